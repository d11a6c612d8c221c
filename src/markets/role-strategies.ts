/**
 * Role assignment: which candidate in a token's window is the line and which are
 * the over/under prices. Kept pluggable so a market type with a different field
 * layout needs a new strategy, not a new scanner.
 */
import { LEGACY_MID_RANGE, LEGACY_MID_RANGE_DIVISOR, LEGACY_TOP_VALUES } from './format.js';
import { DecoderConfigError } from './errors.js';
import { roundTo } from './numeric-extractor.js';
import type { MarketLine, NumericCandidate, ResolvedDecoderConfig, RoleStrategy } from './types.js';

export const EMPTY_LINE: Readonly<MarketLine> = Object.freeze({
    finalLine: null,
    topOverValue: null,
    topUnderValue: null,
});

function scalePrice(value: number | undefined, config: ResolvedDecoderConfig): number | null {
    if (value === undefined) return null;
    return roundTo(value / config.priceScale, config.decimalPlaces);
}

/**
 * First candidate after the token is the line, the next two are the over and
 * under prices. Missing roles stay null.
 */
export const PositionalRoleStrategy: RoleStrategy = {
    name: 'positional',
    assign(window: readonly NumericCandidate[], config: ResolvedDecoderConfig): MarketLine {
        const line: NumericCandidate | undefined = window[0];
        const over: NumericCandidate | undefined = window[1];
        const under: NumericCandidate | undefined = window[2];
        return {
            finalLine: line ? line.value : null,
            topOverValue: scalePrice(over?.value, config),
            topUnderValue: scalePrice(under?.value, config),
        };
    },
};

/**
 * Legacy heuristic: the three largest values in the window, mid-range values
 * divided down, line = their mean.
 */
export const RankedRoleStrategy: RoleStrategy = {
    name: 'ranked',
    assign(window: readonly NumericCandidate[], config: ResolvedDecoderConfig): MarketLine {
        if (window.length === 0) return { ...EMPTY_LINE };

        const top = window.map((c) => c.value).sort((a, b) => b - a).slice(0, LEGACY_TOP_VALUES);
        const normalized = top.map((v) => (
            v >= LEGACY_MID_RANGE.min && v <= LEGACY_MID_RANGE.max
                ? roundTo(v / LEGACY_MID_RANGE_DIVISOR, 2)
                : v
        ));
        const mean = normalized.reduce((sum, v) => sum + v, 0) / normalized.length;
        const over: number | undefined = normalized[0];
        const under: number | undefined = normalized[1];

        return {
            finalLine: roundTo(mean, 2),
            topOverValue: scalePrice(over, config),
            topUnderValue: scalePrice(under, config),
        };
    },
};

export const ROLE_STRATEGIES: Map<string, RoleStrategy> = new Map();

export function registerRoleStrategy(strategy: RoleStrategy): void {
    ROLE_STRATEGIES.set(strategy.name, strategy);
}

export function getRoleStrategy(name: string): RoleStrategy {
    const strategy = ROLE_STRATEGIES.get(name);
    if (!strategy) {
        throw new DecoderConfigError(`Unknown role strategy: ${name}`);
    }
    return strategy;
}

registerRoleStrategy(PositionalRoleStrategy);
registerRoleStrategy(RankedRoleStrategy);
