import { readFileSync } from 'node:fs';
import {
    CATEGORY_SUFFIX_SOURCE, CATEGORY_TOKEN_SOURCE, DEFAULT_BYTE_STRIDE, DEFAULT_DECIMAL_PLACES,
    DEFAULT_LOOKAHEAD_WINDOW, DEFAULT_MAX_INFLATED_BYTES, DEFAULT_PLAUSIBLE_RANGE, DEFAULT_PRICE_SCALE,
    MAX_DECIMAL_PLACES
} from './format.js';
import { DecoderConfigError } from './errors.js';
import { PositionalRoleStrategy, getRoleStrategy } from './role-strategies.js';
import type {
    ContainerFallback, DecoderOptions, PlausibleRange, ResolvedDecoderConfig, RoleStrategy,
    TokenEncoding, TokenPattern
} from './types.js';

export const DEFAULT_TOKEN_PATTERN: Readonly<TokenPattern> = Object.freeze({
    encoded: new RegExp(CATEGORY_TOKEN_SOURCE, 'g'),
    encoding: 'base64',
    numericSuffix: new RegExp(CATEGORY_SUFFIX_SOURCE),
});

const DEFAULTS = {
    byteStride: DEFAULT_BYTE_STRIDE,
    littleEndian: true,
    plausibleRange: DEFAULT_PLAUSIBLE_RANGE,
    decimalPlaces: DEFAULT_DECIMAL_PLACES,
    lookaheadWindow: DEFAULT_LOOKAHEAD_WINDOW,
    keepEmptyRecords: true,
    priceScale: DEFAULT_PRICE_SCALE,
    roleStrategy: PositionalRoleStrategy,
    tokenPattern: DEFAULT_TOKEN_PATTERN,
    maxInflatedBytes: DEFAULT_MAX_INFLATED_BYTES,
    containerFallback: 'reject',
} satisfies ResolvedDecoderConfig;

const CONTAINER_FALLBACKS: readonly ContainerFallback[] = ['reject', 'passthrough'];
const TOKEN_ENCODINGS: readonly TokenEncoding[] = ['base64', 'utf8'];

function requirePositiveInteger(name: string, value: number): number {
    if (!Number.isInteger(value) || value <= 0) {
        throw new DecoderConfigError(`${name} must be a positive integer, got ${value}`);
    }
    return value;
}

function resolveRange(range: PlausibleRange): Readonly<PlausibleRange> {
    const { min, max } = range;
    if (!Number.isFinite(min) || !Number.isFinite(max) || min < 0 || min > max) {
        throw new DecoderConfigError(`plausibleRange must satisfy 0 <= min <= max, got [${min}, ${max}]`);
    }
    return Object.freeze({ min, max });
}

function resolveStrategy(strategy: string | RoleStrategy): RoleStrategy {
    if (typeof strategy === 'string') return getRoleStrategy(strategy);
    if (typeof strategy.name !== 'string' || typeof strategy.assign !== 'function') {
        throw new DecoderConfigError('roleStrategy must have a name and an assign function');
    }
    return strategy;
}

/**
 * The scanner iterates with matchAll, so `encoded` needs the g flag; the suffix
 * regex is run with exec and must not carry lastIndex state.
 */
function resolveTokenPattern(pattern: TokenPattern): Readonly<TokenPattern> {
    if (!(pattern.encoded instanceof RegExp) || !(pattern.numericSuffix instanceof RegExp)) {
        throw new DecoderConfigError('tokenPattern.encoded and tokenPattern.numericSuffix must be regular expressions');
    }
    if (!TOKEN_ENCODINGS.includes(pattern.encoding)) {
        throw new DecoderConfigError(`tokenPattern.encoding must be one of ${TOKEN_ENCODINGS.join(', ')}`);
    }
    const encodedFlags = pattern.encoded.flags.replace(/[gy]/g, '') + 'g';
    const suffixFlags = pattern.numericSuffix.flags.replace(/[gy]/g, '');
    return Object.freeze({
        encoded: new RegExp(pattern.encoded.source, encodedFlags),
        encoding: pattern.encoding,
        numericSuffix: new RegExp(pattern.numericSuffix.source, suffixFlags),
    });
}

/**
 * Merges options over the defaults, validates, and freezes the result.
 * Throws DecoderConfigError on the first invalid setting.
 */
export function resolveDecoderConfig(options: DecoderOptions = {}): ResolvedDecoderConfig {
    const byteStride = requirePositiveInteger('byteStride', options.byteStride ?? DEFAULTS.byteStride);
    const lookaheadWindow = requirePositiveInteger('lookaheadWindow', options.lookaheadWindow ?? DEFAULTS.lookaheadWindow);
    const maxInflatedBytes = requirePositiveInteger('maxInflatedBytes', options.maxInflatedBytes ?? DEFAULTS.maxInflatedBytes);

    const decimalPlaces = options.decimalPlaces ?? DEFAULTS.decimalPlaces;
    if (!Number.isInteger(decimalPlaces) || decimalPlaces < 0 || decimalPlaces > MAX_DECIMAL_PLACES) {
        throw new DecoderConfigError(`decimalPlaces must be an integer in 0..${MAX_DECIMAL_PLACES}, got ${decimalPlaces}`);
    }

    const priceScale = options.priceScale ?? DEFAULTS.priceScale;
    if (!Number.isFinite(priceScale) || priceScale <= 0) {
        throw new DecoderConfigError(`priceScale must be a finite number > 0, got ${priceScale}`);
    }

    const containerFallback = options.containerFallback ?? DEFAULTS.containerFallback;
    if (!CONTAINER_FALLBACKS.includes(containerFallback)) {
        throw new DecoderConfigError(`containerFallback must be one of ${CONTAINER_FALLBACKS.join(', ')}`);
    }

    return Object.freeze({
        byteStride,
        littleEndian: options.littleEndian ?? DEFAULTS.littleEndian,
        plausibleRange: resolveRange(options.plausibleRange ?? DEFAULTS.plausibleRange),
        decimalPlaces,
        lookaheadWindow,
        keepEmptyRecords: options.keepEmptyRecords ?? DEFAULTS.keepEmptyRecords,
        priceScale,
        roleStrategy: resolveStrategy(options.roleStrategy ?? DEFAULTS.roleStrategy),
        tokenPattern: resolveTokenPattern(options.tokenPattern ?? DEFAULTS.tokenPattern),
        maxInflatedBytes,
        containerFallback,
    });
}

// --- JSON form ---

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(obj: Record<string, unknown>, key: string): number | undefined {
    const v = obj[key];
    if (v === undefined) return undefined;
    if (typeof v !== 'number') throw new DecoderConfigError(`${key} must be a number`);
    return v;
}

function readBoolean(obj: Record<string, unknown>, key: string): boolean | undefined {
    const v = obj[key];
    if (v === undefined) return undefined;
    if (typeof v !== 'boolean') throw new DecoderConfigError(`${key} must be a boolean`);
    return v;
}

function readString(obj: Record<string, unknown>, key: string): string | undefined {
    const v = obj[key];
    if (v === undefined) return undefined;
    if (typeof v !== 'string') throw new DecoderConfigError(`${key} must be a string`);
    return v;
}

function compilePattern(key: string, source: string, flags: string | undefined): RegExp {
    try {
        return new RegExp(source, flags);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new DecoderConfigError(`tokenPattern.${key} is not a valid regular expression: ${reason}`);
    }
}

function parseTokenPattern(value: unknown): TokenPattern | undefined {
    if (value === undefined) return undefined;
    if (!isRecord(value)) throw new DecoderConfigError('tokenPattern must be an object');

    const encoded = readString(value, 'encoded');
    const numericSuffix = readString(value, 'numericSuffix');
    if (encoded === undefined || numericSuffix === undefined) {
        throw new DecoderConfigError('tokenPattern needs both encoded and numericSuffix');
    }
    const encoding = readString(value, 'encoding') ?? 'base64';
    if (encoding !== 'base64' && encoding !== 'utf8') {
        throw new DecoderConfigError(`tokenPattern.encoding must be one of ${TOKEN_ENCODINGS.join(', ')}`);
    }
    const flags = readString(value, 'flags');
    return {
        encoded: compilePattern('encoded', encoded, flags),
        encoding,
        numericSuffix: compilePattern('numericSuffix', numericSuffix, flags),
    };
}

function parseRange(value: unknown): PlausibleRange | undefined {
    if (value === undefined) return undefined;
    if (!isRecord(value)) throw new DecoderConfigError('plausibleRange must be an object');
    const min = readNumber(value, 'min');
    const max = readNumber(value, 'max');
    if (min === undefined || max === undefined) {
        throw new DecoderConfigError('plausibleRange needs both min and max');
    }
    return { min, max };
}

function parseFallback(value: string | undefined): ContainerFallback | undefined {
    if (value === undefined) return undefined;
    if (value !== 'reject' && value !== 'passthrough') {
        throw new DecoderConfigError(`containerFallback must be one of ${CONTAINER_FALLBACKS.join(', ')}`);
    }
    return value;
}

const JSON_KEYS = new Set([
    'byteStride', 'littleEndian', 'plausibleRange', 'decimalPlaces', 'lookaheadWindow',
    'keepEmptyRecords', 'priceScale', 'roleStrategy', 'tokenPattern', 'maxInflatedBytes',
    'containerFallback',
]);

/**
 * Parses the JSON form of the options. Patterns are given as regex source strings.
 * Unknown keys are rejected.
 */
export function parseDecoderConfig(json: unknown): DecoderOptions {
    if (!isRecord(json)) throw new DecoderConfigError('Decoder config must be a JSON object');
    for (const key of Object.keys(json)) {
        if (!JSON_KEYS.has(key)) throw new DecoderConfigError(`Unknown config key: ${key}`);
    }

    return {
        byteStride: readNumber(json, 'byteStride'),
        littleEndian: readBoolean(json, 'littleEndian'),
        plausibleRange: parseRange(json.plausibleRange),
        decimalPlaces: readNumber(json, 'decimalPlaces'),
        lookaheadWindow: readNumber(json, 'lookaheadWindow'),
        keepEmptyRecords: readBoolean(json, 'keepEmptyRecords'),
        priceScale: readNumber(json, 'priceScale'),
        roleStrategy: readString(json, 'roleStrategy'),
        tokenPattern: parseTokenPattern(json.tokenPattern),
        maxInflatedBytes: readNumber(json, 'maxInflatedBytes'),
        containerFallback: parseFallback(readString(json, 'containerFallback')),
    };
}

/**
 * Reads, parses and resolves a JSON config file. Meant to run once at startup.
 */
export function loadDecoderConfig(filePath: string): ResolvedDecoderConfig {
    let text: string;
    try {
        text = readFileSync(filePath, 'utf8');
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new DecoderConfigError(`Cannot read decoder config ${filePath}: ${reason}`);
    }

    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new DecoderConfigError(`Decoder config ${filePath} is not valid JSON: ${reason}`);
    }

    return resolveDecoderConfig(parseDecoderConfig(json));
}
