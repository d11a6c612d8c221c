import { FLOAT32_WIDTH } from './format.js';
import { DecoderConfigError } from './errors.js';
import type { NumericCandidate, PlausibleRange, ResolvedDecoderConfig } from './types.js';

export type ExtractorConfig = Pick<ResolvedDecoderConfig, 'byteStride' | 'littleEndian' | 'plausibleRange' | 'decimalPlaces'>;

export interface ExtractionResult {
    candidates: NumericCandidate[];
    windowsScanned: number;
    implausibleDiscarded: number;
}

/**
 * Finite and within the inclusive magnitude bounds. Lines can be negative
 * (spreads), so the sign is not part of the test.
 */
export function isPlausible(value: number, range: PlausibleRange): boolean {
    if (!Number.isFinite(value)) return false;
    const magnitude = Math.abs(value);
    return magnitude >= range.min && magnitude <= range.max;
}

/** Half away from zero. */
export function roundTo(value: number, decimals: number): number {
    const factor = 10 ** decimals;
    return Math.sign(value) * (Math.round(Math.abs(value) * factor) / factor);
}

/**
 * Decodes every stride-aligned float32 window of the buffer and keeps the ones that
 * are plausible both as read and once rounded.
 */
export function extractNumericCandidates(buffer: Uint8Array, config: ExtractorConfig): ExtractionResult {
    const stride = config.byteStride;
    if (!Number.isInteger(stride) || stride <= 0) {
        throw new DecoderConfigError(`byteStride must be a positive integer, got ${stride}`);
    }

    const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    const candidates: NumericCandidate[] = [];
    let windowsScanned = 0;
    let implausibleDiscarded = 0;

    for (let offset = 0; offset + FLOAT32_WIDTH <= buffer.length; offset += stride) {
        windowsScanned++;
        const raw = view.getFloat32(offset, config.littleEndian);
        // Bounds finer than decimalPlaces can let rounding push a value out of range.
        const value = roundTo(raw, config.decimalPlaces);
        if (!isPlausible(raw, config.plausibleRange) || !isPlausible(value, config.plausibleRange)) {
            implausibleDiscarded++;
            continue;
        }
        candidates.push({ offset, value });
    }

    return { candidates, windowsScanned, implausibleDiscarded };
}
