import { FLOAT32_WIDTH } from './format.js';
import type { IdentifierToken, MarketRecord, NumericCandidate, ResolvedDecoderConfig } from './types.js';

export interface AssemblyResult {
    records: MarketRecord[];
    emptyRecordsDropped: number;
}

export interface TokenWindow {
    start: number;
    end: number;
}

/**
 * Bytes a token owns: from just past its last byte up to the next token, the
 * end of the buffer or the lookahead bound, whichever comes first.
 */
export function tokenWindow(
    token: IdentifierToken,
    next: IdentifierToken | undefined,
    bufferLength: number,
    lookaheadWindow: number
): TokenWindow {
    const start = token.offset + token.length;
    const end = Math.min(next ? next.offset : bufferLength, bufferLength, start + lookaheadWindow);
    return { start, end: Math.max(start, end) };
}

/**
 * Pairs tokens with the candidates inside their windows and emits one record per
 * token. Both inputs must be ordered by offset; the candidate cursor only moves
 * forward, so no candidate is attributed to two tokens.
 */
export function assembleRecords(
    tokens: readonly IdentifierToken[],
    candidates: readonly NumericCandidate[],
    bufferLength: number,
    config: ResolvedDecoderConfig
): AssemblyResult {
    const records: MarketRecord[] = [];
    let emptyRecordsDropped = 0;
    let cursor = 0;

    for (let i = 0; i < tokens.length; i++) {
        const token = tokens[i];
        const next: IdentifierToken | undefined = tokens[i + 1];
        const { start, end } = tokenWindow(token, next, bufferLength, config.lookaheadWindow);

        while (cursor < candidates.length && candidates[cursor].offset < start) cursor++;
        const window: NumericCandidate[] = [];
        while (cursor < candidates.length && candidates[cursor].offset + FLOAT32_WIDTH <= end) {
            window.push(candidates[cursor]);
            cursor++;
        }

        if (window.length === 0 && !config.keepEmptyRecords) {
            emptyRecordsDropped++;
            continue;
        }

        const line = config.roleStrategy.assign(window, config);
        records.push(Object.freeze({
            numericId: token.numericId,
            categoryId: token.categoryId,
            rawToken: token.rawToken,
            offset: token.offset,
            finalLine: line.finalLine,
            topOverValue: line.topOverValue,
            topUnderValue: line.topUnderValue,
        }));
    }

    return { records, emptyRecordsDropped };
}
