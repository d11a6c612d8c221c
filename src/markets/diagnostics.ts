import type { DecodeStage } from './errors.js';

/**
 * Per-payload counters. Discarded tokens and implausible floats are reported
 * here, never as errors.
 */
export interface DecodeDiagnostics {
    bufferBytes: number;
    tokensMatched: number;
    tokensDiscarded: number;
    windowsScanned: number;
    implausibleDiscarded: number;
    candidatesKept: number;
    recordsEmitted: number;
    emptyRecordsDropped: number;
}

export interface BatchDiagnostics extends DecodeDiagnostics {
    payloads: number;
    failedPayloads: number;
    failuresByStage: Record<DecodeStage, number>;
}

export function emptyDecodeDiagnostics(): DecodeDiagnostics {
    return {
        bufferBytes: 0,
        tokensMatched: 0,
        tokensDiscarded: 0,
        windowsScanned: 0,
        implausibleDiscarded: 0,
        candidatesKept: 0,
        recordsEmitted: 0,
        emptyRecordsDropped: 0,
    };
}

export function emptyBatchDiagnostics(): BatchDiagnostics {
    return {
        ...emptyDecodeDiagnostics(),
        payloads: 0,
        failedPayloads: 0,
        failuresByStage: { base64: 0, inflate: 0 },
    };
}

export function accumulateDiagnostics(into: BatchDiagnostics, d: DecodeDiagnostics): void {
    into.bufferBytes += d.bufferBytes;
    into.tokensMatched += d.tokensMatched;
    into.tokensDiscarded += d.tokensDiscarded;
    into.windowsScanned += d.windowsScanned;
    into.implausibleDiscarded += d.implausibleDiscarded;
    into.candidatesKept += d.candidatesKept;
    into.recordsEmitted += d.recordsEmitted;
    into.emptyRecordsDropped += d.emptyRecordsDropped;
}

export function formatDiagnostics(d: DecodeDiagnostics): string {
    return `bytes=${d.bufferBytes} tokens=${d.tokensMatched} discardedTokens=${d.tokensDiscarded} `
        + `windows=${d.windowsScanned} implausible=${d.implausibleDiscarded} candidates=${d.candidatesKept} `
        + `records=${d.recordsEmitted} droppedEmpty=${d.emptyRecordsDropped}`;
}
