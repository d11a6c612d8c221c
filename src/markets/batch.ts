import { MarketPayloadDecoder } from './decode.js';
import { accumulateDiagnostics, emptyBatchDiagnostics } from './diagnostics.js';
import type { BatchDiagnostics } from './diagnostics.js';
import type { PayloadDecodeError } from './errors.js';
import type { DecoderOptions, MarketRow, MarketsLogger, RawPayload } from './types.js';

export type BatchOptions = {
    /** Ignored when `decoder` is given. */
    config?: DecoderOptions;
    logger?: MarketsLogger | null;
    /** Reuse a decoder whose config was resolved at startup. */
    decoder?: MarketPayloadDecoder;
};

export interface BatchResult {
    rows: MarketRow[];
    failures: PayloadDecodeError[];
    diagnostics: BatchDiagnostics;
}

/** Row shape handed to the category join. */
export interface JoinTuple {
    player_name: string;
    /** The raw encoded token, which is what the category table is keyed by. */
    category_id: string;
    numeric_id: string;
    final_line: number | null;
    top_over_value: number | null;
    top_under_value: number | null;
}

/**
 * Decodes every payload independently. A payload that fails to unwrap adds one
 * failure and no rows; the rest of the batch is unaffected.
 */
export function decodeBatch(payloads: Iterable<RawPayload>, options: BatchOptions = {}): BatchResult {
    const logger = options.logger ?? null;
    const decoder = options.decoder ?? new MarketPayloadDecoder(options.config, logger);
    const rows: MarketRow[] = [];
    const failures: PayloadDecodeError[] = [];
    const diagnostics = emptyBatchDiagnostics();

    for (const payload of payloads) {
        diagnostics.payloads++;
        const result = decoder.decode(payload);
        if (result.error) {
            failures.push(result.error);
            diagnostics.failedPayloads++;
            diagnostics.failuresByStage[result.error.stage]++;
            continue;
        }
        accumulateDiagnostics(diagnostics, result.diagnostics);
        for (const record of result.records) {
            rows.push({ ...record, playerName: result.playerName });
        }
    }

    logger?.info?.(`[batch] payloads=${diagnostics.payloads} failed=${diagnostics.failedPayloads} rows=${rows.length} implausible=${diagnostics.implausibleDiscarded}`);
    return { rows, failures, diagnostics };
}

export function toJoinTuple(row: MarketRow): JoinTuple {
    return {
        player_name: row.playerName,
        category_id: row.rawToken,
        numeric_id: row.numericId,
        final_line: row.finalLine,
        top_over_value: row.topOverValue,
        top_under_value: row.topUnderValue,
    };
}
