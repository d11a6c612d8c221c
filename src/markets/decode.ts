import { resolveDecoderConfig } from './config.js';
import { assembleRecords } from './assembler.js';
import { emptyDecodeDiagnostics, formatDiagnostics } from './diagnostics.js';
import type { DecodeDiagnostics } from './diagnostics.js';
import type { PayloadDecodeError } from './errors.js';
import { listCategories, scanIdentifiers } from './identifier-scanner.js';
import type { CategoryEntry } from './identifier-scanner.js';
import { extractNumericCandidates } from './numeric-extractor.js';
import type { PayloadCodecId } from './payload-codecs.js';
import { unwrapPayload } from './unwrap.js';
import type {
    DecoderOptions, IdentifierToken, MarketRecord, MarketsLogger, RawPayload, ResolvedDecoderConfig
} from './types.js';

export interface BufferDecodeResult {
    records: MarketRecord[];
    tokens: IdentifierToken[];
    diagnostics: DecodeDiagnostics;
}

export interface PayloadDecodeResult {
    playerName: string;
    records: MarketRecord[];
    /** Set when the payload could not be unwrapped; records is then empty. */
    error: PayloadDecodeError | null;
    codec: PayloadCodecId | null;
    diagnostics: DecodeDiagnostics;
}

/**
 * Decodes one markets64 payload into market records.
 *
 * Stateless between calls: the resolved config is frozen at construction and
 * each call owns its buffer, so one instance can serve any number of payloads.
 */
export class MarketPayloadDecoder {
    readonly config: ResolvedDecoderConfig;
    private readonly logger: MarketsLogger | null;

    constructor(options: DecoderOptions = {}, logger: MarketsLogger | null = null) {
        this.config = resolveDecoderConfig(options);
        this.logger = logger;
    }

    decode(payload: RawPayload): PayloadDecodeResult {
        const unwrapped = unwrapPayload(payload, this.config);
        if (!unwrapped.ok) {
            this.logger?.warn?.(`[decoder] ${unwrapped.error.message}`);
            return {
                playerName: payload.playerName,
                records: [],
                error: unwrapped.error,
                codec: null,
                diagnostics: emptyDecodeDiagnostics(),
            };
        }

        const { records, diagnostics } = this.decodeBytes(unwrapped.bytes);
        this.logger?.debug?.(`[decoder] ${payload.playerName}: codec=${unwrapped.codec} ${formatDiagnostics(diagnostics)}`);
        return {
            playerName: payload.playerName,
            records,
            error: null,
            codec: unwrapped.codec,
            diagnostics,
        };
    }

    /**
     * Scanner, extractor and assembler over an already unwrapped buffer.
     */
    decodeBytes(buffer: Uint8Array): BufferDecodeResult {
        const scan = scanIdentifiers(buffer, this.config.tokenPattern);
        const extraction = extractNumericCandidates(buffer, this.config);
        const assembly = assembleRecords(scan.tokens, extraction.candidates, buffer.length, this.config);

        return {
            records: assembly.records,
            tokens: scan.tokens,
            diagnostics: {
                bufferBytes: buffer.length,
                tokensMatched: scan.tokens.length,
                tokensDiscarded: scan.discarded,
                windowsScanned: extraction.windowsScanned,
                implausibleDiscarded: extraction.implausibleDiscarded,
                candidatesKept: extraction.candidates.length,
                recordsEmitted: assembly.records.length,
                emptyRecordsDropped: assembly.emptyRecordsDropped,
            },
        };
    }

    /**
     * Unique categories a payload references. Empty when the payload cannot be unwrapped.
     */
    extractCategories(payload: RawPayload): CategoryEntry[] {
        const unwrapped = unwrapPayload(payload, this.config);
        if (!unwrapped.ok) {
            this.logger?.warn?.(`[decoder] ${unwrapped.error.message}`);
            return [];
        }
        return listCategories(scanIdentifiers(unwrapped.bytes, this.config.tokenPattern).tokens);
    }
}
