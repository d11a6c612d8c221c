/**
 * markets64 decoder public API
 *
 * @module markets64
 */

import { MarketPayloadDecoder } from './markets/decode.js';
import { decodeBatch, toJoinTuple } from './markets/batch.js';
import { loadDecoderConfig, resolveDecoderConfig } from './markets/config.js';
import type { BatchOptions, BatchResult } from './markets/batch.js';
import type { PayloadDecodeResult } from './markets/decode.js';
import type { DecoderOptions, MarketsLogger, RawPayload } from './markets/types.js';

export type {
    DecoderOptions, ResolvedDecoderConfig, MarketsLogger as Logger, RawPayload, IdentifierToken,
    NumericCandidate, MarketLine, MarketRecord, MarketRow, RoleStrategy, TokenPattern, TokenEncoding,
    PlausibleRange, ContainerFallback
} from './markets/types.js';
export { MarketsError, PayloadDecodeError, DecoderConfigError, LimitExceededError } from './markets/errors.js';
export type { DecodeStage } from './markets/errors.js';
export { MarketPayloadDecoder } from './markets/decode.js';
export type { PayloadDecodeResult, BufferDecodeResult } from './markets/decode.js';
export { decodeBatch, toJoinTuple } from './markets/batch.js';
export type { BatchOptions, BatchResult, JoinTuple } from './markets/batch.js';
export { resolveDecoderConfig, parseDecoderConfig, loadDecoderConfig, DEFAULT_TOKEN_PATTERN } from './markets/config.js';
export { unwrapPayload, decodeBase64 } from './markets/unwrap.js';
export type { UnwrapResult } from './markets/unwrap.js';
export { PAYLOAD_CODECS, PayloadCodecId, compressPayload, detectPayloadCodec, getPayloadCodec } from './markets/payload-codecs.js';
export type { PayloadCodec } from './markets/payload-codecs.js';
export { scanIdentifiers, listCategories } from './markets/identifier-scanner.js';
export type { ScanResult, CategoryEntry } from './markets/identifier-scanner.js';
export { extractNumericCandidates, isPlausible } from './markets/numeric-extractor.js';
export type { ExtractionResult } from './markets/numeric-extractor.js';
export { assembleRecords } from './markets/assembler.js';
export type { AssemblyResult } from './markets/assembler.js';
export {
    ROLE_STRATEGIES, PositionalRoleStrategy, RankedRoleStrategy, getRoleStrategy, registerRoleStrategy
} from './markets/role-strategies.js';
export type { DecodeDiagnostics, BatchDiagnostics } from './markets/diagnostics.js';

// The Markets64 Namespace Object
export const Markets64 = {
    /**
     * Decodes a single payload with a throwaway decoder.
     */
    decode: (payload: RawPayload, options?: DecoderOptions, logger?: MarketsLogger): PayloadDecodeResult => {
        return new MarketPayloadDecoder(options, logger ?? null).decode(payload);
    },

    /**
     * Decodes a sequence of payloads; failures are collected, not thrown.
     */
    decodeBatch: (payloads: Iterable<RawPayload>, options?: BatchOptions): BatchResult => {
        return decodeBatch(payloads, options);
    },

    toJoinTuple,

    /**
     * Validates and freezes a config. Throws DecoderConfigError.
     */
    configure: resolveDecoderConfig,

    loadConfig: loadDecoderConfig,

    Decoder: MarketPayloadDecoder,
};

export default Markets64;
