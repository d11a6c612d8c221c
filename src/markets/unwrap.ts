import { BASE64_ALPHABET } from './format.js';
import { PayloadDecodeError } from './errors.js';
import { PayloadCodecId, detectPayloadCodec, getPayloadCodec } from './payload-codecs.js';
import type { RawPayload, ResolvedDecoderConfig } from './types.js';

export type UnwrapResult =
    | { ok: true; bytes: Uint8Array; codec: PayloadCodecId }
    | { ok: false; error: PayloadDecodeError };

type Base64Result = { ok: true; bytes: Uint8Array } | { ok: false; reason: string };

/**
 * Strict base64 decode. Whitespace is ignored and missing `=` padding restored;
 * anything else outside the standard alphabet is rejected rather than skipped.
 */
export function decodeBase64(text: string): Base64Result {
    if (typeof text !== 'string') {
        return { ok: false, reason: 'payload is not a string' };
    }
    const compact = text.replace(/\s+/g, '');
    if (compact.length === 0) {
        return { ok: false, reason: 'empty payload' };
    }
    if (compact.length % 4 === 1) {
        return { ok: false, reason: `invalid length ${compact.length}` };
    }
    const padded = compact + '='.repeat((4 - (compact.length % 4)) % 4);
    if (!BASE64_ALPHABET.test(padded)) {
        return { ok: false, reason: 'character outside the base64 alphabet' };
    }
    const buf = Buffer.from(padded, 'base64');
    return { ok: true, bytes: new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength) };
}

/**
 * base64 text → decompressed byte buffer. Never throws for bad input.
 */
export function unwrapPayload(payload: RawPayload, config: ResolvedDecoderConfig): UnwrapResult {
    const decoded = decodeBase64(payload.markets64);
    if (!decoded.ok) {
        return { ok: false, error: new PayloadDecodeError('base64', payload.playerName, decoded.reason) };
    }

    const codec = detectPayloadCodec(decoded.bytes)
        ?? (config.containerFallback === 'passthrough' ? getPayloadCodec(PayloadCodecId.NONE) : null);
    if (!codec) {
        return {
            ok: false,
            error: new PayloadDecodeError('inflate', payload.playerName, 'no zlib or gzip header'),
        };
    }

    try {
        const bytes = codec.decompress(decoded.bytes, config.maxInflatedBytes);
        return { ok: true, bytes, codec: codec.id };
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        return { ok: false, error: new PayloadDecodeError('inflate', payload.playerName, reason, err) };
    }
}
