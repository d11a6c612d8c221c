import { deflateSync, gunzipSync, gzipSync, inflateSync } from 'node:zlib';
import { GZIP_MAGIC, ZLIB_DEFLATE_METHOD } from './format.js';
import { LimitExceededError } from './errors.js';

export enum PayloadCodecId {
    NONE = 'none',
    ZLIB = 'zlib',
    GZIP = 'gzip',
}

export interface PayloadCodec {
    id: PayloadCodecId;
    name: string;
    /** True when the bytes carry this codec's header. */
    matches(data: Uint8Array): boolean;
    compress(data: Uint8Array): Uint8Array;
    decompress(data: Uint8Array, maxSize: number): Uint8Array;
}

/**
 * Registry of container codecs, in detection order.
 */
export const PAYLOAD_CODECS: Map<PayloadCodecId, PayloadCodec> = new Map();

function isBufferTooLarge(err: unknown): boolean {
    return err instanceof RangeError
        && 'code' in err
        && err.code === 'ERR_BUFFER_TOO_LARGE';
}

function boundedInflate(
    data: Uint8Array,
    maxSize: number,
    inflate: (buf: Uint8Array, opts: { maxOutputLength: number }) => Buffer
): Uint8Array {
    let out: Buffer;
    try {
        out = inflate(data, { maxOutputLength: maxSize });
    } catch (err) {
        if (isBufferTooLarge(err)) {
            throw new LimitExceededError(`Decompressed size limit exceeded (Limit: ${maxSize})`);
        }
        throw err;
    }
    return new Uint8Array(out.buffer, out.byteOffset, out.byteLength);
}

/**
 * zlib stream (RFC 1950). Header: CMF with deflate method, CMF*256+FLG divisible by 31.
 */
export const PayloadCodecZlib: PayloadCodec = {
    id: PayloadCodecId.ZLIB,
    name: 'ZLIB',
    matches(data: Uint8Array) {
        if (data.length < 2) return false;
        const cmf = data[0];
        const flg = data[1];
        return (cmf & 0x0f) === ZLIB_DEFLATE_METHOD
            && (cmf >> 4) <= 7
            && ((cmf << 8) | flg) % 31 === 0;
    },
    compress(data: Uint8Array) {
        return new Uint8Array(deflateSync(data));
    },
    decompress(data: Uint8Array, maxSize: number) {
        return boundedInflate(data, maxSize, inflateSync);
    },
};

export const PayloadCodecGzip: PayloadCodec = {
    id: PayloadCodecId.GZIP,
    name: 'GZIP',
    matches(data: Uint8Array) {
        return data.length >= 2 && data[0] === GZIP_MAGIC[0] && data[1] === GZIP_MAGIC[1];
    },
    compress(data: Uint8Array) {
        return new Uint8Array(gzipSync(data));
    },
    decompress(data: Uint8Array, maxSize: number) {
        return boundedInflate(data, maxSize, gunzipSync);
    },
};

/**
 * Identity codec. Never detected; used only for the passthrough fallback.
 */
export const PayloadCodecNone: PayloadCodec = {
    id: PayloadCodecId.NONE,
    name: 'NONE',
    matches() {
        return false;
    },
    compress(data: Uint8Array) {
        return data;
    },
    decompress(data: Uint8Array, maxSize: number) {
        if (data.length > maxSize) {
            throw new LimitExceededError(`Decompressed size limit exceeded (Input: ${data.length} > Limit: ${maxSize})`);
        }
        return data;
    },
};

PAYLOAD_CODECS.set(PayloadCodecId.ZLIB, PayloadCodecZlib);
PAYLOAD_CODECS.set(PayloadCodecId.GZIP, PayloadCodecGzip);
PAYLOAD_CODECS.set(PayloadCodecId.NONE, PayloadCodecNone);

export function getPayloadCodec(id: PayloadCodecId): PayloadCodec {
    const codec = PAYLOAD_CODECS.get(id);
    if (!codec) {
        throw new Error(`Unknown PayloadCodecId: ${id}`);
    }
    return codec;
}

export function detectPayloadCodec(data: Uint8Array): PayloadCodec | null {
    for (const codec of PAYLOAD_CODECS.values()) {
        if (codec.matches(data)) return codec;
    }
    return null;
}

export function compressPayload(data: Uint8Array, id: PayloadCodecId = PayloadCodecId.ZLIB): Uint8Array {
    return getPayloadCodec(id).compress(data);
}
