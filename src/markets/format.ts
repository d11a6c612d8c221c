/**
 * markets64 format constants.
 *
 * Every heuristic the decoder relies on lives here under a name, so that upstream
 * format drift is a config change rather than a code change.
 */

/** Width of one numeric field (IEEE-754 single precision). */
export const FLOAT32_WIDTH = 4;

export const DEFAULT_BYTE_STRIDE = 4;
export const DEFAULT_LOOKAHEAD_WINDOW = 1024;
export const DEFAULT_DECIMAL_PLACES = 2;
export const MAX_DECIMAL_PLACES = 6;

/** Inclusive magnitude bounds for a value to pass as betting data. */
export const DEFAULT_PLAUSIBLE_RANGE = { min: 0.3, max: 400 } as const;

/**
 * Divisor applied to price-role values. 1 means prices are stored unscaled;
 * raise it if upstream starts storing fixed-point prices.
 */
export const DEFAULT_PRICE_SCALE = 1;

/** Mid-range divisor of the ranked (legacy) role strategy. */
export const LEGACY_MID_RANGE_DIVISOR = 3.5;
export const LEGACY_MID_RANGE = { min: 10, max: 100 } as const;
export const LEGACY_TOP_VALUES = 3;

export const DEFAULT_MAX_INFLATED_BYTES = 16 * 1024 * 1024;

/** base64("gid://hs3/Category/"). */
export const CATEGORY_TOKEN_PREFIX = 'Z2lkOi8vaHMzL0NhdGVnb3J5Lz';
/** The prefix, then the encoded id up to its padding or the next token's prefix. */
export const CATEGORY_TOKEN_SOURCE = `${CATEGORY_TOKEN_PREFIX}(?:(?!${CATEGORY_TOKEN_PREFIX})[A-Za-z0-9+/])*={0,2}`;
export const CATEGORY_SUFFIX_SOURCE = '^gid://[^/]+/Category/(\\d+)';

export const BASE64_ALPHABET = /^[A-Za-z0-9+/]*={0,2}$/;

export const GZIP_MAGIC = new Uint8Array([0x1f, 0x8b]);

/** zlib CM field for deflate. */
export const ZLIB_DEFLATE_METHOD = 0x08;
