export type MarketsLogger = {
    debug?: (msg: string) => void;
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

/** How a matched token is turned into text before its numeric suffix is read. */
export type TokenEncoding = 'base64' | 'utf8';

export interface TokenPattern {
    /** Matched against a one-char-per-byte view of the buffer. */
    encoded: RegExp;
    encoding: TokenEncoding;
    /** Applied to the decoded token text. Capture group 1 is the numeric id. */
    numericSuffix: RegExp;
}

export interface PlausibleRange {
    min: number;
    max: number;
}

/**
 * - `reject`: bytes without a known compression header fail the inflate stage
 * - `passthrough`: such bytes are used as the buffer unchanged
 */
export type ContainerFallback = 'reject' | 'passthrough';

export interface RawPayload {
    playerName: string;
    markets64: string;
}

export interface IdentifierToken {
    /** Encoded substring as it appears in the buffer; the category table's join key. */
    rawToken: string;
    /** Decoded token text, e.g. `gid://hs3/Category/123`. */
    categoryId: string;
    /** Decimal digits of the numeric suffix. Kept as text so wide ids lose nothing. */
    numericId: string;
    offset: number;
    length: number;
}

export interface NumericCandidate {
    offset: number;
    value: number;
}

export interface MarketLine {
    finalLine: number | null;
    topOverValue: number | null;
    topUnderValue: number | null;
}

export interface MarketRecord extends MarketLine {
    numericId: string;
    categoryId: string;
    rawToken: string;
    /** Byte offset of the token the record was built from. */
    offset: number;
}

export interface MarketRow extends MarketRecord {
    playerName: string;
}

/**
 * Assigns roles to the candidates found in one token's window.
 * Implementations must be pure: same window, same line.
 */
export interface RoleStrategy {
    readonly name: string;
    assign(window: readonly NumericCandidate[], config: ResolvedDecoderConfig): MarketLine;
}

export type DecoderOptions = {
    /** Alignment step between float windows, in bytes (default 4). */
    byteStride?: number;
    /** Byte order of float fields (default little-endian). */
    littleEndian?: boolean;
    /** Inclusive bounds on |value| (default 0.3..400). */
    plausibleRange?: PlausibleRange;
    /** Candidates are rounded to this many decimals (default 2). */
    decimalPlaces?: number;
    /** Max bytes after a token searched for its fields (default 1024). */
    lookaheadWindow?: number;
    /** Emit all-null records for tokens with no candidates (default true). */
    keepEmptyRecords?: boolean;
    /** Divisor for price-role values (default 1). */
    priceScale?: number;
    /** Registered strategy name or a strategy object (default `positional`). */
    roleStrategy?: string | RoleStrategy;
    tokenPattern?: TokenPattern;
    /** Upper bound on the decompressed buffer (default 16 MiB). */
    maxInflatedBytes?: number;
    containerFallback?: ContainerFallback;
};

export type ResolvedDecoderConfig = Readonly<{
    byteStride: number;
    littleEndian: boolean;
    plausibleRange: Readonly<PlausibleRange>;
    decimalPlaces: number;
    lookaheadWindow: number;
    keepEmptyRecords: boolean;
    priceScale: number;
    roleStrategy: RoleStrategy;
    tokenPattern: Readonly<TokenPattern>;
    maxInflatedBytes: number;
    containerFallback: ContainerFallback;
}>;
