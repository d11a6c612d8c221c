export class MarketsError extends Error {
    constructor(message: string, public readonly originalError?: unknown) {
        super(message);
        this.name = 'MarketsError';
    }
}

export type DecodeStage = 'base64' | 'inflate';

/**
 * A payload that could not be turned into a byte buffer. Recoverable: the
 * caller records zero rows for the player and moves on.
 */
export class PayloadDecodeError extends MarketsError {
    constructor(
        public readonly stage: DecodeStage,
        public readonly playerName: string,
        reason: string,
        originalError?: unknown
    ) {
        super(`${stage} failed for "${playerName}": ${reason}`, originalError);
        this.name = 'PayloadDecodeError';
    }
}

/** Rejected configuration. Fatal; raised before any payload is processed. */
export class DecoderConfigError extends MarketsError {
    constructor(message: string) {
        super(message);
        this.name = 'DecoderConfigError';
    }
}

export class LimitExceededError extends MarketsError {
    constructor(message: string) {
        super(message);
        this.name = 'LimitExceededError';
    }
}
