/**
 * Raised when a non-expired record already owns the URL being added.
 */
export class DuplicateKeyError extends Error {
    public override readonly name = 'DuplicateKeyError';

    constructor(public readonly url: string) {
        super(`A memory record already exists for ${url}`);
    }
}

/**
 * Raised when the persisted memory cannot be decoded.
 */
export class CorruptStateError extends Error {
    public override readonly name = 'CorruptStateError';

    constructor(
        public readonly path: string,
        options?: { cause?: unknown },
    ) {
        super(`Memory state at ${path} is corrupt`, options);
    }
}

/**
 * Raised when a record is missing a required field or carries an invalid one.
 */
export class InvalidRecordError extends Error {
    public override readonly name = 'InvalidRecordError';

    constructor(
        message: string,
        public readonly issues: string[] = [],
    ) {
        super(`Invalid memory record: ${message}`);
    }
}
