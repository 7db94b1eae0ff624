/**
 * Typed errors for the catalog core and the shell.
 *
 * Each error carries a `kind` discriminator and a `recovery` hint. The hint tells
 * the shell whether the rest of the current input line should be thrown away
 * once the error is reported; it is independent of the message text.
 */

export type RecoveryHint = 'discard-line' | 'keep-line';

export type ErrorKind =
    | 'not-found'
    | 'duplicate'
    | 'in-use'
    | 'out-of-range'
    | 'already-member'
    | 'not-member'
    | 'invalid-value'
    | 'invalid-format'
    | 'io'
    | 'input';

export abstract class MediaCatalogError extends Error {
    abstract readonly kind: ErrorKind;
    readonly recovery: RecoveryHint;

    constructor(message: string, recovery: RecoveryHint, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
        this.recovery = recovery;
    }

    get discardsLine(): boolean {
        return this.recovery === 'discard-line';
    }
}

export class NotFoundError extends MediaCatalogError {
    readonly kind = 'not-found';
}

export class DuplicateError extends MediaCatalogError {
    readonly kind = 'duplicate';
}

export class InUseError extends MediaCatalogError {
    readonly kind = 'in-use';
}

export class OutOfRangeError extends MediaCatalogError {
    readonly kind = 'out-of-range';
}

export class AlreadyMemberError extends MediaCatalogError {
    readonly kind = 'already-member';
}

export class NotMemberError extends MediaCatalogError {
    readonly kind = 'not-member';
}

/** A title, medium or collection name that the snapshot format could not hold. */
export class InvalidValueError extends MediaCatalogError {
    readonly kind = 'invalid-value';

    constructor(message: string) {
        super(message, 'discard-line');
    }
}

export const ERR_INVALID_FILE = 'Invalid data found in file!';

/** Malformed snapshot data; restore is aborted as a whole. */
export class InvalidFormatError extends MediaCatalogError {
    readonly kind = 'invalid-format';

    constructor(message: string = ERR_INVALID_FILE) {
        super(message, 'discard-line');
    }
}

export class IOError extends MediaCatalogError {
    readonly kind = 'io';

    constructor(message: string, cause?: unknown) {
        super(message, 'discard-line', { cause });
    }
}

/** Raised by the shell tokenizer when an argument cannot be read. */
export class InputError extends MediaCatalogError {
    readonly kind = 'input';
}

export function isMediaCatalogError(err: unknown): err is MediaCatalogError {
    return err instanceof MediaCatalogError;
}
