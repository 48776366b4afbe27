/**
 * Stable identifiers for every failure the SBF library reports.
 */
type SbfErrorCode =
    'HeaderMalformed' |
    'GlobalShiftMalformed' |
    'PayloadMalformed' |
    'PayloadTruncated' |
    'PayloadHeaderMismatch' |
    'FieldNotFound' |
    'DuplicateFieldName' |
    'InvalidFieldName' |
    'FieldLengthMismatch' |
    'FileNotFound' |
    'IOFailure';

/**
 * Base class for all errors thrown by the SBF library.
 *
 * @example
 * ```ts
 * try {
 *     SbfDocument.open(headerText, payloadBytes);
 * } catch (err) {
 *     if (err instanceof SbfError && err.code === 'PayloadHeaderMismatch') {
 *         // header and .data file disagree
 *     }
 * }
 * ```
 */
class SbfError extends Error {
    readonly code: SbfErrorCode;

    /** Optional suggestion shown after the message. */
    readonly hint?: string;

    constructor(code: SbfErrorCode, message: string, hint?: string) {
        super(message);
        this.name = 'SbfError';
        this.code = code;
        this.hint = hint;
    }

    format(): string {
        return this.hint ? `${this.message}\nhelp: ${this.hint}` : this.message;
    }
}

class HeaderMalformedError extends SbfError {
    constructor(message: string, hint?: string) {
        super('HeaderMalformed', `malformed sbf header: ${message}`, hint);
        this.name = 'HeaderMalformedError';
    }
}

class GlobalShiftMalformedError extends SbfError {
    readonly value: string;

    constructor(value: string) {
        super('GlobalShiftMalformed', `malformed GlobalShift '${value}'`, 'expected three numbers, e.g. \'GlobalShift=-300000, -5000000, 0\'');
        this.name = 'GlobalShiftMalformedError';
        this.value = value;
    }
}

class PayloadMalformedError extends SbfError {
    constructor(message: string) {
        super('PayloadMalformed', `malformed sbf payload: ${message}`);
        this.name = 'PayloadMalformedError';
    }
}

class PayloadTruncatedError extends SbfError {
    readonly expected: number;
    readonly actual: number;

    constructor(expected: number, actual: number) {
        super('PayloadTruncated', `sbf payload truncated: expected ${expected} bytes, got ${actual}`);
        this.name = 'PayloadTruncatedError';
        this.expected = expected;
        this.actual = actual;
    }
}

class PayloadHeaderMismatchError extends SbfError {
    constructor(what: 'Points' | 'SFCount', declared: number, stored: number) {
        super(
            'PayloadHeaderMismatch',
            `header declares ${what}=${declared} but the payload stores ${stored}`,
            'the .sbf and .sbf.data files probably belong to different clouds'
        );
        this.name = 'PayloadHeaderMismatchError';
    }
}

/**
 * Thrown when a scalar field name is not present in a document.
 */
class FieldNotFoundError extends SbfError {
    readonly field: string;
    readonly available: string[];

    constructor(field: string, available: string[]) {
        const hint = available.length > 0 ?
            `available fields are: ${available.map(name => `'${name}'`).join(', ')}` :
            'the document has no scalar fields';

        super('FieldNotFound', `scalar field '${field}' not found`, hint);
        this.name = 'FieldNotFoundError';
        this.field = field;
        this.available = available;
    }
}

class DuplicateFieldNameError extends SbfError {
    readonly field: string;

    constructor(field: string) {
        super('DuplicateFieldName', `scalar field '${field}' already exists`);
        this.name = 'DuplicateFieldNameError';
        this.field = field;
    }
}

class InvalidFieldNameError extends SbfError {
    readonly field: string;

    constructor(field: string) {
        super('InvalidFieldName', `invalid scalar field name '${field}'`, 'names must be non-empty single-line text without surrounding whitespace');
        this.name = 'InvalidFieldNameError';
        this.field = field;
    }
}

class FieldLengthMismatchError extends SbfError {
    constructor(field: string, expected: number, actual: number) {
        super('FieldLengthMismatch', `scalar field '${field}' has ${actual} values, expected ${expected}`);
        this.name = 'FieldLengthMismatchError';
    }
}

class FileNotFoundError extends SbfError {
    readonly path: string;

    constructor(path: string) {
        super('FileNotFound', `file '${path}' not found`);
        this.name = 'FileNotFoundError';
        this.path = path;
    }
}

class IoError extends SbfError {
    readonly path: string;

    constructor(path: string, reason: string) {
        super('IOFailure', `cannot access '${path}': ${reason}`);
        this.name = 'IoError';
        this.path = path;
    }
}

export {
    SbfError,
    type SbfErrorCode,
    HeaderMalformedError,
    GlobalShiftMalformedError,
    PayloadMalformedError,
    PayloadTruncatedError,
    PayloadHeaderMismatchError,
    FieldNotFoundError,
    DuplicateFieldNameError,
    InvalidFieldNameError,
    FieldLengthMismatchError,
    FileNotFoundError,
    IoError
};
