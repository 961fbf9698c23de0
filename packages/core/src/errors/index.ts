/**
 * TinyRel - Errors
 *
 * Every failure raised by the engine is a TinyRelError. The `kind` field lets
 * callers branch without instanceof chains; the executor copies it into
 * `errorType` on failed results.
 */

export type ErrorKind = 'SchemaError' | 'ConstraintError' | 'ParseError' | 'LookupError';

export abstract class TinyRelError extends Error {
    abstract readonly kind: ErrorKind;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Missing, unknown or mistyped column, or a value that cannot be coerced.
 */
export class SchemaError extends TinyRelError {
    readonly kind = 'SchemaError';
}

/**
 * PRIMARY KEY or UNIQUE collision.
 */
export class ConstraintError extends TinyRelError {
    readonly kind = 'ConstraintError';
    readonly column: string;

    constructor(message: string, column: string) {
        super(message);
        this.column = column;
    }
}

/**
 * Malformed SQL. `fragment` is the offending token text.
 */
export class ParseError extends TinyRelError {
    readonly kind = 'ParseError';
    readonly fragment: string;
    readonly line: number;
    readonly column: number;

    constructor(message: string, fragment: string, line: number, column: number) {
        super(`Parse error at line ${line}, column ${column}: ${message}`);
        this.fragment = fragment;
        this.line = line;
        this.column = column;
    }
}

/**
 * Unknown table or column.
 */
export class LookupError extends TinyRelError {
    readonly kind = 'LookupError';
}

export function isTinyRelError(error: unknown): error is TinyRelError {
    return error instanceof TinyRelError;
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
