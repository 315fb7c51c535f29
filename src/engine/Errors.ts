/**
 * Error hierarchy for the engine.
 *
 * - SqlError: base class, message only
 *   - ValidationError: identifiers, duplicate columns, row arity and types
 *   - CatalogError: duplicate table names
 *   - LexError: unexpected characters, bad numbers, open strings
 *   - ParseError: wrong or missing keywords and symbols, unknown types
 *   - ExecError: unknown tables and columns
 *   - StorageError: snapshot files and their contents
 */

export class SqlError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "SqlError";
    }
}

export class ValidationError extends SqlError {
    constructor(message: string) {
        super(message);
        this.name = "ValidationError";
    }
}

export class CatalogError extends SqlError {
    constructor(message: string) {
        super(message);
        this.name = "CatalogError";
    }
}

export class LexError extends SqlError {
    constructor(message: string) {
        super(message);
        this.name = "LexError";
    }
}

export class ParseError extends SqlError {
    constructor(message: string) {
        super(message);
        this.name = "ParseError";
    }
}

export class ExecError extends SqlError {
    constructor(message: string) {
        super(message);
        this.name = "ExecError";
    }
}

export class StorageError extends SqlError {
    constructor(message: string) {
        super(message);
        this.name = "StorageError";
    }
}

export function isSqlError(error: unknown): error is SqlError {
    return error instanceof SqlError;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
