/**
 * Error taxonomy for the typo scanner.
 * Provides a structured hierarchy with machine-readable codes, preserving original causes, and
 * optional metadata for diagnostics.
 *
 * Conventions:
 * - Class names are PascalCase.
 * - Error codes are SNAKE_CASE and globally unique.
 * - Each error includes `code`, optional `details`, and optional `cause` chain.
 * - Use specific subclasses instead of the base `AppError` wherever possible.
 */

/** Well-known application error codes. */
export const ERROR_CODES = {
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    DICTIONARY_LOAD_ERROR: 'DICTIONARY_LOAD_ERROR',
    INVALID_ESCAPE: 'INVALID_ESCAPE',
    TOKENIZE_ERROR: 'TOKENIZE_ERROR',
    FILE_READ_ERROR: 'FILE_READ_ERROR',
    DIRECTORY_READ_ERROR: 'DIRECTORY_READ_ERROR',
} as const;

/** Union type of all known error code string literals. */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Structured, non-secret metadata attached to an error. */
export type ErrorDetails = Record<string, string | number | boolean | undefined>;

/**
 * Base application error carrying a machine code and structured details.
 */
export class AppError extends Error {
    /** Machine readable error code (SNAKE_CASE). */
    public readonly code: ErrorCode;
    /** Arbitrary structured metadata for diagnostics. */
    public readonly details?: ErrorDetails;
    /** Underlying cause error (if any). */
    public readonly cause?: unknown;

    /**
     * Constructs a new AppError.
     * @param code ErrorCode - Machine error code (see ERROR_CODES)
     * @param message string - Human readable summary
     * @param details ErrorDetails|undefined - Additional structured context (paths, offsets, etc.)
     * @param cause unknown - Original error object or value
     */
    constructor(code: ErrorCode, message: string, details?: ErrorDetails, cause?: unknown) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.details = details;
        this.cause = cause;
        // Maintain proper prototype chain (TS/JS quirk)
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** ValidationError indicates configuration or CLI input failed schema or semantic validation. */
export class ValidationError extends AppError {
    /**
     * @param message string - Description of validation failure
     * @param details ErrorDetails|undefined - Offending field info, schema path, etc.
     */
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.VALIDATION_ERROR, message, details);
    }
}

/** DictionaryLoadError is fatal: nothing can be scanned without a dictionary. */
export class DictionaryLoadError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.DICTIONARY_LOAD_ERROR, message, details, cause);
    }
}

/** InvalidEscapeError marks a single string literal whose escape sequences cannot be decoded. */
export class InvalidEscapeError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.INVALID_ESCAPE, message, details);
    }
}

/** TokenizeError when source text cannot be split into spans (e.g. unterminated literal). */
export class TokenizeError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.TOKENIZE_ERROR, message, details);
    }
}

/** FileReadError for a single file that cannot be opened or read. */
export class FileReadError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.FILE_READ_ERROR, message, details, cause);
    }
}

/** DirectoryReadError for a directory that cannot be listed; its subtree is skipped. */
export class DirectoryReadError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.DIRECTORY_READ_ERROR, message, details, cause);
    }
}

/**
 * Extracts a printable message from any thrown value.
 * @param error unknown - Caught value
 * @returns string - Message text
 */
export function DescribeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
