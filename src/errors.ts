/**
 * Error types for the save editor.
 *
 * Every failure the tool knows about is fatal to the session; the CLI maps each
 * kind to its own process exit code.
 */

export const EXIT_CODES = {
    USAGE: 64,
    FORMAT: 65,
    TRANSFER_UNAVAILABLE: 69,
    IO: 74,
    UNKNOWN: 1
} as const;

export const ERROR_MESSAGES = {
    DECOMPRESSION_FAILED: 'Save payload is not valid gzip data',
    PARSE_FAILED: 'Save payload is not valid JSON',
    STAGING_PARSE_FAILED: 'Staging file could not be parsed',
    MISSING_HERO: 'Save document has no hero object',
    INVENTORY_NOT_LIST: 'Hero inventory is not a list',
    VERIFICATION_FAILED: 'Generated save failed verification',
    SESSION_OUT_OF_ORDER: 'Session step called out of order'
} as const;

/**
 * Base class for all save editor errors.
 */
export abstract class SaveEditorError extends Error {
    constructor(
        message: string,
        public readonly exitCode: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Payload is not valid compressed structured data, or lacks a hero.
 */
export class FormatError extends SaveEditorError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, EXIT_CODES.FORMAT, options);
    }
}

/**
 * Staging, backup or scratch file could not be read or written.
 */
export class IOError extends SaveEditorError {
    constructor(
        message: string,
        public readonly path: string,
        options?: { cause?: unknown }
    ) {
        super(message, EXIT_CODES.IO, options);
    }
}

/**
 * The device bridge exited non-zero or could not be started.
 * Exit code follows the tool's own status when it has one.
 */
export class TransferError extends SaveEditorError {
    constructor(
        message: string,
        public readonly command: string,
        public readonly status: number | null,
        public readonly stderr: string = '',
        options?: { cause?: unknown }
    ) {
        super(message, status !== null && status > 0 ? status : EXIT_CODES.TRANSFER_UNAVAILABLE, options);
    }
}

export class UsageError extends SaveEditorError {
    constructor(message: string) {
        super(message, EXIT_CODES.USAGE);
    }
}

export function exitCodeFor(error: unknown): number {
    return error instanceof SaveEditorError ? error.exitCode : EXIT_CODES.UNKNOWN;
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
