/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // The next queue item can still play
    TRANSIENT = "TRANSIENT", // Collaborator unavailable, later calls may succeed
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Resolution errors
    RESOLUTION_FAILED = "RESOLUTION_FAILED",
    RESOLUTION_CANCELLED = "RESOLUTION_CANCELLED",
    EMPTY_EXTRACTION = "EMPTY_EXTRACTION",
    PLAYLIST_NOT_FOUND = "PLAYLIST_NOT_FOUND",

    // Playback errors
    DRIVER_FAILURE = "DRIVER_FAILURE",
    CLOCK_STATE = "CLOCK_STATE",
    SESSION_DISPOSED = "SESSION_DISPOSED",

    // Request errors
    INVALID_REQUEST = "INVALID_REQUEST",
}

/**
 * Base application error
 */
export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, new.target.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

/**
 * A track reference could not be turned into a playable source after every
 * attempt. `lastError` is whatever the final attempt failed with.
 */
export class ResolutionError extends AppError {
    constructor(
        public readonly query: string,
        public readonly attempts: number,
        public readonly lastError: unknown
    ) {
        super(
            ErrorCode.RESOLUTION_FAILED,
            ErrorCategory.RECOVERABLE,
            `Could not resolve "${query}" after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${describeError(lastError)}`,
            { query, attempts, lastError: describeError(lastError) }
        );
        this.name = "ResolutionError";
    }
}

export class ResolutionCancelledError extends AppError {
    constructor(public readonly query: string) {
        super(
            ErrorCode.RESOLUTION_CANCELLED,
            ErrorCategory.RECOVERABLE,
            `Resolution of "${query}" was cancelled`,
            { query }
        );
        this.name = "ResolutionCancelledError";
    }
}

/** The extractor answered, but with nothing usable. Retryable. */
export class EmptyExtractionError extends AppError {
    constructor(target: string, reason: string) {
        super(
            ErrorCode.EMPTY_EXTRACTION,
            ErrorCategory.TRANSIENT,
            `No usable result for "${target}": ${reason}`,
            { target, reason }
        );
        this.name = "EmptyExtractionError";
    }
}

/** The audio output device (or its gateway) failed a command. */
export class DriverError extends AppError {
    constructor(
        public readonly tenantId: string,
        operation: string,
        cause: unknown
    ) {
        super(
            ErrorCode.DRIVER_FAILURE,
            ErrorCategory.TRANSIENT,
            `Playback driver ${operation} failed for tenant ${tenantId}: ${describeError(cause)}`,
            { tenantId, operation, cause: describeError(cause) }
        );
        this.name = "DriverError";
    }
}

/**
 * Check if an error is recoverable
 */
export function isRecoverable(error: unknown): boolean {
    return error instanceof AppError && error.category === ErrorCategory.RECOVERABLE;
}

/**
 * Check if an error is transient
 */
export function isTransient(error: unknown): boolean {
    return error instanceof AppError && error.category === ErrorCategory.TRANSIENT;
}

export function isCancellation(error: unknown): error is ResolutionCancelledError {
    return error instanceof ResolutionCancelledError;
}
