/**
 * Error categories for classification
 */
export enum ErrorCategory {
    TRANSIENT = "TRANSIENT", // Temporary issue, will resolve
    FATAL = "FATAL", // Session must be torn down
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Configuration errors
    INVALID_CONFIG = "INVALID_CONFIG",

    // Wire errors
    ENVELOPE_DECODE_FAILED = "ENVELOPE_DECODE_FAILED",
    ENVELOPE_ENCODE_FAILED = "ENVELOPE_ENCODE_FAILED",

    // Channel errors
    TRANSPORT_FAILED = "TRANSPORT_FAILED",
    SEND_FAILED = "SEND_FAILED",

    // Player errors
    PLAYER_FAILED = "PLAYER_FAILED",
}

/**
 * Custom application error class
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
        Object.setPrototypeOf(this, AppError.prototype);
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

export function isFatal(error: unknown): boolean {
    return error instanceof AppError && error.category === ErrorCategory.FATAL;
}

/**
 * Wrap an arbitrary failure in an AppError, keeping AppErrors as they are.
 */
export function toAppError(
    err: unknown,
    code: ErrorCode,
    category: ErrorCategory,
    context: string
): AppError {
    if (err instanceof AppError) {
        return err;
    }

    const originalError = err instanceof Error ? err.message : String(err);
    return new AppError(code, category, `${context}: ${originalError}`, {
        originalError,
    });
}
