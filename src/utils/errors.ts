/**
 * Error hierarchy for the analytics service.
 *
 * Every error carries a stable `code` and the HTTP status it maps to.
 * Operational errors are expected conditions reported to the caller;
 * anything else reaching the error handler is answered as INTERNAL_ERROR.
 */

export class AppError extends Error {
    public readonly code: string;
    public readonly statusCode: number;
    public readonly isOperational: boolean;

    constructor(
        message: string,
        code: string,
        statusCode: number,
        isOperational: boolean = true
    ) {
        super(message);
        this.code = code;
        this.statusCode = statusCode;
        this.isOperational = isOperational;
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class ValidationError extends AppError {
    constructor(
        message: string,
        code: string = 'VALIDATION_ERROR',
        statusCode: number = 400
    ) {
        super(message, code, statusCode, true);
    }
}

/**
 * Bad week/year bounds. Reported to the caller, never retried.
 */
export class InvalidRangeError extends ValidationError {
    constructor(message: string) {
        super(message, 'INVALID_RANGE', 400);
    }
}

export class NotFoundError extends AppError {
    constructor(
        message: string,
        code: string = 'NOT_FOUND',
        statusCode: number = 404
    ) {
        super(message, code, statusCode, true);
    }
}

/**
 * Prediction provider unreachable, timed out, or its model artifact is
 * missing/incompatible. Callers may retry; nothing is substituted.
 */
export class PredictionUnavailableError extends AppError {
    constructor(message: string = 'Prediction service unavailable') {
        super(message, 'PREDICTION_UNAVAILABLE', 503, true);
    }
}

/**
 * Backing storage unreachable or timed out. Fatal for the current request.
 */
export class StoreUnavailableError extends AppError {
    constructor(message: string = 'Record store unavailable') {
        super(message, 'STORE_UNAVAILABLE', 503, true);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
