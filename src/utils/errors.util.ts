// utils/errors.util.ts

export type ErrorType =
    | "ValidationError"
    | "Conflict"
    | "Unauthorized"
    | "NotFound"
    | "BackendUnavailable";

/**
 * Base class for errors that carry an HTTP status.
 * The global error handler reads `status` and `type` off these.
 */
export class AppError extends Error {
    readonly status: number;
    readonly type: ErrorType;

    constructor(type: ErrorType, status: number, message: string) {
        super(message);
        this.name = type;
        this.type = type;
        this.status = status;
    }
}

export class ValidationError extends AppError {
    constructor(message: string) {
        super("ValidationError", 400, message);
    }
}

export class ConflictError extends AppError {
    constructor(message: string) {
        super("Conflict", 400, message);
    }
}

export class UnauthorizedError extends AppError {
    constructor(message = "Could not validate credentials") {
        super("Unauthorized", 401, message);
    }
}

export class NotFoundError extends AppError {
    constructor(message: string) {
        super("NotFound", 404, message);
    }
}

export class BackendUnavailableError extends AppError {
    constructor(message = "Durable store is unreachable") {
        super("BackendUnavailable", 503, message);
    }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;
