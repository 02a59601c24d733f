/**
 * Application error taxonomy shared by the parser, the storage writer,
 * the HTTP layer and the server lifecycle.
 * @license MIT
 */

export type ErrorType =
    | "validation"
    | "not_found"
    | "database"
    | "storage"
    | "network"
    | "internal"
    | "timeout";

export type ErrorContext = Record<string, unknown>;

export type AppErrorOptions = {
    cause?: unknown;
    context?: ErrorContext;
};

export class AppError extends Error {
    readonly type: ErrorType;
    readonly context: ErrorContext;
    /** Creation time, ms since epoch. */
    readonly timestamp: number;

    constructor(type: ErrorType, message: string, options: AppErrorOptions = {}) {
        super(message, { cause: options.cause });
        this.name = "AppError";
        this.type = type;
        this.context = { ...options.context };
        this.timestamp = Date.now();
    }

    withContext(key: string, value: unknown): this {
        this.context[key] = value;
        return this;
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            type: this.type,
            message: this.message,
            context: this.context,
            timestamp: this.timestamp,
            cause: this.cause instanceof Error ? this.cause.message : this.cause,
            stack: this.stack
        };
    }
}

export function isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
}

export function isType(err: unknown, type: ErrorType): boolean {
    return isAppError(err) && err.type === type;
}

function messageOf(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Prefixes the message of `err`. An AppError keeps its type and context,
 * anything else becomes an `internal` error.
 */
export function wrap(err: unknown, message: string): AppError {
    if (isAppError(err)) {
        return new AppError(err.type, `${message}: ${err.message}`, {
            cause: err,
            context: err.context
        });
    }
    return new AppError("internal", `${message}: ${messageOf(err)}`, {
        cause: err
    });
}

export function wrapWithType(
    err: unknown,
    type: ErrorType,
    message: string
): AppError {
    const wrapped = wrap(err, message);
    return new AppError(type, wrapped.message, {
        cause: err,
        context: wrapped.context
    });
}

export const newValidationError = (message: string, context?: ErrorContext) =>
    new AppError("validation", message, { context });
export const newNotFoundError = (message: string, context?: ErrorContext) =>
    new AppError("not_found", message, { context });
export const newDatabaseError = (message: string, context?: ErrorContext) =>
    new AppError("database", message, { context });
export const newStorageError = (message: string, context?: ErrorContext) =>
    new AppError("storage", message, { context });
export const newNetworkError = (message: string, context?: ErrorContext) =>
    new AppError("network", message, { context });
export const newInternalError = (message: string, context?: ErrorContext) =>
    new AppError("internal", message, { context });
export const newTimeoutError = (message: string, context?: ErrorContext) =>
    new AppError("timeout", message, { context });

const STATUS_BY_TYPE: Record<ErrorType, number> = {
    validation: 400,
    not_found: 404,
    database: 503,
    storage: 503,
    network: 502,
    timeout: 408,
    internal: 500
};

export function statusCodeFor(type: ErrorType): number {
    return STATUS_BY_TYPE[type];
}
