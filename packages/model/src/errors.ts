/**
 * Error codes surfaced to the UI through `OperationFailed` responses
 */
export enum ErrorCode {
    AUTHENTICATION = 'authentication',
    RATE_LIMIT = 'rate_limit',
    FETCH = 'fetch',
    RESOLVE = 'resolve',
    HYDRATION = 'hydration',
    TASK_AGGREGATION = 'task_aggregation',
    NO_BROWSABLE_URL = 'no_browsable_url',
    UNKNOWN_NOTIFICATION = 'unknown_notification',
    CONFIG = 'config',
}

/**
 * Base class for every error the pipeline raises on purpose
 */
export abstract class PipelineError extends Error {
    abstract readonly code: ErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Missing or rejected credential. Fatal to the session; never retried.
 */
export class AuthenticationError extends PipelineError {
    readonly code = ErrorCode.AUTHENTICATION;
}

export class RateLimitError extends PipelineError {
    readonly code = ErrorCode.RATE_LIMIT;

    constructor(message: string, readonly resetAt?: Date, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/**
 * Transient remote or network failure
 */
export class FetchError extends PipelineError {
    readonly code = ErrorCode.FETCH;

    constructor(message: string, readonly status?: number, readonly url?: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/**
 * Hydration of a single stub failed
 */
export class ResolveError extends PipelineError {
    readonly code = ErrorCode.RESOLVE;

    constructor(readonly stubId: string, message: string, options?: { cause?: unknown }) {
        super(`notification ${stubId}: ${message}`, options);
    }
}

/**
 * One or more stubs failed to resolve; the refresh was aborted
 */
export class HydrationError extends PipelineError {
    readonly code = ErrorCode.HYDRATION;

    constructor(readonly failures: ResolveError[]) {
        super(`${failures.length} notification(s) failed to load`, { cause: failures[0] });
    }
}

/**
 * A concurrent hydration task crashed with an error the pipeline did not raise itself
 */
export class TaskAggregationError extends PipelineError {
    readonly code = ErrorCode.TASK_AGGREGATION;

    constructor(readonly errors: unknown[]) {
        super(`${errors.length} hydration task(s) crashed`, { cause: errors[0] });
    }
}

export class NoBrowsableUrlError extends PipelineError {
    readonly code = ErrorCode.NO_BROWSABLE_URL;

    constructor(readonly notificationId: string) {
        super(`notification ${notificationId} has no browsable url`);
    }
}

export class UnknownNotificationError extends PipelineError {
    readonly code = ErrorCode.UNKNOWN_NOTIFICATION;

    constructor(readonly notificationId: string) {
        super(`notification ${notificationId} is not in the inbox`);
    }
}

export class ConfigError extends PipelineError {
    readonly code = ErrorCode.CONFIG;
}

export function isPipelineError(error: unknown): error is PipelineError {
    return error instanceof PipelineError;
}

/**
 * Turn any error into the one-line status message shown to the user
 */
export function describeError(error: unknown): string {
    if (error instanceof AuthenticationError) {
        return `Authentication failed: ${error.message}`;
    }
    if (error instanceof RateLimitError) {
        const reset = error.resetAt ? ` until ${error.resetAt.toISOString()}` : '';
        return `Rate limited by the remote service${reset}`;
    }
    if (error instanceof FetchError) {
        return error.status ? `Request failed (${error.status}): ${error.message}` : `Request failed: ${error.message}`;
    }
    if (error instanceof Error) {
        return error.message;
    }
    return 'An unexpected error occurred.';
}
