/**
 * Typed stream failures.
 *
 * The supervisor decides whether to reconnect from `retryable` alone;
 * fatal errors are rethrown to the caller as they are.
 */

export abstract class StreamError extends Error {
    abstract readonly retryable: boolean;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Connection reset, DNS failure, 5xx, 429, unexpected end of stream. */
export class TransientNetworkError extends StreamError {
    readonly retryable = true;
    readonly statusCode: number | null;

    constructor(message: string, options?: { cause?: unknown; statusCode?: number }) {
        super(message, options);
        this.statusCode = options?.statusCode ?? null;
    }
}

/** No response headers or no body bytes within the read timeout. */
export class StreamTimeout extends StreamError {
    readonly retryable = true;
    readonly phase: "headers" | "body" | "connect";

    constructor(phase: "headers" | "body" | "connect", options?: { cause?: unknown }) {
        super(`Stream ${phase} timeout`, options);
        this.phase = phase;
    }
}

/** 401/403: the token is wrong or lacks permission. Never retried. */
export class AuthError extends StreamError {
    readonly retryable = false;
    readonly statusCode: number;

    constructor(statusCode: number, body: string) {
        super(`Stream authorization failed (${statusCode}): ${body}`);
        this.statusCode = statusCode;
    }
}

/** Any other 4xx: the request itself is wrong. Never retried. */
export class RequestRejectedError extends StreamError {
    readonly retryable = false;
    readonly statusCode: number;

    constructor(statusCode: number, body: string) {
        super(`Stream request rejected (${statusCode}): ${body}`);
        this.statusCode = statusCode;
    }
}

export class RetryBudgetExhaustedError extends StreamError {
    readonly retryable = false;
    readonly attempts: number;

    constructor(attempts: number, cause: StreamError) {
        super(`Reconnect budget exhausted after ${attempts} attempts: ${cause.message}`, { cause });
        this.attempts = attempts;
    }
}

export class SessionTimeoutError extends StreamError {
    readonly retryable = false;
    readonly timeoutMs: number;

    constructor(timeoutMs: number) {
        super(`Stream session exceeded ${timeoutMs}ms`);
        this.timeoutMs = timeoutMs;
    }
}

/**
 * Abort reason used by `shutdown()`. Never surfaces to callers.
 */
export class StreamShutdown extends Error {
    constructor() {
        super("Stream shut down");
        this.name = "StreamShutdown";
    }
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
