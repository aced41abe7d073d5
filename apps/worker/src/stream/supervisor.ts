/**
 * Keeps one stream subscription alive across transport failures.
 *
 * Consumption is a plain `for await` over the supervisor. Each connect
 * attempt gets a fresh transport; the classifier and retry state live as
 * long as the supervisor does.
 *
 * Behavior:
 * - Transient failures (network, 5xx, timeouts, clean EOF) reconnect after
 *   an exponential backoff with jitter
 * - Auth and other request errors are rethrown immediately
 * - reconnect=false rethrows the first failure unchanged
 * - A bounded retry budget counts failures since the last delivered message
 * - The attempt counter resets on the first message after a reconnect
 * - shutdown() aborts the in-flight read or sleep; nothing is delivered after it
 */

import { setTimeout as sleepFor } from "timers/promises";
import type { ReconnectSettings } from "@fxgate/shared";
import { createChildLogger } from "../log/logger.js";
import { computeBackoffDelay } from "./backoff.js";
import { MessageClassifier } from "./classifier.js";
import {
    RetryBudgetExhaustedError,
    SessionTimeoutError,
    StreamError,
    StreamShutdown,
    TransientNetworkError,
    describeError,
} from "./errors.js";
import { safeNotify, type StoppedEvent, type StreamLifecycleObserver } from "./observer.js";
import type { TransportFactory } from "./transport.js";
import type { StreamEndpoint, StreamMessage } from "./types.js";

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface ReconnectSupervisorOptions {
    endpoint: StreamEndpoint;
    createTransport: TransportFactory;
    settings: ReconnectSettings;
    classifier?: MessageClassifier;
    observer?: StreamLifecycleObserver;
    /** Backoff sleep; must reject or resolve promptly once the signal aborts */
    sleep?: SleepFn;
    random?: () => number;
    now?: () => number;
}

type ConnectionOutcome =
    | { kind: "ended" }
    | { kind: "aborted" }
    | { kind: "failed"; error: StreamError; thrown: unknown };

const defaultSleep: SleepFn = async (ms, signal) => {
    await sleepFor(ms, undefined, { signal });
};

export class ReconnectSupervisor implements AsyncIterable<StreamMessage> {
    private readonly endpoint: StreamEndpoint;
    private readonly createTransport: TransportFactory;
    private readonly settings: ReconnectSettings;
    private readonly observer: StreamLifecycleObserver | undefined;
    private readonly sleep: SleepFn;
    private readonly random: () => number;
    private readonly now: () => number;
    private readonly controller = new AbortController();
    private readonly log: ReturnType<typeof createChildLogger>;

    readonly classifier: MessageClassifier;

    private failures = 0;
    private started = false;
    private stopped = false;
    private sessionTimer: NodeJS.Timeout | null = null;

    constructor(options: ReconnectSupervisorOptions) {
        this.endpoint = options.endpoint;
        this.createTransport = options.createTransport;
        this.settings = options.settings;
        this.classifier = options.classifier ?? new MessageClassifier();
        this.observer = options.observer;
        this.sleep = options.sleep ?? defaultSleep;
        this.random = options.random ?? Math.random;
        this.now = options.now ?? Date.now;
        this.log = createChildLogger({ module: "stream-supervisor", stream: options.endpoint.name });
    }

    /** Failures since the last delivered message. */
    get attempt(): number {
        return this.failures;
    }

    get isStopped(): boolean {
        return this.stopped;
    }

    get name(): string {
        return this.endpoint.name;
    }

    /**
     * Stop the session. Safe to call repeatedly and from any task.
     */
    shutdown(): void {
        if (this.stopped) return;
        this.stopped = true;
        this.controller.abort(new StreamShutdown());
        this.log.info("Stream shutdown requested");
    }

    [Symbol.asyncIterator](): AsyncIterator<StreamMessage> {
        return this.messages();
    }

    async *messages(): AsyncGenerator<StreamMessage, void, undefined> {
        if (this.started) {
            throw new Error(`Stream "${this.endpoint.name}" can only be consumed once`);
        }
        this.started = true;

        const signal = this.controller.signal;
        let reason: StoppedEvent["reason"] = "shutdown";
        let finalError: Error | null = null;

        this.startSessionTimer();
        this.log.info({ url: this.endpoint.url }, "Starting stream");

        try {
            while (!this.stopped) {
                const outcome = yield* this.readConnection(signal);

                if (outcome.kind === "aborted" || this.stopped) {
                    this.throwIfSessionTimedOut(signal);
                    return;
                }

                let failure: StreamError;
                let thrown: unknown;
                if (outcome.kind === "ended") {
                    if (!this.settings.reconnect) {
                        reason = "ended";
                        this.log.info("Stream ended by server");
                        return;
                    }
                    failure = new TransientNetworkError("Stream ended by server");
                    thrown = failure;
                } else {
                    failure = outcome.error;
                    thrown = outcome.thrown;
                }

                this.failures++;
                const withinBudget = this.withinRetryBudget();
                const willRetry = failure.retryable && this.settings.reconnect && withinBudget;

                safeNotify("onStreamError", () =>
                    this.observer?.onStreamError?.({
                        stream: this.endpoint.name,
                        error: failure,
                        attempt: this.failures,
                        willRetry,
                        at: this.now(),
                    })
                );

                if (!this.settings.reconnect) {
                    throw thrown;
                }
                if (!failure.retryable) {
                    throw failure;
                }
                if (!withinBudget) {
                    throw new RetryBudgetExhaustedError(this.failures - 1, failure);
                }

                const { baseDelayMs, delayMs } = computeBackoffDelay(
                    this.failures - 1,
                    this.settings.backoffBaseMs,
                    this.settings.backoffMaxMs,
                    this.random
                );

                // Published before sleeping; consumers rely on this order
                safeNotify("onReconnectWait", () =>
                    this.observer?.onReconnectWait?.({
                        stream: this.endpoint.name,
                        attempt: this.failures,
                        delayMs,
                        baseDelayMs,
                        cause: failure,
                        at: this.now(),
                    })
                );
                this.log.warn(
                    { attempt: this.failures, delayMs, err: failure.message },
                    "Stream failed, scheduling reconnect"
                );

                try {
                    await this.sleep(delayMs, signal);
                } catch (err) {
                    if (!signal.aborted) throw err;
                }
                if (signal.aborted) {
                    this.throwIfSessionTimedOut(signal);
                    return;
                }
            }
        } catch (err) {
            reason = "failed";
            finalError = err instanceof Error ? err : new Error(String(err));
            this.log.error({ err: describeError(err), attempt: this.failures }, "Stream terminated");
            throw err;
        } finally {
            this.stopped = true;
            this.clearSessionTimer();
            if (!signal.aborted) {
                this.controller.abort(new StreamShutdown());
            }
            const stoppedReason = reason;
            const stoppedError = finalError;
            safeNotify("onStopped", () =>
                this.observer?.onStopped?.({
                    stream: this.endpoint.name,
                    reason: stoppedReason,
                    error: stoppedError,
                    at: this.now(),
                })
            );
        }
    }

    /**
     * One connection: open a transport and deliver its messages until it
     * fails, ends or is aborted.
     */
    private async *readConnection(
        signal: AbortSignal
    ): AsyncGenerator<StreamMessage, ConnectionOutcome, undefined> {
        safeNotify("onConnecting", () =>
            this.observer?.onConnecting?.({
                stream: this.endpoint.name,
                attempt: this.failures,
                at: this.now(),
            })
        );

        let delivered = false;
        try {
            const transport = this.createTransport();
            for await (const line of transport.open(this.endpoint, signal)) {
                if (this.stopped) return { kind: "aborted" };

                const receivedAt = this.now();
                const result = this.classifier.classify(line, receivedAt);
                if (result.status === "empty") continue;
                if (result.status === "malformed") {
                    safeNotify("onParseError", () =>
                        this.observer?.onParseError?.({
                            stream: this.endpoint.name,
                            line: line.slice(0, 200),
                            error: result.error,
                            at: receivedAt,
                        })
                    );
                    this.log.debug({ line: line.slice(0, 200), err: result.error }, "Dropped malformed line");
                    continue;
                }

                if (!delivered) {
                    delivered = true;
                    if (this.failures > 0) {
                        this.log.info({ afterFailures: this.failures }, "Stream recovered");
                    }
                    this.failures = 0;
                    safeNotify("onStreaming", () =>
                        this.observer?.onStreaming?.({
                            stream: this.endpoint.name,
                            attempt: 0,
                            at: receivedAt,
                        })
                    );
                }

                yield result.message;

                if (this.stopped) return { kind: "aborted" };
            }
        } catch (err) {
            if (signal.aborted) return { kind: "aborted" };
            const error =
                err instanceof StreamError
                    ? err
                    : new TransientNetworkError(describeError(err), { cause: err });
            return { kind: "failed", error, thrown: err };
        }

        return signal.aborted ? { kind: "aborted" } : { kind: "ended" };
    }

    private withinRetryBudget(): boolean {
        const limit = this.settings.maxRetries;
        return limit.kind === "unlimited" || this.failures <= limit.max;
    }

    private throwIfSessionTimedOut(signal: AbortSignal): void {
        if (signal.reason instanceof SessionTimeoutError) {
            throw signal.reason;
        }
    }

    private startSessionTimer(): void {
        const timeoutMs = this.settings.sessionTimeoutMs;
        if (timeoutMs <= 0) return;

        this.sessionTimer = setTimeout(() => {
            this.sessionTimer = null;
            if (this.stopped) return;
            this.stopped = true;
            this.log.warn({ timeoutMs }, "Stream session timeout reached");
            this.controller.abort(new SessionTimeoutError(timeoutMs));
        }, timeoutMs);

        // Don't block process exit
        this.sessionTimer.unref();
    }

    private clearSessionTimer(): void {
        if (this.sessionTimer) {
            clearTimeout(this.sessionTimer);
            this.sessionTimer = null;
        }
    }
}
