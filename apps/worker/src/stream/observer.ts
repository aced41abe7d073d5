/**
 * Lifecycle hooks published by the ReconnectSupervisor.
 *
 * Every hook is optional and is called synchronously from the read loop.
 * `onReconnectWait` always fires before the corresponding backoff sleep
 * starts, so consumers can count waits without racing the reconnect.
 */

import { createChildLogger } from "../log/logger.js";
import { describeError, type StreamError } from "./errors.js";

const logger = createChildLogger({ module: "stream-observer" });

export interface ReconnectWaitEvent {
    stream: string;
    /** Reconnect attempt this sleep precedes (1-based) */
    attempt: number;
    delayMs: number;
    baseDelayMs: number;
    cause: StreamError;
    at: number;
}

export interface StreamErrorEvent {
    stream: string;
    error: StreamError;
    /** Failures since the last delivered message, including this one */
    attempt: number;
    willRetry: boolean;
    at: number;
}

export interface ParseErrorEvent {
    stream: string;
    line: string;
    error: string;
    at: number;
}

export interface ConnectingEvent {
    stream: string;
    attempt: number;
    at: number;
}

export interface StoppedEvent {
    stream: string;
    reason: "shutdown" | "ended" | "failed";
    error: Error | null;
    at: number;
}

export interface StreamLifecycleObserver {
    onConnecting?(event: ConnectingEvent): void;
    /** First message delivered on a connection */
    onStreaming?(event: ConnectingEvent): void;
    onStreamError?(event: StreamErrorEvent): void;
    onReconnectWait?(event: ReconnectWaitEvent): void;
    onParseError?(event: ParseErrorEvent): void;
    onStopped?(event: StoppedEvent): void;
}

type HookName = keyof StreamLifecycleObserver;

/**
 * Run one hook call, logging instead of propagating whatever it throws.
 */
export function safeNotify(hook: HookName, call: () => void): void {
    try {
        call();
    } catch (err) {
        logger.error({ hook, err: describeError(err) }, "Stream observer hook failed");
    }
}

/**
 * Fan one supervisor's events out to several observers.
 * A failing observer does not stop the others from being called.
 */
export function combineObservers(...observers: StreamLifecycleObserver[]): StreamLifecycleObserver {
    return {
        onConnecting: (event) =>
            observers.forEach((o) => safeNotify("onConnecting", () => o.onConnecting?.(event))),
        onStreaming: (event) =>
            observers.forEach((o) => safeNotify("onStreaming", () => o.onStreaming?.(event))),
        onStreamError: (event) =>
            observers.forEach((o) => safeNotify("onStreamError", () => o.onStreamError?.(event))),
        onReconnectWait: (event) =>
            observers.forEach((o) => safeNotify("onReconnectWait", () => o.onReconnectWait?.(event))),
        onParseError: (event) =>
            observers.forEach((o) => safeNotify("onParseError", () => o.onParseError?.(event))),
        onStopped: (event) =>
            observers.forEach((o) => safeNotify("onStopped", () => o.onStopped?.(event))),
    };
}
