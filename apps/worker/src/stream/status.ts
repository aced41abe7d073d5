/**
 * Connection state per stream, fed by supervisor lifecycle events.
 * Read by the health endpoint.
 */

import type {
    ConnectingEvent,
    ParseErrorEvent,
    ReconnectWaitEvent,
    StoppedEvent,
    StreamErrorEvent,
    StreamLifecycleObserver,
} from "./observer.js";

export type StreamConnectionState = "idle" | "connecting" | "streaming" | "backoff" | "stopped" | "failed";

export interface StreamStatusView {
    name: string;
    state: StreamConnectionState;
    reconnects: number;
    streamErrors: number;
    parseErrors: number;
    lastError: string | null;
    lastErrorAt: string | null;
    connectedAt: string | null;
    nextRetryDelayMs: number | null;
}

export class StreamStatus implements StreamLifecycleObserver {
    readonly name: string;

    private state: StreamConnectionState = "idle";
    private reconnects = 0;
    private streamErrors = 0;
    private parseErrors = 0;
    private lastError: string | null = null;
    private lastErrorAt: number | null = null;
    private connectedAt: number | null = null;
    private nextRetryDelayMs: number | null = null;

    constructor(name: string) {
        this.name = name;
    }

    onConnecting(_event: ConnectingEvent): void {
        this.state = "connecting";
    }

    onStreaming(event: ConnectingEvent): void {
        this.state = "streaming";
        this.connectedAt = event.at;
        this.nextRetryDelayMs = null;
    }

    onStreamError(event: StreamErrorEvent): void {
        this.streamErrors++;
        this.lastError = event.error.message;
        this.lastErrorAt = event.at;
    }

    onReconnectWait(event: ReconnectWaitEvent): void {
        this.reconnects++;
        this.state = "backoff";
        this.nextRetryDelayMs = event.delayMs;
    }

    onParseError(_event: ParseErrorEvent): void {
        this.parseErrors++;
    }

    onStopped(event: StoppedEvent): void {
        this.state = event.reason === "failed" ? "failed" : "stopped";
        this.nextRetryDelayMs = null;
        if (event.error) {
            this.lastError = event.error.message;
            this.lastErrorAt = event.at;
        }
    }

    view(): StreamStatusView {
        return {
            name: this.name,
            state: this.state,
            reconnects: this.reconnects,
            streamErrors: this.streamErrors,
            parseErrors: this.parseErrors,
            lastError: this.lastError,
            lastErrorAt: this.lastErrorAt === null ? null : new Date(this.lastErrorAt).toISOString(),
            connectedAt: this.connectedAt === null ? null : new Date(this.connectedAt).toISOString(),
            nextRetryDelayMs: this.nextRetryDelayMs,
        };
    }
}
