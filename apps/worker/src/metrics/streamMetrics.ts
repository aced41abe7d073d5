/**
 * Rolling stream metrics for one (mode, instrument).
 *
 * Window is time-based: a sample stays while its receivedTs is within
 * `windowMs` of the newest sample's receivedTs. The window is measured on
 * the samples' own timestamps, never on the wall clock, so a fixed sample
 * sequence always yields the same numbers.
 *
 * All state lives in one frozen MetricsWindow that every write replaces
 * whole. snapshot() reads a single reference and can never observe counts
 * from one write next to percentiles from another.
 *
 * Latency per sample:
 * - raw        = receivedTs - serverTime (signed)
 * - clamped    = max(0, raw)
 * - offset     = min raw in the window, skew outliers excluded (0 if none)
 * - effective  = max(0, raw - offset)
 * - backlog    = effective >= backlogMs
 * - outlier    = effective >= outlierHighMs, or raw < -skewOutlierMs
 *
 * Outliers stay in the sample log and the backlog/outlier counters but are
 * left out of every last/p95/mean figure.
 */

import type { StreamModeType } from "@fxgate/shared";
import { createChildLogger } from "../log/logger.js";
import { EMPTY_LATENCY_STATS, summarize, type LatencyStats } from "./percentile.js";
import { parseServerTime } from "./timestamps.js";

const logger = createChildLogger({ module: "stream-metrics" });

export interface LatencySample {
    readonly ts: number;
    readonly mode: StreamModeType;
    readonly instrument: string;
    readonly receivedTs: number;
    readonly serverTime: number;
    readonly latencyMsRaw: number;
    readonly latencyMsClamped: number;
    readonly effectiveMs: number;
    readonly clockOffsetMs: number;
    /** |raw| when the server clock ran ahead of ours */
    readonly skewMs: number | null;
    readonly isBacklog: boolean;
    readonly isOutlier: boolean;
}

export type MetricsEvent =
    | { type: "message"; ts: number }
    | { type: "error"; ts: number; error: string }
    | { type: "parse_error"; ts: number; error: string }
    | { type: "reconnect_wait"; ts: number; reason: string };

export interface StreamMetricsSnapshot {
    mode: StreamModeType;
    instrument: string;
    messagesTotal: number;
    messagesPerSec: number;
    reconnectCount: number;
    errorCount: number;
    parseErrorCount: number;
    lastError: string | null;
    lastMessageTs: number | null;
    lastErrorTs: number | null;
    lastReconnectTs: number | null;
    sampleCount: number;
    backlogCount: number;
    outlierCount: number;
    windowSampleCount: number;
    clockOffsetMs: number;
    latency: {
        raw: LatencyStats;
        clamped: LatencyStats;
        effective: LatencyStats;
    };
}

export interface StreamMetricsConfig {
    mode: StreamModeType;
    instrument: string;

    /** Rolling window length (ms). Default: 10000 */
    windowMs: number;

    /** Effective latency counted as backlog (ms). Default: 2000 */
    backlogMs: number;

    /** Effective latency counted as an outlier (ms). Default: 10000 */
    outlierHighMs: number;

    /** Negative raw latency beyond this is a skew outlier (ms). Default: 1000 */
    skewOutlierMs: number;

    /** Clock for sample `ts` (ms). Default: Date.now */
    now: () => number;
}

export const DEFAULT_STREAM_METRICS_CONFIG: Omit<StreamMetricsConfig, "mode" | "instrument"> = {
    windowMs: 10_000,
    backlogMs: 2000,
    outlierHighMs: 10_000,
    skewOutlierMs: 1000,
    now: Date.now,
};

interface MetricsCounters {
    readonly messagesTotal: number;
    readonly reconnectCount: number;
    readonly errorCount: number;
    readonly parseErrorCount: number;
    readonly sampleCount: number;
    readonly backlogCount: number;
    readonly outlierCount: number;
    readonly lastError: string | null;
    readonly lastMessageTs: number | null;
    readonly lastErrorTs: number | null;
    readonly lastReconnectTs: number | null;
}

interface MetricsWindow {
    readonly counters: MetricsCounters;
    readonly samples: readonly LatencySample[];
    readonly messageTimes: readonly number[];
    readonly clockOffsetMs: number;
}

const EMPTY_WINDOW: MetricsWindow = Object.freeze({
    counters: Object.freeze({
        messagesTotal: 0,
        reconnectCount: 0,
        errorCount: 0,
        parseErrorCount: 0,
        sampleCount: 0,
        backlogCount: 0,
        outlierCount: 0,
        lastError: null,
        lastMessageTs: null,
        lastErrorTs: null,
        lastReconnectTs: null,
    }),
    samples: Object.freeze([]),
    messageTimes: Object.freeze([]),
    clockOffsetMs: 0,
});

export class StreamMetrics {
    private readonly config: StreamMetricsConfig;
    private window: MetricsWindow = EMPTY_WINDOW;

    constructor(config: Pick<StreamMetricsConfig, "mode" | "instrument"> & Partial<StreamMetricsConfig>) {
        this.config = { ...DEFAULT_STREAM_METRICS_CONFIG, ...config };
        if (this.config.windowMs <= 0) {
            throw new Error(`windowMs must be positive, got ${this.config.windowMs}`);
        }
    }

    /**
     * Turn one server timestamp into a sample and fold it into the window.
     * Returns null when the timestamp cannot be parsed.
     */
    recordLatency(serverTime: string | null, receivedTs: number): LatencySample | null {
        const serverMs = parseServerTime(serverTime);
        if (serverMs === null) {
            logger.debug({ instrument: this.config.instrument, serverTime }, "Unparseable server time");
            return null;
        }

        const current = this.window;
        const { windowMs, skewOutlierMs, backlogMs, outlierHighMs } = this.config;

        const raw = receivedTs - serverMs;
        const skewOutlier = raw < -skewOutlierMs;

        const cutoff = receivedTs - windowMs;
        const kept = current.samples.filter((s) => s.receivedTs > cutoff);

        let offset: number | null = skewOutlier ? null : raw;
        for (const s of kept) {
            if (s.latencyMsRaw < -skewOutlierMs) continue;
            if (offset === null || s.latencyMsRaw < offset) offset = s.latencyMsRaw;
        }
        const clockOffsetMs = offset ?? 0;

        const effectiveMs = Math.max(0, raw - clockOffsetMs);
        const isBacklog = effectiveMs >= backlogMs;
        const isOutlier = effectiveMs >= outlierHighMs || skewOutlier;

        const sample: LatencySample = Object.freeze({
            ts: this.config.now(),
            mode: this.config.mode,
            instrument: this.config.instrument,
            receivedTs,
            serverTime: serverMs,
            latencyMsRaw: raw,
            latencyMsClamped: Math.max(0, raw),
            effectiveMs,
            clockOffsetMs,
            skewMs: raw < 0 ? -raw : null,
            isBacklog,
            isOutlier,
        });

        const counters = current.counters;
        this.window = Object.freeze({
            counters: Object.freeze({
                ...counters,
                sampleCount: counters.sampleCount + 1,
                backlogCount: counters.backlogCount + (isBacklog ? 1 : 0),
                outlierCount: counters.outlierCount + (isOutlier ? 1 : 0),
            }),
            samples: Object.freeze([...kept, sample]),
            messageTimes: current.messageTimes,
            clockOffsetMs,
        });

        return sample;
    }

    onEvent(event: MetricsEvent): void {
        const current = this.window;
        const counters = current.counters;

        switch (event.type) {
            case "message": {
                const cutoff = event.ts - this.config.windowMs;
                this.window = Object.freeze({
                    ...current,
                    counters: Object.freeze({
                        ...counters,
                        messagesTotal: counters.messagesTotal + 1,
                        lastMessageTs: event.ts,
                    }),
                    messageTimes: Object.freeze([...current.messageTimes.filter((t) => t > cutoff), event.ts]),
                });
                return;
            }
            case "error":
                this.window = Object.freeze({
                    ...current,
                    counters: Object.freeze({
                        ...counters,
                        errorCount: counters.errorCount + 1,
                        lastError: event.error,
                        lastErrorTs: event.ts,
                    }),
                });
                return;
            case "parse_error":
                this.window = Object.freeze({
                    ...current,
                    counters: Object.freeze({
                        ...counters,
                        parseErrorCount: counters.parseErrorCount + 1,
                        lastError: event.error,
                        lastErrorTs: event.ts,
                    }),
                });
                return;
            case "reconnect_wait":
                this.window = Object.freeze({
                    ...current,
                    counters: Object.freeze({
                        ...counters,
                        reconnectCount: counters.reconnectCount + 1,
                        lastReconnectTs: event.ts,
                    }),
                });
                return;
        }
    }

    /**
     * Point-in-time view. `now` only affects messagesPerSec.
     */
    snapshot(now: number = this.config.now()): StreamMetricsSnapshot {
        const window = this.window;
        const { counters } = window;
        const cutoff = now - this.config.windowMs;
        const recentMessages = window.messageTimes.filter((t) => t > cutoff && t <= now).length;

        const eligible = window.samples.filter((s) => !s.isOutlier);

        return {
            mode: this.config.mode,
            instrument: this.config.instrument,
            messagesTotal: counters.messagesTotal,
            messagesPerSec: recentMessages / (this.config.windowMs / 1000),
            reconnectCount: counters.reconnectCount,
            errorCount: counters.errorCount,
            parseErrorCount: counters.parseErrorCount,
            lastError: counters.lastError,
            lastMessageTs: counters.lastMessageTs,
            lastErrorTs: counters.lastErrorTs,
            lastReconnectTs: counters.lastReconnectTs,
            sampleCount: counters.sampleCount,
            backlogCount: counters.backlogCount,
            outlierCount: counters.outlierCount,
            windowSampleCount: window.samples.length,
            clockOffsetMs: window.clockOffsetMs,
            latency:
                eligible.length === 0
                    ? { raw: EMPTY_LATENCY_STATS, clamped: EMPTY_LATENCY_STATS, effective: EMPTY_LATENCY_STATS }
                    : {
                        raw: summarize(eligible.map((s) => s.latencyMsRaw)),
                        clamped: summarize(eligible.map((s) => s.latencyMsClamped)),
                        effective: summarize(eligible.map((s) => s.effectiveMs)),
                    },
        };
    }
}
