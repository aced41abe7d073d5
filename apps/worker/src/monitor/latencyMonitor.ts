/**
 * Latency monitor for one (mode, instrument).
 *
 * Owns one StreamMetrics and one TradeLatencyGate. PRICE messages become
 * latency samples on the data path; the gate evaluates them later on its
 * own timer so a slow evaluation never holds up the stream reader.
 * Also acts as a stream lifecycle observer to count reconnects and errors.
 */

import type { GateDecisionType, GateThresholdsInput, StreamModeType } from "@fxgate/shared";
import { createChildLogger } from "../log/logger.js";
import { TradeLatencyGate, type GateReport } from "../gate/tradeLatencyGate.js";
import type { LatencySampleLog } from "../metrics/sampleLog.js";
import { StreamMetrics, type LatencySample, type StreamMetricsSnapshot } from "../metrics/streamMetrics.js";
import type {
    ParseErrorEvent,
    ReconnectWaitEvent,
    StreamErrorEvent,
    StreamLifecycleObserver,
} from "../stream/observer.js";
import { MessageKind, type StreamMessage } from "../stream/types.js";

export interface LatencyMonitorConfig {
    mode: StreamModeType;
    instrument: string;
    thresholds: GateThresholdsInput;

    /** Metrics window (ms). Default: 10000 */
    windowMs: number;

    /** Gate evaluation cadence (ms). Default: 250 */
    gateIntervalMs: number;

    /** Snapshot log cadence (ms). Default: 60000 */
    snapshotIntervalMs: number;

    sampleLog?: LatencySampleLog;

    /** Receives every periodic snapshot record */
    snapshotLog?: MonitorSnapshotSink;
}

export const DEFAULT_MONITOR_CONFIG = {
    thresholds: {},
    windowMs: 10_000,
    gateIntervalMs: 250,
    snapshotIntervalMs: 60_000,
} satisfies Partial<LatencyMonitorConfig>;

export interface MonitorSnapshot {
    ts: string;
    metrics: StreamMetricsSnapshot;
    gate: GateReport;
    pendingSamples: number;
}

export interface MonitorSnapshotSink {
    append(snapshot: MonitorSnapshot): void;
    flush(): Promise<void>;
}

export class LatencyMonitor implements StreamLifecycleObserver {
    readonly metrics: StreamMetrics;
    readonly gate: TradeLatencyGate;

    private readonly config: LatencyMonitorConfig;
    private readonly log: ReturnType<typeof createChildLogger>;
    private pending: LatencySample[] = [];
    private evaluating = false;
    private gateTimer: NodeJS.Timeout | null = null;
    private snapshotTimer: NodeJS.Timeout | null = null;

    constructor(config: Pick<LatencyMonitorConfig, "mode" | "instrument"> & Partial<LatencyMonitorConfig>) {
        this.config = { ...DEFAULT_MONITOR_CONFIG, ...config };
        this.gate = new TradeLatencyGate({
            mode: this.config.mode,
            instrument: this.config.instrument,
            thresholds: this.config.thresholds,
        });
        // Outlier flags are set where samples are made, from the gate's validated profile
        this.metrics = new StreamMetrics({
            mode: this.config.mode,
            instrument: this.config.instrument,
            windowMs: this.config.windowMs,
            outlierHighMs: this.gate.thresholds.outlierHighMs,
            skewOutlierMs: this.gate.thresholds.skewOutlierMs,
        });
        this.log = createChildLogger({
            module: "latency-monitor",
            mode: this.config.mode,
            instrument: this.config.instrument,
        });
    }

    get pendingCount(): number {
        return this.pending.length;
    }

    /**
     * Feed one stream message. Never throws; returns the sample it produced.
     */
    ingest(message: StreamMessage): LatencySample | null {
        if (message.kind !== MessageKind.PRICE || message.instrument !== this.config.instrument) {
            return null;
        }

        try {
            this.metrics.onEvent({ type: "message", ts: message.receivedAt });
            const sample = this.metrics.recordLatency(message.time, message.receivedAt);
            if (!sample) return null;

            this.config.sampleLog?.append(sample);
            this.pending.push(sample);
            return sample;
        } catch (err) {
            this.log.error({ err: err instanceof Error ? err.message : String(err) }, "Failed to record latency");
            return null;
        }
    }

    /**
     * Run queued samples through the gate, oldest first.
     */
    evaluatePending(): GateDecisionType {
        if (this.evaluating) {
            return this.gate.decision;
        }
        this.evaluating = true;
        try {
            const batch = this.pending;
            this.pending = [];
            for (const sample of batch) {
                try {
                    this.gate.evaluate(sample);
                } catch (err) {
                    this.log.error(
                        { err: err instanceof Error ? err.message : String(err) },
                        "Gate evaluation failed"
                    );
                }
            }
            return this.gate.decision;
        } finally {
            this.evaluating = false;
        }
    }

    report(): GateReport {
        return this.gate.report();
    }

    snapshot(now: number = Date.now()): MonitorSnapshot {
        return {
            ts: new Date(now).toISOString(),
            metrics: this.metrics.snapshot(now),
            gate: this.gate.report(),
            pendingSamples: this.pending.length,
        };
    }

    logSnapshot(): MonitorSnapshot {
        const snap = this.snapshot();
        this.log.info(
            {
                messagesPerSec: snap.metrics.messagesPerSec,
                sampleCount: snap.metrics.sampleCount,
                backlogCount: snap.metrics.backlogCount,
                outlierCount: snap.metrics.outlierCount,
                reconnectCount: snap.metrics.reconnectCount,
                clockOffsetMs: snap.metrics.clockOffsetMs,
                effective: snap.metrics.latency.effective,
                decision: snap.gate.decision,
                warn: snap.gate.warn,
            },
            "Latency snapshot"
        );
        this.config.snapshotLog?.append(snap);
        return snap;
    }

    start(): void {
        if (this.gateTimer) return;

        this.gateTimer = setInterval(() => this.evaluatePending(), this.config.gateIntervalMs);
        this.snapshotTimer = setInterval(() => this.logSnapshot(), this.config.snapshotIntervalMs);

        // Don't block process exit
        this.gateTimer.unref();
        this.snapshotTimer.unref();

        this.log.info(
            { gateIntervalMs: this.config.gateIntervalMs, snapshotIntervalMs: this.config.snapshotIntervalMs },
            "Latency monitor started"
        );
    }

    async stop(): Promise<void> {
        if (this.gateTimer) {
            clearInterval(this.gateTimer);
            this.gateTimer = null;
        }
        if (this.snapshotTimer) {
            clearInterval(this.snapshotTimer);
            this.snapshotTimer = null;
        }
        this.evaluatePending();
        await this.config.sampleLog?.flush();
        await this.config.snapshotLog?.flush();
        this.log.info({ decision: this.gate.decision }, "Latency monitor stopped");
    }

    onStreamError(event: StreamErrorEvent): void {
        this.metrics.onEvent({ type: "error", ts: event.at, error: event.error.message });
    }

    onReconnectWait(event: ReconnectWaitEvent): void {
        this.metrics.onEvent({ type: "reconnect_wait", ts: event.at, reason: event.cause.message });
    }

    onParseError(event: ParseErrorEvent): void {
        this.metrics.onEvent({ type: "parse_error", ts: event.at, error: event.error });
    }
}
