import { describe, it, expect, vi, afterEach } from "vitest";
import { LatencyMonitor, type MonitorSnapshot, type MonitorSnapshotSink } from "./latencyMonitor.js";
import { MemorySampleLog } from "../metrics/sampleLog.js";
import { TransientNetworkError } from "../stream/errors.js";
import type { HeartbeatMessage, PriceMessage } from "../stream/types.js";

const T = Date.UTC(2024, 4, 1, 12, 0, 0);

function price(instrument: string, serverMs: number, latencyMs: number): PriceMessage {
    return {
        kind: "PRICE",
        raw: {},
        receivedAt: serverMs + latencyMs,
        instrument,
        time: new Date(serverMs).toISOString(),
        bids: [{ price: "1.3601", liquidity: 1_000_000 }],
        asks: [{ price: "1.3603", liquidity: 1_000_000 }],
        tradeable: true,
        closeoutBid: null,
        closeoutAsk: null,
    };
}

function monitor(sampleLog = new MemorySampleLog()) {
    return new LatencyMonitor({
        mode: "practice",
        instrument: "USD_CAD",
        windowMs: 60_000,
        thresholds: { minSamples: 0 },
        sampleLog,
    });
}

describe("LatencyMonitor", () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it("samples only PRICE messages for its own instrument", () => {
        const log = new MemorySampleLog();
        const m = monitor(log);
        const heartbeat: HeartbeatMessage = {
            kind: "HEARTBEAT",
            raw: {},
            receivedAt: T,
            time: new Date(T).toISOString(),
            lastTransactionId: null,
        };

        expect(m.ingest(heartbeat)).toBeNull();
        expect(m.ingest(price("EUR_USD", T, 100))).toBeNull();
        expect(m.ingest(price("USD_CAD", T, 100))).toMatchObject({ latencyMsRaw: 100, effectiveMs: 0 });

        expect(log.totalAppended).toBe(1);
        expect(m.pendingCount).toBe(1);
        expect(m.metrics.snapshot(T + 100).messagesTotal).toBe(1);
    });

    it("feeds queued samples to the gate in arrival order", () => {
        const m = monitor();
        m.ingest(price("USD_CAD", T, 100));
        m.ingest(price("USD_CAD", T + 1000, 800));
        m.ingest(price("USD_CAD", T + 2000, 800));

        expect(m.report().totalSamplesSeen).toBe(0);
        expect(m.evaluatePending()).toBe("OK");
        expect(m.report()).toMatchObject({ totalSamplesSeen: 3, consecutiveBacklogCount: 2 });

        m.ingest(price("USD_CAD", T + 3000, 800));
        expect(m.evaluatePending()).toBe("BLOCKED");
        expect(m.pendingCount).toBe(0);
    });

    it("flags outliers with the profile's outlier and skew levels", () => {
        const m = new LatencyMonitor({
            mode: "practice",
            instrument: "USD_CAD",
            windowMs: 60_000,
            thresholds: { minSamples: 0, outlierHighMs: 3000, skewOutlierMs: 100 },
        });

        expect(m.ingest(price("USD_CAD", T, 100))).toMatchObject({ effectiveMs: 0, isOutlier: false });
        expect(m.ingest(price("USD_CAD", T + 1000, 5100))).toMatchObject({ effectiveMs: 5000, isOutlier: true });
        expect(m.ingest(price("USD_CAD", T + 2000, -500))).toMatchObject({
            latencyMsRaw: -500,
            skewMs: 500,
            isOutlier: true,
        });
        expect(m.metrics.snapshot(T + 6100).outlierCount).toBe(2);

        m.evaluatePending();
        expect(m.report()).toMatchObject({ outlierSamples: 2, consecutiveBacklogCount: 2, effectiveP95Ms: 0 });
    });

    it("evaluates on its timer once started", async () => {
        vi.useFakeTimers();
        const m = monitor();
        m.start();

        for (let i = 0; i < 3; i++) {
            m.ingest(price("USD_CAD", T + i * 1000, i === 0 ? 100 : 900));
        }
        m.ingest(price("USD_CAD", T + 3000, 900));
        expect(m.report().totalSamplesSeen).toBe(0);

        vi.advanceTimersByTime(250);

        expect(m.report()).toMatchObject({ totalSamplesSeen: 4, decision: "BLOCKED" });
        await m.stop();
    });

    it("counts stream errors and reconnect waits from lifecycle events", () => {
        const m = monitor();
        const cause = new TransientNetworkError("connection reset");

        m.onStreamError({ stream: "pricing", error: cause, attempt: 1, willRetry: true, at: T });
        m.onReconnectWait({ stream: "pricing", attempt: 1, delayMs: 600, baseDelayMs: 500, cause, at: T + 1 });
        m.onParseError({ stream: "pricing", line: "{", error: "Unexpected end of JSON input", at: T + 2 });

        expect(m.snapshot(T + 10).metrics).toMatchObject({
            errorCount: 1,
            reconnectCount: 1,
            parseErrorCount: 1,
            lastError: "Unexpected end of JSON input",
        });
    });

    it("hands each periodic snapshot to the snapshot log", async () => {
        vi.useFakeTimers();
        vi.setSystemTime(T);
        const records: MonitorSnapshot[] = [];
        const flush = vi.fn(async () => {});
        const snapshotLog: MonitorSnapshotSink = { append: (snap) => records.push(snap), flush };
        const m = new LatencyMonitor({
            mode: "practice",
            instrument: "USD_CAD",
            thresholds: { minSamples: 0 },
            snapshotIntervalMs: 1000,
            snapshotLog,
        });
        m.start();
        m.ingest(price("USD_CAD", T - 200, 200));

        vi.advanceTimersByTime(2000);

        expect(records.map((r) => r.ts)).toEqual(["2024-05-01T12:00:01.000Z", "2024-05-01T12:00:02.000Z"]);
        expect(records[1]).toMatchObject({
            pendingSamples: 0,
            metrics: { instrument: "USD_CAD", sampleCount: 1 },
            gate: { totalSamplesSeen: 1, decision: "OK" },
        });

        await m.stop();
        expect(flush).toHaveBeenCalledTimes(1);
    });

    it("flushes the queue and the sample log on stop", async () => {
        const log = new MemorySampleLog();
        const m = monitor(log);
        m.ingest(price("USD_CAD", T, 100));

        await m.stop();

        expect(m.report().totalSamplesSeen).toBe(1);
        expect(m.snapshot(T + 100)).toMatchObject({ pendingSamples: 0, ts: "2024-05-01T12:00:00.100Z" });
    });
});
