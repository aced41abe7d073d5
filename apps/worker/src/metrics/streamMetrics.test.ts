import { describe, it, expect } from "vitest";
import { StreamMetrics, type LatencySample } from "./streamMetrics.js";

const T = Date.UTC(2024, 4, 1, 12, 0, 0);

function iso(ms: number): string {
    return new Date(ms).toISOString();
}

function metrics(windowMs = 10_000): StreamMetrics {
    return new StreamMetrics({ mode: "practice", instrument: "USD_CAD", windowMs, now: () => 42 });
}

describe("StreamMetrics", () => {
    it("derives raw, clamped and effective latency against the window offset", () => {
        const m = metrics();

        const a = m.recordLatency(iso(T), T + 100);
        const b = m.recordLatency(iso(T + 1000), T + 1350);
        const c = m.recordLatency(iso(T + 2000), T + 1800);
        const d = m.recordLatency(iso(T + 3000), T + 3400);

        expect(a).toEqual({
            ts: 42,
            mode: "practice",
            instrument: "USD_CAD",
            receivedTs: T + 100,
            serverTime: T,
            latencyMsRaw: 100,
            latencyMsClamped: 100,
            effectiveMs: 0,
            clockOffsetMs: 100,
            skewMs: null,
            isBacklog: false,
            isOutlier: false,
        });
        expect(b).toMatchObject({ latencyMsRaw: 350, clockOffsetMs: 100, effectiveMs: 250 });
        expect(c).toMatchObject({
            latencyMsRaw: -200,
            latencyMsClamped: 0,
            clockOffsetMs: -200,
            effectiveMs: 0,
            skewMs: 200,
            isOutlier: false,
        });
        expect(d).toMatchObject({ latencyMsRaw: 400, clockOffsetMs: -200, effectiveMs: 600 });
    });

    it("flags skew and high outliers and leaves them out of the statistics", () => {
        const m = metrics();
        m.recordLatency(iso(T), T + 100);
        m.recordLatency(iso(T + 1000), T + 1350);
        m.recordLatency(iso(T + 2000), T + 1800);
        m.recordLatency(iso(T + 3000), T + 3400);

        const skewed = m.recordLatency(iso(T + 9000), T + 4000);
        const late = m.recordLatency(iso(T - 5000), T + 5000);

        expect(skewed).toMatchObject({ latencyMsRaw: -5000, skewMs: 5000, effectiveMs: 0, isOutlier: true });
        expect(late).toMatchObject({
            latencyMsRaw: 10_000,
            clockOffsetMs: -200,
            effectiveMs: 10_200,
            isBacklog: true,
            isOutlier: true,
        });

        const snap = m.snapshot(T + 5000);
        expect(snap.sampleCount).toBe(6);
        expect(snap.backlogCount).toBe(1);
        expect(snap.outlierCount).toBe(2);
        expect(snap.windowSampleCount).toBe(6);
        expect(snap.clockOffsetMs).toBe(-200);
        expect(snap.latency).toEqual({
            raw: { lastMs: 400, p95Ms: 400, meanMs: 162.5 },
            clamped: { lastMs: 400, p95Ms: 400, meanMs: 212.5 },
            effective: { lastMs: 600, p95Ms: 600, meanMs: 212.5 },
        });
    });

    it("matches a reference nearest-rank p95 over non-outliers", () => {
        const m = metrics(60_000);
        const samples: LatencySample[] = [];

        for (let i = 0; i < 50; i++) {
            const latency = i === 10 || i === 30 ? 20_000 : 50 + ((i * 37) % 400);
            const server = T + i * 100;
            const sample = m.recordLatency(iso(server), server + latency);
            if (sample) samples.push(sample);
        }

        const eligible = samples
            .filter((s) => !s.isOutlier)
            .map((s) => s.effectiveMs)
            .sort((x, y) => x - y);
        const reference = eligible[Math.ceil(eligible.length * 0.95) - 1];

        const snap = m.snapshot(T + 10_000);
        expect(samples).toHaveLength(50);
        expect(eligible).toHaveLength(48);
        expect(snap.outlierCount).toBe(2);
        expect(snap.latency.effective.p95Ms).toBe(reference);
    });

    it("drops samples older than the window", () => {
        const m = metrics();
        m.recordLatency(iso(T), T + 100);
        m.recordLatency(iso(T + 5000), T + 5300);
        m.recordLatency(iso(T + 12_000), T + 12_200);

        const snap = m.snapshot(T + 12_200);
        expect(snap.windowSampleCount).toBe(2);
        expect(snap.sampleCount).toBe(3);
        expect(snap.clockOffsetMs).toBe(200);
    });

    it("produces no sample for an unparseable timestamp", () => {
        const m = metrics();

        expect(m.recordLatency("not-a-time", T)).toBeNull();
        expect(m.recordLatency(null, T)).toBeNull();
        expect(m.snapshot(T).sampleCount).toBe(0);
        expect(m.snapshot(T).latency.effective).toEqual({ lastMs: null, p95Ms: null, meanMs: null });
    });

    it("counts messages, errors and reconnect waits", () => {
        const m = metrics();
        for (const ts of [1000, 2000, 3000, 4000, 5000]) {
            m.onEvent({ type: "message", ts });
        }
        m.onEvent({ type: "error", ts: 5500, error: "connection reset" });
        m.onEvent({ type: "reconnect_wait", ts: 5600, reason: "connection reset" });
        m.onEvent({ type: "parse_error", ts: 5700, error: "Unexpected token" });

        const snap = m.snapshot(6000);
        expect(snap).toMatchObject({
            messagesTotal: 5,
            messagesPerSec: 0.5,
            errorCount: 1,
            parseErrorCount: 1,
            reconnectCount: 1,
            lastError: "Unexpected token",
            lastMessageTs: 5000,
            lastErrorTs: 5700,
            lastReconnectTs: 5600,
        });
        expect(m.snapshot(14_500).messagesPerSec).toBe(0.1);
    });

    it("returns snapshots that later writes do not change", () => {
        const m = metrics();
        m.recordLatency(iso(T), T + 100);
        const before = m.snapshot(T + 100);

        m.recordLatency(iso(T + 1000), T + 1500);

        expect(before.sampleCount).toBe(1);
        expect(before.latency.raw).toEqual({ lastMs: 100, p95Ms: 100, meanMs: 100 });
        expect(m.snapshot(T + 1500).sampleCount).toBe(2);
    });

    it("freezes samples", () => {
        const sample = metrics().recordLatency(iso(T), T + 10);

        expect(sample).not.toBeNull();
        expect(Object.isFrozen(sample)).toBe(true);
    });
});
