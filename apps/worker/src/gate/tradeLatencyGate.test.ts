import { describe, it, expect } from "vitest";
import type { GateThresholdsInput } from "@fxgate/shared";
import { InvalidGateConfigError, TradeLatencyGate, type GateSample } from "./tradeLatencyGate.js";

function sample(effectiveMs: number, overrides: Partial<GateSample> = {}): GateSample {
    return { effectiveMs, isOutlier: false, isBacklog: effectiveMs >= 2000, skewMs: null, ...overrides };
}

function gate(thresholds: GateThresholdsInput = {}): TradeLatencyGate {
    return new TradeLatencyGate({ mode: "practice", instrument: "USD_CAD", thresholds });
}

function feed(g: TradeLatencyGate, effectiveMs: number, times: number): string[] {
    const decisions: string[] = [];
    for (let i = 0; i < times; i++) {
        decisions.push(g.evaluate(sample(effectiveMs)));
    }
    return decisions;
}

describe("TradeLatencyGate", () => {
    it("stays OK through warm-up whatever the latency", () => {
        const g = gate();

        const decisions = feed(g, 5000, 59);

        expect(new Set(decisions)).toEqual(new Set(["OK"]));
        expect(g.report()).toMatchObject({
            warmingUp: true,
            warn: false,
            consecutiveBacklogCount: 0,
            consecutiveGoodCount: 0,
            totalSamplesSeen: 59,
            backlogSamples: 59,
        });

        expect(g.evaluate(sample(5000))).toBe("WARN");
        expect(g.report()).toMatchObject({ warmingUp: false, warnLast: true, consecutiveBacklogCount: 1 });
    });

    it("blocks on the third consecutive sample at the block level, not before", () => {
        const g = gate({ minSamples: 0, backlogBlockMs: 500, consecutiveBacklogToBlock: 3 });

        expect(feed(g, 600, 2)).toEqual(["OK", "OK"]);
        expect(g.evaluate(sample(100))).toBe("OK");
        expect(feed(g, 600, 3)).toEqual(["OK", "OK", "BLOCKED"]);
    });

    it("restarts the good streak on a sample at the warn level while blocked", () => {
        const g = gate({ minSamples: 0 });
        feed(g, 600, 3);
        feed(g, 50, 5);
        expect(g.state.consecutiveGoodCount).toBe(5);

        expect(g.evaluate(sample(1600))).toBe("BLOCKED");
        expect(g.state.consecutiveGoodCount).toBe(0);

        expect(feed(g, 50, 9).every((d) => d === "BLOCKED")).toBe(true);

        // The 1600 ms sample is still the window's p95, so the gate reopens as WARN
        expect(g.evaluate(sample(50))).toBe("WARN");
        expect(g.report()).toMatchObject({
            warnLast: false,
            warnP95: true,
            effectiveP95Ms: 1600,
            consecutiveGoodCount: 0,
            consecutiveBacklogCount: 0,
        });
    });

    it("runs the warm-up, block and recover cycle", () => {
        const g = gate();

        expect(feed(g, 80, 60).at(-1)).toBe("OK");
        expect(g.report().warmingUp).toBe(false);

        expect(feed(g, 600, 3)).toEqual(["OK", "OK", "BLOCKED"]);

        const recovery = feed(g, 50, 10);
        expect(recovery.slice(0, 9).every((d) => d === "BLOCKED")).toBe(true);
        expect(recovery[9]).toBe("OK");
        expect(g.state).toEqual({
            decision: "OK",
            consecutiveBacklogCount: 0,
            consecutiveGoodCount: 0,
            totalSamplesSeen: 73,
            backlogSamples: 0,
            outlierSamples: 0,
            skewSamples: 0,
        });
    });

    it("counts outliers toward blocking and keeps them out of the window", () => {
        const g = gate({ minSamples: 0 });

        for (let i = 0; i < 3; i++) {
            g.evaluate(sample(12_000, { isOutlier: true, isBacklog: true }));
        }
        g.evaluate(sample(0, { skewMs: 300 }));

        expect(g.report()).toMatchObject({
            decision: "BLOCKED",
            outlierSamples: 3,
            backlogSamples: 3,
            skewSamples: 1,
            effectiveP95Ms: 0,
            lastEffectiveMs: 0,
        });
    });

    it("warns on an outlier spike while keeping it out of the p95", () => {
        const g = gate();
        feed(g, 50, 100);

        expect(g.evaluate(sample(20_000, { isOutlier: true, isBacklog: true }))).toBe("WARN");
        expect(g.report()).toMatchObject({
            warn: true,
            warnLast: true,
            warnP95: false,
            lastEffectiveMs: 20_000,
            effectiveP95Ms: 50,
            consecutiveBacklogCount: 1,
        });
    });

    it("reports the last effective latency it warned on", () => {
        const g = gate({ minSamples: 0 });
        feed(g, 50, 5);

        expect(g.evaluate(sample(1800))).toBe("WARN");
        expect(g.report()).toMatchObject({ warnLast: true, lastEffectiveMs: 1800 });

        expect(g.evaluate(sample(20_000, { isOutlier: true, isBacklog: true }))).toBe("WARN");
        expect(g.report()).toMatchObject({ warnLast: true, lastEffectiveMs: 20_000, effectiveP95Ms: 1800 });
    });

    it("caps the p95 window at effectiveWindowSize", () => {
        const g = gate({ minSamples: 0, effectiveWindowSize: 4 });
        feed(g, 1400, 4);
        feed(g, 100, 4);

        expect(g.report().effectiveP95Ms).toBe(100);
        expect(g.report().effectiveMeanMs).toBe(100);
    });

    it("rejects invalid thresholds at construction", () => {
        expect(() => gate({ backlogWarnMs: 0 })).toThrow(InvalidGateConfigError);
        expect(() => gate({ backlogBlockMs: 12_000 })).toThrow(InvalidGateConfigError);
        expect(() => gate({ consecutiveGoodToUnblock: 0 })).toThrow(InvalidGateConfigError);
        expect(() => gate({ minSamples: -1 })).toThrow(InvalidGateConfigError);
        expect(() => gate({ backlogWarnMs: 1500, backlogBlockMs: 500 })).not.toThrow();
    });

    it("names the failing field", () => {
        try {
            gate({ backlogWarnMs: 20_000 });
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(InvalidGateConfigError);
            expect(err instanceof InvalidGateConfigError ? err.issues : []).toEqual([
                "backlogWarnMs: backlogWarnMs must be < outlierHighMs",
            ]);
        }
    });
});
