/**
 * Tri-state execution gate driven by effective stream latency.
 *
 * One gate per (mode, instrument). The decision moves only inside
 * evaluate(), one sample at a time:
 *
 * - Warm-up: until minSamples samples were seen the decision is OK and
 *   neither streak counts.
 * - Block: consecutiveBacklogToBlock samples in a row at or above
 *   backlogBlockMs (outliers always count) move OK/WARN to BLOCKED.
 * - Unblock: once BLOCKED, consecutiveGoodToUnblock samples in a row below
 *   backlogWarnMs move back to OK; any other sample restarts the streak.
 * - Warn: the latest effective latency (outliers included) or the windowed
 *   p95 at or above backlogWarnMs. Advisory only; BLOCKED wins over WARN.
 *
 * Outliers never enter the p95/mean window.
 */

import {
    GateDecision,
    GateThresholdsSchema,
    type GateDecisionType,
    type GateThresholds,
    type GateThresholdsInput,
    type StreamModeType,
} from "@fxgate/shared";
import { createChildLogger } from "../log/logger.js";
import { percentile } from "../metrics/percentile.js";
import type { LatencySample } from "../metrics/streamMetrics.js";

const logger = createChildLogger({ module: "latency-gate" });

export class InvalidGateConfigError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid gate thresholds: ${issues.join("; ")}`);
        this.name = "InvalidGateConfigError";
        this.issues = issues;
    }
}

/** The parts of a LatencySample the gate reads. */
export type GateSample = Pick<LatencySample, "effectiveMs" | "isOutlier" | "isBacklog" | "skewMs">;

export interface GateState {
    decision: GateDecisionType;
    consecutiveBacklogCount: number;
    consecutiveGoodCount: number;
    totalSamplesSeen: number;
    backlogSamples: number;
    outlierSamples: number;
    skewSamples: number;
}

export interface GateReport {
    mode: StreamModeType;
    instrument: string;
    decision: GateDecisionType;
    blocked: boolean;
    warmingUp: boolean;
    warn: boolean;
    warnLast: boolean;
    warnP95: boolean;
    consecutiveBacklogCount: number;
    consecutiveGoodCount: number;
    totalSamplesSeen: number;
    backlogSamples: number;
    outlierSamples: number;
    skewSamples: number;
    effectiveP95Ms: number | null;
    effectiveMeanMs: number | null;
    lastEffectiveMs: number | null;
    thresholds: GateThresholds;
}

export interface TradeLatencyGateOptions {
    mode: StreamModeType;
    instrument: string;
    thresholds?: GateThresholdsInput;
}

export class TradeLatencyGate {
    readonly mode: StreamModeType;
    readonly instrument: string;
    readonly thresholds: Readonly<GateThresholds>;

    private readonly gateState: GateState = {
        decision: GateDecision.OK,
        consecutiveBacklogCount: 0,
        consecutiveGoodCount: 0,
        totalSamplesSeen: 0,
        backlogSamples: 0,
        outlierSamples: 0,
        skewSamples: 0,
    };
    private effectiveWindow: number[] = [];
    private lastEffectiveMs: number | null = null;
    private warnLast = false;
    private warnP95 = false;

    constructor(options: TradeLatencyGateOptions) {
        const parsed = GateThresholdsSchema.safeParse(options.thresholds ?? {});
        if (!parsed.success) {
            throw new InvalidGateConfigError(
                parsed.error.issues.map((issue) => `${issue.path.join(".") || "thresholds"}: ${issue.message}`)
            );
        }
        this.mode = options.mode;
        this.instrument = options.instrument;
        this.thresholds = Object.freeze(parsed.data);
    }

    get state(): Readonly<GateState> {
        return { ...this.gateState };
    }

    get decision(): GateDecisionType {
        return this.gateState.decision;
    }

    /**
     * Fold one sample into the gate and return the resulting decision.
     */
    evaluate(sample: GateSample): GateDecisionType {
        const t = this.thresholds;
        const st = this.gateState;
        const previous = st.decision;

        st.totalSamplesSeen++;
        if (sample.isBacklog) st.backlogSamples++;
        if (sample.isOutlier) st.outlierSamples++;
        if (sample.skewMs !== null) st.skewSamples++;

        this.lastEffectiveMs = sample.effectiveMs;
        if (!sample.isOutlier) {
            this.effectiveWindow.push(sample.effectiveMs);
            if (this.effectiveWindow.length > t.effectiveWindowSize) {
                this.effectiveWindow = this.effectiveWindow.slice(-t.effectiveWindowSize);
            }
        }

        if (st.totalSamplesSeen < t.minSamples) {
            st.decision = GateDecision.OK;
            st.consecutiveBacklogCount = 0;
            st.consecutiveGoodCount = 0;
            this.warnLast = false;
            this.warnP95 = false;
            return st.decision;
        }

        const p95 = this.effectiveP95();
        this.warnLast = sample.effectiveMs >= t.backlogWarnMs;
        this.warnP95 = p95 !== null && p95 >= t.backlogWarnMs;

        const backlogHit = sample.isOutlier || sample.effectiveMs >= t.backlogBlockMs;
        st.consecutiveBacklogCount = backlogHit ? st.consecutiveBacklogCount + 1 : 0;

        let blocked = previous === GateDecision.BLOCKED;

        if (blocked) {
            const good = !sample.isOutlier && sample.effectiveMs < t.backlogWarnMs;
            st.consecutiveGoodCount = good ? st.consecutiveGoodCount + 1 : 0;
            if (st.consecutiveGoodCount >= t.consecutiveGoodToUnblock) {
                blocked = false;
                st.consecutiveGoodCount = 0;
                st.consecutiveBacklogCount = 0;
            }
        } else if (st.consecutiveBacklogCount >= t.consecutiveBacklogToBlock) {
            blocked = true;
            st.consecutiveGoodCount = 0;
        }

        if (blocked) {
            st.decision = GateDecision.BLOCKED;
        } else {
            st.decision = this.warnLast || this.warnP95 ? GateDecision.WARN : GateDecision.OK;
        }

        if (st.decision !== previous) {
            this.logTransition(previous, st.decision, sample.effectiveMs);
        }
        return st.decision;
    }

    report(): GateReport {
        const st = this.gateState;
        const mean =
            this.effectiveWindow.length === 0
                ? null
                : this.effectiveWindow.reduce((a, b) => a + b, 0) / this.effectiveWindow.length;
        return {
            mode: this.mode,
            instrument: this.instrument,
            decision: st.decision,
            blocked: st.decision === GateDecision.BLOCKED,
            warmingUp: st.totalSamplesSeen < this.thresholds.minSamples,
            warn: this.warnLast || this.warnP95,
            warnLast: this.warnLast,
            warnP95: this.warnP95,
            consecutiveBacklogCount: st.consecutiveBacklogCount,
            consecutiveGoodCount: st.consecutiveGoodCount,
            totalSamplesSeen: st.totalSamplesSeen,
            backlogSamples: st.backlogSamples,
            outlierSamples: st.outlierSamples,
            skewSamples: st.skewSamples,
            effectiveP95Ms: this.effectiveP95(),
            effectiveMeanMs: mean,
            lastEffectiveMs: this.lastEffectiveMs,
            thresholds: { ...this.thresholds },
        };
    }

    private effectiveP95(): number | null {
        const sorted = [...this.effectiveWindow].sort((a, b) => a - b);
        return percentile(sorted, 95);
    }

    private logTransition(from: GateDecisionType, to: GateDecisionType, effectiveMs: number): void {
        const fields = {
            mode: this.mode,
            instrument: this.instrument,
            from,
            to,
            effectiveMs,
            consecutiveBacklogCount: this.gateState.consecutiveBacklogCount,
            totalSamplesSeen: this.gateState.totalSamplesSeen,
        };
        if (to === GateDecision.BLOCKED) {
            logger.warn(fields, "Trade gate blocked");
        } else if (from === GateDecision.BLOCKED) {
            logger.info(fields, "Trade gate unblocked");
        } else {
            logger.debug(fields, "Trade gate decision changed");
        }
    }
}
