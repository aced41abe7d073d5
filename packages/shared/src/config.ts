import { z } from "zod";

/**
 * Broker environment a stream belongs to.
 * - practice: demo accounts
 * - live: real-money accounts
 */
export const StreamMode = {
    PRACTICE: "practice",
    LIVE: "live",
} as const;

export type StreamModeType = (typeof StreamMode)[keyof typeof StreamMode];

/**
 * Admission decision reported by the latency gate.
 * - OK: trading may proceed
 * - WARN: advisory, latency elevated but not blocking
 * - BLOCKED: execution disabled until a good streak clears it
 */
export const GateDecision = {
    OK: "OK",
    WARN: "WARN",
    BLOCKED: "BLOCKED",
} as const;

export type GateDecisionType = (typeof GateDecision)[keyof typeof GateDecision];

/**
 * Reconnect budget. Unlimited is its own variant instead of a null bound.
 */
export const RetryLimitSchema = z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("unlimited") }),
    z.object({ kind: z.literal("bounded"), max: z.number().int().min(0) }),
]);

export type RetryLimit = z.infer<typeof RetryLimitSchema>;

export const UNLIMITED_RETRIES: RetryLimit = { kind: "unlimited" };

export function boundedRetries(max: number): RetryLimit {
    return RetryLimitSchema.parse({ kind: "bounded", max });
}

/**
 * Parse the env form of a retry limit: "unlimited" (or empty) or an integer.
 */
export function parseRetryLimit(value: string | undefined): RetryLimit {
    const trimmed = value?.trim().toLowerCase() ?? "";
    if (trimmed === "" || trimmed === "unlimited") {
        return UNLIMITED_RETRIES;
    }
    const max = Number(trimmed);
    if (!Number.isInteger(max)) {
        throw new Error(`Invalid retry limit "${value}": use "unlimited" or an integer`);
    }
    return boundedRetries(max);
}

/**
 * Reconnect settings for one stream supervisor.
 * Durations are in milliseconds.
 */
export const ReconnectSettingsSchema = z
    .object({
        /** Reconnect after transient failures (default: true) */
        reconnect: z.boolean().default(true),
        /** Reconnect budget (default: unlimited) */
        maxRetries: RetryLimitSchema.default(UNLIMITED_RETRIES),
        /** Backoff base delay in ms (default: 500) */
        backoffBaseMs: z.number().int().positive().default(500),
        /** Backoff ceiling in ms (default: 15000) */
        backoffMaxMs: z.number().int().positive().default(15_000),
        /** Total session wall-clock timeout in ms, 0 disables it (default: 0) */
        sessionTimeoutMs: z.number().int().min(0).default(0),
    })
    .refine((data) => data.backoffBaseMs <= data.backoffMaxMs, {
        message: "backoffBaseMs must be <= backoffMaxMs",
        path: ["backoffBaseMs"],
    });

export type ReconnectSettings = z.infer<typeof ReconnectSettingsSchema>;

/**
 * Latency gate thresholds (base object).
 * Use GateThresholdsSchemaBase.partial() for parsing profile files.
 * Use GateThresholdsSchema for full validation with refinements.
 */
export const GateThresholdsSchemaBase = z.object({
    /** Negative raw latency beyond this is a clock-skew outlier in ms (default: 1000) */
    skewOutlierMs: z.number().positive().default(1000),
    /** Effective latency that raises a warning in ms (default: 1500) */
    backlogWarnMs: z.number().positive().default(1500),
    /** Effective latency that counts toward blocking in ms (default: 500) */
    backlogBlockMs: z.number().positive().default(500),
    /** Consecutive backlog samples needed to block (default: 3) */
    consecutiveBacklogToBlock: z.number().int().min(1).default(3),
    /** Consecutive good samples needed to unblock (default: 10) */
    consecutiveGoodToUnblock: z.number().int().min(1).default(10),
    /** Effective latency treated as an outlier in ms (default: 10000) */
    outlierHighMs: z.number().positive().default(10_000),
    /** Samples required before the gate leaves warm-up (default: 60) */
    minSamples: z.number().int().min(0).default(60),
    /** Non-outlier samples kept for the gate's p95 (default: 120) */
    effectiveWindowSize: z.number().int().min(1).default(120),
});

/**
 * Gate thresholds with ordering refinements.
 * The warn and block levels may be in either order, but both must sit
 * below the outlier level.
 */
export const GateThresholdsSchema = GateThresholdsSchemaBase.refine(
    (data) => data.backlogWarnMs < data.outlierHighMs,
    {
        message: "backlogWarnMs must be < outlierHighMs",
        path: ["backlogWarnMs"],
    }
).refine((data) => data.backlogBlockMs < data.outlierHighMs, {
    message: "backlogBlockMs must be < outlierHighMs",
    path: ["backlogBlockMs"],
});

export type GateThresholds = z.infer<typeof GateThresholdsSchemaBase>;

export type GateThresholdsInput = z.input<typeof GateThresholdsSchemaBase>;

export const DEFAULT_GATE_THRESHOLDS: GateThresholds = GateThresholdsSchema.parse({});
