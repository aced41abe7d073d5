/**
 * Gate threshold profiles.
 *
 * A profile is a JSON file named latency_thresholds_<mode>_<instrument>.json
 * holding any subset of GateThresholds (camelCase or snake_case keys).
 * The first match in the search directories wins; missing fields keep
 * their defaults. The loaded file's sha1 is reported so a running gate can
 * be traced back to the exact profile it was built from.
 */

import { createHash } from "crypto";
import { readFile } from "fs/promises";
import { join } from "path";
import {
    DEFAULT_GATE_THRESHOLDS,
    GateThresholdsSchema,
    GateThresholdsSchemaBase,
    type GateThresholds,
    type StreamModeType,
} from "@fxgate/shared";
import { createChildLogger } from "../log/logger.js";
import { percentile } from "../metrics/percentile.js";
import { InvalidGateConfigError } from "./tradeLatencyGate.js";

const logger = createChildLogger({ module: "gate-thresholds" });

export const DEFAULT_THRESHOLD_DIRS = ["config/latency_thresholds", "data"];

export interface ThresholdsMeta {
    source: "file" | "defaults";
    path: string | null;
    sha1: string | null;
    warnOverrideMs: number | null;
}

export interface LoadedThresholds {
    thresholds: GateThresholds;
    meta: ThresholdsMeta;
}

export interface LoadThresholdsOptions {
    /** Directories searched in order (default: DEFAULT_THRESHOLD_DIRS) */
    dirs?: string[];
    /** Replaces backlogWarnMs after the file is applied */
    warnOverrideMs?: number;
}

export function thresholdsFileName(mode: StreamModeType, instrument: string): string {
    return `latency_thresholds_${mode}_${instrument.replace(/\//g, "_")}.json`;
}

function camelCase(key: string): string {
    return key.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase());
}

async function readIfExists(path: string): Promise<string | null> {
    try {
        return await readFile(path, "utf8");
    } catch (err) {
        if (err instanceof Error && "code" in err && err.code === "ENOENT") {
            return null;
        }
        throw err;
    }
}

function parseProfile(path: string, content: string): Partial<GateThresholds> {
    let data: unknown;
    try {
        data = JSON.parse(content);
    } catch (err) {
        throw new InvalidGateConfigError([`${path}: ${err instanceof Error ? err.message : String(err)}`]);
    }
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
        throw new InvalidGateConfigError([`${path}: profile must be a JSON object`]);
    }

    const normalized = Object.fromEntries(Object.entries(data).map(([key, value]) => [camelCase(key), value]));
    const parsed = GateThresholdsSchemaBase.partial().safeParse(normalized);
    if (!parsed.success) {
        throw new InvalidGateConfigError(
            parsed.error.issues.map((issue) => `${path}: ${issue.path.join(".")}: ${issue.message}`)
        );
    }
    return parsed.data;
}

function validate(input: Partial<GateThresholds>, path: string | null): GateThresholds {
    const parsed = GateThresholdsSchema.safeParse(input);
    if (!parsed.success) {
        throw new InvalidGateConfigError(
            parsed.error.issues.map((issue) => `${path ?? "defaults"}: ${issue.path.join(".")}: ${issue.message}`)
        );
    }
    return parsed.data;
}

/**
 * Resolve the thresholds for one (mode, instrument).
 */
export async function loadThresholds(
    mode: StreamModeType,
    instrument: string,
    options: LoadThresholdsOptions = {}
): Promise<LoadedThresholds> {
    const dirs = options.dirs ?? DEFAULT_THRESHOLD_DIRS;
    const fileName = thresholdsFileName(mode, instrument);
    const warnOverrideMs = options.warnOverrideMs ?? null;

    for (const dir of dirs) {
        const path = join(dir, fileName);
        const content = await readIfExists(path);
        if (content === null) continue;

        const fromFile = parseProfile(path, content);
        const merged = { ...DEFAULT_GATE_THRESHOLDS, ...fromFile };
        if (warnOverrideMs !== null) merged.backlogWarnMs = warnOverrideMs;

        const sha1 = createHash("sha1").update(content, "utf8").digest("hex");
        const thresholds = validate(merged, path);

        logger.info({ mode, instrument, path, sha1, warnOverrideMs }, "Loaded gate thresholds");
        return { thresholds, meta: { source: "file", path, sha1, warnOverrideMs } };
    }

    logger.warn({ mode, instrument, dirs, fileName }, "Threshold file missing, using defaults");

    const merged = { ...DEFAULT_GATE_THRESHOLDS };
    if (warnOverrideMs !== null) merged.backlogWarnMs = warnOverrideMs;

    return {
        thresholds: validate(merged, null),
        meta: { source: "defaults", path: null, sha1: null, warnOverrideMs },
    };
}

export interface ThresholdBounds {
    warnMinMs: number;
    warnMaxMs: number;
    blockMinMs: number;
    blockMaxMs: number;
}

export const DEFAULT_THRESHOLD_BOUNDS: ThresholdBounds = {
    warnMinMs: 800,
    warnMaxMs: 2500,
    blockMinMs: 250,
    blockMaxMs: 750,
};

function clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), max);
}

/**
 * Suggest warn/block levels from a recorded latency distribution:
 * warn from the p95 and block from the p99 of the clamped values,
 * each held inside its bounds.
 */
export function suggestThresholds(
    rawValues: Iterable<number>,
    bounds: ThresholdBounds = DEFAULT_THRESHOLD_BOUNDS
): { warnMs: number; blockMs: number } {
    const values: number[] = [];
    for (const value of rawValues) {
        if (Number.isFinite(value)) values.push(Math.max(0, value));
    }
    values.sort((a, b) => a - b);

    const p95 = percentile(values, 95);
    const p99 = percentile(values, 99);

    return {
        warnMs: p95 === null ? bounds.warnMinMs : clamp(p95, bounds.warnMinMs, bounds.warnMaxMs),
        blockMs: p99 === null ? bounds.blockMinMs : clamp(p99, bounds.blockMinMs, bounds.blockMaxMs),
    };
}
