/**
 * Append-only latency sample logs, plus the JSONL writer that also
 * records monitor snapshots.
 *
 * Every sample is kept here, outliers included; the rolling statistics
 * are the only place outliers are filtered.
 */

import { appendFile, mkdir } from "fs/promises";
import { dirname } from "path";
import { createChildLogger } from "../log/logger.js";
import type { LatencySample } from "./streamMetrics.js";

const logger = createChildLogger({ module: "jsonl-log" });

export interface LatencySampleLog {
    append(sample: LatencySample): void;
    /** Resolves once every append so far has been written */
    flush(): Promise<void>;
}

/**
 * Keeps the newest `capacity` samples in memory.
 */
export class MemorySampleLog implements LatencySampleLog {
    private readonly capacity: number;
    private readonly samples: LatencySample[] = [];
    private appended = 0;

    constructor(capacity = 10_000) {
        if (capacity < 1) {
            throw new Error(`capacity must be >= 1, got ${capacity}`);
        }
        this.capacity = capacity;
    }

    append(sample: LatencySample): void {
        this.appended++;
        this.samples.push(sample);
        if (this.samples.length > this.capacity) {
            this.samples.splice(0, this.samples.length - this.capacity);
        }
    }

    async flush(): Promise<void> {}

    entries(): readonly LatencySample[] {
        return [...this.samples];
    }

    get totalAppended(): number {
        return this.appended;
    }
}

/**
 * One JSON object per line. Writes are chained so lines land in append
 * order; a failed write is logged and the chain continues.
 */
export class JsonlWriter<T> {
    readonly path: string;
    private readonly label: string;
    private pending: Promise<void> = Promise.resolve();
    private dirReady = false;
    private failures = 0;

    constructor(path: string, label = "record") {
        this.path = path;
        this.label = label;
    }

    get writeFailures(): number {
        return this.failures;
    }

    append(record: T): void {
        const line = `${JSON.stringify(record)}\n`;
        this.pending = this.pending.then(() => this.write(line));
    }

    flush(): Promise<void> {
        return this.pending;
    }

    private async write(line: string): Promise<void> {
        try {
            if (!this.dirReady) {
                await mkdir(dirname(this.path), { recursive: true });
                this.dirReady = true;
            }
            await appendFile(this.path, line, "utf8");
        } catch (err) {
            this.failures++;
            logger.error(
                { path: this.path, record: this.label, err: err instanceof Error ? err.message : String(err) },
                "Failed to append JSONL record"
            );
        }
    }
}

export class JsonlSampleLog extends JsonlWriter<LatencySample> implements LatencySampleLog {
    constructor(path: string) {
        super(path, "latency-sample");
    }
}
