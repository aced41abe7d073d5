import { config } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { StreamMode } from "@fxgate/shared";

// Load .env from project root (four levels up from apps/worker/src/config)
const __dirname = dirname(fileURLToPath(import.meta.url));
config({ path: resolve(__dirname, "../../../../.env") });

const booleanFlag = (fallback: "true" | "false") =>
    z
        .string()
        .transform((v) => v.toLowerCase() !== "false" && v !== "0")
        .default(fallback);

const envSchema = z.object({
    STREAM_MODE: z.enum([StreamMode.PRACTICE, StreamMode.LIVE]).default(StreamMode.PRACTICE),
    /** Overrides the per-mode default stream host */
    STREAM_BASE_URL: z.string().url().optional(),
    STREAM_API_TOKEN: z.string().optional(),
    STREAM_ACCOUNT_ID: z.string().optional(),
    STREAM_INSTRUMENTS: z
        .string()
        .default("USD_CAD")
        .transform((v) =>
            v
                .split(",")
                .map((s) => s.trim())
                .filter((s) => s.length > 0)
        ),
    STREAM_TRANSACTIONS_ENABLED: booleanFlag("true"),
    STREAM_RECONNECT: booleanFlag("true"),
    /** "unlimited" or a non-negative integer */
    STREAM_MAX_RETRIES: z.string().default("unlimited"),
    STREAM_BACKOFF_BASE_SECONDS: z.coerce.number().positive().default(0.5),
    STREAM_BACKOFF_MAX_SECONDS: z.coerce.number().positive().default(15),
    STREAM_SESSION_TIMEOUT_SECONDS: z.coerce.number().min(0).default(0),
    STREAM_READ_TIMEOUT_SECONDS: z.coerce.number().positive().default(20),
    LATENCY_THRESHOLDS_DIR: z.string().optional(),
    LATENCY_WARN_MS_OVERRIDE: z.coerce.number().positive().optional(),
    METRICS_WINDOW_SECONDS: z.coerce.number().positive().default(10),
    GATE_EVAL_INTERVAL_MS: z.coerce.number().int().positive().default(250),
    SNAPSHOT_LOG_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
    SAMPLE_LOG_PATH: z.string().optional(),
    SNAPSHOT_LOG_PATH: z.string().optional(),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    LOG_LEVEL: z
        .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
        .default("info"),
    WORKER_PORT: z.coerce.number().default(8081),
});

export type Env = z.infer<typeof envSchema>;

/** One line per problem, e.g. "WORKER_PORT: Expected number, received nan". */
export function describeEnvIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

export function parseEnv(source: NodeJS.ProcessEnv) {
    return envSchema.safeParse(source);
}

function loadEnv(): Env {
    const result = parseEnv(process.env);
    if (result.success) {
        return result.data;
    }
    console.error(`Invalid stream worker environment:\n  ${describeEnvIssues(result.error).join("\n  ")}`);
    process.exit(1);
}

export const env = loadEnv();
