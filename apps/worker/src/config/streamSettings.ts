import { ReconnectSettingsSchema, parseRetryLimit, type ReconnectSettings } from "@fxgate/shared";
import type { Env } from "./env.js";

type StreamEnv = Pick<
    Env,
    | "STREAM_RECONNECT"
    | "STREAM_MAX_RETRIES"
    | "STREAM_BACKOFF_BASE_SECONDS"
    | "STREAM_BACKOFF_MAX_SECONDS"
    | "STREAM_SESSION_TIMEOUT_SECONDS"
>;

/**
 * Env values are in seconds; supervisor settings are in milliseconds.
 */
export function reconnectSettingsFromEnv(source: StreamEnv): ReconnectSettings {
    return ReconnectSettingsSchema.parse({
        reconnect: source.STREAM_RECONNECT,
        maxRetries: parseRetryLimit(source.STREAM_MAX_RETRIES),
        backoffBaseMs: Math.round(source.STREAM_BACKOFF_BASE_SECONDS * 1000),
        backoffMaxMs: Math.round(source.STREAM_BACKOFF_MAX_SECONDS * 1000),
        sessionTimeoutMs: Math.round(source.STREAM_SESSION_TIMEOUT_SECONDS * 1000),
    });
}
