import { createServer, type RequestListener, type Server, type ServerResponse } from "http";
import { GateDecision } from "@fxgate/shared";
import { logger } from "../log/logger.js";
import type { MonitorSnapshot } from "../monitor/latencyMonitor.js";
import type { StreamStatusView } from "../stream/status.js";

interface MonitorHealth {
    key: string;
    decision: MonitorSnapshot["gate"]["decision"];
    warn: boolean;
    warmingUp: boolean;
    totalSamplesSeen: number;
    effectiveP95Ms: number | null;
    messagesPerSec: number;
    lastMessageTs: string | null;
    latency: MonitorSnapshot["metrics"]["latency"];
    thresholdsSource: string | null;
}

export interface HealthStatus {
    status: "ok" | "degraded" | "unhealthy";
    timestamp: string;
    streams: StreamStatusView[];
    monitors: MonitorHealth[];
}

export interface MonitorHealthInput {
    snapshot: MonitorSnapshot;
    /** Where the gate thresholds came from, e.g. a profile path */
    thresholdsSource?: string | null;
}

export type HealthProvider = () => HealthStatus;

/**
 * Overall status:
 * - unhealthy: a stream stopped on a fatal error
 * - degraded: a stream is not currently streaming, or a gate is BLOCKED
 */
export function buildHealthStatus(
    streams: StreamStatusView[],
    monitors: MonitorHealthInput[],
    now: Date = new Date()
): HealthStatus {
    const monitorHealth: MonitorHealth[] = monitors.map(({ snapshot, thresholdsSource }) => ({
        key: `${snapshot.metrics.mode}:${snapshot.metrics.instrument}`,
        decision: snapshot.gate.decision,
        warn: snapshot.gate.warn,
        warmingUp: snapshot.gate.warmingUp,
        totalSamplesSeen: snapshot.gate.totalSamplesSeen,
        effectiveP95Ms: snapshot.gate.effectiveP95Ms,
        messagesPerSec: snapshot.metrics.messagesPerSec,
        lastMessageTs:
            snapshot.metrics.lastMessageTs === null ? null : new Date(snapshot.metrics.lastMessageTs).toISOString(),
        latency: snapshot.metrics.latency,
        thresholdsSource: thresholdsSource ?? null,
    }));

    let status: HealthStatus["status"] = "ok";
    if (streams.some((s) => s.state === "failed")) {
        status = "unhealthy";
    } else if (
        streams.some((s) => s.state !== "streaming") ||
        monitorHealth.some((m) => m.decision === GateDecision.BLOCKED)
    ) {
        status = "degraded";
    }

    return {
        status,
        timestamp: now.toISOString(),
        streams,
        monitors: monitorHealth,
    };
}

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
    res.writeHead(statusCode, { "Content-Type": "application/json", "Cache-Control": "no-store" });
    res.end(JSON.stringify(body));
}

/**
 * GET /health (query string ignored): 200, or 503 once a stream failed.
 * Anything else is a JSON 404.
 */
function healthListener(provider: HealthProvider): RequestListener {
    return (req, res) => {
        const { pathname } = new URL(req.url ?? "/", "http://health.local");
        if (req.method !== "GET" || pathname !== "/health") {
            sendJson(res, 404, { error: "not_found", path: pathname });
            return;
        }

        let health: HealthStatus;
        try {
            health = provider();
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            logger.error({ err: message }, "Health provider failed");
            sendJson(res, 500, { status: "error", error: message });
            return;
        }
        sendJson(res, health.status === "unhealthy" ? 503 : 200, health);
    };
}

export function startHealthServer(port: number, provider: HealthProvider): Server {
    const server = createServer(healthListener(provider));
    server.listen(port, () => {
        logger.info({ port }, "Health server started");
    });
    return server;
}
