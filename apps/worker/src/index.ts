import { logger } from "./log/logger.js";
import { env } from "./config/env.js";
import { reconnectSettingsFromEnv } from "./config/streamSettings.js";
import { startHealthServer, buildHealthStatus } from "./health/server.js";
import { DEFAULT_THRESHOLD_DIRS, loadThresholds } from "./gate/thresholds.js";
import { LatencyMonitor, type MonitorSnapshot } from "./monitor/latencyMonitor.js";
import { JsonlSampleLog, JsonlWriter, MemorySampleLog, type LatencySampleLog } from "./metrics/sampleLog.js";
import {
    HttpStreamTransport,
    MessageKind,
    ReconnectSupervisor,
    StreamStatus,
    combineObservers,
    describeError,
    pricingEndpoint,
    transactionsEndpoint,
    type StreamMessage,
} from "./stream/index.js";

async function consume(supervisor: ReconnectSupervisor, handle: (message: StreamMessage) => void): Promise<void> {
    try {
        for await (const message of supervisor) {
            handle(message);
        }
        logger.info({ stream: supervisor.name }, "Stream finished");
    } catch (err) {
        // Terminal; the stream status observer already reports it as failed
        logger.error({ stream: supervisor.name, err: describeError(err) }, "Stream stopped with error");
    }
}

function logTransaction(message: StreamMessage): void {
    if (message.kind === MessageKind.TRANSACTION) {
        logger.info(
            { transactionId: message.transactionId, type: message.transactionType, accountId: message.accountId },
            "Transaction"
        );
    } else if (message.kind === MessageKind.UNKNOWN) {
        logger.debug({ type: message.type }, "Unrecognized transaction stream payload");
    }
}

async function main() {
    logger.info("Worker starting...");

    if (!env.STREAM_API_TOKEN || !env.STREAM_ACCOUNT_ID) {
        logger.fatal("STREAM_API_TOKEN and STREAM_ACCOUNT_ID are required");
        process.exit(1);
    }
    if (env.STREAM_INSTRUMENTS.length === 0) {
        logger.fatal("STREAM_INSTRUMENTS is empty");
        process.exit(1);
    }

    const mode = env.STREAM_MODE;
    const settings = reconnectSettingsFromEnv(env);
    const endpointOptions = {
        mode,
        accountId: env.STREAM_ACCOUNT_ID,
        token: env.STREAM_API_TOKEN,
        baseUrl: env.STREAM_BASE_URL,
    };
    const createTransport = () =>
        new HttpStreamTransport({ readTimeoutMs: Math.round(env.STREAM_READ_TIMEOUT_SECONDS * 1000) });

    const sampleLog: LatencySampleLog = env.SAMPLE_LOG_PATH
        ? new JsonlSampleLog(env.SAMPLE_LOG_PATH)
        : new MemorySampleLog();
    const snapshotLog = env.SNAPSHOT_LOG_PATH
        ? new JsonlWriter<MonitorSnapshot>(env.SNAPSHOT_LOG_PATH, "monitor-snapshot")
        : undefined;

    // One monitor (metrics + gate) per instrument
    const thresholdDirs = env.LATENCY_THRESHOLDS_DIR
        ? [env.LATENCY_THRESHOLDS_DIR, ...DEFAULT_THRESHOLD_DIRS]
        : DEFAULT_THRESHOLD_DIRS;
    const monitors: { monitor: LatencyMonitor; thresholdsSource: string }[] = [];
    for (const instrument of env.STREAM_INSTRUMENTS) {
        const loaded = await loadThresholds(mode, instrument, {
            dirs: thresholdDirs,
            warnOverrideMs: env.LATENCY_WARN_MS_OVERRIDE,
        });
        const monitor = new LatencyMonitor({
            mode,
            instrument,
            thresholds: loaded.thresholds,
            windowMs: Math.round(env.METRICS_WINDOW_SECONDS * 1000),
            gateIntervalMs: env.GATE_EVAL_INTERVAL_MS,
            snapshotIntervalMs: env.SNAPSHOT_LOG_INTERVAL_MS,
            sampleLog,
            snapshotLog,
        });
        monitor.start();
        monitors.push({ monitor, thresholdsSource: loaded.meta.path ?? loaded.meta.source });
    }

    const statuses: StreamStatus[] = [];
    const supervisors: ReconnectSupervisor[] = [];
    const tasks: Promise<void>[] = [];

    // Pricing stream feeds every monitor
    const pricingStatus = new StreamStatus("pricing");
    const pricing = new ReconnectSupervisor({
        endpoint: pricingEndpoint(endpointOptions, env.STREAM_INSTRUMENTS),
        createTransport,
        settings,
        observer: combineObservers(pricingStatus, ...monitors.map((m) => m.monitor)),
    });
    statuses.push(pricingStatus);
    supervisors.push(pricing);
    tasks.push(
        consume(pricing, (message) => {
            for (const { monitor } of monitors) {
                monitor.ingest(message);
            }
        })
    );

    // Transactions stream runs independently of pricing
    if (env.STREAM_TRANSACTIONS_ENABLED) {
        const transactionsStatus = new StreamStatus("transactions");
        const transactions = new ReconnectSupervisor({
            endpoint: transactionsEndpoint(endpointOptions),
            createTransport,
            settings,
            observer: transactionsStatus,
        });
        statuses.push(transactionsStatus);
        supervisors.push(transactions);
        tasks.push(consume(transactions, logTransaction));
    } else {
        logger.info("Transactions stream disabled (STREAM_TRANSACTIONS_ENABLED=false)");
    }

    const server = startHealthServer(env.WORKER_PORT, () =>
        buildHealthStatus(
            statuses.map((s) => s.view()),
            monitors.map(({ monitor, thresholdsSource }) => ({ snapshot: monitor.snapshot(), thresholdsSource }))
        )
    );

    logger.info({ mode, instruments: env.STREAM_INSTRUMENTS }, "Worker started successfully");

    // Graceful shutdown
    let shuttingDown = false;
    const shutdown = async () => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info("Shutting down...");
        for (const supervisor of supervisors) {
            supervisor.shutdown();
        }
        await Promise.allSettled(tasks);
        for (const { monitor } of monitors) {
            await monitor.stop();
        }
        await sampleLog.flush();
        server.close();
        process.exit(0);
    };

    const onSignal = () => {
        shutdown().catch((err) => {
            logger.fatal({ err: describeError(err) }, "Shutdown failed");
            process.exit(1);
        });
    };
    process.on("SIGTERM", onSignal);
    process.on("SIGINT", onSignal);
}

main().catch((err) => {
    logger.fatal({ err }, "Worker crashed");
    process.exit(1);
});
