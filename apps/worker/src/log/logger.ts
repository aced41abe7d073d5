import { pino } from "pino";
import type { StreamModeType } from "@fxgate/shared";
import { env } from "../config/env.js";

/** Fields every child logger may carry; `module` is always set. */
export type LogBindings = {
    module: string;
    stream?: string;
    mode?: StreamModeType;
    instrument?: string;
};

const prettyTransport = {
    target: "pino-pretty",
    options: {
        colorize: true,
        translateTime: "SYS:HH:MM:ss.l",
        ignore: "pid,hostname,service",
        messageFormat: "[{module}] {msg}",
    },
};

export const logger = pino({
    level: env.LOG_LEVEL,
    transport: env.NODE_ENV === "development" ? prettyTransport : undefined,
    base: {
        service: "stream-gate-worker",
        streamMode: env.STREAM_MODE,
    },
});

export function createChildLogger(bindings: LogBindings) {
    return logger.child(bindings);
}
