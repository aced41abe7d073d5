/**
 * HTTP chunked-transfer transport for newline-delimited JSON streams.
 *
 * One `open()` call is one long-lived GET request. Lines are yielded as they
 * complete; every failure leaves as a typed StreamError so the supervisor can
 * decide whether to reconnect. The idle read timeout relies on the broker's
 * periodic heartbeats: a silent body for `readTimeoutMs` is a StreamTimeout.
 */

import { request, errors, type Dispatcher } from "undici";
import { createChildLogger } from "../log/logger.js";
import { LineSplitter } from "./lineSplitter.js";
import {
    AuthError,
    RequestRejectedError,
    StreamError,
    StreamTimeout,
    TransientNetworkError,
    describeError,
} from "./errors.js";
import type { StreamEndpoint } from "./types.js";

const logger = createChildLogger({ module: "stream-transport" });

export interface StreamTransport {
    open(endpoint: StreamEndpoint, signal: AbortSignal): AsyncIterable<string>;
}

export type TransportFactory = () => StreamTransport;

export interface HttpStreamTransportConfig {
    /** Max silence on the body before giving up (ms). Default: 20000 */
    readTimeoutMs: number;

    /** Max wait for response headers (ms). Default: same as readTimeoutMs */
    headersTimeoutMs?: number;

    /** Custom undici dispatcher (tests use a MockAgent) */
    dispatcher?: Dispatcher;
}

export const DEFAULT_TRANSPORT_CONFIG: HttpStreamTransportConfig = {
    readTimeoutMs: 20_000,
};

export class HttpStreamTransport implements StreamTransport {
    private readonly config: HttpStreamTransportConfig;

    constructor(config: Partial<HttpStreamTransportConfig> = {}) {
        this.config = { ...DEFAULT_TRANSPORT_CONFIG, ...config };
    }

    async *open(endpoint: StreamEndpoint, signal: AbortSignal): AsyncGenerator<string> {
        let response: Dispatcher.ResponseData;
        try {
            response = await request(endpoint.url, {
                method: "GET",
                headers: { Accept: "application/json", ...endpoint.headers },
                signal,
                headersTimeout: this.config.headersTimeoutMs ?? this.config.readTimeoutMs,
                bodyTimeout: this.config.readTimeoutMs,
                dispatcher: this.config.dispatcher,
            });
        } catch (err) {
            throw toStreamError(err, signal);
        }

        const { statusCode, body } = response;
        if (statusCode !== 200) {
            const text = await readErrorBody(body);
            throw errorForStatus(statusCode, text);
        }

        logger.debug({ stream: endpoint.name }, "Stream response open");

        const splitter = new LineSplitter();
        try {
            for await (const chunk of body) {
                const bytes: Uint8Array = chunk;
                for (const line of splitter.push(bytes)) {
                    yield line;
                }
            }
        } catch (err) {
            throw toStreamError(err, signal);
        } finally {
            if (!body.destroyed) {
                body.destroy();
            }
        }

        const tail = splitter.flush();
        if (tail !== null) {
            yield tail;
        }
    }
}

/**
 * Map a non-200 status to its failure class.
 */
export function errorForStatus(statusCode: number, body: string): StreamError {
    if (statusCode === 401 || statusCode === 403) {
        return new AuthError(statusCode, body);
    }
    if (statusCode === 429 || statusCode >= 500) {
        return new TransientNetworkError(`Stream HTTP ${statusCode}: ${body}`, { statusCode });
    }
    if (statusCode >= 400) {
        return new RequestRejectedError(statusCode, body);
    }
    return new TransientNetworkError(`Unexpected stream status ${statusCode}`, { statusCode });
}

/**
 * Map a thrown request/body error to a StreamError.
 * Aborts rethrow the signal's reason untouched so the caller can tell a
 * shutdown or session timeout apart from a network failure.
 */
export function toStreamError(err: unknown, signal?: AbortSignal): unknown {
    if (signal?.aborted) {
        return signal.reason;
    }
    if (err instanceof StreamError) {
        return err;
    }
    if (err instanceof errors.HeadersTimeoutError) {
        return new StreamTimeout("headers", { cause: err });
    }
    if (err instanceof errors.BodyTimeoutError) {
        return new StreamTimeout("body", { cause: err });
    }
    if (err instanceof errors.ConnectTimeoutError) {
        return new StreamTimeout("connect", { cause: err });
    }
    return new TransientNetworkError(describeError(err), { cause: err });
}

async function readErrorBody(body: Dispatcher.ResponseData["body"]): Promise<string> {
    try {
        const text = await body.text();
        return text.slice(0, 200);
    } catch (err) {
        logger.debug({ err: describeError(err) }, "Could not read error body");
        return "";
    }
}
