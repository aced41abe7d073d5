/**
 * Stream ingestion: transport, classification, reconnect supervision.
 */

export * from "./types.js";
export * from "./errors.js";
export { MessageClassifier, TRANSACTION_TYPES, type ClassifyResult } from "./classifier.js";
export { LineSplitter } from "./lineSplitter.js";
export {
    HttpStreamTransport,
    errorForStatus,
    toStreamError,
    type StreamTransport,
    type TransportFactory,
    type HttpStreamTransportConfig,
} from "./transport.js";
export { computeBackoffDelay, type BackoffDelay } from "./backoff.js";
export * from "./observer.js";
export { ReconnectSupervisor, type ReconnectSupervisorOptions, type SleepFn } from "./supervisor.js";
export { StreamStatus, type StreamStatusView, type StreamConnectionState } from "./status.js";
export { pricingEndpoint, transactionsEndpoint, STREAM_HOSTS, type EndpointOptions } from "./endpoints.js";
