/**
 * Turns raw stream lines into typed messages.
 *
 * Classification looks only at the payload's own discriminants:
 * - type "PRICE" with instrument/time/bids/asks -> PRICE
 * - type "HEARTBEAT" -> HEARTBEAT
 * - an id plus a type from the transaction vocabulary -> TRANSACTION
 * - anything else that parses -> UNKNOWN (raw kept verbatim)
 *
 * Lines that are not JSON are counted and dropped; classify() never throws.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import {
    HeartbeatPayloadSchema,
    MessageKind,
    PricePayloadSchema,
    TransactionPayloadSchema,
    type StreamMessage,
    type UnknownMessage,
} from "./types.js";

function loadTransactionTypes(): ReadonlySet<string> {
    const file = new URL("./transaction-types.json", import.meta.url);
    const parsed = z.array(z.string()).parse(JSON.parse(readFileSync(file, "utf8")));
    return new Set(parsed);
}

export const TRANSACTION_TYPES: ReadonlySet<string> = loadTransactionTypes();

export type ClassifyResult =
    | { status: "message"; message: StreamMessage }
    | { status: "malformed"; error: string }
    | { status: "empty" };

export class MessageClassifier {
    private malformedLines = 0;
    private classified = 0;
    private readonly transactionTypes: ReadonlySet<string>;

    constructor(transactionTypes: ReadonlySet<string> = TRANSACTION_TYPES) {
        this.transactionTypes = transactionTypes;
    }

    /** Lines dropped because they were not valid JSON. */
    get errorCount(): number {
        return this.malformedLines;
    }

    get messageCount(): number {
        return this.classified;
    }

    classify(line: string, receivedAt: number): ClassifyResult {
        const trimmed = line.trim();
        if (trimmed.length === 0) {
            return { status: "empty" };
        }

        let payload: unknown;
        try {
            payload = JSON.parse(trimmed);
        } catch (err) {
            this.malformedLines++;
            return { status: "malformed", error: err instanceof Error ? err.message : String(err) };
        }

        this.classified++;
        return { status: "message", message: this.toMessage(payload, receivedAt) };
    }

    private toMessage(payload: unknown, receivedAt: number): StreamMessage {
        if (!isRecord(payload)) {
            return unknownMessage(payload, receivedAt);
        }

        const type = payload.type;

        if (type === "PRICE") {
            const price = PricePayloadSchema.safeParse(payload);
            if (!price.success) {
                // Parseable but incomplete; keep it as UNKNOWN
                return unknownMessage(payload, receivedAt);
            }
            return {
                kind: MessageKind.PRICE,
                raw: payload,
                receivedAt,
                instrument: price.data.instrument,
                time: price.data.time,
                bids: price.data.bids,
                asks: price.data.asks,
                tradeable: price.data.tradeable ?? null,
                closeoutBid: price.data.closeoutBid ?? null,
                closeoutAsk: price.data.closeoutAsk ?? null,
            };
        }

        if (type === "HEARTBEAT") {
            const heartbeat = HeartbeatPayloadSchema.safeParse(payload);
            return {
                kind: MessageKind.HEARTBEAT,
                raw: payload,
                receivedAt,
                time: heartbeat.success ? heartbeat.data.time ?? null : null,
                lastTransactionId: heartbeat.success ? heartbeat.data.lastTransactionID ?? null : null,
            };
        }

        if (typeof type === "string" && this.transactionTypes.has(type)) {
            const transaction = TransactionPayloadSchema.safeParse(payload);
            if (transaction.success) {
                return {
                    kind: MessageKind.TRANSACTION,
                    raw: payload,
                    receivedAt,
                    transactionId: transaction.data.id,
                    transactionType: transaction.data.type,
                    accountId: transaction.data.accountID ?? null,
                    time: transaction.data.time ?? null,
                    batchId: transaction.data.batchID ?? null,
                };
            }
        }

        return unknownMessage(payload, receivedAt);
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function unknownMessage(payload: unknown, receivedAt: number): UnknownMessage {
    const type = isRecord(payload) && typeof payload.type === "string" ? payload.type : null;
    return { kind: MessageKind.UNKNOWN, raw: payload, receivedAt, type };
}
