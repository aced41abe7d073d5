/**
 * Stream message model and payload schemas.
 *
 * Payloads arrive as newline-delimited JSON on a chunked HTTP body.
 * Every message keeps the parsed payload in `raw` so fields we do not
 * model are still available to consumers.
 */

import { z } from "zod";

export const MessageKind = {
    PRICE: "PRICE",
    TRANSACTION: "TRANSACTION",
    HEARTBEAT: "HEARTBEAT",
    UNKNOWN: "UNKNOWN",
} as const;

export type MessageKindType = (typeof MessageKind)[keyof typeof MessageKind];

/**
 * One price level. Prices are decimal strings on the wire.
 */
export const PriceBucketSchema = z
    .object({
        price: z.string(),
        liquidity: z.union([z.number(), z.string()]),
    })
    .passthrough();

export type PriceBucket = z.infer<typeof PriceBucketSchema>;

export const PricePayloadSchema = z
    .object({
        type: z.literal("PRICE"),
        instrument: z.string().min(1),
        time: z.string().min(1),
        bids: z.array(PriceBucketSchema),
        asks: z.array(PriceBucketSchema),
        tradeable: z.boolean().optional(),
        closeoutBid: z.string().optional(),
        closeoutAsk: z.string().optional(),
    })
    .passthrough();

export const HeartbeatPayloadSchema = z
    .object({
        type: z.literal("HEARTBEAT"),
        time: z.string().optional(),
        lastTransactionID: z.string().optional(),
    })
    .passthrough();

export const TransactionPayloadSchema = z
    .object({
        id: z.union([z.string().min(1), z.number()]).transform((v) => String(v)),
        type: z.string(),
        accountID: z.string().optional(),
        time: z.string().optional(),
        batchID: z.string().optional(),
    })
    .passthrough();

interface MessageBase {
    /** Parsed payload, untouched */
    raw: unknown;
    /** Local wall-clock time the line was read (epoch ms) */
    receivedAt: number;
}

export interface PriceMessage extends MessageBase {
    kind: typeof MessageKind.PRICE;
    instrument: string;
    time: string;
    bids: PriceBucket[];
    asks: PriceBucket[];
    tradeable: boolean | null;
    closeoutBid: string | null;
    closeoutAsk: string | null;
}

export interface TransactionMessage extends MessageBase {
    kind: typeof MessageKind.TRANSACTION;
    transactionId: string;
    transactionType: string;
    accountId: string | null;
    time: string | null;
    batchId: string | null;
}

export interface HeartbeatMessage extends MessageBase {
    kind: typeof MessageKind.HEARTBEAT;
    time: string | null;
    lastTransactionId: string | null;
}

export interface UnknownMessage extends MessageBase {
    kind: typeof MessageKind.UNKNOWN;
    /** The payload's `type` field when it was a string */
    type: string | null;
}

export type StreamMessage = PriceMessage | TransactionMessage | HeartbeatMessage | UnknownMessage;

/**
 * Where a transport connects.
 */
export interface StreamEndpoint {
    /** Short label used in logs and lifecycle events (e.g. "pricing") */
    name: string;
    url: string;
    headers: Record<string, string>;
}
