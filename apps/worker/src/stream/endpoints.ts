import { StreamMode, type StreamModeType } from "@fxgate/shared";
import type { StreamEndpoint } from "./types.js";

/**
 * Default streaming hosts per broker environment.
 */
export const STREAM_HOSTS: Record<StreamModeType, string> = {
    [StreamMode.PRACTICE]: "https://stream-fxpractice.oanda.com",
    [StreamMode.LIVE]: "https://stream-fxtrade.oanda.com",
};

export interface EndpointOptions {
    mode: StreamModeType;
    accountId: string;
    token: string;
    /** Overrides the per-mode host */
    baseUrl?: string;
}

function baseUrlFor(options: EndpointOptions): string {
    return (options.baseUrl ?? STREAM_HOSTS[options.mode]).replace(/\/+$/, "");
}

function authHeaders(token: string): Record<string, string> {
    return { Authorization: `Bearer ${token}` };
}

export function pricingEndpoint(options: EndpointOptions, instruments: string[]): StreamEndpoint {
    if (instruments.length === 0) {
        throw new Error("Pricing stream needs at least one instrument");
    }
    const account = encodeURIComponent(options.accountId);
    const query = new URLSearchParams({ instruments: instruments.join(",") });
    return {
        name: "pricing",
        url: `${baseUrlFor(options)}/v3/accounts/${account}/pricing/stream?${query.toString()}`,
        headers: authHeaders(options.token),
    };
}

export function transactionsEndpoint(options: EndpointOptions): StreamEndpoint {
    const account = encodeURIComponent(options.accountId);
    return {
        name: "transactions",
        url: `${baseUrlFor(options)}/v3/accounts/${account}/transactions/stream`,
        headers: authHeaders(options.token),
    };
}
