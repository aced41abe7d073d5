import { describe, it, expect } from "vitest";
import { pricingEndpoint, transactionsEndpoint } from "./endpoints.js";

describe("stream endpoints", () => {
    it("builds the pricing URL on the practice host", () => {
        const endpoint = pricingEndpoint({ mode: "practice", accountId: "101-001-1", token: "test-token" }, [
            "EUR_USD",
            "USD_CAD",
        ]);

        expect(endpoint).toEqual({
            name: "pricing",
            url: "https://stream-fxpractice.oanda.com/v3/accounts/101-001-1/pricing/stream?instruments=EUR_USD%2CUSD_CAD",
            headers: { Authorization: "Bearer test-token" },
        });
    });

    it("uses the base URL override without a trailing slash", () => {
        const endpoint = transactionsEndpoint({
            mode: "live",
            accountId: "acct-1",
            token: "test-token",
            baseUrl: "http://localhost:9000/",
        });

        expect(endpoint.url).toBe("http://localhost:9000/v3/accounts/acct-1/transactions/stream");
        expect(endpoint.name).toBe("transactions");
    });

    it("rejects an empty instrument list", () => {
        expect(() => pricingEndpoint({ mode: "live", accountId: "a", token: "t" }, [])).toThrow(
            "at least one instrument"
        );
    });
});
