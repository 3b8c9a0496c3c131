import { ManualClock, RateLimiter } from "@hedgeline/shared";

import { GuardedVenueGateway } from "../../src/exchanges/GuardedVenueGateway";
import { SimulatedVenueGateway } from "../../src/exchanges/SimulatedVenueGateway";
import { VenueError } from "../../src/exchanges/VenueError";
import type { PositionInfo } from "../../src/types/venues";
import { silentLogger } from "../helpers/fixtures";

class StalledVenue extends SimulatedVenueGateway {
    override getPositions(): Promise<PositionInfo[]> {
        return new Promise<PositionInfo[]>(() => undefined);
    }
}

describe("GuardedVenueGateway", () => {
    let clock: ManualClock;
    let inner: SimulatedVenueGateway;
    let guarded: GuardedVenueGateway;

    const guard = (venue: SimulatedVenueGateway, limiter = new RateLimiter({}, clock), apiTimeoutMs = 1000) =>
        new GuardedVenueGateway(
            venue,
            limiter,
            { apiTimeoutMs, retry: { maxRetries: 2, initialDelayMs: 1000, maxDelayMs: 10000, clock } },
            silentLogger(),
        );

    beforeEach(() => {
        clock = new ManualClock(0);
        inner = new SimulatedVenueGateway({ name: "venue-a" }, clock);
        guarded = guard(inner);
    });

    it("should keep the inner venue's name and symbols", () => {
        expect(guarded.name).toBe("venue-a");
        expect(guarded.getMarketSymbol("ETH")).toBe("ETH-USD");
    });

    it("should retry transient read failures with backoff", async () => {
        inner.failNext("getBalance", VenueError.transient("venue-a", "503 Service Unavailable"), 2);

        const balance = await guarded.getBalance();

        expect(balance.available).toBe(10000);
        expect(inner.callCount("getBalance")).toBe(3);
        expect(clock.getSleeps()).toEqual([1000, 2000]);
    });

    it("should give up after the last retry", async () => {
        inner.failNext("getPositions", VenueError.transient("venue-a", "502 Bad Gateway"), 3);

        await expect(guarded.getPositions()).rejects.toThrow("502 Bad Gateway");
        expect(inner.callCount("getPositions")).toBe(3);
    });

    it("should not retry a rejected read", async () => {
        inner.failNext("getMarketInfo", VenueError.rejected("venue-a", "Unknown market", "UNKNOWN_MARKET"));

        await expect(guarded.getMarketInfo("BTC-USD")).rejects.toThrow("Unknown market");
        expect(inner.callCount("getMarketInfo")).toBe(1);
    });

    it("should send writes exactly once", async () => {
        inner.failNext("placeOrder", VenueError.transient("venue-a", "504 Gateway Timeout"));

        await expect(
            guarded.placeOrder({
                symbol: "BTC-USD",
                side: "LONG",
                quantity: 0.1,
                type: "MARKET",
                externalId: "order-1",
            }),
        ).rejects.toThrow("504 Gateway Timeout");
        expect(inner.callCount("placeOrder")).toBe(1);
        expect(clock.getSleeps()).toEqual([]);
    });

    it("should pass every call through the rate limiter", async () => {
        const limited = guard(inner, new RateLimiter({ requestsPerMinute: 60, burst: 1 }, clock));

        await limited.getBalance();
        await limited.cancelAllOrders("BTC-USD");

        expect(clock.getSleeps()).toEqual([1000]);
    });

    it("should bound each read attempt with a deadline", async () => {
        const stalled = new StalledVenue({ name: "venue-a" }, clock);
        const slow = new GuardedVenueGateway(
            stalled,
            new RateLimiter({}, clock),
            { apiTimeoutMs: 20, retry: { maxRetries: 0, clock } },
            silentLogger(),
        );

        await expect(slow.getPositions()).rejects.toThrow("venue-a getPositions timed out");
    });
});
