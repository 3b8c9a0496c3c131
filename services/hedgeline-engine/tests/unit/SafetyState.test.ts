import { SafetyState } from "../../src/safety/SafetyState";

describe("SafetyState", () => {
    it("should reach the ceiling on the third consecutive failure", () => {
        const state = new SafetyState(3);

        expect(state.recordFailure()).toBe(false);
        expect(state.recordFailure()).toBe(false);
        expect(state.emergencyTriggered).toBe(false);
        expect(state.recordFailure()).toBe(true);
        expect(state.emergencyTriggered).toBe(true);
        expect(state.failureCount).toBe(3);
    });

    it("should reset the counter on success", () => {
        const state = new SafetyState(3);
        state.recordFailure();
        state.recordFailure();
        state.recordSuccess();

        expect(state.recordFailure()).toBe(false);
        expect(state.failureCount).toBe(1);
    });

    it("should keep the emergency flag once set", () => {
        const state = new SafetyState();
        state.triggerEmergency();
        state.recordSuccess();

        expect(state.emergencyTriggered).toBe(true);
    });

    it("should reject a non-positive ceiling", () => {
        expect(() => new SafetyState(0)).toThrow("maxConsecutiveFailures must be a positive integer");
        expect(() => new SafetyState(1.5)).toThrow("maxConsecutiveFailures must be a positive integer");
    });

    it("should track monitored tokens", () => {
        const state = new SafetyState();
        state.addMonitoredToken("BTC");
        state.addMonitoredToken("ETH");
        state.addMonitoredToken("BTC");
        state.removeMonitoredToken("ETH");

        expect(state.monitoredTokens()).toEqual(["BTC"]);
    });

    it("should count nested atomic actions per token", () => {
        const state = new SafetyState();
        state.beginAtomicAction("BTC");
        state.beginAtomicAction("BTC");
        state.endAtomicAction("BTC");

        expect(state.isAtomicActionInFlight("BTC")).toBe(true);
        state.endAtomicAction("BTC");
        expect(state.isAtomicActionInFlight("BTC")).toBe(false);
        expect(state.isAtomicActionInFlight("ETH")).toBe(false);
    });
});
