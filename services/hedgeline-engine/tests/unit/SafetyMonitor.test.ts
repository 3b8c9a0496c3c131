import { ManualClock } from "@hedgeline/shared";

import { SimulatedVenueGateway } from "../../src/exchanges/SimulatedVenueGateway";
import { DEFAULT_SAFETY_CONFIG, SafetyMonitor, SignalSource } from "../../src/safety/SafetyMonitor";
import type { EmergencyAction } from "../../src/types/safety";
import { makeVenues, silentLogger } from "../helpers/fixtures";

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

class FakeSignals implements SignalSource {
    private readonly listeners = new Map<NodeJS.Signals, Array<() => void>>();

    on(signal: NodeJS.Signals, listener: () => void): void {
        this.listeners.set(signal, [...this.listenerList(signal), listener]);
    }

    off(signal: NodeJS.Signals, listener: () => void): void {
        this.listeners.set(
            signal,
            this.listenerList(signal).filter((existing) => existing !== listener),
        );
    }

    emit(signal: NodeJS.Signals): void {
        this.listenerList(signal).forEach((listener) => listener());
    }

    listenerCount(signal: NodeJS.Signals): number {
        return this.listenerList(signal).length;
    }

    private listenerList(signal: NodeJS.Signals): Array<() => void> {
        return this.listeners.get(signal) ?? [];
    }
}

describe("SafetyMonitor", () => {
    let clock: ManualClock;
    let A: SimulatedVenueGateway;
    let B: SimulatedVenueGateway;
    let exit: jest.Mock<void, [number]>;
    let monitor: SafetyMonitor;

    beforeEach(() => {
        clock = new ManualClock(0);
        ({ A, B } = makeVenues(clock));
        exit = jest.fn<void, [number]>();
        monitor = new SafetyMonitor({ A, B }, DEFAULT_SAFETY_CONFIG, silentLogger(), clock, exit);
    });

    describe("failure counting", () => {
        it("should trigger an emergency after three consecutive failures", () => {
            expect(monitor.recordFailure()).toBe(false);
            expect(monitor.recordFailure()).toBe(false);
            expect(monitor.recordFailure()).toBe(true);
            expect(monitor.emergencyTriggered).toBe(true);
            expect(monitor.consecutiveFailures).toBe(3);
        });

        it("should reset after a success", () => {
            monitor.recordFailure();
            monitor.recordFailure();
            monitor.recordSuccess();

            expect(monitor.recordFailure()).toBe(false);
            expect(monitor.consecutiveFailures).toBe(1);
        });
    });

    describe("checkExposure", () => {
        beforeEach(() => {
            monitor.addMonitoredToken("BTC");
        });

        it("should accept opposite legs of equal size", async () => {
            A.injectPosition("BTC", "LONG", 1);
            B.injectPosition("BTC", "SHORT", 1);

            expect(await monitor.checkExposure()).toEqual({
                balanced: true,
                issues: [],
                warnings: [],
                checkedTokens: ["BTC"],
            });
        });

        it("should flag a leg open on one venue only", async () => {
            A.injectPosition("BTC", "LONG", 1);

            const report = await monitor.checkExposure();

            expect(report.balanced).toBe(false);
            expect(report.issues).toEqual(["BTC: unhedged exposure (A=true, B=false)"]);
        });

        it("should flag both legs on the same side", async () => {
            A.injectPosition("BTC", "LONG", 1);
            B.injectPosition("BTC", "LONG", 1);

            const report = await monitor.checkExposure();

            expect(report.issues).toEqual(["BTC: same-side exposure (LONG)"]);
        });

        it("should warn about a size imbalance above tolerance", async () => {
            A.injectPosition("BTC", "LONG", 1);
            B.injectPosition("BTC", "SHORT", 0.9);

            const report = await monitor.checkExposure();

            expect(report.balanced).toBe(true);
            expect(report.warnings).toEqual(["BTC: size imbalance 1 vs 0.9"]);
        });

        it("should skip tokens with an atomic action in flight", async () => {
            A.injectPosition("BTC", "LONG", 1);
            monitor.beginAtomicAction("BTC");

            const report = await monitor.checkExposure();

            expect(report.balanced).toBe(true);
            expect(report.checkedTokens).toEqual([]);
        });

        it("should report a failed position fetch as unbalanced", async () => {
            B.failNext("getPositions", new Error("read timeout"));

            const report = await monitor.checkExposure();

            expect(report.balanced).toBe(false);
            expect(report.issues).toEqual(["Exposure check failed: read timeout"]);
        });
    });

    describe("executeEmergency", () => {
        it("should cancel orders and close every position on both venues", async () => {
            A.addOpenOrder({
                symbol: "BTC-USD",
                side: "LONG",
                type: "LIMIT",
                quantity: 1,
                price: 49000,
                filledQuantity: 0,
                status: "NEW",
                reduceOnly: false,
            });
            A.injectPosition("BTC", "LONG", 1);
            B.injectPosition("BTC", "SHORT", 1);
            const callback = jest.fn<void, [EmergencyAction]>();
            monitor.setEmergencyCallback(callback);

            const action = await monitor.executeEmergency("MANUAL_TRIGGER");

            expect(action.reason).toBe("MANUAL_TRIGGER");
            expect(action.success).toBe(true);
            expect(action.ordersCancelled).toBe(1);
            expect(action.positionsClosed).toEqual([
                { venue: "venue-a", symbol: "BTC-USD", side: "LONG", size: 1, success: true },
                { venue: "venue-b", symbol: "BTC", side: "SHORT", size: 1, success: true },
            ]);
            expect(action.details).toBe("venue-a: cancelled 1 orders; venue-b: cancelled 0 orders");
            expect(callback).toHaveBeenCalledWith(action);
            expect(monitor.emergencyTriggered).toBe(true);
            expect(await monitor.verifyAllClosed()).toBe(true);
        });

        it("should share one sweep between concurrent callers", async () => {
            const first = monitor.executeEmergency("UNHEDGED_EXPOSURE");
            const second = monitor.executeEmergency("CONNECTION_LOST");

            expect(second).toBe(first);
            expect((await second).reason).toBe("UNHEDGED_EXPOSURE");
            expect(A.callCount("cancelAllOrders")).toBe(1);
        });

        it("should keep sweeping past a failing venue", async () => {
            A.failNext("cancelAllOrders", new Error("venue down"));
            A.injectPosition("BTC", "LONG", 1);
            A.scriptCloseOutcome({ type: "reject", message: "Reduce-only rejected" });
            B.injectPosition("BTC", "SHORT", 1);

            const action = await monitor.executeEmergency("SYSTEM_ERROR");

            expect(action.success).toBe(false);
            expect(action.details).toBe("venue-a order cancel failed: venue down; venue-b: cancelled 0 orders");
            expect(action.positionsClosed).toEqual([
                {
                    venue: "venue-a",
                    symbol: "BTC-USD",
                    side: "LONG",
                    size: 1,
                    success: false,
                    error: "Reduce-only rejected",
                },
                { venue: "venue-b", symbol: "BTC", side: "SHORT", size: 1, success: true },
            ]);
            expect(await monitor.verifyAllClosed()).toBe(false);
        });

        it("should contain a throwing emergency callback", async () => {
            monitor.setEmergencyCallback(() => {
                throw new Error("listener failed");
            });

            await expect(monitor.executeEmergency("MANUAL_TRIGGER")).resolves.toMatchObject({ success: true });
        });
    });

    describe("signal handling", () => {
        it("should request shutdown on the first signal", () => {
            const source = new FakeSignals();
            monitor.installSignalHandlers(source);

            source.emit("SIGINT");

            expect(monitor.shutdownRequested).toBe(true);
            expect(exit).not.toHaveBeenCalled();
        });

        it("should exit when a signal arrives during an emergency", async () => {
            const source = new FakeSignals();
            monitor.installSignalHandlers(source);
            await monitor.executeEmergency("MANUAL_TRIGGER");

            source.emit("SIGTERM");

            expect(exit).toHaveBeenCalledWith(1);
        });

        it("should remove its handlers", () => {
            const source = new FakeSignals();
            monitor.installSignalHandlers(source);
            expect(source.listenerCount("SIGINT")).toBe(1);

            monitor.removeSignalHandlers();

            expect(source.listenerCount("SIGINT")).toBe(0);
            expect(source.listenerCount("SIGTERM")).toBe(0);
        });
    });

    describe("runSafetyLoop", () => {
        it("should trigger an emergency when a venue loses its connection", async () => {
            await A.connect();
            const callback = jest.fn<void, [EmergencyAction]>();
            monitor.setEmergencyCallback(callback);

            await monitor.runSafetyLoop();

            expect(monitor.emergencyTriggered).toBe(true);
            expect(callback.mock.calls[0][0].reason).toBe("CONNECTION_LOST");
            expect(monitor.isSafetyLoopRunning()).toBe(false);
        });

        it("should flatten unhedged exposure it finds", async () => {
            await A.connect();
            await B.connect();
            monitor.addMonitoredToken("BTC");
            A.injectPosition("BTC", "LONG", 1);

            await monitor.runSafetyLoop();

            expect(monitor.emergencyTriggered).toBe(true);
            expect(await A.getPositions()).toEqual([]);
        });

        it("should poll at the check interval until stopped", async () => {
            await A.connect();
            await B.connect();

            const loop = monitor.runSafetyLoop();
            await flush();
            await flush();
            expect(monitor.isSafetyLoopRunning()).toBe(true);

            monitor.stopSafetyLoop();
            await loop;

            expect(monitor.isSafetyLoopRunning()).toBe(false);
            expect(monitor.emergencyTriggered).toBe(false);
            expect(clock.getSleeps().length).toBeGreaterThan(0);
            expect(clock.getSleeps().every((ms) => ms === 5000)).toBe(true);
        });

        it("should detect a connection dropped while running", async () => {
            await A.connect();
            await B.connect();

            const loop = monitor.runSafetyLoop();
            await flush();
            B.dropConnection();
            await loop;

            expect(monitor.emergencyTriggered).toBe(true);
        });
    });
});
