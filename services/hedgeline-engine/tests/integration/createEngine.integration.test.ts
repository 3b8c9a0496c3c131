import { ManualClock } from "@hedgeline/shared";

import { parseEngineConfig } from "../../src/config/EngineConfig";
import { createEngine, createSimulatedVenues, guardVenue } from "../../src/engine/createEngine";
import { silentLogger } from "../helpers/fixtures";

describe("createEngine", () => {
    const config = parseEngineConfig({
        tokens: ["BTC"],
        randomization: {
            minEquityUsage: 0.5,
            maxEquityUsage: 0.5,
            minLeverage: 10,
            maxLeverage: 10,
            minHoldSeconds: 1200,
            maxHoldSeconds: 1200,
            minCooldownSeconds: 600,
            maxCooldownSeconds: 600,
        },
        orchestrator: { installSignalHandlers: false, runSafetyLoop: false },
    });

    it("should build simulated venues from the configuration", async () => {
        const venues = createSimulatedVenues(parseEngineConfig({ simulation: { balanceUsd: 2500 } }), new ManualClock(0));

        expect(venues.A.name).toBe("sim-a");
        expect(venues.B.name).toBe("sim-b");
        expect(venues.A.getMarketSymbol("BTC")).toBe("BTC-USD");
        expect(venues.B.getMarketSymbol("BTC")).toBe("BTC");
        expect((await venues.B.getBalance()).available).toBe(2500);
    });

    it("should run a full cycle through guarded venues", async () => {
        const clock = new ManualClock(0);
        const logger = silentLogger();
        const simulated = createSimulatedVenues(config, clock);
        const venues = {
            A: guardVenue(simulated.A, config, logger, clock),
            B: guardVenue(simulated.B, config, logger, clock),
        };
        const engine = createEngine(config, venues, { logger, clock, exit: jest.fn() });

        await engine.start();
        const result = await engine.runCycle();
        await engine.stop();

        expect(result.success).toBe(true);
        expect(result.state).toBe("COOLDOWN");
        expect(result.positionSize).toBe(0.95);
        expect(result.positionValue).toBe(47500);
        expect(clock.totalSlept()).toBe(1_200_000);
        expect(await simulated.A.getPositions()).toEqual([]);
        expect(simulated.A.isConnected()).toBe(false);
    });
});
