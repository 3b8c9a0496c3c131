import {
    DEFAULT_RANDOMIZATION_CONFIG,
    SecureRandomSource,
} from "../../src/random/SecureRandomSource";
import { ScriptedEntropy } from "../helpers/fixtures";

describe("SecureRandomSource", () => {
    describe("cycle parameters", () => {
        it("should map entropy draws onto the configured ranges", () => {
            const entropy = new ScriptedEntropy().push(2, 500, 5, 3600, 1000);
            const source = new SecureRandomSource(DEFAULT_RANDOMIZATION_CONFIG, entropy);

            const params = source.generateCycleParameters(["BTC", "ETH", "SOL", "HYPE"]);

            expect(params.token).toBe("SOL");
            expect(params.equityUsage).toBeCloseTo(0.6, 10);
            expect(params.leverage).toBe(15);
            expect(params.holdDurationSeconds).toBe(4800);
            expect(params.cooldownSeconds).toBe(1600);
            expect(entropy.draws).toEqual([
                [0, 4],
                [0, 1001],
                [0, 11],
                [0, 6001],
                [0, 3001],
            ]);
        });

        it("should reach both ends of every range", () => {
            const low = new SecureRandomSource(DEFAULT_RANDOMIZATION_CONFIG, new ScriptedEntropy().push(0, 0, 0, 0, 0));
            const high = new SecureRandomSource(
                DEFAULT_RANDOMIZATION_CONFIG,
                new ScriptedEntropy().push(3, 1000, 10, 6000, 3000),
            );

            expect(low.generateCycleParameters(["BTC", "ETH", "SOL", "HYPE"])).toEqual({
                token: "BTC",
                equityUsage: 0.4,
                leverage: 10,
                holdDurationSeconds: 1200,
                cooldownSeconds: 600,
            });
            const top = high.generateCycleParameters(["BTC", "ETH", "SOL", "HYPE"]);
            expect(top.token).toBe("HYPE");
            expect(top.equityUsage).toBeCloseTo(0.8, 10);
            expect(top.leverage).toBe(20);
            expect(top.holdDurationSeconds).toBe(7200);
            expect(top.cooldownSeconds).toBe(3600);
        });

        it("should return frozen parameters", () => {
            const params = new SecureRandomSource().generateCycleParameters(["ETH"]);
            expect(Object.isFrozen(params)).toBe(true);
        });

        it("should reject an empty token list", () => {
            expect(() => new SecureRandomSource().selectToken([])).toThrow(
                "Cannot select from an empty token list",
            );
        });
    });

    describe("configuration", () => {
        it("should reject inverted ranges", () => {
            expect(
                () => new SecureRandomSource({ ...DEFAULT_RANDOMIZATION_CONFIG, minLeverage: 21 }),
            ).toThrow("Invalid leverage range: min 21 exceeds max 20");
        });

        it("should reject equity usage outside (0, 1]", () => {
            expect(
                () => new SecureRandomSource({ ...DEFAULT_RANDOMIZATION_CONFIG, maxEquityUsage: 1.5 }),
            ).toThrow("Equity usage must lie in (0, 1]");
        });

        it("should reject fractional integer bounds", () => {
            expect(
                () => new SecureRandomSource({ ...DEFAULT_RANDOMIZATION_CONFIG, minHoldSeconds: 1200.5 }),
            ).toThrow("Integer range bound expected, got 1200.5");
        });
    });

    describe("side assignment", () => {
        it("should flip a fair coin for unbiased assignment", () => {
            const source = new SecureRandomSource(DEFAULT_RANDOMIZATION_CONFIG, new ScriptedEntropy().push(0, 1));

            expect(source.assignSidesRandom()).toEqual({ sideA: "LONG", sideB: "SHORT" });
            expect(source.assignSidesRandom()).toEqual({ sideA: "SHORT", sideB: "LONG" });
        });

        it("should take the favorable short when the draw falls under the weight", () => {
            // LARGE gap, weight 0.75 -> threshold 750
            const source = new SecureRandomSource(DEFAULT_RANDOMIZATION_CONFIG, new ScriptedEntropy().push(749));

            const assignment = source.assignSidesWithBias(0.001, 0.0001);

            expect(assignment).toEqual({
                sideA: "SHORT",
                sideB: "LONG",
                biasStrength: "LARGE",
                favoredShort: "A",
                followedBias: true,
            });
        });

        it("should take the unfavorable assignment when the draw reaches the threshold", () => {
            const source = new SecureRandomSource(DEFAULT_RANDOMIZATION_CONFIG, new ScriptedEntropy().push(750));

            const assignment = source.assignSidesWithBias(0.001, 0.0001);

            expect(assignment.sideA).toBe("LONG");
            expect(assignment.sideB).toBe("SHORT");
            expect(assignment.followedBias).toBe(false);
        });

        it("should favor shorting venue B when its rate is higher", () => {
            // MODERATE gap, weight 0.6 -> threshold 600
            const source = new SecureRandomSource(DEFAULT_RANDOMIZATION_CONFIG, new ScriptedEntropy().push(0));

            const assignment = source.assignSidesWithBias(-0.0001, 0.0001);

            expect(assignment.biasStrength).toBe("MODERATE");
            expect(assignment.favoredShort).toBe("B");
            expect(assignment.sideB).toBe("SHORT");
        });

        it("should stay near 50/50 without bias", () => {
            const source = new SecureRandomSource();
            const draws = 4000;
            let venueALong = 0;
            for (let i = 0; i < draws; i++) {
                if (source.assignSidesRandom().sideA === "LONG") {
                    venueALong++;
                }
            }
            expect(Math.abs(venueALong / draws - 0.5)).toBeLessThan(0.05);
        });

        it("should short the higher-rate venue more than 60% of the time for a large gap", () => {
            const source = new SecureRandomSource();
            const draws = 4000;
            let venueAShort = 0;
            for (let i = 0; i < draws; i++) {
                if (source.assignSidesWithBias(0.001, 0.0001).sideA === "SHORT") {
                    venueAShort++;
                }
            }
            expect(venueAShort / draws).toBeGreaterThan(0.6);
        });
    });

    describe("identifiers", () => {
        it("should produce 32 hex character external ids", () => {
            const source = new SecureRandomSource();
            const first = source.generateExternalId();
            const second = source.generateExternalId();

            expect(first).toMatch(/^[0-9a-f]{32}$/);
            expect(second).not.toBe(first);
        });

        it("should read the nonce as an unsigned 64-bit integer", () => {
            const entropy = new ScriptedEntropy();
            jest.spyOn(entropy, "randomBytes").mockReturnValue(Buffer.from([0, 0, 0, 0, 0, 0, 1, 2]));
            const source = new SecureRandomSource(DEFAULT_RANDOMIZATION_CONFIG, entropy);

            expect(source.generateNonce()).toBe(258n);
        });
    });
});
