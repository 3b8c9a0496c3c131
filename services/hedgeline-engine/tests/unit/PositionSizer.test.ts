import {
    DEFAULT_SIZER_CONFIG,
    PositionSizer,
    roundDown,
    stepDecimals,
} from "../../src/sizing/PositionSizer";
import { balance, sizing } from "../helpers/fixtures";

describe("PositionSizer", () => {
    const sizer = new PositionSizer();

    describe("calculateSize", () => {
        it("should size off the smaller available balance", () => {
            const result = sizer.calculateSize("BTC", 50000, balance(10000), balance(5000), 0.5, 10, 0.001);

            expect(result.positionSize).toBe(0.475);
            expect(result.positionValueUsd).toBeCloseTo(23750, 6);
            expect(result.marginRequiredPerLeg).toBeCloseTo(2375, 6);
            expect(result.totalMarginRequired).toBeCloseTo(4750, 6);
            expect(result.effectiveLeverage).toBe(10);
            expect(result.fitsConstraints).toBe(true);
            expect(result.constraintNotes).toEqual([]);
        });

        it("should keep the safety buffer exact at the precision", () => {
            const result = sizer.calculateSize("BTC", 50000, balance(10000), balance(10000), 0.5, 10, 0.001, 3);

            expect(result.positionSize).toBe(0.95);
            expect(result.positionValueUsd).toBe(47500);
            expect(result.marginRequiredPerLeg).toBe(4750);
        });

        it("should reject when either venue has no available balance", () => {
            const result = sizer.calculateSize("BTC", 50000, balance(0), balance(10000), 0.5, 10);

            expect(result.fitsConstraints).toBe(false);
            expect(result.positionSize).toBe(0);
            expect(result.marginRequiredPerLeg).toBe(0);
            expect(result.effectiveLeverage).toBe(0);
            expect(result.constraintNotes).toEqual([
                "Insufficient available balance on one or both exchanges",
            ]);
        });

        it("should reject a non-positive price", () => {
            const result = sizer.calculateSize("BTC", 0, balance(10000), balance(10000), 0.5, 10);

            expect(result.fitsConstraints).toBe(false);
            expect(result.constraintNotes).toEqual(["Invalid token price"]);
        });

        it("should cap the position value at the configured maximum", () => {
            const result = sizer.calculateSize("BTC", 50000, balance(100000), balance(100000), 0.8, 20, 0.001);

            expect(result.positionSize).toBe(1.9);
            expect(result.constraintNotes).toEqual([
                "Position value capped from $1600000.00 to $100000.00",
            ]);
            expect(result.fitsConstraints).toBe(true);
        });

        it("should reject a size below the venue minimum", () => {
            const result = sizer.calculateSize("BTC", 50000, balance(10), balance(10), 0.4, 10, 0.001, 3);

            expect(result.fitsConstraints).toBe(false);
            expect(result.positionSize).toBe(0);
            expect(result.constraintNotes).toEqual(["Position size 0 below minimum 0.001"]);
        });
    });

    describe("calculateForTargetSize", () => {
        it("should pick the smallest integer leverage reaching the target", () => {
            const { sizing: result, requiredLeverage } = sizer.calculateForTargetSize(
                "BTC",
                50000,
                1,
                balance(10000),
                balance(10000),
            );

            expect(requiredLeverage).toBe(6);
            expect(result.leverage).toBe(6);
            expect(result.positionSize).toBeCloseTo(0.95, 5);
        });

        it("should stop at the leverage cap", () => {
            const { requiredLeverage, sizing: result } = sizer.calculateForTargetSize(
                "BTC",
                50000,
                10,
                balance(10000),
                balance(10000),
                20,
            );

            expect(requiredLeverage).toBe(20);
            expect(result.leverage).toBe(20);
        });
    });

    describe("validateSizing", () => {
        it("should accept a sizing both venues still cover", () => {
            expect(sizer.validateSizing(sizing(), balance(10000), balance(10000))).toEqual({
                valid: true,
                issues: [],
            });
        });

        it("should report the per-venue deficit", () => {
            const validation = sizer.validateSizing(sizing(), balance(1000), balance(10000));

            expect(validation.valid).toBe(false);
            expect(validation.issues).toEqual([
                "Venue A: need $4750.00, have $1000.00 (deficit: $3750.00)",
            ]);
        });

        it("should flag a combined shortfall", () => {
            const validation = sizer.validateSizing(sizing(), balance(1000), balance(1000));

            expect(validation.issues).toContain(
                "Total margin $9500.00 exceeds combined available $2000.00",
            );
            expect(validation.issues).toHaveLength(3);
        });
    });

    it("should expose its configuration", () => {
        expect(sizer.getConfig()).toEqual(DEFAULT_SIZER_CONFIG);
    });
});

describe("roundDown", () => {
    it("should truncate toward zero without binary drift", () => {
        expect(roundDown(0.95, 6)).toBe(0.95);
        expect(roundDown(1.23456789, 3)).toBe(1.234);
        expect(roundDown(5.9, 0)).toBe(5);
        expect(roundDown(2, 3)).toBe(2);
    });

    it("should handle exponent notation", () => {
        expect(roundDown(1e-7, 6)).toBe(0);
        expect(roundDown(2.5e-5, 6)).toBe(0.000025);
    });
});

describe("stepDecimals", () => {
    it("should derive decimal places from a size step", () => {
        expect(stepDecimals(0.001)).toBe(3);
        expect(stepDecimals(0.5)).toBe(1);
        expect(stepDecimals(1)).toBe(0);
        expect(stepDecimals(10)).toBe(0);
    });

    it("should be unbounded for a missing step", () => {
        expect(stepDecimals(0)).toBe(Number.POSITIVE_INFINITY);
        expect(stepDecimals(Number.NaN)).toBe(Number.POSITIVE_INFINITY);
    });
});
