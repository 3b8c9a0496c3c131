import { RiskValidator } from "../../src/risk/RiskValidator";
import { compareRiskLevels, maxRiskLevel } from "../../src/types/risk";
import { balance, sizing } from "../helpers/fixtures";

describe("RiskValidator", () => {
    const validator = new RiskValidator();

    describe("validatePreTrade", () => {
        it("should pass a comfortably funded cycle at LOW risk", () => {
            const assessment = validator.validatePreTrade(sizing(), balance(10000), balance(10000), 50000);

            expect(assessment.checks.map((check) => check.checkName)).toEqual([
                "minimum_balance",
                "position_limits",
                "margin_sufficiency",
                "liquidation_risk",
                "leverage",
            ]);
            expect(assessment.overallPassed).toBe(true);
            expect(assessment.overallRiskLevel).toBe("LOW");
            expect(assessment.canProceed).toBe(true);
            expect(assessment.blockingIssues).toEqual([]);
            expect(assessment.warnings).toEqual([]);
        });

        it("should block a balance below the minimum as CRITICAL", () => {
            const assessment = validator.validatePreTrade(sizing(), balance(50), balance(10000), 50000);

            expect(assessment.overallRiskLevel).toBe("CRITICAL");
            expect(assessment.canProceed).toBe(false);
            expect(assessment.blockingIssues[0]).toBe(
                "minimum_balance: Available balance $50.00 below minimum $100.00",
            );
        });

        it("should surface passing MEDIUM checks as warnings", () => {
            const assessment = validator.validatePreTrade(
                sizing({ leverage: 16, marginRequiredPerLeg: 100 }),
                balance(10000),
                balance(10000),
                50000,
            );

            expect(assessment.canProceed).toBe(true);
            expect(assessment.overallRiskLevel).toBe("MEDIUM");
            expect(assessment.warnings).toEqual(["leverage: Leverage 16x within acceptable range"]);
        });
    });

    describe("checkMinimumBalance", () => {
        it("should mark a balance under twice the minimum as MEDIUM", () => {
            const check = validator.checkMinimumBalance(balance(150), balance(10000));

            expect(check.passed).toBe(true);
            expect(check.riskLevel).toBe("MEDIUM");
            expect(check.message).toBe("Balance $150.00 is low but acceptable");
        });
    });

    describe("checkPositionLimits", () => {
        it("should fail an oversized position as HIGH", () => {
            const check = validator.checkPositionLimits(sizing({ positionValueUsd: 150000 }));

            expect(check.passed).toBe(false);
            expect(check.riskLevel).toBe("HIGH");
            expect(check.message).toBe("Position value $150000.00 exceeds max $100000.00");
        });

        it("should fail a zero size as CRITICAL", () => {
            const check = validator.checkPositionLimits(sizing({ positionSize: 0 }));

            expect(check.riskLevel).toBe("CRITICAL");
            expect(check.details).toEqual({ positionSize: 0 });
        });
    });

    describe("checkMarginSufficiency", () => {
        it("should require the margin buffer on both venues", () => {
            const check = validator.checkMarginSufficiency(sizing(), balance(5000), balance(5000));

            expect(check.passed).toBe(false);
            expect(check.riskLevel).toBe("HIGH");
            expect(check.message).toBe(
                "Insufficient margin with buffer: Venue A: $5000.00 < $5700.00; Venue B: $5000.00 < $5700.00",
            );
        });

        it("should report utilization when covered", () => {
            const check = validator.checkMarginSufficiency(sizing(), balance(10000), balance(10000));

            expect(check.message).toBe("Margin check passed (max utilization: 47.5%)");
            expect(check.details).toEqual({ utilizationA: 0.475, utilizationB: 0.475 });
        });
    });

    describe("checkLiquidationRisk", () => {
        it("should fail when liquidation sits too close", () => {
            const check = validator.checkLiquidationRisk(sizing(), 50000, 0.08, 0.08);

            expect(check.passed).toBe(false);
            expect(check.riskLevel).toBe("HIGH");
        });

        it("should warn between the hard and soft distances", () => {
            const check = validator.checkLiquidationRisk(sizing({ leverage: 20 }), 50000, 0.005, 0.005);

            expect(check.passed).toBe(true);
            expect(check.riskLevel).toBe("MEDIUM");
        });

        it("should reject an invalid price", () => {
            const check = validator.checkLiquidationRisk(sizing(), 0, 0.005, 0.005);

            expect(check.riskLevel).toBe("CRITICAL");
            expect(check.message).toBe("Invalid leverage or price for liquidation calculation");
        });
    });

    describe("checkLeverage", () => {
        it("should fail leverage above the maximum", () => {
            const check = validator.checkLeverage(sizing({ leverage: 25 }));

            expect(check.passed).toBe(false);
            expect(check.message).toBe("Leverage 25x exceeds maximum 20x");
        });

        it("should accept leverage below the target range", () => {
            const check = validator.checkLeverage(sizing({ leverage: 5 }));

            expect(check.passed).toBe(true);
            expect(check.riskLevel).toBe("LOW");
            expect(check.message).toBe("Leverage 5x is below target range (10-20x)");
        });
    });
});

describe("risk levels", () => {
    it("should order LOW < MEDIUM < HIGH < CRITICAL", () => {
        expect(compareRiskLevels("LOW", "MEDIUM")).toBeLessThan(0);
        expect(compareRiskLevels("CRITICAL", "HIGH")).toBeGreaterThan(0);
        expect(maxRiskLevel(["LOW", "HIGH", "MEDIUM"])).toBe("HIGH");
        expect(maxRiskLevel([])).toBe("LOW");
    });
});
