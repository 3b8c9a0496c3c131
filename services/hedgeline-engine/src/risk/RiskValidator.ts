import type { RiskAssessment, RiskCheckResult } from '../types/risk';
import { maxRiskLevel } from '../types/risk';
import type { SizingResult } from '../types/sizing';
import type { BalanceSnapshot } from '../types/venues';

/**
 * Risk Validation Configuration
 */
export interface RiskValidatorConfig {
  /** Per leg */
  maxPositionValueUsd: number;
  /** Smaller available balance must be at least this */
  minBalanceUsd: number;
  /** Margin must be covered with this much headroom (0.2 = 20%) */
  minMarginRatio: number;
  /** Liquidation distance below this fails the check */
  minLiquidationDistance: number;
  /** Liquidation distance below this is MEDIUM */
  warnLiquidationDistance: number;
  minLeverage: number;
  maxLeverage: number;
  /** Leverage above this passes as MEDIUM */
  softLeverageThreshold: number;
}

export const DEFAULT_RISK_CONFIG: RiskValidatorConfig = {
  maxPositionValueUsd: 100_000,
  minBalanceUsd: 100,
  minMarginRatio: 0.2,
  minLiquidationDistance: 0.03,
  warnLiquidationDistance: 0.05,
  minLeverage: 10,
  maxLeverage: 20,
  softLeverageThreshold: 15,
};

export const DEFAULT_MAINTENANCE_MARGIN = 0.005;

const usd = (value: number): string => `$${value.toFixed(2)}`;
const pct = (value: number): string => `${(value * 100).toFixed(1)}%`;

/**
 * Risk Validator
 *
 * Runs the pre-trade checks in a fixed order and aggregates them. A
 * failed check blocks the cycle; passing MEDIUM/HIGH checks become
 * warnings.
 */
export class RiskValidator {
  private readonly config: RiskValidatorConfig;

  constructor(config: RiskValidatorConfig = DEFAULT_RISK_CONFIG) {
    this.config = config;
  }

  validatePreTrade(
    sizing: SizingResult,
    balanceA: BalanceSnapshot,
    balanceB: BalanceSnapshot,
    price: number,
    maintenanceMarginA: number = DEFAULT_MAINTENANCE_MARGIN,
    maintenanceMarginB: number = DEFAULT_MAINTENANCE_MARGIN,
  ): RiskAssessment {
    return this.aggregate([
      this.checkMinimumBalance(balanceA, balanceB),
      this.checkPositionLimits(sizing),
      this.checkMarginSufficiency(sizing, balanceA, balanceB),
      this.checkLiquidationRisk(sizing, price, maintenanceMarginA, maintenanceMarginB),
      this.checkLeverage(sizing),
    ]);
  }

  checkMinimumBalance(balanceA: BalanceSnapshot, balanceB: BalanceSnapshot): RiskCheckResult {
    const minAvailable = Math.min(balanceA.available, balanceB.available);
    const details = {
      availableA: balanceA.available,
      availableB: balanceB.available,
      minimumRequired: this.config.minBalanceUsd,
    };

    if (minAvailable < this.config.minBalanceUsd) {
      return {
        checkName: 'minimum_balance',
        passed: false,
        riskLevel: 'CRITICAL',
        message: `Available balance ${usd(minAvailable)} below minimum ${usd(this.config.minBalanceUsd)}`,
        details,
      };
    }
    if (minAvailable < this.config.minBalanceUsd * 2) {
      return {
        checkName: 'minimum_balance',
        passed: true,
        riskLevel: 'MEDIUM',
        message: `Balance ${usd(minAvailable)} is low but acceptable`,
        details,
      };
    }
    return {
      checkName: 'minimum_balance',
      passed: true,
      riskLevel: 'LOW',
      message: 'Balance check passed',
      details,
    };
  }

  checkPositionLimits(sizing: SizingResult): RiskCheckResult {
    const details = {
      positionValue: sizing.positionValueUsd,
      maxAllowed: this.config.maxPositionValueUsd,
    };

    if (sizing.positionValueUsd > this.config.maxPositionValueUsd) {
      return {
        checkName: 'position_limits',
        passed: false,
        riskLevel: 'HIGH',
        message: `Position value ${usd(sizing.positionValueUsd)} exceeds max ${usd(this.config.maxPositionValueUsd)}`,
        details,
      };
    }
    if (sizing.positionSize <= 0) {
      return {
        checkName: 'position_limits',
        passed: false,
        riskLevel: 'CRITICAL',
        message: 'Position size is zero or negative',
        details: { positionSize: sizing.positionSize },
      };
    }
    return {
      checkName: 'position_limits',
      passed: true,
      riskLevel: 'LOW',
      message: 'Position limits check passed',
      details,
    };
  }

  checkMarginSufficiency(
    sizing: SizingResult,
    balanceA: BalanceSnapshot,
    balanceB: BalanceSnapshot,
  ): RiskCheckResult {
    const requiredWithBuffer = sizing.marginRequiredPerLeg * (1 + this.config.minMarginRatio);
    const okA = balanceA.available >= requiredWithBuffer;
    const okB = balanceB.available >= requiredWithBuffer;

    if (!okA || !okB) {
      const issues: string[] = [];
      if (!okA) issues.push(`Venue A: ${usd(balanceA.available)} < ${usd(requiredWithBuffer)}`);
      if (!okB) issues.push(`Venue B: ${usd(balanceB.available)} < ${usd(requiredWithBuffer)}`);
      return {
        checkName: 'margin_sufficiency',
        passed: false,
        riskLevel: 'HIGH',
        message: `Insufficient margin with buffer: ${issues.join('; ')}`,
        details: {
          requiredWithBuffer,
          availableA: balanceA.available,
          availableB: balanceB.available,
          bufferRatio: this.config.minMarginRatio,
        },
      };
    }

    const utilization = (available: number): number =>
      available > 0 ? sizing.marginRequiredPerLeg / available : 0;
    const utilizationA = utilization(balanceA.available);
    const utilizationB = utilization(balanceB.available);
    const maxUtilization = Math.max(utilizationA, utilizationB);

    return {
      checkName: 'margin_sufficiency',
      passed: true,
      riskLevel: maxUtilization > 0.9 ? 'MEDIUM' : 'LOW',
      message: `Margin check passed (max utilization: ${pct(maxUtilization)})`,
      details: { utilizationA, utilizationB },
    };
  }

  /**
   * Venue A is the long reference and venue B the short reference; the
   * legs are symmetric so the pair bounds either assignment.
   */
  checkLiquidationRisk(
    sizing: SizingResult,
    price: number,
    maintenanceMarginA: number,
    maintenanceMarginB: number,
  ): RiskCheckResult {
    if (sizing.leverage <= 0 || price <= 0) {
      return {
        checkName: 'liquidation_risk',
        passed: false,
        riskLevel: 'CRITICAL',
        message: 'Invalid leverage or price for liquidation calculation',
        details: {},
      };
    }

    const longLiqPrice = price * (1 - (1 / sizing.leverage - maintenanceMarginA));
    const shortLiqPrice = price * (1 + (1 / sizing.leverage - maintenanceMarginB));
    const longDistance = Math.abs(price - longLiqPrice) / price;
    const shortDistance = Math.abs(shortLiqPrice - price) / price;
    const details = { price, longLiqPrice, shortLiqPrice, longDistance, shortDistance };

    if (longDistance < this.config.minLiquidationDistance || shortDistance < this.config.minLiquidationDistance) {
      return {
        checkName: 'liquidation_risk',
        passed: false,
        riskLevel: 'HIGH',
        message: `Liquidation too close: long ${pct(longDistance)}, short ${pct(shortDistance)}`,
        details,
      };
    }

    return {
      checkName: 'liquidation_risk',
      passed: true,
      riskLevel:
        Math.min(longDistance, shortDistance) < this.config.warnLiquidationDistance ? 'MEDIUM' : 'LOW',
      message: `Liquidation distance OK (long: ${pct(longDistance)}, short: ${pct(shortDistance)})`,
      details,
    };
  }

  checkLeverage(sizing: SizingResult): RiskCheckResult {
    const { leverage } = sizing;
    const { minLeverage, maxLeverage, softLeverageThreshold } = this.config;

    if (leverage > maxLeverage) {
      return {
        checkName: 'leverage',
        passed: false,
        riskLevel: 'HIGH',
        message: `Leverage ${leverage}x exceeds maximum ${maxLeverage}x`,
        details: { leverage, maxAllowed: maxLeverage },
      };
    }
    if (leverage < minLeverage) {
      return {
        checkName: 'leverage',
        passed: true,
        riskLevel: 'LOW',
        message: `Leverage ${leverage}x is below target range (${minLeverage}-${maxLeverage}x)`,
        details: { leverage },
      };
    }
    return {
      checkName: 'leverage',
      passed: true,
      riskLevel: leverage > softLeverageThreshold ? 'MEDIUM' : 'LOW',
      message: `Leverage ${leverage}x within acceptable range`,
      details: { leverage },
    };
  }

  private aggregate(checks: RiskCheckResult[]): RiskAssessment {
    const blockingIssues: string[] = [];
    const warnings: string[] = [];

    for (const check of checks) {
      if (!check.passed) {
        blockingIssues.push(`${check.checkName}: ${check.message}`);
      } else if (check.riskLevel === 'MEDIUM' || check.riskLevel === 'HIGH') {
        warnings.push(`${check.checkName}: ${check.message}`);
      }
    }

    const overallPassed = checks.every((check) => check.passed);
    const overallRiskLevel = maxRiskLevel(checks.map((check) => check.riskLevel));

    return {
      checks,
      overallPassed,
      overallRiskLevel,
      blockingIssues,
      warnings,
      canProceed: overallPassed && overallRiskLevel !== 'CRITICAL',
    };
  }
}
