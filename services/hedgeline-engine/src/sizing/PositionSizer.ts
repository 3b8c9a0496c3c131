import type { SizingResult, SizingValidation } from '../types/sizing';
import type { BalanceSnapshot } from '../types/venues';

export interface PositionSizerConfig {
  minPositionValueUsd: number;
  /** Per leg */
  maxPositionValueUsd: number;
  /** Final size is multiplied by this before rounding */
  safetyBuffer: number;
  /** Decimal places for position sizes */
  sizePrecision: number;
}

export const DEFAULT_SIZER_CONFIG: PositionSizerConfig = {
  minPositionValueUsd: 10,
  maxPositionValueUsd: 100_000,
  safetyBuffer: 0.95,
  sizePrecision: 6,
};

/**
 * Truncate toward zero at `decimals` places, working on the shortest
 * decimal representation so 0.95 stays 0.95.
 */
export function roundDown(value: number, decimals: number): number {
  const text = String(value);
  if (text.includes('e')) {
    const factor = 10 ** decimals;
    return Math.floor(value * factor) / factor;
  }
  const [integerPart, fraction = ''] = text.split('.');
  if (decimals <= 0) {
    return Number(integerPart);
  }
  return Number(`${integerPart}.${fraction.slice(0, decimals) || '0'}`);
}

/**
 * Decimal places implied by an order size step, e.g. 0.001 -> 3.
 * Infinity when the venue reports no usable step.
 */
export function stepDecimals(step: number): number {
  if (!Number.isFinite(step) || step <= 0) {
    return Number.POSITIVE_INFINITY;
  }
  return Math.max(0, Math.ceil(-Math.log10(step) - 1e-9));
}

/**
 * Position Sizer
 *
 * Sizes both legs off the smaller available balance so either venue can
 * open its leg. Never returns fitsConstraints with a zero size or margin.
 */
export class PositionSizer {
  private readonly config: PositionSizerConfig;

  constructor(config: PositionSizerConfig = DEFAULT_SIZER_CONFIG) {
    this.config = config;
  }

  getConfig(): Readonly<PositionSizerConfig> {
    return this.config;
  }

  calculateSize(
    token: string,
    price: number,
    balanceA: BalanceSnapshot,
    balanceB: BalanceSnapshot,
    equityUsage: number,
    leverage: number,
    minOrderSize: number = 0.0001,
    precision: number = this.config.sizePrecision,
  ): SizingResult {
    const notes: string[] = [];
    const minAvailable = Math.min(balanceA.available, balanceB.available);

    if (minAvailable <= 0) {
      return this.rejected(token, equityUsage, leverage, [
        'Insufficient available balance on one or both exchanges',
      ]);
    }

    let positionValue = minAvailable * equityUsage * leverage;

    if (positionValue < this.config.minPositionValueUsd) {
      notes.push(
        `Position value $${positionValue.toFixed(2)} below minimum $${this.config.minPositionValueUsd.toFixed(2)}`,
      );
      positionValue = 0;
    }
    if (positionValue > this.config.maxPositionValueUsd) {
      notes.push(
        `Position value capped from $${positionValue.toFixed(2)} to $${this.config.maxPositionValueUsd.toFixed(2)}`,
      );
      positionValue = this.config.maxPositionValueUsd;
    }

    if (price <= 0) {
      return this.rejected(token, equityUsage, leverage, ['Invalid token price']);
    }

    const positionSize = roundDown((positionValue / price) * this.config.safetyBuffer, precision);

    if (positionSize < minOrderSize) {
      notes.push(`Position size ${positionSize} below minimum ${minOrderSize}`);
      return this.rejected(token, equityUsage, leverage, notes);
    }
    if (positionSize <= 0 || leverage <= 0) {
      return this.rejected(token, equityUsage, leverage, [
        ...notes,
        'Invalid position size or leverage',
      ]);
    }

    const actualValue = positionSize * price;
    const marginPerLeg = actualValue / leverage;

    let fits = true;
    if (marginPerLeg > balanceA.available) {
      fits = false;
      notes.push('Insufficient margin on venue A after sizing');
    }
    if (marginPerLeg > balanceB.available) {
      fits = false;
      notes.push('Insufficient margin on venue B after sizing');
    }

    return {
      token,
      positionSize,
      positionValueUsd: actualValue,
      marginRequiredPerLeg: marginPerLeg,
      totalMarginRequired: marginPerLeg * 2,
      equityUsage,
      leverage,
      effectiveLeverage: marginPerLeg > 0 ? leverage : 0,
      availableBalanceUsed: marginPerLeg,
      fitsConstraints: fits && marginPerLeg > 0,
      constraintNotes: notes,
    };
  }

  /**
   * Smallest integer leverage that reaches `targetSize`, capped at
   * `maxLeverage`. At the cap the size is whatever that leverage allows.
   */
  calculateForTargetSize(
    token: string,
    price: number,
    targetSize: number,
    balanceA: BalanceSnapshot,
    balanceB: BalanceSnapshot,
    maxLeverage: number = 20,
    maxEquityUsage: number = 0.8,
  ): { sizing: SizingResult; requiredLeverage: number } {
    const targetValue = targetSize * price;
    const minAvailable = Math.min(balanceA.available, balanceB.available);

    if (minAvailable <= 0 || targetValue <= 0) {
      return {
        sizing: this.calculateSize(token, price, balanceA, balanceB, maxEquityUsage, maxLeverage),
        requiredLeverage: maxLeverage,
      };
    }

    const requiredLeverage = Math.floor(targetValue / minAvailable) + 1;
    if (requiredLeverage > maxLeverage) {
      const achievableUsage = Math.min(maxEquityUsage, minAvailable / targetValue);
      return {
        sizing: this.calculateSize(token, price, balanceA, balanceB, achievableUsage, maxLeverage),
        requiredLeverage: maxLeverage,
      };
    }

    const equityUsage = targetValue / (minAvailable * requiredLeverage);
    return {
      sizing: this.calculateSize(token, price, balanceA, balanceB, equityUsage, requiredLeverage),
      requiredLeverage,
    };
  }

  /**
   * Re-check a sizing against balances fetched later
   */
  validateSizing(
    sizing: SizingResult,
    balanceA: BalanceSnapshot,
    balanceB: BalanceSnapshot,
  ): SizingValidation {
    const issues: string[] = [];
    const margin = sizing.marginRequiredPerLeg;

    if (sizing.positionSize <= 0) {
      issues.push('Position size must be positive');
    }
    for (const [label, balance] of [['Venue A', balanceA], ['Venue B', balanceB]] as const) {
      if (margin > balance.available) {
        issues.push(
          `${label}: need $${margin.toFixed(2)}, have $${balance.available.toFixed(2)} (deficit: $${(margin - balance.available).toFixed(2)})`,
        );
      }
    }

    const totalAvailable = balanceA.available + balanceB.available;
    if (sizing.totalMarginRequired > totalAvailable) {
      issues.push(
        `Total margin $${sizing.totalMarginRequired.toFixed(2)} exceeds combined available $${totalAvailable.toFixed(2)}`,
      );
    }
    if (sizing.positionValueUsd < this.config.minPositionValueUsd) {
      issues.push(
        `Position value $${sizing.positionValueUsd.toFixed(2)} below minimum $${this.config.minPositionValueUsd.toFixed(2)}`,
      );
    }
    if (sizing.positionValueUsd > this.config.maxPositionValueUsd) {
      issues.push(
        `Position value $${sizing.positionValueUsd.toFixed(2)} exceeds maximum $${this.config.maxPositionValueUsd.toFixed(2)}`,
      );
    }

    return { valid: issues.length === 0, issues };
  }

  private rejected(
    token: string,
    equityUsage: number,
    leverage: number,
    notes: string[],
  ): SizingResult {
    return {
      token,
      positionSize: 0,
      positionValueUsd: 0,
      marginRequiredPerLeg: 0,
      totalMarginRequired: 0,
      equityUsage,
      leverage,
      effectiveLeverage: 0,
      availableBalanceUsed: 0,
      fitsConstraints: false,
      constraintNotes: notes,
    };
  }
}
