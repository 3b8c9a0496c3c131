/**
 * Matched position size for both legs of a cycle
 */
export interface SizingResult {
  token: string;
  /** Base-asset size per leg, rounded down to the size precision */
  positionSize: number;
  /** positionSize x price */
  positionValueUsd: number;
  marginRequiredPerLeg: number;
  totalMarginRequired: number;
  equityUsage: number;
  leverage: number;
  /** Leverage actually applied; 0 when nothing was sized */
  effectiveLeverage: number;
  /** Balance drawn from each venue as margin */
  availableBalanceUsed: number;
  /** True only when size > 0, margin > 0 and both venues can cover it */
  fitsConstraints: boolean;
  constraintNotes: string[];
}

export interface SizingValidation {
  valid: boolean;
  issues: string[];
}
