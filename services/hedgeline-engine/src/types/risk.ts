/**
 * Risk Types
 */

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

const RISK_LEVEL_ORDER: Record<RiskLevel, number> = {
  LOW: 0,
  MEDIUM: 1,
  HIGH: 2,
  CRITICAL: 3,
};

export function compareRiskLevels(a: RiskLevel, b: RiskLevel): number {
  return RISK_LEVEL_ORDER[a] - RISK_LEVEL_ORDER[b];
}

export function maxRiskLevel(levels: readonly RiskLevel[]): RiskLevel {
  return levels.reduce<RiskLevel>(
    (max, level) => (compareRiskLevels(level, max) > 0 ? level : max),
    'LOW',
  );
}

export type RiskCheckName =
  | 'minimum_balance'
  | 'position_limits'
  | 'margin_sufficiency'
  | 'liquidation_risk'
  | 'leverage';

export interface RiskCheckResult {
  checkName: RiskCheckName;
  passed: boolean;
  riskLevel: RiskLevel;
  message: string;
  details: Record<string, number | boolean>;
}

export interface RiskAssessment {
  /** In evaluation order */
  checks: RiskCheckResult[];
  overallPassed: boolean;
  /** Max severity over all checks */
  overallRiskLevel: RiskLevel;
  /** "checkName: message" for every failed check */
  blockingIssues: string[];
  /** "checkName: message" for passed MEDIUM/HIGH checks */
  warnings: string[];
  /** overallPassed and overallRiskLevel below CRITICAL */
  canProceed: boolean;
}
