/**
 * Cycle Types
 */
import type { ExecutionResult } from './execution';
import type { FundingAnalysis } from './funding';
import type { RiskAssessment } from './risk';
import type { SizingResult } from './sizing';
import type { PositionSide } from './venues';

/**
 * Cycle state machine.
 * IDLE -> OPENING -> HOLDING -> CLOSING -> COOLDOWN, with ERROR and
 * EMERGENCY reachable from any non-terminal state.
 */
export type CycleState =
  | 'IDLE'
  | 'OPENING'
  | 'HOLDING'
  | 'CLOSING'
  | 'COOLDOWN'
  | 'ERROR'
  | 'EMERGENCY';

/**
 * Randomized parameters for one cycle
 */
export interface CycleParameters {
  readonly token: string;
  /** Fraction of the constraining venue's available balance */
  readonly equityUsage: number;
  /** Integer leverage applied on both venues */
  readonly leverage: number;
  readonly holdDurationSeconds: number;
  readonly cooldownSeconds: number;
}

/**
 * P&L breakdown for a cycle, per venue
 */
export interface CyclePnL {
  realizedPnlA: number;
  realizedPnlB: number;
  fundingA: number;
  fundingB: number;
  totalFees: number;
  grossPnl: number;
  totalFunding: number;
  netPnl: number;
}

/**
 * Outcome of one cycle, frozen once finalized
 */
export interface CycleResult {
  readonly cycleId: string;
  readonly success: boolean;
  /** Terminal state: COOLDOWN on success, ERROR or EMERGENCY otherwise */
  readonly state: CycleState;
  readonly token: string;
  readonly equityUsage: number;
  readonly leverage: number;
  readonly holdDurationSeconds: number;
  /** Seconds actually held, less than planned when interrupted */
  readonly actualHoldSeconds: number;
  readonly cooldownSeconds: number;
  readonly sideA?: PositionSide;
  readonly sideB?: PositionSide;
  readonly positionSize: number;
  readonly positionValue: number;
  readonly fundingAnalysis?: FundingAnalysis;
  readonly sizing?: SizingResult;
  readonly riskAssessment?: RiskAssessment;
  readonly openResult?: ExecutionResult;
  readonly closeResult?: ExecutionResult;
  /** Linear estimate: value x rate differential x held / funding interval */
  readonly fundingEarned: number;
  readonly pnl?: CyclePnL;
  readonly startTime: number;
  readonly endTime: number;
  readonly totalDurationSeconds: number;
  readonly errorMessage?: string;
}
