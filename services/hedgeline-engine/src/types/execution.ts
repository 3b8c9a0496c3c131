/**
 * Execution Types for the atomic dual-venue executor
 */
import type { PositionSide, TradeResult, VenueSlot } from './venues';

export type ExecutionState =
  | 'PENDING'
  | 'OPENING_FIRST'
  | 'OPENING_SECOND'
  | 'COMPLETE'
  | 'ROLLING_BACK'
  | 'ROLLED_BACK'
  | 'FAILED';

/**
 * Why a leg failed
 */
export type LegErrorKind =
  /** Venue returned an unsuccessful result or a VenueError */
  | 'EXCHANGE_REJECTED'
  | 'TIMEOUT'
  | 'UNEXPECTED_EXCEPTION'
  /** Sequential mode: first leg failed, second never sent */
  | 'NOT_ATTEMPTED';

export interface LegResult {
  slot: VenueSlot;
  venue: string;
  /** Position side; absent on closes made without it */
  side?: PositionSide;
  success: boolean;
  tradeResult?: TradeResult;
  error?: string;
  errorKind?: LegErrorKind;
}

export interface ExecutionResult {
  /** Both legs succeeded */
  success: boolean;
  state: ExecutionState;
  legA: LegResult;
  legB: LegResult;
  executionTimeMs: number;
  errorMessage?: string;
  rollbackPerformed: boolean;
  rollbackSuccess: boolean;
}
