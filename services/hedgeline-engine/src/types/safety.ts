/**
 * Safety Types
 */

export type EmergencyReason =
  | 'USER_INTERRUPT'
  | 'CONSECUTIVE_FAILURES'
  | 'UNHEDGED_EXPOSURE'
  | 'MARGIN_CALL'
  | 'CONNECTION_LOST'
  | 'SYSTEM_ERROR'
  | 'MANUAL_TRIGGER';

export interface ClosedPositionRecord {
  venue: string;
  symbol: string;
  side: string;
  size: number;
  success: boolean;
  error?: string;
}

/**
 * Record of one emergency sweep
 */
export interface EmergencyAction {
  reason: EmergencyReason;
  timestamp: number;
  positionsClosed: ClosedPositionRecord[];
  ordersCancelled: number;
  /** Every cancel and close succeeded on both venues */
  success: boolean;
  details: string;
}

/**
 * Result of one exposure check over the monitored tokens
 */
export interface ExposureReport {
  balanced: boolean;
  /** Conditions that require an emergency */
  issues: string[];
  /** Size mismatches above tolerance */
  warnings: string[];
  checkedTokens: string[];
}
