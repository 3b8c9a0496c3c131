import type { CyclePnL } from '../types/cycle';
import type { PositionInfo } from '../types/venues';

/**
 * Position state captured at open or close
 */
export interface PositionSnapshot {
  venue: string;
  symbol: string;
  size: number;
  entryPrice: number;
  markPrice: number;
  unrealizedPnl: number;
  realizedPnl: number;
  /** Funding received (positive) or paid (negative) so far */
  fundingAccumulated: number;
  timestamp: number;
}

export function snapshotFromPosition(
  position: PositionInfo,
  realizedPnl: number = 0,
  fundingAccumulated: number = 0,
): PositionSnapshot {
  return {
    venue: position.venue,
    symbol: position.symbol,
    size: position.size,
    entryPrice: position.entryPrice,
    markPrice: position.markPrice,
    unrealizedPnl: position.unrealizedPnl,
    realizedPnl,
    fundingAccumulated,
    timestamp: position.updatedTime,
  };
}

export interface SimplePnLInput {
  positionValue: number;
  realizedPnlA?: number;
  realizedPnlB?: number;
  fundingA?: number;
  fundingB?: number;
  /** Fees actually paid; estimated from the fee rate when absent */
  actualFees?: number;
}

/** Two venues, one open and one close each */
const FILLS_PER_CYCLE = 4;

function breakdown(
  realizedPnlA: number,
  realizedPnlB: number,
  fundingA: number,
  fundingB: number,
  totalFees: number,
): CyclePnL {
  const grossPnl = realizedPnlA + realizedPnlB;
  const totalFunding = fundingA + fundingB;
  return {
    realizedPnlA,
    realizedPnlB,
    fundingA,
    fundingB,
    totalFees,
    grossPnl,
    totalFunding,
    netPnl: grossPnl + totalFunding - totalFees,
  };
}

/**
 * Per-cycle P&L. An estimate: funding comes from the rate snapshot, not
 * from venue payment ledgers.
 */
export class PnLCalculator {
  constructor(private readonly feeRate: number = 0.0005) {}

  calculateSimple(input: SimplePnLInput): CyclePnL {
    const fees = input.actualFees ?? input.positionValue * this.feeRate * FILLS_PER_CYCLE;
    return breakdown(
      input.realizedPnlA ?? 0,
      input.realizedPnlB ?? 0,
      input.fundingA ?? 0,
      input.fundingB ?? 0,
      fees,
    );
  }

  calculateFromSnapshots(
    openA: PositionSnapshot | undefined,
    closeA: PositionSnapshot | undefined,
    openB: PositionSnapshot | undefined,
    closeB: PositionSnapshot | undefined,
    openFees: number = 0,
    closeFees: number = 0,
  ): CyclePnL {
    const realized = (open?: PositionSnapshot, close?: PositionSnapshot): number =>
      close ? close.realizedPnl - (open?.realizedPnl ?? 0) : 0;
    const funding = (open?: PositionSnapshot, close?: PositionSnapshot): number =>
      (close?.fundingAccumulated ?? 0) - (open?.fundingAccumulated ?? 0);

    return breakdown(
      realized(openA, closeA),
      realized(openB, closeB),
      funding(openA, closeA),
      funding(openB, closeB),
      openFees + closeFees,
    );
  }
}
