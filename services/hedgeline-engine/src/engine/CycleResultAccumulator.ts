import type { CyclePnL, CycleParameters, CycleResult, CycleState } from '../types/cycle';
import type { ExecutionResult } from '../types/execution';
import type { FundingAnalysis } from '../types/funding';
import type { RiskAssessment } from '../types/risk';
import type { SizingResult } from '../types/sizing';
import type { PositionSide } from '../types/venues';

/**
 * Collects a cycle's data as it progresses. Every bail-out path finalizes
 * whatever has been gathered so far.
 */
export class CycleResultAccumulator {
  private params?: CycleParameters;
  private actualHoldSeconds = 0;
  private sideA?: PositionSide;
  private sideB?: PositionSide;
  private positionSize = 0;
  private positionValue = 0;
  private fundingAnalysis?: FundingAnalysis;
  private fundingEarned = 0;
  private sizing?: SizingResult;
  private riskAssessment?: RiskAssessment;
  private openResult?: ExecutionResult;
  private closeResult?: ExecutionResult;
  private pnl?: CyclePnL;
  private success = false;
  private state: CycleState = 'ERROR';
  private errorMessage?: string = 'Cycle did not complete';

  constructor(
    readonly cycleId: string,
    private readonly startTime: number,
  ) {}

  withParams(params: CycleParameters): this {
    this.params = params;
    return this;
  }

  withSides(sideA: PositionSide, sideB: PositionSide): this {
    this.sideA = sideA;
    this.sideB = sideB;
    return this;
  }

  withFunding(analysis: FundingAnalysis): this {
    this.fundingAnalysis = analysis;
    return this;
  }

  withSizing(sizing: SizingResult): this {
    this.sizing = sizing;
    return this;
  }

  /** Size and value of a pair that was actually opened */
  withPosition(size: number, value: number): this {
    this.positionSize = size;
    this.positionValue = value;
    return this;
  }

  withRisk(assessment: RiskAssessment): this {
    this.riskAssessment = assessment;
    return this;
  }

  withOpen(result: ExecutionResult): this {
    this.openResult = result;
    return this;
  }

  withClose(result: ExecutionResult): this {
    this.closeResult = result;
    return this;
  }

  withHold(actualHoldSeconds: number): this {
    this.actualHoldSeconds = actualHoldSeconds;
    return this;
  }

  withPnL(fundingEarned: number, pnl: CyclePnL): this {
    this.fundingEarned = fundingEarned;
    this.pnl = pnl;
    return this;
  }

  fail(message: string, state: CycleState = 'ERROR'): this {
    this.success = false;
    this.state = state;
    this.errorMessage = message;
    return this;
  }

  succeed(state: CycleState = 'COOLDOWN'): this {
    this.success = true;
    this.state = state;
    this.errorMessage = undefined;
    return this;
  }

  finalize(endTime: number): CycleResult {
    const result: CycleResult = {
      cycleId: this.cycleId,
      success: this.success,
      state: this.state,
      token: this.params?.token ?? 'UNKNOWN',
      equityUsage: this.params?.equityUsage ?? 0,
      leverage: this.params?.leverage ?? 0,
      holdDurationSeconds: this.params?.holdDurationSeconds ?? 0,
      actualHoldSeconds: this.actualHoldSeconds,
      cooldownSeconds: this.params?.cooldownSeconds ?? 0,
      sideA: this.sideA,
      sideB: this.sideB,
      positionSize: this.positionSize,
      positionValue: this.positionValue,
      fundingAnalysis: this.fundingAnalysis,
      sizing: this.sizing,
      riskAssessment: this.riskAssessment,
      openResult: this.openResult,
      closeResult: this.closeResult,
      fundingEarned: this.fundingEarned,
      pnl: this.pnl,
      startTime: this.startTime,
      endTime,
      totalDurationSeconds: Math.max(0, endTime - this.startTime) / 1000,
      errorMessage: this.errorMessage,
    };
    return Object.freeze(result);
  }
}
