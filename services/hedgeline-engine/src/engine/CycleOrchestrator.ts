import { EventEmitter } from 'eventemitter3';
import { Clock, Logger, SystemClock } from '@hedgeline/shared';

import { assertLiveModeAllowed } from '../config/liveMode';
import type { VenuePair } from '../exchanges/interfaces';
import { AtomicExecutor, DEFAULT_ATOMIC_CONFIG } from '../execution/AtomicExecutor';
import { FundingAnalyzer } from '../funding/FundingAnalyzer';
import { PnLCalculator } from '../pnl/PnLCalculator';
import { SecureRandomSource } from '../random/SecureRandomSource';
import { DEFAULT_MAINTENANCE_MARGIN, RiskValidator } from '../risk/RiskValidator';
import { DEFAULT_SAFETY_CONFIG, SafetyMonitor } from '../safety/SafetyMonitor';
import { PositionSizer, stepDecimals } from '../sizing/PositionSizer';
import type { CycleResult, CycleState } from '../types/cycle';
import type { EngineEvents } from '../types/events';
import type { LegResult } from '../types/execution';
import type { FundingAnalysis } from '../types/funding';
import type { EmergencyReason } from '../types/safety';
import type { PositionSide } from '../types/venues';
import { CycleResultAccumulator } from './CycleResultAccumulator';

/**
 * Cycle Orchestrator Configuration
 */
export interface OrchestratorConfig {
  tokens: readonly string[];
  /** Safety flags are polled this often while holding or cooling down */
  holdPollIntervalMs: number;
  /** Funding interval the estimate is prorated against */
  fundingIntervalSeconds: number;
  simulationMode: boolean;
  installSignalHandlers: boolean;
  runSafetyLoop: boolean;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  tokens: ['BTC', 'ETH', 'SOL', 'HYPE'],
  holdPollIntervalMs: 30_000,
  fundingIntervalSeconds: 28_800,
  simulationMode: true,
  installSignalHandlers: false,
  runSafetyLoop: true,
};

export interface OrchestratorComponents {
  random: SecureRandomSource;
  fundingAnalyzer: FundingAnalyzer;
  sizer: PositionSizer;
  riskValidator: RiskValidator;
  executor: AtomicExecutor;
  safety: SafetyMonitor;
  pnl: PnLCalculator;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Realized P&L of one leg from its open and close fills
 */
function legRealizedPnl(side: PositionSide, open: LegResult, close: LegResult): number {
  const openPrice = open.tradeResult?.averagePrice ?? 0;
  const closePrice = close.tradeResult?.averagePrice ?? 0;
  const size = open.tradeResult?.filledQuantity ?? 0;
  if (openPrice <= 0 || closePrice <= 0 || size <= 0) {
    return 0;
  }
  return side === 'LONG' ? (closePrice - openPrice) * size : (openPrice - closePrice) * size;
}

function totalFeesPaid(legs: LegResult[]): number {
  return legs.reduce((sum, leg) => sum + (leg.tradeResult?.feePaid ?? 0), 0);
}

/**
 * Cycle Orchestrator
 *
 * Drives IDLE -> OPENING -> HOLDING -> CLOSING -> COOLDOWN for one randomly
 * parameterised pair at a time. runCycle never throws: every bail-out is
 * returned as a failed CycleResult.
 */
export class CycleOrchestrator extends EventEmitter<EngineEvents> {
  private readonly venues: VenuePair;
  private readonly config: OrchestratorConfig;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly random: SecureRandomSource;
  private readonly fundingAnalyzer: FundingAnalyzer;
  private readonly sizer: PositionSizer;
  private readonly riskValidator: RiskValidator;
  private readonly executor: AtomicExecutor;
  private readonly safety: SafetyMonitor;
  private readonly pnl: PnLCalculator;

  private currentState: CycleState = 'IDLE';
  private currentCycleId?: string;
  private running = false;
  private lifecycle = new AbortController();
  private safetyLoop?: Promise<void>;

  constructor(
    venues: VenuePair,
    config: OrchestratorConfig = DEFAULT_ORCHESTRATOR_CONFIG,
    components: Partial<OrchestratorComponents> = {},
    logger: Logger = Logger.getInstance('cycle-orchestrator'),
    clock: Clock = new SystemClock(),
  ) {
    super();
    this.venues = venues;
    this.config = config;
    this.logger = logger;
    this.clock = clock;
    this.random = components.random ?? new SecureRandomSource();
    this.fundingAnalyzer = components.fundingAnalyzer ?? new FundingAnalyzer();
    this.sizer = components.sizer ?? new PositionSizer();
    this.riskValidator = components.riskValidator ?? new RiskValidator();
    this.executor =
      components.executor ??
      new AtomicExecutor(venues, DEFAULT_ATOMIC_CONFIG, this.random, logger.child('executor'), clock);
    this.safety =
      components.safety ?? new SafetyMonitor(venues, DEFAULT_SAFETY_CONFIG, logger.child('safety'), clock);
    this.pnl = components.pnl ?? new PnLCalculator();

    this.safety.setEmergencyCallback((action) => this.emit('emergency', action));
  }

  get isRunning(): boolean {
    return this.running;
  }

  getState(): CycleState {
    return this.currentState;
  }

  getCurrentCycleId(): string | undefined {
    return this.currentCycleId;
  }

  getSafetyMonitor(): SafetyMonitor {
    return this.safety;
  }

  /**
   * Connect both venues and start the watchdog. Refuses live trading with
   * aggressive randomization bounds.
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    const limits = this.random.getConfig();
    assertLiveModeAllowed({
      simulationMode: this.config.simulationMode,
      maxLeverage: limits.maxLeverage,
      maxEquityUsage: limits.maxEquityUsage,
    });
    if (!this.config.simulationMode) {
      this.logger.warn('LIVE MODE ENABLED', undefined, {
        leverageRange: `${limits.minLeverage}-${limits.maxLeverage}`,
        equityRange: `${limits.minEquityUsage}-${limits.maxEquityUsage}`,
      });
    }

    this.logger.info('Starting orchestrator', undefined, {
      venueA: this.venues.A.name,
      venueB: this.venues.B.name,
      simulationMode: this.config.simulationMode,
    });
    await Promise.all([this.venues.A.connect(), this.venues.B.connect()]);
    if (!this.venues.A.isConnected() || !this.venues.B.isConnected()) {
      throw new Error('Failed to connect to one or more venues');
    }

    if (this.config.installSignalHandlers) {
      this.safety.installSignalHandlers();
    }
    this.lifecycle = new AbortController();
    this.running = true;

    if (this.config.runSafetyLoop) {
      this.safetyLoop = this.safety.runSafetyLoop().catch((error: unknown) => {
        this.logger.error('Safety loop crashed', error instanceof Error ? error : undefined);
      });
    }
    this.logger.info('Orchestrator started');
  }

  /**
   * Request shutdown, stop the watchdog and disconnect. An in-flight open
   * or close is allowed to finish; hold and cooldown waits end early.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.logger.info('Stopping orchestrator');
    this.running = false;
    this.safety.requestShutdown();
    this.lifecycle.abort();
    this.safety.stopSafetyLoop();
    await this.safetyLoop;
    this.safetyLoop = undefined;
    this.safety.removeSignalHandlers();

    const results = await Promise.allSettled([this.venues.A.disconnect(), this.venues.B.disconnect()]);
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        const venue = index === 0 ? this.venues.A.name : this.venues.B.name;
        this.logger.warn(`Failed to disconnect ${venue}`, undefined, { error: messageOf(result.reason) });
      }
    });
    this.logger.info('Orchestrator stopped');
  }

  async runCycle(): Promise<CycleResult> {
    const cycleId = this.random.generateExternalId().slice(0, 8);
    const startTime = this.clock.now();
    const accumulator = new CycleResultAccumulator(cycleId, startTime);
    this.currentCycleId = cycleId;

    this.logger.info('Cycle started', cycleId);
    this.logger.logEvent('cycle_start', { cycleId });
    this.emit('cycle:start', { cycleId, startTime });

    try {
      return await this.executeCycle(accumulator);
    } catch (error) {
      this.logger.error('Cycle failed with exception', error instanceof Error ? error : undefined, cycleId);
      return this.failCycle(accumulator, messageOf(error));
    }
  }

  /**
   * Run cycles until shutdown or emergency, with a randomized cooldown in
   * between. No new cycle starts once either flag is set.
   */
  async runContinuous(): Promise<void> {
    if (!this.running) {
      this.logger.warn('runContinuous called before start');
      return;
    }
    while (this.canContinue()) {
      const result = await this.runCycle();
      if (!result.success) {
        this.logger.warn('Cycle failed', result.cycleId, { error: result.errorMessage, state: result.state });
      }
      if (!this.canContinue()) {
        break;
      }
      const cooldownSeconds = result.cooldownSeconds > 0 ? result.cooldownSeconds : this.random.generateCooldown();
      this.transition('COOLDOWN', result.cycleId);
      this.logger.debug('Entering cooldown', result.cycleId, { seconds: cooldownSeconds });
      await this.waitPolling(cooldownSeconds);
    }

    if (this.safety.emergencyTriggered) {
      this.logger.warn('Emergency triggered - stopping continuous operation');
    }
    this.logger.info('Continuous operation ended');
  }

  private async executeCycle(accumulator: CycleResultAccumulator): Promise<CycleResult> {
    const { cycleId } = accumulator;
    this.transition('IDLE', cycleId);

    const params = this.random.generateCycleParameters(this.config.tokens);
    const { token } = params;
    accumulator.withParams(params);
    this.logger.debug('Cycle parameters generated', cycleId, {
      token,
      equityUsage: params.equityUsage,
      leverage: params.leverage,
      holdDurationSeconds: params.holdDurationSeconds,
    });

    const { A: venueA, B: venueB } = this.venues;
    const [balanceA, balanceB, marketA, marketB] = await Promise.all([
      venueA.getBalance(),
      venueB.getBalance(),
      venueA.getMarketInfo(venueA.getMarketSymbol(token)),
      venueB.getMarketInfo(venueB.getMarketSymbol(token)),
    ]);
    this.logger.info('Account balances', cycleId, {
      availableA: balanceA.available,
      equityA: balanceA.equity,
      availableB: balanceB.available,
      equityB: balanceB.equity,
    });

    const analysis = this.fundingAnalyzer.analyze(
      marketA.fundingRate,
      marketB.fundingRate,
      token,
      0,
      marketA.nextFundingTime,
      marketB.nextFundingTime,
    );
    accumulator.withFunding(analysis);
    this.logger.logEvent('funding_rates', {
      cycleId,
      token,
      details: {
        rateA: FundingAnalyzer.formatRate(marketA.fundingRate),
        rateB: FundingAnalyzer.formatRate(marketB.fundingRate),
        bias: analysis.biasStrength,
      },
    });
    this.emit('funding:analyzed', analysis, cycleId);

    const assignment = this.random.assignSidesWithBias(marketA.fundingRate, marketB.fundingRate);
    accumulator.withSides(assignment.sideA, assignment.sideB);
    this.logger.info('Sides assigned', cycleId, {
      sideA: assignment.sideA,
      sideB: assignment.sideB,
      bias: assignment.biasStrength,
      followedBias: assignment.followedBias,
    });
    this.emit('sides:assigned', assignment, cycleId);

    const price = marketA.markPrice;
    const precision = Math.min(
      this.sizer.getConfig().sizePrecision,
      stepDecimals(marketA.minOrderSizeChange),
      stepDecimals(marketB.minOrderSizeChange),
    );
    const sizing = this.sizer.calculateSize(
      token,
      price,
      balanceA,
      balanceB,
      params.equityUsage,
      params.leverage,
      Math.max(marketA.minOrderSize, marketB.minOrderSize),
      precision,
    );
    accumulator.withSizing(sizing);
    if (!sizing.fitsConstraints) {
      this.logger.warn('Sizing rejected - skipping cycle', cycleId, { token, notes: sizing.constraintNotes });
      return this.failCycle(accumulator, `Sizing rejected: ${sizing.constraintNotes.join('; ')}`);
    }
    this.logger.logEvent('sizing_decision', {
      cycleId,
      token,
      details: {
        equityUsage: params.equityUsage,
        leverage: params.leverage,
        positionSize: sizing.positionSize,
        positionValueUsd: sizing.positionValueUsd,
      },
    });
    this.emit('sizing:decided', sizing, cycleId);

    const risk = this.riskValidator.validatePreTrade(
      sizing,
      balanceA,
      balanceB,
      price,
      marketA.maintenanceMarginRate ?? DEFAULT_MAINTENANCE_MARGIN,
      marketB.maintenanceMarginRate ?? DEFAULT_MAINTENANCE_MARGIN,
    );
    accumulator.withRisk(risk);
    if (!risk.canProceed) {
      const issues = risk.blockingIssues.join('; ');
      this.logger.warn('Risk validation failed', cycleId, { issues });
      return this.failCycle(accumulator, issues);
    }
    for (const warning of risk.warnings) {
      this.logger.warn('Risk warning', cycleId, { warning });
    }

    if (this.safety.shutdownRequested || this.safety.emergencyTriggered) {
      accumulator.fail('Shutdown requested before open', this.safety.emergencyTriggered ? 'EMERGENCY' : 'ERROR');
      return this.finish(accumulator);
    }

    this.transition('OPENING', cycleId);
    this.safety.addMonitoredToken(token);
    const openResult = await this.atomically(token, () =>
      this.executor.openPositions(
        token,
        sizing.positionSize,
        assignment.sideA,
        assignment.sideB,
        params.leverage,
        price,
        cycleId,
      ),
    );
    accumulator.withOpen(openResult);

    if (!openResult.success) {
      const message = openResult.errorMessage ?? 'Open failed';
      if (!openResult.rollbackSuccess) {
        // Exposure may remain; the safety loop keeps watching the token
        return this.failCycle(accumulator, `Rollback failed: ${message}`, 'UNHEDGED_EXPOSURE');
      }
      this.safety.removeMonitoredToken(token);
      return this.failCycle(accumulator, message);
    }

    accumulator.withPosition(sizing.positionSize, sizing.positionValueUsd);
    this.logger.logEvent('position_opened', {
      cycleId,
      token,
      phase: 'OPENING',
      details: { sideA: assignment.sideA, sideB: assignment.sideB, size: sizing.positionSize },
    });
    this.emit('position:opened', openResult, cycleId);

    this.transition('HOLDING', cycleId);
    this.logger.debug('Holding positions', cycleId, { seconds: params.holdDurationSeconds });
    const heldSeconds = await this.waitPolling(params.holdDurationSeconds);
    accumulator.withHold(heldSeconds);

    if (this.safety.emergencyTriggered) {
      // The emergency sweep owns liquidation from here
      this.safety.removeMonitoredToken(token);
      accumulator.fail('Emergency triggered during hold', 'EMERGENCY');
      return this.finish(accumulator);
    }

    this.transition('CLOSING', cycleId);
    const closeResult = await this.atomically(
      token,
      () =>
        this.executor.closePositions(token, undefined, undefined, {
          correlationId: cycleId,
          sideA: assignment.sideA,
          sideB: assignment.sideB,
        }),
      () => this.safety.removeMonitoredToken(token),
    );
    accumulator.withClose(closeResult);
    this.logger.logEvent('position_closed', {
      cycleId,
      token,
      phase: 'CLOSING',
      details: { success: closeResult.success },
    });
    this.emit('position:closed', closeResult, cycleId);

    if (!closeResult.success) {
      const message = closeResult.errorMessage ?? 'Close failed';
      // One leg still open and no longer monitored
      const oneSided = closeResult.legA.success !== closeResult.legB.success;
      return this.failCycle(accumulator, message, oneSided ? 'UNHEDGED_EXPOSURE' : undefined);
    }

    const fundingEarned = this.estimateFunding(analysis, sizing.positionValueUsd, heldSeconds);
    const feesPaid = totalFeesPaid([openResult.legA, openResult.legB, closeResult.legA, closeResult.legB]);
    const pnl = this.pnl.calculateSimple({
      positionValue: sizing.positionValueUsd,
      realizedPnlA: legRealizedPnl(assignment.sideA, openResult.legA, closeResult.legA),
      realizedPnlB: legRealizedPnl(assignment.sideB, openResult.legB, closeResult.legB),
      fundingA: this.legFunding(assignment.sideA, marketA.fundingRate, sizing.positionValueUsd, heldSeconds),
      fundingB: this.legFunding(assignment.sideB, marketB.fundingRate, sizing.positionValueUsd, heldSeconds),
      actualFees: feesPaid > 0 ? feesPaid : undefined,
    });
    accumulator.withPnL(fundingEarned, pnl);

    this.safety.recordSuccess();
    accumulator.succeed('COOLDOWN');
    return this.finish(accumulator);
  }

  /**
   * Record the failure and escalate: an explicit reason or a reached
   * failure ceiling both end the cycle in EMERGENCY.
   */
  private async failCycle(
    accumulator: CycleResultAccumulator,
    message: string,
    escalate?: EmergencyReason,
  ): Promise<CycleResult> {
    let state: CycleState = 'ERROR';
    if (escalate) {
      await this.safety.executeEmergency(escalate);
      state = 'EMERGENCY';
    }
    if (this.safety.recordFailure()) {
      await this.safety.executeEmergency('CONSECUTIVE_FAILURES');
      state = 'EMERGENCY';
    }
    accumulator.fail(message, state);
    return this.finish(accumulator);
  }

  private finish(accumulator: CycleResultAccumulator): CycleResult {
    const result = accumulator.finalize(this.clock.now());
    this.transition(result.state, result.cycleId);
    this.logger.info(result.success ? 'Cycle completed' : 'Cycle ended with failure', result.cycleId, {
      token: result.token,
      state: result.state,
      durationSeconds: result.totalDurationSeconds,
      fundingEarned: result.fundingEarned,
      error: result.errorMessage,
    });
    this.logger.logEvent('cycle_end', {
      cycleId: result.cycleId,
      token: result.token,
      phase: result.state,
      details: { success: result.success, netPnl: result.pnl?.netPnl ?? 0 },
    });
    this.emit('cycle:end', result);
    return result;
  }

  /**
   * Run an open or close with the token marked in flight so the watchdog
   * does not read a half-filled pair as unhedged.
   */
  private async atomically<T>(token: string, action: () => Promise<T>, release?: () => void): Promise<T> {
    this.safety.beginAtomicAction(token);
    try {
      return await action();
    } finally {
      this.safety.endAtomicAction(token);
      release?.();
    }
  }

  /**
   * Sleep for up to `seconds`, polling the safety flags.
   *
   * @returns seconds actually waited
   */
  private async waitPolling(seconds: number): Promise<number> {
    const startedAt = this.clock.now();
    const totalMs = seconds * 1000;
    const { signal } = this.lifecycle;

    for (;;) {
      const elapsed = this.clock.now() - startedAt;
      if (
        elapsed >= totalMs ||
        signal.aborted ||
        this.safety.shutdownRequested ||
        this.safety.emergencyTriggered
      ) {
        return Math.min(elapsed, totalMs) / 1000;
      }
      await this.clock.sleep(Math.min(this.config.holdPollIntervalMs, totalMs - elapsed), signal);
    }
  }

  /**
   * Linear estimate from the rate snapshot taken at the start of the cycle
   */
  private estimateFunding(analysis: FundingAnalysis, positionValue: number, heldSeconds: number): number {
    return positionValue * analysis.rateDifference * (heldSeconds / this.config.fundingIntervalSeconds);
  }

  /** Shorts receive a positive rate, longs pay it */
  private legFunding(side: PositionSide, rate: number, positionValue: number, heldSeconds: number): number {
    const paid = positionValue * rate * (heldSeconds / this.config.fundingIntervalSeconds);
    return side === 'SHORT' ? paid : -paid;
  }

  private canContinue(): boolean {
    return this.running && !this.safety.shutdownRequested && !this.safety.emergencyTriggered;
  }

  private transition(to: CycleState, cycleId?: string): void {
    const from = this.currentState;
    if (from === to) {
      return;
    }
    this.currentState = to;
    this.logger.debug(`State ${from} -> ${to}`, cycleId);
    this.emit('state:changed', { from, to, cycleId });
  }
}
