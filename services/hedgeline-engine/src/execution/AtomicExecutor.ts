import { Clock, Logger, SystemClock } from '@hedgeline/shared';

import type { IVenueGateway, VenuePair } from '../exchanges/interfaces';
import { VenueError } from '../exchanges/VenueError';
import { SecureRandomSource } from '../random/SecureRandomSource';
import type { ExecutionResult, ExecutionState, LegErrorKind, LegResult } from '../types/execution';
import type { PositionSide, TradeResult, VenueSlot } from '../types/venues';
import { TimeoutError, withTimeout } from './timeout';

/**
 * Atomic Execution Configuration
 */
export interface AtomicConfig {
  /** Open both legs concurrently; otherwise A first, then B */
  parallelOpen: boolean;
  /** Hard deadline for the open attempt in ms */
  openTimeoutMs: number;
  /** How long a timed-out attempt may take to settle before its legs count as unknown */
  settleTimeoutMs: number;
  /** Worst acceptable fill away from the reference price, in percent */
  maxSlippagePercent: number;
}

export const DEFAULT_ATOMIC_CONFIG: AtomicConfig = {
  parallelOpen: true,
  openTimeoutMs: 30_000,
  settleTimeoutMs: 30_000,
  maxSlippagePercent: 0.5,
};

/**
 * Optional details for closePositions
 */
export interface CloseContext {
  correlationId?: string;
  /** Side of the position being closed on venue A */
  sideA?: PositionSide;
  /** Side of the position being closed on venue B */
  sideB?: PositionSide;
}

interface LegPlan {
  slot: VenueSlot;
  gateway: IVenueGateway;
  side: PositionSide;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorKindOf(error: unknown): LegErrorKind {
  if (error instanceof TimeoutError) {
    return 'TIMEOUT';
  }
  if (error instanceof VenueError) {
    return error.code === 'TIMEOUT' ? 'TIMEOUT' : 'EXCHANGE_REJECTED';
  }
  return 'UNEXPECTED_EXCEPTION';
}

/**
 * Executor for the two legs of a delta-neutral pair.
 *
 * Opens both legs as one unit: if only one fills it is closed again, and
 * a timeout or unexpected failure flattens both venues. Leg failures are
 * reported as data; openPositions and closePositions never throw.
 */
export class AtomicExecutor {
  private readonly venues: VenuePair;
  private readonly config: AtomicConfig;
  private readonly random: SecureRandomSource;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private currentState: ExecutionState = 'PENDING';

  constructor(
    venues: VenuePair,
    config: AtomicConfig = DEFAULT_ATOMIC_CONFIG,
    random: SecureRandomSource = new SecureRandomSource(),
    logger: Logger = Logger.getInstance('atomic-executor'),
    clock: Clock = new SystemClock(),
  ) {
    this.venues = venues;
    this.config = config;
    this.random = random;
    this.logger = logger;
    this.clock = clock;
  }

  getState(): ExecutionState {
    return this.currentState;
  }

  async openPositions(
    token: string,
    size: number,
    sideA: PositionSide,
    sideB: PositionSide,
    leverage: number,
    price: number,
    correlationId?: string,
  ): Promise<ExecutionResult> {
    const startedAt = this.clock.now();
    this.currentState = 'PENDING';
    const legs: { A?: LegResult; B?: LegResult } = {};
    const planA: LegPlan = { slot: 'A', gateway: this.venues.A, side: sideA };
    const planB: LegPlan = { slot: 'B', gateway: this.venues.B, side: sideB };

    this.logger.info('Opening position pair', correlationId, {
      token,
      size,
      sideA,
      sideB,
      leverage,
      mode: this.config.parallelOpen ? 'parallel' : 'sequential',
    });

    await this.applyLeverage(token, leverage, correlationId);

    const controller = new AbortController();
    const attempt = this.config.parallelOpen
      ? this.openParallel(token, size, price, planA, planB, legs)
      : this.openSequential(token, size, price, planA, planB, legs, controller.signal);

    try {
      await withTimeout(attempt, this.config.openTimeoutMs, 'Execution timeout');
    } catch (error) {
      controller.abort();
      const timedOut = error instanceof TimeoutError;
      const message = timedOut ? 'Execution timeout' : messageOf(error);
      this.logger.error('Position opening failed, flattening both venues', error instanceof Error ? error : undefined, correlationId, { token });

      let rollbackSuccess = await this.emergencyRollback(token, correlationId);
      if (timedOut) {
        // Legs still in flight can fill after the first flatten
        rollbackSuccess = await this.reconcileLateLegs(attempt, token, correlationId);
      }

      const filler = (plan: LegPlan): LegResult =>
        this.failedLeg(plan, message, timedOut ? 'TIMEOUT' : 'UNEXPECTED_EXCEPTION');
      const legA = legs.A ?? filler(planA);
      const legB = legs.B ?? filler(planB);

      if (!rollbackSuccess) {
        this.logger.fatal('Failed open not confirmed flat: unhedged exposure possible', undefined, correlationId, { token });
      }
      this.currentState = 'FAILED';
      return {
        success: false,
        state: 'FAILED',
        legA,
        legB,
        executionTimeMs: this.clock.now() - startedAt,
        errorMessage: message,
        rollbackPerformed: true,
        rollbackSuccess,
      };
    }

    const legA = legs.A ?? this.failedLeg(planA, 'Leg result missing', 'UNEXPECTED_EXCEPTION');
    const legB = legs.B ?? this.failedLeg(planB, 'Leg result missing', 'UNEXPECTED_EXCEPTION');

    if (legA.success && legB.success) {
      this.currentState = 'COMPLETE';
      this.logger.info('Position pair opened', correlationId, {
        token,
        size,
        fillPriceA: this.fillPrice(legA.tradeResult, price),
        fillPriceB: this.fillPrice(legB.tradeResult, price),
      });
      return {
        success: true,
        state: 'COMPLETE',
        legA,
        legB,
        executionTimeMs: this.clock.now() - startedAt,
        rollbackPerformed: false,
        rollbackSuccess: true,
      };
    }

    return this.handleFailure(token, legA, legB, startedAt, correlationId);
  }

  /**
   * Close both legs concurrently. Best effort: a failed close is reported,
   * never compensated.
   */
  async closePositions(
    token: string,
    sizeA?: number,
    sizeB?: number,
    context: CloseContext = {},
  ): Promise<ExecutionResult> {
    const { correlationId } = context;
    const startedAt = this.clock.now();
    const [resultA, resultB] = await Promise.allSettled([
      this.closeOn(this.venues.A, token, sizeA),
      this.closeOn(this.venues.B, token, sizeB),
    ]);

    const legA = this.closeLeg('A', this.venues.A, resultA, context.sideA);
    const legB = this.closeLeg('B', this.venues.B, resultB, context.sideB);
    const bothClosed = legA.success && legB.success;

    if (bothClosed) {
      this.logger.info('Both positions closed', correlationId, { token });
    } else {
      this.logger.error('Position close incomplete', undefined, correlationId, {
        token,
        closedA: legA.success,
        closedB: legB.success,
        errorA: legA.error,
        errorB: legB.error,
      });
    }

    return {
      success: bothClosed,
      state: bothClosed ? 'COMPLETE' : 'FAILED',
      legA,
      legB,
      executionTimeMs: this.clock.now() - startedAt,
      errorMessage: bothClosed ? undefined : 'One or both closes failed',
      rollbackPerformed: false,
      rollbackSuccess: true,
    };
  }

  private async applyLeverage(token: string, leverage: number, correlationId?: string): Promise<void> {
    const results = await Promise.allSettled([
      this.leverageOn(this.venues.A, token, leverage),
      this.leverageOn(this.venues.B, token, leverage),
    ]);
    results.forEach((result, index) => {
      const venue = index === 0 ? this.venues.A.name : this.venues.B.name;
      if (result.status === 'rejected') {
        this.logger.warn('Failed to set leverage, continuing', correlationId, {
          venue,
          leverage,
          error: messageOf(result.reason),
        });
      } else if (!result.value) {
        this.logger.warn('Venue declined leverage change, continuing', correlationId, { venue, leverage });
      }
    });
  }

  private async openParallel(
    token: string,
    size: number,
    price: number,
    planA: LegPlan,
    planB: LegPlan,
    legs: { A?: LegResult; B?: LegResult },
  ): Promise<void> {
    this.currentState = 'OPENING_FIRST';
    const [legA, legB] = await Promise.all([
      this.placeLeg(planA, token, size, price),
      this.placeLeg(planB, token, size, price),
    ]);
    legs.A = legA;
    legs.B = legB;
  }

  private async openSequential(
    token: string,
    size: number,
    price: number,
    planA: LegPlan,
    planB: LegPlan,
    legs: { A?: LegResult; B?: LegResult },
    signal: AbortSignal,
  ): Promise<void> {
    this.currentState = 'OPENING_FIRST';
    legs.A = await this.placeLeg(planA, token, size, price);
    if (!legs.A.success) {
      legs.B = this.failedLeg(planB, 'Not attempted - first leg failed', 'NOT_ATTEMPTED');
      return;
    }
    if (signal.aborted) {
      legs.B = this.failedLeg(planB, 'Not attempted - open aborted', 'NOT_ATTEMPTED');
      return;
    }
    this.currentState = 'OPENING_SECOND';
    legs.B = await this.placeLeg(planB, token, size, price);
  }

  /**
   * Never rejects: exceptions become failed leg results.
   */
  private async placeLeg(plan: LegPlan, token: string, size: number, price: number): Promise<LegResult> {
    const slippage = this.config.maxSlippagePercent / 100;
    const protectivePrice = plan.side === 'LONG' ? price * (1 + slippage) : price * (1 - slippage);

    try {
      const trade = await plan.gateway.placeOrder({
        symbol: plan.gateway.getMarketSymbol(token),
        side: plan.side,
        quantity: size,
        type: 'MARKET',
        price: protectivePrice,
        timeInForce: 'IOC',
        externalId: this.random.generateExternalId(),
      });
      if (trade.success) {
        return { slot: plan.slot, venue: plan.gateway.name, side: plan.side, success: true, tradeResult: trade };
      }
      return {
        ...this.failedLeg(plan, trade.errorMessage ?? 'Order rejected', 'EXCHANGE_REJECTED'),
        tradeResult: trade,
      };
    } catch (error) {
      return this.failedLeg(plan, messageOf(error), errorKindOf(error));
    }
  }

  /**
   * Compensate a half-open pair by closing the leg that filled
   */
  private async handleFailure(
    token: string,
    legA: LegResult,
    legB: LegResult,
    startedAt: number,
    correlationId?: string,
  ): Promise<ExecutionResult> {
    // A timed-out leg may still have filled; only a full flatten is safe
    if (legA.errorKind === 'TIMEOUT' || legB.errorKind === 'TIMEOUT') {
      const flattened = await this.emergencyRollback(token, correlationId);
      const rollbackSuccess = flattened && (await this.venuesFlat(token, correlationId));
      this.currentState = 'FAILED';
      return {
        success: false,
        state: 'FAILED',
        legA,
        legB,
        executionTimeMs: this.clock.now() - startedAt,
        errorMessage: 'Execution timeout',
        rollbackPerformed: true,
        rollbackSuccess,
      };
    }

    this.currentState = 'ROLLING_BACK';
    const filled = legA.success ? legA : legB.success ? legB : undefined;
    let rollbackSuccess = true;

    if (filled) {
      const gateway = this.venues[filled.slot];
      this.logger.warn(`Rolling back ${gateway.name} position`, correlationId, { token, side: filled.side });
      try {
        const close = await gateway.closePosition(gateway.getMarketSymbol(token));
        rollbackSuccess = close.success;
        if (!close.success) {
          this.logger.error(`${gateway.name} rollback rejected`, undefined, correlationId, {
            error: close.errorMessage,
          });
        }
      } catch (error) {
        rollbackSuccess = false;
        this.logger.error(`${gateway.name} rollback failed`, error instanceof Error ? error : undefined, correlationId);
      }
    }

    if (!rollbackSuccess) {
      this.logger.fatal('Rollback failed: unhedged exposure remains', undefined, correlationId, {
        token,
        venue: filled?.venue,
        side: filled?.side,
      });
    }

    const finalState: ExecutionState = rollbackSuccess ? 'ROLLED_BACK' : 'FAILED';
    this.currentState = finalState;

    const errors: string[] = [];
    if (!legA.success) errors.push(`${legA.venue}: ${legA.error}`);
    if (!legB.success) errors.push(`${legB.venue}: ${legB.error}`);

    return {
      success: false,
      state: finalState,
      legA,
      legB,
      executionTimeMs: this.clock.now() - startedAt,
      errorMessage: errors.join('; '),
      rollbackPerformed: filled !== undefined,
      rollbackSuccess,
    };
  }

  /**
   * Cancel open orders then close positions on both venues. Safe to repeat.
   */
  private async emergencyRollback(token: string, correlationId?: string): Promise<boolean> {
    this.currentState = 'ROLLING_BACK';
    this.logger.warn('Performing emergency rollback', correlationId, { token });
    let success = true;

    for (const gateway of [this.venues.A, this.venues.B]) {
      try {
        await gateway.cancelAllOrders(gateway.getMarketSymbol(token));
      } catch (error) {
        success = false;
        this.logger.error(`Failed to cancel ${gateway.name} orders`, error instanceof Error ? error : undefined, correlationId);
      }
    }

    for (const gateway of [this.venues.A, this.venues.B]) {
      try {
        const close = await gateway.closePosition(gateway.getMarketSymbol(token));
        if (!close.success) {
          success = false;
          this.logger.error(`Failed to close ${gateway.name} position`, undefined, correlationId, {
            error: close.errorMessage,
          });
        }
      } catch (error) {
        success = false;
        this.logger.error(`Failed to close ${gateway.name} position`, error instanceof Error ? error : undefined, correlationId);
      }
    }

    return success;
  }

  /**
   * Wait for a timed-out attempt to settle, then flatten again and confirm
   * neither venue holds the token. An attempt that never settles leaves its
   * legs unknown, which counts as a failed rollback.
   */
  private async reconcileLateLegs(attempt: Promise<void>, token: string, correlationId?: string): Promise<boolean> {
    try {
      await withTimeout(attempt, this.config.settleTimeoutMs, 'Open attempt did not settle');
    } catch (error) {
      this.logger.error('Open attempt still in flight after flatten', error instanceof Error ? error : undefined, correlationId, { token });
      return false;
    }
    const flattened = await this.emergencyRollback(token, correlationId);
    return flattened && (await this.venuesFlat(token, correlationId));
  }

  private async venuesFlat(token: string, correlationId?: string): Promise<boolean> {
    let flat = true;
    for (const gateway of [this.venues.A, this.venues.B]) {
      try {
        const positions = await gateway.getPositions(gateway.getMarketSymbol(token));
        if (positions.some((position) => position.size > 0)) {
          flat = false;
          this.logger.error(`${gateway.name} still holds ${token} after flatten`, undefined, correlationId);
        }
      } catch (error) {
        flat = false;
        this.logger.error(`Failed to verify ${gateway.name} positions`, error instanceof Error ? error : undefined, correlationId);
      }
    }
    return flat;
  }

  private async closeOn(gateway: IVenueGateway, token: string, size?: number): Promise<TradeResult> {
    return gateway.closePosition(gateway.getMarketSymbol(token), size);
  }

  private async leverageOn(gateway: IVenueGateway, token: string, leverage: number): Promise<boolean> {
    return gateway.setLeverage(gateway.getMarketSymbol(token), leverage);
  }

  private closeLeg(
    slot: VenueSlot,
    gateway: IVenueGateway,
    settled: PromiseSettledResult<TradeResult>,
    side?: PositionSide,
  ): LegResult {
    if (settled.status === 'rejected') {
      return {
        slot,
        venue: gateway.name,
        side,
        success: false,
        error: messageOf(settled.reason),
        errorKind: errorKindOf(settled.reason),
      };
    }
    const trade = settled.value;
    return {
      slot,
      venue: gateway.name,
      side,
      success: trade.success,
      tradeResult: trade,
      error: trade.success ? undefined : trade.errorMessage ?? 'Close rejected',
      errorKind: trade.success ? undefined : 'EXCHANGE_REJECTED',
    };
  }

  private failedLeg(plan: LegPlan, error: string, errorKind: LegErrorKind): LegResult {
    return {
      slot: plan.slot,
      venue: plan.gateway.name,
      side: plan.side,
      success: false,
      error,
      errorKind,
    };
  }

  private fillPrice(trade: TradeResult | undefined, fallback: number): number {
    return trade && trade.averagePrice > 0 ? trade.averagePrice : fallback;
  }
}
