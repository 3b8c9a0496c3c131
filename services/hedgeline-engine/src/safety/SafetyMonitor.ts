import { Clock, Logger, SystemClock } from '@hedgeline/shared';

import type { IVenueGateway, VenuePair } from '../exchanges/interfaces';
import type {
  ClosedPositionRecord,
  EmergencyAction,
  EmergencyReason,
  ExposureReport,
} from '../types/safety';
import type { PositionInfo } from '../types/venues';
import { SafetyState } from './SafetyState';

/**
 * Safety Monitor Configuration
 */
export interface SafetyMonitorConfig {
  maxConsecutiveFailures: number;
  /** Interval between watchdog checks in ms */
  checkIntervalMs: number;
  /** Relative size mismatch tolerated between the two legs */
  sizeImbalanceTolerance: number;
}

export const DEFAULT_SAFETY_CONFIG: SafetyMonitorConfig = {
  maxConsecutiveFailures: 3,
  checkIntervalMs: 5000,
  sizeImbalanceTolerance: 0.01,
};

/**
 * Where signal handlers are installed. `process` satisfies it.
 */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

export type EmergencyCallback = (action: EmergencyAction) => void;

const HANDLED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Safety Monitor
 *
 * Counts consecutive cycle failures, watches the monitored tokens for
 * unhedged exposure and runs the emergency liquidation sweep. Once an
 * emergency has started it cannot be cleared.
 */
export class SafetyMonitor {
  private readonly venues: VenuePair;
  private readonly config: SafetyMonitorConfig;
  private readonly state: SafetyState;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly exit: (code: number) => void;
  private emergencyCallback?: EmergencyCallback;
  private emergencySweep?: Promise<EmergencyAction>;
  private loopController?: AbortController;
  private signalSource?: SignalSource;
  private readonly signalListeners = new Map<NodeJS.Signals, () => void>();

  constructor(
    venues: VenuePair,
    config: SafetyMonitorConfig = DEFAULT_SAFETY_CONFIG,
    logger: Logger = Logger.getInstance('safety-monitor'),
    clock: Clock = new SystemClock(),
    exit: (code: number) => void = (code) => process.exit(code),
    state: SafetyState = new SafetyState(config.maxConsecutiveFailures),
  ) {
    this.venues = venues;
    this.config = config;
    this.logger = logger;
    this.clock = clock;
    this.exit = exit;
    this.state = state;
  }

  get shutdownRequested(): boolean {
    return this.state.shutdownRequested;
  }

  get emergencyTriggered(): boolean {
    return this.state.emergencyTriggered;
  }

  get consecutiveFailures(): number {
    return this.state.failureCount;
  }

  getState(): SafetyState {
    return this.state;
  }

  setEmergencyCallback(callback: EmergencyCallback): void {
    this.emergencyCallback = callback;
  }

  requestShutdown(): void {
    this.state.requestShutdown();
  }

  /**
   * @returns true when the failure ceiling is reached
   */
  recordFailure(): boolean {
    const reached = this.state.recordFailure();
    this.logger.warn('Cycle failure recorded', undefined, {
      count: this.state.failureCount,
      max: this.state.failureCeiling,
    });
    if (reached) {
      this.logger.error('Maximum consecutive failures reached');
    }
    return reached;
  }

  recordSuccess(): void {
    this.state.recordSuccess();
  }

  addMonitoredToken(token: string): void {
    this.state.addMonitoredToken(token);
  }

  removeMonitoredToken(token: string): void {
    this.state.removeMonitoredToken(token);
  }

  beginAtomicAction(token: string): void {
    this.state.beginAtomicAction(token);
  }

  endAtomicAction(token: string): void {
    this.state.endAtomicAction(token);
  }

  /**
   * Compare the monitored tokens across both venues. Tokens whose legs are
   * being opened or closed right now are skipped.
   */
  async checkExposure(): Promise<ExposureReport> {
    const checkedTokens = this.state
      .monitoredTokens()
      .filter((token) => !this.state.isAtomicActionInFlight(token));
    const issues: string[] = [];
    const warnings: string[] = [];

    let positionsA: PositionInfo[];
    let positionsB: PositionInfo[];
    try {
      [positionsA, positionsB] = await Promise.all([
        this.venues.A.getPositions(),
        this.venues.B.getPositions(),
      ]);
    } catch (error) {
      this.logger.error('Exposure check failed', error instanceof Error ? error : undefined);
      return {
        balanced: false,
        issues: [`Exposure check failed: ${messageOf(error)}`],
        warnings,
        checkedTokens,
      };
    }

    for (const token of checkedTokens) {
      const symbolA = this.venues.A.getMarketSymbol(token);
      const symbolB = this.venues.B.getMarketSymbol(token);
      const legA = positionsA.find((position) => position.symbol === symbolA && position.size > 0);
      const legB = positionsB.find((position) => position.symbol === symbolB && position.size > 0);

      if (!legA && !legB) {
        continue;
      }
      if (!legA || !legB) {
        issues.push(`${token}: unhedged exposure (A=${legA !== undefined}, B=${legB !== undefined})`);
        this.logger.error('Unhedged exposure detected', undefined, undefined, {
          token,
          venueA: legA !== undefined,
          venueB: legB !== undefined,
        });
        continue;
      }
      if (legA.side === legB.side) {
        issues.push(`${token}: same-side exposure (${legA.side})`);
        this.logger.error('Same-side exposure detected', undefined, undefined, { token, side: legA.side });
        continue;
      }

      const largest = Math.max(legA.size, legB.size);
      const imbalance = Math.abs(legA.size - legB.size) / largest;
      if (imbalance > this.config.sizeImbalanceTolerance) {
        warnings.push(`${token}: size imbalance ${legA.size} vs ${legB.size}`);
        this.logger.warn('Size imbalance detected', undefined, {
          token,
          sizeA: legA.size,
          sizeB: legB.size,
        });
      }
    }

    return { balanced: issues.length === 0, issues, warnings, checkedTokens };
  }

  /**
   * Cancel every order and close every position on both venues. One-way:
   * the emergency flag stays set. Concurrent callers share one sweep.
   */
  executeEmergency(reason: EmergencyReason): Promise<EmergencyAction> {
    if (this.emergencySweep) {
      return this.emergencySweep;
    }
    this.state.triggerEmergency();
    this.emergencySweep = this.sweep(reason);
    return this.emergencySweep;
  }

  async verifyAllClosed(): Promise<boolean> {
    try {
      const [positionsA, positionsB] = await Promise.all([
        this.venues.A.getPositions(),
        this.venues.B.getPositions(),
      ]);
      if (positionsA.length > 0) {
        this.logger.warn(`${this.venues.A.name} still has positions`, undefined, { count: positionsA.length });
        return false;
      }
      if (positionsB.length > 0) {
        this.logger.warn(`${this.venues.B.name} still has positions`, undefined, { count: positionsB.length });
        return false;
      }
      return true;
    } catch (error) {
      this.logger.error('Position verification failed', error instanceof Error ? error : undefined);
      return false;
    }
  }

  installSignalHandlers(source: SignalSource = process): void {
    if (this.signalSource) {
      return;
    }
    this.signalSource = source;
    for (const signal of HANDLED_SIGNALS) {
      const listener = (): void => this.handleSignal(signal);
      this.signalListeners.set(signal, listener);
      source.on(signal, listener);
    }
    this.logger.info('Safety monitor signal handlers installed');
  }

  removeSignalHandlers(): void {
    const source = this.signalSource;
    if (!source) {
      return;
    }
    for (const [signal, listener] of this.signalListeners) {
      source.off(signal, listener);
    }
    this.signalListeners.clear();
    this.signalSource = undefined;
  }

  /**
   * First signal asks for a graceful stop; a signal during an emergency
   * exits immediately.
   */
  handleSignal(signal: NodeJS.Signals): void {
    this.logger.warn(`Received ${signal} - initiating graceful shutdown`);
    this.state.requestShutdown();
    if (this.state.emergencyTriggered) {
      this.logger.warn('Emergency already in progress - forcing exit');
      this.exit(1);
    }
  }

  /**
   * Watchdog loop. Runs until stopSafetyLoop() or an emergency.
   */
  async runSafetyLoop(): Promise<void> {
    if (this.loopController) {
      return;
    }
    const controller = new AbortController();
    this.loopController = controller;

    try {
      while (!controller.signal.aborted && !this.state.emergencyTriggered) {
        const reason = await this.runSafetyCheck();
        if (reason) {
          await this.executeEmergency(reason);
          break;
        }
        await this.clock.sleep(this.config.checkIntervalMs, controller.signal);
      }
    } finally {
      if (this.loopController === controller) {
        this.loopController = undefined;
      }
    }
  }

  stopSafetyLoop(): void {
    this.loopController?.abort();
  }

  isSafetyLoopRunning(): boolean {
    return this.loopController !== undefined;
  }

  /**
   * One watchdog pass.
   *
   * @returns the emergency reason, if any
   */
  async runSafetyCheck(): Promise<EmergencyReason | undefined> {
    try {
      if (this.state.monitoredTokens().length > 0) {
        const report = await this.checkExposure();
        if (!report.balanced) {
          return 'UNHEDGED_EXPOSURE';
        }
      }
      for (const gateway of [this.venues.A, this.venues.B]) {
        if (!gateway.isConnected()) {
          this.logger.error(`${gateway.name} connection lost`);
          return 'CONNECTION_LOST';
        }
      }
    } catch (error) {
      this.logger.error('Safety check error', error instanceof Error ? error : undefined);
    }
    return undefined;
  }

  private async sweep(reason: EmergencyReason): Promise<EmergencyAction> {
    this.logger.fatal('Emergency shutdown initiated', undefined, undefined, { reason });
    this.logger.logEvent('emergency_start', { details: { reason } });
    const timestamp = this.clock.now();

    const results = await Promise.all([this.sweepVenue(this.venues.A), this.sweepVenue(this.venues.B)]);

    const action: EmergencyAction = {
      reason,
      timestamp,
      positionsClosed: results.flatMap((result) => result.closed),
      ordersCancelled: results.reduce((sum, result) => sum + result.cancelled, 0),
      success: results.every((result) => result.success),
      details: results.flatMap((result) => result.details).join('; '),
    };

    if (this.emergencyCallback) {
      try {
        this.emergencyCallback(action);
      } catch (error) {
        this.logger.error('Emergency callback failed', error instanceof Error ? error : undefined);
      }
    }

    this.logger.fatal('Emergency shutdown complete', undefined, undefined, {
      reason,
      positionsClosed: action.positionsClosed.length,
      ordersCancelled: action.ordersCancelled,
      success: action.success,
    });
    this.logger.logEvent('emergency_complete', {
      details: {
        reason,
        success: action.success,
        ordersCancelled: action.ordersCancelled,
        positionsClosed: action.positionsClosed.length,
      },
    });
    return action;
  }

  /**
   * Venues are swept independently so one outage never blocks the other.
   */
  private async sweepVenue(gateway: IVenueGateway): Promise<{
    cancelled: number;
    closed: ClosedPositionRecord[];
    success: boolean;
    details: string[];
  }> {
    let cancelled = 0;
    let success = true;
    const details: string[] = [];
    const closed: ClosedPositionRecord[] = [];

    try {
      cancelled = await gateway.cancelAllOrders();
      details.push(`${gateway.name}: cancelled ${cancelled} orders`);
    } catch (error) {
      success = false;
      details.push(`${gateway.name} order cancel failed: ${messageOf(error)}`);
      this.logger.error(`Failed to cancel ${gateway.name} orders`, error instanceof Error ? error : undefined);
    }

    let positions: PositionInfo[] = [];
    try {
      positions = await gateway.getPositions();
    } catch (error) {
      success = false;
      details.push(`${gateway.name} position listing failed: ${messageOf(error)}`);
      this.logger.error(`Failed to get ${gateway.name} positions`, error instanceof Error ? error : undefined);
    }

    for (const position of positions) {
      const record: ClosedPositionRecord = {
        venue: gateway.name,
        symbol: position.symbol,
        side: position.side,
        size: position.size,
        success: false,
      };
      try {
        const result = await gateway.closePosition(position.symbol);
        record.success = result.success;
        if (!result.success) {
          record.error = result.errorMessage ?? 'Close rejected';
        }
      } catch (error) {
        record.error = messageOf(error);
      }
      if (!record.success) {
        success = false;
        this.logger.error(`Failed to close ${gateway.name} position`, undefined, undefined, {
          symbol: position.symbol,
          error: record.error,
        });
      }
      closed.push(record);
    }

    return { cancelled, closed, success, details };
  }
}
