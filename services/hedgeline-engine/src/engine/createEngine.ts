import { Clock, Logger, RateLimiter, SystemClock } from '@hedgeline/shared';

import {
  type EngineConfig,
  toAtomicConfig,
  toFundingAnalyzerConfig,
  toGuardedVenueConfig,
  toOrchestratorConfig,
  toRandomizationConfig,
  toRateLimiterConfig,
  toRiskConfig,
  toSafetyConfig,
  toSizerConfig,
} from '../config/EngineConfig';
import { GuardedVenueGateway } from '../exchanges/GuardedVenueGateway';
import type { IVenueGateway, VenuePair } from '../exchanges/interfaces';
import { SimulatedVenueGateway } from '../exchanges/SimulatedVenueGateway';
import { AtomicExecutor } from '../execution/AtomicExecutor';
import { FundingAnalyzer } from '../funding/FundingAnalyzer';
import { PnLCalculator } from '../pnl/PnLCalculator';
import { SecureRandomSource } from '../random/SecureRandomSource';
import { RiskValidator } from '../risk/RiskValidator';
import { SafetyMonitor } from '../safety/SafetyMonitor';
import { PositionSizer } from '../sizing/PositionSizer';
import { CycleOrchestrator } from './CycleOrchestrator';

export interface EngineOptions {
  logger?: Logger;
  clock?: Clock;
  /** Process exit used when a signal arrives during an emergency */
  exit?: (code: number) => void;
}

/**
 * Put a venue behind its own rate limiter and the read-retry policy
 */
export function guardVenue(
  venue: IVenueGateway,
  config: EngineConfig,
  logger: Logger,
  clock: Clock = new SystemClock(),
): GuardedVenueGateway {
  const guarded = toGuardedVenueConfig(config);
  return new GuardedVenueGateway(
    venue,
    new RateLimiter(toRateLimiterConfig(config), clock),
    { ...guarded, retry: { ...guarded.retry, clock } },
    logger.child(`venue:${venue.name}`),
  );
}

/**
 * Two in-memory venues funded with the simulated balance
 */
export function createSimulatedVenues(
  config: EngineConfig,
  clock: Clock = new SystemClock(),
): { A: SimulatedVenueGateway; B: SimulatedVenueGateway } {
  const common = {
    balanceUsd: config.simulation.balanceUsd,
    feeRate: config.simulation.feeRate,
  };
  return {
    A: new SimulatedVenueGateway({ ...common, name: 'sim-a', symbolSuffix: '-USD' }, clock),
    B: new SimulatedVenueGateway({ ...common, name: 'sim-b', symbolSuffix: '' }, clock),
  };
}

/**
 * Wire every component from one validated configuration
 */
export function createEngine(
  config: EngineConfig,
  venues: VenuePair,
  options: EngineOptions = {},
): CycleOrchestrator {
  const logger = options.logger ?? Logger.getInstance('hedgeline-engine');
  const clock = options.clock ?? new SystemClock();
  const random = new SecureRandomSource(toRandomizationConfig(config));

  const safety = new SafetyMonitor(
    venues,
    toSafetyConfig(config),
    logger.child('safety'),
    clock,
    options.exit,
  );

  return new CycleOrchestrator(
    venues,
    toOrchestratorConfig(config),
    {
      random,
      fundingAnalyzer: new FundingAnalyzer(toFundingAnalyzerConfig(config)),
      sizer: new PositionSizer(toSizerConfig(config)),
      riskValidator: new RiskValidator(toRiskConfig(config)),
      executor: new AtomicExecutor(venues, toAtomicConfig(config), random, logger.child('executor'), clock),
      safety,
      pnl: new PnLCalculator(config.pnl.feeRate),
    },
    logger.child('orchestrator'),
    clock,
  );
}
