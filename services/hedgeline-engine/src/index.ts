/**
 * Delta-neutral funding-rate execution engine
 */
export * from './types';

export * from './config/EngineConfig';
export * from './config/EnvironmentLoader';
export * from './config/liveMode';

export * from './exchanges/interfaces';
export * from './exchanges/VenueError';
export * from './exchanges/GuardedVenueGateway';
export * from './exchanges/SimulatedVenueGateway';

export * from './random/SecureRandomSource';
export * from './funding/FundingAnalyzer';
export * from './funding/bias';
export * from './sizing/PositionSizer';
export * from './risk/RiskValidator';
export * from './pnl/PnLCalculator';

export * from './execution/timeout';
export * from './execution/AtomicExecutor';
export * from './safety/SafetyState';
export * from './safety/SafetyMonitor';

export * from './engine/CycleResultAccumulator';
export * from './engine/CycleOrchestrator';
export * from './engine/createEngine';
