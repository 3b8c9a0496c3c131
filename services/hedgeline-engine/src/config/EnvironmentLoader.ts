import { type EngineConfig, parseEngineConfig } from './EngineConfig';

type Env = Record<string, string | undefined>;

const number = (env: Env, key: string): number | undefined => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  // NaN is rejected by the schema with the offending path
  return Number(raw);
};

const boolean = (env: Env, key: string): boolean | undefined => {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === '') {
    return undefined;
  }
  return raw === 'true' || raw === '1' || raw === 'yes';
};

const list = (env: Env, key: string): string[] | undefined => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  return raw
    .split(',')
    .map((item) => item.trim().toUpperCase())
    .filter((item) => item.length > 0);
};

/**
 * Drop undefined leaves so schema defaults apply
 */
function compact(section: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(section).filter(([, value]) => value !== undefined));
}

/**
 * Build the engine configuration from HEDGELINE_* variables. Unset
 * variables fall back to the schema defaults.
 */
export function loadConfigFromEnvironment(env: Env = process.env): EngineConfig {
  return parseEngineConfig(
    compact({
      tokens: list(env, 'HEDGELINE_TOKENS'),
      randomization: compact({
        minEquityUsage: number(env, 'HEDGELINE_MIN_EQUITY_USAGE'),
        maxEquityUsage: number(env, 'HEDGELINE_MAX_EQUITY_USAGE'),
        minLeverage: number(env, 'HEDGELINE_MIN_LEVERAGE'),
        maxLeverage: number(env, 'HEDGELINE_MAX_LEVERAGE'),
        minHoldSeconds: number(env, 'HEDGELINE_MIN_HOLD_SECONDS'),
        maxHoldSeconds: number(env, 'HEDGELINE_MAX_HOLD_SECONDS'),
        minCooldownSeconds: number(env, 'HEDGELINE_MIN_COOLDOWN_SECONDS'),
        maxCooldownSeconds: number(env, 'HEDGELINE_MAX_COOLDOWN_SECONDS'),
      }),
      sizing: compact({
        maxPositionValueUsd: number(env, 'HEDGELINE_MAX_POSITION_USD'),
      }),
      risk: compact({
        minBalanceUsd: number(env, 'HEDGELINE_MIN_BALANCE_USD'),
      }),
      execution: compact({
        parallelOpen: boolean(env, 'HEDGELINE_PARALLEL_OPEN'),
        maxSlippagePercent: number(env, 'HEDGELINE_MAX_SLIPPAGE_PERCENT'),
        apiTimeoutSeconds: number(env, 'HEDGELINE_API_TIMEOUT_SECONDS'),
        orderTimeoutSeconds: number(env, 'HEDGELINE_ORDER_TIMEOUT_SECONDS'),
        requestsPerMinute: number(env, 'HEDGELINE_REQUESTS_PER_MINUTE'),
      }),
      safety: compact({
        maxConsecutiveFailures: number(env, 'HEDGELINE_MAX_CONSECUTIVE_FAILURES'),
      }),
      simulation: compact({
        enabled: boolean(env, 'HEDGELINE_SIMULATION_MODE'),
        balanceUsd: number(env, 'HEDGELINE_SIMULATION_BALANCE_USD'),
      }),
    }),
  );
}
