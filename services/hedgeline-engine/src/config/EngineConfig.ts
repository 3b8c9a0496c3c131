/**
 * Engine configuration schema
 *
 * Every field has a default, so `parseEngineConfig({})` yields a complete
 * simulation-mode configuration.
 */

import { DEFAULT_RATE_LIMITER_CONFIG, type RateLimiterConfig } from '@hedgeline/shared';
import { z } from 'zod';

import type { AtomicConfig } from '../execution/AtomicExecutor';
import type { GuardedVenueConfig } from '../exchanges/GuardedVenueGateway';
import type { OrchestratorConfig } from '../engine/CycleOrchestrator';
import type { FundingAnalyzerConfig } from '../funding/FundingAnalyzer';
import type { RandomizationConfig } from '../random/SecureRandomSource';
import type { RiskValidatorConfig } from '../risk/RiskValidator';
import type { SafetyMonitorConfig } from '../safety/SafetyMonitor';
import type { PositionSizerConfig } from '../sizing/PositionSizer';

export const SUPPORTED_TOKENS = ['BTC', 'ETH', 'SOL', 'HYPE'] as const;

const probability = z.number().min(0).max(1);
const positiveSeconds = z.number().int().positive();

export const RandomizationSchema = z.object({
  minEquityUsage: z.number().gt(0).max(1).default(0.4),
  maxEquityUsage: z.number().gt(0).max(1).default(0.8),
  minLeverage: z.number().int().min(1).default(10),
  maxLeverage: z.number().int().min(1).default(20),
  minHoldSeconds: positiveSeconds.default(1200),
  maxHoldSeconds: positiveSeconds.default(7200),
  minCooldownSeconds: z.number().int().min(0).default(600),
  maxCooldownSeconds: z.number().int().min(0).default(3600),
});

export const FundingSchema = z.object({
  smallThreshold: z.number().positive().default(0.0001),
  moderateThreshold: z.number().positive().default(0.0005),
  weights: z
    .object({
      SMALL: probability.default(0.5),
      MODERATE: probability.default(0.6),
      LARGE: probability.default(0.75),
    })
    .default({}),
  minMeaningfulDifference: z.number().min(0).default(0.00001),
});

export const SizingSchema = z.object({
  minPositionValueUsd: z.number().min(0).default(10),
  maxPositionValueUsd: z.number().positive().default(100_000),
  safetyBuffer: z.number().gt(0).max(1).default(0.95),
  sizePrecision: z.number().int().min(0).max(12).default(6),
});

export const RiskSchema = z.object({
  minBalanceUsd: z.number().min(0).default(100),
  minMarginRatio: z.number().min(0).default(0.2),
  minLiquidationDistance: z.number().min(0).max(1).default(0.03),
  warnLiquidationDistance: z.number().min(0).max(1).default(0.05),
  softLeverageThreshold: z.number().positive().default(15),
});

export const ExecutionSchema = z.object({
  parallelOpen: z.boolean().default(true),
  orderTimeoutSeconds: positiveSeconds.default(60),
  apiTimeoutSeconds: positiveSeconds.default(30),
  maxSlippagePercent: z.number().min(0).max(100).default(0.5),
  retryAttempts: z.number().int().min(1).max(10).default(3),
  retryInitialDelayMs: z.number().int().min(0).default(1000),
  retryMaxDelayMs: z.number().int().min(0).default(10_000),
  requestsPerMinute: z.number().positive().default(DEFAULT_RATE_LIMITER_CONFIG.requestsPerMinute),
  burst: z.number().int().min(1).default(DEFAULT_RATE_LIMITER_CONFIG.burst),
});

export const SafetySchema = z.object({
  maxConsecutiveFailures: z.number().int().min(1).default(3),
  checkIntervalSeconds: z.number().positive().default(5),
  sizeImbalanceTolerance: z.number().min(0).max(1).default(0.01),
});

export const OrchestratorSchema = z.object({
  holdPollIntervalSeconds: z.number().positive().default(30),
  fundingIntervalSeconds: positiveSeconds.default(28_800),
  installSignalHandlers: z.boolean().default(true),
  runSafetyLoop: z.boolean().default(true),
});

export const SimulationSchema = z.object({
  enabled: z.boolean().default(true),
  balanceUsd: z.number().min(0).default(10_000),
  feeRate: z.number().min(0).max(0.01).default(0),
});

export const PnLSchema = z.object({
  feeRate: z.number().min(0).max(0.01).default(0.0005),
});

export const EngineConfigSchema = z
  .object({
    tokens: z.array(z.string().min(1)).min(1).default([...SUPPORTED_TOKENS]),
    randomization: RandomizationSchema.default({}),
    funding: FundingSchema.default({}),
    sizing: SizingSchema.default({}),
    risk: RiskSchema.default({}),
    execution: ExecutionSchema.default({}),
    safety: SafetySchema.default({}),
    orchestrator: OrchestratorSchema.default({}),
    simulation: SimulationSchema.default({}),
    pnl: PnLSchema.default({}),
  })
  .superRefine((config, ctx) => {
    const ranges: Array<[string, string, number, number]> = [
      ['randomization', 'EquityUsage', config.randomization.minEquityUsage, config.randomization.maxEquityUsage],
      ['randomization', 'Leverage', config.randomization.minLeverage, config.randomization.maxLeverage],
      ['randomization', 'HoldSeconds', config.randomization.minHoldSeconds, config.randomization.maxHoldSeconds],
      [
        'randomization',
        'CooldownSeconds',
        config.randomization.minCooldownSeconds,
        config.randomization.maxCooldownSeconds,
      ],
      ['sizing', 'PositionValueUsd', config.sizing.minPositionValueUsd, config.sizing.maxPositionValueUsd],
      ['funding', 'Threshold', config.funding.smallThreshold, config.funding.moderateThreshold],
      ['execution', 'Delay', config.execution.retryInitialDelayMs, config.execution.retryMaxDelayMs],
      ['risk', 'LiquidationDistance', config.risk.minLiquidationDistance, config.risk.warnLiquidationDistance],
    ];
    for (const [section, field, min, max] of ranges) {
      if (min > max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `min${field} (${min}) must not exceed max${field} (${max})`,
          path: [section],
        });
      }
    }
  });

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid engine configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

export function parseEngineConfig(input: unknown = {}): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.issues.map((issue) =>
        issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    );
  }
  return parsed.data;
}

export function toRandomizationConfig(config: EngineConfig): RandomizationConfig {
  return {
    ...config.randomization,
    bias: {
      smallThreshold: config.funding.smallThreshold,
      moderateThreshold: config.funding.moderateThreshold,
      weights: config.funding.weights,
    },
  };
}

export function toFundingAnalyzerConfig(config: EngineConfig): FundingAnalyzerConfig {
  return {
    bias: toRandomizationConfig(config).bias,
    minMeaningfulDifference: config.funding.minMeaningfulDifference,
  };
}

export function toSizerConfig(config: EngineConfig): PositionSizerConfig {
  return { ...config.sizing };
}

export function toRiskConfig(config: EngineConfig): RiskValidatorConfig {
  return {
    ...config.risk,
    maxPositionValueUsd: config.sizing.maxPositionValueUsd,
    minLeverage: config.randomization.minLeverage,
    maxLeverage: config.randomization.maxLeverage,
  };
}

export function toAtomicConfig(config: EngineConfig): AtomicConfig {
  return {
    parallelOpen: config.execution.parallelOpen,
    openTimeoutMs: config.execution.orderTimeoutSeconds * 1000,
    settleTimeoutMs: config.execution.apiTimeoutSeconds * 1000,
    maxSlippagePercent: config.execution.maxSlippagePercent,
  };
}

export function toGuardedVenueConfig(config: EngineConfig): GuardedVenueConfig {
  return {
    apiTimeoutMs: config.execution.apiTimeoutSeconds * 1000,
    retry: {
      maxRetries: config.execution.retryAttempts - 1,
      initialDelayMs: config.execution.retryInitialDelayMs,
      maxDelayMs: config.execution.retryMaxDelayMs,
    },
  };
}

export function toRateLimiterConfig(config: EngineConfig): RateLimiterConfig {
  return {
    requestsPerMinute: config.execution.requestsPerMinute,
    burst: config.execution.burst,
  };
}

export function toSafetyConfig(config: EngineConfig): SafetyMonitorConfig {
  return {
    maxConsecutiveFailures: config.safety.maxConsecutiveFailures,
    checkIntervalMs: config.safety.checkIntervalSeconds * 1000,
    sizeImbalanceTolerance: config.safety.sizeImbalanceTolerance,
  };
}

export function toOrchestratorConfig(config: EngineConfig): OrchestratorConfig {
  return {
    tokens: config.tokens,
    holdPollIntervalMs: config.orchestrator.holdPollIntervalSeconds * 1000,
    fundingIntervalSeconds: config.orchestrator.fundingIntervalSeconds,
    simulationMode: config.simulation.enabled,
    installSignalHandlers: config.orchestrator.installSignalHandlers,
    runSafetyLoop: config.orchestrator.runSafetyLoop,
  };
}
