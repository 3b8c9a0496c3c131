import * as crypto from 'crypto';

import { classifyDifferential } from '../funding/bias';
import type { CycleParameters } from '../types/cycle';
import { type BiasConfig, DEFAULT_BIAS_CONFIG, type SideAssignment } from '../types/funding';
import { oppositeSide, otherSlot, type PositionSide, type VenueSlot } from '../types/venues';

/**
 * Entropy the source draws from. Production always uses the OS CSPRNG.
 */
export interface EntropySource {
  /** Uniform integer in [min, max) */
  randomInt(min: number, max: number): number;
  randomBytes(size: number): Buffer;
}

export const OS_ENTROPY: EntropySource = {
  randomInt: (min, max) => crypto.randomInt(min, max),
  randomBytes: (size) => crypto.randomBytes(size),
};

export interface RandomizationConfig {
  minEquityUsage: number;
  maxEquityUsage: number;
  minLeverage: number;
  maxLeverage: number;
  minHoldSeconds: number;
  maxHoldSeconds: number;
  minCooldownSeconds: number;
  maxCooldownSeconds: number;
  bias: BiasConfig;
}

export const DEFAULT_RANDOMIZATION_CONFIG: RandomizationConfig = {
  minEquityUsage: 0.4,
  maxEquityUsage: 0.8,
  minLeverage: 10,
  maxLeverage: 20,
  minHoldSeconds: 1200,
  maxHoldSeconds: 7200,
  minCooldownSeconds: 600,
  maxCooldownSeconds: 3600,
  bias: DEFAULT_BIAS_CONFIG,
};

/** Granularity of equity-usage draws */
const EQUITY_STEPS = 1000;
/** Resolution of biased side draws */
const BIAS_RESOLUTION = 1000;

/**
 * Secure Random Source
 *
 * Cycle parameters and side assignment come from OS entropy so cycles
 * cannot be predicted from earlier ones. There is no seed.
 */
export class SecureRandomSource {
  private readonly config: RandomizationConfig;
  private readonly entropy: EntropySource;

  constructor(
    config: RandomizationConfig = DEFAULT_RANDOMIZATION_CONFIG,
    entropy: EntropySource = OS_ENTROPY,
  ) {
    this.validateConfig(config);
    this.config = config;
    this.entropy = entropy;
  }

  getConfig(): Readonly<RandomizationConfig> {
    return this.config;
  }

  /**
   * Uniform choice from a non-empty list
   */
  selectToken(tokens: readonly string[]): string {
    if (tokens.length === 0) {
      throw new Error('Cannot select from an empty token list');
    }
    return tokens[this.entropy.randomInt(0, tokens.length)];
  }

  /**
   * min + (max - min) x step / 1000, step uniform in [0, 1000]
   */
  generateEquityUsage(): number {
    const { minEquityUsage, maxEquityUsage } = this.config;
    const step = this.entropy.randomInt(0, EQUITY_STEPS + 1);
    return minEquityUsage + ((maxEquityUsage - minEquityUsage) * step) / EQUITY_STEPS;
  }

  generateLeverage(): number {
    return this.inclusiveInt(this.config.minLeverage, this.config.maxLeverage);
  }

  generateHoldDuration(): number {
    return this.inclusiveInt(this.config.minHoldSeconds, this.config.maxHoldSeconds);
  }

  generateCooldown(): number {
    return this.inclusiveInt(this.config.minCooldownSeconds, this.config.maxCooldownSeconds);
  }

  generateCycleParameters(tokens: readonly string[]): CycleParameters {
    return Object.freeze({
      token: this.selectToken(tokens),
      equityUsage: this.generateEquityUsage(),
      leverage: this.generateLeverage(),
      holdDurationSeconds: this.generateHoldDuration(),
      cooldownSeconds: this.generateCooldown(),
    });
  }

  /**
   * Fair coin: which venue takes the long
   */
  assignSidesRandom(): { sideA: PositionSide; sideB: PositionSide } {
    return this.entropy.randomInt(0, 2) === 0
      ? { sideA: 'LONG', sideB: 'SHORT' }
      : { sideA: 'SHORT', sideB: 'LONG' };
  }

  /**
   * Side assignment skewed toward shorting the higher-funding venue.
   *
   * The favorable assignment is taken with the band's weight, never with
   * certainty.
   */
  assignSidesWithBias(rateA: number, rateB: number): SideAssignment {
    const biasStrength = classifyDifferential(rateA - rateB, this.config.bias);
    const weight = this.config.bias.weights[biasStrength];
    const threshold = Math.floor(weight * BIAS_RESOLUTION);
    const followedBias = this.entropy.randomInt(0, BIAS_RESOLUTION) < threshold;

    const favoredShort: VenueSlot = rateA > rateB ? 'A' : 'B';
    const shortSlot: VenueSlot = followedBias ? favoredShort : otherSlot(favoredShort);
    const sideA: PositionSide = shortSlot === 'A' ? 'SHORT' : 'LONG';

    return {
      sideA,
      sideB: oppositeSide(sideA),
      biasStrength,
      favoredShort,
      followedBias,
    };
  }

  /**
   * 64-bit random nonce
   */
  generateNonce(): bigint {
    return this.entropy.randomBytes(8).readBigUInt64BE(0);
  }

  /**
   * 128-bit client order id as 32 hex characters
   */
  generateExternalId(): string {
    return this.entropy.randomBytes(16).toString('hex');
  }

  private inclusiveInt(min: number, max: number): number {
    return min + this.entropy.randomInt(0, max - min + 1);
  }

  private validateConfig(config: RandomizationConfig): void {
    const ranges: Array<[string, number, number]> = [
      ['equity usage', config.minEquityUsage, config.maxEquityUsage],
      ['leverage', config.minLeverage, config.maxLeverage],
      ['hold duration', config.minHoldSeconds, config.maxHoldSeconds],
      ['cooldown', config.minCooldownSeconds, config.maxCooldownSeconds],
    ];
    for (const [name, min, max] of ranges) {
      if (min > max) {
        throw new Error(`Invalid ${name} range: min ${min} exceeds max ${max}`);
      }
    }
    if (config.minEquityUsage <= 0 || config.maxEquityUsage > 1) {
      throw new Error('Equity usage must lie in (0, 1]');
    }
    for (const value of [config.minLeverage, config.maxLeverage, config.minHoldSeconds,
      config.maxHoldSeconds, config.minCooldownSeconds, config.maxCooldownSeconds]) {
      if (!Number.isInteger(value)) {
        throw new Error(`Integer range bound expected, got ${value}`);
      }
    }
  }
}
