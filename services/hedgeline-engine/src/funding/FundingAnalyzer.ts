import type {
  AssignmentComparison,
  BiasConfig,
  FundingAnalysis,
  FundingRateInfo,
} from '../types/funding';
import { DEFAULT_BIAS_CONFIG } from '../types/funding';
import { otherSlot, type VenueSlot } from '../types/venues';
import { classifyDifferential } from './bias';

export interface FundingAnalyzerConfig {
  bias: BiasConfig;
  /** Differentials below this carry no bias */
  minMeaningfulDifference: number;
}

export const DEFAULT_FUNDING_ANALYZER_CONFIG: FundingAnalyzerConfig = {
  bias: DEFAULT_BIAS_CONFIG,
  minMeaningfulDifference: 0.00001,
};

/**
 * Funding Analyzer
 *
 * Pure and advisory: recommends shorting the venue with the higher signed
 * rate. Side assignment itself stays randomized.
 */
export class FundingAnalyzer {
  private readonly config: FundingAnalyzerConfig;

  constructor(config: FundingAnalyzerConfig = DEFAULT_FUNDING_ANALYZER_CONFIG) {
    this.config = config;
  }

  analyze(
    rateA: number,
    rateB: number,
    token: string,
    positionValueUsd: number = 0,
    nextFundingA?: number,
    nextFundingB?: number,
  ): FundingAnalysis {
    const rateDifference = Math.abs(rateA - rateB);
    const favorableForOptimization = rateDifference >= this.config.minMeaningfulDifference;
    const biasStrength = favorableForOptimization
      ? classifyDifferential(rateDifference, this.config.bias)
      : 'NONE';

    const recommendedShort: VenueSlot = rateA > rateB ? 'A' : 'B';
    const recommendedLong: VenueSlot = otherSlot(recommendedShort);

    return {
      token,
      rateA: this.rateInfo('A', token, rateA, nextFundingA),
      rateB: this.rateInfo('B', token, rateB, nextFundingB),
      rateDifference,
      rateDifferencePercent: rateDifference * 100,
      biasStrength,
      recommendedShort,
      recommendedLong,
      expectedHourlyIncome: this.calculateExpectedIncome(
        positionValueUsd,
        recommendedShort === 'A' ? rateA : rateB,
        recommendedShort === 'A' ? rateB : rateA,
      ),
      favorableForOptimization,
    };
  }

  /**
   * Same analysis re-priced for a different position value
   */
  withPositionValue(analysis: FundingAnalysis, positionValueUsd: number): FundingAnalysis {
    const shortRate = analysis.recommendedShort === 'A' ? analysis.rateA.rate : analysis.rateB.rate;
    const longRate = analysis.recommendedLong === 'A' ? analysis.rateA.rate : analysis.rateB.rate;
    return {
      ...analysis,
      expectedHourlyIncome: this.calculateExpectedIncome(positionValueUsd, shortRate, longRate),
    };
  }

  /**
   * Shorts receive funding when the rate is positive; longs pay it.
   * Zero for non-positive values.
   */
  calculateExpectedIncome(positionValueUsd: number, shortRate: number, longRate: number): number {
    if (positionValueUsd <= 0) {
      return 0;
    }
    return positionValueUsd * (shortRate - longRate);
  }

  compareAssignmentOutcomes(
    rateA: number,
    rateB: number,
    positionValueUsd: number,
  ): AssignmentComparison {
    const shortAIncome = this.calculateExpectedIncome(positionValueUsd, rateA, rateB);
    const shortBIncome = this.calculateExpectedIncome(positionValueUsd, rateB, rateA);

    return {
      shortA: { sideA: 'SHORT', sideB: 'LONG', expectedIncome: shortAIncome },
      shortB: { sideA: 'LONG', sideB: 'SHORT', expectedIncome: shortBIncome },
      betterAssignment: shortAIncome > shortBIncome ? 'SHORT_A' : 'SHORT_B',
      incomeDifference: Math.abs(shortAIncome - shortBIncome),
    };
  }

  /**
   * Signed percentage with four decimals, e.g. 0.0001 -> "+0.0100%"
   */
  static formatRate(rate: number): string {
    const percent = rate * 100;
    const sign = percent >= 0 ? '+' : '-';
    return `${sign}${Math.abs(percent).toFixed(4)}%`;
  }

  private rateInfo(
    venue: VenueSlot,
    token: string,
    rate: number,
    nextFundingTime?: number,
  ): FundingRateInfo {
    return { venue, token, rate, ratePercent: rate * 100, nextFundingTime };
  }
}
