/**
 * Funding Types
 *
 * Funding-rate analysis and side assignment.
 */
import type { PositionSide, VenueSlot } from './venues';

/**
 * Magnitude band of the funding-rate differential
 */
export type BiasStrength = 'NONE' | 'SMALL' | 'MODERATE' | 'LARGE';

/**
 * Differential bands and how strongly each one biases side assignment
 */
export interface BiasConfig {
  /** Differentials below this are SMALL */
  smallThreshold: number;
  /** Differentials below this (and >= smallThreshold) are MODERATE */
  moderateThreshold: number;
  /** Probability of taking the favorable assignment, per band */
  weights: {
    SMALL: number;
    MODERATE: number;
    LARGE: number;
  };
}

export const DEFAULT_BIAS_CONFIG: BiasConfig = {
  smallThreshold: 0.0001,
  moderateThreshold: 0.0005,
  weights: {
    SMALL: 0.5,
    MODERATE: 0.6,
    LARGE: 0.75,
  },
};

/**
 * Funding rate observed on one venue
 */
export interface FundingRateInfo {
  venue: VenueSlot;
  token: string;
  /** Signed per-interval rate */
  rate: number;
  /** Rate as a percentage (rate x 100) */
  ratePercent: number;
  nextFundingTime?: number;
}

/**
 * Advisory analysis of a funding-rate pair
 */
export interface FundingAnalysis {
  token: string;
  rateA: FundingRateInfo;
  rateB: FundingRateInfo;
  /** |rateA - rateB| */
  rateDifference: number;
  rateDifferencePercent: number;
  biasStrength: BiasStrength;
  /** Venue that should hold the short to collect the spread */
  recommendedShort: VenueSlot;
  recommendedLong: VenueSlot;
  /** Position value x (short rate - long rate), per funding interval */
  expectedHourlyIncome: number;
  /** Whether the differential is above the meaningful floor */
  favorableForOptimization: boolean;
}

/**
 * Sides for one cycle, always opposite
 */
export interface SideAssignment {
  sideA: PositionSide;
  sideB: PositionSide;
  biasStrength: BiasStrength;
  /** Venue favored for the short by the rate comparison */
  favoredShort: VenueSlot;
  /** Whether the draw followed the favorable assignment */
  followedBias: boolean;
}

/**
 * Expected income of both possible assignments
 */
export interface AssignmentComparison {
  shortA: { sideA: PositionSide; sideB: PositionSide; expectedIncome: number };
  shortB: { sideA: PositionSide; sideB: PositionSide; expectedIncome: number };
  betterAssignment: 'SHORT_A' | 'SHORT_B';
  incomeDifference: number;
}
