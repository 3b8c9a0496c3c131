import type { BiasConfig, BiasStrength } from '../types/funding';

/**
 * Band a funding-rate differential. Never returns NONE; the meaningful
 * floor is the analyzer's concern.
 */
export function classifyDifferential(
  rateDifference: number,
  config: BiasConfig,
): Exclude<BiasStrength, 'NONE'> {
  const diff = Math.abs(rateDifference);
  if (diff < config.smallThreshold) {
    return 'SMALL';
  }
  if (diff < config.moderateThreshold) {
    return 'MODERATE';
  }
  return 'LARGE';
}
