/**
 * Upper bounds accepted when trading with real funds
 */
export const LIVE_MODE_LIMITS = {
  maxLeverage: 10,
  maxEquityUsage: 0.5,
} as const;

export class LiveModeRejectedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LiveModeRejectedError';
  }
}

export interface LiveModeSettings {
  simulationMode: boolean;
  maxLeverage: number;
  maxEquityUsage: number;
}

/**
 * Refuse to start live trading with aggressive randomization bounds.
 * Simulation mode is never restricted.
 */
export function assertLiveModeAllowed(settings: LiveModeSettings): void {
  if (settings.simulationMode) {
    return;
  }
  if (settings.maxLeverage > LIVE_MODE_LIMITS.maxLeverage) {
    throw new LiveModeRejectedError(
      `Live leverage too high: ${settings.maxLeverage}x exceeds ${LIVE_MODE_LIMITS.maxLeverage}x`,
    );
  }
  if (settings.maxEquityUsage > LIVE_MODE_LIMITS.maxEquityUsage) {
    throw new LiveModeRejectedError(
      `Live equity usage too high: ${settings.maxEquityUsage} exceeds ${LIVE_MODE_LIMITS.maxEquityUsage}`,
    );
  }
}
