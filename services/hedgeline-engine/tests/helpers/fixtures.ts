import * as crypto from "crypto";

import { Logger, ManualClock } from "@hedgeline/shared";

import { SimulatedVenueGateway } from "../../src/exchanges/SimulatedVenueGateway";
import {
    DEFAULT_RANDOMIZATION_CONFIG,
    EntropySource,
    RandomizationConfig,
    SecureRandomSource,
} from "../../src/random/SecureRandomSource";
import type { SizingResult } from "../../src/types/sizing";
import type { BalanceSnapshot } from "../../src/types/venues";

export const silentLogger = (): Logger => Logger.silent();

/**
 * Entropy that replays queued integers, then falls back to the lower bound
 */
export class ScriptedEntropy implements EntropySource {
    private readonly queue: number[] = [];
    readonly draws: Array<[number, number]> = [];

    push(...values: number[]): this {
        this.queue.push(...values);
        return this;
    }

    randomInt(min: number, max: number): number {
        this.draws.push([min, max]);
        const next = this.queue.shift();
        return next === undefined ? min : next;
    }

    randomBytes(size: number): Buffer {
        return crypto.randomBytes(size);
    }
}

/**
 * Random source whose ranges collapse to single values: BTC, 50% equity,
 * 10x, 1200 s hold, 600 s cooldown
 */
export function fixedRandom(
    overrides: Partial<RandomizationConfig> = {},
    entropy?: EntropySource,
): SecureRandomSource {
    return new SecureRandomSource(
        {
            ...DEFAULT_RANDOMIZATION_CONFIG,
            minEquityUsage: 0.5,
            maxEquityUsage: 0.5,
            minLeverage: 10,
            maxLeverage: 10,
            minHoldSeconds: 1200,
            maxHoldSeconds: 1200,
            minCooldownSeconds: 600,
            maxCooldownSeconds: 600,
            ...overrides,
        },
        entropy,
    );
}

export function makeVenues(clock: ManualClock = new ManualClock(0)): {
    A: SimulatedVenueGateway;
    B: SimulatedVenueGateway;
} {
    return {
        A: new SimulatedVenueGateway({ name: "venue-a", symbolSuffix: "-USD" }, clock),
        B: new SimulatedVenueGateway({ name: "venue-b", symbolSuffix: "" }, clock),
    };
}

export function balance(available: number, equity: number = available): BalanceSnapshot {
    return {
        available,
        equity,
        marginUsed: 0,
        currency: "USD",
        unrealizedPnl: 0,
        updatedTime: 0,
    };
}

export function sizing(overrides: Partial<SizingResult> = {}): SizingResult {
    return {
        token: "BTC",
        positionSize: 0.95,
        positionValueUsd: 47500,
        marginRequiredPerLeg: 4750,
        totalMarginRequired: 9500,
        equityUsage: 0.5,
        leverage: 10,
        effectiveLeverage: 10,
        availableBalanceUsed: 4750,
        fitsConstraints: true,
        constraintNotes: [],
        ...overrides,
    };
}
