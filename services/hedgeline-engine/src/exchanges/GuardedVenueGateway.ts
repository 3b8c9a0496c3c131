import { Logger, RateLimiter, RetryOptions, retryWithBackoff } from '@hedgeline/shared';

import { withTimeout } from '../execution/timeout';
import type {
  BalanceSnapshot,
  MarketInfo,
  OrderInfo,
  OrderRequest,
  PositionInfo,
  TradeResult,
} from '../types/venues';
import type { IVenueGateway } from './interfaces';
import { isRetryableVenueError } from './VenueError';

export interface GuardedVenueConfig {
  /** Deadline per read attempt in ms */
  apiTimeoutMs: number;
  retry: Pick<RetryOptions, 'maxRetries' | 'initialDelayMs' | 'maxDelayMs' | 'backoffFactor' | 'clock'>;
}

export const DEFAULT_GUARDED_VENUE_CONFIG: GuardedVenueConfig = {
  apiTimeoutMs: 30_000,
  retry: {
    maxRetries: 2,
    initialDelayMs: 1000,
    maxDelayMs: 10_000,
  },
};

/**
 * Wraps a venue so every call passes its rate limiter. Idempotent reads
 * get a per-attempt deadline and are retried with backoff on transient
 * errors. Writes are sent exactly once with no deadline of their own; the
 * executor bounds the open attempt as a whole.
 */
export class GuardedVenueGateway implements IVenueGateway {
  readonly name: string;

  constructor(
    private readonly inner: IVenueGateway,
    private readonly limiter: RateLimiter,
    private readonly config: GuardedVenueConfig = DEFAULT_GUARDED_VENUE_CONFIG,
    private readonly logger: Logger = Logger.getInstance('venue-gateway'),
  ) {
    this.name = inner.name;
  }

  connect(): Promise<void> {
    return this.write('connect', () => this.inner.connect());
  }

  disconnect(): Promise<void> {
    return this.write('disconnect', () => this.inner.disconnect());
  }

  isConnected(): boolean {
    return this.inner.isConnected();
  }

  getMarketSymbol(token: string): string {
    return this.inner.getMarketSymbol(token);
  }

  getMarketInfo(symbol: string): Promise<MarketInfo> {
    return this.read('getMarketInfo', () => this.inner.getMarketInfo(symbol));
  }

  getBalance(): Promise<BalanceSnapshot> {
    return this.read('getBalance', () => this.inner.getBalance());
  }

  getPositions(symbol?: string): Promise<PositionInfo[]> {
    return this.read('getPositions', () => this.inner.getPositions(symbol));
  }

  getOpenOrders(symbol?: string): Promise<OrderInfo[]> {
    return this.read('getOpenOrders', () => this.inner.getOpenOrders(symbol));
  }

  getLeverage(symbol: string): Promise<number> {
    return this.read('getLeverage', () => this.inner.getLeverage(symbol));
  }

  placeOrder(request: OrderRequest): Promise<TradeResult> {
    return this.write('placeOrder', () => this.inner.placeOrder(request));
  }

  cancelOrder(orderId: string): Promise<boolean> {
    return this.write('cancelOrder', () => this.inner.cancelOrder(orderId));
  }

  cancelAllOrders(symbol?: string): Promise<number> {
    return this.write('cancelAllOrders', () => this.inner.cancelAllOrders(symbol));
  }

  closePosition(symbol: string, quantity?: number): Promise<TradeResult> {
    return this.write('closePosition', () => this.inner.closePosition(symbol, quantity));
  }

  setLeverage(symbol: string, leverage: number): Promise<boolean> {
    return this.write('setLeverage', () => this.inner.setLeverage(symbol, leverage));
  }

  private read<T>(operation: string, call: () => Promise<T>): Promise<T> {
    return retryWithBackoff(
      async () => {
        await this.limiter.acquire();
        return withTimeout(call(), this.config.apiTimeoutMs, `${this.name} ${operation} timed out`);
      },
      { ...this.config.retry, retryableErrors: isRetryableVenueError, logger: this.logger },
      `${this.name} ${operation}`,
    );
  }

  private async write<T>(operation: string, call: () => Promise<T>): Promise<T> {
    await this.limiter.acquire();
    this.logger.debug(`${this.name} ${operation}`);
    return call();
  }
}
