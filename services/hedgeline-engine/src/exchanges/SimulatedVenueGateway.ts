import { Clock, SystemClock } from '@hedgeline/shared';

import type {
  BalanceSnapshot,
  MarketInfo,
  OrderInfo,
  OrderRequest,
  PositionInfo,
  PositionSide,
  TradeResult,
} from '../types/venues';
import type { IVenueGateway } from './interfaces';
import { VenueError } from './VenueError';

export type VenueMethod =
  | 'connect'
  | 'disconnect'
  | 'getMarketInfo'
  | 'getBalance'
  | 'getPositions'
  | 'getOpenOrders'
  | 'getLeverage'
  | 'placeOrder'
  | 'cancelOrder'
  | 'cancelAllOrders'
  | 'closePosition'
  | 'setLeverage';

/**
 * Scripted outcome for the next placeOrder or closePosition call
 */
export type ScriptedOutcome =
  | { type: 'fill' }
  | { type: 'reject'; message: string; code?: string }
  | { type: 'throw'; error: Error }
  /** Never settles; for deadline tests */
  | { type: 'hang' }
  /** Proceeds normally after `ms` of real time; deadlines run on real timers too */
  | { type: 'delay'; ms: number };

export interface SimulatedMarket {
  markPrice: number;
  fundingRate: number;
  minOrderSize?: number;
  minOrderSizeChange?: number;
  maxLeverage?: number;
  maintenanceMarginRate?: number;
}

export interface SimulatedVenueConfig {
  name: string;
  /** Venue symbol = token + suffix */
  symbolSuffix: string;
  balanceUsd: number;
  markets: Record<string, SimulatedMarket>;
  feeRate: number;
  defaultLeverage: number;
}

export const DEFAULT_SIMULATED_VENUE_CONFIG: SimulatedVenueConfig = {
  name: 'simulated',
  symbolSuffix: '-USD',
  balanceUsd: 10_000,
  markets: {
    BTC: { markPrice: 50_000, fundingRate: 0.0001 },
    ETH: { markPrice: 3_000, fundingRate: 0.0001 },
    SOL: { markPrice: 150, fundingRate: 0.0001 },
    HYPE: { markPrice: 25, fundingRate: 0.0001 },
  },
  feeRate: 0,
  defaultLeverage: 10,
};

interface CallRecord {
  method: VenueMethod;
  args: unknown[];
}

/**
 * Simulated Venue Gateway
 *
 * Deterministic in-memory venue: fills market orders at the mark price,
 * tracks positions and margin, and plays back scripted outcomes and
 * injected failures. Backs the tests and the CLI's simulation mode.
 */
export class SimulatedVenueGateway implements IVenueGateway {
  readonly name: string;
  private readonly config: SimulatedVenueConfig;
  private readonly clock: Clock;
  private connected = false;
  private balance: number;
  private markets = new Map<string, SimulatedMarket>();
  private positions = new Map<string, PositionInfo>();
  private openOrders: OrderInfo[] = [];
  private leverage = new Map<string, number>();
  private seenExternalIds = new Set<string>();
  private orderOutcomes: ScriptedOutcome[] = [];
  private closeOutcomes: ScriptedOutcome[] = [];
  private failures = new Map<VenueMethod, Error[]>();
  private nextOrderId = 1;
  readonly calls: CallRecord[] = [];

  constructor(config: Partial<SimulatedVenueConfig> = {}, clock: Clock = new SystemClock()) {
    this.config = { ...DEFAULT_SIMULATED_VENUE_CONFIG, ...config };
    this.name = this.config.name;
    this.clock = clock;
    this.balance = this.config.balanceUsd;
    for (const [token, market] of Object.entries(this.config.markets)) {
      this.markets.set(token, { ...market });
    }
  }

  // ==========================================
  // Test controls
  // ==========================================

  /** Fail the next `times` calls of `method` with `error` */
  failNext(method: VenueMethod, error: Error, times: number = 1): void {
    const queue = this.failures.get(method) ?? [];
    for (let i = 0; i < times; i++) {
      queue.push(error);
    }
    this.failures.set(method, queue);
  }

  scriptOrderOutcome(...outcomes: ScriptedOutcome[]): void {
    this.orderOutcomes.push(...outcomes);
  }

  scriptCloseOutcome(...outcomes: ScriptedOutcome[]): void {
    this.closeOutcomes.push(...outcomes);
  }

  setMarket(token: string, patch: Partial<SimulatedMarket>): void {
    const current = this.markets.get(token) ?? { markPrice: 0, fundingRate: 0 };
    this.markets.set(token, { ...current, ...patch });
  }

  setBalance(balanceUsd: number): void {
    this.balance = balanceUsd;
  }

  /** Put a position on the book directly */
  injectPosition(token: string, side: PositionSide, size: number): void {
    const symbol = this.getMarketSymbol(token);
    const price = this.markets.get(token)?.markPrice ?? 0;
    this.positions.set(symbol, this.buildPosition(symbol, side, size, price));
  }

  addOpenOrder(order: Omit<OrderInfo, 'orderId' | 'createdTime'>): void {
    this.openOrders.push({ ...order, orderId: this.allocateOrderId(), createdTime: this.clock.now() });
  }

  callCount(method: VenueMethod): number {
    return this.calls.filter((call) => call.method === method).length;
  }

  // ==========================================
  // IVenueGateway
  // ==========================================

  async connect(): Promise<void> {
    this.record('connect');
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.record('disconnect');
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  /** Simulate a dropped session */
  dropConnection(): void {
    this.connected = false;
  }

  getMarketSymbol(token: string): string {
    return `${token}${this.config.symbolSuffix}`;
  }

  async getMarketInfo(symbol: string): Promise<MarketInfo> {
    this.record('getMarketInfo', symbol);
    const token = this.tokenFor(symbol);
    const market = this.markets.get(token);
    if (!market) {
      throw VenueError.rejected(this.name, `Unknown market ${symbol}`, 'UNKNOWN_MARKET');
    }
    const price = market.markPrice;
    return {
      symbol,
      baseAsset: token,
      quoteAsset: 'USD',
      markPrice: price,
      indexPrice: price,
      lastPrice: price,
      bidPrice: price,
      askPrice: price,
      fundingRate: market.fundingRate,
      nextFundingTime: this.clock.now() + 8 * 3600 * 1000,
      minOrderSize: market.minOrderSize ?? 0.001,
      minOrderSizeChange: market.minOrderSizeChange ?? 0.001,
      minPriceChange: 0.01,
      maxLeverage: market.maxLeverage ?? 50,
      maintenanceMarginRate: market.maintenanceMarginRate,
      isActive: true,
    };
  }

  async getBalance(): Promise<BalanceSnapshot> {
    this.record('getBalance');
    const marginUsed = this.marginUsed();
    const unrealizedPnl = [...this.positions.values()]
      .map((position) => this.markToMarket(position))
      .reduce((sum, position) => sum + position.unrealizedPnl, 0);
    return {
      available: Math.max(0, this.balance - marginUsed),
      equity: this.balance + unrealizedPnl,
      marginUsed,
      currency: 'USD',
      unrealizedPnl,
      updatedTime: this.clock.now(),
    };
  }

  async getPositions(symbol?: string): Promise<PositionInfo[]> {
    this.record('getPositions', symbol);
    return [...this.positions.values()]
      .filter((position) => symbol === undefined || position.symbol === symbol)
      .map((position) => this.markToMarket(position));
  }

  async getOpenOrders(symbol?: string): Promise<OrderInfo[]> {
    this.record('getOpenOrders', symbol);
    return this.openOrders.filter((order) => symbol === undefined || order.symbol === symbol);
  }

  async getLeverage(symbol: string): Promise<number> {
    this.record('getLeverage', symbol);
    return this.leverage.get(symbol) ?? this.config.defaultLeverage;
  }

  async setLeverage(symbol: string, leverage: number): Promise<boolean> {
    this.record('setLeverage', symbol, leverage);
    if (!Number.isInteger(leverage) || leverage < 1) {
      throw VenueError.rejected(this.name, `Invalid leverage ${leverage}`, 'INVALID_LEVERAGE');
    }
    this.leverage.set(symbol, leverage);
    return true;
  }

  async placeOrder(request: OrderRequest): Promise<TradeResult> {
    this.record('placeOrder', request);
    const outcome = this.orderOutcomes.shift() ?? { type: 'fill' };
    const scripted = await this.applyOutcome(outcome, request.externalId);
    if (scripted) {
      return scripted;
    }

    if (this.seenExternalIds.has(request.externalId)) {
      return this.rejection(`Duplicate external id ${request.externalId}`, 'DUPLICATE_EXTERNAL_ID', request.externalId);
    }
    this.seenExternalIds.add(request.externalId);

    const token = this.tokenFor(request.symbol);
    const market = this.markets.get(token);
    if (!market) {
      return this.rejection(`Unknown market ${request.symbol}`, 'UNKNOWN_MARKET', request.externalId);
    }
    if (request.quantity <= 0) {
      return this.rejection('Quantity must be positive', 'INVALID_QUANTITY', request.externalId);
    }

    const price = market.markPrice;
    const existing = this.positions.get(request.symbol);

    if (request.reduceOnly) {
      if (!existing || existing.side === request.side) {
        return this.rejection('Reduce-only order would increase position', 'REDUCE_ONLY', request.externalId);
      }
      return this.reduce(existing, Math.min(request.quantity, existing.size), price, request.externalId);
    }

    if (existing && existing.side !== request.side) {
      return this.reduce(existing, Math.min(request.quantity, existing.size), price, request.externalId);
    }

    const leverage = this.leverage.get(request.symbol) ?? this.config.defaultLeverage;
    const margin = (request.quantity * price) / leverage;
    if (margin > this.balance - this.marginUsed()) {
      return this.rejection('Insufficient margin', 'INSUFFICIENT_MARGIN', request.externalId);
    }

    const size = (existing?.size ?? 0) + request.quantity;
    this.positions.set(request.symbol, this.buildPosition(request.symbol, request.side, size, price));
    return this.fill(request.quantity, price, request.externalId);
  }

  async cancelOrder(orderId: string): Promise<boolean> {
    this.record('cancelOrder', orderId);
    const before = this.openOrders.length;
    this.openOrders = this.openOrders.filter((order) => order.orderId !== orderId);
    return this.openOrders.length < before;
  }

  async cancelAllOrders(symbol?: string): Promise<number> {
    this.record('cancelAllOrders', symbol);
    const before = this.openOrders.length;
    this.openOrders = this.openOrders.filter((order) => symbol !== undefined && order.symbol !== symbol);
    return before - this.openOrders.length;
  }

  async closePosition(symbol: string, quantity?: number): Promise<TradeResult> {
    this.record('closePosition', symbol, quantity);
    const outcome = this.closeOutcomes.shift() ?? { type: 'fill' };
    const scripted = await this.applyOutcome(outcome);
    if (scripted) {
      return scripted;
    }

    const existing = this.positions.get(symbol);
    if (!existing) {
      return this.fill(0, 0);
    }
    const price = this.markets.get(this.tokenFor(symbol))?.markPrice ?? existing.markPrice;
    return this.reduce(existing, Math.min(quantity ?? existing.size, existing.size), price);
  }

  // ==========================================
  // Internals
  // ==========================================

  private record(method: VenueMethod, ...args: unknown[]): void {
    this.calls.push({ method, args });
    const queue = this.failures.get(method);
    const error = queue?.shift();
    if (error) {
      throw error;
    }
  }

  private async applyOutcome(outcome: ScriptedOutcome, externalId?: string): Promise<TradeResult | undefined> {
    switch (outcome.type) {
      case 'fill':
        return undefined;
      case 'reject':
        return this.rejection(outcome.message, outcome.code, externalId);
      case 'throw':
        throw outcome.error;
      case 'hang':
        return new Promise<TradeResult>(() => undefined);
      case 'delay':
        await new Promise<void>((resolve) => setTimeout(resolve, outcome.ms));
        return undefined;
    }
  }

  private marginUsed(): number {
    return [...this.positions.values()].reduce((sum, position) => sum + position.margin, 0);
  }

  private reduce(position: PositionInfo, quantity: number, price: number, externalId?: string): TradeResult {
    const remaining = position.size - quantity;
    const direction = position.side === 'LONG' ? 1 : -1;
    this.balance += (price - position.entryPrice) * quantity * direction;

    if (remaining <= 1e-12) {
      this.positions.delete(position.symbol);
    } else {
      this.positions.set(position.symbol, this.buildPosition(position.symbol, position.side, remaining, position.entryPrice));
    }
    return this.fill(quantity, price, externalId);
  }

  private fill(quantity: number, price: number, externalId?: string): TradeResult {
    const fee = quantity * price * this.config.feeRate;
    this.balance -= fee;
    return {
      success: true,
      orderId: this.allocateOrderId(),
      externalId,
      filledQuantity: quantity,
      averagePrice: price,
      feePaid: fee,
    };
  }

  private rejection(message: string, code: string | undefined, externalId?: string): TradeResult {
    return {
      success: false,
      externalId,
      errorMessage: message,
      errorCode: code,
      filledQuantity: 0,
      averagePrice: 0,
      feePaid: 0,
    };
  }

  private buildPosition(symbol: string, side: PositionSide, size: number, entryPrice: number): PositionInfo {
    const leverage = this.leverage.get(symbol) ?? this.config.defaultLeverage;
    return {
      positionId: `${this.name}-${symbol}`,
      venue: this.name,
      symbol,
      side,
      size,
      value: size * entryPrice,
      entryPrice,
      markPrice: entryPrice,
      unrealizedPnl: 0,
      leverage,
      margin: (size * entryPrice) / leverage,
      updatedTime: this.clock.now(),
    };
  }

  private markToMarket(position: PositionInfo): PositionInfo {
    const mark = this.markets.get(this.tokenFor(position.symbol))?.markPrice ?? position.markPrice;
    const direction = position.side === 'LONG' ? 1 : -1;
    return {
      ...position,
      markPrice: mark,
      value: position.size * mark,
      unrealizedPnl: (mark - position.entryPrice) * position.size * direction,
    };
  }

  private tokenFor(symbol: string): string {
    return symbol.endsWith(this.config.symbolSuffix)
      ? symbol.slice(0, symbol.length - this.config.symbolSuffix.length)
      : symbol;
  }

  private allocateOrderId(): string {
    return `${this.name}-${this.nextOrderId++}`;
  }
}
