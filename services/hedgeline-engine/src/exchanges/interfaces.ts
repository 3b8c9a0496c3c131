import type {
  BalanceSnapshot,
  MarketInfo,
  OrderInfo,
  OrderRequest,
  PositionInfo,
  TradeResult,
} from '../types/venues';

/**
 * Venue Gateway Interface
 * Everything the core needs from a perpetual-futures venue.
 *
 * Implementations throw VenueError for transport and venue failures. A
 * rejected order may instead come back as a TradeResult with
 * success=false.
 */
export interface IVenueGateway {
  readonly name: string;

  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;

  /** Venue symbol for a token, e.g. BTC -> BTC-USD */
  getMarketSymbol(token: string): string;

  getMarketInfo(symbol: string): Promise<MarketInfo>;
  getBalance(): Promise<BalanceSnapshot>;
  getPositions(symbol?: string): Promise<PositionInfo[]>;
  getOpenOrders(symbol?: string): Promise<OrderInfo[]>;
  getLeverage(symbol: string): Promise<number>;

  placeOrder(request: OrderRequest): Promise<TradeResult>;
  cancelOrder(orderId: string): Promise<boolean>;
  /** Returns the number of orders cancelled */
  cancelAllOrders(symbol?: string): Promise<number>;
  /**
   * Reduce-only close of the open position (all of it when quantity is
   * omitted). Closing with nothing open succeeds with filledQuantity 0.
   */
  closePosition(symbol: string, quantity?: number): Promise<TradeResult>;
  setLeverage(symbol: string, leverage: number): Promise<boolean>;
}

/**
 * The two venues a strategy trades across
 */
export interface VenuePair {
  A: IVenueGateway;
  B: IVenueGateway;
}
