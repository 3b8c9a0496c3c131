/**
 * Venue data types shared by the gateways and the trading core
 */

/** Which of the two configured venues a value refers to */
export type VenueSlot = 'A' | 'B';

export type PositionSide = 'LONG' | 'SHORT';

export type OrderType = 'MARKET' | 'LIMIT';

export type TimeInForce = 'GTC' | 'IOC' | 'FOK';

export type OrderStatus = 'NEW' | 'PARTIALLY_FILLED' | 'FILLED' | 'CANCELLED' | 'REJECTED';

export function oppositeSide(side: PositionSide): PositionSide {
  return side === 'LONG' ? 'SHORT' : 'LONG';
}

export function otherSlot(slot: VenueSlot): VenueSlot {
  return slot === 'A' ? 'B' : 'A';
}

/**
 * Market snapshot for one symbol on one venue
 */
export interface MarketInfo {
  symbol: string;
  baseAsset: string;
  quoteAsset: string;
  markPrice: number;
  indexPrice: number;
  lastPrice: number;
  bidPrice: number;
  askPrice: number;
  /** Per-interval funding rate as a signed fraction (0.0001 = 0.01%) */
  fundingRate: number;
  /** Epoch ms of the next funding settlement */
  nextFundingTime: number;
  minOrderSize: number;
  /** Order size step */
  minOrderSizeChange: number;
  minPriceChange: number;
  maxLeverage: number;
  /** Maintenance margin rate; venues that do not report it get 0.005 */
  maintenanceMarginRate?: number;
  isActive: boolean;
}

/**
 * Account balance snapshot, fetched fresh each cycle
 */
export interface BalanceSnapshot {
  /** Margin available for new positions */
  available: number;
  equity: number;
  marginUsed: number;
  currency: string;
  unrealizedPnl: number;
  updatedTime: number;
}

export interface PositionInfo {
  positionId: string;
  venue: string;
  symbol: string;
  side: PositionSide;
  size: number;
  value: number;
  entryPrice: number;
  markPrice: number;
  liquidationPrice?: number;
  unrealizedPnl: number;
  leverage: number;
  margin: number;
  updatedTime: number;
}

export interface OrderInfo {
  orderId: string;
  externalId?: string;
  symbol: string;
  side: PositionSide;
  type: OrderType;
  quantity: number;
  price?: number;
  filledQuantity: number;
  status: OrderStatus;
  reduceOnly: boolean;
  createdTime: number;
}

export interface OrderRequest {
  symbol: string;
  side: PositionSide;
  quantity: number;
  type: OrderType;
  /** Limit price, or worst acceptable fill price for market orders */
  price?: number;
  reduceOnly?: boolean;
  postOnly?: boolean;
  timeInForce?: TimeInForce;
  /** Client id; never reused across attempts */
  externalId: string;
}

/**
 * Outcome of a placement or close as reported by the venue
 */
export interface TradeResult {
  success: boolean;
  orderId?: string;
  externalId?: string;
  errorMessage?: string;
  errorCode?: string;
  filledQuantity: number;
  averagePrice: number;
  feePaid: number;
}
