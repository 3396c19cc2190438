// XTS interactive API types

export type XtsOrderSide = 'BUY' | 'SELL';
export type XtsOrderType = 'MARKET' | 'LIMIT';

/** Every interactive endpoint wraps its payload the same way */
export interface XtsResponse<T = unknown> {
  /** `success` or `error` */
  type: string;
  code?: string;
  description?: string;
  result?: T;
}

// ─── Session ─────────────────────────────────────────────────────────────────

export interface XtsLoginResult {
  token: string;
  userID: string;
}

// ─── Orders ──────────────────────────────────────────────────────────────────

export interface XtsOrderRequest {
  exchangeSegment: string;
  exchangeInstrumentID: number;
  productType: string;
  orderType: XtsOrderType;
  orderSide: XtsOrderSide;
  timeInForce: 'DAY';
  disclosedQuantity: number;
  orderQuantity: number;
  limitPrice: number;
  stopPrice: number;
  orderUniqueIdentifier: string;
  clientID: string;
}

export interface XtsPlaceOrderResult {
  AppOrderID: number;
}

/** One entry of an order's history or of the order book */
export interface XtsOrder {
  AppOrderID: number;
  TradingSymbol?: string;
  ExchangeInstrumentID?: number;
  OrderSide?: string;
  OrderStatus: string;
  OrderQuantity?: number;
  CumulativeQuantity?: number;
  OrderAverageTradedPrice?: string | number;
  CancelRejectReason?: string;
}

// ─── Portfolio ───────────────────────────────────────────────────────────────

export interface XtsPosition {
  TradingSymbol: string;
  ExchangeSegment: string;
  ExchangeInstrumentId: string | number;
  ProductType: string;
  /** Signed net quantity in units */
  Quantity: string | number;
}

export interface XtsPositionsResult {
  positionList?: XtsPosition[];
}

export interface XtsSquareOffRequest {
  exchangeSegment: string;
  exchangeInstrumentID: number;
  productType: string;
  squareoffMode: 'DayWise' | 'NetWise';
  squareOffQtyValue: number;
  clientID: string;
  positionSquareOffQuantityType: 'ExactQty' | 'Percentage';
}
