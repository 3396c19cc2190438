// Fyers API v3 types, enums, and constants

// ─── Order Enums (numeric values used by the API) ────────────────────────────

export enum FyersSide {
  BUY = 1,
  SELL = -1,
}

export enum FyersOrderType {
  LIMIT = 1,
  MARKET = 2,
  STOP = 3,
  STOP_LIMIT = 4,
}

export enum FyersOrderStatus {
  CANCELLED = 1,
  TRADED = 2,
  TRANSIT = 4,
  REJECTED = 5,
  PENDING = 6,
  EXPIRED = 7,
}

// ─── API Response Wrapper ────────────────────────────────────────────────────

export interface FyersResponse {
  /** `ok` or `error` */
  s: string;
  code: number;
  message: string;
}

// ─── Orders ──────────────────────────────────────────────────────────────────

export interface FyersOrderRequest {
  symbol: string;
  qty: number;
  type: FyersOrderType;
  side: FyersSide;
  productType: string;
  limitPrice: number;
  stopPrice: number;
  validity: 'DAY' | 'IOC';
  disclosedQty: number;
  offlineOrder: boolean;
  orderTag?: string;
}

export interface FyersPlaceOrderResponse extends FyersResponse {
  id?: string;
}

export interface FyersOrder {
  id: string;
  symbol: string;
  status: number;
  side: number;
  qty: number;
  filledQty: number;
  limitPrice: number;
  tradedPrice: number;
  productType: string;
  message?: string;
}

export interface FyersOrderBookResponse extends FyersResponse {
  orderBook?: FyersOrder[];
}

// ─── Positions ───────────────────────────────────────────────────────────────

export interface FyersPosition {
  id: string;
  symbol: string;
  netQty: number;
  side: number;
  productType: string;
}

export interface FyersPositionsResponse extends FyersResponse {
  netPositions?: FyersPosition[];
}

/** Shape of the token file written by the external login flow */
export interface FyersTokenFile {
  access_token?: string;
}
