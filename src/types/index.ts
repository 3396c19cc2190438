// Alert Order Router - Type Definitions

/**
 * Exchanges the router trades derivatives on
 */
export type Exchange = 'NSE' | 'BSE' | 'MCX';

/**
 * Supported payload formats for signal parsing
 */
export type PayloadFormat = 'json' | 'text';

/**
 * Order style requested by the alert (`LMT` → LIMIT, anything else → MARKET)
 */
export type OrderStyle = 'MARKET' | 'LIMIT';

/**
 * Canonical intent action.
 *
 * `net` is the signed-lots shape: `signedLots` carries direction and size and
 * zero means flatten. The remaining actions come from the legacy comment
 * vocabulary and use `lots` as an unsigned size.
 */
export type IntentAction =
  | 'net'
  | 'exit_all'
  | 'exit_long'
  | 'exit_short'
  | 'enter_long'
  | 'enter_short'
  | 'reduce'
  | 'unrecognized';

/**
 * Normalized trade signal produced by the parser
 */
export interface TradeIntent {
  format: PayloadFormat;
  /** Upper-cased exchange prefix as sent by the alert (`NSE`, `BSE`, `MCX`, ...) */
  exchange: string;
  /** Underlying for futures, full option descriptor otherwise */
  rawSymbol: string;
  isFuture: boolean;
  action: IntentAction;
  /**
   * Signed lot count. Drives the decision for `net`; for comment actions it
   * only records the strategy position the alert reported.
   */
  signedLots: number;
  /** Unsigned lot count for comment actions (entry size or reduce target) */
  lots: number;
  /** Classification label from the legacy format, truncated */
  comment?: string;
  referencePrice: number;
  orderStyle: OrderStyle;
  receivedAt: Date;
  /** Local exchange time (UTC+05:30), `YYYY-MM-DDTHH:mm:ss` */
  receivedAtLocal: string;
  source?: string;
  interval?: string;
}

/**
 * Why a payload was turned away by the parser
 */
export type RejectReason = 'unauthorized' | 'invalid_format' | 'unsafe_content';

export type ParseResult =
  | { success: true; intent: TradeIntent }
  | { success: false; reason: RejectReason; error: string };

/**
 * Webhook API Response
 */
export interface WebhookResponse {
  success: boolean;
  message?: string;
  error?: string;
  data?: Record<string, unknown>;
  details?: string;
}

/**
 * Logger levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

/**
 * Database connection status
 */
export interface DatabaseStatus {
  connected: boolean;
  /** Round trip of the health query */
  latencyMs?: number;
  error?: string;
}

/**
 * Pagination metadata for list responses
 */
export interface PaginationMeta {
  page: number;
  limit: number;
  total: number;
  totalPages: number;
}
