// TradingView alert parser
// Handles the structured JSON alert and the legacy "order filled" text message

import { getConfig } from './config';
import { toLocalTimestamp } from './market-time';
import {
  FIELD_LIMITS,
  checkUnsafeContent,
  containsKeywords,
  normalizeTicker,
  parseFiniteNumber,
  parseInteger,
  truncate,
} from './validation';
import type {
  IntentAction,
  OrderStyle,
  ParseResult,
  PayloadFormat,
  RejectReason,
  TradeIntent,
} from '../types';

const COMMENT_ACTIONS: Record<string, Exclude<IntentAction, 'net' | 'unrecognized'>> = {
  'exit all': 'exit_all',
  'Remaining Short Exit': 'exit_short',
  'Stop Loss Short': 'exit_short',
  'Short SL': 'exit_short',
  'Short TP': 'exit_short',
  'Short BE': 'exit_short',
  'Short Exit': 'exit_short',
  'Close entry(s) order Short Entry': 'exit_short',
  'Stop Loss Long Exit': 'exit_long',
  'Remaining Long Exit': 'exit_long',
  'Long SL': 'exit_long',
  'Long TP': 'exit_long',
  'Long BE': 'exit_long',
  'Long Exit': 'exit_long',
  'Close entry(s) order Long Entry': 'exit_long',
  'Short Entry': 'enter_short',
  'Long Entry': 'enter_long',
  'Exit fifty at two x': 'reduce',
  'long exit fifty at three x': 'reduce',
};

export interface ParseOptions {
  /** Authorization markers; defaults to `SIGNAL_TAG_KEYWORDS` */
  keywords?: readonly string[];
  now?: () => Date;
}

interface ParseContext {
  keywords: readonly string[];
  now: () => Date;
}

function reject(reason: RejectReason, error: string): ParseResult {
  return { success: false, reason, error };
}

function asRecord(value: unknown): Record<string, unknown> | null {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : null;
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : null;
}

/**
 * Detects the payload format based on content.
 * JSON payloads start with '{', everything else is legacy text.
 */
export function detectPayloadFormat(content: string): PayloadFormat {
  return content.trim().startsWith('{') ? 'json' : 'text';
}

/** Map a legacy comment label onto an intent action (exact match after trim) */
export function classifyComment(comment: string): IntentAction {
  return COMMENT_ACTIONS[comment.trim()] ?? 'unrecognized';
}

function resolveAlertTime(value: unknown, now: () => Date): Date {
  if (typeof value === 'string' || typeof value === 'number') {
    const parsed = new Date(value);
    if (!isNaN(parsed.getTime())) {
      return parsed;
    }
  }
  return now();
}

function orderStyleFor(orderType: string): OrderStyle {
  return orderType.toUpperCase() === 'LMT' ? 'LIMIT' : 'MARKET';
}

/**
 * Parse a structured TradingView strategy alert:
 * `{ strategy: { action, contracts, position_size }, symbol: { exchange, ticker },
 *    price: { close }, meta: { tag, order_type?, source?, time? } }`
 */
function parseStructured(body: Record<string, unknown>, ctx: ParseContext): ParseResult {
  const unsafe = checkUnsafeContent(JSON.stringify(body));
  if (unsafe) {
    return reject('unsafe_content', unsafe);
  }

  const meta = asRecord(body.meta);
  const tag = meta?.tag;
  if (typeof tag !== 'string' || !containsKeywords(tag, ctx.keywords)) {
    return reject('unauthorized', 'Signal tag does not carry the authorization keywords');
  }

  const strategy = asRecord(body.strategy);
  const symbol = asRecord(body.symbol);
  const price = asRecord(body.price);
  if (!strategy || !symbol || !price || !meta) {
    return reject('invalid_format', 'Payload requires strategy, symbol, price and meta objects');
  }

  const action = typeof strategy.action === 'string' ? strategy.action.trim().toLowerCase() : '';
  if (action !== 'buy' && action !== 'sell') {
    return reject('invalid_format', 'strategy.action must be buy or sell');
  }

  const contracts = parseInteger(strategy.contracts);
  if (contracts === null || contracts < 0) {
    return reject('invalid_format', 'strategy.contracts must be a non-negative whole number');
  }

  const positionSize = parseInteger(strategy.position_size);
  if (positionSize === null) {
    return reject('invalid_format', 'strategy.position_size must be a whole number');
  }
  if (positionSize !== 0 && contracts === 0) {
    return reject('invalid_format', 'strategy.contracts must be positive unless the position is flat');
  }

  const exchange = nonEmptyString(symbol.exchange);
  const ticker = nonEmptyString(symbol.ticker);
  if (!exchange || !ticker) {
    return reject('invalid_format', 'symbol.exchange and symbol.ticker are required');
  }

  const close = parseFiniteNumber(price.close);
  if (close === null) {
    return reject('invalid_format', 'price.close must be a number');
  }

  const orderType = truncate(nonEmptyString(meta.order_type) ?? 'MKT', FIELD_LIMITS.orderType);
  const orderStyle = orderStyleFor(orderType);
  if (orderStyle === 'LIMIT' && close <= 0) {
    return reject('invalid_format', 'Limit order requires a price');
  }

  const { rawSymbol, isFuture } = normalizeTicker(ticker);
  const signedLots = positionSize === 0 ? 0 : action === 'buy' ? contracts : -contracts;
  const receivedAt = resolveAlertTime(meta.time ?? body.time, ctx.now);
  const source = nonEmptyString(meta.source);

  const intent: TradeIntent = {
    format: 'json',
    exchange: exchange.toUpperCase(),
    rawSymbol,
    isFuture,
    action: 'net',
    signedLots,
    lots: Math.abs(signedLots),
    referencePrice: close,
    orderStyle,
    receivedAt,
    receivedAtLocal: toLocalTimestamp(receivedAt),
  };
  if (source) {
    intent.source = truncate(source, FIELD_LIMITS.source);
  }

  return { success: true, intent };
}

/**
 * Parse the legacy strategy message, e.g.
 *
 * ```
 * radhe algo: order buy @ 1 filled on NSE:BANKNIFTY1!
 * New strategy position is 1
 * comment = Long Entry
 * open : 52410.5
 * order_type : MKT
 * time : 2024-11-13T04:00:00Z
 * interval : 5
 * ```
 */
export function parseLegacyMessage(message: string, options: ParseOptions = {}): ParseResult {
  return parseLegacy(message, contextFrom(options));
}

function parseLegacy(message: string, ctx: ParseContext): ParseResult {
  const unsafe = checkUnsafeContent(message);
  if (unsafe) {
    return reject('unsafe_content', unsafe);
  }

  if (!containsKeywords(message, ctx.keywords)) {
    return reject('unauthorized', 'Message does not carry the authorization keywords');
  }

  const filled = /filled on (\S+):(\S+)/.exec(message);
  if (!filled) {
    return reject('invalid_format', 'Could not find "filled on EXCHANGE:TICKER"');
  }

  const positionMatch = /New strategy position is ([-\d]+)/.exec(message);
  if (!positionMatch) {
    return reject('invalid_format', 'Could not find the new strategy position');
  }
  const position = parseInteger(positionMatch[1]);
  if (position === null) {
    return reject('invalid_format', `Strategy position is not a number: ${positionMatch[1]}`);
  }

  const commentMatch = /comment\s*=\s*([^\n]+)/i.exec(message);
  const comment = commentMatch ? truncate(commentMatch[1].trim(), FIELD_LIMITS.comment) : '';
  if (!comment) {
    return reject('invalid_format', 'Message has no comment label');
  }

  let referencePrice = 0;
  const openMatch = /open\s*:\s*([\d.]+)/.exec(message);
  if (openMatch) {
    const open = parseFiniteNumber(openMatch[1]);
    if (open === null) {
      return reject('invalid_format', `Open price is not a number: ${openMatch[1]}`);
    }
    referencePrice = open;
  }

  const orderTypeMatch = /order_type\s*:\s*(\S+)/i.exec(message);
  const orderType = truncate(orderTypeMatch ? orderTypeMatch[1] : 'MKT', FIELD_LIMITS.orderType);
  const orderStyle = orderStyleFor(orderType);
  if (orderStyle === 'LIMIT' && referencePrice <= 0) {
    return reject('invalid_format', 'Limit order requires a price');
  }

  const timeMatch = /time\s*:\s*([\d\-T:Z]+)/.exec(message);
  const receivedAt = resolveAlertTime(timeMatch?.[1], ctx.now);
  const intervalMatch = /interval\s*:\s*(\S+)/.exec(message);

  const { rawSymbol, isFuture } = normalizeTicker(filled[2], true);

  const intent: TradeIntent = {
    format: 'text',
    exchange: filled[1].toUpperCase(),
    rawSymbol,
    isFuture,
    action: classifyComment(comment),
    signedLots: position,
    lots: Math.abs(position),
    comment,
    referencePrice,
    orderStyle,
    receivedAt,
    receivedAtLocal: toLocalTimestamp(receivedAt),
  };
  if (intervalMatch) {
    intent.interval = truncate(intervalMatch[1], FIELD_LIMITS.interval);
  }

  return { success: true, intent };
}

function contextFrom(options: ParseOptions): ParseContext {
  return {
    keywords: options.keywords ?? getConfig().signalKeywords,
    now: options.now ?? (() => new Date()),
  };
}

/**
 * Normalize an inbound webhook body (parsed JSON object or raw text) into a
 * {@link TradeIntent}. Never throws.
 */
export function parseSignal(raw: unknown, options: ParseOptions = {}): ParseResult {
  const ctx = contextFrom(options);

  if (typeof raw === 'string') {
    const content = raw.trim();
    if (!content) {
      return reject('invalid_format', 'Empty message');
    }
    if (detectPayloadFormat(content) === 'text') {
      return parseLegacy(content, ctx);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      return reject('invalid_format', 'Invalid JSON format');
    }
    const body = asRecord(parsed);
    return body ? parseStructured(body, ctx) : reject('invalid_format', 'Payload must be a JSON object');
  }

  const body = asRecord(raw);
  if (!body) {
    return reject('invalid_format', 'Payload must be a JSON object or text');
  }
  return parseStructured(body, ctx);
}
