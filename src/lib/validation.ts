// Inbound alert validation helpers

import { timingSafeEqual } from 'crypto';

export const MAX_MESSAGE_LENGTH = 10_000;

const UNSAFE_PATTERNS: RegExp[] = [
  /<script[^>]*>.*?<\/script>/is,
  /javascript:/i,
  /vbscript:/i,
  /onload=/i,
  /onerror=/i,
];

/** Field length limits applied before a value reaches the intent */
export const FIELD_LIMITS = {
  comment: 100,
  orderType: 20,
  interval: 20,
  source: 100,
} as const;

/**
 * Returns a reason string when the message must not be processed, `null` otherwise.
 */
export function checkUnsafeContent(message: string): string | null {
  if (message.length > MAX_MESSAGE_LENGTH) {
    return `Message exceeds ${MAX_MESSAGE_LENGTH} characters`;
  }
  if (UNSAFE_PATTERNS.some((pattern) => pattern.test(message))) {
    return 'Message contains potentially dangerous content';
  }
  return null;
}

/** True when every keyword occurs in the text, ignoring case */
export function containsKeywords(text: string, keywords: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.every((keyword) => lower.includes(keyword.toLowerCase()));
}

export interface NormalizedTicker {
  rawSymbol: string;
  isFuture: boolean;
}

/**
 * Turn a TradingView ticker into the resolver's raw symbol.
 * "BANKNIFTY1!" → { rawSymbol: "BANKNIFTY", isFuture: true }
 * Non-continuous tickers pass through; `stripPunctuation` also removes a
 * trailing "!" or "." left by the legacy message text.
 */
export function normalizeTicker(ticker: string, stripPunctuation = false): NormalizedTicker {
  const trimmed = ticker.trim();
  if (trimmed.endsWith('!')) {
    return { rawSymbol: trimmed.replace(/[\d!]+$/, ''), isFuture: true };
  }
  return {
    rawSymbol: stripPunctuation ? trimmed.replace(/[!.]+$/, '') : trimmed,
    isFuture: false,
  };
}

export function truncate(value: string, max: number): string {
  return value.length > max ? value.slice(0, max) : value;
}

/** Accepts numbers and numeric strings; anything else is `null` */
export function parseFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** Like {@link parseFiniteNumber} but only whole numbers pass */
export function parseInteger(value: unknown): number | null {
  const parsed = parseFiniteNumber(value);
  return parsed !== null && Number.isInteger(parsed) ? parsed : null;
}

/**
 * Compare a caller-supplied secret with the configured one.
 * No configured secret means the check is disabled.
 */
export function validateWebhookSecret(provided: string | undefined, expected: string | undefined): boolean {
  if (!expected) {
    return true;
  }
  if (!provided) {
    return false;
  }
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}
