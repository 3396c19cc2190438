// Signal de-duplication by content hash within a short window

import { createHash } from 'crypto';
import type { TradeIntent } from '../types';

/** Stable hash of the fields that make two alerts the same order request */
export function intentFingerprint(broker: string, intent: TradeIntent): string {
  const raw = [
    broker,
    intent.exchange,
    intent.rawSymbol.toUpperCase(),
    intent.isFuture ? 'FUT' : 'OPT',
    intent.action,
    intent.signedLots,
    intent.lots,
    intent.referencePrice,
    intent.orderStyle,
    intent.comment ?? '',
  ].join('|');
  return createHash('sha256').update(raw).digest('hex');
}

export class SignalDeduplicator {
  private readonly seen = new Map<string, number>();

  /**
   * @param windowMs how long a fingerprint blocks repeats; 0 disables
   * @param now clock in epoch milliseconds
   */
  constructor(
    private readonly windowMs: number,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Record the intent and report whether an identical one was seen inside
   * the window.
   */
  isDuplicate(broker: string, intent: TradeIntent): boolean {
    if (this.windowMs <= 0) return false;

    const at = this.now();
    this.prune(at);

    const key = intentFingerprint(broker, intent);
    const last = this.seen.get(key);
    if (last !== undefined && at - last < this.windowMs) {
      return true;
    }
    this.seen.set(key, at);
    return false;
  }

  get size(): number {
    return this.seen.size;
  }

  private prune(at: number): void {
    for (const [key, seenAt] of this.seen) {
      if (at - seenAt >= this.windowMs) this.seen.delete(key);
    }
  }
}
