import { describe, it, expect } from 'vitest';
import { SignalDeduplicator, intentFingerprint } from './dedup';
import type { TradeIntent } from '../types';

const base: TradeIntent = {
  format: 'json',
  exchange: 'NSE',
  rawSymbol: 'NIFTY',
  isFuture: true,
  action: 'net',
  signedLots: 2,
  lots: 2,
  referencePrice: 24100,
  orderStyle: 'MARKET',
  receivedAt: new Date('2024-11-13T04:00:00Z'),
  receivedAtLocal: '2024-11-13T09:30:00',
};

describe('intentFingerprint', () => {
  it('is a hex SHA-256 digest', () => {
    expect(intentFingerprint('fyers', base)).toMatch(/^[0-9a-f]{64}$/);
  });

  it('ignores arrival time but not order content', () => {
    const later = { ...base, receivedAt: new Date('2024-11-13T04:00:03Z') };
    expect(intentFingerprint('fyers', later)).toBe(intentFingerprint('fyers', base));
    expect(intentFingerprint('fyers', { ...base, signedLots: 3 })).not.toBe(intentFingerprint('fyers', base));
    expect(intentFingerprint('xts', base)).not.toBe(intentFingerprint('fyers', base));
  });
});

describe('SignalDeduplicator', () => {
  it('flags a repeat inside the window and accepts it after', () => {
    let clock = 1_000;
    const dedup = new SignalDeduplicator(5_000, () => clock);

    expect(dedup.isDuplicate('fyers', base)).toBe(false);
    clock = 4_000;
    expect(dedup.isDuplicate('fyers', base)).toBe(true);
    clock = 6_000;
    expect(dedup.isDuplicate('fyers', base)).toBe(false);
  });

  it('treats different content as distinct', () => {
    const dedup = new SignalDeduplicator(5_000, () => 0);

    expect(dedup.isDuplicate('fyers', base)).toBe(false);
    expect(dedup.isDuplicate('fyers', { ...base, referencePrice: 24105 })).toBe(false);
    expect(dedup.size).toBe(2);
  });

  it('forgets expired fingerprints', () => {
    let clock = 0;
    const dedup = new SignalDeduplicator(1_000, () => clock);
    dedup.isDuplicate('fyers', base);

    clock = 2_000;
    dedup.isDuplicate('fyers', { ...base, signedLots: -1 });
    expect(dedup.size).toBe(1);
  });

  it('is disabled by a zero window', () => {
    const dedup = new SignalDeduplicator(0, () => 0);

    expect(dedup.isDuplicate('fyers', base)).toBe(false);
    expect(dedup.isDuplicate('fyers', base)).toBe(false);
    expect(dedup.size).toBe(0);
  });
});
