import { describe, it, expect, vi, beforeEach } from 'vitest';
import { buildAuditRow, recordSignal } from './signal-audit';
import type { SignalOutcome } from '../bot/types';

const mockQuery = vi.fn();
vi.mock('../lib/db', () => ({
  query: (...args: unknown[]) => mockQuery(...args),
}));

vi.mock('../lib/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
  errorMessage: (error: unknown, fallback = 'Unknown error') => (error instanceof Error ? error.message : fallback),
}));

const executed: SignalOutcome = {
  status: 'executed',
  message: 'BUY 2 lots (entry) NSE:NIFTY24NOVFUT',
  intent: {
    format: 'json',
    exchange: 'NSE',
    rawSymbol: 'NIFTY',
    isFuture: true,
    action: 'net',
    signedLots: 2,
    lots: 2,
    referencePrice: 24100.5,
    orderStyle: 'MARKET',
    receivedAt: new Date('2024-11-13T04:00:00.000Z'),
    receivedAtLocal: '2024-11-13T09:30:00',
    source: 'tv-strategy',
  },
  instrument: {
    tradableSymbol: 'NSE:NIFTY24NOVFUT',
    underlying: 'NIFTY',
    lotSize: 25,
    expiryDate: '2024-11-28',
    exchange: 'NSE',
  },
  commands: [
    { side: 'BUY', purpose: 'entry', lots: 2, quantityUnits: 50, price: 0, style: 'MARKET', status: 'accepted', orderId: 'ORD-1' },
  ],
  netLotsBefore: 0,
  netLotsAfter: 2,
};

describe('buildAuditRow', () => {
  it('flattens intent, instrument and commands', () => {
    expect(buildAuditRow('fyers', executed)).toEqual({
      broker: 'fyers',
      exchange: 'NSE',
      raw_symbol: 'NIFTY',
      resolved_symbol: 'NSE:NIFTY24NOVFUT',
      is_future: true,
      action: 'net',
      signed_lots: 2,
      reference_price: 24100.5,
      order_style: 'MARKET',
      signal_time_utc: '2024-11-13T04:00:00.000Z',
      signal_time_local: '2024-11-13T09:30:00',
      status: 'executed',
      reason: null,
      message: 'BUY 2 lots (entry) NSE:NIFTY24NOVFUT',
      commands: [
        { side: 'BUY', purpose: 'entry', lots: 2, quantityUnits: 50, price: 0, style: 'MARKET', status: 'accepted', orderId: 'ORD-1' },
      ],
      source: 'tv-strategy',
    });
  });

  it('leaves unreached fields null for a rejected payload', () => {
    const row = buildAuditRow('xts', {
      status: 'rejected',
      reason: 'unauthorized',
      message: 'Message does not carry the authorization keywords',
      commands: [],
    });

    expect(row.exchange).toBeNull();
    expect(row.resolved_symbol).toBeNull();
    expect(row.signal_time_utc).toBeNull();
    expect(row.reason).toBe('unauthorized');
    expect(row.commands).toEqual([]);
  });
});

describe('recordSignal', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('inserts the row and returns its id', async () => {
    mockQuery.mockResolvedValue([{ id: 42 }]);

    expect(await recordSignal('fyers', executed)).toBe(42);

    const [strings, ...values] = mockQuery.mock.calls[0];
    expect(strings.join('')).toContain('INSERT INTO signal_audit');
    expect(values[0]).toBe('fyers');
    expect(values[3]).toBe('NSE:NIFTY24NOVFUT');
    expect(values[11]).toBe('executed');
    expect(JSON.parse(values[14])).toHaveLength(1);
  });

  it('returns null when the write fails', async () => {
    mockQuery.mockRejectedValue(new Error('relation "signal_audit" does not exist'));

    expect(await recordSignal('fyers', executed)).toBeNull();
  });
});
