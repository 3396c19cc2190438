import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { VercelRequest, VercelResponse } from '@vercel/node';

// Track Supabase query calls
let queryCalls: { method: string; args: unknown[] }[] = [];
let fromCallIndex = 0;
let dataError: { message: string } | null = null;

function trackCall(method: string, args: unknown[]) {
  queryCalls.push({ method, args });
}

function createQueryBuilder(resolveWith: unknown): Record<string, unknown> {
  const builder: Record<string, unknown> = {};
  for (const method of ['select', 'eq', 'like', 'order', 'range']) {
    builder[method] = (...args: unknown[]) => {
      trackCall(method, args);
      return builder;
    };
  }
  builder.then = (
    resolve: (value: unknown) => unknown,
    reject?: (reason: unknown) => unknown,
  ) => {
    return Promise.resolve(resolveWith).then(resolve, reject);
  };
  return builder;
}

const ledgerRows = [
  { instrument_key: 'fyers/NSE:NIFTY24NOVFUT', net_lots: 2, updated_at: '2024-11-13T04:00:00Z' },
  { instrument_key: 'xts/NSE:BANKNIFTY24N1352500CE', net_lots: -1, updated_at: '2024-11-13T04:05:00Z' },
];

vi.mock('../src/lib/supabase', () => ({
  getSupabase: () => ({
    from: (...args: unknown[]) => {
      trackCall('from', args);
      fromCallIndex++;
      if (fromCallIndex % 2 === 1) {
        return createQueryBuilder({ count: ledgerRows.length, error: null });
      }
      return createQueryBuilder(dataError ? { data: null, error: dataError } : { data: ledgerRows, error: null });
    },
  }),
}));

import handler from '../api/positions';

let responseData: unknown;
let statusCode: number;

const mockRes: Partial<VercelResponse> = {
  status: vi.fn().mockImplementation((code) => {
    statusCode = code;
    return mockRes;
  }) as unknown as VercelResponse['status'],
  json: vi.fn().mockImplementation((data) => {
    responseData = data;
    return mockRes;
  }) as unknown as VercelResponse['json'],
};

describe('GET /api/positions', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    queryCalls = [];
    fromCallIndex = 0;
    dataError = null;
    responseData = undefined;
    statusCode = 0;
  });

  it('returns 405 for non-GET requests', async () => {
    const req: Partial<VercelRequest> = { method: 'POST', query: {} };
    await handler(req as VercelRequest, mockRes as VercelResponse);
    expect(statusCode).toBe(405);
  });

  it('returns ledger rows with pagination', async () => {
    const req: Partial<VercelRequest> = { method: 'GET', query: {} };
    await handler(req as VercelRequest, mockRes as VercelResponse);

    expect(statusCode).toBe(200);
    expect(responseData).toEqual({
      success: true,
      data: ledgerRows,
      pagination: { page: 1, limit: 25, total: 2, totalPages: 1 },
    });
    expect(queryCalls.filter((c) => c.method === 'from').map((c) => c.args[0])).toEqual([
      'position_ledger',
      'position_ledger',
    ]);
  });

  it('sorts by instrument key ascending by default', async () => {
    const req: Partial<VercelRequest> = { method: 'GET', query: {} };
    await handler(req as VercelRequest, mockRes as VercelResponse);

    const orderCall = queryCalls.find((c) => c.method === 'order');
    expect(orderCall?.args).toEqual(['instrument_key', { ascending: true }]);
  });

  it('filters by broker prefix', async () => {
    const req: Partial<VercelRequest> = { method: 'GET', query: { broker: 'xts' } };
    await handler(req as VercelRequest, mockRes as VercelResponse);

    const likeCalls = queryCalls.filter((c) => c.method === 'like');
    expect(likeCalls).toHaveLength(2);
    expect(likeCalls[0].args).toEqual(['instrument_key', 'xts/%']);
  });

  it('computes the range from page and limit', async () => {
    const req: Partial<VercelRequest> = { method: 'GET', query: { page: '3', limit: '10' } };
    await handler(req as VercelRequest, mockRes as VercelResponse);

    const rangeCall = queryCalls.find((c) => c.method === 'range');
    expect(rangeCall?.args).toEqual([20, 29]);
  });

  it('returns 400 for an invalid sort column', async () => {
    const req: Partial<VercelRequest> = { method: 'GET', query: { sort: 'symbol' } };
    await handler(req as VercelRequest, mockRes as VercelResponse);

    expect(statusCode).toBe(400);
    expect(responseData).toEqual({
      success: false,
      error: 'Invalid sort column',
      details: 'Valid columns: instrument_key, net_lots, updated_at',
    });
  });

  it('returns 400 for an unknown broker', async () => {
    const req: Partial<VercelRequest> = { method: 'GET', query: { broker: 'zerodha' } };
    await handler(req as VercelRequest, mockRes as VercelResponse);

    expect(statusCode).toBe(400);
    expect(responseData).toEqual({
      success: false,
      error: 'Invalid broker filter',
      details: 'Valid brokers: fyers, xts',
    });
  });

  it('returns 500 when the data query fails', async () => {
    dataError = { message: 'relation does not exist' };
    const req: Partial<VercelRequest> = { method: 'GET', query: {} };
    await handler(req as VercelRequest, mockRes as VercelResponse);

    expect(statusCode).toBe(500);
    expect(responseData).toEqual({ success: false, error: 'Database error', details: 'relation does not exist' });
  });
});
