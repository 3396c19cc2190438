import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { InstrumentResolver, SymbolMaster } from '../src/services/instruments';
import { MemoryPositionLedger } from '../src/bot/position-ledger';
import { SignalProcessor, type AuditWriter } from '../src/bot/signal-processor';
import type { BrokerName, BrokerOrderGateway, Notifier } from '../src/bot/types';

// End-to-end routing against a real resolver and symbol-master files on disk

function csvRow(desc: string, lot: number, symbol: string, token: number, underlying: string, strike: string, type: string): string {
  return [
    '101124111335095', desc, 11, lot, '0.05', '', '0915-1530|1815-1915:', '', '1731491400',
    symbol, '14', '2', token, underlying, '26009', strike, type, '101124111335095', 'None', '0', '0.0',
  ].join(',');
}

const NSE_TABLE = [
  csvRow('BANKNIFTY 24 Oct 30 FUT', 15, 'NSE:BANKNIFTY24OCTFUT', 35000, 'BANKNIFTY', '-1.0', 'XX'),
  csvRow('BANKNIFTY 24 Nov 27 FUT', 15, 'NSE:BANKNIFTY24NOVFUT', 35001, 'BANKNIFTY', '-1.0', 'XX'),
  csvRow('BANKNIFTY 24 Nov 13 52500 CE', 15, 'NSE:BANKNIFTY24N1352500CE', 43210, 'BANKNIFTY', '52500.0', 'CE'),
].join('\n');

const FUT_KEY = 'fyers/NSE:BANKNIFTY24NOVFUT';

function alert(ticker: string, action: 'buy' | 'sell', contracts: number, positionSize: number, exchange = 'NSE') {
  return {
    strategy: { action, contracts, position_size: positionSize },
    symbol: { exchange, ticker },
    price: { close: 51800 },
    meta: { tag: 'radhe algo', source: 'tests' },
  };
}

function fakeGateway(name: BrokerName = 'fyers', requiresInstrumentIds = false) {
  return {
    name,
    requiresInstrumentIds,
    place: vi.fn<BrokerOrderGateway['place']>(async () => ({ status: 'accepted', orderId: 'ord-1' })),
    exitPosition: vi.fn<BrokerOrderGateway['exitPosition']>(async () => ({ status: 'accepted', orderId: 'ord-2' })),
    cancelPending: vi.fn<BrokerOrderGateway['cancelPending']>(async () => ({ ok: true, message: 'none' })),
    cancelAll: vi.fn<BrokerOrderGateway['cancelAll']>(async () => ({ ok: true, message: 'ok' })),
    queryPositions: vi.fn<BrokerOrderGateway['queryPositions']>(async () => []),
    exitAll: vi.fn<BrokerOrderGateway['exitAll']>(async () => ({ ok: true, message: 'ok' })),
  } satisfies BrokerOrderGateway;
}

describe('signal routing', () => {
  let dir: string;
  let resolver: InstrumentResolver;
  let ledger: MemoryPositionLedger;
  let gateway: ReturnType<typeof fakeGateway>;
  let audit: Mock<AuditWriter>;

  function processor(broker: BrokerName = 'fyers'): SignalProcessor {
    const notifier: Notifier = { notify: async () => true };
    return new SignalProcessor({
      broker,
      gateway,
      ledger,
      resolver,
      notifier,
      audit,
      productType: 'MARGIN',
      keywords: ['radhe', 'algo'],
      now: () => new Date('2024-11-10T04:00:00Z'),
    });
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    dir = mkdtempSync(join(tmpdir(), 'routing-'));
    writeFileSync(join(dir, 'NSE_FO.csv'), NSE_TABLE + '\n');
    resolver = new InstrumentResolver(new SymbolMaster(dir), { today: () => '2024-11-10' });
    ledger = new MemoryPositionLedger();
    gateway = fakeGateway();
    audit = vi.fn<AuditWriter>(async () => null);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('scenarios', () => {
    it('resolves a weekly option descriptor and sizes the order by its lot', async () => {
      const outcome = await processor().process(alert('BANKNIFTY24N1352500CE', 'buy', 2, 2));

      expect(outcome.instrument).toEqual({
        tradableSymbol: 'NSE:BANKNIFTY24N1352500CE',
        underlying: 'BANKNIFTY',
        lotSize: 15,
        expiryDate: '2024-11-13',
        exchange: 'NSE',
      });
      expect(gateway.place.mock.calls[0][0].quantityUnits).toBe(30);
    });

    it('reports an unlisted option as not found without throwing', async () => {
      const outcome = await processor().process(alert('BANKNIFTY24N1352600CE', 'buy', 2, 2));

      expect(outcome.status).toBe('skipped');
      expect(outcome.reason).toBe('symbol_not_found');
      expect(gateway.place).not.toHaveBeenCalled();
    });

    it('treats a repeated net target as a no-op', async () => {
      const p = processor();
      const first = await p.process(alert('BANKNIFTY1!', 'buy', 5, 5));
      const second = await p.process(alert('BANKNIFTY1!', 'buy', 5, 5));

      expect(first.status).toBe('executed');
      expect(first.instrument?.tradableSymbol).toBe('NSE:BANKNIFTY24NOVFUT');
      expect(gateway.place).toHaveBeenCalledTimes(1);
      expect(gateway.place.mock.calls[0][0].side).toBe('BUY');
      expect(gateway.place.mock.calls[0][0].quantityUnits).toBe(75);
      expect(second.status).toBe('ignored');
      expect(second.commands).toEqual([]);
      expect(await ledger.get(FUT_KEY)).toBe(5);
    });

    it('skips a stop-loss flatten when nothing is held', async () => {
      const outcome = await processor().process(alert('BANKNIFTY1!', 'sell', 5, 0));

      expect(outcome.status).toBe('skipped');
      expect(outcome.message).toBe('skipped — no position');
      expect(gateway.exitPosition).not.toHaveBeenCalled();
      expect(gateway.place).not.toHaveBeenCalled();
    });

    it('rejects a message without the authorization keywords before resolving', async () => {
      const resolve = vi.spyOn(resolver, 'resolve');
      const outcome = await processor().process(
        'order sell @ 1 filled on NSE:BANKNIFTY1!\nNew strategy position is -1\ncomment = Short Entry'
      );

      expect(outcome.status).toBe('rejected');
      expect(outcome.reason).toBe('unauthorized');
      expect(resolve).not.toHaveBeenCalled();
      expect(await ledger.listAll()).toEqual({});
    });

    it('reports a missing symbol-master file as not found and leaves the ledger alone', async () => {
      const outcome = await processor().process(alert('CRUDEOIL1!', 'buy', 1, 1, 'MCX'));

      expect(outcome.status).toBe('skipped');
      expect(outcome.reason).toBe('symbol_not_found');
      expect(gateway.place).not.toHaveBeenCalled();
      expect(gateway.cancelPending).not.toHaveBeenCalled();
      expect(await ledger.listAll()).toEqual({});
    });
  });

  describe('properties', () => {
    it('flattens a held position with one opposing exit and clears the ledger', async () => {
      ledger = new MemoryPositionLedger({ [FUT_KEY]: -4 });
      await processor().process(alert('BANKNIFTY1!', 'buy', 4, 0));

      expect(gateway.exitPosition).toHaveBeenCalledTimes(1);
      const exit = gateway.exitPosition.mock.calls[0][0];
      expect(exit.side).toBe('BUY');
      expect(exit.quantityUnits).toBe(60);
      expect(await ledger.get(FUT_KEY)).toBe(0);
    });

    it('adds a non-zero delta to the ledger', async () => {
      ledger = new MemoryPositionLedger({ [FUT_KEY]: 2 });
      const outcome = await processor().process(alert('BANKNIFTY1!', 'sell', 3, -3));

      expect(gateway.place.mock.calls[0][0].side).toBe('SELL');
      expect(gateway.place.mock.calls[0][0].quantityUnits).toBe(45);
      expect(outcome.netLotsAfter).toBe(-1);
      expect(await ledger.get(FUT_KEY)).toBe(-1);
    });

    it('resolves the same request to the same instrument', () => {
      const request = { exchange: 'NSE', rawSymbol: 'BANKNIFTY24N1352500CE', isFuture: false };
      expect(resolver.resolve(request)).toEqual(resolver.resolve(request));
    });

    it('carries broker instrument ids for XTS', async () => {
      gateway = fakeGateway('xts', true);
      await processor('xts').process(alert('BANKNIFTY1!', 'buy', 1, 1));

      const sent = gateway.place.mock.calls[0][0].instrument;
      expect(sent.brokerSegment).toBe('NSEFO');
      expect(sent.brokerInstrumentId).toBe(35001);
      expect(await ledger.get('xts/NSE:BANKNIFTY24NOVFUT')).toBe(1);
    });

    it('audits every outcome', async () => {
      const p = processor();
      await p.process(alert('BANKNIFTY1!', 'buy', 1, 1));
      await p.process('not a signal');
      await p.process(alert('NOPE1!', 'buy', 1, 1));

      expect(audit.mock.calls.map(([, outcome]) => outcome.status)).toEqual(['executed', 'rejected', 'skipped']);
    });
  });
});
