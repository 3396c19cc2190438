import { describe, it, expect } from 'vitest';
import {
  NOTICE_NO_CHANGE,
  NOTICE_NO_POSITION,
  NOTICE_UNRECOGNIZED,
  decide,
  describeCommands,
} from './decision-engine';
import type { IntentAction, TradeIntent } from '../types';
import type { ResolvedInstrument } from './types';

const instrument: ResolvedInstrument = {
  tradableSymbol: 'NSE:NIFTY24NOVFUT',
  underlying: 'NIFTY',
  lotSize: 25,
  expiryDate: '2024-11-28',
  exchange: 'NSE',
};

function intent(overrides: Partial<TradeIntent> = {}): TradeIntent {
  return {
    format: 'json',
    exchange: 'NSE',
    rawSymbol: 'NIFTY',
    isFuture: true,
    action: 'net',
    signedLots: 0,
    lots: 0,
    referencePrice: 24150.5,
    orderStyle: 'MARKET',
    receivedAt: new Date('2024-11-13T04:00:00Z'),
    receivedAtLocal: '2024-11-13T09:30:00',
    ...overrides,
  };
}

function comment(action: IntentAction, lots: number): TradeIntent {
  return intent({ format: 'text', action, lots, signedLots: 0 });
}

describe('decide — signed lots', () => {
  it('buys the target when flat, then treats the repeat as no change', () => {
    const first = decide(intent({ signedLots: 5 }), instrument, 0, 'MARGIN');

    expect(first.commands).toHaveLength(1);
    expect(first.commands[0]).toMatchObject({
      side: 'BUY',
      lots: 5,
      quantityUnits: 125,
      style: 'MARKET',
      price: 0,
      purpose: 'entry',
      productType: 'MARGIN',
      lotsDelta: 5,
    });
    expect(first.projectedNetLots).toBe(5);

    const second = decide(intent({ signedLots: 5 }), instrument, first.projectedNetLots, 'MARGIN');
    expect(second.commands).toEqual([]);
    expect(second.notice).toBe(NOTICE_NO_CHANGE);
    expect(second.reason).toBe('no_change');
    expect(second.projectedNetLots).toBe(5);
  });

  it('skips a flatten signal when no position is recorded', () => {
    const decision = decide(intent({ signedLots: 0, comment: 'stoploss' }), instrument, 0, 'MARGIN');

    expect(decision.commands).toEqual([]);
    expect(decision.notice).toBe(NOTICE_NO_POSITION);
    expect(decision.reason).toBe('no_position');
  });

  it.each([
    [3, 'SELL', 75],
    [-4, 'BUY', 100],
  ] as const)('flattens a net of %i with one %s of %i units', (net, side, units) => {
    const decision = decide(intent({ signedLots: 0 }), instrument, net, 'MARGIN');

    expect(decision.commands).toHaveLength(1);
    expect(decision.commands[0]).toMatchObject({ side, quantityUnits: units, purpose: 'exit', style: 'MARKET' });
    expect(decision.projectedNetLots).toBe(0);
  });

  it.each([
    [2, 3, 'BUY', 75, 5],
    [2, -3, 'SELL', 75, -1],
    [-1, -2, 'SELL', 50, -3],
  ] as const)('net %i with signed lots %i sends %s %i units and lands on %i', (net, signed, side, units, after) => {
    const decision = decide(intent({ signedLots: signed }), instrument, net, 'MARGIN');

    expect(decision.commands).toHaveLength(1);
    expect(decision.commands[0].side).toBe(side);
    expect(decision.commands[0].quantityUnits).toBe(units);
    expect(decision.projectedNetLots).toBe(after);
  });

  it('carries the reference price on limit entries', () => {
    const decision = decide(intent({ signedLots: -2, orderStyle: 'LIMIT' }), instrument, 0, 'MARGIN');

    expect(decision.commands[0]).toMatchObject({ side: 'SELL', style: 'LIMIT', price: 24150.5 });
  });

  it('exits at market even when the alert asked for a limit', () => {
    const decision = decide(intent({ signedLots: 0, orderStyle: 'LIMIT' }), instrument, 2, 'MARGIN');

    expect(decision.commands[0]).toMatchObject({ style: 'MARKET', price: 0 });
  });
});

describe('decide — comment actions', () => {
  it('exit_all closes whatever is open', () => {
    expect(decide(comment('exit_all', 0), instrument, -2, 'NRML').commands[0]).toMatchObject({
      side: 'BUY',
      lots: 2,
      purpose: 'exit',
    });
    expect(decide(comment('exit_all', 0), instrument, 0, 'NRML').notice).toBe(NOTICE_NO_POSITION);
  });

  it('exit_short only acts on a short position', () => {
    expect(decide(comment('exit_short', 0), instrument, -3, 'NRML').commands[0]).toMatchObject({
      side: 'BUY',
      lots: 3,
    });
    const long = decide(comment('exit_short', 0), instrument, 3, 'NRML');
    expect(long.commands).toEqual([]);
    expect(long.reason).toBe('no_position');
  });

  it('exit_long only acts on a long position', () => {
    expect(decide(comment('exit_long', 0), instrument, 1, 'NRML').commands[0]).toMatchObject({
      side: 'SELL',
      lots: 1,
    });
    expect(decide(comment('exit_long', 0), instrument, 0, 'NRML').commands).toEqual([]);
  });

  it('enter_short from long exits first, then sells', () => {
    const decision = decide(comment('enter_short', 2), instrument, 3, 'NRML');

    expect(decision.commands.map((c) => [c.side, c.lots, c.purpose])).toEqual([
      ['SELL', 3, 'exit'],
      ['SELL', 2, 'entry'],
    ]);
    expect(decision.projectedNetLots).toBe(-2);
  });

  it('enter_short while already short adds to the position', () => {
    const decision = decide(comment('enter_short', 1), instrument, -1, 'NRML');

    expect(decision.commands.map((c) => [c.side, c.lots, c.purpose])).toEqual([['SELL', 1, 'entry']]);
    expect(decision.projectedNetLots).toBe(-2);
  });

  it('enter_long from short exits first, then buys', () => {
    const decision = decide(comment('enter_long', 1), instrument, -2, 'NRML');

    expect(decision.commands.map((c) => [c.side, c.lots, c.purpose])).toEqual([
      ['BUY', 2, 'exit'],
      ['BUY', 1, 'entry'],
    ]);
    expect(decision.projectedNetLots).toBe(1);
    expect(decision.notice).toBe('BUY 2 lots (exit), BUY 1 lot (entry) NSE:NIFTY24NOVFUT');
  });

  it('treats a zero-lot entry as no change', () => {
    expect(decide(comment('enter_long', 0), instrument, 0, 'NRML').reason).toBe('no_change');
  });

  it('reduce trades the excess on the opposing side', () => {
    const decision = decide(comment('reduce', 1), instrument, 4, 'NRML');

    expect(decision.commands).toHaveLength(1);
    expect(decision.commands[0]).toMatchObject({ side: 'SELL', lots: 3, quantityUnits: 75, purpose: 'reduce' });
    expect(decision.projectedNetLots).toBe(1);

    expect(decide(comment('reduce', 2), instrument, -5, 'NRML').commands[0]).toMatchObject({
      side: 'BUY',
      lots: 3,
    });
  });

  it('reduce does nothing when already at or below the target', () => {
    expect(decide(comment('reduce', 3), instrument, 2, 'NRML').reason).toBe('no_change');
    expect(decide(comment('reduce', 1), instrument, 0, 'NRML').reason).toBe('no_position');
  });

  it('ignores unrecognized comments', () => {
    const decision = decide(comment('unrecognized', 2), instrument, 2, 'NRML');

    expect(decision.commands).toEqual([]);
    expect(decision.notice).toBe(NOTICE_UNRECOGNIZED);
    expect(decision.projectedNetLots).toBe(2);
  });
});

describe('describeCommands', () => {
  it('says when there is nothing to send', () => {
    expect(describeCommands([])).toBe('no orders');
  });
});
