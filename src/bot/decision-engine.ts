// Order decision engine: turns an intent and the current net position into commands

import type { TradeIntent } from '../types';
import type { Decision, DecisionReason, OrderCommand, OrderSide, ResolvedInstrument } from './types';

export const NOTICE_NO_POSITION = 'skipped — no position';
export const NOTICE_NO_CHANGE = 'ignored — no change';
export const NOTICE_UNRECOGNIZED = 'ignored — unrecognized comment';

function opposing(net: number): OrderSide {
  return net > 0 ? 'SELL' : 'BUY';
}

function command(
  instrument: ResolvedInstrument,
  side: OrderSide,
  lots: number,
  purpose: OrderCommand['purpose'],
  productType: string,
  intent?: TradeIntent
): OrderCommand {
  // exits and reductions always go at market
  const limit = purpose === 'entry' && intent?.orderStyle === 'LIMIT';
  return {
    instrument,
    side,
    lots,
    quantityUnits: lots * instrument.lotSize,
    price: limit && intent ? intent.referencePrice : 0,
    style: limit ? 'LIMIT' : 'MARKET',
    productType,
    purpose,
    lotsDelta: side === 'BUY' ? lots : -lots,
  };
}

function exitAll(instrument: ResolvedInstrument, net: number, productType: string): OrderCommand {
  return command(instrument, opposing(net), Math.abs(net), 'exit', productType);
}

function none(net: number, reason: DecisionReason): Decision {
  const notice =
    reason === 'no_position' ? NOTICE_NO_POSITION : reason === 'no_change' ? NOTICE_NO_CHANGE : NOTICE_UNRECOGNIZED;
  return { commands: [], notice, projectedNetLots: net, reason };
}

function act(commands: OrderCommand[], net: number): Decision {
  const projectedNetLots = commands.reduce((sum, c) => sum + c.lotsDelta, net);
  return { commands, notice: describeCommands(commands), projectedNetLots };
}

/** "SELL 2 lots (exit), BUY 1 lot (entry) NSE:NIFTY24NOVFUT" */
export function describeCommands(commands: OrderCommand[]): string {
  if (commands.length === 0) return 'no orders';
  const parts = commands.map((c) => `${c.side} ${c.lots} ${c.lots === 1 ? 'lot' : 'lots'} (${c.purpose})`);
  return `${parts.join(', ')} ${commands[0].instrument.tradableSymbol}`;
}

function decideNet(intent: TradeIntent, instrument: ResolvedInstrument, net: number, productType: string): Decision {
  const target = intent.signedLots;

  if (target === 0) {
    return net === 0 ? none(net, 'no_position') : act([exitAll(instrument, net, productType)], net);
  }
  if (target === net) {
    return none(net, 'no_change');
  }

  const side: OrderSide = target > 0 ? 'BUY' : 'SELL';
  return act([command(instrument, side, Math.abs(target), 'entry', productType, intent)], net);
}

function decideComment(
  intent: TradeIntent,
  instrument: ResolvedInstrument,
  net: number,
  productType: string
): Decision {
  const lots = intent.lots;

  switch (intent.action) {
    case 'exit_all':
      return net === 0 ? none(net, 'no_position') : act([exitAll(instrument, net, productType)], net);

    case 'exit_short':
      return net < 0 ? act([exitAll(instrument, net, productType)], net) : none(net, 'no_position');

    case 'exit_long':
      return net > 0 ? act([exitAll(instrument, net, productType)], net) : none(net, 'no_position');

    case 'enter_short': {
      if (lots === 0) return none(net, 'no_change');
      const entry = command(instrument, 'SELL', lots, 'entry', productType, intent);
      return net > 0 ? act([exitAll(instrument, net, productType), entry], net) : act([entry], net);
    }

    case 'enter_long': {
      if (lots === 0) return none(net, 'no_change');
      const entry = command(instrument, 'BUY', lots, 'entry', productType, intent);
      return net < 0 ? act([exitAll(instrument, net, productType), entry], net) : act([entry], net);
    }

    case 'reduce': {
      if (net === 0) return none(net, 'no_position');
      const excess = Math.abs(net) - lots;
      if (excess <= 0) return none(net, 'no_change');
      return act([command(instrument, opposing(net), excess, 'reduce', productType)], net);
    }

    default:
      return none(net, 'unrecognized_comment');
  }
}

/**
 * Decide which orders move the position from `currentNetLots` to what the
 * intent asks for. Pure: no I/O, no clock, no ledger writes.
 */
export function decide(
  intent: TradeIntent,
  instrument: ResolvedInstrument,
  currentNetLots: number,
  productType: string
): Decision {
  return intent.action === 'net'
    ? decideNet(intent, instrument, currentNetLots, productType)
    : decideComment(intent, instrument, currentNetLots, productType);
}
