// Fyers implementation of the broker order gateway

import { errorMessage, logger } from '../../lib/logger';
import { FyersApiError, type FyersClient } from '../../services/fyers/client';
import {
  FyersOrderStatus,
  FyersOrderType,
  FyersSide,
  type FyersOrder,
  type FyersPosition,
} from '../../services/fyers/types';
import type {
  BrokerOrderGateway,
  BrokerPosition,
  BulkResult,
  OrderCommand,
  OrderResult,
  ResolvedInstrument,
} from '../types';

const ORDER_TAG = 'ALERTROUTER';

/** Only an explicit broker refusal is `rejected`; a timeout, 5xx or unreadable reply is `unknown` */
export function fyersFailure(error: unknown): OrderResult {
  const message = errorMessage(error);
  return error instanceof FyersApiError ? { status: 'rejected', message } : { status: 'unknown', message };
}

export class FyersGateway implements BrokerOrderGateway {
  readonly name = 'fyers' as const;
  readonly requiresInstrumentIds = false;

  constructor(private readonly client: FyersClient) {}

  async place(command: OrderCommand): Promise<OrderResult> {
    const limit = command.style === 'LIMIT';
    try {
      const data = await this.client.placeOrder({
        symbol: command.instrument.tradableSymbol,
        qty: command.quantityUnits,
        type: limit ? FyersOrderType.LIMIT : FyersOrderType.MARKET,
        side: command.side === 'BUY' ? FyersSide.BUY : FyersSide.SELL,
        productType: command.productType,
        limitPrice: limit ? command.price : 0,
        stopPrice: 0,
        validity: 'DAY',
        disclosedQty: 0,
        offlineOrder: false,
        orderTag: ORDER_TAG,
      });
      return { status: 'accepted', orderId: data.id, message: data.message };
    } catch (error) {
      const result = fyersFailure(error);
      logger.error('Fyers order failed', {
        symbol: command.instrument.tradableSymbol,
        status: result.status,
        error: result.message,
      });
      return result;
    }
  }

  /**
   * Close against the live net position: a full exit goes through the
   * position id, a reduction is an opposing market order in the position's
   * own product so it cannot open a second position.
   */
  async exitPosition(command: OrderCommand): Promise<OrderResult> {
    const symbol = command.instrument.tradableSymbol;
    let position: FyersPosition | undefined;
    try {
      const positions = await this.client.getPositions();
      // a SELL closes a long row, a BUY a short one
      const wanted = command.side === 'SELL' ? 1 : -1;
      position = positions.find((p) => p.symbol === symbol && Math.sign(p.netQty) === wanted);
    } catch (error) {
      const message = `Positions unavailable, nothing sent: ${errorMessage(error)}`;
      logger.error('Fyers exit aborted', { symbol, error: message });
      return { status: 'rejected', message };
    }

    if (!position) {
      // the ledger disagrees with the broker; let reconciliation settle it
      logger.warn('No live Fyers position to exit', { symbol, side: command.side });
      return { status: 'unknown', message: `No open Fyers position for ${symbol}` };
    }

    if (command.purpose === 'reduce') {
      return this.place({ ...command, style: 'MARKET', price: 0, productType: position.productType });
    }

    try {
      const data = await this.client.exitPositions(position.id);
      return { status: 'accepted', orderId: position.id, message: data.message || `Exited position ${position.id}` };
    } catch (error) {
      const result = fyersFailure(error);
      logger.error('Fyers position exit failed', {
        symbol,
        positionId: position.id,
        status: result.status,
        error: result.message,
      });
      return result;
    }
  }

  async cancelPending(instrument: ResolvedInstrument): Promise<BulkResult> {
    return this.cancelWhere(
      (order) => order.symbol === instrument.tradableSymbol,
      instrument.tradableSymbol
    );
  }

  async cancelAll(): Promise<BulkResult> {
    return this.cancelWhere(() => true, 'all instruments');
  }

  async queryPositions(): Promise<BrokerPosition[]> {
    const positions = await this.client.getPositions();
    return positions.map((p) => ({
      tradableSymbol: p.symbol,
      netUnits: p.netQty,
      productType: p.productType,
    }));
  }

  async exitAll(): Promise<BulkResult> {
    try {
      const data = await this.client.exitPositions();
      return { ok: true, message: data.message || 'All Fyers positions exited' };
    } catch (error) {
      const message = errorMessage(error);
      logger.error('Fyers exit all failed', { error: message });
      return { ok: false, message };
    }
  }

  private async cancelWhere(match: (order: FyersOrder) => boolean, label: string): Promise<BulkResult> {
    let pending: FyersOrder[];
    try {
      const book = await this.client.getOrderBook();
      pending = book.filter((o) => o.status === FyersOrderStatus.PENDING && match(o));
    } catch (error) {
      const message = errorMessage(error);
      logger.error('Fyers order book unavailable', { error: message });
      return { ok: false, message };
    }

    if (pending.length === 0) {
      return { ok: true, message: `No pending orders for ${label}` };
    }

    const failures: string[] = [];
    for (const order of pending) {
      try {
        await this.client.cancelOrder(order.id);
      } catch (error) {
        failures.push(`${order.id}: ${errorMessage(error)}`);
      }
    }

    if (failures.length > 0) {
      logger.warn('Some Fyers cancels failed', { label, failures });
      return { ok: false, message: `Cancelled ${pending.length - failures.length} of ${pending.length} orders for ${label}` };
    }
    return { ok: true, message: `Cancelled ${pending.length} order(s) for ${label}` };
  }
}
