// XTS implementation of the broker order gateway

import { setTimeout as sleep } from 'timers/promises';
import { errorMessage, logger } from '../../lib/logger';
import { XtsApiError, type XtsClient } from '../../services/xts/client';
import type { XtsOrder } from '../../services/xts/types';
import type {
  BrokerOrderGateway,
  BrokerPosition,
  BulkResult,
  OrderCommand,
  OrderResult,
  ResolvedInstrument,
} from '../types';

/** Order book statuses that can still be cancelled */
const OPEN_STATUSES = new Set(['New', 'Open', 'Pending', 'PendingNew', 'PartiallyFilled']);

export interface XtsGatewayOptions {
  /** Pause between placement and the status check */
  statusCheckDelayMs: number;
}

/** Only an explicit broker refusal is `rejected`; a timeout, 5xx or reply without an order id is `unknown` */
export function xtsFailure(error: unknown): OrderResult {
  const message = errorMessage(error);
  return error instanceof XtsApiError ? { status: 'rejected', message } : { status: 'unknown', message };
}

function instrumentIds(instrument: ResolvedInstrument): { segment: string; id: number } | null {
  if (!instrument.brokerSegment || instrument.brokerInstrumentId === undefined) return null;
  return { segment: instrument.brokerSegment, id: instrument.brokerInstrumentId };
}

function toNumber(value: string | number | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Read the placed order's history: any `Rejected` entry rejects it, otherwise
 * the latest entry describes the fill.
 */
export function interpretOrderHistory(appOrderId: number, history: XtsOrder[]): OrderResult {
  const orderId = String(appOrderId);
  const rejected = history.find((o) => o.OrderStatus === 'Rejected');
  if (rejected) {
    return { status: 'rejected', orderId, message: rejected.CancelRejectReason || 'Order rejected' };
  }

  const latest = history[history.length - 1];
  if (!latest) {
    return { status: 'unknown', orderId, message: 'Order status not available' };
  }

  const fillPrice = toNumber(latest.OrderAverageTradedPrice);
  return {
    status: 'accepted',
    orderId,
    fillPrice: fillPrice && fillPrice > 0 ? fillPrice : undefined,
    filledQty: latest.CumulativeQuantity,
    message: latest.OrderStatus,
  };
}

export class XtsGateway implements BrokerOrderGateway {
  readonly name = 'xts' as const;
  readonly requiresInstrumentIds = true;

  constructor(
    private readonly client: XtsClient,
    private readonly options: XtsGatewayOptions = { statusCheckDelayMs: 1_000 }
  ) {}

  async place(command: OrderCommand): Promise<OrderResult> {
    const ids = instrumentIds(command.instrument);
    if (!ids) {
      return { status: 'rejected', message: `No XTS instrument id for ${command.instrument.tradableSymbol}` };
    }

    const limit = command.style === 'LIMIT';
    let appOrderId: number;
    try {
      appOrderId = await this.client.placeOrder({
        exchangeSegment: ids.segment,
        exchangeInstrumentID: ids.id,
        productType: command.productType,
        orderType: limit ? 'LIMIT' : 'MARKET',
        orderSide: command.side,
        timeInForce: 'DAY',
        disclosedQuantity: 0,
        orderQuantity: command.quantityUnits,
        limitPrice: limit ? command.price : 0,
        stopPrice: 0,
        orderUniqueIdentifier: `AR${Date.now()}`,
      });
    } catch (error) {
      const result = xtsFailure(error);
      logger.error('XTS order failed', {
        symbol: command.instrument.tradableSymbol,
        status: result.status,
        error: result.message,
      });
      return result;
    }

    if (this.options.statusCheckDelayMs > 0) {
      await sleep(this.options.statusCheckDelayMs);
    }

    try {
      const history = await this.client.getOrderHistory(appOrderId);
      const result = interpretOrderHistory(appOrderId, history);
      if (result.status === 'rejected') {
        logger.error('XTS order rejected', { appOrderId, reason: result.message });
      }
      return result;
    } catch (error) {
      const message = errorMessage(error);
      logger.warn('XTS order status not verifiable', { appOrderId, error: message });
      return { status: 'unknown', orderId: String(appOrderId), message: `Status not verifiable: ${message}` };
    }
  }

  /** Square-off by exact quantity; the broker picks the closing side */
  async exitPosition(command: OrderCommand): Promise<OrderResult> {
    const ids = instrumentIds(command.instrument);
    if (!ids) {
      return { status: 'rejected', message: `No XTS instrument id for ${command.instrument.tradableSymbol}` };
    }

    try {
      await this.client.squareOff({
        exchangeSegment: ids.segment,
        exchangeInstrumentID: ids.id,
        productType: command.productType,
        squareoffMode: 'DayWise',
        squareOffQtyValue: command.quantityUnits,
        positionSquareOffQuantityType: 'ExactQty',
      });
      return { status: 'accepted', message: `Squared off ${command.quantityUnits} units` };
    } catch (error) {
      const result = xtsFailure(error);
      logger.error('XTS square-off failed', {
        symbol: command.instrument.tradableSymbol,
        status: result.status,
        error: result.message,
      });
      return result;
    }
  }

  async cancelPending(instrument: ResolvedInstrument): Promise<BulkResult> {
    let open: XtsOrder[];
    try {
      const book = await this.client.getOrderBook();
      open = book.filter(
        (o) =>
          OPEN_STATUSES.has(o.OrderStatus) &&
          (o.ExchangeInstrumentID === instrument.brokerInstrumentId || o.TradingSymbol === instrument.tradableSymbol)
      );
    } catch (error) {
      const message = errorMessage(error);
      logger.error('XTS order book unavailable', { error: message });
      return { ok: false, message };
    }

    if (open.length === 0) {
      return { ok: true, message: `No pending orders for ${instrument.tradableSymbol}` };
    }

    const failures: string[] = [];
    for (const order of open) {
      try {
        await this.client.cancelOrder(order.AppOrderID);
      } catch (error) {
        failures.push(`${order.AppOrderID}: ${errorMessage(error)}`);
      }
    }

    if (failures.length > 0) {
      logger.warn('Some XTS cancels failed', { symbol: instrument.tradableSymbol, failures });
      return {
        ok: false,
        message: `Cancelled ${open.length - failures.length} of ${open.length} orders for ${instrument.tradableSymbol}`,
      };
    }
    return { ok: true, message: `Cancelled ${open.length} order(s) for ${instrument.tradableSymbol}` };
  }

  async cancelAll(): Promise<BulkResult> {
    try {
      await this.client.cancelAll();
      return { ok: true, message: 'All XTS orders cancelled' };
    } catch (error) {
      const message = errorMessage(error);
      logger.error('XTS cancel all failed', { error: message });
      return { ok: false, message };
    }
  }

  async queryPositions(): Promise<BrokerPosition[]> {
    const positions = await this.client.getPositions();
    const result: BrokerPosition[] = [];
    for (const p of positions) {
      const netUnits = toNumber(p.Quantity);
      if (netUnits === undefined) continue;
      result.push({
        tradableSymbol: p.TradingSymbol,
        netUnits,
        productType: p.ProductType,
        brokerInstrumentId: toNumber(p.ExchangeInstrumentId),
      });
    }
    return result;
  }

  async exitAll(): Promise<BulkResult> {
    try {
      await this.client.squareOffAll();
      return { ok: true, message: 'All XTS positions squared off' };
    } catch (error) {
      const message = errorMessage(error);
      logger.error('XTS exit all failed', { error: message });
      return { ok: false, message };
    }
  }
}
