// Fyers API v3 REST client

import { readFileSync } from 'fs';
import { errorMessage, logger } from '../../lib/logger';
import {
  FyersSide,
  FyersOrderType,
  type FyersResponse,
  type FyersOrderRequest,
  type FyersPlaceOrderResponse,
  type FyersOrder,
  type FyersOrderBookResponse,
  type FyersPosition,
  type FyersPositionsResponse,
} from './types';

/** The broker answered and refused the request */
export class FyersApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code?: number
  ) {
    super(message);
    this.name = 'FyersApiError';
  }
}

/** No readable verdict (5xx, gateway page, garbled body); the request may have taken effect */
export class FyersUnavailableError extends Error {
  constructor(
    message: string,
    readonly status: number
  ) {
    super(message);
    this.name = 'FyersUnavailableError';
  }
}

// ─── Session ─────────────────────────────────────────────────────────────────

export interface FyersSessionOptions {
  clientId?: string;
  /** Takes precedence over the token file */
  accessToken?: string;
  tokenFile: string;
}

function readTokenFile(path: string): string | null {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    logger.error('Fyers token file unreadable', { path, error: errorMessage(error) });
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed === 'object' && parsed !== null && 'access_token' in parsed) {
      const token = parsed.access_token;
      return typeof token === 'string' && token.trim() ? token.trim() : null;
    }
  } catch (error) {
    logger.error('Fyers token file is not valid JSON', { path, error: errorMessage(error) });
  }
  return null;
}

/**
 * Access token issued by the external login flow. Read lazily and cached
 * until a 401 invalidates it.
 */
export class FyersSession {
  private token: string | null = null;

  constructor(private readonly options: FyersSessionOptions) {}

  authHeader(): string {
    const clientId = this.options.clientId;
    if (!clientId) {
      throw new Error('Missing FYERS_CLIENT_ID environment variable');
    }
    if (!this.token) {
      this.token = this.options.accessToken ?? readTokenFile(this.options.tokenFile);
    }
    if (!this.token) {
      throw new Error(`No Fyers access token (set FYERS_ACCESS_TOKEN or write ${this.options.tokenFile})`);
    }
    return `${clientId}:${this.token}`;
  }

  /** Forget the cached token so the next call re-reads the token file */
  invalidate(): void {
    this.token = null;
    logger.warn('Fyers session invalidated');
  }
}

// ─── Client ──────────────────────────────────────────────────────────────────

export interface FyersClientOptions {
  apiUrl: string;
  timeoutMs: number;
}

export class FyersClient {
  constructor(
    private readonly session: FyersSession,
    private readonly options: FyersClientOptions
  ) {}

  private async request<T extends FyersResponse>(
    method: 'GET' | 'POST' | 'DELETE',
    path: string,
    body?: Record<string, unknown>
  ): Promise<T> {
    const url = `${this.options.apiUrl.replace(/\/+$/, '')}${path}`;

    const response = await fetch(url, {
      method,
      headers: {
        Authorization: this.session.authHeader(),
        'Content-Type': 'application/json',
      },
      body: body ? JSON.stringify(body) : undefined,
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (response.status === 401) {
      this.session.invalidate();
    }

    const text = await response.text();
    let data: T | null = null;
    try {
      data = text ? (JSON.parse(text) as T) : null;
    } catch {
      data = null;
    }

    const failure = `Fyers ${method} ${path} failed (${response.status}): ${data?.message || text || `HTTP ${response.status}`}`;

    // 4xx and an explicit `s: error` are refusals; anything else unreadable is not a verdict
    if (response.status >= 400 && response.status < 500) {
      throw new FyersApiError(failure, response.status, data?.code);
    }
    if (response.status >= 500 || !data) {
      throw new FyersUnavailableError(failure, response.status);
    }
    if (data.s === 'error') {
      throw new FyersApiError(failure, response.status, data.code);
    }
    if (data.s !== 'ok') {
      throw new FyersUnavailableError(failure, response.status);
    }

    return data;
  }

  // ─── Orders ────────────────────────────────────────────────────────────────

  async placeOrder(order: FyersOrderRequest): Promise<FyersPlaceOrderResponse> {
    logger.info('Placing Fyers order', {
      symbol: order.symbol,
      side: FyersSide[order.side],
      type: FyersOrderType[order.type],
      qty: order.qty,
      limitPrice: order.limitPrice,
    });

    const data = await this.request<FyersPlaceOrderResponse>('POST', '/orders/sync', { ...order });
    logger.info('Fyers order placed', { orderId: data.id, message: data.message });
    return data;
  }

  async getOrderBook(): Promise<FyersOrder[]> {
    const data = await this.request<FyersOrderBookResponse>('GET', '/orders');
    return data.orderBook ?? [];
  }

  async cancelOrder(id: string): Promise<FyersResponse> {
    logger.info('Cancelling Fyers order', { orderId: id });
    return this.request<FyersResponse>('DELETE', '/orders/sync', { id });
  }

  // ─── Positions ─────────────────────────────────────────────────────────────

  async getPositions(): Promise<FyersPosition[]> {
    const data = await this.request<FyersPositionsResponse>('GET', '/positions');
    return data.netPositions ?? [];
  }

  /** Exit one position by its position id, or every open position */
  async exitPositions(id?: string): Promise<FyersResponse> {
    logger.info('Exiting Fyers positions', { positionId: id ?? 'all' });
    return this.request<FyersResponse>('DELETE', '/positions', id ? { id } : {});
  }
}
