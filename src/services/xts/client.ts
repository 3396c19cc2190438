// XTS interactive API REST client

import { logger } from '../../lib/logger';
import type {
  XtsResponse,
  XtsLoginResult,
  XtsOrderRequest,
  XtsPlaceOrderResult,
  XtsOrder,
  XtsPosition,
  XtsPositionsResult,
  XtsSquareOffRequest,
} from './types';

/** The broker answered and refused the request */
export class XtsApiError extends Error {
  constructor(
    message: string,
    readonly status: number
  ) {
    super(message);
    this.name = 'XtsApiError';
  }
}

/** No readable verdict (5xx, gateway page, missing order id); the request may have taken effect */
export class XtsUnavailableError extends Error {
  constructor(
    message: string,
    readonly status: number
  ) {
    super(message);
    this.name = 'XtsUnavailableError';
  }
}

type Method = 'GET' | 'POST' | 'PUT' | 'DELETE';

async function send<T>(
  url: string,
  method: Method,
  headers: Record<string, string>,
  timeoutMs: number,
  body?: Record<string, unknown>
): Promise<{ status: number; data: XtsResponse<T> | null; text: string }> {
  const response = await fetch(url, {
    method,
    headers: { 'Content-Type': 'application/json', ...headers },
    body: body ? JSON.stringify(body) : undefined,
    signal: AbortSignal.timeout(timeoutMs),
  });

  const text = await response.text();
  try {
    const data = text ? (JSON.parse(text) as XtsResponse<T>) : null;
    return { status: response.status, data, text };
  } catch {
    return { status: response.status, data: null, text };
  }
}

// ─── Session ─────────────────────────────────────────────────────────────────

export interface XtsSessionOptions {
  apiRoot: string;
  apiKey?: string;
  apiSecret?: string;
  source: string;
  timeoutMs: number;
}

/**
 * Interactive session token. Logs in on first use, shares one login between
 * concurrent callers and forgets the token after a 401.
 */
export class XtsSession {
  private token: string | null = null;
  private userId: string | null = null;
  private pending: Promise<string> | null = null;

  constructor(private readonly options: XtsSessionOptions) {}

  get apiRoot(): string {
    return this.options.apiRoot.replace(/\/+$/, '');
  }

  get timeoutMs(): number {
    return this.options.timeoutMs;
  }

  get currentUserId(): string | null {
    return this.userId;
  }

  async getToken(): Promise<string> {
    if (this.token) return this.token;
    if (!this.pending) {
      this.pending = this.login().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  invalidate(): void {
    this.token = null;
    this.userId = null;
    logger.warn('XTS session invalidated');
  }

  private async login(): Promise<string> {
    const { apiKey, apiSecret, source } = this.options;
    if (!apiKey || !apiSecret) {
      throw new Error('Missing XTS_INTERACTIVE_API_KEY or XTS_INTERACTIVE_API_SECRET environment variables');
    }

    const { status, data, text } = await send<XtsLoginResult>(
      `${this.apiRoot}/interactive/user/session`,
      'POST',
      {},
      this.options.timeoutMs,
      { appKey: apiKey, secretKey: apiSecret, source }
    );

    if (data?.type !== 'success' || !data.result?.token) {
      const description = data?.description || text || `HTTP ${status}`;
      logger.error('XTS login failed', { status, description });
      throw new XtsApiError(`XTS login failed: ${description}`, status);
    }

    this.token = data.result.token;
    this.userId = data.result.userID;
    logger.info('Logged in to XTS', { userId: this.userId });
    return this.token;
  }
}

// ─── Client ──────────────────────────────────────────────────────────────────

export class XtsClient {
  constructor(
    private readonly session: XtsSession,
    private readonly clientId: string
  ) {}

  private async request<T>(method: Method, path: string, body?: Record<string, unknown>): Promise<T | undefined> {
    const token = await this.session.getToken();
    const { status, data, text } = await send<T>(
      `${this.session.apiRoot}${path}`,
      method,
      { Authorization: token },
      this.session.timeoutMs,
      body
    );

    if (status === 401) {
      this.session.invalidate();
    }
    if (status < 400 && data?.type === 'success') {
      return data.result;
    }

    const failure = `XTS ${method} ${path.split('?')[0]} failed (${status}): ${data?.description || text || `HTTP ${status}`}`;
    if ((status >= 400 && status < 500) || (status < 500 && data?.type === 'error')) {
      throw new XtsApiError(failure, status);
    }
    throw new XtsUnavailableError(failure, status);
  }

  // ─── Orders ────────────────────────────────────────────────────────────────

  async placeOrder(order: Omit<XtsOrderRequest, 'clientID'>): Promise<number> {
    logger.info('Placing XTS order', {
      segment: order.exchangeSegment,
      instrumentId: order.exchangeInstrumentID,
      side: order.orderSide,
      type: order.orderType,
      qty: order.orderQuantity,
      limitPrice: order.limitPrice,
    });

    const result = await this.request<XtsPlaceOrderResult>('POST', '/interactive/orders', {
      ...order,
      clientID: this.clientId,
    });
    if (result?.AppOrderID === undefined) {
      throw new XtsUnavailableError('XTS order response carried no AppOrderID', 200);
    }
    logger.info('XTS order placed', { appOrderId: result.AppOrderID });
    return result.AppOrderID;
  }

  /** Status history of one order, oldest first */
  async getOrderHistory(appOrderId: number): Promise<XtsOrder[]> {
    const result = await this.request<XtsOrder[]>('GET', `/interactive/orders?appOrderID=${appOrderId}`);
    return Array.isArray(result) ? result : [];
  }

  async getOrderBook(): Promise<XtsOrder[]> {
    const result = await this.request<XtsOrder[]>(
      'GET',
      `/interactive/orders/dealerorderbook?clientID=${encodeURIComponent(this.clientId)}`
    );
    return Array.isArray(result) ? result : [];
  }

  async cancelOrder(appOrderId: number): Promise<void> {
    logger.info('Cancelling XTS order', { appOrderId });
    await this.request<unknown>(
      'DELETE',
      `/interactive/orders/cancel?appOrderID=${appOrderId}&clientID=${encodeURIComponent(this.clientId)}`
    );
  }

  async cancelAll(): Promise<void> {
    logger.info('Cancelling all XTS orders');
    await this.request<unknown>('POST', '/interactive/orders/cancelall', { clientID: this.clientId });
  }

  // ─── Portfolio ─────────────────────────────────────────────────────────────

  async getPositions(): Promise<XtsPosition[]> {
    const result = await this.request<XtsPositionsResult>(
      'GET',
      `/interactive/portfolio/dealerpositions?dayOrNet=NetWise&clientID=${encodeURIComponent(this.clientId)}`
    );
    return result?.positionList ?? [];
  }

  async squareOff(request: Omit<XtsSquareOffRequest, 'clientID'>): Promise<void> {
    logger.info('Squaring off XTS position', {
      segment: request.exchangeSegment,
      instrumentId: request.exchangeInstrumentID,
      qty: request.squareOffQtyValue,
    });
    await this.request<unknown>('PUT', '/interactive/portfolio/squareoff', {
      ...request,
      clientID: this.clientId,
    });
  }

  async squareOffAll(): Promise<void> {
    logger.info('Squaring off all XTS positions');
    await this.request<unknown>('PUT', '/interactive/portfolio/squareoffall', {
      squareoffMode: 'NetWise',
      clientID: this.clientId,
    });
  }
}
