// Gateway selection per broker

import type { RouterConfig } from '../../lib/config';
import { FyersClient, FyersSession } from '../../services/fyers/client';
import { XtsClient, XtsSession } from '../../services/xts/client';
import type { BrokerName, BrokerOrderGateway } from '../types';
import { FyersGateway } from './fyers-gateway';
import { XtsGateway } from './xts-gateway';

export { FyersGateway } from './fyers-gateway';
export { XtsGateway } from './xts-gateway';

/** Build a gateway with its own session; nothing is shared between brokers */
export function createGateway(broker: BrokerName, config: RouterConfig): BrokerOrderGateway {
  if (broker === 'fyers') {
    const session = new FyersSession({
      clientId: config.fyers.clientId,
      accessToken: config.fyers.accessToken,
      tokenFile: config.fyers.tokenFile,
    });
    return new FyersGateway(new FyersClient(session, { apiUrl: config.fyers.apiUrl, timeoutMs: config.brokerTimeoutMs }));
  }

  const session = new XtsSession({
    apiRoot: config.xts.apiRoot,
    apiKey: config.xts.apiKey,
    apiSecret: config.xts.apiSecret,
    source: config.xts.source,
    timeoutMs: config.brokerTimeoutMs,
  });
  return new XtsGateway(new XtsClient(session, config.xts.clientId));
}

export function productTypeFor(broker: BrokerName, config: RouterConfig): string {
  return broker === 'fyers' ? config.fyers.productType : config.xts.productType;
}
