// Router core types: order commands, decisions, broker boundary, outcomes

import type { OrderStyle, TradeIntent } from '../types';
import type { SignalStatus } from '../types/database';
import type { BrokerName } from '../lib/config';
import type { ResolvedInstrument } from '../services/instruments/types';

export type { BrokerName, ResolvedInstrument };

export type OrderSide = 'BUY' | 'SELL';

/** Why a command exists: closing, partially closing, or opening exposure */
export type CommandPurpose = 'entry' | 'exit' | 'reduce';

/** One broker order operation produced by the decision engine */
export interface OrderCommand {
  instrument: ResolvedInstrument;
  side: OrderSide;
  lots: number;
  /** lots × lotSize */
  quantityUnits: number;
  /** 0 for market orders */
  price: number;
  style: OrderStyle;
  productType: string;
  purpose: CommandPurpose;
  /** Signed change applied to the ledger once the broker accepts the command */
  lotsDelta: number;
}

/** Why a decision produced no commands */
export type DecisionReason = 'no_position' | 'no_change' | 'unrecognized_comment';

export interface Decision {
  commands: OrderCommand[];
  /** Human-readable summary, e.g. `NOTICE_NO_POSITION` */
  notice: string;
  /** Ledger value if every command is accepted */
  projectedNetLots: number;
  reason?: DecisionReason;
}

export type OrderStatus = 'accepted' | 'rejected' | 'unknown';

export interface OrderResult {
  status: OrderStatus;
  orderId?: string;
  fillPrice?: number;
  filledQty?: number;
  message?: string;
}

/** Live broker position keyed like the ledger */
export interface BrokerPosition {
  tradableSymbol: string;
  /** Signed quantity in units (not lots) */
  netUnits: number;
  productType?: string;
  brokerInstrumentId?: number;
}

export interface BulkResult {
  ok: boolean;
  message: string;
}

/**
 * What the router needs from a broker. Implementations never throw for
 * broker-side failures; they return a status instead.
 */
export interface BrokerOrderGateway {
  readonly name: BrokerName;
  /** XTS addresses instruments by segment and numeric id */
  readonly requiresInstrumentIds: boolean;
  place(command: OrderCommand): Promise<OrderResult>;
  /** Close part or all of an open position (`exit` and `reduce` commands) */
  exitPosition(command: OrderCommand): Promise<OrderResult>;
  cancelPending(instrument: ResolvedInstrument): Promise<BulkResult>;
  cancelAll(): Promise<BulkResult>;
  queryPositions(): Promise<BrokerPosition[]>;
  exitAll(): Promise<BulkResult>;
}

export interface Notifier {
  notify(text: string): Promise<boolean>;
}

/** Per-command record kept for the response and the audit row */
export interface CommandReport {
  side: OrderSide;
  purpose: CommandPurpose;
  lots: number;
  quantityUnits: number;
  price: number;
  style: OrderStyle;
  status: OrderStatus | 'skipped';
  orderId?: string;
  message?: string;
}

export type OutcomeReason =
  | 'unauthorized'
  | 'invalid_format'
  | 'unsafe_content'
  | 'duplicate'
  | 'symbol_not_found'
  | 'no_position'
  | 'no_change'
  | 'unrecognized_comment'
  | 'gateway_rejected'
  | 'gateway_unknown'
  | 'internal_error';

export interface SignalOutcome {
  status: SignalStatus;
  reason?: OutcomeReason;
  message: string;
  intent?: TradeIntent;
  instrument?: ResolvedInstrument;
  commands: CommandReport[];
  netLotsBefore?: number;
  netLotsAfter?: number;
}
