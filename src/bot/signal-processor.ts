// Signal processor: parse, resolve, decide and execute one alert per call
//
// Pipeline:
//   parse → dedup → resolve → ledger lock(instrument) { reconcile → ledger → decide → execute } → notify → audit

import { getConfig, type RouterConfig } from '../lib/config';
import { isDatabaseConfigured } from '../lib/db';
import { errorMessage, logger } from '../lib/logger';
import { parseSignal } from '../lib/tradingview-parser';
import { InstrumentResolver, SymbolMaster } from '../services/instruments';
import { recordSignal } from '../services/signal-audit';
import { createNotifier } from '../services/telegram/notifier';
import type { TradeIntent } from '../types';
import { decide } from './decision-engine';
import { SignalDeduplicator } from './dedup';
import { createGateway, productTypeFor } from './gateways';
import { MemoryPositionLedger, PostgresPositionLedger, ledgerKey, type PositionLedger } from './position-ledger';
import { TradeExecutor, type ExecutionReport } from './trade-executor';
import type {
  BrokerName,
  BrokerOrderGateway,
  BrokerPosition,
  BulkResult,
  Notifier,
  ResolvedInstrument,
  SignalOutcome,
} from './types';

export type InstrumentLookup = Pick<InstrumentResolver, 'resolve' | 'lookupBrokerIds'>;

export type AuditWriter = (broker: BrokerName, outcome: SignalOutcome) => Promise<unknown>;

export interface SignalProcessorDeps {
  broker: BrokerName;
  gateway: BrokerOrderGateway;
  ledger: PositionLedger;
  resolver: InstrumentLookup;
  notifier: Notifier;
  audit: AuditWriter;
  productType: string;
  dryRun?: boolean;
  /** Read live positions before every decision */
  reconcilePositions?: boolean;
  dedup?: SignalDeduplicator;
  keywords?: readonly string[];
  now?: () => Date;
}

export interface PingResult {
  broker: BrokerName;
  dryRun: boolean;
  timestamp: string;
}

const STATUS_BY_EXECUTION: Record<ExecutionReport['status'], SignalOutcome['status']> = {
  executed: 'executed',
  partial: 'partial',
  rejected: 'rejected',
  unknown: 'unknown',
};

/** `[FYERS] EXECUTED NSE:NIFTY24NOVFUT` plus the message and the net move */
export function formatOutcome(broker: BrokerName, outcome: SignalOutcome): string {
  const { intent, instrument } = outcome;
  const subject = instrument?.tradableSymbol ?? (intent ? `${intent.exchange}:${intent.rawSymbol}` : 'signal');
  const lines = [`[${broker.toUpperCase()}] ${outcome.status.toUpperCase()} ${subject}`, outcome.message];
  if (outcome.netLotsBefore !== undefined && outcome.netLotsAfter !== undefined) {
    lines.push(`net lots ${outcome.netLotsBefore} -> ${outcome.netLotsAfter}`);
  }
  return lines.join('\n');
}

function matchesInstrument(position: BrokerPosition, instrument: ResolvedInstrument): boolean {
  if (instrument.brokerInstrumentId !== undefined && position.brokerInstrumentId !== undefined) {
    return position.brokerInstrumentId === instrument.brokerInstrumentId;
  }
  return position.tradableSymbol === instrument.tradableSymbol;
}

export class SignalProcessor {
  readonly broker: BrokerName;
  private readonly gateway: BrokerOrderGateway;
  private readonly ledger: PositionLedger;
  private readonly resolver: InstrumentLookup;
  private readonly notifier: Notifier;
  private readonly audit: AuditWriter;
  private readonly executor: TradeExecutor;
  private readonly productType: string;
  private readonly dryRun: boolean;
  private readonly reconcilePositions: boolean;
  private readonly dedup: SignalDeduplicator | null;
  private readonly keywords?: readonly string[];
  private readonly now: () => Date;

  /** Ledger keys whose last command had an ambiguous outcome */
  private readonly unverified = new Set<string>();

  constructor(deps: SignalProcessorDeps) {
    this.broker = deps.broker;
    this.gateway = deps.gateway;
    this.ledger = deps.ledger;
    this.resolver = deps.resolver;
    this.notifier = deps.notifier;
    this.audit = deps.audit;
    this.productType = deps.productType;
    this.dryRun = deps.dryRun ?? false;
    this.reconcilePositions = deps.reconcilePositions ?? false;
    this.dedup = deps.dedup ?? null;
    this.keywords = deps.keywords;
    this.now = deps.now ?? (() => new Date());
    this.executor = new TradeExecutor(this.gateway, this.ledger, this.dryRun);
  }

  /** Keys that must be reconciled before their next decision */
  get unverifiedKeys(): string[] {
    return [...this.unverified];
  }

  /**
   * Handle one webhook body. Classified failures come back as outcomes;
   * only unexpected errors (database down, bugs) are thrown.
   */
  async process(raw: unknown): Promise<SignalOutcome> {
    const outcome = await this.evaluate(raw);
    await this.finish(outcome);
    return outcome;
  }

  /** Notify and audit an unexpected failure surfaced by the caller */
  async reportFailure(error: unknown): Promise<SignalOutcome> {
    const outcome: SignalOutcome = {
      status: 'failed',
      reason: 'internal_error',
      message: errorMessage(error),
      commands: [],
    };
    await this.finish(outcome);
    return outcome;
  }

  // ─── Admin commands ──────────────────────────────────────────────────────────

  /** Close every position at the broker, then forget this broker's ledger entries */
  async exitAll(): Promise<BulkResult> {
    let result: BulkResult;
    if (this.dryRun) {
      logger.info('[DRY-RUN] Would exit all positions', { broker: this.broker });
      result = { ok: true, message: 'dry run: all positions exited' };
    } else {
      result = await this.gateway.exitAll();
    }

    if (result.ok) {
      const prefix = ledgerKey(this.broker, '');
      const positions = await this.ledger.listAll();
      for (const key of Object.keys(positions)) {
        if (key.startsWith(prefix)) await this.ledger.clear(key);
      }
      this.unverified.clear();
    }

    await this.notify(`[${this.broker.toUpperCase()}] EXIT ALL\n${result.message}`);
    return result;
  }

  async cancelAll(): Promise<BulkResult> {
    let result: BulkResult;
    if (this.dryRun) {
      logger.info('[DRY-RUN] Would cancel all orders', { broker: this.broker });
      result = { ok: true, message: 'dry run: all orders cancelled' };
    } else {
      result = await this.gateway.cancelAll();
    }
    await this.notify(`[${this.broker.toUpperCase()}] CANCEL ALL\n${result.message}`);
    return result;
  }

  ping(): PingResult {
    return { broker: this.broker, dryRun: this.dryRun, timestamp: this.now().toISOString() };
  }

  // ─── Pipeline ────────────────────────────────────────────────────────────────

  private async evaluate(raw: unknown): Promise<SignalOutcome> {
    const parsed = parseSignal(raw, { keywords: this.keywords, now: this.now });
    if (!parsed.success) {
      logger.warn('Signal rejected', { broker: this.broker, reason: parsed.reason, error: parsed.error });
      return { status: 'rejected', reason: parsed.reason, message: parsed.error, commands: [] };
    }

    const intent = parsed.intent;
    if (this.dedup?.isDuplicate(this.broker, intent)) {
      logger.info('Duplicate signal ignored', { broker: this.broker, symbol: intent.rawSymbol });
      return { status: 'ignored', reason: 'duplicate', message: 'ignored — duplicate signal', intent, commands: [] };
    }

    const resolved = this.resolve(intent);
    if (!resolved.ok) {
      logger.warn('Symbol not found', { broker: this.broker, symbol: intent.rawSymbol, error: resolved.error });
      return {
        status: 'skipped',
        reason: 'symbol_not_found',
        message: `symbol not found — ${resolved.error}`,
        intent,
        commands: [],
      };
    }

    const instrument = resolved.instrument;
    const key = ledgerKey(this.broker, instrument.tradableSymbol);
    return this.ledger.withLock(key, () => this.decideAndExecute(intent, instrument, key));
  }

  private resolve(intent: TradeIntent): { ok: true; instrument: ResolvedInstrument } | { ok: false; error: string } {
    const result = this.resolver.resolve({
      exchange: intent.exchange,
      rawSymbol: intent.rawSymbol,
      isFuture: intent.isFuture,
    });
    if (!result.ok) return result;
    if (!this.gateway.requiresInstrumentIds) return result;

    const ids = this.resolver.lookupBrokerIds(result.instrument.exchange, result.instrument.tradableSymbol);
    if (!ids.ok) return ids;
    return {
      ok: true,
      instrument: {
        ...result.instrument,
        brokerSegment: ids.brokerSegment,
        brokerInstrumentId: ids.brokerInstrumentId,
      },
    };
  }

  private async decideAndExecute(
    intent: TradeIntent,
    instrument: ResolvedInstrument,
    key: string
  ): Promise<SignalOutcome> {
    let net = await this.ledger.get(key);

    if (this.reconcilePositions || this.unverified.has(key)) {
      const live = await this.reconcile(instrument, key, net);
      if (live !== null) {
        net = live;
      } else if (this.unverified.has(key)) {
        return {
          status: 'failed',
          reason: 'gateway_unknown',
          message: 'position unverified — live positions unavailable after an ambiguous order',
          intent,
          instrument,
          commands: [],
          netLotsBefore: net,
          netLotsAfter: net,
        };
      }
    }

    const decision = decide(intent, instrument, net, this.productType);
    if (decision.commands.length === 0) {
      logger.info('No orders needed', { key, net, notice: decision.notice });
      return {
        status: decision.reason === 'no_position' ? 'skipped' : 'ignored',
        reason: decision.reason,
        message: decision.notice,
        intent,
        instrument,
        commands: [],
        netLotsBefore: net,
        netLotsAfter: net,
      };
    }

    const execution = await this.executor.execute(key, decision, net);
    let netAfter = execution.netLotsAfter;

    if (execution.needsReconcile) {
      this.unverified.add(key);
      const live = await this.reconcile(instrument, key, netAfter);
      if (live !== null) netAfter = live;
    }

    const status = STATUS_BY_EXECUTION[execution.status];
    return {
      status,
      reason:
        execution.status === 'rejected' || execution.status === 'partial'
          ? 'gateway_rejected'
          : execution.status === 'unknown'
            ? 'gateway_unknown'
            : undefined,
      message: execution.failure ? `${decision.notice} — ${execution.failure}` : decision.notice,
      intent,
      instrument,
      commands: execution.commands,
      netLotsBefore: net,
      netLotsAfter: netAfter,
    };
  }

  /**
   * Overwrite the ledger with the broker's live position. Returns the live
   * lot count, or null when positions could not be read.
   */
  private async reconcile(instrument: ResolvedInstrument, key: string, ledgerLots: number): Promise<number | null> {
    if (this.dryRun) return null;

    let positions: BrokerPosition[];
    try {
      positions = await this.gateway.queryPositions();
    } catch (error) {
      logger.warn('Live positions unavailable, keeping ledger value', { key, error: errorMessage(error) });
      return null;
    }

    const units = positions.find((p) => matchesInstrument(p, instrument))?.netUnits ?? 0;
    const lots = Math.floor(units / instrument.lotSize);

    // an unverified key may hold a stale stored value whatever ledgerLots says
    if (lots !== ledgerLots || this.unverified.has(key)) {
      logger.warn('Ledger reconciled to live position', { key, ledgerLots, liveLots: lots, liveUnits: units });
      await this.ledger.set(key, lots);
    }
    this.unverified.delete(key);
    return lots;
  }

  private async finish(outcome: SignalOutcome): Promise<void> {
    await this.notify(formatOutcome(this.broker, outcome));
    await this.audit(this.broker, outcome);
  }

  private async notify(text: string): Promise<void> {
    const sent = await this.notifier.notify(text);
    if (!sent) {
      logger.warn('Notification not delivered', { broker: this.broker });
    }
  }
}

// ─── Runtime wiring ────────────────────────────────────────────────────────────

let symbolMaster: SymbolMaster | null = null;
let resolver: InstrumentResolver | null = null;
const processors = new Map<BrokerName, SignalProcessor>();

/** One resolver per process so the table cache and memo are shared */
export function getResolver(config: RouterConfig = getConfig()): InstrumentResolver {
  if (!resolver || !symbolMaster) {
    symbolMaster = new SymbolMaster(config.symbolMasterDir);
    resolver = new InstrumentResolver(symbolMaster);
  }
  return resolver;
}

/**
 * Durable ledger when a database is configured. The in-memory ledger is
 * only allowed for dry runs.
 */
export function createLedger(config: RouterConfig): PositionLedger {
  if (isDatabaseConfigured()) {
    return new PostgresPositionLedger();
  }
  if (!config.dryRun) {
    throw new Error('Live trading needs DATABASE_URL for the position ledger (or set DRY_RUN=true)');
  }
  logger.warn('No database configured, using in-memory ledger for dry run');
  return new MemoryPositionLedger();
}

export function createSignalProcessor(broker: BrokerName, config: RouterConfig = getConfig()): SignalProcessor {
  return new SignalProcessor({
    broker,
    gateway: createGateway(broker, config),
    ledger: createLedger(config),
    resolver: getResolver(config),
    notifier: createNotifier(config.telegram),
    audit: isDatabaseConfigured() ? recordSignal : async () => null,
    productType: productTypeFor(broker, config),
    dryRun: config.dryRun,
    reconcilePositions: config.reconcilePositions,
    dedup: new SignalDeduplicator(config.dedupWindowMs),
    keywords: config.signalKeywords,
  });
}

/** Per-broker processor kept for the life of the process */
export function getSignalProcessor(broker: BrokerName): SignalProcessor {
  let processor = processors.get(broker);
  if (!processor) {
    processor = createSignalProcessor(broker);
    processors.set(broker, processor);
  }
  return processor;
}
