// Signal audit trail - one row per processed signal

import { query } from '../lib/db';
import { errorMessage, logger } from '../lib/logger';
import type { SignalAuditInsert, SignalAuditRow } from '../types/database';
import type { BrokerName, SignalOutcome } from '../bot/types';

/**
 * Flatten an outcome into the audit row. Fields the pipeline never reached
 * (no intent for a rejected payload, no instrument when resolution failed)
 * stay null.
 */
export function buildAuditRow(broker: BrokerName, outcome: SignalOutcome): SignalAuditInsert {
  const { intent, instrument } = outcome;
  return {
    broker,
    exchange: intent?.exchange ?? null,
    raw_symbol: intent?.rawSymbol ?? null,
    resolved_symbol: instrument?.tradableSymbol ?? null,
    is_future: intent?.isFuture ?? null,
    action: intent?.action ?? null,
    signed_lots: intent?.signedLots ?? null,
    reference_price: intent?.referencePrice ?? null,
    order_style: intent?.orderStyle ?? null,
    signal_time_utc: intent?.receivedAt.toISOString() ?? null,
    signal_time_local: intent?.receivedAtLocal ?? null,
    status: outcome.status,
    reason: outcome.reason ?? null,
    message: outcome.message,
    commands: outcome.commands.map((c) => ({ ...c })),
    source: intent?.source ?? null,
  };
}

/**
 * Persist the outcome. A failed write is logged and reported as null; it
 * never changes the outcome itself.
 */
export async function recordSignal(broker: BrokerName, outcome: SignalOutcome): Promise<number | null> {
  const row = buildAuditRow(broker, outcome);
  const commands = JSON.stringify(row.commands ?? []);

  try {
    const result = await query<Pick<SignalAuditRow, 'id'>>`
      INSERT INTO signal_audit (
        broker, exchange, raw_symbol, resolved_symbol, is_future,
        action, signed_lots, reference_price, order_style,
        signal_time_utc, signal_time_local,
        status, reason, message, commands, source
      ) VALUES (
        ${row.broker}, ${row.exchange}, ${row.raw_symbol}, ${row.resolved_symbol}, ${row.is_future},
        ${row.action}, ${row.signed_lots}, ${row.reference_price}, ${row.order_style},
        ${row.signal_time_utc}, ${row.signal_time_local},
        ${row.status}, ${row.reason}, ${row.message}, ${commands}::jsonb, ${row.source}
      )
      RETURNING id
    `;

    const id = result[0]?.id ?? null;
    logger.debug('Signal audited', { id, status: row.status });
    return id;
  } catch (error) {
    logger.error('Failed to write signal audit', {
      error: errorMessage(error, 'Unknown database error'),
      status: row.status,
      symbol: row.raw_symbol,
    });
    return null;
  }
}
