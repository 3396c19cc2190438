// Trade executor: runs a decision's commands against a broker gateway with dry-run support

import { errorMessage, logger } from '../lib/logger';
import type { PositionLedger } from './position-ledger';
import type {
  BrokerOrderGateway,
  CommandReport,
  Decision,
  OrderCommand,
  OrderResult,
} from './types';

export type ExecutionStatus = 'executed' | 'partial' | 'rejected' | 'unknown';

export interface ExecutionReport {
  status: ExecutionStatus;
  commands: CommandReport[];
  /** Ledger value after the last confirmed command */
  netLotsAfter: number;
  /** A command's outcome is ambiguous; the ledger may not match the broker */
  needsReconcile: boolean;
  /** Broker message of the command that stopped the run */
  failure?: string;
}

function report(command: OrderCommand, result: OrderResult | null): CommandReport {
  return {
    side: command.side,
    purpose: command.purpose,
    lots: command.lots,
    quantityUnits: command.quantityUnits,
    price: command.price,
    style: command.style,
    status: result ? result.status : 'skipped',
    orderId: result?.orderId,
    message: result?.message,
  };
}

export class TradeExecutor {
  constructor(
    private readonly gateway: BrokerOrderGateway,
    private readonly ledger: PositionLedger,
    private readonly dryRun = false
  ) {}

  /**
   * Send the commands in order. The ledger moves after each accepted
   * command; a rejected or ambiguous result stops the run and the rest are
   * reported as skipped.
   */
  async execute(key: string, decision: Decision, netLotsBefore: number): Promise<ExecutionReport> {
    const reports: CommandReport[] = [];
    let net = netLotsBefore;
    let cancelled = false;

    for (let i = 0; i < decision.commands.length; i++) {
      const command = decision.commands[i];

      if (command.purpose === 'entry' && !cancelled) {
        cancelled = true;
        await this.cancelPending(command);
      }

      const result = await this.send(command);
      reports.push(report(command, result));

      if (result.status === 'accepted') {
        net += command.lotsDelta;
        try {
          await this.ledger.set(key, net);
        } catch (error) {
          // the broker holds the new position but the ledger does not
          const failure = `ledger write failed: ${errorMessage(error)}`;
          logger.error('Ledger not updated after accepted command', { key, netLots: net, error: failure });
          for (const rest of decision.commands.slice(i + 1)) {
            reports.push(report(rest, null));
          }
          return { status: 'unknown', commands: reports, netLotsAfter: net, needsReconcile: true, failure };
        }
        logger.info('Command accepted', {
          key,
          side: command.side,
          lots: command.lots,
          purpose: command.purpose,
          orderId: result.orderId,
          netLots: net,
        });
        continue;
      }

      for (const rest of decision.commands.slice(i + 1)) {
        reports.push(report(rest, null));
      }

      if (result.status === 'rejected') {
        logger.warn('Command rejected, stopping', { key, purpose: command.purpose, message: result.message });
        return {
          status: i === 0 ? 'rejected' : 'partial',
          commands: reports,
          netLotsAfter: net,
          needsReconcile: false,
          failure: result.message,
        };
      }

      logger.error('Command outcome unknown, instrument needs reconciliation', {
        key,
        purpose: command.purpose,
        message: result.message,
      });
      return { status: 'unknown', commands: reports, netLotsAfter: net, needsReconcile: true, failure: result.message };
    }

    return { status: 'executed', commands: reports, netLotsAfter: net, needsReconcile: false };
  }

  private async send(command: OrderCommand): Promise<OrderResult> {
    if (this.dryRun) {
      logger.info('[DRY-RUN] Would send order', {
        broker: this.gateway.name,
        symbol: command.instrument.tradableSymbol,
        side: command.side,
        lots: command.lots,
        quantityUnits: command.quantityUnits,
        style: command.style,
        price: command.price,
        purpose: command.purpose,
      });
      return { status: 'accepted', orderId: 'dry-run', message: 'dry run' };
    }

    return command.purpose === 'entry' ? this.gateway.place(command) : this.gateway.exitPosition(command);
  }

  private async cancelPending(command: OrderCommand): Promise<void> {
    if (this.dryRun) {
      logger.info('[DRY-RUN] Would cancel pending orders', { symbol: command.instrument.tradableSymbol });
      return;
    }

    const result = await this.gateway.cancelPending(command.instrument);
    if (!result.ok) {
      logger.warn('Pending orders not cancelled before entry', {
        symbol: command.instrument.tradableSymbol,
        message: result.message,
      });
    }
  }
}
