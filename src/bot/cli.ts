#!/usr/bin/env node
/* eslint-disable no-console */
// Router CLI -- entry point for `npm run bot -- <command>`

import { fileURLToPath } from 'url';
import { BROKERS, getConfig, isBrokerName, loadEnvFile, type BrokerName } from '../lib/config';
import { enableFileLogging } from '../lib/logger';
import { runMigrations } from '../lib/migrate';
import { refreshSymbolMaster } from '../services/instruments';
import { createGateway } from './gateways';
import { createLedger, getResolver, getSignalProcessor } from './signal-processor';

// --- Helpers ---

function getArg(argv: string[], flag: string): string | undefined {
  const idx = argv.indexOf(flag);
  if (idx === -1 || idx + 1 >= argv.length) return undefined;
  return argv[idx + 1];
}

function usage(): never {
  console.error('Usage: npm run bot -- <command> [options]');
  console.error('');
  console.error('  resolve <EXCHANGE> <SYMBOL> [--future] [--broker xts]');
  console.error('  positions [--broker <b>] [--live]');
  console.error('  exit-all --broker <b>');
  console.error('  cancel-all --broker <b>');
  console.error('  refresh-symbols');
  console.error('  migrate');
  console.error('');
  console.error('Global flags: --log-dir <dir> (also write JSON log lines to a file)');
  console.error(`Brokers: ${BROKERS.join(', ')}`);
  process.exit(1);
}

function requireBroker(args: string[]): BrokerName {
  const broker = getArg(args, '--broker')?.toLowerCase();
  if (!broker || !isBrokerName(broker)) {
    console.error(`Error: --broker must be one of ${BROKERS.join(', ')}`);
    process.exit(1);
  }
  return broker;
}

// --- Commands ---

function resolveCommand(args: string[]): void {
  const [exchange, symbol] = args;
  if (!exchange || !symbol) usage();

  const resolver = getResolver();
  const result = resolver.resolve({ exchange, rawSymbol: symbol, isFuture: args.includes('--future') });
  if (!result.ok) {
    console.error(`Not resolved (${result.reason}): ${result.error}`);
    process.exit(1);
  }

  console.log(JSON.stringify(result.instrument, null, 2));

  if (getArg(args, '--broker') === 'xts') {
    const ids = resolver.lookupBrokerIds(result.instrument.exchange, result.instrument.tradableSymbol);
    console.log(ids.ok ? `XTS ${ids.brokerSegment} ${ids.brokerInstrumentId}` : `No XTS id: ${ids.error}`);
  }
}

async function positionsCommand(args: string[]): Promise<void> {
  const config = getConfig();
  const filter = getArg(args, '--broker');

  const ledger = createLedger(config);
  const rows = Object.entries(await ledger.listAll()).filter(([key]) => !filter || key.startsWith(`${filter}/`));

  console.log(`==== Ledger (${config.dryRun ? 'DRY-RUN' : 'LIVE'}) ====`);
  if (rows.length === 0) {
    console.log('  (flat)');
  }
  for (const [key, lots] of rows) {
    console.log(`  ${key.padEnd(48)} ${lots > 0 ? '+' : ''}${lots}`);
  }

  if (args.includes('--live')) {
    const broker = requireBroker(args);
    const live = await createGateway(broker, config).queryPositions();
    console.log('');
    console.log(`==== ${broker.toUpperCase()} live positions ====`);
    for (const p of live.filter((p) => p.netUnits !== 0)) {
      console.log(`  ${p.tradableSymbol.padEnd(48)} ${p.netUnits} units${p.productType ? ` (${p.productType})` : ''}`);
    }
  }
}

async function exitAllCommand(args: string[]): Promise<void> {
  const result = await getSignalProcessor(requireBroker(args)).exitAll();
  console.log(result.message);
  if (!result.ok) process.exit(1);
}

async function cancelAllCommand(args: string[]): Promise<void> {
  const result = await getSignalProcessor(requireBroker(args)).cancelAll();
  console.log(result.message);
  if (!result.ok) process.exit(1);
}

async function refreshSymbolsCommand(): Promise<void> {
  const reports = await refreshSymbolMaster();
  for (const report of reports) {
    console.log(report.ok ? `  + ${report.exchange}: ${report.bytes} bytes` : `  ! ${report.exchange}: ${report.error}`);
  }
  if (reports.some((r) => !r.ok)) process.exit(1);
}

async function migrateCommand(): Promise<void> {
  const result = await runMigrations(fileURLToPath(new URL('../../migrations', import.meta.url)));
  if (result.error) {
    console.error(`Migration error: ${result.error}`);
    process.exit(1);
  }
  console.log(`Applied ${result.applied.length}, skipped ${result.skipped.length} migration(s)`);
}

// --- Main ---

async function main(): Promise<void> {
  const [command, ...args] = process.argv.slice(2);

  // Load env vars from .env.local
  loadEnvFile();

  const logDir = getArg(args, '--log-dir');
  if (logDir) {
    console.log(`Logging to ${enableFileLogging(logDir)}`);
  }

  switch (command) {
    case 'resolve':
      resolveCommand(args);
      return;
    case 'positions':
      await positionsCommand(args);
      return;
    case 'exit-all':
      await exitAllCommand(args);
      return;
    case 'cancel-all':
      await cancelAllCommand(args);
      return;
    case 'refresh-symbols':
      await refreshSymbolsCommand();
      return;
    case 'migrate':
      await migrateCommand();
      return;
    default:
      usage();
  }
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
