// Runtime configuration read from environment variables

import { readFileSync } from 'fs';
import type { Exchange } from '../types';

export type BrokerName = 'fyers' | 'xts';

export const BROKERS: readonly BrokerName[] = ['fyers', 'xts'];

export function isBrokerName(value: string): value is BrokerName {
  return (BROKERS as readonly string[]).includes(value);
}

export interface FyersConfig {
  apiUrl: string;
  clientId?: string;
  accessToken?: string;
  tokenFile: string;
  productType: string;
}

export interface XtsConfig {
  apiRoot: string;
  apiKey?: string;
  apiSecret?: string;
  source: string;
  clientId: string;
  productType: string;
}

export interface TelegramConfig {
  token?: string;
  chatId?: string;
}

export interface RouterConfig {
  dryRun: boolean;
  /** Query live broker positions before every decision */
  reconcilePositions: boolean;
  brokerTimeoutMs: number;
  dedupWindowMs: number;
  /** Both must occur (case-insensitive) for a signal to be accepted */
  signalKeywords: string[];
  symbolMasterDir: string;
  symbolMasterBaseUrl: string;
  webhookSecret?: string;
  fyers: FyersConfig;
  xts: XtsConfig;
  telegram: TelegramConfig;
}

function env(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function envInt(name: string, fallback: number): number {
  const raw = env(name);
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function envFlag(name: string, fallback: boolean): boolean {
  const raw = env(name)?.toLowerCase();
  if (raw === undefined) return fallback;
  return raw === '1' || raw === 'true' || raw === 'yes';
}

/**
 * Build the router configuration from the current environment.
 * Read on every call so tests and the CLI can adjust `process.env`.
 */
export function getConfig(): RouterConfig {
  const keywords = (env('SIGNAL_TAG_KEYWORDS') ?? 'radhe,algo')
    .split(',')
    .map((k) => k.trim().toLowerCase())
    .filter((k) => k.length > 0);

  return {
    dryRun: envFlag('DRY_RUN', false),
    reconcilePositions: envFlag('RECONCILE_POSITIONS', true),
    brokerTimeoutMs: envInt('BROKER_TIMEOUT_MS', 10_000),
    dedupWindowMs: envInt('DEDUP_WINDOW_MS', 5_000),
    signalKeywords: keywords,
    symbolMasterDir: env('SYMBOL_MASTER_DIR') ?? 'data/symbols',
    symbolMasterBaseUrl: env('SYMBOL_MASTER_BASE_URL') ?? 'https://public.fyers.in/sym_details',
    webhookSecret: env('WEBHOOK_SECRET'),
    fyers: {
      apiUrl: env('FYERS_API_URL') ?? 'https://api-t1.fyers.in/api/v3',
      clientId: env('FYERS_CLIENT_ID'),
      accessToken: env('FYERS_ACCESS_TOKEN'),
      tokenFile: env('FYERS_TOKEN_FILE') ?? 'store_token.json',
      productType: env('FYERS_PRODUCT_TYPE') ?? 'MARGIN',
    },
    xts: {
      apiRoot: env('XTS_API_ROOT') ?? 'https://api.xts.com',
      apiKey: env('XTS_INTERACTIVE_API_KEY'),
      apiSecret: env('XTS_INTERACTIVE_API_SECRET'),
      source: env('XTS_API_SOURCE') ?? 'WEBAPI',
      clientId: env('XTS_CLIENT_ID') ?? '*****',
      productType: env('XTS_PRODUCT_TYPE') ?? 'NRML',
    },
    telegram: {
      token: env('TELEGRAM_TOKEN'),
      chatId: env('TELEGRAM_CHAT_ID'),
    },
  };
}

export const EXCHANGES: readonly Exchange[] = ['NSE', 'BSE', 'MCX'];

/** Symbol-master table per exchange class */
export const SYMBOL_MASTER_FILES: Record<Exchange, { filename: string; segmentCode: number }> = {
  NSE: { filename: 'NSE_FO.csv', segmentCode: 11 },
  BSE: { filename: 'BSE_FO.csv', segmentCode: 14 },
  MCX: { filename: 'MCX_COM.csv', segmentCode: 30 },
};

/**
 * Load `KEY=value` lines from a dotenv-style file without overriding variables
 * that are already set. Missing files are not an error.
 */
export function loadEnvFile(path = '.env.local'): number {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch {
    return 0;
  }

  let loaded = 0;
  for (const line of content.split('\n')) {
    const match = line.match(/^([A-Z0-9_]+)=(.+)$/);
    if (match && !process.env[match[1]]) {
      process.env[match[1]] = match[2].trim();
      loaded++;
    }
  }
  return loaded;
}
