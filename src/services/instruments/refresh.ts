// Symbol-master download

import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { EXCHANGES, SYMBOL_MASTER_FILES, getConfig } from '../../lib/config';
import { errorMessage, logger } from '../../lib/logger';
import type { Exchange } from '../../types';

export interface RefreshOptions {
  dir?: string;
  baseUrl?: string;
  timeoutMs?: number;
  exchanges?: readonly Exchange[];
}

export interface RefreshReport {
  exchange: Exchange;
  file: string;
  ok: boolean;
  bytes?: number;
  error?: string;
}

async function refreshOne(exchange: Exchange, dir: string, baseUrl: string, timeoutMs: number): Promise<RefreshReport> {
  const { filename } = SYMBOL_MASTER_FILES[exchange];
  const target = join(dir, filename);
  const temp = `${target}.${process.pid}.tmp`;
  const url = `${baseUrl.replace(/\/+$/, '')}/${filename}`;

  try {
    const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    if (!response.ok) {
      throw new Error(`Download failed (${response.status})`);
    }
    const body = await response.text();
    if (!body.trim()) {
      throw new Error('Downloaded file is empty');
    }

    // readers only ever see the old file or the complete new one
    await writeFile(temp, body, 'utf-8');
    await rename(temp, target);

    logger.info('Symbol master refreshed', { exchange, file: target, bytes: body.length });
    return { exchange, file: target, ok: true, bytes: body.length };
  } catch (error) {
    const message = errorMessage(error);
    await rm(temp, { force: true });
    logger.error('Symbol master refresh failed', { exchange, url, error: message });
    return { exchange, file: target, ok: false, error: message };
  }
}

/**
 * Download every configured symbol-master CSV and swap it into place.
 * Per-file failures are reported, never thrown; the previous file stays.
 */
export async function refreshSymbolMaster(options: RefreshOptions = {}): Promise<RefreshReport[]> {
  const config = getConfig();
  const dir = options.dir ?? config.symbolMasterDir;
  const baseUrl = options.baseUrl ?? config.symbolMasterBaseUrl;
  const timeoutMs = options.timeoutMs ?? config.brokerTimeoutMs;
  const exchanges = options.exchanges ?? EXCHANGES;

  await mkdir(dir, { recursive: true });

  const reports: RefreshReport[] = [];
  for (const exchange of exchanges) {
    reports.push(await refreshOne(exchange, dir, baseUrl, timeoutMs));
  }
  return reports;
}
