import type { VercelRequest, VercelResponse } from '@vercel/node';
import { getConfig } from '../src/lib/config';
import { checkDatabaseConnection } from '../src/lib/db';

/** Liveness plus ledger database reachability; always 200 so probes can read the body */
export default async function handler(_req: VercelRequest, res: VercelResponse): Promise<void> {
  const database = await checkDatabaseConnection();
  res.status(200).json({
    status: database.connected ? 'ok' : 'degraded',
    version: '1.0.0',
    dryRun: getConfig().dryRun,
    database,
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
  });
}
