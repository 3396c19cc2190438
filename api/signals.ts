import type { VercelRequest, VercelResponse } from '@vercel/node';
import { BROKERS, isBrokerName } from '../src/lib/config';
import { getSupabase } from '../src/lib/supabase';
import type { PaginationMeta } from '../src/types';
import type { SignalStatus } from '../src/types/database';

const VALID_SORT_COLUMNS = ['created_at', 'resolved_symbol', 'status'];

const VALID_STATUSES: SignalStatus[] = ['executed', 'partial', 'skipped', 'ignored', 'rejected', 'unknown', 'failed'];

function isSignalStatus(value: string): value is SignalStatus {
  return (VALID_STATUSES as string[]).includes(value);
}

/** Paged read of the signal audit trail, newest first by default */
export default async function handler(req: VercelRequest, res: VercelResponse): Promise<void> {
  if (req.method !== 'GET') {
    res.status(405).json({ success: false, error: 'Method not allowed' });
    return;
  }

  const page = Math.max(1, parseInt(String(req.query.page ?? '1'), 10) || 1);
  const limit = Math.min(100, Math.max(1, parseInt(String(req.query.limit ?? '25'), 10) || 25));
  const broker = req.query.broker ? String(req.query.broker) : undefined;
  const sort = req.query.sort ? String(req.query.sort) : 'created_at';
  const order = req.query.order === 'asc' ? 'asc' : 'desc';

  if (!VALID_SORT_COLUMNS.includes(sort)) {
    res.status(400).json({
      success: false,
      error: 'Invalid sort column',
      details: `Valid columns: ${VALID_SORT_COLUMNS.join(', ')}`,
    });
    return;
  }

  if (broker && !isBrokerName(broker)) {
    res.status(400).json({
      success: false,
      error: 'Invalid broker filter',
      details: `Valid brokers: ${BROKERS.join(', ')}`,
    });
    return;
  }

  let status: SignalStatus | undefined;
  if (req.query.status) {
    const value = String(req.query.status);
    if (!isSignalStatus(value)) {
      res.status(400).json({
        success: false,
        error: 'Invalid status filter',
        details: `Valid statuses: ${VALID_STATUSES.join(', ')}`,
      });
      return;
    }
    status = value;
  }

  try {
    let countQuery = getSupabase().from('signal_audit').select('*', { count: 'exact', head: true });
    if (broker) countQuery = countQuery.eq('broker', broker);
    if (status) countQuery = countQuery.eq('status', status);

    const { count, error: countError } = await countQuery;
    if (countError) {
      res.status(500).json({ success: false, error: 'Database error', details: countError.message });
      return;
    }

    const total = count ?? 0;
    const offset = (page - 1) * limit;
    let dataQuery = getSupabase()
      .from('signal_audit')
      .select('*')
      .order(sort, { ascending: order === 'asc' })
      .range(offset, offset + limit - 1);
    if (broker) dataQuery = dataQuery.eq('broker', broker);
    if (status) dataQuery = dataQuery.eq('status', status);

    const { data, error: dataError } = await dataQuery;
    if (dataError) {
      res.status(500).json({ success: false, error: 'Database error', details: dataError.message });
      return;
    }

    const pagination: PaginationMeta = { page, limit, total, totalPages: Math.ceil(total / limit) };
    res.status(200).json({ success: true, data: data ?? [], pagination });
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    res.status(500).json({ success: false, error: 'Internal server error', details: message });
  }
}
