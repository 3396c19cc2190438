import type { VercelRequest, VercelResponse } from '@vercel/node';
import { BROKERS, isBrokerName } from '../src/lib/config';
import { getSupabase } from '../src/lib/supabase';
import type { PaginationMeta } from '../src/types';

const VALID_SORT_COLUMNS = ['instrument_key', 'net_lots', 'updated_at'];

export default async function handler(req: VercelRequest, res: VercelResponse): Promise<void> {
  if (req.method !== 'GET') {
    res.status(405).json({ success: false, error: 'Method not allowed' });
    return;
  }

  const page = Math.max(1, parseInt(String(req.query.page ?? '1'), 10) || 1);
  const limit = Math.min(100, Math.max(1, parseInt(String(req.query.limit ?? '25'), 10) || 25));
  const broker = req.query.broker ? String(req.query.broker) : undefined;
  const sort = req.query.sort ? String(req.query.sort) : 'instrument_key';
  const order = req.query.order === 'desc' ? 'desc' : 'asc';

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

  try {
    let countQuery = getSupabase().from('position_ledger').select('*', { count: 'exact', head: true });
    if (broker) countQuery = countQuery.like('instrument_key', `${broker}/%`);

    const { count, error: countError } = await countQuery;
    if (countError) {
      res.status(500).json({ success: false, error: 'Database error', details: countError.message });
      return;
    }

    const total = count ?? 0;
    const offset = (page - 1) * limit;
    let dataQuery = getSupabase()
      .from('position_ledger')
      .select('*')
      .order(sort, { ascending: order === 'asc' })
      .range(offset, offset + limit - 1);
    if (broker) dataQuery = dataQuery.like('instrument_key', `${broker}/%`);

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
