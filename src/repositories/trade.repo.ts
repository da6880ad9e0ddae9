import { SupabaseClient } from '@supabase/supabase-js';
import config from '../config';
import { getSupabaseClient } from '../services/supabase';
import { HttpError } from '../middleware/error.middleware';
import { toTradeRecord } from '../utils/trade-analysis';
import { TradeRecord, TradeRow } from '../types';

export interface TradeRepository {
  findByUserId(userId: string): Promise<TradeRecord[]>;
}

// Минимальная форма ответа PostgREST, которая нам нужна
export interface TradeRowsResponse {
  data: TradeRow[] | null;
  error: { message: string; details?: string | null } | null;
  status: number;
}

export function unwrapTradeRows(response: TradeRowsResponse): TradeRecord[] {
  const { data, error, status } = response;
  if (error || status < 200 || status >= 300) {
    const detail = error?.details || undefined;
    throw new HttpError(500, error?.message || `Trade store responded with status ${status}`, {
      upstreamStatus: status,
      upstreamDetail: detail,
    });
  }
  return (data || []).map(toTradeRecord);
}

export class SupabaseTradeRepository implements TradeRepository {
  constructor(
    private readonly getClient: () => SupabaseClient = getSupabaseClient,
    private readonly table: string = config.supabase.tradesTable
  ) {}

  public async findByUserId(userId: string): Promise<TradeRecord[]> {
    const response = await this.getClient()
      .from(this.table)
      .select('*')
      .eq('user_id', userId)
      .returns<TradeRow[]>();
    return unwrapTradeRows(response);
  }
}

export default SupabaseTradeRepository;
