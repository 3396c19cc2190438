// Supabase table types for the router's Postgres schema (see migrations/)

import type { IntentAction, OrderStyle } from './index';

export type SignalStatus =
  | 'executed'
  | 'partial'
  | 'skipped'
  | 'ignored'
  | 'rejected'
  | 'unknown'
  | 'failed';

export interface Database {
  public: {
    Tables: {
      position_ledger: {
        Row: {
          instrument_key: string;
          net_lots: number;
          updated_at: string;
        };
        Insert: {
          instrument_key: string;
          net_lots?: number;
          updated_at?: string;
        };
        Update: {
          instrument_key?: string;
          net_lots?: number;
          updated_at?: string;
        };
        Relationships: [];
      };
      signal_audit: {
        Row: {
          id: number;
          created_at: string;
          broker: string;
          exchange: string | null;
          raw_symbol: string | null;
          resolved_symbol: string | null;
          is_future: boolean | null;
          action: IntentAction | null;
          signed_lots: number | null;
          reference_price: number | null;
          order_style: OrderStyle | null;
          signal_time_utc: string | null;
          signal_time_local: string | null;
          status: SignalStatus;
          reason: string | null;
          message: string | null;
          commands: Record<string, unknown>[];
          source: string | null;
        };
        Insert: {
          id?: number;
          created_at?: string;
          broker: string;
          exchange?: string | null;
          raw_symbol?: string | null;
          resolved_symbol?: string | null;
          is_future?: boolean | null;
          action?: IntentAction | null;
          signed_lots?: number | null;
          reference_price?: number | null;
          order_style?: OrderStyle | null;
          signal_time_utc?: string | null;
          signal_time_local?: string | null;
          status: SignalStatus;
          reason?: string | null;
          message?: string | null;
          commands?: Record<string, unknown>[];
          source?: string | null;
        };
        Update: {
          status?: SignalStatus;
          reason?: string | null;
          message?: string | null;
        };
        Relationships: [];
      };
    };
    Views: Record<string, never>;
    Functions: Record<string, never>;
    Enums: Record<string, never>;
    CompositeTypes: Record<string, never>;
  };
}

export type LedgerRow = Database['public']['Tables']['position_ledger']['Row'];
export type SignalAuditRow = Database['public']['Tables']['signal_audit']['Row'];
export type SignalAuditInsert = Database['public']['Tables']['signal_audit']['Insert'];
