// Raw CoinMarketCap Pro API payloads, snake_case as the provider sends them

export type CmcOhlcvInterval =
  | 'hourly'
  | 'daily'
  | 'weekly'
  | 'monthly'
  | 'yearly'
  | '1h'
  | '2h'
  | '3h'
  | '4h'
  | '6h'
  | '12h'
  | '1d'
  | '2d'
  | '3d'
  | '7d'
  | '14d'
  | '15d'
  | '30d'
  | '60d'
  | '90d'
  | '365d';

export interface CmcStatus {
  timestamp?: string;
  error_code: number;
  error_message: string | null;
  elapsed?: number;
  credit_count?: number;
}

export interface CmcResponse<T> {
  status: CmcStatus;
  data: T;
}

export interface CmcMapEntry {
  id: number;
  name: string;
  symbol: string;
  slug: string;
  rank?: number;
  is_active?: number;
}

export interface CmcQuoteValues {
  price: number | null;
  volume_24h: number | null;
  volume_change_24h?: number | null;
  market_cap: number | null;
  market_cap_dominance?: number | null;
  fully_diluted_market_cap?: number | null;
  percent_change_1h: number | null;
  percent_change_24h: number | null;
  percent_change_7d: number | null;
  percent_change_30d?: number | null;
  last_updated: string;
}

export interface CmcQuoteEntry {
  id: number;
  name: string;
  symbol: string;
  slug: string;
  cmc_rank: number | null;
  circulating_supply: number | null;
  total_supply: number | null;
  max_supply: number | null;
  last_updated: string;
  quote: Record<string, CmcQuoteValues>;
}

export interface CmcInfoEntry {
  id: number;
  name: string;
  symbol: string;
  slug: string;
  category: string | null;
  description: string | null;
  logo?: string;
  tags?: string[] | null;
  urls?: Record<string, string[]>;
  date_added?: string;
}

export interface CmcOhlcvValues {
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  market_cap?: number;
  timestamp?: string;
}

export interface CmcOhlcvQuote {
  time_open?: string;
  time_close?: string;
  time_high?: string;
  time_low?: string;
  quote?: Record<string, CmcOhlcvValues>;
}

export interface CmcOhlcvData {
  id: number;
  name: string;
  symbol: string;
  quotes: CmcOhlcvQuote[];
}

export interface CmcGlobalQuoteValues {
  total_market_cap: number | null;
  total_volume_24h: number | null;
  altcoin_market_cap?: number | null;
  altcoin_volume_24h?: number | null;
  last_updated: string;
}

export interface CmcGlobalMetrics {
  btc_dominance: number | null;
  eth_dominance: number | null;
  active_cryptocurrencies: number | null;
  total_cryptocurrencies?: number | null;
  active_exchanges: number | null;
  last_updated: string;
  quote: Record<string, CmcGlobalQuoteValues>;
}
