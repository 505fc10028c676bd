// Raw CoinCap v3 payloads. Numbers may arrive as strings.

export type CoinCapInterval =
  | 'm1'
  | 'm5'
  | 'm15'
  | 'm30'
  | 'h1'
  | 'h2'
  | 'h6'
  | 'h12'
  | 'd1';

export interface CoinCapHistoryEntry {
  priceUsd?: string | number;
  time?: number;
  date?: string;
}

// Elements are checked one by one; a provider can send nulls in the series
export interface CoinCapHistoryResponse {
  data?: unknown[];
  timestamp?: number;
}

export interface CoinCapMacdEntry {
  macd?: string | number;
  signal?: string | number;
  histogram?: string | number;
  time?: number;
  date?: string;
}

export interface CoinCapMacdResponse {
  macd?: unknown[];
  data?: unknown[];
  timestamp?: number;
}
