export interface PriceQuote {
  date: Date;
  priceUsd: number;
}

export interface MacdPoint {
  date: Date;
  macd: number;
  signal: number;
  histogram: number;
}

export interface OhlcvCandle {
  date: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Latest quote merged with static metadata for one asset
 */
export interface CryptoFundamentals {
  symbol: string;
  name: string;
  description: string;
  category: string | null;
  rank: number | null;
  currency: string;
  price: number | null;
  marketCap: number | null;
  volume24h: number | null;
  percentChange1h: number | null;
  percentChange24h: number | null;
  percentChange7d: number | null;
  circulatingSupply: number | null;
  totalSupply: number | null;
  maxSupply: number | null;
  lastUpdated: string | null;
}

export interface MarketMetrics {
  currency: string;
  totalMarketCap: number | null;
  totalVolume24h: number | null;
  bitcoinDominance: number | null;
  ethereumDominance: number | null;
  activeCryptocurrencies: number | null;
  activeExchanges: number | null;
  lastUpdated: string | null;
}

export interface AgentDataPayload {
  ticker: string;
  priceData: OhlcvCandle[];
  fundamentals: CryptoFundamentals;
  marketMetrics: MarketMetrics;
  dataPeriod: {
    start: string;
    end: string;
  };
}
