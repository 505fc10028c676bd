export const COINMARKETCAP_OPTIONS = 'COINMARKETCAP_OPTIONS';

export const COINMARKETCAP_BASE_URL = 'https://pro-api.coinmarketcap.com';

export const DEFAULT_CONVERT_CURRENCY = 'USD';

/**
 * Explicit settings; each one wins over its environment variable
 */
export interface CoinMarketCapOptions {
  apiKey?: string;
  baseUrl?: string;
  convert?: string;
}
