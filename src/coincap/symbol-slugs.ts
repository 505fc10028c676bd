/**
 * Lowercase ticker -> CoinCap asset id.
 * Tickers missing here are sent to CoinCap as their lowercased form.
 */
export const SYMBOL_TO_SLUG: ReadonlyMap<string, string> = new Map([
  ['btc', 'bitcoin'],
  ['eth', 'ethereum'],
  ['usdt', 'tether'],
  ['bnb', 'binance-coin'],
  ['sol', 'solana'],
  ['xrp', 'xrp'],
  ['usdc', 'usd-coin'],
  ['ada', 'cardano'],
  ['doge', 'dogecoin'],
  ['trx', 'tron'],
  ['dot', 'polkadot'],
  ['ltc', 'litecoin'],
  ['link', 'chainlink'],
  ['avax', 'avalanche'],
  ['xlm', 'stellar'],
]);
