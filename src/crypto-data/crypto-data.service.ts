import { Injectable, Logger } from '@nestjs/common';
import { CoinMarketCapApiError } from '../common/errors/market-data.errors';
import {
  AgentDataPayload,
  CryptoFundamentals,
  MarketMetrics,
  OhlcvCandle,
} from '../common/interfaces/market-data.interface';
import { toNullableNumber } from '../common/utils/coerce';
import { CoinMarketCapService } from '../coinmarketcap/coinmarketcap.service';

/**
 * CryptoDataService - flattened views over CoinMarketCapService for agents
 * No network behavior of its own; errors from the client propagate unchanged.
 */
@Injectable()
export class CryptoDataService {
  private readonly logger = new Logger(CryptoDataService.name);

  constructor(private coinMarketCap: CoinMarketCapService) {}

  async getCryptoPriceData(
    symbol: string,
    startDate: string,
    endDate: string,
  ): Promise<OhlcvCandle[]> {
    return this.coinMarketCap.getHistoricalQuotes(symbol, startDate, endDate);
  }

  /**
   * Latest quote merged with static metadata for one symbol
   */
  async getCryptoFundamentals(symbol: string): Promise<CryptoFundamentals> {
    const ticker = symbol.trim().toUpperCase();
    const currency = this.coinMarketCap.convert;
    const id = String(await this.coinMarketCap.getCryptoId(ticker));

    const quotes = await this.coinMarketCap.getLatestQuote([ticker]);
    const info = await this.coinMarketCap.getCryptoInfo([ticker]);

    const entry = quotes.data?.[id];
    const quote = entry?.quote?.[currency];
    if (!entry || !quote) {
      throw new CoinMarketCapApiError(`No ${currency} quote returned for ${ticker}`);
    }
    const metadata = info.data?.[id];

    return {
      symbol: entry.symbol ?? ticker,
      name: metadata?.name ?? entry.name,
      description: metadata?.description ?? '',
      category: metadata?.category ?? null,
      rank: toNullableNumber(entry.cmc_rank),
      currency,
      price: toNullableNumber(quote.price),
      marketCap: toNullableNumber(quote.market_cap),
      volume24h: toNullableNumber(quote.volume_24h),
      percentChange1h: toNullableNumber(quote.percent_change_1h),
      percentChange24h: toNullableNumber(quote.percent_change_24h),
      percentChange7d: toNullableNumber(quote.percent_change_7d),
      circulatingSupply: toNullableNumber(entry.circulating_supply),
      totalSupply: toNullableNumber(entry.total_supply),
      maxSupply: toNullableNumber(entry.max_supply),
      lastUpdated: quote.last_updated ?? entry.last_updated ?? null,
    };
  }

  /**
   * Global totals plus Bitcoin and Ethereum dominance (percent)
   */
  async getMarketMetrics(): Promise<MarketMetrics> {
    const currency = this.coinMarketCap.convert;
    const { data } = await this.coinMarketCap.getGlobalMetrics();
    const quote = data?.quote?.[currency];
    if (!data || !quote) {
      throw new CoinMarketCapApiError(`Global metrics returned no ${currency} quote`);
    }

    return {
      currency,
      totalMarketCap: toNullableNumber(quote.total_market_cap),
      totalVolume24h: toNullableNumber(quote.total_volume_24h),
      bitcoinDominance: toNullableNumber(data.btc_dominance),
      ethereumDominance: toNullableNumber(data.eth_dominance),
      activeCryptocurrencies: toNullableNumber(data.active_cryptocurrencies),
      activeExchanges: toNullableNumber(data.active_exchanges),
      lastUpdated: quote.last_updated ?? data.last_updated ?? null,
    };
  }

  /**
   * Everything an analysis agent needs for one ticker.
   * `dataPeriod` echoes the caller's strings exactly as given.
   */
  async formatCryptoDataForAgents(
    symbol: string,
    startDate: string,
    endDate: string,
  ): Promise<AgentDataPayload> {
    const ticker = symbol.trim().toUpperCase();
    this.logger.log(`📊 Collecting ${ticker} data for ${startDate} to ${endDate}`);

    const priceData = await this.getCryptoPriceData(ticker, startDate, endDate);
    const fundamentals = await this.getCryptoFundamentals(ticker);
    const marketMetrics = await this.getMarketMetrics();

    return {
      ticker,
      priceData,
      fundamentals,
      marketMetrics,
      dataPeriod: {
        start: startDate,
        end: endDate,
      },
    };
  }
}
