import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import {
  CoinMarketCapApiError,
  ConfigurationError,
  SymbolNotFoundError,
} from '../common/errors/market-data.errors';
import {
  CmcGlobalMetrics,
  CmcInfoEntry,
  CmcMapEntry,
  CmcOhlcvData,
  CmcOhlcvInterval,
  CmcOhlcvQuote,
  CmcQuoteEntry,
  CmcResponse,
} from '../common/interfaces/coinmarketcap.interface';
import { OhlcvCandle } from '../common/interfaces/market-data.interface';
import { isRecord, toFiniteNumber, toUtcDate } from '../common/utils/coerce';
import { toEpochRange } from '../common/utils/date-range';
import { resolveHttpTimeout } from '../config/http.config';
import {
  COINMARKETCAP_BASE_URL,
  COINMARKETCAP_OPTIONS,
  CoinMarketCapOptions,
  DEFAULT_CONVERT_CURRENCY,
} from './coinmarketcap.constants';

type QueryParams = Record<string, string | number>;

function isOhlcvData(value: unknown): value is CmcOhlcvData {
  return isRecord(value) && Array.isArray(value.quotes);
}

function isMapEntry(value: unknown): value is CmcMapEntry {
  return isRecord(value) && typeof value.symbol === 'string' && typeof value.id === 'number';
}

/**
 * CoinMarketCapService - fundamentals from the CoinMarketCap Pro API
 *
 * Unlike CoinCapService nothing is swallowed here: a missing key, an unknown
 * symbol or a failed request reaches the caller as an error.
 */
@Injectable()
export class CoinMarketCapService {
  private readonly logger = new Logger(CoinMarketCapService.name);
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly convert: string;
  private readonly client: AxiosInstance;
  private cryptoMap: ReadonlyMap<string, number> | null = null;

  constructor(
    private configService: ConfigService,
    @Optional() @Inject(COINMARKETCAP_OPTIONS) options: CoinMarketCapOptions = {},
  ) {
    const apiKey = options.apiKey || this.configService.get<string>('COINMARKETCAP_API_KEY');
    if (!apiKey) {
      throw new ConfigurationError(
        'CoinMarketCap API key not provided: set COINMARKETCAP_API_KEY or pass apiKey to CoinMarketCapModule.forRoot()',
      );
    }

    this.apiKey = apiKey;
    this.baseUrl =
      options.baseUrl ??
      this.configService.get<string>('COINMARKETCAP_BASE_URL', COINMARKETCAP_BASE_URL);
    this.convert = (
      options.convert ??
      this.configService.get<string>('COINMARKETCAP_CONVERT', DEFAULT_CONVERT_CURRENCY)
    ).toUpperCase();

    this.client = axios.create({
      baseURL: this.baseUrl,
      timeout: resolveHttpTimeout(this.configService),
      headers: {
        'X-CMC_PRO_API_KEY': apiKey,
        Accept: 'application/json',
      },
    });
  }

  /**
   * Symbol -> CoinMarketCap id for every listed asset.
   * Fetched on first use and kept for the lifetime of the service.
   */
  async getCryptoMap(): Promise<ReadonlyMap<string, number>> {
    if (this.cryptoMap) {
      return this.cryptoMap;
    }

    this.logger.log('📡 Fetching CoinMarketCap id map...');
    const body = await this.request<unknown[]>('/v1/cryptocurrency/map', {
      sort: 'cmc_rank',
    });

    // Several assets share tickers; the list is rank-sorted so the first one wins
    const map = new Map<string, number>();
    let skipped = 0;
    for (const entry of Array.isArray(body.data) ? body.data : []) {
      if (!isMapEntry(entry)) {
        skipped += 1;
        continue;
      }
      const symbol = entry.symbol.toUpperCase();
      if (!map.has(symbol)) {
        map.set(symbol, entry.id);
      }
    }
    if (skipped > 0) {
      this.logger.warn(`Skipped ${skipped} CoinMarketCap map entries without a symbol or id`);
    }

    this.logger.log(`✅ Loaded ${map.size} CoinMarketCap symbols`);
    this.cryptoMap = map;
    return map;
  }

  async getCryptoId(symbol: string): Promise<number> {
    const map = await this.getCryptoMap();
    const id = map.get(symbol.trim().toUpperCase());
    if (id === undefined) {
      throw new SymbolNotFoundError(symbol);
    }
    return id;
  }

  /**
   * Latest market quotes, keyed by id string
   */
  async getLatestQuote(symbols: string[]): Promise<CmcResponse<Record<string, CmcQuoteEntry>>> {
    const ids = await this.resolveIds(symbols);
    return this.request<Record<string, CmcQuoteEntry>>('/v1/cryptocurrency/quotes/latest', {
      id: ids.join(','),
      convert: this.convert,
    });
  }

  /**
   * Daily (by default) OHLCV candles, oldest first
   */
  async getHistoricalQuotes(
    symbol: string,
    startDate: string,
    endDate: string,
    interval: CmcOhlcvInterval = 'daily',
  ): Promise<OhlcvCandle[]> {
    // Rejects malformed or inverted dates before any request
    toEpochRange(startDate, endDate);
    const id = await this.getCryptoId(symbol);

    const body = await this.request<unknown>('/v2/cryptocurrency/ohlcv/historical', {
      id,
      time_start: startDate,
      time_end: endDate,
      interval,
      convert: this.convert,
    });

    const quotes = this.extractOhlcvQuotes(body.data, id);
    const candles: OhlcvCandle[] = [];
    for (const quote of quotes) {
      const candle = this.toCandle(quote);
      if (candle) {
        candles.push(candle);
      }
    }

    if (candles.length === 0) {
      this.logger.warn(`No OHLCV data returned for ${symbol} between ${startDate} and ${endDate}`);
    }
    return candles.sort((a, b) => a.date.getTime() - b.date.getTime());
  }

  /**
   * Static metadata (name, description, category, links), keyed by id string
   */
  async getCryptoInfo(symbols: string[]): Promise<CmcResponse<Record<string, CmcInfoEntry>>> {
    const ids = await this.resolveIds(symbols);
    return this.request<Record<string, CmcInfoEntry>>('/v2/cryptocurrency/info', {
      id: ids.join(','),
    });
  }

  async getGlobalMetrics(): Promise<CmcResponse<CmcGlobalMetrics>> {
    return this.request<CmcGlobalMetrics>('/v1/global-metrics/quotes/latest', {
      convert: this.convert,
    });
  }

  private async resolveIds(symbols: string[]): Promise<number[]> {
    const ids: number[] = [];
    for (const symbol of symbols) {
      ids.push(await this.getCryptoId(symbol));
    }
    return ids;
  }

  // Keyed by id when the endpoint echoes the request shape, flat otherwise
  private extractOhlcvQuotes(data: unknown, id: number): CmcOhlcvQuote[] {
    if (isOhlcvData(data)) {
      return data.quotes;
    }
    if (isRecord(data)) {
      const nested = data[String(id)];
      if (isOhlcvData(nested)) {
        return nested.quotes;
      }
    }
    return [];
  }

  private toCandle(quote: CmcOhlcvQuote): OhlcvCandle | null {
    const values = quote.quote?.[this.convert];
    const date = toUtcDate(quote.time_open) ?? toUtcDate(values?.timestamp);
    const open = toFiniteNumber(values?.open);
    const high = toFiniteNumber(values?.high);
    const low = toFiniteNumber(values?.low);
    const close = toFiniteNumber(values?.close);
    const volume = toFiniteNumber(values?.volume);

    if (
      !date ||
      open === undefined ||
      high === undefined ||
      low === undefined ||
      close === undefined ||
      volume === undefined
    ) {
      return null;
    }
    return { date, open, high, low, close, volume };
  }

  private async request<T>(path: string, params: QueryParams): Promise<CmcResponse<T>> {
    let body: CmcResponse<T>;
    try {
      const response = await this.client.get<CmcResponse<T>>(path, { params });
      body = response.data;
    } catch (error) {
      throw this.toApiError(path, error);
    }

    const errorCode = Number(body?.status?.error_code ?? 0);
    if (errorCode !== 0) {
      const apiError = new CoinMarketCapApiError(
        `CoinMarketCap API error on ${path}: ${body.status.error_message ?? 'unknown error'}`,
        undefined,
        errorCode,
      );
      this.logger.error(apiError.message);
      throw apiError;
    }
    if (!isRecord(body) || !('data' in body)) {
      const apiError = new CoinMarketCapApiError(`CoinMarketCap returned no data for ${path}`);
      this.logger.error(apiError.message);
      throw apiError;
    }
    return body;
  }

  private toApiError(path: string, error: unknown): CoinMarketCapApiError {
    let apiError: CoinMarketCapApiError;

    if (axios.isAxiosError<Partial<CmcResponse<unknown>>>(error)) {
      const data = error.response?.data;
      const status = isRecord(data) ? data.status : undefined;
      const errorCode = toFiniteNumber(status?.error_code);
      apiError = new CoinMarketCapApiError(
        `CoinMarketCap request to ${path} failed: ${status?.error_message ?? error.message}`,
        error.response?.status,
        errorCode,
      );
    } else {
      const message = error instanceof Error ? error.message : String(error);
      apiError = new CoinMarketCapApiError(`CoinMarketCap request to ${path} failed: ${message}`);
    }

    this.logger.error(apiError.message);
    return apiError;
  }
}
