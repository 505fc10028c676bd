import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import {
  CoinCapHistoryEntry,
  CoinCapHistoryResponse,
  CoinCapInterval,
  CoinCapMacdEntry,
  CoinCapMacdResponse,
} from '../common/interfaces/coincap.interface';
import { MacdPoint, PriceQuote } from '../common/interfaces/market-data.interface';
import { describeBody, isRecord, toFiniteNumber, toUtcDate } from '../common/utils/coerce';
import { toEpochRange } from '../common/utils/date-range';
import { resolveHttpTimeout } from '../config/http.config';
import { SYMBOL_TO_SLUG } from './symbol-slugs';

export const COINCAP_BASE_URL = 'https://rest.coincap.io';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

function isHistoryEntry(value: unknown): value is CoinCapHistoryEntry {
  return isRecord(value);
}

function isMacdEntry(value: unknown): value is CoinCapMacdEntry {
  return isRecord(value);
}

/**
 * CoinCapService - price history and MACD from the CoinCap v3 REST API
 *
 * Every failure (timeout, connection error, non-2xx, empty payload) is logged
 * and degrades to an empty series. Callers cannot tell "no data" from
 * "request failed" without the logs.
 */
@Injectable()
export class CoinCapService {
  private readonly logger = new Logger(CoinCapService.name);
  private readonly baseUrl: string;
  private readonly client: AxiosInstance;

  constructor(private configService: ConfigService) {
    const apiKey = this.configService.get<string>('COINCAP_API_KEY', '');
    this.baseUrl = this.configService.get<string>('COINCAP_BASE_URL', COINCAP_BASE_URL);

    // Bearer token is optional, it only raises rate limits
    this.client = axios.create({
      baseURL: this.baseUrl,
      timeout: resolveHttpTimeout(this.configService),
      headers: apiKey ? { Authorization: `Bearer ${apiKey}` } : {},
    });
  }

  /**
   * Map a ticker to its CoinCap asset id.
   * Unknown tickers fall through as their lowercased form, so an unsupported
   * symbol produces a plausible URL and an empty result, not an error.
   */
  resolveSlug(symbol: string): string {
    const assetId = symbol.trim().toLowerCase();
    return SYMBOL_TO_SLUG.get(assetId) ?? assetId;
  }

  /**
   * Fetch USD price history between two calendar dates (inclusive, UTC)
   */
  async getHistoricalQuotes(
    symbol: string,
    startDate: string,
    endDate: string,
    interval: CoinCapInterval = 'h1',
  ): Promise<PriceQuote[]> {
    const { start, end } = toEpochRange(startDate, endDate);
    const slug = this.resolveSlug(symbol);

    const body = await this.fetch<CoinCapHistoryResponse>(
      `/v3/assets/${encodeURIComponent(slug)}/history`,
      symbol,
      { interval, start, end },
    );
    if (!body) {
      return [];
    }

    const entries = body.data;
    if (!Array.isArray(entries) || entries.length === 0) {
      this.logger.warn(`No historical data available for ${symbol}`);
      return [];
    }

    const quotes: PriceQuote[] = [];
    for (const entry of entries) {
      if (!isHistoryEntry(entry)) {
        continue;
      }
      const date = toUtcDate(entry.date, entry.time);
      const priceUsd = toFiniteNumber(entry.priceUsd);
      if (date && priceUsd !== undefined) {
        quotes.push({ date, priceUsd });
      }
    }

    this.warnDropped(symbol, entries.length, quotes.length);
    return quotes;
  }

  /**
   * Fetch the MACD series CoinCap computes for an asset.
   * Histogram is the provider's value, it is not recomputed here.
   */
  async getMacd(symbol: string): Promise<MacdPoint[]> {
    const slug = this.resolveSlug(symbol);
    const body = await this.fetch<CoinCapMacdResponse>(
      `/v3/ta/${encodeURIComponent(slug)}/macd`,
      symbol,
    );
    if (!body) {
      return [];
    }

    const entries = this.extractMacdEntries(body);
    if (entries.length === 0) {
      this.logger.warn(`No MACD data available for ${symbol}`);
      return [];
    }

    const points: MacdPoint[] = [];
    for (const entry of entries) {
      if (!isMacdEntry(entry)) {
        continue;
      }
      const date = toUtcDate(entry.date, entry.time);
      const macd = toFiniteNumber(entry.macd);
      const signal = toFiniteNumber(entry.signal);
      const histogram = toFiniteNumber(entry.histogram);
      if (date && macd !== undefined && signal !== undefined && histogram !== undefined) {
        points.push({ date, macd, signal, histogram });
      }
    }

    this.warnDropped(symbol, entries.length, points.length);
    return points;
  }

  // The series sits under `macd`; some responses only carry it as `data`
  private extractMacdEntries(body: CoinCapMacdResponse): unknown[] {
    if (Array.isArray(body.macd)) {
      return body.macd;
    }
    if (Array.isArray(body.data)) {
      return body.data;
    }
    return [];
  }

  /**
   * GET a path, returning null after logging any failure
   */
  private async fetch<T>(
    path: string,
    symbol: string,
    params?: Record<string, string | number>,
  ): Promise<T | null> {
    try {
      const response = await this.client.get<T>(path, { params });
      const body: unknown = response.data;
      if (body === null || body === undefined || body === '') {
        this.logger.warn(`Empty response body for ${symbol}`);
        return null;
      }
      return response.data;
    } catch (error) {
      this.logRequestError(symbol, error);
      return null;
    }
  }

  private logRequestError(symbol: string, error: unknown): void {
    if (axios.isAxiosError(error)) {
      if (error.response) {
        this.logger.error(
          `HTTP Error ${error.response.status} for ${symbol}: ${describeBody(error.response.data)}`,
        );
        return;
      }
      if (error.code && TIMEOUT_CODES.has(error.code)) {
        this.logger.error(`Request timeout for ${symbol}`);
        return;
      }
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`Request failed for ${symbol}: ${message}`);
  }

  private warnDropped(symbol: string, received: number, kept: number): void {
    if (kept < received) {
      this.logger.warn(`Dropped ${received - kept} of ${received} ${symbol} points with unusable values`);
    }
  }
}
