import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosError, AxiosInstance } from 'axios';
import { InvalidDateError } from '../common/errors/market-data.errors';
import { httpError } from '../testing/axios.fixtures';
import { CoinCapService } from './coincap.service';
import { SYMBOL_TO_SLUG } from './symbol-slugs';

describe('CoinCapService', () => {
  let client: AxiosInstance;
  let get: jest.SpyInstance;
  let logError: jest.SpyInstance;
  let logWarn: jest.SpyInstance;
  const savedApiKey = process.env.COINCAP_API_KEY;

  const createService = (config: Record<string, string> = {}) =>
    new CoinCapService(new ConfigService(config));

  beforeEach(() => {
    delete process.env.COINCAP_API_KEY;
    client = axios.create();
    jest.spyOn(axios, 'create').mockReturnValue(client);
    get = jest.spyOn(client, 'get');
    logError = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    logWarn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    if (savedApiKey !== undefined) {
      process.env.COINCAP_API_KEY = savedApiKey;
    }
  });

  describe('client setup', () => {
    it('targets the public API with a 10s timeout and no auth by default', () => {
      createService();
      expect(axios.create).toHaveBeenCalledWith({
        baseURL: 'https://rest.coincap.io',
        timeout: 10000,
        headers: {},
      });
    });

    it('sends the configured key as a bearer token', () => {
      createService({ COINCAP_API_KEY: 'test-secret', HTTP_TIMEOUT_MS: '2500' });
      expect(axios.create).toHaveBeenCalledWith({
        baseURL: 'https://rest.coincap.io',
        timeout: 2500,
        headers: { Authorization: 'Bearer test-secret' },
      });
    });
  });

  describe('resolveSlug', () => {
    it.each(['btc', 'BTC', 'Btc'])('maps %p to bitcoin', (symbol) => {
      expect(createService().resolveSlug(symbol)).toBe('bitcoin');
    });

    it('falls back to the lowercased symbol for unknown tickers', () => {
      expect(createService().resolveSlug('INVALID_XYZ')).toBe('invalid_xyz');
    });

    it('resolves every tabled ticker to its slug', () => {
      const service = createService();
      for (const [ticker, slug] of SYMBOL_TO_SLUG) {
        expect(service.resolveSlug(ticker.toUpperCase())).toBe(slug);
      }
    });
  });

  describe('getHistoricalQuotes', () => {
    it('requests the inclusive day range and keeps provider order', async () => {
      get.mockResolvedValue({
        data: {
          data: [
            { priceUsd: '42000.5', time: 1704067200000, date: '2024-01-01T00:00:00.000Z' },
            { priceUsd: '41950.25', time: 1704070800000, date: '2024-01-01T01:00:00.000Z' },
            { priceUsd: '42100', time: 1704074400000, date: '2024-01-01T02:00:00.000Z' },
          ],
          timestamp: 1706745599999,
        },
      });

      const quotes = await createService().getHistoricalQuotes('BTC', '2024-01-01', '2024-01-31');

      expect(get).toHaveBeenCalledWith('/v3/assets/bitcoin/history', {
        params: { interval: 'h1', start: 1704067200000, end: 1706745599999 },
      });
      expect(quotes).toEqual([
        { date: new Date('2024-01-01T00:00:00.000Z'), priceUsd: 42000.5 },
        { date: new Date('2024-01-01T01:00:00.000Z'), priceUsd: 41950.25 },
        { date: new Date('2024-01-01T02:00:00.000Z'), priceUsd: 42100 },
      ]);
    });

    it('passes the requested interval through', async () => {
      get.mockResolvedValue({ data: { data: [] } });

      await createService().getHistoricalQuotes('eth', '2024-02-01', '2024-02-01', 'd1');

      expect(get).toHaveBeenCalledWith('/v3/assets/ethereum/history', {
        params: { interval: 'd1', start: 1706745600000, end: 1706831999999 },
      });
    });

    it('uses the lowercased symbol as slug for unknown tickers', async () => {
      get.mockResolvedValue({ data: { data: [] } });

      const quotes = await createService().getHistoricalQuotes('INVALID_XYZ', '2024-01-01', '2024-01-02');

      expect(get.mock.calls[0][0]).toBe('/v3/assets/invalid_xyz/history');
      expect(quotes).toEqual([]);
    });

    it('returns an empty series on connection errors', async () => {
      get.mockRejectedValue(new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED'));

      await expect(createService().getHistoricalQuotes('BTC', '2024-01-01', '2024-01-02')).resolves.toEqual([]);
      expect(logError).toHaveBeenCalledWith('Request failed for BTC: connect ECONNREFUSED 127.0.0.1:443');
    });

    it('returns an empty series on timeouts', async () => {
      get.mockRejectedValue(new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED'));

      await expect(createService().getHistoricalQuotes('BTC', '2024-01-01', '2024-01-02')).resolves.toEqual([]);
      expect(logError).toHaveBeenCalledWith('Request timeout for BTC');
    });

    it('returns an empty series on HTTP errors', async () => {
      get.mockRejectedValue(httpError(403, 'Forbidden', 'Forbidden'));

      await expect(createService().getHistoricalQuotes('BTC', '2024-01-01', '2024-01-02')).resolves.toEqual([]);
      expect(logError).toHaveBeenCalledWith('HTTP Error 403 for BTC: Forbidden');
    });

    it('returns an empty series when the payload has no data', async () => {
      get.mockResolvedValue({ data: { error: 'asset not found' } });

      await expect(createService().getHistoricalQuotes('BTC', '2024-01-01', '2024-01-02')).resolves.toEqual([]);
      expect(logWarn).toHaveBeenCalledWith('No historical data available for BTC');
    });

    it('drops points whose price cannot be read', async () => {
      get.mockResolvedValue({
        data: {
          data: [
            { priceUsd: '42000.5', date: '2024-01-01T00:00:00.000Z' },
            { priceUsd: null, date: '2024-01-01T01:00:00.000Z' },
          ],
        },
      });

      const quotes = await createService().getHistoricalQuotes('BTC', '2024-01-01', '2024-01-01');

      expect(quotes).toEqual([{ date: new Date('2024-01-01T00:00:00.000Z'), priceUsd: 42000.5 }]);
      expect(logWarn).toHaveBeenCalledWith('Dropped 1 of 2 BTC points with unusable values');
    });

    it('drops points that are not objects', async () => {
      get.mockResolvedValue({
        data: { data: [{ priceUsd: '1', date: '2024-01-01T00:00:00.000Z' }, null, 7] },
      });

      const quotes = await createService().getHistoricalQuotes('BTC', '2024-01-01', '2024-01-01');

      expect(quotes).toEqual([{ date: new Date('2024-01-01T00:00:00.000Z'), priceUsd: 1 }]);
      expect(logWarn).toHaveBeenCalledWith('Dropped 2 of 3 BTC points with unusable values');
    });

    it('returns an empty series and logs when the body is empty', async () => {
      get.mockResolvedValue({ data: '' });

      await expect(createService().getHistoricalQuotes('BTC', '2024-01-01', '2024-01-02')).resolves.toEqual([]);
      expect(logWarn).toHaveBeenCalledWith('Empty response body for BTC');
    });

    it('rejects malformed dates without calling the API', async () => {
      await expect(
        createService().getHistoricalQuotes('BTC', '2024-13-01', '2024-01-31'),
      ).rejects.toBeInstanceOf(InvalidDateError);
      expect(get).not.toHaveBeenCalled();
    });
  });

  describe('getMacd', () => {
    const macdSeries = [
      { date: '2024-01-01T00:00:00.000Z', macd: 120.5, signal: 100.25, histogram: 20.25 },
      { date: '2024-01-02T00:00:00.000Z', macd: '-15.75', signal: '-10.5', histogram: '-5.25' },
      { time: 1704240000000, macd: 3.125, signal: 3.12, histogram: 0.005 },
    ];

    it('returns one row per provider point, in order', async () => {
      get.mockResolvedValue({ data: { macd: macdSeries } });

      const points = await createService().getMacd('ETH');

      expect(get.mock.calls[0][0]).toBe('/v3/ta/ethereum/macd');
      expect(points).toEqual([
        { date: new Date('2024-01-01T00:00:00.000Z'), macd: 120.5, signal: 100.25, histogram: 20.25 },
        { date: new Date('2024-01-02T00:00:00.000Z'), macd: -15.75, signal: -10.5, histogram: -5.25 },
        { date: new Date('2024-01-03T00:00:00.000Z'), macd: 3.125, signal: 3.12, histogram: 0.005 },
      ]);
      for (const point of points) {
        expect(Math.abs(point.histogram - (point.macd - point.signal))).toBeLessThan(0.01);
      }
    });

    it('reads the series from data when macd is absent', async () => {
      get.mockResolvedValue({ data: { data: macdSeries.slice(0, 1) } });

      await expect(createService().getMacd('btc')).resolves.toHaveLength(1);
    });

    it('returns an empty series on network failures', async () => {
      get.mockRejectedValue(new AxiosError('socket hang up', 'ECONNRESET'));

      await expect(createService().getMacd('BTC')).resolves.toEqual([]);
      expect(logError).toHaveBeenCalledWith('Request failed for BTC: socket hang up');
    });

    it('returns an empty series on timeouts', async () => {
      get.mockRejectedValue(new AxiosError('timeout of 10000ms exceeded', 'ETIMEDOUT'));

      await expect(createService().getMacd('BTC')).resolves.toEqual([]);
      expect(logError).toHaveBeenCalledWith('Request timeout for BTC');
    });

    it('returns an empty series on HTTP errors', async () => {
      get.mockRejectedValue(httpError(404, 'Not Found', { error: 'not found' }));

      await expect(createService().getMacd('INVALID_XYZ')).resolves.toEqual([]);
      expect(logError).toHaveBeenCalledWith('HTTP Error 404 for INVALID_XYZ: {"error":"not found"}');
    });

    it('returns an empty series when every point is null', async () => {
      get.mockResolvedValue({ data: { macd: [null] } });

      await expect(createService().getMacd('BTC')).resolves.toEqual([]);
      expect(logWarn).toHaveBeenCalledWith('Dropped 1 of 1 BTC points with unusable values');
    });

    it('returns an empty series and logs when the body is empty', async () => {
      get.mockResolvedValue({ data: null });

      await expect(createService().getMacd('BTC')).resolves.toEqual([]);
      expect(logWarn).toHaveBeenCalledWith('Empty response body for BTC');
    });

    it('returns an empty series when the series is empty', async () => {
      get.mockResolvedValue({ data: { macd: [] } });

      await expect(createService().getMacd('BTC')).resolves.toEqual([]);
      expect(logWarn).toHaveBeenCalledWith('No MACD data available for BTC');
    });
  });
});
