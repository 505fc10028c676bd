import { ConfigService } from '@nestjs/config';

export const DEFAULT_HTTP_TIMEOUT_MS = 10000;

/**
 * Per-request timeout shared by every provider client.
 * Environment values arrive as strings, so parse rather than trust get<number>.
 */
export function resolveHttpTimeout(configService: ConfigService): number {
  const raw = configService.get<string | number>('HTTP_TIMEOUT_MS');
  const timeout = raw === undefined ? NaN : Number(raw);
  return Number.isFinite(timeout) && timeout > 0 ? timeout : DEFAULT_HTTP_TIMEOUT_MS;
}
