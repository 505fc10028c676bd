/**
 * Providers send numbers both as JSON numbers and as decimal strings
 */
export function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function toNullableNumber(value: unknown): number | null {
  return toFiniteNumber(value) ?? null;
}

/**
 * ISO timestamp first, epoch milliseconds as fallback
 */
export function toUtcDate(iso: unknown, epochMs?: unknown): Date | undefined {
  if (typeof iso === 'string') {
    const date = new Date(iso);
    if (!Number.isNaN(date.getTime())) {
      return date;
    }
  }
  const ms = toFiniteNumber(epochMs);
  return ms === undefined ? undefined : new Date(ms);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function describeBody(body: unknown): string {
  if (typeof body === 'string') {
    return body;
  }
  if (body === undefined) {
    return 'No response body';
  }
  return JSON.stringify(body);
}
