/**
 * Raised when a client cannot be built from the available configuration
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class SymbolNotFoundError extends Error {
  constructor(public readonly symbol: string) {
    super(`Cryptocurrency symbol '${symbol}' not found`);
    this.name = 'SymbolNotFoundError';
  }
}

/**
 * Raised for calendar dates that are not YYYY-MM-DD or for an inverted range
 */
export class InvalidDateError extends Error {
  constructor(
    public readonly value: string,
    reason = 'expected a YYYY-MM-DD calendar date',
  ) {
    super(`Invalid date '${value}': ${reason}`);
    this.name = 'InvalidDateError';
  }
}

/**
 * Transport, HTTP or provider-level failure of a CoinMarketCap request.
 * `errorCode` is the `status.error_code` CoinMarketCap puts in its body.
 */
export class CoinMarketCapApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly errorCode?: number,
  ) {
    super(message);
    this.name = 'CoinMarketCapApiError';
  }
}
