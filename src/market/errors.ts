export type MarketErrorKind =
  | "invalid-argument"
  | "rate-limit-exceeded"
  | "upstream-http"
  | "upstream-unavailable"
  | "no-data";

export abstract class MarketDataError extends Error {
  abstract readonly kind: MarketErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends MarketDataError {
  readonly kind = "invalid-argument";
}

export class RateLimitExceededError extends MarketDataError {
  readonly kind = "rate-limit-exceeded";

  constructor(message = "CoinGecko API rate limit exceeded. Please try again later.") {
    super(message);
  }
}

export class UpstreamHttpError extends MarketDataError {
  readonly kind = "upstream-http";
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.status = status;
  }
}

export class UpstreamUnavailableError extends MarketDataError {
  readonly kind = "upstream-unavailable";

  constructor(cause: unknown, message = "Failed to fetch data from CoinGecko") {
    super(message, { cause });
  }
}

export class NoDataError extends MarketDataError {
  readonly kind = "no-data";

  constructor(message = "No cryptocurrency data found") {
    super(message);
  }
}

export const isMarketDataError = (value: unknown): value is MarketDataError =>
  value instanceof MarketDataError;
