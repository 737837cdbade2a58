import type { MarketConfig } from "./types.js";

export const COINGECKO_MARKETS_URL = "https://api.coingecko.com/api/v3/coins/markets";
export const MAX_PAGE_SIZE = 250;

export const DEFAULT_MARKET_CONFIG: MarketConfig = {
  baseUrl: COINGECKO_MARKETS_URL,
  pageSize: MAX_PAGE_SIZE,
  maxCoins: 1_000,
  maxAttempts: 3,
  retryDelayMs: 15_000,
  requestDelayMs: 5_000,
  networkRetryDelayMs: 5_000,
  requestTimeoutMs: 30_000,
  cacheTtlMs: 60_000,
  port: 8_000,
};

export const parseNumber = (value: string | undefined, fallback: number): number => {
  const trimmed = value?.trim();
  if (!trimmed) return fallback;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, Math.trunc(value)));

export const loadMarketConfig = (
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<MarketConfig> = {},
): MarketConfig => {
  const defaults = DEFAULT_MARKET_CONFIG;
  const base: MarketConfig = {
    baseUrl: env.COINGECKO_MARKETS_URL?.trim() || defaults.baseUrl,
    pageSize: parseNumber(env.MARKET_PAGE_SIZE, defaults.pageSize),
    maxCoins: parseNumber(env.MARKET_MAX_COINS, defaults.maxCoins),
    maxAttempts: defaults.maxAttempts,
    retryDelayMs: parseNumber(env.MARKET_RETRY_DELAY_MS, defaults.retryDelayMs),
    requestDelayMs: parseNumber(env.MARKET_REQUEST_DELAY_MS, defaults.requestDelayMs),
    networkRetryDelayMs: parseNumber(
      env.MARKET_NETWORK_RETRY_DELAY_MS,
      defaults.networkRetryDelayMs,
    ),
    requestTimeoutMs: parseNumber(env.MARKET_REQUEST_TIMEOUT_MS, defaults.requestTimeoutMs),
    cacheTtlMs: parseNumber(env.MARKET_CACHE_TTL_MS, defaults.cacheTtlMs),
    port: parseNumber(env.PORT, defaults.port),
  };
  const merged: MarketConfig = { ...base, ...overrides };

  return {
    ...merged,
    pageSize: clamp(merged.pageSize, 1, MAX_PAGE_SIZE),
    maxCoins: Math.max(1, Math.trunc(merged.maxCoins)),
  };
};
