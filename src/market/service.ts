import { Logger } from "@hashgraphonline/standards-sdk";
import { systemClock, type Clock } from "../lib/clock.js";
import { httpGetJson, type HttpGet } from "../lib/http.js";
import { aggregateTopCoins } from "./aggregator.js";
import { DEFAULT_MARKET_CONFIG, MAX_PAGE_SIZE } from "./config.js";
import { InvalidArgumentError, NoDataError } from "./errors.js";
import { createPageFetcher } from "./fetcher.js";
import { normalizeCoin } from "./normalize.js";
import { TtlCache } from "./ttl-cache.js";
import type { CanonicalCoin, FetchRequest, MarketConfig, MarketService } from "./types.js";

const logger = Logger.getInstance({ module: "market-service" });

export type CoinCache = TtlCache<readonly CanonicalCoin[]>;

export type MarketServiceDeps = {
  config?: MarketConfig;
  clock?: Clock;
  httpGet?: HttpGet;
  cache?: CoinCache;
};

const isPositiveInteger = (value: number): boolean => Number.isInteger(value) && value >= 1;

/** Top-N requests share one entry holding the full capped list. */
export const cacheKeyFor = (request: FetchRequest, maxCoins: number): string =>
  request.kind === "top" ? `top:${maxCoins}` : `page:${request.page}:${request.perPage}`;

const copyCoins = (coins: readonly CanonicalCoin[], limit = coins.length): CanonicalCoin[] =>
  coins.slice(0, limit).map((coin) => ({ ...coin }));

export const createMarketService = (deps: MarketServiceDeps = {}): MarketService => {
  const config = deps.config ?? DEFAULT_MARKET_CONFIG;
  const clock = deps.clock ?? systemClock;
  const cache: CoinCache = deps.cache ?? new TtlCache({ ttlMs: config.cacheTtlMs, clock });
  const fetchPage = createPageFetcher({
    baseUrl: config.baseUrl,
    maxAttempts: config.maxAttempts,
    retryDelayMs: config.retryDelayMs,
    networkRetryDelayMs: config.networkRetryDelayMs,
    requestTimeoutMs: config.requestTimeoutMs,
    httpGet: deps.httpGet ?? httpGetJson,
    clock,
  });

  const fetchTop = async (limit: number): Promise<CanonicalCoin[]> => {
    if (!isPositiveInteger(limit) || limit > config.maxCoins) {
      throw new InvalidArgumentError(`Limit must be between 1 and ${config.maxCoins}`);
    }
    const key = cacheKeyFor({ kind: "top", limit }, config.maxCoins);
    const cached = cache.get(key);
    if (cached) {
      logger.debug(`Serving top ${limit} from cache`);
      return copyCoins(cached, limit);
    }

    logger.info(`Fetching top ${config.maxCoins} cryptocurrencies from upstream`);
    const raw = await aggregateTopCoins(fetchPage, {
      pageSize: config.pageSize,
      maxCoins: config.maxCoins,
      requestDelayMs: config.requestDelayMs,
      clock,
      onPage: (page, total) => logger.info(`Page ${page} completed, total coins: ${total}`),
    });
    if (raw.length === 0) {
      throw new NoDataError();
    }

    const coins = raw.map(normalizeCoin);
    cache.set(key, coins);
    return copyCoins(coins, limit);
  };

  const fetchPageOfCoins = async (page: number, perPage: number): Promise<CanonicalCoin[]> => {
    if (!isPositiveInteger(page)) {
      throw new InvalidArgumentError("Page must be >= 1");
    }
    if (!isPositiveInteger(perPage) || perPage > MAX_PAGE_SIZE) {
      throw new InvalidArgumentError(`Per page must be between 1 and ${MAX_PAGE_SIZE}`);
    }
    const key = cacheKeyFor({ kind: "page", page, perPage }, config.maxCoins);
    const cached = cache.get(key);
    if (cached) {
      logger.debug(`Serving page ${page} (${perPage} per page) from cache`);
      return copyCoins(cached);
    }

    const raw = await fetchPage({ page, perPage });
    if (raw.length === 0) {
      logger.info(`No data available for page ${page}`);
      throw new NoDataError("No cryptocurrency data found for the requested page");
    }

    const coins = raw.slice(0, perPage).map(normalizeCoin);
    cache.set(key, coins);
    logger.info(`Successfully fetched ${coins.length} coins for page ${page}`);
    return copyCoins(coins);
  };

  return {
    config,
    fetchTop,
    fetchPage: fetchPageOfCoins,
  };
};
