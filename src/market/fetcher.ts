import { Logger } from "@hashgraphonline/standards-sdk";
import type { Clock } from "../lib/clock.js";
import type { HttpGet } from "../lib/http.js";
import {
  type MarketDataError,
  RateLimitExceededError,
  UpstreamHttpError,
  UpstreamUnavailableError,
} from "./errors.js";
import { isRecord } from "./normalize.js";
import type { PageQuery, RawRecord } from "./types.js";

const logger = Logger.getInstance({ module: "market-fetcher" });

export type RetryPolicy = {
  maxAttempts: number;
  retryDelayMs: number;
  networkRetryDelayMs: number;
};

export type AttemptResult =
  | { type: "ok"; status: number; body: unknown }
  | { type: "http-error"; status: number; statusText: string }
  | { type: "network-error"; error: unknown };

export type AttemptOutcome =
  | { type: "success"; records: RawRecord[] }
  | { type: "retry"; delayMs: number; reason: "rate-limited" | "network" }
  | { type: "failed"; error: MarketDataError };

export type PageFetcherOptions = RetryPolicy & {
  baseUrl: string;
  requestTimeoutMs: number;
  httpGet: HttpGet;
  clock: Clock;
};

export type PageFetcher = (query: PageQuery) => Promise<RawRecord[]>;

export const buildMarketsUrl = (baseUrl: string, query: PageQuery): string => {
  const url = new URL(baseUrl);
  url.searchParams.set("vs_currency", "usd");
  url.searchParams.set("order", "market_cap_desc");
  url.searchParams.set("per_page", String(query.perPage));
  url.searchParams.set("page", String(query.page));
  url.searchParams.set("sparkline", "false");
  return url.toString();
};

/**
 * Decides what follows one attempt. `attempt` is 1-based; rate limits back
 * off linearly (`retryDelayMs * attempt`), network failures wait a fixed
 * delay, and no wait is scheduled once the last attempt has been used.
 */
export const classifyAttempt = (
  result: AttemptResult,
  attempt: number,
  policy: RetryPolicy,
): AttemptOutcome => {
  const hasAttemptsLeft = attempt < policy.maxAttempts;

  switch (result.type) {
    case "ok": {
      if (!Array.isArray(result.body)) {
        return {
          type: "failed",
          error: new UpstreamHttpError(
            result.status,
            "CoinGecko returned an unexpected payload",
          ),
        };
      }
      return { type: "success", records: result.body.filter(isRecord) };
    }
    case "http-error": {
      if (result.status !== 429) {
        const message = `CoinGecko request failed with status ${result.status}${
          result.statusText ? ` ${result.statusText}` : ""
        }`;
        return { type: "failed", error: new UpstreamHttpError(result.status, message) };
      }
      if (!hasAttemptsLeft) {
        return { type: "failed", error: new RateLimitExceededError() };
      }
      return { type: "retry", delayMs: policy.retryDelayMs * attempt, reason: "rate-limited" };
    }
    case "network-error": {
      if (!hasAttemptsLeft) {
        return { type: "failed", error: new UpstreamUnavailableError(result.error) };
      }
      return { type: "retry", delayMs: policy.networkRetryDelayMs, reason: "network" };
    }
  }
};

export const performAttempt = async (
  httpGet: HttpGet,
  url: string,
  timeoutMs: number,
): Promise<AttemptResult> => {
  try {
    const response = await httpGet(url, timeoutMs);
    if (!response.ok) {
      return { type: "http-error", status: response.status, statusText: response.statusText };
    }
    try {
      return { type: "ok", status: response.status, body: await response.json() };
    } catch (error) {
      if (error instanceof SyntaxError) {
        return { type: "ok", status: response.status, body: undefined };
      }
      throw error;
    }
  } catch (error) {
    return { type: "network-error", error };
  }
};

export const createPageFetcher = (options: PageFetcherOptions): PageFetcher => {
  const policy: RetryPolicy = {
    maxAttempts: Math.max(1, options.maxAttempts),
    retryDelayMs: options.retryDelayMs,
    networkRetryDelayMs: options.networkRetryDelayMs,
  };

  return async (query) => {
    const url = buildMarketsUrl(options.baseUrl, query);

    for (let attempt = 1; ; attempt += 1) {
      logger.info(
        `Fetching page ${query.page} with ${query.perPage} items (attempt ${attempt})`,
      );
      const result = await performAttempt(options.httpGet, url, options.requestTimeoutMs);
      const outcome = classifyAttempt(result, attempt, policy);

      if (outcome.type === "success") {
        return outcome.records;
      }
      if (outcome.type === "failed") {
        logger.error(`Page ${query.page} failed: ${outcome.error.message}`, {
          kind: outcome.error.kind,
          attempt,
        });
        throw outcome.error;
      }
      if (outcome.reason === "rate-limited") {
        logger.warn(
          `Rate limit hit on page ${query.page}, waiting ${outcome.delayMs}ms before retrying`,
        );
      } else {
        logger.warn(`Request error on page ${query.page}, retrying in ${outcome.delayMs}ms`, {
          error: result.type === "network-error" ? String(result.error) : undefined,
        });
      }
      await options.clock.sleep(outcome.delayMs);
    }
  };
};
