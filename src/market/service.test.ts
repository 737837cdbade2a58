import { describe, expect, it } from "vitest";
import { ManualClock, pageQuery, samplePage, scriptedHttp, type Reply } from "../test/fakes.js";
import { loadMarketConfig } from "./config.js";
import { InvalidArgumentError, NoDataError } from "./errors.js";
import { cacheKeyFor, createMarketService } from "./service.js";
import type { MarketConfig } from "./types.js";

const config: MarketConfig = loadMarketConfig(
  {},
  {
    baseUrl: "https://upstream.example.test/api/v3/coins/markets",
    retryDelayMs: 1_000,
    requestDelayMs: 100,
    networkRetryDelayMs: 50,
    cacheTtlMs: 60_000,
  },
);

const setup = (reply: (url: URL, call: number) => Reply, overrides: Partial<MarketConfig> = {}) => {
  const clock = new ManualClock(1_700_000_000_000);
  const http = scriptedHttp(reply);
  const service = createMarketService({
    config: { ...config, ...overrides },
    clock,
    httpGet: http.httpGet,
  });
  return { service, clock, calls: http.calls };
};

const echoPages = (url: URL): Reply => {
  const { page, perPage } = pageQuery(url);
  return { status: 200, body: samplePage(page, perPage) };
};

describe("cacheKeyFor", () => {
  it("keys top requests by the maximum, not the limit", () => {
    expect(cacheKeyFor({ kind: "top", limit: 10 }, 1_000)).toBe("top:1000");
    expect(cacheKeyFor({ kind: "top", limit: 500 }, 1_000)).toBe("top:1000");
    expect(cacheKeyFor({ kind: "page", page: 2, perPage: 5 }, 1_000)).toBe("page:2:5");
  });
});

describe("fetchPage", () => {
  it.each([
    [0, 10],
    [1, 300],
    [1, 0],
    [-1, 10],
    [1.5, 10],
    [1, 2.5],
  ])("rejects page=%s per_page=%s without calling upstream", async (page, perPage) => {
    const { service, calls } = setup(echoPages);

    await expect(service.fetchPage(page, perPage)).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(calls).toHaveLength(0);
  });

  it("returns the requested page in canonical shape", async () => {
    const { service, calls } = setup(echoPages);

    const coins = await service.fetchPage(2, 5);
    expect(coins).toHaveLength(5);
    expect(coins[0]).toEqual({
      rank: 6,
      symbol: "C6",
      id: "coin-6",
      name: "Coin 6",
      price_usd: 106,
      market_cap_usd: 6_000_000,
      change_24h_pct: 1.5,
      total_volume_usd: 60_000,
      last_updated: "2025-01-01T00:00:06Z",
      image_url: "https://assets.example.test/coins/6.png",
    });
    expect(pageQuery(calls[0] ?? new URL("http://unused"))).toEqual({ page: 2, perPage: 5 });
  });

  it.each([1, 7, 100, 250])("never returns more than per_page=%s records", async (perPage) => {
    const { service } = setup(() => ({ status: 200, body: samplePage(1, 260) }));

    const coins = await service.fetchPage(1, perPage);
    expect(coins.length).toBeLessThanOrEqual(perPage);
  });

  it("serves repeat requests from cache until the TTL elapses", async () => {
    const { service, clock, calls } = setup(echoPages);

    const first = await service.fetchPage(2, 5);
    clock.advance(30_000);
    const second = await service.fetchPage(2, 5);
    expect(calls).toHaveLength(1);
    expect(second).toEqual(first);

    clock.advance(30_001);
    await service.fetchPage(2, 5);
    expect(calls).toHaveLength(2);
  });

  it("caches distinct page sizes separately", async () => {
    const { service, calls } = setup(echoPages);

    await service.fetchPage(1, 5);
    await service.fetchPage(1, 10);
    await service.fetchPage(1, 5);
    expect(calls).toHaveLength(2);
  });

  it("hands out copies the caller cannot use to alter the cache", async () => {
    const { service } = setup(echoPages);

    const first = await service.fetchPage(1, 2);
    const [coin] = first;
    if (coin) coin.name = "mutated";
    first.pop();

    const second = await service.fetchPage(1, 2);
    expect(second).toHaveLength(2);
    expect(second[0]?.name).toBe("Coin 1");
  });

  it("reports an empty page as no data and does not cache it", async () => {
    const { service, calls } = setup(() => ({ status: 200, body: [] }));

    await expect(service.fetchPage(50, 250)).rejects.toBeInstanceOf(NoDataError);
    await expect(service.fetchPage(50, 250)).rejects.toBeInstanceOf(NoDataError);
    expect(calls).toHaveLength(2);
  });
});

describe("fetchTop", () => {
  it.each([0, -5, 1_001, 2.5])("rejects limit=%s", async (limit) => {
    const { service, calls } = setup(echoPages);

    await expect(service.fetchTop(limit)).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(calls).toHaveLength(0);
  });

  it("aggregates pages until upstream runs dry", async () => {
    const { service, calls, clock } = setup((url) => {
      const { page } = pageQuery(url);
      return { status: 200, body: page <= 4 ? samplePage(page, 5) : [] };
    });

    const coins = await service.fetchTop(1_000);
    expect(coins).toHaveLength(20);
    expect(coins.map((coin) => coin.rank)).toEqual(
      Array.from({ length: 20 }, (_, index) => index + 1),
    );
    expect(calls).toHaveLength(5);
    expect(calls.every((url) => url.searchParams.get("per_page") === "250")).toBe(true);
    expect(clock.sleeps).toEqual([100, 100, 100, 100]);
  });

  it("caps the aggregate at the maximum with the fewest page requests", async () => {
    const { service, calls } = setup(echoPages);

    const coins = await service.fetchTop(1_000);
    expect(coins).toHaveLength(1_000);
    expect(coins[999]?.rank).toBe(1_000);
    expect(calls).toHaveLength(4);
  });

  it("shares one cached aggregate across different limits", async () => {
    const { service, calls } = setup(echoPages, { maxCoins: 30, pageSize: 10 });

    const top5 = await service.fetchTop(5);
    const top30 = await service.fetchTop(30);
    expect(top5.map((coin) => coin.symbol)).toEqual(["C1", "C2", "C3", "C4", "C5"]);
    expect(top30).toHaveLength(30);
    expect(calls).toHaveLength(3);
  });

  it("refetches once the cached aggregate is stale", async () => {
    const { service, clock, calls } = setup(echoPages, { maxCoins: 10, pageSize: 10 });

    await service.fetchTop(10);
    clock.advance(60_001);
    await service.fetchTop(10);
    expect(calls).toHaveLength(2);
  });

  it("reports no data when the first page is empty", async () => {
    const { service, calls } = setup(() => ({ status: 200, body: [] }));

    await expect(service.fetchTop(10)).rejects.toBeInstanceOf(NoDataError);
    expect(calls).toHaveLength(1);
  });
});
