import type { Clock } from "../lib/clock.js";
import type { PageFetcher } from "./fetcher.js";
import type { RawRecord } from "./types.js";

export type AggregateOptions = {
  pageSize: number;
  maxCoins: number;
  requestDelayMs: number;
  clock: Clock;
  onPage?: (page: number, total: number) => void;
};

/**
 * Walks the market-cap ranking page by page until `maxCoins` rows are held or
 * upstream runs dry. Pages are requested one at a time with `requestDelayMs`
 * between them; the list is cut to exactly `maxCoins`.
 */
export const aggregateTopCoins = async (
  fetchPage: PageFetcher,
  options: AggregateOptions,
): Promise<RawRecord[]> => {
  const { pageSize, maxCoins, requestDelayMs, clock } = options;
  const collected: RawRecord[] = [];

  for (let page = 1; collected.length < maxCoins; page += 1) {
    const records = await fetchPage({ page, perPage: pageSize });
    if (records.length === 0) break;

    collected.push(...records);
    options.onPage?.(page, collected.length);
    if (collected.length >= maxCoins) break;

    await clock.sleep(requestDelayMs);
  }

  return collected.slice(0, maxCoins);
};
