export type RawRecord = Record<string, unknown>;

export type CanonicalCoin = {
  rank: number | null;
  symbol: string;
  id: string;
  name: string;
  price_usd: number | null;
  market_cap_usd: number | null;
  change_24h_pct: number | null;
  total_volume_usd: number | null;
  last_updated: string | null;
  image_url: string | null;
};

export type FetchRequest =
  | { kind: "top"; limit: number }
  | { kind: "page"; page: number; perPage: number };

export type MarketConfig = {
  baseUrl: string;
  pageSize: number;
  maxCoins: number;
  maxAttempts: number;
  retryDelayMs: number;
  requestDelayMs: number;
  networkRetryDelayMs: number;
  requestTimeoutMs: number;
  cacheTtlMs: number;
  port: number;
};

export type PageQuery = {
  page: number;
  perPage: number;
};

export type CryptoResponse = {
  coins: CanonicalCoin[];
  total_count: number;
  last_updated: string;
  page: number;
  per_page: number;
  total_pages: number;
  has_next: boolean;
  has_prev: boolean;
};

export interface MarketService {
  fetchTop(limit: number): Promise<CanonicalCoin[]>;
  fetchPage(page: number, perPage: number): Promise<CanonicalCoin[]>;
  readonly config: MarketConfig;
}
