import type { CanonicalCoin, RawRecord } from "./types.js";

export const isRecord = (value: unknown): value is RawRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toNumber = (value: unknown): number | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

const toInteger = (value: unknown): number | null => {
  const parsed = toNumber(value);
  return parsed !== null && Number.isInteger(parsed) ? parsed : null;
};

const toText = (value: unknown): string | null => {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
};

const toOptionalString = (value: unknown): string | null =>
  typeof value === "string" ? value : null;

/**
 * Maps one `/coins/markets` row onto the canonical coin shape. Never throws:
 * absent or malformed fields fall back to `null` (or `""` for the identity
 * fields).
 */
export const normalizeCoin = (record: RawRecord): CanonicalCoin => ({
  rank: toInteger(record.market_cap_rank),
  symbol: (toText(record.symbol) ?? "").toUpperCase(),
  id: toText(record.id) ?? "",
  name: toText(record.name) ?? "",
  price_usd: toNumber(record.current_price),
  market_cap_usd: toNumber(record.market_cap),
  change_24h_pct: toNumber(record.price_change_percentage_24h),
  total_volume_usd: toNumber(record.total_volume),
  last_updated: toOptionalString(record.last_updated),
  image_url: toOptionalString(record.image),
});

export const latestUpdate = (coins: readonly CanonicalCoin[]): string =>
  coins.reduce<string>((latest, coin) => {
    const value = coin.last_updated;
    return value && value > latest ? value : latest;
  }, "");
