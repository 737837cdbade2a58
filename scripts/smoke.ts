import "dotenv/config";
import fetch from "node-fetch";
import { Logger } from "@hashgraphonline/standards-sdk";
import { startServer } from "../src/server.js";

type CryptosBody = {
  coins?: { rank: number | null; symbol: string; price_usd: number | null }[];
  total_count?: number;
  last_updated?: string;
};

const logger = Logger.getInstance({ module: "market-smoke" });

const expectOk = async (url: string): Promise<CryptosBody> => {
  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`${url} responded with ${response.status}`);
  }
  return (await response.json()) as CryptosBody;
};

const main = async (): Promise<void> => {
  const port = Number(process.env.SMOKE_PORT ?? "8765");
  const handle = await startServer({ port });
  const baseUrl = `http://127.0.0.1:${port}`;

  try {
    await expectOk(`${baseUrl}/health`);

    const page = await expectOk(`${baseUrl}/cryptos?page=1&per_page=5`);
    const coins = page.coins ?? [];
    if (coins.length === 0) {
      throw new Error("Expected at least one coin on the first page");
    }
    coins.forEach((coin) => {
      logger.info(`#${coin.rank ?? "?"} ${coin.symbol} ${coin.price_usd ?? "n/a"} USD`);
    });

    const started = Date.now();
    await expectOk(`${baseUrl}/cryptos?page=1&per_page=5`);
    logger.info(`Cached page served in ${Date.now() - started}ms`, {
      lastUpdated: page.last_updated,
    });
  } finally {
    await handle.stop();
  }
};

main().catch((error: unknown) => {
  logger.error("Smoke test failed", error);
  process.exitCode = 1;
});
