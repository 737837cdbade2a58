import type { Server } from "node:http";
import dotenv from "dotenv";
import { Logger } from "@hashgraphonline/standards-sdk";
import { loadMarketConfig } from "./market/config.js";
import { buildMarketServer } from "./market/server.js";
import { createMarketService } from "./market/service.js";
import type { MarketConfig, MarketService } from "./market/types.js";

dotenv.config();

const logger = Logger.getInstance({ module: "market-api" });

export type ServerHandle = {
  service: MarketService;
  port: number;
  stop: () => Promise<void>;
};

export const startServer = async (overrides?: Partial<MarketConfig>): Promise<ServerHandle> => {
  const config = loadMarketConfig(process.env, overrides);
  const service = createMarketService({ config });
  const app = buildMarketServer(service);

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(config.port);
    listening.once("error", reject);
    listening.once("listening", () => {
      listening.off("error", reject);
      resolve(listening);
    });
  });
  const address = server.address();
  const port = address && typeof address !== "string" ? address.port : config.port;
  logger.info(`Coin market API listening on ${port}`, {
    upstream: config.baseUrl,
    cacheTtlMs: config.cacheTtlMs,
  });

  return {
    service,
    port,
    stop: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
};

if (process.argv[1] && /[\\/]server\.[jt]s$/.test(process.argv[1])) {
  startServer().catch((error: unknown) => {
    logger.error("Failed to start server", error);
    process.exitCode = 1;
  });
}
