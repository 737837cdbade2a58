import express, { type NextFunction, type Request, type Response } from "express";
import { Logger } from "@hashgraphonline/standards-sdk";
import { isMarketDataError, type MarketDataError, UpstreamHttpError } from "./errors.js";
import { latestUpdate } from "./normalize.js";
import type { CanonicalCoin, CryptoResponse, MarketService } from "./types.js";

const logger = Logger.getInstance({ module: "market-server" });

const parseIntegerParam = (value: unknown, fallback?: number): number | null => {
  if (value === undefined) return fallback ?? null;
  if (typeof value !== "string" || !/^-?\d+$/.test(value.trim())) return null;
  return Number(value.trim());
};

const statusFor = (error: MarketDataError): number => {
  switch (error.kind) {
    case "invalid-argument":
      return 400;
    case "no-data":
      return 404;
    case "rate-limit-exceeded":
      return 429;
    case "upstream-http":
      return 502;
    case "upstream-unavailable":
      return 503;
  }
};

const sendError = (res: Response, error: unknown): void => {
  if (!isMarketDataError(error)) {
    logger.error("Unexpected error", error);
    res.status(500).json({ error: "Internal server error" });
    return;
  }
  const body: Record<string, unknown> = { error: error.message };
  if (error instanceof UpstreamHttpError) {
    body.upstreamStatus = error.status;
  }
  res.status(statusFor(error)).json(body);
};

const toResponse = (
  coins: CanonicalCoin[],
  pagination: Pick<CryptoResponse, "page" | "per_page" | "total_pages">,
): CryptoResponse => ({
  coins,
  total_count: coins.length,
  last_updated: latestUpdate(coins),
  ...pagination,
  has_next: pagination.page < pagination.total_pages,
  has_prev: pagination.page > 1,
});

export const buildMarketServer = (service: MarketService): express.Express => {
  const app = express();
  const estimatedTotal = service.config.maxCoins;

  app.use((req: Request, res: Response, next: NextFunction) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET,OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    if (req.method === "OPTIONS") {
      res.sendStatus(200);
      return;
    }
    next();
  });

  app.get("/", (_req: Request, res: Response) => {
    res.json({
      message: "Coin market API",
      endpoints: { crypto: ["/cryptos", "/cryptos/top/{limit}"], health: ["/health"] },
    });
  });

  app.get("/favicon.ico", (_req: Request, res: Response) => {
    res.sendStatus(204);
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  app.get("/cryptos", async (req: Request, res: Response) => {
    const page = parseIntegerParam(req.query.page, 1);
    const perPage = parseIntegerParam(req.query.per_page, 10);
    if (page === null || perPage === null) {
      res.status(400).json({ error: "page and per_page must be integers" });
      return;
    }
    logger.info(`Fetching cryptocurrency data - page ${page}, per_page ${perPage}`);
    try {
      const coins = await service.fetchPage(page, perPage);
      res.json(
        toResponse(coins, {
          page,
          per_page: perPage,
          total_pages: Math.ceil(estimatedTotal / perPage),
        }),
      );
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get("/cryptos/top/:limit", async (req: Request, res: Response) => {
    const limit = parseIntegerParam(req.params.limit);
    if (limit === null) {
      res.status(400).json({ error: "limit must be an integer" });
      return;
    }
    try {
      const coins = await service.fetchTop(limit);
      res.json(toResponse(coins, { page: 1, per_page: limit, total_pages: 1 }));
    } catch (error) {
      sendError(res, error);
    }
  });

  return app;
};
