import { OpenAPIHono } from "@hono/zod-openapi";
import { logger as honoLogger } from "hono/logger";
import { swaggerUI } from "@hono/swagger-ui";
import type { LedgerDatabase } from "./db/repositories";
import type { AssetRegistry } from "./services/asset-registry";
import type { LedgerAuditor } from "./services/reconciliation.service";
import type { WalletService } from "./services/wallet.service";
import { transactionRoutes } from "./routes/transactions";
import { walletRoutes } from "./routes/wallets";
import { userRoutes } from "./routes/users";
import { assetRoutes } from "./routes/assets";
import { ledgerRoutes } from "./routes/ledger";
import { metricsRoutes } from "./routes/metrics";
import { metricsMiddleware } from "./monitoring/metrics";
import { rateLimiter, type RateLimitStore } from "./middlewares/rateLimiter";
import { errorHandler } from "./middlewares/errorHandler";
import { logger } from "./utils/logger";

export interface AppDependencies {
  db: LedgerDatabase;
  wallet: WalletService;
  assets: AssetRegistry;
  auditor: LedgerAuditor;
  redis: RateLimitStore | null;
  rateLimit: { windowMs: number; max: number };
}

export function createApp(deps: AppDependencies): OpenAPIHono {
  const app = new OpenAPIHono();
  const { windowMs, max } = deps.rateLimit;

  app.use(honoLogger((str) => logger.info(str)));
  app.use("*", metricsMiddleware());

  app.use(
    "*",
    rateLimiter({ windowMs, max, keyPrefix: "global", redis: deps.redis }),
  );
  app.use(
    "/transactions/*",
    rateLimiter({ windowMs, max, keyPrefix: "transactions", redis: deps.redis }),
  );

  app.onError(errorHandler);

  app.get("/", (c) => {
    return c.json({
      service: "Credit Ledger Service",
      version: "1.0.0",
      status: "running",
      endpoints: {
        transactions: "/transactions",
        wallets: "/wallets",
        users: "/users",
        assets: "/assets",
        ledger: "/ledger",
        metrics: "/metrics",
        health: "/metrics/health",
        swagger: "/swagger",
        docs: "/doc",
      },
    });
  });

  app.route("/transactions", transactionRoutes(deps.wallet));
  app.route("/wallets", walletRoutes(deps.wallet));
  app.route("/users", userRoutes(deps.wallet));
  app.route("/assets", assetRoutes(deps.assets));
  app.route("/ledger", ledgerRoutes(deps.auditor));
  app.route("/metrics", metricsRoutes(deps.db));

  app.doc("/doc", {
    openapi: "3.0.0",
    info: {
      version: "1.0.0",
      title: "Credit Ledger API",
      description:
        "Double-entry ledger for virtual credits: postings, balances, history and reconciliation",
    },
  });

  app.get("/swagger", swaggerUI({ url: "/doc" }));

  return app;
}
