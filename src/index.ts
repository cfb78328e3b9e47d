import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createSql } from "./db";
import { PostgresLedgerDatabase } from "./db/postgres-ledger";
import { createRedis } from "./db/redis";
import { AssetRegistry } from "./services/asset-registry";
import { ensureTreasuryAccounts } from "./services/bootstrap";
import { LedgerAuditor } from "./services/reconciliation.service";
import { TransactionEngine } from "./services/transaction.engine";
import { WalletService } from "./services/wallet.service";
import { logger } from "./utils/logger";

async function main(): Promise<void> {
  const config = loadConfig();
  const { ledger } = config;

  const db = new PostgresLedgerDatabase(
    createSql(config.database),
    ledger.amountScale,
  );
  const redis = config.redis.url ? createRedis(config.redis.url) : null;

  const assets = new AssetRegistry(
    db,
    redis ?? undefined,
    config.redis.assetCacheTtlSeconds,
  );
  const engine = new TransactionEngine(db, assets, ledger);
  const wallet = new WalletService(db, engine, ledger.amountScale);
  const auditor = new LedgerAuditor(db);

  await ensureTreasuryAccounts(db, ledger.treasuryUserId, {
    lockTimeoutMs: ledger.lockTimeoutMs,
    statementTimeoutMs: ledger.statementTimeoutMs,
  });

  const app = createApp({
    db,
    wallet,
    assets,
    auditor,
    redis,
    rateLimit: config.http.rateLimit,
  });

  const server = serve(
    { fetch: app.fetch, port: config.http.port, hostname: config.http.host },
    (info) => {
      logger.info(
        { port: info.port, host: config.http.host, env: config.env },
        "Server is listening",
      );
    },
  );

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutting down");

    server.close(() => {
      Promise.all([db.close(), redis ? redis.quit() : Promise.resolve("OK")])
        .then(() => {
          logger.info("Shutdown complete");
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ err }, "Error during shutdown");
          process.exit(1);
        });
    });
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "Failed to start");
  process.exit(1);
});
