import { fileURLToPath } from "node:url";
import { loadConfig } from "../config";
import { ensureTreasuryAccounts } from "../services/bootstrap";
import { logger } from "../utils/logger";
import { createSql } from "./index";
import { PostgresLedgerDatabase } from "./postgres-ledger";

const sqlFile = (name: string) =>
  fileURLToPath(new URL(`./${name}`, import.meta.url));

async function migrate(): Promise<void> {
  const config = loadConfig();
  const sql = createSql({ url: config.database.url, poolMax: 1 });
  const db = new PostgresLedgerDatabase(sql, config.ledger.amountScale);

  try {
    for (const name of ["schema.sql", "seed.sql"]) {
      await sql.file(sqlFile(name));
      logger.info({ file: name }, "Applied");
    }
    await ensureTreasuryAccounts(db, config.ledger.treasuryUserId, {
      lockTimeoutMs: config.ledger.lockTimeoutMs,
      statementTimeoutMs: config.ledger.statementTimeoutMs,
    });
  } finally {
    await db.close();
  }
}

migrate().catch((err: unknown) => {
  logger.fatal({ err }, "Migration failed");
  process.exit(1);
});
