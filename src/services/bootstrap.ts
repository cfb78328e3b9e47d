import type { LedgerDatabase, UnitOfWorkOptions } from "../db/repositories";
import type { Account } from "../types";
import { logger } from "../utils/logger";

/** Eagerly creates the SYSTEM account of every active asset type. Idempotent. */
export async function ensureTreasuryAccounts(
  db: LedgerDatabase,
  treasuryUserId: string,
  options: UnitOfWorkOptions,
): Promise<Account[]> {
  const assetTypes = await db.read(({ assets }) => assets.list());
  const active = assetTypes.filter((asset) => asset.active);

  const treasuries = await db.unitOfWork(async ({ accounts }) => {
    const created: Account[] = [];
    for (const asset of active) {
      created.push(
        await accounts.resolveOrCreate(treasuryUserId, asset.code, "SYSTEM"),
      );
    }
    return created;
  }, options);

  logger.info(
    { treasuryUserId, accounts: treasuries.map((account) => account.id) },
    "Treasury accounts ready",
  );
  return treasuries;
}
