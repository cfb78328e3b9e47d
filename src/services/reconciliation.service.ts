import { Decimal } from "decimal.js";
import type { LedgerDatabase } from "../db/repositories";
import type { LedgerEntry } from "../types";
import { NotFoundError } from "./errors";

export interface AssetReconciliation {
  asset_type_code: string;
  entry_count: number;
  net: string;
  balanced: boolean;
}

export interface ReconciliationReport {
  generated_at: Date;
  balanced: boolean;
  assets: AssetReconciliation[];
}

export interface PairVerification {
  transaction_id: string;
  valid: boolean;
  problems: string[];
}

/**
 * Checks the journal's invariants: every asset nets to zero, and every
 * transaction owns exactly one DEBIT and one CREDIT entry that mirror each
 * other.
 */
export class LedgerAuditor {
  constructor(private readonly db: LedgerDatabase) {}

  async reconcile(): Promise<ReconciliationReport> {
    const totals = await this.db.read(({ journal }) => journal.netByAsset());
    const assets = totals.map((total) => ({
      ...total,
      balanced: new Decimal(total.net).isZero(),
    }));
    return {
      generated_at: new Date(),
      balanced: assets.every((asset) => asset.balanced),
      assets,
    };
  }

  async verifyTransaction(transactionId: string): Promise<PairVerification> {
    const { transaction, entries } = await this.db.read(
      async ({ transactions, journal }) => ({
        transaction: await transactions.findById(transactionId),
        entries: await journal.entriesFor(transactionId),
      }),
    );
    if (!transaction) {
      throw new NotFoundError(`Transaction ${transactionId} not found`);
    }

    const problems = pairProblems(entries);
    if (
      entries.some(
        (entry) =>
          entry.asset_type_code !== transaction.asset_type_code ||
          !new Decimal(entry.amount).equals(transaction.amount),
      )
    ) {
      problems.push("entries do not match the transaction's asset or amount");
    }

    return { transaction_id: transactionId, valid: problems.length === 0, problems };
  }
}

export function pairProblems(entries: readonly LedgerEntry[]): string[] {
  if (entries.length !== 2) {
    return [`expected 2 entries, found ${entries.length}`];
  }

  const debit = entries.find((entry) => entry.direction === "DEBIT");
  const credit = entries.find((entry) => entry.direction === "CREDIT");
  if (!debit || !credit) {
    return ["expected one DEBIT and one CREDIT entry"];
  }

  const problems: string[] = [];
  if (debit.transaction_id !== credit.transaction_id) {
    problems.push("entries reference different transactions");
  }
  if (debit.asset_type_code !== credit.asset_type_code) {
    problems.push("entries carry different asset types");
  }
  if (!new Decimal(debit.amount).equals(credit.amount)) {
    problems.push("entry amounts differ");
  }
  if (
    debit.account_id !== credit.contra_account_id ||
    credit.account_id !== debit.contra_account_id
  ) {
    problems.push("debit and credit accounts are not mirrored");
  }
  return problems;
}
