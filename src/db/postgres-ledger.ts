import type postgres from "postgres";
import type {
  Account,
  AccountKind,
  AssetType,
  EntryDirection,
  LedgerEntry,
  Metadata,
  Transaction,
  TransactionStatus,
  TransactionType,
} from "../types";
import type { Sql } from "./index";
import type {
  AccountRepository,
  AssetNet,
  AssetRepository,
  JournalPosting,
  JournalRepository,
  LedgerDatabase,
  LedgerRepositories,
  NewTransaction,
  TransactionRepository,
  UnitOfWorkOptions,
  UserSummary,
} from "./repositories";
import { translateDatabaseError } from "./errors";
import { newEntryId, newTransactionId } from "./ids";
import { accountIdFor } from "../services/accounts";
import { formatAmount } from "../services/amount";
import { IntegrityError } from "../services/errors";

type Tx = postgres.TransactionSql;

interface AccountRow {
  id: string;
  user_id: string;
  kind: AccountKind;
  asset_type_code: string;
  version: number;
  created_at: Date;
}

interface TransactionRow {
  id: string;
  type: TransactionType;
  status: TransactionStatus;
  user_id: string;
  asset_type_code: string;
  amount: string;
  idempotency_key: string;
  metadata: Metadata | null;
  created_at: Date;
}

interface EntryRow {
  id: string;
  transaction_id: string;
  direction: EntryDirection;
  account_id: string;
  contra_account_id: string;
  asset_type_code: string;
  amount: string;
  created_at: Date;
}

class PgAssetRepository implements AssetRepository {
  constructor(private readonly tx: Tx) {}

  async findByCode(code: string): Promise<AssetType | null> {
    const [row] = await this.tx<AssetType[]>`
      SELECT code, name, description, active, created_at
      FROM asset_types
      WHERE code = ${code}
    `;
    return row ?? null;
  }

  async list(): Promise<AssetType[]> {
    return await this.tx<AssetType[]>`
      SELECT code, name, description, active, created_at
      FROM asset_types
      ORDER BY code ASC
    `;
  }
}

class PgAccountRepository implements AccountRepository {
  constructor(private readonly tx: Tx) {}

  async findByOwner(userId: string, assetTypeCode: string) {
    const [row] = await this.tx<AccountRow[]>`
      SELECT * FROM accounts
      WHERE user_id = ${userId} AND asset_type_code = ${assetTypeCode}
    `;
    return row ?? null;
  }

  async resolveOrCreate(
    userId: string,
    assetTypeCode: string,
    kind: AccountKind,
  ): Promise<Account> {
    // A concurrent insert of the same key makes this wait for the other
    // transaction, then do nothing; the read below sees the winner's row.
    await this.tx`
      INSERT INTO accounts (id, user_id, kind, asset_type_code)
      VALUES (${accountIdFor(userId, assetTypeCode)}, ${userId}, ${kind}, ${assetTypeCode})
      ON CONFLICT (user_id, asset_type_code) DO NOTHING
    `;

    const account = await this.findByOwner(userId, assetTypeCode);
    if (!account) {
      throw new IntegrityError(
        `Account for ${userId}/${assetTypeCode} vanished after insert`,
      );
    }
    return account;
  }

  async lock(accountIds: readonly string[]): Promise<Account[]> {
    const locked: Account[] = [];
    // One statement per row so the acquisition order is exactly the caller's.
    for (const id of accountIds) {
      const [row] = await this.tx<AccountRow[]>`
        SELECT * FROM accounts WHERE id = ${id} FOR UPDATE
      `;
      if (!row) {
        throw new IntegrityError(`Cannot lock unknown account ${id}`);
      }
      locked.push(row);
    }
    return locked;
  }

  async touch(accountIds: readonly string[]): Promise<void> {
    await this.tx`
      UPDATE accounts SET version = version + 1
      WHERE id = ANY(${accountIds})
    `;
  }

  async listByUser(userId: string): Promise<Account[]> {
    return await this.tx<AccountRow[]>`
      SELECT * FROM accounts WHERE user_id = ${userId} ORDER BY asset_type_code ASC
    `;
  }

  async listUsers(): Promise<UserSummary[]> {
    const rows = await this.tx<{ user_id: string; account_count: string }[]>`
      SELECT user_id, COUNT(*)::text AS account_count
      FROM accounts
      WHERE kind = 'USER'
      GROUP BY user_id
      ORDER BY user_id ASC
    `;
    return rows.map((row) => ({
      user_id: row.user_id,
      account_count: Number(row.account_count),
    }));
  }
}

class PgJournalRepository implements JournalRepository {
  constructor(
    private readonly tx: Tx,
    private readonly scale: number,
  ) {}

  private toEntry = (row: EntryRow): LedgerEntry => ({
    ...row,
    amount: formatAmount(row.amount, this.scale),
  });

  async append(posting: JournalPosting): Promise<[LedgerEntry, LedgerEntry]> {
    const rows = await this.tx<EntryRow[]>`
      INSERT INTO ledger_entries (
        id, transaction_id, direction, account_id, contra_account_id, asset_type_code, amount
      ) VALUES
        (${newEntryId()}, ${posting.transactionId}, 'DEBIT', ${posting.debitAccountId},
         ${posting.creditAccountId}, ${posting.assetTypeCode}, ${posting.amount}),
        (${newEntryId()}, ${posting.transactionId}, 'CREDIT', ${posting.creditAccountId},
         ${posting.debitAccountId}, ${posting.assetTypeCode}, ${posting.amount})
      RETURNING *
    `;

    const debit = rows.find((row) => row.direction === "DEBIT");
    const credit = rows.find((row) => row.direction === "CREDIT");
    if (!debit || !credit) {
      throw new IntegrityError(
        `Journal append for ${posting.transactionId} returned ${rows.length} rows`,
      );
    }
    return [this.toEntry(debit), this.toEntry(credit)];
  }

  async balanceOf(accountId: string): Promise<string> {
    const [row] = await this.tx<{ balance: string }[]>`
      SELECT COALESCE(
        SUM(CASE WHEN direction = 'DEBIT' THEN amount ELSE -amount END),
        0
      )::text AS balance
      FROM ledger_entries
      WHERE account_id = ${accountId}
    `;
    return formatAmount(row?.balance ?? "0", this.scale);
  }

  async entriesFor(transactionId: string): Promise<LedgerEntry[]> {
    const rows = await this.tx<EntryRow[]>`
      SELECT * FROM ledger_entries
      WHERE transaction_id = ${transactionId}
      ORDER BY direction DESC
    `;
    return rows.map(this.toEntry);
  }

  async historyOf(
    userId: string,
    limit: number,
    offset: number,
  ): Promise<Transaction[]> {
    const rows = await this.tx<TransactionRow[]>`
      SELECT * FROM transactions
      WHERE user_id = ${userId}
      ORDER BY created_at DESC, id DESC
      LIMIT ${limit} OFFSET ${offset}
    `;
    return rows.map((row) => toTransaction(row, this.scale));
  }

  async netByAsset(): Promise<AssetNet[]> {
    const rows = await this.tx<{ asset_type_code: string; entry_count: string; net: string }[]>`
      SELECT
        asset_type_code,
        COUNT(*)::text AS entry_count,
        SUM(CASE WHEN direction = 'DEBIT' THEN amount ELSE -amount END)::text AS net
      FROM ledger_entries
      GROUP BY asset_type_code
      ORDER BY asset_type_code ASC
    `;
    return rows.map((row) => ({
      asset_type_code: row.asset_type_code,
      entry_count: Number(row.entry_count),
      net: formatAmount(row.net, this.scale),
    }));
  }
}

class PgTransactionRepository implements TransactionRepository {
  constructor(
    private readonly tx: Tx,
    private readonly scale: number,
  ) {}

  async findById(id: string): Promise<Transaction | null> {
    const [row] = await this.tx<TransactionRow[]>`
      SELECT * FROM transactions WHERE id = ${id}
    `;
    return row ? toTransaction(row, this.scale) : null;
  }

  async findByIdempotencyKey(key: string): Promise<Transaction | null> {
    const [row] = await this.tx<TransactionRow[]>`
      SELECT * FROM transactions WHERE idempotency_key = ${key}
    `;
    return row ? toTransaction(row, this.scale) : null;
  }

  async insertCompleted(transaction: NewTransaction): Promise<Transaction> {
    try {
      const [row] = await this.tx<TransactionRow[]>`
        INSERT INTO transactions (
          id, type, status, user_id, asset_type_code, amount, idempotency_key, metadata
        ) VALUES (
          ${newTransactionId()}, ${transaction.type}, 'COMPLETED', ${transaction.userId},
          ${transaction.assetTypeCode}, ${transaction.amount}, ${transaction.idempotencyKey},
          ${JSON.stringify(transaction.metadata)}::jsonb
        )
        RETURNING *
      `;
      if (!row) {
        throw new IntegrityError("Transaction insert returned no row");
      }
      return toTransaction(row, this.scale);
    } catch (err) {
      throw translateDatabaseError(err, {
        idempotencyKey: transaction.idempotencyKey,
      });
    }
  }
}

function toTransaction(row: TransactionRow, scale: number): Transaction {
  return {
    ...row,
    amount: formatAmount(row.amount, scale),
    metadata: row.metadata ?? {},
  };
}

/** LedgerDatabase over postgres.js. Every access runs inside `sql.begin`. */
export class PostgresLedgerDatabase implements LedgerDatabase {
  constructor(
    private readonly sql: Sql,
    private readonly scale: number,
  ) {}

  private repositories(tx: Tx): LedgerRepositories {
    return {
      assets: new PgAssetRepository(tx),
      accounts: new PgAccountRepository(tx),
      journal: new PgJournalRepository(tx, this.scale),
      transactions: new PgTransactionRepository(tx, this.scale),
    };
  }

  async read<T>(work: (repos: LedgerRepositories) => Promise<T>): Promise<T> {
    let outcome: { value: T } | undefined;
    try {
      await this.sql.begin("isolation level repeatable read read only", async (tx) => {
        outcome = { value: await work(this.repositories(tx)) };
      });
    } catch (err) {
      throw translateDatabaseError(err);
    }
    if (!outcome) throw new IntegrityError("Read finished without a result");
    return outcome.value;
  }

  async unitOfWork<T>(
    work: (repos: LedgerRepositories) => Promise<T>,
    options: UnitOfWorkOptions,
  ): Promise<T> {
    let outcome: { value: T } | undefined;
    try {
      await this.sql.begin("isolation level read committed", async (tx) => {
        // set_config(..., true) is SET LOCAL with bind parameters.
        await tx`
          SELECT
            set_config('lock_timeout', ${String(options.lockTimeoutMs)}, true),
            set_config('statement_timeout', ${String(options.statementTimeoutMs)}, true)
        `;
        outcome = { value: await work(this.repositories(tx)) };
      });
    } catch (err) {
      throw translateDatabaseError(err);
    }
    if (!outcome) throw new IntegrityError("Unit of work finished without a result");
    return outcome.value;
  }

  async ping(): Promise<void> {
    await this.sql`SELECT 1`;
  }

  async close(): Promise<void> {
    await this.sql.end({ timeout: 5 });
  }
}
