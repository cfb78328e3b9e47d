// In-process stand-in for PostgresLedgerDatabase.
//
// Models what the engine relies on: FIFO row locks with a timeout, staged
// writes that only become visible on commit, read-committed visibility of
// other sessions' commits inside a unit of work, one snapshot per read, and
// a unique idempotency key that blocks on an uncommitted duplicate until its
// owner finishes.

import { setImmediate as yieldTurn } from "node:timers/promises";
import { Decimal } from "decimal.js";
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
} from "../../src/db/repositories";
import { newEntryId, newTransactionId } from "../../src/db/ids";
import { accountIdFor } from "../../src/services/accounts";
import { formatAmount } from "../../src/services/amount";
import {
  ConflictError,
  DuplicateIdempotencyKeyError,
  IntegrityError,
} from "../../src/services/errors";
import type {
  Account,
  AccountKind,
  AssetType,
  LedgerEntry,
  Transaction,
} from "../../src/types";

/** Committed journal lengths a read session sees; null means read committed. */
interface Snapshot {
  transactions: number;
  entries: number;
}

interface Session {
  writable: boolean;
  snapshot: Snapshot | null;
  transactions: Transaction[];
  entries: LedgerEntry[];
  touched: string[];
  held: Set<string>;
  keys: Set<string>;
  lockLog: string[];
  settled: Promise<void>;
  settle: () => void;
}

interface Waiter {
  session: Session;
  grant: () => void;
}

interface RowLock {
  holder: Session | null;
  queue: Waiter[];
}

export interface Faults {
  /** Each journal append shifts one error off the queue and throws it. */
  append: Error[];
  ping: Error | null;
}

function openSession(writable: boolean, snapshot: Snapshot | null = null): Session {
  let settle = () => {};
  const settled = new Promise<void>((resolve) => {
    settle = resolve;
  });
  return {
    writable,
    snapshot,
    transactions: [],
    entries: [],
    touched: [],
    held: new Set(),
    keys: new Set(),
    lockLog: [],
    settled,
    settle,
  };
}

export class MemoryLedgerDatabase implements LedgerDatabase {
  readonly assetTypes = new Map<string, AssetType>();
  readonly accounts = new Map<string, Account>();
  readonly transactions: Transaction[] = [];
  readonly entries: LedgerEntry[] = [];

  /** Account ids in acquisition order, one list per unit of work that locked. */
  readonly lockLog: string[][] = [];
  readonly faults: Faults = { append: [], ping: null };

  commits = 0;
  rollbacks = 0;

  private readonly locks = new Map<string, RowLock>();
  private readonly inflightKeys = new Map<string, Session>();
  private lastTimestamp = 0;

  constructor(private readonly scale: number = 2) {}

  addAsset(
    code: string,
    options: { name?: string; active?: boolean } = {},
  ): AssetType {
    const asset: AssetType = {
      code,
      name: options.name ?? code,
      description: null,
      active: options.active ?? true,
      created_at: this.now(),
    };
    this.assetTypes.set(code, asset);
    return asset;
  }

  /** Takes the row lock outside any unit of work; call the result to release it. */
  async holdLock(accountId: string): Promise<() => void> {
    const session = openSession(true);
    await this.acquire(session, accountId, 60_000);
    return () => {
      this.release(session);
      session.settle();
    };
  }

  async read<T>(work: (repos: LedgerRepositories) => Promise<T>): Promise<T> {
    const session = openSession(false, {
      transactions: this.transactions.length,
      entries: this.entries.length,
    });
    try {
      return await work(this.repositories(session, null));
    } finally {
      session.settle();
    }
  }

  async unitOfWork<T>(
    work: (repos: LedgerRepositories) => Promise<T>,
    options: UnitOfWorkOptions,
  ): Promise<T> {
    const session = openSession(true);
    try {
      const value = await work(this.repositories(session, options));
      this.commit(session);
      return value;
    } catch (err) {
      this.rollback(session);
      throw err;
    }
  }

  async ping(): Promise<void> {
    if (this.faults.ping) throw this.faults.ping;
  }

  async close(): Promise<void> {}

  balanceOf(accountId: string): string {
    return formatAmount(net(this.entries, accountId), this.scale);
  }

  private repositories(
    session: Session,
    options: UnitOfWorkOptions | null,
  ): LedgerRepositories {
    return {
      assets: this.assetRepository(),
      accounts: this.accountRepository(session, options),
      journal: this.journalRepository(session),
      transactions: this.transactionRepository(session),
    };
  }

  private assetRepository(): AssetRepository {
    return {
      findByCode: async (code) => {
        await yieldTurn();
        const asset = this.assetTypes.get(code);
        return asset ? { ...asset } : null;
      },
      list: async () => {
        await yieldTurn();
        return [...this.assetTypes.values()]
          .sort((a, b) => compare(a.code, b.code))
          .map((asset) => ({ ...asset }));
      },
    };
  }

  private accountRepository(
    session: Session,
    options: UnitOfWorkOptions | null,
  ): AccountRepository {
    const findByOwner = async (userId: string, assetTypeCode: string) => {
      await yieldTurn();
      const account = this.accounts.get(accountIdFor(userId, assetTypeCode));
      return account ? { ...account } : null;
    };

    return {
      findByOwner,
      resolveOrCreate: async (
        userId: string,
        assetTypeCode: string,
        kind: AccountKind,
      ) => {
        this.assertWritable(session);
        if (!this.assetTypes.has(assetTypeCode)) {
          throw new IntegrityError(
            `Constraint violation (23503 on accounts_asset_type_code_fkey)`,
          );
        }
        const id = accountIdFor(userId, assetTypeCode);
        if (!this.accounts.has(id)) {
          this.accounts.set(id, {
            id,
            user_id: userId,
            kind,
            asset_type_code: assetTypeCode,
            version: 0,
            created_at: this.now(),
          });
        }
        const account = await findByOwner(userId, assetTypeCode);
        if (!account) throw new IntegrityError(`Account ${id} vanished`);
        return account;
      },
      lock: async (accountIds) => {
        this.assertWritable(session);
        if (session.lockLog.length === 0) this.lockLog.push(session.lockLog);
        const locked: Account[] = [];
        for (const id of accountIds) {
          if (!this.accounts.has(id)) {
            throw new IntegrityError(`Cannot lock unknown account ${id}`);
          }
          session.lockLog.push(id);
          await this.acquire(session, id, options?.lockTimeoutMs ?? 0);
          const account = this.accounts.get(id);
          if (account) locked.push({ ...account });
        }
        return locked;
      },
      touch: async (accountIds) => {
        this.assertWritable(session);
        await yieldTurn();
        session.touched.push(...accountIds);
      },
      listByUser: async (userId) => {
        await yieldTurn();
        return [...this.accounts.values()]
          .filter((account) => account.user_id === userId)
          .sort((a, b) => compare(a.asset_type_code, b.asset_type_code))
          .map((account) => ({ ...account }));
      },
      listUsers: async () => {
        await yieldTurn();
        const counts = new Map<string, number>();
        for (const account of this.accounts.values()) {
          if (account.kind !== "USER") continue;
          counts.set(account.user_id, (counts.get(account.user_id) ?? 0) + 1);
        }
        return [...counts.entries()]
          .sort(([a], [b]) => compare(a, b))
          .map(([user_id, account_count]) => ({ user_id, account_count }));
      },
    };
  }

  private journalRepository(session: Session): JournalRepository {
    const visibleEntries = () =>
      session.snapshot
        ? this.entries.slice(0, session.snapshot.entries)
        : [...this.entries, ...session.entries];

    return {
      append: async (posting: JournalPosting) => {
        this.assertWritable(session);
        await yieldTurn();
        const fault = this.faults.append.shift();
        if (fault) throw fault;

        const created_at = this.now();
        const debit: LedgerEntry = {
          id: newEntryId(),
          transaction_id: posting.transactionId,
          direction: "DEBIT",
          account_id: posting.debitAccountId,
          contra_account_id: posting.creditAccountId,
          asset_type_code: posting.assetTypeCode,
          amount: formatAmount(posting.amount, this.scale),
          created_at,
        };
        const credit: LedgerEntry = {
          ...debit,
          id: newEntryId(),
          direction: "CREDIT",
          account_id: posting.creditAccountId,
          contra_account_id: posting.debitAccountId,
        };
        session.entries.push(debit, credit);
        return [{ ...debit }, { ...credit }];
      },
      balanceOf: async (accountId) => {
        await yieldTurn();
        return formatAmount(net(visibleEntries(), accountId), this.scale);
      },
      entriesFor: async (transactionId) => {
        await yieldTurn();
        return visibleEntries()
          .filter((entry) => entry.transaction_id === transactionId)
          .sort((a, b) => compare(b.direction, a.direction))
          .map((entry) => ({ ...entry }));
      },
      historyOf: async (userId, limit, offset) => {
        await yieldTurn();
        return this.visibleTransactions(session)
          .filter((transaction) => transaction.user_id === userId)
          .sort(
            (a, b) =>
              b.created_at.getTime() - a.created_at.getTime() ||
              compare(b.id, a.id),
          )
          .slice(offset, offset + limit)
          .map((transaction) => ({ ...transaction }));
      },
      netByAsset: async () => {
        await yieldTurn();
        const totals = new Map<string, AssetNet>();
        for (const entry of visibleEntries()) {
          const total = totals.get(entry.asset_type_code) ?? {
            asset_type_code: entry.asset_type_code,
            entry_count: 0,
            net: "0",
          };
          const signed = new Decimal(entry.amount).times(
            entry.direction === "DEBIT" ? 1 : -1,
          );
          totals.set(entry.asset_type_code, {
            ...total,
            entry_count: total.entry_count + 1,
            net: signed.plus(total.net).toString(),
          });
        }
        return [...totals.values()]
          .sort((a, b) => compare(a.asset_type_code, b.asset_type_code))
          .map((total) => ({ ...total, net: formatAmount(total.net, this.scale) }));
      },
    };
  }

  private transactionRepository(session: Session): TransactionRepository {
    const visible = () => this.visibleTransactions(session);

    return {
      findById: async (id) => {
        await yieldTurn();
        const found = visible().find((transaction) => transaction.id === id);
        return found ? { ...found } : null;
      },
      findByIdempotencyKey: async (key) => {
        await yieldTurn();
        const found = visible().find(
          (transaction) => transaction.idempotency_key === key,
        );
        return found ? { ...found } : null;
      },
      insertCompleted: async (input: NewTransaction) => {
        this.assertWritable(session);
        await yieldTurn();
        const key = input.idempotencyKey;

        // A unique index blocks on an uncommitted duplicate until its owner
        // commits (violation) or rolls back (insert proceeds).
        for (;;) {
          if (this.transactions.some((t) => t.idempotency_key === key)) {
            throw new DuplicateIdempotencyKeyError(key);
          }
          const owner = this.inflightKeys.get(key);
          if (!owner || owner === session) break;
          await owner.settled;
        }

        this.inflightKeys.set(key, session);
        session.keys.add(key);

        const transaction: Transaction = {
          id: newTransactionId(),
          type: input.type,
          status: "COMPLETED",
          user_id: input.userId,
          asset_type_code: input.assetTypeCode,
          amount: formatAmount(input.amount, this.scale),
          idempotency_key: key,
          metadata: structuredClone(input.metadata),
          created_at: this.now(),
        };
        session.transactions.push(transaction);
        return { ...transaction };
      },
    };
  }

  private visibleTransactions(session: Session): Transaction[] {
    return session.snapshot
      ? this.transactions.slice(0, session.snapshot.transactions)
      : [...this.transactions, ...session.transactions];
  }

  private async acquire(
    session: Session,
    accountId: string,
    timeoutMs: number,
  ): Promise<void> {
    const lock = this.locks.get(accountId) ?? { holder: null, queue: [] };
    this.locks.set(accountId, lock);

    if (lock.holder === null || lock.holder === session) {
      lock.holder = session;
      session.held.add(accountId);
      return;
    }

    await new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        session,
        grant: () => {
          clearTimeout(timer);
          resolve();
        },
      };
      const timer = setTimeout(() => {
        lock.queue.splice(lock.queue.indexOf(waiter), 1);
        reject(new ConflictError("Transaction aborted (lock timeout), retry later"));
      }, timeoutMs);
      lock.queue.push(waiter);
    });
  }

  private release(session: Session): void {
    for (const accountId of session.held) {
      const lock = this.locks.get(accountId);
      if (!lock) continue;
      const next = lock.queue.shift();
      if (next) {
        lock.holder = next.session;
        next.session.held.add(accountId);
        next.grant();
      } else {
        lock.holder = null;
      }
    }
    session.held.clear();
  }

  private commit(session: Session): void {
    this.transactions.push(...session.transactions);
    this.entries.push(...session.entries);
    for (const id of session.touched) {
      const account = this.accounts.get(id);
      if (account) this.accounts.set(id, { ...account, version: account.version + 1 });
    }
    this.commits++;
    this.finish(session);
  }

  private rollback(session: Session): void {
    this.rollbacks++;
    this.finish(session);
  }

  private finish(session: Session): void {
    for (const key of session.keys) {
      if (this.inflightKeys.get(key) === session) this.inflightKeys.delete(key);
    }
    this.release(session);
    session.settle();
  }

  private assertWritable(session: Session): void {
    if (!session.writable) {
      throw new Error("cannot execute a write in a read-only transaction");
    }
  }

  // Strictly increasing, so history order never depends on id ties.
  private now(): Date {
    this.lastTimestamp = Math.max(Date.now(), this.lastTimestamp + 1);
    return new Date(this.lastTimestamp);
  }
}

function net(entries: readonly LedgerEntry[], accountId: string): Decimal {
  return entries
    .filter((entry) => entry.account_id === accountId)
    .reduce(
      (sum, entry) =>
        entry.direction === "DEBIT" ? sum.plus(entry.amount) : sum.minus(entry.amount),
      new Decimal(0),
    );
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
