import type {
  Account,
  AccountKind,
  AssetType,
  LedgerEntry,
  Metadata,
  Transaction,
  TransactionType,
} from "../types";

export interface AssetRepository {
  findByCode(code: string): Promise<AssetType | null>;
  list(): Promise<AssetType[]>;
}

export interface AccountRepository {
  findByOwner(userId: string, assetTypeCode: string): Promise<Account | null>;
  /** Fetch-or-insert; never produces a second account for the same owner and asset. */
  resolveOrCreate(
    userId: string,
    assetTypeCode: string,
    kind: AccountKind,
  ): Promise<Account>;
  /** Exclusive row locks, acquired one by one in exactly the given order. */
  lock(accountIds: readonly string[]): Promise<Account[]>;
  /** Bumps the diagnostic version counter. */
  touch(accountIds: readonly string[]): Promise<void>;
  listByUser(userId: string): Promise<Account[]>;
  /** Holders of USER accounts, by id; system accounts are left out. */
  listUsers(): Promise<UserSummary[]>;
}

export interface UserSummary {
  user_id: string;
  account_count: number;
}

export interface JournalPosting {
  transactionId: string;
  debitAccountId: string;
  creditAccountId: string;
  assetTypeCode: string;
  amount: string;
}

export interface AssetNet {
  asset_type_code: string;
  entry_count: number;
  net: string;
}

export interface JournalRepository {
  /** Writes the DEBIT and CREDIT entries of one posting; returns them in that order. */
  append(posting: JournalPosting): Promise<[LedgerEntry, LedgerEntry]>;
  /** Σ DEBIT − Σ CREDIT over the account's entries. */
  balanceOf(accountId: string): Promise<string>;
  entriesFor(transactionId: string): Promise<LedgerEntry[]>;
  /** Newest first; ties broken by id. */
  historyOf(userId: string, limit: number, offset: number): Promise<Transaction[]>;
  netByAsset(): Promise<AssetNet[]>;
}

export interface NewTransaction {
  type: TransactionType;
  userId: string;
  assetTypeCode: string;
  amount: string;
  idempotencyKey: string;
  metadata: Metadata;
}

export interface TransactionRepository {
  findById(id: string): Promise<Transaction | null>;
  findByIdempotencyKey(key: string): Promise<Transaction | null>;
  /** Inserts a COMPLETED row; throws DuplicateIdempotencyKeyError when the key is taken. */
  insertCompleted(transaction: NewTransaction): Promise<Transaction>;
}

export interface LedgerRepositories {
  assets: AssetRepository;
  accounts: AccountRepository;
  journal: JournalRepository;
  transactions: TransactionRepository;
}

export interface UnitOfWorkOptions {
  lockTimeoutMs: number;
  statementTimeoutMs: number;
}

export interface LedgerDatabase {
  /** Read-only snapshot spanning every query issued by `work`. */
  read<T>(work: (repos: LedgerRepositories) => Promise<T>): Promise<T>;
  /**
   * One atomic unit of work at READ COMMITTED. Throwing from `work` rolls
   * back everything it wrote and releases its locks.
   */
  unitOfWork<T>(
    work: (repos: LedgerRepositories) => Promise<T>,
    options: UnitOfWorkOptions,
  ): Promise<T>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
