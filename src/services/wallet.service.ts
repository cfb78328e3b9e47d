import type { LedgerDatabase, UserSummary } from "../db/repositories";
import type {
  Account,
  AccountBalance,
  LedgerEntry,
  Metadata,
  Transaction,
} from "../types";
import { formatAmount } from "./amount";
import { NotFoundError, ValidationError } from "./errors";
import type {
  TransactionEngine,
  TransactionRequest,
  TransactionResult,
} from "./transaction.engine";

export const DEFAULT_HISTORY_LIMIT = 50;
export const MAX_HISTORY_LIMIT = 100;

export interface HistoryPage {
  limit?: number;
  offset?: number;
}

export interface History {
  transactions: Transaction[];
  limit: number;
  offset: number;
}

export class WalletService {
  constructor(
    private readonly db: LedgerDatabase,
    private readonly engine: TransactionEngine,
    private readonly amountScale: number,
  ) {}

  create(request: TransactionRequest): Promise<TransactionResult> {
    return this.engine.execute(request);
  }

  // Top-up (treasury -> user)
  topUp(
    userId: string,
    assetTypeCode: string,
    amount: string,
    idempotencyKey: string,
    metadata?: Metadata,
  ): Promise<TransactionResult> {
    return this.engine.execute({
      type: "TOPUP",
      userId,
      assetTypeCode,
      amount,
      idempotencyKey,
      metadata,
    });
  }

  // Bonus (treasury -> user)
  grantBonus(
    userId: string,
    assetTypeCode: string,
    amount: string,
    idempotencyKey: string,
    metadata?: Metadata,
  ): Promise<TransactionResult> {
    return this.engine.execute({
      type: "BONUS",
      userId,
      assetTypeCode,
      amount,
      idempotencyKey,
      metadata,
    });
  }

  // Spend (user -> treasury)
  spend(
    userId: string,
    assetTypeCode: string,
    amount: string,
    idempotencyKey: string,
    metadata?: Metadata,
  ): Promise<TransactionResult> {
    return this.engine.execute({
      type: "SPEND",
      userId,
      assetTypeCode,
      amount,
      idempotencyKey,
      metadata,
    });
  }

  /** One balance per account the user holds, all read from the same snapshot. */
  async getBalances(userId: string): Promise<AccountBalance[]> {
    return this.db.read(async ({ accounts, journal }) => {
      const owned = await accounts.listByUser(userId);
      const balances: AccountBalance[] = [];
      for (const account of owned) {
        balances.push({
          asset_type_code: account.asset_type_code,
          account_id: account.id,
          balance: await journal.balanceOf(account.id),
        });
      }
      return balances;
    });
  }

  async getBalance(userId: string, assetTypeCode: string): Promise<string> {
    return this.db.read(async ({ accounts, journal }) => {
      const account = await accounts.findByOwner(userId, assetTypeCode);
      return account
        ? journal.balanceOf(account.id)
        : formatAmount(0, this.amountScale);
    });
  }

  async getTransactions(
    userId: string,
    page: HistoryPage = {},
  ): Promise<History> {
    const limit = page.limit ?? DEFAULT_HISTORY_LIMIT;
    const offset = page.offset ?? 0;

    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_HISTORY_LIMIT) {
      throw new ValidationError(
        `limit must be an integer between 1 and ${MAX_HISTORY_LIMIT}`,
      );
    }
    if (!Number.isInteger(offset) || offset < 0) {
      throw new ValidationError("offset must be a non-negative integer");
    }

    const transactions = await this.db.read(({ journal }) =>
      journal.historyOf(userId, limit, offset),
    );
    return { transactions, limit, offset };
  }

  async getTransaction(id: string): Promise<Transaction> {
    const transaction = await this.db.read(({ transactions }) =>
      transactions.findById(id),
    );
    if (!transaction) {
      throw new NotFoundError(`Transaction ${id} not found`);
    }
    return transaction;
  }

  async getEntries(transactionId: string): Promise<LedgerEntry[]> {
    return this.db.read(async ({ transactions, journal }) => {
      const transaction = await transactions.findById(transactionId);
      if (!transaction) {
        throw new NotFoundError(`Transaction ${transactionId} not found`);
      }
      return journal.entriesFor(transactionId);
    });
  }

  async getAccounts(userId: string): Promise<Account[]> {
    return this.db.read(({ accounts }) => accounts.listByUser(userId));
  }

  async getUsers(): Promise<UserSummary[]> {
    return this.db.read(({ accounts }) => accounts.listUsers());
  }
}
