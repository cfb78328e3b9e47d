import { setTimeout as sleep } from "node:timers/promises";
import type { Decimal } from "decimal.js";
import type { LedgerPolicy } from "../config";
import type { LedgerDatabase } from "../db/repositories";
import {
  POSTABLE_TRANSACTION_TYPES,
  type Metadata,
  type PostableTransactionType,
  type Transaction,
} from "../types";
import { logger } from "../utils/logger";
import {
  trackTransaction,
  trackUnitOfWork,
  type TransactionOutcome,
} from "../monitoring/metrics";
import { lockOrder, participantsFor } from "./accounts";
import { assertWithinBounds, formatAmount, parseAmount } from "./amount";
import type { AssetRegistry } from "./asset-registry";
import {
  ConflictError,
  DuplicateIdempotencyKeyError,
  InsufficientBalanceError,
  IntegrityError,
  LedgerError,
  ValidationError,
} from "./errors";

export interface TransactionRequest {
  type: string;
  userId: string;
  assetTypeCode: string;
  amount: string;
  idempotencyKey: string;
  metadata?: Metadata;
}

export interface TransactionResult {
  transaction: Transaction;
  /** True when the idempotency key had already been used. */
  replayed: boolean;
}

interface Command {
  type: PostableTransactionType;
  userId: string;
  assetTypeCode: string;
  amount: Decimal;
  idempotencyKey: string;
  metadata: Metadata;
}

const MAX_IDEMPOTENCY_KEY_LENGTH = 255;
const MAX_USER_ID_LENGTH = 100;

function isPostable(type: string): type is PostableTransactionType {
  return POSTABLE_TRANSACTION_TYPES.some((candidate) => candidate === type);
}

/**
 * Posts TOPUP, BONUS and SPEND transactions as balanced entry pairs.
 *
 * Locks are always taken in `lockOrder`, so two transactions sharing
 * accounts queue on the same first row instead of deadlocking. The engine
 * keeps no state between calls; all coordination happens in the database.
 */
export class TransactionEngine {
  constructor(
    private readonly db: LedgerDatabase,
    private readonly assets: AssetRegistry,
    private readonly policy: LedgerPolicy,
  ) {}

  async process(request: TransactionRequest): Promise<Transaction> {
    const { transaction } = await this.execute(request);
    return transaction;
  }

  async execute(request: TransactionRequest): Promise<TransactionResult> {
    const command = this.parse(request);

    logger.debug(
      {
        type: command.type,
        userId: command.userId,
        assetTypeCode: command.assetTypeCode,
        amount: command.amount.toString(),
        idempotencyKey: command.idempotencyKey,
      },
      "Processing transaction",
    );

    try {
      const existing = await this.db.read(({ transactions }) =>
        transactions.findByIdempotencyKey(command.idempotencyKey),
      );
      if (existing) return this.replay(existing, command);

      await this.assets.require(command.assetTypeCode);
      assertWithinBounds(
        command.amount,
        this.policy.minAmount,
        this.policy.maxAmount,
      );

      const transaction = await this.postWithRetry(command);
      trackTransaction(command.type, "completed");
      logger.info(
        { transactionId: transaction.id, type: transaction.type },
        "Transaction completed",
      );
      return { transaction, replayed: false };
    } catch (err) {
      if (err instanceof DuplicateIdempotencyKeyError) {
        return this.recoverDuplicate(command);
      }
      this.recordFailure(command, err);
      throw err;
    }
  }

  private parse(request: TransactionRequest): Command {
    if (!isPostable(request.type)) {
      throw new ValidationError(
        `Unsupported transaction type: ${request.type}. Expected one of ${POSTABLE_TRANSACTION_TYPES.join(", ")}`,
      );
    }

    const idempotencyKey = request.idempotencyKey.trim();
    if (idempotencyKey.length === 0) {
      throw new ValidationError("Idempotency key is required");
    }
    if (idempotencyKey.length > MAX_IDEMPOTENCY_KEY_LENGTH) {
      throw new ValidationError(
        `Idempotency key must be at most ${MAX_IDEMPOTENCY_KEY_LENGTH} characters`,
      );
    }

    const userId = request.userId.trim();
    if (userId.length === 0 || userId.length > MAX_USER_ID_LENGTH) {
      throw new ValidationError(
        `User id must be between 1 and ${MAX_USER_ID_LENGTH} characters`,
      );
    }
    if (userId === this.policy.treasuryUserId) {
      throw new ValidationError("The treasury cannot transact with itself");
    }

    return {
      type: request.type,
      userId,
      assetTypeCode: request.assetTypeCode,
      amount: parseAmount(request.amount, this.policy.amountScale),
      idempotencyKey,
      metadata: request.metadata ?? {},
    };
  }

  private async postWithRetry(command: Command): Promise<Transaction> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.post(command);
      } catch (err) {
        if (!(err instanceof ConflictError) || attempt >= this.policy.retryLimit) {
          throw err;
        }
        const delay = this.policy.retryBackoffMs * 2 ** attempt;
        logger.warn(
          { idempotencyKey: command.idempotencyKey, attempt: attempt + 1, delay, err },
          "Transient conflict, retrying transaction",
        );
        await sleep(delay);
      }
    }
  }

  private async post(command: Command): Promise<Transaction> {
    const started = performance.now();
    const amount = formatAmount(command.amount, this.policy.amountScale);

    try {
      return await this.db.unitOfWork(
        async ({ accounts, journal, transactions }) => {
          const user = await accounts.resolveOrCreate(
            command.userId,
            command.assetTypeCode,
            "USER",
          );
          const treasury = await accounts.resolveOrCreate(
            this.policy.treasuryUserId,
            command.assetTypeCode,
            "SYSTEM",
          );
          const { debit, credit } = participantsFor(command.type, user, treasury);

          await accounts.lock(lockOrder([debit.id, credit.id]));

          // A same-key request that held these locks before us has committed
          // by now; resolve to its row before the balance check can reject.
          const winner = await transactions.findByIdempotencyKey(
            command.idempotencyKey,
          );
          if (winner) {
            throw new DuplicateIdempotencyKeyError(command.idempotencyKey);
          }

          // Read under lock: no concurrent spend can slip in between the
          // check and the write.
          if (command.type === "SPEND") {
            const balance = await journal.balanceOf(user.id);
            if (command.amount.greaterThan(balance)) {
              logger.warn(
                { userId: command.userId, amount, balance },
                "Insufficient balance",
              );
              throw new InsufficientBalanceError(
                `Insufficient balance in ${user.id}: available ${balance}, requested ${amount}`,
                user.id,
                balance,
                amount,
              );
            }
          }

          const transaction = await transactions.insertCompleted({
            type: command.type,
            userId: command.userId,
            assetTypeCode: command.assetTypeCode,
            amount,
            idempotencyKey: command.idempotencyKey,
            metadata: command.metadata,
          });

          await journal.append({
            transactionId: transaction.id,
            debitAccountId: debit.id,
            creditAccountId: credit.id,
            assetTypeCode: command.assetTypeCode,
            amount,
          });
          await accounts.touch([debit.id, credit.id]);

          return transaction;
        },
        {
          lockTimeoutMs: this.policy.lockTimeoutMs,
          statementTimeoutMs: this.policy.statementTimeoutMs,
        },
      );
    } finally {
      trackUnitOfWork(performance.now() - started);
    }
  }

  private replay(existing: Transaction, command: Command): TransactionResult {
    const matches =
      existing.type === command.type &&
      existing.user_id === command.userId &&
      existing.asset_type_code === command.assetTypeCode &&
      command.amount.equals(existing.amount);

    if (!matches) {
      logger.warn(
        {
          idempotencyKey: command.idempotencyKey,
          transactionId: existing.id,
        },
        "Idempotency key reused with a different request; returning the original transaction",
      );
    }

    trackTransaction(command.type, "replayed");
    return { transaction: existing, replayed: true };
  }

  // Lost the race on the unique key: the winner's row is committed by now.
  private async recoverDuplicate(command: Command): Promise<TransactionResult> {
    const winner = await this.db.read(({ transactions }) =>
      transactions.findByIdempotencyKey(command.idempotencyKey),
    );
    if (!winner) {
      throw new ConflictError(
        `Idempotency key ${command.idempotencyKey} is being processed concurrently, retry later`,
      );
    }
    logger.info(
      { idempotencyKey: command.idempotencyKey, transactionId: winner.id },
      "Concurrent duplicate resolved to existing transaction",
    );
    return this.replay(winner, command);
  }

  private recordFailure(command: Command, err: unknown): void {
    const outcome: TransactionOutcome =
      err instanceof LedgerError && !(err instanceof IntegrityError) && !err.retryable
        ? "rejected"
        : "failed";
    trackTransaction(command.type, outcome);

    if (err instanceof LedgerError && outcome === "rejected") return;
    if (err instanceof ConflictError) {
      logger.warn(
        { idempotencyKey: command.idempotencyKey, err },
        "Transaction aborted by a transient conflict",
      );
      return;
    }
    logger.error(
      { idempotencyKey: command.idempotencyKey, err },
      "Transaction failed and was rolled back",
    );
  }
}
