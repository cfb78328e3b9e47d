import { z } from "@hono/zod-openapi";
import { POSTABLE_TRANSACTION_TYPES, TRANSACTION_TYPES } from "../types";
import type {
  Account,
  AccountBalance,
  AssetType,
  LedgerEntry,
  Transaction,
} from "../types";

export const ErrorSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    retryable: z.boolean(),
  })
  .openapi("Error");

const transactionFields = {
  userId: z.string().min(1).max(100).openapi({ example: "user_001" }),
  assetCode: z.string().min(1).openapi({ example: "GOLD_COINS" }),
  amount: z
    .string()
    .openapi({ example: "100.00", description: "Fixed-point decimal string" }),
  idempotencyKey: z.string().min(1).max(255).openapi({ example: "order-7f3a" }),
  metadata: z
    .record(z.string(), z.unknown())
    .optional()
    .openapi({ description: "Opaque payload, stored and returned verbatim" }),
};

export const TypedTransactionRequestSchema = z
  .object(transactionFields)
  .openapi("TypedTransactionRequest");

export const TransactionRequestSchema = z
  .object({
    type: z.string().openapi({
      enum: [...POSTABLE_TRANSACTION_TYPES],
      example: "TOPUP",
    }),
    ...transactionFields,
  })
  .openapi("TransactionRequest");

export const TransactionSchema = z
  .object({
    id: z.string(),
    type: z.enum(TRANSACTION_TYPES),
    status: z.enum(["PENDING", "COMPLETED", "FAILED"]),
    user_id: z.string(),
    asset_type_code: z.string(),
    amount: z.string(),
    idempotency_key: z.string(),
    metadata: z.record(z.string(), z.unknown()),
    created_at: z.string(),
  })
  .openapi("Transaction");

export const LedgerEntrySchema = z
  .object({
    id: z.string(),
    transaction_id: z.string(),
    direction: z.enum(["DEBIT", "CREDIT"]),
    account_id: z.string(),
    contra_account_id: z.string(),
    asset_type_code: z.string(),
    amount: z.string(),
    created_at: z.string(),
  })
  .openapi("LedgerEntry");

export const BalanceSchema = z
  .object({
    user_id: z.string(),
    balances: z.array(
      z.object({
        asset_type_code: z.string(),
        account_id: z.string(),
        balance: z.string(),
      }),
    ),
    timestamp: z.string(),
  })
  .openapi("WalletBalance");

export const AccountSchema = z
  .object({
    id: z.string(),
    user_id: z.string(),
    kind: z.enum(["USER", "SYSTEM"]),
    asset_type_code: z.string(),
    version: z.number().int(),
    created_at: z.string(),
  })
  .openapi("Account");

export const AssetTypeSchema = z
  .object({
    code: z.string(),
    name: z.string(),
    description: z.string().nullable(),
    active: z.boolean(),
    created_at: z.string(),
  })
  .openapi("AssetType");

export const UserSummarySchema = z
  .object({
    user_id: z.string(),
    account_count: z.number().int(),
  })
  .openapi("UserSummary");

export const AssetCodeParamSchema = z.object({
  code: z
    .string()
    .min(1)
    .openapi({ param: { name: "code", in: "path" }, example: "GOLD_COINS" }),
});

export const UserIdParamSchema = z.object({
  userId: z
    .string()
    .min(1)
    .openapi({ param: { name: "userId", in: "path" }, example: "user_001" }),
});

export const TransactionIdParamSchema = z.object({
  id: z
    .string()
    .min(1)
    .openapi({ param: { name: "id", in: "path" }, example: "txn_0f3c…" }),
});

export const jsonContent = <T extends z.ZodTypeAny>(schema: T, description: string) => ({
  content: { "application/json": { schema } },
  description,
});

export const errorResponses = {
  400: jsonContent(ErrorSchema, "Invalid request"),
  409: jsonContent(ErrorSchema, "Transient conflict, safe to retry"),
  500: jsonContent(ErrorSchema, "Internal error"),
};

export type TransactionResponse = z.infer<typeof TransactionSchema>;

export const toTransactionResponse = (t: Transaction): TransactionResponse => ({
  id: t.id,
  type: t.type,
  status: t.status,
  user_id: t.user_id,
  asset_type_code: t.asset_type_code,
  amount: t.amount,
  idempotency_key: t.idempotency_key,
  metadata: t.metadata,
  created_at: t.created_at.toISOString(),
});

export const toEntryResponse = (
  e: LedgerEntry,
): z.infer<typeof LedgerEntrySchema> => ({
  ...e,
  created_at: e.created_at.toISOString(),
});

export const toAccountResponse = (
  a: Account,
): z.infer<typeof AccountSchema> => ({
  ...a,
  created_at: a.created_at.toISOString(),
});

export const toAssetResponse = (
  a: AssetType,
): z.infer<typeof AssetTypeSchema> => ({
  ...a,
  created_at: a.created_at.toISOString(),
});

export const toBalanceResponse = (
  userId: string,
  balances: AccountBalance[],
): z.infer<typeof BalanceSchema> => ({
  user_id: userId,
  balances,
  timestamp: new Date().toISOString(),
});
