export const TRANSACTION_TYPES = [
  "TOPUP",
  "BONUS",
  "SPEND",
  "REFUND",
  "ADJUSTMENT",
] as const;

export type TransactionType = (typeof TRANSACTION_TYPES)[number];

// REFUND and ADJUSTMENT are reserved: the engine only posts these three.
export const POSTABLE_TRANSACTION_TYPES = ["TOPUP", "BONUS", "SPEND"] as const;

export type PostableTransactionType =
  (typeof POSTABLE_TRANSACTION_TYPES)[number];

export type TransactionStatus = "PENDING" | "COMPLETED" | "FAILED";

export type AccountKind = "USER" | "SYSTEM";

export type EntryDirection = "DEBIT" | "CREDIT";

/** Caller-supplied payload, stored and returned verbatim. */
export type Metadata = Record<string, unknown>;

export interface AssetType {
  code: string;
  name: string;
  description: string | null;
  active: boolean;
  created_at: Date;
}

export interface Account {
  id: string; // "<asset_type_code>:<user_id>"
  user_id: string;
  kind: AccountKind;
  asset_type_code: string;
  version: number;
  created_at: Date;
}

export interface Transaction {
  id: string;
  type: TransactionType;
  status: TransactionStatus;
  user_id: string;
  asset_type_code: string;
  amount: string; // Decimal
  idempotency_key: string;
  metadata: Metadata;
  created_at: Date;
}

export interface LedgerEntry {
  id: string;
  transaction_id: string;
  direction: EntryDirection;
  account_id: string;
  contra_account_id: string;
  asset_type_code: string;
  amount: string; // Decimal
  created_at: Date;
}

export interface AccountBalance {
  asset_type_code: string;
  account_id: string;
  balance: string;
}
