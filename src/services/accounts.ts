import type { PostableTransactionType } from "../types";

// Asset codes are upper-case identifiers, so the first ":" always separates
// the asset from the owner.
export const ASSET_CODE_PATTERN = /^[A-Z][A-Z0-9_]*$/;

export function accountIdFor(userId: string, assetTypeCode: string): string {
  return `${assetTypeCode}:${userId}`;
}

/**
 * Canonical lock order: lexicographic on account id. Every path that locks
 * more than one account goes through here.
 */
export function lockOrder(accountIds: readonly string[]): string[] {
  return [...new Set(accountIds)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export interface Participants<T> {
  debit: T;
  credit: T;
}

/** TOPUP and BONUS move value treasury → user; SPEND moves it user → treasury. */
export function participantsFor<T>(
  type: PostableTransactionType,
  user: T,
  treasury: T,
): Participants<T> {
  switch (type) {
    case "TOPUP":
    case "BONUS":
      return { debit: user, credit: treasury };
    case "SPEND":
      return { debit: treasury, credit: user };
  }
}
