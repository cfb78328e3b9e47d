// Test Fixtures - Asset Data
export const ASSET_CODES = {
  GOLD: "GOLD_COINS",
  DIAMOND: "DIAMONDS",
  LOYALTY: "LOYALTY_POINTS",
} as const;

export type AssetCode = (typeof ASSET_CODES)[keyof typeof ASSET_CODES];

// Registered but deactivated; postings against it are rejected.
export const INACTIVE_ASSET_CODE = "RETIRED_TOKENS";
