export const ONE_DAY_SEC = 24n * 60n * 60n;

export const LOCKUP_30_DAYS = 30n * ONE_DAY_SEC;
export const LOCKUP_90_DAYS = 90n * ONE_DAY_SEC;
export const LOCKUP_180_DAYS = 180n * ONE_DAY_SEC;
export const LOCKUP_365_DAYS = 365n * ONE_DAY_SEC;

export const CANONICAL_LOCKUP_PERIODS: readonly bigint[] = [
  LOCKUP_30_DAYS,
  LOCKUP_90_DAYS,
  LOCKUP_180_DAYS,
  LOCKUP_365_DAYS,
];

/** 10000 basis points = 1.0x */
export const BASIS_POINTS = 10000n;

export const DEFAULT_TOKEN_DECIMALS = 18;

// Fixed-point bounds of the stored quantities
export const MAX_UINT256 = 2n ** 256n - 1n;
export const MAX_UINT64 = 2n ** 64n - 1n;

export const DEFAULT_MINIMUM_STAKE_TOKENS = "100";
export const DEFAULT_MAXIMUM_STAKE_TOKENS = "10000";
export const DEFAULT_COOLDOWN_PERIOD_SEC = 2n * ONE_DAY_SEC;
export const DEFAULT_EARLY_UNSTAKE_COOLDOWN_PERIOD_SEC = 2n * ONE_DAY_SEC;
export const DEFAULT_EARLY_UNSTAKE_PENALTY_BPS = 2000n;
export const DEFAULT_MINIMUM_LOCKUP_INCREASE_SEC = 7n * ONE_DAY_SEC;

// Primary key of the single vault state row
export const VAULT_STATE_ID = 1;
