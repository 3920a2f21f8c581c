export type Address = string;
export type UnixSeconds = bigint;
export type BasisPoints = bigint;

/**
 * A user's current stake record.
 * `amount > 0` is the only "has position" predicate.
 */
export interface Position {
  readonly user: Address;
  readonly amount: bigint;
  readonly weightedStartTime: UnixSeconds;
  readonly effectiveLockupPeriod: bigint;
  readonly effectiveMultiplier: BasisPoints;
  readonly cooldownStart: UnixSeconds;
  readonly cooldownAmount: bigint;
  readonly earlyUnstakeCooldownStart: UnixSeconds;
  readonly earlyUnstakeCooldownAmount: bigint;
  readonly lastUpdateTime: UnixSeconds;
}

export function emptyPosition(user: Address): Position {
  return {
    user,
    amount: 0n,
    weightedStartTime: 0n,
    effectiveLockupPeriod: 0n,
    effectiveMultiplier: 0n,
    cooldownStart: 0n,
    cooldownAmount: 0n,
    earlyUnstakeCooldownStart: 0n,
    earlyUnstakeCooldownAmount: 0n,
    lastUpdateTime: 0n,
  };
}

/** Global aggregate and role configuration. */
export interface VaultSettings {
  readonly totalStaked: bigint;
  readonly totalInCooldown: bigint;
  readonly totalInEarlyCooldown: bigint;
  readonly maximumStakeAmount: bigint;
  readonly admin: Address;
  readonly treasury: Address;
  readonly qualityControl: Address;
  readonly paused: boolean;
}

export interface UserStakingSummary {
  readonly user: Address;
  readonly hasActiveStake: boolean;
  readonly totalStaked: bigint;
  readonly totalUnlocked: bigint;
  readonly totalLocked: bigint;
  readonly totalInCooldown: bigint;
  readonly totalInEarlyCooldown: bigint;
  readonly totalReadyForUnstake: bigint;
  readonly totalReadyForEarlyUnstake: bigint;
  readonly effectiveMultiplier: BasisPoints;
  readonly effectiveLockupPeriod: bigint;
  readonly timeUntilUnlock: bigint;
  readonly timeUntilCooldownComplete: bigint;
  readonly timeUntilEarlyUnstakeComplete: bigint;
}
