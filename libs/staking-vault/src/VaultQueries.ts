import { DataSource } from "typeorm";
import { VaultParameters } from "./configs/vault-config";
import { readEvents, StoredVaultEvent } from "./events/VaultEvents";
import { AggregateAudit, PositionLedger } from "./PositionLedger";
import { isMatured } from "./StakingVault";
import { Clock, systemClock } from "./utils/Clock";
import { Address, Position, UserStakingSummary, VaultSettings } from "./vault-types";

/**
 * Read-only views over committed vault state. Never writes and never fails on a missing position.
 */
export class VaultQueries {
  private readonly clock: Clock;

  constructor(
    private readonly dataSource: DataSource,
    private readonly parameters: VaultParameters,
    clock?: Clock
  ) {
    this.clock = clock ?? systemClock;
  }

  private get ledger() {
    return new PositionLedger(this.dataSource.manager);
  }

  async getPosition(user: Address): Promise<Position> {
    return this.ledger.getPosition(user);
  }

  async hasActiveStake(user: Address): Promise<boolean> {
    return (await this.getPosition(user)).amount > 0n;
  }

  async getTotalStaked(user?: Address): Promise<bigint> {
    if (user === undefined) {
      return (await this.ledger.getSettings()).totalStaked;
    }
    return (await this.getPosition(user)).amount;
  }

  async getTotalUnlocked(user: Address): Promise<bigint> {
    return unlockedAmount(await this.getPosition(user), this.clock.nowSec());
  }

  async getTotalLocked(user: Address): Promise<bigint> {
    return lockedAmount(await this.getPosition(user), this.clock.nowSec());
  }

  async getTotalInCooldown(user: Address): Promise<bigint> {
    return (await this.getPosition(user)).cooldownAmount;
  }

  async getTotalInEarlyCooldown(user: Address): Promise<bigint> {
    return (await this.getPosition(user)).earlyUnstakeCooldownAmount;
  }

  async getTotalReadyForUnstake(user: Address): Promise<bigint> {
    const position = await this.getPosition(user);
    return this.timeUntilCooldownComplete(position, this.clock.nowSec()) === 0n ? position.cooldownAmount : 0n;
  }

  async getTotalReadyForEarlyUnstake(user: Address): Promise<bigint> {
    const position = await this.getPosition(user);
    return this.timeUntilEarlyUnstakeComplete(position, this.clock.nowSec()) === 0n
      ? position.earlyUnstakeCooldownAmount
      : 0n;
  }

  async getEffectiveMultiplier(user: Address): Promise<bigint> {
    return (await this.getPosition(user)).effectiveMultiplier;
  }

  async getEffectiveLockupPeriod(user: Address): Promise<bigint> {
    return (await this.getPosition(user)).effectiveLockupPeriod;
  }

  async getTimeUntilUnlock(user: Address): Promise<bigint> {
    return timeUntilUnlock(await this.getPosition(user), this.clock.nowSec());
  }

  async getTimeUntilCooldownComplete(user: Address): Promise<bigint> {
    return this.timeUntilCooldownComplete(await this.getPosition(user), this.clock.nowSec());
  }

  async getTimeUntilEarlyUnstakeComplete(user: Address): Promise<bigint> {
    return this.timeUntilEarlyUnstakeComplete(await this.getPosition(user), this.clock.nowSec());
  }

  /** All per-user figures, computed against a single clock reading. */
  async getUserStakingSummary(user: Address): Promise<UserStakingSummary> {
    const position = await this.getPosition(user);
    const now = this.clock.nowSec();
    const cooldownLeft = this.timeUntilCooldownComplete(position, now);
    const earlyCooldownLeft = this.timeUntilEarlyUnstakeComplete(position, now);
    return {
      user: position.user,
      hasActiveStake: position.amount > 0n,
      totalStaked: position.amount,
      totalUnlocked: unlockedAmount(position, now),
      totalLocked: lockedAmount(position, now),
      totalInCooldown: position.cooldownAmount,
      totalInEarlyCooldown: position.earlyUnstakeCooldownAmount,
      totalReadyForUnstake: cooldownLeft === 0n ? position.cooldownAmount : 0n,
      totalReadyForEarlyUnstake: earlyCooldownLeft === 0n ? position.earlyUnstakeCooldownAmount : 0n,
      effectiveMultiplier: position.effectiveMultiplier,
      effectiveLockupPeriod: position.effectiveLockupPeriod,
      timeUntilUnlock: timeUntilUnlock(position, now),
      timeUntilCooldownComplete: cooldownLeft,
      timeUntilEarlyUnstakeComplete: earlyCooldownLeft,
    };
  }

  async getMaximumStakeAmount(): Promise<bigint> {
    return (await this.ledger.getSettings()).maximumStakeAmount;
  }

  async getVaultSettings(): Promise<VaultSettings> {
    return this.ledger.getSettings();
  }

  async getEvents(user?: Address): Promise<StoredVaultEvent[]> {
    return readEvents(this.dataSource.manager, user);
  }

  async auditAggregates(): Promise<AggregateAudit> {
    return this.ledger.audit();
  }

  private timeUntilCooldownComplete(position: Position, now: bigint): bigint {
    if (position.cooldownAmount === 0n) return 0n;
    return remaining(position.cooldownStart + this.parameters.cooldownPeriod, now);
  }

  private timeUntilEarlyUnstakeComplete(position: Position, now: bigint): bigint {
    if (position.earlyUnstakeCooldownAmount === 0n) return 0n;
    return remaining(position.earlyUnstakeCooldownStart + this.parameters.earlyUnstakeCooldownPeriod, now);
  }
}

function remaining(end: bigint, now: bigint): bigint {
  return end > now ? end - now : 0n;
}

function timeUntilUnlock(position: Position, now: bigint): bigint {
  if (position.amount === 0n) return 0n;
  return remaining(position.weightedStartTime + position.effectiveLockupPeriod, now);
}

function unlockedAmount(position: Position, now: bigint): bigint {
  if (position.amount === 0n || !isMatured(position, now)) return 0n;
  return position.amount - position.cooldownAmount - position.earlyUnstakeCooldownAmount;
}

function lockedAmount(position: Position, now: bigint): bigint {
  if (position.amount === 0n || isMatured(position, now)) return 0n;
  return position.amount - position.earlyUnstakeCooldownAmount;
}
