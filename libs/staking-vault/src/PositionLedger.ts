import { EntityManager } from "typeorm";
import { VAULT_STATE_ID } from "./constants";
import { calculateMultiplier } from "./multiplier/multiplier-calculation";
import { MultiplierTable } from "./multiplier/MultiplierTable";
import { StakePositionEntity, VaultStateEntity } from "./orm/entities";
import { InvariantViolationError, StatePreconditionError } from "./utils/error";
import { Address, emptyPosition, Position, VaultSettings } from "./vault-types";

export interface AggregateAudit {
  readonly positions: number;
  readonly sumOfAmounts: bigint;
  readonly sumOfCooldownAmounts: bigint;
  readonly sumOfEarlyCooldownAmounts: bigint;
  readonly consistent: boolean;
}

/**
 * Per-user positions and the global aggregate, read and written through one EntityManager.
 * Empty positions are never stored.
 */
export class PositionLedger {
  constructor(private readonly em: EntityManager) {}

  async getPosition(user: Address): Promise<Position> {
    const row = await this.em.findOneBy(StakePositionEntity, { user });
    if (!row) return emptyPosition(user);
    return {
      user: row.user,
      amount: row.amount,
      weightedStartTime: row.weightedStartTime,
      effectiveLockupPeriod: row.effectiveLockupPeriod,
      effectiveMultiplier: row.effectiveMultiplier,
      cooldownStart: row.cooldownStart,
      cooldownAmount: row.cooldownAmount,
      earlyUnstakeCooldownStart: row.earlyUnstakeCooldownStart,
      earlyUnstakeCooldownAmount: row.earlyUnstakeCooldownAmount,
      lastUpdateTime: row.lastUpdateTime,
    };
  }

  /** Stores the position, or removes it once its amount reached zero. */
  async savePosition(position: Position): Promise<void> {
    if (position.amount === 0n) {
      await this.em.delete(StakePositionEntity, { user: position.user });
      return;
    }
    await this.em.save(this.em.create(StakePositionEntity, { ...position }));
  }

  async findSettings(): Promise<VaultSettings | undefined> {
    const row = await this.em.findOneBy(VaultStateEntity, { id: VAULT_STATE_ID });
    if (!row) return undefined;
    return {
      totalStaked: row.totalStaked,
      totalInCooldown: row.totalInCooldown,
      totalInEarlyCooldown: row.totalInEarlyCooldown,
      maximumStakeAmount: row.maximumStakeAmount,
      admin: row.admin,
      treasury: row.treasury,
      qualityControl: row.qualityControl,
      paused: row.paused,
    };
  }

  async getSettings(): Promise<VaultSettings> {
    const settings = await this.findSettings();
    if (!settings) {
      throw new StatePreconditionError("NotInitialized", "vault state has not been initialized");
    }
    return settings;
  }

  async saveSettings(settings: VaultSettings): Promise<void> {
    await this.em.save(this.em.create(VaultStateEntity, { id: VAULT_STATE_ID, ...settings }));
  }

  /** Recomputes the aggregates from every stored position. */
  async audit(): Promise<AggregateAudit> {
    const rows = await this.em.find(StakePositionEntity);
    const settings = await this.getSettings();
    let sumOfAmounts = 0n;
    let sumOfCooldownAmounts = 0n;
    let sumOfEarlyCooldownAmounts = 0n;
    for (const row of rows) {
      sumOfAmounts += row.amount;
      sumOfCooldownAmounts += row.cooldownAmount;
      sumOfEarlyCooldownAmounts += row.earlyUnstakeCooldownAmount;
    }
    return {
      positions: rows.length,
      sumOfAmounts,
      sumOfCooldownAmounts,
      sumOfEarlyCooldownAmounts,
      consistent:
        sumOfAmounts === settings.totalStaked &&
        sumOfCooldownAmounts === settings.totalInCooldown &&
        sumOfEarlyCooldownAmounts === settings.totalInEarlyCooldown,
    };
  }
}

/**
 * Throws if the position breaks any of the record invariants.
 */
export function checkPositionInvariants(position: Position, table: MultiplierTable): void {
  const violation = (message: string): never => {
    throw new InvariantViolationError("InvariantViolation", `${position.user}: ${message}`);
  };
  if (position.amount < 0n || position.cooldownAmount < 0n || position.earlyUnstakeCooldownAmount < 0n) {
    violation("negative amount");
  }
  if (position.cooldownAmount > position.amount) {
    violation("cooldown amount exceeds staked amount");
  }
  if (position.earlyUnstakeCooldownAmount > position.amount) {
    violation("early unstake cooldown amount exceeds staked amount");
  }
  if (position.cooldownAmount > 0n && position.earlyUnstakeCooldownAmount > 0n) {
    violation("both cooldown kinds are open");
  }
  if ((position.cooldownStart === 0n) !== (position.cooldownAmount === 0n)) {
    violation("cooldown start and amount disagree");
  }
  if ((position.earlyUnstakeCooldownStart === 0n) !== (position.earlyUnstakeCooldownAmount === 0n)) {
    violation("early unstake cooldown start and amount disagree");
  }
  if (position.amount > 0n) {
    const expected = calculateMultiplier(position.amount, position.effectiveLockupPeriod, table);
    if (position.effectiveMultiplier !== expected) {
      violation(`cached multiplier ${position.effectiveMultiplier} differs from ${expected}`);
    }
  }
}
