import { EntityManager } from "typeorm";
import { VaultEventEntity } from "../orm/entities";
import { bigIntReplacer, bigIntReviver } from "../utils/big-number-serialization";
import { Address, UnixSeconds } from "../vault-types";

interface UserEventBase {
  readonly user: Address;
  readonly timestamp: UnixSeconds;
}

export interface Staked extends UserEventBase {
  readonly name: "Staked";
  readonly amount: bigint;
  readonly multiplier: bigint;
  readonly lockupPeriod: bigint;
}

export interface AmountIncreased extends UserEventBase {
  readonly name: "AmountIncreased";
  readonly additionalAmount: bigint;
  readonly newTotalAmount: bigint;
  readonly newEffectiveMultiplier: bigint;
  readonly newEffectiveLockupPeriod: bigint;
}

export interface LockupIncreased extends UserEventBase {
  readonly name: "LockupIncreased";
  readonly additionalLockup: bigint;
  readonly newEffectiveLockupPeriod: bigint;
  readonly newEffectiveMultiplier: bigint;
}

export interface UnstakeInitiated extends UserEventBase {
  readonly name: "UnstakeInitiated";
  readonly amount: bigint;
}

export interface Unstaked extends UserEventBase {
  readonly name: "Unstaked";
  readonly amount: bigint;
}

export interface EarlyUnstakeInitiated extends UserEventBase {
  readonly name: "EarlyUnstakeInitiated";
  readonly amount: bigint;
}

export interface EarlyUnstake extends UserEventBase {
  readonly name: "EarlyUnstake";
  readonly amount: bigint;
  readonly payout: bigint;
  readonly penalty: bigint;
}

export interface QAPenaltyProcessed extends UserEventBase {
  readonly name: "QAPenaltyProcessed";
  readonly requestedAmount: bigint;
  readonly appliedAmount: bigint;
  readonly qualityControl: Address;
}

interface AdminEventBase {
  readonly user: null;
  readonly timestamp: UnixSeconds;
  readonly by: Address;
}

export interface Initialized extends AdminEventBase {
  readonly name: "Initialized";
  readonly treasury: Address;
  readonly qualityControl: Address;
  readonly maximumStakeAmount: bigint;
}

export interface TreasuryUpdated extends AdminEventBase {
  readonly name: "TreasuryUpdated";
  readonly treasury: Address;
}

export interface QualityControlUpdated extends AdminEventBase {
  readonly name: "QualityControlUpdated";
  readonly qualityControl: Address;
}

export interface MaximumStakeAmountUpdated extends AdminEventBase {
  readonly name: "MaximumStakeAmountUpdated";
  readonly oldMaximumStakeAmount: bigint;
  readonly newMaximumStakeAmount: bigint;
}

export interface Paused extends AdminEventBase {
  readonly name: "Paused";
}

export interface Unpaused extends AdminEventBase {
  readonly name: "Unpaused";
}

export interface EmergencyWithdraw extends AdminEventBase {
  readonly name: "EmergencyWithdraw";
  readonly to: Address;
  readonly amount: bigint;
}

export type VaultEvent =
  | Staked
  | AmountIncreased
  | LockupIncreased
  | UnstakeInitiated
  | Unstaked
  | EarlyUnstakeInitiated
  | EarlyUnstake
  | QAPenaltyProcessed
  | Initialized
  | TreasuryUpdated
  | QualityControlUpdated
  | MaximumStakeAmountUpdated
  | Paused
  | Unpaused
  | EmergencyWithdraw;

export type VaultEventName = VaultEvent["name"];

/** Appends event records within the given transaction. */
export async function recordEvents(em: EntityManager, events: readonly VaultEvent[]): Promise<void> {
  if (events.length === 0) return;
  const rows = events.map(event => {
    const { name, user, timestamp, ...payload } = event;
    return em.create(VaultEventEntity, {
      name,
      user,
      timestamp,
      payload: JSON.stringify(payload, bigIntReplacer),
    });
  });
  await em.save(rows);
}

export interface StoredVaultEvent {
  readonly id: number;
  readonly name: string;
  readonly user: Address | null;
  readonly timestamp: UnixSeconds;
  readonly payload: Record<string, unknown>;
}

export async function readEvents(em: EntityManager, user?: Address): Promise<StoredVaultEvent[]> {
  const rows = await em.find(VaultEventEntity, {
    where: user === undefined ? {} : { user },
    order: { id: "ASC" },
  });
  return rows.map(row => {
    const parsed: unknown = JSON.parse(row.payload, bigIntReviver);
    const payload: Record<string, unknown> =
      parsed !== null && typeof parsed === "object" ? Object.fromEntries(Object.entries(parsed)) : {};
    return { id: row.id, name: row.name, user: row.user, timestamp: row.timestamp, payload };
  });
}
