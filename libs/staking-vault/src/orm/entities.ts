import "reflect-metadata";
import { Column, Entity, Index, PrimaryColumn, PrimaryGeneratedColumn, ValueTransformer } from "typeorm";

/** Stores bigints as decimal strings: fits uint256 in every supported database. */
export const bigIntTransformer: ValueTransformer = {
  to: (value: bigint | undefined) => (value === undefined ? undefined : value.toString()),
  from: (value: string | null) => (value === null ? 0n : BigInt(value)),
};

const UINT256_DIGITS = 78;
const ADDRESS_LENGTH = 42;

const bigIntColumn = (name: string) => ({
  name,
  type: "varchar" as const,
  length: UINT256_DIGITS,
  transformer: bigIntTransformer,
});

@Entity("stake_positions")
export class StakePositionEntity {
  @PrimaryColumn({ name: "user", type: "varchar", length: ADDRESS_LENGTH })
  user!: string;

  @Column(bigIntColumn("amount"))
  amount!: bigint;

  @Column(bigIntColumn("weighted_start_time"))
  weightedStartTime!: bigint;

  @Column(bigIntColumn("effective_lockup_period"))
  effectiveLockupPeriod!: bigint;

  @Column(bigIntColumn("effective_multiplier"))
  effectiveMultiplier!: bigint;

  @Column(bigIntColumn("cooldown_start"))
  cooldownStart!: bigint;

  @Column(bigIntColumn("cooldown_amount"))
  cooldownAmount!: bigint;

  @Column(bigIntColumn("early_unstake_cooldown_start"))
  earlyUnstakeCooldownStart!: bigint;

  @Column(bigIntColumn("early_unstake_cooldown_amount"))
  earlyUnstakeCooldownAmount!: bigint;

  @Column(bigIntColumn("last_update_time"))
  lastUpdateTime!: bigint;
}

// Single row, see VAULT_STATE_ID
@Entity("vault_state")
export class VaultStateEntity {
  @PrimaryColumn({ name: "id", type: "integer" })
  id!: number;

  @Column(bigIntColumn("total_staked"))
  totalStaked!: bigint;

  @Column(bigIntColumn("total_in_cooldown"))
  totalInCooldown!: bigint;

  @Column(bigIntColumn("total_in_early_cooldown"))
  totalInEarlyCooldown!: bigint;

  @Column(bigIntColumn("maximum_stake_amount"))
  maximumStakeAmount!: bigint;

  @Column({ name: "admin", type: "varchar", length: ADDRESS_LENGTH })
  admin!: string;

  @Column({ name: "treasury", type: "varchar", length: ADDRESS_LENGTH })
  treasury!: string;

  @Column({ name: "quality_control", type: "varchar", length: ADDRESS_LENGTH })
  qualityControl!: string;

  @Column({ name: "paused", type: "boolean" })
  paused!: boolean;
}

@Entity("token_balances")
export class TokenBalanceEntity {
  @PrimaryColumn({ name: "account", type: "varchar", length: ADDRESS_LENGTH })
  account!: string;

  @Column(bigIntColumn("balance"))
  balance!: bigint;
}

@Entity("token_allowances")
export class TokenAllowanceEntity {
  @PrimaryColumn({ name: "owner", type: "varchar", length: ADDRESS_LENGTH })
  owner!: string;

  @PrimaryColumn({ name: "spender", type: "varchar", length: ADDRESS_LENGTH })
  spender!: string;

  @Column(bigIntColumn("amount"))
  amount!: bigint;
}

@Entity("vault_events")
export class VaultEventEntity {
  @PrimaryGeneratedColumn({ name: "id", type: "integer" })
  id!: number;

  @Column({ name: "name", type: "varchar", length: 64 })
  name!: string;

  @Index()
  @Column({ name: "user", type: "varchar", length: ADDRESS_LENGTH, nullable: true })
  user!: string | null;

  // JSON, bigints serialized with bigIntReplacer
  @Column({ name: "payload", type: "text" })
  payload!: string;

  @Column(bigIntColumn("timestamp"))
  timestamp!: bigint;
}

export const VAULT_ENTITIES = [
  StakePositionEntity,
  VaultStateEntity,
  TokenBalanceEntity,
  TokenAllowanceEntity,
  VaultEventEntity,
];
