import { ApiProperty } from "@nestjs/swagger";

// Amounts, times and multipliers are bigints in the vault and decimal strings on the wire.

export class VaultStateResponse {
  @ApiProperty({ type: String, description: "Sum of all active stake, in token base units" })
  totalStaked!: string;
  @ApiProperty({ type: String })
  totalInCooldown!: string;
  @ApiProperty({ type: String })
  totalInEarlyCooldown!: string;
  @ApiProperty({ type: String })
  minimumStakeAmount!: string;
  @ApiProperty({ type: String })
  maximumStakeAmount!: string;
  @ApiProperty({ type: [String], description: "Accepted initial lockup periods, in seconds" })
  lockupPeriods!: string[];
  @ApiProperty({ type: String })
  treasury!: string;
  @ApiProperty({ type: String })
  qualityControl!: string;
  @ApiProperty({ type: Boolean })
  paused!: boolean;
  @ApiProperty({ type: Boolean, description: "Aggregates equal the sums over all positions" })
  consistent!: boolean;
}

export class UserStakingSummaryResponse {
  @ApiProperty({ type: String })
  user!: string;
  @ApiProperty({ type: Boolean })
  hasActiveStake!: boolean;
  @ApiProperty({ type: String })
  totalStaked!: string;
  @ApiProperty({ type: String })
  totalUnlocked!: string;
  @ApiProperty({ type: String })
  totalLocked!: string;
  @ApiProperty({ type: String })
  totalInCooldown!: string;
  @ApiProperty({ type: String })
  totalInEarlyCooldown!: string;
  @ApiProperty({ type: String })
  totalReadyForUnstake!: string;
  @ApiProperty({ type: String })
  totalReadyForEarlyUnstake!: string;
  @ApiProperty({ type: String, description: "Basis points, 10000 = 1x" })
  effectiveMultiplier!: string;
  @ApiProperty({ type: String })
  effectiveLockupPeriod!: string;
  @ApiProperty({ type: String })
  timeUntilUnlock!: string;
  @ApiProperty({ type: String })
  timeUntilCooldownComplete!: string;
  @ApiProperty({ type: String })
  timeUntilEarlyUnstakeComplete!: string;
}

export class ActiveStakeResponse {
  @ApiProperty({ type: String })
  user!: string;
  @ApiProperty({ type: Boolean })
  hasActiveStake!: boolean;
}
