import { Inject, Injectable, Logger, Optional } from "@nestjs/common";
import { InjectDataSource } from "@nestjs/typeorm";
import { DataSource } from "typeorm";
import { loadVaultParameters, VaultParameters } from "../../../libs/staking-vault/src/configs/vault-config";
import { requireAddress } from "../../../libs/staking-vault/src/utils/address";
import { VaultQueries } from "../../../libs/staking-vault/src/VaultQueries";
import type { Clock } from "../../../libs/staking-vault/src/utils/Clock";
import type { UserStakingSummary } from "../../../libs/staking-vault/src/vault-types";

export const VAULT_CLOCK = "VAULT_CLOCK";

export interface VaultState {
  totalStaked: bigint;
  totalInCooldown: bigint;
  totalInEarlyCooldown: bigint;
  minimumStakeAmount: bigint;
  maximumStakeAmount: bigint;
  lockupPeriods: bigint[];
  treasury: string;
  qualityControl: string;
  paused: boolean;
  consistent: boolean;
}

@Injectable()
export class StakingVaultApiService {
  private readonly logger = new Logger(StakingVaultApiService.name);
  private readonly parameters: VaultParameters;
  private readonly queries: VaultQueries;

  constructor(@InjectDataSource() dataSource: DataSource, @Optional() @Inject(VAULT_CLOCK) clock?: Clock) {
    this.parameters = loadVaultParameters();
    this.queries = new VaultQueries(dataSource, this.parameters, clock);
    this.logger.log(`Serving vault ${this.parameters.vaultAddress}`);
  }

  async getVaultState(): Promise<VaultState> {
    const settings = await this.queries.getVaultSettings();
    const audit = await this.queries.auditAggregates();
    if (!audit.consistent) {
      this.logger.error(
        `Aggregates differ from position sums: staked ${settings.totalStaked} vs ${audit.sumOfAmounts}, ` +
          `cooldown ${settings.totalInCooldown} vs ${audit.sumOfCooldownAmounts}, ` +
          `early cooldown ${settings.totalInEarlyCooldown} vs ${audit.sumOfEarlyCooldownAmounts}`
      );
    }
    return {
      totalStaked: settings.totalStaked,
      totalInCooldown: settings.totalInCooldown,
      totalInEarlyCooldown: settings.totalInEarlyCooldown,
      minimumStakeAmount: this.parameters.minimumStakeAmount,
      maximumStakeAmount: settings.maximumStakeAmount,
      lockupPeriods: [...this.parameters.lockupPeriods],
      treasury: settings.treasury,
      qualityControl: settings.qualityControl,
      paused: settings.paused,
      consistent: audit.consistent,
    };
  }

  async getUserSummary(address: string): Promise<UserStakingSummary> {
    return this.queries.getUserStakingSummary(requireAddress(address, "user"));
  }

  async hasActiveStake(address: string): Promise<boolean> {
    return this.queries.hasActiveStake(requireAddress(address, "user"));
  }
}
