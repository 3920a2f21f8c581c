import {
  BadRequestException,
  Controller,
  Get,
  Inject,
  InternalServerErrorException,
  Logger,
  NotFoundException,
  Param,
} from "@nestjs/common";
import { ApiOkResponse, ApiTags } from "@nestjs/swagger";
import { isVaultError } from "../../../libs/staking-vault/src/utils/error";
import type { UserStakingSummary } from "../../../libs/staking-vault/src/vault-types";
import { ActiveStakeResponse, UserStakingSummaryResponse, VaultStateResponse } from "./dto/vault-responses.dto";
import { StakingVaultApiService } from "./staking-vault-api.service";
import type { VaultState } from "./staking-vault-api.service";

enum ApiTagsEnum {
  VAULT = "Staking vault",
  USERS = "Staking positions",
}

@Controller("vault")
export class StakingVaultApiController {
  private readonly logger = new Logger(StakingVaultApiController.name);
  constructor(@Inject(StakingVaultApiService) private readonly vaultService: StakingVaultApiService) {}

  @ApiTags(ApiTagsEnum.VAULT)
  @ApiOkResponse({ type: VaultStateResponse })
  @Get()
  async getVault(): Promise<VaultState> {
    this.logger.log("Calling GET on vault");
    return this.handle(() => this.vaultService.getVaultState());
  }

  @ApiTags(ApiTagsEnum.USERS)
  @ApiOkResponse({ type: UserStakingSummaryResponse })
  @Get("users/:address")
  async getUserSummary(@Param("address") address: string): Promise<UserStakingSummary> {
    this.logger.log(`Calling GET on vault/users with param: address ${address}`);
    return this.handle(() => this.vaultService.getUserSummary(address));
  }

  @ApiTags(ApiTagsEnum.USERS)
  @ApiOkResponse({ type: ActiveStakeResponse })
  @Get("users/:address/active")
  async hasActiveStake(@Param("address") address: string): Promise<{ user: string; hasActiveStake: boolean }> {
    this.logger.log(`Calling GET on vault/users/active with param: address ${address}`);
    const hasActiveStake = await this.handle(() => this.vaultService.hasActiveStake(address));
    return { user: address, hasActiveStake };
  }

  private async handle<T>(query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (e) {
      if (isVaultError(e)) {
        if (e.kind === "InputValidation") throw new BadRequestException(e.message);
        if (e.code === "NotInitialized") throw new NotFoundException(e.message);
      }
      this.logger.error(`Vault query failed: ${e instanceof Error ? e.message : String(e)}`);
      throw new InternalServerErrorException("Vault query failed", { cause: e });
    }
  }
}
