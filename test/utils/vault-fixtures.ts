import FakeTimers from "@sinonjs/fake-timers";
import { DataSource } from "typeorm";
import { Logger } from "winston";
import { loadVaultParameters, VaultParameters } from "../../libs/staking-vault/src/configs/vault-config";
import { DatabaseTokenLedger } from "../../libs/staking-vault/src/token/DatabaseTokenLedger";
import { TokenLedgerFactory } from "../../libs/staking-vault/src/token/ITokenLedger";
import { StakingVault } from "../../libs/staking-vault/src/StakingVault";
import { VaultQueries } from "../../libs/staking-vault/src/VaultQueries";
import { ADMIN, QUALITY_CONTROL, START_TIME_SEC, TREASURY } from "./constants";
import { getDataSource } from "./db";

export interface TestVault {
  readonly dataSource: DataSource;
  readonly vault: StakingVault;
  readonly queries: VaultQueries;
  readonly token: DatabaseTokenLedger;
  readonly parameters: VaultParameters;
}

export interface TestVaultOptions {
  parameters?: VaultParameters;
  tokenLedger?: TokenLedgerFactory;
  initialize?: boolean;
  logger?: Logger;
}

/** In-memory vault with default parameters, initialized with the test roles. */
export async function createTestVault(options: TestVaultOptions = {}): Promise<TestVault> {
  const dataSource = await getDataSource();
  const parameters = options.parameters ?? loadVaultParameters({});
  const vault = new StakingVault({ dataSource, parameters, tokenLedger: options.tokenLedger, logger: options.logger });
  if (options.initialize ?? true) {
    await vault.initialize({ admin: ADMIN, treasury: TREASURY, qualityControl: QUALITY_CONTROL });
  }
  return {
    dataSource,
    vault,
    queries: new VaultQueries(dataSource, parameters),
    token: new DatabaseTokenLedger(dataSource.manager),
    parameters,
  };
}

/** Mints `amount` to `user` and lets the vault pull all of it. */
export async function fund(testVault: TestVault, user: string, amount: bigint): Promise<void> {
  await testVault.token.mint(user, amount);
  const allowance = await testVault.token.allowance(user, testVault.vault.vaultAddress);
  await testVault.token.approve(user, testVault.vault.vaultAddress, allowance + amount);
}

/** Fakes `Date` only, so that database callbacks keep running on real timers. */
export function installClock(nowSec: bigint = START_TIME_SEC): FakeTimers.InstalledClock {
  return FakeTimers.install({ now: Number(nowSec) * 1000, toFake: ["Date"] });
}

export function advance(clock: FakeTimers.InstalledClock, seconds: bigint): void {
  clock.tick(Number(seconds) * 1000);
}
