import { expect } from "chai";
import { getAddress, parseUnits } from "ethers";
import {
  DEFAULT_VAULT_ADDRESS,
  loadVaultParameters,
  validateVaultParameters,
} from "../../../libs/staking-vault/src/configs/vault-config";
import { DEFAULT_MULTIPLIER_TABLE_PATH } from "../../../libs/staking-vault/src/multiplier/MultiplierTable";
import { calculateMultiplier } from "../../../libs/staking-vault/src/multiplier/multiplier-calculation";
import { InputValidationError } from "../../../libs/staking-vault/src/utils/error";
import { days, tokens } from "../../utils/constants";
import { getTestFile } from "../../utils/getTestFile";

describe(`vault-config; ${getTestFile(__filename)}`, () => {
  it("should use defaults for every missing variable", () => {
    const parameters = loadVaultParameters({});
    expect(parameters.vaultAddress).to.equal(getAddress(DEFAULT_VAULT_ADDRESS));
    expect(parameters.tokenDecimals).to.equal(18);
    expect(parameters.minimumStakeAmount).to.equal(tokens(100));
    expect(parameters.initialMaximumStakeAmount).to.equal(tokens(10000));
    expect(parameters.lockupPeriods).to.eql([days(30), days(90), days(180), days(365)]);
    expect(parameters.maximumLockupPeriod).to.equal(days(365));
    expect(parameters.minimumLockupIncrease).to.equal(days(7));
    expect(parameters.cooldownPeriod).to.equal(days(2));
    expect(parameters.earlyUnstakeCooldownPeriod).to.equal(days(2));
    expect(parameters.earlyUnstakePenaltyBps).to.equal(2000n);
    expect(parameters.multiplierTable.maxMultiplier).to.equal(17000n);
  });

  it("should read overrides", () => {
    const parameters = loadVaultParameters({
      VAULT_TOKEN_DECIMALS: "6",
      VAULT_MINIMUM_STAKE: "250.5",
      VAULT_MAXIMUM_STAKE: "5000",
      VAULT_LOCKUP_PERIODS_DAYS: "7, 14",
      VAULT_COOLDOWN_PERIOD_SEC: "3600",
      VAULT_EARLY_UNSTAKE_PENALTY_BPS: "500",
      VAULT_MULTIPLIER_TABLE_PATH: DEFAULT_MULTIPLIER_TABLE_PATH,
    });
    expect(parameters.tokenDecimals).to.equal(6);
    expect(parameters.minimumStakeAmount).to.equal(parseUnits("250.5", 6));
    expect(parameters.initialMaximumStakeAmount).to.equal(5_000_000_000n);
    expect(parameters.lockupPeriods).to.eql([days(7), days(14)]);
    expect(parameters.cooldownPeriod).to.equal(3600n);
    expect(parameters.earlyUnstakePenaltyBps).to.equal(500n);
    expect(parameters.multiplierTable.amountTiers[0].minAmount).to.equal(parseUnits("1000", 6));
    expect(calculateMultiplier(parseUnits("10000", 6), days(365), parameters.multiplierTable)).to.equal(17000n);
  });

  it("should reject malformed integers", () => {
    expect(() => loadVaultParameters({ VAULT_COOLDOWN_PERIOD_SEC: "2 days" })).to.throw(
      InputValidationError,
      'VAULT_COOLDOWN_PERIOD_SEC has invalid value "2 days"'
    );
  });

  it("should reject malformed lockup periods", () => {
    expect(() => loadVaultParameters({ VAULT_LOCKUP_PERIODS_DAYS: "30,0" })).to.throw(
      InputValidationError,
      'VAULT_LOCKUP_PERIODS_DAYS has invalid value "30,0"'
    );
  });

  it("should reject an invalid vault address", () => {
    expect(() => loadVaultParameters({ VAULT_ADDRESS: "vault" })).to.throw(
      InputValidationError,
      'VAULT_ADDRESS is not a valid address: "vault"'
    );
  });

  it("should reject a maximum stake below the minimum", () => {
    expect(() => loadVaultParameters({ VAULT_MINIMUM_STAKE: "500", VAULT_MAXIMUM_STAKE: "100" })).to.throw(
      InputValidationError,
      "maximum stake must not be below the minimum stake"
    );
  });

  it("should reject lockup periods longer than the maximum lockup", () => {
    expect(() => loadVaultParameters({ VAULT_MAXIMUM_LOCKUP_SEC: days(100).toString() })).to.throw(
      InputValidationError,
      `lockup period ${days(180)} exceeds the maximum lockup ${days(100)}`
    );
  });

  it("should reject a penalty above 100%", () => {
    const parameters = loadVaultParameters({});
    expect(() => validateVaultParameters({ ...parameters, earlyUnstakePenaltyBps: 10001n })).to.throw(
      InputValidationError,
      "early unstake penalty exceeds 100%"
    );
  });
});
