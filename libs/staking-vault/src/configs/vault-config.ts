import { getAddress, parseUnits } from "ethers";
import {
  CANONICAL_LOCKUP_PERIODS,
  DEFAULT_COOLDOWN_PERIOD_SEC,
  DEFAULT_EARLY_UNSTAKE_COOLDOWN_PERIOD_SEC,
  DEFAULT_EARLY_UNSTAKE_PENALTY_BPS,
  DEFAULT_MAXIMUM_STAKE_TOKENS,
  DEFAULT_MINIMUM_LOCKUP_INCREASE_SEC,
  DEFAULT_MINIMUM_STAKE_TOKENS,
  DEFAULT_TOKEN_DECIMALS,
  BASIS_POINTS,
  LOCKUP_365_DAYS,
} from "../constants";
import { DEFAULT_MULTIPLIER_TABLE_PATH, loadMultiplierTable, MultiplierTable } from "../multiplier/MultiplierTable";
import { InputValidationError } from "../utils/error";
import { Address } from "../vault-types";

/**
 * Static vault parameters. Runtime-updatable values (maximum stake, treasury, QA identity)
 * are only initial values here and live in the vault state afterwards.
 */
export interface VaultParameters {
  /** Custody address holding every staked token. */
  readonly vaultAddress: Address;
  readonly tokenDecimals: number;
  readonly minimumStakeAmount: bigint;
  readonly initialMaximumStakeAmount: bigint;
  readonly lockupPeriods: readonly bigint[];
  readonly maximumLockupPeriod: bigint;
  readonly minimumLockupIncrease: bigint;
  readonly cooldownPeriod: bigint;
  readonly earlyUnstakeCooldownPeriod: bigint;
  readonly earlyUnstakePenaltyBps: bigint;
  readonly multiplierTable: MultiplierTable;
}

export const DEFAULT_VAULT_ADDRESS = "0x000000000000000000000000000000000000fa17";

type Env = Record<string, string | undefined>;

function invalid(variable: string, value: string): never {
  throw new InputValidationError("InvalidConfiguration", `${variable} has invalid value "${value}"`);
}

function readInteger(env: Env, variable: string, fallback: bigint): bigint {
  const value = env[variable];
  if (value === undefined || value === "") return fallback;
  if (!/^\d+$/.test(value)) invalid(variable, value);
  return BigInt(value);
}

function readTokenAmount(env: Env, variable: string, fallbackTokens: string, decimals: number): bigint {
  const value = env[variable] || fallbackTokens;
  try {
    return parseUnits(value, decimals);
  } catch (e) {
    throw new InputValidationError("InvalidConfiguration", `${variable} has invalid value "${value}"`, {
      cause: e,
    });
  }
}

function readAddress(env: Env, variable: string, fallback: Address): Address {
  const value = env[variable] || fallback;
  try {
    return getAddress(value);
  } catch (e) {
    throw new InputValidationError("InvalidConfiguration", `${variable} is not a valid address: "${value}"`, {
      cause: e,
    });
  }
}

function readLockupPeriods(env: Env): bigint[] {
  const value = env.VAULT_LOCKUP_PERIODS_DAYS;
  if (value === undefined || value === "") return [...CANONICAL_LOCKUP_PERIODS];
  const periods = value.split(",").map(part => {
    const days = part.trim();
    if (!/^\d+$/.test(days) || BigInt(days) === 0n) invalid("VAULT_LOCKUP_PERIODS_DAYS", value);
    return BigInt(days) * 24n * 60n * 60n;
  });
  return periods;
}

/**
 * Reads vault parameters from environment variables, falling back to defaults:
 *
 * - VAULT_ADDRESS
 * - VAULT_TOKEN_DECIMALS
 * - VAULT_MINIMUM_STAKE, VAULT_MAXIMUM_STAKE (whole tokens, decimals allowed)
 * - VAULT_LOCKUP_PERIODS_DAYS (comma separated)
 * - VAULT_MAXIMUM_LOCKUP_SEC, VAULT_MINIMUM_LOCKUP_INCREASE_SEC
 * - VAULT_COOLDOWN_PERIOD_SEC, VAULT_EARLY_UNSTAKE_COOLDOWN_PERIOD_SEC
 * - VAULT_EARLY_UNSTAKE_PENALTY_BPS
 * - VAULT_MULTIPLIER_TABLE_PATH
 */
export function loadVaultParameters(env: Env = process.env): VaultParameters {
  const tokenDecimals = Number(readInteger(env, "VAULT_TOKEN_DECIMALS", BigInt(DEFAULT_TOKEN_DECIMALS)));
  const multiplierTable = loadMultiplierTable(
    env.VAULT_MULTIPLIER_TABLE_PATH || DEFAULT_MULTIPLIER_TABLE_PATH,
    tokenDecimals
  );

  const parameters: VaultParameters = {
    vaultAddress: readAddress(env, "VAULT_ADDRESS", DEFAULT_VAULT_ADDRESS),
    tokenDecimals,
    minimumStakeAmount: readTokenAmount(env, "VAULT_MINIMUM_STAKE", DEFAULT_MINIMUM_STAKE_TOKENS, tokenDecimals),
    initialMaximumStakeAmount: readTokenAmount(
      env,
      "VAULT_MAXIMUM_STAKE",
      DEFAULT_MAXIMUM_STAKE_TOKENS,
      tokenDecimals
    ),
    lockupPeriods: readLockupPeriods(env),
    maximumLockupPeriod: readInteger(env, "VAULT_MAXIMUM_LOCKUP_SEC", LOCKUP_365_DAYS),
    minimumLockupIncrease: readInteger(env, "VAULT_MINIMUM_LOCKUP_INCREASE_SEC", DEFAULT_MINIMUM_LOCKUP_INCREASE_SEC),
    cooldownPeriod: readInteger(env, "VAULT_COOLDOWN_PERIOD_SEC", DEFAULT_COOLDOWN_PERIOD_SEC),
    earlyUnstakeCooldownPeriod: readInteger(
      env,
      "VAULT_EARLY_UNSTAKE_COOLDOWN_PERIOD_SEC",
      DEFAULT_EARLY_UNSTAKE_COOLDOWN_PERIOD_SEC
    ),
    earlyUnstakePenaltyBps: readInteger(env, "VAULT_EARLY_UNSTAKE_PENALTY_BPS", DEFAULT_EARLY_UNSTAKE_PENALTY_BPS),
    multiplierTable,
  };
  validateVaultParameters(parameters);
  return parameters;
}

export function validateVaultParameters(parameters: VaultParameters): void {
  const fail = (message: string): never => {
    throw new InputValidationError("InvalidConfiguration", message);
  };
  if (parameters.minimumStakeAmount <= 0n) fail("minimum stake must be positive");
  if (parameters.initialMaximumStakeAmount < parameters.minimumStakeAmount) {
    fail("maximum stake must not be below the minimum stake");
  }
  if (parameters.lockupPeriods.length === 0) fail("at least one lockup period is required");
  for (const period of parameters.lockupPeriods) {
    if (period > parameters.maximumLockupPeriod) {
      fail(`lockup period ${period} exceeds the maximum lockup ${parameters.maximumLockupPeriod}`);
    }
  }
  if (parameters.minimumLockupIncrease <= 0n) fail("minimum lockup increase must be positive");
  if (parameters.earlyUnstakePenaltyBps > BASIS_POINTS) fail("early unstake penalty exceeds 100%");
}
