import fs from "fs";
import path from "path";
import { parseUnits } from "ethers";
import { DEFAULT_TOKEN_DECIMALS, ONE_DAY_SEC } from "../constants";
import { InputValidationError } from "../utils/error";

export interface DurationBreakpoint {
  /** Lockup duration in seconds. */
  readonly duration: bigint;
  readonly multiplier: bigint;
}

export interface AmountTier {
  /** Threshold in token base units. */
  readonly minAmount: bigint;
  readonly bonus: bigint;
}

export interface MultiplierTable {
  readonly durationBreakpoints: readonly DurationBreakpoint[];
  readonly amountTiers: readonly AmountTier[];
  readonly maxMultiplier: bigint;
}

export const DEFAULT_MULTIPLIER_TABLE_PATH = path.join(__dirname, "..", "configs", "multiplier-table.json");

function invalid(message: string): never {
  throw new InputValidationError("InvalidConfiguration", `multiplier table: ${message}`);
}

function asRecord(value: unknown, where: string): Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    invalid(`${where} must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

function asArray(value: unknown, where: string): unknown[] {
  if (!Array.isArray(value)) {
    invalid(`${where} must be an array`);
  }
  return value;
}

function asNonNegativeInteger(value: unknown, where: string): bigint {
  if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  if (typeof value === "string" && /^\d+$/.test(value)) {
    return BigInt(value);
  }
  invalid(`${where} must be a non-negative integer`);
}

/**
 * Parses and validates a multiplier table in its JSON form.
 * Durations are given in days and tier thresholds in whole tokens, scaled by `tokenDecimals`.
 * A table that names its own `tokenDecimals` must agree with it.
 */
export function parseMultiplierTable(raw: unknown, tokenDecimals: number = DEFAULT_TOKEN_DECIMALS): MultiplierTable {
  const root = asRecord(raw, "table");
  if (root.tokenDecimals !== undefined) {
    const declared = asNonNegativeInteger(root.tokenDecimals, "tokenDecimals");
    if (declared !== BigInt(tokenDecimals)) {
      invalid(`tokenDecimals ${declared} does not match the token decimals ${tokenDecimals}`);
    }
  }

  const durationBreakpoints = asArray(root.durationBreakpoints, "durationBreakpoints").map((entry, i) => {
    const record = asRecord(entry, `durationBreakpoints[${i}]`);
    return {
      duration: asNonNegativeInteger(record.durationDays, `durationBreakpoints[${i}].durationDays`) * ONE_DAY_SEC,
      multiplier: asNonNegativeInteger(record.multiplierBps, `durationBreakpoints[${i}].multiplierBps`),
    };
  });

  const amountTiers = asArray(root.amountTiers ?? [], "amountTiers").map((entry, i) => {
    const record = asRecord(entry, `amountTiers[${i}]`);
    const minAmount = asNonNegativeInteger(record.minAmount, `amountTiers[${i}].minAmount`);
    return {
      minAmount: parseUnits(minAmount.toString(), tokenDecimals),
      bonus: asNonNegativeInteger(record.bonusBps, `amountTiers[${i}].bonusBps`),
    };
  });

  const table: MultiplierTable = {
    durationBreakpoints,
    amountTiers,
    maxMultiplier: asNonNegativeInteger(root.maxMultiplierBps, "maxMultiplierBps"),
  };
  validateMultiplierTable(table);
  return table;
}

/**
 * Checks the ordering rules that make the calculator monotonic in both inputs.
 */
export function validateMultiplierTable(table: MultiplierTable): void {
  const breakpoints = table.durationBreakpoints;
  if (breakpoints.length === 0) {
    invalid("at least one duration breakpoint is required");
  }
  for (let i = 1; i < breakpoints.length; i++) {
    if (breakpoints[i].duration <= breakpoints[i - 1].duration) {
      invalid(`duration breakpoint ${i} is not strictly increasing`);
    }
    if (breakpoints[i].multiplier < breakpoints[i - 1].multiplier) {
      invalid(`duration breakpoint ${i} decreases the multiplier`);
    }
  }
  const tiers = table.amountTiers;
  for (let i = 1; i < tiers.length; i++) {
    if (tiers[i].minAmount <= tiers[i - 1].minAmount) {
      invalid(`amount tier ${i} is not strictly increasing`);
    }
    if (tiers[i].bonus < tiers[i - 1].bonus) {
      invalid(`amount tier ${i} decreases the bonus`);
    }
  }
  if (table.maxMultiplier < breakpoints[0].multiplier) {
    invalid("maxMultiplierBps is below the first duration breakpoint");
  }
}

export function loadMultiplierTable(
  filePath: string = DEFAULT_MULTIPLIER_TABLE_PATH,
  tokenDecimals: number = DEFAULT_TOKEN_DECIMALS
): MultiplierTable {
  const content = fs.readFileSync(filePath, "utf8");
  return parseMultiplierTable(JSON.parse(content), tokenDecimals);
}
