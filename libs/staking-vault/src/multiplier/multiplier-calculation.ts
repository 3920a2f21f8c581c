import { MAX_UINT256, MAX_UINT64 } from "../constants";
import { ArithmeticError, InputValidationError } from "../utils/error";
import { MultiplierTable } from "./MultiplierTable";

/**
 * Multiplier (in basis points, 10000 = 1.0x) for the given amount and effective lockup duration.
 *
 * Duration component: value of the first breakpoint below it, of the last breakpoint above it,
 * linearly interpolated (truncated) in between. Amount component: additive bonus of the highest
 * tier reached. The sum is capped at `table.maxMultiplier`. Zero amount yields zero.
 */
export function calculateMultiplier(amount: bigint, duration: bigint, table: MultiplierTable): bigint {
  if (amount < 0n) {
    throw new InputValidationError("InvalidAmount", `amount must not be negative, got ${amount}`);
  }
  if (duration < 0n) {
    throw new InputValidationError("InvalidLockupPeriod", `duration must not be negative, got ${duration}`);
  }
  if (amount > MAX_UINT256) {
    throw new ArithmeticError("Overflow", "amount exceeds the fixed-point range");
  }
  if (duration > MAX_UINT64) {
    throw new ArithmeticError("Overflow", "duration exceeds the fixed-point range");
  }
  if (amount === 0n) {
    return 0n;
  }
  const combined = durationMultiplier(duration, table) + amountBonus(amount, table);
  return combined > table.maxMultiplier ? table.maxMultiplier : combined;
}

export function durationMultiplier(duration: bigint, table: MultiplierTable): bigint {
  const breakpoints = table.durationBreakpoints;
  const first = breakpoints[0];
  const last = breakpoints[breakpoints.length - 1];
  if (duration <= first.duration) {
    return first.multiplier;
  }
  if (duration >= last.duration) {
    return last.multiplier;
  }
  for (let i = 1; i < breakpoints.length; i++) {
    const upper = breakpoints[i];
    if (duration <= upper.duration) {
      const lower = breakpoints[i - 1];
      return (
        lower.multiplier +
        ((upper.multiplier - lower.multiplier) * (duration - lower.duration)) / (upper.duration - lower.duration)
      );
    }
  }
  // unreachable: duration is below the last breakpoint
  return last.multiplier;
}

export function amountBonus(amount: bigint, table: MultiplierTable): bigint {
  let bonus = 0n;
  for (const tier of table.amountTiers) {
    if (amount < tier.minAmount) break;
    bonus = tier.bonus;
  }
  return bonus;
}
