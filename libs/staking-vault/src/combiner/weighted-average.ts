import { MAX_UINT256, MAX_UINT64 } from "../constants";
import { ArithmeticError, InputValidationError } from "../utils/error";

/** Timing and size of an existing position, as seen by the combiner. */
export interface LockupState {
  readonly start: bigint;
  readonly duration: bigint;
  readonly amount: bigint;
}

export interface CombinedLockup {
  readonly start: bigint;
  readonly duration: bigint;
}

/** Lock time left from `now`, zero once matured. */
export function remainingLockup(start: bigint, duration: bigint, now: bigint): bigint {
  const unlockTime = start + duration;
  return unlockTime > now ? unlockTime - now : 0n;
}

/**
 * Merges an amount top-up into an existing position.
 *
 * The existing amount contributes its remaining lock, the added amount a fresh copy of the current
 * effective duration; the merged remaining lock is their amount-weighted average (truncated).
 * The duration itself never shrinks, so the start is back-derived from the merged remaining lock.
 */
export function combineAmountIncrease(current: LockupState, addedAmount: bigint, now: bigint): CombinedLockup {
  checkState(current, now);
  if (addedAmount <= 0n) {
    throw new InputValidationError("InvalidAmount", `added amount must be positive, got ${addedAmount}`);
  }
  const totalAmount = current.amount + addedAmount;
  if (addedAmount > MAX_UINT256 || totalAmount > MAX_UINT256) {
    throw new ArithmeticError("Overflow", "combined amount exceeds the fixed-point range");
  }

  const remaining = remainingLockup(current.start, current.duration, now);
  const weightedSum = checkedMul(remaining, current.amount) + checkedMul(current.duration, addedAmount);
  if (weightedSum > MAX_UINT256) {
    throw new ArithmeticError("Overflow", "weighted lockup exceeds the fixed-point range");
  }
  const merged = weightedSum / totalAmount;
  const duration = merged > current.duration ? merged : current.duration;

  return checkResult(current, { start: now + merged - duration, duration }, now);
}

/**
 * Extends the lock of an existing position by `extension` seconds counted from its remaining lock,
 * capped at `maxLockup`. When the result reaches the current duration the start resets to `now`;
 * otherwise the current duration is kept and the start is back-derived.
 */
export function combineLockupExtension(
  current: LockupState,
  extension: bigint,
  now: bigint,
  maxLockup: bigint
): CombinedLockup {
  checkState(current, now);
  if (extension <= 0n) {
    throw new InputValidationError("InvalidLockupPeriod", `extension must be positive, got ${extension}`);
  }
  if (extension > MAX_UINT64 || maxLockup > MAX_UINT64) {
    throw new ArithmeticError("Overflow", "lockup exceeds the fixed-point range");
  }

  const remaining = remainingLockup(current.start, current.duration, now);
  const extended = remaining + extension;
  const requested = extended < maxLockup ? extended : maxLockup;
  const merged = requested > remaining ? requested : remaining;

  if (merged >= current.duration) {
    return checkResult(current, { start: now, duration: merged }, now);
  }
  return checkResult(current, { start: now + merged - current.duration, duration: current.duration }, now);
}

function checkState(current: LockupState, now: bigint): void {
  if (current.amount <= 0n) {
    throw new InputValidationError("InvalidAmount", "position amount must be positive");
  }
  if (current.duration <= 0n) {
    throw new InputValidationError("InvalidLockupPeriod", "position duration must be positive");
  }
  if (current.amount > MAX_UINT256) {
    throw new ArithmeticError("Overflow", "position amount exceeds the fixed-point range");
  }
  if (current.start < 0n || now < 0n) {
    throw new ArithmeticError("Underflow", "timestamps must not be negative");
  }
  if (current.start > MAX_UINT64 || current.duration > MAX_UINT64 || now > MAX_UINT64) {
    throw new ArithmeticError("Overflow", "timestamp exceeds the fixed-point range");
  }
}

function checkedMul(a: bigint, b: bigint): bigint {
  const product = a * b;
  if (product > MAX_UINT256) {
    throw new ArithmeticError("Overflow", "product exceeds the fixed-point range");
  }
  return product;
}

function checkResult(previous: LockupState, result: CombinedLockup, now: bigint): CombinedLockup {
  if (result.duration < previous.duration) {
    throw new ArithmeticError(
      "LockupShortened",
      `combined duration ${result.duration} is shorter than ${previous.duration}`
    );
  }
  if (result.start < 0n) {
    throw new ArithmeticError("Underflow", `combined start ${result.start} is negative`);
  }
  if (result.start > now) {
    throw new ArithmeticError("InvalidResult", `combined start ${result.start} lies after ${now}`);
  }
  if (result.start + result.duration < now) {
    throw new ArithmeticError("InvalidResult", "combined unlock time lies in the past");
  }
  return result;
}
