export function throwError(message: string): never {
  throw new Error(message);
}

export type VaultErrorKind =
  | "InputValidation"
  | "StatePrecondition"
  | "Timing"
  | "Authorization"
  | "Arithmetic"
  | "Invariant";

export type InputValidationCode =
  | "ZeroAddress"
  | "InvalidAddress"
  | "InvalidAmount"
  | "MinimumStakeAmountRequired"
  | "ExceedsMaximumStake"
  | "InvalidLockupPeriod"
  | "MinimumLockupIncreaseRequired"
  | "InvalidConfiguration";

export type StatePreconditionCode =
  | "NoStakeFound"
  | "ExistingStakeFound"
  | "CannotIncreaseStakeInCooldown"
  | "CooldownAlreadyActive"
  | "NotInCooldown"
  | "NoEarlyUnstakeRequested"
  | "AmountExceedsAvailableBalance"
  | "AmountExceedsCooldownAmount"
  | "AmountExceedsEarlyUnstakeRequest"
  | "LockPeriodCompleted"
  | "VaultPaused"
  | "VaultNotPaused"
  | "AlreadyInitialized"
  | "NotInitialized"
  | "InsufficientSurplus"
  | "InsufficientBalance"
  | "InsufficientAllowance";

export type TimingCode = "LockPeriodNotCompleted" | "CooldownPeriodNotCompleted" | "EarlyUnstakeCooldownNotCompleted";

export type AuthorizationCode = "Unauthorized";

export type ArithmeticCode = "Overflow" | "Underflow" | "LockupShortened" | "InvalidResult";

export type InvariantCode = "InvariantViolation" | "Insolvent";

export type VaultErrorCode =
  | InputValidationCode
  | StatePreconditionCode
  | TimingCode
  | AuthorizationCode
  | ArithmeticCode
  | InvariantCode;

/**
 * Base class of every rejection raised by the vault.
 * All of them are thrown before the surrounding transaction commits.
 */
export abstract class VaultError<C extends VaultErrorCode = VaultErrorCode> extends Error {
  abstract readonly kind: VaultErrorKind;

  constructor(
    readonly code: C,
    message: string,
    options?: ErrorOptions
  ) {
    super(`${code}: ${message}`, options);
    this.name = new.target.name;
  }
}

export class InputValidationError extends VaultError<InputValidationCode> {
  readonly kind = "InputValidation";
}

export class StatePreconditionError extends VaultError<StatePreconditionCode> {
  readonly kind = "StatePrecondition";
}

export class TimingError extends VaultError<TimingCode> {
  readonly kind = "Timing";
}

export class AuthorizationError extends VaultError<AuthorizationCode> {
  readonly kind = "Authorization";
}

export class ArithmeticError extends VaultError<ArithmeticCode> {
  readonly kind = "Arithmetic";
}

export class InvariantViolationError extends VaultError<InvariantCode> {
  readonly kind = "Invariant";
}

export function isVaultError(error: unknown): error is VaultError {
  return error instanceof VaultError;
}
