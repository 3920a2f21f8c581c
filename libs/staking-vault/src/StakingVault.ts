import { DataSource, EntityManager } from "typeorm";
import { Logger } from "winston";
import { BASIS_POINTS } from "./constants";
import { combineAmountIncrease, combineLockupExtension } from "./combiner/weighted-average";
import { VaultParameters } from "./configs/vault-config";
import { recordEvents, VaultEvent } from "./events/VaultEvents";
import { calculateMultiplier } from "./multiplier/multiplier-calculation";
import { checkPositionInvariants, PositionLedger } from "./PositionLedger";
import { ITokenLedger, TokenLedgerFactory } from "./token/ITokenLedger";
import { databaseTokenLedger } from "./token/DatabaseTokenLedger";
import { requireAddress } from "./utils/address";
import { Clock, systemClock } from "./utils/Clock";
import {
  AuthorizationError,
  InputValidationError,
  InvariantViolationError,
  isVaultError,
  StatePreconditionError,
  TimingError,
} from "./utils/error";
import { getLogger, logError } from "./utils/logger";
import { SerialExecutor } from "./utils/SerialExecutor";
import { Address, emptyPosition, Position, VaultSettings } from "./vault-types";

export interface StakingVaultOptions {
  readonly dataSource: DataSource;
  readonly parameters: VaultParameters;
  readonly tokenLedger?: TokenLedgerFactory;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

export interface VaultRoles {
  readonly admin: Address;
  readonly treasury: Address;
  readonly qualityControl: Address;
}

export interface EarlyUnstakeResult {
  readonly position: Position;
  readonly payout: bigint;
  readonly penalty: bigint;
}

/**
 * State shared by the steps of one mutating operation.
 * Everything written through it commits or rolls back together.
 */
class VaultTransaction {
  readonly events: VaultEvent[] = [];
  readonly touched = new Map<Address, Position>();
  settingsChanged = false;

  constructor(
    readonly ledger: PositionLedger,
    readonly token: ITokenLedger,
    readonly now: bigint,
    public settings: VaultSettings
  ) {}

  async writePosition(position: Position): Promise<void> {
    this.touched.set(position.user, position);
    await this.ledger.savePosition(position);
  }

  async writeSettings(settings: VaultSettings): Promise<void> {
    this.settings = settings;
    this.settingsChanged = true;
    await this.ledger.saveSettings(settings);
  }

  emit(event: VaultEvent): void {
    this.events.push(event);
  }
}

/**
 * Staking vault: one position per user, cooldown-gated exits, early exits with a penalty
 * and a QA penalty hook. Every mutating call is a single serialized database transaction.
 */
export class StakingVault {
  private readonly dataSource: DataSource;
  private readonly tokenLedger: TokenLedgerFactory;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly executor = new SerialExecutor();

  constructor(options: StakingVaultOptions) {
    this.dataSource = options.dataSource;
    this.parameters = options.parameters;
    this.tokenLedger = options.tokenLedger ?? databaseTokenLedger;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? getLogger("StakingVault");
  }

  readonly parameters: VaultParameters;

  get vaultAddress(): Address {
    return this.parameters.vaultAddress;
  }

  // ============ Initialization and administration ============

  async initialize(roles: VaultRoles): Promise<VaultSettings> {
    const admin = requireAddress(roles.admin, "admin");
    const treasury = requireAddress(roles.treasury, "treasury");
    const qualityControl = requireAddress(roles.qualityControl, "qualityControl");

    const createSettings = async (ledger: PositionLedger): Promise<VaultSettings> => {
      if (await ledger.findSettings()) {
        throw new StatePreconditionError("AlreadyInitialized", "vault state already exists");
      }
      return {
        totalStaked: 0n,
        totalInCooldown: 0n,
        totalInEarlyCooldown: 0n,
        maximumStakeAmount: this.parameters.initialMaximumStakeAmount,
        admin,
        treasury,
        qualityControl,
        paused: false,
      };
    };
    return this.execute(
      "initialize",
      async tx => {
        await tx.writeSettings(tx.settings);
        tx.emit({
          name: "Initialized",
          user: null,
          by: admin,
          treasury,
          qualityControl,
          maximumStakeAmount: tx.settings.maximumStakeAmount,
          timestamp: tx.now,
        });
        return tx.settings;
      },
      createSettings
    );
  }

  async setTreasury(caller: Address, treasury: Address): Promise<void> {
    const newTreasury = requireAddress(treasury, "treasury");
    await this.execute("setTreasury", async tx => {
      this.requireAdmin(caller, tx.settings);
      await tx.writeSettings({ ...tx.settings, treasury: newTreasury });
      tx.emit({ name: "TreasuryUpdated", user: null, by: tx.settings.admin, treasury: newTreasury, timestamp: tx.now });
    });
  }

  async setQualityControl(caller: Address, qualityControl: Address): Promise<void> {
    const newQualityControl = requireAddress(qualityControl, "qualityControl");
    await this.execute("setQualityControl", async tx => {
      this.requireAdmin(caller, tx.settings);
      await tx.writeSettings({ ...tx.settings, qualityControl: newQualityControl });
      tx.emit({
        name: "QualityControlUpdated",
        user: null,
        by: tx.settings.admin,
        qualityControl: newQualityControl,
        timestamp: tx.now,
      });
    });
  }

  async setMaximumStakeAmount(caller: Address, maximumStakeAmount: bigint): Promise<void> {
    if (maximumStakeAmount < this.parameters.minimumStakeAmount) {
      throw new InputValidationError(
        "InvalidAmount",
        `maximum stake ${maximumStakeAmount} is below the minimum stake ${this.parameters.minimumStakeAmount}`
      );
    }
    await this.execute("setMaximumStakeAmount", async tx => {
      this.requireAdmin(caller, tx.settings);
      const oldMaximumStakeAmount = tx.settings.maximumStakeAmount;
      await tx.writeSettings({ ...tx.settings, maximumStakeAmount });
      tx.emit({
        name: "MaximumStakeAmountUpdated",
        user: null,
        by: tx.settings.admin,
        oldMaximumStakeAmount,
        newMaximumStakeAmount: maximumStakeAmount,
        timestamp: tx.now,
      });
    });
  }

  async pause(caller: Address): Promise<void> {
    await this.execute("pause", async tx => {
      this.requireAdmin(caller, tx.settings);
      this.requireNotPaused(tx.settings);
      await tx.writeSettings({ ...tx.settings, paused: true });
      tx.emit({ name: "Paused", user: null, by: tx.settings.admin, timestamp: tx.now });
    });
  }

  async unpause(caller: Address): Promise<void> {
    await this.execute("unpause", async tx => {
      this.requireAdmin(caller, tx.settings);
      this.requirePaused(tx.settings);
      await tx.writeSettings({ ...tx.settings, paused: false });
      tx.emit({ name: "Unpaused", user: null, by: tx.settings.admin, timestamp: tx.now });
    });
  }

  /**
   * Moves tokens held by the vault beyond everything it owes (staked and both cooldown totals).
   * Only available to the admin while the vault is paused.
   */
  async emergencyWithdraw(caller: Address, to: Address, amount: bigint): Promise<void> {
    const recipient = requireAddress(to, "recipient");
    requirePositive(amount, "amount");
    await this.execute("emergencyWithdraw", async tx => {
      this.requireAdmin(caller, tx.settings);
      this.requirePaused(tx.settings);
      const balance = await tx.token.balanceOf(this.vaultAddress);
      const owed = tx.settings.totalStaked + tx.settings.totalInCooldown + tx.settings.totalInEarlyCooldown;
      const surplus = balance > owed ? balance - owed : 0n;
      if (amount > surplus) {
        throw new StatePreconditionError(
          "InsufficientSurplus",
          `requested ${amount}, only ${surplus} is held beyond the owed ${owed}`
        );
      }
      await tx.token.transfer(this.vaultAddress, recipient, amount);
      tx.emit({ name: "EmergencyWithdraw", user: null, by: tx.settings.admin, to: recipient, amount, timestamp: tx.now });
    });
  }

  // ============ Stake and increase ============

  async stake(user: Address, amount: bigint, lockupPeriod: bigint): Promise<Position> {
    const account = requireAddress(user, "user");
    requirePositive(amount, "amount");
    if (!this.parameters.lockupPeriods.includes(lockupPeriod)) {
      throw new InputValidationError("InvalidLockupPeriod", `unsupported lockup period ${lockupPeriod}`);
    }
    return this.execute("stake", async tx => {
      this.requireNotPaused(tx.settings);
      if (amount < this.parameters.minimumStakeAmount) {
        throw new InputValidationError(
          "MinimumStakeAmountRequired",
          `amount ${amount} is below the minimum stake ${this.parameters.minimumStakeAmount}`
        );
      }
      this.requireWithinMaximum(amount, tx.settings);
      const current = await tx.ledger.getPosition(account);
      if (current.amount > 0n) {
        throw new StatePreconditionError("ExistingStakeFound", `${account} already has an active position`);
      }

      const position = this.settle({
        ...emptyPosition(account),
        amount,
        weightedStartTime: tx.now,
        effectiveLockupPeriod: lockupPeriod,
        lastUpdateTime: tx.now,
      });
      await tx.writePosition(position);
      await tx.writeSettings({ ...tx.settings, totalStaked: tx.settings.totalStaked + amount });
      await tx.token.transferFrom(this.vaultAddress, account, this.vaultAddress, amount);
      tx.emit({
        name: "Staked",
        user: account,
        amount,
        multiplier: position.effectiveMultiplier,
        lockupPeriod,
        timestamp: tx.now,
      });
      return position;
    });
  }

  async increaseAmount(user: Address, additionalAmount: bigint): Promise<Position> {
    const account = requireAddress(user, "user");
    requirePositive(additionalAmount, "additional amount");
    return this.execute("increaseAmount", async tx => {
      this.requireNotPaused(tx.settings);
      const position = await this.requireIncreasablePosition(tx, account);
      return this.applyAmountIncrease(tx, position, additionalAmount);
    });
  }

  async increaseLockup(user: Address, additionalLockup: bigint): Promise<Position> {
    const account = requireAddress(user, "user");
    this.requireLockupIncrease(additionalLockup);
    return this.execute("increaseLockup", async tx => {
      this.requireNotPaused(tx.settings);
      const position = await this.requireIncreasablePosition(tx, account);
      return this.applyLockupIncrease(tx, position, additionalLockup);
    });
  }

  /**
   * Extends the lockup, then adds the amount, in one transaction.
   * The order is fixed: it yields the shortest resulting lockup of the two possible orders.
   */
  async increaseStake(user: Address, additionalAmount: bigint, additionalLockup: bigint): Promise<Position> {
    const account = requireAddress(user, "user");
    requirePositive(additionalAmount, "additional amount");
    this.requireLockupIncrease(additionalLockup);
    return this.execute("increaseStake", async tx => {
      this.requireNotPaused(tx.settings);
      const position = await this.requireIncreasablePosition(tx, account);
      const extended = await this.applyLockupIncrease(tx, position, additionalLockup);
      return this.applyAmountIncrease(tx, extended, additionalAmount);
    });
  }

  // ============ Unstake lifecycle ============

  async initiateUnstake(user: Address, amount: bigint): Promise<Position> {
    const account = requireAddress(user, "user");
    requirePositive(amount, "amount");
    return this.execute("initiateUnstake", async tx => {
      this.requireNotPaused(tx.settings);
      const position = await this.requireActivePosition(tx, account);
      this.requireNoOpenCooldown(position);
      if (!isMatured(position, tx.now)) {
        throw new TimingError(
          "LockPeriodNotCompleted",
          `${account} is locked until ${position.weightedStartTime + position.effectiveLockupPeriod}`
        );
      }
      const unlocked = position.amount - position.earlyUnstakeCooldownAmount;
      if (amount > unlocked) {
        throw new StatePreconditionError("AmountExceedsAvailableBalance", `requested ${amount}, unlocked ${unlocked}`);
      }

      const next: Position = { ...position, cooldownStart: tx.now, cooldownAmount: amount, lastUpdateTime: tx.now };
      await tx.writePosition(next);
      await tx.writeSettings({ ...tx.settings, totalInCooldown: tx.settings.totalInCooldown + amount });
      tx.emit({ name: "UnstakeInitiated", user: account, amount, timestamp: tx.now });
      return next;
    });
  }

  async unstake(user: Address, amount: bigint): Promise<Position> {
    const account = requireAddress(user, "user");
    requirePositive(amount, "amount");
    return this.execute("unstake", async tx => {
      this.requireNotPaused(tx.settings);
      const position = await this.requireActivePosition(tx, account);
      if (position.cooldownAmount === 0n) {
        throw new StatePreconditionError("NotInCooldown", `${account} has not requested an unstake`);
      }
      const cooldownEnd = position.cooldownStart + this.parameters.cooldownPeriod;
      if (tx.now < cooldownEnd) {
        throw new TimingError("CooldownPeriodNotCompleted", `cooldown of ${account} ends at ${cooldownEnd}`);
      }
      if (amount > position.cooldownAmount) {
        throw new StatePreconditionError(
          "AmountExceedsCooldownAmount",
          `requested ${amount}, in cooldown ${position.cooldownAmount}`
        );
      }

      const cooldownAmount = position.cooldownAmount - amount;
      const next = this.settle({
        ...position,
        amount: position.amount - amount,
        cooldownAmount,
        cooldownStart: cooldownAmount === 0n ? 0n : position.cooldownStart,
        lastUpdateTime: tx.now,
      });
      await tx.writePosition(next);
      await tx.writeSettings({
        ...tx.settings,
        totalStaked: tx.settings.totalStaked - amount,
        totalInCooldown: tx.settings.totalInCooldown - amount,
      });
      await tx.token.transfer(this.vaultAddress, account, amount);
      tx.emit({ name: "Unstaked", user: account, amount, timestamp: tx.now });
      return next;
    });
  }

  async initiateEarlyUnstake(user: Address, amount: bigint): Promise<Position> {
    const account = requireAddress(user, "user");
    requirePositive(amount, "amount");
    return this.execute("initiateEarlyUnstake", async tx => {
      this.requireNotPaused(tx.settings);
      const position = await this.requireActivePosition(tx, account);
      this.requireNoOpenCooldown(position);
      if (isMatured(position, tx.now)) {
        throw new StatePreconditionError(
          "LockPeriodCompleted",
          `${account} is no longer locked, use the regular unstake`
        );
      }
      const locked = position.amount - position.earlyUnstakeCooldownAmount;
      if (amount > locked) {
        throw new StatePreconditionError("AmountExceedsAvailableBalance", `requested ${amount}, locked ${locked}`);
      }

      const next: Position = {
        ...position,
        earlyUnstakeCooldownStart: tx.now,
        earlyUnstakeCooldownAmount: amount,
        lastUpdateTime: tx.now,
      };
      await tx.writePosition(next);
      await tx.writeSettings({ ...tx.settings, totalInEarlyCooldown: tx.settings.totalInEarlyCooldown + amount });
      tx.emit({ name: "EarlyUnstakeInitiated", user: account, amount, timestamp: tx.now });
      return next;
    });
  }

  async earlyUnstake(user: Address, amount: bigint): Promise<EarlyUnstakeResult> {
    const account = requireAddress(user, "user");
    requirePositive(amount, "amount");
    return this.execute("earlyUnstake", async tx => {
      this.requireNotPaused(tx.settings);
      const position = await this.requireActivePosition(tx, account);
      if (position.earlyUnstakeCooldownAmount === 0n) {
        throw new StatePreconditionError("NoEarlyUnstakeRequested", `${account} has not requested an early unstake`);
      }
      const cooldownEnd = position.earlyUnstakeCooldownStart + this.parameters.earlyUnstakeCooldownPeriod;
      if (tx.now < cooldownEnd) {
        throw new TimingError(
          "EarlyUnstakeCooldownNotCompleted",
          `early unstake cooldown of ${account} ends at ${cooldownEnd}`
        );
      }
      if (amount > position.earlyUnstakeCooldownAmount) {
        throw new StatePreconditionError(
          "AmountExceedsEarlyUnstakeRequest",
          `requested ${amount}, requested early ${position.earlyUnstakeCooldownAmount}`
        );
      }

      const penalty = (amount * this.parameters.earlyUnstakePenaltyBps) / BASIS_POINTS;
      const payout = amount - penalty;
      const earlyUnstakeCooldownAmount = position.earlyUnstakeCooldownAmount - amount;
      const next = this.settle({
        ...position,
        amount: position.amount - amount,
        earlyUnstakeCooldownAmount,
        earlyUnstakeCooldownStart: earlyUnstakeCooldownAmount === 0n ? 0n : position.earlyUnstakeCooldownStart,
        lastUpdateTime: tx.now,
      });
      await tx.writePosition(next);
      await tx.writeSettings({
        ...tx.settings,
        totalStaked: tx.settings.totalStaked - amount,
        totalInEarlyCooldown: tx.settings.totalInEarlyCooldown - amount,
      });
      if (payout > 0n) {
        await tx.token.transfer(this.vaultAddress, account, payout);
      }
      if (penalty > 0n) {
        await tx.token.transfer(this.vaultAddress, tx.settings.treasury, penalty);
      }
      tx.emit({ name: "EarlyUnstake", user: account, amount, payout, penalty, timestamp: tx.now });
      return { position: next, payout, penalty };
    });
  }

  // ============ Penalty hook ============

  /**
   * Deducts up to `requestedAmount` from the user's stake into the treasury, taking the
   * active portion first and the open cooldown after it. Never fails for insufficient stake:
   * returns the amount actually applied, which callers compare with the request.
   */
  async processQAPenalty(caller: Address, user: Address, requestedAmount: bigint): Promise<bigint> {
    const account = requireAddress(user, "user");
    requirePositive(requestedAmount, "penalty amount");
    return this.execute("processQAPenalty", async tx => {
      if (requireAddress(caller, "caller") !== tx.settings.qualityControl) {
        throw new AuthorizationError("Unauthorized", `${caller} is not the quality control caller`);
      }
      this.requireNotPaused(tx.settings);
      const position = await tx.ledger.getPosition(account);
      if (position.amount === 0n) {
        this.logger.warn(`QA penalty of ${requestedAmount} for ${account} skipped: no active position`);
        return 0n;
      }

      const applied = requestedAmount < position.amount ? requestedAmount : position.amount;
      const active = position.amount - position.cooldownAmount - position.earlyUnstakeCooldownAmount;
      let rest = applied - (applied < active ? applied : active);
      const fromCooldown = rest < position.cooldownAmount ? rest : position.cooldownAmount;
      rest -= fromCooldown;
      const fromEarlyCooldown = rest < position.earlyUnstakeCooldownAmount ? rest : position.earlyUnstakeCooldownAmount;

      const cooldownAmount = position.cooldownAmount - fromCooldown;
      const earlyUnstakeCooldownAmount = position.earlyUnstakeCooldownAmount - fromEarlyCooldown;
      const next = this.settle({
        ...position,
        amount: position.amount - applied,
        cooldownAmount,
        cooldownStart: cooldownAmount === 0n ? 0n : position.cooldownStart,
        earlyUnstakeCooldownAmount,
        earlyUnstakeCooldownStart: earlyUnstakeCooldownAmount === 0n ? 0n : position.earlyUnstakeCooldownStart,
        lastUpdateTime: tx.now,
      });
      await tx.writePosition(next);
      await tx.writeSettings({
        ...tx.settings,
        totalStaked: tx.settings.totalStaked - applied,
        totalInCooldown: tx.settings.totalInCooldown - fromCooldown,
        totalInEarlyCooldown: tx.settings.totalInEarlyCooldown - fromEarlyCooldown,
      });
      await tx.token.transfer(this.vaultAddress, tx.settings.treasury, applied);
      tx.emit({
        name: "QAPenaltyProcessed",
        user: account,
        requestedAmount,
        appliedAmount: applied,
        qualityControl: tx.settings.qualityControl,
        timestamp: tx.now,
      });
      if (applied < requestedAmount) {
        this.logger.warn(`QA penalty for ${account} partially applied: ${applied} of ${requestedAmount}`);
      }
      return applied;
    });
  }

  // ============ Internals ============

  private async applyAmountIncrease(
    tx: VaultTransaction,
    position: Position,
    additionalAmount: bigint
  ): Promise<Position> {
    const newAmount = position.amount + additionalAmount;
    this.requireWithinMaximum(newAmount, tx.settings);
    const combined = combineAmountIncrease(
      { start: position.weightedStartTime, duration: position.effectiveLockupPeriod, amount: position.amount },
      additionalAmount,
      tx.now
    );
    const next = this.settle({
      ...position,
      amount: newAmount,
      weightedStartTime: combined.start,
      effectiveLockupPeriod: combined.duration,
      lastUpdateTime: tx.now,
    });
    await tx.writePosition(next);
    await tx.writeSettings({ ...tx.settings, totalStaked: tx.settings.totalStaked + additionalAmount });
    await tx.token.transferFrom(this.vaultAddress, position.user, this.vaultAddress, additionalAmount);
    tx.emit({
      name: "AmountIncreased",
      user: position.user,
      additionalAmount,
      newTotalAmount: newAmount,
      newEffectiveMultiplier: next.effectiveMultiplier,
      newEffectiveLockupPeriod: next.effectiveLockupPeriod,
      timestamp: tx.now,
    });
    return next;
  }

  private async applyLockupIncrease(
    tx: VaultTransaction,
    position: Position,
    additionalLockup: bigint
  ): Promise<Position> {
    const combined = combineLockupExtension(
      { start: position.weightedStartTime, duration: position.effectiveLockupPeriod, amount: position.amount },
      additionalLockup,
      tx.now,
      this.parameters.maximumLockupPeriod
    );
    const next = this.settle({
      ...position,
      weightedStartTime: combined.start,
      effectiveLockupPeriod: combined.duration,
      lastUpdateTime: tx.now,
    });
    await tx.writePosition(next);
    tx.emit({
      name: "LockupIncreased",
      user: position.user,
      additionalLockup,
      newEffectiveLockupPeriod: next.effectiveLockupPeriod,
      newEffectiveMultiplier: next.effectiveMultiplier,
      timestamp: tx.now,
    });
    return next;
  }

  /** Re-derives the cached multiplier; an emptied position becomes the empty record. */
  private settle(position: Position): Position {
    if (position.amount === 0n) {
      return { ...emptyPosition(position.user), lastUpdateTime: position.lastUpdateTime };
    }
    return {
      ...position,
      effectiveMultiplier: calculateMultiplier(
        position.amount,
        position.effectiveLockupPeriod,
        this.parameters.multiplierTable
      ),
    };
  }

  private async requireActivePosition(tx: VaultTransaction, user: Address): Promise<Position> {
    const position = await tx.ledger.getPosition(user);
    if (position.amount === 0n) {
      throw new StatePreconditionError("NoStakeFound", `${user} has no active position`);
    }
    return position;
  }

  private async requireIncreasablePosition(tx: VaultTransaction, user: Address): Promise<Position> {
    const position = await this.requireActivePosition(tx, user);
    if (position.cooldownAmount > 0n || position.earlyUnstakeCooldownAmount > 0n) {
      throw new StatePreconditionError(
        "CannotIncreaseStakeInCooldown",
        `${user} has an open cooldown, the position cannot be increased`
      );
    }
    return position;
  }

  private requireNoOpenCooldown(position: Position): void {
    if (position.cooldownAmount > 0n || position.earlyUnstakeCooldownAmount > 0n) {
      throw new StatePreconditionError("CooldownAlreadyActive", `${position.user} already has an open cooldown`);
    }
  }

  private requireLockupIncrease(additionalLockup: bigint): void {
    if (additionalLockup <= 0n) {
      throw new InputValidationError("InvalidLockupPeriod", `lockup increase must be positive, got ${additionalLockup}`);
    }
    if (additionalLockup < this.parameters.minimumLockupIncrease) {
      throw new InputValidationError(
        "MinimumLockupIncreaseRequired",
        `lockup increase ${additionalLockup} is below ${this.parameters.minimumLockupIncrease}`
      );
    }
  }

  private requireWithinMaximum(amount: bigint, settings: VaultSettings): void {
    if (amount > settings.maximumStakeAmount) {
      throw new InputValidationError(
        "ExceedsMaximumStake",
        `amount ${amount} exceeds the maximum stake ${settings.maximumStakeAmount}`
      );
    }
  }

  private requireAdmin(caller: Address, settings: VaultSettings): void {
    if (requireAddress(caller, "caller") !== settings.admin) {
      throw new AuthorizationError("Unauthorized", `${caller} is not the vault admin`);
    }
  }

  private requireNotPaused(settings: VaultSettings): void {
    if (settings.paused) {
      throw new StatePreconditionError("VaultPaused", "vault is paused");
    }
  }

  private requirePaused(settings: VaultSettings): void {
    if (!settings.paused) {
      throw new StatePreconditionError("VaultNotPaused", "vault is not paused");
    }
  }

  /**
   * Runs `body` in its own transaction after all previously submitted operations.
   * Invariants and solvency are verified before commit; events are stored with the changes.
   * `loadSettings` supplies the vault state the body starts from, the stored one by default.
   */
  private execute<T>(
    operation: string,
    body: (tx: VaultTransaction) => Promise<T>,
    loadSettings: (ledger: PositionLedger) => Promise<VaultSettings> = ledger => ledger.getSettings()
  ): Promise<T> {
    return this.executor.run(async () => {
      try {
        const { result, events } = await this.dataSource.transaction(async (em: EntityManager) => {
          const ledger = new PositionLedger(em);
          const tx = new VaultTransaction(ledger, this.tokenLedger(em), this.clock.nowSec(), await loadSettings(ledger));
          const result = await body(tx);
          await this.verify(tx);
          await recordEvents(em, tx.events);
          return { result, events: tx.events };
        });
        for (const event of events) {
          this.logger.info(`${event.name}${event.user ? ` ${event.user}` : ""} at ${event.timestamp}`);
        }
        return result;
      } catch (e) {
        if (e instanceof InvariantViolationError || !isVaultError(e)) {
          logError(this.logger, e, `${operation} failed`);
        } else {
          this.logger.warn(`${operation} rejected: ${e.message}`);
        }
        throw e;
      }
    });
  }

  private async verify(tx: VaultTransaction): Promise<void> {
    for (const position of tx.touched.values()) {
      checkPositionInvariants(position, this.parameters.multiplierTable);
    }
    const { totalStaked, totalInCooldown, totalInEarlyCooldown } = tx.settings;
    if (totalStaked < 0n || totalInCooldown < 0n || totalInEarlyCooldown < 0n) {
      throw new InvariantViolationError("InvariantViolation", "negative aggregate");
    }
    if (tx.touched.size > 0 || tx.settingsChanged) {
      const custody = await tx.token.balanceOf(this.vaultAddress);
      if (custody < totalStaked) {
        throw new InvariantViolationError("Insolvent", `vault holds ${custody}, owes ${totalStaked}`);
      }
    }
  }
}

export function isMatured(position: Position, now: bigint): boolean {
  return now >= position.weightedStartTime + position.effectiveLockupPeriod;
}

function requirePositive(amount: bigint, what: string): void {
  if (amount <= 0n) {
    throw new InputValidationError("InvalidAmount", `${what} must be positive, got ${amount}`);
  }
}
