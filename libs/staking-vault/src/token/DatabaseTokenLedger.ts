import { EntityManager } from "typeorm";
import { TokenAllowanceEntity, TokenBalanceEntity } from "../orm/entities";
import { InputValidationError, StatePreconditionError } from "../utils/error";
import { Address } from "../vault-types";
import { ITokenLedger, TokenLedgerFactory } from "./ITokenLedger";

/**
 * Token ledger kept in the vault database, so that token movement commits
 * and rolls back together with the position changes it accompanies.
 */
export class DatabaseTokenLedger implements ITokenLedger {
  constructor(private readonly em: EntityManager) {}

  async balanceOf(account: Address): Promise<bigint> {
    const row = await this.em.findOneBy(TokenBalanceEntity, { account });
    return row ? row.balance : 0n;
  }

  async allowance(owner: Address, spender: Address): Promise<bigint> {
    const row = await this.em.findOneBy(TokenAllowanceEntity, { owner, spender });
    return row ? row.amount : 0n;
  }

  async approve(owner: Address, spender: Address, amount: bigint): Promise<void> {
    checkAmount(amount, true);
    await this.em.save(this.em.create(TokenAllowanceEntity, { owner, spender, amount }));
  }

  async mint(to: Address, amount: bigint): Promise<void> {
    checkAmount(amount, false);
    await this.setBalance(to, (await this.balanceOf(to)) + amount);
  }

  async transfer(from: Address, to: Address, amount: bigint): Promise<void> {
    checkAmount(amount, false);
    const fromBalance = await this.balanceOf(from);
    if (fromBalance < amount) {
      throw new StatePreconditionError(
        "InsufficientBalance",
        `${from} holds ${fromBalance}, cannot transfer ${amount}`
      );
    }
    await this.setBalance(from, fromBalance - amount);
    await this.setBalance(to, (await this.balanceOf(to)) + amount);
  }

  async transferFrom(spender: Address, from: Address, to: Address, amount: bigint): Promise<void> {
    checkAmount(amount, false);
    const allowed = await this.allowance(from, spender);
    if (allowed < amount) {
      throw new StatePreconditionError(
        "InsufficientAllowance",
        `${spender} may move ${allowed} of ${from}'s tokens, requested ${amount}`
      );
    }
    await this.transfer(from, to, amount);
    await this.em.save(this.em.create(TokenAllowanceEntity, { owner: from, spender, amount: allowed - amount }));
  }

  private async setBalance(account: Address, balance: bigint): Promise<void> {
    await this.em.save(this.em.create(TokenBalanceEntity, { account, balance }));
  }
}

function checkAmount(amount: bigint, allowZero: boolean) {
  if (amount < 0n || (!allowZero && amount === 0n)) {
    throw new InputValidationError("InvalidAmount", `invalid token amount ${amount}`);
  }
}

export const databaseTokenLedger: TokenLedgerFactory = em => new DatabaseTokenLedger(em);
