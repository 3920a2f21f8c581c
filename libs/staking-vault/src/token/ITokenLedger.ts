import { EntityManager } from "typeorm";
import { Address } from "../vault-types";

/**
 * Fungible token primitive the vault moves custody through.
 * Implementations bound to an EntityManager take part in its transaction.
 */
export interface ITokenLedger {
  balanceOf(account: Address): Promise<bigint>;
  /** Moves `amount` from `from` to `to`. */
  transfer(from: Address, to: Address, amount: bigint): Promise<void>;
  /** Moves `amount` from `from` to `to` on behalf of `spender`, consuming its allowance. */
  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): Promise<void>;
}

export type TokenLedgerFactory = (em: EntityManager) => ITokenLedger;
