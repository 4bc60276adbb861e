/**
 * @splitpact/settlement — Token ledger collaborator.
 *
 * The engine never holds funds. It asks an external ledger how much a
 * participant has allowed the coordinator to move and then pulls each
 * leg from participant to payer inside one atomic unit.
 */

import type { Address } from "viem";

/**
 * Transfers available inside an atomic unit.
 */
export interface TokenTransfers {
  /**
   * Move `amount` of `token` from `owner` to `recipient`, spending the
   * allowance `owner` granted to `spender`.
   *
   * @returns false when the ledger refuses the transfer
   */
  transferFrom(
    token: Address,
    spender: Address,
    owner: Address,
    recipient: Address,
    amount: bigint,
  ): Promise<boolean>;
}

export interface TokenLedger {
  allowanceOf(token: Address, owner: Address, spender: Address): Promise<bigint>;

  /**
   * Run `work` as one unit. If it throws, every transfer it made is
   * discarded and the error is rethrown.
   */
  atomic<T>(work: (tx: TokenTransfers) => Promise<T>): Promise<T>;
}

// =============================================================================
// In-memory implementation
// =============================================================================

interface TokenState {
  readonly balances: Map<string, bigint>;
  readonly allowances: Map<string, bigint>;
}

function balanceKey(token: string, owner: string): string {
  return `${token.toLowerCase()}:${owner.toLowerCase()}`;
}

function allowanceKey(token: string, owner: string, spender: string): string {
  return `${token.toLowerCase()}:${owner.toLowerCase()}:${spender.toLowerCase()}`;
}

/**
 * ERC-20-like balances and allowances held in memory, for tests and
 * local tooling. `atomic` snapshots the state and puts it back when
 * the unit fails.
 */
export class InMemoryTokenLedger implements TokenLedger {
  private _state: TokenState = { balances: new Map(), allowances: new Map() };

  mint(token: Address, owner: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError(`Cannot mint a negative amount: ${amount.toString()}`);
    }
    const k = balanceKey(token, owner);
    this._state.balances.set(k, (this._state.balances.get(k) ?? 0n) + amount);
  }

  /** Set (not add to) the allowance `owner` grants `spender`. */
  approve(token: Address, owner: Address, spender: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError(`Cannot approve a negative amount: ${amount.toString()}`);
    }
    this._state.allowances.set(allowanceKey(token, owner, spender), amount);
  }

  balanceOf(token: Address, owner: Address): bigint {
    return this._state.balances.get(balanceKey(token, owner)) ?? 0n;
  }

  allowanceOf(token: Address, owner: Address, spender: Address): Promise<bigint> {
    return Promise.resolve(
      this._state.allowances.get(allowanceKey(token, owner, spender)) ?? 0n,
    );
  }

  async atomic<T>(work: (tx: TokenTransfers) => Promise<T>): Promise<T> {
    const saved: TokenState = {
      balances: new Map(this._state.balances),
      allowances: new Map(this._state.allowances),
    };
    try {
      return await work({
        transferFrom: (token, spender, owner, recipient, amount) =>
          Promise.resolve(this._transferFrom(token, spender, owner, recipient, amount)),
      });
    } catch (error) {
      this._state = saved;
      throw error;
    }
  }

  private _transferFrom(
    token: Address,
    spender: Address,
    owner: Address,
    recipient: Address,
    amount: bigint,
  ): boolean {
    if (amount < 0n) {
      return false;
    }
    const aKey = allowanceKey(token, owner, spender);
    const allowance = this._state.allowances.get(aKey) ?? 0n;
    const fromKey = balanceKey(token, owner);
    const balance = this._state.balances.get(fromKey) ?? 0n;
    if (allowance < amount || balance < amount) {
      return false;
    }
    this._state.allowances.set(aKey, allowance - amount);
    this._state.balances.set(fromKey, balance - amount);
    const toKey = balanceKey(token, recipient);
    this._state.balances.set(toKey, (this._state.balances.get(toKey) ?? 0n) + amount);
    return true;
  }
}
