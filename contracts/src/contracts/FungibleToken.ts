/**
 * FungibleToken.ts - Ledger-resident token with transfer/transferFrom semantics
 *
 * The pool pulls deposits with transferFrom (after the depositor's approve);
 * markets pay winners with transfer from their own balance.
 */

import { PrivateKey, PublicKey, UInt64 } from 'o1js';
import { Contract, type Ledger } from '../utils/Ledger.js';
import { StateMap } from '../utils/StateMap.js';
import { assertThat } from '../utils/MarketError.js';
import { TransferEvent } from '../types/Events.js';

/**
 * What the pool and markets need from a token. A `false` return is treated
 * exactly like a thrown error: the enclosing transaction aborts.
 */
export interface TokenInterface {
  readonly address: PublicKey;
  transfer(to: PublicKey, amount: UInt64): Promise<boolean>;
  transferFrom(from: PublicKey, to: PublicKey, amount: UInt64): Promise<boolean>;
  balanceOf(owner: PublicKey): UInt64;
}

const tokenEvents = {
  transfer: TransferEvent,
};

export interface FungibleTokenOptions {
  owner: PublicKey;
  address?: PublicKey;
}

export class FungibleToken extends Contract<typeof tokenEvents> implements TokenInterface {
  readonly events = tokenEvents;
  readonly owner: PublicKey;

  private balances = new StateMap<UInt64>();
  private allowances = new StateMap<UInt64>();
  private totalSupply = UInt64.zero;

  constructor(ledger: Ledger, options: FungibleTokenOptions) {
    super(ledger, options.address ?? PrivateKey.random().toPublicKey());
    this.owner = options.owner;
  }

  balanceOf(owner: PublicKey): UInt64 {
    return this.balances.get(owner.toBase58()) ?? UInt64.zero;
  }

  allowance(owner: PublicKey, spender: PublicKey): UInt64 {
    return this.allowances.get(allowanceKey(owner, spender)) ?? UInt64.zero;
  }

  getTotalSupply(): UInt64 {
    return this.totalSupply;
  }

  /**
   * Owner-only issuance
   */
  async mint(to: PublicKey, amount: UInt64): Promise<boolean> {
    assertThat(this.caller.equals(this.owner), 'NOT_OWNER');
    assertThat(amount.greaterThan(UInt64.zero), 'INVALID_AMOUNT');

    this.balances.set(to.toBase58(), this.balanceOf(to).add(amount));
    this.totalSupply = this.totalSupply.add(amount);
    this.emitEvent('transfer', new TransferEvent({ from: PublicKey.empty(), to, amount }));
    return true;
  }

  async approve(spender: PublicKey, amount: UInt64): Promise<boolean> {
    this.allowances.set(allowanceKey(this.caller, spender), amount);
    return true;
  }

  async transfer(to: PublicKey, amount: UInt64): Promise<boolean> {
    this.move(this.caller, to, amount);
    return true;
  }

  async transferFrom(from: PublicKey, to: PublicKey, amount: UInt64): Promise<boolean> {
    const spender = this.caller;
    const allowed = this.allowance(from, spender);
    assertThat(allowed.greaterThanOrEqual(amount), 'INSUFFICIENT_ALLOWANCE', `${allowed} < ${amount}`);

    this.allowances.set(allowanceKey(from, spender), allowed.sub(amount));
    this.move(from, to, amount);
    return true;
  }

  checkpoint(): () => void {
    const restoreBalances = this.balances.checkpoint();
    const restoreAllowances = this.allowances.checkpoint();
    const totalSupply = this.totalSupply;

    return () => {
      restoreBalances();
      restoreAllowances();
      this.totalSupply = totalSupply;
    };
  }

  private move(from: PublicKey, to: PublicKey, amount: UInt64) {
    const balance = this.balanceOf(from);
    assertThat(balance.greaterThanOrEqual(amount), 'INSUFFICIENT_BALANCE', `${balance} < ${amount}`);

    this.balances.set(from.toBase58(), balance.sub(amount));
    this.balances.set(to.toBase58(), this.balanceOf(to).add(amount));
    this.emitEvent('transfer', new TransferEvent({ from, to, amount }));
  }
}

function allowanceKey(owner: PublicKey, spender: PublicKey): string {
  return `${owner.toBase58()}:${spender.toBase58()}`;
}
