/**
 * Token Ledger - ERC-20 style balances for one chain
 *
 * Models transfer/approve/transferFrom semantics plus native currency
 * and its wrapped form. The lending engine never trusts cached
 * balances: every read goes through balanceOf().
 */

import type { Address } from 'viem';
import type { TokenInfo } from '../config/types.js';
import { NATIVE_DECIMALS, NATIVE_TOKEN } from '../config/defaults.js';
import { LendingError, ensure } from '../utils/errors.js';
import { addressKey, isZeroAddress, sameAddress } from './access.js';

interface LedgerState {
  balances: Map<string, bigint>;
  allowances: Map<string, bigint>;
}

function balanceKey(token: Address, holder: Address): string {
  return `${addressKey(token)}:${addressKey(holder)}`;
}

function allowanceKey(token: Address, owner: Address, spender: Address): string {
  return `${addressKey(token)}:${addressKey(owner)}:${addressKey(spender)}`;
}

export class TokenLedger {
  private readonly tokens = new Map<string, TokenInfo>();
  private balances = new Map<string, bigint>();
  private allowances = new Map<string, bigint>();
  private wrappedNative: Address | undefined;

  constructor() {
    this.tokens.set(addressKey(NATIVE_TOKEN), {
      address: NATIVE_TOKEN,
      symbol: 'NATIVE',
      decimals: NATIVE_DECIMALS,
    });
  }

  // ============================================================
  // TOKEN REGISTRY
  // ============================================================

  registerToken(info: TokenInfo): void {
    ensure(!isZeroAddress(info.address), 'ZERO_ADDRESS', 'token address cannot be zero');
    ensure(!this.tokens.has(addressKey(info.address)), 'TOKEN_EXISTS', `token already registered: ${info.symbol}`);
    this.tokens.set(addressKey(info.address), { ...info });
  }

  /**
   * Mark a registered token as the chain's wrapped native currency
   */
  setWrappedNative(token: Address): void {
    this.info(token);
    this.wrappedNative = token;
  }

  getWrappedNative(): Address | undefined {
    return this.wrappedNative;
  }

  isWrappedNative(token: Address): boolean {
    return this.wrappedNative !== undefined && sameAddress(this.wrappedNative, token);
  }

  info(token: Address): TokenInfo {
    const info = this.tokens.get(addressKey(token));
    if (!info) {
      throw new LendingError('UNKNOWN_TOKEN', `token not registered: ${token}`, { token });
    }
    return info;
  }

  decimals(token: Address): number {
    return this.info(token).decimals;
  }

  symbol(token: Address): string {
    return this.info(token).symbol;
  }

  // ============================================================
  // BALANCES
  // ============================================================

  balanceOf(token: Address, holder: Address): bigint {
    return this.balances.get(balanceKey(token, holder)) ?? 0n;
  }

  /**
   * Create new units (faucet, bridge mint)
   */
  mint(token: Address, to: Address, amount: bigint): void {
    this.info(token);
    ensure(!isZeroAddress(to), 'ZERO_ADDRESS', 'cannot mint to the zero address');
    this.credit(token, to, amount);
  }

  /**
   * Destroy units (bridge burn)
   */
  burn(token: Address, from: Address, amount: bigint): void {
    this.debit(token, from, amount);
  }

  transfer(token: Address, from: Address, to: Address, amount: bigint): void {
    this.info(token);
    ensure(!isZeroAddress(to), 'ZERO_ADDRESS', 'cannot transfer to the zero address');
    this.debit(token, from, amount);
    this.credit(token, to, amount);
  }

  // ============================================================
  // ALLOWANCES
  // ============================================================

  approve(token: Address, owner: Address, spender: Address, amount: bigint): void {
    this.info(token);
    this.allowances.set(allowanceKey(token, owner, spender), amount);
  }

  allowance(token: Address, owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(token, owner, spender)) ?? 0n;
  }

  /**
   * Move tokens on behalf of `from` using the spender's allowance
   */
  transferFrom(token: Address, spender: Address, from: Address, to: Address, amount: bigint): void {
    const key = allowanceKey(token, from, spender);
    const allowed = this.allowances.get(key) ?? 0n;
    if (allowed < amount) {
      throw new LendingError('INSUFFICIENT_ALLOWANCE', `allowance ${allowed} < ${amount}`, {
        token,
        owner: from,
        spender,
      });
    }
    this.transfer(token, from, to, amount);
    this.allowances.set(key, allowed - amount);
  }

  // ============================================================
  // NATIVE WRAPPING
  // ============================================================

  wrap(holder: Address, amount: bigint): Address {
    const wrapped = this.requireWrappedNative();
    this.debit(NATIVE_TOKEN, holder, amount);
    this.credit(wrapped, holder, amount);
    return wrapped;
  }

  unwrap(holder: Address, amount: bigint): void {
    const wrapped = this.requireWrappedNative();
    this.debit(wrapped, holder, amount);
    this.credit(NATIVE_TOKEN, holder, amount);
  }

  // ============================================================
  // STATE HOLDER
  // ============================================================

  captureState(): LedgerState {
    return { balances: new Map(this.balances), allowances: new Map(this.allowances) };
  }

  restoreState(state: LedgerState): void {
    this.balances = state.balances;
    this.allowances = state.allowances;
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private requireWrappedNative(): Address {
    if (this.wrappedNative === undefined) {
      throw new LendingError('NOT_NATIVE_POOL', 'no wrapped native token configured on this chain');
    }
    return this.wrappedNative;
  }

  private debit(token: Address, from: Address, amount: bigint): void {
    const key = balanceKey(token, from);
    const balance = this.balances.get(key) ?? 0n;
    if (balance < amount) {
      throw new LendingError('INSUFFICIENT_BALANCE', `balance ${balance} < ${amount}`, { token, holder: from });
    }
    this.balances.set(key, balance - amount);
  }

  private credit(token: Address, to: Address, amount: bigint): void {
    const key = balanceKey(token, to);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }
}
