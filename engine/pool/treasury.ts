/**
 * Protocol Treasury
 *
 * Receives borrow-origination fees and DEX-liquidation surplus.
 * Income lands in `locked`; a buyback releases it, 95% to the
 * protocol's `available` balance and 5% straight to the operator.
 */

import type { Address } from 'viem';
import type { ChainRuntime, StateHolder } from '../runtime/chain.js';
import { TREASURY_PROTOCOL_SHARE_BPS } from '../config/defaults.js';
import { addressKey, isZeroAddress, sameAddress } from '../runtime/access.js';
import { ensure } from '../utils/errors.js';
import { applyBps } from '../utils/units.js';
import { logger, shortAddress } from '../utils/logger.js';

interface TreasuryState {
  locked: Map<string, bigint>;
  available: Map<string, bigint>;
}

export interface TreasuryOptions {
  runtime: ChainRuntime;
  address: Address;
  /** Resolves the protocol owner at call time */
  owner: () => Address;
  operator: Address;
}

export interface BuybackResult {
  protocolShare: bigint;
  operatorShare: bigint;
}

export class Treasury implements StateHolder<TreasuryState> {
  readonly address: Address;
  readonly operator: Address;

  private readonly runtime: ChainRuntime;
  private readonly owner: () => Address;
  private locked = new Map<string, bigint>();
  private available = new Map<string, bigint>();

  constructor(options: TreasuryOptions) {
    ensure(!isZeroAddress(options.operator), 'ZERO_ADDRESS', 'operator cannot be zero');
    this.runtime = options.runtime;
    this.address = options.address;
    this.owner = options.owner;
    this.operator = options.operator;
    this.runtime.track(this);
  }

  /**
   * Move `amount` of token from `from` into the treasury as locked income
   */
  collect(from: Address, token: Address, amount: bigint): void {
    if (amount === 0n) return;
    this.runtime.atomic(() => {
      this.runtime.tokens.transfer(token, from, this.address, amount);
      this.locked.set(addressKey(token), this.lockedOf(token) + amount);
    });
    logger.treasury.debug('Income collected', { token: shortAddress(token), amount, from: shortAddress(from) });
  }

  /**
   * Release locked income: 95% to available, 5% paid to the operator
   */
  buyback(caller: Address, token: Address, amount: bigint): BuybackResult {
    this.requireOwner(caller, 'buyback');
    ensure(amount > 0n, 'ZERO_AMOUNT', 'amount must be > 0');
    const locked = this.lockedOf(token);
    ensure(locked >= amount, 'INSUFFICIENT_BALANCE', `locked ${locked} < ${amount}`, { token });

    const protocolShare = applyBps(amount, TREASURY_PROTOCOL_SHARE_BPS);
    const operatorShare = amount - protocolShare;

    this.runtime.atomic(() => {
      this.locked.set(addressKey(token), locked - amount);
      this.available.set(addressKey(token), this.availableOf(token) + protocolShare);
      this.runtime.tokens.transfer(token, this.address, this.operator, operatorShare);
    });

    logger.treasury.warn('Buyback executed', {
      audit: true,
      caller,
      token,
      amount,
      protocolShare,
      operatorShare,
    });
    return { protocolShare, operatorShare };
  }

  withdraw(caller: Address, token: Address, amount: bigint, to: Address): void {
    this.requireOwner(caller, 'withdraw');
    ensure(amount > 0n, 'ZERO_AMOUNT', 'amount must be > 0');
    const available = this.availableOf(token);
    ensure(available >= amount, 'INSUFFICIENT_BALANCE', `available ${available} < ${amount}`, { token });

    this.runtime.atomic(() => {
      this.available.set(addressKey(token), available - amount);
      this.runtime.tokens.transfer(token, this.address, to, amount);
    });
    logger.treasury.info('Treasury withdrawal', { token: shortAddress(token), amount, to: shortAddress(to) });
  }

  lockedOf(token: Address): bigint {
    return this.locked.get(addressKey(token)) ?? 0n;
  }

  availableOf(token: Address): bigint {
    return this.available.get(addressKey(token)) ?? 0n;
  }

  captureState(): TreasuryState {
    return { locked: new Map(this.locked), available: new Map(this.available) };
  }

  restoreState(state: TreasuryState): void {
    this.locked = state.locked;
    this.available = state.available;
  }

  private requireOwner(caller: Address, operation: string): void {
    ensure(sameAddress(caller, this.owner()), 'UNAUTHORIZED', `${operation} requires the protocol owner`, { caller });
  }
}
