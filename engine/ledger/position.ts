/**
 * Position - per-user collateral vault for one pool
 *
 * ============================================================
 * WHAT THIS MODULE DOES:
 * ============================================================
 * - Holds the user's collateral and any swapped auxiliary tokens
 *   (custody is the token ledger balance at the position address)
 * - Keeps an append-only list of every token ever held; the health
 *   evaluator values the whole list
 * - Moves collateral out only for the pool or the liquidator
 * - Swaps single-hop at oracle-derived minimum output
 *
 * ============================================================
 * TOKEN LIST:
 * ============================================================
 * Slot 0 is a zero-address placeholder; the collateral token is seeded
 * at index 1. Tokens are never removed, even at zero balance.
 * ============================================================
 */

import { zeroAddress, type Address } from 'viem';
import type { StateHolder } from '../runtime/chain.js';
import type { ProtocolServices } from './services.js';
import { NATIVE_TOKEN, DEFAULT_SWAP_FEE_TIER, MAX_SLIPPAGE_BPS } from '../config/defaults.js';
import { addressKey, requireRole, sameAddress, type CallerRole } from '../runtime/access.js';
import { requireSwapEstimate } from '../swap/estimate.js';
import { LendingError, ensure, isLendingError } from '../utils/errors.js';
import { BPS } from '../utils/units.js';
import { logger, shortAddress } from '../utils/logger.js';

/**
 * What a position needs to know about the pool that owns it
 */
export interface PositionHost {
  readonly collateralToken: Address;
  readonly borrowToken: Address;
  lendingPoolAddress(): Address | undefined;
}

interface PositionState {
  tokenLists: Address[];
  tokenListsId: Map<string, number>;
}

const WITHDRAW_ROLES: readonly CallerRole[] = ['lendingPool', 'liquidator'];
const SWAP_ROLES: readonly CallerRole[] = ['positionOwner', 'lendingPool', 'position'];

export class Position implements StateHolder<PositionState> {
  readonly address: Address;
  readonly owner: Address;
  readonly host: PositionHost;

  private readonly services: ProtocolServices;
  private tokenLists: Address[];
  private tokenListsId: Map<string, number>;

  constructor(services: ProtocolServices, host: PositionHost, owner: Address, address: Address) {
    this.services = services;
    this.host = host;
    this.owner = owner;
    this.address = address;
    this.tokenLists = [zeroAddress, host.collateralToken];
    this.tokenListsId = new Map([[addressKey(host.collateralToken), 1]]);
    services.runtime.track(this);
  }

  // ============================================================
  // VIEWS
  // ============================================================

  /**
   * Every slot of the token list, placeholder included
   */
  tokenList(): readonly Address[] {
    return [...this.tokenLists];
  }

  /**
   * Number of tokens ever listed
   */
  get counter(): number {
    return this.tokenLists.length - 1;
  }

  hasToken(token: Address): boolean {
    return this.tokenListsId.has(addressKey(token));
  }

  balanceOf(token: Address): bigint {
    return this.services.runtime.tokens.balanceOf(token, this.address);
  }

  collateralBalance(): bigint {
    return this.balanceOf(this.host.collateralToken);
  }

  // ============================================================
  // CUSTODY
  // ============================================================

  /**
   * Send collateral to recipient, optionally unwrapping to native
   */
  withdrawCollateral(caller: Address, amount: bigint, recipient: Address, unwrapToNative: boolean): void {
    this.authorize(caller, WITHDRAW_ROLES, 'withdrawCollateral');
    ensure(amount > 0n, 'ZERO_AMOUNT', 'amount must be > 0');

    const { runtime } = this.services;
    const collateral = this.host.collateralToken;
    const balance = this.collateralBalance();
    ensure(balance >= amount, 'INSUFFICIENT_COLLATERAL', `position holds ${balance} < ${amount}`, {
      position: this.address,
    });

    runtime.atomic(() => {
      if (unwrapToNative) {
        ensure(runtime.tokens.isWrappedNative(collateral), 'NOT_NATIVE_POOL', 'collateral is not wrapped native');
        runtime.tokens.unwrap(this.address, amount);
        runtime.tokens.transfer(NATIVE_TOKEN, this.address, recipient, amount);
      } else {
        runtime.tokens.transfer(collateral, this.address, recipient, amount);
      }
    });

    logger.position.debug('Collateral withdrawn', {
      position: shortAddress(this.address),
      amount,
      recipient: shortAddress(recipient),
      native: unwrapToNative,
    });
  }

  /**
   * Swap amountIn of tokenIn held by the position into tokenOut
   *
   * @returns amount of tokenOut received
   */
  swapTokenByPosition(
    caller: Address,
    tokenIn: Address,
    tokenOut: Address,
    amountIn: bigint,
    slippageBps: bigint
  ): bigint {
    this.authorize(caller, SWAP_ROLES, 'swapTokenByPosition');
    ensure(!sameAddress(tokenIn, tokenOut), 'SAME_TOKEN', 'tokenIn and tokenOut must differ');
    ensure(this.services.hasPriceFeed(tokenIn), 'ORACLE_NOT_FOUND', `no price feed for ${tokenIn}`, { token: tokenIn });
    ensure(this.services.hasPriceFeed(tokenOut), 'ORACLE_NOT_FOUND', `no price feed for ${tokenOut}`, { token: tokenOut });
    ensure(slippageBps >= 0n && slippageBps <= MAX_SLIPPAGE_BPS, 'SLIPPAGE_TOO_HIGH', `slippage ${slippageBps} > ${MAX_SLIPPAGE_BPS}`);
    ensure(amountIn > 0n, 'ZERO_AMOUNT', 'amountIn must be > 0');

    const balance = this.balanceOf(tokenIn);
    ensure(balance >= amountIn, 'INSUFFICIENT_BALANCE', `position holds ${balance} < ${amountIn}`, { token: tokenIn });

    const { runtime, swapVenue } = this.services;
    return runtime.atomic(() => {
      this.listToken(tokenIn);
      this.listToken(tokenOut);

      const expected = requireSwapEstimate(runtime.tokens, this.services, tokenIn, tokenOut, amountIn);
      const amountOutMinimum = (expected * (BPS - slippageBps)) / BPS;

      runtime.tokens.approve(tokenIn, this.address, swapVenue.address, amountIn);
      let amountOut: bigint;
      try {
        amountOut = swapVenue.swapExactInputSingle(this.address, {
          tokenIn,
          tokenOut,
          fee: DEFAULT_SWAP_FEE_TIER,
          recipient: this.address,
          amountIn,
          amountOutMinimum,
        });
      } catch (error) {
        if (isLendingError(error, 'SWAP_FAILED')) throw error;
        throw new LendingError('SWAP_FAILED', 'swap venue rejected the swap', { tokenIn, tokenOut }, { cause: error });
      }

      logger.position.info('Position swap', {
        position: shortAddress(this.address),
        tokenIn: shortAddress(tokenIn),
        tokenOut: shortAddress(tokenOut),
        amountIn,
        amountOut,
        amountOutMinimum,
      });
      return amountOut;
    });
  }

  /**
   * Pay `amount` of the borrow token to the pool, swapping `token` first
   * when it is not the borrow token
   */
  repayWithSelectedToken(caller: Address, amount: bigint, token: Address, slippageBps: bigint): void {
    this.authorize(caller, WITHDRAW_ROLES, 'repayWithSelectedToken');
    ensure(amount > 0n, 'ZERO_AMOUNT', 'amount must be > 0');

    const pool = this.host.lendingPoolAddress();
    if (pool === undefined) {
      throw new LendingError('LENDING_POOL_NOT_SET', 'router has no lending pool');
    }

    const { runtime } = this.services;
    const borrowToken = this.host.borrowToken;

    runtime.atomic(() => {
      if (sameAddress(token, borrowToken)) {
        runtime.tokens.transfer(borrowToken, this.address, pool, amount);
        return;
      }

      const available = this.balanceOf(token);
      const received = this.swapTokenByPosition(this.address, token, borrowToken, available, slippageBps);
      if (received < amount) {
        throw new LendingError('INSUFFICIENT_SWAP_OUTPUT', `swap returned ${received} < ${amount}`, {
          token,
          received,
          required: amount,
        });
      }

      runtime.tokens.transfer(borrowToken, this.address, pool, amount);

      const remainder = received - amount;
      if (remainder > 0n) {
        this.swapTokenByPosition(this.address, borrowToken, token, remainder, slippageBps);
      }
    });

    logger.position.info('Repaid from position', {
      position: shortAddress(this.address),
      amount,
      token: shortAddress(token),
    });
  }

  // ============================================================
  // STATE HOLDER
  // ============================================================

  captureState(): PositionState {
    return { tokenLists: [...this.tokenLists], tokenListsId: new Map(this.tokenListsId) };
  }

  restoreState(state: PositionState): void {
    this.tokenLists = state.tokenLists;
    this.tokenListsId = state.tokenListsId;
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private listToken(token: Address): void {
    if (this.hasToken(token)) return;
    this.tokenListsId.set(addressKey(token), this.tokenLists.length);
    this.tokenLists.push(token);
  }

  private authorize(caller: Address, allowed: readonly CallerRole[], operation: string): void {
    requireRole(caller, allowed, (role, who) => this.holdsRole(role, who), operation);
  }

  private holdsRole(role: CallerRole, caller: Address): boolean {
    switch (role) {
      case 'positionOwner':
        return sameAddress(caller, this.owner);
      case 'position':
        return sameAddress(caller, this.address);
      case 'lendingPool': {
        const pool = this.host.lendingPoolAddress();
        return pool !== undefined && sameAddress(caller, pool);
      }
      case 'liquidator':
        return sameAddress(caller, this.services.liquidatorAddress());
      default:
        return false;
    }
  }
}
