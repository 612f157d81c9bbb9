/**
 * Lending Pool - user-facing façade for one pool
 *
 * ============================================================
 * WHAT THIS MODULE DOES:
 * ============================================================
 * - Moves tokens (wallet <-> pool custody <-> position) and wraps
 *   native currency for native pools
 * - Creates positions lazily (first collateral supply or borrow)
 * - Delegates every ledger mutation to the router
 * - Sends borrow proceeds and bridged supply/repay to other chains,
 *   and applies bridged credits received from them
 *
 * ============================================================
 * WHAT THIS MODULE DOES NOT DO:
 * ============================================================
 * - Does NOT do share math or health math itself
 *
 * Every public mutation is one atomic() transaction on this chain.
 * Liquidity custody is the pool address.
 * ============================================================
 */

import { zeroAddress, type Address } from 'viem';
import type { HealthReport, LiquidationEvent } from '../config/types.js';
import type { PoolRouter, BorrowResult, RepayResult } from '../ledger/router.js';
import type { Position } from '../ledger/position.js';
import type { BridgeAction, BridgeReceipt } from '../bridge/types.js';
import type { ProtocolFactory } from './factory.js';
import { encodeBridgePayload } from '../bridge/payload.js';
import { NATIVE_TOKEN } from '../config/defaults.js';
import { requireRole, sameAddress, type CallerRole } from '../runtime/access.js';
import { ensure } from '../utils/errors.js';
import { logger, shortAddress } from '../utils/logger.js';

// ============================================================
// TYPES
// ============================================================

/**
 * Deliver borrowed funds on another chain
 */
export interface CrossChainDelivery {
  destinationChainId: number;
  minAmount: bigint;
  /** Native messaging fee, paid by the borrower */
  fee: bigint;
}

export interface BorrowReceipt extends BorrowResult {
  bridge?: BridgeReceipt;
}

export interface RepayOptions {
  /** Repay from the position, swapping this token to the borrow token */
  fromPosition?: { token: Address; slippageBps: bigint };
  /** Native currency attached (native pools only) */
  value?: bigint;
}

export type DispatchAction = Exclude<BridgeAction, 'borrowDelivery'>;

export interface DispatchParams {
  action: DispatchAction;
  amount: bigint;
  destinationChainId: number;
  /** Lending pool on the destination chain */
  remotePool: Address;
  minAmount: bigint;
  fee: bigint;
}

export interface BridgedExecution {
  action: DispatchAction;
  amount: bigint;
  /** Supply shares minted (supplyLiquidity) or borrow shares burned (repay) */
  shares: bigint;
  /** Part of a bridged repayment above the debt, returned to the user */
  refunded: bigint;
}

// ============================================================
// POOL
// ============================================================

export class LendingPool {
  readonly address: Address;
  readonly router: PoolRouter;

  private readonly factory: ProtocolFactory;

  constructor(factory: ProtocolFactory, router: PoolRouter, address: Address) {
    this.factory = factory;
    this.router = router;
    this.address = address;
  }

  get collateralToken(): Address {
    return this.router.collateralToken;
  }

  get borrowToken(): Address {
    return this.router.borrowToken;
  }

  get chainId(): number {
    return this.factory.runtime.chainId;
  }

  // ============================================================
  // LIQUIDITY
  // ============================================================

  supplyLiquidity(caller: Address, amount: bigint, value?: bigint): bigint {
    return this.factory.runtime.atomic(() => {
      this.pull(this.borrowToken, caller, this.address, amount, value);
      return this.router.supplyLiquidity(this.address, amount, caller);
    });
  }

  withdrawLiquidity(caller: Address, shares: bigint, unwrapToNative = false): bigint {
    return this.factory.runtime.atomic(() => {
      const amount = this.router.withdrawLiquidity(this.address, shares, caller);
      this.pay(this.borrowToken, caller, amount, unwrapToNative);
      return amount;
    });
  }

  // ============================================================
  // COLLATERAL
  // ============================================================

  supplyCollateral(caller: Address, amount: bigint, value?: bigint): void {
    this.factory.runtime.atomic(() => {
      const position = this.ensurePosition(caller);
      this.pull(this.collateralToken, caller, position.address, amount, value);
      this.router.supplyCollateral(this.address, caller, amount);
    });
  }

  withdrawCollateral(caller: Address, amount: bigint, unwrapToNative = false): void {
    this.factory.runtime.atomic(() => {
      const position = this.router.requirePosition(caller);
      position.withdrawCollateral(this.address, amount, caller, unwrapToNative);
      this.router.withdrawCollateral(this.address, caller, amount);
    });
  }

  // ============================================================
  // DEBT
  // ============================================================

  /**
   * Borrow against the caller's position; proceeds go to the caller's
   * wallet, or through the bridge when `delivery` names another chain
   */
  borrowDebt(caller: Address, amount: bigint, delivery?: CrossChainDelivery): BorrowReceipt {
    const { runtime, treasury } = this.factory;

    return runtime.atomic(() => {
      this.ensurePosition(caller);
      const result = this.router.borrowDebt(this.address, amount, caller);
      treasury.collect(this.address, this.borrowToken, result.protocolFee);

      if (delivery === undefined || delivery.destinationChainId === this.chainId) {
        runtime.tokens.transfer(this.borrowToken, this.address, caller, result.userAmount);
        return result;
      }

      const bridge = this.send(caller, {
        action: 'borrowDelivery',
        token: this.borrowToken,
        amount: result.userAmount,
        destinationChainId: delivery.destinationChainId,
        pool: this.address,
        user: caller,
        minAmount: delivery.minAmount,
        fee: delivery.fee,
      });
      return { ...result, bridge };
    });
  }

  /**
   * Burn `shares` of the caller's debt, paid from the wallet or from the
   * position (with a swap when the chosen token is not the borrow token)
   */
  repayWithSelectedToken(caller: Address, shares: bigint, options: RepayOptions = {}): RepayResult {
    ensure(
      options.fromPosition === undefined || options.value === undefined,
      'UNEXPECTED_VALUE',
      'a repayment from the position takes no attached value'
    );
    return this.factory.runtime.atomic(() => {
      const result = this.router.repayWithSelectedToken(this.address, shares, caller);
      if (options.fromPosition) {
        const position = this.router.requirePosition(caller);
        position.repayWithSelectedToken(
          this.address,
          result.borrowAmount,
          options.fromPosition.token,
          options.fromPosition.slippageBps
        );
      } else {
        this.pull(this.borrowToken, caller, this.address, result.borrowAmount, options.value);
      }
      return result;
    });
  }

  // ============================================================
  // LIQUIDATION
  // ============================================================

  /**
   * Query form of the health gate (never throws for a healthy user)
   */
  checkLiquidation(user: Address): HealthReport {
    return this.router.healthOf(user);
  }

  liquidateByDEX(caller: Address, borrower: Address, incentiveBps: bigint): LiquidationEvent {
    return this.factory.runtime.atomic(() =>
      this.factory.liquidator.liquidateByDEX(this.address, this.router, { initiator: caller, borrower, incentiveBps })
    );
  }

  /**
   * The caller pays `repayAmount` (approve the liquidator, or attach
   * `value` on native pools) and receives the collateral
   */
  liquidateByMEV(
    caller: Address,
    borrower: Address,
    repayAmount: bigint,
    incentiveBps: bigint,
    value?: bigint
  ): LiquidationEvent {
    return this.factory.runtime.atomic(() =>
      this.factory.liquidator.liquidateByMEV(this.address, this.router, {
        beneficiary: caller,
        borrower,
        repayAmount,
        incentiveBps,
        value,
      })
    );
  }

  // ============================================================
  // CROSS-CHAIN
  // ============================================================

  /**
   * Bridge the caller's tokens to a pool on another chain, tagged with
   * the action to apply there
   */
  dispatchCrossChain(caller: Address, params: DispatchParams): BridgeReceipt {
    const token = this.tokenFor(params.action);
    return this.factory.runtime.atomic(() => {
      this.pull(token, caller, this.address, params.amount);
      return this.send(caller, {
        action: params.action,
        token,
        amount: params.amount,
        destinationChainId: params.destinationChainId,
        pool: params.remotePool,
        user: caller,
        minAmount: params.minAmount,
        fee: params.fee,
      });
    });
  }

  /**
   * Apply bridged credits addressed to this pool for `user`
   *
   * Callable by the user, the protocol owner or an operator.
   */
  executeBridged(caller: Address, user: Address, action: DispatchAction, amount: bigint): BridgedExecution {
    requireRole(caller, ['positionOwner', 'owner', 'operator'], (role, who) => this.holdsRole(role, who, user), 'executeBridged');
    const { inbox } = this.factory.requireBridge();
    const { runtime } = this.factory;
    const token = this.tokenFor(action);

    return runtime.atomic((): BridgedExecution => {
      switch (action) {
        case 'supplyLiquidity': {
          inbox.consume(this.address, user, token, amount, this.address);
          const shares = this.router.supplyLiquidity(this.address, amount, user);
          return { action, amount, shares, refunded: 0n };
        }
        case 'supplyCollateral': {
          const position = this.ensurePosition(user);
          inbox.consume(this.address, user, token, amount, position.address);
          this.router.supplyCollateral(this.address, user, amount);
          return { action, amount, shares: 0n, refunded: 0n };
        }
        case 'repay': {
          inbox.consume(this.address, user, token, amount, this.address);
          ensure(this.router.userBorrowShares(user) > 0n, 'NO_DEBT', `${user} has no debt to repay`, { user });
          const shares = this.sharesForRepayment(user, amount);
          ensure(shares > 0n, 'ZERO_AMOUNT', `repayment of ${amount} covers no shares`, { user });
          const result = this.router.repayWithSelectedToken(this.address, shares, user);
          const refunded = amount - result.borrowAmount;
          if (refunded > 0n) {
            runtime.tokens.transfer(token, this.address, user, refunded);
          }
          return { action, amount, shares, refunded };
        }
      }
    });
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private ensurePosition(user: Address): Position {
    return this.router.positionOf(user) ?? this.router.createPosition(this.address, user);
  }

  private tokenFor(action: DispatchAction): Address {
    return action === 'supplyCollateral' ? this.collateralToken : this.borrowToken;
  }

  /**
   * Borrow shares that `amount` repays, capped at the user's shares
   */
  private sharesForRepayment(user: Address, amount: bigint): bigint {
    this.router.accrueInterest();
    const totals = this.router.snapshot();
    const userShares = this.router.userBorrowShares(user);
    if (totals.totalBorrowAssets === 0n) return 0n;
    const shares = (amount * totals.totalBorrowShares) / totals.totalBorrowAssets;
    return shares < userShares ? shares : userShares;
  }

  /**
   * Take `amount` of token from `from` into `to`
   *
   * With `value`, the pool's token must be wrapped native: value is taken
   * as native currency, `amount` is wrapped and the excess refunded.
   */
  private pull(token: Address, from: Address, to: Address, amount: bigint, value?: bigint): void {
    ensure(amount > 0n, 'ZERO_AMOUNT', 'amount must be > 0');
    const { tokens } = this.factory.runtime;

    if (value === undefined) {
      tokens.transferFrom(token, this.address, from, to, amount);
      return;
    }

    ensure(tokens.isWrappedNative(token), 'NOT_NATIVE_POOL', 'native value sent to a non-native pool');
    ensure(value >= amount, 'INSUFFICIENT_VALUE', `value ${value} < amount ${amount}`);
    tokens.transfer(NATIVE_TOKEN, from, this.address, value);
    tokens.wrap(this.address, amount);
    if (!sameAddress(to, this.address)) {
      tokens.transfer(token, this.address, to, amount);
    }
    const refund = value - amount;
    if (refund > 0n) {
      tokens.transfer(NATIVE_TOKEN, this.address, from, refund);
    }
  }

  private pay(token: Address, to: Address, amount: bigint, unwrapToNative: boolean): void {
    const { tokens } = this.factory.runtime;
    if (!unwrapToNative) {
      tokens.transfer(token, this.address, to, amount);
      return;
    }
    ensure(tokens.isWrappedNative(token), 'NOT_NATIVE_POOL', 'pool token is not wrapped native');
    tokens.unwrap(this.address, amount);
    tokens.transfer(NATIVE_TOKEN, this.address, to, amount);
  }

  private send(
    payer: Address,
    message: {
      action: BridgeAction;
      token: Address;
      amount: bigint;
      destinationChainId: number;
      pool: Address;
      user: Address;
      minAmount: bigint;
      fee: bigint;
    }
  ): BridgeReceipt {
    const { bridge } = this.factory.requireBridge();
    const { tokens } = this.factory.runtime;
    const remoteToken = this.factory.bridgeTokenFor(message.token, message.destinationChainId);

    if (message.fee > 0n) {
      tokens.transfer(NATIVE_TOKEN, payer, this.address, message.fee);
    }

    const payload = encodeBridgePayload({
      pool: message.action === 'borrowDelivery' ? zeroAddress : message.pool,
      user: message.user,
      token: remoteToken,
      amount: message.amount,
      action: message.action,
    });

    const receipt = bridge.send(this.address, {
      destinationChainId: message.destinationChainId,
      recipient: bridge.receiverOf(message.destinationChainId),
      token: message.token,
      remoteToken,
      amount: message.amount,
      minAmount: message.minAmount,
      fee: message.fee,
      payload,
    });

    logger.pool.info('Cross-chain dispatch', {
      action: message.action,
      user: shortAddress(message.user),
      amount: message.amount,
      destinationChainId: message.destinationChainId,
      messageId: receipt.messageId,
    });
    return receipt;
  }

  private holdsRole(role: CallerRole, caller: Address, user: Address): boolean {
    switch (role) {
      case 'positionOwner':
        return sameAddress(caller, user);
      case 'owner':
        return sameAddress(caller, this.factory.owner());
      case 'operator':
        return this.factory.isOperator(caller);
      default:
        return false;
    }
  }
}
