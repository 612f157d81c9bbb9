/**
 * Pool Router - share-based ledger for one collateral/borrow pair
 *
 * ============================================================
 * WHAT THIS MODULE DOES:
 * ============================================================
 * - Owns supply shares, borrow shares and tracked collateral
 * - Accrues interest on the kinked curve before every mutation
 * - Gates borrow and collateral withdrawal on the health evaluator
 * - Writes debt down on liquidation
 *
 * ============================================================
 * WHAT THIS MODULE DOES NOT DO:
 * ============================================================
 * - Does NOT move tokens (the lending pool and positions do)
 * - Does NOT price anything itself (health evaluator + oracles)
 *
 * ============================================================
 * INVARIANTS (checked after every operation):
 * ============================================================
 * - totalBorrowAssets <= totalSupplyAssets
 * - sum(user shares) == total shares, for supply and borrow
 * - a user with borrow shares has a position
 * - assets/shares only grows through accrual
 * ============================================================
 */

import type { Address } from 'viem';
import type { StateHolder } from '../runtime/chain.js';
import type { HealthReport, PoolParams, PoolTotals } from '../config/types.js';
import type { HealthInput } from '../risk/health.js';
import type { ProtocolServices } from './services.js';
import { Position, type PositionHost } from './position.js';
import { PROTOCOL_FEE_WAD } from '../config/defaults.js';
import { addressKey, isZeroAddress, requireRole, sameAddress, type CallerRole } from '../runtime/access.js';
import { accrue, borrowRate, supplyRate, utilization, type Accrual } from '../risk/rates.js';
import { LendingError, ensure } from '../utils/errors.js';
import { WAD } from '../utils/units.js';
import { logger, shortAddress } from '../utils/logger.js';

// ============================================================
// TYPES
// ============================================================

interface Account {
  user: Address;
  supplyShares: bigint;
  borrowShares: bigint;
  /** Informational - custody lives in the position */
  collateral: bigint;
}

interface RouterState {
  totals: PoolTotals;
  accounts: Map<string, Account>;
  positions: Map<string, Position>;
  lendingPool: Address | undefined;
}

export interface BorrowResult {
  protocolFee: bigint;
  userAmount: bigint;
  shares: bigint;
}

export interface RepayResult {
  borrowAmount: bigint;
  remainingUserShares: bigint;
  remainingTotalShares: bigint;
  remainingTotalAssets: bigint;
}

export interface LiquidationWriteDown {
  sharesBurned: bigint;
  assetsRepaid: bigint;
}

const NO_HEALTH: HealthReport = {
  isLiquidatable: false,
  borrowValue: 0n,
  collateralValue: 0n,
  maxBorrow: 0n,
  borrowed: 0n,
};

// ============================================================
// ROUTER
// ============================================================

export class PoolRouter implements PositionHost, StateHolder<RouterState> {
  readonly address: Address;
  readonly collateralToken: Address;
  readonly borrowToken: Address;
  readonly ltv: bigint;

  private readonly services: ProtocolServices;
  private state: RouterState;

  constructor(services: ProtocolServices, params: PoolParams, address: Address) {
    this.services = services;
    this.address = address;
    this.collateralToken = params.collateralToken;
    this.borrowToken = params.borrowToken;
    this.ltv = params.ltv;
    this.state = {
      totals: {
        totalSupplyAssets: 0n,
        totalSupplyShares: 0n,
        totalBorrowAssets: 0n,
        totalBorrowShares: 0n,
        lastAccrued: services.runtime.now(),
      },
      accounts: new Map(),
      positions: new Map(),
      lendingPool: undefined,
    };
    services.runtime.track(this);
  }

  // ============================================================
  // WIRING
  // ============================================================

  /**
   * Bind the router to its lending pool (once, by the factory)
   */
  setLendingPool(caller: Address, pool: Address): void {
    this.authorize(caller, ['factory'], 'setLendingPool');
    ensure(this.state.lendingPool === undefined, 'LENDING_POOL_ALREADY_SET', 'lending pool already set');
    ensure(!isZeroAddress(pool), 'ZERO_ADDRESS', 'lending pool cannot be zero');
    this.state.lendingPool = pool;
  }

  lendingPoolAddress(): Address | undefined {
    return this.state.lendingPool;
  }

  // ============================================================
  // POSITIONS
  // ============================================================

  createPosition(caller: Address, user: Address): Position {
    this.authorize(caller, ['lendingPool'], 'createPosition');
    ensure(!isZeroAddress(user), 'ZERO_ADDRESS', 'user cannot be zero');
    ensure(!this.state.positions.has(addressKey(user)), 'POSITION_EXISTS', `position exists for ${user}`, { user });

    const address = this.services.runtime.deploy(this.address, 'position');
    const position = new Position(this.services, this, user, address);
    this.state.positions.set(addressKey(user), position);

    logger.router.info('Position created', { user: shortAddress(user), position: address });
    return position;
  }

  positionOf(user: Address): Position | undefined {
    return this.state.positions.get(addressKey(user));
  }

  requirePosition(user: Address): Position {
    const position = this.positionOf(user);
    if (!position) {
      throw new LendingError('POSITION_NOT_FOUND', `no position for ${user}`, { user, router: this.address });
    }
    return position;
  }

  // ============================================================
  // INTEREST
  // ============================================================

  /**
   * Apply interest up to now (idempotent within one timestamp)
   */
  accrueInterest(): Accrual {
    const result = accrue(this.state.totals, this.services.runtime.now());
    this.state.totals = result.totals;
    if (result.interest > 0n) {
      logger.router.debug('Interest accrued', {
        router: shortAddress(this.address),
        interest: result.interest,
        supplierInterest: result.supplierInterest,
        reserveInterest: result.reserveInterest,
        rate: result.rate,
        elapsed: result.elapsed,
      });
    }
    return result;
  }

  // ============================================================
  // LIQUIDITY
  // ============================================================

  supplyLiquidity(caller: Address, amount: bigint, user: Address): bigint {
    this.authorize(caller, ['lendingPool'], 'supplyLiquidity');
    ensure(amount > 0n, 'ZERO_AMOUNT', 'amount must be > 0');

    return this.services.runtime.atomic(() => {
      this.accrueInterest();
      const totals = this.state.totals;

      const shares =
        totals.totalSupplyShares === 0n || totals.totalSupplyAssets === 0n
          ? amount
          : (amount * totals.totalSupplyShares) / totals.totalSupplyAssets;
      ensure(shares > 0n, 'INSUFFICIENT_SHARES', `deposit of ${amount} would mint zero shares`, { amount });

      this.account(user).supplyShares += shares;
      totals.totalSupplyShares += shares;
      totals.totalSupplyAssets += amount;

      logger.router.info('Liquidity supplied', { user: shortAddress(user), amount, shares });
      return shares;
    });
  }

  withdrawLiquidity(caller: Address, shares: bigint, user: Address): bigint {
    this.authorize(caller, ['lendingPool'], 'withdrawLiquidity');
    ensure(shares > 0n, 'ZERO_AMOUNT', 'shares must be > 0');

    return this.services.runtime.atomic(() => {
      this.accrueInterest();
      const account = this.account(user);
      ensure(account.supplyShares >= shares, 'INSUFFICIENT_SHARES', `user holds ${account.supplyShares} < ${shares}`, {
        user,
      });

      const totals = this.state.totals;
      const amount = (shares * totals.totalSupplyAssets) / totals.totalSupplyShares;

      account.supplyShares -= shares;
      totals.totalSupplyShares -= shares;
      totals.totalSupplyAssets -= amount;
      ensure(
        totals.totalSupplyAssets >= totals.totalBorrowAssets,
        'INSUFFICIENT_LIQUIDITY',
        'withdrawal would leave borrows uncovered',
        { totalSupplyAssets: totals.totalSupplyAssets, totalBorrowAssets: totals.totalBorrowAssets }
      );

      logger.router.info('Liquidity withdrawn', { user: shortAddress(user), shares, amount });
      return amount;
    });
  }

  // ============================================================
  // COLLATERAL
  // ============================================================

  supplyCollateral(caller: Address, user: Address, amount: bigint): void {
    this.authorize(caller, ['lendingPool'], 'supplyCollateral');
    ensure(amount > 0n, 'ZERO_AMOUNT', 'amount must be > 0');

    this.services.runtime.atomic(() => {
      this.accrueInterest();
      this.account(user).collateral += amount;
    });
  }

  /**
   * Decrement tracked collateral; re-runs the health gate for borrowers
   *
   * The position's custody must already reflect the withdrawal.
   */
  withdrawCollateral(caller: Address, user: Address, amount: bigint): void {
    this.authorize(caller, ['lendingPool'], 'withdrawCollateral');
    ensure(amount > 0n, 'ZERO_AMOUNT', 'amount must be > 0');

    this.services.runtime.atomic(() => {
      this.accrueInterest();
      const account = this.account(user);
      ensure(account.collateral >= amount, 'INSUFFICIENT_COLLATERAL', `tracked ${account.collateral} < ${amount}`, {
        user,
      });
      account.collateral -= amount;

      if (account.borrowShares > 0n) {
        const position = this.requirePosition(user);
        this.services.health.assertHealthy(this.healthInput(position, account, this.state.totals), 'withdrawCollateral');
      }
    });
  }

  // ============================================================
  // DEBT
  // ============================================================

  borrowDebt(caller: Address, amount: bigint, user: Address): BorrowResult {
    this.authorize(caller, ['lendingPool'], 'borrowDebt');
    ensure(amount > 0n, 'ZERO_AMOUNT', 'amount must be > 0');
    const position = this.requirePosition(user);

    return this.services.runtime.atomic(() => {
      this.accrueInterest();
      const totals = this.state.totals;

      const shares =
        totals.totalBorrowShares === 0n || totals.totalBorrowAssets === 0n
          ? amount
          : (amount * totals.totalBorrowShares) / totals.totalBorrowAssets;
      ensure(shares > 0n, 'ZERO_AMOUNT', `borrow of ${amount} would mint zero shares`);

      const protocolFee = (amount * PROTOCOL_FEE_WAD) / WAD;
      const userAmount = amount - protocolFee;

      const account = this.account(user);
      account.borrowShares += shares;
      totals.totalBorrowShares += shares;
      totals.totalBorrowAssets += amount;

      ensure(
        totals.totalBorrowAssets <= totals.totalSupplyAssets,
        'INSUFFICIENT_LIQUIDITY',
        `borrow of ${amount} exceeds available liquidity`,
        { totalSupplyAssets: totals.totalSupplyAssets, totalBorrowAssets: totals.totalBorrowAssets }
      );

      this.services.health.assertHealthy(this.healthInput(position, account, totals), 'borrowDebt');

      logger.router.info('Debt borrowed', { user: shortAddress(user), amount, shares, protocolFee });
      return { protocolFee, userAmount, shares };
    });
  }

  repayWithSelectedToken(caller: Address, shares: bigint, user: Address): RepayResult {
    this.authorize(caller, ['lendingPool'], 'repayWithSelectedToken');
    ensure(shares > 0n, 'ZERO_AMOUNT', 'shares must be > 0');

    return this.services.runtime.atomic(() => {
      this.accrueInterest();
      const account = this.account(user);
      ensure(account.borrowShares >= shares, 'INSUFFICIENT_SHARES', `user owes ${account.borrowShares} < ${shares}`, {
        user,
      });

      const totals = this.state.totals;
      const borrowAmount = (shares * totals.totalBorrowAssets) / totals.totalBorrowShares;

      account.borrowShares -= shares;
      totals.totalBorrowShares -= shares;
      totals.totalBorrowAssets -= borrowAmount;

      logger.router.info('Debt repaid', { user: shortAddress(user), shares, borrowAmount });
      return {
        borrowAmount,
        remainingUserShares: account.borrowShares,
        remainingTotalShares: totals.totalBorrowShares,
        remainingTotalAssets: totals.totalBorrowAssets,
      };
    });
  }

  // ============================================================
  // LIQUIDATION AUTHORITY
  // ============================================================

  /**
   * Write down `repayAmount` of the user's debt and clear tracked collateral
   *
   * Share removal is capped at the user's balance. Supply shares are
   * never touched.
   */
  liquidatePosition(caller: Address, user: Address, repayAmount: bigint): LiquidationWriteDown {
    this.authorize(caller, ['liquidator'], 'liquidatePosition');
    ensure(repayAmount > 0n, 'ZERO_AMOUNT', 'repayAmount must be > 0');

    return this.services.runtime.atomic(() => {
      this.accrueInterest();
      const totals = this.state.totals;
      const account = this.account(user);
      ensure(account.borrowShares > 0n && totals.totalBorrowAssets > 0n, 'NO_DEBT', `${user} has no debt`, { user });

      let sharesBurned = (repayAmount * totals.totalBorrowShares) / totals.totalBorrowAssets;
      let assetsRepaid = repayAmount;
      if (sharesBurned > account.borrowShares) {
        sharesBurned = account.borrowShares;
        assetsRepaid = (sharesBurned * totals.totalBorrowAssets) / totals.totalBorrowShares;
      }

      account.borrowShares -= sharesBurned;
      account.collateral = 0n;
      totals.totalBorrowShares -= sharesBurned;
      totals.totalBorrowAssets -= assetsRepaid;

      logger.router.info('Position liquidated', {
        user: shortAddress(user),
        sharesBurned,
        assetsRepaid,
        remainingShares: account.borrowShares,
      });
      return { sharesBurned, assetsRepaid };
    });
  }

  /**
   * Owner-only recovery: forget a user's debt and collateral tracking
   *
   * DANGEROUS: no repayment happens and nothing is seized. The debt's
   * asset value leaves totalBorrowAssets so the totals stay consistent.
   */
  emergencyResetPosition(caller: Address, user: Address): void {
    this.authorize(caller, ['owner'], 'emergencyResetPosition');

    this.services.runtime.atomic(() => {
      this.accrueInterest();
      const totals = this.state.totals;
      const account = this.account(user);

      const shares = account.borrowShares;
      const assets = shares === 0n ? 0n : (shares * totals.totalBorrowAssets) / totals.totalBorrowShares;
      const collateral = account.collateral;

      totals.totalBorrowShares -= shares;
      totals.totalBorrowAssets -= assets;
      account.borrowShares = 0n;
      account.collateral = 0n;

      logger.router.warn('EMERGENCY position reset', {
        audit: true,
        caller,
        router: this.address,
        user,
        borrowSharesCleared: shares,
        borrowAssetsForgiven: assets,
        collateralCleared: collateral,
      });
    });
  }

  // ============================================================
  // VIEWS
  // ============================================================

  /**
   * Health of a user at current (projected) totals
   */
  healthOf(user: Address): HealthReport {
    const position = this.positionOf(user);
    if (!position) return { ...NO_HEALTH };
    const totals = accrue(this.state.totals, this.services.runtime.now()).totals;
    return this.services.health.evaluate(this.healthInput(position, this.peek(user), totals));
  }

  snapshot(): PoolTotals {
    return { ...this.state.totals };
  }

  userSupplyShares(user: Address): bigint {
    return this.peek(user).supplyShares;
  }

  userBorrowShares(user: Address): bigint {
    return this.peek(user).borrowShares;
  }

  userCollateral(user: Address): bigint {
    return this.peek(user).collateral;
  }

  supplyAssetsOf(user: Address): bigint {
    const totals = this.state.totals;
    if (totals.totalSupplyShares === 0n) return 0n;
    return (this.peek(user).supplyShares * totals.totalSupplyAssets) / totals.totalSupplyShares;
  }

  borrowAssetsOf(user: Address): bigint {
    const totals = this.state.totals;
    if (totals.totalBorrowShares === 0n) return 0n;
    return (this.peek(user).borrowShares * totals.totalBorrowAssets) / totals.totalBorrowShares;
  }

  /**
   * Users with outstanding borrow shares, in first-seen order
   */
  borrowers(): Address[] {
    const result: Address[] = [];
    for (const account of this.state.accounts.values()) {
      if (account.borrowShares > 0n) result.push(account.user);
    }
    return result;
  }

  /**
   * Every user with an account (any shares or collateral ever recorded)
   */
  accountHolders(): Address[] {
    return [...this.state.accounts.values()].map((account) => account.user);
  }

  utilization(): bigint {
    return utilization(this.state.totals.totalSupplyAssets, this.state.totals.totalBorrowAssets);
  }

  borrowRate(): bigint {
    return borrowRate(this.state.totals.totalSupplyAssets, this.state.totals.totalBorrowAssets);
  }

  supplyRate(): bigint {
    return supplyRate(this.state.totals.totalSupplyAssets, this.state.totals.totalBorrowAssets);
  }

  // ============================================================
  // STATE HOLDER
  // ============================================================

  captureState(): RouterState {
    const accounts = new Map<string, Account>();
    for (const [key, account] of this.state.accounts) {
      accounts.set(key, { ...account });
    }
    return {
      totals: { ...this.state.totals },
      accounts,
      positions: new Map(this.state.positions),
      lendingPool: this.state.lendingPool,
    };
  }

  restoreState(state: RouterState): void {
    this.state = state;
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private healthInput(position: Position, account: Account, totals: PoolTotals): HealthInput {
    return {
      borrowToken: this.borrowToken,
      tokens: position.tokenList(),
      holder: position.address,
      ltv: this.ltv,
      totalBorrowAssets: totals.totalBorrowAssets,
      totalBorrowShares: totals.totalBorrowShares,
      userBorrowShares: account.borrowShares,
    };
  }

  /**
   * Read-only view of an account (zeroes for unknown users)
   */
  private peek(user: Address): Account {
    return (
      this.state.accounts.get(addressKey(user)) ?? { user, supplyShares: 0n, borrowShares: 0n, collateral: 0n }
    );
  }

  /**
   * Mutable account, created on first touch
   */
  private account(user: Address): Account {
    const key = addressKey(user);
    let account = this.state.accounts.get(key);
    if (!account) {
      account = { user, supplyShares: 0n, borrowShares: 0n, collateral: 0n };
      this.state.accounts.set(key, account);
    }
    return account;
  }

  private authorize(caller: Address, allowed: readonly CallerRole[], operation: string): void {
    requireRole(caller, allowed, (role, who) => this.holdsRole(role, who), operation);
  }

  private holdsRole(role: CallerRole, caller: Address): boolean {
    switch (role) {
      case 'factory':
        return sameAddress(caller, this.services.address);
      case 'owner':
        return sameAddress(caller, this.services.owner());
      case 'lendingPool':
        return this.state.lendingPool !== undefined && sameAddress(caller, this.state.lendingPool);
      case 'liquidator':
        return sameAddress(caller, this.services.liquidatorAddress());
      default:
        return false;
    }
  }
}
