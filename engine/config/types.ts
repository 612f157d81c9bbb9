/**
 * Core type definitions for the lending engine
 *
 * All amounts are bigint token units; all USD values are 18-decimal
 * fixed point (see utils/units.ts).
 */

import type { Address } from 'viem';

/**
 * Token metadata known to a chain's token ledger
 */
export interface TokenInfo {
  address: Address;
  symbol: string;
  decimals: number;
}

/**
 * Immutable parameters of one lending pool pair
 */
export interface PoolParams {
  collateralToken: Address;
  borrowToken: Address;
  /** Loan-to-value limit, WAD (1e18 = 100%) */
  ltv: bigint;
}

/**
 * Outcome of a health evaluation
 *
 * CRITICAL: The borrow/withdraw gate and checkLiquidation both produce
 * this from the same function - they can never disagree.
 */
export interface HealthReport {
  /** borrowValue > collateralValue OR borrowValue > maxBorrow */
  isLiquidatable: boolean;
  /** User debt valued in 18-decimal USD */
  borrowValue: bigint;
  /** Sum of every listed position token, 18-decimal USD */
  collateralValue: bigint;
  /** collateralValue * ltv / 1e18 */
  maxBorrow: bigint;
  /** User debt in borrow-token units */
  borrowed: bigint;
}

/**
 * Liquidation strategies
 * - dex: protocol swaps seized collateral for the borrow token
 * - mev: external caller pays the debt and receives collateral directly
 */
export type LiquidationStrategy = 'dex' | 'mev';

/**
 * Ephemeral liquidation record (logged and returned, never stored)
 */
export interface LiquidationEvent {
  borrower: Address;
  liquidator: Address;
  collateralSeized: bigint;
  debtRepaid: bigint;
  strategy: LiquidationStrategy;
}

/**
 * Snapshot of a router's pool totals
 */
export interface PoolTotals {
  totalSupplyAssets: bigint;
  totalSupplyShares: bigint;
  totalBorrowAssets: bigint;
  totalBorrowShares: bigint;
  lastAccrued: bigint;
}
