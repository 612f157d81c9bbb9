/**
 * Interest Rate Model - kinked utilization curve
 *
 * ============================================================
 * FORMULAS (rates x100, utilization x10000):
 * ============================================================
 * utilization = totalBorrowAssets * 10000 / totalSupplyAssets
 *
 * utilization <= optimal:
 *   borrowRate = base + utilization * (rateAtOptimal - base) / optimal
 * utilization > optimal:
 *   borrowRate = rateAtOptimal
 *              + (utilization - optimal) * (max - rateAtOptimal) / (10000 - optimal)
 *
 * supplyRate = borrowRate * utilization * (10000 - reserveFactor) / 1e8
 *
 * An empty pool (no supplied assets) reports the flat empty-pool rate.
 * ============================================================
 */

import { RATE_MODEL } from '../config/defaults.js';
import type { PoolTotals } from '../config/types.js';
import { SECONDS_PER_YEAR } from '../utils/units.js';

const SCALE = RATE_MODEL.utilizationScale;

/**
 * Pool utilization, scaled x10000 (0 when nothing is supplied)
 */
export function utilization(totalSupplyAssets: bigint, totalBorrowAssets: bigint): bigint {
  if (totalSupplyAssets === 0n) return 0n;
  return (totalBorrowAssets * SCALE) / totalSupplyAssets;
}

/**
 * Borrow rate at a given utilization
 */
export function borrowRateAt(util: bigint): bigint {
  const { baseRate, rateAtOptimal, maxRate, optimalUtilization } = RATE_MODEL;
  if (util <= optimalUtilization) {
    return baseRate + (util * (rateAtOptimal - baseRate)) / optimalUtilization;
  }
  const excess = util - optimalUtilization;
  return rateAtOptimal + (excess * (maxRate - rateAtOptimal)) / (SCALE - optimalUtilization);
}

/**
 * Supply rate at a given utilization (borrow rate minus the reserve cut)
 */
export function supplyRateAt(util: bigint): bigint {
  return (borrowRateAt(util) * util * (SCALE - RATE_MODEL.reserveFactor)) / (SCALE * SCALE);
}

/**
 * Borrow rate for the given totals
 */
export function borrowRate(totalSupplyAssets: bigint, totalBorrowAssets: bigint): bigint {
  if (totalSupplyAssets === 0n) return RATE_MODEL.emptyPoolRate;
  return borrowRateAt(utilization(totalSupplyAssets, totalBorrowAssets));
}

export function supplyRate(totalSupplyAssets: bigint, totalBorrowAssets: bigint): bigint {
  if (totalSupplyAssets === 0n) return 0n;
  return supplyRateAt(utilization(totalSupplyAssets, totalBorrowAssets));
}

/**
 * Outcome of one accrual step
 */
export interface Accrual {
  totals: PoolTotals;
  /** Interest added to both borrow and supply assets */
  interest: bigint;
  /** Portion attributed to suppliers (90%) */
  supplierInterest: bigint;
  /** Portion attributed to the protocol reserve (10%) - stays as pool equity */
  reserveInterest: bigint;
  rate: bigint;
  elapsed: bigint;
}

/**
 * Apply interest for the time elapsed since lastAccrued
 *
 * lastAccrued moves to `now` even when the interest rounds to zero.
 */
export function accrue(totals: PoolTotals, now: bigint): Accrual {
  const elapsed = now > totals.lastAccrued ? now - totals.lastAccrued : 0n;
  const rate = borrowRate(totals.totalSupplyAssets, totals.totalBorrowAssets);

  let interest = 0n;
  if (elapsed > 0n && totals.totalBorrowAssets > 0n) {
    interest = (totals.totalBorrowAssets * rate * elapsed) / (SCALE * SECONDS_PER_YEAR);
  }

  const reserveInterest = (interest * RATE_MODEL.reserveFactor) / SCALE;

  return {
    totals: {
      ...totals,
      totalBorrowAssets: totals.totalBorrowAssets + interest,
      totalSupplyAssets: totals.totalSupplyAssets + interest,
      lastAccrued: now,
    },
    interest,
    supplierInterest: interest - reserveInterest,
    reserveInterest,
    rate,
    elapsed,
  };
}
