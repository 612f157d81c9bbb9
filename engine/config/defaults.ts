/**
 * Protocol constants for the lending engine
 * 
 * ============================================================
 * COMPATIBILITY:
 * ============================================================
 * The interest-rate constants below are part of the deployed
 * protocol's observable behaviour. Rates are scaled x100
 * (200 = 2.00%) and utilization x10000 (8000 = 80%).
 * Changing any of them changes accrued debt bit-for-bit.
 * ============================================================
 */

import type { Address } from 'viem';
import { WAD } from '../utils/units.js';

/**
 * Kinked interest-rate model
 */
export const RATE_MODEL = {
  /** Borrow rate at 0% utilization */
  baseRate: 200n,
  /** Borrow rate at the kink */
  rateAtOptimal: 1000n,
  /** Borrow rate at 100% utilization */
  maxRate: 5000n,
  /** Kink position (80%) */
  optimalUtilization: 8000n,
  /** Share of interest kept as protocol reserve (10%) */
  reserveFactor: 1000n,
  /** Rate reported for a pool without any supplied liquidity */
  emptyPoolRate: 500n,
  /** Utilization scale (100%) */
  utilizationScale: 10_000n,
} as const;

/**
 * Borrow origination fee, WAD-scaled (1e15 / 1e18 = 0.1%)
 */
export const PROTOCOL_FEE_WAD = 10n ** 15n;

/**
 * Liquidation parameters (basis points)
 */
export const LIQUIDATION = {
  /** Maximum incentive a caller may request (50%) */
  maxIncentiveBps: 5000n,
  /** Share of collateral value (DEX) or debt (MEV) one call may close */
  closeFactorBps: 5000n,
  /** Slippage tolerance applied to the oracle estimate on DEX liquidation */
  dexSlippageBps: 1000n,
} as const;

/**
 * Upper bound for caller-supplied slippage tolerances (100%)
 */
export const MAX_SLIPPAGE_BPS = 10_000n;

/**
 * Swap fee tier used for single-hop swaps (hundredths of a bip, 3000 = 0.3%)
 */
export const DEFAULT_SWAP_FEE_TIER = 3000;

/**
 * Treasury buyback split: protocol keeps 95%, operator receives 5%
 */
export const TREASURY_PROTOCOL_SHARE_BPS = 9500n;

/**
 * Sentinel address for the chain's native currency
 */
export const NATIVE_TOKEN: Address = '0xEeeeeEeeeEeEeeEeEeEeeEEEeeeeEeeeeeeeEEeE';

/**
 * Decimals of every chain's native currency
 */
export const NATIVE_DECIMALS = 18;

/**
 * Hard ceiling for a pool LTV regardless of chain (100%)
 */
export const MAX_LTV = WAD;
