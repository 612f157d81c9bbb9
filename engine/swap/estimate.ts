/**
 * Oracle-based swap output estimates
 *
 * The estimate is a Result: oracle outages come back as a typed error so
 * the caller decides whether a fallback applies. Anything else throws.
 */

import type { Address } from 'viem';
import type { TokenLedger } from '../runtime/tokens.js';
import { readNormalizedPrice, type PriceFeedRegistry } from '../oracle/feeds.js';
import { err, isLendingError, ok, type LendingError, type Result } from '../utils/errors.js';
import { pow10, tokenValue, valueToTokenAmount } from '../utils/units.js';

export interface EstimateError {
  kind: 'oracle_missing' | 'oracle_unavailable';
  cause: LendingError;
}

/**
 * Expected tokenOut for amountIn of tokenIn at oracle prices (no fee)
 */
export function estimateSwapOutput(
  tokens: TokenLedger,
  feeds: PriceFeedRegistry,
  tokenIn: Address,
  tokenOut: Address,
  amountIn: bigint
): Result<bigint, EstimateError> {
  try {
    const value = tokenValue(amountIn, readNormalizedPrice(feeds, tokenIn), tokens.decimals(tokenIn));
    return ok(valueToTokenAmount(value, readNormalizedPrice(feeds, tokenOut), tokens.decimals(tokenOut)));
  } catch (error) {
    if (isLendingError(error, 'ORACLE_NOT_FOUND')) return err({ kind: 'oracle_missing', cause: error });
    if (isLendingError(error, 'ORACLE_UNAVAILABLE')) return err({ kind: 'oracle_unavailable', cause: error });
    throw error;
  }
}

/**
 * 1:1 estimate adjusted only for the decimal difference
 */
export function decimalsOnlyEstimate(
  tokens: TokenLedger,
  tokenIn: Address,
  tokenOut: Address,
  amountIn: bigint
): bigint {
  const decIn = tokens.decimals(tokenIn);
  const decOut = tokens.decimals(tokenOut);
  if (decOut >= decIn) return amountIn * pow10(decOut - decIn);
  return amountIn / pow10(decIn - decOut);
}

/**
 * Estimate that propagates oracle failures as thrown errors
 */
export function requireSwapEstimate(
  tokens: TokenLedger,
  feeds: PriceFeedRegistry,
  tokenIn: Address,
  tokenOut: Address,
  amountIn: bigint
): bigint {
  const estimate = estimateSwapOutput(tokens, feeds, tokenIn, tokenOut, amountIn);
  if (!estimate.ok) throw estimate.error.cause;
  return estimate.value;
}
