/**
 * Health Evaluator - solvency of one position
 *
 * ============================================================
 * WHAT THIS MODULE DOES:
 * ============================================================
 * - Values every token a position has ever held (18-decimal USD)
 * - Values the user's share of pool debt
 * - Derives maxBorrow from the pool LTV and the liquidation flag
 *
 * ============================================================
 * WHAT THIS MODULE DOES NOT DO:
 * ============================================================
 * - Does NOT mutate anything (pure read of ledger + oracles)
 * - Does NOT cache prices or balances between calls
 *
 * ============================================================
 * CRITICAL:
 * ============================================================
 * The borrow/withdraw gate (assertHealthy) and the liquidation
 * query (evaluate) share computeHealth(). They cannot disagree
 * on the same state.
 * ============================================================
 */

import type { Address } from 'viem';
import type { HealthReport } from '../config/types.js';
import type { TokenLedger } from '../runtime/tokens.js';
import { isZeroAddress } from '../runtime/access.js';
import { readNormalizedPrice, type PriceFeedRegistry } from '../oracle/feeds.js';
import { LendingError } from '../utils/errors.js';
import { WAD, formatUsd, tokenValue } from '../utils/units.js';
import { logger, shortAddress } from '../utils/logger.js';

/**
 * Everything needed to evaluate one position
 */
export interface HealthInput {
  borrowToken: Address;
  /** Full append-only token list of the position (may contain zero-address slots) */
  tokens: readonly Address[];
  /** Address holding the position's collateral */
  holder: Address;
  /** Pool LTV, WAD */
  ltv: bigint;
  totalBorrowAssets: bigint;
  totalBorrowShares: bigint;
  userBorrowShares: bigint;
}

export class HealthEvaluator {
  constructor(
    private readonly tokens: TokenLedger,
    private readonly feeds: PriceFeedRegistry
  ) {}

  /**
   * Query form - never throws on an unhealthy position
   */
  evaluate(input: HealthInput): HealthReport {
    return this.computeHealth(input);
  }

  /**
   * Gate form - throws POSITION_UNHEALTHY with the report attached
   */
  assertHealthy(input: HealthInput, operation: string): HealthReport {
    const report = this.computeHealth(input);
    if (report.isLiquidatable) {
      logger.health.info('Health gate rejected operation', {
        operation,
        holder: shortAddress(input.holder),
        borrowValue: formatUsd(report.borrowValue),
        maxBorrow: formatUsd(report.maxBorrow),
      });
      throw new LendingError('POSITION_UNHEALTHY', `${operation} would leave the position liquidatable`, {
        holder: input.holder,
        borrowValue: report.borrowValue,
        collateralValue: report.collateralValue,
        maxBorrow: report.maxBorrow,
      });
    }
    return report;
  }

  private computeHealth(input: HealthInput): HealthReport {
    const borrowPrice = readNormalizedPrice(this.feeds, input.borrowToken);

    let collateralValue = 0n;
    for (const token of input.tokens) {
      if (isZeroAddress(token)) continue;
      const balance = this.tokens.balanceOf(token, input.holder);
      if (balance === 0n) continue;
      const price = readNormalizedPrice(this.feeds, token);
      collateralValue += tokenValue(balance, price, this.tokens.decimals(token));
    }

    const borrowed =
      input.totalBorrowShares === 0n
        ? 0n
        : (input.userBorrowShares * input.totalBorrowAssets) / input.totalBorrowShares;
    const borrowValue = tokenValue(borrowed, borrowPrice, this.tokens.decimals(input.borrowToken));
    const maxBorrow = (collateralValue * input.ltv) / WAD;

    return {
      isLiquidatable: borrowValue > collateralValue || borrowValue > maxBorrow,
      borrowValue,
      collateralValue,
      maxBorrow,
      borrowed,
    };
  }
}
