/**
 * Keeper Tick - Single Liquidation Sweep
 *
 * ============================================================
 * WHAT THIS MODULE DOES:
 * ============================================================
 * - Executes ONE sweep over every pool of a factory
 * - Checks every borrower with checkLiquidation()
 * - Liquidates unhealthy borrowers with the configured strategy
 * - Stops liquidating once maxLiquidationsPerTick is reached
 *
 * ============================================================
 * WHAT THIS MODULE DOES NOT DO:
 * ============================================================
 * - Does NOT manage timing or sleep
 * - Does NOT run in a loop
 * - Does NOT decide health itself (the pool's report is final)
 *
 * A failed liquidation is recorded against the borrower and the
 * sweep moves on; the pool's atomic() has already rolled it back.
 * ============================================================
 */

import type { Address } from 'viem';
import type { EngineConfig } from '../config/env.js';
import type { LiquidationEvent } from '../config/types.js';
import type { ProtocolFactory } from '../pool/factory.js';
import type { LendingPool } from '../pool/lending-pool.js';
import { LIQUIDATION } from '../config/defaults.js';
import { applyBps, formatUsd } from '../utils/units.js';
import { errorMessage } from '../utils/errors.js';
import { logger, shortAddress } from '../utils/logger.js';

// ============================================================
// TYPES
// ============================================================

/**
 * Context required to run a tick
 */
export interface TickContext {
  /** Factory whose pools are swept */
  factory: ProtocolFactory;
  /** Strategy, incentive and per-tick limit */
  config: EngineConfig;
  /** Keeper account (initiator for DEX, payer for MEV) */
  keeper: Address;
}

/**
 * Result of a tick execution
 */
export interface TickResult {
  poolsScanned: number;
  borrowersChecked: number;
  liquidationsAttempted: number;
  liquidationsSucceeded: number;
  usersSkipped: number;
  /** Liquidations executed this tick */
  events: LiquidationEvent[];
  /** Errors encountered (pool:user -> error message) */
  errors: Map<string, string>;
  /** Skip reasons (pool:user -> reason) */
  skipReasons: Map<string, SkipReason>;
}

/**
 * Reason codes for skipping a borrower
 */
export type SkipReason = 'position_healthy' | 'tick_limit_reached' | 'insufficient_keeper_balance';

function borrowerKey(pool: LendingPool, user: Address): string {
  return `${pool.address}:${user}`;
}

// ============================================================
// LIQUIDATE ONE BORROWER
// ============================================================

/**
 * MEV liquidations are paid by the keeper: repay the largest amount the
 * half-debt cap allows, provided the keeper holds it
 */
function liquidateWithKeeperFunds(ctx: TickContext, pool: LendingPool, user: Address): LiquidationEvent | SkipReason {
  const { factory, keeper, config } = ctx;
  const { tokens } = factory.runtime;

  pool.router.accrueInterest();
  const repayAmount = applyBps(pool.router.borrowAssetsOf(user), LIQUIDATION.closeFactorBps);
  if (tokens.balanceOf(pool.borrowToken, keeper) < repayAmount) {
    return 'insufficient_keeper_balance';
  }

  return factory.runtime.atomic(() => {
    tokens.approve(pool.borrowToken, keeper, factory.liquidatorAddress(), repayAmount);
    return pool.liquidateByMEV(keeper, user, repayAmount, config.incentiveBps);
  });
}

function liquidate(ctx: TickContext, pool: LendingPool, user: Address): LiquidationEvent | SkipReason {
  if (ctx.config.strategy === 'mev') {
    return liquidateWithKeeperFunds(ctx, pool, user);
  }
  return pool.liquidateByDEX(ctx.keeper, user, ctx.config.incentiveBps);
}

// ============================================================
// MAIN TICK FUNCTION
// ============================================================

/**
 * Execute one keeper sweep
 */
export function tick(ctx: TickContext): TickResult {
  const { factory, config } = ctx;
  const result: TickResult = {
    poolsScanned: 0,
    borrowersChecked: 0,
    liquidationsAttempted: 0,
    liquidationsSucceeded: 0,
    usersSkipped: 0,
    events: [],
    errors: new Map(),
    skipReasons: new Map(),
  };

  const skip = (key: string, reason: SkipReason): void => {
    result.usersSkipped++;
    result.skipReasons.set(key, reason);
  };

  for (const pool of factory.pools()) {
    result.poolsScanned++;

    for (const user of pool.router.borrowers()) {
      result.borrowersChecked++;
      const key = borrowerKey(pool, user);

      const report = pool.checkLiquidation(user);
      if (!report.isLiquidatable) {
        skip(key, 'position_healthy');
        continue;
      }
      if (result.liquidationsAttempted >= config.maxLiquidationsPerTick) {
        skip(key, 'tick_limit_reached');
        continue;
      }

      logger.keeper.info('Liquidatable borrower', {
        pool: shortAddress(pool.address),
        user: shortAddress(user),
        borrowValue: formatUsd(report.borrowValue),
        maxBorrow: formatUsd(report.maxBorrow),
        strategy: config.strategy,
      });

      result.liquidationsAttempted++;
      try {
        const outcome = liquidate(ctx, pool, user);
        if (typeof outcome === 'string') {
          skip(key, outcome);
          continue;
        }
        result.liquidationsSucceeded++;
        result.events.push(outcome);
      } catch (error) {
        result.errors.set(key, errorMessage(error));
        logger.keeper.error('Liquidation failed', { pool: shortAddress(pool.address), user: shortAddress(user), error: errorMessage(error) });
      }
    }
  }

  logger.keeper.info('Tick complete', {
    pools: result.poolsScanned,
    checked: result.borrowersChecked,
    liquidated: result.liquidationsSucceeded,
    skipped: result.usersSkipped,
    errors: result.errors.size,
  });

  return result;
}
