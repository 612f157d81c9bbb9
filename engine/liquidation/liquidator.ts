/**
 * Liquidator - DEX-swap and MEV liquidation strategies
 *
 * ============================================================
 * WHAT THIS MODULE DOES:
 * ============================================================
 * - Checks eligibility with the pool's health report
 * - DEX: seizes collateral, swaps it to the borrow token, repays,
 *   sends swap surplus to the treasury
 * - MEV: takes the repayment from an external buyer and hands
 *   them the collateral directly (no swap)
 * - Both end in router.liquidatePosition()
 *
 * ============================================================
 * CAPS:
 * ============================================================
 * - incentive <= 50%
 * - DEX: debt closed per call <= 50% of collateral value
 * - MEV: repayAmount <= 50% of the user's debt
 *
 * Only a router's own lending pool may start a liquidation.
 * ============================================================
 */

import type { Address } from 'viem';
import type { HealthReport, LiquidationEvent } from '../config/types.js';
import type { PoolRouter } from '../ledger/router.js';
import type { ProtocolServices } from '../ledger/services.js';
import { DEFAULT_SWAP_FEE_TIER, LIQUIDATION, NATIVE_TOKEN } from '../config/defaults.js';
import { readNormalizedPrice } from '../oracle/feeds.js';
import { sameAddress } from '../runtime/access.js';
import { decimalsOnlyEstimate, estimateSwapOutput } from '../swap/estimate.js';
import { LendingError, ensure, isLendingError } from '../utils/errors.js';
import { BPS, applyBps, formatUsd, minBigInt, tokenValue, valueToTokenAmount } from '../utils/units.js';
import { logger, shortAddress } from '../utils/logger.js';

export interface DexLiquidationParams {
  /** Account that asked the pool to liquidate */
  initiator: Address;
  borrower: Address;
  incentiveBps: bigint;
}

export interface MevLiquidationParams {
  /** External buyer paying the debt and receiving collateral */
  beneficiary: Address;
  borrower: Address;
  repayAmount: bigint;
  incentiveBps: bigint;
  /** Native currency attached (native pools only) */
  value?: bigint;
}

export class Liquidator {
  readonly address: Address;

  private readonly services: ProtocolServices;

  constructor(services: ProtocolServices, address: Address) {
    this.services = services;
    this.address = address;
  }

  // ============================================================
  // DEX STRATEGY
  // ============================================================

  liquidateByDEX(caller: Address, router: PoolRouter, params: DexLiquidationParams): LiquidationEvent {
    const { initiator, borrower, incentiveBps } = params;
    this.requirePool(caller, router);
    this.requireIncentive(incentiveBps);
    const { runtime } = this.services;

    return runtime.atomic(() => {
      router.accrueInterest();
      const position = router.requirePosition(borrower);
      const report = this.requireLiquidatable(router, borrower);
      const { tokens } = runtime;
      const collateralToken = router.collateralToken;
      const borrowToken = router.borrowToken;

      // STEP 1: cap debt at half the collateral value
      const debtValue = minBigInt(report.borrowValue, report.collateralValue / 2n);

      // STEP 2: collateral to seize (incentive included, capped at custody)
      const collateralPrice = readNormalizedPrice(this.services, collateralToken);
      const borrowPrice = readNormalizedPrice(this.services, borrowToken);
      const seizeValue = applyBps(debtValue, BPS + incentiveBps);
      const collateralToSeize = minBigInt(
        valueToTokenAmount(seizeValue, collateralPrice, tokens.decimals(collateralToken)),
        position.collateralBalance()
      );
      const debtToLiquidate = minBigInt(
        valueToTokenAmount(debtValue, borrowPrice, tokens.decimals(borrowToken)),
        report.borrowed
      );
      ensure(collateralToSeize > 0n && debtToLiquidate > 0n, 'INSUFFICIENT_COLLATERAL', 'nothing left to seize', {
        borrower,
      });

      // STEP 3: seize into our custody
      position.withdrawCollateral(this.address, collateralToSeize, this.address, false);

      // STEP 4: swap with 10% slippage against the oracle estimate
      const amountOutMinimum = applyBps(
        this.expectedOutput(collateralToken, borrowToken, collateralToSeize),
        BPS - LIQUIDATION.dexSlippageBps
      );
      tokens.approve(collateralToken, this.address, this.services.swapVenue.address, collateralToSeize);
      const amountOut = this.swap(collateralToken, borrowToken, collateralToSeize, amountOutMinimum);

      // STEP 5: repay, surplus to treasury
      const debtRepaid = minBigInt(amountOut, debtToLiquidate);
      this.payPool(router, borrowToken, debtRepaid);
      const surplus = amountOut - debtRepaid;
      if (surplus > 0n) {
        this.services.treasury.collect(this.address, borrowToken, surplus);
      }
      router.liquidatePosition(this.address, borrower, debtRepaid);

      logger.liquidator.info('DEX liquidation', {
        borrower: shortAddress(borrower),
        debtValue: formatUsd(debtValue),
        collateralSeized: collateralToSeize,
        amountOut,
        debtRepaid,
        surplus,
      });

      return {
        borrower,
        liquidator: initiator,
        collateralSeized: collateralToSeize,
        debtRepaid,
        strategy: 'dex',
      };
    });
  }

  // ============================================================
  // MEV STRATEGY
  // ============================================================

  liquidateByMEV(caller: Address, router: PoolRouter, params: MevLiquidationParams): LiquidationEvent {
    const { beneficiary, borrower, repayAmount, incentiveBps, value } = params;
    this.requirePool(caller, router);
    this.requireIncentive(incentiveBps);
    ensure(repayAmount > 0n, 'ZERO_AMOUNT', 'repayAmount must be > 0');
    const { runtime } = this.services;

    return runtime.atomic(() => {
      router.accrueInterest();
      const position = router.requirePosition(borrower);
      const report = this.requireLiquidatable(router, borrower);
      const { tokens } = runtime;
      const collateralToken = router.collateralToken;
      const borrowToken = router.borrowToken;

      // STEP 1: half-debt cap, from shares
      const maxRepay = applyBps(router.borrowAssetsOf(borrower), LIQUIDATION.closeFactorBps);
      ensure(repayAmount <= maxRepay, 'REPAY_EXCEEDS_HALF_DEBT', `repay ${repayAmount} > max ${maxRepay}`, {
        borrower,
        maxRepay,
      });

      // STEP 2: collateral owed to the buyer
      const repayValue = tokenValue(
        repayAmount,
        readNormalizedPrice(this.services, borrowToken),
        tokens.decimals(borrowToken)
      );
      const collateralToGive = minBigInt(
        valueToTokenAmount(
          applyBps(repayValue, BPS + incentiveBps),
          readNormalizedPrice(this.services, collateralToken),
          tokens.decimals(collateralToken)
        ),
        position.collateralBalance()
      );
      ensure(collateralToGive > 0n, 'INSUFFICIENT_COLLATERAL', 'no collateral left to give', { borrower });

      // STEP 3: collect the repayment
      if (value !== undefined) {
        ensure(tokens.isWrappedNative(borrowToken), 'NOT_NATIVE_POOL', 'value sent to a non-native pool');
        ensure(value >= repayAmount, 'INSUFFICIENT_VALUE', `value ${value} < repay ${repayAmount}`);
        tokens.transfer(NATIVE_TOKEN, beneficiary, this.address, value);
        tokens.wrap(this.address, repayAmount);
        const refund = value - repayAmount;
        if (refund > 0n) {
          tokens.transfer(NATIVE_TOKEN, this.address, beneficiary, refund);
        }
      } else {
        tokens.transferFrom(borrowToken, this.address, beneficiary, this.address, repayAmount);
      }

      // STEP 4: collateral straight to the buyer
      position.withdrawCollateral(this.address, collateralToGive, beneficiary, false);

      // STEP 5: forward repayment and write the debt down
      this.payPool(router, borrowToken, repayAmount);
      router.liquidatePosition(this.address, borrower, repayAmount);

      logger.liquidator.info('MEV liquidation', {
        borrower: shortAddress(borrower),
        beneficiary: shortAddress(beneficiary),
        repayAmount,
        collateralGiven: collateralToGive,
        borrowValue: formatUsd(report.borrowValue),
      });

      return {
        borrower,
        liquidator: beneficiary,
        collateralSeized: collateralToGive,
        debtRepaid: repayAmount,
        strategy: 'mev',
      };
    });
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  /**
   * Oracle estimate, falling back to a decimals-only ratio only when the
   * oracle itself is missing or down
   */
  private expectedOutput(tokenIn: Address, tokenOut: Address, amountIn: bigint): bigint {
    const { tokens } = this.services.runtime;
    const estimate = estimateSwapOutput(tokens, this.services, tokenIn, tokenOut, amountIn);
    if (estimate.ok) return estimate.value;

    const fallback = decimalsOnlyEstimate(tokens, tokenIn, tokenOut, amountIn);
    logger.liquidator.warn('Oracle estimate failed, using decimals-only estimate', {
      reason: estimate.error.kind,
      error: estimate.error.cause.message,
      fallback,
    });
    return fallback;
  }

  private swap(tokenIn: Address, tokenOut: Address, amountIn: bigint, amountOutMinimum: bigint): bigint {
    try {
      return this.services.swapVenue.swapExactInputSingle(this.address, {
        tokenIn,
        tokenOut,
        fee: DEFAULT_SWAP_FEE_TIER,
        recipient: this.address,
        amountIn,
        amountOutMinimum,
      });
    } catch (error) {
      if (isLendingError(error, 'SWAP_FAILED')) throw error;
      throw new LendingError('SWAP_FAILED', 'liquidation swap failed', { tokenIn, tokenOut }, { cause: error });
    }
  }

  private payPool(router: PoolRouter, token: Address, amount: bigint): void {
    const pool = router.lendingPoolAddress();
    if (pool === undefined) {
      throw new LendingError('LENDING_POOL_NOT_SET', 'router has no lending pool');
    }
    this.services.runtime.tokens.transfer(token, this.address, pool, amount);
  }

  private requireLiquidatable(router: PoolRouter, borrower: Address): HealthReport {
    const report = router.healthOf(borrower);
    if (!report.isLiquidatable) {
      throw new LendingError('NOT_LIQUIDATABLE', `${borrower} is healthy`, {
        borrower,
        borrowValue: report.borrowValue,
        maxBorrow: report.maxBorrow,
      });
    }
    return report;
  }

  private requireIncentive(incentiveBps: bigint): void {
    ensure(
      incentiveBps >= 0n && incentiveBps <= LIQUIDATION.maxIncentiveBps,
      'INCENTIVE_TOO_HIGH',
      `incentive ${incentiveBps} > ${LIQUIDATION.maxIncentiveBps}`
    );
  }

  private requirePool(caller: Address, router: PoolRouter): void {
    const pool = router.lendingPoolAddress();
    ensure(pool !== undefined && sameAddress(caller, pool), 'UNAUTHORIZED', 'liquidations go through the lending pool', {
      caller,
    });
  }
}
