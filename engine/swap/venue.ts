/**
 * Swap venues
 *
 * ============================================================
 * WHAT THIS MODULE DOES:
 * ============================================================
 * - Defines the single-hop exact-input swap primitive the engine
 *   consumes (Uniswap V3 exactInputSingle shape)
 * - Provides OracleSwapVenue: an in-process venue quoting at oracle
 *   prices minus the fee tier, paying from its own reserves
 *
 * ============================================================
 * WHAT THIS MODULE DOES NOT DO:
 * ============================================================
 * - Does NOT route across pools (single hop only)
 * - Does NOT model price impact
 * ============================================================
 */

import type { Address } from 'viem';
import type { ChainRuntime } from '../runtime/chain.js';
import { readNormalizedPrice, type PriceFeedRegistry } from '../oracle/feeds.js';
import { sameAddress } from '../runtime/access.js';
import { LendingError, ensure } from '../utils/errors.js';
import { tokenValue, valueToTokenAmount } from '../utils/units.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('SwapVenue');

/** Fee tiers are expressed in hundredths of a basis point */
export const FEE_DENOMINATOR = 1_000_000n;

export interface ExactInputSingleParams {
  tokenIn: Address;
  tokenOut: Address;
  fee: number;
  recipient: Address;
  amountIn: bigint;
  amountOutMinimum: bigint;
}

export interface SwapVenue {
  readonly address: Address;
  /**
   * Pull amountIn of tokenIn from caller (caller must have approved the
   * venue) and pay at least amountOutMinimum of tokenOut to recipient
   *
   * @throws LendingError SWAP_FAILED
   */
  swapExactInputSingle(caller: Address, params: ExactInputSingleParams): bigint;
}

/**
 * In-process venue priced by the oracle registry
 */
export class OracleSwapVenue implements SwapVenue {
  readonly address: Address;

  constructor(
    private readonly runtime: ChainRuntime,
    private readonly feeds: PriceFeedRegistry,
    address: Address
  ) {
    this.address = address;
  }

  /**
   * Output for amountIn at current oracle prices, after the fee tier
   */
  quote(tokenIn: Address, tokenOut: Address, fee: number, amountIn: bigint): bigint {
    const { tokens } = this.runtime;
    const value = tokenValue(amountIn, readNormalizedPrice(this.feeds, tokenIn), tokens.decimals(tokenIn));
    const gross = valueToTokenAmount(value, readNormalizedPrice(this.feeds, tokenOut), tokens.decimals(tokenOut));
    return (gross * (FEE_DENOMINATOR - BigInt(fee))) / FEE_DENOMINATOR;
  }

  swapExactInputSingle(caller: Address, params: ExactInputSingleParams): bigint {
    const { tokenIn, tokenOut, fee, recipient, amountIn, amountOutMinimum } = params;
    ensure(amountIn > 0n, 'ZERO_AMOUNT', 'amountIn must be > 0');
    ensure(!sameAddress(tokenIn, tokenOut), 'SAME_TOKEN', 'tokenIn and tokenOut must differ');
    ensure(fee >= 0 && BigInt(fee) < FEE_DENOMINATOR, 'SWAP_FAILED', `invalid fee tier ${fee}`);

    let amountOut: bigint;
    try {
      amountOut = this.quote(tokenIn, tokenOut, fee, amountIn);
    } catch (error) {
      throw new LendingError('SWAP_FAILED', 'venue could not price the swap', { tokenIn, tokenOut }, { cause: error });
    }

    if (amountOut < amountOutMinimum) {
      throw new LendingError('SWAP_FAILED', `too little received: ${amountOut} < ${amountOutMinimum}`, {
        tokenIn,
        tokenOut,
        amountOut,
        amountOutMinimum,
      });
    }

    const reserves = this.runtime.tokens.balanceOf(tokenOut, this.address);
    if (reserves < amountOut) {
      throw new LendingError('SWAP_FAILED', `venue reserves ${reserves} < ${amountOut}`, { tokenOut });
    }

    this.runtime.tokens.transferFrom(tokenIn, this.address, caller, this.address, amountIn);
    this.runtime.tokens.transfer(tokenOut, this.address, recipient, amountOut);

    log.debug('Swap executed', { tokenIn, tokenOut, amountIn, amountOut, recipient });
    return amountOut;
  }
}
