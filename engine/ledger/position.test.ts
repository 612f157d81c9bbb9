import { describe, it, expect, beforeEach } from 'vitest';
import { zeroAddress } from 'viem';
import { ACCOUNTS, createDevnet, seedCollateral, seedLiquidity, type ChainDevnet } from '../testutils/index.js';
import type { LendingPool } from '../pool/lending-pool.js';
import type { Position } from './position.js';

const ONE_TKA = 10n ** 18n;

describe('Position', () => {
  let chain: ChainDevnet;
  let pool: LendingPool;
  let position: Position;
  const { alice, bob, stranger } = ACCOUNTS;

  beforeEach(() => {
    chain = createDevnet().mainnet;
    pool = chain.pools.tkaUsdc;
    seedLiquidity(chain, pool, bob, 1_000_000_000n);
    seedCollateral(chain, pool, alice, ONE_TKA);
    position = pool.router.requirePosition(alice);
  });

  describe('token list', () => {
    it('seeds the collateral token after a placeholder slot', () => {
      expect(position.tokenList()).toEqual([zeroAddress, chain.tokens.tka]);
      expect(position.counter).toBe(1);
      expect(position.collateralBalance()).toBe(ONE_TKA);
    });
  });

  describe('swapTokenByPosition', () => {
    it('swaps at the oracle minimum and lists the output token', () => {
      const out = position.swapTokenByPosition(alice, chain.tokens.tka, chain.tokens.usdc, ONE_TKA / 2n, 100n);

      // $1000 less the 0.3% venue fee
      expect(out).toBe(997_000_000n);
      expect(position.balanceOf(chain.tokens.usdc)).toBe(997_000_000n);
      expect(position.collateralBalance()).toBe(ONE_TKA / 2n);
      expect(position.tokenList()).toEqual([zeroAddress, chain.tokens.tka, chain.tokens.usdc]);
      expect(position.counter).toBe(2);
    });

    it('values every listed token in the health report', () => {
      position.swapTokenByPosition(alice, chain.tokens.tka, chain.tokens.usdc, ONE_TKA / 2n, 100n);
      expect(pool.checkLiquidation(alice).collateralValue).toBe(1_997n * 10n ** 18n);
    });

    it('validates before touching the venue', () => {
      const { tka, usdc } = chain.tokens;
      expect(() => position.swapTokenByPosition(stranger, tka, usdc, 1n, 100n)).toThrow('UNAUTHORIZED');
      expect(() => position.swapTokenByPosition(alice, tka, tka, 1n, 100n)).toThrow('SAME_TOKEN');
      expect(() => position.swapTokenByPosition(alice, tka, usdc, 1n, 10_001n)).toThrow('SLIPPAGE_TOO_HIGH');
      expect(() => position.swapTokenByPosition(alice, tka, usdc, 0n, 100n)).toThrow('ZERO_AMOUNT');
      expect(() => position.swapTokenByPosition(alice, tka, usdc, ONE_TKA + 1n, 100n)).toThrow('INSUFFICIENT_BALANCE');
    });

    it('propagates an oracle outage from the estimate', () => {
      chain.feeds.usdc.disable(ACCOUNTS.admin);
      expect(() => position.swapTokenByPosition(alice, chain.tokens.tka, chain.tokens.usdc, ONE_TKA, 100n)).toThrow(
        'ORACLE_UNAVAILABLE'
      );
      expect(position.tokenList()).toEqual([zeroAddress, chain.tokens.tka]);
    });
  });

  describe('repayWithSelectedToken', () => {
    it('pays borrow-token balances straight to the pool', () => {
      pool.borrowDebt(alice, 100_000_000n);
      position.swapTokenByPosition(alice, chain.tokens.tka, chain.tokens.usdc, ONE_TKA / 10n, 100n);
      expect(position.balanceOf(chain.tokens.usdc)).toBe(199_400_000n);

      pool.repayWithSelectedToken(alice, 50_000_000n, {
        fromPosition: { token: chain.tokens.usdc, slippageBps: 100n },
      });

      expect(position.balanceOf(chain.tokens.usdc)).toBe(149_400_000n);
      expect(pool.router.userBorrowShares(alice)).toBe(50_000_000n);
      expect(chain.balanceOf(chain.tokens.usdc, pool.address)).toBe(950_000_000n);
    });

    it('swaps another token through the position and swaps the remainder back', () => {
      pool.borrowDebt(alice, 100_000_000n);

      pool.repayWithSelectedToken(alice, 100_000_000n, {
        fromPosition: { token: chain.tokens.tka, slippageBps: 100n },
      });

      // 1 TKA -> 1994e6 USDC; 100e6 repaid; 1894e6 -> 0.947 TKA less 0.3%
      expect(position.balanceOf(chain.tokens.tka)).toBe(944_159_000_000_000_000n);
      expect(position.balanceOf(chain.tokens.usdc)).toBe(0n);
      expect(pool.router.userBorrowShares(alice)).toBe(0n);
      expect(chain.balanceOf(chain.tokens.usdc, pool.address)).toBe(1_000_000_000n);
    });

    it('lets the liquidator repay with a non-borrow token', () => {
      const before = chain.balanceOf(chain.tokens.usdc, pool.address);
      position.repayWithSelectedToken(chain.factory.liquidatorAddress(), 100_000_000n, chain.tokens.tka, 100n);
      expect(chain.balanceOf(chain.tokens.usdc, pool.address)).toBe(before + 100_000_000n);
    });

    it('rolls back when the swap returns too little', () => {
      expect(() =>
        position.repayWithSelectedToken(chain.factory.liquidatorAddress(), 5_000_000_000n, chain.tokens.tka, 100n)
      ).toThrow('INSUFFICIENT_SWAP_OUTPUT');
      expect(position.collateralBalance()).toBe(ONE_TKA);
      expect(position.balanceOf(chain.tokens.usdc)).toBe(0n);
      expect(position.tokenList()).toEqual([zeroAddress, chain.tokens.tka]);
    });

    it('is closed to everyone but the pool and the liquidator', () => {
      expect(() => position.repayWithSelectedToken(alice, 1n, chain.tokens.tka, 100n)).toThrow('UNAUTHORIZED');
      expect(() => position.repayWithSelectedToken(stranger, 1n, chain.tokens.tka, 100n)).toThrow('UNAUTHORIZED');
    });
  });

  describe('withdrawCollateral', () => {
    it('is closed to everyone but the pool and the liquidator', () => {
      expect(() => position.withdrawCollateral(alice, 1n, alice, false)).toThrow('UNAUTHORIZED');
    });

    it('refuses to unwrap a non-native collateral', () => {
      expect(() => position.withdrawCollateral(pool.address, 1n, alice, true)).toThrow('NOT_NATIVE_POOL');
      expect(position.collateralBalance()).toBe(ONE_TKA);
    });
  });
});
