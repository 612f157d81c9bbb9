import { describe, it, expect, beforeEach } from 'vitest';
import { ACCOUNTS, createDevnet, seedCollateral, seedLiquidity, type ChainDevnet } from '../testutils/index.js';
import { NATIVE_TOKEN } from '../config/defaults.js';

const ONE = 10n ** 18n;

describe('LendingPool', () => {
  let chain: ChainDevnet;
  const { alice, bob, carol } = ACCOUNTS;

  beforeEach(() => {
    chain = createDevnet().mainnet;
  });

  describe('full lifecycle', () => {
    it('supplies, borrows, repays and withdraws back to zero', () => {
      const pool = chain.pools.tkaUsdc;
      const { tka, usdc } = chain.tokens;

      expect(seedLiquidity(chain, pool, bob, 1_000_000_000n)).toBe(1_000_000_000n);
      seedCollateral(chain, pool, alice, ONE);
      expect(chain.balanceOf(tka, pool.router.requirePosition(alice).address)).toBe(ONE);

      pool.borrowDebt(alice, 500_000_000n);
      expect(chain.balanceOf(usdc, alice)).toBe(499_500_000n);

      chain.fund(usdc, alice, 500_000n);
      chain.approve(usdc, alice, pool.address, 500_000_000n);
      expect(pool.repayWithSelectedToken(alice, 500_000_000n).borrowAmount).toBe(500_000_000n);

      pool.withdrawCollateral(alice, ONE);
      expect(pool.withdrawLiquidity(bob, 1_000_000_000n)).toBe(1_000_000_000n);

      expect(chain.balanceOf(tka, alice)).toBe(ONE);
      expect(chain.balanceOf(usdc, alice)).toBe(0n);
      expect(chain.balanceOf(usdc, bob)).toBe(1_000_000_000n);
      expect(chain.balanceOf(usdc, pool.address)).toBe(0n);
      expect(pool.router.snapshot()).toMatchObject({
        totalSupplyAssets: 0n,
        totalSupplyShares: 0n,
        totalBorrowAssets: 0n,
        totalBorrowShares: 0n,
      });
    });

    it('borrows twice and repays twice back to zero debt', () => {
      const pool = chain.pools.tkaUsdc;
      const { usdc } = chain.tokens;
      seedLiquidity(chain, pool, bob, 1_000_000_000n);
      seedCollateral(chain, pool, alice, 1000n * ONE);

      pool.borrowDebt(alice, 10_000_000n);
      pool.borrowDebt(alice, 10_000_000n);
      expect(pool.router.userBorrowShares(alice)).toBe(20_000_000n);

      // both fees of 10_000
      chain.fund(usdc, alice, 20_000n);
      chain.approve(usdc, alice, pool.address, 20_000_000n);
      expect(pool.repayWithSelectedToken(alice, 10_000_000n).borrowAmount).toBe(10_000_000n);
      expect(pool.repayWithSelectedToken(alice, 10_000_000n).borrowAmount).toBe(10_000_000n);

      expect(pool.router.userBorrowShares(alice)).toBe(0n);
      expect(pool.router.snapshot()).toMatchObject({ totalBorrowAssets: 0n, totalBorrowShares: 0n });
      expect(chain.balanceOf(usdc, alice)).toBe(0n);
    });

    it('creates the position on first collateral supply', () => {
      const pool = chain.pools.tkaUsdc;
      expect(pool.router.positionOf(alice)).toBeUndefined();
      seedCollateral(chain, pool, alice, 1n);
      expect(pool.router.positionOf(alice)?.owner).toBe(alice);
    });

    it('rejects zero amounts before moving tokens', () => {
      const pool = chain.pools.tkaUsdc;
      expect(() => pool.supplyLiquidity(bob, 0n)).toThrow('ZERO_AMOUNT');
      expect(() => pool.supplyCollateral(alice, 0n)).toThrow('ZERO_AMOUNT');
      expect(pool.router.positionOf(alice)).toBeUndefined();
    });
  });

  describe('native collateral', () => {
    it('wraps attached value into the position and refunds the excess', () => {
      const pool = chain.pools.wethUsdc;
      chain.fundNative(alice, 2n * ONE);

      pool.supplyCollateral(alice, ONE, 1_500_000_000_000_000_000n);

      const position = pool.router.requirePosition(alice);
      expect(chain.balanceOf(chain.tokens.weth, position.address)).toBe(ONE);
      expect(chain.balanceOf(NATIVE_TOKEN, alice)).toBe(ONE);
      expect(chain.balanceOf(NATIVE_TOKEN, pool.address)).toBe(0n);
      expect(pool.router.userCollateral(alice)).toBe(ONE);
    });

    it('unwraps on withdrawal when asked', () => {
      const pool = chain.pools.wethUsdc;
      chain.fundNative(alice, ONE);
      pool.supplyCollateral(alice, ONE, ONE);

      pool.withdrawCollateral(alice, 400_000_000_000_000_000n, true);

      expect(chain.balanceOf(NATIVE_TOKEN, alice)).toBe(400_000_000_000_000_000n);
      expect(chain.balanceOf(chain.tokens.weth, alice)).toBe(0n);
      expect(pool.router.userCollateral(alice)).toBe(600_000_000_000_000_000n);
      expect(pool.router.requirePosition(alice).collateralBalance()).toBe(600_000_000_000_000_000n);
    });

    it('refuses value on ERC-20 pools and value short of the amount', () => {
      chain.fundNative(alice, ONE);
      expect(() => chain.pools.tkaUsdc.supplyCollateral(alice, ONE, ONE)).toThrow('NOT_NATIVE_POOL');
      expect(() => chain.pools.wethUsdc.supplyCollateral(alice, ONE, ONE - 1n)).toThrow('INSUFFICIENT_VALUE');
      expect(chain.balanceOf(NATIVE_TOKEN, alice)).toBe(ONE);
    });
  });

  describe('native liquidity', () => {
    it('supplies native currency and withdraws it unwrapped', () => {
      const pool = chain.pools.usdcWeth;
      chain.fundNative(carol, 5n * ONE);

      expect(pool.supplyLiquidity(carol, 5n * ONE, 5n * ONE)).toBe(5n * ONE);
      expect(chain.balanceOf(chain.tokens.weth, pool.address)).toBe(5n * ONE);

      expect(pool.withdrawLiquidity(carol, 2n * ONE, true)).toBe(2n * ONE);
      expect(chain.balanceOf(NATIVE_TOKEN, carol)).toBe(2n * ONE);
      expect(chain.balanceOf(chain.tokens.weth, pool.address)).toBe(3n * ONE);
    });

    it('takes a native repayment', () => {
      const pool = chain.pools.usdcWeth;
      seedLiquidity(chain, pool, bob, 10n * ONE);
      seedCollateral(chain, pool, alice, 3_000_000_000n);
      pool.borrowDebt(alice, ONE);
      chain.fundNative(alice, 2n * ONE);

      pool.repayWithSelectedToken(alice, ONE, { value: 2n * ONE });

      expect(pool.router.userBorrowShares(alice)).toBe(0n);
      expect(chain.balanceOf(NATIVE_TOKEN, alice)).toBe(ONE);
      expect(chain.balanceOf(chain.tokens.weth, pool.address)).toBe(10n * ONE);
    });

    it('refuses attached value on a repayment from the position', () => {
      const pool = chain.pools.usdcWeth;
      seedLiquidity(chain, pool, bob, 10n * ONE);
      seedCollateral(chain, pool, alice, 3_000_000_000n);
      pool.borrowDebt(alice, ONE);
      chain.fundNative(alice, ONE);

      expect(() =>
        pool.repayWithSelectedToken(alice, ONE / 100n, {
          fromPosition: { token: chain.tokens.usdc, slippageBps: 100n },
          value: ONE,
        })
      ).toThrow('UNEXPECTED_VALUE');
      expect(pool.router.userBorrowShares(alice)).toBe(ONE);
      expect(chain.balanceOf(NATIVE_TOKEN, alice)).toBe(ONE);
      expect(pool.router.requirePosition(alice).collateralBalance()).toBe(3_000_000_000n);
    });

    it('refuses to unwrap an ERC-20 pool token', () => {
      const pool = chain.pools.tkaUsdc;
      seedLiquidity(chain, pool, bob, 100n);
      expect(() => pool.withdrawLiquidity(bob, 100n, true)).toThrow('NOT_NATIVE_POOL');
      expect(pool.router.userSupplyShares(bob)).toBe(100n);
    });
  });
});
