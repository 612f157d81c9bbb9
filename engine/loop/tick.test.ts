import { describe, it, expect, beforeEach } from 'vitest';
import type { Address } from 'viem';
import { tick, type TickContext } from './tick.js';
import type { EngineConfig } from '../config/env.js';
import { ACCOUNTS, createDevnet, seedCollateral, seedLiquidity, type ChainDevnet } from '../testutils/index.js';
import type { LendingPool } from '../pool/lending-pool.js';

const COLLATERAL = 50_000_000_000_000_000n; // 0.05 TKA

function engineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    chainId: 1,
    pollIntervalMs: 1_000,
    strategy: 'dex',
    incentiveBps: 500n,
    maxLiquidationsPerTick: 10,
    ...overrides,
  };
}

describe('tick', () => {
  let chain: ChainDevnet;
  let pool: LendingPool;
  const { admin, alice, bob, carol, keeper } = ACCOUNTS;

  const key = (user: Address): string => `${pool.address}:${user}`;
  const context = (overrides: Partial<EngineConfig> = {}): TickContext => ({
    factory: chain.factory,
    config: engineConfig(overrides),
    keeper,
  });

  function borrow(user: Address, amount: bigint): void {
    seedCollateral(chain, pool, user, COLLATERAL);
    pool.borrowDebt(user, amount);
  }

  beforeEach(() => {
    chain = createDevnet().mainnet;
    pool = chain.pools.tkaUsdc;
    seedLiquidity(chain, pool, bob, 1_000_000_000n);
  });

  it('liquidates unhealthy borrowers and skips healthy ones', () => {
    borrow(alice, 80_000_000n);
    borrow(carol, 40_000_000n);
    chain.feeds.tka.updateAnswer(admin, 1900_00000000n);

    const result = tick(context());

    expect(result.poolsScanned).toBe(3);
    expect(result.borrowersChecked).toBe(2);
    expect(result.liquidationsAttempted).toBe(1);
    expect(result.liquidationsSucceeded).toBe(1);
    expect(result.usersSkipped).toBe(1);
    expect(result.skipReasons.get(key(carol))).toBe('position_healthy');
    expect(result.events).toEqual([
      {
        borrower: alice,
        liquidator: keeper,
        collateralSeized: 26_250_000_000_000_000n,
        debtRepaid: 47_500_000n,
        strategy: 'dex',
      },
    ]);
    expect(result.errors.size).toBe(0);
  });

  it('stops at the per-tick limit', () => {
    borrow(alice, 80_000_000n);
    borrow(carol, 80_000_000n);
    chain.feeds.tka.updateAnswer(admin, 1900_00000000n);

    const result = tick(context({ maxLiquidationsPerTick: 1 }));

    expect(result.liquidationsSucceeded).toBe(1);
    expect(result.events[0]?.borrower).toBe(alice);
    expect(result.skipReasons.get(key(carol))).toBe('tick_limit_reached');
    expect(pool.checkLiquidation(carol).isLiquidatable).toBe(true);
  });

  it('records failures and keeps sweeping', () => {
    borrow(alice, 80_000_000n);
    chain.feeds.tka.updateAnswer(admin, 1900_00000000n);
    const reserves = chain.balanceOf(chain.tokens.usdc, chain.factory.swapVenue.address);
    chain.runtime.tokens.burn(chain.tokens.usdc, chain.factory.swapVenue.address, reserves);

    const result = tick(context());

    expect(result.liquidationsAttempted).toBe(1);
    expect(result.liquidationsSucceeded).toBe(0);
    expect(result.errors.get(key(alice))).toMatch(/^SWAP_FAILED: venue reserves 0 < /);
    expect(pool.router.userBorrowShares(alice)).toBe(80_000_000n);
  });

  describe('mev strategy', () => {
    beforeEach(() => {
      borrow(alice, 80_000_000n);
      chain.feeds.tka.updateAnswer(admin, 1900_00000000n);
    });

    it('skips when the keeper cannot fund the repayment', () => {
      chain.fund(chain.tokens.usdc, keeper, 39_999_999n);

      const result = tick(context({ strategy: 'mev' }));

      expect(result.liquidationsAttempted).toBe(1);
      expect(result.liquidationsSucceeded).toBe(0);
      expect(result.skipReasons.get(key(alice))).toBe('insufficient_keeper_balance');
      expect(chain.balanceOf(chain.tokens.usdc, keeper)).toBe(39_999_999n);
    });

    it('leaves no allowance behind when the liquidation fails', () => {
      chain.fund(chain.tokens.usdc, keeper, 100_000_000n);

      const result = tick(context({ strategy: 'mev', incentiveBps: 5_001n }));

      expect(result.errors.get(key(alice))).toMatch(/^INCENTIVE_TOO_HIGH: /);
      expect(chain.runtime.tokens.allowance(chain.tokens.usdc, keeper, chain.factory.liquidatorAddress())).toBe(0n);
      expect(chain.balanceOf(chain.tokens.usdc, keeper)).toBe(100_000_000n);
    });

    it('repays half the debt from the keeper and takes the collateral', () => {
      chain.fund(chain.tokens.usdc, keeper, 100_000_000n);

      const result = tick(context({ strategy: 'mev' }));

      expect(result.events).toEqual([
        {
          borrower: alice,
          liquidator: keeper,
          collateralSeized: 22_105_263_157_894_736n,
          debtRepaid: 40_000_000n,
          strategy: 'mev',
        },
      ]);
      expect(chain.balanceOf(chain.tokens.usdc, keeper)).toBe(60_000_000n);
      expect(chain.balanceOf(chain.tokens.tka, keeper)).toBe(22_105_263_157_894_736n);
    });
  });
});
