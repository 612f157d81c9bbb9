import { describe, it, expect } from 'vitest';
import { getContractAddress, type Address } from 'viem';
import { ChainRuntime, ManualClock, type StateHolder } from './chain.js';

const DEPLOYER: Address = '0x00000000000000000000000000000000000000aa';
const USDC: Address = '0x0000000000000000000000000000000000001002';
const ALICE: Address = '0x000000000000000000000000000000000000a11c';

class Counter implements StateHolder<number> {
  value = 0;

  captureState(): number {
    return this.value;
  }

  restoreState(state: number): void {
    this.value = state;
  }
}

class CountingHolder extends Counter {
  captures = 0;

  override captureState(): number {
    this.captures++;
    return super.captureState();
  }
}

function setup(): { runtime: ChainRuntime; counter: Counter } {
  const runtime = new ChainRuntime({ chainId: 1, clock: new ManualClock(100n) });
  runtime.tokens.registerToken({ address: USDC, symbol: 'USDC', decimals: 6 });
  const counter = new Counter();
  runtime.track(counter);
  return { runtime, counter };
}

describe('ChainRuntime', () => {
  it('allocates CREATE-style addresses per deployer nonce', () => {
    const { runtime } = setup();
    expect(runtime.deploy(DEPLOYER, 'first')).toBe(getContractAddress({ from: DEPLOYER, nonce: 0n }));
    expect(runtime.deploy(DEPLOYER, 'second')).toBe(getContractAddress({ from: DEPLOYER, nonce: 1n }));
  });

  it('reads time from its clock', () => {
    const clock = new ManualClock(500n);
    const runtime = new ChainRuntime({ chainId: 8453, clock });
    clock.advance(25n);
    expect(runtime.now()).toBe(525n);
    clock.set(10n);
    expect(runtime.now()).toBe(10n);
  });

  it('rejects unsupported chains', () => {
    expect(() => new ChainRuntime({ chainId: 5 })).toThrow('UNSUPPORTED_CHAIN');
  });
});

describe('atomic', () => {
  it('commits every write when fn returns', () => {
    const { runtime, counter } = setup();
    const result = runtime.atomic(() => {
      counter.value = 3;
      runtime.tokens.mint(USDC, ALICE, 10n);
      return 'done';
    });
    expect(result).toBe('done');
    expect(counter.value).toBe(3);
    expect(runtime.tokens.balanceOf(USDC, ALICE)).toBe(10n);
  });

  it('restores every tracked holder when fn throws', () => {
    const { runtime, counter } = setup();
    runtime.tokens.mint(USDC, ALICE, 10n);

    expect(() =>
      runtime.atomic(() => {
        counter.value = 7;
        runtime.tokens.mint(USDC, ALICE, 90n);
        throw new Error('revert');
      })
    ).toThrow('revert');

    expect(counter.value).toBe(0);
    expect(runtime.tokens.balanceOf(USDC, ALICE)).toBe(10n);
  });

  it('stops tracking holders registered by a reverted call', () => {
    const { runtime } = setup();
    const orphan = new CountingHolder();

    expect(() =>
      runtime.atomic(() => {
        runtime.track(orphan);
        throw new Error('revert');
      })
    ).toThrow('revert');
    runtime.atomic(() => undefined);

    expect(orphan.captures).toBe(0);
  });

  it('reverts a caught inner call but keeps the outer writes', () => {
    const { runtime, counter } = setup();

    runtime.atomic(() => {
      counter.value = 1;
      try {
        runtime.atomic(() => {
          counter.value = 2;
          runtime.tokens.mint(USDC, ALICE, 5n);
          throw new Error('inner');
        });
      } catch (error) {
        expect(error).toBeInstanceOf(Error);
      }
      counter.value += 10;
    });

    expect(counter.value).toBe(11);
    expect(runtime.tokens.balanceOf(USDC, ALICE)).toBe(0n);
  });
});
