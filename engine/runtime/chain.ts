/**
 * Chain Runtime - execution environment for one chain
 *
 * ============================================================
 * WHAT THIS MODULE DOES:
 * ============================================================
 * - Owns the chain's clock, token ledger and address allocator
 * - Provides ledger-of-record transactions via atomic()
 * - Every stateful component registers a StateHolder; atomic()
 *   captures all of them and restores all of them on failure
 *
 * ============================================================
 * TRANSACTION SEMANTICS:
 * ============================================================
 * - atomic(fn) either commits every mutation fn made, or none
 * - Nested atomic() calls behave like sub-calls: a failure that
 *   the outer code catches still reverts the inner call's writes
 * - Execution is synchronous - no two operations can interleave
 *   their reads and writes on the same chain
 * ============================================================
 */

import { getContractAddress, type Address } from 'viem';
import { getChainConfig, type ChainConfig } from '../config/chains.js';
import { TokenLedger } from './tokens.js';
import { addressKey } from './access.js';
import { logger } from '../utils/logger.js';

// ============================================================
// STATE HOLDERS
// ============================================================

/**
 * Anything with transactional state
 */
export interface StateHolder<S> {
  captureState(): S;
  restoreState(state: S): void;
}

type Restorer = () => void;
type Capturer = () => Restorer;

// ============================================================
// CLOCKS
// ============================================================

/**
 * Block timestamp source (seconds)
 */
export interface Clock {
  now(): bigint;
}

/**
 * Wall-clock time
 */
export class SystemClock implements Clock {
  now(): bigint {
    return BigInt(Math.floor(Date.now() / 1000));
  }
}

/**
 * Manually driven time for simulations and tests
 */
export class ManualClock implements Clock {
  private current: bigint;

  constructor(start: bigint = 1_700_000_000n) {
    this.current = start;
  }

  now(): bigint {
    return this.current;
  }

  set(timestamp: bigint): void {
    this.current = timestamp;
  }

  advance(seconds: bigint): void {
    this.current += seconds;
  }
}

// ============================================================
// RUNTIME
// ============================================================

export interface ChainRuntimeOptions {
  chainId: number;
  clock?: Clock;
}

export class ChainRuntime {
  readonly chainId: number;
  readonly config: ChainConfig;
  readonly clock: Clock;
  readonly tokens: TokenLedger;

  private readonly capturers: Capturer[] = [];
  private readonly nonces = new Map<string, bigint>();

  constructor(options: ChainRuntimeOptions) {
    this.chainId = options.chainId;
    this.config = getChainConfig(options.chainId);
    this.clock = options.clock ?? new SystemClock();
    this.tokens = new TokenLedger();
    this.track(this.tokens);
  }

  /**
   * Current block timestamp
   */
  now(): bigint {
    return this.clock.now();
  }

  /**
   * Register a component whose state must follow transaction boundaries
   */
  track<S>(holder: StateHolder<S>): void {
    this.capturers.push(() => {
      const state = holder.captureState();
      return () => holder.restoreState(state);
    });
  }

  /**
   * Allocate a contract address the way CREATE does (deployer + nonce)
   */
  deploy(deployer: Address, label: string): Address {
    const key = addressKey(deployer);
    const nonce = this.nonces.get(key) ?? 0n;
    this.nonces.set(key, nonce + 1n);
    const address = getContractAddress({ from: deployer, nonce });
    logger.runtime.debug('Deployed', { chainId: this.chainId, label, address });
    return address;
  }

  /**
   * Run fn as one all-or-nothing transaction
   */
  atomic<T>(fn: () => T): T {
    const tracked = this.capturers.length;
    const restorers = this.capturers.map((capture) => capture());
    try {
      return fn();
    } catch (error) {
      for (const restore of restorers.reverse()) {
        restore();
      }
      // holders created by the failed call no longer exist
      this.capturers.length = tracked;
      throw error;
    }
  }
}
