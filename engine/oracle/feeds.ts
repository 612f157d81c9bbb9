/**
 * Price feeds
 *
 * ============================================================
 * WHAT THIS MODULE DOES:
 * ============================================================
 * - Defines the read interface the engine consumes (latestRoundData +
 *   decimals, Chainlink aggregator shape)
 * - Provides ManualPriceFeed: an admin-updated feed for simulations,
 *   devnets and tests
 *
 * ============================================================
 * ASSUMPTIONS:
 * ============================================================
 * - answer is non-negative
 * - decimals() is stable for the life of a pool
 * - Prices are read fresh on every call - nothing here is cached
 * ============================================================
 */

import type { Address } from 'viem';
import type { Clock } from '../runtime/chain.js';
import { sameAddress } from '../runtime/access.js';
import { LendingError, ensure } from '../utils/errors.js';
import { normalizePrice } from '../utils/units.js';

/**
 * One oracle round
 */
export interface RoundData {
  roundId: bigint;
  answer: bigint;
  startedAt: bigint;
  updatedAt: bigint;
  answeredInRound: bigint;
}

export interface PriceFeed {
  latestRoundData(): RoundData;
  decimals(): number;
}

/**
 * Resolves a token's feed (the factory's oracle registry)
 */
export interface PriceFeedRegistry {
  /** @throws LendingError ORACLE_NOT_FOUND */
  priceFeedOf(token: Address): PriceFeed;
  hasPriceFeed(token: Address): boolean;
}

/**
 * Read a token's price normalized to 18 decimals
 */
export function readNormalizedPrice(registry: PriceFeedRegistry, token: Address): bigint {
  const feed = registry.priceFeedOf(token);
  const { answer } = feed.latestRoundData();
  ensure(answer >= 0n, 'INVALID_PRICE', `negative price for ${token}`, { token });
  return normalizePrice(answer, feed.decimals());
}

// ============================================================
// MANUAL FEED
// ============================================================

export interface ManualPriceFeedOptions {
  admin: Address;
  decimals: number;
  answer: bigint;
  clock: Clock;
  description?: string;
}

/**
 * Admin-updated price feed
 */
export class ManualPriceFeed implements PriceFeed {
  readonly admin: Address;
  readonly description: string;

  private readonly feedDecimals: number;
  private readonly clock: Clock;
  private round: RoundData;
  private available = true;

  constructor(options: ManualPriceFeedOptions) {
    ensure(options.answer >= 0n, 'INVALID_PRICE', 'initial answer must be non-negative');
    this.admin = options.admin;
    this.feedDecimals = options.decimals;
    this.clock = options.clock;
    this.description = options.description ?? 'manual';
    const now = this.clock.now();
    this.round = { roundId: 1n, answer: options.answer, startedAt: now, updatedAt: now, answeredInRound: 1n };
  }

  latestRoundData(): RoundData {
    if (!this.available) {
      throw new LendingError('ORACLE_UNAVAILABLE', `feed ${this.description} is not answering`);
    }
    return { ...this.round };
  }

  decimals(): number {
    return this.feedDecimals;
  }

  /**
   * Publish a new answer (starts a new round)
   */
  updateAnswer(caller: Address, answer: bigint): void {
    this.requireAdmin(caller);
    ensure(answer >= 0n, 'INVALID_PRICE', 'answer must be non-negative', { answer });
    const now = this.clock.now();
    const roundId = this.round.roundId + 1n;
    this.round = { roundId, answer, startedAt: now, updatedAt: now, answeredInRound: roundId };
  }

  /**
   * Simulate an outage: reads throw ORACLE_UNAVAILABLE until enable()
   */
  disable(caller: Address): void {
    this.requireAdmin(caller);
    this.available = false;
  }

  enable(caller: Address): void {
    this.requireAdmin(caller);
    this.available = true;
  }

  private requireAdmin(caller: Address): void {
    ensure(sameAddress(caller, this.admin), 'UNAUTHORIZED', 'only the feed admin may update it', { caller });
  }
}
