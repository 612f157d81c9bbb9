/**
 * Shared protocol services handed to every router and position
 *
 * Collaborators are injected once at construction; the values they
 * expose (owner, liquidator, prices, balances) are read on every call.
 */

import type { Address } from 'viem';
import type { ChainRuntime } from '../runtime/chain.js';
import type { PriceFeedRegistry } from '../oracle/feeds.js';
import type { HealthEvaluator } from '../risk/health.js';
import type { SwapVenue } from '../swap/venue.js';
import type { Treasury } from '../pool/treasury.js';

export interface ProtocolServices extends PriceFeedRegistry {
  readonly runtime: ChainRuntime;
  /** Factory address (deployer of routers and pools) */
  readonly address: Address;
  readonly health: HealthEvaluator;
  readonly swapVenue: SwapVenue;
  readonly treasury: Treasury;
  owner(): Address;
  liquidatorAddress(): Address;
}
