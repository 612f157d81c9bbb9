/**
 * Protocol Factory - per-chain registry and pool deployer
 *
 * ============================================================
 * WHAT THIS MODULE DOES:
 * ============================================================
 * - Oracle registry (token -> price feed)
 * - Operator allow-list and protocol owner
 * - Bridge token routes (token, chainId -> remote token)
 * - Shared infrastructure: health evaluator, liquidator, treasury,
 *   swap venue, bridge endpoint + inbox
 * - createPool(): deploys a Router and a LendingPool and wires them
 *
 * ============================================================
 * POOL RULES:
 * ============================================================
 * - 0 < ltv <= chain maxLtv
 * - collateral != borrow token, both with a price feed
 * - one pool per (collateral, borrow) pair
 * ============================================================
 */

import type { Address } from 'viem';
import type { ChainRuntime, StateHolder } from '../runtime/chain.js';
import type { PriceFeed } from '../oracle/feeds.js';
import type { ProtocolServices } from '../ledger/services.js';
import type { BridgeTransport } from '../bridge/types.js';
import { BridgeInbox } from '../bridge/inbox.js';
import { PoolRouter } from '../ledger/router.js';
import { HealthEvaluator } from '../risk/health.js';
import { Liquidator } from '../liquidation/liquidator.js';
import { OracleSwapVenue, type SwapVenue } from '../swap/venue.js';
import { Treasury } from './treasury.js';
import { LendingPool } from './lending-pool.js';
import { addressKey, isZeroAddress, requireRole, sameAddress, type CallerRole } from '../runtime/access.js';
import { LendingError, ensure } from '../utils/errors.js';
import { formatWad } from '../utils/units.js';
import { logger, shortAddress } from '../utils/logger.js';

export interface ProtocolFactoryOptions {
  runtime: ChainRuntime;
  owner: Address;
  /** Receives the operator share of treasury buybacks (defaults to owner) */
  treasuryOperator?: Address;
  /** Swap venue; defaults to an OracleSwapVenue priced by this factory's feeds */
  swapVenue?: SwapVenue;
  /** Bridge endpoint on this chain; enables cross-chain flows and the inbox */
  bridge?: BridgeTransport;
}

interface FactoryState {
  owner: Address;
  feeds: Map<string, PriceFeed>;
  operators: Set<string>;
  bridgeTokens: Map<string, Address>;
  pools: Map<string, LendingPool>;
  poolAddresses: Set<string>;
}

function pairKey(collateralToken: Address, borrowToken: Address): string {
  return `${addressKey(collateralToken)}:${addressKey(borrowToken)}`;
}

function routeKey(token: Address, chainId: number): string {
  return `${addressKey(token)}:${chainId}`;
}

export class ProtocolFactory implements ProtocolServices, StateHolder<FactoryState> {
  readonly runtime: ChainRuntime;
  readonly address: Address;
  readonly health: HealthEvaluator;
  readonly swapVenue: SwapVenue;
  readonly treasury: Treasury;
  readonly liquidator: Liquidator;
  readonly bridge: BridgeTransport | undefined;
  readonly inbox: BridgeInbox | undefined;

  private state: FactoryState;

  constructor(options: ProtocolFactoryOptions) {
    const { runtime, owner } = options;
    ensure(!isZeroAddress(owner), 'ZERO_ADDRESS', 'owner cannot be zero');

    this.runtime = runtime;
    this.address = runtime.deploy(owner, 'factory');
    this.state = {
      owner,
      feeds: new Map(),
      operators: new Set(),
      bridgeTokens: new Map(),
      pools: new Map(),
      poolAddresses: new Set(),
    };
    runtime.track(this);

    this.health = new HealthEvaluator(runtime.tokens, this);
    this.treasury = new Treasury({
      runtime,
      address: runtime.deploy(this.address, 'treasury'),
      owner: () => this.owner(),
      operator: options.treasuryOperator ?? owner,
    });
    this.liquidator = new Liquidator(this, runtime.deploy(this.address, 'liquidator'));
    this.swapVenue = options.swapVenue ?? new OracleSwapVenue(runtime, this, runtime.deploy(this.address, 'swap-venue'));
    this.bridge = options.bridge;
    this.inbox = options.bridge
      ? new BridgeInbox({
          runtime,
          address: runtime.deploy(this.address, 'bridge-inbox'),
          trustedSender: options.bridge.address,
          isLendingPool: (address) => this.isLendingPool(address),
        })
      : undefined;

    logger.factory.info('Factory deployed', {
      chainId: runtime.chainId,
      factory: this.address,
      owner,
      bridge: this.bridge?.address ?? 'none',
    });
  }

  // ============================================================
  // OWNERSHIP + OPERATORS
  // ============================================================

  owner(): Address {
    return this.state.owner;
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.authorize(caller, ['owner'], 'transferOwnership');
    ensure(!isZeroAddress(newOwner), 'ZERO_ADDRESS', 'new owner cannot be zero');
    this.state.owner = newOwner;
    logger.factory.warn('Ownership transferred', { audit: true, from: caller, to: newOwner });
  }

  setOperator(caller: Address, operator: Address, enabled: boolean): void {
    this.authorize(caller, ['owner'], 'setOperator');
    ensure(!isZeroAddress(operator), 'ZERO_ADDRESS', 'operator cannot be zero');
    if (enabled) {
      this.state.operators.add(addressKey(operator));
    } else {
      this.state.operators.delete(addressKey(operator));
    }
    logger.factory.info('Operator updated', { operator: shortAddress(operator), enabled });
  }

  isOperator(address: Address): boolean {
    return this.state.operators.has(addressKey(address));
  }

  liquidatorAddress(): Address {
    return this.liquidator.address;
  }

  // ============================================================
  // ORACLE REGISTRY
  // ============================================================

  setPriceFeed(caller: Address, token: Address, feed: PriceFeed): void {
    this.authorize(caller, ['owner', 'operator'], 'setPriceFeed');
    this.runtime.tokens.info(token);
    this.state.feeds.set(addressKey(token), feed);
    logger.factory.info('Price feed set', { token: shortAddress(token), decimals: feed.decimals() });
  }

  priceFeedOf(token: Address): PriceFeed {
    const feed = this.state.feeds.get(addressKey(token));
    if (!feed) {
      throw new LendingError('ORACLE_NOT_FOUND', `no price feed for ${token}`, { token });
    }
    return feed;
  }

  hasPriceFeed(token: Address): boolean {
    return this.state.feeds.has(addressKey(token));
  }

  // ============================================================
  // BRIDGE ROUTES
  // ============================================================

  setBridgeToken(caller: Address, token: Address, chainId: number, remoteToken: Address): void {
    this.authorize(caller, ['owner', 'operator'], 'setBridgeToken');
    ensure(!isZeroAddress(remoteToken), 'ZERO_ADDRESS', 'remote token cannot be zero');
    this.runtime.tokens.info(token);
    this.state.bridgeTokens.set(routeKey(token, chainId), remoteToken);
    logger.factory.info('Bridge route set', { token: shortAddress(token), chainId, remoteToken });
  }

  bridgeTokenFor(token: Address, chainId: number): Address {
    const remote = this.state.bridgeTokens.get(routeKey(token, chainId));
    if (remote === undefined) {
      throw new LendingError('BRIDGE_ROUTE_NOT_FOUND', `no route for ${token} to chain ${chainId}`, { token, chainId });
    }
    return remote;
  }

  requireBridge(): { bridge: BridgeTransport; inbox: BridgeInbox } {
    if (!this.bridge || !this.inbox) {
      throw new LendingError('BRIDGE_ROUTE_NOT_FOUND', `chain ${this.runtime.chainId} has no bridge`);
    }
    return { bridge: this.bridge, inbox: this.inbox };
  }

  // ============================================================
  // POOLS
  // ============================================================

  createPool(caller: Address, collateralToken: Address, borrowToken: Address, ltv: bigint): LendingPool {
    this.authorize(caller, ['owner', 'operator'], 'createPool');
    const maxLtv = this.runtime.config.maxLtv;
    ensure(ltv > 0n && ltv <= maxLtv, 'INVALID_LTV', `ltv ${formatWad(ltv)} outside (0, ${formatWad(maxLtv)}]`, {
      ltv,
      maxLtv,
    });
    ensure(!sameAddress(collateralToken, borrowToken), 'SAME_TOKEN', 'collateral and borrow token must differ');
    this.priceFeedOf(collateralToken);
    this.priceFeedOf(borrowToken);
    ensure(!this.state.pools.has(pairKey(collateralToken, borrowToken)), 'POOL_EXISTS', 'pool already exists', {
      collateralToken,
      borrowToken,
    });

    return this.runtime.atomic(() => {
      const router = new PoolRouter(
        this,
        { collateralToken, borrowToken, ltv },
        this.runtime.deploy(this.address, 'router')
      );
      const pool = new LendingPool(this, router, this.runtime.deploy(this.address, 'lending-pool'));
      router.setLendingPool(this.address, pool.address);

      this.state.pools.set(pairKey(collateralToken, borrowToken), pool);
      this.state.poolAddresses.add(addressKey(pool.address));

      logger.factory.info('Pool created', {
        collateral: this.runtime.tokens.symbol(collateralToken),
        borrow: this.runtime.tokens.symbol(borrowToken),
        ltv: formatWad(ltv),
        router: router.address,
        pool: pool.address,
      });
      return pool;
    });
  }

  poolFor(collateralToken: Address, borrowToken: Address): LendingPool | undefined {
    return this.state.pools.get(pairKey(collateralToken, borrowToken));
  }

  pools(): LendingPool[] {
    return [...this.state.pools.values()];
  }

  isLendingPool(address: Address): boolean {
    return this.state.poolAddresses.has(addressKey(address));
  }

  // ============================================================
  // STATE HOLDER
  // ============================================================

  captureState(): FactoryState {
    return {
      owner: this.state.owner,
      feeds: new Map(this.state.feeds),
      operators: new Set(this.state.operators),
      bridgeTokens: new Map(this.state.bridgeTokens),
      pools: new Map(this.state.pools),
      poolAddresses: new Set(this.state.poolAddresses),
    };
  }

  restoreState(state: FactoryState): void {
    this.state = state;
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private authorize(caller: Address, allowed: readonly CallerRole[], operation: string): void {
    requireRole(caller, allowed, (role, who) => this.holdsRole(role, who), operation);
  }

  private holdsRole(role: CallerRole, caller: Address): boolean {
    switch (role) {
      case 'owner':
        return sameAddress(caller, this.state.owner);
      case 'operator':
        return this.isOperator(caller);
      default:
        return false;
    }
  }
}
