/**
 * Two-chain devnet for tests and simulations
 *
 * Mainnet (1) and Base (8453) runtimes on manual clocks, joined by a
 * LocalBridgeNetwork. Each chain gets TKA (18 decimals, $2000), USDC
 * (6 decimals, $1) and WETH (wrapped native, $2000) with 8-decimal
 * feeds, a funded oracle swap venue, a factory and three pools:
 *
 *   tkaUsdc   TKA collateral / USDC debt, ltv 0.80
 *   wethUsdc  WETH collateral / USDC debt, ltv 0.75
 *   usdcWeth  USDC collateral / WETH debt, ltv 0.75
 */

import type { Address } from 'viem';
import { CHAIN_IDS } from '../config/chains.js';
import { NATIVE_TOKEN } from '../config/defaults.js';
import { ChainRuntime, ManualClock } from '../runtime/chain.js';
import { ManualPriceFeed } from '../oracle/feeds.js';
import { LocalBridgeNetwork, type BridgeEndpoint } from '../bridge/network.js';
import { ProtocolFactory } from '../pool/factory.js';
import type { LendingPool } from '../pool/lending-pool.js';

export const START_TIME = 1_700_000_000n;

export const ACCOUNTS = {
  admin: '0x00000000000000000000000000000000000000aa',
  operator: '0x00000000000000000000000000000000000000bb',
  alice: '0x000000000000000000000000000000000000a11c',
  bob: '0x0000000000000000000000000000000000000b0b',
  carol: '0x00000000000000000000000000000000000ca201',
  keeper: '0x000000000000000000000000000000000000cee9',
  stranger: '0x0000000000000000000000000000000000005777',
} as const satisfies Record<string, Address>;

/** 8-decimal feed answers */
export const PRICES = {
  tka: 2000_00000000n,
  usdc: 1_00000000n,
  weth: 2000_00000000n,
} as const;

export const LTV = {
  tkaUsdc: 800_000_000_000_000_000n,
  wethUsdc: 750_000_000_000_000_000n,
  usdcWeth: 750_000_000_000_000_000n,
} as const;

interface TokenSet {
  tka: Address;
  usdc: Address;
  weth: Address;
}

const TOKEN_ADDRESSES: Record<'mainnet' | 'base', TokenSet> = {
  mainnet: {
    tka: '0x0000000000000000000000000000000000001001',
    usdc: '0x0000000000000000000000000000000000001002',
    weth: '0x0000000000000000000000000000000000001003',
  },
  base: {
    tka: '0x0000000000000000000000000000000000002001',
    usdc: '0x0000000000000000000000000000000000002002',
    weth: '0x0000000000000000000000000000000000002003',
  },
};

const VENUE_RESERVES = {
  tka: 1_000n * 10n ** 18n,
  usdc: 10_000_000n * 10n ** 6n,
  weth: 1_000n * 10n ** 18n,
} as const;

export interface ChainDevnet {
  runtime: ChainRuntime;
  clock: ManualClock;
  factory: ProtocolFactory;
  endpoint: BridgeEndpoint;
  tokens: TokenSet;
  feeds: { tka: ManualPriceFeed; usdc: ManualPriceFeed; weth: ManualPriceFeed };
  pools: { tkaUsdc: LendingPool; wethUsdc: LendingPool; usdcWeth: LendingPool };
  /** Mint `amount` of token to holder */
  fund(token: Address, holder: Address, amount: bigint): void;
  /** Give holder native currency */
  fundNative(holder: Address, amount: bigint): void;
  approve(token: Address, owner: Address, spender: Address, amount: bigint): void;
  balanceOf(token: Address, holder: Address): bigint;
}

export interface Devnet {
  network: LocalBridgeNetwork;
  mainnet: ChainDevnet;
  base: ChainDevnet;
}

export interface DevnetOptions {
  /** Haircut the bridge takes on delivery, basis points */
  bridgeFeeBps?: bigint;
}

function createChain(network: LocalBridgeNetwork, chainId: number, tokens: TokenSet): ChainDevnet {
  const { admin, operator } = ACCOUNTS;
  const clock = new ManualClock(START_TIME);
  const runtime = new ChainRuntime({ chainId, clock });

  runtime.tokens.registerToken({ address: tokens.tka, symbol: 'TKA', decimals: 18 });
  runtime.tokens.registerToken({ address: tokens.usdc, symbol: 'USDC', decimals: 6 });
  runtime.tokens.registerToken({ address: tokens.weth, symbol: 'WETH', decimals: 18 });
  runtime.tokens.setWrappedNative(tokens.weth);

  const endpoint = network.attach(runtime, admin);
  const factory = new ProtocolFactory({ runtime, owner: admin, treasuryOperator: operator, bridge: endpoint });
  factory.setOperator(admin, operator, true);
  network.connect(chainId, factory.requireBridge().inbox);

  const feed = (answer: bigint, description: string): ManualPriceFeed =>
    new ManualPriceFeed({ admin, decimals: 8, answer, clock, description });
  const feeds = {
    tka: feed(PRICES.tka, 'TKA / USD'),
    usdc: feed(PRICES.usdc, 'USDC / USD'),
    weth: feed(PRICES.weth, 'WETH / USD'),
  };
  factory.setPriceFeed(admin, tokens.tka, feeds.tka);
  factory.setPriceFeed(admin, tokens.usdc, feeds.usdc);
  factory.setPriceFeed(admin, tokens.weth, feeds.weth);

  runtime.tokens.mint(tokens.tka, factory.swapVenue.address, VENUE_RESERVES.tka);
  runtime.tokens.mint(tokens.usdc, factory.swapVenue.address, VENUE_RESERVES.usdc);
  runtime.tokens.mint(tokens.weth, factory.swapVenue.address, VENUE_RESERVES.weth);

  const pools = {
    tkaUsdc: factory.createPool(admin, tokens.tka, tokens.usdc, LTV.tkaUsdc),
    wethUsdc: factory.createPool(admin, tokens.weth, tokens.usdc, LTV.wethUsdc),
    usdcWeth: factory.createPool(admin, tokens.usdc, tokens.weth, LTV.usdcWeth),
  };

  return {
    runtime,
    clock,
    factory,
    endpoint,
    tokens,
    feeds,
    pools,
    fund: (token, holder, amount) => runtime.tokens.mint(token, holder, amount),
    fundNative: (holder, amount) => runtime.tokens.mint(NATIVE_TOKEN, holder, amount),
    approve: (token, owner, spender, amount) => runtime.tokens.approve(token, owner, spender, amount),
    balanceOf: (token, holder) => runtime.tokens.balanceOf(token, holder),
  };
}

function routeTokens(from: ChainDevnet, to: ChainDevnet): void {
  const { admin } = ACCOUNTS;
  const chainId = to.runtime.chainId;
  from.factory.setBridgeToken(admin, from.tokens.tka, chainId, to.tokens.tka);
  from.factory.setBridgeToken(admin, from.tokens.usdc, chainId, to.tokens.usdc);
  from.factory.setBridgeToken(admin, from.tokens.weth, chainId, to.tokens.weth);
}

export function createDevnet(options: DevnetOptions = {}): Devnet {
  const network = new LocalBridgeNetwork({ tokenFeeBps: options.bridgeFeeBps });
  const mainnet = createChain(network, CHAIN_IDS.MAINNET, TOKEN_ADDRESSES.mainnet);
  const base = createChain(network, CHAIN_IDS.BASE, TOKEN_ADDRESSES.base);
  routeTokens(mainnet, base);
  routeTokens(base, mainnet);
  return { network, mainnet, base };
}

/**
 * Supply `amount` of the pool's borrow token as liquidity from `user`
 */
export function seedLiquidity(chain: ChainDevnet, pool: LendingPool, user: Address, amount: bigint): bigint {
  chain.fund(pool.borrowToken, user, amount);
  chain.approve(pool.borrowToken, user, pool.address, amount);
  return pool.supplyLiquidity(user, amount);
}

/**
 * Post `amount` of the pool's collateral token for `user`
 */
export function seedCollateral(chain: ChainDevnet, pool: LendingPool, user: Address, amount: bigint): void {
  chain.fund(pool.collateralToken, user, amount);
  chain.approve(pool.collateralToken, user, pool.address, amount);
  pool.supplyCollateral(user, amount);
}
