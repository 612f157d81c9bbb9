import { describe, it, expect } from 'vitest';
import { ENV_DEFAULTS, parseEngineConfig } from './env.js';
import { getChainConfig, isChainSupported } from './chains.js';
import { isLendingError } from '../utils/errors.js';

describe('parseEngineConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(parseEngineConfig({})).toEqual({
      chainId: ENV_DEFAULTS.chainId,
      pollIntervalMs: 15_000,
      strategy: 'dex',
      incentiveBps: 500n,
      maxLiquidationsPerTick: 5,
    });
  });

  it('parses every key', () => {
    const config = parseEngineConfig({
      CHAIN_ID: '8453',
      KEEPER_POLL_INTERVAL_MS: '5000',
      KEEPER_STRATEGY: ' MEV ',
      KEEPER_INCENTIVE_BPS: '250',
      KEEPER_MAX_LIQUIDATIONS_PER_TICK: '3',
    });
    expect(config).toEqual({
      chainId: 8453,
      pollIntervalMs: 5000,
      strategy: 'mev',
      incentiveBps: 250n,
      maxLiquidationsPerTick: 3,
    });
  });

  it('clamps out-of-range numbers', () => {
    const config = parseEngineConfig({
      KEEPER_POLL_INTERVAL_MS: '10',
      KEEPER_INCENTIVE_BPS: '9000',
      KEEPER_MAX_LIQUIDATIONS_PER_TICK: '1000',
    });
    expect(config.pollIntervalMs).toBe(1_000);
    expect(config.incentiveBps).toBe(5000n);
    expect(config.maxLiquidationsPerTick).toBe(100);
  });

  it('ignores unparseable values and unknown strategies', () => {
    const config = parseEngineConfig({ KEEPER_POLL_INTERVAL_MS: 'soon', KEEPER_STRATEGY: 'flash' });
    expect(config.pollIntervalMs).toBe(15_000);
    expect(config.strategy).toBe('dex');
  });

  it('rejects unsupported chains', () => {
    let caught: unknown;
    try {
      parseEngineConfig({ CHAIN_ID: '999' });
    } catch (error) {
      caught = error;
    }
    expect(isLendingError(caught, 'UNSUPPORTED_CHAIN')).toBe(true);
  });
});

describe('chain registry', () => {
  it('carries a per-chain LTV ceiling', () => {
    expect(getChainConfig(1).maxLtv).toBe(850_000_000_000_000_000n);
    expect(getChainConfig(8453).maxLtv).toBe(800_000_000_000_000_000n);
    expect(isChainSupported(42161)).toBe(true);
    expect(isChainSupported(5)).toBe(false);
    expect(() => getChainConfig(5)).toThrow('UNSUPPORTED_CHAIN');
  });
});
