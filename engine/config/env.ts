/**
 * Environment configuration for the lending engine
 *
 * ============================================================
 * PARSING AND VALIDATION
 * ============================================================
 * Values come from process.env (optionally seeded from a .env
 * file via dotenv). Numeric values are clamped to sane bounds
 * rather than rejected - a mistyped poll interval must never
 * stop the liquidation keeper from starting.
 *
 * KEYS:
 * - CHAIN_ID                          → chainId (must be supported)
 * - KEEPER_POLL_INTERVAL_MS           → pollIntervalMs
 * - KEEPER_STRATEGY                   → strategy ("dex" | "mev")
 * - KEEPER_INCENTIVE_BPS              → incentiveBps (≤ 5000)
 * - KEEPER_MAX_LIQUIDATIONS_PER_TICK  → maxLiquidationsPerTick
 * ============================================================
 */

import { config as loadDotenv } from 'dotenv';
import { CHAIN_IDS, isChainSupported } from './chains.js';
import { LIQUIDATION } from './defaults.js';
import type { LiquidationStrategy } from './types.js';
import { LendingError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Config');

/**
 * Engine configuration
 */
export interface EngineConfig {
  /** Chain the keeper operates on */
  chainId: number;
  /** Keeper polling interval in milliseconds */
  pollIntervalMs: number;
  /** Liquidation strategy used by the keeper */
  strategy: LiquidationStrategy;
  /** Liquidation incentive requested by the keeper (basis points) */
  incentiveBps: bigint;
  /** Upper bound on liquidations executed in one tick */
  maxLiquidationsPerTick: number;
}

/**
 * Validation bounds for environment values
 */
export const ENV_BOUNDS = {
  pollIntervalMs: { min: 1_000, max: 3_600_000 },
  incentiveBps: { min: 0, max: Number(LIQUIDATION.maxIncentiveBps) },
  maxLiquidationsPerTick: { min: 1, max: 100 },
} as const;

export const ENV_DEFAULTS = {
  chainId: CHAIN_IDS.MAINNET,
  pollIntervalMs: 15_000,
  strategy: 'dex',
  incentiveBps: 500,
  maxLiquidationsPerTick: 5,
} as const;

type Env = Record<string, string | undefined>;

/**
 * Parse an integer string, clamping to bounds
 *
 * @param key - Environment key (for logging)
 * @param value - Raw value
 * @param fallback - Default value if missing or unparseable
 * @param min - Minimum allowed value
 * @param max - Maximum allowed value
 */
function parseInteger(
  key: string,
  value: string | undefined,
  fallback: number,
  min: number,
  max: number
): number {
  if (value === undefined || value === '') {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    log.warn(`Invalid number for ${key}: ${value}, using fallback: ${fallback}`);
    return fallback;
  }

  if (parsed < min) {
    log.warn(`${key}=${parsed} below minimum ${min}, clamping`);
    return min;
  }
  if (parsed > max) {
    log.warn(`${key}=${parsed} above maximum ${max}, clamping`);
    return max;
  }

  return parsed;
}

function parseStrategy(value: string | undefined): LiquidationStrategy {
  if (value === undefined || value === '') return ENV_DEFAULTS.strategy;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'dex' || normalized === 'mev') return normalized;
  log.warn(`Unknown KEEPER_STRATEGY: ${value}, using ${ENV_DEFAULTS.strategy}`);
  return ENV_DEFAULTS.strategy;
}

/**
 * Parse engine configuration from an environment map
 *
 * @throws LendingError UNSUPPORTED_CHAIN if CHAIN_ID is not configured
 */
export function parseEngineConfig(env: Env): EngineConfig {
  const chainId = parseInteger('CHAIN_ID', env['CHAIN_ID'], ENV_DEFAULTS.chainId, 1, Number.MAX_SAFE_INTEGER);
  if (!isChainSupported(chainId)) {
    throw new LendingError('UNSUPPORTED_CHAIN', `CHAIN_ID ${chainId} is not supported`, { chainId });
  }

  return {
    chainId,
    pollIntervalMs: parseInteger(
      'KEEPER_POLL_INTERVAL_MS',
      env['KEEPER_POLL_INTERVAL_MS'],
      ENV_DEFAULTS.pollIntervalMs,
      ENV_BOUNDS.pollIntervalMs.min,
      ENV_BOUNDS.pollIntervalMs.max
    ),
    strategy: parseStrategy(env['KEEPER_STRATEGY']),
    incentiveBps: BigInt(parseInteger(
      'KEEPER_INCENTIVE_BPS',
      env['KEEPER_INCENTIVE_BPS'],
      ENV_DEFAULTS.incentiveBps,
      ENV_BOUNDS.incentiveBps.min,
      ENV_BOUNDS.incentiveBps.max
    )),
    maxLiquidationsPerTick: parseInteger(
      'KEEPER_MAX_LIQUIDATIONS_PER_TICK',
      env['KEEPER_MAX_LIQUIDATIONS_PER_TICK'],
      ENV_DEFAULTS.maxLiquidationsPerTick,
      ENV_BOUNDS.maxLiquidationsPerTick.min,
      ENV_BOUNDS.maxLiquidationsPerTick.max
    ),
  };
}

/**
 * Load configuration from the process environment (and .env, if present)
 */
export function loadEngineConfig(): EngineConfig {
  loadDotenv();
  return parseEngineConfig(process.env);
}
