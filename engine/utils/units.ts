/**
 * Unit conversion utilities for the lending engine
 *
 * Handles conversions between the decimal representations used across
 * tokens (6, 8, 18...), price feeds (usually 8) and the engine's common
 * 18-decimal USD unit.
 *
 * CRITICAL: All arithmetic is BigInt with floor division, matching on-chain
 * uint256 semantics. Never route ledger math through Number!
 */

import { formatUnits } from 'viem';

/**
 * WAD (1e18) - fixed-point unit for LTV and normalized USD values
 */
export const WAD_DECIMALS = 18;
export const WAD = 10n ** 18n;

/**
 * Basis points denominator (10000 = 100%)
 */
export const BPS = 10_000n;

/**
 * Seconds in the 365-day interest year
 */
export const SECONDS_PER_YEAR = 365n * 24n * 60n * 60n;

/**
 * 10^decimals as a bigint
 */
export function pow10(decimals: number): bigint {
  return 10n ** BigInt(decimals);
}

/**
 * Normalize a feed answer to 18 decimals
 *
 * Example:
 *   answer = 2000_00000000 (8-decimal feed, $2000)
 *   normalizePrice(answer, 8) => 2000e18
 */
export function normalizePrice(answer: bigint, feedDecimals: number): bigint {
  return (answer * WAD) / pow10(feedDecimals);
}

/**
 * Value of a token amount in 18-decimal USD
 *
 * value = amount * normalizedPrice / 10^tokenDecimals
 */
export function tokenValue(amount: bigint, normalizedPrice: bigint, tokenDecimals: number): bigint {
  return (amount * normalizedPrice) / pow10(tokenDecimals);
}

/**
 * Inverse of tokenValue - how many token units are worth `value` (floor)
 */
export function valueToTokenAmount(value: bigint, normalizedPrice: bigint, tokenDecimals: number): bigint {
  if (normalizedPrice === 0n) return 0n;
  return (value * pow10(tokenDecimals)) / normalizedPrice;
}

/**
 * Apply a basis-point multiplier: amount * bps / 10000
 */
export function applyBps(amount: bigint, bps: bigint): bigint {
  return (amount * bps) / BPS;
}

/**
 * Smaller of two bigints
 */
export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

/**
 * Format an 18-decimal USD value for display
 */
export function formatUsd(value: bigint): string {
  return `$${Number(formatUnits(value, WAD_DECIMALS)).toFixed(2)}`;
}

/**
 * Format a token amount for display
 */
export function formatTokenAmount(amount: bigint, decimals: number): string {
  return formatUnits(amount, decimals);
}

/**
 * Format a WAD ratio (LTV, health factor) for display
 */
export function formatWad(value: bigint): string {
  return formatUnits(value, WAD_DECIMALS);
}
