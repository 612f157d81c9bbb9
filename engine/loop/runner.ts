/**
 * Keeper Runner - Loop with Precise Timing
 *
 * ============================================================
 * WHAT THIS MODULE DOES:
 * ============================================================
 * - Runs the keeper until shutdown (or maxTicks)
 * - Calls tick() every pollIntervalMs
 * - Ensures NO overlapping executions
 * - Subtracts execution time from the sleep
 *
 * ============================================================
 * WHAT THIS MODULE DOES NOT DO:
 * ============================================================
 * - Does NOT contain liquidation logic
 * - Does NOT use setInterval (while loop for precise control)
 * ============================================================
 */

import { tick, type TickContext } from './tick.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

// ============================================================
// TYPES
// ============================================================

export interface RunnerConfig {
  /** Polling interval in milliseconds */
  pollIntervalMs: number;
  tickContext: TickContext;
  /** Stop after this many ticks (runs until shutdown when omitted) */
  maxTicks?: number;
}

export interface RunnerStats {
  totalTicks: number;
  totalLiquidations: number;
  totalErrors: number;
  totalSkipped: number;
  startedAt: Date;
}

// ============================================================
// SLEEP UTILITY
// ============================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

// ============================================================
// SHUTDOWN HANDLING
// ============================================================

let shutdownRequested = false;

/**
 * Ask the runner to exit after the current tick
 */
export function requestShutdown(): void {
  shutdownRequested = true;
  logger.keeper.info('Shutdown requested - will exit after current tick');
}

export function isShutdownRequested(): boolean {
  return shutdownRequested;
}

// ============================================================
// RUNNER
// ============================================================

/**
 * Run the keeper loop
 *
 * Tick errors are logged and counted, never thrown.
 */
export async function runForever(config: RunnerConfig): Promise<RunnerStats> {
  const { pollIntervalMs, tickContext, maxTicks } = config;
  shutdownRequested = false;

  const stats: RunnerStats = {
    totalTicks: 0,
    totalLiquidations: 0,
    totalErrors: 0,
    totalSkipped: 0,
    startedAt: new Date(),
  };

  logger.keeper.info('Runner started', {
    pollIntervalMs,
    chainId: tickContext.factory.runtime.chainId,
    strategy: tickContext.config.strategy,
    maxTicks: maxTicks ?? 'unbounded',
  });

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.keeper.info(`Received ${signal}`);
    requestShutdown();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    while (!shutdownRequested) {
      const tickStart = Date.now();

      try {
        const result = tick(tickContext);
        stats.totalLiquidations += result.liquidationsSucceeded;
        stats.totalErrors += result.errors.size;
        stats.totalSkipped += result.usersSkipped;
      } catch (error) {
        stats.totalErrors++;
        logger.keeper.error('Unexpected tick error', { error: errorMessage(error), tick: stats.totalTicks });
      }
      stats.totalTicks++;

      if (stats.totalTicks % 10 === 0) {
        logger.keeper.info('Runner stats', {
          ticks: stats.totalTicks,
          liquidations: stats.totalLiquidations,
          errors: stats.totalErrors,
          skipped: stats.totalSkipped,
        });
      }

      if (maxTicks !== undefined && stats.totalTicks >= maxTicks) break;

      const elapsed = Date.now() - tickStart;
      const sleepTime = pollIntervalMs - elapsed;
      if (sleepTime < 0) {
        logger.keeper.warn('Tick took longer than poll interval', { elapsed, interval: pollIntervalMs });
      }
      if (!shutdownRequested) {
        await sleep(sleepTime);
      }
    }
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }

  const uptimeMinutes = ((Date.now() - stats.startedAt.getTime()) / 60_000).toFixed(2);
  logger.keeper.info('Runner stopped', {
    totalTicks: stats.totalTicks,
    totalLiquidations: stats.totalLiquidations,
    totalErrors: stats.totalErrors,
    uptimeMinutes,
  });
  return stats;
}
