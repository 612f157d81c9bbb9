/**
 * Loop module exports
 */

export { tick, type TickContext, type TickResult, type SkipReason } from './tick.js';
export { runForever, requestShutdown, isShutdownRequested, type RunnerConfig, type RunnerStats } from './runner.js';
