/**
 * Logging utilities for the lending engine
 * 
 * Structured logging with consistent format for debugging and monitoring.
 * No external dependencies - uses console with formatting.
 */

type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

interface LogContext {
  [key: string]: unknown;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

/**
 * Resolve the active log level from the environment (read on every call so
 * tests and long-running keepers can change it at runtime)
 */
function currentLevel(): LogLevel {
  const raw = (process.env['LOG_LEVEL'] ?? 'INFO').toUpperCase();
  return isLogLevel(raw) ? raw : 'INFO';
}

/**
 * Check if a message should be logged based on current level
 */
function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel()];
}

/**
 * Format timestamp for log output
 */
function timestamp(): string {
  return new Date().toISOString();
}

/**
 * Format context object for display
 * 
 * Ledger values are bigints, which JSON.stringify rejects - emit them as strings.
 */
function formatContext(ctx: LogContext): string {
  if (Object.keys(ctx).length === 0) return '';
  return ' ' + JSON.stringify(ctx, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value
  );
}

/**
 * Core logging function
 */
function log(level: LogLevel, module: string, message: string, ctx: LogContext = {}): void {
  if (!shouldLog(level)) return;

  const prefix = `[${timestamp()}] [${level}] [${module}]`;
  const contextStr = formatContext(ctx);
  
  const output = `${prefix} ${message}${contextStr}`;

  switch (level) {
    case 'ERROR':
      console.error(output);
      break;
    case 'WARN':
      console.warn(output);
      break;
    default:
      console.log(output);
  }
}

export interface Logger {
  debug: (message: string, ctx?: LogContext) => void;
  info: (message: string, ctx?: LogContext) => void;
  warn: (message: string, ctx?: LogContext) => void;
  error: (message: string, ctx?: LogContext) => void;
}

/**
 * Create a logger instance for a specific module
 */
export function createLogger(module: string): Logger {
  return {
    debug: (message: string, ctx?: LogContext) => log('DEBUG', module, message, ctx),
    info: (message: string, ctx?: LogContext) => log('INFO', module, message, ctx),
    warn: (message: string, ctx?: LogContext) => log('WARN', module, message, ctx),
    error: (message: string, ctx?: LogContext) => log('ERROR', module, message, ctx),
  };
}

/**
 * Pre-configured loggers for each module
 */
export const logger = {
  runtime: createLogger('Runtime'),
  router: createLogger('Router'),
  position: createLogger('Position'),
  health: createLogger('Health'),
  liquidator: createLogger('Liquidator'),
  pool: createLogger('LendingPool'),
  factory: createLogger('Factory'),
  bridge: createLogger('Bridge'),
  treasury: createLogger('Treasury'),
  keeper: createLogger('Keeper'),
};

/**
 * Shorten an address for log lines (matches the 0x1234abcd... convention)
 */
export function shortAddress(address: string): string {
  return address.slice(0, 10) + '...';
}
