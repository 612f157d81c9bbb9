/**
 * Error taxonomy for the lending engine
 *
 * Every rejection carries a distinct code so callers (including liquidation
 * bots) can decide whether to retry, adjust parameters or abandon.
 * Messages are always prefixed with the code: "ZERO_AMOUNT: amount must be > 0".
 */

/**
 * Error categories
 *
 * - validation:       bad input, rejected before any mutation
 * - insufficiency:    not enough shares/collateral/liquidity/balance
 * - health:           operation would breach LTV (rolled back)
 * - not_liquidatable: liquidation attempted on a healthy position
 * - external:         oracle, swap venue or bridge failure
 */
export type ErrorCategory =
  | 'validation'
  | 'insufficiency'
  | 'health'
  | 'not_liquidatable'
  | 'external';

const ERROR_CATEGORIES = {
  // validation
  ZERO_AMOUNT: 'validation',
  ZERO_ADDRESS: 'validation',
  UNAUTHORIZED: 'validation',
  INVALID_LTV: 'validation',
  INCENTIVE_TOO_HIGH: 'validation',
  SLIPPAGE_TOO_HIGH: 'validation',
  SAME_TOKEN: 'validation',
  UNKNOWN_TOKEN: 'validation',
  TOKEN_EXISTS: 'validation',
  INVALID_PRICE: 'validation',
  NOT_NATIVE_POOL: 'validation',
  UNEXPECTED_VALUE: 'validation',
  UNSUPPORTED_CHAIN: 'validation',
  BRIDGE_ROUTE_NOT_FOUND: 'validation',
  INVALID_PAYLOAD: 'validation',
  DUPLICATE_MESSAGE: 'validation',
  REPAY_EXCEEDS_HALF_DEBT: 'validation',
  POSITION_EXISTS: 'validation',
  POSITION_NOT_FOUND: 'validation',
  POOL_EXISTS: 'validation',
  LENDING_POOL_ALREADY_SET: 'validation',
  LENDING_POOL_NOT_SET: 'validation',
  // insufficiency
  INSUFFICIENT_SHARES: 'insufficiency',
  INSUFFICIENT_LIQUIDITY: 'insufficiency',
  INSUFFICIENT_COLLATERAL: 'insufficiency',
  INSUFFICIENT_BALANCE: 'insufficiency',
  INSUFFICIENT_ALLOWANCE: 'insufficiency',
  INSUFFICIENT_VALUE: 'insufficiency',
  INSUFFICIENT_SWAP_OUTPUT: 'insufficiency',
  INSUFFICIENT_PENDING_AMOUNT: 'insufficiency',
  NO_DEBT: 'insufficiency',
  // health
  POSITION_UNHEALTHY: 'health',
  // liquidation
  NOT_LIQUIDATABLE: 'not_liquidatable',
  // external collaborators
  ORACLE_NOT_FOUND: 'external',
  ORACLE_UNAVAILABLE: 'external',
  SWAP_FAILED: 'external',
  SLIPPAGE_EXCEEDED: 'external',
  NO_MESSAGE_IN_FLIGHT: 'external',
} as const satisfies Record<string, ErrorCategory>;

export type LendingErrorCode = keyof typeof ERROR_CATEGORIES;

export class LendingError extends Error {
  readonly code: LendingErrorCode;
  readonly category: ErrorCategory;
  readonly details: Record<string, unknown>;

  constructor(code: LendingErrorCode, message: string, details: Record<string, unknown> = {}, options?: ErrorOptions) {
    super(`${code}: ${message}`, options);
    this.name = 'LendingError';
    this.code = code;
    this.category = ERROR_CATEGORIES[code];
    this.details = details;
    Object.setPrototypeOf(this, LendingError.prototype);
  }

  toJSON(): { code: LendingErrorCode; category: ErrorCategory; message: string } {
    return { code: this.code, category: this.category, message: this.message };
  }
}

/**
 * Narrow an unknown thrown value to a LendingError (optionally of a given code)
 */
export function isLendingError(error: unknown, code?: LendingErrorCode): error is LendingError {
  if (!(error instanceof LendingError)) return false;
  return code === undefined || error.code === code;
}

/**
 * Throw a LendingError unless the condition holds (contract-style require)
 */
export function ensure(
  condition: boolean,
  code: LendingErrorCode,
  message: string,
  details?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    throw new LendingError(code, message, details);
  }
}

/**
 * Extract a loggable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

// ============================================================
// RESULT TYPE
// ============================================================

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
