/**
 * crosslend-engine public API
 */

// Config
export { CHAIN_IDS, CHAINS, getChainConfig, isChainSupported, type ChainConfig } from './config/chains.js';
export {
  RATE_MODEL,
  PROTOCOL_FEE_WAD,
  LIQUIDATION,
  MAX_SLIPPAGE_BPS,
  DEFAULT_SWAP_FEE_TIER,
  TREASURY_PROTOCOL_SHARE_BPS,
  NATIVE_TOKEN,
  NATIVE_DECIMALS,
} from './config/defaults.js';
export { loadEngineConfig, parseEngineConfig, ENV_BOUNDS, ENV_DEFAULTS, type EngineConfig } from './config/env.js';
export type {
  TokenInfo,
  PoolParams,
  HealthReport,
  LiquidationStrategy,
  LiquidationEvent,
  PoolTotals,
} from './config/types.js';

// Runtime
export { ChainRuntime, ManualClock, SystemClock, type Clock, type StateHolder } from './runtime/chain.js';
export { TokenLedger } from './runtime/tokens.js';
export { requireRole, sameAddress, type CallerRole } from './runtime/access.js';

// Oracle + swap
export { ManualPriceFeed, readNormalizedPrice, type PriceFeed, type RoundData } from './oracle/feeds.js';
export { OracleSwapVenue, FEE_DENOMINATOR, type SwapVenue, type ExactInputSingleParams } from './swap/venue.js';
export { estimateSwapOutput, decimalsOnlyEstimate, type EstimateError } from './swap/estimate.js';

// Risk
export { borrowRate, supplyRate, utilization, accrue, type Accrual } from './risk/rates.js';
export { HealthEvaluator, type HealthInput } from './risk/health.js';

// Ledger
export { PoolRouter, type BorrowResult, type RepayResult, type LiquidationWriteDown } from './ledger/router.js';
export { Position } from './ledger/position.js';

// Pools
export { ProtocolFactory, type ProtocolFactoryOptions } from './pool/factory.js';
export {
  LendingPool,
  type CrossChainDelivery,
  type BorrowReceipt,
  type RepayOptions,
  type DispatchParams,
  type DispatchAction,
  type BridgedExecution,
} from './pool/lending-pool.js';
export { Treasury, type BuybackResult } from './pool/treasury.js';
export { Liquidator, type DexLiquidationParams, type MevLiquidationParams } from './liquidation/liquidator.js';

// Bridge
export { LocalBridgeNetwork, BridgeEndpoint, type InFlightMessage, type FailedDelivery } from './bridge/network.js';
export { BridgeInbox, type PendingCredit, type ConsumedCredit } from './bridge/inbox.js';
export { encodeBridgePayload, decodeBridgePayload, computeMessageId } from './bridge/payload.js';
export type { BridgeAction, BridgePayload, BridgeReceipt, BridgeTransport, BridgeReceiver } from './bridge/types.js';

// Keeper
export { tick, runForever, requestShutdown, isShutdownRequested } from './loop/index.js';
export type { TickContext, TickResult, SkipReason, RunnerConfig, RunnerStats } from './loop/index.js';

// Utils
export { LendingError, isLendingError, errorMessage, type LendingErrorCode, type ErrorCategory } from './utils/errors.js';
export { createLogger, logger, type Logger } from './utils/logger.js';
export { WAD, BPS, SECONDS_PER_YEAR, formatUsd, formatWad, formatTokenAmount } from './utils/units.js';
