/**
 * Cross-chain messaging types
 */

import type { Address, Hex } from 'viem';

/**
 * What the destination should do with bridged value
 * - supplyLiquidity / supplyCollateral / repay: applied by executeBridged
 * - borrowDelivery: borrowed funds, claimed by the user from the inbox
 */
export type BridgeAction = 'supplyLiquidity' | 'supplyCollateral' | 'repay' | 'borrowDelivery';

/**
 * Decoded application payload
 */
export interface BridgePayload {
  /** Destination lending pool (source pool for borrow deliveries) */
  pool: Address;
  user: Address;
  /** Token as known on the destination chain */
  token: Address;
  amount: bigint;
  action: BridgeAction;
}

export interface BridgeSendParams {
  destinationChainId: number;
  /** Receiver contract on the destination chain */
  recipient: Address;
  /** Token debited on the source chain */
  token: Address;
  /** Token minted on the destination chain */
  remoteToken: Address;
  amount: bigint;
  /** Delivery fails if fewer than minAmount units would arrive */
  minAmount: bigint;
  /** Native messaging fee, debited from the caller */
  fee: bigint;
  payload: Hex;
}

export interface BridgeReceipt {
  messageId: Hex;
  sourceChainId: number;
  destinationChainId: number;
  nonce: bigint;
  amount: bigint;
  fee: bigint;
}

/**
 * Message as handed to the destination receiver
 */
export interface InboundMessage {
  messageId: Hex;
  sourceChainId: number;
  /** Destination-chain token that was credited to the receiver */
  token: Address;
  /** Amount actually delivered */
  amount: bigint;
  payload: Hex;
}

/**
 * Source-side send primitive
 */
export interface BridgeTransport {
  readonly address: Address;
  readonly chainId: number;
  /** @throws LendingError BRIDGE_ROUTE_NOT_FOUND when nothing listens on that chain */
  receiverOf(destinationChainId: number): Address;
  send(caller: Address, params: BridgeSendParams): BridgeReceipt;
}

/**
 * Destination-side callback
 */
export interface BridgeReceiver {
  readonly address: Address;
  onReceive(caller: Address, message: InboundMessage): void;
}
