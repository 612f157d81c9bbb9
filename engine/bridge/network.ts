/**
 * Local Bridge Network - in-process cross-chain messenger
 *
 * ============================================================
 * WHAT THIS MODULE DOES:
 * ============================================================
 * - One endpoint per attached chain (implements BridgeTransport)
 * - send(): burns the bridged token and takes the native fee on the
 *   source chain, then queues the message in flight
 * - deliverNext()/deliverAll(): mint on the destination chain and
 *   call the connected receiver, inside the destination's atomic()
 *
 * ============================================================
 * FAILURE MODEL:
 * ============================================================
 * - A failed send leaves nothing debited (source atomic rollback)
 * - A failed delivery leaves nothing on the destination and moves
 *   the message to `failed`; it is not retried
 * - Timeouts and cancellation are not modelled
 * ============================================================
 */

import type { Address } from 'viem';
import type { ChainRuntime } from '../runtime/chain.js';
import type { BridgeReceipt, BridgeReceiver, BridgeSendParams, BridgeTransport, InboundMessage } from './types.js';
import { computeMessageId } from './payload.js';
import { NATIVE_TOKEN } from '../config/defaults.js';
import { sameAddress } from '../runtime/access.js';
import { LendingError, ensure, errorMessage } from '../utils/errors.js';
import { BPS, applyBps } from '../utils/units.js';
import { logger } from '../utils/logger.js';

export interface InFlightMessage extends InboundMessage {
  destinationChainId: number;
  recipient: Address;
  nonce: bigint;
  minAmount: bigint;
}

export interface FailedDelivery {
  message: InFlightMessage;
  error: string;
}

interface NetworkState {
  inFlight: InFlightMessage[];
  nonces: Map<number, bigint>;
  failed: FailedDelivery[];
}

export interface LocalBridgeNetworkOptions {
  /** Haircut taken on delivered value, basis points (default 0) */
  tokenFeeBps?: bigint;
}

interface AttachedChain {
  runtime: ChainRuntime;
  endpoint: BridgeEndpoint;
  receiver?: BridgeReceiver;
}

export class LocalBridgeNetwork {
  private readonly chains = new Map<number, AttachedChain>();
  private readonly tokenFeeBps: bigint;
  private state: NetworkState = { inFlight: [], nonces: new Map(), failed: [] };

  constructor(options: LocalBridgeNetworkOptions = {}) {
    this.tokenFeeBps = options.tokenFeeBps ?? 0n;
    ensure(this.tokenFeeBps >= 0n && this.tokenFeeBps < BPS, 'SLIPPAGE_TOO_HIGH', 'tokenFeeBps must be below 10000');
  }

  /**
   * Register a chain; returns the endpoint its contracts send through
   */
  attach(runtime: ChainRuntime, deployer: Address): BridgeEndpoint {
    ensure(!this.chains.has(runtime.chainId), 'UNSUPPORTED_CHAIN', `chain ${runtime.chainId} already attached`);
    const endpoint = new BridgeEndpoint(this, runtime, runtime.deploy(deployer, 'bridge-endpoint'));
    this.chains.set(runtime.chainId, { runtime, endpoint });
    runtime.track(this);
    logger.bridge.info('Chain attached', { chainId: runtime.chainId, endpoint: endpoint.address });
    return endpoint;
  }

  /**
   * Set the contract that receives messages on a chain
   */
  connect(chainId: number, receiver: BridgeReceiver): void {
    this.chain(chainId).receiver = receiver;
  }

  receiverOf(chainId: number): Address {
    const receiver = this.chains.get(chainId)?.receiver;
    if (!receiver) {
      throw new LendingError('BRIDGE_ROUTE_NOT_FOUND', `no receiver on chain ${chainId}`, { chainId });
    }
    return receiver.address;
  }

  inFlight(): readonly InFlightMessage[] {
    return [...this.state.inFlight];
  }

  failed(): readonly FailedDelivery[] {
    return [...this.state.failed];
  }

  // ============================================================
  // SEND (called by endpoints)
  // ============================================================

  dispatch(source: ChainRuntime, endpoint: Address, caller: Address, params: BridgeSendParams): BridgeReceipt {
    ensure(params.amount > 0n, 'ZERO_AMOUNT', 'bridged amount must be > 0');
    ensure(params.destinationChainId !== source.chainId, 'BRIDGE_ROUTE_NOT_FOUND', 'destination is the source chain');
    this.chain(params.destinationChainId);

    return source.atomic(() => {
      source.tokens.burn(params.token, caller, params.amount);
      if (params.fee > 0n) {
        source.tokens.transfer(NATIVE_TOKEN, caller, endpoint, params.fee);
      }

      const nonce = this.state.nonces.get(source.chainId) ?? 0n;
      this.state.nonces.set(source.chainId, nonce + 1n);
      const messageId = computeMessageId(source.chainId, nonce, params.payload);

      this.state.inFlight.push({
        messageId,
        sourceChainId: source.chainId,
        destinationChainId: params.destinationChainId,
        recipient: params.recipient,
        nonce,
        token: params.remoteToken,
        amount: params.amount,
        minAmount: params.minAmount,
        payload: params.payload,
      });

      logger.bridge.info('Message sent', {
        messageId,
        from: source.chainId,
        to: params.destinationChainId,
        amount: params.amount,
        fee: params.fee,
      });

      return {
        messageId,
        sourceChainId: source.chainId,
        destinationChainId: params.destinationChainId,
        nonce,
        amount: params.amount,
        fee: params.fee,
      };
    });
  }

  // ============================================================
  // DELIVERY
  // ============================================================

  /**
   * Deliver the oldest in-flight message
   *
   * @throws the receiver's error (the message is then recorded as failed)
   */
  deliverNext(): InFlightMessage {
    const message = this.state.inFlight[0];
    if (!message) {
      throw new LendingError('NO_MESSAGE_IN_FLIGHT', 'nothing to deliver');
    }
    const destination = this.chain(message.destinationChainId);

    try {
      destination.runtime.atomic(() => this.deliver(destination, message));
    } catch (error) {
      this.state.inFlight = this.state.inFlight.filter((m) => m.messageId !== message.messageId);
      this.state.failed.push({ message, error: errorMessage(error) });
      logger.bridge.error('Delivery failed', { messageId: message.messageId, error: errorMessage(error) });
      throw error;
    }
    return message;
  }

  /**
   * Deliver everything in flight; failures are recorded and skipped
   */
  deliverAll(): { delivered: number; failed: number } {
    let delivered = 0;
    let failed = 0;
    while (this.state.inFlight.length > 0) {
      try {
        this.deliverNext();
        delivered++;
      } catch (error) {
        failed++;
        logger.bridge.warn('Skipping failed message', { error: errorMessage(error) });
      }
    }
    return { delivered, failed };
  }

  /**
   * Re-deliver an already delivered message (duplicate delivery)
   */
  replay(message: InFlightMessage): void {
    const destination = this.chain(message.destinationChainId);
    destination.runtime.atomic(() => this.deliver(destination, message));
  }

  // ============================================================
  // STATE HOLDER
  // ============================================================

  captureState(): NetworkState {
    return {
      inFlight: [...this.state.inFlight],
      nonces: new Map(this.state.nonces),
      failed: [...this.state.failed],
    };
  }

  restoreState(state: NetworkState): void {
    this.state = state;
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private deliver(destination: AttachedChain, message: InFlightMessage): void {
    const receiver = destination.receiver;
    if (!receiver) {
      throw new LendingError('BRIDGE_ROUTE_NOT_FOUND', `no receiver on chain ${message.destinationChainId}`);
    }
    ensure(
      sameAddress(receiver.address, message.recipient),
      'BRIDGE_ROUTE_NOT_FOUND',
      `recipient ${message.recipient} is not the receiver on chain ${message.destinationChainId}`
    );

    const delivered = message.amount - applyBps(message.amount, this.tokenFeeBps);
    if (delivered < message.minAmount) {
      throw new LendingError('SLIPPAGE_EXCEEDED', `delivered ${delivered} < min ${message.minAmount}`, {
        messageId: message.messageId,
      });
    }

    this.state.inFlight = this.state.inFlight.filter((m) => m.messageId !== message.messageId);
    destination.runtime.tokens.mint(message.token, receiver.address, delivered);
    receiver.onReceive(destination.endpoint.address, {
      messageId: message.messageId,
      sourceChainId: message.sourceChainId,
      token: message.token,
      amount: delivered,
      payload: message.payload,
    });

    logger.bridge.info('Message delivered', {
      messageId: message.messageId,
      chainId: message.destinationChainId,
      amount: delivered,
    });
  }

  private chain(chainId: number): AttachedChain {
    const chain = this.chains.get(chainId);
    if (!chain) {
      throw new LendingError('BRIDGE_ROUTE_NOT_FOUND', `chain ${chainId} is not attached`, { chainId });
    }
    return chain;
  }
}

/**
 * A chain's view of the network
 */
export class BridgeEndpoint implements BridgeTransport {
  readonly address: Address;
  readonly chainId: number;

  constructor(
    private readonly network: LocalBridgeNetwork,
    private readonly runtime: ChainRuntime,
    address: Address
  ) {
    this.address = address;
    this.chainId = runtime.chainId;
  }

  receiverOf(destinationChainId: number): Address {
    return this.network.receiverOf(destinationChainId);
  }

  send(caller: Address, params: BridgeSendParams): BridgeReceipt {
    return this.network.dispatch(this.runtime, this.address, caller, params);
  }
}
