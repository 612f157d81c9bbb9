/**
 * Bridge Inbox - destination-side pending credits
 *
 * ============================================================
 * TWO-PHASE DELIVERY:
 * ============================================================
 * 1. onReceive(): the network credits the inbox with the bridged
 *    tokens; the inbox appends a credit to the (user, token) queue
 * 2. consume()/claim(): a lending pool (or the user, for borrow
 *    deliveries) drains credits FIFO and takes the tokens
 *
 * A message id is accepted once. Consumption never exceeds the
 * credits currently queued, so one bridged transfer cannot be
 * spent twice.
 * ============================================================
 */

import type { Address, Hex } from 'viem';
import type { ChainRuntime, StateHolder } from '../runtime/chain.js';
import type { BridgeAction, BridgeReceiver, InboundMessage } from './types.js';
import { decodeBridgePayload } from './payload.js';
import { addressKey, sameAddress } from '../runtime/access.js';
import { LendingError, ensure } from '../utils/errors.js';
import { logger, shortAddress } from '../utils/logger.js';

export interface PendingCredit {
  messageId: Hex;
  sourceChainId: number;
  pool: Address;
  action: BridgeAction;
  /** Amount still unconsumed */
  remaining: bigint;
}

export interface ConsumedCredit {
  messageId: Hex;
  action: BridgeAction;
  amount: bigint;
}

interface InboxState {
  queues: Map<string, PendingCredit[]>;
  processed: Set<Hex>;
}

export interface BridgeInboxOptions {
  runtime: ChainRuntime;
  address: Address;
  /** Network endpoint allowed to call onReceive */
  trustedSender: Address;
  /** Whether an address is a lending pool of this chain */
  isLendingPool: (address: Address) => boolean;
}

function queueKey(user: Address, token: Address): string {
  return `${addressKey(user)}:${addressKey(token)}`;
}

function cloneQueues(queues: Map<string, PendingCredit[]>): Map<string, PendingCredit[]> {
  const copy = new Map<string, PendingCredit[]>();
  for (const [key, credits] of queues) {
    copy.set(key, credits.map((credit) => ({ ...credit })));
  }
  return copy;
}

export class BridgeInbox implements BridgeReceiver, StateHolder<InboxState> {
  readonly address: Address;

  private readonly runtime: ChainRuntime;
  private readonly trustedSender: Address;
  private readonly isLendingPool: (address: Address) => boolean;
  private state: InboxState = { queues: new Map(), processed: new Set() };

  constructor(options: BridgeInboxOptions) {
    this.runtime = options.runtime;
    this.address = options.address;
    this.trustedSender = options.trustedSender;
    this.isLendingPool = options.isLendingPool;
    this.runtime.track(this);
  }

  // ============================================================
  // RECEIVE
  // ============================================================

  onReceive(caller: Address, message: InboundMessage): void {
    ensure(sameAddress(caller, this.trustedSender), 'UNAUTHORIZED', 'only the bridge endpoint may deliver', { caller });
    ensure(!this.state.processed.has(message.messageId), 'DUPLICATE_MESSAGE', `message ${message.messageId} already received`, {
      messageId: message.messageId,
    });

    const payload = decodeBridgePayload(message.payload);
    ensure(sameAddress(payload.token, message.token), 'INVALID_PAYLOAD', 'payload token does not match delivered token', {
      payloadToken: payload.token,
      delivered: message.token,
    });
    ensure(message.amount > 0n, 'INVALID_PAYLOAD', 'nothing was delivered');

    this.state.processed.add(message.messageId);
    const key = queueKey(payload.user, message.token);
    const queue = this.state.queues.get(key) ?? [];
    queue.push({
      messageId: message.messageId,
      sourceChainId: message.sourceChainId,
      pool: payload.pool,
      action: payload.action,
      remaining: message.amount,
    });
    this.state.queues.set(key, queue);

    logger.bridge.info('Credit queued', {
      messageId: message.messageId,
      user: shortAddress(payload.user),
      action: payload.action,
      amount: message.amount,
    });
  }

  // ============================================================
  // CONSUME
  // ============================================================

  /**
   * Drain `amount` of the user's credits addressed to the calling pool
   * and send the tokens to `destination`
   */
  consume(caller: Address, user: Address, token: Address, amount: bigint, destination: Address): ConsumedCredit[] {
    ensure(this.isLendingPool(caller), 'UNAUTHORIZED', 'only a lending pool may consume credits', { caller });
    return this.drain(user, token, amount, destination, (credit) =>
      credit.action !== 'borrowDelivery' && sameAddress(credit.pool, caller)
    );
  }

  /**
   * Withdraw delivered borrow proceeds to the user's wallet
   */
  claim(caller: Address, token: Address, amount: bigint): ConsumedCredit[] {
    return this.drain(caller, token, amount, caller, (credit) => credit.action === 'borrowDelivery');
  }

  // ============================================================
  // VIEWS
  // ============================================================

  /**
   * Total unconsumed credit for (user, token)
   */
  pendingAmount(user: Address, token: Address): bigint {
    return this.credits(user, token).reduce((sum, credit) => sum + credit.remaining, 0n);
  }

  credits(user: Address, token: Address): PendingCredit[] {
    return (this.state.queues.get(queueKey(user, token)) ?? []).map((credit) => ({ ...credit }));
  }

  isProcessed(messageId: Hex): boolean {
    return this.state.processed.has(messageId);
  }

  // ============================================================
  // STATE HOLDER
  // ============================================================

  captureState(): InboxState {
    return { queues: cloneQueues(this.state.queues), processed: new Set(this.state.processed) };
  }

  restoreState(state: InboxState): void {
    this.state = state;
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private drain(
    user: Address,
    token: Address,
    amount: bigint,
    destination: Address,
    eligible: (credit: PendingCredit) => boolean
  ): ConsumedCredit[] {
    ensure(amount > 0n, 'ZERO_AMOUNT', 'amount must be > 0');
    const key = queueKey(user, token);
    const queue = this.state.queues.get(key) ?? [];

    const available = queue.filter(eligible).reduce((sum, credit) => sum + credit.remaining, 0n);
    if (available < amount) {
      throw new LendingError('INSUFFICIENT_PENDING_AMOUNT', `pending ${available} < ${amount}`, {
        user,
        token,
        available,
      });
    }

    return this.runtime.atomic(() => {
      const consumed: ConsumedCredit[] = [];
      let outstanding = amount;
      for (const credit of queue) {
        if (outstanding === 0n) break;
        if (!eligible(credit) || credit.remaining === 0n) continue;
        const take = credit.remaining < outstanding ? credit.remaining : outstanding;
        credit.remaining -= take;
        outstanding -= take;
        consumed.push({ messageId: credit.messageId, action: credit.action, amount: take });
      }
      this.state.queues.set(
        key,
        queue.filter((credit) => credit.remaining > 0n)
      );
      this.runtime.tokens.transfer(token, this.address, destination, amount);

      logger.bridge.info('Credits consumed', {
        user: shortAddress(user),
        amount,
        credits: consumed.length,
        destination: shortAddress(destination),
      });
      return consumed;
    });
  }
}
