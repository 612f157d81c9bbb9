/**
 * Bridge payload codec
 *
 * Wire format: abi.encode(address pool, address user, address token,
 * uint256 amount, uint8 action). Message ids hash the source chain,
 * the sender's nonce and the payload.
 */

import { decodeAbiParameters, encodeAbiParameters, keccak256, type Hex } from 'viem';
import type { BridgeAction, BridgePayload } from './types.js';
import { LendingError } from '../utils/errors.js';

const PAYLOAD_PARAMS = [
  { name: 'pool', type: 'address' },
  { name: 'user', type: 'address' },
  { name: 'token', type: 'address' },
  { name: 'amount', type: 'uint256' },
  { name: 'action', type: 'uint8' },
] as const;

const MESSAGE_ID_PARAMS = [
  { name: 'sourceChainId', type: 'uint256' },
  { name: 'nonce', type: 'uint256' },
  { name: 'payload', type: 'bytes' },
] as const;

const ACTION_CODES: Record<BridgeAction, number> = {
  supplyLiquidity: 1,
  supplyCollateral: 2,
  repay: 3,
  borrowDelivery: 4,
};

function actionFromCode(code: number): BridgeAction | undefined {
  for (const [action, value] of Object.entries(ACTION_CODES)) {
    if (value === code && isBridgeAction(action)) return action;
  }
  return undefined;
}

function isBridgeAction(value: string): value is BridgeAction {
  return value in ACTION_CODES;
}

export function encodeBridgePayload(payload: BridgePayload): Hex {
  return encodeAbiParameters(PAYLOAD_PARAMS, [
    payload.pool,
    payload.user,
    payload.token,
    payload.amount,
    ACTION_CODES[payload.action],
  ]);
}

function decodeRaw(data: Hex) {
  try {
    return decodeAbiParameters(PAYLOAD_PARAMS, data);
  } catch (error) {
    throw new LendingError('INVALID_PAYLOAD', 'payload is not abi-encoded (address,address,address,uint256,uint8)', {}, {
      cause: error,
    });
  }
}

/**
 * @throws LendingError INVALID_PAYLOAD
 */
export function decodeBridgePayload(data: Hex): BridgePayload {
  const [pool, user, token, amount, code] = decodeRaw(data);
  const action = actionFromCode(code);
  if (action === undefined) {
    throw new LendingError('INVALID_PAYLOAD', `unknown action code ${code}`, { code });
  }
  return { pool, user, token, amount, action };
}

export function computeMessageId(sourceChainId: number, nonce: bigint, payload: Hex): Hex {
  return keccak256(encodeAbiParameters(MESSAGE_ID_PARAMS, [BigInt(sourceChainId), nonce, payload]));
}
