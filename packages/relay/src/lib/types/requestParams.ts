// SPDX-License-Identifier: Apache-2.0

import type { BlockRef } from './blockRef';
import type { ChainAccessListEntry } from './chain';

/**
 * A synthetic transaction used by eth_call and eth_estimateGas; never pooled.
 */
export interface CallRequest {
  from?: string;
  to?: string | null;
  gas?: bigint;
  gasPrice?: bigint;
  maxFeePerGas?: bigint;
  maxPriorityFeePerGas?: bigint;
  value?: bigint;
  data?: string;
  nonce?: bigint;
  type?: number;
  chainId?: bigint;
  accessList?: ChainAccessListEntry[];
}

/**
 * Transaction to be completed, signed by the node's signer and submitted to the pool.
 */
export interface TransactionRequest extends CallRequest {
  from: string;
}

/**
 * A transaction request with every field the signer needs filled in.
 */
export interface UnsignedTransaction {
  from: string;
  to: string | null;
  nonce: bigint;
  gas: bigint;
  value: bigint;
  data: string;
  chainId?: bigint;
  gasPrice?: bigint;
  maxFeePerGas?: bigint;
  maxPriorityFeePerGas?: bigint;
  type?: number;
  accessList?: ChainAccessListEntry[];
}

export type TopicFilter = (string[] | null)[];

export type LogFilter =
  | {
      readonly kind: 'range';
      readonly fromBlock: BlockRef;
      readonly toBlock: BlockRef;
      readonly addresses: string[];
      readonly topics: TopicFilter;
    }
  | {
      readonly kind: 'blockHash';
      readonly blockHash: string;
      readonly addresses: string[];
      readonly topics: TopicFilter;
    };
