// SPDX-License-Identifier: Apache-2.0

import { JsonRpcError, predefined } from './lib/errors/JsonRpcError';
import type { Block, ISyncStatus, ITransactionReceipt, Log, Transaction } from './lib/model';
import type { BlockRef, CallRequest, LogFilter, RequestDetails, TransactionRequest } from './lib/types';

export { JsonRpcError, predefined };
export { ChainBackendError } from './lib/errors/ChainBackendError';
export type { ChainBackendErrorKind } from './lib/errors/ChainBackendError';
export { ExecutionError } from './lib/errors/ExecutionError';
export { ResolutionError } from './lib/errors/ResolutionError';

export { Relay } from './lib/relay';
export { METHOD_RESULT_POLICY, ResultPolicy } from './lib/config/methodResultPolicy';
export * from './lib/types';
export * from './lib/model';

/**
 * The read path of the `eth` namespace.
 */
export interface Eth {
  accounts(requestDetails: RequestDetails): string[];

  blockNumber(requestDetails: RequestDetails): Promise<string>;

  chainId(requestDetails: RequestDetails): string | null;

  gasPrice(requestDetails: RequestDetails): Promise<string>;

  getBalance(address: string, blockRef: BlockRef, requestDetails: RequestDetails): Promise<string | null>;

  getBlockByHash(hash: string, showDetails: boolean, requestDetails: RequestDetails): Promise<Block | null>;

  getBlockByNumber(blockRef: BlockRef, showDetails: boolean, requestDetails: RequestDetails): Promise<Block | null>;

  getBlockTransactionCountByHash(hash: string, requestDetails: RequestDetails): Promise<string | null>;

  getBlockTransactionCountByNumber(blockRef: BlockRef, requestDetails: RequestDetails): Promise<string | null>;

  getCode(address: string, blockRef: BlockRef, requestDetails: RequestDetails): Promise<string | null>;

  getLogs(filter: LogFilter, requestDetails: RequestDetails): Promise<Log[] | null>;

  getStorageAt(
    address: string,
    slot: string,
    blockRef: BlockRef,
    requestDetails: RequestDetails,
  ): Promise<string | null>;

  getTransactionByBlockHashAndIndex(
    hash: string,
    index: number,
    requestDetails: RequestDetails,
  ): Promise<Transaction | null>;

  getTransactionByBlockNumberAndIndex(
    blockRef: BlockRef,
    index: number,
    requestDetails: RequestDetails,
  ): Promise<Transaction | null>;

  getTransactionByHash(hash: string, requestDetails: RequestDetails): Promise<Transaction | null>;

  getTransactionCount(address: string, blockRef: BlockRef, requestDetails: RequestDetails): Promise<string | null>;

  getTransactionReceipt(hash: string, requestDetails: RequestDetails): Promise<ITransactionReceipt | null>;

  getUncleByBlockHashAndIndex(hash: string, index: number, requestDetails: RequestDetails): Promise<Block | null>;

  getUncleByBlockNumberAndIndex(blockRef: BlockRef, index: number, requestDetails: RequestDetails): Promise<Block | null>;

  getUncleCountByBlockHash(hash: string, requestDetails: RequestDetails): Promise<string | null>;

  getUncleCountByBlockNumber(blockRef: BlockRef, requestDetails: RequestDetails): Promise<string | null>;

  protocolVersion(requestDetails: RequestDetails): string;

  syncing(requestDetails: RequestDetails): Promise<false | ISyncStatus>;
}

/**
 * The calls of the `eth` namespace that execute or submit transactions.
 */
export interface EthWrite {
  call(call: CallRequest, blockRef: BlockRef, requestDetails: RequestDetails): Promise<string | null>;

  estimateGas(call: CallRequest, blockRef: BlockRef, requestDetails: RequestDetails): Promise<string | JsonRpcError | null>;

  sendRawTransaction(transaction: string, requestDetails: RequestDetails): Promise<string>;

  sendTransaction(request: TransactionRequest, requestDetails: RequestDetails): Promise<string>;
}

/**
 * The proof-of-work calls of the `eth` namespace. They never wait on I/O.
 */
export interface EthMining {
  coinbase(requestDetails: RequestDetails): string;

  getWork(requestDetails: RequestDetails): string[];

  hashrate(requestDetails: RequestDetails): string;

  mining(requestDetails: RequestDetails): boolean;

  submitHashrate(rate: bigint, id: string, requestDetails: RequestDetails): boolean;

  submitWork(nonce: string, powHash: string, mixHash: string, requestDetails: RequestDetails): boolean;
}
