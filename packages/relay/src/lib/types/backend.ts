// SPDX-License-Identifier: Apache-2.0

import type { ChainBlock, ChainLog, ChainReceipt, ChainTransaction, MiningWork, SyncProgress } from './chain';
import type { CallRequest, UnsignedTransaction } from './requestParams';

/**
 * Block, transaction, receipt and log lookups over the canonical chain.
 */
export interface ChainHistory {
  latestBlock(): Promise<ChainBlock>;

  /**
   * The speculative next block. Backends without a pending block concept leave
   * this out, and pending lookups are served from the latest block.
   */
  pendingBlock?(): Promise<ChainBlock | null>;

  blockByNumber(number: bigint): Promise<ChainBlock | null>;

  blockByHash(hash: string): Promise<ChainBlock | null>;

  /**
   * Only included transactions; pooled ones are served by {@link TransactionPool}.
   */
  transactionByHash(hash: string): Promise<ChainTransaction | null>;

  receiptByHash(hash: string): Promise<ChainReceipt | null>;

  logsByBlockHash(hash: string): Promise<ChainLog[]>;

  /**
   * null once the node considers itself synced.
   */
  syncStatus(): Promise<SyncProgress | null>;
}

export interface StateTarget {
  hash: string;
  number: bigint;
  pending: boolean;
}

/**
 * Point-in-time account state. Each lookup returns null when nothing is recorded.
 */
export interface StateSnapshot {
  balance(address: string): Promise<bigint | null>;
  nonce(address: string): Promise<bigint | null>;
  code(address: string): Promise<string | null>;
  storage(address: string, slot: string): Promise<string | null>;
}

export interface ChainState {
  /**
   * Opens the state at a resolved block; null when that state is no longer available.
   */
  stateAt(target: StateTarget): Promise<StateSnapshot | null>;
}

export interface TransactionPool {
  /**
   * Admits a signed transaction and resolves with its hash once admission is durable.
   * Byte-identical resubmissions resolve with the same hash without queuing a duplicate.
   */
  submit(rawTransaction: string): Promise<string>;

  pendingTransaction(hash: string): Promise<ChainTransaction | null>;

  nextNonce(address: string): Promise<bigint>;

  gasPrice(): Promise<bigint>;
}

export interface ExecutionContext {
  block: ChainBlock;
  state: StateSnapshot;
}

export type ExecutionOutcome =
  | { kind: 'success'; output: string; gasUsed: bigint }
  | { kind: 'revert'; output: string; gasUsed: bigint }
  | { kind: 'halt'; output: string; gasUsed: bigint; reason: string };

/**
 * Runs calls in a sandbox whose state changes are discarded.
 * Throws an ExecutionError when the call cannot be started at all.
 */
export interface Executor {
  execute(request: CallRequest, context: ExecutionContext): Promise<ExecutionOutcome>;
}

/**
 * Resident proof-of-work state; every member answers synchronously.
 */
export interface MiningCoordinator {
  isMining(): boolean;
  coinbase(): string | null;
  hashrate(): bigint;
  submitHashrate(rate: bigint, id: string): boolean;
  currentWork(): MiningWork | null;
  submitWork(nonce: string, powHash: string, mixHash: string): boolean;
}

export interface TransactionSigner {
  accounts(): string[];
  signTransaction(transaction: UnsignedTransaction): Promise<string>;
}

/**
 * Everything the facade needs from the node it fronts.
 */
export interface ChainBackend {
  history: ChainHistory;
  state: ChainState;
  pool: TransactionPool;
  executor: Executor;
  mining?: MiningCoordinator;
  signer?: TransactionSigner;
}
