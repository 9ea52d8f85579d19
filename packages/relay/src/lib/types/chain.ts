// SPDX-License-Identifier: Apache-2.0

/**
 * Records served by the chain backend. Quantities are bigint, hashes, addresses
 * and byte strings are 0x-prefixed lowercase hex.
 */

export interface ChainBlockHeader {
  number: bigint;
  hash: string;
  parentHash: string;
  nonce: string;
  mixHash: string;
  sha3Uncles: string;
  logsBloom: string;
  transactionsRoot: string;
  stateRoot: string;
  receiptsRoot: string;
  miner: string;
  difficulty: bigint;
  totalDifficulty: bigint;
  extraData: string;
  size: bigint;
  gasLimit: bigint;
  gasUsed: bigint;
  timestamp: bigint;
  baseFeePerGas?: bigint;
}

export interface ChainBlock extends ChainBlockHeader {
  transactions: ChainTransaction[];
  uncles: ChainBlockHeader[];
}

export interface ChainAccessListEntry {
  address: string;
  storageKeys: string[];
}

export interface ChainTransaction {
  hash: string;
  nonce: bigint;
  from: string;
  to: string | null;
  value: bigint;
  gas: bigint;
  gasPrice?: bigint;
  maxFeePerGas?: bigint;
  maxPriorityFeePerGas?: bigint;
  input: string;
  type: number;
  chainId?: bigint;
  accessList?: ChainAccessListEntry[];
  v: bigint;
  r: string;
  s: string;
  // null while the transaction is still pooled
  blockHash: string | null;
  blockNumber: bigint | null;
  transactionIndex: number | null;
}

export interface ChainLog {
  address: string;
  topics: string[];
  data: string;
  blockHash: string;
  blockNumber: bigint;
  transactionHash: string;
  transactionIndex: number;
  logIndex: number;
  removed: boolean;
}

export interface ChainReceipt {
  transactionHash: string;
  transactionIndex: number;
  blockHash: string;
  blockNumber: bigint;
  from: string;
  to: string | null;
  cumulativeGasUsed: bigint;
  gasUsed: bigint;
  effectiveGasPrice: bigint;
  contractAddress: string | null;
  logs: ChainLog[];
  logsBloom: string;
  status: bigint;
  type: number;
}

export interface SyncProgress {
  startingBlock: bigint;
  currentBlock: bigint;
  highestBlock: bigint;
}

export interface MiningWork {
  powHash: string;
  seedHash: string;
  target: string;
  number?: bigint;
}
