// SPDX-License-Identifier: Apache-2.0

/**
 * Wire shapes of the objects returned to JSON-RPC clients. Every quantity is
 * a minimal 0x-prefixed hex string.
 */

export interface BlockFields {
  baseFeePerGas?: string;
  difficulty: string;
  extraData: string;
  gasLimit: string;
  gasUsed: string;
  hash: string;
  logsBloom: string;
  miner: string;
  mixHash: string;
  nonce: string;
  number: string;
  parentHash: string;
  receiptsRoot: string;
  sha3Uncles: string;
  size: string;
  stateRoot: string;
  timestamp: string;
  totalDifficulty: string;
  transactions: string[] | Transaction[];
  transactionsRoot: string;
  uncles: string[];
}

export class Block {
  public readonly baseFeePerGas?: string;
  public readonly difficulty: string;
  public readonly extraData: string;
  public readonly gasLimit: string;
  public readonly gasUsed: string;
  public readonly hash: string;
  public readonly logsBloom: string;
  public readonly miner: string;
  public readonly mixHash: string;
  public readonly nonce: string;
  public readonly number: string;
  public readonly parentHash: string;
  public readonly receiptsRoot: string;
  public readonly sha3Uncles: string;
  public readonly size: string;
  public readonly stateRoot: string;
  public readonly timestamp: string;
  public readonly totalDifficulty: string;
  public readonly transactions: string[] | Transaction[];
  public readonly transactionsRoot: string;
  public readonly uncles: string[];

  constructor(args: BlockFields) {
    // pre-London blocks carry no base fee and must not show the field at all
    if (args.baseFeePerGas !== undefined) {
      this.baseFeePerGas = args.baseFeePerGas;
    }
    this.difficulty = args.difficulty;
    this.extraData = args.extraData;
    this.gasLimit = args.gasLimit;
    this.gasUsed = args.gasUsed;
    this.hash = args.hash;
    this.logsBloom = args.logsBloom;
    this.miner = args.miner;
    this.mixHash = args.mixHash;
    this.nonce = args.nonce;
    this.number = args.number;
    this.parentHash = args.parentHash;
    this.receiptsRoot = args.receiptsRoot;
    this.sha3Uncles = args.sha3Uncles;
    this.size = args.size;
    this.stateRoot = args.stateRoot;
    this.timestamp = args.timestamp;
    this.totalDifficulty = args.totalDifficulty;
    this.transactions = args.transactions;
    this.transactionsRoot = args.transactionsRoot;
    this.uncles = args.uncles;
  }

  getNumber(): number {
    return Number(this.number);
  }
}

export interface TransactionFields {
  blockHash: string | null;
  blockNumber: string | null;
  chainId?: string;
  from: string;
  gas: string;
  gasPrice: string;
  hash: string;
  input: string;
  nonce: string;
  r: string;
  s: string;
  to: string | null;
  transactionIndex: string | null;
  type: string;
  v: string;
  value: string;
}

export class Transaction {
  public readonly blockHash: string | null;
  public readonly blockNumber: string | null;
  public readonly chainId?: string;
  public readonly from: string;
  public readonly gas: string;
  public readonly gasPrice: string;
  public readonly hash: string;
  public readonly input: string;
  public readonly nonce: string;
  public readonly r: string;
  public readonly s: string;
  public readonly to: string | null;
  public readonly transactionIndex: string | null;
  public readonly type: string;
  public readonly v: string;
  public readonly value: string;

  constructor(args: TransactionFields) {
    this.blockHash = args.blockHash;
    this.blockNumber = args.blockNumber;
    if (args.chainId !== undefined) {
      this.chainId = args.chainId;
    }
    this.from = args.from;
    this.gas = args.gas;
    this.gasPrice = args.gasPrice;
    this.hash = args.hash;
    this.input = args.input;
    this.nonce = args.nonce;
    this.r = args.r;
    this.s = args.s;
    this.to = args.to;
    this.transactionIndex = args.transactionIndex;
    this.type = args.type;
    this.v = args.v;
    this.value = args.value;
  }
}

export interface AccessListEntry {
  address: string;
  storageKeys: string[];
}

export interface Transaction2930Fields extends TransactionFields {
  accessList: AccessListEntry[];
}

export class Transaction2930 extends Transaction {
  public readonly accessList: AccessListEntry[];
  public readonly yParity: string;

  constructor(args: Transaction2930Fields) {
    super(args);
    this.accessList = args.accessList;
    this.yParity = args.v;
  }
}

export interface Transaction1559Fields extends Transaction2930Fields {
  maxPriorityFeePerGas: string;
  maxFeePerGas: string;
}

export class Transaction1559 extends Transaction2930 {
  public readonly maxPriorityFeePerGas: string;
  public readonly maxFeePerGas: string;

  constructor(args: Transaction1559Fields) {
    super(args);
    this.maxPriorityFeePerGas = args.maxPriorityFeePerGas;
    this.maxFeePerGas = args.maxFeePerGas;
  }
}

export interface LogFields {
  address: string;
  blockHash: string;
  blockNumber: string;
  data: string;
  logIndex: string;
  removed: boolean;
  topics: string[];
  transactionHash: string;
  transactionIndex: string;
}

export class Log {
  public readonly address: string;
  public readonly blockHash: string;
  public readonly blockNumber: string;
  public readonly data: string;
  public readonly logIndex: string;
  public readonly removed: boolean;
  public readonly topics: string[];
  public readonly transactionHash: string;
  public readonly transactionIndex: string;

  constructor(args: LogFields) {
    this.address = args.address;
    this.blockHash = args.blockHash;
    this.blockNumber = args.blockNumber;
    this.data = args.data;
    this.logIndex = args.logIndex;
    this.removed = args.removed;
    this.topics = args.topics;
    this.transactionHash = args.transactionHash;
    this.transactionIndex = args.transactionIndex;
  }
}

export interface ITransactionReceipt {
  blockHash: string;
  blockNumber: string;
  contractAddress: string | null;
  cumulativeGasUsed: string;
  effectiveGasPrice: string;
  from: string;
  gasUsed: string;
  logs: Log[];
  logsBloom: string;
  status: string;
  to: string | null;
  transactionHash: string;
  transactionIndex: string;
  type: string;
}

/**
 * The eth_syncing result while the node is still catching up.
 */
export interface ISyncStatus {
  startingBlock: string;
  currentBlock: string;
  highestBlock: string;
}
