// SPDX-License-Identifier: Apache-2.0

/**
 * What a null handler result means for the client.
 */
export enum ResultPolicy {
  // null is a valid answer and is returned as is
  OPTIONAL = 'optional',
  // null means the resource is missing and is reported as an error
  REQUIRED = 'required',
}

/**
 * Result policy of every registered method. The dispatcher treats methods missing
 * from this table as REQUIRED.
 */
export const METHOD_RESULT_POLICY: Readonly<Record<string, ResultPolicy>> = {
  eth_accounts: ResultPolicy.REQUIRED,
  eth_blockNumber: ResultPolicy.REQUIRED,
  eth_chainId: ResultPolicy.OPTIONAL,
  eth_gasPrice: ResultPolicy.REQUIRED,
  eth_protocolVersion: ResultPolicy.REQUIRED,
  eth_syncing: ResultPolicy.REQUIRED,

  eth_getBalance: ResultPolicy.REQUIRED,
  eth_getCode: ResultPolicy.REQUIRED,
  eth_getStorageAt: ResultPolicy.REQUIRED,
  eth_getTransactionCount: ResultPolicy.REQUIRED,

  eth_getBlockByHash: ResultPolicy.OPTIONAL,
  eth_getBlockByNumber: ResultPolicy.OPTIONAL,
  eth_getBlockTransactionCountByHash: ResultPolicy.OPTIONAL,
  eth_getBlockTransactionCountByNumber: ResultPolicy.OPTIONAL,
  eth_getUncleByBlockHashAndIndex: ResultPolicy.OPTIONAL,
  eth_getUncleByBlockNumberAndIndex: ResultPolicy.OPTIONAL,
  eth_getUncleCountByBlockHash: ResultPolicy.OPTIONAL,
  eth_getUncleCountByBlockNumber: ResultPolicy.OPTIONAL,

  eth_getTransactionByBlockHashAndIndex: ResultPolicy.OPTIONAL,
  eth_getTransactionByBlockNumberAndIndex: ResultPolicy.OPTIONAL,
  eth_getTransactionByHash: ResultPolicy.OPTIONAL,
  eth_getTransactionReceipt: ResultPolicy.OPTIONAL,

  eth_getLogs: ResultPolicy.REQUIRED,

  eth_call: ResultPolicy.REQUIRED,
  eth_estimateGas: ResultPolicy.REQUIRED,
  eth_sendRawTransaction: ResultPolicy.REQUIRED,
  eth_sendTransaction: ResultPolicy.REQUIRED,

  eth_coinbase: ResultPolicy.REQUIRED,
  eth_getWork: ResultPolicy.REQUIRED,
  eth_hashrate: ResultPolicy.REQUIRED,
  eth_mining: ResultPolicy.REQUIRED,
  eth_submitHashrate: ResultPolicy.REQUIRED,
  eth_submitWork: ResultPolicy.REQUIRED,
};
