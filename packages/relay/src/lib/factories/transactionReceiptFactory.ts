// SPDX-License-Identifier: Apache-2.0

import { numberTo0x } from '../../formatters';
import type { ITransactionReceipt } from '../model';
import type { ChainReceipt } from '../types';
import { LogFactory } from './logFactory';

/**
 * Factory for transaction receipts
 */
class TransactionReceiptFactory {
  /**
   * Creates the wire receipt. `contractAddress` is only set for contract creations,
   * in which case `to` stays null.
   */
  public static createReceipt(receipt: ChainReceipt): ITransactionReceipt {
    return {
      blockHash: receipt.blockHash,
      blockNumber: numberTo0x(receipt.blockNumber),
      contractAddress: receipt.to === null ? receipt.contractAddress : null,
      cumulativeGasUsed: numberTo0x(receipt.cumulativeGasUsed),
      effectiveGasPrice: numberTo0x(receipt.effectiveGasPrice),
      from: receipt.from,
      gasUsed: numberTo0x(receipt.gasUsed),
      logs: receipt.logs.map((log) => LogFactory.createLog(log)),
      logsBloom: receipt.logsBloom,
      status: numberTo0x(receipt.status),
      to: receipt.to,
      transactionHash: receipt.transactionHash,
      transactionIndex: numberTo0x(receipt.transactionIndex),
      type: numberTo0x(receipt.type),
    };
  }
}

export { TransactionReceiptFactory };
