// SPDX-License-Identifier: Apache-2.0

import { numberTo0x } from '../../formatters';
import constants from '../constants';
import { Transaction, Transaction1559, Transaction2930, type TransactionFields } from '../model';
import type { ChainTransaction } from '../types';

// TransactionFactory is a factory class that creates a Transaction object based on the type of transaction.
export class TransactionFactory {
  public static createTransaction(transaction: ChainTransaction): Transaction {
    const fields: TransactionFields = {
      blockHash: transaction.blockHash,
      blockNumber: transaction.blockNumber === null ? null : numberTo0x(transaction.blockNumber),
      chainId: transaction.chainId === undefined ? undefined : numberTo0x(transaction.chainId),
      from: transaction.from,
      gas: numberTo0x(transaction.gas),
      gasPrice: numberTo0x(transaction.gasPrice ?? transaction.maxFeePerGas ?? 0n),
      hash: transaction.hash,
      input: transaction.input,
      nonce: numberTo0x(transaction.nonce),
      r: transaction.r,
      s: transaction.s,
      to: transaction.to,
      transactionIndex: transaction.transactionIndex === null ? null : numberTo0x(transaction.transactionIndex),
      type: numberTo0x(transaction.type),
      v: numberTo0x(transaction.v),
      value: numberTo0x(transaction.value),
    };

    switch (transaction.type) {
      case constants.TX_TYPE_ACCESS_LIST:
        return new Transaction2930({ ...fields, accessList: transaction.accessList ?? [] }); // eip 2930 fields
      case constants.TX_TYPE_DYNAMIC_FEE:
        return new Transaction1559({
          ...fields,
          accessList: transaction.accessList ?? [],
          maxPriorityFeePerGas: numberTo0x(transaction.maxPriorityFeePerGas ?? 0n),
          maxFeePerGas: numberTo0x(transaction.maxFeePerGas ?? 0n),
        }); // eip 1559 fields
      default:
        return new Transaction(fields); // eip 155 fields
    }
  }
}
