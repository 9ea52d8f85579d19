// SPDX-License-Identifier: Apache-2.0

import type { ITransactionReceipt, Transaction } from '../../../model';
import type { BlockRef, RequestDetails, TransactionRequest } from '../../../types';

export interface ITransactionService {
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

  getTransactionReceipt(hash: string, requestDetails: RequestDetails): Promise<ITransactionReceipt | null>;

  sendRawTransaction(transaction: string, requestDetails: RequestDetails): Promise<string>;

  sendTransaction(request: TransactionRequest, requestDetails: RequestDetails): Promise<string>;
}
