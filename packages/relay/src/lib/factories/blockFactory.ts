// SPDX-License-Identifier: Apache-2.0

import { numberTo0x } from '../../formatters';
import { Block } from '../model';
import type { ChainBlock, ChainBlockHeader } from '../types';
import { TransactionFactory } from './transactionFactory';

export class BlockFactory {
  /**
   * Builds the wire block. With `showDetails` the transactions are full objects,
   * otherwise only their hashes.
   */
  static createBlock(block: ChainBlock, showDetails: boolean): Block {
    const transactions = showDetails
      ? block.transactions.map((transaction) => TransactionFactory.createTransaction(transaction))
      : block.transactions.map((transaction) => transaction.hash);

    return new Block({
      ...BlockFactory.headerFields(block),
      transactions,
      uncles: block.uncles.map((uncle) => uncle.hash),
    });
  }

  /**
   * Uncles are served header only: no transactions and no nested uncles.
   */
  static createUncle(header: ChainBlockHeader): Block {
    return new Block({
      ...BlockFactory.headerFields(header),
      transactions: [],
      uncles: [],
    });
  }

  private static headerFields(header: ChainBlockHeader) {
    return {
      baseFeePerGas: header.baseFeePerGas === undefined ? undefined : numberTo0x(header.baseFeePerGas),
      difficulty: numberTo0x(header.difficulty),
      extraData: header.extraData,
      gasLimit: numberTo0x(header.gasLimit),
      gasUsed: numberTo0x(header.gasUsed),
      hash: header.hash,
      logsBloom: header.logsBloom,
      miner: header.miner,
      mixHash: header.mixHash,
      nonce: header.nonce,
      number: numberTo0x(header.number),
      parentHash: header.parentHash,
      receiptsRoot: header.receiptsRoot,
      sha3Uncles: header.sha3Uncles,
      size: numberTo0x(header.size),
      stateRoot: header.stateRoot,
      timestamp: numberTo0x(header.timestamp),
      totalDifficulty: numberTo0x(header.totalDifficulty),
      transactionsRoot: header.transactionsRoot,
    };
  }
}
