// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@eth-facade/config-service';
import type { Logger } from 'pino';

import constants from '../../../constants';
import { JsonRpcError, predefined } from '../../../errors/JsonRpcError';
import { TransactionFactory } from '../../../factories/transactionFactory';
import { TransactionReceiptFactory } from '../../../factories/transactionReceiptFactory';
import type { ITransactionReceipt, Transaction } from '../../../model';
import {
  type BlockRef,
  BlockTag,
  type ChainBackend,
  type RequestDetails,
  type TransactionRequest,
  type UnsignedTransaction,
} from '../../../types';
import type { IContractService } from '../contractService/IContractService';
import type { ICommonService } from '../ethCommonService/ICommonService';
import type { ITransactionService } from './ITransactionService';

export class TransactionService implements ITransactionService {
  /**
   * The node the facade fronts.
   *
   * @private
   */
  private readonly backend: ChainBackend;

  /**
   * The Common Service implementation that contains logic shared by other services.
   *
   * @private
   */
  private readonly common: ICommonService;

  /**
   * Fills in the gas limit of transactions sent without one.
   *
   * @private
   */
  private readonly contractService: IContractService;

  /**
   * Logger instance for logging messages.
   *
   * @private
   */
  private readonly logger: Logger;

  constructor(backend: ChainBackend, common: ICommonService, contractService: IContractService, logger: Logger) {
    this.backend = backend;
    this.common = common;
    this.contractService = contractService;
    this.logger = logger;
  }

  /**
   * Gets the transaction at the given index of the block with the given hash.
   *
   * @param {string} hash - The block hash
   * @param {number} index - The transaction index
   * @param {RequestDetails} requestDetails - Details about the request for logging and tracking
   */
  async getTransactionByBlockHashAndIndex(
    hash: string,
    index: number,
    requestDetails: RequestDetails,
  ): Promise<Transaction | null> {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(
        `${requestDetails.formattedRequestId} getTransactionByBlockHashAndIndex(hash=${hash}, index=${index})`,
      );
    }
    return this.transactionAt({ kind: 'hash', hash }, index, requestDetails);
  }

  /**
   * Gets the transaction at the given index of the block with the given number or tag.
   *
   * @param {BlockRef} blockRef - The block number or tag
   * @param {number} index - The transaction index
   * @param {RequestDetails} requestDetails - Details about the request for logging and tracking
   */
  async getTransactionByBlockNumberAndIndex(
    blockRef: BlockRef,
    index: number,
    requestDetails: RequestDetails,
  ): Promise<Transaction | null> {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} getTransactionByBlockNumberAndIndex(index=${index})`);
    }
    return this.transactionAt(blockRef, index, requestDetails);
  }

  /**
   * Gets an included transaction, falling back to the pool. Pooled transactions
   * come back with null block fields.
   *
   * @param {string} hash - The transaction hash
   * @param {RequestDetails} requestDetails - Details about the request for logging and tracking
   */
  async getTransactionByHash(hash: string, requestDetails: RequestDetails): Promise<Transaction | null> {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} getTransactionByHash(hash=${hash})`);
    }

    const included = await this.backend.history.transactionByHash(hash);
    if (included) {
      return TransactionFactory.createTransaction(included);
    }

    const pooled = await this.backend.pool.pendingTransaction(hash);
    if (!pooled) {
      this.logger.debug(`${requestDetails.formattedRequestId} Transaction ${hash} is neither included nor pooled`);
      return null;
    }
    return TransactionFactory.createTransaction({
      ...pooled,
      blockHash: null,
      blockNumber: null,
      transactionIndex: null,
    });
  }

  /**
   * Gets the receipt of an included transaction; pooled transactions have none.
   *
   * @param {string} hash - The transaction hash
   * @param {RequestDetails} requestDetails - Details about the request for logging and tracking
   */
  async getTransactionReceipt(hash: string, requestDetails: RequestDetails): Promise<ITransactionReceipt | null> {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} getTransactionReceipt(hash=${hash})`);
    }

    const receipt = await this.backend.history.receiptByHash(hash);
    return receipt ? TransactionReceiptFactory.createReceipt(receipt) : null;
  }

  /**
   * Hands the signed bytes to the pool unchanged and returns the hash once admitted.
   *
   * @param {string} transaction - The raw signed transaction
   * @param {RequestDetails} requestDetails - Details about the request for logging and tracking
   */
  async sendRawTransaction(transaction: string, requestDetails: RequestDetails): Promise<string> {
    const requestIdPrefix = requestDetails.formattedRequestId;
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestIdPrefix} sendRawTransaction(size=${(transaction.length - 2) / 2})`);
    }

    this.common.throwIfAborted(requestDetails);
    const hash = await this.backend.pool.submit(transaction);
    this.logger.info(`${requestIdPrefix} Transaction ${hash} admitted to the pool`);
    return hash;
  }

  /**
   * Completes the request from the pool and the latest block, has the node's
   * signer sign it and submits it like a raw transaction.
   *
   * @param {TransactionRequest} request - The transaction to send
   * @param {RequestDetails} requestDetails - Details about the request for logging and tracking
   */
  async sendTransaction(request: TransactionRequest, requestDetails: RequestDetails): Promise<string> {
    const requestIdPrefix = requestDetails.formattedRequestId;
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestIdPrefix} sendTransaction(from=${request.from}, to=${request.to})`);
    }

    const signer = this.backend.signer;
    const from = request.from.toLowerCase();
    if (!signer || !signer.accounts().some((account) => account.toLowerCase() === from)) {
      throw predefined.UNKNOWN_ACCOUNT(request.from);
    }

    const unsigned: UnsignedTransaction = {
      from,
      to: request.to ?? null,
      nonce: request.nonce ?? (await this.backend.pool.nextNonce(from)),
      gas: request.gas ?? (await this.estimateGasLimit(request, requestDetails)),
      value: request.value ?? 0n,
      data: request.data ?? '0x',
      chainId: this.chainId(request),
    };
    if (request.type !== undefined) {
      unsigned.type = request.type;
    }
    if (request.accessList !== undefined) {
      unsigned.accessList = request.accessList;
    }

    const dynamicFee =
      request.type !== undefined
        ? request.type === constants.TX_TYPE_DYNAMIC_FEE
        : request.maxFeePerGas !== undefined || request.maxPriorityFeePerGas !== undefined;
    if (dynamicFee) {
      const gasPrice = await this.backend.pool.gasPrice();
      unsigned.maxFeePerGas = request.maxFeePerGas ?? gasPrice;
      unsigned.maxPriorityFeePerGas = request.maxPriorityFeePerGas ?? gasPrice;
    } else {
      unsigned.gasPrice = request.gasPrice ?? (await this.backend.pool.gasPrice());
    }

    this.common.throwIfAborted(requestDetails);
    const raw = await signer.signTransaction(unsigned);
    return this.sendRawTransaction(raw, requestDetails);
  }

  private async estimateGasLimit(request: TransactionRequest, requestDetails: RequestDetails): Promise<bigint> {
    const latest: BlockRef = { kind: 'tag', tag: BlockTag.LATEST };
    const estimate = await this.contractService.estimateGas(request, latest, requestDetails);
    if (estimate instanceof JsonRpcError) {
      throw estimate;
    }
    if (estimate === null) {
      throw predefined.INTERNAL_ERROR('latest block unavailable while estimating gas');
    }
    return BigInt(estimate);
  }

  private chainId(request: TransactionRequest): bigint | undefined {
    if (request.chainId !== undefined) {
      return request.chainId;
    }
    const configured = ConfigService.get('CHAIN_ID');
    return configured === undefined ? undefined : BigInt(configured);
  }

  private async transactionAt(
    blockRef: BlockRef,
    index: number,
    requestDetails: RequestDetails,
  ): Promise<Transaction | null> {
    const resolved = await this.common.resolveBlock(blockRef, requestDetails);
    const transaction = resolved?.block.transactions[index];
    return transaction ? TransactionFactory.createTransaction(transaction) : null;
  }
}
