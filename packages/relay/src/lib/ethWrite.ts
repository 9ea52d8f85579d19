// SPDX-License-Identifier: Apache-2.0

import type { Logger } from 'pino';

import type { EthWrite } from '../index';
import constants from './constants';
import { RPC_LAYOUT, rpcMethod, rpcParamLayoutConfig, rpcParamValidationRules } from './decorators';
import type { JsonRpcError } from './errors/JsonRpcError';
import type { IContractService, ITransactionService } from './services';
import { type BlockRef, type CallRequest, ParamType, type RequestDetails, type TransactionRequest } from './types';
import { parseBlockRef, parseCallRequest, parseTransactionRequest } from './validators';

/**
 * Implementation of the "eth_" methods that execute calls or submit transactions.
 */
export class EthWriteImpl implements EthWrite {
  /**
   * The ContractService implementation that takes care of all contract related operations.
   * @private
   */
  private readonly contractService: IContractService;

  /**
   * The logger used for logging all output from this class.
   * @private
   */
  private readonly logger: Logger;

  /**
   * The Transaction Service implementation that handles all transaction-related operations.
   * @private
   */
  private readonly transactionService: ITransactionService;

  constructor(contractService: IContractService, transactionService: ITransactionService, logger: Logger) {
    this.contractService = contractService;
    this.transactionService = transactionService;
    this.logger = logger;
  }

  /**
   * Executes a message call against the state of the given block without creating a transaction.
   *
   * @rpcMethod Exposed as eth_call RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   *
   * @param {CallRequest} call - The call to execute
   * @param {BlockRef} blockRef - The block to execute on; latest when omitted
   * @param {RequestDetails} requestDetails - The details of the request for logging and tracking.
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.TRANSACTION, required: true },
    1: { type: ParamType.BLOCK_PARAMS, required: false },
  })
  @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [parseCallRequest(params[0], 0), parseBlockRef(params[1], 1)]))
  async call(call: CallRequest, blockRef: BlockRef, requestDetails: RequestDetails): Promise<string | null> {
    return this.contractService.call(call, blockRef, requestDetails);
  }

  /**
   * Estimates the gas limit the call needs to succeed.
   *
   * @rpcMethod Exposed as eth_estimateGas RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   *
   * @param {CallRequest} call - The call to estimate
   * @param {BlockRef} blockRef - The block to estimate on; latest when omitted
   * @param {RequestDetails} requestDetails - The details of the request for logging and tracking.
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.TRANSACTION, required: true },
    1: { type: ParamType.BLOCK_PARAMS, required: false },
  })
  @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [parseCallRequest(params[0], 0), parseBlockRef(params[1], 1)]))
  async estimateGas(
    call: CallRequest,
    blockRef: BlockRef,
    requestDetails: RequestDetails,
  ): Promise<string | JsonRpcError | null> {
    const callDataSize = call.data?.length ?? 0;
    if (callDataSize >= constants.FUNCTION_SELECTOR_CHAR_LENGTH && this.logger.isLevelEnabled('debug')) {
      const selector = call.data?.substring(0, constants.FUNCTION_SELECTOR_CHAR_LENGTH);
      this.logger.debug(`${requestDetails.formattedRequestId} Estimating contract call with selector ${selector}`);
    }
    return this.contractService.estimateGas(call, blockRef, requestDetails);
  }

  /**
   * Submits a signed transaction to the pool. The bytes reach the pool exactly as sent.
   *
   * @rpcMethod Exposed as eth_sendRawTransaction RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   *
   * @param {string} transaction - The signed transaction bytes
   * @param {RequestDetails} requestDetails - The details of the request for logging and tracking.
   * @returns {Promise<string>} The transaction hash
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.SIGNED_TRANSACTION, required: true },
  })
  async sendRawTransaction(transaction: string, requestDetails: RequestDetails): Promise<string> {
    return this.transactionService.sendRawTransaction(transaction, requestDetails);
  }

  /**
   * Fills in, signs with the node's keys and submits a transaction.
   *
   * @rpcMethod Exposed as eth_sendTransaction RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   *
   * @param {TransactionRequest} request - The transaction to send
   * @param {RequestDetails} requestDetails - The details of the request for logging and tracking.
   * @returns {Promise<string>} The transaction hash
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.TRANSACTION_REQUEST, required: true },
  })
  @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [parseTransactionRequest(params[0], 0)]))
  async sendTransaction(request: TransactionRequest, requestDetails: RequestDetails): Promise<string> {
    return this.transactionService.sendTransaction(request, requestDetails);
  }
}
