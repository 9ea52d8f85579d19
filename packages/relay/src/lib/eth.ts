// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@eth-facade/config-service';
import type { Logger } from 'pino';

import type { Eth } from '../index';
import { numberTo0x } from '../formatters';
import { RPC_LAYOUT, rpcMethod, rpcParamLayoutConfig, rpcParamValidationRules } from './decorators';
import type { Block, ISyncStatus, ITransactionReceipt, Log, Transaction } from './model';
import type {
  IAccountService,
  IBlockService,
  ICommonService,
  IFilterService,
  ITransactionService,
} from './services';
import { type BlockRef, type ChainBackend, type LogFilter, ParamType, type RequestDetails } from './types';
import { parseBlockRef, parseHex, parseIndex, parseLogFilter } from './validators';

/**
 * Implementation of the read-only "eth_" methods of the Ethereum JSON-RPC API.
 * Every call resolves its block once and serves all of its reads from that block.
 */
export class EthImpl implements Eth {
  /**
   * The Account Service implementation that takes care of all account API operations.
   * @private
   */
  private readonly accountService: IAccountService;

  /**
   * The node the facade fronts.
   * @private
   */
  private readonly backend: ChainBackend;

  /**
   * The Block Service implementation that takes care of all block API operations.
   * @private
   */
  private readonly blockService: IBlockService;

  /**
   * The Common Service implementation that contains logic shared by other services.
   * @private
   */
  private readonly common: ICommonService;

  /**
   * The Filter Service implementation that takes care of all filter API operations.
   * @private
   */
  private readonly filterService: IFilterService;

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

  constructor(
    backend: ChainBackend,
    services: {
      accountService: IAccountService;
      blockService: IBlockService;
      common: ICommonService;
      filterService: IFilterService;
      transactionService: ITransactionService;
    },
    logger: Logger,
  ) {
    this.backend = backend;
    this.accountService = services.accountService;
    this.blockService = services.blockService;
    this.common = services.common;
    this.filterService = services.filterService;
    this.transactionService = services.transactionService;
    this.logger = logger;
  }

  /**
   * Returns the addresses the node's signer holds keys for.
   *
   * @rpcMethod Exposed as eth_accounts RPC endpoint
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamLayoutConfig(RPC_LAYOUT.REQUEST_DETAILS_ONLY)
  accounts(requestDetails: RequestDetails): string[] {
    return this.accountService.accounts(requestDetails);
  }

  /**
   * Gets the most recent block number.
   *
   * @rpcMethod Exposed as eth_blockNumber RPC endpoint
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamLayoutConfig(RPC_LAYOUT.REQUEST_DETAILS_ONLY)
  async blockNumber(requestDetails: RequestDetails): Promise<string> {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} blockNumber()`);
    }
    return await this.common.getLatestBlockNumber(requestDetails);
  }

  /**
   * Gets the chain ID, as configured through `CHAIN_ID`. Null when unset.
   *
   * @rpcMethod Exposed as eth_chainId RPC endpoint
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamLayoutConfig(RPC_LAYOUT.REQUEST_DETAILS_ONLY)
  chainId(requestDetails: RequestDetails): string | null {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} chainId()`);
    }
    return ConfigService.get('CHAIN_ID') ?? null;
  }

  /**
   * Retrieves the gas price the pool currently asks for.
   *
   * @rpcMethod Exposed as eth_gasPrice RPC endpoint
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamLayoutConfig(RPC_LAYOUT.REQUEST_DETAILS_ONLY)
  async gasPrice(requestDetails: RequestDetails): Promise<string> {
    return this.common.gasPrice(requestDetails);
  }

  /**
   * @rpcMethod Exposed as eth_protocolVersion RPC endpoint
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamLayoutConfig(RPC_LAYOUT.REQUEST_DETAILS_ONLY)
  protocolVersion(requestDetails: RequestDetails): string {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} protocolVersion()`);
    }
    return numberTo0x(ConfigService.get('PROTOCOL_VERSION'));
  }

  /**
   * Returns false once synced, the sync progress otherwise.
   *
   * @rpcMethod Exposed as eth_syncing RPC endpoint
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamLayoutConfig(RPC_LAYOUT.REQUEST_DETAILS_ONLY)
  async syncing(requestDetails: RequestDetails): Promise<false | ISyncStatus> {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} syncing()`);
    }
    const progress = await this.backend.history.syncStatus();
    if (!progress) {
      return false;
    }
    return {
      startingBlock: numberTo0x(progress.startingBlock),
      currentBlock: numberTo0x(progress.currentBlock),
      highestBlock: numberTo0x(progress.highestBlock),
    };
  }

  /**
   * Gets the balance of an account as of the given block.
   *
   * @rpcMethod Exposed as eth_getBalance RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.ADDRESS, required: true },
    1: { type: ParamType.BLOCK_PARAMS, required: false },
  })
  @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [parseHex(params[0], 0), parseBlockRef(params[1], 1)]))
  async getBalance(address: string, blockRef: BlockRef, requestDetails: RequestDetails): Promise<string | null> {
    return this.accountService.getBalance(address, blockRef, requestDetails);
  }

  /**
   * Gets the number of transactions sent from an address as of the given block.
   *
   * @rpcMethod Exposed as eth_getTransactionCount RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.ADDRESS, required: true },
    1: { type: ParamType.BLOCK_PARAMS, required: false },
  })
  @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [parseHex(params[0], 0), parseBlockRef(params[1], 1)]))
  async getTransactionCount(
    address: string,
    blockRef: BlockRef,
    requestDetails: RequestDetails,
  ): Promise<string | null> {
    return this.accountService.getTransactionCount(address, blockRef, requestDetails);
  }

  /**
   * Returns the code deployed at an address as of the given block.
   *
   * @rpcMethod Exposed as eth_getCode RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.ADDRESS, required: true },
    1: { type: ParamType.BLOCK_PARAMS, required: false },
  })
  @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [parseHex(params[0], 0), parseBlockRef(params[1], 1)]))
  async getCode(address: string, blockRef: BlockRef, requestDetails: RequestDetails): Promise<string | null> {
    return this.accountService.getCode(address, blockRef, requestDetails);
  }

  /**
   * Returns the value of a storage slot at an address as of the given block.
   *
   * @rpcMethod Exposed as eth_getStorageAt RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.ADDRESS, required: true },
    1: { type: ParamType.HEX64, required: true },
    2: { type: ParamType.BLOCK_PARAMS, required: false },
  })
  @rpcParamLayoutConfig(
    RPC_LAYOUT.custom((params) => [parseHex(params[0], 0), parseHex(params[1], 1), parseBlockRef(params[2], 2)]),
  )
  async getStorageAt(
    address: string,
    slot: string,
    blockRef: BlockRef,
    requestDetails: RequestDetails,
  ): Promise<string | null> {
    return this.accountService.getStorageAt(address, slot, blockRef, requestDetails);
  }

  /**
   * Gets a canonical block by its hash.
   *
   * @rpcMethod Exposed as eth_getBlockByHash RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.BLOCK_HASH, required: true },
    1: { type: ParamType.BOOLEAN, required: true },
  })
  @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [parseHex(params[0], 0), params[1]]))
  async getBlockByHash(hash: string, showDetails: boolean, requestDetails: RequestDetails): Promise<Block | null> {
    return this.blockService.getBlockByHash(hash, showDetails, requestDetails);
  }

  /**
   * Gets a block by its number or tag.
   *
   * @rpcMethod Exposed as eth_getBlockByNumber RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.BLOCK_NUMBER, required: true },
    1: { type: ParamType.BOOLEAN, required: true },
  })
  @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [parseBlockRef(params[0], 0), params[1]]))
  async getBlockByNumber(
    blockRef: BlockRef,
    showDetails: boolean,
    requestDetails: RequestDetails,
  ): Promise<Block | null> {
    return this.blockService.getBlockByNumber(blockRef, showDetails, requestDetails);
  }

  /**
   * @rpcMethod Exposed as eth_getBlockTransactionCountByHash RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.BLOCK_HASH, required: true },
  })
  @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [parseHex(params[0], 0)]))
  async getBlockTransactionCountByHash(hash: string, requestDetails: RequestDetails): Promise<string | null> {
    return this.blockService.getBlockTransactionCountByHash(hash, requestDetails);
  }

  /**
   * @rpcMethod Exposed as eth_getBlockTransactionCountByNumber RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.BLOCK_NUMBER, required: true },
  })
  @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [parseBlockRef(params[0], 0)]))
  async getBlockTransactionCountByNumber(blockRef: BlockRef, requestDetails: RequestDetails): Promise<string | null> {
    return this.blockService.getBlockTransactionCountByNumber(blockRef, requestDetails);
  }

  /**
   * @rpcMethod Exposed as eth_getUncleCountByBlockHash RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.BLOCK_HASH, required: true },
  })
  @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [parseHex(params[0], 0)]))
  async getUncleCountByBlockHash(hash: string, requestDetails: RequestDetails): Promise<string | null> {
    return this.blockService.getUncleCountByBlockHash(hash, requestDetails);
  }

  /**
   * @rpcMethod Exposed as eth_getUncleCountByBlockNumber RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.BLOCK_NUMBER, required: true },
  })
  @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [parseBlockRef(params[0], 0)]))
  async getUncleCountByBlockNumber(blockRef: BlockRef, requestDetails: RequestDetails): Promise<string | null> {
    return this.blockService.getUncleCountByBlockNumber(blockRef, requestDetails);
  }

  /**
   * Gets an uncle header, without transactions, by block hash and uncle index.
   *
   * @rpcMethod Exposed as eth_getUncleByBlockHashAndIndex RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.BLOCK_HASH, required: true },
    1: { type: ParamType.INDEX, required: true },
  })
  @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [parseHex(params[0], 0), parseIndex(params[1], 1)]))
  async getUncleByBlockHashAndIndex(
    hash: string,
    index: number,
    requestDetails: RequestDetails,
  ): Promise<Block | null> {
    return this.blockService.getUncleByBlockHashAndIndex(hash, index, requestDetails);
  }

  /**
   * Gets an uncle header, without transactions, by block number and uncle index.
   *
   * @rpcMethod Exposed as eth_getUncleByBlockNumberAndIndex RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.BLOCK_NUMBER, required: true },
    1: { type: ParamType.INDEX, required: true },
  })
  @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [parseBlockRef(params[0], 0), parseIndex(params[1], 1)]))
  async getUncleByBlockNumberAndIndex(
    blockRef: BlockRef,
    index: number,
    requestDetails: RequestDetails,
  ): Promise<Block | null> {
    return this.blockService.getUncleByBlockNumberAndIndex(blockRef, index, requestDetails);
  }

  /**
   * Gets a transaction by its hash, whether included or still pooled.
   *
   * @rpcMethod Exposed as eth_getTransactionByHash RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.TRANSACTION_HASH, required: true },
  })
  @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [parseHex(params[0], 0)]))
  async getTransactionByHash(hash: string, requestDetails: RequestDetails): Promise<Transaction | null> {
    return this.transactionService.getTransactionByHash(hash, requestDetails);
  }

  /**
   * @rpcMethod Exposed as eth_getTransactionByBlockHashAndIndex RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.BLOCK_HASH, required: true },
    1: { type: ParamType.INDEX, required: true },
  })
  @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [parseHex(params[0], 0), parseIndex(params[1], 1)]))
  async getTransactionByBlockHashAndIndex(
    hash: string,
    index: number,
    requestDetails: RequestDetails,
  ): Promise<Transaction | null> {
    return this.transactionService.getTransactionByBlockHashAndIndex(hash, index, requestDetails);
  }

  /**
   * @rpcMethod Exposed as eth_getTransactionByBlockNumberAndIndex RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.BLOCK_NUMBER, required: true },
    1: { type: ParamType.INDEX, required: true },
  })
  @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [parseBlockRef(params[0], 0), parseIndex(params[1], 1)]))
  async getTransactionByBlockNumberAndIndex(
    blockRef: BlockRef,
    index: number,
    requestDetails: RequestDetails,
  ): Promise<Transaction | null> {
    return this.transactionService.getTransactionByBlockNumberAndIndex(blockRef, index, requestDetails);
  }

  /**
   * Gets the receipt of an included transaction. Pooled transactions have none yet.
   *
   * @rpcMethod Exposed as eth_getTransactionReceipt RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.TRANSACTION_HASH, required: true },
  })
  @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [parseHex(params[0], 0)]))
  async getTransactionReceipt(hash: string, requestDetails: RequestDetails): Promise<ITransactionReceipt | null> {
    return this.transactionService.getTransactionReceipt(hash, requestDetails);
  }

  /**
   * Returns all logs matching the filter, in chain order.
   *
   * @rpcMethod Exposed as eth_getLogs RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.FILTER, required: true },
  })
  @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [parseLogFilter(params[0], 0)]))
  async getLogs(filter: LogFilter, requestDetails: RequestDetails): Promise<Log[] | null> {
    return this.filterService.getLogs(filter, requestDetails);
  }
}
