// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@eth-facade/config-service';
import type { Logger } from 'pino';

import type { Eth, EthMining, EthWrite } from '../index';
import { RpcMethodDispatcher } from './dispatcher/rpcMethodDispatcher';
import { EthImpl } from './eth';
import { EthMiningImpl } from './ethMining';
import { EthWriteImpl } from './ethWrite';
import {
  AccountService,
  BlockService,
  CommonService,
  ContractService,
  FilterService,
  MiningService,
  TransactionService,
} from './services';
import { registerRpcMethods } from './services/registryService/rpcMethodRegistryService';
import type { ChainBackend, RequestDetails, RpcMethodRegistry, RpcNamespaceRegistry } from './types';

export class Relay {
  /**
   * @private
   * @readonly
   * @property {Eth} ethImpl - The read path of the eth namespace.
   */
  private readonly ethImpl: Eth;

  /**
   * @private
   * @readonly
   * @property {EthWrite} ethWriteImpl - The calls of the eth namespace that execute or submit transactions.
   */
  private readonly ethWriteImpl: EthWrite;

  /**
   * @private
   * @readonly
   * @property {EthMining} ethMiningImpl - The proof-of-work calls of the eth namespace.
   */
  private readonly ethMiningImpl: EthMining;

  /**
   * Registry for RPC methods that manages the mapping between RPC method names and their implementations.
   * This registry is populated with methods from the eth implementations that have been decorated
   * with the @rpcMethod decorator.
   *
   * @public
   * @type {RpcMethodRegistry} - The registry containing all available RPC methods.
   */
  public readonly rpcMethodRegistry: RpcMethodRegistry;

  /**
   * The RPC method dispatcher that takes care of executing the correct method based on the request.
   */
  private readonly rpcMethodDispatcher: RpcMethodDispatcher;

  /**
   * Wires the eth implementations and their services to the chain backend.
   *
   * @param {Logger} logger - Logger instance for logging system messages.
   * @param {ChainBackend} backend - The node collaborators every call is served from.
   */
  constructor(
    private readonly logger: Logger,
    backend: ChainBackend,
  ) {
    ConfigService.validate();
    logger.info('Configurations successfully loaded');

    const common = new CommonService(backend, logger.child({ name: 'common-service' }));
    const contractService = new ContractService(backend, common, logger.child({ name: 'contract-service' }));
    const transactionService = new TransactionService(
      backend,
      common,
      contractService,
      logger.child({ name: 'transaction-service' }),
    );

    this.ethImpl = new EthImpl(
      backend,
      {
        accountService: new AccountService(backend, common, logger.child({ name: 'account-service' })),
        blockService: new BlockService(common, logger.child({ name: 'block-service' })),
        common,
        filterService: new FilterService(backend, common, logger.child({ name: 'filter-service' })),
        transactionService,
      },
      logger.child({ name: 'relay-eth' }),
    );
    this.ethWriteImpl = new EthWriteImpl(contractService, transactionService, logger.child({ name: 'relay-eth-write' }));
    this.ethMiningImpl = new EthMiningImpl(new MiningService(backend.mining, logger.child({ name: 'mining-service' })));

    // The three groups share the eth namespace and together form its method surface
    const rpcNamespaceRegistry: RpcNamespaceRegistry[] = [this.ethImpl, this.ethWriteImpl, this.ethMiningImpl].map(
      (serviceImpl) => ({ namespace: 'eth', serviceImpl }),
    );

    // Registering RPC methods from the provided service implementations
    this.rpcMethodRegistry = registerRpcMethods(rpcNamespaceRegistry);

    // Initialize the RPC method dispatcher
    this.rpcMethodDispatcher = new RpcMethodDispatcher(this.rpcMethodRegistry, this.logger);

    logger.info('Relay running with chainId=%s', ConfigService.get('CHAIN_ID') ?? 'unset');
  }

  /**
   * Executes an RPC method by delegating to the RPC method dispatcher
   *
   * This method serves as the only public API entry point for server packages
   * to invoke RPC methods on the Relay.
   *
   * @param {string} rpcMethodName - The name of the RPC method to execute
   * @param {unknown[]} rpcMethodParams - The params for the RPC method to execute
   * @param {RequestDetails} requestDetails - Additional request context
   * @returns {Promise<unknown>} The result of executing the RPC method, or the JsonRpcError it failed with
   */
  public async executeRpcMethod(
    rpcMethodName: string,
    rpcMethodParams: unknown[] | undefined,
    requestDetails: RequestDetails,
  ): Promise<unknown> {
    return this.rpcMethodDispatcher.dispatch(rpcMethodName, rpcMethodParams, requestDetails);
  }

  eth(): Eth {
    return this.ethImpl;
  }

  ethWrite(): EthWrite {
    return this.ethWriteImpl;
  }

  ethMining(): EthMining {
    return this.ethMiningImpl;
  }
}
