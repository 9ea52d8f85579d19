// SPDX-License-Identifier: Apache-2.0

import type { EthMining } from '../index';
import { RPC_LAYOUT, rpcMethod, rpcParamLayoutConfig, rpcParamValidationRules } from './decorators';
import type { IMiningService } from './services';
import { ParamType, type RequestDetails } from './types';
import { parseHex, parseQuantity } from './validators';

/**
 * Implementation of the proof-of-work "eth_" methods. All of them are synchronous.
 */
export class EthMiningImpl implements EthMining {
  /**
   * @private
   */
  private readonly miningService: IMiningService;

  constructor(miningService: IMiningService) {
    this.miningService = miningService;
  }

  /**
   * @rpcMethod Exposed as eth_coinbase RPC endpoint
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamLayoutConfig(RPC_LAYOUT.REQUEST_DETAILS_ONLY)
  coinbase(requestDetails: RequestDetails): string {
    return this.miningService.coinbase(requestDetails);
  }

  /**
   * @rpcMethod Exposed as eth_mining RPC endpoint
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamLayoutConfig(RPC_LAYOUT.REQUEST_DETAILS_ONLY)
  mining(requestDetails: RequestDetails): boolean {
    return this.miningService.mining(requestDetails);
  }

  /**
   * @rpcMethod Exposed as eth_hashrate RPC endpoint
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamLayoutConfig(RPC_LAYOUT.REQUEST_DETAILS_ONLY)
  hashrate(requestDetails: RequestDetails): string {
    return this.miningService.hashrate(requestDetails);
  }

  /**
   * @rpcMethod Exposed as eth_getWork RPC endpoint
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamLayoutConfig(RPC_LAYOUT.REQUEST_DETAILS_ONLY)
  getWork(requestDetails: RequestDetails): string[] {
    return this.miningService.getWork(requestDetails);
  }

  /**
   * Submits a proof-of-work solution. False when the coordinator rejects it.
   *
   * @rpcMethod Exposed as eth_submitWork RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.NONCE, required: true },
    1: { type: ParamType.HASH, required: true },
    2: { type: ParamType.HASH, required: true },
  })
  @rpcParamLayoutConfig(
    RPC_LAYOUT.custom((params) => [parseHex(params[0], 0), parseHex(params[1], 1), parseHex(params[2], 2)]),
  )
  submitWork(nonce: string, powHash: string, mixHash: string, requestDetails: RequestDetails): boolean {
    return this.miningService.submitWork(nonce, powHash, mixHash, requestDetails);
  }

  /**
   * @rpcMethod Exposed as eth_submitHashrate RPC endpoint
   * @rpcParamValidationRules Applies JSON-RPC parameter validation according to the API specification
   * @rpcParamLayoutConfig decorated method parameter layout
   */
  @rpcMethod
  @rpcParamValidationRules({
    0: { type: ParamType.QUANTITY, required: true },
    1: { type: ParamType.HASH, required: true },
  })
  @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [parseQuantity(params[0], 0), parseHex(params[1], 1)]))
  submitHashrate(rate: bigint, id: string, requestDetails: RequestDetails): boolean {
    return this.miningService.submitHashrate(rate, id, requestDetails);
  }
}
