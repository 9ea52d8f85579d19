// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@eth-facade/config-service';
import type { Logger } from 'pino';

import { numberTo0x } from '../../../../formatters';
import constants from '../../../constants';
import { type JsonRpcError, predefined } from '../../../errors/JsonRpcError';
import type {
  BlockRef,
  CallRequest,
  ChainBackend,
  ExecutionContext,
  ExecutionOutcome,
  RequestDetails,
} from '../../../types';
import type { ICommonService } from '../ethCommonService/ICommonService';
import type { IContractService } from './IContractService';

export class ContractService implements IContractService {
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
   * The logger used for logging all output from this class.
   *
   * @private
   */
  private readonly logger: Logger;

  constructor(backend: ChainBackend, common: ICommonService, logger: Logger) {
    this.backend = backend;
    this.common = common;
    this.logger = logger;
  }

  /**
   * Executes the call against the state of the given block. Reverts and halts are
   * not errors here: the client gets the output bytes either way.
   *
   * @param {CallRequest} call - The call request
   * @param {BlockRef} blockRef - The block to execute on
   * @param {RequestDetails} requestDetails - The request details for logging and tracking
   * @returns {Promise<string | null>} The output bytes, or null when the block does not exist
   */
  public async call(call: CallRequest, blockRef: BlockRef, requestDetails: RequestDetails): Promise<string | null> {
    const requestIdPrefix = requestDetails.formattedRequestId;
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestIdPrefix} call(to=${call.to}, from=${call.from})`);
    }

    const context = await this.executionContext(blockRef, requestDetails);
    if (!context) {
      return null;
    }

    const outcome = await this.execute(call, call.gas ?? context.block.gasLimit, context, requestDetails);
    if (outcome.kind !== 'success') {
      this.logger.debug(`${requestIdPrefix} call ended with ${outcome.kind}, returning its output`);
    }
    return outcome.output;
  }

  /**
   * Runs the call at the gas cap, then narrows down to the lowest limit it
   * succeeds with. The search starts just below max(intrinsic gas, gasUsed at the cap).
   *
   * @param {CallRequest} call - The call request
   * @param {BlockRef} blockRef - The block to execute on
   * @param {RequestDetails} requestDetails - The request details for logging and tracking
   */
  public async estimateGas(
    call: CallRequest,
    blockRef: BlockRef,
    requestDetails: RequestDetails,
  ): Promise<string | JsonRpcError | null> {
    const requestIdPrefix = requestDetails.formattedRequestId;
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestIdPrefix} estimateGas(to=${call.to}, from=${call.from}, gas=${call.gas})`);
    }

    const context = await this.executionContext(blockRef, requestDetails);
    if (!context) {
      return null;
    }

    const cap = call.gas ?? context.block.gasLimit;
    const atCap = await this.execute(call, cap, context, requestDetails);

    if (atCap.kind === 'revert') {
      if (ConfigService.get('ESTIMATE_GAS_THROWS')) {
        return predefined.CONTRACT_REVERT(undefined, atCap.output);
      }
      this.logger.info(`${requestIdPrefix} Call reverts at the gas cap, returning the cap ${cap}`);
      return numberTo0x(cap);
    }
    if (atCap.kind === 'halt') {
      this.logger.debug(`${requestIdPrefix} Call halts at the gas cap: ${atCap.reason}`);
      throw predefined.GAS_ALLOWANCE_EXCEEDED(cap);
    }

    const floor = ContractService.intrinsicGas(call);
    let lo = (atCap.gasUsed > floor ? atCap.gasUsed : floor) - 1n;
    let hi = cap;
    while (lo + 1n < hi) {
      const mid = (lo + hi) / 2n;
      const outcome = await this.execute(call, mid, context, requestDetails);
      if (outcome.kind === 'success') {
        hi = mid;
      } else {
        lo = mid;
      }
    }

    this.logger.info(`${requestIdPrefix} Returning gas: ${hi}`);
    return numberTo0x(hi);
  }

  /**
   * Base cost of the transaction plus what its access list adds.
   */
  static intrinsicGas(call: CallRequest): bigint {
    return (call.accessList ?? []).reduce(
      (total, entry) =>
        total +
        constants.TX_ACCESS_LIST_ADDRESS_COST +
        BigInt(entry.storageKeys.length) * constants.TX_ACCESS_LIST_STORAGE_KEY_COST,
      constants.TX_BASE_COST,
    );
  }

  private async executionContext(
    blockRef: BlockRef,
    requestDetails: RequestDetails,
  ): Promise<ExecutionContext | null> {
    const resolved = await this.common.resolveBlock(blockRef, requestDetails);
    if (!resolved) {
      return null;
    }
    const state = await this.common.stateAt(resolved, requestDetails);
    return { block: resolved.block, state };
  }

  private async execute(
    call: CallRequest,
    gas: bigint,
    context: ExecutionContext,
    requestDetails: RequestDetails,
  ): Promise<ExecutionOutcome> {
    this.common.throwIfAborted(requestDetails);
    return this.backend.executor.execute({ ...call, gas }, context);
  }
}
