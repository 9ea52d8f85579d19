// SPDX-License-Identifier: Apache-2.0

import type { Logger } from 'pino';

import { numberTo0x, toHash32 } from '../../../../formatters';
import constants from '../../../constants';
import type { BlockRef, ChainBackend, RequestDetails, StateSnapshot } from '../../../types';
import type { ICommonService } from '../ethCommonService/ICommonService';
import type { IAccountService } from './IAccountService';

export class AccountService implements IAccountService {
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
   * The addresses the node can sign for; empty without a signer.
   */
  public accounts(requestDetails: RequestDetails): string[] {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} accounts()`);
    }
    return this.backend.signer?.accounts().map((account) => account.toLowerCase()) ?? [];
  }

  /**
   * Gets the balance of an account as of the given block. Unseen accounts hold zero.
   *
   * @param {string} address The account to get the balance from
   * @param {BlockRef} blockRef The block to read the state of
   * @param {RequestDetails} requestDetails The request details for logging and tracking
   */
  public async getBalance(address: string, blockRef: BlockRef, requestDetails: RequestDetails): Promise<string | null> {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} getBalance(address=${address})`);
    }

    return this.readState(blockRef, requestDetails, async (state) => {
      const balance = await state.balance(address);
      return numberTo0x(balance ?? 0n);
    });
  }

  /**
   * Gets the nonce of an account as of the given block.
   */
  public async getTransactionCount(
    address: string,
    blockRef: BlockRef,
    requestDetails: RequestDetails,
  ): Promise<string | null> {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} getTransactionCount(address=${address})`);
    }

    return this.readState(blockRef, requestDetails, async (state) => {
      const nonce = await state.nonce(address);
      return numberTo0x(nonce ?? 0n);
    });
  }

  public async getCode(address: string, blockRef: BlockRef, requestDetails: RequestDetails): Promise<string | null> {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} getCode(address=${address})`);
    }

    return this.readState(blockRef, requestDetails, async (state) => {
      const code = await state.code(address);
      return code ?? constants.EMPTY_HEX;
    });
  }

  /**
   * Reads one storage word. The slot is padded to 32 bytes before the lookup
   * and an unwritten slot reads as zero.
   */
  public async getStorageAt(
    address: string,
    slot: string,
    blockRef: BlockRef,
    requestDetails: RequestDetails,
  ): Promise<string | null> {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} getStorageAt(address=${address}, slot=${slot})`);
    }

    return this.readState(blockRef, requestDetails, async (state) => {
      const word = await state.storage(address, toHash32(slot));
      return word === null ? constants.ZERO_HEX_32_BYTE : toHash32(word);
    });
  }

  private async readState(
    blockRef: BlockRef,
    requestDetails: RequestDetails,
    read: (state: StateSnapshot) => Promise<string>,
  ): Promise<string | null> {
    const resolved = await this.common.resolveBlock(blockRef, requestDetails);
    if (!resolved) {
      return null;
    }
    const state = await this.common.stateAt(resolved, requestDetails);
    return read(state);
  }
}
