// SPDX-License-Identifier: Apache-2.0

import type { Logger } from 'pino';

import { numberTo0x } from '../../../../formatters';
import { BlockFactory } from '../../../factories/blockFactory';
import type { Block } from '../../../model';
import type { BlockRef, ChainBlock, RequestDetails } from '../../../types';
import type { ICommonService } from '../ethCommonService/ICommonService';
import type { IBlockService } from './IBlockService';

export class BlockService implements IBlockService {
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

  constructor(common: ICommonService, logger: Logger) {
    this.common = common;
    this.logger = logger;
  }

  /**
   * Gets the block with the given hash, provided it is on the canonical chain.
   *
   * @param {string} hash the block hash
   * @param {boolean} showDetails whether to include full transaction objects
   * @param {RequestDetails} requestDetails The request details for logging and tracking
   */
  public async getBlockByHash(hash: string, showDetails: boolean, requestDetails: RequestDetails): Promise<Block | null> {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(
        `${requestDetails.formattedRequestId} getBlockByHash(hash=${hash}, showDetails=${showDetails})`,
      );
    }
    const block = await this.findBlock({ kind: 'hash', hash }, requestDetails);
    return block ? BlockFactory.createBlock(block, showDetails) : null;
  }

  /**
   * Gets the block with the given number or tag.
   *
   * @param {BlockRef} blockRef the block number or tag
   * @param {boolean} showDetails whether to include full transaction objects
   * @param {RequestDetails} requestDetails The request details for logging and tracking
   */
  public async getBlockByNumber(
    blockRef: BlockRef,
    showDetails: boolean,
    requestDetails: RequestDetails,
  ): Promise<Block | null> {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} getBlockByNumber(showDetails=${showDetails})`);
    }
    const block = await this.findBlock(blockRef, requestDetails);
    return block ? BlockFactory.createBlock(block, showDetails) : null;
  }

  public async getBlockTransactionCountByHash(hash: string, requestDetails: RequestDetails): Promise<string | null> {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} getBlockTransactionCountByHash(hash=${hash})`);
    }
    const block = await this.findBlock({ kind: 'hash', hash }, requestDetails);
    return block ? numberTo0x(block.transactions.length) : null;
  }

  public async getBlockTransactionCountByNumber(
    blockRef: BlockRef,
    requestDetails: RequestDetails,
  ): Promise<string | null> {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} getBlockTransactionCountByNumber()`);
    }
    const block = await this.findBlock(blockRef, requestDetails);
    return block ? numberTo0x(block.transactions.length) : null;
  }

  public async getUncleCountByBlockHash(hash: string, requestDetails: RequestDetails): Promise<string | null> {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} getUncleCountByBlockHash(hash=${hash})`);
    }
    const block = await this.findBlock({ kind: 'hash', hash }, requestDetails);
    return block ? numberTo0x(block.uncles.length) : null;
  }

  public async getUncleCountByBlockNumber(blockRef: BlockRef, requestDetails: RequestDetails): Promise<string | null> {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} getUncleCountByBlockNumber()`);
    }
    const block = await this.findBlock(blockRef, requestDetails);
    return block ? numberTo0x(block.uncles.length) : null;
  }

  public async getUncleByBlockHashAndIndex(
    hash: string,
    index: number,
    requestDetails: RequestDetails,
  ): Promise<Block | null> {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(
        `${requestDetails.formattedRequestId} getUncleByBlockHashAndIndex(hash=${hash}, index=${index})`,
      );
    }
    return this.uncleAt(await this.findBlock({ kind: 'hash', hash }, requestDetails), index);
  }

  public async getUncleByBlockNumberAndIndex(
    blockRef: BlockRef,
    index: number,
    requestDetails: RequestDetails,
  ): Promise<Block | null> {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} getUncleByBlockNumberAndIndex(index=${index})`);
    }
    return this.uncleAt(await this.findBlock(blockRef, requestDetails), index);
  }

  private uncleAt(block: ChainBlock | null, index: number): Block | null {
    const uncle = block?.uncles[index];
    return uncle ? BlockFactory.createUncle(uncle) : null;
  }

  private async findBlock(blockRef: BlockRef, requestDetails: RequestDetails): Promise<ChainBlock | null> {
    const resolved = await this.common.resolveBlock(blockRef, requestDetails);
    return resolved?.block ?? null;
  }
}
