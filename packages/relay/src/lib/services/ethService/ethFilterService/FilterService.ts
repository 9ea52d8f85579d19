// SPDX-License-Identifier: Apache-2.0

import * as _ from 'lodash';
import type { Logger } from 'pino';

import { numberTo0x } from '../../../../formatters';
import { predefined } from '../../../errors/JsonRpcError';
import { ResolutionError } from '../../../errors/ResolutionError';
import { LogFactory } from '../../../factories/logFactory';
import type { Log } from '../../../model';
import type { ChainBackend, ChainBlock, ChainLog, LogFilter, RequestDetails, TopicFilter } from '../../../types';
import type { ICommonService } from '../ethCommonService/ICommonService';
import type { IFilterService } from './IFilterService';

/**
 * Log queries over one contiguous stretch of the canonical chain.
 */
export class FilterService implements IFilterService {
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

  static matches(log: ChainLog, addresses: string[], topics: TopicFilter): boolean {
    if (!_.isEmpty(addresses) && !addresses.includes(log.address.toLowerCase())) {
      return false;
    }
    return topics.every((accepted, position) => {
      if (accepted === null) {
        return true;
      }
      const topic = log.topics[position];
      return topic !== undefined && accepted.includes(topic.toLowerCase());
    });
  }

  static compare(a: ChainLog, b: ChainLog): number {
    if (a.blockNumber !== b.blockNumber) {
      return a.blockNumber < b.blockNumber ? -1 : 1;
    }
    if (a.transactionIndex !== b.transactionIndex) {
      return a.transactionIndex - b.transactionIndex;
    }
    return a.logIndex - b.logIndex;
  }

  /**
   * Collects the matching logs, ordered by block number, transaction index and log index.
   * Returns null when a block hash filter names no canonical block.
   *
   * @param {LogFilter} filter - The parsed filter
   * @param {RequestDetails} requestDetails - The request details for logging and tracking
   */
  async getLogs(filter: LogFilter, requestDetails: RequestDetails): Promise<Log[] | null> {
    const requestIdPrefix = requestDetails.formattedRequestId;
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(
        `${requestIdPrefix} getLogs(kind=${filter.kind}, addresses=${filter.addresses.length}, ` +
          `topics=${filter.topics.length})`,
      );
    }

    const blocks = await this.blocksInRange(filter, requestDetails);
    if (!blocks) {
      return null;
    }

    const logs: ChainLog[] = [];
    for (const block of blocks) {
      this.common.throwIfAborted(requestDetails);
      const blockLogs = await this.backend.history.logsByBlockHash(block.hash);
      logs.push(...blockLogs.filter((log) => FilterService.matches(log, filter.addresses, filter.topics)));
    }

    logs.sort(FilterService.compare);
    if (this.logger.isLevelEnabled('debug')) {
      this.logger.debug(`${requestIdPrefix} getLogs matched ${logs.length} logs in ${blocks.length} blocks`);
    }
    return logs.map((log) => LogFactory.createLog(log));
  }

  /**
   * Lists the blocks the filter covers, lowest first. The walk goes from the upper
   * bound back through parent hashes, so every block belongs to the same chain.
   */
  private async blocksInRange(filter: LogFilter, requestDetails: RequestDetails): Promise<ChainBlock[] | null> {
    if (filter.kind === 'blockHash') {
      const resolved = await this.common.resolveBlock({ kind: 'hash', hash: filter.blockHash }, requestDetails);
      return resolved ? [resolved.block] : null;
    }

    const scope = this.common.createResolutionScope();
    const from = await this.common.resolveBlock(filter.fromBlock, requestDetails, scope);
    const to = await this.common.resolveBlock(filter.toBlock, requestDetails, scope);
    if (!from || !to) {
      return null;
    }
    if (from.block.number > to.block.number) {
      throw predefined.INVALID_BLOCK_RANGE;
    }

    const blocks = [to.block];
    let cursor = to.block;
    while (cursor.number > from.block.number) {
      this.common.throwIfAborted(requestDetails);
      const parent = await this.backend.history.blockByHash(cursor.parentHash);
      if (!parent) {
        throw ResolutionError.pruned(`block ${cursor.parentHash}`);
      }
      cursor = parent;
      blocks.push(parent);
    }

    if (cursor.hash !== from.block.hash) {
      throw ResolutionError.reorged(`block ${numberTo0x(from.block.number)}`);
    }
    return blocks.reverse();
  }
}
