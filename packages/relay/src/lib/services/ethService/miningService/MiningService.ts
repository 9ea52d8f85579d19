// SPDX-License-Identifier: Apache-2.0

import type { Logger } from 'pino';

import { numberTo0x } from '../../../../formatters';
import { predefined } from '../../../errors/JsonRpcError';
import type { MiningCoordinator, RequestDetails } from '../../../types';
import type { IMiningService } from './IMiningService';

export class MiningService implements IMiningService {
  /**
   * Absent on nodes that do not mine.
   *
   * @private
   */
  private readonly coordinator?: MiningCoordinator;

  /**
   * The logger used for logging all output from this class.
   *
   * @private
   */
  private readonly logger: Logger;

  constructor(coordinator: MiningCoordinator | undefined, logger: Logger) {
    this.coordinator = coordinator;
    this.logger = logger;
  }

  coinbase(requestDetails: RequestDetails): string {
    const coinbase = this.coordinator?.coinbase();
    if (!coinbase) {
      this.logger.debug(`${requestDetails.formattedRequestId} No coinbase configured`);
      throw predefined.COINBASE_UNAVAILABLE;
    }
    return coinbase.toLowerCase();
  }

  mining(requestDetails: RequestDetails): boolean {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} mining()`);
    }
    return this.coordinator?.isMining() ?? false;
  }

  hashrate(requestDetails: RequestDetails): string {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} hashrate()`);
    }
    return numberTo0x(this.coordinator?.hashrate() ?? 0n);
  }

  /**
   * The current work package as [powHash, seedHash, target], followed by the
   * block number when the coordinator knows it.
   */
  getWork(requestDetails: RequestDetails): string[] {
    const work = this.coordinator?.currentWork();
    if (!work) {
      this.logger.debug(`${requestDetails.formattedRequestId} No mining work available`);
      throw predefined.NO_MINING_WORK;
    }

    const result = [work.powHash, work.seedHash, work.target];
    if (work.number !== undefined) {
      result.push(numberTo0x(work.number));
    }
    return result;
  }

  /**
   * A stale or invalid solution is reported as false, never as an error.
   */
  submitWork(nonce: string, powHash: string, mixHash: string, requestDetails: RequestDetails): boolean {
    if (!this.coordinator) {
      return false;
    }
    const accepted = this.coordinator.submitWork(nonce, powHash, mixHash);
    this.logger.info(`${requestDetails.formattedRequestId} Work for ${powHash} ${accepted ? 'accepted' : 'rejected'}`);
    return accepted;
  }

  submitHashrate(rate: bigint, id: string, requestDetails: RequestDetails): boolean {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`${requestDetails.formattedRequestId} submitHashrate(rate=${rate}, id=${id})`);
    }
    if (!this.coordinator) {
      return false;
    }
    return this.coordinator.submitHashrate(rate, id);
  }
}
