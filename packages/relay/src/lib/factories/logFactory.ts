// SPDX-License-Identifier: Apache-2.0

import { numberTo0x } from '../../formatters';
import { Log } from '../model';
import type { ChainLog } from '../types';

export class LogFactory {
  public static createLog(log: ChainLog): Log {
    return new Log({
      address: log.address,
      blockHash: log.blockHash,
      blockNumber: numberTo0x(log.blockNumber),
      data: log.data,
      logIndex: numberTo0x(log.logIndex),
      removed: log.removed,
      topics: log.topics,
      transactionHash: log.transactionHash,
      transactionIndex: numberTo0x(log.transactionIndex),
    });
  }
}
