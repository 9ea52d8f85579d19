// SPDX-License-Identifier: Apache-2.0

import type { Log } from '../../../model';
import type { LogFilter, RequestDetails } from '../../../types';

export interface IFilterService {
  getLogs(filter: LogFilter, requestDetails: RequestDetails): Promise<Log[] | null>;
}
