// SPDX-License-Identifier: Apache-2.0

import type { JsonRpcError } from '../../../errors/JsonRpcError';
import type { BlockRef, CallRequest, RequestDetails } from '../../../types';

export interface IContractService {
  /**
   * Executes a new message call immediately without creating a transaction.
   */
  call: (call: CallRequest, blockRef: BlockRef, requestDetails: RequestDetails) => Promise<string | null>;

  /**
   * Estimates the lowest gas limit under which the call succeeds.
   */
  estimateGas: (
    call: CallRequest,
    blockRef: BlockRef,
    requestDetails: RequestDetails,
  ) => Promise<string | JsonRpcError | null>;
}
