// SPDX-License-Identifier: Apache-2.0

import type { BlockRef, RequestDetails } from '../../../types';

export interface IAccountService {
  accounts: (requestDetails: RequestDetails) => string[];

  getBalance: (address: string, blockRef: BlockRef, requestDetails: RequestDetails) => Promise<string | null>;

  getCode: (address: string, blockRef: BlockRef, requestDetails: RequestDetails) => Promise<string | null>;

  getStorageAt: (
    address: string,
    slot: string,
    blockRef: BlockRef,
    requestDetails: RequestDetails,
  ) => Promise<string | null>;

  getTransactionCount: (address: string, blockRef: BlockRef, requestDetails: RequestDetails) => Promise<string | null>;
}
