// SPDX-License-Identifier: Apache-2.0

import type { Block } from '../../../model';
import type { BlockRef, RequestDetails } from '../../../types';

export interface IBlockService {
  getBlockByNumber: (blockRef: BlockRef, showDetails: boolean, requestDetails: RequestDetails) => Promise<Block | null>;
  getBlockByHash: (hash: string, showDetails: boolean, requestDetails: RequestDetails) => Promise<Block | null>;
  getBlockTransactionCountByHash: (hash: string, requestDetails: RequestDetails) => Promise<string | null>;
  getBlockTransactionCountByNumber: (blockRef: BlockRef, requestDetails: RequestDetails) => Promise<string | null>;
  getUncleByBlockHashAndIndex: (hash: string, index: number, requestDetails: RequestDetails) => Promise<Block | null>;
  getUncleByBlockNumberAndIndex: (
    blockRef: BlockRef,
    index: number,
    requestDetails: RequestDetails,
  ) => Promise<Block | null>;
  getUncleCountByBlockHash: (hash: string, requestDetails: RequestDetails) => Promise<string | null>;
  getUncleCountByBlockNumber: (blockRef: BlockRef, requestDetails: RequestDetails) => Promise<string | null>;
}
