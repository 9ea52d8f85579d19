// SPDX-License-Identifier: Apache-2.0

import type { BlockRef, ChainBlock, RequestDetails, ResolvedBlock, StateSnapshot } from '../../../types';

/**
 * Memoizes the head for the duration of one call, so that every `latest`
 * a call resolves names the same block.
 */
export interface IResolutionScope {
  latestBlock(): Promise<ChainBlock>;
}

export interface ICommonService {
  createResolutionScope(): IResolutionScope;

  gasPrice(requestDetails: RequestDetails): Promise<string>;

  genericErrorHandler(error: unknown, logMessage?: string): never;

  getLatestBlockNumber(requestDetails: RequestDetails): Promise<string>;

  resolveBlock(
    blockRef: BlockRef,
    requestDetails: RequestDetails,
    scope?: IResolutionScope,
  ): Promise<ResolvedBlock | null>;

  stateAt(resolved: ResolvedBlock, requestDetails: RequestDetails): Promise<StateSnapshot>;

  throwIfAborted(requestDetails: RequestDetails): void;
}
