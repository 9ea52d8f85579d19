// SPDX-License-Identifier: Apache-2.0

import type { ChainBlock } from './chain';

export enum BlockTag {
  EARLIEST = 'earliest',
  LATEST = 'latest',
  PENDING = 'pending',
}

/**
 * A client supplied block identifier, parsed but not yet resolved against the chain.
 */
export type BlockRef =
  | { readonly kind: 'number'; readonly number: bigint }
  | { readonly kind: 'hash'; readonly hash: string }
  | { readonly kind: 'tag'; readonly tag: BlockTag };

/**
 * A block bound for the whole duration of one RPC call. Every read made while
 * serving that call goes through this handle, never through the live head.
 */
export interface ResolvedBlock {
  readonly block: ChainBlock;
  readonly pending: boolean;
}

export enum ResolutionFailure {
  PRUNED_OR_UNAVAILABLE = 'PrunedOrUnavailable',
  REORGED = 'Reorged',
}
