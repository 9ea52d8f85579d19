// SPDX-License-Identifier: Apache-2.0

import type { Logger } from 'pino';

import { numberTo0x } from '../../../../formatters';
import { ChainBackendError } from '../../../errors/ChainBackendError';
import { ExecutionError } from '../../../errors/ExecutionError';
import { JsonRpcError, predefined } from '../../../errors/JsonRpcError';
import { ResolutionError } from '../../../errors/ResolutionError';
import {
  type BlockRef,
  BlockTag,
  type ChainBackend,
  type ChainBlock,
  type ChainHistory,
  type RequestDetails,
  type ResolvedBlock,
  type StateSnapshot,
} from '../../../types';
import type { ICommonService, IResolutionScope } from './ICommonService';

class ResolutionScope implements IResolutionScope {
  private latest?: Promise<ChainBlock>;

  constructor(private readonly history: ChainHistory) {}

  latestBlock(): Promise<ChainBlock> {
    if (!this.latest) {
      this.latest = this.history.latestBlock();
    }
    return this.latest;
  }
}

/**
 * Block resolution and the other pieces every eth service leans on.
 */
export class CommonService implements ICommonService {
  /**
   * The node the facade fronts.
   * @private
   */
  private readonly backend: ChainBackend;

  /**
   * The logger used for logging all output from this class.
   * @private
   */
  private readonly logger: Logger;

  constructor(backend: ChainBackend, logger: Logger) {
    this.backend = backend;
    this.logger = logger;
  }

  public static describeBlockRef(blockRef: BlockRef): string {
    switch (blockRef.kind) {
      case 'number':
        return `block ${numberTo0x(blockRef.number)}`;
      case 'hash':
        return `block ${blockRef.hash}`;
      case 'tag':
        return `${blockRef.tag} block`;
    }
  }

  public createResolutionScope(): IResolutionScope {
    return new ResolutionScope(this.backend.history);
  }

  /**
   * Binds a block identifier to one canonical block. Returns null when a number or
   * hash names no block on the canonical chain.
   *
   * @param blockRef - The parsed identifier
   * @param requestDetails - The request details for logging and tracking
   * @param scope - Shares the head between the resolutions of one call
   */
  public async resolveBlock(
    blockRef: BlockRef,
    requestDetails: RequestDetails,
    scope: IResolutionScope = this.createResolutionScope(),
  ): Promise<ResolvedBlock | null> {
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(
        `${requestDetails.formattedRequestId} resolveBlock(${CommonService.describeBlockRef(blockRef)})`,
      );
    }
    this.throwIfAborted(requestDetails);

    const history = this.backend.history;
    switch (blockRef.kind) {
      case 'number':
        return this.resolved(await history.blockByNumber(blockRef.number));
      case 'hash': {
        const block = await history.blockByHash(blockRef.hash);
        if (!block) {
          return null;
        }
        const canonical = await history.blockByNumber(block.number);
        return canonical?.hash === block.hash ? this.resolved(block) : null;
      }
      case 'tag':
        return this.resolveTag(blockRef.tag, scope);
    }
  }

  private async resolveTag(tag: BlockTag, scope: IResolutionScope): Promise<ResolvedBlock | null> {
    switch (tag) {
      case BlockTag.EARLIEST: {
        const genesis = await this.backend.history.blockByNumber(0n);
        if (!genesis) {
          throw ResolutionError.pruned('earliest block');
        }
        return this.resolved(genesis);
      }
      case BlockTag.PENDING: {
        const pending = this.backend.history.pendingBlock ? await this.backend.history.pendingBlock() : null;
        if (pending) {
          return { block: pending, pending: true };
        }
        return this.resolved(await scope.latestBlock());
      }
      case BlockTag.LATEST:
        return this.resolved(await scope.latestBlock());
    }
  }

  private resolved(block: ChainBlock | null): ResolvedBlock | null {
    return block ? { block, pending: false } : null;
  }

  /**
   * Opens the account state of a resolved block.
   * @throws ResolutionError when the state has been pruned
   */
  public async stateAt(resolved: ResolvedBlock, requestDetails: RequestDetails): Promise<StateSnapshot> {
    this.throwIfAborted(requestDetails);
    const { block, pending } = resolved;
    const snapshot = await this.backend.state.stateAt({ hash: block.hash, number: block.number, pending });
    if (!snapshot) {
      throw ResolutionError.pruned(`state at block ${numberTo0x(block.number)}`);
    }
    return snapshot;
  }

  public throwIfAborted(requestDetails: RequestDetails): void {
    if (requestDetails.abortSignal?.aborted) {
      throw predefined.REQUEST_ABORTED;
    }
  }

  /**
   * Gets the most recent block number.
   */
  public async getLatestBlockNumber(requestDetails: RequestDetails): Promise<string> {
    try {
      const latest = await this.backend.history.latestBlock();
      return numberTo0x(latest.number);
    } catch (error) {
      throw this.genericErrorHandler(
        error,
        `${requestDetails.formattedRequestId} Failed to retrieve latest block number`,
      );
    }
  }

  /**
   * Gets the gas price the pool currently asks for.
   */
  public async gasPrice(requestDetails: RequestDetails): Promise<string> {
    try {
      return numberTo0x(await this.backend.pool.gasPrice());
    } catch (error) {
      throw this.genericErrorHandler(error, `${requestDetails.formattedRequestId} Failed to retrieve gasPrice`);
    }
  }

  public genericErrorHandler(error: unknown, logMessage?: string): never {
    if (logMessage) {
      this.logger.error(error, logMessage);
    } else {
      this.logger.error(error);
    }

    // preserve the original error and throw to the upper layer
    if (
      error instanceof JsonRpcError ||
      error instanceof ChainBackendError ||
      error instanceof ResolutionError ||
      error instanceof ExecutionError
    ) {
      throw error;
    }
    throw predefined.INTERNAL_ERROR(error instanceof Error ? error.message : String(error));
  }
}
