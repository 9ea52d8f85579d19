// SPDX-License-Identifier: Apache-2.0

export type ChainBackendErrorKind = 'rejected' | 'unavailable' | 'internal';

/**
 * Thrown by chain collaborators to report a failure together with the detail
 * that should reach the client.
 */
export class ChainBackendError extends Error {
  public readonly kind: ChainBackendErrorKind;
  public readonly data?: string;

  constructor(message: string, options: { kind: ChainBackendErrorKind; data?: string }) {
    super(message);
    this.name = 'ChainBackendError';
    this.kind = options.kind;
    this.data = options.data;
    Object.setPrototypeOf(this, ChainBackendError.prototype);
  }

  /**
   * Pool refusals caused by the transaction itself (nonce, fee, duplicate signature, size).
   */
  public isRejection(): boolean {
    return this.kind === 'rejected';
  }
}
