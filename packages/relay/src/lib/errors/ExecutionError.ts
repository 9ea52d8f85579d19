// SPDX-License-Identifier: Apache-2.0

/**
 * Raised by an executor when a call could not be started, as opposed to a call
 * that ran and reverted or halted.
 */
export class ExecutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExecutionError';
    Object.setPrototypeOf(this, ExecutionError.prototype);
  }
}
