// SPDX-License-Identifier: Apache-2.0

import { ResolutionFailure } from '../types/blockRef';

/**
 * A well-formed block identifier that can no longer be served: the history or
 * state behind it is gone, or the chain reorganised while it was being resolved.
 */
export class ResolutionError extends Error {
  public readonly reason: ResolutionFailure;

  constructor(reason: ResolutionFailure, message: string) {
    super(message);
    this.name = 'ResolutionError';
    this.reason = reason;
    Object.setPrototypeOf(this, ResolutionError.prototype);
  }

  static pruned(target: string): ResolutionError {
    return new ResolutionError(ResolutionFailure.PRUNED_OR_UNAVAILABLE, `${target} is pruned or unavailable`);
  }

  static reorged(target: string): ResolutionError {
    return new ResolutionError(ResolutionFailure.REORGED, `chain reorganised while resolving ${target}`);
  }
}
