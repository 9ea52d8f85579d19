// SPDX-License-Identifier: Apache-2.0

import type { RequestDetails } from '../../../types';

/**
 * Proof-of-work queries. Every member answers synchronously from the coordinator's resident state.
 */
export interface IMiningService {
  coinbase(requestDetails: RequestDetails): string;
  getWork(requestDetails: RequestDetails): string[];
  hashrate(requestDetails: RequestDetails): string;
  mining(requestDetails: RequestDetails): boolean;
  submitHashrate(rate: bigint, id: string, requestDetails: RequestDetails): boolean;
  submitWork(nonce: string, powHash: string, mixHash: string, requestDetails: RequestDetails): boolean;
}
