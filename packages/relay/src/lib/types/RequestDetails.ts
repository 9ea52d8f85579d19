// SPDX-License-Identifier: Apache-2.0

export interface IRequestDetails {
  requestId: string;
  ipAddress: string;
  abortSignal?: AbortSignal;
}

/**
 * Per-request context handed from the transport through the dispatcher to every service.
 */
export class RequestDetails {
  /**
   * The unique identifier of the request, echoed in logs and error messages.
   */
  requestId: string;

  /**
   * The IP address the request originated from.
   */
  ipAddress: string;

  /**
   * Aborted by the transport when the client goes away before the response is written.
   */
  abortSignal?: AbortSignal;

  constructor(details: IRequestDetails) {
    this.requestId = details.requestId;
    this.ipAddress = details.ipAddress;
    this.abortSignal = details.abortSignal;
  }

  get formattedRequestId(): string {
    return this.requestId ? `[Request ID: ${this.requestId}]` : '';
  }
}
