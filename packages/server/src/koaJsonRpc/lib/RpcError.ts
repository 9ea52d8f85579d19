// SPDX-License-Identifier: Apache-2.0

import { JsonRpcError } from '@eth-facade/relay';

/**
 * Errors raised by the transport itself, before a request reaches the relay.
 */
export class ParseError extends JsonRpcError {
  constructor() {
    super({ code: -32700, message: 'Parse error' });
  }
}

export class InvalidRequest extends JsonRpcError {
  constructor() {
    super({ code: -32600, message: 'Invalid Request' });
  }
}

export class InternalError extends JsonRpcError {
  constructor(message?: string) {
    super({ code: -32603, message: message ? `Error invoking RPC: ${message}` : 'Unknown error invoking RPC' });
  }
}
