// SPDX-License-Identifier: Apache-2.0

import type { JsonRpcError } from '@eth-facade/relay';

import type { IJsonRpcResponse } from './IJsonRpcResponse';

/**
 * Builds a JSON-RPC 2.0 response envelope. An error wins over a result; an absent
 * result is written as null.
 */
export default function jsonResp(
  id: string | number | null,
  error: JsonRpcError | null,
  result: unknown,
): IJsonRpcResponse {
  if (error) {
    return {
      jsonrpc: '2.0',
      id,
      error: {
        code: error.code,
        message: error.message,
        ...(error.data !== undefined && { data: error.data }),
      },
    };
  }

  return { jsonrpc: '2.0', id, result: result ?? null };
}
