// SPDX-License-Identifier: Apache-2.0

export interface IJsonRpcRequest {
  id: string | number | null;
  jsonrpc: string;
  method: string;
  params?: unknown[];
}
