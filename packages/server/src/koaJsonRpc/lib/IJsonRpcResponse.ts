// SPDX-License-Identifier: Apache-2.0

export interface IJsonRpcErrorObject {
  code: number;
  message: string;
  data?: string;
}

export interface IJsonRpcResponse {
  jsonrpc: '2.0';
  id: string | number | null;
  result?: unknown;
  error?: IJsonRpcErrorObject;
}
