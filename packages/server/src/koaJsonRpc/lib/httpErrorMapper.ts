// SPDX-License-Identifier: Apache-2.0

import type { IJsonRpcErrorObject } from './IJsonRpcResponse';

// Define constants for frequently used values
const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
};

// Direct mapping from RPC error codes to HTTP status codes
const ERROR_CODE_MAP: Record<number, number> = {
  3: HTTP_STATUS.OK, // Contract revert
  [-32603]: HTTP_STATUS.INTERNAL_SERVER_ERROR, // Internal error
  [-32700]: HTTP_STATUS.BAD_REQUEST, // Parse error
  [-32600]: HTTP_STATUS.BAD_REQUEST, // Invalid request
  [-32602]: HTTP_STATUS.BAD_REQUEST, // Invalid params
  [-32601]: HTTP_STATUS.BAD_REQUEST, // Method not found
};

// Map chain backend failure kinds to HTTP status codes
// - unavailable -> 503
// - any other kind -> 500
const CHAIN_BACKEND_ERROR_MAP: Record<string, number> = {
  unavailable: HTTP_STATUS.SERVICE_UNAVAILABLE,
};

/**
 * Translates JSON-RPC errors to appropriate HTTP responses
 *
 * @param jsonRpcError - The error carried in the JSON-RPC response
 * @returns HTTP status code and status error description
 */
export function translateRpcErrorToHttpStatus(jsonRpcError: IJsonRpcErrorObject): {
  statusErrorCode: number;
  statusErrorMessage: string;
} {
  // look up status code and define error message
  let statusErrorCode = ERROR_CODE_MAP[jsonRpcError.code] ?? HTTP_STATUS.BAD_REQUEST;
  const statusErrorMessage = jsonRpcError.message;

  // -32020 is a chain backend failure whose data holds the failure kind
  if (jsonRpcError.code === -32020) {
    statusErrorCode =
      (jsonRpcError.data && CHAIN_BACKEND_ERROR_MAP[jsonRpcError.data]) || HTTP_STATUS.INTERNAL_SERVER_ERROR;
  }

  return { statusErrorCode, statusErrorMessage };
}
