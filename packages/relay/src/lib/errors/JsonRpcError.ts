// SPDX-License-Identifier: Apache-2.0

import { decodeErrorMessage } from '../../formatters';
import constants from '../constants';

export class JsonRpcError {
  public code: number;
  public message: string;
  public data?: string;

  constructor(args: { code: number; message: string; data?: string }, requestId?: string) {
    this.code = args.code;
    this.message =
      requestId && !args.message.includes(`[${constants.REQUEST_ID_STRING}`)
        ? `[${constants.REQUEST_ID_STRING}${requestId}] ` + args.message
        : args.message;
    this.data = args.data;
  }

  /**
   * A copy of the error whose message carries the request id.
   */
  public static newWithRequestId(error: JsonRpcError, requestId: string): JsonRpcError {
    return new JsonRpcError({ code: error.code, message: error.message, data: error.data }, requestId);
  }
}

export const predefined = {
  BATCH_REQUESTS_AMOUNT_MAX_EXCEEDED: (amount: number, max: number) =>
    new JsonRpcError({
      code: -32203,
      message: `Batch request amount ${amount} exceeds max ${max}`,
    }),
  BATCH_REQUESTS_DISABLED: new JsonRpcError({
    code: -32202,
    message: 'Batch requests are disabled',
  }),
  BATCH_REQUESTS_METHOD_NOT_PERMITTED: (method: string) =>
    new JsonRpcError({
      code: -32007,
      message: `Method ${method} is not permitted as part of batch requests`,
    }),
  CHAIN_BACKEND_FAIL: (detail: string, kind: string, data?: string) =>
    new JsonRpcError({
      code: -32020,
      message: `Chain backend failure: ${detail}`,
      // the kind stands in for the data when the backend sent none
      data: data ?? kind,
    }),
  COINBASE_UNAVAILABLE: new JsonRpcError({
    code: -32000,
    message: 'Coinbase address is not configured',
  }),
  CONTRACT_REVERT: (errorMessage?: string, data: string = '') => {
    let message: string;
    if (errorMessage?.length) {
      message = `execution reverted: ${decodeErrorMessage(errorMessage)}`;
    } else {
      const decodedData = decodeErrorMessage(data);
      message = decodedData.length ? `execution reverted: ${decodedData}` : 'execution reverted';
    }
    return new JsonRpcError({
      code: 3,
      message,
      data,
    });
  },
  EXECUTION_FAILED: (detail: string) =>
    new JsonRpcError({
      code: -32000,
      message: `Execution failed: ${detail}`,
    }),
  GAS_ALLOWANCE_EXCEEDED: (cap: bigint) =>
    new JsonRpcError({
      code: -32000,
      message: `Gas required exceeds allowance (${cap})`,
    }),
  INTERNAL_ERROR: (message = '') =>
    new JsonRpcError({
      code: -32603,
      message: message === '' ? 'Unknown error invoking RPC' : `Error invoking RPC: ${message}`,
    }),
  INVALID_BLOCK_RANGE: new JsonRpcError({
    code: -32602,
    message: 'Invalid block range',
  }),
  INVALID_PARAMETER: (index: number | string, message: string) =>
    new JsonRpcError({
      code: -32602,
      message: `Invalid parameter ${index}: ${message}`,
    }),
  INVALID_PARAMETERS: new JsonRpcError({
    code: -32602,
    message: 'Invalid params',
  }),
  METHOD_NOT_FOUND: (methodName: string) =>
    new JsonRpcError({
      code: -32601,
      message: `Method ${methodName} not found`,
    }),
  MISSING_REQUIRED_PARAMETER: (index: number | string) =>
    new JsonRpcError({
      code: -32602,
      message: `Missing value for required parameter ${index}`,
    }),
  NO_MINING_WORK: new JsonRpcError({
    code: -32000,
    message: 'No mining work available',
  }),
  REQUEST_ABORTED: new JsonRpcError({
    code: -32004,
    message: 'Request aborted by client',
  }),
  RESOLUTION_FAILED: (reason: string, detail: string) =>
    new JsonRpcError({
      code: -32002,
      message: `Block resolution failed: ${detail}`,
      data: reason,
    }),
  RESOURCE_NOT_FOUND: (message = '') =>
    new JsonRpcError({
      code: -32001,
      message: `Requested resource not found. ${message}`,
    }),
  TRANSACTION_REJECTED: (detail: string, data?: string) =>
    new JsonRpcError({
      code: -32003,
      message: `Transaction rejected: ${detail}`,
      data,
    }),
  UNKNOWN_ACCOUNT: (address: string) =>
    new JsonRpcError({
      code: -32000,
      message: `Unknown account ${address}`,
    }),
};
