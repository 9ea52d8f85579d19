// SPDX-License-Identifier: Apache-2.0

import { JsonRpcError } from '@eth-facade/relay';
import { expect } from 'chai';

import { translateRpcErrorToHttpStatus } from '../../src/koaJsonRpc/lib/httpErrorMapper';

describe('translateRpcErrorToHttpStatus', () => {
  const requestId = 'req-123';
  const requestIdPrefix = `[Request ID: ${requestId}]`;

  // Helper function to test error code mappings
  const testErrorCodeMapping = (
    errorCode: number,
    errorMessage: string,
    expectedStatusCode: number,
    errorData?: string,
  ) => {
    const result = translateRpcErrorToHttpStatus(
      new JsonRpcError({ code: errorCode, message: errorMessage, data: errorData }, requestId),
    );

    expect(result.statusErrorCode).to.equal(expectedStatusCode);
    return result;
  };

  describe('Standard JSON-RPC error codes', () => {
    const errorCodeMappings = [
      { code: 3, message: 'Contract reverted', expectedStatus: 200 },
      { code: -32603, message: 'Internal error', expectedStatus: 500 },
      { code: -32700, message: 'Parse error', expectedStatus: 400 },
      { code: -32600, message: 'Invalid request', expectedStatus: 400 },
      { code: -32602, message: 'Invalid params', expectedStatus: 400 },
      { code: -32601, message: 'Method not found', expectedStatus: 400 },
      { code: -32001, message: 'Requested resource not found', expectedStatus: 400 },
      { code: -32002, message: 'Block resolution failed', expectedStatus: 400 },
      { code: -32003, message: 'Transaction rejected', expectedStatus: 400 },
      { code: -99999, message: 'Unknown error', expectedStatus: 400 },
    ];

    errorCodeMappings.forEach(({ code, message, expectedStatus }) => {
      it(`should map ${message} (${code}) to HTTP ${expectedStatus}`, () => {
        testErrorCodeMapping(code, message, expectedStatus);
      });
    });
  });

  describe('Chain backend error handling', () => {
    const chainBackendErrorCode = -32020;

    const chainBackendErrorMappings = [
      { kind: 'unavailable', message: 'Chain backend failure: executor offline', expectedStatus: 503 },
      { kind: 'internal', message: 'Chain backend failure: state corrupt', expectedStatus: 500 },
      { kind: 'something-else', message: 'Chain backend failure: unknown', expectedStatus: 500 },
    ];

    chainBackendErrorMappings.forEach(({ kind, message, expectedStatus }) => {
      it(`should map a ${kind} backend failure to HTTP ${expectedStatus}`, () => {
        const result = testErrorCodeMapping(chainBackendErrorCode, message, expectedStatus, kind);
        expect(result.statusErrorMessage).to.equal(`${requestIdPrefix} ${message}`);
      });
    });

    it('should handle backend failures without error data', () => {
      const result = testErrorCodeMapping(chainBackendErrorCode, 'Chain backend failure without data', 500);
      expect(result.statusErrorMessage).to.equal(`${requestIdPrefix} Chain backend failure without data`);
    });
  });
});
