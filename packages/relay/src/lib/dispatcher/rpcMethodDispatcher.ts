// SPDX-License-Identifier: Apache-2.0

import type { Logger } from 'pino';

import { Utils } from '../../utils';
import { METHOD_RESULT_POLICY, ResultPolicy } from '../config/methodResultPolicy';
import { RPC_PARAM_VALIDATION_RULES_KEY } from '../decorators';
import { ChainBackendError } from '../errors/ChainBackendError';
import { ExecutionError } from '../errors/ExecutionError';
import { JsonRpcError, predefined } from '../errors/JsonRpcError';
import { ResolutionError } from '../errors/ResolutionError';
import type { OperationHandler, RequestDetails, RpcMethodRegistry } from '../types';
import { Validator } from '../validators';

/**
 * Dispatches JSON-RPC method calls to their appropriate handlers
 *
 * This class is responsible for:
 * - Validating incoming RPC method requests
 * - Routing requests to the correct operation handler
 * - Processing method parameters
 * - Turning absent results into either null or an error, per method
 * - Handling errors that occur during method execution
 */
export class RpcMethodDispatcher {
  /**
   * Creates a new RpcMethodDispatcher
   *
   * @param methodRegistry - Map of RPC method names to their implementations
   * @param logger - Logger for recording execution information
   */
  constructor(
    private readonly methodRegistry: RpcMethodRegistry,
    private readonly logger: Logger,
  ) {}

  /**
   * Dispatches an RPC method call to the appropriate operation handler
   *
   * This is the core method that handles the complete lifecycle of an RPC request:
   * 1. Pre-execution: Validates the method exists and its parameters
   * 2. Execution: Processes the method with the appropriate handler
   * 3. Error handling: Catches and formats any errors that occur
   *
   * @param rpcMethodName - The name of the RPC method to execute (e.g., "eth_blockNumber")
   * @param rpcMethodParams - The parameters of the RPC method to execute
   * @param requestDetails - Additional details about the request context
   * @returns Promise that resolves to the method execution result or a JsonRpcError instance
   */
  public async dispatch(
    rpcMethodName: string,
    rpcMethodParams: unknown[] = [],
    requestDetails: RequestDetails,
  ): Promise<unknown> {
    try {
      /////////////////////////////// Pre-execution Phase ///////////////////////////////
      const operationHandler = this.precheckRpcMethod(rpcMethodName, rpcMethodParams, requestDetails);

      /////////////////////////////// Execution Phase ///////////////////////////////
      const result = await this.processRpcMethod(operationHandler, rpcMethodParams, requestDetails);

      return this.applyResultPolicy(rpcMethodName, result);
    } catch (error) {
      /////////////////////////////// Error Handling Phase ///////////////////////////////
      return this.handleRpcMethodError(error, rpcMethodName, requestDetails);
    }
  }

  /**
   * Prechecks that the requested RPC method exists and its parameters are valid
   *
   * @param rpcMethodName - The name of the RPC method to validate
   * @param rpcMethodParams - The parameters to validate against the method's schema
   * @param requestDetails - Details about the request for logging purposes
   * @returns The operation handler for the requested method
   * @throws {JsonRpcError} If the method doesn't exist or parameters are invalid
   */
  private precheckRpcMethod(
    rpcMethodName: string,
    rpcMethodParams: unknown[],
    requestDetails: RequestDetails,
  ): OperationHandler {
    // Validate RPC method existence
    const operationHandler = this.methodRegistry.get(rpcMethodName);

    if (!operationHandler) {
      if (this.logger.isLevelEnabled('debug')) {
        this.logger.debug(
          `${requestDetails.formattedRequestId} RPC method not found in registry: rpcMethodName=${rpcMethodName}`,
        );
      }

      throw predefined.METHOD_NOT_FOUND(rpcMethodName);
    }

    // Validate RPC method parameters
    const methodParamSchemas = operationHandler[RPC_PARAM_VALIDATION_RULES_KEY];

    if (methodParamSchemas) {
      if (this.logger.isLevelEnabled('debug')) {
        this.logger.debug(
          `${
            requestDetails.formattedRequestId
          } Validating method parameters for ${rpcMethodName}, params: ${JSON.stringify(rpcMethodParams)}`,
        );
      }
      Validator.validateParams(rpcMethodParams, methodParamSchemas);
    } else if (rpcMethodParams.length > 0) {
      // methods without rules take no parameters
      throw predefined.INVALID_PARAMETERS;
    }

    return operationHandler;
  }

  /**
   * Processes an RPC method by executing its operation handler with the provided parameters
   *
   * @param operationHandler - The function that implements the RPC method
   * @param rpcMethodParams - The parameters passed to the RPC method
   * @param requestDetails - Additional context about the request
   * @returns Promise resolving to the result of the operation handler
   */
  private async processRpcMethod(
    operationHandler: OperationHandler,
    rpcMethodParams: unknown[],
    requestDetails: RequestDetails,
  ): Promise<unknown> {
    // Rearrange the parameters as needed for the specific operation handler
    const rearrangedParams = Utils.arrangeRpcParams(operationHandler, rpcMethodParams, requestDetails);

    // Execute the operation handler with the rearranged parameters
    const result = await operationHandler(...rearrangedParams);

    // *Note: In some cases, the operation handler may return an exception instead of throwing.
    // To ensure proper and centralized error handling in the dispatcher, preserve and rethrow the error,
    // regardless of whether the operation handler returns or throws it.
    if (result instanceof JsonRpcError) {
      throw result;
    }

    return result;
  }

  /**
   * A null result is passed through for optional results and turned into a
   * resource-not-found error for required ones.
   */
  private applyResultPolicy(rpcMethodName: string, result: unknown): unknown {
    if (result !== null && result !== undefined) {
      return result;
    }
    const policy = METHOD_RESULT_POLICY[rpcMethodName] ?? ResultPolicy.REQUIRED;
    if (policy === ResultPolicy.OPTIONAL) {
      return null;
    }
    throw predefined.RESOURCE_NOT_FOUND(rpcMethodName);
  }

  /**
   * Handles errors that occur during RPC method execution
   *
   * - JsonRpcError instances are returned as-is with the request ID attached
   * - ResolutionError, ExecutionError and ChainBackendError are mapped to their JSON-RPC codes
   * - An aborted request is reported as such, whatever the handler threw on its way out
   * - All other errors are converted to generic INTERNAL_ERROR responses
   *
   * All errors are logged with request context for traceability.
   *
   * @param error - The error that occurred during method execution
   * @param rpcMethodName - The name of the RPC method that failed
   * @param requestDetails - Details about the request for logging and context
   * @returns A JsonRpcError instance with appropriate error code, message and request ID
   */
  private handleRpcMethodError(error: unknown, rpcMethodName: string, requestDetails: RequestDetails): JsonRpcError {
    const errorMessage =
      (error instanceof Error || error instanceof JsonRpcError) && error.message ? error.message : 'Unknown error';
    this.logger.error(
      `${requestDetails.formattedRequestId} Error executing method: rpcMethodName=${rpcMethodName}, error=${errorMessage}`,
    );

    // If error is already a JsonRpcError, use it directly
    if (error instanceof JsonRpcError) {
      return this.createJsonRpcError(error, requestDetails.requestId);
    }

    if (requestDetails.abortSignal?.aborted || (error instanceof Error && error.name === 'AbortError')) {
      return this.createJsonRpcError(predefined.REQUEST_ABORTED, requestDetails.requestId);
    }

    if (error instanceof ResolutionError) {
      return this.createJsonRpcError(
        predefined.RESOLUTION_FAILED(error.reason, error.message),
        requestDetails.requestId,
      );
    }

    if (error instanceof ExecutionError) {
      return this.createJsonRpcError(predefined.EXECUTION_FAILED(error.message), requestDetails.requestId);
    }

    if (error instanceof ChainBackendError) {
      return this.createJsonRpcError(
        error.isRejection()
          ? predefined.TRANSACTION_REJECTED(error.message, error.data)
          : predefined.CHAIN_BACKEND_FAIL(error.message, error.kind, error.data),
        requestDetails.requestId,
      );
    }

    // Default to internal error for all other error types
    return this.createJsonRpcError(predefined.INTERNAL_ERROR(errorMessage), requestDetails.requestId);
  }

  /**
   * Creates a new JsonRpcError with the request ID attached to assist with tracing and debugging
   */
  private createJsonRpcError(error: JsonRpcError, requestId: string): JsonRpcError {
    return JsonRpcError.newWithRequestId(error, requestId);
  }
}
