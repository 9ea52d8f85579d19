// SPDX-License-Identifier: Apache-2.0

/**
 * Key used to store parameter layout configuration
 */
export const RPC_PARAM_LAYOUT_KEY = 'eth-facade-rpc-param-layout';

/**
 * Turns the raw positional JSON-RPC params into the handler's leading arguments.
 * It may parse as well as rearrange, and throws a JsonRpcError for values it cannot parse.
 */
export type ParamTransformFn = (params: unknown[]) => unknown[];

/**
 * Built-in parameter layouts for common RPC method patterns
 */
export const RPC_LAYOUT = {
  /**
   * Layout for methods that only need the requestDetails parameter
   */
  REQUEST_DETAILS_ONLY: 'request-details-only',

  /**
   * Create a custom parameter layout using a transform function
   *
   * @param rpcParamRearrangementFn - Function to show custom parameter rearrangement
   */
  custom: (rpcParamRearrangementFn: ParamTransformFn): ParamTransformFn => rpcParamRearrangementFn,
} as const;

export type RpcParamLayout = typeof RPC_LAYOUT.REQUEST_DETAILS_ONLY | ParamTransformFn;

/**
 * Decorator for specifying the parameter layout of an RPC method which is different from the standard layout
 *
 * Without it, handlers receive the raw params followed by the request details.
 *
 * @example
 * ```typescript
 * // Method that only needs requestDetails
 * @rpcMethod
 * @rpcParamLayoutConfig(RPC_LAYOUT.REQUEST_DETAILS_ONLY)
 * blockNumber(requestDetails: RequestDetails): Promise<string> {
 *   // Implementation
 * }
 *
 * // Method whose optional block parameter is parsed into a BlockRef
 * @rpcMethod
 * @rpcParamLayoutConfig(RPC_LAYOUT.custom((params) => [params[0], parseBlockRef(params[1], 1)]))
 * getBalance(address: string, blockRef: BlockRef, requestDetails: RequestDetails): Promise<string | null> {
 *   // Implementation
 * }
 * ```
 */
export function rpcParamLayoutConfig(layout: RpcParamLayout) {
  return function <T extends (...args: never[]) => unknown>(
    _target: object,
    _propertyKey: string,
    descriptor: TypedPropertyDescriptor<T>,
  ): TypedPropertyDescriptor<T> {
    if (descriptor.value) {
      Object.assign(descriptor.value, { [RPC_PARAM_LAYOUT_KEY]: layout });
    }
    return descriptor;
  };
}
