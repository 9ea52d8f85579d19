// SPDX-License-Identifier: Apache-2.0

/**
 * Key used to mark methods as RPC-enabled.
 * This key is attached to method functions to indicate they can be exposed via RPC.
 */
export const RPC_METHOD_KEY = 'eth-facade-rpc-method';

/**
 * Decorator that marks a class method as an RPC method.
 * When applied to a method, it marks that method as available for RPC invocation.
 *
 * @example
 * ```typescript
 * class EthMiningImpl {
 *   @rpcMethod
 *   mining(): boolean {
 *     return false;
 *   }
 * }
 * ```
 */
export function rpcMethod<T extends (...args: never[]) => unknown>(
  _target: object,
  _propertyKey: string,
  descriptor: TypedPropertyDescriptor<T>,
): TypedPropertyDescriptor<T> {
  if (descriptor.value) {
    Object.assign(descriptor.value, { [RPC_METHOD_KEY]: true });
  }
  return descriptor;
}
