// SPDX-License-Identifier: Apache-2.0
import {
  RPC_METHOD_KEY,
  RPC_PARAM_LAYOUT_KEY,
  RPC_PARAM_VALIDATION_RULES_KEY,
  type RpcMethodMetadata,
} from '../../decorators';
import type { OperationHandler, RpcMethodRegistry, RpcNamespaceRegistry } from '../../types';

const isRpcMethod = (candidate: unknown): candidate is ((...args: unknown[]) => unknown) & RpcMethodMetadata =>
  typeof candidate === 'function' && RPC_METHOD_KEY in candidate && candidate[RPC_METHOD_KEY] === true;

/**
 * Registers RPC methods from the provided service implementations.
 *
 * This function scans each implementation instance for methods decorated with
 * the @rpcMethod decorator and registers them in a map using the convention
 * namespace_operationName (e.g., eth_blockNumber). Several implementations may
 * share a namespace; an operation name registered twice is a wiring error.
 *
 * @param {RpcNamespaceRegistry[]} rpcNamespaceRegistry - An array of objects
 * containing the namespace and corresponding service implementation.
 *
 * @returns {RpcMethodRegistry} A map where keys are RPC method names in the
 * format namespace_operationName, and values are the bound function implementations
 * of those methods.
 */
export function registerRpcMethods(rpcNamespaceRegistry: RpcNamespaceRegistry[]): RpcMethodRegistry {
  const registry: RpcMethodRegistry = new Map();

  rpcNamespaceRegistry.forEach(({ namespace, serviceImpl }) => {
    // Get the prototype to access the methods defined on the class
    const prototype: object = Object.getPrototypeOf(serviceImpl);

    // Find all method names on the prototype, excluding constructor
    Object.getOwnPropertyNames(prototype)
      .filter((operationName) => operationName !== 'constructor')
      .forEach((operationName) => {
        const operationFunction: unknown = Reflect.get(prototype, operationName);

        // Only register methods that have been decorated with @rpcMethod (i.e. RPC_METHOD_KEY is true)
        if (!isRpcMethod(operationFunction)) {
          return;
        }

        // Create the full RPC method ID in format: namespace_operationName (e.g., eth_blockNumber)
        const rpcMethodName = `${namespace}_${operationName}`;
        if (registry.has(rpcMethodName)) {
          throw new Error(`RPC method ${rpcMethodName} is registered by more than one implementation`);
        }

        // Bind the method to the implementation instance to preserve the 'this' context,
        // and carry the validation rules and parameter layout over to the bound handler
        const boundMethod: OperationHandler = Object.assign(
          (...args: unknown[]): unknown => Reflect.apply(operationFunction, serviceImpl, args),
          {
            [RPC_METHOD_KEY]: true,
            [RPC_PARAM_VALIDATION_RULES_KEY]: operationFunction[RPC_PARAM_VALIDATION_RULES_KEY],
            [RPC_PARAM_LAYOUT_KEY]: operationFunction[RPC_PARAM_LAYOUT_KEY],
          },
        );

        // Preserve the original operation name
        Object.defineProperty(boundMethod, 'name', {
          value: operationName,
        });

        registry.set(rpcMethodName, boundMethod);
      });
  });

  return registry;
}
