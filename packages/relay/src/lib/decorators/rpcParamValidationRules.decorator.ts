// SPDX-License-Identifier: Apache-2.0

import type { IParamValidation } from '../types/validation';

/**
 * This key is attached to method functions to store their validation rules.
 */
export const RPC_PARAM_VALIDATION_RULES_KEY = 'eth-facade-rpc-param-validation-rules';

/**
 * Decorator that defines a schema for validating RPC method parameters
 *
 * @example
 * ```typescript
 * @rpcMethod
 * @rpcParamValidationRules({
 *   0: { type: ParamType.ADDRESS, required: true },
 *   1: { type: ParamType.BLOCK_PARAMS, required: false },
 * })
 * getBalance(address: string, blockRef: BlockRef, requestDetails: RequestDetails): Promise<string | null> {
 *   // Implementation
 * }
 * ```
 *
 * @param validationRules - Validation rules for method parameters
 * @returns Method decorator function
 */
export function rpcParamValidationRules(validationRules: Record<number, IParamValidation>) {
  return function <T extends (...args: never[]) => unknown>(
    _target: object,
    _propertyKey: string,
    descriptor: TypedPropertyDescriptor<T>,
  ): TypedPropertyDescriptor<T> {
    if (descriptor.value) {
      // Store validation rules directly on the function as a property
      Object.assign(descriptor.value, { [RPC_PARAM_VALIDATION_RULES_KEY]: validationRules });
    }
    return descriptor;
  };
}
