// SPDX-License-Identifier: Apache-2.0

import { RPC_METHOD_KEY } from './rpcMethod.decorator';
import { RPC_PARAM_LAYOUT_KEY, type RpcParamLayout } from './rpcParamLayoutConfig.decorator';
import { RPC_PARAM_VALIDATION_RULES_KEY } from './rpcParamValidationRules.decorator';
import type { IParamValidation } from '../types/validation';

export * from './rpcMethod.decorator';
export * from './rpcParamLayoutConfig.decorator';
export * from './rpcParamValidationRules.decorator';

/**
 * Metadata the decorators attach to a method function.
 */
export interface RpcMethodMetadata {
  [RPC_METHOD_KEY]?: boolean;
  [RPC_PARAM_LAYOUT_KEY]?: RpcParamLayout;
  [RPC_PARAM_VALIDATION_RULES_KEY]?: Record<number, IParamValidation>;
}
