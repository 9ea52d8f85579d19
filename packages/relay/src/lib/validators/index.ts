// SPDX-License-Identifier: Apache-2.0

import { predefined } from '../errors/JsonRpcError';
import type { IParamValidation } from '../types/validation';
import { TYPES } from './types';
import { requiredIsMissing, stringify } from './utils';

function validateParams(params: unknown[], indexes: Record<number, IParamValidation>): void {
  if (params.length > Object.keys(indexes).length) {
    throw predefined.INVALID_PARAMETERS;
  }

  for (const index of Object.keys(indexes)) {
    const validation = indexes[Number(index)];
    const param = params[Number(index)];

    validateParam(index, param, validation);
  }
}

function validateParam(index: number | string, param: unknown, validation: IParamValidation): void {
  const paramType = TYPES[validation.type];

  if (requiredIsMissing(param, validation.required)) {
    throw predefined.MISSING_REQUIRED_PARAMETER(index);
  } else if (!validation.required && param === undefined) {
    // optional trailing params, such as the block of eth_call, may be left out
    return;
  }

  if (param === null) {
    throw predefined.INVALID_PARAMETER(index, `The value passed is not valid: ${param}.`);
  }

  if (!paramType.test(param)) {
    throw predefined.INVALID_PARAMETER(index, `${paramType.error}, value: ${stringify(param)}`);
  }
}

export const Validator = {
  validateParams,
  validateParam,
};

export { TYPES } from './types';
export { OBJECTS_VALIDATIONS } from './objectTypes';
export * as Constants from './constants';
export * from './parsers';
