// SPDX-License-Identifier: Apache-2.0

import { JsonRpcError, predefined } from '../errors/JsonRpcError';
import type { IObjectSchema, ValidationTypeName } from '../types/validation';
import { TYPES } from './types';

export function isObject(param: unknown): param is Record<string, unknown> {
  return Object.prototype.toString.call(param) === '[object Object]';
}

export function stringify(param: unknown): string {
  return typeof param === 'object' ? JSON.stringify(param) : String(param);
}

export function validateObject(object: Record<string, unknown>, filters: IObjectSchema): boolean {
  for (const property of Object.keys(filters.properties)) {
    const validation = filters.properties[property];
    const param = object[property];

    if (requiredIsMissing(param, validation.required)) {
      throw predefined.MISSING_REQUIRED_PARAMETER(`'${property}' for ${filters.name}`);
    }

    if (isValidAndNonNullableParam(param, validation.nullable)) {
      try {
        const result = TYPES[validation.type].test(param);

        if (!result) {
          throw predefined.INVALID_PARAMETER(
            `'${property}' for ${filters.name}`,
            `${TYPES[validation.type].error}, value: ${stringify(param)}`,
          );
        }
      } catch (error) {
        if (error instanceof JsonRpcError) {
          throw predefined.INVALID_PARAMETER(
            `'${property}' for ${filters.name}`,
            `${TYPES[validation.type].error}, value: ${stringify(param)}`,
          );
        }

        throw error;
      }
    }
  }

  const paramsMatchingFilters = Object.keys(filters.properties).filter((key) => object[key] !== undefined);
  return !filters.failOnEmpty || paramsMatchingFilters.length > 0;
}

export function validateArray(array: unknown[], innerType?: ValidationTypeName): boolean {
  if (!innerType) return true;

  const isInnerType = (element: unknown) => TYPES[innerType].test(element);

  return array.every(isInnerType);
}

export function requiredIsMissing(param: unknown, required: boolean | undefined): boolean {
  return required === true && param === undefined;
}

export function isValidAndNonNullableParam(param: unknown, nullable: boolean): boolean {
  return param !== undefined && (param !== null || !nullable);
}
