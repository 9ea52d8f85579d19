// SPDX-License-Identifier: Apache-2.0

/**
 * Standard parameter types supported by the validator
 * These are the basic types used in parameter validation schemas
 */
export enum ParamType {
  // Basic types
  ADDRESS = 'address',
  BLOCK_HASH = 'blockHash',
  BLOCK_NUMBER = 'blockNumber',
  BLOCK_PARAMS = 'blockParams',
  TRANSACTION_HASH = 'transactionHash',
  HASH = 'hash',
  INDEX = 'index',
  NONCE = 'nonce',
  QUANTITY = 'quantity',

  // Hex types
  HEX64 = 'hex64',
  HEX_EVEN_LENGTH = 'hexEvenLength',
  SIGNED_TRANSACTION = 'signedTransaction',

  // Complex objects
  TRANSACTION = 'transaction',
  TRANSACTION_REQUEST = 'transactionRequest',
  FILTER = 'filter',

  // Basic JavaScript types
  BOOLEAN = 'boolean',
}

/**
 * Represents a validation rule for a parameter
 */
export interface IParamValidation {
  /**
   * The type of parameter to validate against
   */
  type: ParamType;

  /**
   * Whether the parameter is required
   */
  required: boolean;
}

export type ITypeValidation = {
  test: (param: unknown) => boolean;
  error: string;
};

export type IObjectParamSchema = {
  type: ValidationTypeName;
  nullable: boolean;
  required?: boolean;
};

export type IObjectSchema = {
  name: string;
  properties: {
    [prop: string]: IObjectParamSchema;
  };
  failOnEmpty?: boolean;
  failOnUnexpectedParams?: boolean;
  deleteUnknownProperties?: boolean;
};

/**
 * Names usable in object schemas: every ParamType plus the element types that
 * only appear nested inside objects.
 */
export type ValidationTypeName = ParamType | 'accessList' | 'addressFilter' | 'topicHash' | 'topics';
