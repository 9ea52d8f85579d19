// SPDX-License-Identifier: Apache-2.0

import { predefined } from '../errors/JsonRpcError';
import { type IObjectParamSchema, type IObjectSchema, ParamType } from '../types/validation';
import { validateObject } from './utils';

const CALL_PROPERTIES: { [prop: string]: IObjectParamSchema } = {
  from: {
    type: ParamType.ADDRESS,
    nullable: false,
  },
  to: {
    type: ParamType.ADDRESS,
    nullable: true,
  },
  gas: {
    type: ParamType.QUANTITY,
    nullable: false,
  },
  gasPrice: {
    type: ParamType.QUANTITY,
    nullable: false,
  },
  maxPriorityFeePerGas: {
    type: ParamType.QUANTITY,
    nullable: false,
  },
  maxFeePerGas: {
    type: ParamType.QUANTITY,
    nullable: false,
  },
  value: {
    type: ParamType.QUANTITY,
    nullable: false,
  },
  data: {
    type: ParamType.HEX_EVEN_LENGTH,
    nullable: true,
  },
  input: {
    type: ParamType.HEX_EVEN_LENGTH,
    nullable: false,
  },
  type: {
    type: ParamType.QUANTITY,
    nullable: false,
  },
  chainId: {
    type: ParamType.QUANTITY,
    nullable: false,
  },
  nonce: {
    type: ParamType.QUANTITY,
    nullable: false,
  },
  accessList: {
    type: 'accessList',
    nullable: false,
  },
};

export const OBJECTS_VALIDATIONS = {
  blockHashObject: {
    name: 'BlockHashObject',
    failOnUnexpectedParams: true,
    properties: {
      blockHash: {
        type: ParamType.BLOCK_HASH,
        nullable: false,
        required: true,
      },
    },
  },
  blockNumberObject: {
    name: 'BlockNumberObject',
    failOnUnexpectedParams: true,
    properties: {
      blockNumber: {
        type: ParamType.BLOCK_NUMBER,
        nullable: false,
        required: true,
      },
    },
  },
  filter: {
    name: 'FilterObject',
    failOnUnexpectedParams: true,
    properties: {
      blockHash: {
        type: ParamType.BLOCK_HASH,
        nullable: false,
      },
      fromBlock: {
        type: ParamType.BLOCK_NUMBER,
        nullable: false,
      },
      toBlock: {
        type: ParamType.BLOCK_NUMBER,
        nullable: false,
      },
      address: {
        type: 'addressFilter',
        nullable: false,
      },
      topics: {
        type: 'topics',
        nullable: false,
      },
    },
  },
  transaction: {
    name: 'TransactionObject',
    failOnUnexpectedParams: false,
    deleteUnknownProperties: true,
    properties: CALL_PROPERTIES,
  },
  transactionRequest: {
    name: 'TransactionRequestObject',
    failOnUnexpectedParams: false,
    deleteUnknownProperties: true,
    properties: {
      ...CALL_PROPERTIES,
      from: {
        type: ParamType.ADDRESS,
        nullable: false,
        required: true,
      },
    },
  },
} satisfies { [key: string]: IObjectSchema };

export function validateSchema(schema: IObjectSchema, object: Record<string, unknown>): boolean {
  const expectedParams = Object.keys(schema.properties);
  const actualParams = Object.keys(object);
  if (schema.failOnUnexpectedParams) {
    const unknownParam = actualParams.find((param) => !expectedParams.includes(param));
    if (unknownParam) {
      throw predefined.INVALID_PARAMETER(`'${unknownParam}' for ${schema.name}`, `Unknown parameter`);
    }
  }
  if (schema.deleteUnknownProperties) {
    const unknownParams = actualParams.filter((param) => !expectedParams.includes(param));
    for (const param of unknownParams) {
      delete object[param];
    }
  }
  return validateObject(object, schema);
}

/**
 * Only one way of selecting blocks may be used per filter.
 */
export function validateFilterObject(param: Record<string, unknown>): boolean {
  if (param.blockHash !== undefined && (param.toBlock !== undefined || param.fromBlock !== undefined)) {
    throw predefined.INVALID_PARAMETER(0, "Can't use both blockHash and toBlock/fromBlock");
  }
  return validateSchema(OBJECTS_VALIDATIONS.filter, param);
}
