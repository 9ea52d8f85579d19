// SPDX-License-Identifier: Apache-2.0

import { type ITypeValidation, ParamType, type ValidationTypeName } from '../types/validation';
import * as Constants from './constants';
import { OBJECTS_VALIDATIONS, validateFilterObject, validateSchema } from './objectTypes';
import { isObject, validateArray } from './utils';

const matches =
  (regex: RegExp) =>
  (param: unknown): boolean =>
    typeof param === 'string' && regex.test(param);

const isBlockNumber = (param: unknown): boolean =>
  matches(Constants.BLOCK_NUMBER_REGEX)(param) ||
  (typeof param === 'string' && Constants.BLOCK_TAGS.includes(param));

export const TYPES: { [typeName in ValidationTypeName]: ITypeValidation } = {
  [ParamType.ADDRESS]: {
    test: matches(Constants.ADDRESS_REGEX),
    error: Constants.ADDRESS_ERROR,
  },
  accessList: {
    test: (param: unknown) =>
      Array.isArray(param) &&
      param.every(
        (entry: unknown) =>
          isObject(entry) &&
          TYPES[ParamType.ADDRESS].test(entry.address) &&
          Array.isArray(entry.storageKeys) &&
          entry.storageKeys.every(matches(Constants.HASH_REGEX)),
      ),
    error: 'Expected an array of { address, storageKeys } entries',
  },
  addressFilter: {
    test: (param: unknown) => {
      return Array.isArray(param) ? validateArray(param.flat(), ParamType.ADDRESS) : TYPES[ParamType.ADDRESS].test(param);
    },
    error: `${Constants.ADDRESS_ERROR} or an array of addresses`,
  },
  [ParamType.BLOCK_HASH]: {
    test: matches(Constants.HASH_REGEX),
    error: Constants.BLOCK_HASH_ERROR,
  },
  [ParamType.BLOCK_NUMBER]: {
    test: isBlockNumber,
    error: Constants.BLOCK_NUMBER_ERROR,
  },
  [ParamType.BLOCK_PARAMS]: {
    test: (param: unknown) => {
      if (isObject(param)) {
        if (Object.prototype.hasOwnProperty.call(param, 'blockHash')) {
          return validateSchema(OBJECTS_VALIDATIONS.blockHashObject, param);
        }
        return validateSchema(OBJECTS_VALIDATIONS.blockNumberObject, param);
      }
      return isBlockNumber(param) || matches(Constants.HASH_REGEX)(param);
    },
    error: Constants.BLOCK_PARAMS_ERROR,
  },
  [ParamType.BOOLEAN]: {
    test: (param: unknown) => param === true || param === false,
    error: 'Expected boolean type',
  },
  [ParamType.FILTER]: {
    test: (param: unknown) => {
      if (isObject(param)) {
        return validateFilterObject(param);
      }

      return false;
    },
    error: `Expected FilterObject`,
  },
  [ParamType.HASH]: {
    test: matches(Constants.HASH_REGEX),
    error: Constants.HASH_ERROR,
  },
  [ParamType.HEX64]: {
    test: matches(new RegExp(Constants.BASE_HEX_REGEX + '{1,64}$')),
    error: Constants.SLOT_ERROR,
  },
  [ParamType.HEX_EVEN_LENGTH]: {
    test: (param: unknown) =>
      typeof param === 'string' && new RegExp(Constants.BASE_HEX_REGEX + '*$').test(param) && !(param.length % 2),
    error: Constants.EVEN_HEX_ERROR,
  },
  [ParamType.SIGNED_TRANSACTION]: {
    test: (param: unknown) =>
      typeof param === 'string' && new RegExp(Constants.BASE_HEX_REGEX + '+$').test(param) && !(param.length % 2),
    error: Constants.SIGNED_TRANSACTION_ERROR,
  },
  [ParamType.INDEX]: {
    test: (param: unknown) =>
      matches(Constants.INDEX_REGEX)(param) && Number.MAX_SAFE_INTEGER >= Number(param),
    error: Constants.INDEX_ERROR,
  },
  [ParamType.NONCE]: {
    test: matches(Constants.NONCE_REGEX),
    error: Constants.NONCE_ERROR,
  },
  [ParamType.QUANTITY]: {
    test: matches(Constants.QUANTITY_REGEX),
    error: Constants.QUANTITY_ERROR,
  },
  topicHash: {
    test: (param: unknown) => matches(Constants.HASH_REGEX)(param) || param === null,
    error: Constants.TOPIC_HASH_ERROR,
  },
  topics: {
    test: (param: unknown) => {
      return Array.isArray(param) ? validateArray(param.flat(), 'topicHash') : false;
    },
    error: `Expected an array or array of arrays containing ${Constants.HASH_ERROR} of a topic`,
  },
  [ParamType.TRANSACTION]: {
    test: (param: unknown) => {
      if (isObject(param)) {
        return validateSchema(OBJECTS_VALIDATIONS.transaction, param);
      }

      return false;
    },
    error: 'Expected TransactionObject',
  },
  [ParamType.TRANSACTION_HASH]: {
    test: matches(Constants.HASH_REGEX),
    error: Constants.TRANSACTION_HASH_ERROR,
  },
  [ParamType.TRANSACTION_REQUEST]: {
    test: (param: unknown) => {
      if (isObject(param)) {
        return validateSchema(OBJECTS_VALIDATIONS.transactionRequest, param);
      }

      return false;
    },
    error: 'Expected TransactionRequestObject',
  },
};
