// SPDX-License-Identifier: Apache-2.0

import { predefined } from '../errors/JsonRpcError';
import {
  type BlockRef,
  BlockTag,
  type CallRequest,
  type ChainAccessListEntry,
  type LogFilter,
  type TopicFilter,
  type TransactionRequest,
} from '../types';
import * as Constants from './constants';
import { isObject, stringify } from './utils';

/**
 * Turns validated JSON-RPC params into the domain values the handlers take.
 * Validation runs first, so a failure here means the value slipped past its rule.
 */

const LATEST: BlockRef = { kind: 'tag', tag: BlockTag.LATEST };

const isBlockTag = (value: string): value is BlockTag =>
  value === BlockTag.EARLIEST || value === BlockTag.LATEST || value === BlockTag.PENDING;

export function parseBlockRef(param: unknown, index: number | string): BlockRef {
  if (param === undefined || param === null) {
    return LATEST;
  }

  if (isObject(param)) {
    if (param.blockHash !== undefined) {
      return parseBlockRef(param.blockHash, index);
    }
    return parseBlockRef(param.blockNumber, index);
  }

  if (typeof param === 'string') {
    if (isBlockTag(param)) {
      return { kind: 'tag', tag: param };
    }
    if (Constants.HASH_REGEX.test(param)) {
      return { kind: 'hash', hash: param.toLowerCase() };
    }
    if (Constants.BLOCK_NUMBER_REGEX.test(param)) {
      return { kind: 'number', number: BigInt(param.toLowerCase()) };
    }
  }

  throw predefined.INVALID_PARAMETER(index, `${Constants.BLOCK_PARAMS_ERROR}, value: ${stringify(param)}`);
}

export function parseQuantity(param: unknown, index: number | string): bigint {
  if (typeof param === 'string' && Constants.QUANTITY_REGEX.test(param)) {
    return BigInt(param.toLowerCase());
  }
  throw predefined.INVALID_PARAMETER(index, `${Constants.QUANTITY_ERROR}, value: ${stringify(param)}`);
}

export function parseIndex(param: unknown, index: number | string): number {
  if (typeof param === 'string' && Constants.INDEX_REGEX.test(param)) {
    const value = Number(param);
    if (Number.isSafeInteger(value)) {
      return value;
    }
  }
  throw predefined.INVALID_PARAMETER(index, `${Constants.INDEX_ERROR}, value: ${stringify(param)}`);
}

export function parseHex(param: unknown, index: number | string): string {
  if (typeof param === 'string' && /^0[xX][0-9a-fA-F]*$/.test(param)) {
    return '0x' + param.substring(2).toLowerCase();
  }
  throw predefined.INVALID_PARAMETER(index, `Expected 0x prefixed hexadecimal value, value: ${stringify(param)}`);
}

const optionalQuantity = (object: Record<string, unknown>, field: string, name: string): bigint | undefined =>
  object[field] === undefined ? undefined : parseQuantity(object[field], `'${field}' for ${name}`);

const parseTransactionType = (object: Record<string, unknown>, name: string): number | undefined => {
  const type = optionalQuantity(object, 'type', name);
  if (type === undefined) {
    return undefined;
  }
  // typed transaction envelopes take a single byte below 0x80
  if (type > 0x7fn) {
    throw predefined.INVALID_PARAMETER(
      `'type' for ${name}`,
      `Unknown transaction type, value: ${stringify(object.type)}`,
    );
  }
  return Number(type);
};

const parseAccessList = (param: unknown, name: string): ChainAccessListEntry[] | undefined => {
  if (param === undefined) {
    return undefined;
  }
  const field = `'accessList' for ${name}`;
  if (!Array.isArray(param)) {
    throw predefined.INVALID_PARAMETER(field, `Expected an array, value: ${stringify(param)}`);
  }
  return param.map((entry: unknown) => {
    if (!isObject(entry) || !Array.isArray(entry.storageKeys)) {
      throw predefined.INVALID_PARAMETER(field, `Expected an access list entry, value: ${stringify(entry)}`);
    }
    return {
      address: parseHex(entry.address, field),
      storageKeys: entry.storageKeys.map((key: unknown) => parseHex(key, field)),
    };
  });
};

export function parseCallRequest(param: unknown, index: number | string): CallRequest {
  const name = 'TransactionObject';
  if (!isObject(param)) {
    throw predefined.INVALID_PARAMETER(index, `Expected ${name}, value: ${stringify(param)}`);
  }

  const data = param.data === undefined || param.data === null ? undefined : parseHex(param.data, `'data' for ${name}`);
  const input = param.input === undefined ? undefined : parseHex(param.input, `'input' for ${name}`);
  if (data !== undefined && input !== undefined && data !== input) {
    throw predefined.INVALID_PARAMETER(
      index,
      `'data' and 'input' are both set and not equal, please use 'input' to pass transaction call data`,
    );
  }

  let to: string | null | undefined;
  if (param.to === null) {
    to = null;
  } else if (param.to !== undefined) {
    to = parseHex(param.to, `'to' for ${name}`);
  }

  return {
    from: param.from === undefined ? undefined : parseHex(param.from, `'from' for ${name}`),
    to,
    gas: optionalQuantity(param, 'gas', name),
    gasPrice: optionalQuantity(param, 'gasPrice', name),
    maxFeePerGas: optionalQuantity(param, 'maxFeePerGas', name),
    maxPriorityFeePerGas: optionalQuantity(param, 'maxPriorityFeePerGas', name),
    value: optionalQuantity(param, 'value', name),
    data: input ?? data,
    nonce: optionalQuantity(param, 'nonce', name),
    type: parseTransactionType(param, name),
    chainId: optionalQuantity(param, 'chainId', name),
    accessList: parseAccessList(param.accessList, name),
  };
}

export function parseTransactionRequest(param: unknown, index: number | string): TransactionRequest {
  const { from, ...rest } = parseCallRequest(param, index);
  if (from === undefined) {
    throw predefined.MISSING_REQUIRED_PARAMETER(`'from' for TransactionRequestObject`);
  }
  return { ...rest, from };
}

const parseAddresses = (param: unknown, index: number | string): string[] => {
  if (param === undefined || param === null) {
    return [];
  }
  const addresses = Array.isArray(param) ? param.flat() : [param];
  return addresses.map((address: unknown) => {
    if (typeof address === 'string' && Constants.ADDRESS_REGEX.test(address)) {
      return address.toLowerCase();
    }
    throw predefined.INVALID_PARAMETER(index, `${Constants.ADDRESS_ERROR}, value: ${stringify(address)}`);
  });
};

const parseTopic = (topic: unknown, index: number | string): string => {
  if (typeof topic === 'string' && Constants.HASH_REGEX.test(topic)) {
    return topic.toLowerCase();
  }
  throw predefined.INVALID_PARAMETER(index, `${Constants.TOPIC_HASH_ERROR}, value: ${stringify(topic)}`);
};

/**
 * A null position, an empty set, or a set holding null all match any topic.
 */
const parseTopics = (param: unknown, index: number | string): TopicFilter => {
  if (param === undefined || param === null) {
    return [];
  }
  if (!Array.isArray(param)) {
    throw predefined.INVALID_PARAMETER(index, `Expected an array of topics, value: ${stringify(param)}`);
  }
  return param.map((position: unknown) => {
    if (position === null) {
      return null;
    }
    if (Array.isArray(position)) {
      if (position.length === 0 || position.includes(null)) {
        return null;
      }
      return position.map((topic: unknown) => parseTopic(topic, index));
    }
    return [parseTopic(position, index)];
  });
};

export function parseLogFilter(param: unknown, index: number | string): LogFilter {
  if (!isObject(param)) {
    throw predefined.INVALID_PARAMETER(index, `Expected FilterObject, value: ${stringify(param)}`);
  }

  const addresses = parseAddresses(param.address, index);
  const topics = parseTopics(param.topics, index);

  if (param.blockHash !== undefined) {
    const blockRef = parseBlockRef(param.blockHash, index);
    if (blockRef.kind !== 'hash') {
      throw predefined.INVALID_PARAMETER(index, `${Constants.BLOCK_HASH_ERROR}, value: ${stringify(param.blockHash)}`);
    }
    return { kind: 'blockHash', blockHash: blockRef.hash, addresses, topics };
  }

  return {
    kind: 'range',
    fromBlock: parseBlockRef(param.fromBlock, index),
    toBlock: parseBlockRef(param.toBlock, index),
    addresses,
    topics,
  };
}
