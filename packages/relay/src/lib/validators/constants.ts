// SPDX-License-Identifier: Apache-2.0

export const BASE_HEX_REGEX = '^0[xX][a-fA-F0-9]';
export const ADDRESS_REGEX = /^0[xX][a-fA-F0-9]{40}$/;
export const HASH_REGEX = /^0[xX][a-fA-F0-9]{64}$/;
// minimal digits, at most 64 bits
export const BLOCK_NUMBER_REGEX = /^0[xX]([1-9A-Fa-f][0-9A-Fa-f]{0,15}|0)$/;
export const INDEX_REGEX = /^0[xX]([1-9A-Fa-f][0-9A-Fa-f]{0,12}|0)$/;
export const QUANTITY_REGEX = /^0[xX][0-9A-Fa-f]{1,64}$/;
export const NONCE_REGEX = /^0[xX][a-fA-F0-9]{16}$/;

export const BLOCK_TAGS = ['earliest', 'latest', 'pending'];

export const ADDRESS_ERROR = 'Expected 0x prefixed string representing the address (20 bytes)';
export const BLOCK_NUMBER_ERROR =
  'Expected 0x prefixed hexadecimal block number, or the string "latest", "earliest" or "pending"';
export const BLOCK_PARAMS_ERROR = `Expected 0x prefixed hexadecimal block number, a block hash, the string "latest", "earliest" or "pending", or an object with a blockHash or a blockNumber`;
export const BLOCK_HASH_ERROR = 'Expected 0x prefixed string representing the hash (32 bytes) of a block';
export const TRANSACTION_HASH_ERROR =
  'Expected 0x prefixed string representing the hash (32 bytes) of a transaction';
export const HASH_ERROR = 'Expected 0x prefixed string representing the hash (32 bytes)';
export const TOPIC_HASH_ERROR = 'Expected 0x prefixed string representing the hash (32 bytes) of a topic';
export const SLOT_ERROR = 'Expected 0x prefixed hexadecimal value of at most 32 bytes';
export const EVEN_HEX_ERROR = 'Expected 0x prefixed hexadecimal value with even length';
export const SIGNED_TRANSACTION_ERROR = 'Expected non-empty 0x prefixed hexadecimal signed transaction bytes';
export const INDEX_ERROR = 'Expected 0x prefixed hexadecimal index without leading zeros';
export const NONCE_ERROR = 'Expected 0x prefixed string representing the nonce (8 bytes)';
export const QUANTITY_ERROR = 'Expected 0x prefixed hexadecimal quantity of at most 32 bytes';
