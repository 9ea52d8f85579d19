// SPDX-License-Identifier: Apache-2.0

import { AbiCoder } from 'ethers';

import constants from './lib/constants';

/**
 * Encodes an unsigned integer as a minimal 0x-prefixed hex quantity.
 */
const numberTo0x = (input: bigint | number): string => {
  return '0x' + input.toString(16);
};

const strip0x = (input: string): string => {
  return input.startsWith('0x') ? input.substring(2) : input;
};

/**
 * Left-pads a hex value to a 32-byte word.
 */
const toHash32 = (value: string): string => {
  return '0x' + strip0x(value).toLowerCase().padStart(64, '0');
};

/**
 * Turns revert data (`0x` + 4-byte selector + ABI encoded string) into its string.
 * Plain text is returned unchanged; data that is not an encoded string yields ''.
 */
const decodeErrorMessage = (message?: string): string => {
  if (!message) return '';

  if (!message.startsWith('0x')) {
    return message;
  }

  const payload = message.substring(constants.FUNCTION_SELECTOR_CHAR_LENGTH);
  if (!payload.length) {
    return '';
  }

  try {
    const [decoded] = AbiCoder.defaultAbiCoder().decode(['string'], '0x' + payload);
    return String(decoded);
  } catch {
    // custom errors with non-string arguments carry no readable reason
    return '';
  }
};

export { decodeErrorMessage, numberTo0x, strip0x, toHash32 };
