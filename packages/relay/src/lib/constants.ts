// SPDX-License-Identifier: Apache-2.0

export default {
  REQUEST_ID_STRING: `Request ID: `,

  EMPTY_HEX: '0x',
  ZERO_HEX_32_BYTE: '0x0000000000000000000000000000000000000000000000000000000000000000',

  // intrinsic gas of a plain value transfer, the floor of any estimate
  TX_BASE_COST: 21_000n,
  TX_ACCESS_LIST_ADDRESS_COST: 2_400n,
  TX_ACCESS_LIST_STORAGE_KEY_COST: 1_900n,

  TX_TYPE_ACCESS_LIST: 1,
  TX_TYPE_DYNAMIC_FEE: 2,

  FUNCTION_SELECTOR_CHAR_LENGTH: 10,
};
