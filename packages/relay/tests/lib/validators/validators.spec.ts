// SPDX-License-Identifier: Apache-2.0
import { expect } from 'chai';

import { ParamType } from '../../../src/lib/types';
import { Validator } from '../../../src/lib/validators';
import * as Constants from '../../../src/lib/validators/constants';

describe('Validator', () => {
  const address = '0x4422E9088662c44604189B2aA3ae8eE282fceBB7';
  const hash = '0x' + 'ab'.repeat(32);

  function expectInvalidParam(index: number | string, message: string, paramValue?: string) {
    return `Invalid parameter ${index}: ${message}${paramValue ? `, value: ${paramValue}` : ''}`;
  }

  function expectInvalidObject(index: number | string, message: string, object: string, paramValue: string) {
    return `Invalid parameter '${index}' for ${object}: ${message}, value: ${paramValue}`;
  }

  function expectUnknownParam(index: number | string, object: string) {
    return `Invalid parameter '${index}' for ${object}: Unknown parameter`;
  }

  const rules = (type: ParamType, required = true) => ({ 0: { type, required } });

  describe('params list', () => {
    it('rejects more params than there are rules', () => {
      expect(() => Validator.validateParams([address, 'latest'], rules(ParamType.ADDRESS))).to.throw('Invalid params');
    });

    it('rejects a missing required param', () => {
      expect(() => Validator.validateParams([], rules(ParamType.ADDRESS))).to.throw(
        'Missing value for required parameter 0',
      );
    });

    it('accepts a missing optional param', () => {
      expect(() => Validator.validateParams([], rules(ParamType.BLOCK_PARAMS, false))).to.not.throw();
    });

    it('rejects null even for optional params', () => {
      expect(() => Validator.validateParams([null], rules(ParamType.BLOCK_PARAMS, false))).to.throw(
        expectInvalidParam(0, 'The value passed is not valid: null.'),
      );
    });
  });

  describe('validates Address type correctly', () => {
    const validation = rules(ParamType.ADDRESS);

    it('accepts a 20 byte address in any case', () => {
      expect(() => Validator.validateParams([address], validation)).to.not.throw();
      expect(() => Validator.validateParams([address.toLowerCase()], validation)).to.not.throw();
    });

    it('throws an error if address is smaller than 20 bytes', () => {
      expect(() => Validator.validateParams(['0x4422E9088662'], validation)).to.throw(
        expectInvalidParam(0, Constants.ADDRESS_ERROR, '0x4422E9088662'),
      );
    });

    it('throws an error if address is NOT 0x prefixed', () => {
      expect(() => Validator.validateParams([address.substring(2)], validation)).to.throw(
        expectInvalidParam(0, Constants.ADDRESS_ERROR, address.substring(2)),
      );
    });

    it('throws an error if address is other type', () => {
      expect(() => Validator.validateParams([123], validation)).to.throw(
        expectInvalidParam(0, Constants.ADDRESS_ERROR, '123'),
      );
      expect(() => Validator.validateParams([{}], validation)).to.throw(
        expectInvalidParam(0, Constants.ADDRESS_ERROR, '{}'),
      );
    });
  });

  describe('validates BlockNumber type correctly', () => {
    const validation = rules(ParamType.BLOCK_NUMBER);

    for (const value of ['0x0', '0x1a', '0xFFFFFFFFFFFFFFFF', 'earliest', 'latest', 'pending']) {
      it(`accepts ${value}`, () => {
        expect(() => Validator.validateParams([value], validation)).to.not.throw();
      });
    }

    it('throws an error for a number with leading zeros', () => {
      expect(() => Validator.validateParams(['0x01'], validation)).to.throw(
        expectInvalidParam(0, Constants.BLOCK_NUMBER_ERROR, '0x01'),
      );
    });

    it('throws an error for a number wider than 64 bits', () => {
      expect(() => Validator.validateParams(['0x10000000000000000'], validation)).to.throw(
        expectInvalidParam(0, Constants.BLOCK_NUMBER_ERROR, '0x10000000000000000'),
      );
    });

    it('throws an error for unknown tags', () => {
      expect(() => Validator.validateParams(['finalized'], validation)).to.throw(
        expectInvalidParam(0, Constants.BLOCK_NUMBER_ERROR, 'finalized'),
      );
    });
  });

  describe('validates BlockParams type correctly', () => {
    const validation = rules(ParamType.BLOCK_PARAMS);

    it('accepts numbers, tags and block hashes', () => {
      expect(() => Validator.validateParams(['0x5'], validation)).to.not.throw();
      expect(() => Validator.validateParams(['latest'], validation)).to.not.throw();
      expect(() => Validator.validateParams([hash], validation)).to.not.throw();
    });

    it('accepts block hash and block number objects', () => {
      expect(() => Validator.validateParams([{ blockHash: hash }], validation)).to.not.throw();
      expect(() => Validator.validateParams([{ blockNumber: '0x5' }], validation)).to.not.throw();
    });

    it('throws an error for unknown object fields', () => {
      expect(() => Validator.validateParams([{ blockNumber: '0x5', extra: true }], validation)).to.throw(
        expectUnknownParam('extra', 'BlockNumberObject'),
      );
    });

    it('throws an error for an empty object', () => {
      expect(() => Validator.validateParams([{}], validation)).to.throw(
        "Missing value for required parameter 'blockNumber' for BlockNumberObject",
      );
    });

    it('throws an error for a malformed block hash object', () => {
      expect(() => Validator.validateParams([{ blockHash: '0x1234' }], validation)).to.throw(
        expectInvalidObject('blockHash', Constants.BLOCK_HASH_ERROR, 'BlockHashObject', '0x1234'),
      );
    });
  });

  describe('validates Hex64 type correctly', () => {
    const validation = rules(ParamType.HEX64);

    it('accepts short and full width slots', () => {
      expect(() => Validator.validateParams(['0x0'], validation)).to.not.throw();
      expect(() => Validator.validateParams(['0x' + 'f'.repeat(64)], validation)).to.not.throw();
    });

    it('throws an error for a slot wider than 32 bytes', () => {
      const slot = '0x' + '1'.repeat(65);
      expect(() => Validator.validateParams([slot], validation)).to.throw(
        expectInvalidParam(0, Constants.SLOT_ERROR, slot),
      );
    });
  });

  describe('validates Index type correctly', () => {
    const validation = rules(ParamType.INDEX);

    it('accepts a minimal hex index', () => {
      expect(() => Validator.validateParams(['0x0'], validation)).to.not.throw();
      expect(() => Validator.validateParams(['0x2a'], validation)).to.not.throw();
    });

    it('throws an error for leading zeros', () => {
      expect(() => Validator.validateParams(['0x00'], validation)).to.throw(
        expectInvalidParam(0, Constants.INDEX_ERROR, '0x00'),
      );
    });
  });

  describe('validates Boolean type correctly', () => {
    it('throws an error for anything but a boolean', () => {
      expect(() => Validator.validateParams([true], rules(ParamType.BOOLEAN))).to.not.throw();
      expect(() => Validator.validateParams(['true'], rules(ParamType.BOOLEAN))).to.throw(
        expectInvalidParam(0, 'Expected boolean type', 'true'),
      );
    });
  });

  describe('validates SignedTransaction type correctly', () => {
    const validation = rules(ParamType.SIGNED_TRANSACTION);

    it('accepts even length hex bytes', () => {
      expect(() => Validator.validateParams(['0x02f8'], validation)).to.not.throw();
    });

    it('throws an error for empty bytes', () => {
      expect(() => Validator.validateParams(['0x'], validation)).to.throw(
        expectInvalidParam(0, Constants.SIGNED_TRANSACTION_ERROR, '0x'),
      );
    });

    it('throws an error for odd length hex', () => {
      expect(() => Validator.validateParams(['0x02f'], validation)).to.throw(
        expectInvalidParam(0, Constants.SIGNED_TRANSACTION_ERROR, '0x02f'),
      );
    });
  });

  describe('validates Filter Object type correctly', () => {
    const validation = rules(ParamType.FILTER);

    it('accepts a range filter with addresses and nested topics', () => {
      const filter = {
        fromBlock: 'earliest',
        toBlock: '0x10',
        address: [address, address.toLowerCase()],
        topics: [hash, null, [hash, null], []],
      };
      expect(() => Validator.validateParams([filter], validation)).to.not.throw();
    });

    it('accepts an empty filter', () => {
      expect(() => Validator.validateParams([{}], validation)).to.not.throw();
    });

    it('throws an error when blockHash is combined with fromBlock', () => {
      expect(() => Validator.validateParams([{ blockHash: hash, fromBlock: '0x1' }], validation)).to.throw(
        "Invalid parameter 0: Can't use both blockHash and toBlock/fromBlock",
      );
    });

    it('throws an error for unknown fields', () => {
      expect(() => Validator.validateParams([{ fromBlock: '0x1', limit: 10 }], validation)).to.throw(
        expectUnknownParam('limit', 'FilterObject'),
      );
    });

    it('throws an error for a malformed topic', () => {
      expect(() => Validator.validateParams([{ topics: ['0x12'] }], validation)).to.throw(
        expectInvalidObject(
          'topics',
          `Expected an array or array of arrays containing ${Constants.HASH_ERROR} of a topic`,
          'FilterObject',
          '["0x12"]',
        ),
      );
    });

    it('throws an error for a malformed address', () => {
      expect(() => Validator.validateParams([{ address: '0x12' }], validation)).to.throw(
        expectInvalidObject('address', `${Constants.ADDRESS_ERROR} or an array of addresses`, 'FilterObject', '0x12'),
      );
    });

    it('throws an error when the filter is not an object', () => {
      expect(() => Validator.validateParams(['latest'], validation)).to.throw(
        expectInvalidParam(0, 'Expected FilterObject', 'latest'),
      );
    });
  });

  describe('validates Transaction Object type correctly', () => {
    const validation = rules(ParamType.TRANSACTION);

    it('accepts a contract creation with a null recipient', () => {
      expect(() => Validator.validateParams([{ from: address, to: null, input: '0x6080' }], validation)).to.not.throw();
    });

    it('deletes unknown properties', () => {
      const transaction: Record<string, unknown> = { to: address, value: '0x1', customField: 'dropped' };

      Validator.validateParams([transaction], validation);

      expect(transaction).to.deep.equal({ to: address, value: '0x1' });
    });

    it('throws an error for a malformed recipient', () => {
      expect(() => Validator.validateParams([{ to: '0x1' }], validation)).to.throw(
        expectInvalidObject('to', Constants.ADDRESS_ERROR, 'TransactionObject', '0x1'),
      );
    });

    it('throws an error for odd length call data', () => {
      expect(() => Validator.validateParams([{ to: address, data: '0x123' }], validation)).to.throw(
        expectInvalidObject('data', Constants.EVEN_HEX_ERROR, 'TransactionObject', '0x123'),
      );
    });

    it('throws an error for a gas value that is not a quantity', () => {
      expect(() => Validator.validateParams([{ to: address, gas: 21000 }], validation)).to.throw(
        expectInvalidObject('gas', Constants.QUANTITY_ERROR, 'TransactionObject', '21000'),
      );
    });
  });

  describe('validates Transaction Request Object type correctly', () => {
    it('throws an error when the sender is missing', () => {
      expect(() => Validator.validateParams([{ to: address }], rules(ParamType.TRANSACTION_REQUEST))).to.throw(
        "Missing value for required parameter 'from' for TransactionRequestObject",
      );
    });
  });
});
