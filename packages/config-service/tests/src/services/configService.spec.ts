// SPDX-License-Identifier: Apache-2.0

import { expect } from 'chai';

import { ConfigService } from '../../../src/services';
import { type ConfigKey, GlobalConfig } from '../../../src/services/globalConfig';

describe('ConfigService tests', function () {
  let envBefore: NodeJS.ProcessEnv;

  beforeEach(() => {
    envBefore = process.env;
    process.env = { ...envBefore };
  });

  afterEach(() => {
    process.env = envBefore;
  });

  it('should return the default value for configurations not set in process.env', () => {
    const targetKeys: ConfigKey[] = ['ESTIMATE_GAS_THROWS', 'BATCH_REQUESTS_MAX_SIZE', 'PROTOCOL_VERSION'];

    targetKeys.forEach((targetKey) => {
      delete process.env[targetKey];
      expect(ConfigService.get(targetKey)).to.deep.equal(GlobalConfig.ENTRIES[targetKey].defaultValue);
    });
  });

  it('should leave CHAIN_ID undefined when it is not configured', () => {
    delete process.env.CHAIN_ID;
    expect(ConfigService.get('CHAIN_ID')).to.be.undefined;
  });

  it('should treat an empty value as not set', () => {
    process.env.SERVER_PORT = '';
    expect(ConfigService.get('SERVER_PORT')).to.equal(7546);
  });

  it('should cast values to the type declared for the key', () => {
    process.env.ESTIMATE_GAS_THROWS = 'FALSE';
    process.env.BATCH_REQUESTS_MAX_SIZE = '25';
    process.env.BATCH_REQUESTS_DISALLOWED_METHODS = '["eth_sendTransaction","eth_getLogs"]';

    expect(ConfigService.get('ESTIMATE_GAS_THROWS')).to.equal(false);
    expect(ConfigService.get('BATCH_REQUESTS_MAX_SIZE')).to.equal(25);
    expect(ConfigService.get('BATCH_REQUESTS_DISALLOWED_METHODS')).to.deep.equal([
      'eth_sendTransaction',
      'eth_getLogs',
    ]);
  });

  it('should always convert CHAIN_ID to a hexadecimal string', () => {
    const cases: [string, string][] = [
      ['298', '0x12a'],
      ['0x12a', '0x12a'],
      ['0x12A', '0x12a'],
      ['1000000', '0xf4240'],
    ];

    cases.forEach(([input, expected]) => {
      process.env.CHAIN_ID = input;
      expect(ConfigService.get('CHAIN_ID')).to.equal(expected);
    });
  });

  it('should reject a CHAIN_ID that is not a number', () => {
    process.env.CHAIN_ID = '0xchain';
    expect(() => ConfigService.get('CHAIN_ID')).to.throw(
      "Configuration error: CHAIN_ID must be a decimal or 0x-prefixed hex number, received '0xchain'",
    );
  });

  it('should reject values that do not match the declared type', () => {
    process.env.BATCH_REQUESTS_ENABLED = 'yes';
    expect(() => ConfigService.get('BATCH_REQUESTS_ENABLED')).to.throw(
      "Configuration error: BATCH_REQUESTS_ENABLED must be true or false, received 'yes'",
    );

    process.env.INPUT_SIZE_LIMIT = 'one';
    expect(() => ConfigService.get('INPUT_SIZE_LIMIT')).to.throw(
      "Configuration error: INPUT_SIZE_LIMIT must be a number, received 'one'",
    );

    process.env.BATCH_REQUESTS_DISALLOWED_METHODS = '["eth_call", 1]';
    expect(() => ConfigService.get('BATCH_REQUESTS_DISALLOWED_METHODS')).to.throw(
      `Configuration error: BATCH_REQUESTS_DISALLOWED_METHODS must be a JSON array of strings, received '["eth_call", 1]'`,
    );
  });

  it('should surface invalid entries through validate()', () => {
    process.env.PROTOCOL_VERSION = 'latest';
    expect(() => ConfigService.validate()).to.throw(/^Configuration error: PROTOCOL_VERSION must be a number/);
  });

  it('should list every entry in getAll()', () => {
    process.env.LOG_LEVEL = 'debug';
    const all = ConfigService.getAll();

    expect(Object.keys(all)).to.have.members(Object.keys(GlobalConfig.ENTRIES));
    expect(all.LOG_LEVEL).to.equal('debug');
  });
});
