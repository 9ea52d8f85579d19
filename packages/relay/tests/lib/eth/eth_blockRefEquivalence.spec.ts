// SPDX-License-Identifier: Apache-2.0

import { expect } from 'chai';

import { Relay } from '../../../src';
import { logger, requestDetailsFor } from '../../helpers';
import { InMemoryChain } from '../../helpers/inMemoryChain';

const ACCOUNT = '0x' + 'aa'.repeat(20);
const OTHER = '0x' + 'bb'.repeat(20);

const word = (hex: string) => '0x' + hex.padStart(64, '0');

describe('@ethBlockRefEquivalence', function () {
  const requestDetails = requestDetailsFor('eth_blockRefEquivalenceTest');
  let chain: InMemoryChain;
  let relay: Relay;

  const rpc = (method: string, params: unknown[] = []) => relay.executeRpcMethod(method, params, requestDetails);

  beforeEach(() => {
    chain = new InMemoryChain({ alloc: { [ACCOUNT]: 100n } });
    relay = new Relay(logger, chain);

    chain.setCode(ACCOUNT, '0x6001');
    chain.setStorage(ACCOUNT, '0x1', word('2a'));
    chain.mine({ transactions: [{ from: ACCOUNT, to: OTHER, value: 1n }, { from: OTHER, to: ACCOUNT }], uncles: 1 });

    // block 2 moves every value on, so a lookup that ignored its block would show it
    chain.setBalance(ACCOUNT, 7n);
    chain.setCode(ACCOUNT, '0x6002');
    chain.setStorage(ACCOUNT, '0x1', word('2b'));
    chain.mine({ transactions: [{ from: ACCOUNT, to: OTHER }], uncles: 2 });
  });

  // state reads take the block as their last parameter, in any of the four forms
  const stateReads: { method: string; params: unknown[] }[] = [
    { method: 'eth_getBalance', params: [ACCOUNT] },
    { method: 'eth_getCode', params: [ACCOUNT] },
    { method: 'eth_getStorageAt', params: [ACCOUNT, '0x1'] },
    { method: 'eth_getTransactionCount', params: [ACCOUNT] },
    { method: 'eth_call', params: [{ to: ACCOUNT }] },
  ];

  stateReads.forEach(({ method, params }) => {
    it(`${method} should read the same state by height and by hash`, async () => {
      const { hash } = chain.block(1);

      const byHeight = await rpc(method, [...params, '0x1']);
      expect(byHeight).to.be.a('string');
      expect(byHeight).to.not.deep.equal(await rpc(method, [...params, 'latest']));

      expect(await rpc(method, [...params, hash])).to.deep.equal(byHeight);
      expect(await rpc(method, [...params, { blockHash: hash }])).to.deep.equal(byHeight);
      expect(await rpc(method, [...params, { blockNumber: '0x1' }])).to.deep.equal(byHeight);
    });
  });

  // block reads come in pairs, one keyed by height and one by hash
  const blockReads: { byNumber: string; byHash: string; extra: unknown[] }[] = [
    { byNumber: 'eth_getBlockByNumber', byHash: 'eth_getBlockByHash', extra: [true] },
    { byNumber: 'eth_getBlockTransactionCountByNumber', byHash: 'eth_getBlockTransactionCountByHash', extra: [] },
    { byNumber: 'eth_getUncleCountByBlockNumber', byHash: 'eth_getUncleCountByBlockHash', extra: [] },
    {
      byNumber: 'eth_getTransactionByBlockNumberAndIndex',
      byHash: 'eth_getTransactionByBlockHashAndIndex',
      extra: ['0x1'],
    },
    { byNumber: 'eth_getUncleByBlockNumberAndIndex', byHash: 'eth_getUncleByBlockHashAndIndex', extra: ['0x0'] },
  ];

  blockReads.forEach(({ byNumber, byHash, extra }) => {
    it(`${byNumber} and ${byHash} should return the same result`, async () => {
      const fromHeight = await rpc(byNumber, ['0x1', ...extra]);
      expect(fromHeight).to.not.be.null;
      expect(fromHeight).to.not.deep.equal(await rpc(byNumber, ['latest', ...extra]));

      expect(await rpc(byHash, [chain.block(1).hash, ...extra])).to.deep.equal(fromHeight);
    });
  });
});
