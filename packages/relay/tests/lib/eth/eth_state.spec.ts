// SPDX-License-Identifier: Apache-2.0

import { expect } from 'chai';
import sinon from 'sinon';

import { Relay } from '../../../src';
import { logger, requestDetailsFor } from '../../helpers';
import { InMemoryChain } from '../../helpers/inMemoryChain';

const ACCOUNT = '0x' + 'a1'.repeat(20);
const UNSEEN = '0x' + 'b2'.repeat(20);

describe('@ethState', function () {
  const requestDetails = requestDetailsFor('eth_stateTest');
  let chain: InMemoryChain;
  let relay: Relay;

  const rpc = (method: string, params: unknown[] = []) => relay.executeRpcMethod(method, params, requestDetails);

  beforeEach(() => {
    chain = new InMemoryChain({ alloc: { [ACCOUNT]: 10n } });
    relay = new Relay(logger, chain);
  });

  afterEach(() => {
    sinon.restore();
  });

  describe('eth_getBalance', () => {
    it('should read the balance at latest when no block is given', async () => {
      expect(await rpc('eth_getBalance', [ACCOUNT])).to.equal('0xa');
    });

    it('should read the balance of a historical block', async () => {
      chain.setBalance(ACCOUNT, 20n);
      chain.mine();

      expect(await rpc('eth_getBalance', [ACCOUNT, '0x0'])).to.equal('0xa');
      expect(await rpc('eth_getBalance', [ACCOUNT, '0x1'])).to.equal('0x14');
      expect(await rpc('eth_getBalance', [ACCOUNT, 'earliest'])).to.equal('0xa');
    });

    it('should accept a block hash and a block object', async () => {
      chain.setBalance(ACCOUNT, 20n);
      const block = chain.mine();

      expect(await rpc('eth_getBalance', [ACCOUNT, block.hash])).to.equal('0x14');
      expect(await rpc('eth_getBalance', [ACCOUNT, { blockHash: chain.block(0).hash }])).to.equal('0xa');
      expect(await rpc('eth_getBalance', [ACCOUNT, { blockNumber: '0x1' }])).to.equal('0x14');
    });

    it('should match the address regardless of case', async () => {
      expect(await rpc('eth_getBalance', [ACCOUNT.toUpperCase().replace('0X', '0x'), 'latest'])).to.equal('0xa');
    });

    it('should report zero for an unseen account', async () => {
      expect(await rpc('eth_getBalance', [UNSEEN, 'latest'])).to.equal('0x0');
    });

    it('should read the pending state when the node keeps one', async () => {
      chain = new InMemoryChain({ alloc: { [ACCOUNT]: 10n }, pending: true });
      relay = new Relay(logger, chain);
      chain.setBalance(ACCOUNT, 30n);

      expect(await rpc('eth_getBalance', [ACCOUNT, 'pending'])).to.equal('0x1e');
      expect(await rpc('eth_getBalance', [ACCOUNT, 'latest'])).to.equal('0xa');
    });

    it('should fail for a block above the head', async () => {
      expect(await rpc('eth_getBalance', [ACCOUNT, '0x5'])).to.include({
        code: -32001,
        message: '[Request ID: eth_stateTest] Requested resource not found. eth_getBalance',
      });
    });

    it('should fail for a block that left the canonical chain', async () => {
      const orphan = chain.mine();
      chain.rewindTo(0);
      chain.mine();

      expect(await rpc('eth_getBalance', [ACCOUNT, orphan.hash])).to.include({ code: -32001 });
    });

    it('should fail when the state of the block has been pruned', async () => {
      chain.mineEmpty(2);
      chain.pruneStateAt(1);

      expect(await rpc('eth_getBalance', [ACCOUNT, '0x1'])).to.include({
        code: -32002,
        message: '[Request ID: eth_stateTest] Block resolution failed: state at block 0x1 is pruned or unavailable',
        data: 'PrunedOrUnavailable',
      });
      expect(await rpc('eth_getBalance', [ACCOUNT, '0x2'])).to.equal('0xa');
    });

    it('should read the state of the block resolved before the head moved', async () => {
      chain.mine();
      const stateAt = chain.state.stateAt.bind(chain.state);
      sinon.stub(chain.state, 'stateAt').callsFake(async (target) => {
        chain.setBalance(ACCOUNT, 99n);
        chain.mine();
        return stateAt(target);
      });

      expect(await rpc('eth_getBalance', [ACCOUNT, 'latest'])).to.equal('0xa');
      expect(chain.head().number).to.equal(2n);
    });

    it('should reject a malformed address', async () => {
      expect(await rpc('eth_getBalance', ['0x123', 'latest'])).to.include({
        code: -32602,
        message:
          '[Request ID: eth_stateTest] Invalid parameter 0: ' +
          'Expected 0x prefixed string representing the address (20 bytes), value: 0x123',
      });
    });
  });

  describe('eth_getTransactionCount', () => {
    it('should read the nonce', async () => {
      chain.setNonce(ACCOUNT, 3n);
      chain.mine();

      expect(await rpc('eth_getTransactionCount', [ACCOUNT, 'latest'])).to.equal('0x3');
      expect(await rpc('eth_getTransactionCount', [ACCOUNT, '0x0'])).to.equal('0x0');
    });

    it('should count mined transactions', async () => {
      chain.mine({ transactions: [{ from: ACCOUNT, to: UNSEEN }, { from: ACCOUNT, to: UNSEEN }] });

      expect(await rpc('eth_getTransactionCount', [ACCOUNT])).to.equal('0x2');
    });
  });

  describe('eth_getCode', () => {
    it('should read deployed code', async () => {
      chain.setCode(ACCOUNT, '0x6080604052');
      chain.mine();

      expect(await rpc('eth_getCode', [ACCOUNT, 'latest'])).to.equal('0x6080604052');
    });

    it('should return empty code for an account without any', async () => {
      expect(await rpc('eth_getCode', [UNSEEN, 'latest'])).to.equal('0x');
    });
  });

  describe('eth_getStorageAt', () => {
    const word = '0x' + '00'.repeat(31) + '2a';

    beforeEach(() => {
      chain.setStorage(ACCOUNT, '0x1', '0x2a');
      chain.mine();
    });

    it('should pad a short slot before the lookup', async () => {
      expect(await rpc('eth_getStorageAt', [ACCOUNT, '0x1', 'latest'])).to.equal(word);
      expect(await rpc('eth_getStorageAt', [ACCOUNT, '0x' + '00'.repeat(31) + '01', 'latest'])).to.equal(word);
    });

    it('should read an unwritten slot as zero', async () => {
      expect(await rpc('eth_getStorageAt', [ACCOUNT, '0x2', 'latest'])).to.equal('0x' + '00'.repeat(32));
      expect(await rpc('eth_getStorageAt', [ACCOUNT, '0x1', '0x0'])).to.equal('0x' + '00'.repeat(32));
    });

    it('should reject a slot longer than 32 bytes', async () => {
      expect(await rpc('eth_getStorageAt', [ACCOUNT, '0x' + '00'.repeat(33), 'latest'])).to.include({
        code: -32602,
      });
    });

    it('should require the slot', async () => {
      expect(await rpc('eth_getStorageAt', [ACCOUNT])).to.include({
        code: -32602,
        message: '[Request ID: eth_stateTest] Missing value for required parameter 1',
      });
    });
  });
});
