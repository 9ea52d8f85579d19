// SPDX-License-Identifier: Apache-2.0

import chai, { expect } from 'chai';
import chaiAsPromised from 'chai-as-promised';
import sinon from 'sinon';

import { BlockTag, JsonRpcError, ResolutionError } from '../../../../../src';
import { CommonService } from '../../../../../src/lib/services';
import { logger, requestDetailsFor } from '../../../../helpers';
import { InMemoryChain } from '../../../../helpers/inMemoryChain';

chai.use(chaiAsPromised);

describe('CommonService', function () {
  const requestDetails = requestDetailsFor('commonServiceTest');
  let chain: InMemoryChain;
  let commonService: CommonService;

  beforeEach(() => {
    chain = new InMemoryChain();
    commonService = new CommonService(chain, logger);
    chain.mineEmpty(3);
  });

  afterEach(() => {
    sinon.restore();
  });

  describe('resolveBlock', () => {
    it('should bind a number to the canonical block', async () => {
      const resolved = await commonService.resolveBlock({ kind: 'number', number: 2n }, requestDetails);

      expect(resolved).to.deep.equal({ block: chain.block(2), pending: false });
    });

    it('should return null for a number above the head', async () => {
      expect(await commonService.resolveBlock({ kind: 'number', number: 4n }, requestDetails)).to.be.null;
    });

    it('should return null for the hash of a block that left the canonical chain', async () => {
      const orphan = chain.block(3);
      chain.rewindTo(2);
      chain.mine();

      expect(await commonService.resolveBlock({ kind: 'hash', hash: orphan.hash }, requestDetails)).to.be.null;
      const replacement = await commonService.resolveBlock({ kind: 'number', number: 3n }, requestDetails);
      expect(replacement?.block.hash).to.not.equal(orphan.hash);
    });

    it('should read the head once per resolution scope', async () => {
      const latestBlock = sinon.spy(chain.history, 'latestBlock');
      const scope = commonService.createResolutionScope();
      const latest = { kind: 'tag', tag: BlockTag.LATEST } as const;

      const first = await commonService.resolveBlock(latest, requestDetails, scope);
      chain.mine();
      const second = await commonService.resolveBlock(latest, requestDetails, scope);

      expect(latestBlock.calledOnce).to.be.true;
      expect(first?.block.number).to.equal(3n);
      expect(second?.block.hash).to.equal(first?.block.hash);
    });

    it('should fall back to the head when the node keeps no pending block', async () => {
      const resolved = await commonService.resolveBlock({ kind: 'tag', tag: BlockTag.PENDING }, requestDetails);

      expect(resolved).to.deep.equal({ block: chain.block(3), pending: false });
    });

    it('should fail earliest once the genesis block has been pruned', async () => {
      chain.pruneHistoryBelow(2);

      await expect(
        commonService.resolveBlock({ kind: 'tag', tag: BlockTag.EARLIEST }, requestDetails),
      ).to.be.rejectedWith(ResolutionError, 'earliest block is pruned or unavailable');
    });

    it('should stop when the request has been aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        commonService.resolveBlock({ kind: 'number', number: 1n }, requestDetailsFor('aborted', controller.signal)),
      ).to.be.rejectedWith(JsonRpcError, 'Request aborted by client');
    });
  });

  describe('stateAt', () => {
    it('should fail for a block whose state has been pruned', async () => {
      chain.pruneStateAt(1);

      await expect(
        commonService.stateAt({ block: chain.block(1), pending: false }, requestDetails),
      ).to.be.rejectedWith(ResolutionError, 'state at block 0x1 is pruned or unavailable');
    });
  });

  describe('genericErrorHandler', () => {
    it('should wrap an unknown failure into an internal error', () => {
      expect(() => commonService.genericErrorHandler(new Error('disk full'))).to.throw(JsonRpcError, 'disk full');
    });

    it('should rethrow a resolution failure unchanged', () => {
      const error = ResolutionError.reorged('block 0x2');

      expect(() => commonService.genericErrorHandler(error)).to.throw(error);
    });
  });
});
