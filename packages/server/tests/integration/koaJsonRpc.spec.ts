// SPDX-License-Identifier: Apache-2.0

import { Relay, RequestDetails } from '@eth-facade/relay';
import { expect } from 'chai';
import parse from 'co-body';
import Koa from 'koa';
import { IncomingMessage, ServerResponse } from 'node:http';
import { Socket } from 'node:net';
import { Registry } from 'prom-client';
import sinon from 'sinon';

import { logger, withOverriddenEnvsInMochaTest } from '../../../relay/tests/helpers';
import { InMemoryChain } from '../../../relay/tests/helpers/inMemoryChain';
import KoaJsonRpc from '../../src/koaJsonRpc';
import { createServer } from '../../src/server';

describe('KoaJsonRpc', () => {
  const requestDetails = new RequestDetails({ requestId: 'server-test', ipAddress: '0.0.0.0' });
  let chain: InMemoryChain;
  let relay: Relay;
  let register: Registry;
  let koaJsonRpc: KoaJsonRpc;

  beforeEach(() => {
    chain = new InMemoryChain();
    relay = new Relay(logger, chain);
    register = new Registry();
    koaJsonRpc = new KoaJsonRpc(logger, register, relay, { limit: '1mb' });
  });

  afterEach(() => {
    sinon.restore();
  });

  describe('validateJsonRpcRequest', () => {
    it('should accept a request without params', () => {
      const request = koaJsonRpc.validateJsonRpcRequest(
        { jsonrpc: '2.0', id: 1, method: 'eth_chainId' },
        requestDetails,
      );

      expect(request).to.deep.equal({ id: 1, jsonrpc: '2.0', method: 'eth_chainId' });
    });

    it('should keep the params and a null id', () => {
      const request = koaJsonRpc.validateJsonRpcRequest(
        { jsonrpc: '2.0', id: null, method: 'eth_getBalance', params: ['0x01'] },
        requestDetails,
      );

      expect(request).to.deep.equal({ id: null, jsonrpc: '2.0', method: 'eth_getBalance', params: ['0x01'] });
    });

    const invalidBodies: { description: string; body: unknown }[] = [
      { description: 'a wrong version', body: { jsonrpc: '1.0', id: 1, method: 'eth_chainId' } },
      { description: 'a missing method', body: { jsonrpc: '2.0', id: 1 } },
      { description: 'a non-string method', body: { jsonrpc: '2.0', id: 1, method: 42 } },
      { description: 'params given as an object', body: { jsonrpc: '2.0', id: 1, method: 'eth_chainId', params: {} } },
      { description: 'an object id', body: { jsonrpc: '2.0', id: {}, method: 'eth_chainId' } },
      { description: 'a missing id', body: { jsonrpc: '2.0', method: 'eth_chainId' } },
      { description: 'a body that is not an object', body: 'eth_chainId' },
    ];

    invalidBodies.forEach(({ description, body }) => {
      it(`should reject a request with ${description}`, () => {
        expect(koaJsonRpc.validateJsonRpcRequest(body, requestDetails)).to.be.null;
      });
    });

    withOverriddenEnvsInMochaTest({ REQUEST_ID_IS_OPTIONAL: 'true' }, () => {
      it('should default a missing id to 0', () => {
        const optionalIds = new KoaJsonRpc(logger, register, relay, { limit: '1mb' });

        expect(
          optionalIds.validateJsonRpcRequest({ jsonrpc: '2.0', method: 'eth_chainId' }, requestDetails),
        ).to.deep.equal({ id: '0', jsonrpc: '2.0', method: 'eth_chainId' });
      });
    });
  });

  describe('getRequestResult', () => {
    it('should answer with the result of the method', async () => {
      chain.mineEmpty(2);

      expect(
        await koaJsonRpc.getRequestResult({ jsonrpc: '2.0', id: 1, method: 'eth_blockNumber' }, requestDetails),
      ).to.deep.equal({ jsonrpc: '2.0', id: 1, result: '0x2' });
    });

    it('should write a null result', async () => {
      expect(
        await koaJsonRpc.getRequestResult(
          { jsonrpc: '2.0', id: 'a', method: 'eth_getBlockByNumber', params: ['0x5', false] },
          requestDetails,
        ),
      ).to.deep.equal({ jsonrpc: '2.0', id: 'a', result: null });
    });

    it('should answer an invalid request with its id', async () => {
      expect(await koaJsonRpc.getRequestResult({ jsonrpc: '1.0', id: 7, method: 'x' }, requestDetails)).to.deep.equal({
        jsonrpc: '2.0',
        id: 7,
        error: { code: -32600, message: 'Invalid Request' },
      });
    });

    it('should pass the error of the method through', async () => {
      expect(
        await koaJsonRpc.getRequestResult({ jsonrpc: '2.0', id: 2, method: 'net_version' }, requestDetails),
      ).to.deep.equal({
        jsonrpc: '2.0',
        id: 2,
        error: { code: -32601, message: '[Request ID: server-test] Method net_version not found' },
      });
    });

    it('should carry the data of an error', async () => {
      chain.callHandler = async () => ({ kind: 'revert', output: '0x', gasUsed: 0n });

      const response = await koaJsonRpc.getRequestResult(
        { jsonrpc: '2.0', id: 3, method: 'eth_estimateGas', params: [{ to: '0x' + '22'.repeat(20) }] },
        requestDetails,
      );

      expect(response.error).to.deep.equal({
        code: 3,
        message: '[Request ID: server-test] execution reverted',
        data: '0x',
      });
    });

    it('should turn a failing relay into an internal error', async () => {
      sinon.stub(relay, 'executeRpcMethod').rejects(new Error('boom'));

      expect(
        await koaJsonRpc.getRequestResult({ jsonrpc: '2.0', id: 4, method: 'eth_chainId' }, requestDetails),
      ).to.deep.equal({ jsonrpc: '2.0', id: 4, error: { code: -32603, message: 'Error invoking RPC: boom' } });
    });
  });

  describe('getBatchResult', () => {
    it('should answer every request in order', async () => {
      const result = await koaJsonRpc.getBatchResult(
        [
          { jsonrpc: '2.0', id: 2, method: 'eth_protocolVersion' },
          { jsonrpc: '2.0', id: 1, method: 'eth_blockNumber' },
          5,
        ],
        requestDetails,
      );

      expect(result).to.deep.equal({
        status: 200,
        body: [
          { jsonrpc: '2.0', id: 2, result: '0x41' },
          { jsonrpc: '2.0', id: 1, result: '0x0' },
          { jsonrpc: '2.0', id: null, error: { code: -32600, message: 'Invalid Request' } },
        ],
      });
    });

    it('should record the latency of each request', async () => {
      await koaJsonRpc.getBatchResult([{ jsonrpc: '2.0', id: 1, method: 'eth_blockNumber' }], requestDetails);

      const metrics = await register.getSingleMetricAsString('rpc_relay_method_result');

      expect(metrics.split('\n')).to.include(
        'rpc_relay_method_result_count{method="eth_blockNumber",statusCode="200",isPartOfBatch="true"} 1',
      );
    });

    withOverriddenEnvsInMochaTest({ BATCH_REQUESTS_ENABLED: 'false' }, () => {
      it('should refuse batches', async () => {
        expect(
          await koaJsonRpc.getBatchResult([{ jsonrpc: '2.0', id: 1, method: 'eth_chainId' }], requestDetails),
        ).to.deep.equal({
          status: 400,
          body: { jsonrpc: '2.0', id: null, error: { code: -32202, message: 'Batch requests are disabled' } },
        });
      });
    });

    withOverriddenEnvsInMochaTest({ BATCH_REQUESTS_MAX_SIZE: '2' }, () => {
      it('should refuse a batch above the maximum size', async () => {
        const limited = new KoaJsonRpc(logger, register, relay, { limit: '1mb' });
        const request = { jsonrpc: '2.0', id: 1, method: 'eth_chainId' };

        expect(await limited.getBatchResult([request, request, request], requestDetails)).to.deep.equal({
          status: 400,
          body: { jsonrpc: '2.0', id: null, error: { code: -32203, message: 'Batch request amount 3 exceeds max 2' } },
        });
      });
    });

    withOverriddenEnvsInMochaTest({ BATCH_REQUESTS_DISALLOWED_METHODS: '["eth_sendRawTransaction"]' }, () => {
      it('should refuse disallowed methods and run the rest', async () => {
        const result = await koaJsonRpc.getBatchResult(
          [
            { jsonrpc: '2.0', id: 1, method: 'eth_sendRawTransaction', params: ['0x01'] },
            { jsonrpc: '2.0', id: 2, method: 'eth_blockNumber' },
          ],
          requestDetails,
        );

        expect(result.body).to.deep.equal([
          {
            jsonrpc: '2.0',
            id: 1,
            error: {
              code: -32007,
              message: 'Method eth_sendRawTransaction is not permitted as part of batch requests',
            },
          },
          { jsonrpc: '2.0', id: 2, result: '0x0' },
        ]);
        expect(chain.pool.admitted).to.be.empty;
      });
    });
  });

  describe('rpcApp', () => {
    const postContext = (): Koa.Context => {
      const req = new IncomingMessage(new Socket());
      req.method = 'POST';
      return new Koa().createContext(req, new ServerResponse(req));
    };

    it('should answer an unparseable body with a parse error and HTTP 400', async () => {
      sinon.stub(parse, 'json').rejects(new SyntaxError('Unexpected token n in JSON at position 1'));
      const ctx = postContext();

      await koaJsonRpc.rpcApp()(ctx, async () => {});

      expect(ctx.status).to.equal(400);
      expect(ctx.body).to.deep.equal({ jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Parse error' } });
      expect(ctx.state.status).to.equal('400 (Parse error)');
    });
  });

  describe('createServer', () => {
    it('should wire the relay and the metrics into one application', async () => {
      const server = createServer(chain, { logger, register });

      expect(server.relay.eth()).to.not.be.undefined;
      expect(server.app).to.equal(server.koaJsonRpc.getKoaApp());
      expect(register.getSingleMetric('rpc_relay_method_response')).to.not.be.undefined;
      expect(register.getSingleMetric('rpc_relay_method_result')).to.not.be.undefined;
    });
  });
});
