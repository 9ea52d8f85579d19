// SPDX-License-Identifier: Apache-2.0

import { JsonRpcError, predefined, type Relay, RequestDetails } from '@eth-facade/relay';
import parse from 'co-body';
import Koa from 'koa';
import type { Logger } from 'pino';
import { Histogram, type Registry } from 'prom-client';

import { translateRpcErrorToHttpStatus } from './lib/httpErrorMapper';
import type { IJsonRpcRequest } from './lib/IJsonRpcRequest';
import type { IJsonRpcResponse } from './lib/IJsonRpcResponse';
import { InternalError, InvalidRequest, ParseError } from './lib/RpcError';
import jsonResp from './lib/RpcResponse';
import {
  getBatchRequestsDisallowedMethods,
  getBatchRequestsEnabled,
  getBatchRequestsMaxSize,
  getRequestIdIsOptional,
  hasOwnProperty,
  isObject,
} from './lib/utils';

const INVALID_REQUEST = 'INVALID REQUEST';
const REQUEST_ID_HEADER_NAME = 'X-Request-Id';
const responseSuccessStatusCode = '200';
const METRIC_HISTOGRAM_NAME = 'rpc_relay_method_result';
const BATCH_REQUEST_METHOD_NAME = 'batch_request';

/**
 * Outcome of a batch body: the HTTP status and the payload to write.
 */
export interface IBatchResult {
  status: number;
  body: IJsonRpcResponse | IJsonRpcResponse[];
}

export default class KoaJsonRpc {
  private readonly limit: string;
  private readonly metricsRegistry: Registry;
  private readonly koaApp: Koa<Koa.DefaultState, Koa.DefaultContext>;
  private readonly logger: Logger;
  private readonly requestIdIsOptional: boolean = getRequestIdIsOptional(); // default to false
  private readonly batchRequestsMaxSize: number = getBatchRequestsMaxSize(); // default to 100
  private readonly methodResponseHistogram: Histogram;
  private readonly relay: Relay;

  constructor(logger: Logger, register: Registry, relay: Relay, opts?: { limit: string | null }) {
    this.koaApp = new Koa();
    this.limit = opts?.limit ?? '1mb';
    this.logger = logger;
    this.metricsRegistry = register;
    this.relay = relay;

    // clear and create metric in registry
    this.metricsRegistry.removeSingleMetric(METRIC_HISTOGRAM_NAME);
    this.methodResponseHistogram = new Histogram({
      name: METRIC_HISTOGRAM_NAME,
      help: 'JSON RPC method statusCode latency histogram',
      labelNames: ['method', 'statusCode', 'isPartOfBatch'],
      registers: [this.metricsRegistry],
      buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000, 30000, 40000, 50000, 60000], // ms (milliseconds)
    });
  }

  rpcApp(): (ctx: Koa.Context, _next: Koa.Next) => Promise<void> {
    return async (ctx: Koa.Context, _next: Koa.Next) => {
      const requestDetails = this.createRequestDetails(ctx);
      ctx.set(REQUEST_ID_HEADER_NAME, requestDetails.requestId);

      if (ctx.request.method !== 'POST') {
        ctx.body = jsonResp(null, new InvalidRequest(), undefined);
        ctx.status = 400;
        ctx.state.status = `${ctx.status} (${INVALID_REQUEST})`;
        return;
      }

      let body: unknown;
      try {
        body = await parse.json(ctx, { limit: this.limit });
      } catch (err) {
        this.logger.warn(`${requestDetails.formattedRequestId} Unparseable request body: ${String(err)}`);
        const parseError = new ParseError();
        const { statusErrorCode, statusErrorMessage } = translateRpcErrorToHttpStatus(parseError);
        ctx.body = jsonResp(null, parseError, undefined);
        ctx.status = statusErrorCode;
        ctx.state.status = `${ctx.status} (${statusErrorMessage})`;
        return;
      }

      //check if body is array or object
      if (Array.isArray(body)) {
        await this.handleMultipleRequest(ctx, body, requestDetails);
      } else {
        await this.handleSingleRequest(ctx, body, requestDetails);
      }
    };
  }

  private async handleSingleRequest(ctx: Koa.Context, body: unknown, requestDetails: RequestDetails): Promise<void> {
    ctx.state.methodName = isObject(body) && typeof body.method === 'string' ? body.method : INVALID_REQUEST;
    const response = await this.getRequestResult(body, requestDetails);
    ctx.body = response;

    if (response.error) {
      // What HTTP Status code to return for JsonRpcError
      const { statusErrorCode, statusErrorMessage } = translateRpcErrorToHttpStatus(response.error);
      ctx.status = statusErrorCode;
      ctx.state.status = `${ctx.status} (${statusErrorMessage})`;
    }
  }

  private async handleMultipleRequest(
    ctx: Koa.Context,
    body: unknown[],
    requestDetails: RequestDetails,
  ): Promise<void> {
    ctx.state.methodName = BATCH_REQUEST_METHOD_NAME;
    const result = await this.getBatchResult(body, requestDetails);
    ctx.body = result.body;
    ctx.status = result.status;
    ctx.state.status = result.status === 200 ? responseSuccessStatusCode : `${ctx.status} (${INVALID_REQUEST})`;
  }

  /**
   * Executes every entry of a batch body. The entries run in parallel and the
   * responses keep the order of the requests, since ids may be absent or repeated.
   */
  async getBatchResult(body: unknown[], requestDetails: RequestDetails): Promise<IBatchResult> {
    // verify that batch requests are enabled
    if (!getBatchRequestsEnabled()) {
      return { status: 400, body: jsonResp(null, predefined.BATCH_REQUESTS_DISABLED, undefined) };
    }

    // verify max batch size
    if (body.length > this.batchRequestsMaxSize) {
      return {
        status: 400,
        body: jsonResp(
          null,
          predefined.BATCH_REQUESTS_AMOUNT_MAX_EXCEEDED(body.length, this.batchRequestsMaxSize),
          undefined,
        ),
      };
    }

    const disallowedMethods = getBatchRequestsDisallowedMethods();
    const responses = await Promise.all(
      body.map(async (item) => {
        const method = isObject(item) && typeof item.method === 'string' ? item.method : undefined;
        if (method !== undefined && disallowedMethods.includes(method)) {
          return jsonResp(this.responseId(item), predefined.BATCH_REQUESTS_METHOD_NOT_PERMITTED(method), undefined);
        }
        const startTime = Date.now();
        const res = await this.getRequestResult(item, requestDetails);
        const ms = Date.now() - startTime;
        this.methodResponseHistogram
          .labels(method ?? INVALID_REQUEST, `${res.error ? res.error.code : 200}`, 'true')
          .observe(ms);
        return res;
      }),
    );

    // for batch requests, always return 200 http status, this is standard for JSON-RPC 2.0 batch requests
    return { status: 200, body: responses };
  }

  async getRequestResult(body: unknown, requestDetails: RequestDetails): Promise<IJsonRpcResponse> {
    // ensure the request aligns with JSON-RPC 2.0 Specification
    const request = this.validateJsonRpcRequest(body, requestDetails);
    if (!request) {
      return jsonResp(this.responseId(body), new InvalidRequest(), undefined);
    }

    try {
      // call the public API entry point on the Relay package to execute the RPC method
      const result = await this.relay.executeRpcMethod(request.method, request.params, requestDetails);

      if (result instanceof JsonRpcError) {
        return jsonResp(request.id, result, undefined);
      }
      return jsonResp(request.id, null, result);
    } catch (err) {
      return jsonResp(request.id, new InternalError(err instanceof Error ? err.message : String(err)), undefined);
    }
  }

  /**
   * Checks the envelope of a request and returns it typed, or null when it is not a
   * valid JSON-RPC 2.0 request. A missing id is defaulted to '0' when ids are optional.
   */
  validateJsonRpcRequest(body: unknown, requestDetails: RequestDetails): IJsonRpcRequest | null {
    if (!isObject(body)) {
      this.logger.warn(`${requestDetails.formattedRequestId} Invalid request, body is not an object`);
      return null;
    }

    const { jsonrpc, method, params } = body;
    const id = this.requestIdOf(body, requestDetails);
    if (
      jsonrpc !== '2.0' ||
      typeof method !== 'string' ||
      id === undefined ||
      (params !== undefined && !Array.isArray(params))
    ) {
      this.logger.warn(
        `${requestDetails.formattedRequestId} Invalid request, body.jsonrpc: ${String(jsonrpc)}, body[method]: ${String(
          method,
        )}, body[id]: ${String(body.id)}`,
      );
      return null;
    }

    return { id, jsonrpc, method, ...(params !== undefined && { params }) };
  }

  getKoaApp(): Koa<Koa.DefaultState, Koa.DefaultContext> {
    return this.koaApp;
  }

  /**
   * Request details for one HTTP request. Its abort signal fires when the
   * connection closes before the response has been written.
   */
  createRequestDetails(ctx: Koa.Context): RequestDetails {
    const controller = new AbortController();
    ctx.res.once('close', () => {
      if (!ctx.res.writableFinished) {
        controller.abort();
      }
    });

    return new RequestDetails({
      requestId: typeof ctx.state.reqId === 'string' ? ctx.state.reqId : '',
      ipAddress: ctx.request.ip,
      abortSignal: controller.signal,
    });
  }

  /**
   * The id a request should be answered with; undefined when it has none that can be used.
   */
  private requestIdOf(
    body: Record<string, unknown>,
    requestDetails: RequestDetails,
  ): string | number | null | undefined {
    if (!hasOwnProperty(body, 'id')) {
      if (this.requestIdIsOptional) {
        // If the request is invalid, we still want to return a valid JSON-RPC response, default id to 0
        this.logger.warn(
          `${requestDetails.formattedRequestId} Optional JSON-RPC 2.0 request id encountered. ` +
            'Will continue and default id to 0 in response',
        );
        return '0';
      }
      return undefined;
    }

    const { id } = body;
    return typeof id === 'string' || typeof id === 'number' || id === null ? id : undefined;
  }

  private responseId(body: unknown): string | number | null {
    if (isObject(body) && (typeof body.id === 'string' || typeof body.id === 'number')) {
      return body.id;
    }
    return null;
  }
}

export type { IJsonRpcRequest, IJsonRpcResponse };
