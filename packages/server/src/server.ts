// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@eth-facade/config-service';
import { type ChainBackend, JsonRpcError, Relay } from '@eth-facade/relay';
import cors from '@koa/cors';
import type { Server } from 'http';
import type Koa from 'koa';
import pino, { type Logger } from 'pino';
import { collectDefaultMetrics, Histogram, Registry } from 'prom-client';
import { v4 as uuid } from 'uuid';

import { formatRequestIdMessage } from './formatters';
import KoaJsonRpc from './koaJsonRpc';

export interface ServerOptions {
  logger?: Logger;
  register?: Registry;
}

export interface RpcServer {
  app: Koa;
  koaJsonRpc: KoaJsonRpc;
  relay: Relay;
  register: Registry;
}

/**
 * The root logger of the process, pretty printed at LOG_LEVEL.
 */
export function createLogger(): Logger {
  return pino({
    name: 'eth-rpc-facade',
    // pino rejects an empty level with "default level must be included in custom levels"
    level: ConfigService.get('LOG_LEVEL') || 'trace',
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: true,
      },
    },
  });
}

/**
 * Builds the Koa application serving the eth namespace of the given backend,
 * together with its metrics and health endpoints.
 */
export function createServer(backend: ChainBackend, options: ServerOptions = {}): RpcServer {
  const logger = (options.logger ?? createLogger()).child({ name: 'rpc-server' });
  const register = options.register ?? new Registry();
  const relay = new Relay(logger.child({ name: 'relay' }), backend);
  const koaJsonRpc = new KoaJsonRpc(logger.child({ name: 'koa-rpc' }), register, relay, {
    limit: ConfigService.get('INPUT_SIZE_LIMIT') + 'mb',
  });
  const app = koaJsonRpc.getKoaApp();

  collectDefaultMetrics({ register, prefix: 'rpc_relay_' });

  // clear and create metric in registry
  const metricHistogramName = 'rpc_relay_method_response';
  register.removeSingleMetric(metricHistogramName);
  const methodResponseHistogram = new Histogram({
    name: metricHistogramName,
    help: 'JSON RPC method statusCode latency histogram',
    labelNames: ['method', 'statusCode'],
    registers: [register],
    buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000, 30000, 40000, 50000, 60000], // ms (milliseconds)
  });

  // enable proxy support to trust proxy-added headers for client IP detection
  app.proxy = true;

  // set cors
  app.use(cors());

  /**
   * request id from the Request-Id header, or a fresh one
   */
  app.use(async (ctx, next) => {
    ctx.state.reqId = ctx.get('Request-Id') || uuid();
    await next();
  });

  /**
   * middleware for request timing
   */
  app.use(async (ctx, next) => {
    const start = Date.now();
    ctx.state.start = start;
    await next();

    const ms = Date.now() - start;
    if (ctx.method !== 'POST') {
      logger.info(`[${ctx.method}]: ${ctx.url} ${ctx.status} ${ms} ms`);
    } else {
      // Since ctx.state.status might contain the request ID from JsonRpcError, remove it for a cleaner log.
      const contextStatus =
        typeof ctx.state.status === 'string'
          ? ctx.state.status.replace(`${formatRequestIdMessage(ctx.state.reqId)} `, '')
          : ctx.status;

      // log call type, method, status code and latency
      logger.info(
        `${formatRequestIdMessage(ctx.state.reqId)} [${ctx.method}]: ${ctx.state.methodName} ${contextStatus} ${ms} ms`,
      );
      methodResponseHistogram.labels(String(ctx.state.methodName), `${ctx.status}`).observe(ms);
    }
  });

  /**
   * prometheus metrics exposure
   */
  app.use(async (ctx, next) => {
    if (ctx.url === '/metrics') {
      ctx.status = 200;
      ctx.body = await register.metrics();
    } else {
      return next();
    }
  });

  /**
   * liveness endpoint
   */
  app.use(async (ctx, next) => {
    if (ctx.url === '/health/liveness') {
      ctx.status = 200;
    } else {
      return next();
    }
  });

  /**
   * readiness endpoint, up while the chain head can be read
   */
  app.use(async (ctx, next) => {
    if (ctx.url === '/health/readiness') {
      const result = await relay.executeRpcMethod('eth_blockNumber', [], koaJsonRpc.createRequestDetails(ctx));
      if (result instanceof JsonRpcError) {
        logger.warn(`Readiness check failed: ${result.message}`);
        ctx.body = 'DOWN';
        ctx.status = 503; // UNAVAILABLE
      } else {
        ctx.status = 200;
        ctx.body = 'OK';
      }
    } else {
      return next();
    }
  });

  /**
   * middleware to end for non POST requests asides health and metrics
   */
  app.use(async (ctx, next) => {
    if (ctx.method === 'POST') {
      await next();
    } else if (ctx.method === 'OPTIONS') {
      // support CORS preflight
      ctx.status = 200;
    } else {
      logger.warn(`skipping HTTP method: [${ctx.method}], url: ${ctx.url}, status: ${ctx.status}`);
    }
  });

  const rpcApp = koaJsonRpc.rpcApp();

  app.use(async (ctx, next) => {
    await rpcApp(ctx, next);
  });

  return { app, koaJsonRpc, relay, register };
}

/**
 * Creates the server for the backend and listens on SERVER_PORT.
 */
export function startServer(backend: ChainBackend, options: ServerOptions = {}): Server {
  const logger = options.logger ?? createLogger();
  const { app } = createServer(backend, { ...options, logger });

  process.on('unhandledRejection', (reason, p) => {
    logger.error(`Unhandled Rejection at: Promise: ${JSON.stringify(p)}, reason: ${String(reason)}`);
  });

  process.on('uncaughtException', (err) => {
    logger.error(err, 'Uncaught Exception!');
  });

  const port = ConfigService.get('SERVER_PORT');
  return app.listen(port, () => {
    logger.info(`Listening on port ${port}`);
  });
}
