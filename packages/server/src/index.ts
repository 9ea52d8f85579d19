// SPDX-License-Identifier: Apache-2.0

export { formatRequestIdMessage } from './formatters';
export { default as KoaJsonRpc } from './koaJsonRpc';
export type { IBatchResult } from './koaJsonRpc';
export { translateRpcErrorToHttpStatus } from './koaJsonRpc/lib/httpErrorMapper';
export { createLogger, createServer, type RpcServer, type ServerOptions, startServer } from './server';
