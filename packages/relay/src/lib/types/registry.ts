// SPDX-License-Identifier: Apache-2.0

import type { RpcMethodMetadata } from '../decorators';

/**
 * Type for supported namespaces
 */
export type RpcNamespace = 'eth';

/**
 * Several service implementations may share one namespace; together they form
 * that namespace's method surface.
 */
export type RpcNamespaceRegistry = {
  namespace: RpcNamespace;
  serviceImpl: object;
};

/**
 * Represents a method handler function registered for remote invocation.
 * Handlers are bound to their implementation and carry the decorator metadata.
 */
export type OperationHandler = ((...args: unknown[]) => unknown) & RpcMethodMetadata;

/**
 * Type for the registry mapping of method names to their handler implementations
 */
export type RpcMethodRegistry = Map<string, OperationHandler>;
