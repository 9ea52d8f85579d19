// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@eth-facade/config-service';

export function hasOwnProperty<K extends PropertyKey>(obj: object, prop: K): obj is Record<K, unknown> {
  return Object.prototype.hasOwnProperty.call(obj, prop);
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getRequestIdIsOptional(): boolean {
  return ConfigService.get('REQUEST_ID_IS_OPTIONAL');
}

export function getBatchRequestsEnabled(): boolean {
  return ConfigService.get('BATCH_REQUESTS_ENABLED');
}

export function getBatchRequestsMaxSize(): number {
  return ConfigService.get('BATCH_REQUESTS_MAX_SIZE');
}

export function getBatchRequestsDisallowedMethods(): string[] {
  return ConfigService.get('BATCH_REQUESTS_DISALLOWED_METHODS');
}
