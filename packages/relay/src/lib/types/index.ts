// SPDX-License-Identifier: Apache-2.0

export * from './backend';
export * from './blockRef';
export * from './chain';
export * from './RequestDetails';
export * from './requestParams';
export * from './registry';
export * from './validation';
