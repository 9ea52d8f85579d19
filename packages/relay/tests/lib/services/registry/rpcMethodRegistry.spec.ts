// SPDX-License-Identifier: Apache-2.0

import { expect } from 'chai';

import {
  RPC_LAYOUT,
  RPC_METHOD_KEY,
  RPC_PARAM_LAYOUT_KEY,
  RPC_PARAM_VALIDATION_RULES_KEY,
  rpcMethod,
  rpcParamLayoutConfig,
  rpcParamValidationRules,
} from '../../../../src/lib/decorators';
import { registerRpcMethods } from '../../../../src/lib/services/registryService/rpcMethodRegistryService';
import { ParamType } from '../../../../src/lib/types';

describe('registerRpcMethods', () => {
  class ReadImpl {
    private readonly height = 7;

    @rpcMethod
    @rpcParamLayoutConfig(RPC_LAYOUT.REQUEST_DETAILS_ONLY)
    blockNumber(): number {
      return this.height;
    }

    @rpcMethod
    @rpcParamValidationRules({ 0: { type: ParamType.ADDRESS, required: true } })
    getBalance(address: string): string {
      return `${address}:${this.height}`;
    }

    helper(): string {
      return 'not exposed';
    }
  }

  class WriteImpl {
    @rpcMethod
    sendRawTransaction(raw: string): string {
      return `sent ${raw}`;
    }
  }

  it('should register decorated methods as namespace_operation', () => {
    const registry = registerRpcMethods([{ namespace: 'eth', serviceImpl: new ReadImpl() }]);

    expect(Array.from(registry.keys())).to.have.members(['eth_blockNumber', 'eth_getBalance']);
  });

  it('should not register undecorated methods or the constructor', () => {
    const registry = registerRpcMethods([{ namespace: 'eth', serviceImpl: new ReadImpl() }]);

    expect(registry.has('eth_helper')).to.be.false;
    expect(registry.has('eth_constructor')).to.be.false;
  });

  it('should bind handlers to their implementation', () => {
    const registry = registerRpcMethods([{ namespace: 'eth', serviceImpl: new ReadImpl() }]);

    expect(registry.get('eth_blockNumber')?.()).to.equal(7);
    expect(registry.get('eth_getBalance')?.('0xabc')).to.equal('0xabc:7');
  });

  it('should carry the decorator metadata and the operation name over to the handler', () => {
    const registry = registerRpcMethods([{ namespace: 'eth', serviceImpl: new ReadImpl() }]);
    const blockNumber = registry.get('eth_blockNumber');
    const getBalance = registry.get('eth_getBalance');

    expect(blockNumber?.[RPC_METHOD_KEY]).to.equal(true);
    expect(blockNumber?.[RPC_PARAM_LAYOUT_KEY]).to.equal(RPC_LAYOUT.REQUEST_DETAILS_ONLY);
    expect(blockNumber?.[RPC_PARAM_VALIDATION_RULES_KEY]).to.be.undefined;
    expect(getBalance?.[RPC_PARAM_VALIDATION_RULES_KEY]).to.deep.equal({
      0: { type: ParamType.ADDRESS, required: true },
    });
    expect(getBalance?.name).to.equal('getBalance');
  });

  it('should merge several implementations that share a namespace', () => {
    const registry = registerRpcMethods([
      { namespace: 'eth', serviceImpl: new ReadImpl() },
      { namespace: 'eth', serviceImpl: new WriteImpl() },
    ]);

    expect(registry.size).to.equal(3);
    expect(registry.get('eth_sendRawTransaction')?.('0x01')).to.equal('sent 0x01');
  });

  it('should reject an operation registered by two implementations', () => {
    expect(() =>
      registerRpcMethods([
        { namespace: 'eth', serviceImpl: new ReadImpl() },
        { namespace: 'eth', serviceImpl: new ReadImpl() },
      ]),
    ).to.throw('RPC method eth_blockNumber is registered by more than one implementation');
  });

  it('should return an empty registry for implementations without decorated methods', () => {
    expect(registerRpcMethods([{ namespace: 'eth', serviceImpl: {} }]).size).to.equal(0);
  });
});
