import { describe, expect, it } from 'vitest';

import {
  decodeEnvelope,
  decodeRpcRequest,
  encodeEnvelope,
  EnvelopeDecodeError,
  rpcError,
  rpcResult,
  RpcDecodeError,
} from '@/tunnel/codec.js';

describe('codec', () => {
  it('decodes envelopes from text and buffers', () => {
    expect(decodeEnvelope('{"type":"registered","tunnel_id":"t-1","tunnel_url":"https://relay.test/t-1"}')).toEqual({
      type: 'registered',
      tunnel_id: 't-1',
      tunnel_url: 'https://relay.test/t-1',
    });
    expect(decodeEnvelope(Buffer.from('{"type":"ping","extra":true}'))).toEqual({ type: 'ping' });
    expect(decodeEnvelope([Buffer.from('{"type":'), Buffer.from('"pong"}')])).toEqual({ type: 'pong' });
  });

  it('keeps the embedded payload untouched', () => {
    const envelope = decodeEnvelope('{"type":"request","request_id":"r1","payload":{"method":"ping","id":1}}');

    expect(envelope.payload).toEqual({ method: 'ping', id: 1 });
  });

  it('rejects malformed frames', () => {
    expect(() => decodeEnvelope('{not json')).toThrow(EnvelopeDecodeError);
    expect(() => decodeEnvelope('{not json')).toThrow(/^malformed frame: /);
    expect(() => decodeEnvelope('{"tunnel_url":"x"}')).toThrow('invalid envelope: type: Required');
  });

  it('encodes envelopes without absent fields', () => {
    expect(encodeEnvelope({ type: 'pong' })).toBe('{"type":"pong"}');
    expect(encodeEnvelope({ type: 'response', request_id: 'r1', payload: { jsonrpc: '2.0', id: 1, result: {} } })).toBe(
      '{"type":"response","request_id":"r1","payload":{"jsonrpc":"2.0","id":1,"result":{}}}',
    );
  });

  it('decodes JSON-RPC requests', () => {
    expect(decodeRpcRequest({ jsonrpc: '2.0', id: 'a', method: 'tools/list' })).toEqual({
      jsonrpc: '2.0',
      id: 'a',
      method: 'tools/list',
    });
    expect(decodeRpcRequest({ id: null })).toEqual({ id: null, method: '' });
    expect(() => decodeRpcRequest(undefined)).toThrow('payload is missing');
    expect(() => decodeRpcRequest('tools/list')).toThrow(RpcDecodeError);
    expect(() => decodeRpcRequest({ method: 7 })).toThrow(RpcDecodeError);
  });

  it('builds responses that echo the id only when present', () => {
    expect(rpcError(undefined, -32700, 'Parse error')).toStrictEqual({
      jsonrpc: '2.0',
      error: { code: -32700, message: 'Parse error' },
    });
    expect(rpcError(3, -32601, 'Method not found: x')).toStrictEqual({
      jsonrpc: '2.0',
      id: 3,
      error: { code: -32601, message: 'Method not found: x' },
    });
    expect(rpcResult(null, {})).toStrictEqual({ jsonrpc: '2.0', id: null, result: {} });
  });
});
