import { describe, it, expect } from 'vitest';
import { HttpJsonRpcClient, decodeHexQuantity, type FetchLike } from '../../../src/health/rpc-client.js';

function respondWith(body: unknown, status = 200): { fetch: FetchLike; requests: RequestInit[] } {
  const requests: RequestInit[] = [];
  return {
    requests,
    fetch: async (_url, init) => {
      requests.push(init);
      return new Response(JSON.stringify(body), { status });
    },
  };
}

describe('HttpJsonRpcClient', () => {
  it('posts a JSON-RPC 2.0 request and returns the result', async () => {
    const { fetch, requests } = respondWith({ jsonrpc: '2.0', id: 1, result: '0x64' });
    const client = new HttpJsonRpcClient('http://localhost:8545', 5000, fetch);

    expect(await client.call('eth_blockNumber')).toEqual({ ok: true, result: '0x64' });
    expect(JSON.parse(String(requests[0]?.body))).toEqual({ jsonrpc: '2.0', method: 'eth_blockNumber', params: [], id: 1 });
  });

  it('keeps a null result', async () => {
    const { fetch } = respondWith({ jsonrpc: '2.0', id: 1, result: null });
    expect(await new HttpJsonRpcClient('http://rpc', 5000, fetch).call('admin_nodeInfo')).toEqual({ ok: true, result: null });
  });

  it('surfaces RPC errors, HTTP errors and missing results', async () => {
    const rpcError = respondWith({ jsonrpc: '2.0', id: 1, error: { code: -32000, message: 'header not found' } });
    expect(await new HttpJsonRpcClient('http://rpc', 5000, rpcError.fetch).call('eth_syncing')).toEqual({
      ok: false,
      error: 'header not found',
    });

    const httpError = respondWith({}, 502);
    expect(await new HttpJsonRpcClient('http://rpc', 5000, httpError.fetch).call('eth_syncing')).toEqual({
      ok: false,
      error: 'HTTP 502',
    });

    const empty = respondWith({ jsonrpc: '2.0', id: 1 });
    expect(await new HttpJsonRpcClient('http://rpc', 5000, empty.fetch).call('eth_syncing')).toEqual({
      ok: false,
      error: 'response has no result',
    });
  });

  it('never rejects on transport failure', async () => {
    const client = new HttpJsonRpcClient('http://rpc', 5000, async () => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:8545');
    });
    expect(await client.call('eth_syncing')).toEqual({ ok: false, error: 'connect ECONNREFUSED 127.0.0.1:8545' });
  });
});

describe('decodeHexQuantity', () => {
  it('decodes hex quantities and non-negative integers only', () => {
    expect(decodeHexQuantity('0x1a')).toBe(26);
    expect(decodeHexQuantity(26)).toBe(26);
    expect(decodeHexQuantity('1a')).toBeNull();
    expect(decodeHexQuantity('0x')).toBeNull();
    expect(decodeHexQuantity(-1)).toBeNull();
    expect(decodeHexQuantity(1.5)).toBeNull();
    expect(decodeHexQuantity(null)).toBeNull();
  });
});
