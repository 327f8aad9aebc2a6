/**
 * @module health/rpc-client
 * Minimal JSON-RPC 2.0 client for the local blockchain node.
 *
 * `call()` never rejects: transport errors, non-2xx answers, RPC errors and
 * unparsable bodies all come back as `{ ok: false }`.
 */

import { z } from 'zod';

export type RpcResponse =
  | { ok: true; result: unknown }
  | { ok: false; error: string };

export interface JsonRpcClient {
  call(method: string, params?: unknown[]): Promise<RpcResponse>;
}

const RpcEnvelopeSchema = z.object({
  result: z.unknown().optional(),
  error: z.object({ code: z.number().optional(), message: z.string() }).optional(),
});

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export class HttpJsonRpcClient implements JsonRpcClient {
  private nextId = 1;

  constructor(
    private readonly url: string,
    private readonly timeoutMs = 5000,
    private readonly fetchImpl: FetchLike = (url, init) => fetch(url, init),
  ) {}

  async call(method: string, params: unknown[] = []): Promise<RpcResponse> {
    let body: unknown;
    try {
      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ jsonrpc: '2.0', method, params, id: this.nextId++ }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) return { ok: false, error: `HTTP ${response.status}` };
      body = await response.json();
    } catch (err) {
      return { ok: false, error: err instanceof Error ? err.message : String(err) };
    }

    const envelope = RpcEnvelopeSchema.safeParse(body);
    if (!envelope.success) return { ok: false, error: 'malformed JSON-RPC response' };
    if (envelope.data.error) return { ok: false, error: envelope.data.error.message };
    if (!('result' in envelope.data)) return { ok: false, error: 'response has no result' };
    return { ok: true, result: envelope.data.result };
  }
}

/**
 * Decode a JSON-RPC quantity (`"0x1a"` → 26). Anything else, including
 * negative or non-integer numbers, is `null`.
 */
export function decodeHexQuantity(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value >= 0 ? value : null;
  }
  if (typeof value !== 'string' || !/^0x[0-9a-fA-F]+$/.test(value)) return null;
  const decoded = Number.parseInt(value.slice(2), 16);
  return Number.isSafeInteger(decoded) ? decoded : null;
}
