/**
 * @module chain/ethstats-client
 * Reads the current peer list from a network's ethstats WebSocket endpoint.
 */

import WebSocket from 'ws';
import { z } from 'zod';
import { fail, succeed, type Outcome } from '../resilience/error-codes.js';

export type EnodeFetcher = (endpoint: string) => Promise<Outcome<string[]>>;

export interface FetchEnodesOptions {
  /** Give up waiting for the node list after this long (default 10s) */
  timeoutMs?: number;
}

const InitMessageSchema = z.object({
  emit: z.tuple([z.string(), z.object({ nodes: z.array(z.unknown()) }).passthrough()]).rest(z.unknown()),
});

function collectEnodes(value: unknown, into: Set<string>): void {
  if (typeof value === 'string') {
    if (value.startsWith('enode://')) into.add(value);
    return;
  }
  if (Array.isArray(value)) {
    for (const item of value) collectEnodes(item, into);
    return;
  }
  if (value !== null && typeof value === 'object') {
    for (const item of Object.values(value)) collectEnodes(item, into);
  }
}

/**
 * Enode URLs found anywhere under `emit[1].nodes`, de-duplicated in first-seen
 * order. `null` when the message is not a node-list frame.
 */
export function extractEnodes(message: string): string[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(message);
  } catch {
    return null;
  }
  const frame = InitMessageSchema.safeParse(parsed);
  if (!frame.success) return null;

  const found = new Set<string>();
  collectEnodes(frame.data.emit[1].nodes, found);
  return [...found];
}

function rawToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

/**
 * Connect, announce `ready`, and resolve with the first node list received.
 * A timeout without a list resolves to an empty list; a connection error is
 * a failure.
 */
export function fetchEnodes(endpoint: string, options: FetchEnodesOptions = {}): Promise<Outcome<string[]>> {
  const timeoutMs = options.timeoutMs ?? 10_000;

  return new Promise((resolve) => {
    let settled = false;
    const socket = new WebSocket(endpoint, { handshakeTimeout: timeoutMs });

    const finish = (outcome: Outcome<string[]>): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.removeAllListeners('message');
      socket.terminate();
      resolve(outcome);
    };

    const timer = setTimeout(() => finish(succeed([], ['ethstats sent no node list before the timeout'])), timeoutMs);

    socket.on('open', () => {
      socket.send(JSON.stringify({ emit: ['ready'] }));
    });

    socket.on('message', (data) => {
      const enodes = extractEnodes(rawToString(data));
      if (enodes !== null) finish(succeed(enodes));
    });

    socket.on('error', (err) => {
      finish(fail('EXTERNAL_TOOL_FAILURE', `ethstats connection to ${endpoint} failed: ${err.message}`, { endpoint }));
    });

    socket.on('close', () => {
      finish(succeed([], ['ethstats closed the connection without a node list']));
    });
  });
}
