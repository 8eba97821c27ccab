import { EventEmitter } from 'node:events';
import type { SupabaseClient } from '@supabase/supabase-js';
import type { NextApiRequest, NextApiResponse } from 'next';
import { vi } from 'vitest';
import type { AuthToken } from '../lib/auth-token.js';
import type { FetchLike } from '../lib/direct-client.js';
import { Logger } from '../lib/logger.js';

// ── SSE / fetch ──────────────────────────────────────────────────────────

export function sseFromPayload(payload: Record<string, unknown>): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

export function deltaEvent(content: string, extra: Record<string, unknown> = {}): string {
  const { phase, status, ...top } = extra;
  return sseFromPayload({
    ...top,
    choices: [{ delta: { role: 'assistant', content, ...(phase ? { phase } : {}), ...(status ? { status } : {}) } }],
  });
}

export const DONE = 'data: [DONE]\n\n';

export function streamFromStrings(chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  let index = 0;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      if (index >= chunks.length) {
        controller.close();
        return;
      }
      controller.enqueue(encoder.encode(chunks[index]));
      index += 1;
    },
  });
}

/** Emits `chunks`, then stalls without closing. Records whether it was cancelled. */
export function hangingStream(chunks: string[] = []) {
  const encoder = new TextEncoder();
  const state = { cancelled: false };
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(encoder.encode(chunk));
    },
    cancel() {
      state.cancelled = true;
    },
  });
  return { stream, state };
}

export function sseResponse(body: ReadableStream<Uint8Array> | string[], status = 200): Response {
  const stream = Array.isArray(body) ? streamFromStrings(body) : body;
  return new Response(stream, { status, headers: { 'content-type': 'text/event-stream' } });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

export const NEW_CHAT_REPLY = { success: true, data: { id: 'chat-new-1' } };

/**
 * Fetch stand-in for the upstream: chat creation answers NEW_CHAT_REPLY,
 * completions answer whatever `completion` returns.
 */
export function createUpstreamFetch(completion: (url: string, init: RequestInit) => Response | Promise<Response>) {
  return vi.fn<FetchLike>(async (url, init) => {
    if (url.includes('/api/v2/chats/new')) return jsonResponse(NEW_CHAT_REPLY);
    return completion(url, init);
  });
}

/** JSON body the fetch stub received on call `index`. */
export function sentBody(fetchMock: { mock: { calls: Parameters<FetchLike>[] } }, index: number): Record<string, unknown> {
  const init = fetchMock.mock.calls[index][1];
  const parsed: unknown = JSON.parse(typeof init.body === 'string' ? init.body : '{}');
  return parsed !== null && typeof parsed === 'object' ? { ...parsed } : {};
}

// ── Credentials ──────────────────────────────────────────────────────────

export function makeJwt(claims: Record<string, unknown>): string {
  const encode = (value: unknown) => Buffer.from(JSON.stringify(value)).toString('base64url');
  return `${encode({ alg: 'HS256', typ: 'JWT' })}.${encode(claims)}.test-signature`;
}

export const TEST_TOKEN: AuthToken = {
  token: 'test-secret',
  expiresAt: Number.POSITIVE_INFINITY,
  subject: 'user-test',
};

// ── Logging ──────────────────────────────────────────────────────────────

export function createRecordingLogger() {
  const lines: Array<Record<string, unknown>> = [];
  const push = (line: string) => {
    const parsed: unknown = JSON.parse(line);
    if (parsed !== null && typeof parsed === 'object') lines.push({ ...parsed });
  };
  const logger = new Logger('debug', { log: push, warn: push, error: push });
  return { logger, lines };
}

// ── Supabase ─────────────────────────────────────────────────────────────

export interface SupabaseCall {
  table: string;
  op: 'insert' | 'upsert';
  rows: unknown;
  options?: unknown;
}

/** Records writes; `failTables` answer every write with a PostgREST-style error. */
export function createSupabaseMock(failTables: string[] = []) {
  const calls: SupabaseCall[] = [];
  const reply = (table: string) => Promise.resolve(
    failTables.includes(table)
      ? { data: null, error: { message: `permission denied for table ${table}`, code: '42501' } }
      : { data: null, error: null },
  );

  const client = {
    from(table: string) {
      return {
        insert(rows: unknown) {
          calls.push({ table, op: 'insert', rows });
          return reply(table);
        },
        upsert(rows: unknown, options?: unknown) {
          calls.push({ table, op: 'upsert', rows, options });
          return reply(table);
        },
      };
    },
  };

  return { client: client as unknown as SupabaseClient, calls };
}

// ── Next.js req/res ──────────────────────────────────────────────────────

export function makeReq(init: { method: string; body?: unknown; query?: Record<string, string | string[]> }) {
  return {
    method: init.method,
    body: init.body,
    query: init.query ?? {},
    headers: { 'content-type': 'application/json' },
  } as unknown as NextApiRequest;
}

export interface MockResponse {
  res: NextApiResponse;
  statusCode: () => number;
  body: () => unknown;
  headers: Record<string, string>;
  /** Simulates the client dropping the connection. */
  disconnect: () => void;
}

export function makeRes(): MockResponse {
  const emitter = new EventEmitter();
  const headers: Record<string, string> = {};
  let statusCode = 200;
  let body: unknown;
  let finished = false;

  const res = {
    get writableFinished() { return finished; },
    on(event: string, listener: () => void) { emitter.on(event, listener); return res; },
    off(event: string, listener: () => void) { emitter.off(event, listener); return res; },
    setHeader(key: string, value: string) { headers[key] = value; return res; },
    status(code: number) { statusCode = code; return res; },
    json(payload: unknown) { body = payload; finished = true; },
  };

  return {
    res: res as unknown as NextApiResponse,
    statusCode: () => statusCode,
    body: () => body,
    headers,
    disconnect: () => emitter.emit('close'),
  };
}
