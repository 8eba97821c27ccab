/* ============================================================================
   session-store.ts
   Minimal conversation record: a session row per conversation, a turn row per
   successful dispatch.

   The orchestrator only ever calls ensure() then append(). Failures surface
   as SessionStoreError; the orchestrator logs and moves on.

   Session ids share one column but come from two places: upstream chat ids
   (returned by either transport) and ids minted here when no transport
   reported one. Minted ids carry LOCAL_SESSION_PREFIX and are never sent
   upstream as a chat id.
============================================================================ */

import { randomUUID } from "node:crypto";
import type { SupabaseClient } from "@supabase/supabase-js";
import { SessionStoreError } from "./errors.js";
import type { TransportName } from "./transport.js";

export const LOCAL_SESSION_PREFIX = "local-";

export function newLocalSessionId(): string {
  return `${LOCAL_SESSION_PREFIX}${randomUUID()}`;
}

export function isLocalSessionId(sessionId: string): boolean {
  return sessionId.startsWith(LOCAL_SESSION_PREFIX);
}

export interface ChatTurn {
  correlationId: string;
  prompt: string;
  reply: string;
  reasoning?: string;
  artifactUrl?: string;
  transport: TransportName;
  modelId: string;
}

export interface SessionMeta {
  modelId: string;
}

export interface SessionStore {
  /** Returns `sessionId` unchanged when given, otherwise a new id. */
  ensure(sessionId: string | null, meta: SessionMeta): Promise<string>;
  append(sessionId: string, turn: ChatTurn): Promise<void>;
}

// ── Supabase ─────────────────────────────────────────────────────────────

export const SESSION_TABLE = "chat_sessions";
export const TURN_TABLE = "chat_turns";

export class SupabaseSessionStore implements SessionStore {
  constructor(private readonly client: SupabaseClient) { }

  async ensure(sessionId: string | null, meta: SessionMeta): Promise<string> {
    const id = sessionId ?? newLocalSessionId();
    const { error } = await this.client
      .from(SESSION_TABLE)
      .upsert({ id, model_id: meta.modelId, updated_at: new Date().toISOString() }, { onConflict: "id" });

    if (error) throw new SessionStoreError(`ensure ${id}: ${error.message}`, { cause: error });
    return id;
  }

  async append(sessionId: string, turn: ChatTurn): Promise<void> {
    const { error } = await this.client.from(TURN_TABLE).insert({
      session_id: sessionId,
      correlation_id: turn.correlationId,
      model_id: turn.modelId,
      prompt: turn.prompt,
      reply: turn.reply,
      reasoning: turn.reasoning ?? null,
      artifact_url: turn.artifactUrl ?? null,
      transport: turn.transport,
      created_at: new Date().toISOString(),
    });

    if (error) throw new SessionStoreError(`append ${sessionId}: ${error.message}`, { cause: error });
  }
}

// ── In-memory ────────────────────────────────────────────────────────────

interface MemorySession {
  modelId: string;
  turns: ChatTurn[];
}

/** Process-local store for development and tests. */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, MemorySession>();

  async ensure(sessionId: string | null, meta: SessionMeta): Promise<string> {
    const id = sessionId ?? newLocalSessionId();
    const existing = this.sessions.get(id);
    if (existing) existing.modelId = meta.modelId;
    else this.sessions.set(id, { modelId: meta.modelId, turns: [] });
    return id;
  }

  async append(sessionId: string, turn: ChatTurn): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SessionStoreError(`Unknown session: ${sessionId}`);
    session.turns.push(turn);
  }

  turns(sessionId: string): readonly ChatTurn[] {
    return this.sessions.get(sessionId)?.turns ?? [];
  }

  get size(): number {
    return this.sessions.size;
  }
}
