/* ============================================================================
   direct-client.ts
   Direct path: structured HTTP call with a streamed (SSE) reply.

   ├─ §1  Wire body: RequestPayload → upstream JSON
   ├─ §2  Client: chat creation, file upload, streamed chat, image generation
   ├─ §3  Stream consumption: SSE framing, envelope validation, reassembly
   └─ §4  Utilities: abortable reads, error mapping

   Timeout is a hard cutoff for the whole attempt. When it fires, the request
   and the stream reader are cancelled and DirectTimeout is thrown. A caller
   abort surfaces as the native AbortError so the orchestrator can tell the two
   apart. A chat opened by a failed attempt rides on the error as `chatId`.
============================================================================ */

import { randomUUID } from "node:crypto";
import type { AuthToken } from "./auth-token.js";
import {
  DirectTransportError,
  classifyHttpStatus,
  toError,
  type DirectFailureKind,
} from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { FileAttachment, RequestPayload } from "./payload-builder.js";
import {
  CompletionResponseSchema,
  FileUploadResponseSchema,
  NewChatResponseSchema,
  StreamEventSchema,
} from "./schemas/wire.js";
import { StreamAssembler } from "./stream-assembler.js";
import { abortError, raceAbort, type TransportResult } from "./transport.js";

export const DEFAULT_BASE_URL = "https://chat.qwen.ai";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface DirectClientOptions {
  baseUrl?: string;
  fetch?: FetchLike;
  logger?: Logger;
}


// ═══════════════════════════════════════════════════════════════════════════
// §1  WIRE BODY
// ═══════════════════════════════════════════════════════════════════════════

export function toWireBody(
  payload: RequestPayload,
  chatId: string,
  nowSeconds: number = Math.floor(Date.now() / 1000),
  fileIds: readonly string[] = [],
): Record<string, unknown> {
  const { model } = payload;
  const image = payload.kind === "image";
  const search = payload.features.webSearch === true;
  const chatType = image ? "t2i" : search ? "t2t_search" : "t2t";

  const featureConfig: Record<string, unknown> = image
    ? { thinking_enabled: false, output_schema: "image" }
    : {
        thinking_enabled: model.thinkingEnabled,
        output_schema: model.outputSchema,
        ...payload.featureConfig,
      };
  if (search) featureConfig.web_search_enabled = true;

  const body: Record<string, unknown> = {
    stream: !image,
    incremental_output: !image,
    chat_id: chatId,
    chat_mode: image ? "image_generation" : search ? "web_search" : "normal",
    model: model.id,
    parent_id: null,
    messages: [{
      fid: randomUUID(),
      parentId: null,
      childrenIds: [],
      role: "user",
      content: payload.prompt,
      user_action: image ? "image_generation" : search ? "chat_with_search" : "chat",
      files: fileIds.map((id) => ({ file_id: id, type: "attachment" })),
      timestamp: nowSeconds,
      models: [model.id],
      chat_type: chatType,
      feature_config: featureConfig,
      extra: { meta: { subChatType: chatType } },
      sub_chat_type: chatType,
      parent_id: null,
    }],
    timestamp: nowSeconds,
    turn_id: payload.correlationId,
    modelIdx: 0,
    temperature: model.temperature,
    max_tokens: model.maxTokens,
    ...payload.extras,
  };
  if (search) body.web_search = true;
  return body;
}


// ═══════════════════════════════════════════════════════════════════════════
// §2  CLIENT
// ═══════════════════════════════════════════════════════════════════════════

export class DirectApiClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: DirectClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
  }

  async send(
    payload: RequestPayload,
    auth: AuthToken,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<TransportResult> {
    if (signal?.aborted) throw abortError();

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = () => controller.abort();
    signal?.addEventListener("abort", onCallerAbort, { once: true });

    let createdChatId: string | undefined;
    try {
      let chatId = payload.sessionId;
      if (!chatId) {
        chatId = await this.createChat(payload, auth, controller.signal);
        createdChatId = chatId;
      }
      const fileIds: string[] = [];
      for (const file of payload.files) {
        fileIds.push(await this.uploadFile(file, payload, auth, controller.signal));
      }
      return payload.kind === "image"
        ? await this.completeImage(payload, chatId, fileIds, auth, controller.signal)
        : await this.streamChat(payload, chatId, fileIds, auth, controller.signal);
    } catch (err) {
      if (timedOut) {
        const timeout = new DirectTransportError(
          "DirectTimeout",
          `No terminal event within ${timeoutMs}ms`,
          undefined,
          { cause: err },
        );
        timeout.chatId = createdChatId;
        throw timeout;
      }
      if (createdChatId && err instanceof DirectTransportError) err.chatId = createdChatId;
      throw err;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  /** POST /api/v2/chats/new: the upstream requires a chat id per conversation. */
  private async createChat(payload: RequestPayload, auth: AuthToken, signal: AbortSignal): Promise<string> {
    const res = await this.request(`${this.baseUrl}/api/v2/chats/new`, {
      method: "POST",
      headers: this.headers(auth, payload, "application/json"),
      body: JSON.stringify({}),
    }, signal);
    await assertOk(res);

    const parsed = NewChatResponseSchema.safeParse(await readJson(res, signal));
    if (!parsed.success) {
      throw new DirectTransportError("DirectMalformedResponse", "Chat creation reply has no chat id", res.status);
    }

    this.logger.debug("DirectClient", "Created upstream chat", {
      correlationId: payload.correlationId,
      chatId: parsed.data.data.id,
    });
    return parsed.data.data.id;
  }

  /** POST /api/v2/files/upload, one attachment per call. Returns the file id. */
  private async uploadFile(
    file: FileAttachment,
    payload: RequestPayload,
    auth: AuthToken,
    signal: AbortSignal,
  ): Promise<string> {
    const res = await this.request(`${this.baseUrl}/api/v2/files/upload`, {
      method: "POST",
      headers: this.headers(auth, payload, "application/json"),
      body: JSON.stringify({
        file_name: file.name,
        file_content: file.content,
        file_type: file.type ?? "auto",
        file_size: Buffer.byteLength(file.content, "base64"),
        upload_type: "chat_attachment",
      }),
    }, signal);
    await assertOk(res);

    const parsed = FileUploadResponseSchema.safeParse(await readJson(res, signal));
    if (!parsed.success) {
      throw new DirectTransportError("DirectMalformedResponse", `Upload reply for ${file.name} has no file id`, res.status);
    }
    return parsed.data.data.file_id;
  }

  private async streamChat(
    payload: RequestPayload,
    chatId: string,
    fileIds: readonly string[],
    auth: AuthToken,
    signal: AbortSignal,
  ): Promise<TransportResult> {
    const res = await this.request(this.completionsUrl(payload, chatId), {
      method: "POST",
      headers: this.headers(auth, payload, "text/event-stream"),
      body: JSON.stringify(toWireBody(payload, chatId, undefined, fileIds)),
    }, signal);
    await assertOk(res);
    if (!res.body) throw new DirectTransportError("DirectMalformedResponse", "Response has no body", res.status);

    const assembler = new StreamAssembler();
    await consumeEventStream(res.body, assembler, signal);

    this.logger.debug("DirectClient", "Stream complete", {
      correlationId: payload.correlationId,
      fragments: assembler.fragmentCount,
      chars: assembler.text.length,
    });

    const reasoning = assembler.reasoning;
    return {
      text: assembler.text,
      ...(reasoning !== null ? { reasoning } : {}),
      sessionId: chatId,
    };
  }

  private async completeImage(
    payload: RequestPayload,
    chatId: string,
    fileIds: readonly string[],
    auth: AuthToken,
    signal: AbortSignal,
  ): Promise<TransportResult> {
    const res = await this.request(this.completionsUrl(payload, chatId), {
      method: "POST",
      headers: this.headers(auth, payload, "application/json"),
      body: JSON.stringify(toWireBody(payload, chatId, undefined, fileIds)),
    }, signal);
    await assertOk(res);

    const parsed = CompletionResponseSchema.safeParse(await readJson(res, signal));
    if (!parsed.success) {
      throw new DirectTransportError("DirectMalformedResponse", "Completion reply does not match envelope", res.status);
    }

    const content = parsed.data.choices[0].message.content;
    const artifactUrl = typeof content === "string" ? extractUrl(content) : content.image_url;
    if (!artifactUrl) {
      throw new DirectTransportError("DirectMalformedResponse", "Image reply carries no image URL", res.status);
    }

    return {
      text: typeof content === "string" ? content : "",
      artifactUrl,
      sessionId: chatId,
    };
  }

  private completionsUrl(payload: RequestPayload, chatId: string): string {
    const params = new URLSearchParams({ chat_id: chatId });
    if (payload.features.webSearch) params.set("web_search", "true");
    return `${this.baseUrl}/api/v2/chat/completions?${params.toString()}`;
  }

  private headers(auth: AuthToken, payload: RequestPayload, accept: string): Record<string, string> {
    return {
      "Content-Type": "application/json",
      Accept: accept,
      Authorization: `Bearer ${auth.token}`,
      "X-Request-Id": payload.correlationId,
    };
  }

  private async request(url: string, init: RequestInit, signal: AbortSignal): Promise<Response> {
    try {
      return await this.fetchImpl(url, { ...init, signal });
    } catch (err) {
      if (signal.aborted) throw abortError();
      throw new DirectTransportError(
        "DirectServerError",
        `Network failure: ${toError(err).message}`,
        undefined,
        { cause: err },
      );
    }
  }
}


// ═══════════════════════════════════════════════════════════════════════════
// §3  STREAM CONSUMPTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Read SSE lines until a terminal event. Throws DirectMalformedResponse when
 * the stream ends without one. The reader is always cancelled on exit so an
 * early stop releases the connection.
 */
export async function consumeEventStream(
  body: ReadableStream<Uint8Array>,
  assembler: StreamAssembler,
  signal: AbortSignal,
): Promise<void> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let terminated = false;

  try {
    while (!terminated) {
      const { done, value } = await raceAbort(reader.read(), signal);
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split(/\r?\n/);
      buffer = lines.pop() ?? "";

      for (const line of lines) {
        if (consumeLine(line, assembler)) {
          terminated = true;
          break;
        }
      }
    }

    if (!terminated) {
      buffer += decoder.decode();
      if (buffer.trim()) terminated = consumeLine(buffer, assembler);
    }
    if (!terminated) {
      throw new DirectTransportError("DirectMalformedResponse", "Stream ended before a terminal event");
    }
  } finally {
    await reader.cancel().catch(() => undefined);
  }
}

/** Returns true when the line is a terminal event. */
function consumeLine(line: string, assembler: StreamAssembler): boolean {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith(":")) return false;
  if (/^(event|id|retry):/.test(trimmed)) return false;

  const data = trimmed.startsWith("data:") ? trimmed.slice(5).trim() : trimmed;
  if (data === "[DONE]") return true;

  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch (err) {
    throw new DirectTransportError(
      "DirectMalformedResponse",
      `Unparseable stream event: ${data.slice(0, 80)}`,
      undefined,
      { cause: err },
    );
  }

  const parsed = StreamEventSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DirectTransportError("DirectMalformedResponse", "Stream event does not match envelope");
  }

  const event = parsed.data;
  if (event.error) {
    const detail = event.error.message ?? event.error.details ?? event.error.code ?? "unknown error";
    throw new DirectTransportError(classifyStreamError(event.error.code), `Upstream error: ${detail}`);
  }

  const choice = event.choices?.[0];
  const delta = choice?.delta;
  if (delta?.content !== undefined || event.seq !== undefined) {
    assembler.push({
      content: delta?.content ?? "",
      seq: event.seq,
      phase: delta?.phase ?? undefined,
    });
  }

  return Boolean(
    choice?.finish_reason ||
    event.finish_reason ||
    (delta?.status === "finished" && delta.phase !== "think"),
  );
}


// ═══════════════════════════════════════════════════════════════════════════
// §4  UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

async function assertOk(res: Response): Promise<void> {
  if (res.ok) return;
  const errorBody = await res.text().catch(() => "");
  throw new DirectTransportError(
    classifyHttpStatus(res.status),
    `${res.status}: ${errorBody.slice(0, 200)}`,
    res.status,
  );
}

async function readJson(res: Response, signal: AbortSignal): Promise<unknown> {
  try {
    return await res.json();
  } catch (err) {
    if (signal.aborted) throw abortError();
    throw new DirectTransportError("DirectMalformedResponse", "Body is not JSON", res.status, { cause: err });
  }
}

function classifyStreamError(code: string | undefined): DirectFailureKind {
  if (!code) return "DirectServerError";
  if (/rate|limit|throttl/i.test(code)) return "DirectRateLimited";
  if (/unauthori[sz]ed|forbidden|token|login/i.test(code)) return "DirectAuthFailure";
  return "DirectServerError";
}

const URL_PATTERN = /(?:https?:\/\/|blob:)[^\s)"'<>]+/;

function extractUrl(content: string): string | undefined {
  return URL_PATTERN.exec(content)?.[0];
}
