/* ============================================================================
   dispatch.ts
   Per-request state machine: direct attempt, then at most one fallback.

     Idle ─┬─ valid token ─→ AttemptingDirect ─┬─ ok ──────────→ Success
           │                                   └─ Direct* ─┐
           └─ no token (skip) ─────────────────────────────┴─→ AttemptingFallback
                                                               ├─ ok ──→ Success
                                                               └─ err ─→ Failed

   ├─ §1  Types: collaborators, options, results, transitions
   ├─ §2  Orchestrator: dispatch(), generateImage()
   └─ §3  Completion: tracker update, session write, result shaping

   No retries. The direct client is called at most once per dispatch and the
   fallback at most once. The tracker is only written once a dispatch
   completes, so a caller abort at any point throws DispatchCancelledError and
   leaves the tracker and session store untouched.

   Session ids: the caller's id names the conversation in the store. Only
   upstream chat ids reach the transports; a locally minted id does not, and
   a chat the direct attempt opened before failing is handed to the fallback.
============================================================================ */

import { classifyAutomationError } from "./automation-client.js";
import type { AuthToken, AuthTokenManager } from "./auth-token.js";
import {
  DirectTransportError,
  DispatchCancelledError,
  toError,
  type AutomationFailureKind,
  type DirectFailureKind,
} from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { ModelRegistry } from "./model-registry.js";
import {
  buildPayload,
  type CapabilityWarning,
  type FileAttachment,
  type PayloadKind,
  type RequestPayload,
} from "./payload-builder.js";
import type { PerformanceTracker } from "./performance-tracker.js";
import { isLocalSessionId, newLocalSessionId, type SessionStore } from "./session-store.js";
import type { TransportName, TransportResult } from "./transport.js";


// ═══════════════════════════════════════════════════════════════════════════
// §1  TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface DirectTransport {
  send(payload: RequestPayload, token: AuthToken, timeoutMs: number, signal?: AbortSignal): Promise<TransportResult>;
}

export interface FallbackTransport {
  send(payload: RequestPayload, signal?: AbortSignal): Promise<TransportResult>;
}

export type DispatchState =
  | "Idle"
  | "AttemptingDirect"
  | "AttemptingFallback"
  | "Success"
  | "Failed";

export interface DispatchTransition {
  from: DispatchState;
  to: DispatchState;
  /** Milliseconds since the orchestrator was entered. */
  elapsedMs: number;
  correlationId: string;
  /** Failure kind or skip reason that caused the move, when there is one. */
  reason?: string;
}

export interface DispatchOptions {
  sessionId?: string | null;
  webSearch?: boolean;
  files?: readonly FileAttachment[];
  signal?: AbortSignal;
  onTransition?: (transition: DispatchTransition) => void;
}

export interface DispatchSuccess {
  success: true;
  text: string;
  reasoning?: string;
  artifactUrl?: string;
  transport: TransportName;
  sessionId: string;
  durationMs: number;
  correlationId: string;
  warnings: readonly CapabilityWarning[];
}

export interface DispatchFailure {
  success: false;
  transport: "fallback";
  error: { kind: AutomationFailureKind; message: string };
  durationMs: number;
  correlationId: string;
  warnings: readonly CapabilityWarning[];
}

export type DispatchResult = DispatchSuccess | DispatchFailure;

export interface OrchestratorDeps {
  registry: ModelRegistry;
  tokens: AuthTokenManager;
  direct: DirectTransport;
  fallback: FallbackTransport;
  tracker: PerformanceTracker;
  sessions?: SessionStore;
  logger?: Logger;
  directTimeoutMs: number;
  /** Clock in milliseconds; injectable for deterministic timing. */
  now?: () => number;
}

/** Per-dispatch bookkeeping shared by the completion helpers. */
interface Attempt {
  /** Payload of the current transport; the fallback may get a continued chat id. */
  payload: RequestPayload;
  startedAt: number;
  state: DispatchState;
  options: DispatchOptions;
  /** Why the direct path did not finish the dispatch; counted on completion only. */
  directOutcome: DirectFailureKind | "skipped" | null;
}


// ═══════════════════════════════════════════════════════════════════════════
// §2  ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════════════════

export class DispatchOrchestrator {
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly deps: OrchestratorDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => performance.now());
  }

  dispatch(prompt: string, modelId: string, options: DispatchOptions = {}): Promise<DispatchResult> {
    return this.run("chat", prompt, modelId, options);
  }

  /** Same state machine with an image-generation payload. Web search never applies. */
  generateImage(prompt: string, modelId: string, options: DispatchOptions = {}): Promise<DispatchResult> {
    return this.run("image", prompt, modelId, { ...options, webSearch: false });
  }

  private async run(
    kind: PayloadKind,
    prompt: string,
    modelId: string,
    options: DispatchOptions,
  ): Promise<DispatchResult> {
    const startedAt = this.now();
    const { registry, tokens, direct, fallback, directTimeoutMs } = this.deps;

    // Configuration errors escape here, before any network activity.
    const model = registry.resolve(modelId);
    const requested = options.sessionId ?? null;
    const payload = buildPayload({
      prompt,
      model,
      sessionId: requested && !isLocalSessionId(requested) ? requested : null,
      features: { webSearch: options.webSearch },
      files: options.files,
      kind,
    });

    const attempt: Attempt = { payload, startedAt, state: "Idle", options, directOutcome: null };
    const { correlationId } = payload;
    const { signal } = options;

    if (signal?.aborted) throw this.cancelled(attempt);

    for (const warning of payload.warnings) {
      this.logger.warn("Dispatch", warning.message, { correlationId, capability: warning.capability });
    }

    // ── Direct ──
    const token = tokens.current();
    let directResult: TransportResult | null = null;
    if (token) {
      this.transition(attempt, "AttemptingDirect");
      try {
        directResult = await direct.send(payload, token, directTimeoutMs, signal);
      } catch (err) {
        if (signal?.aborted) throw this.cancelled(attempt);

        const failure = err instanceof DirectTransportError
          ? err
          : new DirectTransportError("DirectServerError", toError(err).message, undefined, { cause: err });

        attempt.directOutcome = failure.kind;
        if (failure.kind === "DirectAuthFailure") tokens.invalidate();
        if (failure.chatId && !payload.sessionId) {
          attempt.payload = { ...payload, sessionId: failure.chatId };
        }

        this.logger.warn("Dispatch", "Direct attempt failed; falling back", {
          correlationId,
          kind: failure.kind,
          status: failure.status,
          chatId: failure.chatId,
          error: failure.message,
          elapsedMs: this.elapsed(attempt),
        });
        this.transition(attempt, "AttemptingFallback", failure.kind);
      }
    } else {
      attempt.directOutcome = "skipped";
      this.logger.info("Dispatch", "No valid token; skipping direct attempt", { correlationId });
      this.transition(attempt, "AttemptingFallback", "no_valid_token");
    }

    if (directResult) {
      if (signal?.aborted) throw this.cancelled(attempt);
      return this.succeed(attempt, "direct", directResult);
    }

    // ── Fallback ──
    let result: TransportResult;
    try {
      result = await fallback.send(attempt.payload, signal);
    } catch (err) {
      if (signal?.aborted) throw this.cancelled(attempt);
      return this.fail(attempt, err);
    }
    if (signal?.aborted) throw this.cancelled(attempt);
    return this.succeed(attempt, "fallback", result);
  }


  // ═════════════════════════════════════════════════════════════════════════
  // §3  COMPLETION
  // ═════════════════════════════════════════════════════════════════════════

  private async succeed(attempt: Attempt, transport: TransportName, result: TransportResult): Promise<DispatchSuccess> {
    const { payload } = attempt;
    const durationMs = this.elapsed(attempt);
    this.track(attempt, transport, durationMs, true);
    this.transition(attempt, "Success");

    const sessionId = await this.persist(payload, transport, result, attempt.options.sessionId ?? null);

    this.logger.info("Dispatch", "Dispatch succeeded", {
      correlationId: payload.correlationId,
      model: payload.model.id,
      transport,
      durationMs,
    });

    return {
      success: true,
      text: result.text,
      ...(result.reasoning !== undefined ? { reasoning: result.reasoning } : {}),
      ...(result.artifactUrl !== undefined ? { artifactUrl: result.artifactUrl } : {}),
      transport,
      sessionId,
      durationMs,
      correlationId: payload.correlationId,
      warnings: payload.warnings,
    };
  }

  private fail(attempt: Attempt, err: unknown): DispatchFailure {
    const { payload } = attempt;
    const failure = classifyAutomationError(err);
    const durationMs = this.elapsed(attempt);
    this.track(attempt, "fallback", durationMs, false);
    this.transition(attempt, "Failed", failure.kind);

    this.logger.error("Dispatch", "Fallback attempt failed", {
      correlationId: payload.correlationId,
      model: payload.model.id,
      kind: failure.kind,
      error: failure.message,
      durationMs,
    });

    return {
      success: false,
      transport: "fallback",
      error: { kind: failure.kind, message: failure.message },
      durationMs,
      correlationId: payload.correlationId,
      warnings: payload.warnings,
    };
  }

  private track(attempt: Attempt, transport: TransportName, durationMs: number, success: boolean): void {
    const { tracker } = this.deps;
    tracker.record(transport, durationMs / 1000, success);
    if (attempt.directOutcome === "skipped") tracker.noteDirectSkip();
    else if (attempt.directOutcome) tracker.noteDirectFailure(attempt.directOutcome);
  }

  /**
   * Session write after a success. Store failures never fail the dispatch.
   * Id order: the caller's, then the transport's chat, then a fresh local one.
   */
  private async persist(
    payload: RequestPayload,
    transport: TransportName,
    result: TransportResult,
    requested: string | null,
  ): Promise<string> {
    let sessionId = requested ?? result.sessionId ?? payload.sessionId;
    const { sessions } = this.deps;
    if (!sessions) return sessionId ?? newLocalSessionId();

    try {
      sessionId = await sessions.ensure(sessionId, { modelId: payload.model.id });
      await sessions.append(sessionId, {
        correlationId: payload.correlationId,
        prompt: payload.prompt,
        reply: result.text,
        ...(result.reasoning !== undefined ? { reasoning: result.reasoning } : {}),
        ...(result.artifactUrl !== undefined ? { artifactUrl: result.artifactUrl } : {}),
        transport,
        modelId: payload.model.id,
      });
    } catch (err) {
      this.logger.warn("Dispatch", "Session store write failed", {
        correlationId: payload.correlationId,
        sessionId,
        error: err,
      });
    }
    return sessionId ?? newLocalSessionId();
  }

  private cancelled(attempt: Attempt): DispatchCancelledError {
    const { correlationId } = attempt.payload;
    this.logger.info("Dispatch", "Dispatch cancelled by caller", {
      correlationId,
      state: attempt.state,
      elapsedMs: this.elapsed(attempt),
    });
    return new DispatchCancelledError(correlationId);
  }

  private transition(attempt: Attempt, to: DispatchState, reason?: string): void {
    const transition: DispatchTransition = {
      from: attempt.state,
      to,
      elapsedMs: this.elapsed(attempt),
      correlationId: attempt.payload.correlationId,
      ...(reason !== undefined ? { reason } : {}),
    };
    attempt.state = to;
    this.logger.debug("Dispatch", `${transition.from} → ${to}`, { ...transition });
    attempt.options.onTransition?.(transition);
  }

  /** Never negative, even when the clock steps back mid-dispatch. */
  private elapsed(attempt: Attempt): number {
    return Math.max(0, this.now() - attempt.startedAt);
  }
}
