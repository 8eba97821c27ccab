/* ============================================================================
   errors.ts
   Dispatch error taxonomy.

   ├─ Configuration  : caller error, thrown before any network activity
   ├─ Direct*        : direct-path failures, always absorbed by the orchestrator
   ├─ Automation*    : fallback-path failures, terminal
   └─ Cancellation   : caller aborted; never recorded in metrics
============================================================================ */

export type ConfigurationErrorKind = "UnknownModel" | "EmptyPrompt";

export type DirectFailureKind =
  | "DirectTimeout"
  | "DirectAuthFailure"
  | "DirectRateLimited"
  | "DirectServerError"
  | "DirectMalformedResponse"
  | "StreamReorderDetected";

export type AutomationFailureKind =
  | "AutomationTimeout"
  | "AutomationElementNotFound"
  | "AutomationCrashed";

export type DispatchErrorKind =
  | ConfigurationErrorKind
  | DirectFailureKind
  | AutomationFailureKind
  | "SessionStoreFailure";

export class DispatchError extends Error {
  constructor(
    public readonly kind: DispatchErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DispatchError";
  }
}

export class ConfigurationError extends DispatchError {
  declare readonly kind: ConfigurationErrorKind;

  constructor(kind: ConfigurationErrorKind, message: string) {
    super(kind, message);
    this.name = "ConfigurationError";
  }
}

export class DirectTransportError extends DispatchError {
  declare readonly kind: DirectFailureKind;
  /** Upstream chat opened by the failed attempt, so the fallback can continue it. */
  chatId?: string;

  constructor(
    kind: DirectFailureKind,
    message: string,
    /** HTTP status when the failure came from a response. */
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(kind, `[direct] ${message}`, options);
    this.name = "DirectTransportError";
  }
}

export class AutomationError extends DispatchError {
  declare readonly kind: AutomationFailureKind;

  constructor(kind: AutomationFailureKind, message: string, options?: { cause?: unknown }) {
    super(kind, `[automation] ${message}`, options);
    this.name = "AutomationError";
  }
}

export class SessionStoreError extends DispatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SessionStoreFailure", message, options);
    this.name = "SessionStoreError";
  }
}

export class DispatchCancelledError extends Error {
  constructor(public readonly correlationId: string) {
    super(`Dispatch ${correlationId} cancelled by caller`);
    this.name = "DispatchCancelledError";
  }
}

// ── Classification ───────────────────────────────────────────────────────

export function classifyHttpStatus(status: number): DirectFailureKind {
  if (status === 401 || status === 403) return "DirectAuthFailure";
  if (status === 429) return "DirectRateLimited";
  if (status >= 500) return "DirectServerError";
  return "DirectMalformedResponse";
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
