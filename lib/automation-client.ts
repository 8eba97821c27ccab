/* ============================================================================
   automation-client.ts
   Fallback path: drives the service's web UI through an AutomationDriver.

   The driver owns the browser engine (pages, selectors, typing, scraping).
   This client owns everything around it: a bounded page pool, the timeout,
   and mapping whatever the driver throws onto the three Automation* kinds.
============================================================================ */

import { AutomationError, isAbortError, toError, type AutomationFailureKind } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { FileAttachment, PayloadKind, RequestPayload } from "./payload-builder.js";
import { abortError, raceAbort, type TransportResult } from "./transport.js";

export const DEFAULT_POOL_SIZE = 2;

export interface AutomationJob {
  kind: PayloadKind;
  prompt: string;
  modelId: string;
  sessionId: string | null;
  webSearch: boolean;
  /** Attached through the page's upload control before the prompt is sent. */
  files: readonly FileAttachment[];
  correlationId: string;
}

export interface AutomationOutcome {
  text: string;
  artifactUrl?: string;
  sessionId?: string;
}

export interface AutomationDriver {
  /** Must stop work when `signal` fires; the client stops waiting regardless. */
  run(job: AutomationJob, signal: AbortSignal): Promise<AutomationOutcome>;
}

/** Default driver when no browser engine is wired in. Every job crashes. */
export class UnavailableAutomationDriver implements AutomationDriver {
  async run(): Promise<AutomationOutcome> {
    throw new AutomationError("AutomationCrashed", "No automation driver configured");
  }
}

// ── Page pool ────────────────────────────────────────────────────────────

/**
 * At most `size` jobs hold a page at once; the rest wait in FIFO order.
 * A waiter whose signal fires leaves the queue without taking a slot.
 */
export class PagePool {
  private readonly waiting: (() => void)[] = [];
  private active = 0;

  constructor(private readonly size: number) {
    if (!Number.isInteger(size) || size < 1) throw new RangeError(`Pool size must be a positive integer, got ${size}`);
  }

  async run<T>(task: () => Promise<T>, signal: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get queueLength(): number {
    return this.waiting.length;
  }

  private acquire(signal: AbortSignal): Promise<void> {
    if (signal.aborted) return Promise.reject(abortError());
    if (this.active < this.size) {
      this.active++;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const grant = () => {
        signal.removeEventListener("abort", onAbort);
        this.active++;
        resolve();
      };
      const onAbort = () => {
        const index = this.waiting.indexOf(grant);
        if (index >= 0) this.waiting.splice(index, 1);
        reject(abortError());
      };
      this.waiting.push(grant);
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  private release(): void {
    this.active--;
    this.waiting.shift()?.();
  }
}

// ── Client ───────────────────────────────────────────────────────────────

export interface AutomationClientOptions {
  driver: AutomationDriver;
  timeoutMs: number;
  poolSize?: number;
  logger?: Logger;
}

export class AutomationFallbackClient {
  private readonly driver: AutomationDriver;
  private readonly timeoutMs: number;
  private readonly pool: PagePool;
  private readonly logger: Logger;

  constructor(options: AutomationClientOptions) {
    this.driver = options.driver;
    this.timeoutMs = options.timeoutMs;
    this.pool = new PagePool(options.poolSize ?? DEFAULT_POOL_SIZE);
    this.logger = options.logger ?? silentLogger;
  }

  /** Timeout covers the wait for a page as well as the run itself. */
  async send(payload: RequestPayload, signal?: AbortSignal): Promise<TransportResult> {
    if (signal?.aborted) throw abortError();

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    signal?.addEventListener("abort", onCallerAbort, { once: true });

    const job: AutomationJob = {
      kind: payload.kind,
      prompt: payload.prompt,
      modelId: payload.model.id,
      sessionId: payload.sessionId,
      webSearch: payload.features.webSearch === true,
      files: payload.files,
      correlationId: payload.correlationId,
    };

    try {
      const outcome = await this.pool.run(
        () => raceAbort(this.driver.run(job, controller.signal), controller.signal),
        controller.signal,
      );

      if (job.kind === "chat" && !outcome.text.trim()) {
        throw new AutomationError("AutomationElementNotFound", "Reply element was empty");
      }
      if (job.kind === "image" && !outcome.artifactUrl) {
        throw new AutomationError("AutomationElementNotFound", "No generated image found on the page");
      }

      this.logger.debug("AutomationClient", "Job complete", {
        correlationId: job.correlationId,
        chars: outcome.text.length,
      });

      return {
        text: outcome.text,
        ...(outcome.artifactUrl ? { artifactUrl: outcome.artifactUrl } : {}),
        ...(outcome.sessionId ? { sessionId: outcome.sessionId } : {}),
      };
    } catch (err) {
      if (timedOut) {
        throw new AutomationError("AutomationTimeout", `No reply within ${this.timeoutMs}ms`, { cause: err });
      }
      if (signal?.aborted) throw abortError();
      throw classifyAutomationError(err);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onCallerAbort);
    }
  }
}

// ── Classification ───────────────────────────────────────────────────────

export function classifyAutomationError(err: unknown): AutomationError {
  if (err instanceof AutomationError) return err;

  const error = toError(err);
  const kind: AutomationFailureKind =
    error.name === "TimeoutError" || isAbortError(error) ? "AutomationTimeout"
      : /selector|locator|element|not found/i.test(error.message) ? "AutomationElementNotFound"
        : "AutomationCrashed";

  return new AutomationError(kind, error.message, { cause: err });
}
