// Shapes shared by both transports. Neither leaks wire formats past this point.

export type TransportName = "direct" | "fallback";

export interface TransportResult {
  /** Reassembled reply text. */
  text: string;
  /** Thinking-phase trace, for models that stream one. */
  reasoning?: string;
  /** Generated image or other artifact. */
  artifactUrl?: string;
  /** Conversation id the transport actually used, when it knows one. */
  sessionId?: string;
}

export function abortError(): DOMException {
  return new DOMException("Aborted", "AbortError");
}

/**
 * Settle with `promise`, or reject with an AbortError as soon as `signal`
 * fires. The underlying work is not stopped; callers cancel it themselves.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortError());
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });
    void promise
      .then(resolve, reject)
      .finally(() => signal.removeEventListener("abort", onAbort));
  });
}
