/* ============================================================================
   http.ts
   Shared pieces of the API routes: disconnect handling and the mapping from
   dispatch outcomes to HTTP status codes.

     success                     → 200
     ConfigurationError          → 400
     terminal fallback failure   → 502
     caller disconnected         → 499
     anything else               → 500
============================================================================ */

import type { NextApiResponse } from "next";
import type { DispatchResult } from "./dispatch.js";
import { ConfigurationError, DispatchCancelledError, toError } from "./errors.js";
import { Logger } from "./logger.js";

export const STATUS_CLIENT_CLOSED = 499;

/** Used when the runtime, and with it the configured logger, failed to start. */
const bootLogger = new Logger("error");

/**
 * Signal that fires when the client goes away before the response is written.
 * Listens on the response: the request's own "close" fires as soon as its body
 * has been read.
 */
export function abortOnDisconnect(res: NextApiResponse): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onClose = () => {
    if (!res.writableFinished) controller.abort();
  };
  res.on("close", onClose);
  return {
    signal: controller.signal,
    dispose: () => res.off("close", onClose),
  };
}

export function sendDispatchResult(res: NextApiResponse, result: DispatchResult, modelId: string): void {
  if (result.success) {
    res.status(200).json({
      success: true,
      response: result.text,
      ...(result.reasoning !== undefined ? { reasoning: result.reasoning } : {}),
      ...(result.artifactUrl !== undefined ? { image_url: result.artifactUrl } : {}),
      chat_id: result.sessionId,
      model: modelId,
      transport: result.transport,
      duration_ms: result.durationMs,
      correlation_id: result.correlationId,
      warnings: result.warnings,
    });
    return;
  }

  res.status(502).json({
    success: false,
    error: result.error,
    model: modelId,
    transport: result.transport,
    duration_ms: result.durationMs,
    correlation_id: result.correlationId,
    warnings: result.warnings,
  });
}

export function sendDispatchError(
  res: NextApiResponse,
  err: unknown,
  logger: Logger | undefined,
  context: string,
): void {
  if (err instanceof ConfigurationError) {
    res.status(400).json({ success: false, error: { kind: err.kind, message: err.message } });
    return;
  }
  if (err instanceof DispatchCancelledError) {
    res.status(STATUS_CLIENT_CLOSED).json({
      success: false,
      error: { kind: "Cancelled", message: err.message },
      correlation_id: err.correlationId,
    });
    return;
  }

  const error = toError(err);
  (logger ?? bootLogger).error(context, "Unhandled dispatch error", { error });
  res.status(500).json({ success: false, error: { kind: "InternalError", message: error.message } });
}

export function methodNotAllowed(res: NextApiResponse, allowed: string): void {
  res.setHeader("Allow", allowed);
  res.status(405).json({ error: "Method not allowed" });
}
