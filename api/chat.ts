/**
 * ============================================================================
 * api/chat.ts
 * POST /api/chat: one chat turn through the hybrid dispatch core.
 *
 * Body: { prompt, model_name?, chat_id?, use_web_search?, files? }
 * files: [{ name, content (base64), type? }], dropped for models without uploads
 * ├─ 200  reply, transport used, chat id, timing
 * ├─ 400  invalid body, unknown model, empty prompt
 * ├─ 499  client disconnected before the reply was ready
 * ├─ 500  runtime failed to start (bad environment) or unexpected error
 * └─ 502  direct path and automation fallback both failed
 * ============================================================================
 */

import type { NextApiRequest, NextApiResponse } from "next";
import { z } from "zod";

import { abortOnDisconnect, methodNotAllowed, sendDispatchError, sendDispatchResult } from "../lib/http.js";
import { getRuntime, type Runtime } from "../lib/runtime.js";

const ChatRequestSchema = z.object({
    prompt: z.string(),
    model_name: z.string().min(1).optional(),
    chat_id: z.string().min(1).nullish(),
    use_web_search: z.boolean().default(false),
    files: z.array(z.object({
        name: z.string().min(1),
        content: z.string().base64(),
        type: z.string().min(1).optional(),
    })).max(10).default([]),
});

export default async function handler(req: NextApiRequest, res: NextApiResponse) {
    if (req.method !== "POST") return methodNotAllowed(res, "POST");

    const parsedReq = ChatRequestSchema.safeParse(req.body);
    if (!parsedReq.success) {
        return res.status(400).json({ error: "Invalid payload format", details: parsedReq.error.format() });
    }

    const { prompt, model_name, chat_id, use_web_search, files } = parsedReq.data;
    const disconnect = abortOnDisconnect(res);
    let runtime: Runtime | undefined;

    try {
        runtime = await getRuntime();
        const modelId = model_name ?? runtime.config.defaultModel;
        const result = await runtime.orchestrator.dispatch(prompt, modelId, {
            sessionId: chat_id ?? null,
            webSearch: use_web_search,
            files,
            signal: disconnect.signal,
        });
        return sendDispatchResult(res, result, modelId);
    } catch (err) {
        return sendDispatchError(res, err, runtime?.logger, "api/chat");
    } finally {
        disconnect.dispose();
    }
}
