/**
 * api/image.ts
 * POST /api/image: image generation through the same dispatch path as chat.
 * Body: { prompt, model_name?, chat_id? }. Status codes match /api/chat.
 */

import type { NextApiRequest, NextApiResponse } from "next";
import { z } from "zod";

import { abortOnDisconnect, methodNotAllowed, sendDispatchError, sendDispatchResult } from "../lib/http.js";
import { getRuntime, type Runtime } from "../lib/runtime.js";

const ImageRequestSchema = z.object({
    prompt: z.string(),
    model_name: z.string().min(1).optional(),
    chat_id: z.string().min(1).nullish(),
});

export default async function handler(req: NextApiRequest, res: NextApiResponse) {
    if (req.method !== "POST") return methodNotAllowed(res, "POST");

    const parsedReq = ImageRequestSchema.safeParse(req.body);
    if (!parsedReq.success) {
        return res.status(400).json({ error: "Invalid payload format", details: parsedReq.error.format() });
    }

    const { prompt, model_name, chat_id } = parsedReq.data;
    const disconnect = abortOnDisconnect(res);
    let runtime: Runtime | undefined;

    try {
        runtime = await getRuntime();
        const modelId = model_name ?? runtime.config.defaultImageModel;
        const result = await runtime.orchestrator.generateImage(prompt, modelId, {
            sessionId: chat_id ?? null,
            signal: disconnect.signal,
        });
        return sendDispatchResult(res, result, modelId);
    } catch (err) {
        return sendDispatchError(res, err, runtime?.logger, "api/image");
    } finally {
        disconnect.dispose();
    }
}
