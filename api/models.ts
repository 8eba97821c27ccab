/**
 * api/models.ts
 * GET /api/models           → every configured model
 * GET /api/models?id=<id>   → one model's config, capabilities and recommended use
 */

import type { NextApiRequest, NextApiResponse } from "next";
import { z } from "zod";

import { methodNotAllowed, sendDispatchError } from "../lib/http.js";
import { describeModel } from "../lib/model-registry.js";
import { getRuntime, type Runtime } from "../lib/runtime.js";

const ModelsQuerySchema = z.object({
    id: z.string().min(1).optional(),
});

export default async function handler(req: NextApiRequest, res: NextApiResponse) {
    if (req.method !== "GET") return methodNotAllowed(res, "GET");

    const parsedQuery = ModelsQuerySchema.safeParse(req.query);
    if (!parsedQuery.success) {
        return res.status(400).json({ error: "Invalid query", details: parsedQuery.error.format() });
    }

    let runtime: Runtime;
    try {
        runtime = await getRuntime();
    } catch (err) {
        return sendDispatchError(res, err, undefined, "api/models");
    }
    const { registry, config } = runtime;
    const { id } = parsedQuery.data;

    if (id) {
        if (!registry.has(id)) return res.status(404).json({ error: `Unknown model: ${id}` });
        const info = describeModel(registry.resolve(id));
        return res.status(200).json({
            model_id: id,
            config: info.config,
            capabilities: info.capabilities,
            recommended_use: info.recommendedUse,
        });
    }

    return res.status(200).json({
        default_model: config.defaultModel,
        default_image_model: config.defaultImageModel,
        models: registry.list().map((m) => ({
            id: m.id,
            name: m.displayName,
            category: m.category,
            capabilities: m.capabilities,
        })),
    });
}
