/**
 * api/performance.ts
 * GET /api/performance: direct vs. fallback counters since process start.
 */

import type { NextApiRequest, NextApiResponse } from "next";

import { methodNotAllowed, sendDispatchError } from "../lib/http.js";
import { getRuntime, type Runtime } from "../lib/runtime.js";

export default async function handler(req: NextApiRequest, res: NextApiResponse) {
    if (req.method !== "GET") return methodNotAllowed(res, "GET");

    let runtime: Runtime;
    try {
        runtime = await getRuntime();
    } catch (err) {
        return sendDispatchError(res, err, undefined, "api/performance");
    }
    const { tracker, tokens } = runtime;
    return res.status(200).json({
        ...tracker.snapshot(),
        direct_api_available: tokens.current() !== null,
    });
}
