/**
 * wire.ts
 * Zod schemas for the upstream chat service envelopes.
 *
 * Only the fields the direct client reads are declared; everything else passes
 * through untouched so upstream additions do not break parsing.
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// §1  CHAT CREATION  (POST /api/v2/chats/new)
// ═══════════════════════════════════════════════════════════════════════════

export const NewChatResponseSchema = z.object({
    success: z.boolean().optional(),
    data: z.object({
        id: z.string().min(1),
    }).passthrough(),
}).passthrough();

/** POST /api/v2/files/upload */
export const FileUploadResponseSchema = z.object({
    data: z.object({
        file_id: z.string().min(1),
    }).passthrough(),
}).passthrough();

// ═══════════════════════════════════════════════════════════════════════════
// §2  STREAMED COMPLETION EVENTS  (data: {...} lines)
// ═══════════════════════════════════════════════════════════════════════════

export const StreamErrorSchema = z.object({
    code: z.string().optional(),
    message: z.string().optional(),
    details: z.string().optional(),
}).passthrough();

export const StreamDeltaSchema = z.object({
    role: z.string().optional(),
    content: z.string().optional(),
    /** "think" while the model reasons, "answer" afterwards. */
    phase: z.string().nullish(),
    /** "finished" on the closing delta of a phase. */
    status: z.string().nullish(),
}).passthrough();

export const StreamEventSchema = z.object({
    /** Monotonic fragment marker; absent on upstreams that do not number events. */
    seq: z.number().int().optional(),
    choices: z.array(z.object({
        delta: StreamDeltaSchema.optional(),
        finish_reason: z.string().nullish(),
    }).passthrough()).optional(),
    finish_reason: z.string().nullish(),
    error: StreamErrorSchema.optional(),
}).passthrough();

export type StreamEvent = z.infer<typeof StreamEventSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// §3  NON-STREAMED COMPLETION  (image generation)
// ═══════════════════════════════════════════════════════════════════════════

const CompletionBodySchema = z.object({
    choices: z.array(z.object({
        message: z.object({
            content: z.union([
                z.string(),
                z.object({ image_url: z.string() }).passthrough(),
            ]),
        }).passthrough(),
    }).passthrough()).min(1),
}).passthrough();

/** The service answers either bare or wrapped as `{ success, data }`. */
export const CompletionResponseSchema = z.union([
    CompletionBodySchema,
    z.object({ success: z.boolean().optional(), data: CompletionBodySchema }).passthrough()
        .transform((wrapped) => wrapped.data),
]);

export type CompletionResponse = z.infer<typeof CompletionResponseSchema>;
