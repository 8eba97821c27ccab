/* ============================================================================
   payload-builder.ts
   (ModelConfig, prompt, session, requested features) → RequestPayload.

   Pure data composition. Category-specific fields come from the tables below,
   keyed by category only. Unsupported features are dropped with a warning.
============================================================================ */

import { randomUUID } from "node:crypto";
import { ConfigurationError } from "./errors.js";
import type { ModelCategory, ModelConfig } from "./model-registry.js";

export type PayloadKind = "chat" | "image";

export interface FeatureFlags {
  webSearch?: boolean;
}

/** A file sent with the prompt; `content` is base64. */
export interface FileAttachment {
  name: string;
  content: string;
  /** Upstream file type hint; "auto" lets the service detect it. */
  type?: string;
}

export interface CapabilityWarning {
  code: "capability_mismatch";
  capability: "webSearch" | "imageGeneration" | "fileUpload";
  message: string;
}

export type CategoryExtras = Readonly<Record<string, boolean | number>>;

export interface RequestPayload {
  readonly kind: PayloadKind;
  readonly prompt: string;
  readonly model: ModelConfig;
  readonly sessionId: string | null;
  /** Only features the model can actually serve are present. */
  readonly features: { readonly webSearch?: true };
  /** Empty when none were given or the model takes no uploads. */
  readonly files: readonly FileAttachment[];
  /** Category fields sent alongside the request (e.g. code_mode). */
  readonly extras: CategoryExtras;
  /** Category flags merged into the message feature_config. */
  readonly featureConfig: CategoryExtras;
  readonly correlationId: string;
  readonly warnings: readonly CapabilityWarning[];
}

export interface BuildPayloadInput {
  prompt: string;
  model: ModelConfig;
  sessionId?: string | null;
  features?: FeatureFlags;
  kind?: PayloadKind;
  files?: readonly FileAttachment[];
  /** Injected for deterministic tests. */
  correlationId?: string;
}

// ── Category tables ──────────────────────────────────────────────────────

const CATEGORY_EXTRAS: Record<ModelCategory, CategoryExtras> = {
  reasoning:  { reasoning_mode: true, max_reasoning_steps: 10 },
  coding:     { code_mode: true, syntax_highlighting: true },
  vision:     { multimodal: true, vision_enabled: true },
  multimodal: { multimodal: true },
  advanced:   {},
  standard:   {},
};

const CATEGORY_FEATURE_CONFIG: Record<ModelCategory, CategoryExtras> = {
  reasoning:  { step_by_step: true },
  coding:     { code_completion: true },
  vision:     { vision_enabled: true },
  multimodal: { multimodal: true },
  advanced:   { advanced_reasoning: true },
  standard:   {},
};

// ── Builder ──────────────────────────────────────────────────────────────

export function buildPayload(input: BuildPayloadInput): RequestPayload {
  const { model } = input;
  const kind = input.kind ?? "chat";
  const { prompt } = input;
  if (!prompt.trim()) throw new ConfigurationError("EmptyPrompt", "Prompt must not be empty");

  const warnings: CapabilityWarning[] = [];
  const features: { webSearch?: true } = {};

  if (input.features?.webSearch) {
    if (model.capabilities.webSearch) {
      features.webSearch = true;
    } else {
      warnings.push({
        code: "capability_mismatch",
        capability: "webSearch",
        message: `Model ${model.id} does not support web search; request sent without it`,
      });
    }
  }

  let files = input.files ?? [];
  if (files.length > 0 && !model.capabilities.fileUpload) {
    warnings.push({
      code: "capability_mismatch",
      capability: "fileUpload",
      message: `Model ${model.id} does not accept file uploads; ${files.length} file(s) dropped`,
    });
    files = [];
  }

  if (kind === "image" && !model.capabilities.imageGeneration) {
    warnings.push({
      code: "capability_mismatch",
      capability: "imageGeneration",
      message: `Model ${model.id} is not marked for image generation; attempting anyway`,
    });
  }

  return {
    kind,
    prompt,
    model,
    sessionId: input.sessionId ?? null,
    features,
    files,
    extras: CATEGORY_EXTRAS[model.category],
    featureConfig: CATEGORY_FEATURE_CONFIG[model.category],
    correlationId: input.correlationId ?? randomUUID(),
    warnings,
  };
}
