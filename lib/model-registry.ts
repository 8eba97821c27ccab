/* ============================================================================
   model-registry.ts
   Declarative model table: model id → frozen ModelConfig.

   Category implies every generation default. No model-name matching anywhere;
   an exception for a single model is an `overrides` entry in the seed table.
============================================================================ */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

// ── Types ────────────────────────────────────────────────────────────────

export const MODEL_CATEGORIES = [
  "advanced",
  "coding",
  "reasoning",
  "vision",
  "multimodal",
  "standard",
] as const;

export type ModelCategory = (typeof MODEL_CATEGORIES)[number];

export type OutputSchema = "phase" | "thinking";

export interface ModelCapabilities {
  webSearch: boolean;
  fileUpload: boolean;
  imageGeneration: boolean;
  audioProcessing: boolean;
  thinkingMode: boolean;
}

export interface ModelConfig {
  readonly id: string;
  readonly displayName: string;
  readonly category: ModelCategory;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly thinkingEnabled: boolean;
  readonly outputSchema: OutputSchema;
  readonly capabilities: Readonly<ModelCapabilities>;
}

type CategoryDefaults = Omit<ModelConfig, "id" | "displayName" | "category">;

// ── Category policy ──────────────────────────────────────────────────────

function defaults(
  temperature: number,
  maxTokens: number,
  thinkingEnabled: boolean,
  outputSchema: OutputSchema,
  extra: Partial<Pick<ModelCapabilities, "imageGeneration" | "audioProcessing">> = {},
): CategoryDefaults {
  return {
    temperature,
    maxTokens,
    thinkingEnabled,
    outputSchema,
    capabilities: {
      webSearch: true,
      fileUpload: true,
      imageGeneration: extra.imageGeneration ?? false,
      audioProcessing: extra.audioProcessing ?? false,
      thinkingMode: thinkingEnabled,
    },
  };
}

export const CATEGORY_DEFAULTS: Readonly<Record<ModelCategory, CategoryDefaults>> = {
  advanced:   defaults(0.3, 6144, true,  "phase"),
  coding:     defaults(0.1, 4096, true,  "phase"),
  reasoning:  defaults(0.2, 8192, true,  "thinking"),
  vision:     defaults(0.3, 2048, false, "phase", { imageGeneration: true }),
  multimodal: defaults(0.3, 4096, false, "phase", { audioProcessing: true }),
  standard:   defaults(0.3, 2048, false, "phase"),
};

const RECOMMENDED_USE: Record<ModelCategory, string> = {
  advanced: "High-capability general model for demanding conversational tasks",
  coding: "Ideal for code generation, debugging, and technical documentation",
  reasoning: "Best for complex problem-solving and step-by-step analysis",
  vision: "Optimized for image analysis and visual content understanding",
  multimodal: "Supports text, images, and audio processing",
  standard: "Versatile model for general conversational AI tasks",
};

// ── Seed schema ──────────────────────────────────────────────────────────

const CapabilityOverridesSchema = z.object({
  webSearch: z.boolean(),
  fileUpload: z.boolean(),
  imageGeneration: z.boolean(),
  audioProcessing: z.boolean(),
  thinkingMode: z.boolean(),
}).partial();

export const ModelSeedSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  category: z.enum(MODEL_CATEGORIES),
  overrides: z.object({
    temperature: z.number().min(0).max(1).optional(),
    maxTokens: z.number().int().positive().optional(),
    thinkingEnabled: z.boolean().optional(),
    outputSchema: z.enum(["phase", "thinking"]).optional(),
    capabilities: CapabilityOverridesSchema.optional(),
  }).optional(),
});

export type ModelSeed = z.infer<typeof ModelSeedSchema>;

const ModelSeedTableSchema = z.array(ModelSeedSchema).min(1);

const DEFAULT_SEED_URL = new URL("./data/models.json", import.meta.url);

export function loadModelSeed(source: URL | string = DEFAULT_SEED_URL): ModelSeed[] {
  const raw: unknown = JSON.parse(readFileSync(source, "utf8"));
  return ModelSeedTableSchema.parse(raw);
}

// ── Registry ─────────────────────────────────────────────────────────────

function compose(seed: ModelSeed): ModelConfig {
  const base = CATEGORY_DEFAULTS[seed.category];
  const { capabilities: capabilityOverrides, ...overrides } = seed.overrides ?? {};
  const capabilities = Object.freeze({ ...base.capabilities, ...capabilityOverrides });

  return Object.freeze({
    id: seed.id,
    displayName: seed.name,
    category: seed.category,
    ...base,
    ...overrides,
    capabilities,
  });
}

export class ModelRegistry {
  private readonly models: ReadonlyMap<string, ModelConfig>;

  constructor(seed: readonly ModelSeed[] = loadModelSeed()) {
    const models = new Map<string, ModelConfig>();
    for (const entry of seed) {
      const parsed = ModelSeedSchema.parse(entry);
      if (models.has(parsed.id)) {
        throw new Error(`Duplicate model id in registry seed: ${parsed.id}`);
      }
      models.set(parsed.id, compose(parsed));
    }
    this.models = models;
  }

  resolve(modelId: string): ModelConfig {
    const config = this.models.get(modelId);
    if (!config) throw new ConfigurationError("UnknownModel", `Unknown model: ${modelId}`);
    return config;
  }

  has(modelId: string): boolean {
    return this.models.has(modelId);
  }

  list(): ModelConfig[] {
    return [...this.models.values()];
  }
}

export interface ModelDescription {
  config: ModelConfig;
  capabilities: ModelCapabilities;
  recommendedUse: string;
}

export function describeModel(config: ModelConfig): ModelDescription {
  return {
    config,
    capabilities: { ...config.capabilities },
    recommendedUse: RECOMMENDED_USE[config.category],
  };
}
