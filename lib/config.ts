// ============================================================================
// CONFIGURATION
// Environment → validated, typed settings. Nothing else reads process.env.
// ============================================================================

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_BASE_URL } from './direct-client.js';
import type { LogLevel } from './logger.js';

/** Unset and empty are the same thing in a .env file. */
const blankToUndefined = (value: unknown) => (value === '' ? undefined : value);

const optionalString = z.preprocess(blankToUndefined, z.string().min(1).optional());

const millis = (fallback: number) =>
    z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const EnvSchema = z.object({
    CHAT_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_BASE_URL)),
    CHAT_AUTH_TOKEN: optionalString,
    CHAT_STORAGE_STATE_PATH: optionalString,
    DIRECT_TIMEOUT_MS: millis(20_000),
    AUTOMATION_TIMEOUT_MS: millis(120_000),
    AUTOMATION_POOL_SIZE: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(16).default(2)),
    DEFAULT_MODEL: z.preprocess(blankToUndefined, z.string().default('qwen3-235b-a22b')),
    DEFAULT_IMAGE_MODEL: z.preprocess(blankToUndefined, z.string().default('qwen-vl-max-latest')),
    SUPABASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
    SUPABASE_SERVICE_ROLE_KEY: optionalString,
    LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(['debug', 'info', 'warn', 'error']).default('info')),
});

export interface AppConfig {
    baseUrl: string;
    authToken?: string;
    storageStatePath?: string;
    directTimeoutMs: number;
    automationTimeoutMs: number;
    automationPoolSize: number;
    defaultModel: string;
    defaultImageModel: string;
    /** Null unless both URL and key are set. */
    supabase: { url: string; serviceRoleKey: string } | null;
    logLevel: LogLevel;
}

/** Plain variable map; `process.env` is one. */
export type EnvSource = Record<string, string | undefined>;

export class ConfigValidationError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid environment: ${issues.join('; ')}`);
        this.name = 'ConfigValidationError';
    }
}

export function loadConfig(env: EnvSource = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigValidationError(
            parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        );
    }

    const e = parsed.data;
    return {
        baseUrl: e.CHAT_BASE_URL,
        ...(e.CHAT_AUTH_TOKEN ? { authToken: e.CHAT_AUTH_TOKEN } : {}),
        ...(e.CHAT_STORAGE_STATE_PATH ? { storageStatePath: e.CHAT_STORAGE_STATE_PATH } : {}),
        directTimeoutMs: e.DIRECT_TIMEOUT_MS,
        automationTimeoutMs: e.AUTOMATION_TIMEOUT_MS,
        automationPoolSize: e.AUTOMATION_POOL_SIZE,
        defaultModel: e.DEFAULT_MODEL,
        defaultImageModel: e.DEFAULT_IMAGE_MODEL,
        supabase: e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
            ? { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY }
            : null,
        logLevel: e.LOG_LEVEL,
    };
}

let envFilesLoaded = false;

/** Reads .env.local then .env into process.env once. Existing variables win. */
export function loadEnvFiles(): void {
    if (envFilesLoaded) return;
    dotenv.config({ path: '.env.local' });
    dotenv.config();
    envFilesLoaded = true;
}
