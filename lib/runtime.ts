/* ============================================================================
   runtime.ts
   Composition root. Builds the process-wide collaborators once and hands the
   same instances to every route: one token manager, one tracker, one page pool.
============================================================================ */

import { createClient } from "@supabase/supabase-js";
import { createTokenManager, type AuthTokenManager } from "./auth-token.js";
import {
  AutomationFallbackClient,
  UnavailableAutomationDriver,
  type AutomationDriver,
} from "./automation-client.js";
import { loadConfig, loadEnvFiles, type AppConfig, type EnvSource } from "./config.js";
import { DirectApiClient, type FetchLike } from "./direct-client.js";
import { DispatchOrchestrator } from "./dispatch.js";
import { Logger } from "./logger.js";
import { ModelRegistry } from "./model-registry.js";
import { PerformanceTracker } from "./performance-tracker.js";
import { InMemorySessionStore, SupabaseSessionStore, type SessionStore } from "./session-store.js";

export interface Runtime {
  config: AppConfig;
  logger: Logger;
  registry: ModelRegistry;
  tokens: AuthTokenManager;
  tracker: PerformanceTracker;
  sessions: SessionStore;
  orchestrator: DispatchOrchestrator;
}

export interface RuntimeOverrides {
  env?: EnvSource;
  logger?: Logger;
  fetch?: FetchLike;
  automationDriver?: AutomationDriver;
  sessions?: SessionStore;
}

export async function createRuntime(overrides: RuntimeOverrides = {}): Promise<Runtime> {
  const config = loadConfig(overrides.env ?? process.env);
  const logger = overrides.logger ?? new Logger(config.logLevel);
  const registry = new ModelRegistry();

  const tokens = await createTokenManager({
    token: config.authToken,
    storageStatePath: config.storageStatePath,
    origin: config.baseUrl,
    logger,
  });

  const sessions = overrides.sessions ?? createSessionStore(config, logger);
  const tracker = new PerformanceTracker();

  const orchestrator = new DispatchOrchestrator({
    registry,
    tokens,
    direct: new DirectApiClient({ baseUrl: config.baseUrl, fetch: overrides.fetch, logger }),
    fallback: new AutomationFallbackClient({
      driver: overrides.automationDriver ?? new UnavailableAutomationDriver(),
      timeoutMs: config.automationTimeoutMs,
      poolSize: config.automationPoolSize,
      logger,
    }),
    tracker,
    sessions,
    logger,
    directTimeoutMs: config.directTimeoutMs,
  });

  logger.info("Runtime", "Dispatch core ready", {
    models: registry.list().length,
    directApiAvailable: tokens.current() !== null,
    sessionStore: config.supabase ? "supabase" : "memory",
    directTimeoutMs: config.directTimeoutMs,
    automationPoolSize: config.automationPoolSize,
  });

  return { config, logger, registry, tokens, tracker, sessions, orchestrator };
}

function createSessionStore(config: AppConfig, logger: Logger): SessionStore {
  if (!config.supabase) {
    logger.info("Runtime", "Supabase not configured; sessions kept in memory");
    return new InMemorySessionStore();
  }
  const client = createClient(config.supabase.url, config.supabase.serviceRoleKey, {
    auth: { persistSession: false },
  });
  return new SupabaseSessionStore(client);
}

// ── Process singleton ────────────────────────────────────────────────────

let current: Promise<Runtime> | null = null;

export function getRuntime(): Promise<Runtime> {
  if (!current) {
    loadEnvFiles();
    current = createRuntime();
    // A failed start must not stick; the next request tries again.
    void current.catch(() => { current = null; });
  }
  return current;
}

/** Replace the process runtime, e.g. to wire a real automation driver at startup. */
export function configureRuntime(overrides: RuntimeOverrides): Promise<Runtime> {
  current = createRuntime(overrides);
  return current;
}

export function resetRuntime(): void {
  current = null;
}
