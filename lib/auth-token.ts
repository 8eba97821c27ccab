/* ============================================================================
   auth-token.ts
   Holds the bearer credential for the direct path.

   The manager never refreshes on its own. A refresh is an external call to
   replace(); a 401/403 on the direct path calls invalidate(). While no valid
   token is held, the orchestrator skips the direct attempt entirely.
============================================================================ */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { Logger } from "./logger.js";

export interface AuthToken {
  readonly token: string;
  /** Epoch milliseconds. Infinity when the credential carries no expiry. */
  readonly expiresAt: number;
  readonly subject: string;
}

export class AuthTokenManager {
  private held: AuthToken | null;

  constructor(
    initial: AuthToken | null = null,
    private readonly now: () => number = Date.now,
  ) {
    this.held = initial;
  }

  /** The held token, or null when missing or expired. */
  current(): AuthToken | null {
    if (!this.held) return null;
    if (this.held.expiresAt <= this.now()) return null;
    return this.held;
  }

  invalidate(): void {
    if (!this.held) return;
    this.held = { ...this.held, expiresAt: Math.min(this.held.expiresAt, this.now()) };
  }

  replace(token: AuthToken | null): void {
    this.held = token;
  }

  static fromJwt(jwt: string, now?: () => number): AuthTokenManager {
    return new AuthTokenManager(tokenFromJwt(jwt), now);
  }
}

// ── JWT claims ───────────────────────────────────────────────────────────

const JwtClaimsSchema = z.object({
  exp: z.number().optional(),
  id: z.string().optional(),
  sub: z.string().optional(),
}).passthrough();

/**
 * Read expiry and subject from a JWT without verifying it. Verification is the
 * upstream service's job; this only decides whether sending it is pointless.
 */
export function tokenFromJwt(jwt: string): AuthToken {
  const segments = jwt.split(".");
  if (segments.length !== 3) throw new Error("Token is not a JWT");

  const decoded: unknown = JSON.parse(Buffer.from(segments[1], "base64url").toString("utf8"));
  const claims = JwtClaimsSchema.parse(decoded);

  return {
    token: jwt,
    expiresAt: claims.exp !== undefined ? claims.exp * 1000 : Number.POSITIVE_INFINITY,
    subject: claims.id ?? claims.sub ?? "unknown",
  };
}

// ── Browser storage state ────────────────────────────────────────────────

const StorageStateSchema = z.object({
  origins: z.array(z.object({
    origin: z.string(),
    localStorage: z.array(z.object({ name: z.string(), value: z.string() })).default([]),
  })).default([]),
});

/**
 * Pull the `token` localStorage entry for `origin` out of an exported browser
 * storage-state file. Returns null when the file has no such entry.
 */
export async function loadStorageStateToken(path: string, origin: string): Promise<string | null> {
  const raw: unknown = JSON.parse(await readFile(path, "utf8"));
  const state = StorageStateSchema.parse(raw);
  const entry = state.origins
    .find((o) => o.origin === origin)
    ?.localStorage.find((item) => item.name === "token");
  return entry?.value ?? null;
}

export interface TokenSourceOptions {
  token?: string;
  storageStatePath?: string;
  origin: string;
  logger: Logger;
}

/**
 * Build the manager from configuration. A bad or missing credential yields an
 * empty manager; the process keeps serving through automation.
 */
export async function createTokenManager(options: TokenSourceOptions): Promise<AuthTokenManager> {
  const { logger } = options;
  try {
    let jwt = options.token ?? null;
    if (!jwt && options.storageStatePath) {
      jwt = await loadStorageStateToken(options.storageStatePath, options.origin);
    }
    if (!jwt) {
      logger.warn("AuthToken", "No bearer token configured; direct path disabled");
      return new AuthTokenManager();
    }
    const token = tokenFromJwt(jwt);
    logger.info("AuthToken", "Bearer token loaded", {
      subject: token.subject,
      expiresAt: Number.isFinite(token.expiresAt) ? new Date(token.expiresAt).toISOString() : null,
    });
    return new AuthTokenManager(token);
  } catch (err) {
    logger.error("AuthToken", "Failed to load bearer token; direct path disabled", { error: err });
    return new AuthTokenManager();
  }
}
