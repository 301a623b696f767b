import type { Request, RequestHandler } from "express";
import crypto from "node:crypto";
import pool from "../db/connection.js";
import config from "../config.js";
import { AuthError } from "../errors.js";
import { runWithUser } from "../context/user-context.js";

interface CachedToken {
  userId: number;
  expiresAt: number;
  lastAccess: number;
}

const tokenCache = new Map<string, CachedToken>();
const TOKEN_CACHE_TTL = 60_000; // 1 minute
const TOKEN_CACHE_MAX = 1000;

function cacheKey(token: string): string {
  return crypto.createHash("sha256").update(token).digest("hex");
}

export function clearTokenCache(): void {
  tokenCache.clear();
}

/** Drops a token from the cache so a revoked token stops working at once. */
export function forgetToken(token: string): void {
  tokenCache.delete(cacheKey(token));
}

export function extractBearerToken(req: Request): string {
  const authHeader = req.headers.authorization;
  const token = authHeader?.startsWith("Bearer ") ? authHeader.slice(7).trim() : "";
  if (!token) {
    throw new AuthError("Missing or invalid Authorization header");
  }
  return token;
}

/**
 * Authenticates a Bearer token from the request and returns the user ID.
 * Uses a small in-memory cache (1-min TTL, max 1000 entries) to avoid hitting
 * the database on every request. On cache miss, looks the token up in
 * auth_tokens and bumps users.last_login if it is older than an hour.
 *
 * Cache eviction: when full, removes the least recently used 25% of entries
 * instead of clearing everything, so concurrent requests don't all miss at once.
 */
export async function authenticateToken(req: Request): Promise<number> {
  const token = extractBearerToken(req);
  const key = cacheKey(token);

  const cached = tokenCache.get(key);
  if (cached && cached.expiresAt > Date.now()) {
    cached.lastAccess = Date.now();
    return cached.userId;
  }
  if (cached) {
    tokenCache.delete(key);
  }

  const { rows } = await pool.query<{ user_id: number; expires_at: Date }>(
    "SELECT user_id, expires_at FROM auth_tokens WHERE token = $1 AND expires_at > NOW()",
    [token]
  );
  if (rows.length === 0) {
    throw new AuthError("Invalid or expired token");
  }

  const { user_id: userId, expires_at: tokenExpiresAt } = rows[0];

  await pool.query(
    `UPDATE users SET last_login = NOW()
     WHERE id = $1 AND (last_login IS NULL OR last_login < NOW() - INTERVAL '1 hour')`,
    [userId]
  );

  if (tokenCache.size >= TOKEN_CACHE_MAX) {
    const toDelete = Math.floor(TOKEN_CACHE_MAX * 0.25);
    const entries = Array.from(tokenCache.entries())
      .sort((a, b) => a[1].lastAccess - b[1].lastAccess);
    for (let i = 0; i < toDelete && i < entries.length; i++) {
      tokenCache.delete(entries[i][0]);
    }
  }

  const now = Date.now();
  tokenCache.set(key, {
    userId,
    // Never cache past the token's own expiry
    expiresAt: Math.min(now + TOKEN_CACHE_TTL, new Date(tokenExpiresAt).getTime()),
    lastAccess: now,
  });

  return userId;
}

/**
 * Express middleware: authenticates the request and runs the rest of the
 * chain inside the user's context so handlers can call getUserId().
 * DEV_USER_ID bypasses token checks outside production.
 */
export const requireAuth: RequestHandler = (req, _res, next) => {
  const resolveUser = (): Promise<number> => {
    if (config.DEV_USER_ID !== undefined && config.NODE_ENV !== "production") {
      return Promise.resolve(config.DEV_USER_ID);
    }
    return authenticateToken(req);
  };

  resolveUser()
    .then((userId) => runWithUser(userId, () => next()))
    .catch(next);
};
