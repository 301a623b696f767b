import type { Request, Router } from "express";
import crypto from "node:crypto";
import pool from "../db/connection.js";
import config from "../config.js";
import { AuthError, InvalidValueError, RateLimitError } from "../errors.js";
import { asyncRoute, errorCode } from "../helpers/http-response.js";
import { parseBody } from "../helpers/parse-helpers.js";
import { credentialsSchema, hashPassword, validatePassword, verifyPassword } from "../auth/passwords.js";
import { extractBearerToken, forgetToken, requireAuth } from "../auth/middleware.js";
import { getUserId } from "../context/user-context.js";

const USERNAME_TAKEN = "A user with that username already exists.";

// --- Rate limiting (in-memory) ---
const RATE_LIMIT_WINDOW_MS = 60 * 1000;
const rateLimitMap = new Map<string, { count: number; windowStart: number }>();

export function checkRateLimit(key: string, limit: number, now: number = Date.now()): boolean {
  const entry = rateLimitMap.get(key);

  if (!entry || now - entry.windowStart > RATE_LIMIT_WINDOW_MS) {
    rateLimitMap.set(key, { count: 1, windowStart: now });
    return true;
  }

  entry.count++;
  return entry.count <= limit;
}

export function resetRateLimits(): void {
  rateLimitMap.clear();
}

function clientIp(req: Request): string {
  return req.ip || req.socket.remoteAddress || "unknown";
}

// Cleanup stale rate limit entries every 5 minutes
setInterval(() => {
  const now = Date.now();
  for (const [key, entry] of rateLimitMap) {
    if (now - entry.windowStart > RATE_LIMIT_WINDOW_MS) {
      rateLimitMap.delete(key);
    }
  }
}, 5 * 60 * 1000).unref();

// Cleanup expired tokens every 15 minutes
setInterval(() => {
  pool.query("DELETE FROM auth_tokens WHERE expires_at < NOW()").catch((err: unknown) => {
    console.error("[auth] Token cleanup failed:", err instanceof Error ? err.message : err);
  });
}, 15 * 60 * 1000).unref();

export function registerAuthRoutes(router: Router) {
  router.post("/register", asyncRoute(async (req, res) => {
    if (!checkRateLimit(`register:${clientIp(req)}`, 5)) {
      throw new RateLimitError("Rate limit exceeded. Try again later.");
    }

    const { username, password } = parseBody(credentialsSchema, req.body);
    validatePassword(password, username);

    const { rows: existing } = await pool.query(
      "SELECT id FROM users WHERE username = $1",
      [username]
    );
    if (existing.length > 0) {
      throw new InvalidValueError(USERNAME_TAKEN);
    }

    const passwordHash = await hashPassword(password);
    // A concurrent registration can still win between the check and the insert
    const { rows: [user] } = await pool
      .query<{ id: number; username: string }>(
        "INSERT INTO users (username, password_hash) VALUES ($1, $2) RETURNING id, username",
        [username, passwordHash]
      )
      .catch((err: unknown) => {
        if (errorCode(err) === "23505") throw new InvalidValueError(USERNAME_TAKEN);
        throw err;
      });

    console.log(`[auth] Registered user ${user.id}`);
    res.status(201).json({ id: user.id, username: user.username });
  }));

  router.post("/token", asyncRoute(async (req, res) => {
    if (!checkRateLimit(`token:${clientIp(req)}`, 10)) {
      throw new RateLimitError("Rate limit exceeded. Try again later.");
    }

    const { username, password } = parseBody(credentialsSchema, req.body);

    const { rows } = await pool.query<{ id: number; password_hash: string }>(
      "SELECT id, password_hash FROM users WHERE username = $1",
      [username]
    );
    const user = rows[0];
    if (!user || !(await verifyPassword(password, user.password_hash))) {
      throw new AuthError("No active account found with the given credentials");
    }

    const token = crypto.randomBytes(32).toString("base64url");
    const expiresIn = config.TOKEN_TTL_HOURS * 3600;
    await pool.query(
      "INSERT INTO auth_tokens (token, user_id, expires_at) VALUES ($1, $2, NOW() + make_interval(secs => $3))",
      [token, user.id, expiresIn]
    );

    res.json({ access_token: token, token_type: "Bearer", expires_in: expiresIn });
  }));

  // Revokes the token the request was made with
  router.delete("/token", requireAuth, asyncRoute(async (req, res) => {
    const token = extractBearerToken(req);
    await pool.query("DELETE FROM auth_tokens WHERE token = $1 AND user_id = $2", [token, getUserId()]);
    forgetToken(token);
    res.status(204).end();
  }));
}
