import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Request, Response } from "express";

const { mockQuery, mockConfig } = vi.hoisted(() => ({
  mockQuery: vi.fn(),
  mockConfig: { NODE_ENV: "test", DEV_USER_ID: undefined as number | undefined },
}));

vi.mock("../../db/connection.js", () => ({
  default: { query: mockQuery },
}));

vi.mock("../../config.js", () => ({
  default: mockConfig,
}));

import { authenticateToken, clearTokenCache, forgetToken, requireAuth } from "../middleware.js";
import { getUserId } from "../../context/user-context.js";
import { AuthError } from "../../errors.js";

function request(authorization?: string): Request {
  return { headers: authorization ? { authorization } : {} } as unknown as Request;
}

function tokenRow(userId: number, expiresInMs = 3_600_000) {
  return { rows: [{ user_id: userId, expires_at: new Date(Date.now() + expiresInMs) }] };
}

describe("authenticateToken", () => {
  beforeEach(() => {
    clearTokenCache();
    mockQuery.mockReset();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("rejects a request without a bearer token", async () => {
    await expect(authenticateToken(request())).rejects.toThrow("Missing or invalid Authorization header");
    await expect(authenticateToken(request("Basic dXNlcg=="))).rejects.toBeInstanceOf(AuthError);
    expect(mockQuery).not.toHaveBeenCalled();
  });

  it("rejects an unknown or expired token", async () => {
    mockQuery.mockResolvedValueOnce({ rows: [] });

    await expect(authenticateToken(request("Bearer tok-unknown"))).rejects.toThrow("Invalid or expired token");
  });

  it("returns the token's user and caches the lookup", async () => {
    mockQuery.mockResolvedValueOnce(tokenRow(4)).mockResolvedValueOnce({ rows: [], rowCount: 0 });

    expect(await authenticateToken(request("Bearer tok-1"))).toBe(4);
    expect(await authenticateToken(request("Bearer tok-1"))).toBe(4);

    expect(mockQuery).toHaveBeenCalledTimes(2);
    expect(mockQuery).toHaveBeenNthCalledWith(1, expect.stringContaining("FROM auth_tokens"), ["tok-1"]);
    expect(mockQuery).toHaveBeenNthCalledWith(2, expect.stringContaining("UPDATE users SET last_login"), [4]);
  });

  it("looks the token up again once it is forgotten", async () => {
    mockQuery.mockResolvedValueOnce(tokenRow(4)).mockResolvedValueOnce({ rows: [] });
    await authenticateToken(request("Bearer tok-1"));

    forgetToken("tok-1");
    mockQuery.mockResolvedValueOnce({ rows: [] });

    await expect(authenticateToken(request("Bearer tok-1"))).rejects.toBeInstanceOf(AuthError);
  });

  it("does not serve a token from cache past its expiry", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-03-10T12:00:00Z"));
    mockQuery.mockResolvedValueOnce(tokenRow(4, 5_000)).mockResolvedValueOnce({ rows: [] });
    await authenticateToken(request("Bearer tok-1"));

    vi.setSystemTime(new Date("2026-03-10T12:00:06Z"));
    mockQuery.mockResolvedValueOnce({ rows: [] });

    await expect(authenticateToken(request("Bearer tok-1"))).rejects.toThrow("Invalid or expired token");
  });
});

describe("requireAuth", () => {
  beforeEach(() => {
    clearTokenCache();
    mockQuery.mockReset();
    mockConfig.NODE_ENV = "test";
    mockConfig.DEV_USER_ID = undefined;
  });

  it("runs the rest of the chain as the authenticated user", async () => {
    mockQuery.mockResolvedValueOnce(tokenRow(4)).mockResolvedValueOnce({ rows: [] });
    let seen: number | undefined;
    const next = vi.fn(() => {
      seen = getUserId();
    });

    requireAuth(request("Bearer tok-1"), {} as Response, next);

    await vi.waitFor(() => expect(next).toHaveBeenCalled());
    expect(next).toHaveBeenCalledWith();
    expect(seen).toBe(4);
  });

  it("passes authentication failures to next", async () => {
    const next = vi.fn();

    requireAuth(request(), {} as Response, next);

    await vi.waitFor(() => expect(next).toHaveBeenCalled());
    expect(next.mock.calls[0][0]).toBeInstanceOf(AuthError);
  });

  it("uses DEV_USER_ID outside production", async () => {
    mockConfig.DEV_USER_ID = 9;
    let seen: number | undefined;
    const next = vi.fn(() => {
      seen = getUserId();
    });

    requireAuth(request(), {} as Response, next);

    await vi.waitFor(() => expect(next).toHaveBeenCalled());
    expect(seen).toBe(9);
    expect(mockQuery).not.toHaveBeenCalled();
  });

  it("ignores DEV_USER_ID in production", async () => {
    mockConfig.NODE_ENV = "production";
    mockConfig.DEV_USER_ID = 9;
    const next = vi.fn();

    requireAuth(request(), {} as Response, next);

    await vi.waitFor(() => expect(next).toHaveBeenCalled());
    expect(next.mock.calls[0][0]).toBeInstanceOf(AuthError);
  });
});
