import { describe, it, expect, vi, beforeEach } from "vitest";

const { mockQuery } = vi.hoisted(() => ({ mockQuery: vi.fn() }));

vi.mock("../../db/connection.js", () => ({
  default: { query: mockQuery },
}));

vi.mock("../../config.js", () => ({
  default: { NODE_ENV: "test", TOKEN_TTL_HOURS: 720, DEV_USER_ID: undefined },
}));

vi.mock("../../context/user-context.js", () => ({
  getUserId: vi.fn().mockReturnValue(3),
  runWithUser: vi.fn(),
}));

import { checkRateLimit, registerAuthRoutes, resetRateLimits } from "../auth.js";
import { hashPassword, verifyPassword } from "../../auth/passwords.js";
import { AuthError, InvalidValueError, RateLimitError } from "../../errors.js";
import { captureRoutes, invoke } from "./route-harness.js";

const credentials = { username: " Alice ", password: "test-secret-pass" };

describe("auth routes", () => {
  const routes = captureRoutes(registerAuthRoutes);

  beforeEach(() => {
    mockQuery.mockReset();
    resetRateLimits();
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  describe("POST /register", () => {
    it("creates a user with a lowercased name and hashed password", async () => {
      mockQuery.mockResolvedValueOnce({ rows: [] }).mockResolvedValueOnce({ rows: [{ id: 3, username: "alice" }] });

      const { res } = await invoke(routes, "POST /register", { body: credentials });

      expect(res.statusCode).toBe(201);
      expect(res.body).toEqual({ id: 3, username: "alice" });
      expect(mockQuery.mock.calls[0][1]).toEqual(["alice"]);
      const [username, hash] = mockQuery.mock.calls[1][1];
      expect(username).toBe("alice");
      expect(await verifyPassword("test-secret-pass", hash)).toBe(true);
    });

    it("rejects a taken username", async () => {
      mockQuery.mockResolvedValueOnce({ rows: [{ id: 2 }] });

      const { error } = await invoke(routes, "POST /register", { body: credentials });

      expect(error).toBeInstanceOf(InvalidValueError);
      expect(error).toHaveProperty("message", "A user with that username already exists.");
      expect(mockQuery).toHaveBeenCalledTimes(1);
    });

    it("reports a registration that lost the race for the name the same way", async () => {
      mockQuery
        .mockResolvedValueOnce({ rows: [] })
        .mockRejectedValueOnce(Object.assign(new Error("duplicate key value"), { code: "23505" }));

      const { error } = await invoke(routes, "POST /register", { body: credentials });

      expect(error).toBeInstanceOf(InvalidValueError);
      expect(error).toHaveProperty("message", "A user with that username already exists.");
    });

    it("passes other insert failures through unchanged", async () => {
      const failure = Object.assign(new Error("connection terminated"), { code: "57P01" });
      mockQuery.mockResolvedValueOnce({ rows: [] }).mockRejectedValueOnce(failure);

      const { error } = await invoke(routes, "POST /register", { body: credentials });

      expect(error).toBe(failure);
    });

    it("rejects a weak password before touching the database", async () => {
      const { error } = await invoke(routes, "POST /register", { body: { username: "alice", password: "short" } });

      expect(error).toHaveProperty("message", "password must be at least 8 characters");
      expect(mockQuery).not.toHaveBeenCalled();
    });

    it("limits attempts per client", async () => {
      for (let i = 0; i < 5; i++) {
        const { error } = await invoke(routes, "POST /register", { body: {} });
        expect(error).toBeInstanceOf(InvalidValueError);
      }

      const { error } = await invoke(routes, "POST /register", { body: {} });

      expect(error).toBeInstanceOf(RateLimitError);
    });
  });

  describe("POST /token", () => {
    it("issues a bearer token for valid credentials", async () => {
      const hash = await hashPassword("test-secret-pass");
      mockQuery.mockResolvedValueOnce({ rows: [{ id: 3, password_hash: hash }] }).mockResolvedValueOnce({ rows: [], rowCount: 1 });

      const { res } = await invoke(routes, "POST /token", { body: credentials });

      expect(res.body).toEqual({ access_token: expect.stringMatching(/^[A-Za-z0-9_-]{43}$/), token_type: "Bearer", expires_in: 2_592_000 });
      const [token, userId, expiresIn] = mockQuery.mock.calls[1][1];
      expect(token).toBe((res.body as { access_token: string }).access_token);
      expect(userId).toBe(3);
      expect(expiresIn).toBe(2_592_000);
    });

    it("rejects a wrong password", async () => {
      const hash = await hashPassword("test-secret-pass");
      mockQuery.mockResolvedValueOnce({ rows: [{ id: 3, password_hash: hash }] });

      const { error } = await invoke(routes, "POST /token", { body: { username: "alice", password: "wrong-pass" } });

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toHaveProperty("message", "No active account found with the given credentials");
      expect(mockQuery).toHaveBeenCalledTimes(1);
    });

    it("rejects an unknown user with the same message", async () => {
      mockQuery.mockResolvedValueOnce({ rows: [] });

      const { error } = await invoke(routes, "POST /token", { body: credentials });

      expect(error).toHaveProperty("message", "No active account found with the given credentials");
    });
  });

  describe("DELETE /token", () => {
    it("revokes the presented token", async () => {
      mockQuery.mockResolvedValueOnce({ rows: [], rowCount: 1 });

      const { res } = await invoke(routes, "DELETE /token", { headers: { authorization: "Bearer tok-1" } });

      expect(mockQuery).toHaveBeenCalledWith("DELETE FROM auth_tokens WHERE token = $1 AND user_id = $2", ["tok-1", 3]);
      expect(res.statusCode).toBe(204);
    });
  });
});

describe("checkRateLimit", () => {
  beforeEach(() => {
    resetRateLimits();
  });

  it("allows the limit within a window and resets after it", () => {
    expect(checkRateLimit("k", 2, 0)).toBe(true);
    expect(checkRateLimit("k", 2, 1_000)).toBe(true);
    expect(checkRateLimit("k", 2, 2_000)).toBe(false);
    expect(checkRateLimit("k", 2, 61_001)).toBe(true);
  });

  it("counts keys separately", () => {
    expect(checkRateLimit("a", 1, 0)).toBe(true);
    expect(checkRateLimit("b", 1, 0)).toBe(true);
    expect(checkRateLimit("a", 1, 0)).toBe(false);
  });
});
