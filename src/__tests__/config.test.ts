import { describe, it, expect } from "vitest";
import { loadConfig } from "../config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config.NODE_ENV).toBe("development");
    expect(config.PORT).toBe(3001);
    expect(config.REFERENCE_TIMEZONE).toBe("UTC");
    expect(config.TOKEN_TTL_HOURS).toBe(720);
    expect(config.DEV_USER_ID).toBeUndefined();
    expect(config.allowedOrigins).toContain("http://localhost:5173");
  });

  it("parses a comma separated origin list", () => {
    const config = loadConfig({ ALLOWED_ORIGINS: " https://a.example , https://b.example,," });

    expect(config.allowedOrigins).toEqual(["https://a.example", "https://b.example"]);
  });

  it("allows no origins in production unless configured", () => {
    expect(loadConfig({ NODE_ENV: "production" }).allowedOrigins).toEqual([]);
  });

  it("coerces numeric settings", () => {
    const config = loadConfig({ PORT: "8080", TOKEN_TTL_HOURS: "2", DEV_USER_ID: "4" });

    expect(config.PORT).toBe(8080);
    expect(config.TOKEN_TTL_HOURS).toBe(2);
    expect(config.DEV_USER_ID).toBe(4);
  });

  it("accepts an IANA time zone", () => {
    expect(loadConfig({ REFERENCE_TIMEZONE: "Europe/Madrid" }).REFERENCE_TIMEZONE).toBe("Europe/Madrid");
  });

  it("rejects an unknown time zone", () => {
    expect(() => loadConfig({ REFERENCE_TIMEZONE: "Mars/Olympus" }))
      .toThrow("Invalid configuration: REFERENCE_TIMEZONE: must be a valid IANA time zone");
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(/^Invalid configuration: PORT:/);
  });
});
