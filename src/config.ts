import { z } from "zod";

function isValidTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-CA", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const DEV_ORIGINS = [
  "http://localhost:3000",
  "http://localhost:3001",
  "http://localhost:5173",
  "http://localhost:8080",
];

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  ALLOWED_ORIGINS: z.string().optional(),
  /** Calendar day boundary for the protein counter. */
  REFERENCE_TIMEZONE: z
    .string()
    .default("UTC")
    .refine(isValidTimeZone, { message: "must be a valid IANA time zone" }),
  TOKEN_TTL_HOURS: z.coerce.number().int().positive().default(24 * 30),
  DEV_USER_ID: z.coerce.number().int().positive().optional(),
});

export type AppConfig = z.infer<typeof envSchema> & { allowedOrigins: string[] };

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join(", ")}`);
  }

  let allowedOrigins: string[] = [];
  if (parsed.data.ALLOWED_ORIGINS) {
    allowedOrigins = parsed.data.ALLOWED_ORIGINS.split(",").map(s => s.trim()).filter(Boolean);
  } else if (parsed.data.NODE_ENV === "development") {
    allowedOrigins = DEV_ORIGINS;
  }

  return { ...parsed.data, allowedOrigins };
}

const config = loadConfig();

export default config;
