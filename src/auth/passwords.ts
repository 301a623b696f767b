import bcrypt from "bcryptjs";
import { z } from "zod";
import { InvalidValueError } from "../errors.js";

const BCRYPT_ROUNDS = 10;
export const MIN_PASSWORD_LENGTH = 8;

/** Passwords rejected outright regardless of length. */
const COMMON_PASSWORDS = new Set([
  "password",
  "password1",
  "password123",
  "12345678",
  "123456789",
  "1234567890",
  "qwerty123",
  "qwertyuiop",
  "iloveyou",
  "letmein1",
  "welcome1",
  "abc12345",
  "football",
  "baseball",
  "sunshine",
  "princess",
  "superman",
  "trustno1",
  "passw0rd",
  "11111111",
]);

export const credentialsSchema = z.object({
  username: z
    .string()
    .trim()
    .min(1)
    .max(150)
    .regex(/^[\w.@+-]+$/, "may contain only letters, digits and @/./+/-/_")
    .transform(s => s.toLowerCase()),
  password: z.string().min(1).max(128),
});

export type Credentials = z.infer<typeof credentialsSchema>;

/**
 * Password rules for new accounts. Throws InvalidValueError listing every
 * rule the password breaks.
 */
export function validatePassword(password: string, username: string): void {
  const problems: string[] = [];
  const lower = password.toLowerCase();

  if (password.length < MIN_PASSWORD_LENGTH) {
    problems.push(`password must be at least ${MIN_PASSWORD_LENGTH} characters`);
  }
  if (/^\d+$/.test(password)) {
    problems.push("password cannot be entirely numeric");
  }
  if (COMMON_PASSWORDS.has(lower)) {
    problems.push("password is too common");
  }
  if (username && (lower === username || lower.includes(username) || username.includes(lower))) {
    problems.push("password is too similar to the username");
  }

  if (problems.length > 0) {
    throw new InvalidValueError(problems.join(", "));
  }
}

export function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, BCRYPT_ROUNDS);
}

export function verifyPassword(password: string, hash: string): Promise<boolean> {
  return bcrypt.compare(password, hash);
}
