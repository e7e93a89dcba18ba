import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config({
  path: path.resolve(process.cwd(), ".env")
});

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(4000),
  /** Timeout for fetching a content URL. */
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(2 * 1024 * 1024),
  MAX_SESSIONS: z.coerce.number().int().positive().default(500),
  SESSION_TTL_MS: z.coerce.number().int().positive().default(2 * 60 * 60 * 1000),
  /** Text substituted for a placeholder with no resolved value. */
  MISSING_MARKER: z.string().default(""),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info")
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const issueText = parsed.error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
  throw new Error(`Invalid environment variables: ${issueText}`);
}

export const env = parsed.data;
