/**
 * Environment Configuration
 * Validates and exports type-safe environment variables.
 * Fails fast at startup if required variables are missing.
 */

import path from "path";
import { z } from "zod";

const envSchema = z.object({
  BOT_TOKEN: z.string().min(1, "Missing required environment variable: BOT_TOKEN"),
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(3000),
  DOWNLOAD_DIR: z.string().min(1).optional(),
  YTDLP_PATH: z.string().min(1).default("yt-dlp"),
  ALLOWED_USER_IDS: z.string().optional(),
  ARTIFACT_MAX_AGE_HOURS: z.coerce.number().positive().default(2),
});

export interface AppConfig {
  botToken: string;
  nodeEnv: string;
  port: number;
  downloadDir: string;
  ytdlpPath: string;
  /** Empty set means everyone may use the bot. */
  allowedUserIds: ReadonlySet<number>;
  artifactMaxAgeHours: number;
}

/**
 * Parses a comma separated list of Telegram user ids.
 * Throws on entries that are not integers.
 */
export function parseAllowedUserIds(raw: string | undefined): Set<number> {
  const ids = new Set<number>();
  if (!raw) return ids;

  for (const entry of raw.split(",")) {
    const trimmed = entry.trim();
    if (!trimmed) continue;
    if (!/^-?\d+$/.test(trimmed)) {
      throw new Error(`Invalid user id in ALLOWED_USER_IDS: '${trimmed}'`);
    }
    ids.add(Number(trimmed));
  }
  return ids;
}

/**
 * Builds the application configuration from environment variables.
 * Throws immediately if a variable is missing or malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const parsed = result.data;
  return {
    botToken: parsed.BOT_TOKEN,
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    downloadDir: path.resolve(parsed.DOWNLOAD_DIR ?? path.join(process.cwd(), "downloads")),
    ytdlpPath: parsed.YTDLP_PATH,
    allowedUserIds: parseAllowedUserIds(parsed.ALLOWED_USER_IDS),
    artifactMaxAgeHours: parsed.ARTIFACT_MAX_AGE_HOURS,
  };
}
