/**
 * Process-level settings, read from the environment (`dotenv/config` fills it at bootstrap).
 *
 * Invariants:
 * - Parsed once and cached; `resetSettings()` exists for tests.
 * - Invalid values are a `ConfigError`: the process must not start with a bad timeout.
 */
import { z } from "zod";
import { ConfigError } from "@/modules/sync/errors";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import {
  DEFAULT_CONFIRMATION_TIMEOUT_MS,
  DEFAULT_DB_NAME,
  DEFAULT_EFFECTOR_RETRIES,
  DEFAULT_EFFECTOR_TIMEOUT_MS,
  MAX_EFFECTOR_RETRIES,
} from "./constants";

// Empty strings come from `.env` lines such as `SYNC_EFFECTOR_RETRIES=`.
const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const SettingsSchema = z.object({
  MONGO_URI: z.preprocess(blankToUndefined, z.string().optional()),
  DB_NAME: z.preprocess(blankToUndefined, z.string().default(DEFAULT_DB_NAME)),
  SYNC_CONFIRMATION_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_CONFIRMATION_TIMEOUT_MS),
  ),
  SYNC_EFFECTOR_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_EFFECTOR_TIMEOUT_MS),
  ),
  SYNC_EFFECTOR_RETRIES: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(0).max(MAX_EFFECTOR_RETRIES).default(DEFAULT_EFFECTOR_RETRIES),
  ),
  SYNC_MIRROR_MEMBER_UPDATES: z.preprocess(
    blankToUndefined,
    z.enum(["true", "false"]).default("true"),
  ),
});

export interface SyncSettings {
  mongoUri: string | null;
  dbName: string;
  confirmationTimeoutMs: number;
  effectorTimeoutMs: number;
  /** Extra attempts for grant/revoke calls. Punishment application is never retried. */
  effectorRetries: number;
  /** Mirror labelled role changes made outside the bot as they happen. */
  mirrorMemberUpdates: boolean;
}

export function parseSettings(
  env: Record<string, string | undefined>,
): Result<SyncSettings, ConfigError> {
  const parsed = SettingsSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    return ErrResult(new ConfigError("Invalid environment settings", issues));
  }

  const data = parsed.data;
  return OkResult({
    mongoUri: data.MONGO_URI ?? null,
    dbName: data.DB_NAME,
    confirmationTimeoutMs: data.SYNC_CONFIRMATION_TIMEOUT_MS,
    effectorTimeoutMs: data.SYNC_EFFECTOR_TIMEOUT_MS,
    effectorRetries: data.SYNC_EFFECTOR_RETRIES,
    mirrorMemberUpdates: data.SYNC_MIRROR_MEMBER_UPDATES === "true",
  });
}

let cached: SyncSettings | null = null;

/** Reads `process.env` once. Throws at boot when the environment is invalid. */
export function loadSettings(): SyncSettings {
  if (cached) return cached;
  const result = parseSettings(process.env);
  if (result.isErr()) {
    throw result.error;
  }
  cached = result.value;
  return cached;
}

export function resetSettings(): void {
  cached = null;
}
