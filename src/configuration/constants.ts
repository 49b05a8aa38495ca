/**
 * Defaults for the sync engine's runtime settings.
 *
 * The confirmation window matches the lifetime of a confirmation prompt (24 h). Retries
 * default to zero: a remote moderation action is never repeated unless an operator opts in.
 */
export const DEFAULT_DB_NAME = "guild-sync";
export const DEFAULT_CONFIRMATION_TIMEOUT_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_EFFECTOR_TIMEOUT_MS = 10_000;
export const DEFAULT_EFFECTOR_RETRIES = 0;
export const MAX_EFFECTOR_RETRIES = 5;
