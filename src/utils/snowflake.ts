const SNOWFLAKE_PATTERN = /^\d{17,20}$/;

export const isSnowflake = (value: unknown): value is string =>
  typeof value === "string" && SNOWFLAKE_PATTERN.test(value);

/** Trimmed id, or `null` when the input is not a snowflake. */
export const normalizeSnowflake = (value: string | null | undefined): string | null => {
  if (value == null) return null;
  const str = value.trim();
  return SNOWFLAKE_PATTERN.test(str) ? str : null;
};
