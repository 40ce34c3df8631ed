export const SNOWFLAKE_PATTERN = /^\d{1,20}$/;

export function isSnowflake(value: string): boolean {
  return SNOWFLAKE_PATTERN.test(value);
}

/** Numeric comparison of two snowflake ids; plain string order breaks once ids grow a digit. */
export function compareSnowflakes(left: string, right: string): number {
  const a = BigInt(left);
  const b = BigInt(right);
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export function maxSnowflake(ids: string[]): string | undefined {
  let newest: string | undefined;
  for (const id of ids) {
    if (newest === undefined || compareSnowflakes(id, newest) > 0) {
      newest = id;
    }
  }
  return newest;
}
