/**
 * Environment variable utilities
 */

/**
 * Gets an environment variable as a string with a default value
 */
export const envStr = (k: string, d: string): string => process.env[k] ?? d;

/**
 * Gets an environment variable as an integer with a default value
 * @returns Parsed integer value or default when unset or invalid
 */
export const envInt = (k: string, d: number): number => {
  const v = process.env[k];
  if (!v) return d;
  const n = parseInt(v, 10);
  return Number.isFinite(n) ? n : d;
};

/**
 * Gets an environment variable as a float with a default value
 */
export const envFloat = (k: string, d: number): number => {
  const v = process.env[k];
  if (!v) return d;
  const n = parseFloat(v);
  return Number.isFinite(n) ? n : d;
};

/**
 * Gets an environment variable as a boolean with a default value
 * @returns true for "1", "true", "yes", "on"; false otherwise
 */
export const envBool = (k: string, d: boolean): boolean =>
  /^(1|true|yes|on)$/i.test(process.env[k] ?? String(d));

/**
 * Gets an environment variable restricted to a set of allowed values
 * @returns The value when allowed, the default otherwise
 */
export const envOneOf = <T extends string>(k: string, allowed: readonly T[], d: T): T =>
  allowed.find((v) => v === process.env[k]) ?? d;
