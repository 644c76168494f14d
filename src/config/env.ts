/**
 * Typed readers for environment variables. Every reader accepts an optional
 * environment snapshot so settings can be resolved from something other than
 * {@link process.env} (tests, embedded coordinators).
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Returns the trimmed value, treating blank strings as unset. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Returns an optional boolean if {@link name} is set to a recognised literal. */
export function readOptionalBool(name: string, env: EnvSource = process.env): boolean | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  return undefined;
}

export function readBool(name: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  return readOptionalBool(name, env) ?? defaultValue;
}

interface IntOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

/**
 * Returns an optional integer when {@link name} holds a base-10 literal inside
 * the requested bounds. Literals outside the safe integer range are rejected.
 */
export function readOptionalInt(name: string, options?: IntOptions, env: EnvSource = process.env): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  if (options?.min !== undefined && value < options.min) {
    return undefined;
  }
  if (options?.max !== undefined && value > options.max) {
    return undefined;
  }
  return value;
}

export function readInt(
  name: string,
  defaultValue: number,
  options?: IntOptions,
  env: EnvSource = process.env,
): number {
  return readOptionalInt(name, options, env) ?? defaultValue;
}

/** Returns the trimmed string when {@link name} is set to a non-empty value. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

export function readString(name: string, defaultValue: string, env: EnvSource = process.env): string {
  return readOptionalString(name, env) ?? defaultValue;
}

/**
 * Reads an enum-like variable. Comparison is case-insensitive and the
 * canonical spelling from {@link allowed} is returned.
 */
export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: EnvSource = process.env,
): T {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return defaultValue;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((value) => value.toLowerCase() === lower) ?? defaultValue;
}
