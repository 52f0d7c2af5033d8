/**
 * Readers for the `MEDIAFERRY_*` environment variables. Every helper trims the
 * raw value and treats blank strings as "unset" so operators can disable an
 * override by exporting an empty variable.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/**
 * Interprets {@link name} as a boolean ("1", "true", "yes", "on" and their
 * negative counterparts). Unknown literals yield the default.
 */
export function readBool(name: string, defaultValue: boolean): boolean {
  return readOptionalBool(name) ?? defaultValue;
}

export function readOptionalBool(name: string): boolean | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
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

/** Reads a base-10 integer, falling back to {@link defaultValue} on bad input. */
export function readInt(name: string, defaultValue: number, options?: NumberOptions): number {
  return readOptionalInt(name, options) ?? defaultValue;
}

export function readOptionalInt(name: string, options?: NumberOptions): number | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

/** Reads a trimmed string, returning {@link defaultValue} when unset or blank. */
export function readString(name: string, defaultValue: string): string {
  return readOptionalString(name) ?? defaultValue;
}

export function readOptionalString(name: string): string | undefined {
  return normaliseEnvValue(process.env[name]);
}

/**
 * Reads an enum-like variable. Matching is case-insensitive and the canonical
 * spelling from {@link allowed} is returned.
 */
export function readOptionalEnum<T extends string>(name: string, allowed: readonly T[]): T | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((candidate) => candidate.toLowerCase() === lower);
}
