/**
 * Environment readers shared by every tool server. Each reader trims the raw
 * value, treats blank strings as "unset" and falls back to the supplied default
 * whenever the literal cannot be coerced.
 */

/** Source of environment variables; defaults to {@link process.env}. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function normalise(raw: string | undefined): string | undefined {
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

/** Returns the trimmed value of {@link name}, or `undefined` when blank or absent. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return normalise(env[name]);
}

export function readString(name: string, defaultValue: string, env: EnvSource = process.env): string {
  return readOptionalString(name, env) ?? defaultValue;
}

/**
 * Reads a base-10 integer. Literals with a fractional part, values outside the
 * safe integer range and values violating {@link NumberOptions} are ignored.
 */
export function readInt(
  name: string,
  defaultValue: number,
  options?: NumberOptions,
  env: EnvSource = process.env,
): number {
  const value = normalise(env[name]);
  if (!value || !/^[-+]?\d+$/.test(value)) {
    return defaultValue;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed) || !withinBounds(parsed, options)) {
    return defaultValue;
  }
  return parsed;
}

/**
 * Splits a comma separated literal into trimmed, non-empty, deduplicated
 * segments while keeping the first occurrence order.
 */
export function parseCsvList(value: string): string[] {
  const seen = new Set<string>();
  const ordered: string[] = [];
  for (const segment of value.split(",")) {
    const trimmed = segment.trim();
    if (trimmed.length === 0 || seen.has(trimmed)) {
      continue;
    }
    seen.add(trimmed);
    ordered.push(trimmed);
  }
  return ordered;
}

/** Reads a CSV list, returning {@link defaultValue} when nothing usable is set. */
export function readCsv(
  name: string,
  defaultValue: readonly string[],
  env: EnvSource = process.env,
): string[] {
  const value = normalise(env[name]);
  if (!value) {
    return [...defaultValue];
  }
  const parsed = parseCsvList(value);
  return parsed.length > 0 ? parsed : [...defaultValue];
}
