/**
 * Environment variable readers.
 *
 * `.env` is loaded once, when this module is first imported. Every reader
 * takes an explicit source so callers can hand in a fixed environment
 * instead of the process-wide one. An empty value counts as unset.
 */

import "dotenv/config";

export type EnvSource = Readonly<Record<string, string | undefined>>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const BOOLEAN_WORDS: ReadonlyMap<string, boolean> = new Map([
  ["true", true],
  ["1", true],
  ["yes", true],
  ["false", false],
  ["0", false],
  ["no", false],
]);

/** The variable's value, or undefined when it is unset or empty. */
export function maybeEnv(key: string, source: EnvSource = process.env): string | undefined {
  const value = source[key];
  return value === undefined || value === "" ? undefined : value;
}

export function optionalEnv(
  key: string,
  defaultValue: string,
  source: EnvSource = process.env
): string {
  return maybeEnv(key, source) ?? defaultValue;
}

/**
 * Reads true/false, 1/0 or yes/no in any case.
 * @throws ConfigError for any other value
 */
export function optionalEnvBool(
  key: string,
  defaultValue: boolean,
  source: EnvSource = process.env
): boolean {
  const raw = maybeEnv(key, source);
  if (raw === undefined) return defaultValue;

  const parsed = BOOLEAN_WORDS.get(raw.toLowerCase());
  if (parsed === undefined) {
    throw new ConfigError(
      `${key} must be one of ${[...BOOLEAN_WORDS.keys()].join("/")}, got "${raw}"`
    );
  }
  return parsed;
}
