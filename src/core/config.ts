import { readFile } from "node:fs/promises";
import { parse } from "smol-toml";

export interface Config {
  word_count: number; // default: 1000
  min_length: number; // default: 2
  max_length: number; // default: 10
  alphanumeric_probability: number; // default: 0.7, rest is Hangul
  style_probability: number; // default: 0.1
  newline_probability: number; // default: 0.1
  pause_ms: number; // default: 100
}

/**
 * Return a Config with all defaults.
 */
export function defaultConfig(): Config {
  return {
    word_count: 1000,
    min_length: 2,
    max_length: 10,
    alphanumeric_probability: 0.7,
    style_probability: 0.1,
    newline_probability: 0.1,
    pause_ms: 100,
  };
}

type NumericKey = keyof Config;

const INTEGER_KEYS: readonly NumericKey[] = ["word_count", "min_length", "max_length", "pause_ms"];
const PROBABILITY_KEYS: readonly NumericKey[] = [
  "alphanumeric_probability",
  "style_probability",
  "newline_probability",
];

function readNumber(parsed: Record<string, unknown>, key: NumericKey, fallback: number): number {
  const value = parsed[key];
  if (value === undefined) return fallback;
  // smol-toml may hand back a bigint for integers past the safe range
  if (typeof value === "bigint") {
    throw new Error(`config: ${key} is out of range`);
  }
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw new Error(`config: ${key} must be a number`);
  }
  return value;
}

/**
 * Check ranges and cross-field constraints. Throws on the first bad key.
 */
export function validateConfig(config: Config): Config {
  for (const key of INTEGER_KEYS) {
    if (!Number.isInteger(config[key]) || config[key] < 0) {
      throw new Error(`config: ${key} must be a non-negative integer`);
    }
  }
  for (const key of PROBABILITY_KEYS) {
    if (config[key] < 0 || config[key] > 1) {
      throw new Error(`config: ${key} must be between 0 and 1`);
    }
  }
  if (config.min_length < 1) {
    throw new Error("config: min_length must be at least 1");
  }
  if (config.min_length > config.max_length) {
    throw new Error("config: min_length must not exceed max_length");
  }
  return config;
}

/**
 * Parse TOML config text. Missing keys take their defaults.
 */
export function parseConfig(raw: string): Config {
  const parsed: Record<string, unknown> = parse(raw);
  const defaults = defaultConfig();
  return validateConfig({
    word_count: readNumber(parsed, "word_count", defaults.word_count),
    min_length: readNumber(parsed, "min_length", defaults.min_length),
    max_length: readNumber(parsed, "max_length", defaults.max_length),
    alphanumeric_probability: readNumber(
      parsed,
      "alphanumeric_probability",
      defaults.alphanumeric_probability,
    ),
    style_probability: readNumber(parsed, "style_probability", defaults.style_probability),
    newline_probability: readNumber(parsed, "newline_probability", defaults.newline_probability),
    pause_ms: readNumber(parsed, "pause_ms", defaults.pause_ms),
  });
}

/**
 * Read config from a TOML file. Unlike an absent --config flag, a missing
 * file here is an error: the caller named it.
 */
export async function readConfig(configPath: string): Promise<Config> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new Error(`Config file not found: ${configPath}`);
    }
    throw err;
  }
  return parseConfig(raw);
}
