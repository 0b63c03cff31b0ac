import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { load as parseToml } from "js-toml";
import { z } from "zod";
import { LOG_LEVELS } from "./constants.js";

// ─────────────────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────────────────

function intRange(min: number, max: number) {
  return z
    .number({ invalid_type_error: "must be a number" })
    .int("must be an integer")
    .min(min, `must be >= ${min}`)
    .max(max, `must be <= ${max}`);
}

const globalSchema = z
  .object({
    "log-level": z
      .enum(LOG_LEVELS, {
        errorMap: () => ({ message: `must be one of: ${LOG_LEVELS.join(", ")}` }),
      })
      .optional(),
  })
  .strict();

const playSchema = z
  .object({
    "tick-interval": intRange(10, 5000).optional(),
    "pulse-interval": intRange(100, 60000).optional(),
    color: z.boolean({ invalid_type_error: "must be a boolean" }).optional(),
  })
  .strict();

const configSchema = z
  .object({
    global: globalSchema.optional(),
    play: playSchema.optional(),
  })
  .strict();

/**
 * Global CLI options that apply to all commands.
 */
export type GlobalConfig = z.infer<typeof globalSchema>;

/**
 * Defaults for `play` and `run`.
 */
export type PlayConfig = z.infer<typeof playSchema>;

export type CLIConfig = z.infer<typeof configSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Loading
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Returns the default config file path: ~/.trailrunner/cli.toml
 */
export function getConfigPath(): string {
  return join(homedir(), ".trailrunner", "cli.toml");
}

/**
 * Configuration validation error.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = "ConfigError";
  }
}

/**
 * Formats a schema issue as `[section].key message`.
 */
function formatIssue(issue: z.ZodIssue): string {
  const [section, ...rest] = issue.path.map(String);
  let location = "";
  if (section !== undefined) {
    location = rest.length > 0 ? `[${section}].${rest.join(".")}` : `[${section}]`;
  }

  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    const what = section === undefined ? "section" : "field";
    const names = issue.keys.join(", ");
    return location ? `${location} Unknown ${what}: ${names}` : `Unknown ${what}: ${names}`;
  }

  return location ? `${location} ${issue.message}` : issue.message;
}

/**
 * Validates and normalizes a raw TOML object to CLIConfig.
 *
 * @throws ConfigError if validation fails
 */
export function validateConfig(raw: unknown, configPath?: string): CLIConfig {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigError("Config must be a TOML table", configPath);
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const [first] = result.error.issues;
    throw new ConfigError(first ? formatIssue(first) : "Invalid config", configPath);
  }
  return result.data;
}

/**
 * Loads configuration from the given path (default ~/.trailrunner/cli.toml).
 * Returns empty config if the file doesn't exist.
 *
 * @throws ConfigError if the file exists but has invalid syntax or unknown fields
 */
export function loadConfig(configPath: string = getConfigPath()): CLIConfig {
  if (!existsSync(configPath)) {
    return {};
  }

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read config file: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid TOML syntax: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  return validateConfig(raw, configPath);
}
