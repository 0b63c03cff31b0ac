import { Command, InvalidArgumentError } from "commander";

import { type CLIConfig, type GlobalConfig, loadConfig } from "./config.js";
import {
  CLI_DESCRIPTION,
  CLI_NAME,
  type CLILogLevel,
  LOG_LEVELS,
  OPTION_DESCRIPTIONS,
  OPTION_FLAGS,
  VERSION,
} from "./constants.js";
import type { CLIEnvironment, CLILoggerConfig } from "./environment.js";
import { createDefaultEnvironment } from "./environment.js";
import { registerModesCommand } from "./modes-command.js";
import { registerPlayCommand } from "./play-command.js";
import { registerRunCommand } from "./run-command.js";

function isLogLevel(value: string): value is CLILogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Parses and validates the log level option value.
 */
function parseLogLevel(value: string): CLILogLevel {
  const normalized = value.toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new InvalidArgumentError(`Log level must be one of: ${LOG_LEVELS.join(", ")}`);
  }
  return normalized;
}

/**
 * Creates and configures the CLI program with the play, run and modes
 * commands.
 *
 * @param env - CLI environment configuration for I/O and dependencies
 * @param config - Optional CLI configuration loaded from config file
 * @returns Configured Commander program ready for parsing
 */
export function createProgram(env: CLIEnvironment, config?: CLIConfig): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(VERSION)
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel, parseLogLevel)
    .configureOutput({
      writeOut: (str) => env.stdout.write(str),
      writeErr: (str) => env.stderr.write(str),
    });

  registerPlayCommand(program, env, config?.play);
  registerRunCommand(program, env, config?.play);
  registerModesCommand(program, env);

  return program;
}

/**
 * Options for runCLI function.
 */
export interface RunCLIOptions {
  /** Environment overrides for testing or customization */
  env?: Partial<CLIEnvironment>;
  /** Config override - if provided, skips loading from file. Use {} to disable config. */
  config?: CLIConfig;
}

/**
 * A valid --log-level flag wins over `[global] log-level`; anything else in
 * the flag is left for the real parse to reject.
 */
export function resolveLoggerConfig(
  rawFlag: string | undefined,
  global?: GlobalConfig,
): CLILoggerConfig {
  const normalized = rawFlag?.toLowerCase();
  const flagLevel = normalized !== undefined && isLogLevel(normalized) ? normalized : undefined;
  return { logLevel: flagLevel ?? global?.["log-level"] };
}

/**
 * Main entry point for running the CLI.
 * Creates environment, parses arguments, and executes the appropriate command.
 */
export async function runCLI(opts: RunCLIOptions = {}): Promise<void> {
  // Load config early (before program creation) - errors here should fail fast
  const config = opts.config !== undefined ? opts.config : loadConfig();
  const envOverrides = opts.env ?? {};
  const argv = envOverrides.argv ?? process.argv;

  // First pass: read the raw --log-level only; the real parse below validates it
  const preParser = new Command();
  preParser
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel)
    .allowUnknownOption()
    .allowExcessArguments()
    .helpOption(false); // Don't intercept --help

  preParser.parse(argv);
  // Priority: CLI flags > config file > defaults
  const rawLevel = preParser.opts<{ logLevel?: string }>().logLevel;
  const loggerConfig = resolveLoggerConfig(rawLevel, config.global);

  const env: CLIEnvironment = {
    ...createDefaultEnvironment(loggerConfig),
    ...envOverrides,
  };
  const program = createProgram(env, config);
  await program.parseAsync(argv);
}
