export { type CLIConfig, ConfigError, getConfigPath, loadConfig, validateConfig } from "./config.js";
export type { CLIEnvironment, CLILoggerConfig, TTYAwareStream } from "./environment.js";
export { createDefaultEnvironment, createLoggerFactory } from "./environment.js";
export { describeRegistry } from "./modes-command.js";
export { executePlay, type PlayCommandOptions } from "./play-command.js";
export { createProgram, type RunCLIOptions, runCLI } from "./program.js";
export {
  executeRun,
  type RunCommandOptions,
  runScript,
  type ScriptOptions,
  type ScriptResult,
} from "./run-command.js";

export * from "./content/index.js";
