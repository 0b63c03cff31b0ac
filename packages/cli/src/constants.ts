/** CLI program name */
export const CLI_NAME = "trailrunner";

/** CLI program description shown in --help */
export const CLI_DESCRIPTION = "Play and script trailrunner simulations from the terminal.";

/** Reported by --version */
export const VERSION = "0.1.0";

/** Available command names */
export const COMMANDS = {
  play: "play",
  run: "run",
  modes: "modes",
} as const;

/** Valid log level names */
export const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;
export type CLILogLevel = (typeof LOG_LEVELS)[number];

/** Default milliseconds between scheduler ticks in `play` */
export const DEFAULT_TICK_INTERVAL_MS = 100;

/** Extra ticks `run` performs after the last command */
export const DEFAULT_SETTLE_TICKS = 1;

/** Upper bound on ticks `run` spends settling one command */
export const MAX_TICKS_PER_COMMAND = 100;

/** Command-line option flags */
export const OPTION_FLAGS = {
  logLevel: "--log-level <level>",
  input: "-i, --input <commands...>",
  settle: "--settle <ticks>",
  tickInterval: "--tick-interval <ms>",
  pulseInterval: "--pulse-interval <ms>",
  noColor: "--no-color",
} as const;

/** Human-readable descriptions for command-line options */
export const OPTION_DESCRIPTIONS = {
  logLevel: "Log level: silly, trace, debug, info, warn, error, fatal.",
  input: "Commands to type and submit in order. Pass '' to press ENTER on an empty line.",
  settle: "Ticks to run after the last command.",
  tickInterval: "Milliseconds between scheduler ticks.",
  pulseInterval: "Milliseconds of game time per pulse (one travelled day).",
  noColor: "Draw frames without color.",
} as const;

/** Shown after the first Ctrl+C */
export const QUIT_HINT = "Press Ctrl+C again to quit.";
