import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";
import { type ILogObj, Logger } from "tslog";

const LEVEL_NAME_TO_ID: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

/**
 * Parses a level given either by name ("debug") or by number ("2").
 * Numbers are clamped to the 0..6 range tslog understands.
 */
export function parseLogLevel(value?: string): number | undefined {
  if (!value) {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();

  if (normalized === "") {
    return undefined;
  }

  const numericLevel = Number(normalized);
  if (Number.isFinite(numericLevel)) {
    return Math.max(0, Math.min(6, Math.floor(numericLevel)));
  }

  return LEVEL_NAME_TO_ID[normalized];
}

/**
 * Logger configuration options for the runtime.
 */
export interface LoggerOptions {
  /**
   * Log level: 0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal
   * @default 4 (warn)
   */
  minLevel?: number;

  /**
   * Output type: 'pretty' for development, 'json' for machine consumption
   * @default 'pretty'
   */
  type?: "pretty" | "json" | "hidden";

  /**
   * Logger name (appears in logs)
   */
  name?: string;

  /**
   * When true, truncate the log file instead of appending.
   * @default false
   */
  logReset?: boolean;
}

function parseEnvBoolean(value?: string): boolean | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return undefined;
}

// All loggers share one WriteStream per file path
let sharedLogFilePath: string | undefined;
let sharedLogFileStream: WriteStream | undefined;
let writeErrorCount = 0;
let writeErrorReported = false;
const MAX_WRITE_ERRORS_BEFORE_DISABLE = 5;

const LOG_TEMPLATE =
  "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}:{{ms}}\t{{logLevelName}}\t[{{name}}]\t";

/**
 * Strips ANSI color codes from a string.
 */
export function stripAnsi(str: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escape codes use control characters
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

/**
 * Resets the shared file logging state. Used for testing.
 * @internal
 */
export function _resetFileLoggingState(): void {
  if (sharedLogFileStream) {
    sharedLogFileStream.end();
    sharedLogFileStream = undefined;
  }
  sharedLogFilePath = undefined;
  writeErrorCount = 0;
  writeErrorReported = false;
}

function openLogFile(path: string, reset: boolean): void {
  if (sharedLogFileStream) {
    sharedLogFileStream.end();
    sharedLogFileStream = undefined;
  }

  mkdirSync(dirname(path), { recursive: true });

  const stream = createWriteStream(path, { flags: reset ? "w" : "a" });
  sharedLogFileStream = stream;
  sharedLogFilePath = path;
  writeErrorCount = 0;
  writeErrorReported = false;

  stream.on("error", (error) => {
    writeErrorCount++;
    if (!writeErrorReported) {
      console.error(`[trailrunner] Log file write error: ${error.message}`);
      writeErrorReported = true;
    }
    if (writeErrorCount >= MAX_WRITE_ERRORS_BEFORE_DISABLE && sharedLogFileStream === stream) {
      console.error(
        `[trailrunner] Too many log file errors (${writeErrorCount}), disabling file logging`,
      );
      stream.end();
      sharedLogFileStream = undefined;
    }
  });
}

/**
 * Create a logger for a runtime component.
 *
 * Options win over the `TRAILRUNNER_LOG_LEVEL`, `TRAILRUNNER_LOG_FILE` and
 * `TRAILRUNNER_LOG_RESET` environment variables. When a log file is set, all
 * loggers write to it (ANSI stripped) instead of the console.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: "mode-stack", minLevel: 2 });
 *
 * // Silent logger for tests
 * const quiet = createLogger({ type: "hidden" });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const envMinLevel = parseLogLevel(process.env.TRAILRUNNER_LOG_LEVEL);
  const envLogFile = process.env.TRAILRUNNER_LOG_FILE?.trim() ?? "";
  const envLogReset = parseEnvBoolean(process.env.TRAILRUNNER_LOG_RESET);

  const minLevel = options.minLevel ?? envMinLevel ?? 4;
  const defaultType = options.type ?? "pretty";
  const name = options.name ?? "trailrunner";
  const logReset = options.logReset ?? envLogReset ?? false;

  if (envLogFile && sharedLogFilePath !== envLogFile) {
    try {
      openLogFile(envLogFile, logReset);
    } catch (error) {
      console.error("Failed to initialize TRAILRUNNER_LOG_FILE output:", error);
    }
  }

  const useFileLogging = Boolean(sharedLogFileStream) && defaultType !== "hidden";

  return new Logger<ILogObj>({
    name,
    minLevel,
    type: useFileLogging ? "pretty" : defaultType,
    hideLogPositionForProduction: useFileLogging || defaultType !== "pretty",
    prettyLogTemplate: LOG_TEMPLATE,
    overwrite: useFileLogging
      ? {
          transportFormatted: (logMetaMarkup: string, logArgs: unknown[], _logErrors: string[]) => {
            if (!sharedLogFileStream) return;

            const meta = stripAnsi(logMetaMarkup);
            const args = logArgs.map((arg) =>
              typeof arg === "string" ? stripAnsi(arg) : JSON.stringify(arg),
            );
            sharedLogFileStream.write(`${meta}${args.join(" ")}\n`);
          },
        }
      : undefined,
  });
}

/**
 * Default logger instance for components created without one.
 */
export const defaultLogger = createLogger();
