import type { Command } from "commander";
import type { ILogObj, Logger } from "trailrunner";
import type { PlayConfig } from "./config.js";
import {
  COMMANDS,
  DEFAULT_SETTLE_TICKS,
  DEFAULT_TICK_INTERVAL_MS,
  MAX_TICKS_PER_COMMAND,
  OPTION_DESCRIPTIONS,
  OPTION_FLAGS,
} from "./constants.js";
import { createTrailSimulation, INITIAL_MODES } from "./content/index.js";
import type { CLIEnvironment } from "./environment.js";
import { FrameDisplay } from "./tui/display.js";
import {
  createNumericParser,
  executeAction,
  isInteractive,
  readLines,
  StreamPrinter,
} from "./utils.js";

export interface RunCommandOptions {
  input?: string[];
  settle: number;
  tickInterval: number;
  pulseInterval?: number;
  color: boolean;
}

export interface ScriptOptions {
  tickIntervalMs: number;
  pulseIntervalMs?: number;
  settleTicks: number;
  /** @default MAX_TICKS_PER_COMMAND */
  maxTicksPerCommand?: number;
  logger: Logger<ILogObj>;
}

export interface ScriptResult {
  /** The last frame the renderer produced */
  frame: string;
  ticks: number;
  /** Commands in the order they reached the stack */
  dispatched: string[];
}

/**
 * Plays a list of commands against a fresh trail simulation on a virtual
 * clock. Each tick moves the clock forward by `tickIntervalMs`, so a script
 * gives the same frames on every run.
 *
 * One tick renders the title screen. Each command is then typed, submitted
 * and ticked until the input queue drains and no active mode is waiting to be
 * swept, for at most `maxTicksPerCommand` ticks; `settleTicks` more ticks
 * follow. Commands after the stack has emptied are dropped.
 */
export function runScript(commands: readonly string[], options: ScriptOptions): ScriptResult {
  const { logger } = options;
  const maxTicks = options.maxTicksPerCommand ?? MAX_TICKS_PER_COMMAND;
  const dispatched: string[] = [];
  let nowMs = 0;
  let ticks = 0;

  const sim = createTrailSimulation({
    pulseIntervalMs: options.pulseIntervalMs,
    now: () => nowMs,
    logger,
    callbacks: {
      onCommandDispatched: (command) => dispatched.push(command),
    },
  });

  const step = (): void => {
    nowMs += options.tickIntervalMs;
    ticks++;
    sim.tick();
  };

  const settled = (): boolean =>
    sim.input.pendingCount() === 0 && sim.activeMode()?.shouldRemove !== true;

  try {
    sim.start(INITIAL_MODES);
    step();

    for (let i = 0; i < commands.length; i++) {
      if (sim.modeCount() === 0) {
        logger.info("Stack is empty, dropping remaining commands", {
          remaining: commands.length - i,
        });
        break;
      }

      const command = commands[i];
      let accepted = 0;
      for (const ch of command) {
        if (sim.input.addChar(ch)) accepted++;
      }
      if (accepted < Array.from(command).length) {
        logger.debug("Characters refused by the input router", { command, accepted });
      }

      sim.input.submit();
      let spent = 0;
      do {
        step();
        spent++;
      } while (!settled() && spent < maxTicks);

      if (!settled()) {
        logger.warn("Command did not settle, moving on", { command, ticks: spent });
      }
    }

    for (let i = 0; i < options.settleTicks; i++) {
      step();
    }

    return { frame: sim.renderer.frame, ticks, dispatched };
  } finally {
    sim.destroy();
  }
}

/**
 * Executes the run command: plays the given commands and prints the final
 * frame.
 */
export async function executeRun(options: RunCommandOptions, env: CLIEnvironment): Promise<void> {
  const logger = env.createLogger("run");

  let commands = options.input;
  if (commands === undefined) {
    if (isInteractive(env.stdin)) {
      throw new Error("No commands given. Pass --input or pipe commands on stdin.");
    }
    commands = await readLines(env.stdin);
  }

  const result = runScript(commands, {
    tickIntervalMs: options.tickInterval,
    pulseIntervalMs: options.pulseInterval,
    settleTicks: options.settle,
    logger,
  });
  logger.debug("Script finished", { ticks: result.ticks, dispatched: result.dispatched.length });

  const display = new FrameDisplay(env.stdout, { color: options.color, clear: false });
  const printer = new StreamPrinter(env.stdout);
  printer.write(display.format(result.frame));
  printer.ensureNewline();
}

/**
 * Registers the run command with the program.
 */
export function registerRunCommand(program: Command, env: CLIEnvironment, config?: PlayConfig): void {
  program
    .command(COMMANDS.run)
    .description("Play a scripted session headlessly and print the final frame.")
    .option(OPTION_FLAGS.input, OPTION_DESCRIPTIONS.input)
    .option(
      OPTION_FLAGS.settle,
      OPTION_DESCRIPTIONS.settle,
      createNumericParser({ label: "Settle ticks", integer: true, min: 0 }),
      DEFAULT_SETTLE_TICKS,
    )
    .option(
      OPTION_FLAGS.tickInterval,
      OPTION_DESCRIPTIONS.tickInterval,
      createNumericParser({ label: "Tick interval", integer: true, min: 10, max: 5000 }),
      config?.["tick-interval"] ?? DEFAULT_TICK_INTERVAL_MS,
    )
    .option(
      OPTION_FLAGS.pulseInterval,
      OPTION_DESCRIPTIONS.pulseInterval,
      createNumericParser({ label: "Pulse interval", integer: true, min: 100, max: 60000 }),
      config?.["pulse-interval"],
    )
    .option(OPTION_FLAGS.noColor, OPTION_DESCRIPTIONS.noColor, config?.color ?? true)
    .action((options: RunCommandOptions) => executeAction(() => executeRun(options, env), env));
}
