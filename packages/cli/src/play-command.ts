import { emitKeypressEvents } from "node:readline";
import type { Command } from "commander";
import type { PlayConfig } from "./config.js";
import {
  COMMANDS,
  DEFAULT_TICK_INTERVAL_MS,
  OPTION_DESCRIPTIONS,
  OPTION_FLAGS,
} from "./constants.js";
import { createTrailSimulation, INITIAL_MODES } from "./content/index.js";
import type { CLIEnvironment } from "./environment.js";
import { PlayController } from "./tui/controller.js";
import { FrameDisplay } from "./tui/display.js";
import { KeyboardManager } from "./tui/keymap.js";
import { createNumericParser, executeAction, isInteractive } from "./utils.js";

export interface PlayCommandOptions {
  tickInterval: number;
  pulseInterval?: number;
  color: boolean;
}

/**
 * Executes the play command: an interactive session driven by a real-time
 * tick loop. Resolves when the player quits or the stack empties; rejects
 * when a tick or keypress throws.
 */
export async function executePlay(options: PlayCommandOptions, env: CLIEnvironment): Promise<void> {
  const { stdin } = env;
  if (!isInteractive(stdin) || !stdin.setRawMode) {
    throw new Error(
      `${COMMANDS.play} needs an interactive terminal. Use '${COMMANDS.run}' to script a session.`,
    );
  }

  const logger = env.createLogger("play");
  const display = new FrameDisplay(env.stdout, { color: options.color, clear: true });
  const sim = createTrailSimulation({
    pulseIntervalMs: options.pulseInterval,
    logger,
    callbacks: {
      onBufferChanged: (frame) => display.show(frame),
      onModeChanged: (modeId) => logger.debug("Mode changed", { modeId }),
    },
  });

  await new Promise<void>((resolve, reject) => {
    let finished = false;
    let timer: NodeJS.Timeout | undefined;

    const finish = (error?: unknown): void => {
      if (finished) return;
      finished = true;

      if (timer) clearInterval(timer);
      keyboard.dispose();
      stdin.setRawMode?.(false);
      stdin.pause();
      env.stdout.write("\n");

      try {
        sim.destroy();
      } catch (destroyError) {
        logger.error("Failed to tear down simulation", destroyError);
      }

      if (error === undefined) {
        resolve();
      } else {
        reject(error);
      }
    };

    const controller = new PlayController(sim.input, {
      onQuit: () => finish(),
      onHint: (message) => display.hint(message),
    });

    const keyboard = new KeyboardManager({
      input: stdin,
      onAction: (action) => {
        try {
          controller.handleAction(action);
        } catch (error) {
          finish(error);
        }
      },
    });

    const tick = (): void => {
      try {
        sim.tick();
        if (sim.modeCount() === 0) {
          logger.info("Stack is empty, ending session");
          finish();
        }
      } catch (error) {
        finish(error);
      }
    };

    emitKeypressEvents(stdin);
    stdin.setRawMode?.(true);
    stdin.resume();
    keyboard.setup();

    try {
      sim.start(INITIAL_MODES);
    } catch (error) {
      finish(error);
      return;
    }

    tick();
    if (!finished) {
      timer = setInterval(tick, options.tickInterval);
    }
  });
}

/**
 * Registers the play command with the program.
 */
export function registerPlayCommand(program: Command, env: CLIEnvironment, config?: PlayConfig): void {
  program
    .command(COMMANDS.play)
    .description("Play the trail interactively in the terminal.")
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
    .action((options: PlayCommandOptions) => executeAction(() => executePlay(options, env), env));
}
