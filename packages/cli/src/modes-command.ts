import type { Command } from "commander";
import type { ModeRegistry, SimulationTypes } from "trailrunner";
import { COMMANDS } from "./constants.js";
import { INITIAL_MODES, trailRegistry } from "./content/index.js";
import type { CLIEnvironment } from "./environment.js";
import { executeAction } from "./utils.js";

/**
 * One line per registered mode: its identifier and the states it owns.
 */
export function describeRegistry<T extends SimulationTypes>(registry: ModeRegistry<T>): string[] {
  return registry.modeIds.map((modeId) => {
    const table = registry.states[modeId];
    const stateIds = table ? Object.keys(table) : [];
    return `${modeId}: ${stateIds.length > 0 ? stateIds.join(", ") : "(no states)"}`;
  });
}

export async function executeModes(env: CLIEnvironment): Promise<void> {
  for (const line of describeRegistry(trailRegistry)) {
    env.stdout.write(`${line}\n`);
  }
  env.stdout.write(`\nStarts in: ${INITIAL_MODES.join(", ")}\n`);
}

/**
 * Registers the modes command with the program.
 */
export function registerModesCommand(program: Command, env: CLIEnvironment): void {
  program
    .command(COMMANDS.modes)
    .description("List the registered modes and the states each one owns.")
    .action(() => executeAction(() => executeModes(env), env));
}
