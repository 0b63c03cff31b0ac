import { defineRegistry, Simulation, type SimulationOptions } from "trailrunner";
import { MainMenuMode } from "./modes/main-menu.js";
import { RiverCrossingMode } from "./modes/river-crossing.js";
import { StoreMode } from "./modes/store.js";
import { TravelMode } from "./modes/travel.js";
import { ConfirmNamesState } from "./states/confirm-names.js";
import { NameEntryState } from "./states/name-entry.js";
import { RiverCrossHelpState } from "./states/river-cross-help.js";
import { StoreHelpState } from "./states/store-help.js";
import { TrailDomain } from "./trail-domain.js";
import type { TrailModeId, TrailTypes } from "./trail-types.js";

export const trailRegistry = defineRegistry<TrailTypes>({
  modeIds: ["mainMenu", "travel", "store", "riverCrossing"],
  modes: {
    mainMenu: MainMenuMode,
    travel: TravelMode,
    store: StoreMode,
    riverCrossing: RiverCrossingMode,
  },
  states: {
    mainMenu: { nameEntry: NameEntryState, confirmNames: ConfirmNamesState },
    store: { storeHelp: StoreHelpState },
    riverCrossing: { riverCrossHelp: RiverCrossHelpState },
  },
});

/** Travel sits at the bottom of the stack with the main menu above it */
export const INITIAL_MODES: readonly TrailModeId[] = ["travel", "mainMenu"];

export type TrailSimulationOptions = Omit<SimulationOptions<TrailTypes>, "registry" | "domain"> & {
  domain?: TrailDomain;
};

export function createTrailSimulation(options: TrailSimulationOptions = {}): Simulation<TrailTypes> {
  return Simulation.create<TrailTypes>({
    ...options,
    registry: trailRegistry,
    domain: options.domain ?? new TrailDomain(),
  });
}
