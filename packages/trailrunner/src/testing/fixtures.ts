/**
 * Small mode/state set used by the runtime's own tests.
 */

import type { ILogObj, Logger } from "tslog";
import { createLogger } from "../logging/logger.js";
import { BaseMode } from "../modes/mode.js";
import { ModeFactory } from "../modes/mode-factory.js";
import { ModeStack, type ModeStackCallbacks } from "../modes/mode-stack.js";
import { BaseState, type DialogKind, type DialogResponse, DialogState } from "../modes/state.js";
import { StateFactory } from "../modes/state-factory.js";
import {
  defineRegistry,
  type Mode,
  type ModeHost,
  type SimulationDomain,
  type SimulationTypes,
  type State,
  type TickEvent,
} from "../modes/types.js";
import { Simulation, type SimulationCallbacks } from "../simulation/simulation.js";

export type FixtureModeId = "travel" | "store" | "mainMenu";
export type FixtureStateId = "nameEntry" | "help" | "confirm";

export class FixtureDomain implements SimulationDomain {
  vehicle = "Stopped";
  location = "Independence";
  readonly ticks: TickEvent[] = [];
  readonly turns: number[] = [];

  vehicleStatus(): string {
    return this.vehicle;
  }

  locationStatus(): string {
    return this.location;
  }

  onTick(event: TickEvent): void {
    this.ticks.push(event);
  }

  onTurn(turns: number): void {
    this.turns.push(turns);
  }
}

export interface FixtureTypes extends SimulationTypes {
  readonly modeId: FixtureModeId;
  readonly stateId: FixtureStateId;
  readonly domain: FixtureDomain;
}

export abstract class FixtureMode extends BaseMode<FixtureTypes> {
  acceptsInput = true;
  readonly commands: string[] = [];
  readonly ticks: TickEvent[] = [];
  destroyed = false;
  private textOverride: { value: string | null | undefined } | null = null;

  /** Replaces the default "<id> window" text, including with null or undefined */
  overrideText(value: string | null | undefined): void {
    this.textOverride = { value };
  }

  protected onRender(): string | null | undefined {
    return this.textOverride ? this.textOverride.value : `${this.modeId} window`;
  }

  protected onCommand(command: string): void {
    this.commands.push(command);
  }

  protected onTick(event: TickEvent): void {
    this.ticks.push(event);
  }

  protected onDestroy(): void {
    this.destroyed = true;
  }
}

export class TravelMode extends FixtureMode {
  readonly modeId = "travel";
}

export class StoreMode extends FixtureMode {
  readonly modeId = "store";
}

export class MainMenuMode extends FixtureMode {
  readonly modeId = "mainMenu";
}

export class NameEntryState extends BaseState<FixtureTypes> {
  readonly stateId = "nameEntry";
  acceptsInput = true;
  readonly inputs: string[] = [];
  destroyed = false;

  render(): string {
    return "Enter a name";
  }

  handleInput(input: string): void {
    this.inputs.push(input);
  }

  destroy(): void {
    this.destroyed = true;
  }
}

/** Explains something, then returns the owner to no state */
export class HelpState extends DialogState<FixtureTypes> {
  readonly stateId = "help";
  readonly dialogKind: DialogKind = "prompt";

  protected onDialogPrompt(): string {
    return "Rivers must be crossed.";
  }

  protected onDialogResponse(): void {
    this.clearState();
  }
}

/** Yes moves on to the help prompt, no clears the state */
export class ConfirmState extends DialogState<FixtureTypes> {
  readonly stateId = "confirm";
  readonly dialogKind: DialogKind = "yesNo";
  readonly responses: DialogResponse[] = [];

  protected onDialogPrompt(): string {
    return "Are these names correct?";
  }

  protected onDialogResponse(response: DialogResponse): void {
    this.responses.push(response);
    if (response === "yes") {
      this.setState("help");
    } else {
      this.clearState();
    }
  }
}

export const fixtureRegistry = defineRegistry<FixtureTypes>({
  modeIds: ["travel", "store", "mainMenu"],
  modes: {
    travel: TravelMode,
    store: StoreMode,
    mainMenu: MainMenuMode,
  },
  states: {
    mainMenu: { nameEntry: NameEntryState, confirm: ConfirmState, help: HelpState },
    travel: { help: HelpState },
  },
});

export const quietLogger: Logger<ILogObj> = createLogger({ type: "hidden", name: "test" });

/**
 * Factories and a mode stack wired to a minimal host, without the rest of
 * the simulation.
 */
export function createFixtureStack(callbacks?: ModeStackCallbacks<FixtureTypes>) {
  const domain = new FixtureDomain();
  const host: ModeHost<FixtureTypes> = {
    domain,
    logger: quietLogger,
    turns: 0,
    addMode: (modeId) => stack.add(modeId),
    createState: (stateId, owner) => states.createState(stateId, owner.modeId, owner),
    takeTurn: () => {},
  };
  const modes = new ModeFactory(fixtureRegistry, host, quietLogger);
  const states = new StateFactory(fixtureRegistry, host, quietLogger);
  const stack = new ModeStack(modes, states, callbacks, quietLogger);
  return { stack, modes, states, host, domain };
}

export function createFixtureSimulation(
  options: {
    callbacks?: SimulationCallbacks<FixtureTypes>;
    now?: () => number;
    pulseIntervalMs?: number;
  } = {},
): Simulation<FixtureTypes> {
  return Simulation.create<FixtureTypes>({
    registry: fixtureRegistry,
    domain: new FixtureDomain(),
    logger: quietLogger,
    ...options,
  });
}

/**
 * Narrows a mode to the given fixture class or fails the test.
 */
export function expectMode<M extends FixtureMode>(
  mode: Mode<FixtureTypes> | null,
  ctor: new (host: ModeHost<FixtureTypes>) => M,
): M {
  if (!(mode instanceof ctor)) {
    throw new Error(`Expected ${ctor.name}, got ${mode?.modeId ?? "no mode"}`);
  }
  return mode;
}

export function expectState<S extends State<FixtureTypes>>(
  state: State<FixtureTypes> | null,
  ctor: new (owner: Mode<FixtureTypes>, host: ModeHost<FixtureTypes>) => S,
): S {
  if (!(state instanceof ctor)) {
    throw new Error(`Expected ${ctor.name}, got ${state?.stateId ?? "no state"}`);
  }
  return state;
}
