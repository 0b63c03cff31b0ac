/**
 * Capability types shared by modes (windows) and states (forms).
 *
 * Content packages pick their own identifier unions and domain object and
 * bundle them into one `SimulationTypes` record, so every generic in the
 * runtime takes a single parameter:
 *
 * ```typescript
 * interface TrailTypes extends SimulationTypes {
 *   readonly modeId: "travel" | "store";
 *   readonly stateId: "riverCrossHelp";
 *   readonly domain: TrailDomain;
 * }
 * ```
 */

import type { ILogObj, Logger } from "tslog";

/**
 * External domain simulation (vehicle, trail, people). The runtime only reads
 * status strings from it and forwards tick and turn signals.
 */
export interface SimulationDomain {
  vehicleStatus(): string;
  locationStatus(): string;
  onTick?(event: TickEvent): void;
  onTurn?(turns: number): void;
}

export interface SimulationTypes {
  readonly modeId: string;
  readonly stateId: string;
  readonly domain: SimulationDomain;
}

export type ModeIdOf<T extends SimulationTypes> = T["modeId"];
export type StateIdOf<T extends SimulationTypes> = T["stateId"];

/**
 * Passed down the tick chain.
 * - systemTick: false on the ticks where the clock produced a pulse
 * - skipDay: the caller forced a tick without advancing simulated time
 */
export interface TickEvent {
  readonly systemTick: boolean;
  readonly skipDay: boolean;
}

/**
 * A sub-dialog owned by exactly one mode.
 */
export interface State<T extends SimulationTypes> {
  readonly stateId: StateIdOf<T>;
  readonly acceptsInput: boolean;
  /** Prompt text shown in place of the owning mode's own text */
  render(): string;
  tick(event: TickEvent): void;
  handleInput(input: string): void;
  /** Called once when the state is replaced or its mode is destroyed */
  destroy(): void;
}

/**
 * A top-level window occupying one slot of the mode stack.
 */
export interface Mode<T extends SimulationTypes> {
  readonly modeId: ModeIdOf<T>;
  readonly acceptsInput: boolean;
  readonly currentState: State<T> | null;
  readonly shouldRemove: boolean;
  render(): string | null | undefined;
  tick(event: TickEvent): void;
  handleCommand(command: string): void;
  /** Replaces the active state (destroying the previous one) or clears it with null */
  attachState(state: State<T> | null): void;
  /** Flags the mode; the stack sweeps it when it is next active on a tick */
  removeMode(): void;
  destroy(): void;
}

/**
 * What a mode or state can reach of the running simulation.
 */
export interface ModeHost<T extends SimulationTypes> {
  readonly domain: T["domain"];
  readonly logger: Logger<ILogObj>;
  readonly turns: number;
  /** Adds a mode on top of the stack (no-op when already present) */
  addMode(modeId: ModeIdOf<T>): void;
  /** Builds a state bound to the given owner without attaching it */
  createState(stateId: StateIdOf<T>, owner: Mode<T>): State<T>;
  takeTurn(): void;
}

export type ModeConstructor<T extends SimulationTypes> = new (host: ModeHost<T>) => Mode<T>;

export type StateConstructor<T extends SimulationTypes> = new (
  owner: Mode<T>,
  host: ModeHost<T>,
) => State<T>;

/**
 * One constructor per mode identifier. Being a mapped type over the whole
 * union, a missing entry is a compile error.
 */
export type ModeTable<T extends SimulationTypes> = {
  readonly [K in ModeIdOf<T>]: ModeConstructor<T>;
};

/**
 * States registered under their owning mode. Not every mode owns states.
 */
export type StateTable<T extends SimulationTypes> = {
  readonly [K in ModeIdOf<T>]?: { readonly [S in StateIdOf<T>]?: StateConstructor<T> };
};

export interface ModeRegistry<T extends SimulationTypes> {
  /** Every mode identifier, checked against `modes` at start-up */
  readonly modeIds: readonly ModeIdOf<T>[];
  readonly modes: ModeTable<T>;
  readonly states: StateTable<T>;
}

/**
 * Identity helper that pins the generic so tables are checked against it.
 */
export function defineRegistry<T extends SimulationTypes>(registry: ModeRegistry<T>): ModeRegistry<T> {
  return registry;
}
