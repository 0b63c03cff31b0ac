import type { ILogObj, Logger } from "tslog";
import { UnregisteredStateError } from "../core/errors.js";
import { defaultLogger } from "../logging/logger.js";
import type {
  Mode,
  ModeHost,
  ModeIdOf,
  ModeRegistry,
  SimulationTypes,
  State,
  StateConstructor,
  StateIdOf,
  StateTable,
} from "./types.js";

/**
 * Builds state instances bound to an owning mode, looked up by
 * (owner mode id, state id) in the registry's state table.
 */
export class StateFactory<T extends SimulationTypes> {
  private readonly table: StateTable<T>;
  private readonly counts = new Map<StateIdOf<T>, number>();
  private readonly host: ModeHost<T>;
  private readonly logger: Logger<ILogObj>;

  constructor(registry: ModeRegistry<T>, host: ModeHost<T>, logger: Logger<ILogObj> = defaultLogger) {
    this.table = registry.states;
    this.host = host;
    this.logger = logger;
  }

  /**
   * @throws UnregisteredStateError when the owner mode does not register the state
   */
  createState(stateId: StateIdOf<T>, ownerModeId: ModeIdOf<T>, owner: Mode<T>): State<T> {
    const ctor = this.lookup(ownerModeId, stateId);
    if (!ctor) {
      throw new UnregisteredStateError(stateId, ownerModeId);
    }

    const state = new ctor(owner, this.host);
    const count = (this.counts.get(stateId) ?? 0) + 1;
    this.counts.set(stateId, count);
    this.logger.debug("State created", { stateId, ownerModeId, count });
    return state;
  }

  /**
   * State identifiers the given mode can switch to.
   */
  statesOf(modeId: ModeIdOf<T>): StateIdOf<T>[] {
    const states = this.statesTableOf(modeId);
    if (!states) {
      return [];
    }

    const ids: StateIdOf<T>[] = [];
    for (const key of Object.keys(states)) {
      if (this.isStateOf(modeId, key)) {
        ids.push(key);
      }
    }
    return ids;
  }

  runCount(stateId: StateIdOf<T>): number {
    return this.counts.get(stateId) ?? 0;
  }

  destroy(): void {
    this.counts.clear();
  }

  private statesTableOf(
    modeId: ModeIdOf<T>,
  ): Record<string, StateConstructor<T> | undefined> | undefined {
    return Object.hasOwn(this.table, modeId) ? this.table[modeId] : undefined;
  }

  // Own keys only, so ids like "toString" never reach Object.prototype.
  private lookup(modeId: ModeIdOf<T>, key: string): StateConstructor<T> | undefined {
    const states = this.statesTableOf(modeId);
    return states && Object.hasOwn(states, key) ? states[key] : undefined;
  }

  private isStateOf(modeId: ModeIdOf<T>, key: string): key is StateIdOf<T> {
    return this.lookup(modeId, key) !== undefined;
  }
}
