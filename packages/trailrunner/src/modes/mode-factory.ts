import type { ILogObj, Logger } from "tslog";
import { InvariantViolation, UnregisteredModeError } from "../core/errors.js";
import { defaultLogger } from "../logging/logger.js";
import type { Mode, ModeConstructor, ModeHost, ModeIdOf, ModeRegistry, SimulationTypes } from "./types.js";

/**
 * Builds mode instances from the registry's mode table.
 *
 * Construction never touches the mode stack; whoever asks for a mode decides
 * whether it becomes active. Every successful build bumps a per-identifier
 * counter kept for diagnostics.
 */
export class ModeFactory<T extends SimulationTypes> {
  private readonly constructors = new Map<ModeIdOf<T>, ModeConstructor<T>>();
  private readonly counts = new Map<ModeIdOf<T>, number>();
  private readonly host: ModeHost<T>;
  private readonly logger: Logger<ILogObj>;

  /**
   * @throws UnregisteredModeError when a declared identifier has no constructor
   */
  constructor(registry: ModeRegistry<T>, host: ModeHost<T>, logger: Logger<ILogObj> = defaultLogger) {
    this.host = host;
    this.logger = logger;

    for (const modeId of registry.modeIds) {
      const ctor: ModeConstructor<T> | undefined = registry.modes[modeId];
      if (!ctor) {
        throw new UnregisteredModeError(modeId);
      }
      this.constructors.set(modeId, ctor);
    }
  }

  /**
   * @throws UnregisteredModeError for identifiers outside the registry
   * @throws InvariantViolation when the built mode reports another identifier
   */
  createMode(modeId: ModeIdOf<T>): Mode<T> {
    const ctor = this.constructors.get(modeId);
    if (!ctor) {
      throw new UnregisteredModeError(modeId);
    }

    const mode = new ctor(this.host);
    if (mode.modeId !== modeId) {
      throw new InvariantViolation(
        `Mode registered as '${modeId}' reports identifier '${mode.modeId}'`,
      );
    }

    const count = (this.counts.get(modeId) ?? 0) + 1;
    this.counts.set(modeId, count);
    this.logger.debug("Mode created", { modeId, count });
    return mode;
  }

  isRegistered(modeId: string): modeId is ModeIdOf<T> {
    for (const registered of this.constructors.keys()) {
      if (registered === modeId) return true;
    }
    return false;
  }

  runCount(modeId: ModeIdOf<T>): number {
    return this.counts.get(modeId) ?? 0;
  }

  runCounts(): ReadonlyMap<ModeIdOf<T>, number> {
    return new Map(this.counts);
  }

  destroy(): void {
    this.counts.clear();
  }
}
