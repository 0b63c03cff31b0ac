/**
 * ModeStack - Ordered set of active modes (the window manager).
 *
 * Rules:
 * - One instance per mode identifier; adding a present identifier is a no-op
 * - Insertion order is precedence: the last surviving entry is the active mode
 * - Only the active mode is ticked; flagged modes are swept before it ticks
 *
 * The stack also answers whether input is currently accepted, combining the
 * active mode's flag with its active state's flag (see `acceptingInput()`).
 */

import type { ILogObj, Logger } from "tslog";
import { InvariantViolation } from "../core/errors.js";
import { defaultLogger } from "../logging/logger.js";
import type { ModeFactory } from "./mode-factory.js";
import type { StateFactory } from "./state-factory.js";
import type { Mode, ModeIdOf, SimulationTypes, State, StateIdOf, TickEvent } from "./types.js";

export interface ModeStackCallbacks<T extends SimulationTypes> {
  /** Fires with the identifier of the mode that is active after the change */
  onModeChanged?: (modeId: ModeIdOf<T>) => void;
}

export class ModeStack<T extends SimulationTypes> {
  private readonly modes = new Map<ModeIdOf<T>, Mode<T>>();
  private readonly modeFactory: ModeFactory<T>;
  private readonly stateFactory: StateFactory<T>;
  private callbacks: ModeStackCallbacks<T>;
  private readonly logger: Logger<ILogObj>;

  constructor(
    modeFactory: ModeFactory<T>,
    stateFactory: StateFactory<T>,
    callbacks?: ModeStackCallbacks<T>,
    logger: Logger<ILogObj> = defaultLogger,
  ) {
    this.modeFactory = modeFactory;
    this.stateFactory = stateFactory;
    this.callbacks = callbacks ?? {};
    this.logger = logger;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Queries
  // ─────────────────────────────────────────────────────────────────────────────

  activeMode(): Mode<T> | null {
    let last: Mode<T> | null = null;
    for (const mode of this.modes.values()) {
      last = mode;
    }
    return last;
  }

  has(modeId: ModeIdOf<T>): boolean {
    return this.modes.has(modeId);
  }

  count(): number {
    return this.modes.size;
  }

  /** Identifiers in precedence order, active mode last */
  modeIds(): ModeIdOf<T>[] {
    return Array.from(this.modes.keys());
  }

  runCount(modeId: ModeIdOf<T>): number {
    return this.modeFactory.runCount(modeId);
  }

  /**
   * Whether typed input should reach the active mode right now.
   *
   * A mode without a state is judged by its own flag alone; a mode with a
   * state needs both its flag and the state's flag.
   */
  acceptingInput(): boolean {
    const mode = this.activeMode();

    if (mode === null) {
      return false;
    }

    if (!mode.acceptsInput && mode.currentState === null) {
      return false;
    }

    if (mode.currentState !== null && !mode.acceptsInput) {
      return false;
    }

    if (mode.currentState !== null && mode.acceptsInput && !mode.currentState.acceptsInput) {
      return false;
    }

    return true;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Mutations
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Builds the mode and makes it active, unless it is already on the stack.
   */
  add(modeId: ModeIdOf<T>): void {
    if (this.modes.has(modeId)) {
      return;
    }

    const mode = this.modeFactory.createMode(modeId);
    this.modes.set(modeId, mode);
    this.logger.debug("Mode added", { modeId, count: this.modes.size });
    this.callbacks.onModeChanged?.(mode.modeId);
  }

  /**
   * Removes and destroys every mode flagged for removal.
   *
   * @throws InvariantViolation when the stack is empty
   */
  removeFlagged(): void {
    if (this.activeMode() === null) {
      throw new InvariantViolation("Attempted to remove flagged modes while no mode is active");
    }

    const snapshot = Array.from(this.modes.entries());
    for (const [modeId, mode] of snapshot) {
      if (!mode.shouldRemove) {
        continue;
      }

      this.modes.delete(modeId);
      mode.destroy();
      this.logger.debug("Mode removed", { modeId, count: this.modes.size });

      const active = this.activeMode();
      if (active !== null) {
        this.callbacks.onModeChanged?.(active.modeId);
      }
    }
  }

  /**
   * Builds a state owned by the active mode and attaches it there.
   *
   * @throws InvariantViolation when no mode is active
   * @throws UnregisteredStateError when the active mode does not register the state
   */
  createStateForActiveMode(stateId: StateIdOf<T>): State<T> {
    const mode = this.activeMode();
    if (mode === null) {
      throw new InvariantViolation(`Cannot create state '${stateId}' without an active mode`);
    }

    const state = this.stateFactory.createState(stateId, mode.modeId, mode);
    mode.attachState(state);
    return state;
  }

  tick(event: TickEvent): void {
    const active = this.activeMode();
    if (active?.shouldRemove) {
      this.removeFlagged();
    }

    this.activeMode()?.tick(event);
  }

  /**
   * Destroys every mode and empties the stack. No notification fires.
   */
  destroy(): void {
    for (const mode of this.modes.values()) {
      mode.destroy();
    }
    this.modes.clear();
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Callback Registration
  // ─────────────────────────────────────────────────────────────────────────────

  onModeChanged(callback: (modeId: ModeIdOf<T>) => void): this {
    this.callbacks.onModeChanged = callback;
    return this;
  }
}
