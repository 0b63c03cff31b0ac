import type { Mode, ModeHost, ModeIdOf, SimulationTypes, State, StateIdOf, TickEvent } from "./types.js";

/**
 * Base class for content modes.
 *
 * Owns zero or one active state. While a state is attached, commands and
 * rendering go to it; otherwise they reach `onCommand()` / `onRender()`.
 *
 * @example
 * ```typescript
 * class StoreMode extends BaseMode<TrailTypes> {
 *   readonly modeId = "store";
 *   readonly acceptsInput = true;
 *
 *   protected onRender(): string {
 *     return "1. Buy oxen\n2. Leave store";
 *   }
 *
 *   protected onCommand(command: string): void {
 *     if (command === "2") this.removeMode();
 *   }
 * }
 * ```
 */
export abstract class BaseMode<T extends SimulationTypes> implements Mode<T> {
  abstract readonly modeId: ModeIdOf<T>;
  abstract readonly acceptsInput: boolean;

  protected readonly host: ModeHost<T>;
  private state: State<T> | null = null;
  private removeFlag = false;

  constructor(host: ModeHost<T>) {
    this.host = host;
  }

  get currentState(): State<T> | null {
    return this.state;
  }

  get shouldRemove(): boolean {
    return this.removeFlag;
  }

  /**
   * Creates the given state for this mode and makes it the active one.
   */
  setState(stateId: StateIdOf<T>): State<T> {
    const state = this.host.createState(stateId, this);
    this.attachState(state);
    return state;
  }

  clearState(): void {
    this.attachState(null);
  }

  attachState(state: State<T> | null): void {
    const previous = this.state;
    if (previous === state) {
      return;
    }

    this.state = state;
    previous?.destroy();
    this.host.logger.debug("State changed", {
      modeId: this.modeId,
      from: previous?.stateId ?? null,
      to: state?.stateId ?? null,
    });
  }

  /**
   * Flags this mode; the mode stack sweeps it on its next tick.
   */
  removeMode(): void {
    this.removeFlag = true;
  }

  render(): string | null | undefined {
    if (this.state) {
      return this.state.render();
    }
    return this.onRender();
  }

  tick(event: TickEvent): void {
    this.onTick(event);
    this.state?.tick(event);
  }

  handleCommand(command: string): void {
    if (this.state) {
      this.state.handleInput(command);
      return;
    }
    this.onCommand(command);
  }

  destroy(): void {
    this.attachState(null);
    this.onDestroy();
  }

  protected abstract onRender(): string | null | undefined;

  protected abstract onCommand(command: string): void;

  protected onTick(_event: TickEvent): void {}

  protected onDestroy(): void {}
}
