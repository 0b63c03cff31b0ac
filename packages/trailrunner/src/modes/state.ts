import { PRESS_ENTER, PRESS_YESNO } from "../core/constants.js";
import type { Mode, ModeHost, SimulationTypes, State, StateIdOf, TickEvent } from "./types.js";

/**
 * Base class for content states. A state acts on its owner: it can replace
 * itself with another state or clear the owner back to no state.
 */
export abstract class BaseState<T extends SimulationTypes> implements State<T> {
  abstract readonly stateId: StateIdOf<T>;
  abstract readonly acceptsInput: boolean;

  protected readonly owner: Mode<T>;
  protected readonly host: ModeHost<T>;

  constructor(owner: Mode<T>, host: ModeHost<T>) {
    this.owner = owner;
    this.host = host;
  }

  abstract render(): string;

  abstract handleInput(input: string): void;

  tick(_event: TickEvent): void {}

  destroy(): void {}

  protected setState(stateId: StateIdOf<T>): void {
    this.owner.attachState(this.host.createState(stateId, this.owner));
  }

  protected clearState(): void {
    this.owner.attachState(null);
  }
}

/**
 * - prompt: informational text, any input continues
 * - yesNo: waits for an answer starting with Y or N
 * - custom: free-form, any input is handed over
 */
export type DialogKind = "prompt" | "yesNo" | "custom";

export type DialogResponse = "yes" | "no" | "custom";

/**
 * Parses raw input for a dialog of the given kind. Returns null when a
 * yes/no dialog gets an answer it does not understand, so it keeps waiting.
 */
export function parseDialogResponse(kind: DialogKind, input: string): DialogResponse | null {
  if (kind !== "yesNo") {
    return "custom";
  }

  const first = input.trim().charAt(0).toLowerCase();
  if (first === "y") return "yes";
  if (first === "n") return "no";
  return null;
}

/**
 * Suffix printed on its own line under the dialog's prompt text.
 */
export function dialogSuffix(kind: DialogKind): string | null {
  switch (kind) {
    case "prompt":
      return PRESS_ENTER;
    case "yesNo":
      return PRESS_YESNO;
    case "custom":
      return null;
  }
}

/**
 * A state that shows a prompt and turns the next command into a typed
 * `DialogResponse`.
 */
export abstract class DialogState<T extends SimulationTypes> extends BaseState<T> {
  abstract readonly dialogKind: DialogKind;

  get acceptsInput(): boolean {
    return true;
  }

  render(): string {
    const prompt = this.onDialogPrompt();
    const suffix = dialogSuffix(this.dialogKind);
    return suffix === null ? prompt : `${prompt}\n${suffix}`;
  }

  handleInput(input: string): void {
    const response = parseDialogResponse(this.dialogKind, input);
    if (response === null) {
      return;
    }
    this.onDialogResponse(response, input);
  }

  protected abstract onDialogPrompt(): string;

  /**
   * @param input - the raw command, useful to custom dialogs
   */
  protected abstract onDialogResponse(response: DialogResponse, input: string): void;
}
