/**
 * Renderer - Builds the text frame of the simulation and reports when it
 * changes.
 *
 * Frame layout:
 *
 * ```
 * [ | ] - Window(2): store() - Turns: 0003
 * Vehicle: Stopped - Location:Independence
 * <active mode or state text>
 * What is your choice? <buffer>        (only while input is accepted)
 * ```
 *
 * The renderer does not draw anything; subscribers receive the whole frame
 * through `onBufferChanged` and decide how to show it.
 */

import { DEFAULT_WINDOW_TEXT, INPUT_PROMPT, NO_WINDOW_ATTACHED } from "../core/constants.js";
import type { Mode, SimulationDomain, SimulationTypes } from "../modes/types.js";

/**
 * Everything a frame is made of. The simulation context implements it.
 */
export interface FrameSource<T extends SimulationTypes> {
  readonly tickPhase: string;
  readonly turns: number;
  readonly domain: SimulationDomain;
  readonly inputBuffer: string;
  activeMode(): Mode<T> | null;
  modeCount(): number;
  acceptingInput(): boolean;
}

export interface RendererCallbacks {
  onBufferChanged?: (frame: string) => void;
}

/**
 * Text of the active mode, or a fixed marker when there is none or it is empty.
 */
export function renderModeText<T extends SimulationTypes>(mode: Mode<T> | null): string {
  if (mode === null) {
    return NO_WINDOW_ATTACHED;
  }

  const text = mode.render();
  return text ? text : DEFAULT_WINDOW_TEXT;
}

export function composeFrame<T extends SimulationTypes>(source: FrameSource<T>): string {
  const mode = source.activeMode();
  const modeLabel = mode?.modeId ?? "";
  const stateLabel = mode?.currentState?.stateId ?? "";
  const turns = String(source.turns).padStart(4, "0");

  let frame = `[ ${source.tickPhase} ] - `;
  frame += `Window(${source.modeCount()}): ${modeLabel}(${stateLabel}) - `;
  frame += `Turns: ${turns}\n`;
  frame += `Vehicle: ${source.domain.vehicleStatus()} - Location:${source.domain.locationStatus()}\n`;
  frame += `${renderModeText(mode)}\n`;

  if (source.acceptingInput()) {
    frame += `${INPUT_PROMPT}${source.inputBuffer}`;
  }

  return frame;
}

export class Renderer<T extends SimulationTypes> {
  private screenBuffer = "";
  private readonly source: FrameSource<T>;
  private callbacks: RendererCallbacks;

  constructor(source: FrameSource<T>, callbacks?: RendererCallbacks) {
    this.source = source;
    this.callbacks = callbacks ?? {};
  }

  /** Last frame handed to subscribers */
  get frame(): string {
    return this.screenBuffer;
  }

  /**
   * Recomputes the frame; notifies only when it differs from the previous
   * one, ignoring case.
   *
   * @returns true if the frame changed
   */
  tick(): boolean {
    const frame = composeFrame(this.source);
    if (sameText(frame, this.screenBuffer)) {
      return false;
    }

    this.screenBuffer = frame;
    this.callbacks.onBufferChanged?.(frame);
    return true;
  }

  destroy(): void {
    this.screenBuffer = "";
  }

  onBufferChanged(callback: (frame: string) => void): this {
    this.callbacks.onBufferChanged = callback;
    return this;
  }
}

function sameText(a: string, b: string): boolean {
  return a.toUpperCase() === b.toUpperCase();
}
