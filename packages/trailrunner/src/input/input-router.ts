/**
 * InputRouter - Line buffer and command queue between the keyboard and the
 * active mode.
 *
 * Keystrokes build up a buffer of letters and digits; submitting it queues a
 * trimmed command; each tick hands at most one queued command to the
 * `onCommand` callback. The router never decides who receives the command:
 * the owner wires `onCommand` to whichever mode is active at dispatch time.
 */

import type { ILogObj, Logger } from "tslog";
import { defaultLogger } from "../logging/logger.js";

/** A single Unicode letter or number */
const ACCEPTED_CHAR = /^[\p{L}\p{N}]$/u;

/**
 * Source of the input gate, normally the mode stack.
 */
export interface InputGate {
  acceptingInput(): boolean;
}

export interface InputRouterCallbacks {
  onBufferUpdated?: (buffer: string, added: string) => void;
  onCommand?: (command: string) => void;
}

export class InputRouter {
  private lineBuffer = "";
  private readonly queue: string[] = [];
  private readonly gate: InputGate;
  private callbacks: InputRouterCallbacks;
  private readonly logger: Logger<ILogObj>;

  constructor(gate: InputGate, callbacks?: InputRouterCallbacks, logger: Logger<ILogObj> = defaultLogger) {
    this.gate = gate;
    this.callbacks = callbacks ?? {};
    this.logger = logger;
  }

  get buffer(): string {
    return this.lineBuffer;
  }

  pendingCount(): number {
    return this.queue.length;
  }

  /** Queued commands, next one first */
  pending(): readonly string[] {
    return [...this.queue];
  }

  /**
   * Appends a character when it is a letter or digit and input is accepted.
   *
   * @returns true if the buffer changed
   */
  addChar(ch: string): boolean {
    if (!ACCEPTED_CHAR.test(ch)) {
      return false;
    }

    if (!this.gate.acceptingInput()) {
      return false;
    }

    this.lineBuffer += ch;
    this.callbacks.onBufferUpdated?.(this.lineBuffer, ch);
    return true;
  }

  /**
   * Drops the last character. Works even while input is not accepted, so
   * stray keystrokes can always be cleared.
   */
  removeLastChar(): void {
    if (this.lineBuffer.length > 0) {
      this.lineBuffer = Array.from(this.lineBuffer).slice(0, -1).join("");
    }
  }

  /**
   * Queues the buffer as a command and clears it.
   * When input is not accepted, an empty command is queued instead of the
   * buffer's content.
   */
  submit(): void {
    const command = this.gate.acceptingInput() ? this.lineBuffer.trim() : "";
    this.enqueue(command);
    this.lineBuffer = "";
  }

  /**
   * Queues a command unless an identical one is already waiting.
   *
   * @returns true if the command was queued
   */
  enqueue(command: string): boolean {
    const trimmed = command.trim();
    if (this.queue.includes(trimmed)) {
      this.logger.debug("Duplicate command dropped", { command: trimmed });
      return false;
    }

    this.queue.push(trimmed);
    return true;
  }

  /**
   * Dispatches at most one queued command.
   *
   * @returns the dispatched command, or null when the queue was empty
   */
  tick(): string | null {
    const command = this.queue.shift();
    if (command === undefined) {
      return null;
    }

    this.logger.debug("Command dispatched", { command, remaining: this.queue.length });
    this.callbacks.onCommand?.(command);
    return command;
  }

  destroy(): void {
    this.lineBuffer = "";
    this.queue.length = 0;
  }

  onBufferUpdated(callback: (buffer: string, added: string) => void): this {
    this.callbacks.onBufferUpdated = callback;
    return this;
  }

  onCommand(callback: (command: string) => void): this {
    this.callbacks.onCommand = callback;
    return this;
  }
}
