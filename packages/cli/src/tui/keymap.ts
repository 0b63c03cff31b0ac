/**
 * KeyboardManager - Turns terminal keypresses into typed KeyAction objects.
 *
 * Keypress events come from `readline.emitKeypressEvents` on a raw-mode TTY.
 * Mapping is a pure function so bindings can be tested without a terminal.
 *
 * Key handling rules:
 * - Ctrl+C is always reported (double-press detection lives in the controller)
 * - ENTER submits, BACKSPACE deletes
 * - Any other single character is forwarded; the input router decides
 *   whether it belongs in the buffer
 * - Other control and meta combinations are ignored
 */

import type { Key } from "node:readline";

export type KeyAction =
	| { type: "ctrl_c" }
	| { type: "submit" }
	| { type: "backspace" }
	| { type: "char"; ch: string };

export type KeypressListener = (str: string | undefined, key: Key | undefined) => void;

/** Anything that emits readline keypress events, normally stdin */
export interface KeypressSource {
	on(event: "keypress", listener: KeypressListener): unknown;
	off(event: "keypress", listener: KeypressListener): unknown;
}

export function mapKeypress(str: string | undefined, key: Key | undefined): KeyAction | null {
	if (key?.ctrl && key.name === "c") {
		return { type: "ctrl_c" };
	}

	if (key?.name === "return" || key?.name === "enter") {
		return { type: "submit" };
	}

	if (key?.name === "backspace") {
		return { type: "backspace" };
	}

	if (key?.ctrl || key?.meta) {
		return null;
	}

	if (str !== undefined && Array.from(str).length === 1) {
		return { type: "char", ch: str };
	}

	return null;
}

export interface KeyboardManagerConfig {
	input: KeypressSource;
	onAction: (action: KeyAction) => void;
}

export class KeyboardManager {
	private config: KeyboardManagerConfig;
	private attached = false;

	private readonly listener: KeypressListener = (str, key) => {
		const action = mapKeypress(str, key);
		if (action) {
			this.config.onAction(action);
		}
	};

	constructor(config: KeyboardManagerConfig) {
		this.config = config;
	}

	/**
	 * Start listening for keypresses.
	 */
	setup(): void {
		if (this.attached) return;
		this.config.input.on("keypress", this.listener);
		this.attached = true;
	}

	dispose(): void {
		if (!this.attached) return;
		this.config.input.off("keypress", this.listener);
		this.attached = false;
	}
}
