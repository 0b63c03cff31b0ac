/**
 * PlayController - Routes key actions into the simulation's input router.
 *
 * Also handles Ctrl+C double-press detection for quit. The controller holds
 * no terminal state, so it is fully testable without a TTY.
 */

import { QUIT_HINT } from "../constants.js";
import type { KeyAction } from "./keymap.js";

/** Window for double Ctrl+C detection (ms) */
export const CTRL_C_WINDOW_MS = 1000;

/** The slice of the input router the controller drives */
export interface PlayInput {
	addChar(ch: string): boolean;
	removeLastChar(): void;
	submit(): void;
}

export interface PlayControllerCallbacks {
	onQuit?: () => void;
	onHint?: (message: string) => void;
}

export class PlayController {
	private readonly input: PlayInput;
	private callbacks: PlayControllerCallbacks;
	private readonly now: () => number;
	private lastCtrlCTime: number | null = null;

	constructor(input: PlayInput, callbacks?: PlayControllerCallbacks, now: () => number = Date.now) {
		this.input = input;
		this.callbacks = callbacks ?? {};
		this.now = now;
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Key Actions
	// ─────────────────────────────────────────────────────────────────────────────

	handleAction(action: KeyAction): void {
		switch (action.type) {
			case "char":
				this.input.addChar(action.ch);
				break;
			case "backspace":
				this.input.removeLastChar();
				break;
			case "submit":
				this.input.submit();
				break;
			case "ctrl_c":
				if (this.handleCtrlC() === "show_hint") {
					this.callbacks.onHint?.(QUIT_HINT);
				}
				break;
		}
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Ctrl+C Handling
	// ─────────────────────────────────────────────────────────────────────────────

	/**
	 * Handle Ctrl+C keypress.
	 * @returns "show_hint" for first press, "quit" for second press within window
	 */
	handleCtrlC(): "show_hint" | "quit" {
		const now = this.now();

		if (this.lastCtrlCTime !== null && now - this.lastCtrlCTime < CTRL_C_WINDOW_MS) {
			// Second press within window - trigger quit
			this.lastCtrlCTime = null;
			this.callbacks.onQuit?.();
			return "quit";
		}

		this.lastCtrlCTime = now;
		return "show_hint";
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Callback Registration
	// ─────────────────────────────────────────────────────────────────────────────

	onQuit(callback: () => void): this {
		this.callbacks.onQuit = callback;
		return this;
	}

	onHint(callback: (message: string) => void): this {
		this.callbacks.onHint = callback;
		return this;
	}
}
