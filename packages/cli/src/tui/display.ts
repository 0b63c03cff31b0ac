/**
 * Frame display for the terminal.
 *
 * Frames arrive from the renderer as plain text. The header and status lines
 * are colored; the window body and prompt are written as they are.
 */

import { Chalk, type ChalkInstance } from "chalk";

/** Clear the screen and home the cursor */
export const CLEAR_SCREEN = "\u001b[2J\u001b[H";

export function formatFrame(frame: string, chalk: ChalkInstance): string {
	const lines = frame.split("\n");
	return lines
		.map((line, index) => {
			if (index === 0) return chalk.bold.cyan(line);
			if (index === 1) return chalk.dim(line);
			return line;
		})
		.join("\n");
}

export interface FrameDisplayOptions {
	color: boolean;
	/** Redraw from the top of the screen on every frame */
	clear: boolean;
}

export class FrameDisplay {
	private readonly out: NodeJS.WritableStream;
	private readonly chalk: ChalkInstance;
	private readonly clear: boolean;

	constructor(out: NodeJS.WritableStream, options: FrameDisplayOptions) {
		this.out = out;
		// level 1 is basic 16-color ANSI
		this.chalk = new Chalk({ level: options.color ? 1 : 0 });
		this.clear = options.clear;
	}

	format(frame: string): string {
		return formatFrame(frame, this.chalk);
	}

	show(frame: string): void {
		this.out.write(`${this.clear ? CLEAR_SCREEN : ""}${this.format(frame)}`);
	}

	hint(message: string): void {
		this.out.write(`\n${this.chalk.yellow(message)}`);
	}
}
