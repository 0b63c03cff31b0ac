// Prompt suffixes shared by dialog states
export const PRESS_ENTER = "Press ENTER KEY to continue";
export const PRESS_YESNO = "What is your response? Y/N";

// Renderer fallbacks
/** Shown when the active mode has nothing to say */
export const DEFAULT_WINDOW_TEXT = "[DEFAULT WINDOW TEXT]";

/** Shown when the mode stack is empty */
export const NO_WINDOW_ATTACHED = "[NO WINDOW ATTACHED]";

/** Prefix echoed in front of the live input buffer */
export const INPUT_PROMPT = "What is your choice? ";

// Clock defaults
/** Accumulated milliseconds between two pulse ticks */
export const DEFAULT_PULSE_INTERVAL_MS = 1000;

/** Spinner frames shown in the frame header, advanced once per pulse */
export const TICK_PHASES = ["|", "/", "-", "\\"] as const;
