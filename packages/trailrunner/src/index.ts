// Constants and errors
export {
  DEFAULT_PULSE_INTERVAL_MS,
  DEFAULT_WINDOW_TEXT,
  INPUT_PROMPT,
  NO_WINDOW_ATTACHED,
  PRESS_ENTER,
  PRESS_YESNO,
  TICK_PHASES,
} from "./core/constants.js";
export { InvariantViolation, UnregisteredModeError, UnregisteredStateError } from "./core/errors.js";
// Input
export type { InputGate, InputRouterCallbacks } from "./input/input-router.js";
export { InputRouter } from "./input/input-router.js";
// Logging
export type { ILogObj, Logger } from "tslog";
export type { LoggerOptions } from "./logging/logger.js";
export { createLogger, defaultLogger, parseLogLevel, stripAnsi } from "./logging/logger.js";
// Modes and states
export { BaseMode } from "./modes/mode.js";
export { ModeFactory } from "./modes/mode-factory.js";
export type { ModeStackCallbacks } from "./modes/mode-stack.js";
export { ModeStack } from "./modes/mode-stack.js";
export type { DialogKind, DialogResponse } from "./modes/state.js";
export { BaseState, DialogState, dialogSuffix, parseDialogResponse } from "./modes/state.js";
export { StateFactory } from "./modes/state-factory.js";
export type {
  Mode,
  ModeConstructor,
  ModeHost,
  ModeIdOf,
  ModeRegistry,
  ModeTable,
  SimulationDomain,
  SimulationTypes,
  State,
  StateConstructor,
  StateIdOf,
  StateTable,
  TickEvent,
} from "./modes/types.js";
export { defineRegistry } from "./modes/types.js";
// Rendering
export type { FrameSource, RendererCallbacks } from "./render/renderer.js";
export { composeFrame, Renderer, renderModeText } from "./render/renderer.js";
// Simulation
export type { SchedulerParts, TickOptions, TickResult } from "./simulation/scheduler.js";
export { Scheduler } from "./simulation/scheduler.js";
export type { SimulationCallbacks, SimulationOptions } from "./simulation/simulation.js";
export { Simulation } from "./simulation/simulation.js";
export type { ClockReading, TickClockOptions } from "./simulation/tick-clock.js";
export { TickClock } from "./simulation/tick-clock.js";
