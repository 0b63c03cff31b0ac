import type { InputRouter } from "../input/input-router.js";
import type { ModeStack } from "../modes/mode-stack.js";
import type { SimulationDomain, SimulationTypes } from "../modes/types.js";
import type { Renderer } from "../render/renderer.js";
import type { TickClock } from "./tick-clock.js";

export interface SchedulerParts<T extends SimulationTypes> {
  clock: TickClock;
  domain: SimulationDomain;
  modes: ModeStack<T>;
  input: InputRouter;
  renderer: Renderer<T>;
}

export interface TickOptions {
  /** Forwarded to the domain; the runtime does not interpret it */
  skipDay?: boolean;
}

export interface TickResult {
  pulse: boolean;
  /** Command handed to the active mode this tick, if any */
  dispatched: string | null;
  /** Whether a new frame was emitted */
  rendered: boolean;
}

/**
 * Drives one simulation step in a fixed order: domain signals, mode stack
 * (sweep then tick), one queued command, render. Errors thrown by content
 * code are not caught here.
 */
export class Scheduler<T extends SimulationTypes> {
  private readonly parts: SchedulerParts<T>;

  constructor(parts: SchedulerParts<T>) {
    this.parts = parts;
  }

  tick(options: TickOptions = {}): TickResult {
    const { clock, domain, modes, input, renderer } = this.parts;
    const skipDay = options.skipDay ?? false;
    const { pulse } = clock.advance();

    domain.onTick?.({ systemTick: true, skipDay });
    if (pulse) {
      domain.onTick?.({ systemTick: false, skipDay });
    }

    modes.tick({ systemTick: !pulse, skipDay });
    const dispatched = input.tick();
    const rendered = renderer.tick();

    return { pulse, dispatched, rendered };
  }
}
