/**
 * TickClock - Turns irregular external ticks into a steady pulse.
 *
 * Every external tick is a system tick. Elapsed wall time is accumulated and
 * each time it reaches the pulse interval the tick is reported as a pulse.
 * The clock also owns the spinner shown in the frame header, which moves once
 * per pulse so that idle frames stay identical between pulses.
 */

import { DEFAULT_PULSE_INTERVAL_MS, TICK_PHASES } from "../core/constants.js";

export interface TickClockOptions {
  /** @default 1000 */
  pulseIntervalMs?: number;
  /** Time source in milliseconds, injectable for tests */
  now?: () => number;
}

export interface ClockReading {
  /** True when this tick completed a pulse interval */
  pulse: boolean;
  phase: string;
}

export class TickClock {
  private readonly pulseIntervalMs: number;
  private readonly now: () => number;
  private lastTickAt: number | null = null;
  private accumulatedMs = 0;
  private pulses = 0;
  private ticks = 0;

  constructor(options: TickClockOptions = {}) {
    const interval = options.pulseIntervalMs ?? DEFAULT_PULSE_INTERVAL_MS;
    if (!Number.isFinite(interval) || interval <= 0) {
      throw new RangeError(`pulseIntervalMs must be a positive number, got ${interval}`);
    }
    this.pulseIntervalMs = interval;
    this.now = options.now ?? Date.now;
  }

  get phase(): string {
    return TICK_PHASES[this.pulses % TICK_PHASES.length];
  }

  get tickCount(): number {
    return this.ticks;
  }

  get pulseCount(): number {
    return this.pulses;
  }

  advance(): ClockReading {
    const now = this.now();
    const elapsed = this.lastTickAt === null ? 0 : Math.max(0, now - this.lastTickAt);
    this.lastTickAt = now;
    this.ticks++;
    this.accumulatedMs += elapsed;

    let pulse = false;
    if (this.accumulatedMs >= this.pulseIntervalMs) {
      // A long stall yields one pulse, not a burst of catch-up pulses
      this.accumulatedMs %= this.pulseIntervalMs;
      this.pulses++;
      pulse = true;
    }

    return { pulse, phase: this.phase };
  }

  reset(): void {
    this.lastTickAt = null;
    this.accumulatedMs = 0;
    this.pulses = 0;
    this.ticks = 0;
  }
}
