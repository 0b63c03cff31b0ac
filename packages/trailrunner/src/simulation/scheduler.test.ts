import { describe, expect, it, vi } from "vitest";
import { InputRouter } from "../input/input-router.js";
import { Renderer } from "../render/renderer.js";
import {
  createFixtureStack,
  expectMode,
  quietLogger,
  StoreMode,
  TravelMode,
} from "../testing/fixtures.js";
import { Scheduler } from "./scheduler.js";
import { TickClock } from "./tick-clock.js";

function createParts() {
  const time = { now: 0 };
  const { stack, domain } = createFixtureStack();
  const clock = new TickClock({ pulseIntervalMs: 100, now: () => time.now });
  const input = new InputRouter(
    stack,
    { onCommand: (command) => stack.activeMode()?.handleCommand(command) },
    quietLogger,
  );
  const renderer = new Renderer({
    get tickPhase() {
      return clock.phase;
    },
    turns: 0,
    domain,
    get inputBuffer() {
      return input.buffer;
    },
    activeMode: () => stack.activeMode(),
    modeCount: () => stack.count(),
    acceptingInput: () => stack.acceptingInput(),
  });
  const scheduler = new Scheduler({ clock, domain, modes: stack, input, renderer });
  return { scheduler, time, stack, domain, clock, input, renderer };
}

describe("Scheduler", () => {
  it("runs clock, domain, modes, input and renderer in that order", () => {
    const { scheduler, stack, domain, clock, input, renderer } = createParts();
    stack.add("travel");
    const advance = vi.spyOn(clock, "advance");
    const domainTick = vi.spyOn(domain, "onTick");
    const modesTick = vi.spyOn(stack, "tick");
    const inputTick = vi.spyOn(input, "tick");
    const renderTick = vi.spyOn(renderer, "tick");

    scheduler.tick();

    const order = [advance, domainTick, modesTick, inputTick, renderTick].map(
      (spy) => spy.mock.invocationCallOrder[0] ?? -1,
    );
    expect(order.every((n) => n > 0)).toBe(true);
    expect([...order].sort((a, b) => a - b)).toEqual(order);
  });

  it("sends one system tick to domain and modes between pulses", () => {
    const { scheduler, stack, domain } = createParts();
    stack.add("travel");

    const result = scheduler.tick();

    expect(result.pulse).toBe(false);
    expect(domain.ticks).toEqual([{ systemTick: true, skipDay: false }]);
    expect(expectMode(stack.activeMode(), TravelMode).ticks).toEqual([
      { systemTick: true, skipDay: false },
    ]);
  });

  it("adds a pulse tick for the domain and hands modes the pulse", () => {
    const { scheduler, stack, domain, time } = createParts();
    stack.add("travel");
    scheduler.tick();
    domain.ticks.length = 0;

    time.now = 100;
    const result = scheduler.tick({ skipDay: true });

    expect(result.pulse).toBe(true);
    expect(domain.ticks).toEqual([
      { systemTick: true, skipDay: true },
      { systemTick: false, skipDay: true },
    ]);
    expect(expectMode(stack.activeMode(), TravelMode).ticks[1]).toEqual({
      systemTick: false,
      skipDay: true,
    });
  });

  it("dispatches one queued command per tick to the active mode", () => {
    const { scheduler, stack, input } = createParts();
    stack.add("travel");
    input.enqueue("1");
    input.enqueue("2");

    expect(scheduler.tick().dispatched).toBe("1");
    expect(scheduler.tick().dispatched).toBe("2");
    expect(scheduler.tick().dispatched).toBeNull();
    expect(expectMode(stack.activeMode(), TravelMode).commands).toEqual(["1", "2"]);
  });

  it("sweeps a flagged mode before dispatching, so the command reaches the mode below", () => {
    const { scheduler, stack, input } = createParts();
    stack.add("travel");
    stack.add("store");
    const store = expectMode(stack.activeMode(), StoreMode);
    store.removeMode();
    input.enqueue("go");

    scheduler.tick();

    expect(store.commands).toEqual([]);
    expect(expectMode(stack.activeMode(), TravelMode).commands).toEqual(["go"]);
  });

  it("reports whether a new frame was emitted", () => {
    const { scheduler, stack, input } = createParts();
    stack.add("travel");

    expect(scheduler.tick().rendered).toBe(true);
    expect(scheduler.tick().rendered).toBe(false);
    input.addChar("a");
    expect(scheduler.tick().rendered).toBe(true);
  });
});
