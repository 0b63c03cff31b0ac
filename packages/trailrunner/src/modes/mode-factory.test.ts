import { describe, expect, it } from "vitest";
import { InvariantViolation, UnregisteredModeError } from "../core/errors.js";
import {
  createFixtureStack,
  FixtureDomain,
  type FixtureTypes,
  fixtureRegistry,
  quietLogger,
  StoreMode,
  TravelMode,
} from "../testing/fixtures.js";
import { BaseMode } from "./mode.js";
import { ModeFactory } from "./mode-factory.js";
import { defineRegistry, type ModeHost, type SimulationTypes } from "./types.js";

/** Identifiers widened to string so a table can miss one at runtime */
interface LooseTypes extends SimulationTypes {
  readonly modeId: string;
  readonly stateId: string;
  readonly domain: FixtureDomain;
}

class LooseTravelMode extends BaseMode<LooseTypes> {
  readonly modeId = "travel";
  readonly acceptsInput = true;

  protected onRender(): string {
    return "on the trail";
  }

  protected onCommand(): void {}
}

describe("ModeFactory", () => {
  it("builds the registered class for an identifier", () => {
    const { modes } = createFixtureStack();

    const mode = modes.createMode("travel");

    expect(mode).toBeInstanceOf(TravelMode);
    expect(mode.modeId).toBe("travel");
  });

  it("builds a fresh instance on every call", () => {
    const { modes } = createFixtureStack();

    expect(modes.createMode("store")).not.toBe(modes.createMode("store"));
  });

  it("counts creations per identifier", () => {
    const { modes } = createFixtureStack();

    modes.createMode("store");
    modes.createMode("store");
    modes.createMode("travel");

    expect(modes.runCount("store")).toBe(2);
    expect(modes.runCount("travel")).toBe(1);
    expect(modes.runCount("mainMenu")).toBe(0);
    expect(Array.from(modes.runCounts())).toEqual([
      ["store", 2],
      ["travel", 1],
    ]);
  });

  it("does not touch the mode stack", () => {
    const { stack, modes } = createFixtureStack();

    modes.createMode("travel");

    expect(stack.count()).toBe(0);
    expect(stack.activeMode()).toBeNull();
  });

  it("rejects a declared identifier missing from the table at construction", () => {
    const host: ModeHost<LooseTypes> = {
      domain: new FixtureDomain(),
      logger: quietLogger,
      turns: 0,
      addMode: () => {},
      createState: () => {
        throw new Error("no states in this registry");
      },
      takeTurn: () => {},
    };
    const registry = defineRegistry<LooseTypes>({
      modeIds: ["travel", "river"],
      modes: { travel: LooseTravelMode },
      states: {},
    });

    expect(() => new ModeFactory(registry, host, quietLogger)).toThrow(
      new UnregisteredModeError("river"),
    );
  });

  it("rejects identifiers that were never declared", () => {
    const { host } = createFixtureStack();
    const factory = new ModeFactory(
      defineRegistry<FixtureTypes>({ ...fixtureRegistry, modeIds: ["travel"] }),
      host,
      quietLogger,
    );

    expect(() => factory.createMode("store")).toThrow(UnregisteredModeError);
    expect(factory.isRegistered("travel")).toBe(true);
    expect(factory.isRegistered("store")).toBe(false);
  });

  it("rejects a class that reports another identifier", () => {
    const { host } = createFixtureStack();
    const mislabeled = defineRegistry<FixtureTypes>({
      ...fixtureRegistry,
      modes: { ...fixtureRegistry.modes, travel: StoreMode },
    });
    const factory = new ModeFactory(mislabeled, host, quietLogger);

    expect(() => factory.createMode("travel")).toThrow(InvariantViolation);
    expect(factory.runCount("travel")).toBe(0);
  });

  it("clears counters on destroy", () => {
    const { modes } = createFixtureStack();
    modes.createMode("travel");

    modes.destroy();

    expect(modes.runCount("travel")).toBe(0);
  });
});
