import { describe, expect, it, vi } from "vitest";
import {
  createFixtureStack,
  expectMode,
  expectState,
  MainMenuMode,
  NameEntryState,
  TravelMode,
} from "../testing/fixtures.js";

const TICK = { systemTick: false, skipDay: true } as const;

function createMenu() {
  const { stack } = createFixtureStack();
  stack.add("mainMenu");
  return expectMode(stack.activeMode(), MainMenuMode);
}

describe("BaseMode", () => {
  describe("without a state", () => {
    it("renders its own text", () => {
      const menu = createMenu();

      expect(menu.render()).toBe("mainMenu window");
    });

    it("handles commands itself", () => {
      const menu = createMenu();

      menu.handleCommand("2");

      expect(menu.commands).toEqual(["2"]);
    });
  });

  describe("with a state", () => {
    it("routes rendering and commands to the state", () => {
      const menu = createMenu();
      const state = expectState(menu.setState("nameEntry"), NameEntryState);

      menu.handleCommand("Ezra");

      expect(menu.render()).toBe("Enter a name");
      expect(state.inputs).toEqual(["Ezra"]);
      expect(menu.commands).toEqual([]);
    });

    it("ticks itself and then the state", () => {
      const menu = createMenu();
      const state = menu.setState("nameEntry");
      const modeTicksSeenByState: number[] = [];
      vi.spyOn(state, "tick").mockImplementation(() => {
        modeTicksSeenByState.push(menu.ticks.length);
      });

      menu.tick(TICK);

      expect(menu.ticks).toEqual([TICK]);
      expect(modeTicksSeenByState).toEqual([1]);
    });

    it("destroys the previous state when another is attached", () => {
      const menu = createMenu();
      const first = expectState(menu.setState("nameEntry"), NameEntryState);

      menu.setState("help");

      expect(first.destroyed).toBe(true);
      expect(menu.currentState?.stateId).toBe("help");
    });

    it("keeps a state that is attached again", () => {
      const menu = createMenu();
      const state = expectState(menu.setState("nameEntry"), NameEntryState);

      menu.attachState(state);

      expect(state.destroyed).toBe(false);
      expect(menu.currentState).toBe(state);
    });

    it("destroys the state when cleared", () => {
      const menu = createMenu();
      const state = expectState(menu.setState("nameEntry"), NameEntryState);

      menu.clearState();

      expect(state.destroyed).toBe(true);
      expect(menu.currentState).toBeNull();
    });
  });

  it("only flags itself on removeMode", () => {
    const { stack } = createFixtureStack();
    stack.add("travel");
    const travel = expectMode(stack.activeMode(), TravelMode);

    travel.removeMode();

    expect(travel.shouldRemove).toBe(true);
    expect(travel.destroyed).toBe(false);
    expect(stack.has("travel")).toBe(true);
  });

  it("destroys its state on destroy", () => {
    const menu = createMenu();
    const state = expectState(menu.setState("nameEntry"), NameEntryState);

    menu.destroy();

    expect(state.destroyed).toBe(true);
    expect(menu.destroyed).toBe(true);
    expect(menu.currentState).toBeNull();
  });
});
