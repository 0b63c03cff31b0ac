import { BaseMode, type TickEvent } from "trailrunner";
import type { TrailTypes } from "../trail-types.js";

/**
 * Pushed by the travel screen when the wagon reaches a river. Explains the
 * crossing once, then offers the ways across.
 */
export class RiverCrossingMode extends BaseMode<TrailTypes> {
  readonly modeId = "riverCrossing";
  readonly acceptsInput = true;
  private helpShown = false;

  protected onRender(): string {
    const river = this.host.domain.river;
    if (!river) {
      return "There is no river here.";
    }
    return [
      river.name,
      `The river is ${river.width} feet across and ${river.depth} feet deep.`,
      "",
      "1. Ford the river",
      "2. Float the wagon across",
      "3. Wait a day",
    ].join("\n");
  }

  protected onCommand(command: string): void {
    const domain = this.host.domain;

    switch (command) {
      case "1":
        domain.crossRiver("ford");
        this.removeMode();
        break;
      case "2":
        this.host.takeTurn();
        domain.crossRiver("float");
        this.removeMode();
        break;
      case "3":
        this.host.takeTurn();
        domain.waitAtRiver();
        break;
    }
  }

  protected onTick(_event: TickEvent): void {
    if (!this.helpShown) {
      this.helpShown = true;
      this.setState("riverCrossHelp");
    }
  }
}
