import { BaseMode } from "trailrunner";
import type { TrailTypes } from "../trail-types.js";

/**
 * Title screen. Starts name entry or quits; quitting also tells the travel
 * screen below to leave, so the stack empties.
 */
export class MainMenuMode extends BaseMode<TrailTypes> {
  readonly modeId = "mainMenu";
  readonly acceptsInput = true;

  protected onRender(): string {
    return ["Trailrunner", "", "You may:", "", "1. Travel the trail", "2. Quit"].join("\n");
  }

  protected onCommand(command: string): void {
    switch (command) {
      case "1":
        this.setState("nameEntry");
        break;
      case "2":
        this.host.domain.quitting = true;
        this.removeMode();
        break;
    }
  }
}
