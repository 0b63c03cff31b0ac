import { type DialogKind, type DialogResponse, DialogState } from "trailrunner";
import type { TrailTypes } from "../trail-types.js";

/**
 * Yes closes the main menu, uncovering the travel screen beneath it; no asks
 * for the name again.
 */
export class ConfirmNamesState extends DialogState<TrailTypes> {
  readonly stateId = "confirmNames";
  readonly dialogKind: DialogKind = "yesNo";

  protected onDialogPrompt(): string {
    const leader = this.host.domain.leader ?? "nobody";
    return `Your wagon leader is ${leader}.\n\nAre these names correct?`;
  }

  protected onDialogResponse(response: DialogResponse): void {
    if (response === "yes") {
      this.owner.removeMode();
      return;
    }

    this.host.domain.leader = null;
    this.setState("nameEntry");
  }
}
