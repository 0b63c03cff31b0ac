import { type DialogKind, DialogState } from "trailrunner";
import type { TrailTypes } from "../trail-types.js";

export class StoreHelpState extends DialogState<TrailTypes> {
  readonly stateId = "storeHelp";
  readonly dialogKind: DialogKind = "prompt";

  protected onDialogPrompt(): string {
    return [
      "Oxen pull the wagon and food",
      "keeps the party alive. A yoke",
      "of oxen and a few hundred",
      "pounds of food will see you",
      "to the next fort.",
    ].join("\n");
  }

  protected onDialogResponse(): void {
    this.clearState();
  }
}
