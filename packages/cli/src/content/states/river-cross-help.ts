import { type DialogKind, DialogState } from "trailrunner";
import type { TrailTypes } from "../trail-types.js";

export class RiverCrossHelpState extends DialogState<TrailTypes> {
  readonly stateId = "riverCrossHelp";
  readonly dialogKind: DialogKind = "prompt";

  protected onDialogPrompt(): string {
    const river = this.host.domain.river;
    const width = river?.width ?? 0;
    const depth = river?.depth ?? 0;
    return [
      "You must cross the river in",
      "order to continue. The",
      "river at this point is",
      `currently ${width} feet across,`,
      `and ${depth} feet deep in the`,
      "middle.",
    ].join("\n");
  }

  protected onDialogResponse(): void {
    this.clearState();
  }
}
