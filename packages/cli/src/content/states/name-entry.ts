import { BaseState } from "trailrunner";
import type { TrailTypes } from "../trail-types.js";

export class NameEntryState extends BaseState<TrailTypes> {
  readonly stateId = "nameEntry";
  readonly acceptsInput = true;

  render(): string {
    return "What is the first name of the wagon leader?";
  }

  handleInput(input: string): void {
    if (input.length === 0) return;

    this.host.domain.leader = input;
    this.setState("confirmNames");
  }
}
