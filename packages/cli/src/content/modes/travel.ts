import { BaseMode, type TickEvent } from "trailrunner";
import type { TrailTypes } from "../trail-types.js";

export class TravelMode extends BaseMode<TrailTypes> {
  readonly modeId = "travel";
  readonly acceptsInput = true;

  protected onRender(): string {
    const domain = this.host.domain;
    const next = domain.nextLandmark;
    const lines = [
      `Day ${domain.days}`,
      `Miles traveled: ${domain.miles}`,
      next
        ? `Next landmark: ${next.name} in ${next.miles - domain.miles} miles`
        : "Next landmark: none, this is the end of the trail",
      `Food: ${domain.food} pounds`,
    ];
    if (domain.news) {
      lines.push(domain.news);
    }
    lines.push("", "1. Continue on the trail", "2. Stop to rest", "3. Visit the store");
    return lines.join("\n");
  }

  protected onCommand(command: string): void {
    const domain = this.host.domain;
    domain.news = null;

    switch (command) {
      case "1":
        domain.startMoving();
        break;
      case "2":
        domain.stop();
        break;
      case "3":
        if (domain.moving) {
          domain.news = "Stop the wagon before visiting the store.";
        } else {
          this.host.addMode("store");
        }
        break;
    }
  }

  protected onTick(event: TickEvent): void {
    const domain = this.host.domain;
    if (domain.quitting) {
      this.removeMode();
      return;
    }

    // One turn per travelled day
    if (!event.systemTick && !event.skipDay && domain.moving) {
      this.host.takeTurn();
    }

    if (domain.atRiver) {
      this.host.addMode("riverCrossing");
    }
  }
}
