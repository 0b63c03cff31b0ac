import { BaseMode } from "trailrunner";
import { STORE_ITEMS, type StoreItem } from "../trail-domain.js";
import type { TrailTypes } from "../trail-types.js";

const PURCHASES: Readonly<Record<string, StoreItem>> = { "1": "oxen", "2": "food" };

export class StoreMode extends BaseMode<TrailTypes> {
  readonly modeId = "store";
  readonly acceptsInput = true;
  private notice: string | null = null;

  protected onRender(): string {
    const domain = this.host.domain;
    const lines = [
      "General Store",
      `Cash: $${domain.cash}`,
      `Oxen: ${domain.oxen} yoke`,
      `Food: ${domain.food} pounds`,
    ];
    if (this.notice) {
      lines.push(this.notice);
    }
    lines.push(
      "",
      `1. Buy a yoke of oxen ($${STORE_ITEMS.oxen.price})`,
      `2. Buy ${STORE_ITEMS.food.quantity} pounds of food ($${STORE_ITEMS.food.price})`,
      "3. Ask for advice",
      "4. Leave the store",
    );
    return lines.join("\n");
  }

  protected onCommand(command: string): void {
    this.notice = null;

    const item = PURCHASES[command];
    if (item) {
      if (!this.host.domain.buy(item)) {
        this.notice = "You cannot afford that.";
      }
      return;
    }

    if (command === "3") {
      this.setState("storeHelp");
    } else if (command === "4") {
      this.removeMode();
    }
  }
}
