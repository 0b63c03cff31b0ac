/**
 * TrailDomain - The small wagon simulation behind the demo content.
 *
 * The wagon moves on pulse ticks only, one day's distance per pulse. Reaching
 * a landmark stops it; reaching a river also leaves a crossing pending until
 * the party gets across.
 */

import type { SimulationDomain, TickEvent } from "trailrunner";

export interface River {
  width: number;
  depth: number;
}

export interface Landmark {
  name: string;
  miles: number;
  river?: River;
}

export const LANDMARKS: readonly Landmark[] = [
  { name: "Independence", miles: 0 },
  { name: "Kansas River", miles: 102, river: { width: 620, depth: 4 } },
  { name: "Fort Kearney", miles: 304 },
  { name: "Chimney Rock", miles: 554 },
];

export const STARTING_CASH = 400;
export const MILES_PER_DAY = 20;
export const FOOD_PER_DAY = 5;
/** Fording is safe up to this depth, in feet */
export const SAFE_FORD_DEPTH = 3;

export type StoreItem = "oxen" | "food";

export const STORE_ITEMS: Readonly<Record<StoreItem, { price: number; quantity: number }>> = {
  oxen: { price: 40, quantity: 1 },
  food: { price: 20, quantity: 100 },
};

export type CrossingMethod = "ford" | "float";

export class TrailDomain implements SimulationDomain {
  leader: string | null = null;
  cash = STARTING_CASH;
  oxen = 0;
  food = 0;
  miles = 0;
  days = 0;
  moving = false;
  /** Last thing that happened on the trail, shown once by the travel screen */
  news: string | null = null;
  /** Set when the player quits from the main menu */
  quitting = false;
  private landmarkIndex = 0;
  private riverDepth: number | null = null;

  vehicleStatus(): string {
    return this.moving ? "Moving" : "Stopped";
  }

  locationStatus(): string {
    return this.location.name;
  }

  get location(): Landmark {
    return LANDMARKS[this.landmarkIndex] ?? LANDMARKS[0];
  }

  get nextLandmark(): Landmark | null {
    return LANDMARKS[this.landmarkIndex + 1] ?? null;
  }

  /** The river the party is waiting to cross, with its current depth */
  get river(): (River & { name: string }) | null {
    const river = this.location.river;
    if (!river || this.riverDepth === null) {
      return null;
    }
    return { name: this.location.name, width: river.width, depth: this.riverDepth };
  }

  get atRiver(): boolean {
    return this.riverDepth !== null;
  }

  /**
   * @returns false, with the reason in `news`, when the wagon cannot leave
   */
  startMoving(): boolean {
    if (this.atRiver) {
      this.news = "You must cross the river first.";
      return false;
    }
    if (this.nextLandmark === null) {
      this.news = "You have reached the end of the trail.";
      return false;
    }
    if (this.oxen === 0) {
      this.news = "You need oxen to pull the wagon.";
      return false;
    }
    if (this.food === 0) {
      this.news = "You need food for the journey.";
      return false;
    }
    this.moving = true;
    return true;
  }

  stop(): void {
    this.moving = false;
  }

  /**
   * @returns false when the party cannot afford the item
   */
  buy(item: StoreItem): boolean {
    const { price, quantity } = STORE_ITEMS[item];
    if (this.cash < price) {
      return false;
    }
    this.cash -= price;
    if (item === "oxen") {
      this.oxen += quantity;
    } else {
      this.food += quantity;
    }
    return true;
  }

  crossRiver(method: CrossingMethod): void {
    const river = this.river;
    if (!river) return;

    if (method === "ford" && river.depth > SAFE_FORD_DEPTH) {
      const lost = Math.floor(this.food / 2);
      this.food -= lost;
      this.news = `The wagon tipped over in the ${river.name}. You lost ${lost} pounds of food.`;
    } else if (method === "ford") {
      this.news = `You forded the ${river.name} safely.`;
    } else {
      this.news = `You floated the wagon across the ${river.name}.`;
    }
    this.riverDepth = null;
  }

  /** A day's wait lowers the river by a foot, down to one foot */
  waitAtRiver(): void {
    if (this.riverDepth !== null) {
      this.riverDepth = Math.max(1, this.riverDepth - 1);
    }
  }

  onTick(event: TickEvent): void {
    if (event.systemTick || event.skipDay || !this.moving) {
      return;
    }
    this.advance();
  }

  onTurn(turns: number): void {
    this.days = turns;
    this.food = Math.max(0, this.food - FOOD_PER_DAY);
    if (this.food === 0 && this.moving) {
      this.moving = false;
      this.news = "You have run out of food.";
    }
  }

  private advance(): void {
    this.miles += MILES_PER_DAY;
    const next = this.nextLandmark;
    if (!next || this.miles < next.miles) {
      return;
    }

    this.miles = next.miles;
    this.landmarkIndex++;
    this.moving = false;
    this.news = `You have reached ${next.name}.`;
    if (next.river) {
      this.riverDepth = next.river.depth;
    }
  }
}
