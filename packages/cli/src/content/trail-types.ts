import type { SimulationTypes } from "trailrunner";
import type { TrailDomain } from "./trail-domain.js";

export type TrailModeId = "mainMenu" | "travel" | "store" | "riverCrossing";

export type TrailStateId = "nameEntry" | "confirmNames" | "riverCrossHelp" | "storeHelp";

export interface TrailTypes extends SimulationTypes {
  readonly modeId: TrailModeId;
  readonly stateId: TrailStateId;
  readonly domain: TrailDomain;
}
