export { INITIAL_MODES, createTrailSimulation, trailRegistry } from "./registry.js";
export type { TrailSimulationOptions } from "./registry.js";
export { LANDMARKS, TrailDomain } from "./trail-domain.js";
export type { TrailModeId, TrailStateId, TrailTypes } from "./trail-types.js";
