/**
 * @fileoverview Domain barrel exports
 *
 * Entity types and samplers of the simulated fleet.
 *
 * @module domain
 */

export * from "./entities/index.js";
export * from "./samplers/index.js";
