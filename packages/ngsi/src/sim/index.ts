/**
 * @fileoverview Simulation barrel exports
 *
 * @module @contextkit/ngsi/sim
 */

export {
    EntityFactory,
    entityBatches,
    floatAttrCloseTo,
    randomBoolAttr,
    textAttrFromOneOf,
} from "./generator.js";
export type { EntityGenerator, GeneratedEntity } from "./generator.js";

export { DevicePoolSampler } from "./DevicePoolSampler.js";
export type { ReadingsSink } from "./DevicePoolSampler.js";
