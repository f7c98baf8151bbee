/**
 * @fileoverview Domain samplers barrel exports
 *
 * @module domain/samplers
 */

export {
    BotSampler,
    createSampler,
    DroneSampler,
    RoomSampler,
} from "./fleetSamplers.js";
