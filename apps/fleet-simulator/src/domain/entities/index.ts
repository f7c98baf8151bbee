/**
 * @fileoverview Domain entities barrel exports
 *
 * @module domain/entities
 */

export {
    BotSchema,
    DEVICE_TYPES,
    DIRECTIONS,
    DroneSchema,
    RoomSchema,
    SAMPLED_ATTRIBUTE,
    type BotEntity,
    type DeviceType,
    type DroneEntity,
    type RoomEntity,
} from "./fleet.js";
