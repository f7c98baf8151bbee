/**
 * @fileoverview Fleet samplers
 *
 * One DevicePoolSampler per device type, producing readings that wander
 * around a fixed base value.
 *
 * @module domain/samplers/fleetSamplers
 */

import {
    DevicePoolSampler,
    Entity,
    floatAttrCloseTo,
    newAttribute,
    textAttrFromOneOf,
} from "@contextkit/ngsi";
import type { Logger, ReadingsSink } from "@contextkit/ngsi";
import {
    BotSchema,
    DIRECTIONS,
    DroneSchema,
    RoomSchema,
} from "../entities/index.js";
import type {
    BotEntity,
    DeviceType,
    DroneEntity,
    RoomEntity,
} from "../entities/index.js";

export class BotSampler extends DevicePoolSampler<BotEntity> {
    newDeviceEntity(): BotEntity {
        return Entity.create(BotSchema, "", {
            speed    : floatAttrCloseTo(1.0335),
            direction: textAttrFromOneOf(DIRECTIONS),
        });
    }
}

/**
 * Drones hover somewhere between 102 and 112 metres.
 */
export class DroneSampler extends DevicePoolSampler<DroneEntity> {
    newDeviceEntity(): DroneEntity {
        return Entity.create(DroneSchema, "", {
            height: newAttribute("Number", 102.0335 + 10 * Math.random()),
        });
    }
}

export class RoomSampler extends DevicePoolSampler<RoomEntity> {
    newDeviceEntity(): RoomEntity {
        return Entity.create(RoomSchema, "", {
            temperature: floatAttrCloseTo(20.0335),
        });
    }
}

/**
 * Create the sampler for a device type.
 *
 * @param type - Device type
 * @param poolSize - Number of devices in the pool
 * @param orion - Where readings go
 * @param logger - Sampler logger
 */
export function createSampler(
    type: DeviceType,
    poolSize: number,
    orion: ReadingsSink,
    logger?: Logger
): DevicePoolSampler {
    switch (type) {
        case "Bot":
            return new BotSampler(poolSize, orion, logger);
        case "Drone":
            return new DroneSampler(poolSize, orion, logger);
        case "Room":
            return new RoomSampler(poolSize, orion, logger);
    }
}
