/**
 * @fileoverview Fleet entity types
 *
 * The devices the simulator knows about: moving bots, flying drones and
 * rooms with a thermometer.
 *
 * @module domain/entities/fleet
 */

import { defineEntitySchema } from "@contextkit/ngsi";
import type { Entity } from "@contextkit/ngsi";

export const BotSchema = defineEntitySchema("Bot", {
    speed    : "Number",
    direction: "Text",
});

export const DroneSchema = defineEntitySchema("Drone", {
    height: "Number",
});

export const RoomSchema = defineEntitySchema("Room", {
    temperature: "Number",
});

export type BotEntity = Entity<typeof BotSchema>;
export type DroneEntity = Entity<typeof DroneSchema>;
export type RoomEntity = Entity<typeof RoomSchema>;

/**
 * Device types the simulator can run.
 */
export const DEVICE_TYPES = ["Bot", "Drone", "Room"] as const;

export type DeviceType = (typeof DEVICE_TYPES)[number];

/** Compass points a bot may head to */
export const DIRECTIONS: readonly string[] = ["N", "E", "S", "W"];

/**
 * Attribute sampled by each device type, used to count stored readings.
 */
export const SAMPLED_ATTRIBUTE: Readonly<Record<DeviceType, string>> = {
    Bot  : "speed",
    Drone: "height",
    Room : "temperature",
};
