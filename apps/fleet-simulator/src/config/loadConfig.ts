/**
 * @fileoverview Simulator configuration loader
 *
 * Loads the simulator settings from YAML, then applies environment
 * overrides for the service URLs and tenant.
 *
 * @module config/loadConfig
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { isStructuredValue } from "@contextkit/ngsi";
import { DEVICE_TYPES } from "../domain/entities/index.js";
import type { DeviceType } from "../domain/entities/index.js";

/**
 * Devices of one type to simulate.
 */
export interface FleetGroup {
    type: DeviceType;
    poolSize: number;
}

/**
 * Simulator settings
 */
export interface SimulatorConfig {
    /** FIWARE service (tenant) all entities live in */
    tenant: string;

    orion: {
        baseUrl: string;
    };

    quantumleap: {
        baseUrl: string;

        /** Notification URL handed to Orion in the subscription */
        notifyUrl: string;
    };

    sampling: {
        /** Batches to send per device pool */
        samples: number;

        /** Seconds between batches */
        rateSeconds: number;
    };

    wait: {
        /** Seconds to wait for services and data */
        maxWait: number;
        sleepInterval: number;
    };

    fleet: FleetGroup[];
}

/**
 * Environment variables read by {@link applyEnvOverrides}.
 */
export type SimulatorEnv = Readonly<Record<string, string | undefined>>;

/**
 * Load the simulator configuration from a YAML file.
 *
 * @param filePath - Path to simulator.yml
 * @param env - Environment to take overrides from
 * @throws Error if the file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * const config = loadSimulatorConfig("./config/simulator.yml");
 * console.log(config.orion.baseUrl);
 * // "http://localhost:1026"
 * ```
 */
export function loadSimulatorConfig(filePath: string, env: SimulatorEnv = process.env): SimulatorConfig {
    if (!existsSync(filePath)) {
        throw new Error(`Simulator config file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed: unknown = parseYaml(content);

    if (!isStructuredValue(parsed)) {
        throw new Error("Invalid simulator config: expected a mapping at the top level");
    }

    const orion = section(parsed, "orion");
    const quantumleap = section(parsed, "quantumleap");
    const sampling = section(parsed, "sampling");
    const wait = section(parsed, "wait");

    const config: SimulatorConfig = {
        tenant: requireString(parsed.tenant, "tenant"),
        orion : {
            baseUrl: requireString(orion.baseUrl, "orion.baseUrl"),
        },
        quantumleap: {
            baseUrl  : requireString(quantumleap.baseUrl, "quantumleap.baseUrl"),
            notifyUrl: requireString(quantumleap.notifyUrl, "quantumleap.notifyUrl"),
        },
        sampling: {
            samples    : requireNumber(sampling.samples, "sampling.samples", 1),
            rateSeconds: requireNumber(sampling.rateSeconds, "sampling.rateSeconds", 0),
        },
        wait: {
            maxWait      : requireNumber(wait.maxWait, "wait.maxWait", 0),
            sleepInterval: requireNumber(wait.sleepInterval, "wait.sleepInterval", 0.001),
        },
        fleet: parseFleet(parsed.fleet),
    };

    return applyEnvOverrides(config, env);
}

/**
 * Load the simulator configuration, falling back to the defaults.
 *
 * @param filePath - Path to simulator.yml
 * @param env - Environment to take overrides from
 */
export function loadSimulatorConfigWithFallback(filePath: string, env: SimulatorEnv = process.env): SimulatorConfig {
    try {
        return loadSimulatorConfig(filePath, env);
    }
    catch (error) {
        console.warn(`Failed to load simulator config from ${filePath}:`, error);
        return applyEnvOverrides(getDefaultConfig(), env);
    }
}

/**
 * Override service URLs and tenant from the environment. Empty variables
 * are ignored.
 */
export function applyEnvOverrides(config: SimulatorConfig, env: SimulatorEnv): SimulatorConfig {
    return {
        ...config,
        tenant: env.FIWARE_SERVICE || config.tenant,
        orion : {
            baseUrl: env.ORION_BASE_URL || config.orion.baseUrl,
        },
        quantumleap: {
            baseUrl  : env.QUANTUMLEAP_BASE_URL || config.quantumleap.baseUrl,
            notifyUrl: env.QUANTUMLEAP_NOTIFY_URL || config.quantumleap.notifyUrl,
        },
    };
}

/**
 * Get the default configuration: services on localhost as started by the
 * usual compose setup.
 */
export function getDefaultConfig(): SimulatorConfig {
    return {
        tenant: "fleet",
        orion : {
            baseUrl: "http://localhost:1026",
        },
        quantumleap: {
            baseUrl  : "http://localhost:8668",
            notifyUrl: "http://quantumleap:8668/v2/notify",
        },
        sampling: {
            samples    : 10,
            rateSeconds: 0.5,
        },
        wait: {
            maxWait      : 30,
            sleepInterval: 1,
        },
        fleet: [
            { type: "Bot", poolSize: 2 },
            { type: "Drone", poolSize: 2 },
            { type: "Room", poolSize: 1 },
        ],
    };
}

function section(parsed: Record<string, unknown>, name: string): Record<string, unknown> {
    const value = parsed[name];
    if (!isStructuredValue(value)) {
        throw new Error(`Invalid simulator config: missing or invalid '${name}' section`);
    }
    return value;
}

function requireString(value: unknown, path: string): string {
    if (typeof value !== "string" || value.length === 0) {
        throw new Error(`Invalid simulator config: missing or invalid '${path}'`);
    }
    return value;
}

function requireNumber(value: unknown, path: string, min: number): number {
    if (typeof value !== "number" || !Number.isFinite(value) || value < min) {
        throw new Error(`Invalid simulator config: '${path}' must be a number >= ${min}`);
    }
    return value;
}

function parseFleet(value: unknown): FleetGroup[] {
    if (!Array.isArray(value) || value.length === 0) {
        throw new Error("Invalid simulator config: expected a non-empty 'fleet' list");
    }

    return value.map((raw: unknown, index) => {
        if (!isStructuredValue(raw)) {
            throw new Error(`Invalid fleet group at index ${index}: expected a mapping`);
        }

        const type = DEVICE_TYPES.find((t) => t === raw.type);
        if (!type) {
            throw new Error(`Invalid fleet group at index ${index}: unknown device type '${String(raw.type)}'`);
        }

        const poolSize = raw.poolSize;
        if (typeof poolSize !== "number" || !Number.isInteger(poolSize) || poolSize < 1) {
            throw new Error(`Invalid fleet group at index ${index}: 'poolSize' must be a positive integer`);
        }

        return { type, poolSize };
    });
}
