/**
 * @fileoverview Simulation run
 *
 * Waits for Orion and QuantumLeap, subscribes QuantumLeap to entity
 * changes, feeds Orion with device readings and finally reads the history
 * QuantumLeap recorded.
 *
 * @module simulation
 */

import {
    toColumns,
    waitForOrion,
    waitForQuantumLeap,
    waitUntil,
} from "@contextkit/ngsi";
import type {
    EntitySeries,
    Logger,
    OrionClient,
    QuantumLeapClient,
} from "@contextkit/ngsi";
import type { SimulatorConfig } from "./config/index.js";
import { createSampler, SAMPLED_ATTRIBUTE } from "./domain/index.js";
import type { DeviceType } from "./domain/index.js";
import { quantumLeapSubscription } from "./subscriptions.js";

/**
 * Service clients a run talks to.
 */
export interface SimulationClients {
    orion: OrionClient;
    quantumleap: QuantumLeapClient;
}

/**
 * History read back per device type.
 */
export type SimulationReport = Map<DeviceType, Map<string, EntitySeries>>;

/**
 * Run one simulation.
 *
 * @param config - Simulator settings
 * @param clients - Orion and QuantumLeap clients
 * @param logger - Progress logger
 * @returns The entity series QuantumLeap holds for each simulated type
 * @throws WaitTimeoutError if a service or the data doesn't show up in time
 */
export async function runSimulation(
    config: SimulatorConfig,
    clients: SimulationClients,
    logger: Logger
): Promise<SimulationReport> {
    const { orion, quantumleap } = clients;
    const waitOptions = { ...config.wait, logger };

    logger.info("Waiting for Orion and QuantumLeap");
    await waitForOrion(orion, waitOptions);
    await waitForQuantumLeap(quantumleap, waitOptions);

    await orion.subscribe(quantumLeapSubscription(config.quantumleap.notifyUrl));

    const { samples, rateSeconds } = config.sampling;
    logger.info("Sampling", { samples, rateSeconds, groups: config.fleet.length });
    await Promise.all(config.fleet.map((group) =>
        createSampler(group.type, group.poolSize, orion, logger).sample(samples, rateSeconds)
    ));

    const report: SimulationReport = new Map();
    for (const group of config.fleet) {
        const attrName = SAMPLED_ATTRIBUTE[group.type];
        const expected = group.poolSize * samples;

        await waitUntil(
            async () => (await quantumleap.countDataPoints(group.type, attrName)) >= expected,
            waitOptions
        );

        const series = await quantumleap.entityTypeSeries(group.type);
        report.set(group.type, series);
        logger.info(`${group.type} history`, { entities: series.size, attribute: attrName, expected });
    }
    return report;
}

/**
 * Render a report as one line per entity: id, sample count, then the
 * columns.
 */
export function formatReport(report: SimulationReport): string[] {
    const lines: string[] = [];
    for (const [type, byId] of report) {
        for (const [entityId, series] of byId) {
            const columns = toColumns(series);
            const names = Object.keys(columns).filter((name) => name !== "index");
            lines.push(`${type} ${entityId}: ${series.index.length} samples [${names.join(", ")}]`);
        }
    }
    return lines;
}
