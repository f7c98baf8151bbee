/**
 * @fileoverview Fleet Simulator - Main Entry Point
 *
 * Feeds Orion with readings from a simulated fleet of bots, drones and
 * rooms, then prints the history QuantumLeap recorded for them.
 *
 * Expects Orion and QuantumLeap to be running, e.g. from a compose file;
 * service URLs come from config/simulator.yml or the environment.
 *
 * @module fleet-simulator
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";

import {
    createConsoleLogger,
    OrionClient,
    QuantumLeapClient,
} from "@contextkit/ngsi";

import { loadSimulatorConfigWithFallback } from "./config/index.js";
import { formatReport, runSimulation } from "./simulation.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Main entry point
 */
async function main(): Promise<void> {
    const logger = createConsoleLogger("FleetSimulator");

    const config = loadSimulatorConfigWithFallback(join(__dirname, "..", "config", "simulator.yml"));
    logger.info("Configuration loaded", {
        tenant     : config.tenant,
        orion      : config.orion.baseUrl,
        quantumleap: config.quantumleap.baseUrl,
    });

    // Entities reach Orion without a service path, but Orion notifies
    // QuantumLeap under "/", so QuantumLeap queries need it.
    const orion = new OrionClient(config.orion.baseUrl, { service: config.tenant });
    const quantumleap = new QuantumLeapClient(config.quantumleap.baseUrl, {
        service    : config.tenant,
        servicePath: "/",
    });

    const report = await runSimulation(config, { orion, quantumleap }, logger);
    for (const line of formatReport(report)) {
        console.log(line);
    }
}

main().catch((error: unknown) => {
    console.error("[FATAL] Simulation failed:", error);
    process.exit(1);
});
