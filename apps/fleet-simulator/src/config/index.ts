/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    applyEnvOverrides,
    getDefaultConfig,
    loadSimulatorConfig,
    loadSimulatorConfigWithFallback,
    type FleetGroup,
    type SimulatorConfig,
    type SimulatorEnv,
} from "./loadConfig.js";
