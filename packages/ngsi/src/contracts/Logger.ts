/**
 * @fileoverview Logger contract
 *
 * Clients, the transport, samplers and waiters all log through this
 * interface so applications can plug in whatever logger they use.
 *
 * @module @contextkit/ngsi/contracts/Logger
 */

/**
 * Logger interface accepted by every component of the library.
 */
export interface Logger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Create a console logger that tags each line with the component name.
 *
 * @param component - Tag printed in brackets before each message
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger("OrionClient");
 * logger.info("Entity upserted", { id: "urn:ngsi-ld:Bot:1" });
 * // [OrionClient] Entity upserted { id: 'urn:ngsi-ld:Bot:1' }
 * ```
 */
export function createConsoleLogger(component: string): Logger {
    return {
        debug: (msg, data) => console.debug(`[${component}] ${msg}`, data ?? ""),
        info : (msg, data) => console.info(`[${component}] ${msg}`, data ?? ""),
        warn : (msg, data) => console.warn(`[${component}] ${msg}`, data ?? ""),
        error: (msg, data) => console.error(`[${component}] ${msg}`, data ?? ""),
    };
}

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = {
    debug: () => {},
    info : () => {},
    warn : () => {},
    error: () => {},
};
