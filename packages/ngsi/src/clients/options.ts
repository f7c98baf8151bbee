/**
 * @fileoverview Options shared by the service clients
 *
 * @module @contextkit/ngsi/clients/options
 */

import type { JsonClient, JsonClientConfig } from "../contracts/JsonClient.js";
import type { Logger } from "../contracts/Logger.js";
import { AxiosJsonClient } from "../impl/AxiosJsonClient.js";

/**
 * Options shared by the service clients.
 */
export interface ServiceClientOptions extends JsonClientConfig {
    /** Transport to use (default: AxiosJsonClient built from timeout/verify) */
    readonly http?: JsonClient;

    /** Logger for client operations */
    readonly logger?: Logger;
}

/**
 * The configured transport, or an AxiosJsonClient built from the options.
 */
export function resolveTransport(options: ServiceClientOptions, logger: Logger): JsonClient {
    return options.http ?? new AxiosJsonClient({
        timeout: options.timeout,
        verify : options.verify,
        logger,
    });
}

export function toArray(body: unknown): unknown[] {
    return Array.isArray(body) ? body : [];
}
