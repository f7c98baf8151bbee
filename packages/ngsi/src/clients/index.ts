/**
 * @fileoverview Service client barrel exports
 *
 * @module @contextkit/ngsi/clients
 */

export { appendPath, OrionEndpoints, QuantumLeapEndpoints } from "./endpoints.js";
export type { QueryParams } from "./endpoints.js";

export type { ServiceClientOptions } from "./options.js";

export { OrionClient } from "./OrionClient.js";
export type { Subscription } from "./OrionClient.js";

export { QuantumLeapClient } from "./QuantumLeapClient.js";
export type { SeriesRange } from "./QuantumLeapClient.js";
