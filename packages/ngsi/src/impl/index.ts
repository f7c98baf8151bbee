/**
 * @fileoverview Implementation barrel exports
 *
 * @module @contextkit/ngsi/impl
 */

export { AxiosJsonClient } from "./AxiosJsonClient.js";
export type { AxiosJsonClientConfig } from "./AxiosJsonClient.js";
