/**
 * @fileoverview Wait helper barrel exports
 *
 * @module @contextkit/ngsi/wait
 */

export { sleep, waitForOrion, waitForQuantumLeap, waitUntil } from "./waitUntil.js";
export type { EntityLister, WaitCondition, WaitOptions } from "./waitUntil.js";
