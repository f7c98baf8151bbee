/**
 * @fileoverview Orion subscriptions used by the simulator
 *
 * @module subscriptions
 */

import type { Subscription } from "@contextkit/ngsi";

/**
 * Catch-all subscription asking Orion to forward every entity change to
 * QuantumLeap.
 *
 * Create it without a service path: Orion only matches entities right
 * under the subscription's service path, so "/" would match nothing that
 * lives deeper in the tree.
 *
 * @param notifyUrl - QuantumLeap notify endpoint as reachable from Orion
 */
export function quantumLeapSubscription(notifyUrl: string): Subscription {
    return {
        description: "Notify QuantumLeap of changes to any entity.",
        subject    : {
            entities: [{ idPattern: ".*" }],
        },
        notification: {
            http: { url: notifyUrl },
        },
    };
}
