/**
 * @fileoverview FIWARE multi-tenancy context
 *
 * @module @contextkit/ngsi/contracts/FiwareContext
 */

import type { HttpHeaders } from "./JsonClient.js";

/**
 * Tenant, service path and correlator sent along with every request.
 */
export interface FiwareContext {
    /** Tenant name (`fiware-service`) */
    readonly service?: string;

    /** Hierarchical scope within the tenant (`fiware-servicepath`), e.g. "/" */
    readonly servicePath?: string;

    /** Id to correlate log lines across services (`fiware-correlator`) */
    readonly correlator?: string;
}

/**
 * Build the FIWARE headers for the fields of `ctx` that are set.
 *
 * @example
 * ```typescript
 * fiwareHeaders({ service: "demo", servicePath: "/" });
 * // { "fiware-service": "demo", "fiware-servicepath": "/" }
 * ```
 */
export function fiwareHeaders(ctx: FiwareContext): HttpHeaders {
    return {
        ...(ctx.service ? { "fiware-service": ctx.service } : {}),
        ...(ctx.servicePath ? { "fiware-servicepath": ctx.servicePath } : {}),
        ...(ctx.correlator ? { "fiware-correlator": ctx.correlator } : {}),
    };
}
