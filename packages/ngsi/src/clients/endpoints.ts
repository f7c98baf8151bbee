/**
 * @fileoverview Service endpoint URLs
 *
 * Relative paths are appended to the path of the base URL, so a broker
 * behind a reverse proxy at `http://host/orion` works as expected.
 *
 * @module @contextkit/ngsi/clients/endpoints
 */

/**
 * Query string parameters; undefined values are left out.
 */
export type QueryParams = Readonly<Record<string, string | undefined>>;

/**
 * Append a relative path and query string to a base URL.
 *
 * @example
 * ```typescript
 * appendPath("http://localhost:1026/", "v2/entities", { type: "Bot" });
 * // "http://localhost:1026/v2/entities?type=Bot"
 * ```
 */
export function appendPath(baseUrl: string, relPath: string, query: QueryParams = {}): string {
    const url = new URL(baseUrl);
    const basePath = url.pathname.endsWith("/") ? url.pathname : `${url.pathname}/`;
    url.pathname = `${basePath}${relPath}`;

    for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
            url.searchParams.set(key, value);
        }
    }
    return url.toString();
}

function segment(value: string): string {
    return encodeURIComponent(value);
}

/**
 * Orion Context Broker URLs.
 */
export class OrionEndpoints {
    constructor(private readonly baseUrl: string) {}

    entities(query?: QueryParams): string {
        return appendPath(this.baseUrl, "v2/entities", query);
    }

    entity(entityId: string): string {
        return appendPath(this.baseUrl, `v2/entities/${segment(entityId)}`);
    }

    updateOp(): string {
        return appendPath(this.baseUrl, "v2/op/update");
    }

    subscriptions(): string {
        return appendPath(this.baseUrl, "v2/subscriptions");
    }
}

/**
 * QuantumLeap URLs.
 */
export class QuantumLeapEndpoints {
    constructor(private readonly baseUrl: string) {}

    attribute(entityId: string, attrName: string, query?: QueryParams): string {
        return appendPath(this.baseUrl, `v2/entities/${segment(entityId)}/attrs/${segment(attrName)}`, query);
    }

    entityTypeAttribute(entityType: string, attrName: string, query?: QueryParams): string {
        return appendPath(this.baseUrl, `v2/types/${segment(entityType)}/attrs/${segment(attrName)}`, query);
    }

    entities(query?: QueryParams): string {
        return appendPath(this.baseUrl, "v2/entities", query);
    }

    entitySeries(entityId: string, entityType: string, query: QueryParams = {}): string {
        return appendPath(this.baseUrl, `v2/entities/${segment(entityId)}`, { ...query, type: entityType });
    }

    entityTypeSeries(entityType: string, query?: QueryParams): string {
        return appendPath(this.baseUrl, `v2/types/${segment(entityType)}`, query);
    }

    insertOp(): string {
        return appendPath(this.baseUrl, "v2/notify");
    }
}
