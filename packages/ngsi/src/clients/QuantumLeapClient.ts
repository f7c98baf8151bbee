/**
 * @fileoverview QuantumLeap client
 *
 * Stores entity snapshots in QuantumLeap and reads back their history as
 * entity series.
 *
 * @module @contextkit/ngsi/clients/QuantumLeapClient
 */

import { isStructuredValue } from "../contracts/Attribute.js";
import { HttpError, isHttpStatus } from "../contracts/errors.js";
import type { FiwareContext } from "../contracts/FiwareContext.js";
import { fiwareHeaders } from "../contracts/FiwareContext.js";
import type { HttpHeaders, JsonClient } from "../contracts/JsonClient.js";
import type { Logger } from "../contracts/Logger.js";
import { createConsoleLogger } from "../contracts/Logger.js";
import type { NgsiEntity } from "../model/Entity.js";
import { fromMultiEntityResult, fromSingleEntityResult } from "../model/EntitySeries.js";
import type { EntitySeries } from "../model/EntitySeries.js";
import { fromEntitySummaries } from "../model/notifications.js";
import type { EntityRef } from "../model/notifications.js";
import type { QueryParams } from "./endpoints.js";
import { QuantumLeapEndpoints } from "./endpoints.js";
import { resolveTransport, toArray } from "./options.js";
import type { ServiceClientOptions } from "./options.js";

/**
 * Limits on a history query. All fields are optional.
 */
export interface SeriesRange {
    /** Only the most recent N samples; zero or less means no limit */
    readonly lastN?: number;

    /** Earliest sample time, a Date or an ISO 8601 string */
    readonly fromDate?: Date | string;

    /** Latest sample time, a Date or an ISO 8601 string */
    readonly toDate?: Date | string;
}

/**
 * QuantumLeap client.
 *
 * @example
 * ```typescript
 * const ql = new QuantumLeapClient("http://localhost:8668", { service: "demo" });
 *
 * const series = await ql.entitySeries("urn:ngsi-ld:Bot:1", "Bot", { lastN: 10 });
 * toColumns(series);
 * ```
 */
export class QuantumLeapClient {
    private readonly urls: QuantumLeapEndpoints;
    private readonly headers: HttpHeaders;
    private readonly http: JsonClient;
    private readonly logger: Logger;

    constructor(baseUrl: string, ctx: FiwareContext = {}, options: ServiceClientOptions = {}) {
        this.urls = new QuantumLeapEndpoints(baseUrl);
        this.headers = fiwareHeaders(ctx);
        this.logger = options.logger ?? createConsoleLogger("QuantumLeapClient");
        this.http = resolveTransport(options, this.logger);
    }

    /**
     * List id and type of the entities QuantumLeap has data for, optionally
     * of one type only. An empty list when QuantumLeap has none (404).
     */
    async listEntities(entityType?: string): Promise<EntityRef[]> {
        let summaries: unknown;
        try {
            summaries = await this.http.get(this.urls.entities({ type: entityType }), this.headers);
        }
        catch (error) {
            if (isHttpStatus(error, 404)) {
                return [];
            }
            throw error;
        }
        return fromEntitySummaries(toArray(summaries));
    }

    /**
     * Store entity snapshots directly, the way an Orion notification would.
     */
    async insertEntities(entities: readonly NgsiEntity[]): Promise<void> {
        const payload = { data: entities.map((e) => e.toWireObject()) };
        await this.http.post(this.urls.insertOp(), payload, this.headers);
        this.logger.debug("Entities inserted", { count: entities.length });
    }

    /**
     * Raw history of one attribute of one entity.
     */
    timeSeries(entityId: string, attrName: string, query?: QueryParams): Promise<unknown> {
        return this.http.get(this.urls.attribute(entityId, attrName, query), this.headers);
    }

    /**
     * Raw history of one attribute across every entity of a type.
     */
    allTimeSeries(entityType: string, attrName: string, query?: QueryParams): Promise<unknown> {
        return this.http.get(this.urls.entityTypeAttribute(entityType, attrName, query), this.headers);
    }

    /**
     * Count the samples of an attribute stored for a type, across all its
     * entities. Zero if QuantumLeap answers with an error status, which is
     * what it does before the first insert. Transport failures propagate.
     */
    async countDataPoints(entityType: string, attrName: string): Promise<number> {
        let result: unknown;
        try {
            result = await this.allTimeSeries(entityType, attrName);
        }
        catch (error) {
            if (error instanceof HttpError && error.status !== undefined) {
                this.logger.debug("No data points yet", { entityType, attrName, status: error.status });
                return 0;
            }
            throw error;
        }

        if (!isStructuredValue(result)) {
            return 0;
        }
        let count = 0;
        for (const entity of toArray(result.entities)) {
            if (isStructuredValue(entity) && Array.isArray(entity.values)) {
                count += entity.values.length;
            }
        }
        return count;
    }

    /**
     * History of an entity's attributes.
     *
     * @throws SeriesParseError if QuantumLeap sends a malformed index
     */
    async entitySeries(entityId: string, entityType: string, range: SeriesRange = {}): Promise<EntitySeries> {
        const url = this.urls.entitySeries(entityId, entityType, rangeQuery(range));
        return fromSingleEntityResult(await this.http.get(url, this.headers));
    }

    /**
     * History of every entity of a type, keyed by entity id.
     *
     * @throws SeriesParseError if QuantumLeap sends a malformed index
     */
    async entityTypeSeries(entityType: string, range: SeriesRange = {}): Promise<Map<string, EntitySeries>> {
        const url = this.urls.entityTypeSeries(entityType, rangeQuery(range));
        return fromMultiEntityResult(await this.http.get(url, this.headers));
    }
}

function rangeQuery(range: SeriesRange): QueryParams {
    return {
        lastN   : range.lastN !== undefined && range.lastN > 0 ? String(range.lastN) : undefined,
        fromDate: toTimestamp(range.fromDate),
        toDate  : toTimestamp(range.toDate),
    };
}

function toTimestamp(value: Date | string | undefined): string | undefined {
    return value instanceof Date ? value.toISOString() : value;
}
