/**
 * @fileoverview Entity series
 *
 * QuantumLeap returns the history of an entity as a time index plus one
 * value array per attribute. An EntitySeries keeps that columnar layout:
 *
 * ```
 *     index: t0, t1, t2, ...
 *     attr1: v0, v1, v2, ...
 *     attr2: w0, w1, w2, ...
 * ```
 *
 * where `v0` is the value of `attr1` at `t0`, and so on. `toColumns` gives a
 * record you can feed straight into a data frame library.
 *
 * @module @contextkit/ngsi/model/EntitySeries
 */

import { isValid, parseISO } from "date-fns";
import type { StructuredValue } from "../contracts/Attribute.js";
import { isStructuredValue } from "../contracts/Attribute.js";
import { SeriesParseError } from "../contracts/errors.js";

/**
 * Time-indexed attribute values of one entity. Frozen once built.
 */
export interface EntitySeries {
    /**
     * Sample times. The array is frozen but a Date can't be, so treat the
     * elements as read-only; `timestamps` holds the same instants as values.
     */
    readonly index: readonly Date[];

    /** Sample times in epoch milliseconds, aligned with `index` */
    readonly timestamps: readonly number[];

    /** Attribute name to values; `values[k]` was sampled at `index[k]` */
    readonly attributes: Readonly<Record<string, readonly unknown[]>>;
}

/**
 * One attribute array of a QuantumLeap query result.
 */
export interface AttributeValuesPayload {
    readonly attrName?: string;
    readonly values?: readonly unknown[];
}

/**
 * Result of `GET /v2/entities/{entityId}` on QuantumLeap.
 */
export interface EntityQueryResult {
    readonly entityId?: string;
    readonly entityType?: string;
    readonly index?: readonly string[];
    readonly attributes?: readonly AttributeValuesPayload[];
}

/**
 * Result of `GET /v2/types/{entityType}` on QuantumLeap.
 */
export interface EntityTypeQueryResult {
    readonly entityType?: string;
    readonly entities?: readonly EntityQueryResult[];
}

/**
 * Convert a single-entity query result into an EntitySeries.
 *
 * Attribute payloads with no name (or an empty one) or no values are
 * skipped; if a name repeats, the last payload wins. A result with no
 * `index` is an entity with no data yet and gives an empty series with no
 * attributes.
 *
 * @param result - Decoded JSON returned by QuantumLeap
 * @throws TypeError if `result` isn't an object
 * @throws SeriesParseError if an index entry isn't an ISO 8601 timestamp
 *
 * @example
 * ```typescript
 * const series = fromSingleEntityResult({
 *     index     : ["2024-05-01T10:00:00.000+00:00", "2024-05-01T10:00:01.000+00:00"],
 *     attributes: [{ attrName: "speed", values: [1.2, 1.4] }],
 * });
 * series.attributes.speed; // [1.2, 1.4]
 * ```
 */
export function fromSingleEntityResult(result: unknown): EntitySeries {
    if (!isStructuredValue(result)) {
        throw new TypeError(`Entity query result must be an object, got ${result === null ? "null" : typeof result}`);
    }

    const rawIndex = result.index;
    if (rawIndex === undefined || rawIndex === null) {
        return freezeSeries([], {});
    }
    if (!Array.isArray(rawIndex)) {
        throw new SeriesParseError("Series index must be an array", { index: rawIndex });
    }

    const index = rawIndex.map(parseTimestamp);

    const attributes: Record<string, readonly unknown[]> = {};
    const payloads = Array.isArray(result.attributes) ? result.attributes : [];
    for (const payload of payloads) {
        if (!isStructuredValue(payload)) {
            continue;
        }
        const { attrName, values } = payload;
        if (typeof attrName !== "string" || attrName === "" || !Array.isArray(values)) {
            continue;
        }
        attributes[attrName] = Object.freeze([...values]);
    }

    return freezeSeries(index, attributes);
}

/**
 * Convert a per-type query result into one EntitySeries per entity, keyed
 * by entity id.
 *
 * Each entity payload is shallow-copied with the shared `entityType` added
 * before conversion; the input is left untouched. Entities without an id
 * land under "", later ones overwriting earlier ones.
 *
 * @param result - Decoded JSON returned by QuantumLeap
 * @throws TypeError if `result` or one of its entities isn't an object
 * @throws SeriesParseError if an index entry isn't an ISO 8601 timestamp
 */
export function fromMultiEntityResult(result: unknown): Map<string, EntitySeries> {
    if (!isStructuredValue(result)) {
        throw new TypeError(`Entity type query result must be an object, got ${result === null ? "null" : typeof result}`);
    }

    const entityType = typeof result.entityType === "string" ? result.entityType : "";
    const entities = Array.isArray(result.entities) ? result.entities : [];

    const seriesById = new Map<string, EntitySeries>();
    for (const entity of entities) {
        if (!isStructuredValue(entity)) {
            throw new TypeError("Entity series payload must be an object");
        }
        const withType: StructuredValue = { ...entity, entityType };
        const id = typeof withType.entityId === "string" ? withType.entityId : "";
        seriesById.set(id, fromSingleEntityResult(withType));
    }
    return seriesById;
}

/**
 * Flatten a series into `{ index, attr1, attr2, ... }`.
 *
 * An attribute named `index` would clash with the time index; the time
 * index wins.
 */
export function toColumns(series: EntitySeries): Record<string, readonly unknown[]> {
    return {
        ...series.attributes,
        index: series.index,
    };
}

/**
 * Number of samples in a series.
 */
export function seriesLength(series: EntitySeries): number {
    return series.index.length;
}

function parseTimestamp(raw: unknown, position: number): Date {
    const parsed = typeof raw === "string" ? parseISO(raw) : null;
    if (!parsed || !isValid(parsed)) {
        throw new SeriesParseError(`Invalid ISO 8601 timestamp at index ${position}: ${String(raw)}`, {
            position,
            timestamp: raw,
        });
    }
    return parsed;
}

function freezeSeries(index: Date[], attributes: Record<string, readonly unknown[]>): EntitySeries {
    return Object.freeze({
        index     : Object.freeze(index),
        timestamps: Object.freeze(index.map((date) => date.getTime())),
        attributes: Object.freeze(attributes),
    });
}
