/**
 * @fileoverview Notification filtering, batch payloads and entity summaries
 *
 * @module @contextkit/ngsi/model/notifications
 */

import { isStructuredValue } from "../contracts/Attribute.js";
import type { EntitySchema } from "../contracts/EntitySchema.js";
import { Entity } from "./Entity.js";
import type { NgsiEntity, WireEntity } from "./Entity.js";

/**
 * Id and type of an entity, without attributes.
 */
export interface EntityRef {
    readonly id: string;
    readonly type: string;
}

/**
 * Body Orion POSTs to a subscriber when subscribed entities change.
 */
export interface EntityUpdateNotification {
    readonly subscriptionId?: string;
    readonly data: readonly unknown[];
}

/**
 * Body of Orion's `POST /v2/op/update` batch operation.
 */
export interface EntitiesUpsert {
    readonly actionType: "append";
    readonly entities: readonly WireEntity[];
}

/**
 * Entity summary as listed by QuantumLeap's `GET /v2/entities`.
 */
export interface EntitySummary {
    readonly entityId?: string;
    readonly entityType?: string;
    readonly index?: string;
}

/**
 * Pick out of a notification the entities of the schema's type.
 *
 * Notifications usually mix entity types; entries of other types are
 * skipped, not reported.
 *
 * @example
 * ```typescript
 * const bots = filterEntities(
 *     {
 *         data: [
 *             { id: "1", type: "Bot", speed: { value: 1.1 } },
 *             { id: "2", type: "NotMe", speed: { value: 2.2 } },
 *         ],
 *     },
 *     BotSchema
 * );
 * bots.map((b) => b.id); // ["1"]
 * ```
 */
export function filterEntities<S extends EntitySchema>(
    notification: EntityUpdateNotification,
    schema: S
): Entity<S>[] {
    const matches: Entity<S>[] = [];
    for (const raw of notification.data) {
        const entity = Entity.fromFullRepresentation(schema, raw);
        if (entity) {
            matches.push(entity);
        }
    }
    return matches;
}

/**
 * Build the payload to create or update many entities in one call.
 */
export function entitiesUpsert(entities: readonly NgsiEntity[]): EntitiesUpsert {
    return {
        actionType: "append",
        entities  : entities.map((e) => e.toWireObject()),
    };
}

/**
 * Turn QuantumLeap entity summaries into refs, dropping any summary that
 * lacks a non-empty id or type.
 */
export function fromEntitySummaries(summaries: readonly unknown[]): EntityRef[] {
    return collectRefs(summaries, "entityId", "entityType");
}

/**
 * Turn entity documents (only `id` and `type` are read) into refs, dropping
 * any document that lacks a non-empty id or type.
 */
export function fromEntityDocuments(docs: readonly unknown[]): EntityRef[] {
    return collectRefs(docs, "id", "type");
}

function collectRefs(items: readonly unknown[], idKey: string, typeKey: string): EntityRef[] {
    const refs: EntityRef[] = [];
    for (const item of items) {
        if (!isStructuredValue(item)) {
            continue;
        }
        const id = item[idKey];
        const type = item[typeKey];
        if (typeof id === "string" && id !== "" && typeof type === "string" && type !== "") {
            refs.push({ id, type });
        }
    }
    return refs;
}
