/**
 * @fileoverview Model barrel exports
 *
 * @module @contextkit/ngsi/model
 */

export { Entity, ldUrn } from "./Entity.js";
export type {
    EntityAttributes,
    NgsiEntity,
    WireAttribute,
    WireEntity,
} from "./Entity.js";

export {
    fromMultiEntityResult,
    fromSingleEntityResult,
    seriesLength,
    toColumns,
} from "./EntitySeries.js";
export type {
    AttributeValuesPayload,
    EntityQueryResult,
    EntitySeries,
    EntityTypeQueryResult,
} from "./EntitySeries.js";

export {
    entitiesUpsert,
    filterEntities,
    fromEntityDocuments,
    fromEntitySummaries,
} from "./notifications.js";
export type {
    EntitiesUpsert,
    EntityRef,
    EntitySummary,
    EntityUpdateNotification,
} from "./notifications.js";
