/**
 * @fileoverview NGSI toolkit
 *
 * Typed NGSI-v2 entities for the FIWARE context broker and time-series
 * service.
 *
 * The package provides:
 * - A closed attribute type system and schema-bound entities
 * - Conversion between entities and the normalised and keyValues wire shapes
 * - Columnar entity series built from QuantumLeap query results
 * - Orion and QuantumLeap clients on a pluggable JSON transport
 * - Device simulation and service wait helpers
 *
 * @module @contextkit/ngsi
 * @example
 * ```typescript
 * import {
 *     Entity,
 *     OrionClient,
 *     defineEntitySchema,
 *     numberAttr,
 * } from "@contextkit/ngsi";
 *
 * const BotSchema = defineEntitySchema("Bot", { speed: "Number", direction: "Text" });
 * const bot = Entity.create(BotSchema, "", { speed: numberAttr(1.2) }).setIdWithTypePrefix("1");
 *
 * await new OrionClient("http://localhost:1026").upsertEntity(bot);
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

// Attributes
export type {
    Attribute,
    AttributeKind,
    AttributeOf,
    AttributeValueByKind,
    StructuredValue,
} from "./contracts/index.js";
export {
    ATTRIBUTE_KINDS,
    arrayAttr,
    attrFromValue,
    boolAttr,
    coerceAttribute,
    isAttribute,
    isAttributeOfKind,
    isStructuredValue,
    kindOfValue,
    newAttribute,
    numberAttr,
    structuredValueAttr,
    textAttr,
    valueMatchesKind,
} from "./contracts/index.js";

// Schemas
export type {
    AttributeSlot,
    AttributeSlots,
    EntitySchema,
    SlotKind,
    SlotName,
} from "./contracts/index.js";
export { defineEntitySchema, findSlot, RESERVED_NAMES } from "./contracts/index.js";

// Transport, FIWARE headers, logging
export type {
    FiwareContext,
    HttpHeaders,
    JsonClient,
    JsonClientConfig,
    Logger,
} from "./contracts/index.js";
export { createConsoleLogger, fiwareHeaders, silentLogger } from "./contracts/index.js";

// Errors
export {
    EntityParseError,
    HttpError,
    isHttpStatus,
    NgsiError,
    SeriesParseError,
    WaitTimeoutError,
} from "./contracts/index.js";

// ============================================================================
// Model exports
// ============================================================================

export { Entity, ldUrn } from "./model/index.js";
export type {
    EntityAttributes,
    NgsiEntity,
    WireAttribute,
    WireEntity,
} from "./model/index.js";

export {
    fromMultiEntityResult,
    fromSingleEntityResult,
    seriesLength,
    toColumns,
} from "./model/index.js";
export type {
    AttributeValuesPayload,
    EntityQueryResult,
    EntitySeries,
    EntityTypeQueryResult,
} from "./model/index.js";

export {
    entitiesUpsert,
    filterEntities,
    fromEntityDocuments,
    fromEntitySummaries,
} from "./model/index.js";
export type {
    EntitiesUpsert,
    EntityRef,
    EntitySummary,
    EntityUpdateNotification,
} from "./model/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export { AxiosJsonClient, type AxiosJsonClientConfig } from "./impl/index.js";

// ============================================================================
// Client exports
// ============================================================================

export {
    appendPath,
    OrionClient,
    OrionEndpoints,
    QuantumLeapClient,
    QuantumLeapEndpoints,
    type QueryParams,
    type SeriesRange,
    type ServiceClientOptions,
    type Subscription,
} from "./clients/index.js";

// ============================================================================
// Simulation and wait exports
// ============================================================================

export {
    DevicePoolSampler,
    EntityFactory,
    entityBatches,
    floatAttrCloseTo,
    randomBoolAttr,
    textAttrFromOneOf,
    type EntityGenerator,
    type GeneratedEntity,
    type ReadingsSink,
} from "./sim/index.js";

export {
    sleep,
    waitForOrion,
    waitForQuantumLeap,
    waitUntil,
    type EntityLister,
    type WaitCondition,
    type WaitOptions,
} from "./wait/index.js";
