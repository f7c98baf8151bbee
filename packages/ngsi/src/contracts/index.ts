/**
 * @fileoverview Contract barrel exports
 *
 * Attribute kinds, entity schemas, the transport contract, FIWARE headers,
 * logging and errors.
 *
 * @module @contextkit/ngsi/contracts
 */

// Attribute type system
export type {
    Attribute,
    AttributeKind,
    AttributeOf,
    AttributeValueByKind,
    StructuredValue,
} from "./Attribute.js";
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
} from "./Attribute.js";

// Entity schemas
export type {
    AttributeSlot,
    AttributeSlots,
    EntitySchema,
    SlotKind,
    SlotName,
} from "./EntitySchema.js";
export { defineEntitySchema, findSlot, RESERVED_NAMES } from "./EntitySchema.js";

// Transport
export type { HttpHeaders, JsonClient, JsonClientConfig } from "./JsonClient.js";

// FIWARE context
export type { FiwareContext } from "./FiwareContext.js";
export { fiwareHeaders } from "./FiwareContext.js";

// Logging
export type { Logger } from "./Logger.js";
export { createConsoleLogger, silentLogger } from "./Logger.js";

// Errors
export {
    EntityParseError,
    HttpError,
    isHttpStatus,
    NgsiError,
    SeriesParseError,
    WaitTimeoutError,
} from "./errors.js";
