/**
 * @fileoverview NGSI entity model
 *
 * An entity is an id, the type fixed by its schema and an ordered set of
 * attributes. Entities are built from the two NGSI-v2 wire shapes:
 *
 * - full (normalised): `{ id, type, speed: { type: "Number", value: 1.2 } }`
 * - flat (keyValues):  `{ id, type, speed: 1.2 }`
 *
 * and serialise back to the full shape, leaving out attributes with no value.
 *
 * @module @contextkit/ngsi/model/Entity
 */

import type {
    Attribute,
    AttributeKind,
    AttributeOf,
} from "../contracts/Attribute.js";
import {
    attrFromValue,
    isAttributeOfKind,
    isStructuredValue,
} from "../contracts/Attribute.js";
import type {
    AttributeSlots,
    EntitySchema,
    SlotKind,
    SlotName,
} from "../contracts/EntitySchema.js";
import { defineEntitySchema, findSlot, RESERVED_NAMES } from "../contracts/EntitySchema.js";
import { EntityParseError } from "../contracts/errors.js";

/**
 * Attribute as it travels on the wire.
 */
export interface WireAttribute {
    readonly type: string;
    readonly value: unknown;
}

/**
 * Entity in NGSI-v2 normalised JSON.
 */
export interface WireEntity {
    readonly id: string;
    readonly type: string;
    readonly [attribute: string]: string | WireAttribute;
}

/**
 * What the clients need from an entity: its identity and wire form. Any
 * `Entity<S>` satisfies it whatever its schema.
 */
export interface NgsiEntity {
    readonly id: string;
    readonly type: string;
    toWireObject(): WireEntity;
}

/**
 * Initial attribute values for {@link Entity.create}, typed by schema.
 */
export type EntityAttributes<S extends EntitySchema> = {
    readonly [N in SlotName<S>]?: AttributeOf<SlotKind<S, N>> | null;
};

/**
 * Prefix `suffix` with the NGSI-LD URN namespace.
 *
 * @example
 * ```typescript
 * ldUrn("Bot:2"); // "urn:ngsi-ld:Bot:2"
 * ```
 */
export function ldUrn(suffix: string): string {
    return `urn:ngsi-ld:${suffix}`;
}

/**
 * NGSI entity bound to a schema.
 *
 * @typeParam S - The entity schema; fixes `type` and types attribute access
 *
 * @example
 * ```typescript
 * const BotSchema = defineEntitySchema("Bot", { speed: "Number" });
 *
 * const bot = Entity.create(BotSchema, "").setIdWithTypePrefix("1");
 * bot.set("speed", numberAttr(12.3));
 * bot.toWireJson();
 * // '{"id":"urn:ngsi-ld:Bot:1","type":"Bot","speed":{"type":"Number","value":12.3}}'
 * ```
 */
export class Entity<S extends EntitySchema = EntitySchema> implements NgsiEntity {
    /** Entity id, usually an NGSI-LD URN */
    id: string;

    /** Schema this entity conforms to */
    readonly schema: S;

    private readonly attrs: Map<string, Attribute> = new Map();

    private constructor(schema: S, id: string) {
        this.schema = schema;
        this.id = id;
    }

    /**
     * Create an entity programmatically.
     *
     * @param schema - Entity schema
     * @param id - Entity id; pass "" and call setIdWithTypePrefix to build a URN
     * @param attributes - Initial attribute values, null/undefined ones are skipped
     * @throws EntityParseError if an attribute doesn't fit its slot
     */
    static create<S extends EntitySchema>(
        schema: S,
        id: string,
        attributes: EntityAttributes<S> = {}
    ): Entity<S> {
        const entity = new Entity(schema, id);
        for (const [name, attr] of Object.entries(attributes)) {
            entity.assign(name, attr);
        }
        return entity;
    }

    /**
     * Build an entity from its normalised NGSI representation.
     *
     * Fields the schema doesn't declare are ignored. A declared attribute
     * that is present must be `{ value, type? }` with a value fitting the
     * slot kind; the kind, not the wire `type` tag, decides the attribute type.
     *
     * @param schema - Target schema
     * @param raw - Decoded JSON, e.g. from an Orion response
     * @returns The entity, or null if `raw.type` isn't the schema type
     * @throws TypeError if `raw` isn't an object
     * @throws EntityParseError if `id` or a declared attribute is malformed
     */
    static fromFullRepresentation<S extends EntitySchema>(schema: S, raw: unknown): Entity<S> | null {
        const doc = requireDocument(raw);
        if (doc.type !== schema.type) {
            return null;
        }

        const entity = new Entity(schema, requireId(doc));
        for (const slot of schema.attributes) {
            const field = doc[slot.name];
            if (field === undefined || field === null) {
                continue;
            }
            entity.attrs.set(slot.name, parseWireAttribute(schema.type, slot.name, slot.kind, field));
        }
        return entity;
    }

    /**
     * Build an entity from its flat (keyValues) representation.
     *
     * Each value is run through {@link attrFromValue}. Values that can't be
     * inferred, names the schema doesn't declare, and values whose inferred
     * kind isn't the declared kind are dropped.
     *
     * @param schema - Target schema
     * @param raw - Decoded JSON
     * @returns The entity, or null if `raw.type` isn't the schema type
     * @throws TypeError if `raw` isn't an object
     * @throws EntityParseError if `id` is missing or not a string
     */
    static fromFlatRepresentation<S extends EntitySchema>(schema: S, raw: unknown): Entity<S> | null {
        const doc = requireDocument(raw);
        if (doc.type !== schema.type) {
            return null;
        }

        const entity = new Entity(schema, requireId(doc));
        for (const [name, attr] of inferAttributes(doc)) {
            const slot = findSlot(schema, name);
            if (slot && slot.kind === attr.type) {
                entity.attrs.set(name, attr);
            }
        }
        return entity;
    }

    /**
     * Build an entity from its flat representation without a known schema.
     *
     * A schema named after `raw.type` is made up on the spot, with one slot
     * per attribute that could be inferred.
     *
     * @throws TypeError if `raw` isn't an object
     * @throws EntityParseError if `id` or `type` is missing or not a string
     */
    static dynamicFromFlatRepresentation(raw: unknown): Entity {
        const doc = requireDocument(raw);
        if (typeof doc.type !== "string") {
            throw new EntityParseError("Entity type must be a string", { type: doc.type });
        }

        const attrs = inferAttributes(doc);
        const slots: Record<string, AttributeKind> = {};
        for (const [name, attr] of attrs) {
            slots[name] = attr.type;
        }

        const schema: EntitySchema<string, AttributeSlots> = defineEntitySchema(doc.type, slots);
        const entity = new Entity(schema, requireId(doc));
        for (const [name, attr] of attrs) {
            entity.attrs.set(name, attr);
        }
        return entity;
    }

    /** The NGSI type, fixed by the schema */
    get type(): S["type"] {
        return this.schema.type;
    }

    /**
     * Get a declared attribute.
     *
     * @returns The attribute, or null if it has no value
     */
    get<N extends SlotName<S>>(name: N): AttributeOf<SlotKind<S, N>> | null {
        const attr = this.attrs.get(name);
        const slots: S["slots"] = this.schema.slots;
        const kind = slots[name];
        return isAttributeOfKind(attr, kind) ? attr : null;
    }

    /**
     * Get any attribute by name without compile-time slot checks. Handy with
     * dynamically built entities.
     */
    attribute(name: string): Attribute | null {
        return this.attrs.get(name) ?? null;
    }

    /**
     * Replace a declared attribute. Passing null removes it.
     *
     * @throws EntityParseError if the attribute doesn't fit the slot
     */
    set<N extends SlotName<S>>(name: N, attr: AttributeOf<SlotKind<S, N>> | null): this {
        this.assign(name, attr);
        return this;
    }

    /**
     * Check whether an attribute has a value.
     */
    has(name: string): boolean {
        return this.attrs.has(name);
    }

    /**
     * Present attributes in schema declaration order.
     */
    attributes(): Array<[string, Attribute]> {
        const entries: Array<[string, Attribute]> = [];
        for (const slot of this.schema.attributes) {
            const attr = this.attrs.get(slot.name);
            if (attr) {
                entries.push([slot.name, attr]);
            }
        }
        return entries;
    }

    /**
     * Set the id to `urn:ngsi-ld:{type}:{suffix}`. Updates this entity in
     * place and returns it.
     */
    setIdWithTypePrefix(suffix: string): this {
        this.id = ldUrn(`${this.type}:${suffix}`);
        return this;
    }

    /**
     * Normalised NGSI representation: `id`, `type`, then each attribute with
     * a value in schema order. Attributes without a value are left out.
     */
    toWireObject(): WireEntity {
        const wire: { id: string; type: string; [attribute: string]: string | WireAttribute } = {
            id  : this.id,
            type: this.type,
        };
        for (const [name, attr] of this.attributes()) {
            wire[name] = { type: attr.type, value: attr.value };
        }
        return wire;
    }

    /** Lets JSON.stringify serialise entities directly. */
    toJSON(): WireEntity {
        return this.toWireObject();
    }

    /**
     * Serialise to compact NGSI JSON.
     */
    toWireJson(): string {
        return JSON.stringify(this.toWireObject());
    }

    /**
     * Two entities are equal when they have the same wire representation.
     */
    equals(other: NgsiEntity): boolean {
        return this.toWireJson() === JSON.stringify(other.toWireObject());
    }

    private assign(name: string, attr: unknown): void {
        const slot = findSlot(this.schema, name);
        if (!slot) {
            throw new EntityParseError(`Unknown attribute for ${this.type}: ${name}`, { type: this.type, name });
        }
        if (attr === null || attr === undefined) {
            this.attrs.delete(name);
            return;
        }

        // Stored in union form so attribute() callers can narrow on the tag
        const stored = isAttributeOfKind(attr, slot.kind) ? attrFromValue(attr.value) : null;
        if (!stored) {
            throw new EntityParseError(`Attribute ${name} of ${this.type} must be a ${slot.kind}`, {
                type: this.type,
                name,
                kind: slot.kind,
            });
        }
        this.attrs.set(name, stored);
    }
}

function requireDocument(raw: unknown): Record<string, unknown> {
    if (!isStructuredValue(raw)) {
        throw new TypeError(`Entity document must be an object, got ${raw === null ? "null" : typeof raw}`);
    }
    return raw;
}

function requireId(doc: Record<string, unknown>): string {
    if (typeof doc.id !== "string") {
        throw new EntityParseError("Entity id must be a string", { id: doc.id });
    }
    return doc.id;
}

function inferAttributes(doc: Record<string, unknown>): Array<[string, Attribute]> {
    const attrs: Array<[string, Attribute]> = [];
    for (const [name, value] of Object.entries(doc)) {
        if (RESERVED_NAMES.includes(name)) {
            continue;
        }
        const attr = attrFromValue(value);
        if (attr) {
            attrs.push([name, attr]);
        }
    }
    return attrs;
}

function parseWireAttribute(type: string, name: string, kind: AttributeKind, field: unknown): Attribute {
    if (!isStructuredValue(field) || !("value" in field)) {
        throw new EntityParseError(`Attribute ${name} of ${type} must be an object with a value`, { type, name });
    }

    const attr = attrFromValue(field.value);
    if (!attr || attr.type !== kind) {
        throw new EntityParseError(`Attribute ${name} of ${type} must hold a ${kind} value`, {
            type,
            name,
            kind,
            value: field.value,
        });
    }
    return attr;
}
