/**
 * @fileoverview Entity schema contract
 *
 * A schema binds an NGSI entity type to the attributes entities of that type
 * may carry. Schemas are plain frozen values: defining a new entity type at
 * runtime is just building another schema.
 *
 * @module @contextkit/ngsi/contracts/EntitySchema
 */

import type { AttributeKind } from "./Attribute.js";
import { EntityParseError } from "./errors.js";

/**
 * Names an entity can't use for attributes.
 */
export const RESERVED_NAMES: readonly string[] = ["id", "type"];

/**
 * Attribute name to expected kind.
 */
export type AttributeSlots = { readonly [name: string]: AttributeKind };

/**
 * One attribute slot of a schema.
 */
export interface AttributeSlot {
    readonly name: string;
    readonly kind: AttributeKind;
}

/**
 * Entity schema.
 *
 * @typeParam T - The NGSI entity type literal
 * @typeParam S - The attribute slots, used to type attribute access
 */
export interface EntitySchema<T extends string = string, S extends AttributeSlots = AttributeSlots> {
    /** NGSI type every entity of this schema carries */
    readonly type: T;

    /** Slots keyed by name */
    readonly slots: S;

    /** Slots in declaration order */
    readonly attributes: readonly AttributeSlot[];
}

/** Attribute names declared by a schema. */
export type SlotName<S extends EntitySchema> = keyof S["slots"] & string;

/** Kind declared for a slot. */
export type SlotKind<S extends EntitySchema, N extends SlotName<S>> = S["slots"][N];

/**
 * Define an entity schema.
 *
 * Attribute order follows the key order of `slots`, which is what entities
 * of this schema serialise in.
 *
 * @param type - NGSI entity type, e.g. "Bot"
 * @param slots - Attribute names mapped to their kinds
 * @throws EntityParseError if the type is empty or a slot uses a reserved name
 *
 * @example
 * ```typescript
 * const BotSchema = defineEntitySchema("Bot", {
 *     speed    : "Number",
 *     direction: "Text",
 * });
 * ```
 */
export function defineEntitySchema<T extends string, S extends AttributeSlots>(
    type: T,
    slots: S
): EntitySchema<T, S> {
    if (type.length === 0) {
        throw new EntityParseError("Entity schema type must not be empty");
    }

    const attributes = Object.keys(slots).map((name): AttributeSlot => {
        if (RESERVED_NAMES.includes(name)) {
            throw new EntityParseError(`Reserved attribute name in schema ${type}: ${name}`, { type, name });
        }
        return Object.freeze({ name, kind: slots[name] });
    });

    const ownSlots: S = { ...slots };
    Object.freeze(ownSlots);

    return Object.freeze({
        type,
        slots     : ownSlots,
        attributes: Object.freeze(attributes),
    });
}

/**
 * Look up the slot a schema declares for an attribute name.
 */
export function findSlot(schema: EntitySchema, name: string): AttributeSlot | undefined {
    return schema.attributes.find((slot) => slot.name === name);
}
