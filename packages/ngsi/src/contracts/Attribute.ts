/**
 * @fileoverview NGSI attribute type system
 *
 * An NGSI-v2 attribute is a type tag plus a value. The library supports a
 * closed set of five kinds; "no attribute" is represented by `null`, never by
 * an attribute holding a null value.
 *
 * The wire format has no integer type, so integers and floats both become
 * `Number` attributes.
 *
 * @module @contextkit/ngsi/contracts/Attribute
 */

/**
 * Plain JSON object value.
 */
export type StructuredValue = Record<string, unknown>;

/**
 * Value type carried by each attribute kind.
 */
export interface AttributeValueByKind {
    Number: number;
    Text: string;
    Boolean: boolean;
    Array: readonly unknown[];
    StructuredValue: StructuredValue;
}

/**
 * The NGSI type tags this library understands.
 */
export type AttributeKind = keyof AttributeValueByKind;

/**
 * All attribute kinds in declaration order.
 */
export const ATTRIBUTE_KINDS: readonly AttributeKind[] = [
    "Number",
    "Text",
    "Boolean",
    "Array",
    "StructuredValue",
];

/**
 * An attribute of one specific kind.
 */
export interface AttributeOf<K extends AttributeKind> {
    readonly type: K;
    readonly value: AttributeValueByKind[K];
}

/**
 * An NGSI attribute. For a union of kinds this distributes into a union of
 * attribute variants, so narrowing on `type` narrows `value` too.
 *
 * @example
 * ```typescript
 * function describe(attr: Attribute): string {
 *     if (attr.type === "Number") {
 *         return attr.value.toFixed(2);
 *     }
 *     return JSON.stringify(attr.value);
 * }
 * ```
 */
export type Attribute<K extends AttributeKind = AttributeKind> = {
    [P in K]: AttributeOf<P>;
}[K];

/**
 * Build an attribute of the given kind.
 *
 * Returns null when `value` is null or undefined. The value type is checked
 * by the compiler only; callers holding untyped data should use
 * {@link attrFromValue}.
 *
 * @param kind - The attribute kind, which also becomes the type tag
 * @param value - The attribute value; arrays and objects are copied
 * @returns Frozen attribute, or null for a missing value
 */
export function newAttribute<K extends AttributeKind>(kind: K, value: AttributeValueByKind[K]): AttributeOf<K>;
export function newAttribute<K extends AttributeKind>(
    kind: K,
    value: AttributeValueByKind[K] | null | undefined
): AttributeOf<K> | null;
export function newAttribute<K extends AttributeKind>(
    kind: K,
    value: AttributeValueByKind[K] | null | undefined
): AttributeOf<K> | null {
    if (value === null || value === undefined) {
        return null;
    }
    return freezeAttribute(kind, value);
}

export function numberAttr(value: number | null | undefined): AttributeOf<"Number"> | null {
    return newAttribute("Number", value);
}

export function textAttr(value: string | null | undefined): AttributeOf<"Text"> | null {
    return newAttribute("Text", value);
}

export function boolAttr(value: boolean | null | undefined): AttributeOf<"Boolean"> | null {
    return newAttribute("Boolean", value);
}

export function arrayAttr(value: readonly unknown[] | null | undefined): AttributeOf<"Array"> | null {
    return newAttribute("Array", value);
}

export function structuredValueAttr(value: StructuredValue | null | undefined): AttributeOf<"StructuredValue"> | null {
    return newAttribute("StructuredValue", value);
}

/**
 * Check for a plain JSON object: not null, not an array.
 */
export function isStructuredValue(value: unknown): value is StructuredValue {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Work out which attribute kind fits an untyped value.
 *
 * Booleans are tested before numbers. Anything that isn't one of the five
 * JSON shapes (bigint, function, symbol, null, undefined) has no kind.
 */
export function kindOfValue(value: unknown): AttributeKind | null {
    if (value === null || value === undefined) {
        return null;
    }
    if (typeof value === "boolean") {
        return "Boolean";
    }
    if (typeof value === "number") {
        return "Number";
    }
    if (typeof value === "string") {
        return "Text";
    }
    if (Array.isArray(value)) {
        return "Array";
    }
    if (isStructuredValue(value)) {
        return "StructuredValue";
    }
    return null;
}

/**
 * Check that a value has the runtime shape required by an attribute kind.
 */
export function valueMatchesKind<K extends AttributeKind>(
    kind: K,
    value: unknown
): value is AttributeValueByKind[K] {
    return kindOfValue(value) === kind;
}

/**
 * Infer an attribute from an untyped JSON value.
 *
 * | value            | result                  |
 * |------------------|-------------------------|
 * | null / undefined | null                    |
 * | boolean          | Boolean attribute       |
 * | number           | Number attribute        |
 * | string           | Text attribute          |
 * | array            | Array attribute         |
 * | object           | StructuredValue attribute |
 * | anything else    | null                    |
 *
 * @example
 * ```typescript
 * attrFromValue(2.3);     // { type: "Number", value: 2.3 }
 * attrFromValue("yo");    // { type: "Text", value: "yo" }
 * attrFromValue(null);    // null
 * ```
 */
export function attrFromValue(value: unknown): Attribute | null {
    if (value === null || value === undefined) {
        return null;
    }
    if (typeof value === "boolean") {
        return freezeAttribute("Boolean", value);
    }
    if (typeof value === "number") {
        return freezeAttribute("Number", value);
    }
    if (typeof value === "string") {
        return freezeAttribute("Text", value);
    }
    if (Array.isArray(value)) {
        return freezeAttribute("Array", value);
    }
    if (isStructuredValue(value)) {
        return freezeAttribute("StructuredValue", value);
    }
    return null;
}

/**
 * Build an attribute of `kind` from an untyped value, or null if the value
 * doesn't have the kind's shape.
 */
export function coerceAttribute<K extends AttributeKind>(kind: K, value: unknown): AttributeOf<K> | null {
    if (!valueMatchesKind(kind, value)) {
        return null;
    }
    return freezeAttribute(kind, value);
}

/**
 * Type guard for an attribute of the given kind whose value has that kind's
 * shape.
 */
export function isAttributeOfKind<K extends AttributeKind>(obj: unknown, kind: K): obj is AttributeOf<K> {
    return isStructuredValue(obj) && obj.type === kind && valueMatchesKind(kind, obj.value);
}

/**
 * Type guard for anything that looks like an attribute of a known kind.
 */
export function isAttribute(obj: unknown): obj is Attribute {
    return ATTRIBUTE_KINDS.some((kind) => isAttributeOfKind(obj, kind));
}

function freezeAttribute<K extends AttributeKind>(kind: K, value: AttributeValueByKind[K]): AttributeOf<K> {
    const attr: AttributeOf<K> = { type: kind, value: frozenCopy(value) };
    return Object.freeze(attr);
}

/**
 * Deep copy of nested arrays and plain objects, frozen at every level.
 * Other values are returned as they are.
 */
function frozenCopy<V>(value: V): V;
function frozenCopy(value: unknown): unknown {
    if (Array.isArray(value)) {
        return Object.freeze(value.map((item) => frozenCopy(item)));
    }
    if (isPlainObject(value)) {
        const copy: StructuredValue = {};
        for (const [key, item] of Object.entries(value)) {
            copy[key] = frozenCopy(item);
        }
        return Object.freeze(copy);
    }
    return value;
}

function isPlainObject(value: unknown): value is StructuredValue {
    if (!isStructuredValue(value)) {
        return false;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}
