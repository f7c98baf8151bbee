/**
 * @fileoverview Random entity generation
 *
 * Helpers to fake device readings: random attribute values plus a factory
 * that stamps generated entities with predictable ids.
 *
 * @module @contextkit/ngsi/sim/generator
 */

import { randomUUID } from "crypto";
import type { AttributeOf } from "../contracts/Attribute.js";
import { newAttribute } from "../contracts/Attribute.js";
import type { NgsiEntity } from "../model/Entity.js";

/**
 * Number attribute with a random value in `[base, base + 1)`.
 */
export function floatAttrCloseTo(base: number): AttributeOf<"Number"> {
    return newAttribute("Number", base + Math.random());
}

/**
 * Text attribute with a value picked at random from `choices`.
 *
 * @throws RangeError if `choices` is empty
 */
export function textAttrFromOneOf(choices: readonly string[]): AttributeOf<"Text"> {
    if (choices.length === 0) {
        throw new RangeError("Need at least one choice to pick from");
    }
    return newAttribute("Text", choices[Math.floor(Math.random() * choices.length)]);
}

/**
 * Boolean attribute with a random value.
 */
export function randomBoolAttr(): AttributeOf<"Boolean"> {
    return newAttribute("Boolean", Math.random() < 0.5);
}

/**
 * Entity whose id a factory can overwrite. `Entity` is one.
 */
export interface GeneratedEntity extends NgsiEntity {
    setIdWithTypePrefix(suffix: string): unknown;
}

/**
 * Makes a new entity, random attribute values and all. Every call must
 * return an entity of the same NGSI type; the id is overwritten by the
 * factory, so "" will do.
 */
export type EntityGenerator<E extends GeneratedEntity> = () => E;

/**
 * Makes entities with ids `urn:ngsi-ld:{type}:{suffix}`, the suffix drawn
 * from a fixed list.
 *
 * @example
 * ```typescript
 * const factory = EntityFactory.withNumericSuffixes(2, () =>
 *     Entity.create(BotSchema, "", { speed: floatAttrCloseTo(1) })
 * );
 * factory.newBatch().map((bot) => bot.id);
 * // ["urn:ngsi-ld:Bot:1", "urn:ngsi-ld:Bot:2"]
 * ```
 */
export class EntityFactory<E extends GeneratedEntity> {
    private readonly suffixes: readonly string[];

    /**
     * @param generator - Makes the entities
     * @param suffixes - Id suffixes; must not be empty, values are stringified
     * @throws RangeError if `suffixes` is empty
     */
    constructor(
        private readonly generator: EntityGenerator<E>,
        suffixes: ReadonlyArray<string | number>
    ) {
        if (suffixes.length === 0) {
            throw new RangeError("EntityFactory needs at least one id suffix");
        }
        this.suffixes = suffixes.map(String);
    }

    /**
     * Number of suffixes, i.e. the size of a batch.
     */
    get size(): number {
        return this.suffixes.length;
    }

    /**
     * Generate an entity whose id ends with the suffix at `suffixIndex`.
     *
     * @throws RangeError if `suffixIndex` isn't a valid index of the suffix list
     */
    newEntity(suffixIndex: number): E {
        const suffix = this.suffixes[suffixIndex];
        if (suffix === undefined || !Number.isInteger(suffixIndex)) {
            throw new RangeError(`Suffix index out of range: ${suffixIndex}`);
        }
        const entity = this.generator();
        entity.setIdWithTypePrefix(suffix);
        return entity;
    }

    /**
     * One entity per suffix, in suffix order.
     */
    newBatch(): E[] {
        return this.suffixes.map((_, k) => this.newEntity(k));
    }

    /**
     * Id of the entities made for the suffix at `suffixIndex`.
     *
     * @throws RangeError if `suffixIndex` isn't a valid index of the suffix list
     */
    entityId(suffixIndex: number): string {
        return this.newEntity(suffixIndex).id;
    }

    /**
     * Factory with suffixes `1, 2, ..., howMany`.
     *
     * @throws RangeError if `howMany` isn't a positive integer
     */
    static withNumericSuffixes<E extends GeneratedEntity>(
        howMany: number,
        generator: EntityGenerator<E>
    ): EntityFactory<E> {
        ensurePositive(howMany);
        return new EntityFactory(generator, Array.from({ length: howMany }, (_, k) => k + 1));
    }

    /**
     * Factory with `howMany` random UUID suffixes.
     *
     * @throws RangeError if `howMany` isn't a positive integer
     */
    static withUuidSuffixes<E extends GeneratedEntity>(
        howMany: number,
        generator: EntityGenerator<E>
    ): EntityFactory<E> {
        ensurePositive(howMany);
        return new EntityFactory(generator, Array.from({ length: howMany }, () => randomUUID()));
    }
}

/**
 * Endless stream of batches from `factory`.
 */
export function* entityBatches<E extends GeneratedEntity>(factory: EntityFactory<E>): Generator<E[], never, void> {
    while (true) {
        yield factory.newBatch();
    }
}

function ensurePositive(howMany: number): void {
    if (!Number.isInteger(howMany) || howMany <= 0) {
        throw new RangeError(`Expected a positive number of entities, got ${howMany}`);
    }
}
