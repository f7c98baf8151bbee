/**
 * @fileoverview Unit tests for random entity generation
 *
 * @module @contextkit/ngsi/__tests__/generator
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { defineEntitySchema } from "../contracts/index.js";
import { Entity } from "../model/index.js";
import {
    EntityFactory,
    entityBatches,
    floatAttrCloseTo,
    randomBoolAttr,
    textAttrFromOneOf,
} from "../sim/index.js";

const BotSchema = defineEntitySchema("Bot", { speed: "Number", direction: "Text" });

function newBot() {
    return Entity.create(BotSchema, "", { speed: floatAttrCloseTo(1), direction: textAttrFromOneOf(["N", "S"]) });
}

describe("generator", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe("random attributes", () => {
        // Scenario: Value drawn from Math.random
        it("should offset the base by a random fraction", () => {
            vi.spyOn(Math, "random").mockReturnValue(0.25);

            expect(floatAttrCloseTo(10)).toEqual({ type: "Number", value: 10.25 });
        });

        // Scenario: Bounds over many draws
        it("should stay within [base, base + 1)", () => {
            for (let k = 0; k < 100; k++) {
                const value = floatAttrCloseTo(-3).value;
                expect(value).toBeGreaterThanOrEqual(-3);
                expect(value).toBeLessThan(-2);
            }
        });

        it("should pick a text value from the choices", () => {
            vi.spyOn(Math, "random").mockReturnValue(0.5);

            expect(textAttrFromOneOf(["a", "b", "c"])).toEqual({ type: "Text", value: "b" });
        });

        it("should refuse an empty list of choices", () => {
            expect(() => textAttrFromOneOf([])).toThrow(RangeError);
        });

        it("should draw booleans", () => {
            const random = vi.spyOn(Math, "random");

            random.mockReturnValue(0.25);
            expect(randomBoolAttr()).toEqual({ type: "Boolean", value: true });

            random.mockReturnValue(0.75);
            expect(randomBoolAttr()).toEqual({ type: "Boolean", value: false });
        });
    });

    describe("EntityFactory", () => {
        // Scenario: Numeric suffixes
        it("should number entity ids from 1", () => {
            const factory = EntityFactory.withNumericSuffixes(3, newBot);

            expect(factory.size).toBe(3);
            expect(factory.newBatch().map((bot) => bot.id)).toEqual([
                "urn:ngsi-ld:Bot:1",
                "urn:ngsi-ld:Bot:2",
                "urn:ngsi-ld:Bot:3",
            ]);
            expect(factory.entityId(1)).toBe("urn:ngsi-ld:Bot:2");
        });

        // Scenario: Fresh entity on every call
        it("should generate a new entity per call", () => {
            const generator = vi.fn(newBot);
            const factory = new EntityFactory(generator, ["a"]);

            const first = factory.newEntity(0);
            const second = factory.newEntity(0);

            expect(first).not.toBe(second);
            expect(generator).toHaveBeenCalledTimes(2);
            expect(second.get("speed")?.type).toBe("Number");
        });

        // Scenario: UUID suffixes
        it("should use stable random UUID suffixes", () => {
            const factory = EntityFactory.withUuidSuffixes(2, newBot);

            const [a, b] = factory.newBatch().map((bot) => bot.id);

            expect(a).toMatch(/^urn:ngsi-ld:Bot:[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
            expect(a).not.toBe(b);
            expect(factory.entityId(0)).toBe(a);
        });

        // Scenario: Index outside the suffix list
        it("should reject suffix indexes out of range", () => {
            const factory = EntityFactory.withNumericSuffixes(2, newBot);

            expect(() => factory.newEntity(2)).toThrow("Suffix index out of range: 2");
            expect(() => factory.newEntity(-1)).toThrow(RangeError);
        });

        // Scenario: Nothing to suffix with
        it("should reject an empty suffix list or a non-positive count", () => {
            expect(() => new EntityFactory(newBot, [])).toThrow("EntityFactory needs at least one id suffix");
            expect(() => EntityFactory.withNumericSuffixes(0, newBot)).toThrow("Expected a positive number of entities, got 0");
            expect(() => EntityFactory.withUuidSuffixes(-2, newBot)).toThrow(RangeError);
        });
    });

    describe("entityBatches", () => {
        it("should yield a new batch on every step", () => {
            const batches = entityBatches(EntityFactory.withNumericSuffixes(2, newBot));

            const first = batches.next().value;
            const second = batches.next().value;

            expect(first.map((bot) => bot.id)).toEqual(["urn:ngsi-ld:Bot:1", "urn:ngsi-ld:Bot:2"]);
            expect(second).toHaveLength(2);
            expect(second[0]).not.toBe(first[0]);
        });
    });
});
