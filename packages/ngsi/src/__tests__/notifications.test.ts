/**
 * @fileoverview Unit tests for notification filtering and batch payloads
 *
 * @module @contextkit/ngsi/__tests__/notifications
 */

import { describe, it, expect } from "vitest";
import { defineEntitySchema, numberAttr } from "../contracts/index.js";
import {
    Entity,
    entitiesUpsert,
    filterEntities,
    fromEntityDocuments,
    fromEntitySummaries,
} from "../model/index.js";

const BotSchema = defineEntitySchema("Bot", { speed: "Number" });

describe("notifications", () => {
    describe("filterEntities", () => {
        // Scenario: Mixed entity types in one notification
        it("should keep only entities of the schema type", () => {
            const bots = filterEntities(
                {
                    subscriptionId: "sub-1",
                    data          : [
                        { id: "1", type: "Bot", speed: { type: "Number", value: 1.1 } },
                        { id: "2", type: "NotMe", speed: { type: "Number", value: 2.2 } },
                        { id: "3", type: "Bot" },
                    ],
                },
                BotSchema
            );

            expect(bots.map((b) => b.id)).toEqual(["1", "3"]);
            expect(bots[0]?.get("speed")?.value).toBe(1.1);
        });

        // Scenario: Nothing matching
        it("should return an empty list when no entity matches", () => {
            expect(filterEntities({ data: [{ id: "2", type: "NotMe" }] }, BotSchema)).toEqual([]);
        });
    });

    describe("entitiesUpsert", () => {
        it("should wrap wire objects in an append action", () => {
            const bot = Entity.create(BotSchema, "urn:ngsi-ld:Bot:1", { speed: numberAttr(3) });

            expect(entitiesUpsert([bot])).toEqual({
                actionType: "append",
                entities  : [{ id: "urn:ngsi-ld:Bot:1", type: "Bot", speed: { type: "Number", value: 3 } }],
            });
        });
    });

    describe("fromEntitySummaries", () => {
        // Scenario: Summaries missing id or type are dropped
        it("should drop summaries lacking entityId or entityType", () => {
            const refs = fromEntitySummaries([
                { entityId: "urn:ngsi-ld:Bot:1", entityType: "Bot", index: "2024-05-01T10:00:00.000+00:00" },
                { entityId: "urn:ngsi-ld:Bot:2" },
                { entityType: "Bot" },
                { entityId: "", entityType: "Bot" },
                "junk",
            ]);

            expect(refs).toEqual([{ id: "urn:ngsi-ld:Bot:1", type: "Bot" }]);
        });
    });

    describe("fromEntityDocuments", () => {
        it("should read id and type of entity documents", () => {
            expect(fromEntityDocuments([{ id: "r1", type: "Room" }, { id: 7, type: "Room" }]))
                .toEqual([{ id: "r1", type: "Room" }]);
        });
    });
});
