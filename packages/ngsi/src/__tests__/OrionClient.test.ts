/**
 * @fileoverview Unit tests for OrionClient
 *
 * Tests cover:
 * - Request URLs, FIWARE headers and payloads
 * - Parsing of entity listings
 * - Error propagation from the transport
 *
 * @module @contextkit/ngsi/__tests__/OrionClient
 */

import { describe, it, expect, beforeEach } from "vitest";
import { OrionClient } from "../clients/index.js";
import { defineEntitySchema, HttpError, numberAttr } from "../contracts/index.js";
import { Entity } from "../model/index.js";
import { createFakeJsonClient, createMockLogger } from "./fakes.js";

const BotSchema = defineEntitySchema("Bot", { speed: "Number" });
const HEADERS = { "fiware-service": "test-tenant" };

describe("OrionClient", () => {
    let http: ReturnType<typeof createFakeJsonClient>;
    let logger: ReturnType<typeof createMockLogger>;
    let orion: OrionClient;

    beforeEach(() => {
        http = createFakeJsonClient();
        logger = createMockLogger();
        orion = new OrionClient("http://orion:1026", { service: "test-tenant" }, { http, logger });
    });

    describe("upsertEntity", () => {
        // Scenario: Single entity upsert
        it("should POST the wire object with options=upsert", async () => {
            const bot = Entity.create(BotSchema, "urn:ngsi-ld:Bot:1", { speed: numberAttr(1.5) });

            await orion.upsertEntity(bot);

            expect(http.post).toHaveBeenCalledWith(
                "http://orion:1026/v2/entities?options=upsert",
                { id: "urn:ngsi-ld:Bot:1", type: "Bot", speed: { type: "Number", value: 1.5 } },
                HEADERS
            );
            expect(logger.debug).toHaveBeenCalledWith("Entity upserted", { id: "urn:ngsi-ld:Bot:1", type: "Bot" });
        });
    });

    describe("upsertEntities", () => {
        // Scenario: Batch upsert
        it("should POST an append batch update", async () => {
            const bots = [
                Entity.create(BotSchema, "urn:ngsi-ld:Bot:1"),
                Entity.create(BotSchema, "urn:ngsi-ld:Bot:2", { speed: numberAttr(2) }),
            ];

            await orion.upsertEntities(bots);

            expect(http.post).toHaveBeenCalledWith(
                "http://orion:1026/v2/op/update",
                {
                    actionType: "append",
                    entities  : [
                        { id: "urn:ngsi-ld:Bot:1", type: "Bot" },
                        { id: "urn:ngsi-ld:Bot:2", type: "Bot", speed: { type: "Number", value: 2 } },
                    ],
                },
                HEADERS
            );
        });
    });

    describe("listEntities", () => {
        // Scenario: Ids and types only
        it("should request ids only and return refs", async () => {
            http.get.mockResolvedValue([
                { id: "urn:ngsi-ld:Bot:1", type: "Bot" },
                { id: "urn:ngsi-ld:Room:1", type: "Room" },
            ]);

            const refs = await orion.listEntities();

            expect(http.get).toHaveBeenCalledWith("http://orion:1026/v2/entities?attrs=id", HEADERS);
            expect(refs).toEqual([
                { id: "urn:ngsi-ld:Bot:1", type: "Bot" },
                { id: "urn:ngsi-ld:Room:1", type: "Room" },
            ]);
        });

        // Scenario: Filter by type
        it("should pass the type filter along", async () => {
            http.get.mockResolvedValue([{ id: "urn:ngsi-ld:Bot:1", type: "Bot" }]);

            const ids = await orion.listEntityIds("Bot");

            expect(http.get).toHaveBeenCalledWith("http://orion:1026/v2/entities?attrs=id&type=Bot", HEADERS);
            expect(ids).toEqual(["urn:ngsi-ld:Bot:1"]);
        });

        // Scenario: Empty body
        it("should return an empty list for a non-array body", async () => {
            expect(await orion.listEntities()).toEqual([]);
        });
    });

    describe("listEntitiesOfType", () => {
        // Scenario: Typed entity listing
        it("should parse entities of the schema type", async () => {
            http.get.mockResolvedValue([
                { id: "urn:ngsi-ld:Bot:1", type: "Bot", speed: { type: "Number", value: 1 } },
                { id: "urn:ngsi-ld:Bot:2", type: "Bot", speed: { type: "Number", value: 2 } },
            ]);

            const bots = await orion.listEntitiesOfType(BotSchema);

            expect(http.get).toHaveBeenCalledWith("http://orion:1026/v2/entities?type=Bot", HEADERS);
            expect(bots.map((b) => b.get("speed")?.value)).toEqual([1, 2]);
        });
    });

    describe("fetchEntity", () => {
        // Scenario: Entity exists
        it("should return the first matching entity", async () => {
            http.get.mockResolvedValue([{ id: "urn:ngsi-ld:Bot:1", type: "Bot", speed: { type: "Number", value: 4 } }]);

            const bot = await orion.fetchEntity(BotSchema, "urn:ngsi-ld:Bot:1");

            expect(http.get).toHaveBeenCalledWith(
                "http://orion:1026/v2/entities?id=urn%3Angsi-ld%3ABot%3A1&type=Bot",
                HEADERS
            );
            expect(bot?.get("speed")?.value).toBe(4);
        });

        // Scenario: No such entity
        it("should return null when Orion has no match", async () => {
            http.get.mockResolvedValue([]);

            expect(await orion.fetchEntity(BotSchema, "urn:ngsi-ld:Bot:9")).toBeNull();
        });
    });

    describe("deleteEntity", () => {
        it("should DELETE the entity resource", async () => {
            await orion.deleteEntity("urn:ngsi-ld:Bot:1");

            expect(http.delete).toHaveBeenCalledWith("http://orion:1026/v2/entities/urn%3Angsi-ld%3ABot%3A1", HEADERS);
        });
    });

    describe("subscriptions", () => {
        // Scenario: Subscription passed through as is
        it("should POST the subscription unchanged", async () => {
            const subscription = { description: "Notify me", subject: { entities: [{ idPattern: ".*" }] } };

            await orion.subscribe(subscription);

            expect(http.post).toHaveBeenCalledWith("http://orion:1026/v2/subscriptions", subscription, HEADERS);
            expect(logger.info).toHaveBeenCalledWith("Subscription created", { description: "Notify me" });
        });

        it("should list subscriptions, skipping non-objects", async () => {
            http.get.mockResolvedValue([{ id: "s1" }, "junk"]);

            expect(await orion.listSubscriptions()).toEqual([{ id: "s1" }]);
        });
    });

    // Scenario: Transport failure
    it("should propagate HttpError from the transport", async () => {
        http.get.mockRejectedValue(new HttpError("GET failed with status 500", "http://orion:1026/v2/entities", 500));

        await expect(orion.listEntitiesOfType(BotSchema)).rejects.toThrow(HttpError);
    });

    // Scenario: No FIWARE context
    it("should send no FIWARE headers without a context", async () => {
        const plain = new OrionClient("http://orion:1026", {}, { http, logger });

        await plain.deleteEntity("b1");

        expect(http.delete).toHaveBeenCalledWith("http://orion:1026/v2/entities/b1", {});
    });
});
