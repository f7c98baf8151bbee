/**
 * @fileoverview Orion Context Broker client
 *
 * Reads and writes current entity state through the NGSI-v2 API, turning
 * responses into typed entities.
 *
 * @module @contextkit/ngsi/clients/OrionClient
 */

import { isStructuredValue } from "../contracts/Attribute.js";
import type { EntitySchema } from "../contracts/EntitySchema.js";
import type { FiwareContext } from "../contracts/FiwareContext.js";
import { fiwareHeaders } from "../contracts/FiwareContext.js";
import type { HttpHeaders, JsonClient } from "../contracts/JsonClient.js";
import type { Logger } from "../contracts/Logger.js";
import { createConsoleLogger } from "../contracts/Logger.js";
import { Entity } from "../model/Entity.js";
import type { NgsiEntity } from "../model/Entity.js";
import { entitiesUpsert, fromEntityDocuments } from "../model/notifications.js";
import type { EntityRef } from "../model/notifications.js";
import { OrionEndpoints } from "./endpoints.js";
import { resolveTransport, toArray } from "./options.js";
import type { ServiceClientOptions } from "./options.js";

/**
 * Orion subscription, passed through to the broker as is.
 */
export type Subscription = Record<string, unknown>;

/**
 * Orion Context Broker client.
 *
 * @example
 * ```typescript
 * const orion = new OrionClient("http://localhost:1026", { service: "demo" });
 *
 * await orion.upsertEntity(bot);
 * const bots = await orion.listEntitiesOfType(BotSchema);
 * ```
 */
export class OrionClient {
    private readonly urls: OrionEndpoints;
    private readonly headers: HttpHeaders;
    private readonly http: JsonClient;
    private readonly logger: Logger;

    constructor(baseUrl: string, ctx: FiwareContext = {}, options: ServiceClientOptions = {}) {
        this.urls = new OrionEndpoints(baseUrl);
        this.headers = fiwareHeaders(ctx);
        this.logger = options.logger ?? createConsoleLogger("OrionClient");
        this.http = resolveTransport(options, this.logger);
    }

    /**
     * Create the entity, or update its attributes if it already exists.
     */
    async upsertEntity(entity: NgsiEntity): Promise<void> {
        const url = this.urls.entities({ options: "upsert" });
        await this.http.post(url, entity.toWireObject(), this.headers);
        this.logger.debug("Entity upserted", { id: entity.id, type: entity.type });
    }

    /**
     * Create or update a batch of entities in one request.
     */
    async upsertEntities(entities: readonly NgsiEntity[]): Promise<void> {
        await this.http.post(this.urls.updateOp(), entitiesUpsert(entities), this.headers);
        this.logger.debug("Entities upserted", { count: entities.length });
    }

    /**
     * List id and type of the stored entities, optionally of one type only.
     */
    async listEntities(type?: string): Promise<EntityRef[]> {
        // attrs=id keeps Orion from sending attribute values along
        const url = this.urls.entities({ attrs: "id", type });
        const entities = await this.http.get(url, this.headers);
        return fromEntityDocuments(toArray(entities));
    }

    /**
     * List the ids of the stored entities, optionally of one type only.
     */
    async listEntityIds(type?: string): Promise<string[]> {
        const refs = await this.listEntities(type);
        return refs.map((ref) => ref.id);
    }

    /**
     * Fetch every entity of the schema's type.
     *
     * @throws EntityParseError if Orion sends a malformed entity
     */
    async listEntitiesOfType<S extends EntitySchema>(schema: S): Promise<Entity<S>[]> {
        const url = this.urls.entities({ type: schema.type });
        const entities = await this.http.get(url, this.headers);
        return parseAll(schema, toArray(entities));
    }

    /**
     * Fetch one entity by id.
     *
     * @returns The entity, or null if Orion has none with that id and type
     */
    async fetchEntity<S extends EntitySchema>(schema: S, entityId: string): Promise<Entity<S> | null> {
        const url = this.urls.entities({ id: entityId, type: schema.type });
        const entities = await this.http.get(url, this.headers);
        return parseAll(schema, toArray(entities))[0] ?? null;
    }

    /**
     * Delete an entity.
     */
    async deleteEntity(entityId: string): Promise<void> {
        await this.http.delete(this.urls.entity(entityId), this.headers);
        this.logger.debug("Entity deleted", { id: entityId });
    }

    /**
     * Register a subscription. Orion does the notifying, not this library.
     */
    async subscribe(subscription: Subscription): Promise<void> {
        await this.http.post(this.urls.subscriptions(), subscription, this.headers);
        this.logger.info("Subscription created", { description: subscription.description });
    }

    /**
     * List the registered subscriptions.
     */
    async listSubscriptions(): Promise<Subscription[]> {
        const subscriptions = await this.http.get(this.urls.subscriptions(), this.headers);
        return toArray(subscriptions).filter(isStructuredValue);
    }
}

function parseAll<S extends EntitySchema>(schema: S, docs: readonly unknown[]): Entity<S>[] {
    const entities: Entity<S>[] = [];
    for (const doc of docs) {
        const entity = Entity.fromFullRepresentation(schema, doc);
        if (entity) {
            entities.push(entity);
        }
    }
    return entities;
}
