/**
 * @fileoverview Device pool sampler
 *
 * Simulates a pool of devices whose readings are pushed to Orion.
 *
 * @module @contextkit/ngsi/sim/DevicePoolSampler
 */

import type { Logger } from "../contracts/Logger.js";
import { createConsoleLogger } from "../contracts/Logger.js";
import type { NgsiEntity } from "../model/Entity.js";
import { sleep } from "../wait/waitUntil.js";
import { EntityFactory } from "./generator.js";
import type { GeneratedEntity } from "./generator.js";

/**
 * The part of an OrionClient a sampler writes through.
 */
export interface ReadingsSink {
    upsertEntity(entity: NgsiEntity): Promise<void>;
    upsertEntities(entities: readonly NgsiEntity[]): Promise<void>;
}

/**
 * Pool of simulated devices numbered `1..poolSize`.
 *
 * Subclasses implement {@link newDeviceEntity} to turn one round of device
 * readings into an entity; the sampler gives it the id of the device.
 *
 * @example
 * ```typescript
 * class BotSampler extends DevicePoolSampler<Entity<typeof BotSchema>> {
 *     newDeviceEntity() {
 *         return Entity.create(BotSchema, "", { speed: floatAttrCloseTo(1) });
 *     }
 * }
 *
 * await new BotSampler(2, orion).sample(10, 0.5);
 * ```
 */
export abstract class DevicePoolSampler<E extends GeneratedEntity = GeneratedEntity> {
    protected readonly logger: Logger;
    private readonly factory: EntityFactory<E>;

    /**
     * @param poolSize - Number of devices to simulate
     * @param orion - Where readings go, usually an OrionClient
     * @param logger - Logger for sampling progress
     * @throws RangeError if `poolSize` isn't a positive integer
     */
    constructor(
        readonly poolSize: number,
        private readonly orion: ReadingsSink,
        logger?: Logger
    ) {
        this.logger = logger ?? createConsoleLogger(this.constructor.name);
        this.factory = EntityFactory.withNumericSuffixes(poolSize, () => this.newDeviceEntity());
    }

    /**
     * Assemble a round of readings of one device into an entity. The id is
     * overwritten, so "" will do.
     */
    abstract newDeviceEntity(): E;

    /**
     * Readings of device `nid`, with id `urn:ngsi-ld:{type}:{nid}`.
     *
     * @throws RangeError if `nid` isn't in `1..poolSize`
     */
    makeDeviceEntity(nid: number): E {
        if (!Number.isInteger(nid) || nid < 1 || nid > this.poolSize) {
            throw new RangeError(`Device id must be in 1..${this.poolSize}, got ${nid}`);
        }
        return this.factory.newEntity(nid - 1);
    }

    /**
     * Id of the entities made for device `nid`.
     *
     * @throws RangeError if `nid` isn't in `1..poolSize`
     */
    entityId(nid: number): string {
        return this.makeDeviceEntity(nid).id;
    }

    /**
     * Send one round of readings of device `nid`.
     *
     * @returns The entity sent
     */
    async sendDeviceReadings(nid: number): Promise<E> {
        const entity = this.makeDeviceEntity(nid);
        await this.orion.upsertEntity(entity);
        return entity;
    }

    /**
     * Send `samplesN` batches of readings, one entity per device each,
     * pausing `samplingRate` seconds after every batch.
     */
    async sample(samplesN: number, samplingRate: number): Promise<void> {
        for (let k = 1; k <= samplesN; k++) {
            const batch = this.factory.newBatch();
            await this.orion.upsertEntities(batch);
            this.logger.debug("Batch sent", { sample: k, of: samplesN, devices: batch.length });

            await sleep(samplingRate);
        }
    }
}
