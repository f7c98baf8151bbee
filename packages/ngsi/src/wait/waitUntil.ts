/**
 * @fileoverview Polling helpers
 *
 * Wait for a condition to hold, or for the FIWARE services to come up.
 * Times are in seconds.
 *
 * @module @contextkit/ngsi/wait/waitUntil
 */

import type { Logger } from "../contracts/Logger.js";
import { silentLogger } from "../contracts/Logger.js";
import { WaitTimeoutError } from "../contracts/errors.js";

/**
 * Predicate polled by {@link waitUntil}; true means stop waiting.
 */
export type WaitCondition = () => boolean | Promise<boolean>;

export interface WaitOptions {
    /** Give up after this many seconds (default: 20) */
    readonly maxWait?: number;

    /** Seconds between polls (default: 1) */
    readonly sleepInterval?: number;

    /** Logger for poll attempts */
    readonly logger?: Logger;
}

/**
 * Anything with a `listEntities` call, e.g. an OrionClient or a
 * QuantumLeapClient.
 */
export interface EntityLister {
    listEntities(): Promise<unknown>;
}

/**
 * Resolve after `seconds`.
 */
export function sleep(seconds: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, seconds * 1000));
}

/**
 * Poll `condition` every `sleepInterval` seconds until it returns true.
 *
 * An error thrown by `condition` stops the wait and propagates.
 *
 * @throws WaitTimeoutError if the condition still fails after `maxWait` seconds
 *
 * @example
 * ```typescript
 * await waitUntil(async () => (await ql.countDataPoints("Bot", "speed")) >= 10, {
 *     maxWait      : 30,
 *     sleepInterval: 2,
 * });
 * ```
 */
export async function waitUntil(condition: WaitCondition, options: WaitOptions = {}): Promise<void> {
    const maxWait = options.maxWait ?? 20;
    const sleepInterval = options.sleepInterval ?? 1;
    const logger = options.logger ?? silentLogger;

    if (sleepInterval <= 0) {
        throw new RangeError(`Sleep interval must be positive, got ${sleepInterval}`);
    }

    let timeLeft = maxWait;
    let attempt = 0;
    while (timeLeft > 0) {
        attempt++;
        if (await condition()) {
            return;
        }
        logger.debug("Condition not met yet", { attempt, timeLeft });

        timeLeft -= sleepInterval;
        await sleep(sleepInterval);
    }

    throw new WaitTimeoutError(`Waited longer than ${maxWait} secs for condition`, maxWait);
}

/**
 * Wait until Orion answers an entity listing.
 *
 * @throws WaitTimeoutError if it doesn't within `maxWait` (default: 10) seconds
 */
export function waitForOrion(client: EntityLister, options: WaitOptions = {}): Promise<void> {
    return waitForService("Orion", client, options);
}

/**
 * Wait until QuantumLeap answers an entity listing.
 *
 * @throws WaitTimeoutError if it doesn't within `maxWait` (default: 10) seconds
 */
export function waitForQuantumLeap(client: EntityLister, options: WaitOptions = {}): Promise<void> {
    return waitForService("QuantumLeap", client, options);
}

async function waitForService(name: string, client: EntityLister, options: WaitOptions): Promise<void> {
    const logger = options.logger ?? silentLogger;

    const canListEntities = async (): Promise<boolean> => {
        try {
            await client.listEntities();
            return true;
        }
        catch (error) {
            logger.debug(`${name} not reachable yet`, {
                error: error instanceof Error ? error.message : String(error),
            });
            return false;
        }
    };

    await waitUntil(canListEntities, {
        maxWait      : options.maxWait ?? 10,
        sleepInterval: options.sleepInterval ?? 0.5,
        logger,
    });
    logger.info(`${name} is up`);
}
