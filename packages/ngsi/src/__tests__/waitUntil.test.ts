/**
 * @fileoverview Unit tests for the polling helpers
 *
 * @module @contextkit/ngsi/__tests__/waitUntil
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { WaitTimeoutError } from "../contracts/index.js";
import { waitForOrion, waitForQuantumLeap, waitUntil } from "../wait/index.js";
import { createMockLogger } from "./fakes.js";

describe("waitUntil", () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    // Scenario: Condition already true
    it("should return at once when the condition holds", async () => {
        const condition = vi.fn(() => true);

        await waitUntil(condition);

        expect(condition).toHaveBeenCalledTimes(1);
    });

    // Scenario: Async condition that turns true on the third poll
    it("should poll until the condition holds", async () => {
        const condition = vi.fn<() => Promise<boolean>>()
            .mockResolvedValueOnce(false)
            .mockResolvedValueOnce(false)
            .mockResolvedValue(true);

        const done = waitUntil(condition, { maxWait: 5, sleepInterval: 1 });
        await vi.runAllTimersAsync();
        await done;

        expect(condition).toHaveBeenCalledTimes(3);
    });

    // Scenario: Condition never holds
    it("should throw WaitTimeoutError after maxWait seconds", async () => {
        const condition = vi.fn(() => false);

        const done = waitUntil(condition, { maxWait: 2, sleepInterval: 0.5 });
        const assertion = expect(done).rejects.toThrow(WaitTimeoutError);
        await vi.runAllTimersAsync();
        await assertion;

        expect(condition).toHaveBeenCalledTimes(4);
        await expect(done).rejects.toThrow("Waited longer than 2 secs for condition");
    });

    // Scenario: Condition fails hard
    it("should propagate errors thrown by the condition", async () => {
        await expect(waitUntil(() => {
            throw new Error("broken");
        })).rejects.toThrow("broken");
    });

    // Scenario: Zero interval would never time out
    it("should reject a non-positive sleep interval", async () => {
        await expect(waitUntil(() => false, { sleepInterval: 0 })).rejects.toThrow(RangeError);
    });
});

describe("waitForOrion / waitForQuantumLeap", () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    // Scenario: Service comes up on the second attempt
    it("should retry until the service lists entities", async () => {
        const client = {
            listEntities: vi.fn<() => Promise<unknown>>()
                .mockRejectedValueOnce(new Error("connect ECONNREFUSED"))
                .mockResolvedValue([]),
        };
        const logger = createMockLogger();

        const done = waitForOrion(client, { logger });
        await vi.runAllTimersAsync();
        await done;

        expect(client.listEntities).toHaveBeenCalledTimes(2);
        expect(logger.debug).toHaveBeenCalledWith("Orion not reachable yet", { error: "connect ECONNREFUSED" });
        expect(logger.info).toHaveBeenCalledWith("Orion is up");
    });

    // Scenario: Service never comes up
    it("should time out after the default 10 seconds", async () => {
        const client = { listEntities: vi.fn<() => Promise<unknown>>().mockRejectedValue(new Error("down")) };

        const done = waitForQuantumLeap(client);
        const assertion = expect(done).rejects.toThrow("Waited longer than 10 secs for condition");
        await vi.runAllTimersAsync();
        await assertion;

        expect(client.listEntities).toHaveBeenCalledTimes(20);
    });
});
