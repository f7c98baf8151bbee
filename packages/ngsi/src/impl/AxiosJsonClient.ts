/**
 * @fileoverview Axios JSON transport
 *
 * Default JsonClient used by the Orion and QuantumLeap clients.
 *
 * @module @contextkit/ngsi/impl/AxiosJsonClient
 */

import { Agent } from "https";
import axios, { isAxiosError } from "axios";
import type { AxiosInstance, AxiosResponse, Method } from "axios";
import type { HttpHeaders, JsonClient, JsonClientConfig } from "../contracts/JsonClient.js";
import type { Logger } from "../contracts/Logger.js";
import { createConsoleLogger } from "../contracts/Logger.js";
import { HttpError } from "../contracts/errors.js";

/**
 * AxiosJsonClient options.
 */
export interface AxiosJsonClientConfig extends JsonClientConfig {
    /** Logger for request tracing */
    readonly logger?: Logger;
}

const DEFAULT_TIMEOUT_MS = 60000;

/**
 * JsonClient on top of an axios instance.
 *
 * Features:
 * - One axios instance (and connection pool) per client
 * - Empty response bodies resolve to `{}`
 * - Non-2xx statuses and network errors reject with HttpError
 *
 * @example
 * ```typescript
 * const http = new AxiosJsonClient({ timeout: 5000 });
 * const entities = await http.get("http://localhost:1026/v2/entities");
 * ```
 */
export class AxiosJsonClient implements JsonClient {
    private readonly http: AxiosInstance;
    private readonly logger: Logger;

    constructor(config: AxiosJsonClientConfig = {}) {
        this.logger = config.logger ?? createConsoleLogger("AxiosJsonClient");
        this.http = axios.create({
            timeout   : config.timeout ?? DEFAULT_TIMEOUT_MS,
            httpsAgent: new Agent({ rejectUnauthorized: config.verify ?? true }),
            headers   : { Accept: "application/json" },
        });
    }

    get(url: string, headers?: HttpHeaders): Promise<unknown> {
        return this.send("GET", url, undefined, headers);
    }

    post(url: string, payload: unknown, headers?: HttpHeaders): Promise<unknown> {
        return this.send("POST", url, payload, headers);
    }

    put(url: string, payload: unknown, headers?: HttpHeaders): Promise<unknown> {
        return this.send("PUT", url, payload, headers);
    }

    delete(url: string, headers?: HttpHeaders): Promise<unknown> {
        return this.send("DELETE", url, undefined, headers);
    }

    private async send(method: Method, url: string, payload: unknown, headers?: HttpHeaders): Promise<unknown> {
        this.logger.debug("Sending request", { method, url });

        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.request<unknown>({
                method,
                url,
                headers: {
                    ...headers,
                    ...(payload !== undefined && { "Content-Type": "application/json" }),
                },
                data: payload,
            });
        }
        catch (error) {
            throw this.toHttpError(method, url, error);
        }

        return decodeBody(response.data);
    }

    private toHttpError(method: Method, url: string, error: unknown): HttpError {
        if (isAxiosError(error)) {
            const status = error.response?.status;
            this.logger.warn("Request failed", { method, url, status, error: error.message });
            return new HttpError(
                status === undefined
                    ? `${method} ${url} failed: ${error.message}`
                    : `${method} ${url} failed with status ${status}`,
                url,
                status
            );
        }

        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn("Request failed", { method, url, error: message });
        return new HttpError(`${method} ${url} failed: ${message}`, url);
    }
}

/**
 * Axios hands back "" for an empty body, and the raw text when the body
 * isn't JSON.
 */
function decodeBody(data: unknown): unknown {
    if (data === undefined || data === null || data === "") {
        return {};
    }
    return data;
}
