/**
 * @fileoverview JSON transport contract
 *
 * The service clients only talk to the network through this interface.
 * The default implementation sits on axios (see impl/AxiosJsonClient);
 * tests hand the clients an in-process fake.
 *
 * Every method resolves to the decoded JSON body, or `{}` when the server
 * sent no body, and rejects with an HttpError on a non-2xx status.
 *
 * @module @contextkit/ngsi/contracts/JsonClient
 */

/**
 * Request headers, name to value.
 */
export type HttpHeaders = Readonly<Record<string, string>>;

/**
 * JSON-over-HTTP client.
 */
export interface JsonClient {
    /** GET the JSON resource at `url` */
    get(url: string, headers?: HttpHeaders): Promise<unknown>;

    /** POST a JSON payload; `Content-Type: application/json` is added */
    post(url: string, payload: unknown, headers?: HttpHeaders): Promise<unknown>;

    /** PUT a JSON payload; `Content-Type: application/json` is added */
    put(url: string, payload: unknown, headers?: HttpHeaders): Promise<unknown>;

    /** DELETE the resource at `url` */
    delete(url: string, headers?: HttpHeaders): Promise<unknown>;
}

/**
 * Transport options shared by the service clients.
 */
export interface JsonClientConfig {
    /** Request timeout in milliseconds (default: 60000) */
    readonly timeout?: number;

    /** Verify TLS certificates on HTTPS connections (default: true) */
    readonly verify?: boolean;
}
