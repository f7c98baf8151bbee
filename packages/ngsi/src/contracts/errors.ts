/**
 * @fileoverview Error taxonomy
 *
 * Routine outcomes (type mismatch, unrecognised values) are modelled as
 * `null` results elsewhere in the library. The classes below are only for
 * failures the caller has to deal with.
 *
 * @module @contextkit/ngsi/contracts/errors
 */

/**
 * Base class of every error thrown by the library.
 */
export abstract class NgsiError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly details?: Record<string, unknown>
    ) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * Thrown when a raw entity document or a schema definition is malformed.
 */
export class EntityParseError extends NgsiError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, "ENTITY_PARSE", details);
    }
}

/**
 * Thrown when a time-series query result can't be turned into a series,
 * e.g. an index timestamp isn't ISO 8601.
 */
export class SeriesParseError extends NgsiError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, "SERIES_PARSE", details);
    }
}

/**
 * Thrown by a JsonClient when the server answers with a non-2xx status or
 * can't be reached at all (`status` is then undefined).
 */
export class HttpError extends NgsiError {
    constructor(
        message: string,
        public readonly url: string,
        public readonly status?: number
    ) {
        super(message, "HTTP", { url, status });
    }
}

/**
 * Thrown by the wait helpers when a condition doesn't hold in time.
 */
export class WaitTimeoutError extends NgsiError {
    constructor(message: string, maxWait: number) {
        super(message, "WAIT_TIMEOUT", { maxWait });
    }
}

/**
 * Check whether an error is an HttpError with the given status.
 */
export function isHttpStatus(error: unknown, status: number): boolean {
    return error instanceof HttpError && error.status === status;
}
