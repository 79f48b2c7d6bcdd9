import { randomUUID } from "node:crypto";

/**
 * Headers assigned when a message is built.
 *
 * - `id` — unique per message.
 * - `timestamp` — creation time in epoch milliseconds.
 *
 * Additional headers are consumer-defined and passed through untouched.
 */
export interface MessageHeaders {
    readonly id: string;
    readonly timestamp: number;
    readonly [name: string]: unknown;
}

/**
 * Message sent to an outbound channel. Immutable once built; the payload is
 * carried by reference and never transformed.
 */
export interface OutboundMessage<T = unknown> {
    readonly headers: MessageHeaders;
    readonly payload: T;
}

/**
 * Build a message around `payload`.
 *
 * `id` and `timestamp` are always generated here; extra headers with those
 * names are ignored.
 */
export function buildMessage<T>(payload: T, headers?: Record<string, unknown>): OutboundMessage<T> {
    if (payload === null || payload === undefined) {
        throw new TypeError("Message payload must not be null or undefined");
    }

    const merged: MessageHeaders = Object.freeze({
        ...headers,
        id: randomUUID(),
        timestamp: Date.now(),
    });

    return Object.freeze({ headers: merged, payload });
}

/**
 * Validate that a value is a well-formed message envelope.
 *
 * Checks:
 * - Is an object (not null, not array)
 * - `headers` is an object with a non-empty string `id` and a numeric `timestamp`
 * - `payload` is present
 */
export function isValidMessage(value: unknown): value is OutboundMessage {
    if (value === null || typeof value !== "object" || Array.isArray(value)) {
        return false;
    }

    if (!("headers" in value) || !("payload" in value)) {
        return false;
    }

    const { headers, payload } = value;

    if (headers === null || typeof headers !== "object" || Array.isArray(headers)) {
        return false;
    }

    if (!("id" in headers) || typeof headers.id !== "string" || headers.id.length === 0) {
        return false;
    }

    if (!("timestamp" in headers) || typeof headers.timestamp !== "number") {
        return false;
    }

    return payload !== null && payload !== undefined;
}
