import type { OutboundMessage } from "./message.js";
import type { RosterEvent } from "./presence.js";

/**
 * Error taxonomy.
 *
 * - ConfigurationError / IllegalStateError — lifecycle misuse, never retried.
 * - MessagingError and subclasses — raised by the channel layer and passed
 *   through to callers unchanged, so they can apply their own retry policy.
 * - ForwardingError — anything else that goes wrong while forwarding an event.
 */

/** A required collaborator is missing, or a write-once one was replaced. */
export class ConfigurationError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "ConfigurationError";
    }
}

/** A lifecycle verb was invoked in a state that does not permit it. */
export class IllegalStateError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "IllegalStateError";
    }
}

/** Base class for failures raised by the messaging layer. */
export class MessagingError extends Error {
    /** The message being sent, if one had been built. */
    readonly failedMessage: OutboundMessage | null;

    constructor(failedMessage: OutboundMessage | null, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "MessagingError";
        this.failedMessage = failedMessage;
    }
}

/** The channel refused the message (full, no subscribers, send returned false). */
export class MessageDeliveryError extends MessagingError {
    constructor(failedMessage: OutboundMessage | null, message: string, options?: ErrorOptions) {
        super(failedMessage, message, options);
        this.name = "MessageDeliveryError";
    }
}

/** A subscriber of an in-process channel threw while handling the message. */
export class MessageHandlingError extends MessagingError {
    constructor(failedMessage: OutboundMessage | null, message: string, options?: ErrorOptions) {
        super(failedMessage, message, options);
        this.name = "MessageHandlingError";
    }
}

/**
 * A roster event could not be forwarded for a reason outside the messaging
 * layer. `failedMessage` is null when the message could not be built at all;
 * `event` is null when the notification could not even be turned into an
 * event.
 */
export class ForwardingError extends Error {
    readonly event: RosterEvent | null;
    readonly failedMessage: OutboundMessage | null;

    constructor(
        event: RosterEvent | null,
        failedMessage: OutboundMessage | null,
        message: string,
        options?: ErrorOptions,
    ) {
        super(message, options);
        this.name = "ForwardingError";
        this.event = event;
        this.failedMessage = failedMessage;
    }
}
