import { MessageDeliveryError, MessageHandlingError, MessagingError } from "./errors.js";
import type { OutboundMessage } from "./message.js";

/**
 * Destination for outbound messages.
 *
 * `send` returns true when the channel accepted the message and false when
 * it refused it. A thrown MessagingError is a messaging-layer failure;
 * anything else thrown is treated as a generic failure by callers.
 */
export interface OutboundChannel {
    readonly name: string;
    send(message: OutboundMessage): boolean;
}

export type MessageHandler = (message: OutboundMessage) => void;

export interface PublishSubscribeChannelOptions {
    /** Channel name used in error messages. Default: "pubsub". */
    name?: string;
    /** Throw on send when nobody is subscribed. Default: true. */
    requireSubscribers?: boolean;
}

/**
 * In-process channel that fans out every message to all subscribers,
 * synchronously and in subscription order.
 */
export class PublishSubscribeChannel implements OutboundChannel {
    readonly name: string;
    private readonly requireSubscribers: boolean;
    private handlers: Set<MessageHandler> = new Set();

    constructor(options: PublishSubscribeChannelOptions = {}) {
        this.name = options.name ?? "pubsub";
        this.requireSubscribers = options.requireSubscribers ?? true;
    }

    /** Subscribe a handler. Returns a function that removes it again. */
    subscribe(handler: MessageHandler): () => void {
        this.handlers.add(handler);
        return () => {
            this.handlers.delete(handler);
        };
    }

    /** Number of current subscribers. */
    get subscriberCount(): number {
        return this.handlers.size;
    }

    send(message: OutboundMessage): boolean {
        if (this.handlers.size === 0) {
            if (this.requireSubscribers) {
                throw new MessageDeliveryError(message, `Channel '${this.name}' has no subscribers`);
            }
            return true;
        }

        // Snapshot so handlers may (un)subscribe while we iterate
        const snapshot = Array.from(this.handlers);
        for (const handler of snapshot) {
            try {
                handler(message);
            } catch (err) {
                if (err instanceof MessagingError) {
                    throw err;
                }
                throw new MessageHandlingError(
                    message,
                    `Subscriber of channel '${this.name}' failed to handle message ${message.headers.id}`,
                    { cause: err },
                );
            }
        }
        return true;
    }
}

export interface QueueChannelOptions {
    /** Channel name used in error messages. Default: "queue". */
    name?: string;
    /** Maximum number of buffered messages. Default: unbounded. */
    capacity?: number;
}

/**
 * In-process channel that buffers messages until they are received.
 * When the buffer is full, send returns false.
 */
export class QueueChannel implements OutboundChannel {
    readonly name: string;
    private readonly capacity: number;
    private queue: OutboundMessage[] = [];

    constructor(options: QueueChannelOptions = {}) {
        const capacity = options.capacity ?? Number.POSITIVE_INFINITY;
        if (capacity !== Number.POSITIVE_INFINITY && (!Number.isInteger(capacity) || capacity < 1)) {
            throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
        }
        this.name = options.name ?? "queue";
        this.capacity = capacity;
    }

    send(message: OutboundMessage): boolean {
        if (this.queue.length >= this.capacity) {
            return false;
        }
        this.queue.push(message);
        return true;
    }

    /** Remove and return the oldest message, if any. */
    receive(): OutboundMessage | undefined {
        return this.queue.shift();
    }

    /** Remove and return all buffered messages, oldest first. */
    drain(): OutboundMessage[] {
        const drained = this.queue;
        this.queue = [];
        return drained;
    }

    /** Number of buffered messages. */
    get size(): number {
        return this.queue.length;
    }
}
