import type { OutboundChannel } from "./channel.js";
import { ConfigurationError, MessageDeliveryError } from "./errors.js";
import type { OutboundMessage } from "./message.js";

/**
 * Sends messages to a default channel bound once at endpoint init, or to
 * an explicit channel per call.
 */
export class MessageDispatcher {
    private _defaultChannel: OutboundChannel | null = null;

    /** Bind the channel used when send() is not given one. */
    setDefaultChannel(channel: OutboundChannel): void {
        this._defaultChannel = channel;
    }

    get defaultChannel(): OutboundChannel | null {
        return this._defaultChannel;
    }

    /**
     * Send a message.
     *
     * Throws MessageDeliveryError if the channel refuses it. Errors thrown by
     * the channel itself propagate unchanged.
     */
    send(message: OutboundMessage, channel?: OutboundChannel): void {
        const target = channel ?? this._defaultChannel;
        if (!target) {
            throw new ConfigurationError("No channel given and no default channel bound");
        }

        if (!target.send(message)) {
            throw new MessageDeliveryError(message, `Failed to send message to channel '${target.name}'`);
        }
    }
}
