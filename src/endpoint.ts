import type { OutboundChannel } from "./channel.js";
import { MessageDispatcher } from "./dispatcher.js";
import { ConfigurationError, ForwardingError, MessagingError } from "./errors.js";
import { LifecycleEndpoint, type LifecycleEndpointOptions } from "./lifecycle.js";
import { EventForwardingListener } from "./listener.js";
import { buildMessage, type OutboundMessage } from "./message.js";
import { freezeRosterEvent, isRosterEvent, type RosterEvent } from "./presence.js";
import type { PresenceSession, RosterListener } from "./roster.js";

export interface RosterEventEndpointOptions extends LifecycleEndpointOptions {
    /** Connection whose roster is subscribed to on start. */
    session?: PresenceSession;
    /** Channel every roster event is sent to. */
    channel?: OutboundChannel;
}

/**
 * Inbound endpoint that subscribes to a presence session's roster while
 * started and sends every roster notification to an outbound channel as
 * an OutboundMessage whose payload is the RosterEvent.
 *
 * The session and channel are write-once: they may be set until init()
 * completes and are fixed afterwards.
 *
 * Events (in addition to "start" and "stop"):
 * - "message" (message: OutboundMessage<RosterEvent>) — a message was sent
 */
export class RosterEventEndpoint extends LifecycleEndpoint {
    private _session: PresenceSession | null;
    private _channel: OutboundChannel | null;
    private _registered = false;
    private readonly dispatcher = new MessageDispatcher();
    private readonly rosterListener: EventForwardingListener;

    constructor(options: RosterEventEndpointOptions = {}) {
        super(options);
        this._session = options.session ?? null;
        this._channel = options.channel ?? null;
        this.rosterListener = new EventForwardingListener((event) => this.forward(event), this.logger);
    }

    get componentType(): string {
        return "roster-event-inbound-channel-adapter";
    }

    /** Set the channel on which roster event messages are sent. */
    configure(channel: OutboundChannel): void {
        this._channel = this.replaceOnce("channel", this._channel, channel);
    }

    /** Set the presence session whose roster is observed. */
    setSession(session: PresenceSession): void {
        this._session = this.replaceOnce("session", this._session, session);
    }

    get channel(): OutboundChannel | null {
        return this._channel;
    }

    get session(): PresenceSession | null {
        return this._session;
    }

    /** Whether the listener is currently registered with the roster. */
    get registered(): boolean {
        return this._registered;
    }

    /** The listener this endpoint registers with the roster. */
    get listener(): RosterListener {
        return this.rosterListener;
    }

    /**
     * Send a roster event to the configured channel.
     *
     * The payload is a frozen copy of `event` unless the event is already
     * frozen. MessagingErrors from the channel or a "message" listener
     * propagate unchanged. Any other failure, including one thrown by a
     * "message" listener, is raised as a ForwardingError carrying the event.
     */
    forward(event: RosterEvent): void {
        let message: OutboundMessage<RosterEvent> | null = null;
        try {
            if (!isRosterEvent(event)) {
                throw new TypeError("Not a valid roster event");
            }
            message = buildMessage(freezeRosterEvent(event));
            this.dispatcher.send(message);
            this.logger.trace({ id: message.headers.id, event: event.type }, "roster event sent");
            this.emit("message", message);
        } catch (err) {
            if (err instanceof MessagingError) {
                throw err;
            }
            throw new ForwardingError(event, message, "Failed to send roster event message", { cause: err });
        }
    }

    protected defaultComponentName(): string {
        return "roster-endpoint";
    }

    protected onInit(): void {
        if (!this._session) {
            throw new ConfigurationError(`${this.componentName}: a presence session is required`);
        }
        if (!this._channel) {
            throw new ConfigurationError(`${this.componentName}: an outbound channel is required`);
        }
        this.dispatcher.setDefaultChannel(this._channel);
    }

    protected doStart(): void {
        if (this._registered) return;

        this.requireSession().getRoster().addRosterListener(this.rosterListener);
        this._registered = true;
    }

    protected doStop(): void {
        if (!this._registered) return;

        this.requireSession().getRoster().removeRosterListener(this.rosterListener);
        this._registered = false;
    }

    private requireSession(): PresenceSession {
        if (!this._session) {
            throw new ConfigurationError(`${this.componentName}: a presence session is required`);
        }
        return this._session;
    }

    private replaceOnce<T>(what: string, current: T | null, next: T): T {
        if (this.initialized && current !== next) {
            throw new ConfigurationError(`${this.componentName}: ${what} cannot be changed after initialization`);
        }
        return next;
    }
}
