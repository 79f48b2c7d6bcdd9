export {
    type Availability,
    type Presence,
    type RosterEvent,
    type RosterEventType,
    AvailabilitySchema,
    PresenceSchema,
    RosterEventSchema,
    entriesAdded,
    entriesUpdated,
    entriesDeleted,
    presenceChanged,
    freezeRosterEvent,
    isRosterEvent,
    describeRosterEvent,
} from "./presence.js";
export { type OutboundMessage, type MessageHeaders, buildMessage, isValidMessage } from "./message.js";
export {
    ConfigurationError,
    IllegalStateError,
    MessagingError,
    MessageDeliveryError,
    MessageHandlingError,
    ForwardingError,
} from "./errors.js";
export {
    type OutboundChannel,
    type MessageHandler,
    PublishSubscribeChannel,
    type PublishSubscribeChannelOptions,
    QueueChannel,
    type QueueChannelOptions,
} from "./channel.js";
export { MessageDispatcher } from "./dispatcher.js";
export { type RosterListener, type Roster, type PresenceSession } from "./roster.js";
export { InMemoryRoster, InMemorySession } from "./memory-roster.js";
export {
    type EndpointState,
    type Lifecycle,
    type LifecycleEndpointOptions,
    LifecycleEndpoint,
} from "./lifecycle.js";
export { EventForwardingListener, type ForwardFn } from "./listener.js";
export { RosterEventEndpoint, type RosterEventEndpointOptions } from "./endpoint.js";
export { createLogger, LOG_LEVEL_ENV, type Logger } from "./logger.js";
