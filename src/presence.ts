import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

/**
 * Roster event model.
 *
 * A RosterEvent is a closed tagged union over the four notifications a
 * roster source delivers. It is carried into outbound messages as-is, so
 * consumers switch on `type` rather than inspecting the payload shape.
 */

export const AvailabilitySchema = Type.Union([
    Type.Literal("available"),
    Type.Literal("chat"),
    Type.Literal("away"),
    Type.Literal("xa"),
    Type.Literal("dnd"),
    Type.Literal("unavailable"),
]);

export type Availability = Static<typeof AvailabilitySchema>;

export const PresenceSchema = Type.Object({
    /** Identifier of the contact whose presence changed. */
    id: Type.String({ minLength: 1 }),
    status: AvailabilitySchema,
    /** Free-text status, e.g. "in a meeting". */
    text: Type.Optional(Type.String()),
    priority: Type.Optional(Type.Integer({ minimum: -128, maximum: 127 })),
});

export type Presence = Static<typeof PresenceSchema>;

const EntriesSchema = Type.Array(Type.String());

export const RosterEventSchema = Type.Union([
    Type.Object({ type: Type.Literal("entriesAdded"), entries: EntriesSchema }),
    Type.Object({ type: Type.Literal("entriesUpdated"), entries: EntriesSchema }),
    Type.Object({ type: Type.Literal("entriesDeleted"), entries: EntriesSchema }),
    Type.Object({ type: Type.Literal("presenceChanged"), presence: PresenceSchema }),
]);

export type RosterEvent = Static<typeof RosterEventSchema>;

export type RosterEventType = RosterEvent["type"];

/*
 * Events are frozen all the way down: the identifier list and the presence
 * snapshot are copied, so neither the roster source nor a downstream
 * consumer can change an event after it has been built.
 */

function freeze<T extends object>(value: T): T {
    Object.freeze(value);
    return value;
}

export function entriesAdded(ids: Iterable<string>): RosterEvent {
    const event: RosterEvent = { type: "entriesAdded", entries: freeze(Array.from(ids)) };
    return freeze(event);
}

export function entriesUpdated(ids: Iterable<string>): RosterEvent {
    const event: RosterEvent = { type: "entriesUpdated", entries: freeze(Array.from(ids)) };
    return freeze(event);
}

export function entriesDeleted(ids: Iterable<string>): RosterEvent {
    const event: RosterEvent = { type: "entriesDeleted", entries: freeze(Array.from(ids)) };
    return freeze(event);
}

export function presenceChanged(presence: Presence): RosterEvent {
    const event: RosterEvent = { type: "presenceChanged", presence: freeze({ ...presence }) };
    return freeze(event);
}

/**
 * Return `event` if it is already frozen all the way down, otherwise a
 * frozen copy of it.
 */
export function freezeRosterEvent(event: RosterEvent): RosterEvent {
    switch (event.type) {
        case "entriesAdded":
            return isFrozen(event, event.entries) ? event : entriesAdded(event.entries);
        case "entriesUpdated":
            return isFrozen(event, event.entries) ? event : entriesUpdated(event.entries);
        case "entriesDeleted":
            return isFrozen(event, event.entries) ? event : entriesDeleted(event.entries);
        case "presenceChanged":
            return isFrozen(event, event.presence) ? event : presenceChanged(event.presence);
    }
}

function isFrozen(event: RosterEvent, body: object): boolean {
    return Object.isFrozen(event) && Object.isFrozen(body);
}

/** Validate that a value is a well-formed RosterEvent. */
export function isRosterEvent(value: unknown): value is RosterEvent {
    return Value.Check(RosterEventSchema, value);
}

/**
 * Human-readable summary used in trace output.
 *
 * Collection variants list the identifiers comma-separated; presence
 * changes dump the snapshot.
 */
export function describeRosterEvent(event: RosterEvent): string {
    switch (event.type) {
        case "entriesAdded":
        case "entriesUpdated":
        case "entriesDeleted":
            return event.entries.join(",");
        case "presenceChanged":
            return dumpPresence(event.presence);
    }
}

function dumpPresence(presence: Presence): string {
    try {
        return JSON.stringify(presence, (_key, value: unknown) =>
            typeof value === "bigint" ? value.toString() : value,
        );
    } catch {
        // Cyclic snapshot from an untyped source
        return `[unserializable presence of ${String(presence.id)}]`;
    }
}
