import type { Presence } from "./presence.js";

/**
 * Callback capability registered with a roster source. The source invokes
 * these from its own delivery context.
 */
export interface RosterListener {
    entriesAdded(entries: Iterable<string>): void;
    entriesUpdated(entries: Iterable<string>): void;
    entriesDeleted(entries: Iterable<string>): void;
    presenceChanged(presence: Presence): void;
}

/**
 * Subscription API of a roster source. Registration has set semantics:
 * adding a listener twice registers it once, removing an unknown listener
 * does nothing.
 */
export interface Roster {
    addRosterListener(listener: RosterListener): void;
    removeRosterListener(listener: RosterListener): void;
}

/** Active connection to a presence service, owned by the surrounding application. */
export interface PresenceSession {
    getRoster(): Roster;
}
