/**
 * In-Memory Roster
 *
 * A roster source that lives in the current process. It keeps the contact
 * identifiers and latest presence per contact, and delivers changes
 * synchronously to the listeners registered at the time of the change.
 * Listeners that are not registered never see an event.
 *
 * Usage:
 *   const session = new InMemorySession();
 *   session.roster.addEntries(["alice", "bob"]);
 */

import type { Presence } from "./presence.js";
import type { PresenceSession, Roster, RosterListener } from "./roster.js";

export class InMemoryRoster implements Roster {
    private listeners: Set<RosterListener> = new Set();
    private entries: Set<string> = new Set();
    private presences: Map<string, Presence> = new Map();

    addRosterListener(listener: RosterListener): void {
        this.listeners.add(listener);
    }

    removeRosterListener(listener: RosterListener): void {
        this.listeners.delete(listener);
    }

    /** Number of registered listeners. */
    get listenerCount(): number {
        return this.listeners.size;
    }

    /** Whether `listener` is currently registered. */
    isRegistered(listener: RosterListener): boolean {
        return this.listeners.has(listener);
    }

    /** Identifiers currently on the roster, in insertion order. */
    get contacts(): string[] {
        return Array.from(this.entries);
    }

    /** Latest presence seen for a contact. */
    presenceOf(id: string): Presence | undefined {
        return this.presences.get(id);
    }

    /** Add entries and notify listeners of the ones that were new. */
    addEntries(ids: Iterable<string>): void {
        const added = Array.from(ids).filter((id) => !this.entries.has(id));
        if (added.length === 0) return;

        for (const id of added) {
            this.entries.add(id);
        }
        this.notify((listener) => listener.entriesAdded(added));
    }

    /** Notify listeners that existing entries changed. Unknown ids are ignored. */
    updateEntries(ids: Iterable<string>): void {
        const updated = Array.from(ids).filter((id) => this.entries.has(id));
        if (updated.length === 0) return;

        this.notify((listener) => listener.entriesUpdated(updated));
    }

    /** Remove entries and notify listeners of the ones that existed. */
    deleteEntries(ids: Iterable<string>): void {
        const deleted = Array.from(ids).filter((id) => this.entries.has(id));
        if (deleted.length === 0) return;

        for (const id of deleted) {
            this.entries.delete(id);
            this.presences.delete(id);
        }
        this.notify((listener) => listener.entriesDeleted(deleted));
    }

    /** Record a presence snapshot and notify listeners. */
    updatePresence(presence: Presence): void {
        this.presences.set(presence.id, presence);
        this.notify((listener) => listener.presenceChanged(presence));
    }

    private notify(deliver: (listener: RosterListener) => void): void {
        // Snapshot: a listener may deregister itself (or another) mid-delivery
        const snapshot = Array.from(this.listeners);
        for (const listener of snapshot) {
            if (this.listeners.has(listener)) {
                deliver(listener);
            }
        }
    }
}

/** Session whose roster is an InMemoryRoster. */
export class InMemorySession implements PresenceSession {
    readonly roster: InMemoryRoster;

    constructor(roster: InMemoryRoster = new InMemoryRoster()) {
        this.roster = roster;
    }

    getRoster(): Roster {
        return this.roster;
    }
}
