import { ForwardingError } from "./errors.js";
import type { Logger } from "./logger.js";
import {
    describeRosterEvent,
    entriesAdded,
    entriesDeleted,
    entriesUpdated,
    presenceChanged,
    type Presence,
    type RosterEvent,
} from "./presence.js";
import type { RosterListener } from "./roster.js";

export type ForwardFn = (event: RosterEvent) => void;

/**
 * RosterListener that traces each notification and hands it to `forward`
 * as the matching RosterEvent variant.
 *
 * Errors from `forward` are not caught here; they reach the roster
 * source's delivery context. A notification that cannot be turned into an
 * event (e.g. entries that are not iterable) raises a ForwardingError
 * without an event.
 */
export class EventForwardingListener implements RosterListener {
    private readonly forward: ForwardFn;
    private readonly logger: Logger;

    constructor(forward: ForwardFn, logger: Logger) {
        this.forward = forward;
        this.logger = logger;
    }

    entriesAdded(entries: Iterable<string>): void {
        this.dispatch("entries added", () => entriesAdded(entries));
    }

    entriesUpdated(entries: Iterable<string>): void {
        this.dispatch("entries updated", () => entriesUpdated(entries));
    }

    entriesDeleted(entries: Iterable<string>): void {
        this.dispatch("entries deleted", () => entriesDeleted(entries));
    }

    presenceChanged(presence: Presence): void {
        this.dispatch("presence changed", () => presenceChanged(presence));
    }

    private dispatch(what: string, build: () => RosterEvent): void {
        let event: RosterEvent;
        try {
            event = build();
        } catch (err) {
            throw new ForwardingError(null, null, `Failed to build roster event from ${what} notification`, {
                cause: err,
            });
        }

        this.logger.debug({ event: event.type }, `${what}: ${describeRosterEvent(event)}`);
        this.forward(event);
    }
}
