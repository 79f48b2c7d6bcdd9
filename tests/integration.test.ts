import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { PublishSubscribeChannel, QueueChannel } from "../src/channel.js";
import { RosterEventEndpoint } from "../src/endpoint.js";
import { IllegalStateError, MessageDeliveryError } from "../src/errors.js";
import { InMemorySession } from "../src/memory-roster.js";
import { isValidMessage, type OutboundMessage } from "../src/message.js";
import { isRosterEvent } from "../src/presence.js";
import { silentLogger } from "./helpers.js";

function bridge() {
    const session = new InMemorySession();
    const channel = new QueueChannel({ name: "roster-events" });
    const endpoint = new RosterEventEndpoint({ session, logger: silentLogger() });
    endpoint.configure(channel);
    return { session, channel, endpoint, roster: session.roster };
}

describe("roster to channel", () => {
    it("publishes added entries as one message", () => {
        const { channel, endpoint, roster } = bridge();
        endpoint.init();
        endpoint.start();

        roster.addEntries(["alice", "bob"]);

        const messages = channel.drain();
        assert.equal(messages.length, 1);
        assert.ok(isValidMessage(messages[0]));
        assert.deepEqual(messages[0].payload, { type: "entriesAdded", entries: ["alice", "bob"] });
    });

    it("publishes a presence change as one message", () => {
        const { channel, endpoint, roster } = bridge();
        endpoint.init();
        endpoint.start();

        roster.updatePresence({ id: "alice", status: "away" });

        assert.deepEqual(
            channel.drain().map((m) => m.payload),
            [{ type: "presenceChanged", presence: { id: "alice", status: "away" } }],
        );
    });

    it("start before init fails and nothing is published", () => {
        const { channel, endpoint, roster } = bridge();

        assert.throws(() => endpoint.start(), IllegalStateError);
        roster.addEntries(["alice"]);
        assert.equal(channel.size, 0);
    });

    it("publishes nothing after stop", () => {
        const { channel, endpoint, roster } = bridge();
        endpoint.init();
        endpoint.start();
        roster.addEntries(["alice"]);
        endpoint.stop();

        roster.addEntries(["bob"]);
        roster.updatePresence({ id: "alice", status: "unavailable" });

        assert.deepEqual(
            channel.drain().map((m) => m.payload),
            [{ type: "entriesAdded", entries: ["alice"] }],
        );
        assert.equal(roster.listenerCount, 0);
    });

    it("resumes publishing after a restart", () => {
        const { channel, endpoint, roster } = bridge();
        endpoint.init();
        endpoint.start();
        endpoint.stop();
        roster.addEntries(["missed"]);
        endpoint.start();
        roster.deleteEntries(["missed"]);

        assert.deepEqual(
            channel.drain().map((m) => m.payload),
            [{ type: "entriesDeleted", entries: ["missed"] }],
        );
    });

    it("preserves every variant in order through a fan-out channel", () => {
        const session = new InMemorySession();
        const channel = new PublishSubscribeChannel({ name: "presence" });
        const received: OutboundMessage[] = [];
        channel.subscribe((m) => received.push(m));
        const endpoint = new RosterEventEndpoint({ session, channel, logger: silentLogger() });
        endpoint.init();
        endpoint.start();

        session.roster.addEntries(["alice", "bob"]);
        session.roster.updateEntries(["bob"]);
        session.roster.updatePresence({ id: "bob", status: "dnd", text: "heads down", priority: 10 });
        session.roster.deleteEntries(["alice"]);

        assert.deepEqual(received.map((m) => m.payload), [
            { type: "entriesAdded", entries: ["alice", "bob"] },
            { type: "entriesUpdated", entries: ["bob"] },
            { type: "presenceChanged", presence: { id: "bob", status: "dnd", text: "heads down", priority: 10 } },
            { type: "entriesDeleted", entries: ["alice"] },
        ]);
        assert.equal(new Set(received.map((m) => m.headers.id)).size, 4);
    });

    it("surfaces a full channel to the roster instead of dropping the event", () => {
        const session = new InMemorySession();
        const channel = new QueueChannel({ name: "tiny", capacity: 1 });
        const endpoint = new RosterEventEndpoint({ session, channel, logger: silentLogger() });
        endpoint.init();
        endpoint.start();

        session.roster.addEntries(["alice"]);
        assert.throws(() => session.roster.addEntries(["bob"]), MessageDeliveryError);
        assert.equal(channel.size, 1);
    });

    it("lets an in-flight event finish when a subscriber stops the endpoint", () => {
        const session = new InMemorySession();
        const channel = new PublishSubscribeChannel();
        const endpoint = new RosterEventEndpoint({ session, channel, logger: silentLogger() });
        const received: unknown[] = [];
        channel.subscribe((m) => {
            received.push(m.payload);
            endpoint.stop();
        });
        endpoint.init();
        endpoint.start();

        session.roster.addEntries(["alice"]);
        session.roster.addEntries(["bob"]);

        assert.deepEqual(received, [{ type: "entriesAdded", entries: ["alice"] }]);
        assert.equal(endpoint.state, "stopped");
    });

    it("keeps one subscriber from changing what the next one or the roster sees", () => {
        const session = new InMemorySession();
        const channel = new PublishSubscribeChannel();
        const rejected: unknown[] = [];
        const seen: unknown[] = [];
        channel.subscribe((m) => {
            const payload = m.payload;
            if (!isRosterEvent(payload)) return;
            try {
                if (payload.type === "presenceChanged") {
                    payload.presence.status = "dnd";
                } else {
                    payload.entries.push("mallory");
                }
            } catch (err) {
                rejected.push(err);
            }
        });
        channel.subscribe((m) => seen.push(m.payload));
        const endpoint = new RosterEventEndpoint({ session, channel, logger: silentLogger() });
        endpoint.init();
        endpoint.start();

        session.roster.addEntries(["alice"]);
        session.roster.updatePresence({ id: "alice", status: "away" });

        assert.equal(rejected.length, 2);
        assert.ok(rejected.every((err) => err instanceof TypeError));
        assert.deepEqual(seen, [
            { type: "entriesAdded", entries: ["alice"] },
            { type: "presenceChanged", presence: { id: "alice", status: "away" } },
        ]);
        assert.equal(session.roster.presenceOf("alice")?.status, "away");
        assert.deepEqual(session.roster.contacts, ["alice"]);
    });
});
