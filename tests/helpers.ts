/**
 * Shared test infrastructure.
 */

import { pino, type Logger } from "pino";
import type { OutboundChannel } from "../src/channel.js";
import type { OutboundMessage } from "../src/message.js";

export interface LogRecord {
    level: number;
    msg: string;
    component?: string;
    event?: string;
    [key: string]: unknown;
}

/** A pino logger at trace level whose output is parsed into `records`. */
export function captureLogger(): { logger: Logger; records: LogRecord[] } {
    const records: LogRecord[] = [];
    const logger = pino(
        { level: "trace" },
        {
            write(line: string) {
                records.push(JSON.parse(line));
            },
        },
    );
    return { logger, records };
}

/** A logger that drops everything. */
export function silentLogger(): Logger {
    return pino({ level: "silent" });
}

/**
 * Channel double that records what it receives. `behavior` decides the
 * outcome of each send: accept, refuse, or throw.
 */
export class RecordingChannel implements OutboundChannel {
    readonly name: string;
    readonly received: OutboundMessage[] = [];
    behavior: "accept" | "refuse" | { throws: unknown } = "accept";

    constructor(name = "recording") {
        this.name = name;
    }

    send(message: OutboundMessage): boolean {
        if (typeof this.behavior === "object") {
            throw this.behavior.throws;
        }
        if (this.behavior === "refuse") {
            return false;
        }
        this.received.push(message);
        return true;
    }
}

/** Pino numeric levels. */
export const LEVEL = { trace: 10, debug: 20, info: 30 } as const;
