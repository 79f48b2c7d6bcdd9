import { pino, type Logger } from "pino";

/** Environment variable that sets the default log level. */
export const LOG_LEVEL_ENV = "ROSTER_CHANNELS_LOG_LEVEL";

/**
 * Create the default logger for a component when none is injected.
 * Level comes from ROSTER_CHANNELS_LOG_LEVEL, falling back to "info".
 */
export function createLogger(name: string): Logger {
    return pino({
        name,
        level: process.env[LOG_LEVEL_ENV] ?? "info",
    });
}

export type { Logger };
