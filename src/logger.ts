/**
 * Logger Module
 *
 * Pino-based structured logging for the merge queue.
 * Provides child loggers for the different components (queue, slot, git, store, notify, config).
 */

import pino from "pino";

const isDev = process.env.NODE_ENV !== "production";

export const logger = pino({
	level: process.env.LOG_LEVEL || (isDev ? "debug" : "info"),
	transport: isDev
		? {
				target: "pino-pretty",
				options: {
					colorize: true,
					ignore: "pid,hostname",
					translateTime: "HH:MM:ss",
				},
			}
		: undefined,
});

// Child loggers for different components
export const queueLogger = logger.child({ module: "queue" });
export const slotLogger = logger.child({ module: "slot" });
export const gitLogger = logger.child({ module: "git" });
export const storeLogger = logger.child({ module: "store" });
export const notifyLogger = logger.child({ module: "notify" });
export const configLogger = logger.child({ module: "config" });
