// src/homekit/logger.ts
import { PLUGIN_NAME } from '../settings.js';

/**
 * Very small logger interface so we can accept either the host's log
 * object or console.* functions in tests.
 */
export interface HomeKitLogger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

/**
 * Detach-safe view of the host's logger (a homebridge `Logging` or anything
 * else with the four level methods).
 */
export const toHomeKitLogger = (log: HomeKitLogger): HomeKitLogger => ({
	debug: log.debug.bind(log),
	info: log.info.bind(log),
	warn: log.warn.bind(log),
	error: log.error.bind(log),
});

export function createConsoleLogger(module: string): HomeKitLogger {
	const prefix = `[${PLUGIN_NAME}:${module}]`;
	return {
		debug: (...args: unknown[]) => console.debug(prefix, ...args),
		info: (...args: unknown[]) => console.info(prefix, ...args),
		warn: (...args: unknown[]) => console.warn(prefix, ...args),
		error: (...args: unknown[]) => console.error(prefix, ...args),
	};
}

export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
