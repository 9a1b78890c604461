// Logger factory. Components receive a logger by reference; nothing in the
// engine writes to the console directly.

import pino, { type DestinationStream, type LevelWithSilent, type Logger } from 'pino';

export type { Logger };

export type LoggerOptions = {
	name?: string;
	level?: LevelWithSilent;
	/** Defaults to stdout */
	destination?: DestinationStream;
};

export function createLogger(options: LoggerOptions = {}): Logger {
	const settings = {
		name: options.name ?? 'heartbeat-core',
		level: options.level ?? 'info',
	};
	return options.destination ? pino(settings, options.destination) : pino(settings);
}

/** Logger that drops everything; the default for components built without one. */
export function silentLogger(): Logger {
	return pino({ level: 'silent' });
}

/**
 * Child logger bound to one component. `level`, when given, applies to this
 * child only; otherwise the parent's level is inherited.
 */
export function componentLogger(parent: Logger, component: string, level?: LevelWithSilent): Logger {
	return level ? parent.child({ component }, { level }) : parent.child({ component });
}
