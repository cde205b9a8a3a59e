import {styleText as st} from 'node:util';
import {z} from 'zod';

/**
 * Log levels from least to most verbose.
 * `off` silences a logger entirely.
 */
export const LogLevel = z.enum(['off', 'error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevel>;

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
	off: 0,
	error: 1,
	warn: 2,
	info: 3,
	debug: 4,
};

/**
 * Parses a log level from untrusted input like an environment variable.
 * Returns `undefined` for missing or unrecognized values.
 */
export const log_level_parse = (value: string | undefined): LogLevel | undefined => {
	if (value === undefined) return undefined;
	const parsed = LogLevel.safeParse(value.trim().toLowerCase());
	return parsed.success ? parsed.data : undefined;
};

/**
 * The subset of `console` a `Logger` writes to.
 * Inject a custom one to capture output in tests.
 */
export interface LogConsole {
	error: (...args: Array<unknown>) => void;
	warn: (...args: Array<unknown>) => void;
	log: (...args: Array<unknown>) => void;
}

export interface LoggerOptions {
	/**
	 * Defaults to `Logger.level_default`, read from `LOG_LEVEL`.
	 */
	level?: LogLevel;
	/**
	 * @default console
	 */
	console?: LogConsole;
	/**
	 * Whether to style the label with ANSI colors.
	 * @default false
	 */
	colors?: boolean;
}

/**
 * Minimal labelled logger.
 *
 * @example
 * ```ts
 * const log = new Logger('cli_parser');
 * log.warn('unknown token', '--nope'); // [cli_parser] unknown token --nope
 * ```
 */
export class Logger {
	/**
	 * Level used by loggers constructed without one.
	 * Mutate to change the default for new instances.
	 */
	static level_default: LogLevel = log_level_parse(process.env.LOG_LEVEL) ?? 'info';

	readonly label: string;
	level: LogLevel;
	readonly console: LogConsole;
	readonly colors: boolean;

	constructor(label: string, options: LoggerOptions = {}) {
		this.label = label;
		this.level = options.level ?? Logger.level_default;
		this.console = options.console ?? console;
		this.colors = options.colors ?? false;
	}

	/**
	 * Returns true if messages at `level` would be written.
	 */
	enabled(level: Exclude<LogLevel, 'off'>): boolean {
		return LOG_LEVEL_VALUES[this.level] >= LOG_LEVEL_VALUES[level];
	}

	error(...args: Array<unknown>): void {
		if (!this.enabled('error')) return;
		this.console.error(this.#prefix('error'), ...args);
	}

	warn(...args: Array<unknown>): void {
		if (!this.enabled('warn')) return;
		this.console.warn(this.#prefix('warn'), ...args);
	}

	info(...args: Array<unknown>): void {
		if (!this.enabled('info')) return;
		this.console.log(this.#prefix('info'), ...args);
	}

	debug(...args: Array<unknown>): void {
		if (!this.enabled('debug')) return;
		this.console.log(this.#prefix('debug'), ...args);
	}

	/**
	 * Creates a logger sharing this one's sink and settings, labelled `parent:label`.
	 */
	child(label: string): Logger {
		return new Logger(`${this.label}:${label}`, {
			level: this.level,
			console: this.console,
			colors: this.colors,
		});
	}

	#prefix(level: Exclude<LogLevel, 'off'>): string {
		const prefix = `[${this.label}]`;
		if (!this.colors) return prefix;
		switch (level) {
			case 'error':
				return st('red', prefix);
			case 'warn':
				return st('yellow', prefix);
			case 'info':
				return st('gray', prefix);
			case 'debug':
				return st('dim', prefix);
		}
	}
}
