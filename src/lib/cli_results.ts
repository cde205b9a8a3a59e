import type {CliParamTable} from './cli_param_table.js';

export type CliFlagState =
	| {kind: 'flag'; status: 'not_parsed'}
	| {kind: 'flag'; status: 'parsed'; value: boolean};

export type CliArgumentState =
	| {kind: 'argument'; status: 'not_parsed'}
	| {kind: 'argument'; status: 'missing'}
	| {kind: 'argument'; status: 'parsed'; values: ReadonlyArray<unknown>};

/**
 * What is known about one parameter, discriminated by `kind` then `status`.
 */
export type CliParamState = CliFlagState | CliArgumentState;

const FLAG_NOT_PARSED: CliFlagState = Object.freeze({kind: 'flag', status: 'not_parsed'});
const FLAG_FALSE: CliFlagState = Object.freeze({kind: 'flag', status: 'parsed', value: false});
const FLAG_TRUE: CliFlagState = Object.freeze({kind: 'flag', status: 'parsed', value: true});
const ARGUMENT_NOT_PARSED: CliArgumentState = Object.freeze({kind: 'argument', status: 'not_parsed'});
const ARGUMENT_MISSING: CliArgumentState = Object.freeze({kind: 'argument', status: 'missing'});

/**
 * Per-name parse state for every parameter of a table.
 * A store is built once per parse and only written by the matcher.
 */
export class CliResults implements Iterable<[string, CliParamState]> {
	readonly #states: Map<string, CliParamState> = new Map();

	private constructor(table: CliParamTable, parse_started: boolean) {
		for (const spec of table) {
			const state =
				spec.kind === 'flag'
					? parse_started
						? FLAG_FALSE
						: FLAG_NOT_PARSED
					: parse_started
						? ARGUMENT_MISSING
						: ARGUMENT_NOT_PARSED;
			this.#states.set(spec.name, state);
		}
	}

	/**
	 * Every parameter `not_parsed`, the state before any parse.
	 */
	static not_parsed(table: CliParamTable): CliResults {
		return new CliResults(table, false);
	}

	/**
	 * Every flag `false` and every argument `missing`, the state a parse starts from.
	 */
	static parse_started(table: CliParamTable): CliResults {
		return new CliResults(table, true);
	}

	get(name: string): CliParamState | undefined {
		return this.#states.get(name);
	}

	has(name: string): boolean {
		return this.#states.has(name);
	}

	set_flag(name: string): void {
		this.#states.set(name, FLAG_TRUE);
	}

	set_values(name: string, values: Array<unknown>): void {
		this.#states.set(name, {kind: 'argument', status: 'parsed', values: Object.freeze(values)});
	}

	set_missing(name: string): void {
		this.#states.set(name, ARGUMENT_MISSING);
	}

	is_missing(name: string): boolean {
		return this.#states.get(name)?.status === 'missing';
	}

	[Symbol.iterator](): Iterator<[string, CliParamState]> {
		return this.#states.entries();
	}
}
