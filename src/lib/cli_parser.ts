import {z} from 'zod';

import {MissingValueError, NotYetParsedError, UnknownParameterError} from './cli_errors.js';
import {cli_format_dump} from './cli_format.js';
import {cli_match} from './cli_match.js';
import type {
	CliArgumentOptions,
	CliParamDeclarations,
	CliParamValue,
	CliValueType,
} from './cli_param.js';
import {CliParamTable, type CliParamEntries} from './cli_param_table.js';
import {CliResults, type CliParamState} from './cli_results.js';
import {cli_warning_format, type CliWarning} from './cli_warning.js';
import {Logger} from './log.js';

const log_default = new Logger('cli_parser');

export const CliParserOptions = z.object({
	/**
	 * Shown in the dump header, `Command line parser <name>:`.
	 */
	name: z.string().min(1).optional(),
	/**
	 * Receives parse warnings, debug traces, and `print` output.
	 */
	log: z.instanceof(Logger).optional(),
	/**
	 * Whether `parse` logs each warning at `warn` level.
	 * The warnings are returned either way.
	 */
	log_warnings: z.boolean().default(true),
});
export type CliParserOptions = z.input<typeof CliParserOptions>;

/**
 * Declares parameters, parses tokens against them, and answers queries about the result.
 *
 * @example
 * ```ts
 * const parser = CliParser.from_mapping({
 * 	help: cli_flag('Prints usage.'),
 * 	n: cli_argument(cli_value_int, {is_switch: true}),
 * 	data: cli_argument(cli_value_int, {arity: 4}),
 * });
 * parser.parse(['--n', '50', '1', '2', '3', '4']);
 * parser.get('n'); // [50]
 * parser.get('data'); // [1, 2, 3, 4]
 * parser.get('help'); // false
 * ```
 */
export class CliParser<T extends CliParamDeclarations = CliParamDeclarations>
	implements Iterable<[string, CliParamState]>
{
	readonly name: string | undefined;
	readonly log: Logger;
	readonly log_warnings: boolean;

	#table: CliParamTable = new CliParamTable();
	#results: CliResults = CliResults.not_parsed(this.#table);
	#warnings: ReadonlyArray<CliWarning> = [];
	#parsed = false;

	constructor(options: CliParserOptions = {}) {
		const parsed = CliParserOptions.parse(options);
		this.name = parsed.name;
		this.log = parsed.log ?? log_default;
		this.log_warnings = parsed.log_warnings;
	}

	/**
	 * Creates a parser declaring every entry of `mapping` in order,
	 * with `get` typed by each entry's declaration.
	 * @throws on the first invalid entry
	 */
	static from_mapping<T extends CliParamDeclarations>(
		mapping: T,
		options?: CliParserOptions,
	): CliParser<T> {
		const parser = new CliParser<T>(options);
		parser.#reset(CliParamTable.build_from_mapping(mapping));
		return parser;
	}

	/**
	 * Creates a parser from ordered `[name, declaration]` pairs.
	 * Values are untyped, use `from_mapping` with an object for inference.
	 */
	static from_entries(entries: CliParamEntries, options?: CliParserOptions): CliParser {
		const parser = new CliParser(options);
		parser.#reset(CliParamTable.build_from_entries(entries));
		return parser;
	}

	/**
	 * Declaring discards any earlier parse, so every parameter reads as not parsed.
	 * @throws DuplicateNameError, InvalidNameError
	 */
	declare_flag(name: string, help_text = ''): this {
		this.#table.declare_flag(name, help_text);
		this.#reset(this.#table);
		this.log.debug('declared flag', name);
		return this;
	}

	/**
	 * @throws DuplicateNameError, InvalidNameError, InvalidArityError
	 */
	declare_argument<V>(
		name: string,
		value_type: CliValueType<V>,
		arity = 1,
		is_switch = false,
		options: Omit<CliArgumentOptions, 'arity' | 'is_switch'> = {},
	): this {
		this.#table.declare_argument(name, value_type, arity, is_switch, options);
		this.#reset(this.#table);
		this.log.debug('declared argument', name);
		return this;
	}

	/**
	 * True once `parse` has run.
	 */
	get parsed(): boolean {
		return this.#parsed;
	}

	/**
	 * Warnings from the most recent `parse`.
	 */
	get warnings(): ReadonlyArray<CliWarning> {
		return this.#warnings;
	}

	/**
	 * Replaces all previous results with those of matching `tokens`.
	 * Never throws for bad input.
	 *
	 * @param tokens - Defaults to the process arguments after the program name
	 * @returns The warnings of this parse
	 */
	parse(tokens: ReadonlyArray<string> = process.argv.slice(2)): ReadonlyArray<CliWarning> {
		const {results, warnings} = cli_match(tokens, this.#table);
		this.#results = results;
		this.#warnings = Object.freeze(warnings);
		this.#parsed = true;
		this.log.debug(`parsed ${tokens.length} tokens with ${warnings.length} warnings`);
		if (this.log_warnings) {
			for (const warning of warnings) {
				this.log.warn(cli_warning_format(warning));
			}
		}
		return this.#warnings;
	}

	has(name: string): boolean {
		return this.#table.has(name);
	}

	/**
	 * @throws UnknownParameterError
	 */
	state(name: string): CliParamState {
		const state = this.#results.get(name);
		if (!state) throw new UnknownParameterError(name);
		return state;
	}

	/**
	 * Returns the parsed value of `name`: a boolean for flags,
	 * an array of exactly `arity` converted values for arguments.
	 * When `fallback` is given it is returned instead of throwing for
	 * a parameter that is not parsed yet or missing.
	 *
	 * @throws UnknownParameterError for undeclared names, even with a fallback
	 * @throws NotYetParsedError before the first `parse`
	 * @throws MissingValueError for arguments that received no valid values
	 */
	get<K extends keyof T & string>(name: K): CliParamValue<T[K]>;
	get<K extends keyof T & string, D>(name: K, fallback: D): CliParamValue<T[K]> | D;
	get(name: string): unknown;
	get(name: string, fallback: unknown): unknown;
	get(name: string, ...fallback: [] | [unknown]): unknown {
		const state = this.state(name);
		if (state.status === 'not_parsed') {
			if (fallback.length > 0) return fallback[0];
			throw new NotYetParsedError(name);
		}
		if (state.kind === 'flag') return state.value;
		if (state.status === 'missing') {
			if (fallback.length > 0) return fallback[0];
			throw new MissingValueError(name);
		}
		return [...state.values];
	}

	/**
	 * Plain object of every resolved value. Missing and unparsed parameters are omitted.
	 */
	to_values(): Record<string, unknown> {
		const values: Record<string, unknown> = {};
		for (const [name, state] of this) {
			if (state.status !== 'parsed') continue;
			values[name] = state.kind === 'flag' ? state.value : [...state.values];
		}
		return values;
	}

	/**
	 * Yields `[name, state]` for arguments then flags, each in declaration order.
	 */
	*[Symbol.iterator](): Iterator<[string, CliParamState]> {
		for (const spec of [...this.#table.arguments(), ...this.#table.flags()]) {
			yield [spec.name, this.state(spec.name)];
		}
	}

	format(title?: string): string {
		return cli_format_dump(this.#table, this.#results, {name: this.name, title});
	}

	/**
	 * Logs the dump at `info` level.
	 */
	print(title?: string): void {
		this.log.info('\n' + this.format(title));
	}

	toString(): string {
		return this.format();
	}

	#reset(table: CliParamTable): void {
		this.#table = table;
		this.#results = CliResults.not_parsed(table);
		this.#warnings = [];
		this.#parsed = false;
	}
}
