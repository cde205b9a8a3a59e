import type {CliArgumentSpec} from './cli_param.js';
import type {CliParamTable} from './cli_param_table.js';
import {CliResults} from './cli_results.js';
import type {CliWarning} from './cli_warning.js';

/**
 * How a single token reads against a table.
 */
export type CliToken =
	| {type: 'flag'; names: Array<string>}
	| {type: 'switch'; spec: CliArgumentSpec}
	| {type: 'unknown'; token: string}
	| {type: 'terminator'}
	| {type: 'value'; token: string};

export interface CliMatchResult {
	results: CliResults;
	warnings: Array<CliWarning>;
}

// Internal: strips one or two leading dashes, null for tokens without exactly that prefix
const strip_dashes = (token: string): string | null => {
	if (token.startsWith('---')) return null;
	if (token.startsWith('--')) return token.slice(2);
	if (token.startsWith('-')) return token.slice(1);
	return null;
};

// Internal: whether `token` ends the value run of a switch
const ends_switch_run = (token: CliToken): boolean =>
	token.type === 'flag' || token.type === 'switch' || token.type === 'terminator';

// Internal: `-lisa` sets l, i, s and a when each is a declared one-character flag
const flag_group = (chars: string, table: CliParamTable): Array<string> | null => {
	if (chars.length < 2) return null;
	const names = Array.from(chars);
	for (const name of names) {
		if (table.get(name)?.kind !== 'flag') return null;
	}
	return names;
};

/**
 * Classifies `token` against the declarations in `table`.
 *
 * - `--` is the end-of-options terminator
 * - `-name` or `--name` of a flag, or a group like `-abc` of one-character flags, is a flag
 * - `-name` or `--name` of a switch argument is a switch marker
 * - any other `--name` is unknown
 * - everything else, including `-5` and `-` when not declared, is a plain value
 *
 * Only flags, switch markers and the terminator end a switch's value run.
 * Unknown tokens are taken as values there.
 */
export const cli_token_classify = (token: string, table: CliParamTable): CliToken => {
	if (token === '--') return {type: 'terminator'};
	const name = strip_dashes(token);
	if (name === null || name === '') return {type: 'value', token};
	const spec = table.get(name);
	if (spec?.kind === 'flag') return {type: 'flag', names: [name]};
	if (spec?.kind === 'argument' && spec.is_switch) return {type: 'switch', spec};
	if (token.startsWith('--')) return {type: 'unknown', token};
	const group = flag_group(name, table);
	if (group) return {type: 'flag', names: group};
	return {type: 'value', token};
};

/**
 * Matches `tokens` against `table` in a single left-to-right pass.
 *
 * Flags and switch arguments are resolved first, as they appear.
 * Plain values left unclaimed are then handed to the non-switch arguments
 * in declaration order, each taking exactly its arity.
 * Nothing here throws for bad input: every problem becomes a warning
 * and leaves the affected argument missing.
 *
 * @param tokens - Raw tokens, excluding the program name
 * @returns A fresh result store and the warnings in the order they arose
 */
export const cli_match = (tokens: ReadonlyArray<string>, table: CliParamTable): CliMatchResult => {
	const results = CliResults.parse_started(table);
	const warnings: Array<CliWarning> = [];
	// Names already warned about, so they don't also get `missing_argument`
	const warned: Set<string> = new Set();

	const assign = (spec: CliArgumentSpec, raw: Array<string>): void => {
		if (raw.length < spec.arity) {
			warnings.push({
				type: 'insufficient_values',
				name: spec.name,
				expected: spec.arity,
				received: raw.length,
			});
			warned.add(spec.name);
			results.set_missing(spec.name);
			return;
		}
		const values: Array<unknown> = [];
		for (const token of raw) {
			const converted = spec.convert(token);
			if (!converted.ok) {
				warnings.push({type: 'conversion_error', name: spec.name, token, message: converted.message});
				warned.add(spec.name);
				results.set_missing(spec.name);
				return;
			}
			values.push(converted.value);
		}
		results.set_values(spec.name, values);
	};

	const unclaimed: Array<{token: string; index: number}> = [];
	let options_done = false;

	let i = 0;
	while (i < tokens.length) {
		const token = tokens[i];
		if (token === undefined) break;

		if (options_done) {
			unclaimed.push({token, index: i});
			i++;
			continue;
		}

		const classified = cli_token_classify(token, table);
		switch (classified.type) {
			case 'terminator':
				options_done = true;
				i++;
				break;
			case 'flag':
				for (const name of classified.names) results.set_flag(name);
				i++;
				break;
			case 'unknown':
				warnings.push({type: 'unknown_token', token, index: i});
				i++;
				break;
			case 'value':
				unclaimed.push({token, index: i});
				i++;
				break;
			case 'switch': {
				const {spec} = classified;
				const raw: Array<string> = [];
				i++;
				// Values stop short at the end of input, a flag, a switch, or `--`
				while (raw.length < spec.arity) {
					const next = tokens[i];
					if (next === undefined || ends_switch_run(cli_token_classify(next, table))) break;
					raw.push(next);
					i++;
				}
				assign(spec, raw);
				break;
			}
		}
	}

	let cursor = 0;
	for (const spec of table.positionals()) {
		if (cursor >= unclaimed.length) break;
		const run = unclaimed.slice(cursor, cursor + spec.arity);
		cursor += run.length;
		assign(spec, run.map((u) => u.token));
	}
	for (const {token, index} of unclaimed.slice(cursor)) {
		warnings.push({type: 'unknown_token', token, index});
	}

	for (const spec of table.arguments()) {
		if (spec.optional || warned.has(spec.name) || !results.is_missing(spec.name)) continue;
		warnings.push({type: 'missing_argument', name: spec.name});
	}

	return {results, warnings};
};
