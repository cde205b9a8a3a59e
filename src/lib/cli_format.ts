import type {CliParamTable} from './cli_param_table.js';
import type {CliParamState, CliResults} from './cli_results.js';

export const NOT_PARSED_DISPLAY = '[not parsed]';
export const MISSING_DISPLAY = 'Missing';

const format_value = (value: unknown): string =>
	typeof value === 'string' ? JSON.stringify(value) : String(value);

/**
 * Renders one parameter's state the way the dump shows it.
 *
 * @example
 * ```ts
 * cli_format_state({kind: 'argument', status: 'parsed', values: [1, 2]}); // '[1, 2]'
 * cli_format_state({kind: 'flag', status: 'parsed', value: true}); // 'True'
 * ```
 */
export const cli_format_state = (state: CliParamState | undefined): string => {
	if (!state || state.status === 'not_parsed') return NOT_PARSED_DISPLAY;
	if (state.kind === 'flag') return state.value ? 'True' : 'False';
	if (state.status === 'missing') return MISSING_DISPLAY;
	return '[' + state.values.map(format_value).join(', ') + ']';
};

export interface CliFormatDumpOptions {
	/** Shown in the header as `Command line parser <name>:`. */
	name?: string;
	/** An extra first line above the header. */
	title?: string;
}

/**
 * Lists every argument then every flag, in declaration order, with their current results.
 *
 * @example
 * ```
 * Command line parser:
 * 	Arguments:
 * 		--n (nargs: 1, switch)		Results: [50]
 * 	Flags:
 * 		--help	Prints usage.	Status: False
 * ```
 */
export const cli_format_dump = (
	table: CliParamTable,
	results: CliResults,
	options: CliFormatDumpOptions = {},
): string => {
	const lines: Array<string> = [];
	if (options.title) lines.push(options.title);
	lines.push(options.name ? `Command line parser ${options.name}:` : 'Command line parser:');

	lines.push('\tArguments:');
	const args = table.arguments();
	if (args.length === 0) lines.push('\t\t(None)');
	for (const spec of args) {
		const nargs = `(nargs: ${spec.arity}${spec.is_switch ? ', switch' : ''})`;
		lines.push(
			`\t\t--${spec.name} ${nargs}\t${spec.help_text}\tResults: ${cli_format_state(results.get(spec.name))}`,
		);
	}

	lines.push('\tFlags:');
	const flags = table.flags();
	if (flags.length === 0) lines.push('\t\t(None)');
	for (const spec of flags) {
		lines.push(`\t\t--${spec.name}\t${spec.help_text}\tStatus: ${cli_format_state(results.get(spec.name))}`);
	}

	return lines.join('\n');
};
