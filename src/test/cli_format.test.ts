import {describe, test, assert} from 'vitest';

import {cli_format_dump, cli_format_state} from '$lib/cli_format.js';
import {CliParamTable} from '$lib/cli_param_table.js';
import {CliResults} from '$lib/cli_results.js';
import {cli_argument, cli_flag, cli_value_int, cli_value_string} from '$lib/cli_param.js';

describe('cli_format_state', () => {
	test('not parsed', () => {
		assert.strictEqual(cli_format_state({kind: 'flag', status: 'not_parsed'}), '[not parsed]');
		assert.strictEqual(cli_format_state({kind: 'argument', status: 'not_parsed'}), '[not parsed]');
		assert.strictEqual(cli_format_state(undefined), '[not parsed]');
	});

	test('flags', () => {
		assert.strictEqual(cli_format_state({kind: 'flag', status: 'parsed', value: true}), 'True');
		assert.strictEqual(cli_format_state({kind: 'flag', status: 'parsed', value: false}), 'False');
	});

	test('arguments', () => {
		assert.strictEqual(cli_format_state({kind: 'argument', status: 'missing'}), 'Missing');
		assert.strictEqual(
			cli_format_state({kind: 'argument', status: 'parsed', values: [1, 2, 3, 4]}),
			'[1, 2, 3, 4]',
		);
		assert.strictEqual(
			cli_format_state({kind: 'argument', status: 'parsed', values: ['a b', 'c']}),
			'["a b", "c"]',
		);
	});
});

describe('cli_format_dump', () => {
	const table = CliParamTable.build_from_mapping({
		help: cli_flag('Prints usage.'),
		n: cli_argument(cli_value_int, {is_switch: true}),
		data: cli_argument(cli_value_int, {arity: 4, help_text: 'four numbers'}),
		v: cli_flag(),
	});

	test('before parsing', () => {
		assert.strictEqual(
			cli_format_dump(table, CliResults.not_parsed(table)),
			[
				'Command line parser:',
				'\tArguments:',
				'\t\t--n (nargs: 1, switch)\t\tResults: [not parsed]',
				'\t\t--data (nargs: 4)\tfour numbers\tResults: [not parsed]',
				'\tFlags:',
				'\t\t--help\tPrints usage.\tStatus: [not parsed]',
				'\t\t--v\t\tStatus: [not parsed]',
			].join('\n'),
		);
	});

	test('with results, a name, and a title', () => {
		const results = CliResults.parse_started(table);
		results.set_values('n', [50]);
		results.set_flag('v');
		assert.strictEqual(
			cli_format_dump(table, results, {name: 'Demo', title: 'Results of parsing'}),
			[
				'Results of parsing',
				'Command line parser Demo:',
				'\tArguments:',
				'\t\t--n (nargs: 1, switch)\t\tResults: [50]',
				'\t\t--data (nargs: 4)\tfour numbers\tResults: Missing',
				'\tFlags:',
				'\t\t--help\tPrints usage.\tStatus: False',
				'\t\t--v\t\tStatus: True',
			].join('\n'),
		);
	});

	test('empty groups', () => {
		const empty = new CliParamTable();
		assert.strictEqual(
			cli_format_dump(empty, CliResults.not_parsed(empty)),
			'Command line parser:\n\tArguments:\n\t\t(None)\n\tFlags:\n\t\t(None)',
		);
	});

	test('string values are quoted', () => {
		const only_args = new CliParamTable().declare_argument('name', cli_value_string);
		const results = CliResults.parse_started(only_args);
		results.set_values('name', ['world']);
		assert.strictEqual(
			cli_format_dump(only_args, results),
			'Command line parser:\n\tArguments:\n\t\t--name (nargs: 1)\t\tResults: ["world"]\n\tFlags:\n\t\t(None)',
		);
	});
});
