import {describe, test, assert} from 'vitest';
import {z} from 'zod';

import {
	cli_argument,
	cli_flag,
	cli_param_spec_create,
	cli_value_convert,
	cli_value_int,
	cli_value_number,
	cli_value_string,
} from '$lib/cli_param.js';
import {InvalidArityError, InvalidNameError} from '$lib/cli_errors.js';

import {catch_error} from './test_helpers.js';

describe('cli_value_int', () => {
	test('converts digits', () => {
		assert.deepEqual(cli_value_convert(cli_value_int, '50'), {ok: true, value: 50});
	});

	test('accepts a sign', () => {
		assert.deepEqual(cli_value_convert(cli_value_int, '-7'), {ok: true, value: -7});
		assert.deepEqual(cli_value_convert(cli_value_int, '+7'), {ok: true, value: 7});
	});

	test('rejects decimals, exponents, and trailing garbage', () => {
		for (const token of ['1.5', '1e3', '12abc', '', ' 1']) {
			assert.deepEqual(cli_value_convert(cli_value_int, token), {
				ok: false,
				message: 'expected an integer',
			});
		}
	});

	test('rejects integers that lose precision', () => {
		for (const token of ['9007199254740993', '-9007199254740993']) {
			assert.deepEqual(cli_value_convert(cli_value_int, token), {
				ok: false,
				message: 'expected a safe integer',
			});
		}
		assert.deepEqual(cli_value_convert(cli_value_int, '9007199254740991'), {
			ok: true,
			value: 9007199254740991,
		});
	});
});

describe('cli_value_number', () => {
	test('converts decimals and exponents', () => {
		assert.deepEqual(cli_value_convert(cli_value_number, '2.5'), {ok: true, value: 2.5});
		assert.deepEqual(cli_value_convert(cli_value_number, '1e3'), {ok: true, value: 1000});
	});

	test('rejects blank tokens', () => {
		assert.deepEqual(cli_value_convert(cli_value_number, '  '), {
			ok: false,
			message: 'expected a number',
		});
	});

	test('rejects non-numeric tokens', () => {
		assert.ok(!cli_value_convert(cli_value_number, 'abc').ok);
	});
});

describe('cli_value_convert', () => {
	test('passes strings through', () => {
		assert.deepEqual(cli_value_convert(cli_value_string, '--x'), {ok: true, value: '--x'});
	});

	test('calls converter functions', () => {
		assert.deepEqual(cli_value_convert((token) => token.toUpperCase(), 'abc'), {ok: true, value: 'ABC'});
	});

	test('reports the message of a throwing converter', () => {
		const result = cli_value_convert((token): number => {
			throw new Error(`bad ${token}`);
		}, 'x');
		assert.deepEqual(result, {ok: false, message: 'bad x'});
	});

	test('reports non-error throws as strings', () => {
		const result = cli_value_convert((): number => {
			throw 'nope';
		}, 'x');
		assert.deepEqual(result, {ok: false, message: 'nope'});
	});

	test('reports the first issue of a custom schema', () => {
		const schema = z.enum(['red', 'green'], {error: 'expected a color'});
		assert.deepEqual(cli_value_convert(schema, 'green'), {ok: true, value: 'green'});
		assert.deepEqual(cli_value_convert(schema, 'blue'), {ok: false, message: 'expected a color'});
	});
});

describe('cli_flag', () => {
	test('defaults help text to empty', () => {
		assert.deepEqual(cli_flag(), {kind: 'flag', help_text: ''});
	});

	test('is frozen', () => {
		assert.ok(Object.isFrozen(cli_flag('help')));
	});
});

describe('cli_argument', () => {
	test('defaults', () => {
		const declaration = cli_argument(cli_value_string);
		assert.strictEqual(declaration.kind, 'argument');
		assert.strictEqual(declaration.arity, 1);
		assert.strictEqual(declaration.is_switch, false);
		assert.strictEqual(declaration.optional, false);
		assert.strictEqual(declaration.help_text, '');
		assert.strictEqual(declaration.value_type, cli_value_string);
	});

	test('convert uses the value type', () => {
		const declaration = cli_argument(cli_value_int, {arity: 4, is_switch: true});
		assert.deepEqual(declaration.convert('4'), {ok: true, value: 4});
		assert.strictEqual(declaration.arity, 4);
		assert.strictEqual(declaration.is_switch, true);
	});
});

describe('cli_param_spec_create', () => {
	test('binds the name', () => {
		const spec = cli_param_spec_create('help', cli_flag('Prints usage.'));
		assert.deepEqual(spec, {kind: 'flag', name: 'help', help_text: 'Prints usage.'});
		assert.ok(Object.isFrozen(spec));
	});

	test('rejects leading dashes', () => {
		assert.throws(() => cli_param_spec_create('--help', cli_flag()), InvalidNameError);
	});

	test('rejects empty names', () => {
		assert.throws(() => cli_param_spec_create('', cli_flag()), InvalidNameError);
	});

	test('rejects whitespace and equals signs', () => {
		assert.throws(() => cli_param_spec_create('a b', cli_flag()), InvalidNameError);
		assert.throws(() => cli_param_spec_create('a=b', cli_flag()), InvalidNameError);
	});

	test('reports the reason', () => {
		const err = catch_error(() => cli_param_spec_create('-x', cli_flag()), InvalidNameError);
		assert.strictEqual(err.message, "invalid parameter name '-x': must not start with a dash");
		assert.strictEqual(err.param_name, '-x');
	});

	test('rejects arity below 1', () => {
		assert.throws(
			() => cli_param_spec_create('data', cli_argument(cli_value_int, {arity: 0})),
			InvalidArityError,
		);
		assert.throws(
			() => cli_param_spec_create('data', cli_argument(cli_value_int, {arity: -2})),
			InvalidArityError,
		);
	});

	test('rejects fractional arity', () => {
		const err = catch_error(
			() => cli_param_spec_create('data', cli_argument(cli_value_int, {arity: 1.5})),
			InvalidArityError,
		);
		assert.strictEqual(err.arity, 1.5);
		assert.strictEqual(err.message, "argument 'data' must take a positive integer count of values, got 1.5");
	});
});
