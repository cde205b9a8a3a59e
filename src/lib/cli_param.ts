import {z} from 'zod';

import {InvalidArityError, InvalidNameError} from './cli_errors.js';

//
// Value Types
//

/**
 * Converts a raw token into a typed value.
 * Either a zod schema taking a string, or a plain function that throws on bad input.
 */
export type CliValueType<T> = z.ZodType<T> | ((token: string) => T);

/**
 * Outcome of converting a single token.
 */
export type CliConversion<T> = {ok: true; value: T} | {ok: false; message: string};

/**
 * Passes the token through unchanged.
 */
export const cli_value_string = z.string();

/**
 * Optionally signed decimal digits, nothing else. Rejects `1.5`, `1e3`, `12abc`,
 * and integers outside the safe range.
 */
export const cli_value_int = z
	.string()
	.regex(/^[+-]?\d+$/, 'expected an integer')
	.transform((token) => Number(token))
	.pipe(z.number().refine(Number.isSafeInteger, 'expected a safe integer'));

/**
 * Any finite number `Number` understands. Rejects blank tokens.
 */
export const cli_value_number = z
	.string()
	.trim()
	.min(1, 'expected a number')
	.transform((token) => Number(token))
	.pipe(z.number());

/**
 * Converts `token` with `value_type`, never throwing.
 */
export const cli_value_convert = <T>(value_type: CliValueType<T>, token: string): CliConversion<T> => {
	if (typeof value_type === 'function') {
		try {
			return {ok: true, value: value_type(token)};
		} catch (err) {
			return {ok: false, message: err instanceof Error ? err.message : String(err)};
		}
	}
	const parsed = value_type.safeParse(token);
	if (parsed.success) return {ok: true, value: parsed.data};
	return {ok: false, message: parsed.error.issues[0]?.message ?? 'invalid value'};
};

//
// Declarations
//

/**
 * A presence-only parameter, `true` when its marker token appears.
 */
export interface CliFlagDeclaration {
	readonly kind: 'flag';
	readonly help_text: string;
}

/**
 * A parameter consuming exactly `arity` tokens as typed values.
 */
export interface CliArgumentDeclaration<T = unknown> {
	readonly kind: 'argument';
	readonly value_type: CliValueType<T>;
	readonly convert: (token: string) => CliConversion<T>;
	/** Fixed count of value tokens, at least 1. */
	readonly arity: number;
	/**
	 * When true the values must follow a `--name` marker,
	 * otherwise they are claimed positionally.
	 */
	readonly is_switch: boolean;
	/** Suppresses the warning when the argument is never supplied. */
	readonly optional: boolean;
	readonly help_text: string;
}

export type CliParamDeclaration = CliFlagDeclaration | CliArgumentDeclaration;

export type CliFlagSpec = CliFlagDeclaration & {readonly name: string};
export type CliArgumentSpec<T = unknown> = CliArgumentDeclaration<T> & {readonly name: string};

/**
 * A declaration bound to its name, as stored in a `CliParamTable`.
 */
export type CliParamSpec = CliFlagSpec | CliArgumentSpec;

export interface CliArgumentOptions {
	/** @default 1 */
	arity?: number;
	/** @default false */
	is_switch?: boolean;
	/** @default false */
	optional?: boolean;
	/** @default '' */
	help_text?: string;
}

/**
 * Declares a flag.
 */
export const cli_flag = (help_text = ''): CliFlagDeclaration => Object.freeze({kind: 'flag', help_text});

/**
 * Declares an argument converting each of its tokens with `value_type`.
 *
 * @example
 * ```ts
 * cli_argument(cli_value_int, {arity: 4});
 * cli_argument((token) => new URL(token), {is_switch: true});
 * ```
 */
export const cli_argument = <T>(
	value_type: CliValueType<T>,
	options: CliArgumentOptions = {},
): CliArgumentDeclaration<T> =>
	Object.freeze({
		kind: 'argument',
		value_type,
		convert: (token: string) => cli_value_convert(value_type, token),
		arity: options.arity ?? 1,
		is_switch: options.is_switch ?? false,
		optional: options.optional ?? false,
		help_text: options.help_text ?? '',
	});

//
// Validation
//

export const CliParamName = z
	.string()
	.min(1, 'must not be empty')
	.refine((name) => !name.startsWith('-'), 'must not start with a dash')
	.refine((name) => !/[\s=]/.test(name), 'must not contain whitespace or "="');

/**
 * Checks a declaration and binds it to `name`.
 * @throws InvalidNameError, InvalidArityError
 */
export const cli_param_spec_create = (name: string, declaration: CliParamDeclaration): CliParamSpec => {
	const parsed_name = CliParamName.safeParse(name);
	if (!parsed_name.success) {
		throw new InvalidNameError(name, parsed_name.error.issues[0]?.message ?? 'invalid');
	}
	if (declaration.kind === 'flag') {
		return Object.freeze({kind: 'flag', name, help_text: declaration.help_text});
	}
	if (!Number.isInteger(declaration.arity) || declaration.arity < 1) {
		throw new InvalidArityError(name, declaration.arity);
	}
	return Object.freeze({...declaration, name});
};

//
// Inferred Values
//

/**
 * The value `get` returns for a declaration:
 * a boolean for flags, an array of converted values for arguments.
 */
export type CliParamValue<T extends CliParamDeclaration> = T extends CliFlagDeclaration
	? boolean
	: T extends {convert: (token: string) => CliConversion<infer V>}
		? Array<V>
		: never;

export type CliParamDeclarations = Record<string, CliParamDeclaration>;

export type CliParamValues<T extends CliParamDeclarations> = {
	[K in keyof T]: CliParamValue<T[K]>;
};
