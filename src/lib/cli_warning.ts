/**
 * A token matched no declaration and no positional argument was left to claim it.
 */
export interface CliWarningUnknownToken {
	type: 'unknown_token';
	token: string;
	/** Position of the token in the parsed sequence. */
	index: number;
}

/**
 * Input ended, or another marker appeared, before an argument received all its values.
 */
export interface CliWarningInsufficientValues {
	type: 'insufficient_values';
	name: string;
	expected: number;
	received: number;
}

/**
 * A required argument received no tokens at all.
 */
export interface CliWarningMissingArgument {
	type: 'missing_argument';
	name: string;
}

/**
 * A token could not be converted to the argument's value type.
 */
export interface CliWarningConversionError {
	type: 'conversion_error';
	name: string;
	token: string;
	message: string;
}

/**
 * Non-fatal problems found while parsing.
 * Parsing always completes, leaving the affected arguments missing.
 */
export type CliWarning =
	| CliWarningUnknownToken
	| CliWarningInsufficientValues
	| CliWarningMissingArgument
	| CliWarningConversionError;

export const cli_warning_format = (warning: CliWarning): string => {
	switch (warning.type) {
		case 'unknown_token':
			return `unrecognised token '${warning.token}' at position ${warning.index}`;
		case 'insufficient_values':
			return `argument '${warning.name}' expected ${warning.expected} value${warning.expected === 1 ? '' : 's'} but received ${warning.received}`;
		case 'missing_argument':
			return `argument '${warning.name}' was not supplied`;
		case 'conversion_error':
			return `argument '${warning.name}' cannot convert '${warning.token}': ${warning.message}`;
	}
};
