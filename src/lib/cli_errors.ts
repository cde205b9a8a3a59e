/**
 * Hard failures raised by the parser.
 * Declaration errors abort a single declaration,
 * access errors abort a single `get` call.
 * Problems with the parsed input are never thrown, see `cli_warning.ts`.
 */

/**
 * Base class for all errors thrown by the parser.
 */
export class CliParserError extends Error {
	readonly param_name: string;

	constructor(param_name: string, message: string) {
		super(message);
		this.name = 'CliParserError';
		this.param_name = param_name;
	}
}

export class DuplicateNameError extends CliParserError {
	constructor(param_name: string) {
		super(param_name, `parameter '${param_name}' is already declared`);
		this.name = 'DuplicateNameError';
	}
}

export class InvalidArityError extends CliParserError {
	readonly arity: number;

	constructor(param_name: string, arity: number) {
		super(param_name, `argument '${param_name}' must take a positive integer count of values, got ${arity}`);
		this.name = 'InvalidArityError';
		this.arity = arity;
	}
}

export class InvalidNameError extends CliParserError {
	constructor(param_name: string, reason: string) {
		super(param_name, `invalid parameter name '${param_name}': ${reason}`);
		this.name = 'InvalidNameError';
	}
}

export class UnknownParameterError extends CliParserError {
	constructor(param_name: string) {
		super(param_name, `parameter '${param_name}' is not declared`);
		this.name = 'UnknownParameterError';
	}
}

export class NotYetParsedError extends CliParserError {
	constructor(param_name: string) {
		super(param_name, `parameter '${param_name}' has not been parsed yet`);
		this.name = 'NotYetParsedError';
	}
}

export class MissingValueError extends CliParserError {
	constructor(param_name: string) {
		super(param_name, `argument '${param_name}' has no value`);
		this.name = 'MissingValueError';
	}
}
