import {DuplicateNameError} from './cli_errors.js';
import {
	cli_argument,
	cli_flag,
	cli_param_spec_create,
	type CliArgumentOptions,
	type CliArgumentSpec,
	type CliFlagSpec,
	type CliParamDeclaration,
	type CliParamSpec,
	type CliValueType,
} from './cli_param.js';

/**
 * Name → declaration pairs in the order they should be declared.
 */
export type CliParamEntries = Iterable<readonly [string, CliParamDeclaration]>;

/**
 * The declared flags and arguments of a parser, keyed by name in declaration order.
 * Names are unique across both kinds.
 */
export class CliParamTable implements Iterable<CliParamSpec> {
	readonly #specs: Map<string, CliParamSpec> = new Map();

	/**
	 * Declares every property of `mapping` in property order.
	 * Integer-like names sort first in that order, use `build_from_entries` to avoid it.
	 * The first invalid entry throws and no table is returned.
	 */
	static build_from_mapping(mapping: Readonly<Record<string, CliParamDeclaration>>): CliParamTable {
		return CliParamTable.build_from_entries(Object.entries(mapping));
	}

	/**
	 * Declares every pair of `entries` in iteration order.
	 * The first invalid entry throws and no table is returned.
	 */
	static build_from_entries(entries: CliParamEntries): CliParamTable {
		const table = new CliParamTable();
		for (const [name, declaration] of entries) {
			table.add(name, declaration);
		}
		return table;
	}

	/**
	 * @throws DuplicateNameError, InvalidNameError, InvalidArityError
	 */
	add(name: string, declaration: CliParamDeclaration): CliParamSpec {
		if (this.#specs.has(name)) throw new DuplicateNameError(name);
		const spec = cli_param_spec_create(name, declaration);
		this.#specs.set(name, spec);
		return spec;
	}

	declare_flag(name: string, help_text = ''): this {
		this.add(name, cli_flag(help_text));
		return this;
	}

	declare_argument<T>(
		name: string,
		value_type: CliValueType<T>,
		arity = 1,
		is_switch = false,
		options: Omit<CliArgumentOptions, 'arity' | 'is_switch'> = {},
	): this {
		this.add(name, cli_argument(value_type, {...options, arity, is_switch}));
		return this;
	}

	has(name: string): boolean {
		return this.#specs.has(name);
	}

	get(name: string): CliParamSpec | undefined {
		return this.#specs.get(name);
	}

	get size(): number {
		return this.#specs.size;
	}

	flags(): Array<CliFlagSpec> {
		const flags: Array<CliFlagSpec> = [];
		for (const spec of this.#specs.values()) {
			if (spec.kind === 'flag') flags.push(spec);
		}
		return flags;
	}

	arguments(): Array<CliArgumentSpec> {
		const args: Array<CliArgumentSpec> = [];
		for (const spec of this.#specs.values()) {
			if (spec.kind === 'argument') args.push(spec);
		}
		return args;
	}

	/**
	 * Non-switch arguments, in the order they claim plain tokens.
	 */
	positionals(): Array<CliArgumentSpec> {
		return this.arguments().filter((spec) => !spec.is_switch);
	}

	[Symbol.iterator](): Iterator<CliParamSpec> {
		return this.#specs.values();
	}
}
