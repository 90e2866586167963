// Sloth Builtin Registry
// Lookup table for host-implemented functions callable from Sloth code

import { ErrorCodes } from "../errors.js";
import { builtinVal, errorVal, type BuiltinFn, type BuiltinVal, type Value } from "../types.js";

//==============================================================================
// Builtin Registry Type
//==============================================================================

export type BuiltinRegistry = Map<string, BuiltinVal>;

/**
 * Register a builtin in the registry.
 */
export function registerBuiltin(
	registry: BuiltinRegistry,
	builtin: BuiltinVal,
): BuiltinRegistry {
	const newRegistry = new Map(registry);
	newRegistry.set(builtin.name, builtin);
	return newRegistry;
}

/**
 * Look up a builtin by name.
 */
export function lookupBuiltin(
	registry: BuiltinRegistry,
	name: string,
): BuiltinVal | undefined {
	return registry.get(name);
}

/**
 * Create an empty registry.
 */
export function emptyBuiltinRegistry(): BuiltinRegistry {
	return new Map();
}

/**
 * Merge registries; later entries win on name clashes.
 */
export function mergeBuiltins(...registries: BuiltinRegistry[]): BuiltinRegistry {
	let merged = emptyBuiltinRegistry();
	for (const registry of registries) {
		for (const builtin of registry.values()) {
			merged = registerBuiltin(merged, builtin);
		}
	}
	return merged;
}

/**
 * Build a registry from a list of builtins.
 */
export function builtinRegistryOf(builtins: BuiltinVal[]): BuiltinRegistry {
	let registry = emptyBuiltinRegistry();
	for (const builtin of builtins) {
		registry = registerBuiltin(registry, builtin);
	}
	return registry;
}

//==============================================================================
// Builtin Builder
//==============================================================================

export class BuiltinBuilder {
	private readonly name: string;
	private arity: number | undefined;
	private fn: BuiltinFn | undefined;

	constructor(name: string) {
		this.name = name;
	}

	/**
	 * Fix the argument count; calls with any other count yield an ArityError.
	 */
	setArity(arity: number): this {
		this.arity = arity;
		return this;
	}

	setImpl(fn: BuiltinFn): this {
		this.fn = fn;
		return this;
	}

	build(): BuiltinVal {
		const { fn, arity } = this;
		if (!fn) {
			throw new Error("Builtin " + this.name + " has no implementation");
		}
		if (arity === undefined) {
			return builtinVal(this.name, fn);
		}
		return builtinVal(this.name, (...args: Value[]) => {
			if (args.length !== arity) {
				return errorVal(
					ErrorCodes.ArityError,
					"wrong number of arguments. got=" + String(args.length) + ", want=" + String(arity),
				);
			}
			return fn(...args);
		});
	}
}

/**
 * Helper to create a builtin definition.
 */
export function defineBuiltin(name: string): BuiltinBuilder {
	return new BuiltinBuilder(name);
}
