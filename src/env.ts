// Sloth Environment
// Chained lexical scopes used for variable lookup and closure capture

import type { Value } from "./types.js";

//==============================================================================
// Environment
//==============================================================================

/**
 * A single scope frame. Frames link outward to the global scope; a frame
 * stays alive as long as any closure still holds it.
 */
export class Environment {
	private readonly store = new Map<string, Value>();
	readonly outer: Environment | undefined;

	constructor(outer?: Environment) {
		this.outer = outer;
	}

	/**
	 * Look a name up, walking outward until found.
	 */
	get(name: string): Value | undefined {
		const value = this.store.get(name);
		if (value !== undefined) return value;
		return this.outer?.get(name);
	}

	/**
	 * Bind a name in this frame, shadowing any outer binding.
	 */
	set(name: string, value: Value): Value {
		this.store.set(name, value);
		return value;
	}

	/**
	 * Rebind a name in the nearest frame that already holds it.
	 * Returns false when no frame in the chain binds the name.
	 */
	assign(name: string, value: Value): boolean {
		for (let env: Environment | undefined = this; env; env = env.outer) {
			if (env.store.has(name)) {
				env.store.set(name, value);
				return true;
			}
		}
		return false;
	}

	/**
	 * Names bound directly in this frame, in binding order
	 */
	names(): string[] {
		return [...this.store.keys()];
	}
}

//==============================================================================
// Constructors
//==============================================================================

/**
 * Create an empty global environment.
 */
export function newEnvironment(): Environment {
	return new Environment();
}

/**
 * Create a frame enclosed by `outer`, as done for every function call.
 */
export function newEnclosedEnvironment(outer: Environment): Environment {
	return new Environment(outer);
}

/**
 * Create a frame enclosed by `outer` with the given bindings.
 */
export function extendEnvironment(
	outer: Environment,
	bindings: [string, Value][],
): Environment {
	const env = newEnclosedEnvironment(outer);
	for (const [name, value] of bindings) {
		env.set(name, value);
	}
	return env;
}
