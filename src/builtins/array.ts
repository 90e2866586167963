// Sloth Array Builtins
// first, last, rest and push; none of them mutate their input

import { ErrorCodes } from "../errors.js";
import { arrayVal, errorVal, NULL, type ArrayVal, type ErrorVal, type Value } from "../types.js";
import { builtinRegistryOf, defineBuiltin, type BuiltinRegistry } from "./registry.js";

//==============================================================================
// Helper Functions
//==============================================================================

function expectArray(name: string, v: Value): ArrayVal | ErrorVal {
	if (v.kind === "ARRAY") return v;
	return errorVal(
		ErrorCodes.ArgumentError,
		"argument to `" + name + "` must be ARRAY, got " + v.kind,
	);
}

//==============================================================================
// Builtins
//==============================================================================

// first(array) -> value | null
const first = defineBuiltin("first")
	.setArity(1)
	.setImpl((arg) => {
		const arr = expectArray("first", arg);
		if (arr.kind === "ERROR") return arr;
		return arr.elements[0] ?? NULL;
	})
	.build();

// last(array) -> value | null
const last = defineBuiltin("last")
	.setArity(1)
	.setImpl((arg) => {
		const arr = expectArray("last", arg);
		if (arr.kind === "ERROR") return arr;
		return arr.elements[arr.elements.length - 1] ?? NULL;
	})
	.build();

// rest(array) -> array | null
const rest = defineBuiltin("rest")
	.setArity(1)
	.setImpl((arg) => {
		const arr = expectArray("rest", arg);
		if (arr.kind === "ERROR") return arr;
		if (arr.elements.length === 0) return NULL;
		return arrayVal(arr.elements.slice(1));
	})
	.build();

// push(array, value) -> array
const push = defineBuiltin("push")
	.setArity(2)
	.setImpl((arg, value) => {
		const arr = expectArray("push", arg);
		if (arr.kind === "ERROR") return arr;
		return arrayVal([...arr.elements, value]);
	})
	.build();

/**
 * Create registry with array builtins
 */
export function createArrayBuiltins(): BuiltinRegistry {
	return builtinRegistryOf([first, last, rest, push]);
}
