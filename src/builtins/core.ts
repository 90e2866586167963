// Sloth Core Builtins
// Length of strings and arrays

import { ErrorCodes } from "../errors.js";
import { errorVal, intVal } from "../types.js";
import { builtinRegistryOf, defineBuiltin, type BuiltinRegistry } from "./registry.js";

// len(string | array) -> int
// Strings are measured in code points, not UTF-16 units
const len = defineBuiltin("len")
	.setArity(1)
	.setImpl((arg) => {
		switch (arg.kind) {
		case "STRING":
			return intVal(BigInt([...arg.value].length));
		case "ARRAY":
			return intVal(BigInt(arg.elements.length));
		default:
			return errorVal(
				ErrorCodes.ArgumentError,
				"argument to `len` not supported, got " + arg.kind,
			);
		}
	})
	.build();

/**
 * Create registry with core builtins
 */
export function createCoreBuiltins(): BuiltinRegistry {
	return builtinRegistryOf([len]);
}
