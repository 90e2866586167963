// Sloth IO Builtins
// puts writes to a caller-supplied sink so hosts decide where output goes

import { inspect, NULL } from "../types.js";
import { builtinRegistryOf, defineBuiltin, type BuiltinRegistry } from "./registry.js";

export type OutputSink = (line: string) => void;

/**
 * Sink writing each line to process.stdout
 */
export const stdoutSink: OutputSink = (line) => {
	process.stdout.write(line + "\n");
};

/**
 * Create registry with IO builtins bound to `write`
 */
export function createIoBuiltins(write: OutputSink = stdoutSink): BuiltinRegistry {
	// puts(...values) -> null
	const puts = defineBuiltin("puts")
		.setImpl((...args) => {
			for (const arg of args) {
				write(inspect(arg));
			}
			return NULL;
		})
		.build();

	return builtinRegistryOf([puts]);
}
