// Sloth Run API
// One-call parse and evaluate for hosts that only have source text

import { newEnvironment, type Environment } from "./env.js";
import { SlothError } from "./errors.js";
import { evaluate, type EvalOptions } from "./evaluator.js";
import { parse } from "./parser.js";
import type { Value } from "./types.js";

/**
 * Parse and evaluate `source`. Throws a ParseError carrying every diagnostic
 * when the source does not parse; runtime failures come back as ERROR values.
 */
export function run(source: string, env: Environment = newEnvironment(), options?: EvalOptions): Value {
	const { program, errors } = parse(source);
	if (errors.length > 0) {
		throw SlothError.parseError(errors);
	}
	return evaluate(program, env, options);
}
