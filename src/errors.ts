// Sloth Error Types
// Error codes for runtime error values and the host-level SlothError

import type { ErrorVal } from "./types.js";

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Evaluation errors (carried by ERROR values)
	TypeMismatch: "TypeMismatch",
	UnknownOperator: "UnknownOperator",
	UnboundIdentifier: "UnboundIdentifier",
	ArityError: "ArityError",
	ArgumentError: "ArgumentError",
	NotAFunction: "NotAFunction",
	NotHashable: "NotHashable",
	IndexNotSupported: "IndexNotSupported",
	DivideByZero: "DivideByZero",

	// Host errors
	ParseError: "ParseError",
	UsageError: "UsageError",
	IOError: "IOError",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

//==============================================================================
// Sloth Error Class
//==============================================================================

export class SlothError extends Error {
	readonly code: ErrorCode;
	readonly diagnostics: readonly string[];

	constructor(code: ErrorCode, message: string, diagnostics: readonly string[] = []) {
		super(message);
		this.name = "SlothError";
		this.code = code;
		this.diagnostics = diagnostics;
	}

	/**
	 * Convert to an ERROR value so host failures can be shown like runtime ones
	 */
	toValue(): ErrorVal {
		return { kind: "ERROR", code: this.code, message: this.message };
	}

	/**
	 * Create a ParseError carrying the parser diagnostics
	 */
	static parseError(diagnostics: readonly string[]): SlothError {
		const noun = diagnostics.length === 1 ? "error" : "errors";
		return new SlothError(
			ErrorCodes.ParseError,
			"Parsing failed with " + String(diagnostics.length) + " " + noun,
			diagnostics,
		);
	}

	/**
	 * Create a UsageError for bad command-line input
	 */
	static usage(message: string): SlothError {
		return new SlothError(ErrorCodes.UsageError, message);
	}

	/**
	 * Create an IOError for unreadable script files
	 */
	static io(path: string, cause: string): SlothError {
		return new SlothError(ErrorCodes.IOError, "Cannot read " + path + ": " + cause);
	}
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 *
 * @example
 * switch (node.kind) {
 *   case "let": return ...;
 *   case "return": return ...;
 *   default:
 *     exhaustive(node); // Type error if a kind is missing
 * }
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}
