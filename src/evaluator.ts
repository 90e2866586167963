// Sloth Evaluator
// Tree-walking evaluation of a Program against a chained Environment

import type {
	BlockStatement,
	CallExpression,
	Expression,
	HashLiteral,
	Identifier,
	IfExpression,
	Node,
	Program,
} from "./ast.js";
import { createArrayBuiltins } from "./builtins/array.js";
import { createCoreBuiltins } from "./builtins/core.js";
import { createIoBuiltins, type OutputSink } from "./builtins/io.js";
import { lookupBuiltin, mergeBuiltins, type BuiltinRegistry } from "./builtins/registry.js";
import { Environment, extendEnvironment } from "./env.js";
import { ErrorCodes, exhaustive } from "./errors.js";
import {
	arrayVal,
	boolVal,
	errorVal,
	FALSE,
	functionVal,
	hashEntryId,
	hashVal,
	intVal,
	isAbrupt,
	isError,
	isHashable,
	isReturn,
	isTruthy,
	NULL,
	returnVal,
	stringVal,
	TRUE,
	type ArrayVal,
	type FunctionVal,
	type HashPair,
	type HashVal,
	type IntVal,
	type Value,
} from "./types.js";

//==============================================================================
// Evaluation Options
//==============================================================================

export interface EvalOptions {
	/** Where `puts` writes; defaults to stdout */
	output?: OutputSink;
	/** Replaces the default builtin table */
	builtins?: BuiltinRegistry;
}

/**
 * The default builtin table: len, first, last, rest, push and puts.
 */
export function createDefaultBuiltins(output?: OutputSink): BuiltinRegistry {
	return mergeBuiltins(createCoreBuiltins(), createArrayBuiltins(), createIoBuiltins(output));
}

//==============================================================================
// Evaluator Class
//==============================================================================

export class Evaluator {
	private readonly builtins: BuiltinRegistry;

	constructor(builtins: BuiltinRegistry) {
		this.builtins = builtins;
	}

	/**
	 * Evaluate any node. Statements that bind names yield NULL.
	 */
	evaluate(node: Node, env: Environment): Value {
		switch (node.kind) {
		// Statements
		case "program":
			return this.evalProgram(node, env);

		case "block":
			return this.evalBlock(node, env);

		case "expression":
			return this.evaluate(node.expression, env);

		case "let": {
			const value = this.evaluate(node.value, env);
			if (isAbrupt(value)) return value;
			env.set(node.name.value, value);
			return NULL;
		}

		case "assign": {
			const value = this.evaluate(node.value, env);
			if (isAbrupt(value)) return value;
			if (!env.assign(node.name.value, value)) {
				return this.unbound(node.name);
			}
			return value;
		}

		case "return": {
			if (!node.value) return returnVal(NULL);
			const value = this.evaluate(node.value, env);
			if (isAbrupt(value)) return value;
			return returnVal(value);
		}

		// Expressions
		case "integer":
			return intVal(node.value);

		case "string":
			return stringVal(node.value);

		case "boolean":
			return boolVal(node.value);

		case "identifier":
			return this.evalIdentifier(node, env);

		case "prefix": {
			const right = this.evaluate(node.right, env);
			if (isAbrupt(right)) return right;
			return this.evalPrefix(node.operator, right);
		}

		case "infix": {
			const left = this.evaluate(node.left, env);
			if (isAbrupt(left)) return left;
			const right = this.evaluate(node.right, env);
			if (isAbrupt(right)) return right;
			return this.evalInfix(node.operator, left, right);
		}

		case "if":
			return this.evalIf(node, env);

		case "function":
			return functionVal(node.parameters, node.body, env);

		case "call":
			return this.evalCall(node, env);

		case "array": {
			const elements = this.evalExpressions(node.elements, env);
			if (!Array.isArray(elements)) return elements;
			return arrayVal(elements);
		}

		case "hash":
			return this.evalHashLiteral(node, env);

		case "index": {
			const left = this.evaluate(node.left, env);
			if (isAbrupt(left)) return left;
			const index = this.evaluate(node.index, env);
			if (isAbrupt(index)) return index;
			return this.evalIndex(left, index);
		}

		default:
			return exhaustive(node);
		}
	}

	//==========================================================================
	// Statement Sequences
	//==========================================================================

	// Top level: unwrap a return marker and stop
	private evalProgram(program: Program, env: Environment): Value {
		let result: Value = NULL;

		for (const statement of program.statements) {
			result = this.evaluate(statement, env);

			if (isReturn(result)) return result.value;
			if (isError(result)) return result;
		}

		return result;
	}

	// Blocks hand the return marker up unchanged so enclosing blocks stop too
	private evalBlock(block: BlockStatement, env: Environment): Value {
		let result: Value = NULL;

		for (const statement of block.statements) {
			result = this.evaluate(statement, env);

			if (isAbrupt(result)) return result;
		}

		return result;
	}

	//==========================================================================
	// Operators
	//==========================================================================

	private evalPrefix(operator: string, right: Value): Value {
		switch (operator) {
		case "!":
			return isTruthy(right) ? FALSE : TRUE;
		case "-":
			if (right.kind !== "INTEGER") {
				return errorVal(ErrorCodes.UnknownOperator, "unknown operator: -" + right.kind);
			}
			return intVal(-right.value);
		default:
			return errorVal(ErrorCodes.UnknownOperator, "unknown operator: " + operator + right.kind);
		}
	}

	// Anything other than two integers compares by identity under == and !=
	private evalInfix(operator: string, left: Value, right: Value): Value {
		if (left.kind === "INTEGER" && right.kind === "INTEGER") {
			return this.evalIntegerInfix(operator, left, right);
		}
		if (left.kind === "STRING" && right.kind === "STRING" && operator === "+") {
			return stringVal(left.value + right.value);
		}
		if (operator === "==") {
			return boolVal(left === right);
		}
		if (operator === "!=") {
			return boolVal(left !== right);
		}
		if (left.kind !== right.kind) {
			return errorVal(
				ErrorCodes.TypeMismatch,
				"type mismatch: " + left.kind + " " + operator + " " + right.kind,
			);
		}
		return errorVal(
			ErrorCodes.UnknownOperator,
			"unknown operator: " + left.kind + " " + operator + " " + right.kind,
		);
	}

	private evalIntegerInfix(operator: string, left: IntVal, right: IntVal): Value {
		const a = left.value;
		const b = right.value;

		switch (operator) {
		case "+":
			return intVal(a + b);
		case "-":
			return intVal(a - b);
		case "*":
			return intVal(a * b);
		case "/":
			if (b === 0n) {
				return errorVal(ErrorCodes.DivideByZero, "division by zero");
			}
			// bigint division truncates toward zero
			return intVal(a / b);
		case "<":
			return boolVal(a < b);
		case ">":
			return boolVal(a > b);
		case "==":
			return boolVal(a === b);
		case "!=":
			return boolVal(a !== b);
		default:
			return errorVal(
				ErrorCodes.UnknownOperator,
				"unknown operator: " + left.kind + " " + operator + " " + right.kind,
			);
		}
	}

	//==========================================================================
	// Control Flow and Lookup
	//==========================================================================

	private evalIf(node: IfExpression, env: Environment): Value {
		const condition = this.evaluate(node.condition, env);
		if (isAbrupt(condition)) return condition;

		if (isTruthy(condition)) {
			return this.evaluate(node.consequence, env);
		}
		if (node.alternative) {
			return this.evaluate(node.alternative, env);
		}
		return NULL;
	}

	// Environment chain first, then the builtin table
	private evalIdentifier(node: Identifier, env: Environment): Value {
		const value = env.get(node.value);
		if (value !== undefined) return value;

		const builtin = lookupBuiltin(this.builtins, node.value);
		if (builtin) return builtin;

		return this.unbound(node);
	}

	private unbound(node: Identifier): Value {
		return errorVal(ErrorCodes.UnboundIdentifier, "identifier not found: " + node.value);
	}

	//==========================================================================
	// Calls
	//==========================================================================

	private evalCall(node: CallExpression, env: Environment): Value {
		const callee = this.evaluate(node.callee, env);
		if (isAbrupt(callee)) return callee;

		const args = this.evalExpressions(node.args, env);
		if (!Array.isArray(args)) return args;

		return this.apply(callee, args);
	}

	/**
	 * Apply a function or builtin to already-evaluated arguments.
	 */
	apply(callee: Value, args: Value[]): Value {
		switch (callee.kind) {
		case "FUNCTION":
			return this.applyFunction(callee, args);
		case "BUILTIN":
			return callee.fn(...args);
		default:
			return errorVal(ErrorCodes.NotAFunction, "not a function: " + callee.kind);
		}
	}

	private applyFunction(fn: FunctionVal, args: Value[]): Value {
		if (fn.parameters.length !== args.length) {
			return errorVal(
				ErrorCodes.ArityError,
				"wrong number of arguments: want=" +
					String(fn.parameters.length) +
					", got=" +
					String(args.length),
			);
		}

		const callEnv = extendEnvironment(
			fn.env,
			fn.parameters.map((param, i): [string, Value] => [param.value, args[i] ?? NULL]),
		);
		const result = this.evaluate(fn.body, callEnv);
		return isReturn(result) ? result.value : result;
	}

	// Left to right; the first error or return marker stops evaluation and is returned alone
	private evalExpressions(expressions: Expression[], env: Environment): Value[] | Value {
		const values: Value[] = [];

		for (const expression of expressions) {
			const value = this.evaluate(expression, env);
			if (isAbrupt(value)) return value;
			values.push(value);
		}

		return values;
	}

	//==========================================================================
	// Collections
	//==========================================================================

	private evalHashLiteral(node: HashLiteral, env: Environment): Value {
		const pairs = new Map<string, HashPair>();

		for (const [keyNode, valueNode] of node.pairs) {
			const key = this.evaluate(keyNode, env);
			if (isAbrupt(key)) return key;

			if (!isHashable(key)) {
				return errorVal(ErrorCodes.NotHashable, "unusable as hash key: " + key.kind);
			}

			const value = this.evaluate(valueNode, env);
			if (isAbrupt(value)) return value;

			pairs.set(hashEntryId(key), { key, value });
		}

		return hashVal(pairs);
	}

	private evalIndex(left: Value, index: Value): Value {
		if (left.kind === "ARRAY" && index.kind === "INTEGER") {
			return this.evalArrayIndex(left, index);
		}
		if (left.kind === "HASH") {
			return this.evalHashIndex(left, index);
		}
		return errorVal(
			ErrorCodes.IndexNotSupported,
			"index operator not supported: " + left.kind + "[" + index.kind + "]",
		);
	}

	// Out of range, including negative, is null rather than an error
	private evalArrayIndex(array: ArrayVal, index: IntVal): Value {
		const i = index.value;
		if (i < 0n || i >= BigInt(array.elements.length)) {
			return NULL;
		}
		return array.elements[Number(i)] ?? NULL;
	}

	private evalHashIndex(hash: HashVal, index: Value): Value {
		if (!isHashable(index)) {
			return errorVal(ErrorCodes.NotHashable, "unusable as hash key: " + index.kind);
		}
		return hash.pairs.get(hashEntryId(index))?.value ?? NULL;
	}
}

//==============================================================================
// Program Evaluation
//==============================================================================

/**
 * Evaluate a parsed program against `env`.
 */
export function evaluate(program: Program, env: Environment, options?: EvalOptions): Value {
	const builtins = options?.builtins ?? createDefaultBuiltins(options?.output);
	return new Evaluator(builtins).evaluate(program, env);
}
