// Sloth AST
// Node model produced by the parser and consumed by the evaluator

import { exhaustive } from "./errors.js";
import type { Token } from "./token.js";

//==============================================================================
// Program and Statements
//==============================================================================

export interface Program {
	kind: "program";
	statements: Statement[];
}

export type Statement =
	| LetStatement
	| ReturnStatement
	| AssignStatement
	| ExpressionStatement
	| BlockStatement;

export interface LetStatement {
	kind: "let";
	token: Token;
	name: Identifier;
	value: Expression;
}

export interface ReturnStatement {
	kind: "return";
	token: Token;
	value?: Expression;
}

/** Rebinds an existing name, searching outward through enclosing scopes. */
export interface AssignStatement {
	kind: "assign";
	token: Token;
	name: Identifier;
	value: Expression;
}

export interface ExpressionStatement {
	kind: "expression";
	token: Token;
	expression: Expression;
}

export interface BlockStatement {
	kind: "block";
	token: Token;
	statements: Statement[];
}

//==============================================================================
// Expressions
//==============================================================================

export type Expression =
	| Identifier
	| IntegerLiteral
	| StringLiteral
	| BooleanLiteral
	| ArrayLiteral
	| HashLiteral
	| PrefixExpression
	| InfixExpression
	| IfExpression
	| FunctionLiteral
	| CallExpression
	| IndexExpression;

export interface Identifier {
	kind: "identifier";
	token: Token;
	value: string;
}

export interface IntegerLiteral {
	kind: "integer";
	token: Token;
	value: bigint;
}

export interface StringLiteral {
	kind: "string";
	token: Token;
	value: string;
}

export interface BooleanLiteral {
	kind: "boolean";
	token: Token;
	value: boolean;
}

export interface ArrayLiteral {
	kind: "array";
	token: Token;
	elements: Expression[];
}

export interface HashLiteral {
	kind: "hash";
	token: Token;
	pairs: [Expression, Expression][];
}

export interface PrefixExpression {
	kind: "prefix";
	token: Token;
	operator: string;
	right: Expression;
}

export interface InfixExpression {
	kind: "infix";
	token: Token;
	operator: string;
	left: Expression;
	right: Expression;
}

export interface IfExpression {
	kind: "if";
	token: Token;
	condition: Expression;
	consequence: BlockStatement;
	alternative?: BlockStatement;
}

export interface FunctionLiteral {
	kind: "function";
	token: Token;
	parameters: Identifier[];
	body: BlockStatement;
}

export interface CallExpression {
	kind: "call";
	token: Token;
	callee: Expression;
	args: Expression[];
}

export interface IndexExpression {
	kind: "index";
	token: Token;
	left: Expression;
	index: Expression;
}

export type Node = Program | Statement | Expression;

//==============================================================================
// Rendering
//==============================================================================

/**
 * Render a node back to source-like text. Every prefix, infix and index
 * expression is wrapped in parentheses so grouping is unambiguous.
 *
 * @example
 * stringify(parse("1 + 2 * 3").program) // "(1 + (2 * 3))"
 */
export function stringify(node: Node): string {
	switch (node.kind) {
	case "program":
		return node.statements.map(stringify).join(" ");
	case "let":
		return "let " + node.name.value + " = " + stringify(node.value) + ";";
	case "return":
		return node.value ? "return " + stringify(node.value) + ";" : "return;";
	case "assign":
		return node.name.value + " = " + stringify(node.value) + ";";
	case "expression":
		return stringify(node.expression);
	case "block":
		return node.statements.length === 0
			? "{}"
			: "{ " + node.statements.map(stringify).join(" ") + " }";
	case "identifier":
		return node.value;
	case "integer":
		return node.value.toString();
	case "string":
		return "\"" + node.value + "\"";
	case "boolean":
		return String(node.value);
	case "array":
		return "[" + node.elements.map(stringify).join(", ") + "]";
	case "hash":
		return (
			"{" +
				node.pairs.map(([k, v]) => stringify(k) + ": " + stringify(v)).join(", ") +
				"}"
		);
	case "prefix":
		return "(" + node.operator + stringify(node.right) + ")";
	case "infix":
		return (
			"(" + stringify(node.left) + " " + node.operator + " " + stringify(node.right) + ")"
		);
	case "if":
		return (
			"if " +
				stringify(node.condition) +
				" " +
				stringify(node.consequence) +
				(node.alternative ? " else " + stringify(node.alternative) : "")
		);
	case "function":
		return (
			"fn(" + node.parameters.map(stringify).join(", ") + ") " + stringify(node.body)
		);
	case "call":
		return stringify(node.callee) + "(" + node.args.map(stringify).join(", ") + ")";
	case "index":
		return "(" + stringify(node.left) + "[" + stringify(node.index) + "])";
	default:
		return exhaustive(node);
	}
}
