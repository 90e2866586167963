// Sloth - a small expression language
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	Program, Statement, Expression, Node,
	LetStatement, ReturnStatement, AssignStatement, ExpressionStatement, BlockStatement,
	Identifier, IntegerLiteral, StringLiteral, BooleanLiteral, ArrayLiteral, HashLiteral,
	PrefixExpression, InfixExpression, IfExpression, FunctionLiteral, CallExpression,
	IndexExpression,
} from "./ast.js";

export type {
	Value, IntVal, BoolVal, StringVal, NullVal, ReturnVal, ErrorVal,
	FunctionVal, BuiltinVal, BuiltinFn, ArrayVal, HashVal, HashPair,
	HashableVal, HashKey,
} from "./types.js";

export type { Token, TokenKind } from "./token.js";

export type { ErrorCode } from "./errors.js";

export type { BuiltinRegistry } from "./builtins/registry.js";

export type { OutputSink } from "./builtins/io.js";

export type { EvalOptions } from "./evaluator.js";

export type { ParseResult } from "./parser.js";

export type { ReplOptions } from "./repl.js";

//==============================================================================
// Tokens and Lexing
//==============================================================================

export { TokenKinds, token, lookupIdent, kindName } from "./token.js";

export { Lexer, tokenize } from "./lexer.js";

//==============================================================================
// Parsing
//==============================================================================

export { Parser, Precedence, parse } from "./parser.js";

export { stringify } from "./ast.js";

//==============================================================================
// Values
//==============================================================================

export {
	TRUE, FALSE, NULL,
	intVal, boolVal, stringVal, returnVal, errorVal, functionVal, builtinVal, arrayVal, hashVal,
	isError, isReturn, isAbrupt, isTruthy, isHashable,
	fnv1a64, hashKey, hashKeyId, hashEntryId, inspect,
} from "./types.js";

//==============================================================================
// Environment
//==============================================================================

export {
	Environment, newEnvironment, newEnclosedEnvironment, extendEnvironment,
} from "./env.js";

//==============================================================================
// Errors
//==============================================================================

export { ErrorCodes, SlothError, exhaustive } from "./errors.js";

//==============================================================================
// Builtins
//==============================================================================

export {
	registerBuiltin, lookupBuiltin, emptyBuiltinRegistry, mergeBuiltins,
	builtinRegistryOf, defineBuiltin, BuiltinBuilder,
} from "./builtins/registry.js";

export { createCoreBuiltins } from "./builtins/core.js";
export { createArrayBuiltins } from "./builtins/array.js";
export { createIoBuiltins, stdoutSink } from "./builtins/io.js";

//==============================================================================
// Evaluation
//==============================================================================

export { Evaluator, evaluate, createDefaultBuiltins } from "./evaluator.js";

export { run } from "./run.js";

export { startRepl, PROMPT } from "./repl.js";
