// Sloth Value Definitions
// Runtime value domain, shared singletons, hash keys and inspection

import { stringify, type BlockStatement, type Identifier } from "./ast.js";
import type { Environment } from "./env.js";
import { exhaustive, type ErrorCode } from "./errors.js";

//==============================================================================
// Value Domain
//==============================================================================

export type Value =
	| IntVal
	| BoolVal
	| StringVal
	| NullVal
	| ReturnVal // control-flow marker, never visible to programs
	| ErrorVal
	| FunctionVal
	| BuiltinVal
	| ArrayVal
	| HashVal;

export interface IntVal {
	readonly kind: "INTEGER";
	readonly value: bigint;
}

export interface BoolVal {
	readonly kind: "BOOLEAN";
	readonly value: boolean;
}

export interface StringVal {
	readonly kind: "STRING";
	readonly value: string;
}

export interface NullVal {
	readonly kind: "NULL";
}

export interface ReturnVal {
	readonly kind: "RETURN_VALUE";
	readonly value: Value;
}

export interface ErrorVal {
	readonly kind: "ERROR";
	readonly code: ErrorCode;
	readonly message: string;
}

export interface FunctionVal {
	readonly kind: "FUNCTION";
	readonly parameters: readonly Identifier[];
	readonly body: BlockStatement;
	// Shared with the defining scope, never copied
	readonly env: Environment;
}

export type BuiltinFn = (...args: Value[]) => Value;

export interface BuiltinVal {
	readonly kind: "BUILTIN";
	readonly name: string;
	readonly fn: BuiltinFn;
}

export interface ArrayVal {
	readonly kind: "ARRAY";
	readonly elements: readonly Value[];
}

export interface HashPair {
	readonly key: HashableVal;
	readonly value: Value;
}

export interface HashVal {
	readonly kind: "HASH";
	readonly pairs: ReadonlyMap<string, HashPair>;
}

//==============================================================================
// Shared Singletons
//==============================================================================

export const TRUE: BoolVal = Object.freeze({ kind: "BOOLEAN", value: true });
export const FALSE: BoolVal = Object.freeze({ kind: "BOOLEAN", value: false });
export const NULL: NullVal = Object.freeze({ kind: "NULL" });

//==============================================================================
// Value Constructors
//==============================================================================

// Integers wrap at 64 bits like a native signed int64
export const intVal = (value: bigint): IntVal => ({
	kind: "INTEGER",
	value: BigInt.asIntN(64, value),
});
export const boolVal = (value: boolean): BoolVal => (value ? TRUE : FALSE);
export const stringVal = (value: string): StringVal => ({ kind: "STRING", value });
export const returnVal = (value: Value): ReturnVal => ({ kind: "RETURN_VALUE", value });
export const errorVal = (code: ErrorCode, message: string): ErrorVal => ({
	kind: "ERROR",
	code,
	message,
});
export const functionVal = (
	parameters: readonly Identifier[],
	body: BlockStatement,
	env: Environment,
): FunctionVal => ({ kind: "FUNCTION", parameters, body, env });
export const builtinVal = (name: string, fn: BuiltinFn): BuiltinVal => ({
	kind: "BUILTIN",
	name,
	fn,
});
export const arrayVal = (elements: readonly Value[]): ArrayVal => ({
	kind: "ARRAY",
	elements,
});
export const hashVal = (pairs: ReadonlyMap<string, HashPair>): HashVal => ({
	kind: "HASH",
	pairs,
});

//==============================================================================
// Type Guards
//==============================================================================

export function isError(v: Value): v is ErrorVal {
	return v.kind === "ERROR";
}

export function isReturn(v: Value): v is ReturnVal {
	return v.kind === "RETURN_VALUE";
}

/**
 * Errors and return markers both end evaluation of the enclosing node
 */
export function isAbrupt(v: Value): v is ErrorVal | ReturnVal {
	return v.kind === "ERROR" || v.kind === "RETURN_VALUE";
}

/**
 * `false` and `null` are falsy; everything else, including 0, is truthy.
 */
export function isTruthy(v: Value): boolean {
	switch (v.kind) {
	case "NULL":
		return false;
	case "BOOLEAN":
		return v.value;
	default:
		return true;
	}
}

//==============================================================================
// Hash Keys
//==============================================================================

/** Values that may be used as hash keys */
export type HashableVal = IntVal | BoolVal | StringVal;

export interface HashKey {
	readonly type: HashableVal["kind"];
	readonly value: bigint;
}

export function isHashable(v: Value): v is HashableVal {
	return v.kind === "INTEGER" || v.kind === "BOOLEAN" || v.kind === "STRING";
}

const FNV_OFFSET_BASIS = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;

// UTF-8 bytes of one code point; lone surrogates encode like any BMP code point
function utf8Bytes(cp: number): number[] {
	if (cp < 0x80) return [cp];
	if (cp < 0x800) return [0xc0 | (cp >> 6), 0x80 | (cp & 0x3f)];
	if (cp < 0x10000) {
		return [0xe0 | (cp >> 12), 0x80 | ((cp >> 6) & 0x3f), 0x80 | (cp & 0x3f)];
	}
	return [
		0xf0 | (cp >> 18),
		0x80 | ((cp >> 12) & 0x3f),
		0x80 | ((cp >> 6) & 0x3f),
		0x80 | (cp & 0x3f),
	];
}

/**
 * 64-bit FNV-1a over the UTF-8 bytes of a string
 */
export function fnv1a64(text: string): bigint {
	let hash = FNV_OFFSET_BASIS;
	for (const ch of text) {
		for (const byte of utf8Bytes(ch.codePointAt(0) ?? 0)) {
			hash ^= BigInt(byte);
			hash = BigInt.asUintN(64, hash * FNV_PRIME);
		}
	}
	return hash;
}

export function hashKey(v: HashableVal): HashKey {
	switch (v.kind) {
	case "BOOLEAN":
		return { type: v.kind, value: v.value ? 1n : 0n };
	case "INTEGER":
		return { type: v.kind, value: BigInt.asUintN(64, v.value) };
	case "STRING":
		return { type: v.kind, value: fnv1a64(v.value) };
	default:
		return exhaustive(v);
	}
}

/**
 * Flatten a HashKey into a string usable as a Map key
 */
export function hashKeyId(key: HashKey): string {
	return key.type + ":" + key.value.toString(16);
}

/**
 * Map key of a hash entry. Strings are keyed on their text so two distinct
 * strings never share an entry, even when their FNV-1a hashes collide.
 */
export function hashEntryId(v: HashableVal): string {
	return v.kind === "STRING" ? "STRING=" + v.value : hashKeyId(hashKey(v));
}

//==============================================================================
// Inspection
//==============================================================================

export function inspect(v: Value): string {
	switch (v.kind) {
	case "INTEGER":
		return v.value.toString();
	case "BOOLEAN":
		return String(v.value);
	case "STRING":
		return v.value;
	case "NULL":
		return "null";
	case "RETURN_VALUE":
		return inspect(v.value);
	case "ERROR":
		return "ERROR: " + v.message;
	case "FUNCTION":
		return "fn(" + v.parameters.map((p) => p.value).join(", ") + ") " + stringify(v.body);
	case "BUILTIN":
		return "builtin function";
	case "ARRAY":
		return "[" + v.elements.map(inspect).join(", ") + "]";
	case "HASH":
		return (
			"{" +
				Array.from(v.pairs.values(), (p) => inspect(p.key) + ": " + inspect(p.value)).join(", ") +
				"}"
		);
	default:
		return exhaustive(v);
	}
}
