// Sloth Evaluator Tests
// Tests for operators, control flow, functions, collections and runtime errors

import { describe, it } from "node:test";
import assert from "node:assert";
import { builtinRegistryOf, defineBuiltin } from "../src/builtins/registry.js";
import { newEnvironment } from "../src/env.js";
import { ErrorCodes } from "../src/errors.js";
import { createDefaultBuiltins, evaluate, Evaluator } from "../src/evaluator.js";
import { parse } from "../src/parser.js";
import { FALSE, inspect, intVal, NULL, TRUE, type Value } from "../src/types.js";
import type { Program } from "../src/ast.js";

function parseOk(source: string): Program {
	const { program, errors } = parse(source);
	assert.deepStrictEqual(errors, []);
	return program;
}

function evalSource(source: string): Value {
	return evaluate(parseOk(source), newEnvironment(), { output: () => undefined });
}

function assertInspect(source: string, expected: string): void {
	assert.strictEqual(inspect(evalSource(source)), expected, source);
}

function assertCases(cases: [string, string][]): void {
	for (const [source, expected] of cases) {
		it("should evaluate " + source, () => {
			assertInspect(source, expected);
		});
	}
}

describe("Evaluator", () => {
	describe("Integer Arithmetic", () => {
		assertCases([
			["5", "5"],
			["-10", "-10"],
			["5 + 5 + 5 + 5 - 10", "10"],
			["2 * 2 * 2 * 2 * 2", "32"],
			["-50 + 100 + -50", "0"],
			["20 + 2 * -10", "0"],
			["50 / 2 * 2 + 10", "60"],
			["2 * (5 + 10)", "30"],
			["(5 + 10 * 2 + 15 / 3) * 2 + -10", "50"],
			["1 + 2 * 3", "7"],
			["(1 + 2) * 3", "9"],
		]);

		it("should truncate division toward zero", () => {
			assertInspect("7 / 2", "3");
			assertInspect("-7 / 2", "-3");
			assertInspect("7 / -2", "-3");
		});

		it("should wrap on overflow", () => {
			assertInspect("9223372036854775807 + 1", "-9223372036854775808");
			assertInspect("-9223372036854775807 - 2", "9223372036854775807");
		});

		it("should report division by zero as an error value", () => {
			assert.deepStrictEqual(evalSource("1 / 0"), {
				kind: "ERROR",
				code: ErrorCodes.DivideByZero,
				message: "division by zero",
			});
		});
	});

	describe("Booleans and Comparison", () => {
		const cases: [string, Value][] = [
			["true", TRUE],
			["false", FALSE],
			["1 < 2", TRUE],
			["1 > 2", FALSE],
			["1 == 1", TRUE],
			["1 != 1", FALSE],
			["true == true", TRUE],
			["true != false", TRUE],
			["(1 < 2) == true", TRUE],
			["(1 > 2) == true", FALSE],
			["!true", FALSE],
			["!5", FALSE],
			["!!5", TRUE],
			["!0", FALSE],
			["1 == true", FALSE],
		];

		for (const [source, expected] of cases) {
			it("should evaluate " + source + " to the shared singleton", () => {
				assert.strictEqual(evalSource(source), expected);
			});
		}

		it("should compare separately built strings by identity", () => {
			assert.strictEqual(evalSource("\"a\" == \"a\""), FALSE);
			assert.strictEqual(evalSource("\"a\" != \"a\""), TRUE);
			assert.strictEqual(evalSource("let s = \"a\"; s == s"), TRUE);
		});
	});

	describe("Strings", () => {
		assertCases([
			["\"Hello World!\"", "Hello World!"],
			["\"Hello\" + \" \" + \"World!\"", "Hello World!"],
			["\"\" + \"\"", ""],
		]);
	});

	describe("Conditionals", () => {
		assertCases([
			["if (true) { 10 }", "10"],
			["if (false) { 10 }", "null"],
			["if (1) { 10 }", "10"],
			["if (1 < 2) { 10 }", "10"],
			["if (1 > 2) { 10 } else { 20 }", "20"],
			["if (1 < 2) { 10 } else { 20 }", "10"],
			["if (0) { 1 } else { 2 }", "1"],
			["if (true) {}", "null"],
		]);
	});

	describe("Return", () => {
		assertCases([
			["return 10;", "10"],
			["return 10; 9;", "10"],
			["return 2 * 5; 9;", "10"],
			["9; return 2 * 5; 9;", "10"],
			["if (10 > 1) { if (10 > 1) { return 10; } return 1; }", "10"],
			["let f = fn() { return; 5 }; f()", "null"],
			["let f = fn(x) { return x; x + 10; }; f(10);", "10"],
			["let f = fn() { let x = if (true) { return 1 }; 2 }; f()", "1"],
		]);

		it("should stop a loop-like recursion at the first return", () => {
			assertInspect(
				"let find = fn(xs, x) { if (len(xs) == 0) { return false } if (first(xs) == x) { return true } find(rest(xs), x) }; find([1, 2, 3], 2)",
				"true",
			);
		});
	});

	describe("Bindings", () => {
		assertCases([
			["let a = 5; a;", "5"],
			["let a = 5 * 5; a;", "25"],
			["let a = 5; let b = a; b;", "5"],
			["let a = 5; let b = a; let c = a + b + 5; c;", "15"],
			["let a = 1", "null"],
			["let x = 1; x = x + 1; x", "2"],
			["let x = 1; x = 5", "5"],
			["let x = 1; let x = 2; x", "2"],
		]);

		it("should refuse to assign an unbound name", () => {
			assertInspect("y = 1", "ERROR: identifier not found: y");
		});

		it("should leave bindings in the environment passed in", () => {
			const env = newEnvironment();
			evaluate(parseOk("let answer = 6 * 7;"), env);

			assert.deepStrictEqual(env.get("answer"), intVal(42n));
		});
	});

	describe("Functions and Closures", () => {
		assertCases([
			["let identity = fn(x) { x; }; identity(5);", "5"],
			["let double = fn(x) { x * 2; }; double(5);", "10"],
			["let add = fn(x, y) { x + y; }; add(5 + 5, add(5, 5));", "20"],
			["fn(x) { x; }(5)", "5"],
			["fn(x) { x + 2; }", "fn(x) { (x + 2) }"],
			["let newAdder = fn(x) { fn(y) { x + y }; }; let addTwo = newAdder(2); addTwo(2);", "4"],
			["let fib = fn(n) { if (n < 2) { n } else { fib(n - 1) + fib(n - 2) } }; fib(10)", "55"],
			["let x = 1; let f = fn() { x }; let x = 2; f()", "2"],
			["let x = 10; let f = fn(x) { x }; f(1) + x", "11"],
		]);

		it("should let closures mutate captured bindings", () => {
			assertInspect(
				"let counter = fn() { let n = 0; fn() { n = n + 1; n } }; let c = counter(); c(); c(); c()",
				"3",
			);
		});

		it("should give each closure its own captured frame", () => {
			assertInspect(
				"let counter = fn() { let n = 0; fn() { n = n + 1; n } }; let a = counter(); let b = counter(); a(); a(); b()",
				"1",
			);
		});

		it("should check the argument count", () => {
			assertInspect("fn(x) { x }(1, 2)", "ERROR: wrong number of arguments: want=1, got=2");
			assertInspect("fn(x, y) { x }(1)", "ERROR: wrong number of arguments: want=2, got=1");
		});

		it("should refuse to call non-functions", () => {
			assertInspect("5(1)", "ERROR: not a function: INTEGER");
			assertInspect("let s = \"f\"; s()", "ERROR: not a function: STRING");
		});
	});

	describe("Arrays", () => {
		assertCases([
			["[1, 2 * 2, 3 + 3]", "[1, 4, 6]"],
			["[]", "[]"],
			["[1, 2, 3][0]", "1"],
			["[1, 2, 3][1 + 1]", "3"],
			["let i = 0; [1][i];", "1"],
			["let a = [1, 2, 3]; a[0] + a[1] + a[2];", "6"],
			["[1, 2, 3][3]", "null"],
			["[1, 2, 3][5]", "null"],
			["[1, 2, 3][-1]", "null"],
			["[[1, 2], [3]][0][1]", "2"],
		]);
	});

	describe("Hashes", () => {
		it("should evaluate keys and values in source order", () => {
			assertInspect(
				"let two = \"two\"; {\"one\": 10 - 9, two: 1 + 1, \"thr\" + \"ee\": 6 / 2, 4: 4, true: 5, false: 6}",
				"{one: 1, two: 2, three: 3, 4: 4, true: 5, false: 6}",
			);
		});

		assertCases([
			["{\"a\": 1, \"b\": 2}[\"a\"]", "1"],
			["{\"foo\": 5}[\"bar\"]", "null"],
			["let key = \"foo\"; {\"foo\": 5}[key]", "5"],
			["{}[\"foo\"]", "null"],
			["{5: 5}[5]", "5"],
			["{true: 5}[true]", "5"],
			["{false: 5}[false]", "5"],
			["{1: \"int\", true: \"bool\"}[1]", "int"],
			["{\"a\": 1, \"b\": 2, \"a\": 3}", "{a: 3, b: 2}"],
		]);

		it("should keep keys with unpaired surrogates distinct", () => {
			assertInspect("{\"\uD800\": 1}[\"\uD801\"]", "null");
			assertInspect("{\"\uD800\": 1, \"\uFFFD\": 2}[\"\uD800\"]", "1");
			assertInspect("{\"\uD800\": 1, \"\uFFFD\": 2}[\"\uFFFD\"]", "2");
			assertInspect("{\"\uD800\": 1, \"\uFFFD\": 2}", "{\uD800: 1, \uFFFD: 2}");
		});

		it("should reject unhashable keys", () => {
			assertInspect("{\"name\": \"x\"}[fn(x) { x }]", "ERROR: unusable as hash key: FUNCTION");
			assertInspect("{[1]: 2}", "ERROR: unusable as hash key: ARRAY");
		});
	});

	describe("Builtins", () => {
		assertCases([
			["len(\"\")", "0"],
			["len(\"four\")", "4"],
			["len([1, 2])", "2"],
			["first([7, 8])", "7"],
			["last([7, 8])", "8"],
			["rest([7, 8, 9])", "[8, 9]"],
			["let a = [1]; let b = push(a, 2); [a, b]", "[[1], [1, 2]]"],
			["len", "builtin function"],
			["let len = fn(x) { 42 }; len(\"abc\")", "42"],
		]);

		it("should report builtin argument errors", () => {
			assertInspect("len(1)", "ERROR: argument to `len` not supported, got INTEGER");
			assertInspect("len(\"one\", \"two\")", "ERROR: wrong number of arguments. got=2, want=1");
			assertInspect("first(1)", "ERROR: argument to `first` must be ARRAY, got INTEGER");
		});

		it("should send puts output to the configured sink", () => {
			const lines: string[] = [];
			const result = evaluate(parseOk("puts(\"hi\", 1 + 1); puts([true])"), newEnvironment(), {
				output: (line) => lines.push(line),
			});

			assert.strictEqual(result, NULL);
			assert.deepStrictEqual(lines, ["hi", "2", "[true]"]);
		});
	});

	describe("Errors", () => {
		assertCases([
			["5 + true;", "ERROR: type mismatch: INTEGER + BOOLEAN"],
			["5 + true; 5;", "ERROR: type mismatch: INTEGER + BOOLEAN"],
			["1 < true", "ERROR: type mismatch: INTEGER < BOOLEAN"],
			["-true", "ERROR: unknown operator: -BOOLEAN"],
			["-\"x\"", "ERROR: unknown operator: -STRING"],
			["true + false;", "ERROR: unknown operator: BOOLEAN + BOOLEAN"],
			["5; true + false; 5", "ERROR: unknown operator: BOOLEAN + BOOLEAN"],
			["if (10 > 1) { true + false; }", "ERROR: unknown operator: BOOLEAN + BOOLEAN"],
			["true < false", "ERROR: unknown operator: BOOLEAN < BOOLEAN"],
			["\"Hello\" - \"World\"", "ERROR: unknown operator: STRING - STRING"],
			["foobar", "ERROR: identifier not found: foobar"],
			["1[0]", "ERROR: index operator not supported: INTEGER[INTEGER]"],
			["[1][\"a\"]", "ERROR: index operator not supported: ARRAY[STRING]"],
			["len(1 / 0)", "ERROR: division by zero"],
			["[1, missing, 3]", "ERROR: identifier not found: missing"],
			["let f = fn() { oops }; f() + 1", "ERROR: identifier not found: oops"],
		]);

		it("should tag error values with a code", () => {
			const result = evalSource("5 + true");

			assert.ok(result.kind === "ERROR");
			assert.strictEqual(result.code, ErrorCodes.TypeMismatch);
		});
	});

	describe("Programs", () => {
		it("should evaluate an empty program to null", () => {
			assert.strictEqual(evalSource(""), NULL);
		});

		it("should give the same result on a fresh environment every time", () => {
			const program = parseOk("let a = [1, 2]; let b = push(a, 3); len(a) * 10 + len(b)");
			const first = evaluate(program, newEnvironment());
			const second = evaluate(program, newEnvironment());

			assert.deepStrictEqual(first, intVal(23n));
			assert.deepStrictEqual(second, first);
		});
	});

	describe("Evaluator Class", () => {
		it("should use only the builtins it was given", () => {
			const double = defineBuiltin("double")
				.setArity(1)
				.setImpl((x) => (x.kind === "INTEGER" ? intVal(x.value * 2n) : NULL))
				.build();
			const evaluator = new Evaluator(builtinRegistryOf([double]));
			const env = newEnvironment();

			assert.deepStrictEqual(evaluator.evaluate(parseOk("double(21)"), env), intVal(42n));
			assert.strictEqual(
				inspect(evaluator.evaluate(parseOk("len(\"x\")"), env)),
				"ERROR: identifier not found: len",
			);
		});

		it("should apply functions to evaluated arguments", () => {
			const evaluator = new Evaluator(createDefaultBuiltins(() => undefined));
			const triple = evaluator.evaluate(parseOk("fn(x) { x * 3 }"), newEnvironment());

			assert.deepStrictEqual(evaluator.apply(triple, [intVal(2n)]), intVal(6n));
			assert.strictEqual(inspect(evaluator.apply(intVal(1n), [])), "ERROR: not a function: INTEGER");
		});
	});
});
