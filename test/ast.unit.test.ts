// Sloth AST Tests
// Tests for rendering nodes back to source text

import { describe, it } from "node:test";
import assert from "node:assert";
import { stringify, type Identifier, type Program } from "../src/ast.js";
import { parse } from "../src/parser.js";
import { token, TokenKinds } from "../src/token.js";

const ident = (name: string): Identifier => ({
	kind: "identifier",
	token: token(TokenKinds.IDENT, name),
	value: name,
});

function render(source: string): string {
	const { program, errors } = parse(source);
	assert.deepStrictEqual(errors, []);
	return stringify(program);
}

describe("stringify", () => {
	it("should render a hand-built let statement", () => {
		const program: Program = {
			kind: "program",
			statements: [
				{
					kind: "let",
					token: token(TokenKinds.LET, "let"),
					name: ident("myVar"),
					value: ident("anotherVar"),
				},
			],
		};

		assert.strictEqual(stringify(program), "let myVar = anotherVar;");
	});

	it("should quote string literals", () => {
		assert.strictEqual(render("\"hello\" + \"world\""), "(\"hello\" + \"world\")");
	});

	it("should render booleans and prefix operators", () => {
		assert.strictEqual(render("!true == false"), "((!true) == false)");
	});

	it("should render if and else blocks", () => {
		assert.strictEqual(
			render("if (a > b) { a; b } else { c }"),
			"if (a > b) { a b } else { c }",
		);
	});

	it("should render empty blocks as {}", () => {
		assert.strictEqual(render("fn() {}"), "fn() {}");
	});

	it("should render return with and without a value", () => {
		assert.strictEqual(render("return 1 + 2; return;"), "return (1 + 2); return;");
	});

	it("should render hash literals with their pairs in order", () => {
		assert.strictEqual(render("{\"b\": 2, \"a\": [1]}"), "{\"b\": 2, \"a\": [1]}");
	});

	it("should render index expressions in parentheses", () => {
		assert.strictEqual(render("xs[i + 1]"), "(xs[(i + 1)])");
	});

	it("should render assignment statements", () => {
		assert.strictEqual(render("n = n * 2"), "n = (n * 2);");
	});

	it("should reparse its own output to the same text", () => {
		const sources = [
			"let add = fn(a, b) { return a + b; }; add(1, 2 * 3)",
			"if (x < 10) { puts(\"small\") } else { [x, -x] }",
			"let h = {\"k\": fn(v) { v }}; h[\"k\"](1)",
		];

		for (const source of sources) {
			const once = render(source);
			assert.strictEqual(render(once), once);
		}
	});
});
