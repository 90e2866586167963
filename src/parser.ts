// Sloth Parser
// Pratt (precedence-climbing) parser producing a Program and diagnostics

import type {
	ArrayLiteral,
	AssignStatement,
	BlockStatement,
	CallExpression,
	Expression,
	ExpressionStatement,
	FunctionLiteral,
	HashLiteral,
	Identifier,
	IfExpression,
	IndexExpression,
	InfixExpression,
	LetStatement,
	PrefixExpression,
	Program,
	ReturnStatement,
	Statement,
} from "./ast.js";
import { Lexer } from "./lexer.js";
import { kindName, TokenKinds, type Token, type TokenKind } from "./token.js";

//==============================================================================
// Precedence
//==============================================================================

export const Precedence = {
	LOWEST: 1,
	EQUALS: 2, // == !=
	LESSGREATER: 3, // < >
	SUM: 4, // + -
	PRODUCT: 5, // * /
	PREFIX: 6, // -x !x
	CALL: 7, // f(x) a[i]
} as const;

export type Precedence = (typeof Precedence)[keyof typeof Precedence];

const precedences: ReadonlyMap<TokenKind, Precedence> = new Map<TokenKind, Precedence>([
	[TokenKinds.EQ, Precedence.EQUALS],
	[TokenKinds.NOT_EQ, Precedence.EQUALS],
	[TokenKinds.LT, Precedence.LESSGREATER],
	[TokenKinds.GT, Precedence.LESSGREATER],
	[TokenKinds.PLUS, Precedence.SUM],
	[TokenKinds.MINUS, Precedence.SUM],
	[TokenKinds.ASTERISK, Precedence.PRODUCT],
	[TokenKinds.SLASH, Precedence.PRODUCT],
	[TokenKinds.LPAREN, Precedence.CALL],
	[TokenKinds.LBRACKET, Precedence.CALL],
]);

const INT64_MAX = 2n ** 63n - 1n;

type PrefixParseFn = () => Expression | undefined;
type InfixParseFn = (left: Expression) => Expression | undefined;

//==============================================================================
// Parser Class
//==============================================================================

export class Parser {
	private readonly lexer: Lexer;
	private readonly _errors: string[] = [];
	private currentToken: Token;
	private peekToken: Token;

	private readonly prefixParseFns = new Map<TokenKind, PrefixParseFn>();
	private readonly infixParseFns = new Map<TokenKind, InfixParseFn>();

	constructor(lexer: Lexer) {
		this.lexer = lexer;

		this.registerPrefix(TokenKinds.IDENT, () => this.parseIdentifier());
		this.registerPrefix(TokenKinds.INT, () => this.parseIntegerLiteral());
		this.registerPrefix(TokenKinds.STRING, () => this.parseStringLiteral());
		this.registerPrefix(TokenKinds.TRUE, () => this.parseBooleanLiteral());
		this.registerPrefix(TokenKinds.FALSE, () => this.parseBooleanLiteral());
		this.registerPrefix(TokenKinds.BANG, () => this.parsePrefixExpression());
		this.registerPrefix(TokenKinds.MINUS, () => this.parsePrefixExpression());
		this.registerPrefix(TokenKinds.LPAREN, () => this.parseGroupedExpression());
		this.registerPrefix(TokenKinds.IF, () => this.parseIfExpression());
		this.registerPrefix(TokenKinds.FUNCTION, () => this.parseFunctionLiteral());
		this.registerPrefix(TokenKinds.LBRACKET, () => this.parseArrayLiteral());
		this.registerPrefix(TokenKinds.LBRACE, () => this.parseHashLiteral());
		this.registerPrefix(TokenKinds.ILLEGAL, () => this.parseIllegal());

		for (const kind of [
			TokenKinds.PLUS,
			TokenKinds.MINUS,
			TokenKinds.ASTERISK,
			TokenKinds.SLASH,
			TokenKinds.EQ,
			TokenKinds.NOT_EQ,
			TokenKinds.LT,
			TokenKinds.GT,
		]) {
			this.registerInfix(kind, (left) => this.parseInfixExpression(left));
		}
		this.registerInfix(TokenKinds.LPAREN, (callee) => this.parseCallExpression(callee));
		this.registerInfix(TokenKinds.LBRACKET, (left) => this.parseIndexExpression(left));

		// Prime currentToken and peekToken
		this.currentToken = lexer.nextToken();
		this.peekToken = lexer.nextToken();
	}

	get errors(): readonly string[] {
		return this._errors;
	}

	/**
	 * Parse the whole input. Statements that fail to parse are dropped and
	 * parsing resumes at the next token, so one pass can report several errors.
	 */
	parseProgram(): Program {
		const program: Program = { kind: "program", statements: [] };

		while (!this.currentTokenIs(TokenKinds.EOF)) {
			const statement = this.parseStatement();
			if (statement) {
				program.statements.push(statement);
			}
			this.nextToken();
		}

		return program;
	}

	//==========================================================================
	// Token Helpers
	//==========================================================================

	private registerPrefix(kind: TokenKind, fn: PrefixParseFn): void {
		this.prefixParseFns.set(kind, fn);
	}

	private registerInfix(kind: TokenKind, fn: InfixParseFn): void {
		this.infixParseFns.set(kind, fn);
	}

	private nextToken(): void {
		this.currentToken = this.peekToken;
		this.peekToken = this.lexer.nextToken();
	}

	private currentTokenIs(kind: TokenKind): boolean {
		return this.currentToken.kind === kind;
	}

	private peekTokenIs(kind: TokenKind): boolean {
		return this.peekToken.kind === kind;
	}

	/**
	 * Advance only if the next token has the expected kind; record an error otherwise.
	 */
	private expectPeek(kind: TokenKind): boolean {
		if (this.peekTokenIs(kind)) {
			this.nextToken();
			return true;
		}
		this.expectedError(kind, this.peekToken);
		return false;
	}

	// Trailing semicolons are optional and consumed even after a failed statement
	private skipSemicolon(): void {
		if (this.peekTokenIs(TokenKinds.SEMICOLON)) {
			this.nextToken();
		}
	}

	private peekPrecedence(): Precedence {
		return precedences.get(this.peekToken.kind) ?? Precedence.LOWEST;
	}

	private currentPrecedence(): Precedence {
		return precedences.get(this.currentToken.kind) ?? Precedence.LOWEST;
	}

	//==========================================================================
	// Diagnostics
	//==========================================================================

	private error(at: Token, message: string): void {
		this._errors.push(String(at.line) + ":" + String(at.column) + ": " + message);
	}

	private expectedError(kind: TokenKind, got: Token): void {
		this.error(
			got,
			"expected next token to be " + kindName(kind) + ", got " + kindName(got.kind) + " instead",
		);
	}

	//==========================================================================
	// Statements
	//==========================================================================

	private parseStatement(): Statement | undefined {
		switch (this.currentToken.kind) {
		case TokenKinds.LET:
			return this.parseLetStatement();
		case TokenKinds.RETURN:
			return this.parseReturnStatement();
		case TokenKinds.IDENT:
			if (this.peekTokenIs(TokenKinds.ASSIGN)) {
				return this.parseAssignStatement();
			}
			return this.parseExpressionStatement();
		default:
			return this.parseExpressionStatement();
		}
	}

	private parseLetStatement(): LetStatement | undefined {
		const tok = this.currentToken;

		if (!this.expectPeek(TokenKinds.IDENT)) {
			return undefined;
		}
		const name = this.parseIdentifier();

		if (!this.expectPeek(TokenKinds.ASSIGN)) {
			return undefined;
		}
		this.nextToken();

		const value = this.parseExpression(Precedence.LOWEST);
		this.skipSemicolon();
		if (!value) {
			return undefined;
		}

		return { kind: "let", token: tok, name, value };
	}

	// `return;`, `return }` and `return<EOF>` carry no value
	private parseReturnStatement(): ReturnStatement | undefined {
		const tok = this.currentToken;

		if (this.peekTokenIs(TokenKinds.SEMICOLON)) {
			this.nextToken();
			return { kind: "return", token: tok };
		}
		if (this.peekTokenIs(TokenKinds.RBRACE) || this.peekTokenIs(TokenKinds.EOF)) {
			return { kind: "return", token: tok };
		}

		this.nextToken();
		const value = this.parseExpression(Precedence.LOWEST);
		this.skipSemicolon();
		if (!value) {
			return undefined;
		}

		return { kind: "return", token: tok, value };
	}

	private parseAssignStatement(): AssignStatement | undefined {
		const name = this.parseIdentifier();
		this.nextToken();
		const tok = this.currentToken;
		this.nextToken();

		const value = this.parseExpression(Precedence.LOWEST);
		this.skipSemicolon();
		if (!value) {
			return undefined;
		}

		return { kind: "assign", token: tok, name, value };
	}

	private parseExpressionStatement(): ExpressionStatement | undefined {
		const tok = this.currentToken;
		const expression = this.parseExpression(Precedence.LOWEST);
		this.skipSemicolon();
		if (!expression) {
			return undefined;
		}

		return { kind: "expression", token: tok, expression };
	}

	private parseBlockStatement(): BlockStatement | undefined {
		const block: BlockStatement = { kind: "block", token: this.currentToken, statements: [] };
		this.nextToken();

		while (!this.currentTokenIs(TokenKinds.RBRACE)) {
			if (this.currentTokenIs(TokenKinds.EOF)) {
				this.expectedError(TokenKinds.RBRACE, this.currentToken);
				return undefined;
			}
			const statement = this.parseStatement();
			if (statement) {
				block.statements.push(statement);
			}
			this.nextToken();
		}

		return block;
	}

	//==========================================================================
	// Expressions
	//==========================================================================

	private parseExpression(precedence: Precedence): Expression | undefined {
		const prefix = this.prefixParseFns.get(this.currentToken.kind);
		if (!prefix) {
			this.error(
				this.currentToken,
				"no prefix parse function for " + kindName(this.currentToken.kind) + " found",
			);
			return undefined;
		}

		let left = prefix();

		while (left && !this.peekTokenIs(TokenKinds.SEMICOLON) && precedence < this.peekPrecedence()) {
			const infix = this.infixParseFns.get(this.peekToken.kind);
			if (!infix) {
				return left;
			}
			this.nextToken();
			left = infix(left);
		}

		return left;
	}

	private parseIdentifier(): Identifier {
		return { kind: "identifier", token: this.currentToken, value: this.currentToken.literal };
	}

	private parseIntegerLiteral(): Expression | undefined {
		const tok = this.currentToken;
		// Decimal only: no leading zeros and nothing past int64
		const value = BigInt(tok.literal);
		if ((tok.literal.length > 1 && tok.literal.startsWith("0")) || value > INT64_MAX) {
			this.error(tok, "could not parse \"" + tok.literal + "\" as integer");
			return undefined;
		}
		return { kind: "integer", token: tok, value };
	}

	private parseStringLiteral(): Expression {
		return { kind: "string", token: this.currentToken, value: this.currentToken.literal };
	}

	private parseBooleanLiteral(): Expression {
		return {
			kind: "boolean",
			token: this.currentToken,
			value: this.currentTokenIs(TokenKinds.TRUE),
		};
	}

	private parseIllegal(): undefined {
		const tok = this.currentToken;
		if (tok.literal.startsWith("\"")) {
			this.error(tok, "unterminated string literal");
		} else {
			this.error(tok, "illegal character \"" + tok.literal + "\"");
		}
		return undefined;
	}

	private parsePrefixExpression(): PrefixExpression | undefined {
		const tok = this.currentToken;
		this.nextToken();

		const right = this.parseExpression(Precedence.PREFIX);
		if (!right) {
			return undefined;
		}

		return { kind: "prefix", token: tok, operator: tok.literal, right };
	}

	private parseInfixExpression(left: Expression): InfixExpression | undefined {
		const tok = this.currentToken;
		const precedence = this.currentPrecedence();
		this.nextToken();

		const right = this.parseExpression(precedence);
		if (!right) {
			return undefined;
		}

		return { kind: "infix", token: tok, operator: tok.literal, left, right };
	}

	private parseGroupedExpression(): Expression | undefined {
		this.nextToken();

		const expression = this.parseExpression(Precedence.LOWEST);
		if (!expression || !this.expectPeek(TokenKinds.RPAREN)) {
			return undefined;
		}

		return expression;
	}

	private parseIfExpression(): IfExpression | undefined {
		const tok = this.currentToken;

		if (!this.expectPeek(TokenKinds.LPAREN)) {
			return undefined;
		}
		this.nextToken();

		const condition = this.parseExpression(Precedence.LOWEST);
		if (!condition || !this.expectPeek(TokenKinds.RPAREN) || !this.expectPeek(TokenKinds.LBRACE)) {
			return undefined;
		}

		const consequence = this.parseBlockStatement();
		if (!consequence) {
			return undefined;
		}

		if (!this.peekTokenIs(TokenKinds.ELSE)) {
			return { kind: "if", token: tok, condition, consequence };
		}

		this.nextToken();
		if (!this.expectPeek(TokenKinds.LBRACE)) {
			return undefined;
		}

		const alternative = this.parseBlockStatement();
		if (!alternative) {
			return undefined;
		}

		return { kind: "if", token: tok, condition, consequence, alternative };
	}

	private parseFunctionLiteral(): FunctionLiteral | undefined {
		const tok = this.currentToken;

		if (!this.expectPeek(TokenKinds.LPAREN)) {
			return undefined;
		}

		const parameters = this.parseFunctionParameters();
		if (!parameters || !this.expectPeek(TokenKinds.LBRACE)) {
			return undefined;
		}

		const body = this.parseBlockStatement();
		if (!body) {
			return undefined;
		}

		return { kind: "function", token: tok, parameters, body };
	}

	private parseFunctionParameters(): Identifier[] | undefined {
		const parameters: Identifier[] = [];

		if (this.peekTokenIs(TokenKinds.RPAREN)) {
			this.nextToken();
			return parameters;
		}

		if (!this.expectPeek(TokenKinds.IDENT)) {
			return undefined;
		}
		parameters.push(this.parseIdentifier());

		while (this.peekTokenIs(TokenKinds.COMMA)) {
			this.nextToken();
			if (!this.expectPeek(TokenKinds.IDENT)) {
				return undefined;
			}
			parameters.push(this.parseIdentifier());
		}

		if (!this.expectPeek(TokenKinds.RPAREN)) {
			return undefined;
		}

		return parameters;
	}

	private parseCallExpression(callee: Expression): CallExpression | undefined {
		const tok = this.currentToken;
		const args = this.parseExpressionList(TokenKinds.RPAREN);
		if (!args) {
			return undefined;
		}
		return { kind: "call", token: tok, callee, args };
	}

	private parseIndexExpression(left: Expression): IndexExpression | undefined {
		const tok = this.currentToken;
		this.nextToken();

		const index = this.parseExpression(Precedence.LOWEST);
		if (!index || !this.expectPeek(TokenKinds.RBRACKET)) {
			return undefined;
		}

		return { kind: "index", token: tok, left, index };
	}

	private parseArrayLiteral(): ArrayLiteral | undefined {
		const tok = this.currentToken;
		const elements = this.parseExpressionList(TokenKinds.RBRACKET);
		if (!elements) {
			return undefined;
		}
		return { kind: "array", token: tok, elements };
	}

	private parseHashLiteral(): HashLiteral | undefined {
		const hash: HashLiteral = { kind: "hash", token: this.currentToken, pairs: [] };

		while (!this.peekTokenIs(TokenKinds.RBRACE)) {
			this.nextToken();
			const key = this.parseExpression(Precedence.LOWEST);
			if (!key || !this.expectPeek(TokenKinds.COLON)) {
				return undefined;
			}

			this.nextToken();
			const value = this.parseExpression(Precedence.LOWEST);
			if (!value) {
				return undefined;
			}
			hash.pairs.push([key, value]);

			if (!this.peekTokenIs(TokenKinds.RBRACE) && !this.expectPeek(TokenKinds.COMMA)) {
				return undefined;
			}
		}

		if (!this.expectPeek(TokenKinds.RBRACE)) {
			return undefined;
		}

		return hash;
	}

	// Comma-separated expressions up to the closing `end` token
	private parseExpressionList(end: TokenKind): Expression[] | undefined {
		const list: Expression[] = [];

		if (this.peekTokenIs(end)) {
			this.nextToken();
			return list;
		}

		this.nextToken();
		const first = this.parseExpression(Precedence.LOWEST);
		if (!first) {
			return undefined;
		}
		list.push(first);

		while (this.peekTokenIs(TokenKinds.COMMA)) {
			this.nextToken();
			this.nextToken();
			const next = this.parseExpression(Precedence.LOWEST);
			if (!next) {
				return undefined;
			}
			list.push(next);
		}

		if (!this.expectPeek(end)) {
			return undefined;
		}

		return list;
	}
}

//==============================================================================
// Entry Point
//==============================================================================

export interface ParseResult {
	program: Program;
	errors: readonly string[];
}

/**
 * Parse source text. A non-empty `errors` list means `program` must not be evaluated.
 */
export function parse(source: string): ParseResult {
	const parser = new Parser(new Lexer(source));
	const program = parser.parseProgram();
	return { program, errors: parser.errors };
}
