// Sloth Lexer
// Converts source text into a lazy sequence of tokens

import { lookupIdent, token, TokenKinds, type Token, type TokenKind } from "./token.js";

const EOF_CHAR = "";

function isLetter(ch: string): boolean {
	return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
}

function isDigit(ch: string): boolean {
	return ch >= "0" && ch <= "9";
}

function isWhitespace(ch: string): boolean {
	return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

const singleCharTokens: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
	["=", TokenKinds.ASSIGN],
	["+", TokenKinds.PLUS],
	["-", TokenKinds.MINUS],
	["!", TokenKinds.BANG],
	["*", TokenKinds.ASTERISK],
	["/", TokenKinds.SLASH],
	["<", TokenKinds.LT],
	[">", TokenKinds.GT],
	[",", TokenKinds.COMMA],
	[";", TokenKinds.SEMICOLON],
	[":", TokenKinds.COLON],
	["(", TokenKinds.LPAREN],
	[")", TokenKinds.RPAREN],
	["{", TokenKinds.LBRACE],
	["}", TokenKinds.RBRACE],
	["[", TokenKinds.LBRACKET],
	["]", TokenKinds.RBRACKET],
]);

//==============================================================================
// Lexer
//==============================================================================

export class Lexer implements Iterable<Token> {
	private readonly input: string;
	private position = 0;
	private readPosition = 0;
	private ch = EOF_CHAR;
	private line = 1;
	private column = 0;

	constructor(input: string) {
		this.input = input;
		this.readChar();
	}

	/**
	 * Return the next token and advance past it.
	 * Once the input is exhausted every call returns EOF.
	 */
	nextToken(): Token {
		this.skipWhitespace();

		const line = this.line;
		const column = this.column;
		const ch = this.ch;

		if (ch === EOF_CHAR) {
			return token(TokenKinds.EOF, "", line, column);
		}

		if (ch === "=" && this.peekChar() === "=") {
			this.readChar();
			this.readChar();
			return token(TokenKinds.EQ, "==", line, column);
		}

		if (ch === "!" && this.peekChar() === "=") {
			this.readChar();
			this.readChar();
			return token(TokenKinds.NOT_EQ, "!=", line, column);
		}

		const single = singleCharTokens.get(ch);
		if (single !== undefined) {
			this.readChar();
			return token(single, ch, line, column);
		}

		if (ch === "\"") {
			return this.readString(line, column);
		}

		if (isLetter(ch)) {
			const ident = this.readWhile(isLetter);
			return token(lookupIdent(ident), ident, line, column);
		}

		if (isDigit(ch)) {
			return token(TokenKinds.INT, this.readWhile(isDigit), line, column);
		}

		return token(TokenKinds.ILLEGAL, this.readCodePoint(), line, column);
	}

	*[Symbol.iterator](): Iterator<Token> {
		for (let tok = this.nextToken(); tok.kind !== TokenKinds.EOF; tok = this.nextToken()) {
			yield tok;
		}
	}

	private readChar(): void {
		if (this.ch === "\n") {
			this.line++;
			this.column = 0;
		}
		this.ch = this.readPosition < this.input.length ? this.input.charAt(this.readPosition) : EOF_CHAR;
		this.position = this.readPosition;
		this.readPosition++;
		this.column++;
	}

	private peekChar(): string {
		return this.readPosition < this.input.length ? this.input.charAt(this.readPosition) : EOF_CHAR;
	}

	// Consume a whole code point, so a surrogate pair stays one character
	private readCodePoint(): string {
		const cp = this.input.codePointAt(this.position) ?? 0;
		const text = String.fromCodePoint(cp);
		for (let i = 0; i < text.length; i++) {
			this.readChar();
		}
		return text;
	}

	private skipWhitespace(): void {
		while (isWhitespace(this.ch)) {
			this.readChar();
		}
	}

	private readWhile(predicate: (ch: string) => boolean): string {
		const start = this.position;
		while (this.ch !== EOF_CHAR && predicate(this.ch)) {
			this.readChar();
		}
		return this.input.slice(start, this.position);
	}

	// Unterminated strings run to end of input and come back as ILLEGAL
	// with the opening quote kept in the literal.
	private readString(line: number, column: number): Token {
		const start = this.position;
		this.readChar();
		while (this.ch !== "\"" && this.ch !== EOF_CHAR) {
			this.readChar();
		}
		if (this.ch === EOF_CHAR) {
			return token(TokenKinds.ILLEGAL, this.input.slice(start), line, column);
		}
		const value = this.input.slice(start + 1, this.position);
		this.readChar();
		return token(TokenKinds.STRING, value, line, column);
	}
}

/**
 * Tokenize a whole source string, including the trailing EOF token.
 */
export function tokenize(input: string): Token[] {
	const lexer = new Lexer(input);
	const tokens = [...lexer];
	tokens.push(lexer.nextToken());
	return tokens;
}
