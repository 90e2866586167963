// Sloth Tokens
// Token kinds and the keyword table shared by the lexer and parser

//==============================================================================
// Token Kinds
//==============================================================================

export const TokenKinds = {
	ILLEGAL: "ILLEGAL",
	EOF: "EOF",

	// Identifiers and literals
	IDENT: "IDENT",
	INT: "INT",
	STRING: "STRING",

	// Operators
	ASSIGN: "=",
	PLUS: "+",
	MINUS: "-",
	BANG: "!",
	ASTERISK: "*",
	SLASH: "/",
	LT: "<",
	GT: ">",
	EQ: "==",
	NOT_EQ: "!=",

	// Delimiters
	COMMA: ",",
	SEMICOLON: ";",
	COLON: ":",
	LPAREN: "(",
	RPAREN: ")",
	LBRACE: "{",
	RBRACE: "}",
	LBRACKET: "[",
	RBRACKET: "]",

	// Keywords
	FUNCTION: "FUNCTION",
	LET: "LET",
	TRUE: "TRUE",
	FALSE: "FALSE",
	IF: "IF",
	ELSE: "ELSE",
	RETURN: "RETURN",
} as const;

export type TokenKind = (typeof TokenKinds)[keyof typeof TokenKinds];

//==============================================================================
// Token
//==============================================================================

export interface Token {
	readonly kind: TokenKind;
	readonly literal: string;
	readonly line: number;
	readonly column: number;
}

export const token = (
	kind: TokenKind,
	literal: string,
	line = 1,
	column = 1,
): Token => Object.freeze({ kind, literal, line, column });

//==============================================================================
// Keywords
//==============================================================================

const keywords: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
	["fn", TokenKinds.FUNCTION],
	["let", TokenKinds.LET],
	["true", TokenKinds.TRUE],
	["false", TokenKinds.FALSE],
	["if", TokenKinds.IF],
	["else", TokenKinds.ELSE],
	["return", TokenKinds.RETURN],
]);

/**
 * Classify an identifier as a keyword or a plain identifier.
 */
export function lookupIdent(ident: string): TokenKind {
	return keywords.get(ident) ?? TokenKinds.IDENT;
}

/**
 * Human-readable name of a token kind, used in parser diagnostics.
 */
export function kindName(kind: TokenKind): string {
	for (const [name, value] of Object.entries(TokenKinds)) {
		if (value === kind) return name;
	}
	return kind;
}
