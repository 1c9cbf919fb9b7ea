/**
 * Token storage using dense arrays with integer IDs.
 * Tokens are produced once by the lexer and never mutated.
 */

/** Token kinds - small integer discriminant. */
export const TokenKind = {
	// Literals (100-199)
	CharLiteral: 104,
	// Comments (0-9)
	Comment: 0,

	// Special (255)
	Eof: 255,
	FloatLiteral: 102,

	// Names (10-99)
	Identifier: 10,
	IntLiteral: 101,
	Keyword: 11,

	// Punctuation and operator runs (200-249)
	Punctuation: 200,
	StringLiteral: 103,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

const TOKEN_KIND_NAMES: Record<TokenKind, string> = {
	[TokenKind.CharLiteral]: 'char',
	[TokenKind.Comment]: 'comment',
	[TokenKind.Eof]: 'eof',
	[TokenKind.FloatLiteral]: 'float',
	[TokenKind.Identifier]: 'identifier',
	[TokenKind.IntLiteral]: 'integer',
	[TokenKind.Keyword]: 'keyword',
	[TokenKind.Punctuation]: 'punctuation',
	[TokenKind.StringLiteral]: 'string',
}

export function tokenKindName(kind: TokenKind): string {
	return TOKEN_KIND_NAMES[kind]
}

export type TokenId = number & { readonly __brand: 'TokenId' }

export function tokenId(n: number): TokenId {
	return n as TokenId
}

/**
 * A location in a schema file.
 * Lines are 1-indexed; columns are 0-indexed, the way the token dump prints them.
 */
export interface SourcePosition {
	readonly filename: string
	readonly line: number
	readonly column: number
}

/**
 * A single token.
 *
 * For comments, `text` is the comment body with the comment markers removed;
 * for every other kind it is the exact lexeme, `source.slice(start, end)`.
 */
export interface Token {
	readonly kind: TokenKind
	readonly text: string
	readonly line: number
	readonly column: number
	/** Source offset of the first character */
	readonly start: number
	/** Source offset one past the last character */
	readonly end: number
}

/**
 * Dense array storage for tokens.
 * Append-only during tokenization phase.
 */
export class TokenStore {
	private readonly tokens: Token[] = []

	add(token: Token): TokenId {
		const id = this.tokens.length as TokenId
		this.tokens.push(token)
		return id
	}

	get(id: TokenId): Token {
		const token = this.tokens[id]
		if (token === undefined) {
			throw new Error(`Invalid TokenId: ${id}`)
		}
		return token
	}

	count(): number {
		return this.tokens.length
	}

	isValid(id: TokenId): boolean {
		return id >= 0 && id < this.tokens.length
	}

	*[Symbol.iterator](): Generator<[TokenId, Token]> {
		for (let i = 0; i < this.tokens.length; i++) {
			const token = this.tokens[i]
			if (token !== undefined) yield [i as TokenId, token]
		}
	}

	/** Returns tokens in range [start, end). */
	slice(start: TokenId, end: TokenId): Token[] {
		return this.tokens.slice(start, end)
	}
}
