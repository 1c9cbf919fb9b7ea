import type { CompilationContext } from '../core/context.ts'
import { LexError } from '../core/errors.ts'
import { type SourcePosition, type Token, TokenKind } from '../core/tokens.ts'

export interface TokenizeResult {
	succeeded: boolean
}

export interface TokenizeOptions {
	/** Report an unrecognized character and keep scanning after it instead of stopping. */
	recover?: boolean
}

export const KEYWORDS: ReadonlySet<string> = new Set(['const', 'enum', 'package', 'struct'])

/** Characters that group into operator runs such as `=` or `<<=`. */
const OPERATOR_CHARS: ReadonlySet<string> = new Set([...'!~<>=&|^%*+'])

/** Errors after which scanning can resume at the next character. */
const RECOVERABLE: ReadonlySet<string> = new Set(['KLEX001', 'KLEX004'])

/** Always a token on their own. */
const PUNCTUATION_CHARS: ReadonlySet<string> = new Set([...'{}[]();,:'])

function isWhitespace(char: string): boolean {
	return /\s/.test(char)
}

function isDigit(char: string | undefined): boolean {
	return char !== undefined && char >= '0' && char <= '9'
}

function isIdentifierStart(char: string | undefined): boolean {
	return char !== undefined && /[A-Za-z_]/.test(char)
}

function isIdentifierPart(char: string | undefined): boolean {
	return char !== undefined && /[A-Za-z0-9_]/.test(char)
}

function isRadixPrefix(char: string | undefined): boolean {
	return char !== undefined && 'xXoObB'.includes(char)
}

/**
 * Character cursor over one file. `next()` produces one token per call and
 * keeps returning the end-of-input token once the source is exhausted.
 *
 * On an unrecognized character `next()` throws a LexError after stepping
 * past it, so the caller decides whether to stop or to continue scanning.
 */
export class Scanner {
	private pos = 0
	private line = 1
	private column = 0

	constructor(
		private readonly source: string,
		private readonly filename: string
	) {}

	next(): Token {
		this.skipWhitespace()

		const start = this.pos
		const position = this.position()
		const char = this.character()

		if (char === undefined) return this.eof()
		if (char === '"') return this.scanString(start, position)
		if (char === "'") return this.scanCharLiteral(start, position)
		if (char === '/') return this.scanSlash(start, position)
		if (OPERATOR_CHARS.has(char)) return this.scanOperatorRun(start, position)
		if (PUNCTUATION_CHARS.has(char)) {
			this.advance()
			return this.makeToken(TokenKind.Punctuation, start, position)
		}
		if (isDigit(char) || (char === '-' && isDigit(this.peek(1)))) {
			return this.scanNumber(start, position)
		}
		if (isIdentifierStart(char)) return this.scanIdentifier(start, position)

		this.advance()
		throw new LexError(position, char)
	}

	/** End-of-input token at the current position. */
	eof(): Token {
		return {
			column: this.column,
			end: this.pos,
			kind: TokenKind.Eof,
			line: this.line,
			start: this.pos,
			text: '',
		}
	}

	// ===========================================================================
	// CURSOR
	// ===========================================================================

	private position(): SourcePosition {
		return { column: this.column, filename: this.filename, line: this.line }
	}

	private peek(offset = 0): string | undefined {
		return this.source[this.pos + offset]
	}

	/** Whole character at the cursor, both halves of a surrogate pair included. */
	private character(): string | undefined {
		const code = this.source.codePointAt(this.pos)
		return code === undefined ? undefined : String.fromCodePoint(code)
	}

	/**
	 * Consume one character and return the code unit after it.
	 * Columns count code points.
	 */
	private advance(): string | undefined {
		const code = this.source.codePointAt(this.pos)
		if (code === undefined) return undefined
		this.pos += code > 0xffff ? 2 : 1
		if (code === 0x0a) {
			this.line++
			this.column = 0
		} else {
			this.column++
		}
		return this.source[this.pos]
	}

	private skipWhitespace(): void {
		let char = this.peek()
		while (char !== undefined && isWhitespace(char)) {
			char = this.advance()
		}
	}

	private makeToken(kind: TokenKind, start: number, position: SourcePosition): Token {
		return {
			column: position.column,
			end: this.pos,
			kind,
			line: position.line,
			start,
			text: this.source.slice(start, this.pos),
		}
	}

	// ===========================================================================
	// TOKEN RULES
	// ===========================================================================

	private scanOperatorRun(start: number, position: SourcePosition): Token {
		let char = this.peek()
		while (char !== undefined && OPERATOR_CHARS.has(char)) {
			char = this.advance()
		}
		return this.makeToken(TokenKind.Punctuation, start, position)
	}

	private scanIdentifier(start: number, position: SourcePosition): Token {
		let char = this.peek()
		for (;;) {
			while (isIdentifierPart(char)) char = this.advance()
			// Dotted names stay one token: `geometry.shapes.Point`
			if (char !== '.' || !isIdentifierStart(this.peek(1))) break
			char = this.advance()
		}
		const token = this.makeToken(TokenKind.Identifier, start, position)
		return KEYWORDS.has(token.text) ? { ...token, kind: TokenKind.Keyword } : token
	}

	private scanNumber(start: number, position: SourcePosition): Token {
		let char = this.peek()
		if (char === '-') char = this.advance()

		if (char === '0' && isRadixPrefix(this.peek(1))) {
			this.advance()
			char = this.advance()
			while (isIdentifierPart(char)) char = this.advance()
			return this.makeToken(TokenKind.IntLiteral, start, position)
		}

		let kind: TokenKind = TokenKind.IntLiteral
		while (isDigit(char)) char = this.advance()
		if (char === '.') {
			kind = TokenKind.FloatLiteral
			char = this.advance()
			while (isDigit(char)) char = this.advance()
		}
		const signed = this.peek(1) === '+' || this.peek(1) === '-'
		if ((char === 'e' || char === 'E') && isDigit(this.peek(signed ? 2 : 1))) {
			kind = TokenKind.FloatLiteral
			this.advance()
			char = signed ? this.advance() : this.peek()
			while (isDigit(char)) char = this.advance()
		}
		return this.makeToken(kind, start, position)
	}

	private scanString(start: number, position: SourcePosition): Token {
		let char = this.advance()
		while (char !== '"') {
			if (char === undefined) throw new LexError(position, '"', 'KLEX003')
			if (char === '\\') this.advance()
			char = this.advance()
		}
		this.advance()
		return this.makeToken(TokenKind.StringLiteral, start, position)
	}

	/** `'c'` or `'\\c'`: exactly one character between single quotes. */
	private scanCharLiteral(start: number, position: SourcePosition): Token {
		let char = this.advance()
		if (char === '\\') char = this.advance()
		if (char === undefined) throw new LexError(position, "'", 'KLEX004')
		if (this.advance() !== "'") throw new LexError(position, "'", 'KLEX004')
		this.advance()
		return this.makeToken(TokenKind.CharLiteral, start, position)
	}

	private scanSlash(start: number, position: SourcePosition): Token {
		const char = this.advance()
		if (char === '*') {
			this.advance()
			return this.scanBlockComment(start, position)
		}
		if (char === '/') return this.scanLineComment(start, position)
		return this.makeToken(TokenKind.Punctuation, start, position)
	}

	/**
	 * `// text`: extra leading slashes and the spaces after them are not part of the text.
	 */
	private scanLineComment(start: number, position: SourcePosition): Token {
		let char = this.advance()
		while (char === '/') char = this.advance()
		while (char === ' ') char = this.advance()

		const bodyStart = this.pos
		while (char !== undefined && char !== '\n') char = this.advance()
		const text = this.source.slice(bodyStart, this.pos).replace(/\r$/, '')

		return { ...this.makeToken(TokenKind.Comment, start, position), text }
	}

	/**
	 * Block comment, processed line by line:
	 * - leading whitespace followed by asterisks (and one space after them) is dropped
	 * - a line that contributed text ends with a newline
	 * - the closing `*` of `*` `/` is dropped
	 */
	private scanBlockComment(start: number, position: SourcePosition): Token {
		let text = ''
		let char = this.peek()
		let finished = false

		while (!finished) {
			const lineStart = text.length

			while (char === ' ' || char === '\t') {
				text += char
				char = this.advance()
			}

			let gotAsterisk = false
			while (char === '*') {
				text += char
				gotAsterisk = true
				char = this.advance()
			}

			if (gotAsterisk) {
				text = text.slice(0, lineStart)
				if (char === '/') {
					this.advance()
					break
				}
				if (char === ' ') char = this.advance()
			}

			while (char !== undefined && char !== '\n') {
				const last = char
				if (char !== '\r') text += char
				char = this.advance()
				if (last === '*' && char === '/') {
					this.advance()
					text = text.slice(0, -1)
					finished = true
					break
				}
			}

			if (finished) break
			if (char === undefined) throw new LexError(position, '/', 'KLEX002')
			if (text.length !== lineStart) text += '\n'
			char = this.advance()
		}

		return { ...this.makeToken(TokenKind.Comment, start, position), text }
	}
}

/**
 * Lazy, restartable token sequence of one file.
 * Every iteration scans from the start and ends with a single Eof token.
 *
 * @throws {LexError} On the first unrecognized character
 */
export class Lexer implements Iterable<Token> {
	constructor(
		readonly source: string,
		readonly filename = '<input>'
	) {}

	*[Symbol.iterator](): Generator<Token> {
		const scanner = new Scanner(this.source, this.filename)
		for (;;) {
			const token = scanner.next()
			yield token
			if (token.kind === TokenKind.Eof) return
		}
	}
}

/**
 * Tokenizes source code, populating context.tokens.
 * The store always ends with an Eof token, even after an error.
 */
export function tokenize(
	context: CompilationContext,
	options: TokenizeOptions = {}
): TokenizeResult {
	const { recover = false } = options
	const scanner = new Scanner(context.source, context.filename)

	for (;;) {
		let token: Token
		try {
			token = scanner.next()
		} catch (error: unknown) {
			if (!(error instanceof LexError)) throw error
			context.report(error)
			// Unterminated comments and strings run to the end of input; nothing is left to scan.
			if (recover && RECOVERABLE.has(error.code)) continue
			context.tokens.add(scanner.eof())
			break
		}
		context.tokens.add(token)
		if (token.kind === TokenKind.Eof) break
	}

	return { succeeded: !context.hasErrors() }
}
