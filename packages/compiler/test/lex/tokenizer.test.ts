import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CompilationContext } from '../../src/core/context.ts'
import { LexError } from '../../src/core/errors.ts'
import { type Token, TokenKind } from '../../src/core/tokens.ts'
import { Lexer, Scanner, tokenize } from '../../src/lex/tokenizer.ts'

function lex(source: string): Token[] {
	const ctx = new CompilationContext(source)
	const result = tokenize(ctx)
	assert.strictEqual(result.succeeded, true)
	return Array.from(ctx.tokens, ([, token]) => token).filter((t) => t.kind !== TokenKind.Eof)
}

function texts(source: string): string[] {
	return lex(source).map((t) => t.text)
}

function comment(source: string): string {
	const [token] = lex(source)
	assert.strictEqual(token?.kind, TokenKind.Comment)
	return token.text
}

describe('lex/tokenizer', () => {
	describe('basic tokenization', () => {
		it('should produce only Eof for empty input', () => {
			const ctx = new CompilationContext('')
			assert.strictEqual(tokenize(ctx).succeeded, true)
			assert.strictEqual(ctx.tokens.count(), 1)
			assert.strictEqual([...ctx.tokens][0]?.[1].kind, TokenKind.Eof)
		})

		it('should record kind, line and 0-based column', () => {
			assert.deepStrictEqual(
				lex('struct Point { double x; }').map((t) => [t.kind, t.text, t.line, t.column]),
				[
					[TokenKind.Keyword, 'struct', 1, 0],
					[TokenKind.Identifier, 'Point', 1, 7],
					[TokenKind.Punctuation, '{', 1, 13],
					[TokenKind.Identifier, 'double', 1, 15],
					[TokenKind.Identifier, 'x', 1, 22],
					[TokenKind.Punctuation, ';', 1, 23],
					[TokenKind.Punctuation, '}', 1, 25],
				]
			)
		})

		it('should count lines across newlines', () => {
			const tokens = lex('a\n  b\n\n c')
			assert.deepStrictEqual(
				tokens.map((t) => [t.line, t.column]),
				[
					[1, 0],
					[2, 2],
					[4, 1],
				]
			)
		})

		it('should recognize the four keywords only', () => {
			assert.deepStrictEqual(
				lex('package struct enum const int packages').map((t) => t.kind),
				[
					TokenKind.Keyword,
					TokenKind.Keyword,
					TokenKind.Keyword,
					TokenKind.Keyword,
					TokenKind.Identifier,
					TokenKind.Identifier,
				]
			)
		})

		it('should keep dotted names in one token', () => {
			assert.deepStrictEqual(texts('geo.shapes.Point a'), ['geo.shapes.Point', 'a'])
		})

		it('should keep source offsets of each lexeme', () => {
			const source = '  int32_t count;'
			for (const token of lex(source)) {
				assert.strictEqual(source.slice(token.start, token.end), token.text)
			}
		})
	})

	describe('numbers', () => {
		it('should separate integers from floats', () => {
			assert.deepStrictEqual(
				lex('-12 0x1F 0b101 3.5 1e3 2.5e-3 7').map((t) => [t.kind, t.text]),
				[
					[TokenKind.IntLiteral, '-12'],
					[TokenKind.IntLiteral, '0x1F'],
					[TokenKind.IntLiteral, '0b101'],
					[TokenKind.FloatLiteral, '3.5'],
					[TokenKind.FloatLiteral, '1e3'],
					[TokenKind.FloatLiteral, '2.5e-3'],
					[TokenKind.IntLiteral, '7'],
				]
			)
		})

		it('should not range-check literals', () => {
			assert.deepStrictEqual(texts('99999999999999999999999'), ['99999999999999999999999'])
		})
	})

	describe('punctuation', () => {
		it('should emit single punctuation characters', () => {
			assert.deepStrictEqual(texts('{}[]();,:'), ['{', '}', '[', ']', '(', ')', ';', ',', ':'])
		})

		it('should group operator characters into runs', () => {
			assert.deepStrictEqual(texts('a <<= b != c'), ['a', '<<=', 'b', '!=', 'c'])
		})

		it('should keep a lone slash', () => {
			assert.deepStrictEqual(texts('a / b'), ['a', '/', 'b'])
		})
	})

	describe('strings', () => {
		it('should keep string literals verbatim', () => {
			const tokens = lex('"hi \\" there" x')
			assert.strictEqual(tokens[0]?.kind, TokenKind.StringLiteral)
			assert.strictEqual(tokens[0]?.text, '"hi \\" there"')
			assert.strictEqual(tokens[1]?.text, 'x')
		})

		it('should reject an unterminated string', () => {
			const ctx = new CompilationContext('x "abc')
			tokenize(ctx)
			const error = ctx.firstFailure()
			assert.ok(error instanceof LexError)
			assert.strictEqual(error.code, 'KLEX003')
			assert.deepStrictEqual(error.position, { column: 2, filename: '<input>', line: 1 })
		})
	})

	describe('character literals', () => {
		it('should keep character literals verbatim', () => {
			assert.deepStrictEqual(
				lex("'a' '\\n' x").map((t) => [t.kind, t.text, t.column]),
				[
					[TokenKind.CharLiteral, "'a'", 0],
					[TokenKind.CharLiteral, "'\\n'", 4],
					[TokenKind.Identifier, 'x', 9],
				]
			)
		})

		it('should reject more than one character between the quotes', () => {
			const ctx = new CompilationContext("x 'ab'")
			tokenize(ctx)
			const error = ctx.firstFailure()
			assert.ok(error instanceof LexError)
			assert.strictEqual(error.code, 'KLEX004')
			assert.strictEqual(error.message, 'malformed character literal')
			assert.deepStrictEqual(error.position, { column: 2, filename: '<input>', line: 1 })
		})

		it('should reject a literal cut off by the end of input', () => {
			const ctx = new CompilationContext("'\\")
			tokenize(ctx)
			assert.strictEqual(ctx.firstFailure()?.code, 'KLEX004')
		})
	})

	describe('line comments', () => {
		it('should strip extra slashes and leading spaces', () => {
			assert.strictEqual(comment('/// hello world\nx'), 'hello world')
		})

		it('should keep leading tabs', () => {
			assert.strictEqual(comment('//\tindented'), '\tindented')
		})

		it('should drop a carriage return before the newline', () => {
			assert.strictEqual(comment('// a\r\nx'), 'a')
		})

		it('should allow an empty comment', () => {
			assert.strictEqual(comment('//'), '')
		})

		it('should leave the next line to the following token', () => {
			const tokens = lex('// note\nstruct')
			assert.strictEqual(tokens[1]?.text, 'struct')
			assert.strictEqual(tokens[1]?.line, 2)
		})
	})

	describe('block comments', () => {
		it('should strip asterisk margins and end content lines with a newline', () => {
			assert.strictEqual(comment('/**\n * Hello\n */'), 'Hello\n')
		})

		it('should drop the star of the closing marker on a content line', () => {
			assert.strictEqual(comment('/** Doc */'), 'Doc ')
		})

		it('should keep spaces when no asterisk follows them', () => {
			assert.strictEqual(comment('/* a */'), ' a ')
		})

		it('should keep indentation of lines without a margin', () => {
			assert.strictEqual(
				comment('/*\n  line one\n  line two\n*/'),
				'  line one\n  line two\n'
			)
		})

		it('should produce an empty comment for /**/', () => {
			assert.strictEqual(comment('/**/'), '')
		})

		it('should report positions after a multi-line comment', () => {
			const tokens = lex('/* a\n b */ x')
			assert.strictEqual(tokens[0]?.line, 1)
			assert.strictEqual(tokens[1]?.line, 2)
			assert.strictEqual(tokens[1]?.column, 6)
		})

		it('should reject an unterminated comment', () => {
			const ctx = new CompilationContext('/* abc')
			const result = tokenize(ctx)
			assert.strictEqual(result.succeeded, false)
			assert.strictEqual(ctx.firstFailure()?.code, 'KLEX002')
			assert.strictEqual(ctx.tokens.count(), 1)
		})
	})

	describe('error recovery', () => {
		it('should stop at the first unrecognized character by default', () => {
			const ctx = new CompilationContext('a @ b # c')
			const result = tokenize(ctx)

			assert.strictEqual(result.succeeded, false)
			assert.strictEqual(ctx.getErrorCount(), 1)
			assert.deepStrictEqual(
				Array.from(ctx.tokens, ([, t]) => t.kind),
				[TokenKind.Identifier, TokenKind.Eof]
			)
		})

		it('should report every bad character and keep scanning with recover', () => {
			const ctx = new CompilationContext('a @ b # c')
			const result = tokenize(ctx, { recover: true })

			assert.strictEqual(result.succeeded, false)
			assert.deepStrictEqual(
				ctx.getErrors().map((d) => [d.message, d.column]),
				[
					["unrecognized character '@'", 3],
					["unrecognized character '#'", 7],
				]
			)
			assert.deepStrictEqual(
				Array.from(ctx.tokens, ([, t]) => t.text),
				['a', 'b', 'c', '']
			)
		})

		it('should report a character outside the BMP once', () => {
			const ctx = new CompilationContext('a \u{1F600} b')
			tokenize(ctx, { recover: true })

			assert.deepStrictEqual(
				ctx.getErrors().map((d) => [d.message, d.column]),
				[["unrecognized character '\u{1F600}'", 3]]
			)
			assert.deepStrictEqual(
				Array.from(ctx.tokens, ([, t]) => [t.text, t.column]),
				[
					['a', 0],
					['b', 4],
					['', 5],
				]
			)
		})

		it('should reject a dot that does not continue a name', () => {
			const ctx = new CompilationContext('a.')
			tokenize(ctx)
			const error = ctx.firstFailure()
			assert.ok(error instanceof LexError)
			assert.strictEqual(error.character, '.')
		})
	})

	describe('Scanner', () => {
		it('should step past a bad character before throwing', () => {
			const scanner = new Scanner('$x', 'a.keel')
			assert.throws(
				() => scanner.next(),
				(error: unknown) => error instanceof LexError && error.character === '$'
			)
			assert.strictEqual(scanner.next().text, 'x')
		})

		it('should keep returning Eof at the end', () => {
			const scanner = new Scanner('', 'a.keel')
			assert.strictEqual(scanner.next().kind, TokenKind.Eof)
			assert.strictEqual(scanner.next().kind, TokenKind.Eof)
		})
	})

	describe('Lexer', () => {
		it('should be restartable', () => {
			const lexer = new Lexer('struct A { int8_t a; }')
			const first = [...lexer].map((t) => t.text)
			const second = [...lexer].map((t) => t.text)
			assert.deepStrictEqual(first, second)
			assert.deepStrictEqual(first, ['struct', 'A', '{', 'int8_t', 'a', ';', '}', ''])
		})

		it('should end with a single Eof token', () => {
			const kinds = [...new Lexer('a b')].map((t) => t.kind)
			assert.strictEqual(kinds.filter((k) => k === TokenKind.Eof).length, 1)
			assert.strictEqual(kinds.at(-1), TokenKind.Eof)
		})

		it('should throw LexError from iteration', () => {
			assert.throws(() => [...new Lexer('a ?', 'q.keel')], LexError)
		})

		it('should be lazy', () => {
			const iterator = new Lexer('a ? b')[Symbol.iterator]()
			assert.strictEqual(iterator.next().value?.text, 'a')
		})
	})
})
