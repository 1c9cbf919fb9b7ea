import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CompilationContext } from '../../src/core/context.ts'
import type { Token } from '../../src/core/tokens.ts'
import { renderTokens } from '../../src/dump/tokens.ts'
import { tokenize } from '../../src/lex/tokenizer.ts'

function tokensOf(source: string): Token[] {
	const ctx = new CompilationContext(source)
	tokenize(ctx)
	return Array.from(ctx.tokens, ([, token]) => token)
}

describe('dump/tokens', () => {
	it('should print only the header for empty input', () => {
		assert.strictEqual(renderTokens(tokensOf('')), 'tok#   line   col   : token')
	})

	it('should number tokens with line and column', () => {
		assert.strictEqual(
			renderTokens(tokensOf('struct P {\n  int8_t a;\n}')),
			[
				'tok#   line   col   : token',
				'     0      1      0: struct',
				'     1      1      7: P',
				'     2      1      9: {',
				'     3      2      2: int8_t',
				'     4      2      9: a',
				'     5      2     10: ;',
				'     6      3      0: }',
			].join('\n')
		)
	})

	it('should list comments by their text', () => {
		assert.strictEqual(
			renderTokens(tokensOf('/// note\nenum')),
			['tok#   line   col   : token', '     0      1      0: note', '     1      2      0: enum'].join(
				'\n'
			)
		)
	})

	it('should add a kind column on request', () => {
		assert.strictEqual(
			renderTokens(tokensOf('x = 1.5; "s"'), { kinds: true }),
			[
				'tok#   line   col    kind       : token',
				'     0      1      0 identifier : x',
				'     1      1      2 punctuation: =',
				'     2      1      4 float      : 1.5',
				'     3      1      7 punctuation: ;',
				'     4      1      9 string     : "s"',
			].join('\n')
		)
	})
})
