import { type Token, TokenKind, tokenKindName } from '../core/tokens.ts'

export interface RenderTokensOptions {
	/** Insert a kind column before the token text */
	kinds?: boolean
}

const WIDTH = 6
const KIND_WIDTH = 11

/**
 * Token dump: a header, then `number line column: text` per token.
 * The end-of-input token is not listed.
 *
 * ```
 * tok#   line   col   : token
 *      0      1      0: struct
 * ```
 */
export function renderTokens(tokens: Iterable<Token>, options: RenderTokensOptions = {}): string {
	const { kinds = false } = options
	const kindHeader = kinds ? ` ${'kind'.padEnd(KIND_WIDTH)}` : ''
	const lines = [
		`${'tok#'.padEnd(WIDTH)} ${'line'.padEnd(WIDTH)} ${'col'.padEnd(WIDTH)}${kindHeader}: token`,
	]

	let n = 0
	for (const token of tokens) {
		if (token.kind === TokenKind.Eof) continue
		const kind = kinds ? ` ${tokenKindName(token.kind).padEnd(KIND_WIDTH)}` : ''
		lines.push(
			`${String(n).padStart(WIDTH)} ${String(token.line).padStart(WIDTH)} ${String(token.column).padStart(WIDTH)}${kind}: ${token.text}`
		)
		n++
	}

	return lines.join('\n')
}
