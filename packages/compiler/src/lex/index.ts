/**
 * Lexical analysis module.
 * Turns schema source into a flat sequence of tokens, comments included.
 */

export {
	KEYWORDS,
	Lexer,
	Scanner,
	type TokenizeOptions,
	type TokenizeResult,
	tokenize,
} from './tokenizer.ts'
