import type { CompilationContext } from '../core/context.ts'
import { ParseError, SemanticError } from '../core/errors.ts'
import { type SourcePosition, type Token, TokenKind, tokenId } from '../core/tokens.ts'
import {
	type ConstantDecl,
	type ConstType,
	type DimensionSpec,
	type EnumDecl,
	type EnumValueDecl,
	type FieldDecl,
	INTEGER_BOUNDS,
	isConstType,
	isIntegerType,
	isPrimitiveType,
	qualify,
	type SchemaFile,
	type StructDecl,
	type TypeDecl,
	type TypeRef,
} from './ast.ts'

export interface ParseOptions {
	/** Prepended to the package of every declared type and every non-primitive reference */
	packagePrefix?: string
}

const INT32 = INTEGER_BOUNDS.int32_t

const FLOAT_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$|^[-+]?(inf|infinity|nan)$/i

/**
 * Integer literal with an optional sign: decimal without leading zeros,
 * or `0x`/`0o`/`0b` prefixed, with single underscores between digits.
 * Returns null when the text is not an integer.
 */
export function parseIntegerLiteral(text: string): bigint | null {
	const match = /^([-+]?)(.*)$/s.exec(text)
	const sign = match?.[1] ?? ''
	const body = match?.[2] ?? ''

	let value: bigint
	if (/^0[xX](_?[0-9a-fA-F])+$/.test(body)) {
		value = BigInt(`0x${body.slice(2).replaceAll('_', '')}`)
	} else if (/^0[oO](_?[0-7])+$/.test(body)) {
		value = BigInt(`0o${body.slice(2).replaceAll('_', '')}`)
	} else if (/^0[bB](_?[01])+$/.test(body)) {
		value = BigInt(`0b${body.slice(2).replaceAll('_', '')}`)
	} else if (/^[1-9](_?\d)*$/.test(body) || /^0(_?0)*$/.test(body)) {
		value = BigInt(body.replaceAll('_', ''))
	} else {
		return null
	}
	return sign === '-' ? -value : value
}

/** Mutable while its declarations are parsed. */
interface PackageBuilder {
	name: string
	comment: string | null
	position: SourcePosition | null
	declarations: TypeDecl[]
}

/**
 * Recursive-descent parser over one file's token store.
 * Comment tokens are collected at declaration starts and skipped everywhere else.
 */
class Parser {
	private pos = 0
	private readonly prefix: string

	constructor(
		private readonly context: CompilationContext,
		options: ParseOptions
	) {
		this.prefix = options.packagePrefix ?? ''
	}

	parseFile(): SchemaFile {
		const packages: PackageBuilder[] = []
		let current: PackageBuilder = {
			comment: null,
			declarations: [],
			name: this.packageName(''),
			position: null,
		}
		let fileComment: string | null = null

		for (;;) {
			const comment = this.leadingComment()
			const token = this.peek()
			if (token.kind === TokenKind.Eof) break

			if (this.isKeyword(token, 'package')) {
				this.advance()
				const nameToken = this.expectName('package name', { dotted: true })
				this.expect(';')
				if (current.position !== null || current.declarations.length > 0) packages.push(current)
				current = {
					comment,
					declarations: [],
					name: this.packageName(nameToken.text),
					position: this.positionOf(nameToken),
				}
				fileComment = comment
			} else if (this.isKeyword(token, 'struct')) {
				this.advance()
				current.declarations.push(this.parseStruct(current.name, comment, fileComment))
				fileComment = null
			} else if (this.isKeyword(token, 'enum')) {
				this.advance()
				current.declarations.push(this.parseEnum(current.name, comment))
			} else {
				throw this.unexpected("'package', 'struct' or 'enum'")
			}
		}

		if (current.position !== null || current.declarations.length > 0) packages.push(current)
		return { filename: this.context.filename, packages }
	}

	// ===========================================================================
	// STRUCTS
	// ===========================================================================

	private parseStruct(pkg: string, comment: string | null, fileComment: string | null): StructDecl {
		const nameToken = this.expectName('struct name')
		const qualifiedName = qualify(pkg, nameToken.text)
		this.expect('{')

		const fields: FieldDecl[] = []
		const constants: ConstantDecl[] = []
		const members = new Set<string>()
		const claim = (token: Token): void => {
			if (members.has(token.text)) {
				throw new SemanticError('KPARSE002', this.positionOf(token), {
					name: token.text,
					struct: qualifiedName,
				})
			}
			members.add(token.text)
		}

		for (;;) {
			const memberComment = this.leadingComment()
			if (this.accept('}')) break

			const token = this.peek()
			if (this.isKeyword(token, 'struct') || this.isKeyword(token, 'enum')) {
				throw new SemanticError('KPARSE007', this.positionOf(token), { keyword: token.text })
			}
			const order = fields.length + constants.length
			if (this.isKeyword(token, 'const')) {
				this.advance()
				constants.push(...this.parseConstants(memberComment, order, claim))
			} else {
				fields.push(...this.parseFields(pkg, memberComment, order, claim))
			}
		}

		return {
			comment,
			constants,
			fields,
			fileComment,
			kind: 'struct',
			name: nameToken.text,
			package: pkg,
			position: this.positionOf(nameToken),
			qualifiedName,
		}
	}

	/** `type a, b[4], c[n];` */
	private parseFields(
		pkg: string,
		comment: string | null,
		order: number,
		claim: (token: Token) => void
	): FieldDecl[] {
		const typeToken = this.expectName('type identifier', { dotted: true })
		if (typeToken.text === 'int') {
			this.context.emit('KPARSE050', this.positionOf(typeToken))
		}
		const type = this.typeRef(pkg, typeToken)

		const fields: FieldDecl[] = []
		do {
			const nameToken = this.expectName('name identifier')
			claim(nameToken)
			fields.push({
				comment: fields.length === 0 ? comment : null,
				dimensions: this.parseDimensions(),
				name: nameToken.text,
				order: order + fields.length,
				position: this.positionOf(nameToken),
				type,
			})
		} while (this.accept(','))
		this.expect(';')

		return fields
	}

	private parseDimensions(): DimensionSpec[] {
		const dimensions: DimensionSpec[] = []
		while (this.accept('[')) {
			const token = this.peek()
			const position = this.positionOf(token)

			if (token.kind === TokenKind.IntLiteral) {
				this.advance()
				const size = parseIntegerLiteral(token.text)
				if (size === null) {
					throw new SemanticError('KPARSE005', position, { kind: 'integer', value: token.text })
				}
				if (size <= 0n) throw new SemanticError('KPARSE006', position)
				dimensions.push({ kind: 'constant', position, size })
			} else if (token.kind === TokenKind.Identifier && !token.text.includes('.')) {
				this.advance()
				dimensions.push({ kind: 'named', name: token.text, position })
			} else {
				throw this.unexpected('array size')
			}

			this.expect(']')
		}
		return dimensions
	}

	/** `const type A = 1, B = 2;` with the `const` keyword already consumed. */
	private parseConstants(
		comment: string | null,
		order: number,
		claim: (token: Token) => void
	): ConstantDecl[] {
		const typeToken = this.expectName('type identifier')
		const type = typeToken.text
		if (!isConstType(type)) {
			throw new SemanticError('KPARSE003', this.positionOf(typeToken), { type })
		}

		const constants: ConstantDecl[] = []
		do {
			const nameToken = this.expectName('name identifier')
			claim(nameToken)
			this.expect('=')
			const valueToken = this.peek()
			if (valueToken.kind === TokenKind.Eof) throw this.unexpected('constant value')
			this.advance()

			constants.push({
				comment: constants.length === 0 ? comment : null,
				name: nameToken.text,
				order: order + constants.length,
				position: this.positionOf(nameToken),
				text: valueToken.text,
				type,
				value: this.constantValue(type, valueToken),
			})
		} while (this.accept(','))
		this.expect(';')

		return constants
	}

	private constantValue(type: ConstType, token: Token): bigint | number {
		const position = this.positionOf(token)
		if (!isIntegerType(type)) {
			if (token.kind === TokenKind.StringLiteral || !FLOAT_PATTERN.test(token.text)) {
				throw new SemanticError('KPARSE005', position, { kind: 'floating point', value: token.text })
			}
			return Number.parseFloat(token.text)
		}

		const value = parseIntegerLiteral(token.text)
		if (value === null) {
			throw new SemanticError('KPARSE005', position, { kind: 'integer', value: token.text })
		}
		const bounds = INTEGER_BOUNDS[type]
		if (value < bounds.min || value > bounds.max) {
			throw new SemanticError('KPARSE004', position, { type, value: token.text })
		}
		return value
	}

	// ===========================================================================
	// ENUMS
	// ===========================================================================

	/** `enum Name { A, B = 5, C }` with an optional trailing comma. */
	private parseEnum(pkg: string, comment: string | null): EnumDecl {
		const nameToken = this.expectName('enum name')
		const qualifiedName = qualify(pkg, nameToken.text)
		this.expect('{')

		const values: EnumValueDecl[] = []
		const byOrdinal = new Map<number, string>()
		let next = 0n

		for (;;) {
			const valueComment = this.leadingComment()
			if (this.accept('}')) break

			const valueToken = this.expectName('enum value name')
			const name = valueToken.text
			const position = this.positionOf(valueToken)
			if (values.some((value) => value.name === name)) {
				throw new SemanticError('KPARSE008', position, { enum: qualifiedName, name })
			}

			const explicit = this.accept('=')
			const ordinal = explicit ? this.explicitOrdinal() : next
			if (ordinal < INT32.min || ordinal > INT32.max) {
				throw new SemanticError('KPARSE010', position, { name, ordinal })
			}
			const other = byOrdinal.get(Number(ordinal))
			if (other !== undefined) {
				throw new SemanticError('KPARSE009', position, {
					enum: qualifiedName,
					name,
					ordinal,
					other,
				})
			}
			byOrdinal.set(Number(ordinal), name)
			values.push({ comment: valueComment, explicit, name, ordinal: Number(ordinal), position })
			next = ordinal + 1n

			if (this.accept(',')) continue
			this.expect('}')
			break
		}

		return {
			comment,
			kind: 'enum',
			name: nameToken.text,
			package: pkg,
			position: this.positionOf(nameToken),
			qualifiedName,
			values,
		}
	}

	private explicitOrdinal(): bigint {
		const token = this.peek()
		if (token.kind !== TokenKind.IntLiteral) throw this.unexpected('integer')
		this.advance()
		const ordinal = parseIntegerLiteral(token.text)
		if (ordinal === null) {
			throw new SemanticError('KPARSE005', this.positionOf(token), {
				kind: 'integer',
				value: token.text,
			})
		}
		return ordinal
	}

	// ===========================================================================
	// NAMES
	// ===========================================================================

	private packageName(written: string): string {
		if (this.prefix === '') return written
		return written === '' ? this.prefix : `${this.prefix}.${written}`
	}

	private typeRef(pkg: string, token: Token): TypeRef {
		const name = token.text
		if (isPrimitiveType(name)) return { kind: 'primitive', name }
		const qualifiedName = name.includes('.') ? this.packageName(name) : qualify(pkg, name)
		return { kind: 'unresolved', name, position: this.positionOf(token), qualifiedName }
	}

	// ===========================================================================
	// TOKEN CURSOR
	// ===========================================================================

	/** Join the comments at the cursor with newlines and step past them. */
	private leadingComment(): string | null {
		const lines: string[] = []
		for (;;) {
			const token = this.current()
			if (token.kind !== TokenKind.Comment) break
			lines.push(token.text)
			this.pos++
		}
		return lines.length > 0 ? lines.join('\n') : null
	}

	private current(): Token {
		return this.context.tokens.get(tokenId(this.pos))
	}

	/** Next non-comment token. */
	private peek(): Token {
		while (this.current().kind === TokenKind.Comment) this.pos++
		return this.current()
	}

	private advance(): Token {
		const token = this.peek()
		if (token.kind !== TokenKind.Eof) this.pos++
		return token
	}

	private isKeyword(token: Token, keyword: string): boolean {
		return token.kind === TokenKind.Keyword && token.text === keyword
	}

	private isPunctuation(token: Token, text: string): boolean {
		return token.kind === TokenKind.Punctuation && token.text === text
	}

	private accept(text: string): boolean {
		if (!this.isPunctuation(this.peek(), text)) return false
		this.advance()
		return true
	}

	private expect(text: string): Token {
		if (!this.isPunctuation(this.peek(), text)) throw this.unexpected(`'${text}'`)
		return this.advance()
	}

	private expectName(expected: string, options: { dotted?: boolean } = {}): Token {
		const token = this.peek()
		if (token.kind !== TokenKind.Identifier || (!options.dotted && token.text.includes('.'))) {
			throw this.unexpected(expected)
		}
		return this.advance()
	}

	private unexpected(expected: string): ParseError {
		const token = this.peek()
		const found = token.kind === TokenKind.Eof ? 'end of file' : `'${token.text}'`
		return new ParseError(this.positionOf(token), expected, found)
	}

	private positionOf(token: Token): SourcePosition {
		return { column: token.column, filename: this.context.filename, line: token.line }
	}
}

/**
 * Parse the tokens of context into a SchemaFile and store it on the context.
 * Warnings are recorded on the context.
 *
 * @throws {ParseError} On the first token that does not fit the grammar
 * @throws {SemanticError} On a well-formed but illegal declaration
 */
export function parse(context: CompilationContext, options: ParseOptions = {}): SchemaFile {
	const file = new Parser(context, options).parseFile()
	context.file = file
	return file
}
