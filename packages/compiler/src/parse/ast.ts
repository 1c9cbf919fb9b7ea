/**
 * Per-file syntax tree produced by the parser.
 * Type references are still unresolved names; the resolver binds them.
 */

import type { SourcePosition } from '../core/tokens.ts'

// =============================================================================
// PRIMITIVES
// =============================================================================

export const PRIMITIVE_TYPES = [
	'int8_t',
	'int16_t',
	'int32_t',
	'int64_t',
	'byte',
	'float',
	'double',
	'string',
	'boolean',
] as const

export type PrimitiveType = (typeof PRIMITIVE_TYPES)[number]

/** Types a named array dimension may refer to. */
export const INTEGER_TYPES = ['int8_t', 'int16_t', 'int32_t', 'int64_t'] as const

export type IntegerType = (typeof INTEGER_TYPES)[number]

export const CONST_TYPES = [...INTEGER_TYPES, 'float', 'double'] as const

export type ConstType = (typeof CONST_TYPES)[number]

export const INTEGER_BOUNDS: Record<IntegerType, { readonly min: bigint; readonly max: bigint }> = {
	int8_t: { max: 127n, min: -128n },
	int16_t: { max: 32767n, min: -32768n },
	int32_t: { max: 2147483647n, min: -2147483648n },
	int64_t: { max: 9223372036854775807n, min: -9223372036854775808n },
}

const PRIMITIVE_SET: ReadonlySet<string> = new Set(PRIMITIVE_TYPES)
const INTEGER_SET: ReadonlySet<string> = new Set(INTEGER_TYPES)
const CONST_SET: ReadonlySet<string> = new Set(CONST_TYPES)

export function isPrimitiveType(name: string): name is PrimitiveType {
	return PRIMITIVE_SET.has(name)
}

export function isIntegerType(name: string): name is IntegerType {
	return INTEGER_SET.has(name)
}

export function isConstType(name: string): name is ConstType {
	return CONST_SET.has(name)
}

// =============================================================================
// REFERENCES
// =============================================================================

export type TypeRef =
	| { readonly kind: 'primitive'; readonly name: PrimitiveType }
	| {
			readonly kind: 'unresolved'
			/** The name as written */
			readonly name: string
			/** Package-qualified name to look up first */
			readonly qualifiedName: string
			readonly position: SourcePosition
	  }

export type DimensionSpec =
	| { readonly kind: 'constant'; readonly size: bigint; readonly position: SourcePosition }
	| { readonly kind: 'named'; readonly name: string; readonly position: SourcePosition }

// =============================================================================
// DECLARATIONS
// =============================================================================

export interface FieldDecl {
	readonly name: string
	readonly type: TypeRef
	readonly dimensions: readonly DimensionSpec[]
	readonly comment: string | null
	/** Position among the struct's fields and constants */
	readonly order: number
	readonly position: SourcePosition
}

export interface ConstantDecl {
	readonly name: string
	readonly type: ConstType
	/** Literal as written */
	readonly text: string
	/** Integer constants as bigint, float and double as number */
	readonly value: bigint | number
	readonly comment: string | null
	readonly order: number
	readonly position: SourcePosition
}

export interface EnumValueDecl {
	readonly name: string
	readonly ordinal: number
	/** False when the ordinal was assigned from the previous value */
	readonly explicit: boolean
	readonly comment: string | null
	readonly position: SourcePosition
}

interface DeclBase {
	/** Unqualified name */
	readonly name: string
	readonly package: string
	/** `package.name`, or `name` in the root package */
	readonly qualifiedName: string
	readonly comment: string | null
	readonly position: SourcePosition
}

export interface StructDecl extends DeclBase {
	readonly kind: 'struct'
	/** Comment preceding the `package` statement, given to the first struct after it */
	readonly fileComment: string | null
	readonly fields: readonly FieldDecl[]
	readonly constants: readonly ConstantDecl[]
}

export interface EnumDecl extends DeclBase {
	readonly kind: 'enum'
	readonly values: readonly EnumValueDecl[]
}

export type TypeDecl = StructDecl | EnumDecl

export interface PackageDecl {
	/** Dotted name; `''` for declarations before any `package` statement */
	readonly name: string
	readonly comment: string | null
	/** Null for the implicit root package */
	readonly position: SourcePosition | null
	readonly declarations: readonly TypeDecl[]
}

export interface SchemaFile {
	readonly filename: string
	readonly packages: readonly PackageDecl[]
}

/** All declarations of a file in source order. */
export function declarationsOf(file: SchemaFile): TypeDecl[] {
	return file.packages.flatMap((pkg) => [...pkg.declarations])
}

export function qualify(pkg: string, name: string): string {
	return pkg === '' ? name : `${pkg}.${name}`
}
