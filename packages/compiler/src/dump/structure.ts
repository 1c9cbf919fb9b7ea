import { formatHash } from '../hash/fingerprint.ts'
import {
	type ConstantDecl,
	type DimensionSpec,
	declarationsOf,
	type EnumValueDecl,
	type FieldDecl,
	type SchemaFile,
	type StructDecl,
	type TypeDecl,
	type TypeRef,
} from '../parse/ast.ts'
import {
	DimensionMode,
	type ResolvedDecl,
	type ResolvedDimension,
	type ResolvedField,
	type ResolvedTypeRef,
	type ResolvedUnit,
} from '../resolve/unit.ts'

const TYPE_WIDTH = 20

interface MemberLines {
	order: number
	lines: string[]
}

function commentLines(comment: string | null, indent: string): string[] {
	if (comment === null) return []
	return comment
		.replace(/\n$/, '')
		.split('\n')
		.map((line) => (line === '' ? `${indent}//` : `${indent}// ${line}`))
}

function hashText(hash: bigint | null): string {
	return hash === null ? 'unavailable' : formatHash(hash)
}

const constDimension = (text: string): string => ` [ (const) ${text} ]`
const varDimension = (field: string): string => ` [ (var) ${field} ]`

function memberLine(
	comment: string | null,
	type: string,
	name: string,
	dimensions: readonly string[]
): string[] {
	return [...commentLines(comment, '\t'), `\t${type.padEnd(TYPE_WIDTH)}  ${name}${dimensions.join('')}`]
}

function constantLines(constant: ConstantDecl): MemberLines {
	return {
		lines: memberLine(constant.comment, `const ${constant.type}`, `${constant.name} = ${constant.text}`, []),
		order: constant.order,
	}
}

function structLines(
	qualifiedName: string,
	hash: bigint | null,
	fields: readonly MemberLines[],
	constants: readonly ConstantDecl[]
): string[] {
	const members = [...fields, ...constants.map(constantLines)].sort((a, b) => a.order - b.order)
	return [`struct ${qualifiedName} [hash=${hashText(hash)}]`, ...members.flatMap((member) => member.lines)]
}

function enumLines(qualifiedName: string, hash: bigint | null, values: readonly EnumValueDecl[]): string[] {
	return [
		`enum ${qualifiedName} [hash=${hashText(hash)}]`,
		...values.flatMap((value) => [...commentLines(value.comment, '\t'), `\t${value.name} = ${value.ordinal}`]),
	]
}

// =============================================================================
// RESOLVED UNIT
// =============================================================================

function resolvedTypeName(type: ResolvedTypeRef): string {
	return type.kind === 'primitive' ? type.name : type.qualifiedName
}

function resolvedDimension(dim: ResolvedDimension): string {
	return dim.mode === DimensionMode.Constant ? constDimension(dim.text) : varDimension(dim.field)
}

function resolvedField(field: ResolvedField): MemberLines {
	return {
		lines: memberLine(
			field.comment,
			resolvedTypeName(field.type),
			field.name,
			field.dimensions.map(resolvedDimension)
		),
		order: field.order,
	}
}

function resolvedDecl(decl: ResolvedDecl): string[] {
	const body =
		decl.kind === 'struct'
			? structLines(decl.qualifiedName, decl.hash, decl.fields.map(resolvedField), decl.constants)
			: enumLines(decl.qualifiedName, decl.hash, decl.values)
	return [...commentLines(decl.comment, ''), ...body]
}

/**
 * Structural dump of a unit, one block per declaration in unit order:
 *
 * ```
 * // A point
 * struct geo.Point [hash=0x168e98f8b460a204]
 * 	double                x
 * 	double                y
 * ```
 */
export function renderUnit(unit: ResolvedUnit): string {
	const lines: string[] = []
	for (const [, decl] of unit) {
		lines.push(...resolvedDecl(decl))
	}
	return lines.join('\n')
}

// =============================================================================
// SYNTAX TREES
// =============================================================================

function parsedTypeName(type: TypeRef): string {
	return type.kind === 'primitive' ? type.name : type.qualifiedName
}

/** A named size is a constant when an earlier constant of the struct carries the name. */
function parsedDimension(dim: DimensionSpec, field: FieldDecl, struct: StructDecl): string {
	if (dim.kind === 'constant') return constDimension(String(dim.size))
	const { name } = dim
	const constant = struct.constants.find((c) => c.name === name && c.order < field.order)
	return constant === undefined ? varDimension(name) : constDimension(constant.text)
}

function parsedField(field: FieldDecl, struct: StructDecl): MemberLines {
	return {
		lines: memberLine(
			field.comment,
			parsedTypeName(field.type),
			field.name,
			field.dimensions.map((dim) => parsedDimension(dim, field, struct))
		),
		order: field.order,
	}
}

function parsedStruct(struct: StructDecl): string[] {
	const fields = struct.fields.map((field) => parsedField(field, struct))
	return structLines(struct.qualifiedName, null, fields, struct.constants)
}

function parsedDecl(decl: TypeDecl): string[] {
	const body =
		decl.kind === 'struct' ? parsedStruct(decl) : enumLines(decl.qualifiedName, null, decl.values)
	return [...commentLines(decl.comment, ''), ...body]
}

/**
 * Structural dump straight from syntax trees, for files whose references
 * do not resolve. Types print as written, qualified by their package, and
 * every hash prints as `unavailable`.
 */
export function renderFiles(files: readonly SchemaFile[]): string {
	return files
		.flatMap(declarationsOf)
		.flatMap(parsedDecl)
		.join('\n')
}
