import {
	DuplicateTypeError,
	IllegalRecursionError,
	InvalidDimensionFieldError,
	SemanticError,
	UnknownDimensionFieldError,
	UnknownTypeError,
} from '../core/errors.ts'
import type { SourcePosition } from '../core/tokens.ts'
import {
	type DimensionSpec,
	declarationsOf,
	type FieldDecl,
	isIntegerType,
	qualify,
	type SchemaFile,
	type StructDecl,
	type TypeDecl,
	type TypeRef,
} from '../parse/ast.ts'
import {
	DeclStore,
	type DeclId,
	DimensionMode,
	declId,
	isFixedLayout,
	type ResolvedDecl,
	type ResolvedDimension,
	type ResolvedField,
	type ResolvedTypeRef,
	ResolvedUnit,
} from './unit.ts'

type SymbolTable = Map<string, { id: DeclId; decl: TypeDecl }>

// =============================================================================
// PASS 1: SYMBOL TABLE
// =============================================================================

function buildSymbolTable(decls: readonly TypeDecl[]): SymbolTable {
	const symbols: SymbolTable = new Map()
	for (const decl of decls) {
		const previous = symbols.get(decl.qualifiedName)
		if (previous !== undefined) {
			throw new DuplicateTypeError(decl.qualifiedName, decl.position, previous.decl.position)
		}
		symbols.set(decl.qualifiedName, { decl, id: declId(symbols.size) })
	}
	return symbols
}

// =============================================================================
// PASS 2: TYPE REFERENCES
// =============================================================================

/**
 * Undotted names were qualified with the referencing package by the parser.
 * Dotted names are tried as written, then relative to the referencing package.
 */
function resolveTypeRef(symbols: SymbolTable, ref: TypeRef, struct: StructDecl): ResolvedTypeRef {
	if (ref.kind === 'primitive') return ref

	const candidates = [ref.qualifiedName]
	if (ref.name.includes('.')) candidates.push(qualify(struct.package, ref.name))

	for (const candidate of candidates) {
		const symbol = symbols.get(candidate)
		if (symbol !== undefined) {
			return { id: symbol.id, kind: 'declared', qualifiedName: symbol.decl.qualifiedName }
		}
	}
	throw new UnknownTypeError(ref.name, struct.qualifiedName, ref.position)
}

// =============================================================================
// PASS 3: DIMENSIONS
// =============================================================================

function resolveDimension(
	dim: DimensionSpec,
	field: FieldDecl,
	struct: StructDecl
): ResolvedDimension {
	if (dim.kind === 'constant') {
		return { mode: DimensionMode.Constant, size: dim.size, text: String(dim.size) }
	}

	const { name } = dim
	const constant = struct.constants.find((c) => c.name === name && c.order < field.order)
	if (constant !== undefined) {
		if (typeof constant.value !== 'bigint') {
			throw new InvalidDimensionFieldError(dim.name, struct.qualifiedName, dim.position)
		}
		if (constant.value <= 0n) throw new SemanticError('KPARSE006', dim.position)
		return { mode: DimensionMode.Constant, size: constant.value, text: constant.text }
	}

	const sizeField = struct.fields.find((f) => f.name === name && f.order < field.order)
	if (sizeField === undefined) {
		throw new UnknownDimensionFieldError(dim.name, struct.qualifiedName, dim.position)
	}
	const isScalarInteger =
		sizeField.type.kind === 'primitive' &&
		isIntegerType(sizeField.type.name) &&
		sizeField.dimensions.length === 0
	if (!isScalarInteger) {
		throw new InvalidDimensionFieldError(dim.name, struct.qualifiedName, dim.position)
	}
	return { field: dim.name, mode: DimensionMode.Variable }
}

function resolveField(symbols: SymbolTable, field: FieldDecl, struct: StructDecl): ResolvedField {
	return {
		comment: field.comment,
		dimensions: field.dimensions.map((dim) => resolveDimension(dim, field, struct)),
		name: field.name,
		order: field.order,
		position: field.position,
		type: resolveTypeRef(symbols, field.type, struct),
	}
}

function resolveDecl(symbols: SymbolTable, decl: TypeDecl): ResolvedDecl {
	const base = {
		comment: decl.comment,
		hash: null,
		name: decl.name,
		package: decl.package,
		position: decl.position,
		qualifiedName: decl.qualifiedName,
	}
	if (decl.kind === 'enum') {
		return { ...base, kind: 'enum', values: decl.values }
	}
	const struct: StructDecl = decl
	return {
		...base,
		constants: struct.constants,
		fields: struct.fields.map((field) => resolveField(symbols, field, struct)),
		fileComment: struct.fileComment,
		kind: 'struct',
	}
}

// =============================================================================
// PASS 4: FIXED-CONTAINMENT CYCLES
// =============================================================================

const Visit = {
	Done: 2,
	Open: 1,
} as const

interface ContainmentEdge {
	target: DeclId
	position: SourcePosition
}

function containmentEdges(decl: ResolvedDecl): ContainmentEdge[] {
	if (decl.kind === 'enum') return []
	const edges: ContainmentEdge[] = []
	for (const field of decl.fields) {
		if (field.type.kind === 'declared' && isFixedLayout(field)) {
			edges.push({ position: field.position, target: field.type.id })
		}
	}
	return edges
}

/**
 * Depth-first search over struct-contains-struct edges of fixed-layout fields.
 * The first cycle found is reported, starting and ending at the same struct.
 */
function checkFixedContainment(store: DeclStore): void {
	const state = new Map<DeclId, (typeof Visit)[keyof typeof Visit]>()
	const path: DeclId[] = []

	const visit = (id: DeclId): void => {
		state.set(id, Visit.Open)
		path.push(id)
		for (const edge of containmentEdges(store.get(id))) {
			const targetState = state.get(edge.target)
			if (targetState === Visit.Open) {
				const cycle = path.slice(path.indexOf(edge.target)).map((p) => store.get(p).qualifiedName)
				throw new IllegalRecursionError([...cycle, store.get(edge.target).qualifiedName], edge.position)
			}
			if (targetState === undefined) visit(edge.target)
		}
		path.pop()
		state.set(id, Visit.Done)
	}

	for (const [id] of store) {
		if (!state.has(id)) visit(id)
	}
}

/**
 * Merge per-file syntax trees into one ResolvedUnit.
 * Hashes are left unset; the hash engine attaches them.
 *
 * @throws {DuplicateTypeError} When two declarations share a qualified name
 * @throws {UnknownTypeError} When a field type names no declaration
 * @throws {UnknownDimensionFieldError} When a named dimension is not an earlier member
 * @throws {InvalidDimensionFieldError} When a named dimension is not a scalar integer
 * @throws {IllegalRecursionError} When structs contain each other with fixed layout
 */
export function resolve(files: readonly SchemaFile[]): ResolvedUnit {
	const decls = files.flatMap(declarationsOf)
	const symbols = buildSymbolTable(decls)

	const store = new DeclStore()
	for (const decl of decls) {
		store.add(resolveDecl(symbols, decl))
	}

	checkFixedContainment(store)
	return new ResolvedUnit(store)
}
