/**
 * Resolved intermediate representation handed to code emitters.
 * Declarations live in a dense store; references between them are DeclId handles.
 */

import type { SourcePosition } from '../core/tokens.ts'
import type { ConstantDecl, EnumValueDecl, PrimitiveType } from '../parse/ast.ts'

export type DeclId = number & { readonly __brand: 'DeclId' }

export function declId(n: number): DeclId {
	return n as DeclId
}

export const DimensionMode = {
	Constant: 0,
	Variable: 1,
} as const

export type DimensionMode = (typeof DimensionMode)[keyof typeof DimensionMode]

export type ResolvedTypeRef =
	| { readonly kind: 'primitive'; readonly name: PrimitiveType }
	| { readonly kind: 'declared'; readonly id: DeclId; readonly qualifiedName: string }

export type ResolvedDimension =
	| {
			readonly mode: typeof DimensionMode.Constant
			readonly size: bigint
			/** Size as written: the literal, or the value text of the named constant */
			readonly text: string
	  }
	| {
			readonly mode: typeof DimensionMode.Variable
			/** Earlier scalar integer field holding the length */
			readonly field: string
	  }

export interface ResolvedField {
	readonly name: string
	readonly type: ResolvedTypeRef
	readonly dimensions: readonly ResolvedDimension[]
	readonly comment: string | null
	readonly order: number
	readonly position: SourcePosition
}

interface ResolvedDeclBase {
	readonly name: string
	readonly package: string
	readonly qualifiedName: string
	readonly comment: string | null
	readonly position: SourcePosition
	/** 64-bit structural fingerprint, attached by the hash engine */
	hash: bigint | null
}

export interface ResolvedStruct extends ResolvedDeclBase {
	readonly kind: 'struct'
	readonly fileComment: string | null
	readonly fields: readonly ResolvedField[]
	readonly constants: readonly ConstantDecl[]
}

export interface ResolvedEnum extends ResolvedDeclBase {
	readonly kind: 'enum'
	readonly values: readonly EnumValueDecl[]
}

export type ResolvedDecl = ResolvedStruct | ResolvedEnum

/** A field has fixed layout when it has no variable dimension. */
export function isFixedLayout(field: ResolvedField): boolean {
	return field.dimensions.every((dim) => dim.mode === DimensionMode.Constant)
}

/**
 * Dense array storage for declarations.
 * Append-only during resolution.
 */
export class DeclStore {
	private readonly decls: ResolvedDecl[] = []

	add(decl: ResolvedDecl): DeclId {
		const id = this.decls.length as DeclId
		this.decls.push(decl)
		return id
	}

	get(id: DeclId): ResolvedDecl {
		const decl = this.decls[id]
		if (decl === undefined) {
			throw new Error(`Invalid DeclId: ${id}`)
		}
		return decl
	}

	count(): number {
		return this.decls.length
	}

	*[Symbol.iterator](): Generator<[DeclId, ResolvedDecl]> {
		for (let i = 0; i < this.decls.length; i++) {
			const decl = this.decls[i]
			if (decl !== undefined) yield [declId(i), decl]
		}
	}
}

/**
 * The whole compilation unit: every declaration of every file,
 * in file order and then declaration order, indexed by qualified name.
 */
export class ResolvedUnit {
	private readonly byName = new Map<string, DeclId>()

	constructor(readonly declarations: DeclStore) {
		for (const [id, decl] of declarations) {
			this.byName.set(decl.qualifiedName, id)
		}
	}

	get(id: DeclId): ResolvedDecl {
		return this.declarations.get(id)
	}

	lookup(qualifiedName: string): DeclId | undefined {
		return this.byName.get(qualifiedName)
	}

	/** Declaration by qualified name, or undefined. */
	find(qualifiedName: string): ResolvedDecl | undefined {
		const id = this.lookup(qualifiedName)
		return id === undefined ? undefined : this.get(id)
	}

	count(): number {
		return this.declarations.count()
	}

	*[Symbol.iterator](): Generator<[DeclId, ResolvedDecl]> {
		yield* this.declarations
	}
}
