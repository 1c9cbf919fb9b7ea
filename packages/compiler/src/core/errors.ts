/**
 * Error types thrown by the compilation phases.
 *
 * Every error carries a catalog diagnostic, so callers can either format it
 * or match on the subclass and its structured fields.
 */

import {
	createDiagnostic,
	type Diagnostic,
	type DiagnosticArgs,
	type DiagnosticCode,
} from './diagnostics.ts'
import type { SourcePosition } from './tokens.ts'

export class CompileError extends Error {
	readonly diagnostic: Diagnostic

	constructor(diagnostic: Diagnostic) {
		super(diagnostic.message)
		this.name = 'CompileError'
		this.diagnostic = diagnostic
	}

	get code(): string {
		return this.diagnostic.def.code
	}

	/** Position of the offending token (0-indexed column). */
	get position(): SourcePosition {
		return {
			column: this.diagnostic.column - 1,
			filename: this.diagnostic.filename,
			line: this.diagnostic.line,
		}
	}
}

// =============================================================================
// PER-FILE ERRORS
// =============================================================================

export type LexErrorCode = 'KLEX001' | 'KLEX002' | 'KLEX003' | 'KLEX004'

export class LexError extends CompileError {
	readonly character: string

	constructor(position: SourcePosition, character: string, code: LexErrorCode = 'KLEX001') {
		super(createDiagnostic(code, position, { character }))
		this.name = 'LexError'
		this.character = character
	}
}

export class ParseError extends CompileError {
	readonly expected: string
	readonly found: string

	constructor(position: SourcePosition, expected: string, found: string) {
		super(createDiagnostic('KPARSE001', position, { expected, found }))
		this.name = 'ParseError'
		this.expected = expected
		this.found = found
	}
}

/**
 * Parsed fine, but illegal: duplicate members, bad constants, enum ordinal clashes.
 */
export class SemanticError extends CompileError {
	constructor(code: DiagnosticCode, position: SourcePosition, args?: DiagnosticArgs) {
		super(createDiagnostic(code, position, args))
		this.name = 'SemanticError'
	}
}

// =============================================================================
// UNIT-WIDE ERRORS
// =============================================================================

export class DuplicateTypeError extends CompileError {
	readonly qualifiedName: string
	readonly previous: SourcePosition

	constructor(qualifiedName: string, position: SourcePosition, previous: SourcePosition) {
		super(
			createDiagnostic('KRES001', position, {
				file: position.filename,
				name: qualifiedName,
				previous: previous.filename,
			})
		)
		this.name = 'DuplicateTypeError'
		this.qualifiedName = qualifiedName
		this.previous = previous
	}
}

export class UnknownTypeError extends CompileError {
	readonly reference: string
	readonly usedIn: string

	constructor(reference: string, usedIn: string, position: SourcePosition) {
		super(createDiagnostic('KRES002', position, { reference, usedIn }))
		this.name = 'UnknownTypeError'
		this.reference = reference
		this.usedIn = usedIn
	}
}

export class UnknownDimensionFieldError extends CompileError {
	readonly fieldName: string
	readonly structName: string

	constructor(fieldName: string, structName: string, position: SourcePosition) {
		super(createDiagnostic('KRES003', position, { field: fieldName, struct: structName }))
		this.name = 'UnknownDimensionFieldError'
		this.fieldName = fieldName
		this.structName = structName
	}
}

export class InvalidDimensionFieldError extends CompileError {
	readonly fieldName: string
	readonly structName: string

	constructor(fieldName: string, structName: string, position: SourcePosition) {
		super(createDiagnostic('KRES004', position, { field: fieldName, struct: structName }))
		this.name = 'InvalidDimensionFieldError'
		this.fieldName = fieldName
		this.structName = structName
	}
}

export class IllegalRecursionError extends CompileError {
	/** Qualified names along the cycle; the first name is repeated at the end. */
	readonly cycle: readonly string[]

	constructor(cycle: readonly string[], position: SourcePosition) {
		super(createDiagnostic('KRES005', position, { cycle: cycle.join(' -> ') }))
		this.name = 'IllegalRecursionError'
		this.cycle = cycle
	}
}

/**
 * Internal-consistency fault: a fixed-size cycle got past the resolver.
 */
export class HashConsistencyError extends CompileError {
	constructor(qualifiedName: string, position: SourcePosition) {
		super(createDiagnostic('KHASH001', position, { name: qualifiedName }))
		this.name = 'HashConsistencyError'
	}
}
