/**
 * Re-export diagnostic types and compiler definitions from shared package.
 */

import {
	COMPILER_DIAGNOSTICS,
	type DiagnosticArgs,
	type DiagnosticDef,
	interpolateMessage,
} from '@keel/diagnostics'
import type { SourcePosition } from './tokens.ts'

export {
	COMPILER_DIAGNOSTICS,
	type CompilerDiagnosticCode,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	interpolateMessage,
} from '@keel/diagnostics'

/**
 * All valid diagnostic codes for the compiler.
 */
export type DiagnosticCode = keyof typeof COMPILER_DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof COMPILER_DIAGNOSTICS)[typeof code] {
	return COMPILER_DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in COMPILER_DIAGNOSTICS
}

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** File the diagnostic points into */
	readonly filename: string
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
}

/**
 * Build a diagnostic from a catalog code at a token position.
 */
export function createDiagnostic(
	code: DiagnosticCode,
	position: SourcePosition,
	args?: DiagnosticArgs
): Diagnostic {
	const def = getDiagnostic(code)
	return {
		column: position.column + 1,
		def,
		filename: position.filename,
		line: position.line,
		message: interpolateMessage(def.message, args),
		...(args ? { args } : {}),
	}
}
