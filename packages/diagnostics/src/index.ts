/**
 * @keel/diagnostics
 *
 * Shared diagnostic types and definitions for Keel packages.
 */

export { CLI_DIAGNOSTICS, type CliDiagnosticCode, KCLI001, KCLI002, KCLI003 } from './cli.ts'
export {
	COMPILER_DIAGNOSTICS,
	type CompilerDiagnosticCode,
	KHASH001,
	KLEX001,
	KLEX002,
	KLEX003,
	KLEX004,
	KPARSE001,
	KPARSE002,
	KPARSE003,
	KPARSE004,
	KPARSE005,
	KPARSE006,
	KPARSE007,
	KPARSE008,
	KPARSE009,
	KPARSE010,
	KPARSE050,
	KRES001,
	KRES002,
	KRES003,
	KRES004,
	KRES005,
} from './compiler.ts'
export { interpolateMessage } from './interpolate.ts'
export { type DiagnosticArgs, type DiagnosticDef, DiagnosticSeverity } from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { COMPILER_DIAGNOSTICS } from './compiler.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...COMPILER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
