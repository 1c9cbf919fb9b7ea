/**
 * CLI diagnostic definitions.
 *
 * Error code format: KCLI<NUMBER>
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (KCLI001-099)
// =============================================================================

export const KCLI001: DiagnosticDef = {
	code: 'KCLI001',
	description: "keelc couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const KCLI002: DiagnosticDef = {
	code: 'KCLI002',
	description: "The file exists but keelc can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const KCLI003: DiagnosticDef = {
	code: 'KCLI003',
	description: 'Something unexpected went wrong during compilation.',
	message: 'compilation failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your schema files, or report this if it seems like a bug.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	KCLI001,
	KCLI002,
	KCLI003,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
