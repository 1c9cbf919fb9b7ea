import { readFile } from 'node:fs/promises'
import {
	CompileError,
	type Diagnostic,
	formatDiagnostic,
	formatDiagnosticLine,
	type SourceFile,
	sourceLine,
} from '@keel/compiler'
import { interpolateMessage, KCLI001, KCLI002, KCLI003 } from '@keel/diagnostics'

export type ReadOutcome =
	| { ok: true; files: SourceFile[] }
	| { ok: false; message: string }

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		const message = interpolateMessage(KCLI001.message, { path: filePath })
		return `[${KCLI001.code}] ${message}`
	}
	const message = interpolateMessage(KCLI002.message, { reason: getErrorMessage(error) })
	return `[${KCLI002.code}] ${message}`
}

/**
 * Single-line report of a compile failure: `file:line:col: error[CODE]: message`.
 */
export function formatCompileError(error: unknown): string {
	if (error instanceof CompileError) {
		return formatDiagnosticLine(error.diagnostic)
	}
	const message = interpolateMessage(KCLI003.message, { reason: getErrorMessage(error) })
	return `[${KCLI003.code}] ${message}`
}

/**
 * Multi-line report with the offending source line, when the file is among files.
 */
export function formatDiagnosticReport(diagnostic: Diagnostic, files: readonly SourceFile[]): string {
	const file = files.find((f) => f.filename === diagnostic.filename)
	const line = file === undefined ? undefined : sourceLine(file.source, diagnostic.line)
	return formatDiagnostic(diagnostic, line)
}

/**
 * Read every path as UTF-8. Stops at the first file that cannot be read.
 */
export async function readSources(paths: readonly string[]): Promise<ReadOutcome> {
	const files: SourceFile[] = []
	for (const filename of paths) {
		try {
			files.push({ filename, source: await readFile(filename, 'utf-8') })
		} catch (error: unknown) {
			return { message: formatReadError(filename, error), ok: false }
		}
	}
	return { files, ok: true }
}
