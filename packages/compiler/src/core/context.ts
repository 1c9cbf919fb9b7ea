/**
 * Per-file compilation context that flows through lexing and parsing.
 * Owns the file's source, its token store, its parsed AST and the
 * diagnostics (errors and warnings) reported against it.
 */

import type { SchemaFile } from '../parse/ast.ts'
import {
	createDiagnostic,
	type Diagnostic,
	type DiagnosticArgs,
	type DiagnosticCode,
	DiagnosticSeverity,
	interpolateMessage,
} from './diagnostics.ts'
import type { CompileError } from './errors.ts'
import { type SourcePosition, type TokenId, TokenStore } from './tokens.ts'

export type { Diagnostic } from './diagnostics.ts'
export { DiagnosticSeverity } from './diagnostics.ts'

const UTF8_BOM = '\uFEFF'

/**
 * The per-file compilation context.
 *
 * Design principles:
 * - Append-only: phases add to stores, never mutate previous phase data
 * - Centralized diagnostics: all errors and warnings collected in one place
 */
export class CompilationContext {
	/** Original source code, without a leading byte order mark */
	readonly source: string

	/** Source filename for error messages */
	readonly filename: string

	/** Token storage (populated by tokenizer) */
	readonly tokens: TokenStore

	/** Parsed file (populated by parser) */
	file: SchemaFile | null = null

	/** Collected diagnostics */
	private readonly diagnostics: Diagnostic[] = []

	/** Phase errors recorded through report() */
	private readonly failures: CompileError[] = []

	/** Track if any errors have been reported */
	private errorCount = 0

	constructor(source: string, filename = '<input>') {
		this.source = source.startsWith(UTF8_BOM) ? source.slice(1) : source
		this.filename = filename
		this.tokens = new TokenStore()
	}

	// ===========================================================================
	// REPORTING
	// ===========================================================================

	/**
	 * Emit a diagnostic by code at a specific position.
	 */
	emit(code: DiagnosticCode, position: SourcePosition, args?: DiagnosticArgs): void {
		this.addDiagnosticInternal(createDiagnostic(code, position, args))
	}

	/**
	 * Emit a diagnostic by code at a token's location.
	 */
	emitAtToken(code: DiagnosticCode, tokenId: TokenId, args?: DiagnosticArgs): void {
		this.emit(code, this.positionOf(tokenId), args)
	}

	/**
	 * Record a thrown phase error.
	 */
	report(error: CompileError): void {
		this.failures.push(error)
		this.addDiagnosticInternal(error.diagnostic)
	}

	positionOf(tokenId: TokenId): SourcePosition {
		const token = this.tokens.get(tokenId)
		return { column: token.column, filename: this.filename, line: token.line }
	}

	private addDiagnosticInternal(diagnostic: Diagnostic): void {
		this.diagnostics.push(diagnostic)
		if (diagnostic.def.severity === DiagnosticSeverity.Error) {
			this.errorCount++
		}
	}

	// ===========================================================================
	// QUERY METHODS
	// ===========================================================================

	hasErrors(): boolean {
		return this.errorCount > 0
	}

	getErrorCount(): number {
		return this.errorCount
	}

	/** The first error recorded through report(), if any. */
	firstFailure(): CompileError | undefined {
		return this.failures[0]
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getErrors(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	getWarnings(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Warning)
	}

	getSourceLine(line: number): string | undefined {
		return sourceLine(this.source, line)
	}

	// ===========================================================================
	// FORMATTING
	// ===========================================================================

	formatDiagnostic(diagnostic: Diagnostic): string {
		return formatDiagnostic(diagnostic, this.getSourceLine(diagnostic.line))
	}

	formatAllDiagnostics(): string {
		return this.diagnostics.map((d) => this.formatDiagnostic(d)).join('\n\n')
	}
}

/**
 * Get a 1-indexed line of a source text.
 */
export function sourceLine(source: string, line: number): string | undefined {
	return source.split('\n')[line - 1]?.replace(/\r$/, '')
}

function getSeverityLabel(severity: DiagnosticSeverity): string {
	const labels: Record<DiagnosticSeverity, string> = {
		[DiagnosticSeverity.Error]: 'error',
		[DiagnosticSeverity.Warning]: 'warning',
		[DiagnosticSeverity.Note]: 'note',
	}
	return labels[severity]
}

/** Tabs before the caret are kept so the caret lines up under tab-indented code. */
function caretMargin(line: string, column: number): string {
	let margin = ''
	for (const char of line.slice(0, column - 1)) {
		margin += char === '\t' ? '\t' : ' '
	}
	return margin.padEnd(column - 1)
}

function buildSourceContext(
	diagnostic: Diagnostic,
	line: string
): { emptyPrefix: string; lines: string[] } {
	const lineNumWidth = String(diagnostic.line).length
	const pad = ' '.repeat(lineNumWidth)
	const linePrefix = ` ${diagnostic.line} | `
	const emptyPrefix = ` ${pad} | `
	const pointer = `${caretMargin(line, diagnostic.column)}^`

	return {
		emptyPrefix,
		lines: [emptyPrefix, `${linePrefix}${line}`, `${emptyPrefix}${pointer}`],
	}
}

/**
 * Format a diagnostic for display (Rust-style output).
 *
 * Example:
 * ```
 * error[KRES002]: unknown type 'InnerType' used in demo.Wrapper
 *   --> schemas/demo.keel:3:5
 *    |
 *  3 |     InnerType field;
 *    |     ^
 *    |
 *    = help: Declare the type, fix the spelling, or pass the file that declares it.
 * ```
 */
export function formatDiagnostic(diagnostic: Diagnostic, line?: string): string {
	const { def } = diagnostic
	const header = `${getSeverityLabel(def.severity)}[${def.code}]: ${diagnostic.message}`
	const location = `  --> ${diagnostic.filename}:${diagnostic.line}:${diagnostic.column}`

	if (line === undefined) {
		return `${header}\n${location}`
	}

	const { emptyPrefix, lines: contextLines } = buildSourceContext(diagnostic, line)
	const lines = [header, location, ...contextLines]

	if (def.suggestion) {
		const suggestion = interpolateMessage(def.suggestion, diagnostic.args)
		lines.push(emptyPrefix, `   = help: ${suggestion}`)
	}

	return lines.join('\n')
}

/**
 * Format a diagnostic as a single line: `file:line:column: error[CODE]: message`.
 */
export function formatDiagnosticLine(diagnostic: Diagnostic): string {
	const severity = getSeverityLabel(diagnostic.def.severity)
	return `${diagnostic.filename}:${diagnostic.line}:${diagnostic.column}: ${severity}[${diagnostic.def.code}]: ${diagnostic.message}`
}
