/**
 * Keel Compiler Public API
 *
 * Pipeline per compilation unit:
 * 1. Tokenization (source → tokens), per file
 * 2. Parsing (tokens → SchemaFile), per file
 * 3. Resolution (all SchemaFiles → ResolvedUnit)
 * 4. Hashing (fingerprint attached to every declaration)
 *
 * Steps 1-2 are `parseSources`, steps 3-4 are `link`.
 */

import { CompilationContext, type Diagnostic } from './core/context.ts'
import { computeHashes } from './hash/fingerprint.ts'
import { tokenize } from './lex/tokenizer.ts'
import type { SchemaFile } from './parse/ast.ts'
import { type ParseOptions, parse } from './parse/parser.ts'
import { resolve } from './resolve/resolver.ts'
import type { ResolvedUnit } from './resolve/unit.ts'

export * from './core/index.ts'
export * from './dump/index.ts'
export * from './hash/index.ts'
export * from './lex/index.ts'
export * from './parse/index.ts'
export * from './resolve/index.ts'

/**
 * Options for the compile function.
 */
export type CompileOptions = ParseOptions

export interface SourceFile {
	/** Path shown in diagnostics */
	filename: string
	source: string
}

export interface CompileResult {
	unit: ResolvedUnit
	/** Warnings of every file, in file order */
	warnings: Diagnostic[]
}

/**
 * Tokenize and parse one file in its context.
 *
 * @throws {CompileError} The first lexical, syntax or semantic error
 */
export function parseContext(context: CompilationContext, options: ParseOptions = {}): SchemaFile {
	tokenize(context)
	const failure = context.firstFailure()
	if (failure !== undefined) throw failure
	return parse(context, options)
}

/**
 * Tokenize and parse a single source text.
 *
 * @throws {CompileError} The first lexical, syntax or semantic error
 */
export function parseSource(
	source: string,
	filename = '<input>',
	options: ParseOptions = {}
): SchemaFile {
	return parseContext(new CompilationContext(source, filename), options)
}

export interface ParsedSources {
	files: SchemaFile[]
	/** Warnings of every file, in file order */
	warnings: Diagnostic[]
}

/**
 * Tokenize and parse every source in order.
 *
 * @throws {CompileError} The first lexical, syntax or semantic error of any file
 */
export function parseSources(sources: readonly SourceFile[], options: CompileOptions = {}): ParsedSources {
	const files: SchemaFile[] = []
	const warnings: Diagnostic[] = []

	for (const { filename, source } of sources) {
		const context = new CompilationContext(source, filename)
		files.push(parseContext(context, options))
		warnings.push(...context.getWarnings())
	}

	return { files, warnings }
}

/**
 * Resolve parsed files into one unit and fingerprint every declaration.
 *
 * @throws {CompileError} On the first resolution error
 */
export function link(files: readonly SchemaFile[]): ResolvedUnit {
	const unit = resolve(files)
	computeHashes(unit)
	return unit
}

/**
 * Compile schema files into a resolved, fingerprinted unit.
 *
 * Files are parsed in order and the first failure aborts the whole unit.
 *
 * @example
 * ```ts
 * const { unit } = compile([{ filename: 'geo.keel', source: 'package geo; struct Point { double x; double y; }' }])
 * unit.find('geo.Point')?.hash // 0x168e98f8b460a204n
 * ```
 *
 * @throws {CompileError} On the first error of any phase
 */
export function compile(sources: readonly SourceFile[], options: CompileOptions = {}): CompileResult {
	const { files, warnings } = parseSources(sources, options)
	return { unit: link(files), warnings }
}
