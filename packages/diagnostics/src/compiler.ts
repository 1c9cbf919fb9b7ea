/**
 * Compiler diagnostic definitions.
 *
 * Error code format: K<PHASE><NUMBER>
 * - KLEX: Lexer errors (001-099)
 * - KPARSE: Parser errors (001-049), warnings (050-099)
 * - KRES: Resolver errors (001-099)
 * - KHASH: Hash engine faults (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// LEXER ERRORS (KLEX001-099)
// =============================================================================

export const KLEX001: DiagnosticDef = {
	code: 'KLEX001',
	description: 'Schema files may only contain names, numbers, strings, comments and punctuation.',
	message: "unrecognized character '{character}'",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the character or move it into a comment.',
}

export const KLEX002: DiagnosticDef = {
	code: 'KLEX002',
	description: 'A block comment was opened with /* but the file ended before */.',
	message: 'end of file reached while parsing comment',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Close the comment with */.',
}

export const KLEX003: DiagnosticDef = {
	code: 'KLEX003',
	description: 'A string literal was opened with a quote but never closed.',
	message: 'unterminated string literal',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add the closing quote.',
}

export const KLEX004: DiagnosticDef = {
	code: 'KLEX004',
	description: 'A character literal holds exactly one character, or one escape, between single quotes.',
	message: 'malformed character literal',
	severity: DiagnosticSeverity.Error,
	suggestion: "Write it as 'c' or '\\n'.",
}

// =============================================================================
// PARSER ERRORS (KPARSE001-049)
// =============================================================================

export const KPARSE001: DiagnosticDef = {
	code: 'KPARSE001',
	description: 'The parser found a token that does not fit the schema grammar here.',
	message: 'expected {expected}, found {found}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check for a missing semicolon, brace or keyword.',
}

export const KPARSE002: DiagnosticDef = {
	code: 'KPARSE002',
	description: 'Fields and constants of a struct share one namespace.',
	message: "duplicate member name '{name}' in struct {struct}",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Rename one of the members.',
}

export const KPARSE003: DiagnosticDef = {
	code: 'KPARSE003',
	description: 'Constants can only be integers or floating point numbers.',
	message: "invalid type '{type}' for const",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use one of int8_t, int16_t, int32_t, int64_t, float or double.',
}

export const KPARSE004: DiagnosticDef = {
	code: 'KPARSE004',
	description: 'The constant does not fit in the declared integer type.',
	message: 'integer value {value} out of bounds for {type}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use a wider integer type or a smaller value.',
}

export const KPARSE005: DiagnosticDef = {
	code: 'KPARSE005',
	description: 'The constant value could not be read as a number of the declared type.',
	message: "expected {kind} value, found '{value}'",
	severity: DiagnosticSeverity.Error,
}

export const KPARSE006: DiagnosticDef = {
	code: 'KPARSE006',
	description: 'Fixed array dimensions need at least one element.',
	message: 'constant array size must be > 0',
	severity: DiagnosticSeverity.Error,
}

export const KPARSE007: DiagnosticDef = {
	code: 'KPARSE007',
	description: 'Types are declared at the top level of a file, never inside a struct.',
	message: '{keyword} declarations inside a struct are not supported',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare the type at the top level and reference it by name.',
}

export const KPARSE008: DiagnosticDef = {
	code: 'KPARSE008',
	description: 'Each enum value name may appear only once per enum.',
	message: "duplicate enum value '{name}' in enum {enum}",
	severity: DiagnosticSeverity.Error,
}

export const KPARSE009: DiagnosticDef = {
	code: 'KPARSE009',
	description: 'Two values of the same enum would encode to the same number.',
	message: "ordinal {ordinal} of '{name}' is already used by '{other}' in enum {enum}",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Give the value an explicit, unused ordinal.',
}

export const KPARSE010: DiagnosticDef = {
	code: 'KPARSE010',
	description: 'Enum values are encoded as 32-bit signed integers.',
	message: "ordinal {ordinal} of '{name}' is out of range for int32_t",
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// PARSER WARNINGS (KPARSE050-099)
// =============================================================================

export const KPARSE050: DiagnosticDef = {
	code: 'KPARSE050',
	description: '`int` is not a primitive type; its width would differ between languages.',
	message: 'int type should probably be int8_t, int16_t, int32_t, or int64_t',
	severity: DiagnosticSeverity.Warning,
}

// =============================================================================
// RESOLVER ERRORS (KRES001-099)
// =============================================================================

export const KRES001: DiagnosticDef = {
	code: 'KRES001',
	description: 'Every qualified type name may be declared once per compilation unit.',
	message: "duplicate type '{name}' declared in {file}; it was previously declared in {previous}",
	severity: DiagnosticSeverity.Error,
}

export const KRES002: DiagnosticDef = {
	code: 'KRES002',
	description: 'A field refers to a type that no input file declares.',
	message: "unknown type '{reference}' used in {usedIn}",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare the type, fix the spelling, or pass the file that declares it.',
}

export const KRES003: DiagnosticDef = {
	code: 'KRES003',
	description: 'Variable array sizes must be declared before the array that uses them.',
	message: "unknown array size argument '{field}' in struct {struct}",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Declare the size field or constant before the array.',
}

export const KRES004: DiagnosticDef = {
	code: 'KRES004',
	description: 'Array sizes come from integer constants or scalar integer fields.',
	message: "array dimension '{field}' in struct {struct} must be a scalar integer type",
	severity: DiagnosticSeverity.Error,
}

export const KRES005: DiagnosticDef = {
	code: 'KRES005',
	description:
		'A struct that contains itself through fixed-size fields would need infinite storage.',
	message: 'illegal fixed-size recursion: {cycle}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Break the cycle with a variable-length array.',
}

// =============================================================================
// HASH ENGINE FAULTS (KHASH001-099)
// =============================================================================

export const KHASH001: DiagnosticDef = {
	code: 'KHASH001',
	description: 'The hash engine met a cycle the resolver should have rejected.',
	message: 'internal error: fixed-size cycle through {name} reached the hash engine',
	severity: DiagnosticSeverity.Error,
	suggestion: 'This is a compiler bug; run the resolver before hashing.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all compiler diagnostics.
 */
export const COMPILER_DIAGNOSTICS = {
	// Hash engine faults
	KHASH001,
	// Lexer errors
	KLEX001,
	KLEX002,
	KLEX003,
	KLEX004,
	// Parser errors
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
	// Parser warnings
	KPARSE050,
	// Resolver errors
	KRES001,
	KRES002,
	KRES003,
	KRES004,
	KRES005,
} as const

/**
 * All valid compiler diagnostic codes.
 */
export type CompilerDiagnosticCode = keyof typeof COMPILER_DIAGNOSTICS
