/**
 * Core data structures shared by every compiler phase.
 * Dense token storage with integer IDs, per-file context and the error types.
 */

export {
	CompilationContext,
	type Diagnostic,
	formatDiagnostic,
	formatDiagnosticLine,
	sourceLine,
} from './context.ts'
export {
	COMPILER_DIAGNOSTICS,
	createDiagnostic,
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	isValidDiagnosticCode,
} from './diagnostics.ts'
export {
	CompileError,
	DuplicateTypeError,
	HashConsistencyError,
	IllegalRecursionError,
	InvalidDimensionFieldError,
	LexError,
	type LexErrorCode,
	ParseError,
	SemanticError,
	UnknownDimensionFieldError,
	UnknownTypeError,
} from './errors.ts'
export {
	type SourcePosition,
	type Token,
	type TokenId,
	TokenKind,
	TokenStore,
	tokenId,
	tokenKindName,
} from './tokens.ts'
