/**
 * Syntax analysis module.
 * Builds one SchemaFile per source file from its token store.
 */

export type {
	ConstantDecl,
	ConstType,
	DimensionSpec,
	EnumDecl,
	EnumValueDecl,
	FieldDecl,
	IntegerType,
	PackageDecl,
	PrimitiveType,
	SchemaFile,
	StructDecl,
	TypeDecl,
	TypeRef,
} from './ast.ts'
export {
	CONST_TYPES,
	declarationsOf,
	INTEGER_BOUNDS,
	INTEGER_TYPES,
	isConstType,
	isIntegerType,
	isPrimitiveType,
	PRIMITIVE_TYPES,
	qualify,
} from './ast.ts'
export { type ParseOptions, parse, parseIntegerLiteral } from './parser.ts'
