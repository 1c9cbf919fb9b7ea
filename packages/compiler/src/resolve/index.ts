/**
 * Name resolution module.
 * Merges per-file syntax trees into one ResolvedUnit.
 */

export { resolve } from './resolver.ts'
export {
	type DeclId,
	DeclStore,
	DimensionMode,
	declId,
	isFixedLayout,
	type ResolvedDecl,
	type ResolvedDimension,
	type ResolvedEnum,
	type ResolvedField,
	type ResolvedStruct,
	type ResolvedTypeRef,
	ResolvedUnit,
} from './unit.ts'
