import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	DuplicateTypeError,
	IllegalRecursionError,
	InvalidDimensionFieldError,
	SemanticError,
	UnknownDimensionFieldError,
	UnknownTypeError,
} from '../../src/core/errors.ts'
import { parseSource } from '../../src/index.ts'
import { resolve } from '../../src/resolve/resolver.ts'
import {
	DimensionMode,
	type ResolvedStruct,
	type ResolvedUnit,
} from '../../src/resolve/unit.ts'

function unitOf(...sources: string[]): ResolvedUnit {
	return resolve(sources.map((source, i) => parseSource(source, `file${i}.keel`)))
}

function structOf(unit: ResolvedUnit, name: string): ResolvedStruct {
	const decl = unit.find(name)
	if (decl?.kind !== 'struct') throw new Error(`no struct ${name}`)
	return decl
}

describe('resolve/resolver', () => {
	describe('symbol table', () => {
		it('should keep file order, then declaration order', () => {
			const unit = unitOf('package a; struct X {} struct Y {}', 'package b; enum Z { Q }')
			assert.deepStrictEqual(
				[...unit].map(([id, decl]) => [id, decl.qualifiedName, decl.kind]),
				[
					[0, 'a.X', 'struct'],
					[1, 'a.Y', 'struct'],
					[2, 'b.Z', 'enum'],
				]
			)
			assert.strictEqual(unit.lookup('a.Y'), 1)
			assert.strictEqual(unit.lookup('missing'), undefined)
			assert.strictEqual(unit.count(), 3)
		})

		it('should reject a type declared twice, naming both files', () => {
			assert.throws(
				() => unitOf('package p; struct A {}', 'package p; enum A {}'),
				(error: unknown) =>
					error instanceof DuplicateTypeError &&
					error.qualifiedName === 'p.A' &&
					error.message ===
						"duplicate type 'p.A' declared in file1.keel; it was previously declared in file0.keel"
			)
		})

		it('should allow the same name in different packages', () => {
			const unit = unitOf('package a; struct T {}', 'package b; struct T {}')
			assert.strictEqual(unit.count(), 2)
		})

		it('should leave hashes unset', () => {
			const unit = unitOf('struct A {}')
			assert.strictEqual(unit.find('A')?.hash, null)
		})
	})

	describe('type references', () => {
		it('should fail on an undeclared type, naming it and its user', () => {
			assert.throws(
				() => unitOf('package demo;\nstruct Wrapper { InnerType field; }'),
				(error: unknown) => {
					assert.ok(error instanceof UnknownTypeError)
					assert.strictEqual(error.reference, 'InnerType')
					assert.strictEqual(error.usedIn, 'demo.Wrapper')
					assert.strictEqual(error.message, "unknown type 'InnerType' used in demo.Wrapper")
					assert.deepStrictEqual(error.position, { column: 17, filename: 'file0.keel', line: 2 })
					return true
				}
			)
		})

		it('should resolve fully qualified references across files', () => {
			const unit = unitOf(
				'package draw; struct Line { geo.Point a; }',
				'package geo; struct Point { double x; }'
			)
			assert.deepStrictEqual(structOf(unit, 'draw.Line').fields[0]?.type, {
				id: 1,
				kind: 'declared',
				qualifiedName: 'geo.Point',
			})
		})

		it('should resolve dotted references relative to the package', () => {
			const unit = unitOf('package outer; struct U { inner.T t; }', 'package outer.inner; struct T {}')
			const type = structOf(unit, 'outer.U').fields[0]?.type
			assert.strictEqual(type?.kind === 'declared' ? type.qualifiedName : null, 'outer.inner.T')
		})

		it('should resolve undotted names in the same package only', () => {
			assert.throws(() => unitOf('package a; struct U { T t; }', 'package b; struct T {}'), UnknownTypeError)
		})

		it('should resolve forward references and enums', () => {
			const unit = unitOf('package p; struct A { B b; Color c; } struct B {} enum Color { RED }')
			assert.deepStrictEqual(
				structOf(unit, 'p.A').fields.map((f) => (f.type.kind === 'declared' ? f.type.id : null)),
				[1, 2]
			)
		})

		it('should record primitives directly', () => {
			const unit = unitOf('struct P { boolean ok; }')
			assert.deepStrictEqual(structOf(unit, 'P').fields[0]?.type, { kind: 'primitive', name: 'boolean' })
		})
	})

	describe('dimensions', () => {
		it('should resolve constants and earlier fields', () => {
			const unit = unitOf('struct S { const int32_t N = 3; int16_t n; double a[N][n][2]; }')
			assert.deepStrictEqual(structOf(unit, 'S').fields[1]?.dimensions, [
				{ mode: DimensionMode.Constant, size: 3n, text: '3' },
				{ field: 'n', mode: DimensionMode.Variable },
				{ mode: DimensionMode.Constant, size: 2n, text: '2' },
			])
		})

		it('should keep the constant text for named constant sizes', () => {
			const unit = unitOf('struct S { const int8_t N = 0x4; byte a[N]; }')
			assert.deepStrictEqual(structOf(unit, 'S').fields[0]?.dimensions, [
				{ mode: DimensionMode.Constant, size: 4n, text: '0x4' },
			])
		})

		it('should reject a size field declared after the array', () => {
			assert.throws(
				() => unitOf('struct S { double a[n]; int32_t n; }'),
				(error: unknown) =>
					error instanceof UnknownDimensionFieldError &&
					error.fieldName === 'n' &&
					error.structName === 'S'
			)
		})

		it('should reject sizes that are not scalar integers', () => {
			for (const source of [
				'struct S { double n; double a[n]; }',
				'struct S { int32_t n[2]; double a[n]; }',
				'struct S { const double N = 2.0; double a[N]; }',
			]) {
				assert.throws(
					() => unitOf(source),
					(error: unknown) =>
						error instanceof InvalidDimensionFieldError &&
						error.message === "array dimension '" + error.fieldName + "' in struct S must be a scalar integer type",
					source
				)
			}
		})

		it('should reject a constant size that is not positive', () => {
			assert.throws(() => unitOf('struct S { const int8_t N = 0; byte a[N]; }'), SemanticError)
		})
	})

	describe('fixed containment', () => {
		it('should reject a struct embedding itself', () => {
			assert.throws(
				() => unitOf('struct A { A self; }'),
				(error: unknown) =>
					error instanceof IllegalRecursionError && error.cycle.join(' ') === 'A A'
			)
		})

		it('should name a mutual cycle in order', () => {
			assert.throws(
				() => unitOf('package p;\nstruct A { B b; }\nstruct B { A a[2]; }'),
				(error: unknown) => {
					assert.ok(error instanceof IllegalRecursionError)
					assert.deepStrictEqual(error.cycle, ['p.A', 'p.B', 'p.A'])
					assert.strictEqual(error.message, 'illegal fixed-size recursion: p.A -> p.B -> p.A')
					assert.strictEqual(error.position.line, 3)
					return true
				}
			)
		})

		it('should allow cycles through a variable dimension', () => {
			const unit = unitOf(
				'struct A { int32_t n; B b[n]; }',
				'struct B { int32_t m; A a[m]; }',
				'struct Node { int32_t count; Node children[count]; }'
			)
			assert.strictEqual(unit.count(), 3)
		})
	})
})
