import assert from 'node:assert'
import { describe, it } from 'node:test'
import { renderFiles, renderUnit } from '../../src/dump/structure.ts'
import { compile, parseSource } from '../../src/index.ts'

function dump(...sources: string[]): string {
	const { unit } = compile(sources.map((source, i) => ({ filename: `file${i}.keel`, source })))
	return renderUnit(unit)
}

describe('dump/structure', () => {
	it('should print nothing for an empty unit', () => {
		assert.strictEqual(dump(''), '')
	})

	it('should print members in declaration order with their comments', () => {
		const source = [
			'package geo;',
			'// A point',
			'struct Point {',
			'\t// horizontal',
			'\tdouble x;',
			'\tconst int32_t N = 0x2;',
			'\tint16_t n;',
			'\tColor c[N][n];',
			'}',
			'enum Color {',
			'\t// first',
			'\tRED,',
			'\tGREEN = 4',
			'}',
		].join('\n')

		assert.strictEqual(
			dump(source),
			[
				'// A point',
				'struct geo.Point [hash=0x3d3429d89c6a1c2e]',
				'\t// horizontal',
				'\tdouble                x',
				'\tconst int32_t         N = 0x2',
				'\tint16_t               n',
				'\tgeo.Color             c [ (const) 0x2 ] [ (var) n ]',
				'enum geo.Color [hash=0xcc2678087a52545c]',
				'\t// first',
				'\tRED = 0',
				'\tGREEN = 4',
			].join('\n')
		)
	})

	it('should keep empty comment lines', () => {
		assert.strictEqual(
			dump('// a\n//\n// b\nstruct E {}'),
			['// a', '//', '// b', 'struct E [hash=0x00002468acf08a]'].join('\n')
		)
	})

	it('should print literal sizes as written', () => {
		assert.strictEqual(
			dump('struct P { int8_t a[4]; }'),
			['struct P [hash=0x7d89094970233709]', '\tint8_t                a [ (const) 4 ]'].join('\n')
		)
	})

	describe('renderFiles', () => {
		it('should dump syntax trees without resolving them', () => {
			const source = [
				'package p;',
				'// outer',
				'struct S { const int8_t N = 3; other.T t[N][n]; int16_t n; }',
				'enum E { A }',
			].join('\n')

			assert.strictEqual(
				renderFiles([parseSource(source, 's.keel')]),
				[
					'// outer',
					'struct p.S [hash=unavailable]',
					'\tconst int8_t          N = 3',
					'\tother.T               t [ (const) 3 ] [ (var) n ]',
					'\tint16_t               n',
					'enum p.E [hash=unavailable]',
					'\tA = 0',
				].join('\n')
			)
		})

		it('should match the resolved dump apart from the hashes', () => {
			const source = 'package geo; struct Point { double x; double y; int8_t n; byte data[n]; }'
			const resolved = renderUnit(compile([{ filename: 'g.keel', source }]).unit)
			const parsed = renderFiles([parseSource(source, 'g.keel')])
			assert.strictEqual(parsed, resolved.replace(/\[hash=0x[0-9a-f]+\]/, '[hash=unavailable]'))
		})
	})
})
