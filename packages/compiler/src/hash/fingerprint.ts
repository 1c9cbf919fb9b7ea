/**
 * 64-bit structural fingerprints.
 *
 * The accumulator starts at HASH_SEED; every byte is mixed in as
 * `acc = rotl64(acc, 8) ^ byte` and the result is finalized with `rotl64(acc, 1)`.
 * A type's fingerprint covers its short name, its members' names and, for struct
 * fields, the dimensions and the fingerprint of the field type.
 */

import { HashConsistencyError } from '../core/errors.ts'
import type { PrimitiveType } from '../parse/ast.ts'
import {
	type DeclId,
	DimensionMode,
	isFixedLayout,
	type ResolvedField,
	type ResolvedUnit,
} from '../resolve/unit.ts'

export const HASH_SEED = 0x12345678n

const MASK_64 = (1n << 64n) - 1n

const utf8 = new TextEncoder()

export function rotl64(value: bigint, bits: bigint): bigint {
	const v = value & MASK_64
	return ((v << bits) | (v >> (64n - bits))) & MASK_64
}

export function mixByte(acc: bigint, byte: number): bigint {
	return rotl64(acc, 8n) ^ BigInt(byte & 0xff)
}

/** Mixes the UTF-8 bytes of text, without a length prefix. */
export function mixString(acc: bigint, text: string): bigint {
	let result = acc
	for (const byte of utf8.encode(text)) {
		result = mixByte(result, byte)
	}
	return result
}

/** Mixes a 64-bit word as 8 big-endian bytes. */
export function mixWord(acc: bigint, word: bigint): bigint {
	const w = word & MASK_64
	let result = acc
	for (let shift = 56n; shift >= 0n; shift -= 8n) {
		result = mixByte(result, Number((w >> shift) & 0xffn))
	}
	return result
}

const primitiveSignatures = new Map<PrimitiveType, bigint>()

/** Fingerprint of a primitive's name alone. */
export function primitiveSignature(name: PrimitiveType): bigint {
	let signature = primitiveSignatures.get(name)
	if (signature === undefined) {
		signature = rotl64(mixString(HASH_SEED, name), 1n)
		primitiveSignatures.set(name, signature)
	}
	return signature
}

/** Formats a fingerprint as `0x` followed by at least 14 hex digits. */
export function formatHash(hash: bigint): string {
	return `0x${hash.toString(16).padStart(14, '0')}`
}

// =============================================================================
// ENGINE
// =============================================================================

interface Contribution {
	hash: bigint
	/** True when a type already in progress was reached below this one */
	touchedGuard: boolean
}

/**
 * Computes fingerprints over one unit.
 * Types referenced while already in progress contribute 0; results computed
 * without reaching the guard are memoized across top-level computations.
 */
export class HashEngine {
	private readonly memo = new Map<DeclId, bigint>()
	private readonly inProgress: DeclId[] = []
	/** fixedEdges[i] is true when inProgress[i] contains inProgress[i + 1] with fixed layout */
	private readonly fixedEdges: boolean[] = []

	constructor(private readonly unit: ResolvedUnit) {}

	hashOf(id: DeclId): bigint {
		this.inProgress.length = 0
		this.fixedEdges.length = 0
		return this.visit(id).hash
	}

	private visit(id: DeclId): Contribution {
		const memoized = this.memo.get(id)
		if (memoized !== undefined) return { hash: memoized, touchedGuard: false }

		const decl = this.unit.get(id)
		this.inProgress.push(id)

		let touchedGuard = false
		let acc = mixString(HASH_SEED, decl.name)
		if (decl.kind === 'struct') {
			for (const field of decl.fields) {
				acc = mixString(acc, field.name)
				acc = this.mixDimensions(acc, field)
				const contribution = this.typeContribution(field)
				touchedGuard ||= contribution.touchedGuard
				acc = mixWord(acc, contribution.hash)
			}
		} else {
			for (const value of decl.values) {
				acc = mixString(acc, value.name)
			}
		}

		this.inProgress.pop()
		const hash = rotl64(acc, 1n)
		if (!touchedGuard) this.memo.set(id, hash)
		return { hash, touchedGuard }
	}

	private mixDimensions(acc: bigint, field: ResolvedField): bigint {
		let result = mixByte(acc, field.dimensions.length)
		for (const dim of field.dimensions) {
			result = mixByte(result, dim.mode)
			if (dim.mode === DimensionMode.Constant) result = mixWord(result, dim.size)
		}
		return result
	}

	private typeContribution(field: ResolvedField): Contribution {
		if (field.type.kind === 'primitive') {
			return { hash: primitiveSignature(field.type.name), touchedGuard: false }
		}

		const target = field.type.id
		const fixed = isFixedLayout(field)
		const start = this.inProgress.indexOf(target)
		if (start !== -1) {
			const cycleIsFixed = fixed && this.fixedEdges.slice(start).every(Boolean)
			if (cycleIsFixed) {
				const decl = this.unit.get(target)
				throw new HashConsistencyError(decl.qualifiedName, decl.position)
			}
			return { hash: 0n, touchedGuard: true }
		}

		this.fixedEdges.push(fixed)
		const contribution = this.visit(target)
		this.fixedEdges.pop()
		return contribution
	}
}

/**
 * Attach a fingerprint to every declaration of unit.
 *
 * @throws {HashConsistencyError} If a fixed-layout cycle reached the engine
 */
export function computeHashes(unit: ResolvedUnit): void {
	const engine = new HashEngine(unit)
	for (const [id, decl] of unit) {
		decl.hash = engine.hashOf(id)
	}
}

/** Fingerprint of one declaration, computed without touching the unit. */
export function hashDeclaration(unit: ResolvedUnit, id: DeclId): bigint {
	return new HashEngine(unit).hashOf(id)
}
