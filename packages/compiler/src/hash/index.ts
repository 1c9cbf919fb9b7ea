export {
	computeHashes,
	formatHash,
	HASH_SEED,
	HashEngine,
	hashDeclaration,
	mixByte,
	mixString,
	mixWord,
	primitiveSignature,
	rotl64,
} from './fingerprint.ts'
