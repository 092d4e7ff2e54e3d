import { mod, hash as keccak, bytesToBigInt, packWords, type HashFunction } from './crypto.js'
import { VerificationError } from './errors.js'
import type { Challenges, Proof } from '../types/index.js'

/**
 * Build a Fiat–Shamir challenge with the packing the prover uses:
 * word(input_0) || word(input_1) || ... hashed, read big-endian, reduced mod n.
 */
export function buildChallenge(
	inputs: ReadonlyArray<bigint>,
	n: bigint,
	hash: HashFunction = keccak
): bigint {
	if (n === 0n) return 0n
	return mod(bytesToBigInt(hash(packWords(inputs))), n)
}

/**
 * Re-derive y, z and x from the proof transcript.
 *
 * z does not feed any later check, but it is part of the transcript and
 * must still be non-zero.
 */
export function deriveChallenges(
	proof: Proof,
	n: bigint,
	hash: HashFunction = keccak
): Challenges {
	const y = buildChallenge([proof.A, proof.S, proof.C, proof.C_v1, proof.C_v2], n, hash)
	if (y === 0n) throw new VerificationError('InvalidChallengeY', 'challenge y is zero')

	const z = buildChallenge([y], n, hash)
	if (z === 0n) throw new VerificationError('InvalidChallengeZ', 'challenge z is zero')

	const x = buildChallenge([proof.T1, proof.T2], n, hash)
	if (x === 0n) throw new VerificationError('InvalidChallengeX', 'challenge x is zero')

	return { y, z, x }
}
