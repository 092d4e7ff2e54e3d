import { mod } from './crypto.js'
import { VerificationError } from './errors.js'
import type { Proof } from '../types/index.js'

/** Inner-product vector dimension of the supported configuration. */
export const DEFAULT_IPP_DIMENSION = 64

/** Folding rounds for the default dimension: log2(64). */
export const DEFAULT_IPP_ROUNDS = 6

/** Largest supported inner-product vector dimension. */
export const MAX_IPP_DIMENSION = 1 << 20

/**
 * Number of folding rounds an inner-product argument over `dimension`
 * elements produces: ceil(log2(dimension)).
 */
export function ippRoundsForDimension(dimension: number): number {
	if (!Number.isInteger(dimension) || dimension < 1 || dimension > MAX_IPP_DIMENSION) {
		throw new RangeError(`ippRoundsForDimension: invalid dimension ${dimension}`)
	}
	return Math.ceil(Math.log2(dimension))
}

/**
 * Rounds for a range of `bits` bits, one vector element per bit.
 */
export function ippRoundsForBitWidth(bits: number): number {
	return ippRoundsForDimension(bits)
}

const NON_ZERO_FIELDS = ['A', 'S', 'T1', 'T2', 'C', 'C_v1', 'C_v2'] as const

/**
 * Shape and sanity checks that need no challenge values.
 */
export function verifyStructure(proof: Proof, n: bigint, rounds: number = DEFAULT_IPP_ROUNDS): void {
	for (const name of NON_ZERO_FIELDS) {
		if (mod(proof[name], n) === 0n) {
			throw new VerificationError('ZeroField', `${name} is zero mod n`, name)
		}
	}

	if (proof.C === proof.C_v1 || proof.C === proof.C_v2 || proof.C_v1 === proof.C_v2) {
		throw new VerificationError('NonDistinctCommitments', 'C, C_v1 and C_v2 must be pairwise distinct')
	}

	if (proof.ipp_L.length !== proof.ipp_R.length) {
		throw new VerificationError(
			'IppLengthMismatch',
			`ipp_L has ${proof.ipp_L.length} elements, ipp_R has ${proof.ipp_R.length}`
		)
	}
	if (proof.ipp_L.length !== rounds) {
		throw new VerificationError(
			'IppLevelMismatch',
			`expected ${rounds} inner-product rounds, got ${proof.ipp_L.length}`
		)
	}
}
