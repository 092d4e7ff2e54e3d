import { mod } from '@noble/curves/abstract/modular.js'
import { bytesToNumberBE } from '@noble/curves/utils.js'
import { keccak_256 } from '@noble/hashes/sha3.js'
import { concat, encodeU256 } from './bytes.js'

export { mod }

/** Width of one transcript word in bytes. */
export const WORD_BYTES = 32

/** Exclusive upper bound of an unsigned 256-bit word. */
export const WORD_LIMIT = 1n << 256n

export const bytesToBigInt = bytesToNumberBE

/**
 * Hashing primitive consumed by the transcript and the proof identity.
 */
export type HashFunction = (data: Uint8Array) => Uint8Array

/**
 * Hash helper: Keccak-256 over a single byte array.
 */
export function hash(data: Uint8Array): Uint8Array {
	return keccak_256(data)
}

export function isWord(value: bigint): boolean {
	return value >= 0n && value < WORD_LIMIT
}

/**
 * Concatenate the 32-byte big-endian encodings of every input.
 */
export function packWords(inputs: ReadonlyArray<bigint>): Uint8Array {
	return concat(...inputs.map(v => encodeU256(v, WORD_BYTES)))
}
