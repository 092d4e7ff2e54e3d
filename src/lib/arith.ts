import { mod } from '@noble/curves/abstract/modular.js'
import type { ResidueRing } from '../math.js'

/**
 * Exact modular arithmetic over native bigints.
 *
 * A modulus of 0 yields 0 everywhere instead of throwing, so malformed
 * parameters surface as failed equality checks rather than exceptions.
 */

/**
 * base^exponent mod modulus by binary square-and-multiply.
 * A zero base yields 0 even for a zero exponent.
 */
export function modpow(base: bigint, exponent: bigint, modulus: bigint): bigint {
	if (exponent < 0n) throw new RangeError('modpow: negative exponent')
	if (modulus === 0n) return 0n
	if (base === 0n) return 0n
	if (exponent === 0n) return mod(1n, modulus)

	let result = 1n
	let b = mod(base, modulus)
	let e = exponent
	while (e > 0n) {
		if (e & 1n) result = (result * b) % modulus
		b = (b * b) % modulus
		e >>= 1n
	}
	return result
}

export function mulmod(a: bigint, b: bigint, modulus: bigint): bigint {
	if (modulus === 0n) return 0n
	return mod(a * b, modulus)
}

export function addmod(a: bigint, b: bigint, modulus: bigint): bigint {
	if (modulus === 0n) return 0n
	return mod(a + b, modulus)
}

/**
 * Bind the modular operations to one modulus.
 */
export function createModularRing(modulus: bigint): ResidueRing<bigint> {
	const reduce = (a: bigint): bigint => (modulus === 0n ? 0n : mod(a, modulus))
	const add = (a: bigint, b: bigint): bigint => addmod(a, b, modulus)
	const mul = (a: bigint, b: bigint): bigint => mulmod(a, b, modulus)

	return {
		modulus,
		zero: 0n,
		one: reduce(1n),
		mod: reduce,
		add,
		mul,
		exp: (base, exponent) => modpow(base, exponent, modulus),
		eq: (a, b) => reduce(a) === reduce(b),
		ne: (a, b) => reduce(a) !== reduce(b),
		isZero: (a) => reduce(a) === 0n,
		evalPolyAt(coefficients, x) {
			// Horner, highest degree first
			let acc = 0n
			for (let i = coefficients.length - 1; i >= 0; i--) {
				acc = add(mul(acc, x), coefficients[i])
			}
			return acc
		},
	}
}
