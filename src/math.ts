export interface Eq<T> {
	readonly eq: (a: T, b: T) => boolean
	readonly ne: (a: T, b: T) => boolean
}

export interface AdditiveSemigroup<T> {
	readonly add: (a: T, b: T) => T
}

export interface AdditiveMonoid<T> extends AdditiveSemigroup<T> {
	readonly zero: T
}

export interface MultiplicativeSemigroup<T> {
	readonly mul: (a: T, b: T) => T
}

export interface MultiplicativeMonoid<T> extends MultiplicativeSemigroup<T> {
	readonly one: T
}

/**
 * Commutative ring of residues modulo a (not necessarily prime) modulus.
 * No inverses are exposed: an RSA modulus has zero divisors.
 */
export interface ResidueRing<T> extends Eq<T>, AdditiveMonoid<T>, MultiplicativeMonoid<T> {
	readonly modulus: bigint
	readonly mod: (a: T) => T
	readonly exp: (base: T, exponent: T) => T
	readonly isZero: (a: T) => boolean

	// Polynomials encoded as coefficient lists, lowest degree first
	evalPolyAt(coefficients: ReadonlyArray<T>, x: T): T
}
