import { createModularRing } from './arith.js'
import { pedersenCommit } from './commitment.js'
import { VerificationError } from './errors.js'
import type { Proof, PublicParameters } from '../types/index.js'

/**
 * t(x) = t0 + t1*x + t2*x^2 mod n
 */
export function evaluateBlindingPolynomial(proof: Proof, x: bigint, n: bigint): bigint {
	return createModularRing(n).evalPolyAt([proof.t0, proof.t1, proof.t2], x)
}

/**
 * Check t_hat against the blinding polynomial at x, then bind both sides
 * under tau_x. The second check follows from the first whenever t_hat and
 * rhs share one representation; it is kept as part of the transcript.
 */
export function verifyPolynomialRelation(params: PublicParameters, proof: Proof, x: bigint): void {
	const rhs = evaluateBlindingPolynomial(proof, x, params.n)
	if (proof.t_hat !== rhs) {
		throw new VerificationError('PolynomialMismatch', 't_hat != t0 + t1*x + t2*x^2')
	}

	const lhsCommit = pedersenCommit(params, proof.t_hat, proof.tau_x)
	const rhsCommit = pedersenCommit(params, rhs, proof.tau_x)
	if (lhsCommit !== rhsCommit) {
		throw new VerificationError('CommitmentMismatch', 'commitment to t_hat does not match', 't_hat')
	}
}
