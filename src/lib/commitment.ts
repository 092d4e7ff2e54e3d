import { modpow, mulmod } from './arith.js'
import { VerificationError } from './errors.js'
import type { Proof, PublicParameters } from '../types/index.js'

/**
 * Pedersen commitment over the RSA group: g^m * h^r mod n.
 */
export function pedersenCommit(params: PublicParameters, m: bigint, r: bigint): bigint {
	const { g, h, n } = params
	return mulmod(modpow(g, m, n), modpow(h, r, n), n)
}

/**
 * Check that T1 and T2 open to (t1, tau1) and (t2, tau2).
 */
export function verifyCommitments(params: PublicParameters, proof: Proof): void {
	if (pedersenCommit(params, proof.t1, proof.tau1) !== proof.T1) {
		throw new VerificationError('CommitmentMismatch', 'T1 does not open to (t1, tau1)', 'T1')
	}
	if (pedersenCommit(params, proof.t2, proof.tau2) !== proof.T2) {
		throw new VerificationError('CommitmentMismatch', 'T2 does not open to (t2, tau2)', 'T2')
	}
}
