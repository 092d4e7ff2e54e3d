import { bytesToHex, encodeAbiParameters, hexToBytes } from 'viem'
import { hash as keccak, type HashFunction } from './crypto.js'
import type { Proof, ProofIdentity } from '../types/index.js'

/**
 * ABI layout of the proof tuple. Encoding with it reproduces
 * `keccak256(abi.encode(proof))` as computed by an EVM verifier contract:
 * fixed field order, 32-byte words, explicit lengths for ipp_L and ipp_R.
 */
export const PROOF_ABI = [
	{
		type: 'tuple',
		components: [
			{ name: 'A', type: 'uint256' },
			{ name: 'S', type: 'uint256' },
			{ name: 'T1', type: 'uint256' },
			{ name: 'T2', type: 'uint256' },
			{ name: 'tau_x', type: 'uint256' },
			{ name: 'mu', type: 'uint256' },
			{ name: 't_hat', type: 'uint256' },
			{ name: 'C', type: 'uint256' },
			{ name: 'C_v1', type: 'uint256' },
			{ name: 'C_v2', type: 'uint256' },
			{ name: 't0', type: 'uint256' },
			{ name: 't1', type: 'uint256' },
			{ name: 't2', type: 'uint256' },
			{ name: 'tau1', type: 'uint256' },
			{ name: 'tau2', type: 'uint256' },
			{ name: 'ipp_L', type: 'uint256[]' },
			{ name: 'ipp_R', type: 'uint256[]' },
			{ name: 'ipp_a', type: 'uint256' },
			{ name: 'ipp_b', type: 'uint256' },
		],
	},
] as const

export function encodeProof(proof: Proof): Uint8Array {
	return hexToBytes(encodeAbiParameters(PROOF_ABI, [proof]))
}

/**
 * Content hash of the whole proof, used as the deduplication key.
 */
export function proofIdentity(proof: Proof, hash: HashFunction = keccak): ProofIdentity {
	return bytesToHex(hash(encodeProof(proof)))
}
