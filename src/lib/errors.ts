/**
 * Rejection taxonomy. Every check throws a VerificationError; the verifier
 * turns it into a failed result at the first failure.
 */
export type RejectionKind =
	| 'InvalidParameters'
	| 'InvalidRange'
	| 'InvalidSubject'
	| 'MalformedProofShape'
	| 'DuplicateProof'
	| 'InvalidChallengeY'
	| 'InvalidChallengeZ'
	| 'InvalidChallengeX'
	| 'CommitmentMismatch'
	| 'PolynomialMismatch'
	| 'ZeroField'
	| 'NonDistinctCommitments'
	| 'IppLengthMismatch'
	| 'IppLevelMismatch'

/**
 * malformed: the caller sent bad input.
 * invalid-proof: the proof does not check out under these parameters.
 * duplicate: the proof was already accepted.
 */
export type RejectionCategory = 'malformed' | 'invalid-proof' | 'duplicate'

const CATEGORY: Record<RejectionKind, RejectionCategory> = {
	InvalidParameters: 'malformed',
	InvalidRange: 'malformed',
	InvalidSubject: 'malformed',
	MalformedProofShape: 'malformed',
	DuplicateProof: 'duplicate',
	InvalidChallengeY: 'invalid-proof',
	InvalidChallengeZ: 'invalid-proof',
	InvalidChallengeX: 'invalid-proof',
	CommitmentMismatch: 'invalid-proof',
	PolynomialMismatch: 'invalid-proof',
	ZeroField: 'invalid-proof',
	NonDistinctCommitments: 'invalid-proof',
	IppLengthMismatch: 'invalid-proof',
	IppLevelMismatch: 'invalid-proof',
}

export class VerificationError extends Error {
	readonly kind: RejectionKind
	readonly field?: string
	readonly category: RejectionCategory

	constructor(kind: RejectionKind, message: string, field?: string) {
		super(message)
		this.name = 'VerificationError'
		this.kind = kind
		this.field = field
		this.category = CATEGORY[kind]
	}
}

export function isVerificationError(e: unknown): e is VerificationError {
	return e instanceof VerificationError
}
