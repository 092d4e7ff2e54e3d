import type pino from 'pino'
import { zeroAddress } from 'viem'
import { deriveChallenges } from './challenge.js'
import { decodeFlatProof } from './codec.js'
import { verifyCommitments } from './commitment.js'
import { hash as keccak, isWord, type HashFunction } from './crypto.js'
import { VerificationError, isVerificationError } from './errors.js'
import { proofIdentity } from './identity.js'
import { MemoryLedgerStore, VerificationLedger, type LedgerStore } from './ledger.js'
import { getLogger } from './logger.js'
import { verifyPolynomialRelation } from './polynomial.js'
import { DEFAULT_IPP_DIMENSION, ippRoundsForDimension, verifyStructure } from './structure.js'
import {
	SCALAR_FIELDS,
	type Proof,
	type ProofIdentity,
	type PublicParameters,
	type RangeClaim,
	type Subject,
	type VerificationEvent,
	type VerificationResult,
	type VerificationStage,
} from '../types/index.js'

export type VerificationObserver = (event: VerificationEvent) => void

export interface VerifierOptions {
	/** Ledger backend; in-memory when omitted. */
	store?: LedgerStore
	/** Inner-product vector dimension; fixes the expected round count. */
	ippDimension?: number
	/** Milliseconds since the epoch, stamped on emitted events. */
	now?: () => number
	hash?: HashFunction
	logger?: pino.Logger
	observers?: VerificationObserver[]
}

export function isEmptySubject(subject: Subject): boolean {
	return subject.trim() === '' || subject.toLowerCase() === zeroAddress
}

export function validateParameters(params: PublicParameters): void {
	const { g, h, n } = params
	if (g === 0n || h === 0n || n === 0n) {
		throw new VerificationError('InvalidParameters', 'g, h and n must be non-zero')
	}
	if (g < 0n || h < 0n || n < 0n || g >= n || h >= n) {
		throw new VerificationError('InvalidParameters', 'g and h must lie in [1, n)')
	}
	if (!isWord(n)) {
		throw new VerificationError('InvalidParameters', 'n must fit in 256 bits')
	}
}

function validateProofWords(proof: Proof): void {
	for (const name of SCALAR_FIELDS) {
		if (!isWord(proof[name])) {
			throw new VerificationError('MalformedProofShape', `${name} is not a 256-bit word`, name)
		}
	}
	const vectors = [...proof.ipp_L, ...proof.ipp_R, proof.ipp_a, proof.ipp_b]
	if (!vectors.every(isWord)) {
		throw new VerificationError('MalformedProofShape', 'inner-product values must be 256-bit words')
	}
}

/**
 * Verifies range proofs and records each accepted proof once.
 *
 * Every check before Committing is pure; the ledger write in Committing is
 * the only mutation, so a rejected proof leaves no trace.
 */
export class RangeProofVerifier {
	readonly ledger: VerificationLedger
	readonly ippRounds: number
	private readonly now: () => number
	private readonly hash: HashFunction
	private readonly logger: pino.Logger
	private readonly observers: VerificationObserver[]

	constructor(options: VerifierOptions = {}) {
		this.ledger = new VerificationLedger(options.store ?? new MemoryLedgerStore())
		this.ippRounds = ippRoundsForDimension(options.ippDimension ?? DEFAULT_IPP_DIMENSION)
		this.now = options.now ?? Date.now
		this.hash = options.hash ?? keccak
		this.logger = (options.logger ?? getLogger()).child({ component: 'verifier' })
		this.observers = [...(options.observers ?? [])]
	}

	subscribe(observer: VerificationObserver): () => void {
		this.observers.push(observer)
		return () => {
			const i = this.observers.indexOf(observer)
			if (i !== -1) this.observers.splice(i, 1)
		}
	}

	isVerified(identity: ProofIdentity): boolean {
		return this.ledger.isVerified(identity)
	}

	latestIdentity(subject: Subject): ProofIdentity | undefined {
		return this.ledger.latestIdentity(subject)
	}

	/**
	 * Run every check in order and stop at the first failure.
	 */
	verify(params: PublicParameters, proof: Proof, range: RangeClaim, subject: Subject): VerificationResult {
		let stage: VerificationStage = 'Validating'
		const enter = (next: VerificationStage) => {
			stage = next
			this.logger.debug({ stage }, 'Entering stage')
		}

		try {
			enter('Validating')
			if (range.min > range.max) {
				throw new VerificationError('InvalidRange', `range [${range.min}, ${range.max}] is empty`)
			}
			if (isEmptySubject(subject)) {
				throw new VerificationError('InvalidSubject', 'subject is empty')
			}
			validateParameters(params)
			validateProofWords(proof)

			const identity = proofIdentity(proof, this.hash)
			if (this.ledger.isVerified(identity)) {
				throw new VerificationError('DuplicateProof', `proof ${identity} was already accepted`)
			}

			enter('ChallengeDerivation')
			const challenges = deriveChallenges(proof, params.n, this.hash)

			enter('CommitmentCheck')
			verifyCommitments(params, proof)
			verifyPolynomialRelation(params, proof, challenges.x)

			enter('StructuralCheck')
			verifyStructure(proof, params.n, this.ippRounds)

			enter('Committing')
			if (!this.ledger.record(identity, subject)) {
				throw new VerificationError('DuplicateProof', `proof ${identity} was accepted concurrently`)
			}

			const event: VerificationEvent = {
				subject,
				identity,
				rangeMin: range.min,
				rangeMax: range.max,
				accepted: true,
				timestamp: this.now(),
			}
			this.logger.info({ subject, identity }, 'Proof accepted')
			this.emit(event)

			return { valid: true, identity, challenges, event }
		} catch (e) {
			if (!isVerificationError(e)) throw e
			this.logger.warn({ kind: e.kind, field: e.field, stage, subject }, `Proof rejected: ${e.message}`)
			return { valid: false, error: e, stage }
		}
	}

	/**
	 * Verify a flattened proof. Shape errors are reported before any
	 * arithmetic runs.
	 */
	verifyFlat(
		params: PublicParameters,
		values: ReadonlyArray<bigint>,
		range: RangeClaim,
		subject: Subject
	): VerificationResult {
		let proof: Proof
		try {
			proof = decodeFlatProof(values, this.ippRounds)
		} catch (e) {
			if (!isVerificationError(e)) throw e
			this.logger.warn({ kind: e.kind, subject }, `Proof rejected: ${e.message}`)
			return { valid: false, error: e, stage: 'Validating' }
		}
		return this.verify(params, proof, range, subject)
	}

	private emit(event: VerificationEvent): void {
		for (const observer of this.observers) {
			try {
				observer(event)
			} catch (e) {
				// The ledger entry is final; observer failures are reported, not undone
				this.logger.error({ err: e, identity: event.identity }, 'Verification observer failed')
			}
		}
	}
}
