import type { ProofIdentity, Subject } from '../types/index.js'

/**
 * Storage capability behind the duplicate ledger.
 *
 * `tryRecord` is the single atomic check-and-set: when the identity is not
 * yet verified it marks it verified and points the subject at it, both or
 * neither, and returns true. Otherwise it writes nothing and returns false.
 */
export interface LedgerStore {
	isVerified(identity: ProofIdentity): boolean
	latestIdentity(subject: Subject): ProofIdentity | undefined
	tryRecord(identity: ProofIdentity, subject: Subject): boolean
}

/**
 * In-process store. Node runs `tryRecord` to completion without
 * interleaving, which makes the two map writes one unit.
 */
export class MemoryLedgerStore implements LedgerStore {
	private readonly verified = new Map<ProofIdentity, true>()
	private readonly latest = new Map<Subject, ProofIdentity>()

	isVerified(identity: ProofIdentity): boolean {
		return this.verified.has(normalize(identity))
	}

	latestIdentity(subject: Subject): ProofIdentity | undefined {
		return this.latest.get(subject)
	}

	tryRecord(identity: ProofIdentity, subject: Subject): boolean {
		const key = normalize(identity)
		if (this.verified.has(key)) return false
		this.verified.set(key, true)
		this.latest.set(subject, key)
		return true
	}

	get size(): number {
		return this.verified.size
	}
}

/**
 * Read and record accepted proofs. Entries are only ever added.
 */
export class VerificationLedger {
	constructor(private readonly store: LedgerStore = new MemoryLedgerStore()) {}

	isVerified(identity: ProofIdentity): boolean {
		return this.store.isVerified(identity)
	}

	latestIdentity(subject: Subject): ProofIdentity | undefined {
		return this.store.latestIdentity(subject)
	}

	/**
	 * Returns false when another verification recorded the identity first.
	 */
	record(identity: ProofIdentity, subject: Subject): boolean {
		return this.store.tryRecord(identity, subject)
	}
}

export function normalize(identity: ProofIdentity): ProofIdentity {
	return `0x${identity.slice(2).toLowerCase()}`
}
