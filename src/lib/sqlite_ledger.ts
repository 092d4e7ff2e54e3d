import Database from 'better-sqlite3'
import fs from 'node:fs'
import path from 'node:path'
import { isHex } from 'viem'
import { getLogger } from './logger.js'
import { normalize, type LedgerStore } from './ledger.js'
import type { ProofIdentity, Subject } from '../types/index.js'

const MIGRATIONS = [
	// 001: verified proofs and latest proof per subject
	`
	CREATE TABLE IF NOT EXISTS verified_proofs (
		identity TEXT PRIMARY KEY,
		subject TEXT NOT NULL,
		verified_at TEXT NOT NULL DEFAULT (datetime('now'))
	);

	CREATE TABLE IF NOT EXISTS latest_proofs (
		subject TEXT PRIMARY KEY,
		identity TEXT NOT NULL REFERENCES verified_proofs(identity)
	);
	`,
]

function migrate(db: Database.Database): void {
	const version = db.pragma('user_version', { simple: true })
	const current = typeof version === 'number' ? version : 0
	for (let i = current; i < MIGRATIONS.length; i++) {
		db.exec(MIGRATIONS[i])
		db.pragma(`user_version = ${i + 1}`)
		getLogger().debug({ migration: i + 1 }, 'Applied ledger migration')
	}
}

/**
 * Ledger backed by a SQLite file. The insert into verified_proofs is the
 * check-and-set; it shares one transaction with the latest_proofs upsert,
 * so concurrent processes on the same file see exactly one winner.
 */
export class SqliteLedgerStore implements LedgerStore {
	private readonly db: Database.Database
	private readonly recordTx: Database.Transaction<(identity: ProofIdentity, subject: Subject) => boolean>

	constructor(file: string = ':memory:') {
		if (file !== ':memory:') fs.mkdirSync(path.dirname(file), { recursive: true })
		this.db = new Database(file)
		this.db.pragma('journal_mode = WAL')
		migrate(this.db)

		const insertVerified = this.db.prepare(
			'INSERT INTO verified_proofs (identity, subject) VALUES (?, ?) ON CONFLICT(identity) DO NOTHING'
		)
		const upsertLatest = this.db.prepare(`
			INSERT INTO latest_proofs (subject, identity) VALUES (?, ?)
			ON CONFLICT(subject) DO UPDATE SET identity = excluded.identity
		`)

		this.recordTx = this.db.transaction((identity: ProofIdentity, subject: Subject): boolean => {
			const info = insertVerified.run(identity, subject)
			if (info.changes === 0) return false
			upsertLatest.run(subject, identity)
			return true
		})
	}

	isVerified(identity: ProofIdentity): boolean {
		const row = this.db
			.prepare('SELECT 1 AS found FROM verified_proofs WHERE identity = ?')
			.get(normalize(identity)) as { found: number } | undefined
		return row !== undefined
	}

	latestIdentity(subject: Subject): ProofIdentity | undefined {
		const row = this.db
			.prepare('SELECT identity FROM latest_proofs WHERE subject = ?')
			.get(subject) as { identity: string } | undefined
		if (!row) return undefined
		return isHex(row.identity) ? row.identity : undefined
	}

	tryRecord(identity: ProofIdentity, subject: Subject): boolean {
		// IMMEDIATE takes the write lock before the existence check
		return this.recordTx.immediate(normalize(identity), subject)
	}

	close(): void {
		this.db.close()
	}
}
