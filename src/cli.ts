#!/usr/bin/env node
import fs from 'node:fs'
import { Command } from 'commander'
import chalk from 'chalk'
import { isHex } from 'viem'
import { loadConfig } from './config.js'
import { parseParams, parseProofJson, parseProofText } from './lib/codec.js'
import { isVerificationError } from './lib/errors.js'
import { MemoryLedgerStore, type LedgerStore } from './lib/ledger.js'
import { createLogger } from './lib/logger.js'
import { SqliteLedgerStore } from './lib/sqlite_ledger.js'
import { ippRoundsForDimension } from './lib/structure.js'
import { RangeProofVerifier } from './lib/verifier.js'
import type { Proof } from './types/index.js'

function readProof(file: string, rounds: number): Proof {
	const text = fs.readFileSync(file, 'utf-8')
	if (text.trimStart().startsWith('{')) {
		const json: unknown = JSON.parse(text)
		return parseProofJson(json, rounds)
	}
	return parseProofText(text, rounds)
}

function parseBound(value: string): bigint {
	if (!/^-?\d+$/.test(value.trim())) throw new RangeError(`not an integer: ${value}`)
	return BigInt(value.trim())
}

/**
 * Failures caused by what the caller passed in: unparsable files or
 * options, and files or ledgers that cannot be opened.
 */
function describeInputError(e: unknown): string | undefined {
	if (isVerificationError(e)) return `${e.kind}: ${e.message}`
	if (e instanceof SyntaxError) return `Malformed JSON: ${e.message}`
	if (e instanceof RangeError) return `Invalid option: ${e.message}`
	if (e instanceof Error && 'code' in e && typeof e.code === 'string') return `${e.code}: ${e.message}`
	return undefined
}

function openStore(ledgerPath: string): LedgerStore & { close?: () => void } {
	return ledgerPath ? new SqliteLedgerStore(ledgerPath) : new MemoryLedgerStore()
}

export function buildProgram(): Command {
	const program = new Command()

	program
		.name('range-verifier')
		.description('Verify non-interactive range proofs and track accepted proofs')
		.version('0.1.0')

	program
		.command('verify')
		.description('Verify one proof against a parameter file and a claimed range')
		.requiredOption('--proof <file>', 'Proof file (line format or JSON export)')
		.requiredOption('--subject <id>', 'Claiming party')
		.option('--params <file>', 'Parameter file (g, h, n as hex lines)')
		.requiredOption('--min <n>', 'Range lower bound')
		.requiredOption('--max <n>', 'Range upper bound')
		.option('--ledger <file>', 'SQLite ledger file (in-memory when omitted)')
		.action((opts: { proof: string; subject: string; params?: string; min: string; max: string; ledger?: string }) => {
			const config = loadConfig({ paramsPath: opts.params, ledgerPath: opts.ledger })
			const logger = createLogger(config.logLevel)
			let store: ReturnType<typeof openStore> | undefined

			try {
				store = openStore(config.ledgerPath)
				const rounds = ippRoundsForDimension(config.ippDimension)
				const params = parseParams(fs.readFileSync(config.paramsPath, 'utf-8'))
				const proof = readProof(opts.proof, rounds)
				const verifier = new RangeProofVerifier({ store, ippDimension: config.ippDimension, logger })
				const range = { min: parseBound(opts.min), max: parseBound(opts.max) }

				const result = verifier.verify(params, proof, range, opts.subject)
				if (result.valid) {
					console.log(chalk.green('✓ Proof accepted'))
					console.log(`Identity: ${result.identity}`)
					console.log(chalk.dim(`Range: [${range.min}, ${range.max}]  Subject: ${opts.subject}`))
				} else {
					console.log(chalk.red(`✗ Proof rejected: ${result.error.kind}`))
					console.log(chalk.dim(`${result.error.message} (stage ${result.stage}, ${result.error.category})`))
					process.exitCode = 1
				}
			} catch (e) {
				const reason = describeInputError(e)
				if (reason === undefined) throw e
				console.log(chalk.red(`✗ Input rejected: ${reason}`))
				process.exitCode = 2
			} finally {
				store?.close?.()
			}
		})

	program
		.command('status')
		.description('Show ledger state for a proof identity or a subject')
		.requiredOption('--ledger <file>', 'SQLite ledger file')
		.option('--identity <hash>', 'Proof identity')
		.option('--subject <id>', 'Claiming party')
		.action((opts: { ledger: string; identity?: string; subject?: string }) => {
			const store = new SqliteLedgerStore(opts.ledger)
			try {
				if (opts.identity !== undefined) {
					if (!isHex(opts.identity)) {
						console.log(chalk.red(`Not a hex identity: ${opts.identity}`))
						process.exitCode = 2
						return
					}
					const verified = store.isVerified(opts.identity)
					console.log(verified ? chalk.green('verified') : chalk.yellow('not verified'))
				}
				if (opts.subject !== undefined) {
					const latest = store.latestIdentity(opts.subject)
					console.log(latest ?? chalk.dim('no accepted proof'))
				}
			} finally {
				store.close()
			}
		})

	return program
}

export function run(argv: string[] = process.argv): void {
	buildProgram().parse(argv)
}

const isDirect = process.argv[1]?.endsWith('cli.js') || process.argv[1]?.endsWith('cli.ts')
if (isDirect) {
	run()
}
