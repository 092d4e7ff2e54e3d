import fs from 'node:fs'
import path from 'node:path'
import { DEFAULT_IPP_DIMENSION } from './lib/structure.js'

export interface Config {
	// Parameter file with g, h, n as hex lines
	paramsPath: string

	// SQLite ledger file; empty keeps the ledger in memory
	ledgerPath: string

	// Inner-product vector dimension of accepted proofs
	ippDimension: number

	// Logging
	logLevel: string
}

function loadEnvFile(cwd: string): void {
	const envPath = path.resolve(cwd, '.env')
	let envText: string
	try {
		envText = fs.readFileSync(envPath, 'utf-8')
	} catch {
		// .env is optional
		return
	}
	for (const line of envText.split('\n')) {
		const trimmed = line.trim()
		if (!trimmed || trimmed.startsWith('#')) continue
		const eq = trimmed.indexOf('=')
		if (eq > 0) {
			const key = trimmed.slice(0, eq).trim()
			const val = trimmed.slice(eq + 1).trim()
			if (!process.env[key]) process.env[key] = val
		}
	}
}

export function loadConfig(overrides: Partial<Config> = {}, cwd: string = process.cwd()): Config {
	loadEnvFile(cwd)

	const env = (key: string, fallback = ''): string => process.env[key] ?? fallback
	const dimension = Number(env('RANGE_VERIFIER_IPP_DIMENSION'))

	return {
		paramsPath: overrides.paramsPath ?? path.resolve(cwd, env('RANGE_VERIFIER_PARAMS', 'params.txt')),
		ledgerPath: overrides.ledgerPath ?? env('RANGE_VERIFIER_LEDGER'),
		ippDimension:
			overrides.ippDimension ??
			(Number.isInteger(dimension) && dimension > 0 ? dimension : DEFAULT_IPP_DIMENSION),
		logLevel: overrides.logLevel ?? env('LOG_LEVEL', 'info'),
	}
}
