import { parseHex, toHex } from './bytes.js'
import { isWord } from './crypto.js'
import { VerificationError } from './errors.js'
import { DEFAULT_IPP_ROUNDS } from './structure.js'
import { SCALAR_FIELDS, type Proof, type PublicParameters } from '../types/index.js'

/**
 * Wire formats for parameters and proofs.
 *
 * Flattened proof layout (rounds = 6):
 *   [0..14]   A, S, T1, T2, tau_x, mu, t_hat, C, C_v1, C_v2, t0, t1, t2, tau1, tau2
 *   [15]      length marker of ipp_L
 *   [16..21]  ipp_L
 *   [22]      length marker of ipp_R
 *   [23..28]  ipp_R
 *   [29, 30]  ipp_a, ipp_b
 */

export function flatProofLength(rounds: number = DEFAULT_IPP_ROUNDS): number {
	return SCALAR_FIELDS.length + 2 * (rounds + 1) + 2
}

function malformed(message: string): VerificationError {
	return new VerificationError('MalformedProofShape', message)
}

/**
 * Decode a flattened proof. Rejects a wrong length, wrong length markers
 * or values outside the 256-bit word range before anything else runs.
 */
export function decodeFlatProof(values: ReadonlyArray<bigint>, rounds: number = DEFAULT_IPP_ROUNDS): Proof {
	const expected = flatProofLength(rounds)
	if (values.length !== expected) {
		throw malformed(`expected ${expected} values, got ${values.length}`)
	}

	const lMarker = SCALAR_FIELDS.length
	const rMarker = lMarker + rounds + 1
	if (values[lMarker] !== BigInt(rounds)) {
		throw malformed(`ipp_L length marker is ${values[lMarker]}, expected ${rounds}`)
	}
	if (values[rMarker] !== BigInt(rounds)) {
		throw malformed(`ipp_R length marker is ${values[rMarker]}, expected ${rounds}`)
	}

	const bad = values.findIndex(v => !isWord(v))
	if (bad !== -1) throw malformed(`value at position ${bad} is not a 256-bit word`)

	const [A, S, T1, T2, tau_x, mu, t_hat, C, C_v1, C_v2, t0, t1, t2, tau1, tau2] = values
	return {
		A, S, T1, T2, tau_x, mu, t_hat, C, C_v1, C_v2, t0, t1, t2, tau1, tau2,
		ipp_L: values.slice(lMarker + 1, rMarker),
		ipp_R: values.slice(rMarker + 1, rMarker + 1 + rounds),
		ipp_a: values[expected - 2],
		ipp_b: values[expected - 1],
	}
}

/**
 * Inverse of decodeFlatProof, with markers taken from the actual lengths.
 */
export function flattenProof(proof: Proof): bigint[] {
	return [
		...SCALAR_FIELDS.map(name => proof[name]),
		BigInt(proof.ipp_L.length),
		...proof.ipp_L,
		BigInt(proof.ipp_R.length),
		...proof.ipp_R,
		proof.ipp_a,
		proof.ipp_b,
	]
}

function splitLines(text: string): string[] {
	return text
		.split(/\r?\n/)
		.map(l => l.trim())
		.filter(l => l.length > 0)
}

/**
 * Parameter file: three hex lines g, h, n.
 */
export function parseParams(text: string): PublicParameters {
	const lines = splitLines(text)
	if (lines.length < 3) {
		throw new VerificationError('InvalidParameters', 'params file must contain 3 lines: g, h, n')
	}
	const [g, h, n] = lines.slice(0, 3).map((line, i) => {
		const value = parseHex(line)
		if (value === undefined) {
			throw new VerificationError('InvalidParameters', `invalid hex on line ${i + 1}`)
		}
		return value
	})
	return { g, h, n }
}

export function formatParams(params: PublicParameters): string {
	return [params.g, params.h, params.n].map(toHex).join('\n')
}

/**
 * Proof text file: the flattened layout one value per line, hex scalars and
 * decimal length markers.
 */
export function parseProofText(text: string, rounds: number = DEFAULT_IPP_ROUNDS): Proof {
	const lines = splitLines(text)
	const lMarker = SCALAR_FIELDS.length
	const rMarker = lMarker + rounds + 1
	const values = lines.map((line, i) => {
		if (i === lMarker || i === rMarker) {
			if (!/^\d+$/.test(line)) throw malformed(`invalid length marker on line ${i + 1}`)
			return BigInt(line)
		}
		const value = parseHex(line)
		if (value === undefined) throw malformed(`invalid hex on line ${i + 1}`)
		return value
	})
	return decodeFlatProof(values, rounds)
}

export function formatProofText(proof: Proof): string {
	const lMarker = SCALAR_FIELDS.length
	const rMarker = lMarker + proof.ipp_L.length + 1
	return flattenProof(proof)
		.map((v, i) => (i === lMarker || i === rMarker ? v.toString(10) : toHex(v)))
		.join('\n')
}

/**
 * JSON export shape: 0x-prefixed 32-byte hex strings.
 */
export interface ProofJson {
	scalars: string[]
	ipp_L: string[]
	ipp_R: string[]
	ipp_a: string
	ipp_b: string
}

function hexField(value: unknown, where: string): bigint {
	if (typeof value !== 'string') throw malformed(`${where} is not a hex string`)
	const parsed = parseHex(value)
	if (parsed === undefined) throw malformed(`${where} is not valid hex`)
	return parsed
}

function hexList(value: unknown, where: string): bigint[] {
	if (!Array.isArray(value)) throw malformed(`${where} is not an array`)
	return value.map((v: unknown, i) => hexField(v, `${where}[${i}]`))
}

/**
 * Parse the JSON export. Goes through the flattened layout so JSON and
 * text proofs share one set of shape checks.
 */
export function parseProofJson(json: unknown, rounds: number = DEFAULT_IPP_ROUNDS): Proof {
	if (typeof json !== 'object' || json === null) throw malformed('proof JSON is not an object')
	const record: Record<string, unknown> = Object.fromEntries(Object.entries(json))

	const scalars = hexList(record.scalars, 'scalars')
	if (scalars.length !== SCALAR_FIELDS.length) {
		throw malformed(`expected ${SCALAR_FIELDS.length} scalars, got ${scalars.length}`)
	}
	const ippL = hexList(record.ipp_L, 'ipp_L')
	const ippR = hexList(record.ipp_R, 'ipp_R')

	return decodeFlatProof(
		[
			...scalars,
			BigInt(ippL.length),
			...ippL,
			BigInt(ippR.length),
			...ippR,
			hexField(record.ipp_a, 'ipp_a'),
			hexField(record.ipp_b, 'ipp_b'),
		],
		rounds
	)
}

export function toProofJson(proof: Proof): ProofJson {
	const word = (v: bigint) => '0x' + v.toString(16).padStart(64, '0')
	return {
		scalars: SCALAR_FIELDS.map(name => word(proof[name])),
		ipp_L: proof.ipp_L.map(word),
		ipp_R: proof.ipp_R.map(word),
		ipp_a: word(proof.ipp_a),
		ipp_b: word(proof.ipp_b),
	}
}
