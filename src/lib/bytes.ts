/**
 * Byte manipulation utilities for encoding and concatenating data.
 */

/**
 * Concatenate multiple Uint8Array instances into a single array.
 */
export function concat(...arrays: Uint8Array[]): Uint8Array {
	let total = 0
	for (const a of arrays) total += a.length
	const out = new Uint8Array(total)
	let offset = 0
	for (const a of arrays) {
		out.set(a, offset)
		offset += a.length
	}
	return out
}

/**
 * Encode a bigint as a 256-bit unsigned integer (32 bytes, big-endian).
 * Bits above the word are dropped, so callers validate the range first.
 */
export function encodeU256(value: bigint, length: number = 32): Uint8Array {
	const out = new Uint8Array(length)
	for (let i = 0; i < length; i++) {
		out[i] = Number((value >> BigInt(8 * (length - 1 - i))) & 0xFFn)
	}
	return out
}

/**
 * Parse a hex string with or without a `0x` prefix. Returns undefined for
 * empty input or non-hex characters.
 */
export function parseHex(s: string): bigint | undefined {
	const t = s.trim()
	const digits = t.startsWith('0x') || t.startsWith('0X') ? t.slice(2) : t
	if (digits.length === 0 || !/^[0-9a-fA-F]+$/.test(digits)) return undefined
	return BigInt('0x' + digits)
}

/**
 * Lower-case hex without prefix, as written to parameter and proof files.
 */
export function toHex(value: bigint): string {
	const hex = value.toString(16)
	return hex.length % 2 === 0 ? hex : '0' + hex
}
