/**
 * Hex string <-> byte conversion for WKB delivered as text, e.g. by
 * PostGIS `ST_AsBinary(...)::text` or `encode(geom, 'hex')`.
 *
 * @module
 */

const HEX_DIGITS = "0123456789abcdef"

/**
 * Convert a hex string to bytes.
 *
 * Accepts upper or lower case digits and an optional `0x` prefix.
 *
 * @throws Error if the string has an odd number of digits or contains a
 * non-hex character.
 *
 * @example
 * ```ts
 * hexToBytes("0101000000000000000000f03f0000000000000840")
 * ```
 */
export function hexToBytes(hex: string): Uint8Array {
	const digits = hex.startsWith("0x") || hex.startsWith("0X") ? hex.slice(2) : hex
	if (digits.length % 2 !== 0) {
		throw Error(`Hex string must have an even number of digits, got ${digits.length}`)
	}
	const bytes = new Uint8Array(digits.length / 2)
	for (let i = 0; i < bytes.length; i++) {
		const hi = HEX_DIGITS.indexOf(digits.charAt(i * 2).toLowerCase())
		const lo = HEX_DIGITS.indexOf(digits.charAt(i * 2 + 1).toLowerCase())
		if (hi === -1 || lo === -1) {
			const position = hi === -1 ? i * 2 : i * 2 + 1
			throw Error(
				`Invalid hex character "${digits.charAt(position)}" at position ${position}`,
			)
		}
		bytes[i] = (hi << 4) | lo
	}
	return bytes
}

/**
 * Convert bytes to a lowercase hex string.
 */
export function bytesToHex(bytes: Uint8Array): string {
	let hex = ""
	for (const byte of bytes) {
		hex += HEX_DIGITS.charAt(byte >> 4) + HEX_DIGITS.charAt(byte & 0x0f)
	}
	return hex
}
