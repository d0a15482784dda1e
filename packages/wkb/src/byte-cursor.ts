import { TruncatedInputError } from "./errors"

/**
 * Forward-only reader over one WKB buffer.
 *
 * Every read is bounds checked and throws {@link TruncatedInputError} rather
 * than reading past the end. Multi-byte reads are little endian.
 */
export class ByteCursor {
	private readonly bytes: Uint8Array
	private readonly view: DataView
	private pos = 0

	constructor(bytes: Uint8Array) {
		this.bytes = bytes
		this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
	}

	get position(): number {
		return this.pos
	}

	get length(): number {
		return this.bytes.byteLength
	}

	get remaining(): number {
		return this.bytes.byteLength - this.pos
	}

	/**
	 * Return a view of the next `n` bytes and advance past them.
	 */
	readBytes(n: number): Uint8Array {
		const start = this.advance(n)
		return this.bytes.subarray(start, start + n)
	}

	readUint8(): number {
		return this.view.getUint8(this.advance(1))
	}

	readUint32LE(): number {
		return this.view.getUint32(this.advance(4), true)
	}

	readFloat64LE(): number {
		return this.view.getFloat64(this.advance(8), true)
	}

	/**
	 * Reserve `n` bytes, returning the offset they start at.
	 */
	private advance(n: number): number {
		if (!Number.isInteger(n) || n < 0) {
			throw RangeError(`Byte count must be a non-negative integer, got ${n}`)
		}
		if (n > this.remaining) {
			throw new TruncatedInputError(this.pos, n, this.remaining)
		}
		const start = this.pos
		this.pos += n
		return start
	}
}
