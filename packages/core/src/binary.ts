/**
 * Endianness-aware integer packing and byte-sequence search
 *
 * Readers perform no bounds validation: callers check that the bytes they
 * address exist before reading.
 */

/** Byte order of multi-byte integer fields */
export const Endianness = {
	Little: 'little',
	Big: 'big',
} as const

export type Endianness = (typeof Endianness)[keyof typeof Endianness]

// Binary reading helpers
export function readUInt16(data: Uint8Array, offset: number, endianness: Endianness): number {
	const b0 = data[offset]!
	const b1 = data[offset + 1]!
	return endianness === Endianness.Little ? b0 | (b1 << 8) : (b0 << 8) | b1
}

export function readInt16(data: Uint8Array, offset: number, endianness: Endianness): number {
	const u = readUInt16(data, offset, endianness)
	return u > 0x7fff ? u - 0x10000 : u
}

export function readUInt32(data: Uint8Array, offset: number, endianness: Endianness): number {
	const b0 = data[offset]!
	const b1 = data[offset + 1]!
	const b2 = data[offset + 2]!
	const b3 = data[offset + 3]!
	if (endianness === Endianness.Little) {
		return (b0 | (b1 << 8) | (b2 << 16) | (b3 << 24)) >>> 0
	}
	return ((b0 << 24) | (b1 << 16) | (b2 << 8) | b3) >>> 0
}

/**
 * Read `length` bytes as an ASCII string
 */
export function readAscii(data: Uint8Array, offset: number, length: number): string {
	let text = ''
	for (let i = 0; i < length; i++) {
		text += String.fromCharCode(data[offset + i] ?? 0)
	}
	return text
}

export function asciiBytes(text: string): Uint8Array {
	const bytes = new Uint8Array(text.length)
	for (let i = 0; i < text.length; i++) {
		bytes[i] = text.charCodeAt(i) & 0xff
	}
	return bytes
}

/**
 * Find the first byte-exact occurrence of `needle` in `haystack`
 * @returns start index of the match, or -1
 */
export function findSubsequence(haystack: Uint8Array, needle: Uint8Array, fromIndex = 0): number {
	if (needle.length === 0) return Math.min(Math.max(fromIndex, 0), haystack.length)

	const last = haystack.length - needle.length
	outer: for (let i = Math.max(fromIndex, 0); i <= last; i++) {
		for (let j = 0; j < needle.length; j++) {
			if (haystack[i + j] !== needle[j]) continue outer
		}
		return i
	}
	return -1
}

/**
 * Growable output byte sequence
 */
export class ByteWriter {
	private data: Uint8Array
	private size = 0

	constructor(initialCapacity = 64) {
		this.data = new Uint8Array(Math.max(1, initialCapacity))
	}

	/** Number of bytes written so far */
	get length(): number {
		return this.size
	}

	writeUInt8(value: number): void {
		this.ensure(1)
		this.data[this.size++] = value & 0xff
	}

	writeUInt16(value: number, endianness: Endianness): void {
		this.ensure(2)
		const lo = value & 0xff
		const hi = (value >> 8) & 0xff
		if (endianness === Endianness.Little) {
			this.data[this.size++] = lo
			this.data[this.size++] = hi
		} else {
			this.data[this.size++] = hi
			this.data[this.size++] = lo
		}
	}

	writeUInt32(value: number, endianness: Endianness): void {
		this.ensure(4)
		const bytes = [value & 0xff, (value >>> 8) & 0xff, (value >>> 16) & 0xff, (value >>> 24) & 0xff]
		if (endianness === Endianness.Big) bytes.reverse()
		for (const byte of bytes) {
			this.data[this.size++] = byte
		}
	}

	/** Append the character codes of a literal tag such as 'RIFF' */
	writeAscii(tag: string): void {
		this.writeBytes(asciiBytes(tag))
	}

	writeBytes(bytes: Uint8Array): void {
		this.ensure(bytes.length)
		this.data.set(bytes, this.size)
		this.size += bytes.length
	}

	/** Copy of the written bytes */
	toUint8Array(): Uint8Array {
		return this.data.slice(0, this.size)
	}

	private ensure(extra: number): void {
		const required = this.size + extra
		if (required <= this.data.length) return

		let capacity = this.data.length * 2
		while (capacity < required) capacity *= 2
		const grown = new Uint8Array(capacity)
		grown.set(this.data.subarray(0, this.size))
		this.data = grown
	}
}
