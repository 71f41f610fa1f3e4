import { describe, expect, it } from 'vitest'
import {
	ByteWriter,
	Endianness,
	asciiBytes,
	findSubsequence,
	readAscii,
	readInt16,
	readUInt16,
	readUInt32,
} from './binary'

describe('ByteCodec', () => {
	const bytes = new Uint8Array([0x12, 0x34, 0x56, 0x78, 0xff, 0xfe])

	describe('readUInt32', () => {
		it('should compose little-endian bytes', () => {
			expect(readUInt32(bytes, 0, Endianness.Little)).toBe(0x78563412)
		})

		it('should compose big-endian bytes', () => {
			expect(readUInt32(bytes, 0, Endianness.Big)).toBe(0x12345678)
		})

		it('should stay unsigned when the top bit is set', () => {
			const data = new Uint8Array([0xff, 0xff, 0xff, 0xff])
			expect(readUInt32(data, 0, Endianness.Little)).toBe(4294967295)
		})
	})

	describe('readInt16', () => {
		it('should read positive values in both orders', () => {
			expect(readInt16(bytes, 0, Endianness.Little)).toBe(0x3412)
			expect(readInt16(bytes, 0, Endianness.Big)).toBe(0x1234)
		})

		it('should sign-extend negative values', () => {
			expect(readInt16(bytes, 4, Endianness.Little)).toBe(-257) // 0xfeff
			expect(readInt16(bytes, 4, Endianness.Big)).toBe(-2) // 0xfffe
		})
	})

	describe('readUInt16', () => {
		it('should not sign-extend', () => {
			expect(readUInt16(bytes, 4, Endianness.Little)).toBe(0xfeff)
		})
	})

	describe('findSubsequence', () => {
		const haystack = asciiBytes('RIFF....WAVEjunkfmt data')

		it('should return the first match', () => {
			expect(findSubsequence(haystack, asciiBytes('fmt '))).toBe(16)
			expect(findSubsequence(haystack, asciiBytes('data'))).toBe(20)
		})

		it('should honour the start index', () => {
			expect(findSubsequence(haystack, asciiBytes('RIFF'), 1)).toBe(-1)
		})

		it('should return -1 when absent', () => {
			expect(findSubsequence(haystack, asciiBytes('LIST'))).toBe(-1)
		})

		it('should match at the very end', () => {
			expect(findSubsequence(asciiBytes('xxdata'), asciiBytes('data'))).toBe(2)
		})

		it('should handle a needle longer than the haystack', () => {
			expect(findSubsequence(asciiBytes('da'), asciiBytes('data'))).toBe(-1)
		})
	})

	describe('readAscii', () => {
		it('should decode tags', () => {
			expect(readAscii(asciiBytes('RIFFWAVE'), 4, 4)).toBe('WAVE')
		})
	})

	describe('ByteWriter', () => {
		it('should append in the requested byte order', () => {
			const writer = new ByteWriter(2)
			writer.writeUInt32(0x12345678, Endianness.Little)
			writer.writeUInt32(0x12345678, Endianness.Big)
			writer.writeUInt16(0xabcd, Endianness.Little)
			writer.writeUInt16(0xabcd, Endianness.Big)
			writer.writeUInt8(0x1ff)

			expect(Array.from(writer.toUint8Array())).toEqual([
				0x78, 0x56, 0x34, 0x12, 0x12, 0x34, 0x56, 0x78, 0xcd, 0xab, 0xab, 0xcd, 0xff,
			])
			expect(writer.length).toBe(13)
		})

		it('should write negative 16-bit values as two\'s complement', () => {
			const writer = new ByteWriter()
			writer.writeUInt16(-2, Endianness.Little)
			expect(Array.from(writer.toUint8Array())).toEqual([0xfe, 0xff])
		})

		it('should write ASCII tags', () => {
			const writer = new ByteWriter()
			writer.writeAscii('fmt ')
			expect(readAscii(writer.toUint8Array(), 0, 4)).toBe('fmt ')
		})

		it('should round-trip through the readers', () => {
			const writer = new ByteWriter()
			writer.writeUInt32(44100, Endianness.Little)
			writer.writeUInt16(16, Endianness.Big)
			const out = writer.toUint8Array()

			expect(readUInt32(out, 0, Endianness.Little)).toBe(44100)
			expect(readUInt16(out, 4, Endianness.Big)).toBe(16)
		})
	})
})
