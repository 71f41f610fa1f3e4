/**
 * WAV audio decoder
 * Decodes 8/16/24-bit PCM RIFF WAVE audio files
 *
 * The "fmt " and "data" chunks are located by searching for their tags
 * after the RIFF header instead of walking chunk sizes, so chunk order and
 * extra chunks between them do not matter. A tag that happens to occur
 * earlier inside another chunk's payload is taken as the chunk.
 */

import {
	DecodeError,
	Endianness,
	SampleBuffer,
	asciiBytes,
	detectAudioFormat,
	findSubsequence,
	isBitDepth,
	pcm16ToSample,
	pcm24ToSample,
	pcm8ToSample,
	readAscii,
	readInt16,
	readUInt16,
	readUInt32,
	type BitDepth,
	type SampleArray,
	type SampleArrayType,
} from '@pcmkit/core'
import {
	CHUNK_HEADER_SIZE,
	DATA_TAG,
	FMT_TAG,
	PCM_FMT_CHUNK_SIZE,
	RIFF_HEADER_SIZE,
	RIFF_TAG,
	WAVE_TAG,
	WavFormat,
	type WavHeader,
	type WavInfo,
} from './types'

const LE = Endianness.Little
const FMT_BYTES = asciiBytes(FMT_TAG)
const DATA_BYTES = asciiBytes(DATA_TAG)

/**
 * Check if data is a WAV file
 */
export function isWav(data: Uint8Array): boolean {
	if (data.length < RIFF_HEADER_SIZE) return false
	return readAscii(data, 0, 4) === RIFF_TAG && readAscii(data, 8, 4) === WAVE_TAG
}

/**
 * Parse and validate the WAV header
 * @throws DecodeError
 */
export function parseWavHeader(data: Uint8Array): WavHeader {
	if (!isWav(data)) {
		const message = detectAudioFormat(data) === 'aiff' ? 'AIFF is not supported' : 'bad magic number'
		throw new DecodeError('InvalidContainer', message)
	}

	const f = findSubsequence(data, FMT_BYTES, RIFF_HEADER_SIZE)
	if (f === -1) throw new DecodeError('MissingChunk', 'missing fmt chunk')

	const d = findSubsequence(data, DATA_BYTES, RIFF_HEADER_SIZE)
	if (d === -1) throw new DecodeError('MissingChunk', 'missing data chunk')

	if (f + CHUNK_HEADER_SIZE + PCM_FMT_CHUNK_SIZE > data.length) {
		throw new DecodeError('MissingChunk', 'fmt chunk is incomplete')
	}
	if (d + CHUNK_HEADER_SIZE > data.length) {
		throw new DecodeError('MissingChunk', 'data chunk is incomplete')
	}

	const audioFormat = readUInt16(data, f + 8, LE)
	if (audioFormat !== WavFormat.PCM) {
		throw new DecodeError(
			'UnsupportedCompression',
			`unsupported audio format ${formatName(audioFormat)}, only PCM is supported`
		)
	}

	const numChannels = readUInt16(data, f + 10, LE)
	if (numChannels !== 1 && numChannels !== 2) {
		throw new DecodeError('UnsupportedChannelLayout', `unsupported channel count: ${numChannels}`)
	}

	const sampleRate = readUInt32(data, f + 12, LE)
	const byteRate = readUInt32(data, f + 16, LE)
	const blockAlign = readUInt16(data, f + 20, LE)
	const bitsPerSample = readUInt16(data, f + 22, LE)
	if (!isBitDepth(bitsPerSample)) {
		throw new DecodeError('UnsupportedBitDepth', `unsupported bits per sample: ${bitsPerSample}`)
	}

	// Stated rates must agree with the ones derived from the format
	const expectedBlockAlign = (numChannels * bitsPerSample) / 8
	const expectedByteRate = sampleRate * expectedBlockAlign
	if (sampleRate === 0) {
		throw new DecodeError('InconsistentHeader', 'sample rate is 0')
	}
	if (byteRate !== expectedByteRate) {
		throw new DecodeError('InconsistentHeader', `byte rate ${byteRate}, expected ${expectedByteRate}`)
	}
	if (blockAlign !== expectedBlockAlign) {
		throw new DecodeError('InconsistentHeader', `block align ${blockAlign}, expected ${expectedBlockAlign}`)
	}

	const dataSize = readUInt32(data, d + 4, LE)
	const dataOffset = d + CHUNK_HEADER_SIZE
	if (dataOffset + dataSize > data.length) {
		throw new DecodeError(
			'TruncatedData',
			`data chunk declares ${dataSize} bytes, ${data.length - dataOffset} available`
		)
	}

	return {
		fileSize: readUInt32(data, 4, LE) + 8,
		audioFormat: WavFormat.PCM,
		numChannels,
		sampleRate,
		byteRate,
		blockAlign,
		bitsPerSample,
		fmtOffset: f,
		dataOffset,
		dataSize,
	}
}

/**
 * Parse WAV info without decoding samples
 */
export function parseWavInfo(data: Uint8Array): WavInfo {
	const header = parseWavHeader(data)
	const sampleCount = Math.floor(header.dataSize / header.blockAlign)

	return {
		numChannels: header.numChannels,
		sampleRate: header.sampleRate,
		bitsPerSample: header.bitsPerSample,
		format: header.audioFormat,
		duration: sampleCount / header.sampleRate,
		sampleCount,
	}
}

/**
 * Decode WAV audio into a new sample buffer
 * @throws DecodeError
 */
export function decodeWav(data: Uint8Array): SampleBuffer<Float32Array>
export function decodeWav<T extends SampleArray>(data: Uint8Array, arrayType: SampleArrayType<T>): SampleBuffer<T>
export function decodeWav(
	data: Uint8Array,
	arrayType: SampleArrayType<SampleArray> = Float32Array
): SampleBuffer<SampleArray> {
	const buffer = new SampleBuffer(arrayType)
	decodeWavInto(data, buffer)
	return buffer
}

/**
 * Decode WAV audio, replacing the contents of `target`
 *
 * The header is fully validated before `target` is touched, so a failed
 * decode leaves it as it was.
 * @throws DecodeError
 */
export function decodeWavInto<T extends SampleArray>(data: Uint8Array, target: SampleBuffer<T>): void {
	const header = parseWavHeader(data)
	const { numChannels, bitsPerSample, blockAlign, dataOffset, dataSize } = header
	const bytesPerSample = bitsPerSample / 8
	const sampleCount = Math.floor(dataSize / blockAlign)

	target.clear()
	target.setSampleRate(header.sampleRate)
	target.setBitDepth(bitsPerSample)
	target.setAudioBufferSize(numChannels, sampleCount)

	const channels = target.channels
	let offset = dataOffset

	// Interleaved: sample frame by sample frame, channel by channel
	for (let i = 0; i < sampleCount; i++) {
		for (const channel of channels) {
			channel[i] = decodePcmSample(data, offset, bitsPerSample)
			offset += bytesPerSample
		}
	}
}

function decodePcmSample(data: Uint8Array, offset: number, bitsPerSample: BitDepth): number {
	switch (bitsPerSample) {
		case 8:
			// 8-bit is unsigned, centered at 128
			return pcm8ToSample(data[offset]!)
		case 16:
			return pcm16ToSample(readInt16(data, offset, LE))
		case 24: {
			// 24-bit signed, sign-extended from bit 23
			const u = data[offset]! | (data[offset + 1]! << 8) | (data[offset + 2]! << 16)
			return pcm24ToSample(u & 0x800000 ? u - 0x1000000 : u)
		}
	}
}

function formatName(code: number): string {
	switch (code) {
		case WavFormat.IEEE_FLOAT:
			return `${code} (IEEE float)`
		case WavFormat.ALAW:
			return `${code} (A-law)`
		case WavFormat.MULAW:
			return `${code} (μ-law)`
		case WavFormat.EXTENSIBLE:
			return `${code} (extensible)`
		default:
			return String(code)
	}
}
