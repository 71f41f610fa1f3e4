/**
 * WAV audio encoder
 * Encodes a sample buffer to 8/16/24-bit PCM RIFF WAVE
 */

import {
	ByteWriter,
	EncodeError,
	Endianness,
	MAX_CHANNELS,
	MAX_UINT32,
	createSampleBuffer,
	isBitDepth,
	sampleToPcm16,
	sampleToPcm24,
	sampleToPcm8,
	type BitDepth,
	type SampleArray,
	type SampleBuffer,
} from '@pcmkit/core'
import {
	CHUNK_HEADER_SIZE,
	DATA_TAG,
	FMT_TAG,
	PCM_FMT_CHUNK_SIZE,
	RIFF_TAG,
	WAV_HEADER_SIZE,
	WAVE_TAG,
	WavFormat,
	type WavEncodeOptions,
	type WavSamplesEncodeOptions,
} from './types'

const LE = Endianness.Little

/**
 * Encode a sample buffer to WAV
 * Samples outside -1 to 1 are clamped.
 * @throws EncodeError
 */
export function encodeWav(buffer: SampleBuffer<SampleArray>, options: WavEncodeOptions = {}): Uint8Array {
	const bitsPerSample = options.bitDepth ?? buffer.bitDepth
	if (!isBitDepth(bitsPerSample)) {
		throw new EncodeError('UnsupportedBitDepth', `unsupported bits per sample: ${bitsPerSample}`)
	}

	const channels = buffer.channels
	const numChannels = channels.length
	if (numChannels < 1 || numChannels > MAX_CHANNELS) {
		throw new EncodeError('UnsupportedChannelLayout', `unsupported channel count: ${numChannels}`)
	}

	const { sampleRate } = buffer
	const sampleCount = buffer.numSamplesPerChannel
	const bytesPerSample = bitsPerSample / 8
	const blockAlign = numChannels * bytesPerSample
	const byteRate = sampleRate * blockAlign
	const dataChunkSize = sampleCount * blockAlign
	const fileSize = 4 + (CHUNK_HEADER_SIZE + PCM_FMT_CHUNK_SIZE) + CHUNK_HEADER_SIZE + dataChunkSize

	// Header fields are 32-bit; the file size bounds the data size
	if (byteRate > MAX_UINT32) {
		throw new EncodeError('HeaderOverflow', `byte rate ${byteRate} does not fit in 32 bits`)
	}
	if (fileSize > MAX_UINT32) {
		throw new EncodeError('HeaderOverflow', `file size ${fileSize} does not fit in 32 bits`)
	}

	const output = new ByteWriter(WAV_HEADER_SIZE + dataChunkSize)

	// RIFF header
	output.writeAscii(RIFF_TAG)
	output.writeUInt32(fileSize, LE)
	output.writeAscii(WAVE_TAG)

	// fmt chunk
	output.writeAscii(FMT_TAG)
	output.writeUInt32(PCM_FMT_CHUNK_SIZE, LE)
	output.writeUInt16(WavFormat.PCM, LE)
	output.writeUInt16(numChannels, LE)
	output.writeUInt32(sampleRate, LE)
	output.writeUInt32(byteRate, LE)
	output.writeUInt16(blockAlign, LE)
	output.writeUInt16(bitsPerSample, LE)

	// data chunk
	output.writeAscii(DATA_TAG)
	output.writeUInt32(dataChunkSize, LE)

	// Write interleaved samples
	for (let i = 0; i < sampleCount; i++) {
		for (const channel of channels) {
			encodePcmSample(output, channel[i] ?? 0, bitsPerSample)
		}
	}

	// The sizes in the header must describe what was actually written
	const written = output.length
	if (written - 8 !== fileSize || written - WAV_HEADER_SIZE !== dataChunkSize) {
		throw new EncodeError(
			'SizeMismatch',
			`wrote ${written} bytes for file size ${fileSize} and data size ${dataChunkSize}`
		)
	}

	return output.toUint8Array()
}

/**
 * Create WAV from mono audio
 */
export function encodeWavMono(samples: ArrayLike<number>, options: WavSamplesEncodeOptions = {}): Uint8Array {
	return encodeWav(bufferFrom([samples], options.sampleRate), options)
}

/**
 * Create WAV from stereo audio
 */
export function encodeWavStereo(
	left: ArrayLike<number>,
	right: ArrayLike<number>,
	options: WavSamplesEncodeOptions = {}
): Uint8Array {
	return encodeWav(bufferFrom([left, right], options.sampleRate), options)
}

function bufferFrom(channels: ArrayLike<number>[], sampleRate?: number): SampleBuffer<Float32Array> {
	const buffer = createSampleBuffer({ sampleRate })
	buffer.setAudioBuffer(channels)
	return buffer
}

function encodePcmSample(output: ByteWriter, sample: number, bitsPerSample: BitDepth): void {
	switch (bitsPerSample) {
		case 8:
			// 8-bit unsigned, centered at 128
			output.writeUInt8(sampleToPcm8(sample))
			break
		case 16:
			output.writeUInt16(sampleToPcm16(sample), LE)
			break
		case 24: {
			const value = sampleToPcm24(sample)
			output.writeUInt8(value)
			output.writeUInt8(value >> 8)
			output.writeUInt8(value >> 16)
			break
		}
	}
}
