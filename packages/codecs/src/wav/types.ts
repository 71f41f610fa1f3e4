/**
 * WAV audio format types
 * RIFF WAVE container with PCM audio data
 */

import type { BitDepth } from '@pcmkit/core'

/** WAV audio format codes */
export const WavFormat = {
	/** Uncompressed PCM */
	PCM: 1,
	/** IEEE floating point */
	IEEE_FLOAT: 3,
	/** A-law encoded */
	ALAW: 6,
	/** μ-law encoded */
	MULAW: 7,
	/** Extensible format */
	EXTENSIBLE: 0xfffe,
} as const

export type WavFormatCode = (typeof WavFormat)[keyof typeof WavFormat]

/** WAV file header (RIFF + fmt chunk + data chunk location) */
export interface WavHeader {
	/** File size (RIFF chunk size + 8) */
	fileSize: number
	/** Audio format code (always PCM once validated) */
	audioFormat: typeof WavFormat.PCM
	/** Number of channels (1=mono, 2=stereo) */
	numChannels: number
	/** Sample rate in Hz */
	sampleRate: number
	/** Bytes per second */
	byteRate: number
	/** Block alignment (bytes per sample frame) */
	blockAlign: number
	/** Bits per sample */
	bitsPerSample: BitDepth
	/** Offset of the "fmt " tag */
	fmtOffset: number
	/** Offset of the first sample byte */
	dataOffset: number
	/** Data chunk size in bytes */
	dataSize: number
}

/** WAV audio info (metadata without decoding) */
export interface WavInfo {
	/** Number of channels */
	numChannels: number
	/** Sample rate in Hz */
	sampleRate: number
	/** Bits per sample */
	bitsPerSample: number
	/** Audio format */
	format: WavFormatCode
	/** Duration in seconds */
	duration: number
	/** Total sample count per channel */
	sampleCount: number
}

/** WAV encode options */
export interface WavEncodeOptions {
	/** Bits per sample: 8, 16 or 24 (default: the buffer's bit depth) */
	bitDepth?: number
}

/** Options for encoding bare sample arrays */
export interface WavSamplesEncodeOptions extends WavEncodeOptions {
	/** Sample rate (default: 44100) */
	sampleRate?: number
}

// Chunk tags
export const RIFF_TAG = 'RIFF'
export const WAVE_TAG = 'WAVE'
export const FMT_TAG = 'fmt '
export const DATA_TAG = 'data'

/** RIFF tag + size + WAVE tag */
export const RIFF_HEADER_SIZE = 12
/** Payload size of a PCM fmt chunk */
export const PCM_FMT_CHUNK_SIZE = 16
/** Chunk tag + chunk size */
export const CHUNK_HEADER_SIZE = 8
/** Header bytes written before the sample payload */
export const WAV_HEADER_SIZE = RIFF_HEADER_SIZE + CHUNK_HEADER_SIZE + PCM_FMT_CHUNK_SIZE + CHUNK_HEADER_SIZE
