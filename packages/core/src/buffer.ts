/**
 * In-memory multichannel audio: one array of normalized samples per channel
 */

import { BufferError } from './errors'
import {
	DEFAULT_BIT_DEPTH,
	DEFAULT_SAMPLE_RATE,
	MAX_CHANNELS,
	MAX_UINT32,
	isBitDepth,
	type BitDepth,
	type SampleArray,
	type SampleArrayType,
} from './types'

export interface SampleBufferInit {
	/** Sample rate in Hz (default: 44100) */
	sampleRate?: number
	/** Bits per sample used when encoding (default: 16) */
	bitDepth?: number
	/** Number of channels, 1 or 2 (default: 1) */
	numChannels?: number
	/** Samples per channel (default: 0) */
	numSamples?: number
}

/**
 * Sample buffer
 *
 * Every channel always has the same length, there are one or two channels,
 * and the format fields stay within what the WAV codec can write.
 */
export class SampleBuffer<T extends SampleArray = SampleArray> {
	readonly arrayType: SampleArrayType<T>
	private data: T[]
	private rate: number = DEFAULT_SAMPLE_RATE
	private depth: BitDepth = DEFAULT_BIT_DEPTH

	constructor(arrayType: SampleArrayType<T>, init: SampleBufferInit = {}) {
		this.arrayType = arrayType
		this.data = [new arrayType(0)]

		if (init.sampleRate !== undefined) this.setSampleRate(init.sampleRate)
		if (init.bitDepth !== undefined) this.setBitDepth(init.bitDepth)
		this.setAudioBufferSize(init.numChannels ?? 1, init.numSamples ?? 0)
	}

	get sampleRate(): number {
		return this.rate
	}

	get bitDepth(): BitDepth {
		return this.depth
	}

	get channels(): readonly T[] {
		return this.data
	}

	get numChannels(): number {
		return this.data.length
	}

	get numSamplesPerChannel(): number {
		return this.data[0]?.length ?? 0
	}

	get isMono(): boolean {
		return this.numChannels === 1
	}

	get isStereo(): boolean {
		return this.numChannels === 2
	}

	/** Duration in seconds */
	get lengthInSeconds(): number {
		return this.numSamplesPerChannel / this.rate
	}

	getChannel(index: number): T {
		const channel = this.data[index]
		if (!channel) {
			throw new RangeError(`Channel ${index} out of range (0-${this.data.length - 1})`)
		}
		return channel
	}

	/**
	 * Replace every channel with a copy of `channels`
	 */
	setAudioBuffer(channels: ArrayLike<ArrayLike<number>>): void {
		assertChannelCount(channels.length)

		const numSamples = channels[0]?.length ?? 0
		const next: T[] = []
		for (let c = 0; c < channels.length; c++) {
			const source = channels[c]
			if (!source || source.length !== numSamples) {
				throw new BufferError(
					'InvalidBuffer',
					`Channel ${c} has ${source?.length ?? 0} samples, expected ${numSamples}`
				)
			}
			const channel = new this.arrayType(numSamples)
			for (let i = 0; i < numSamples; i++) {
				channel[i] = source[i] ?? 0
			}
			next.push(channel)
		}
		this.data = next
	}

	setAudioBufferSize(numChannels: number, numSamples: number): void {
		assertChannelCount(numChannels)
		this.setNumChannels(numChannels)
		this.setNumSamplesPerChannel(numSamples)
	}

	/**
	 * Truncate or extend every channel. Samples past the previous length are 0.
	 */
	setNumSamplesPerChannel(numSamples: number): void {
		if (!Number.isInteger(numSamples) || numSamples < 0) {
			throw new BufferError('InvalidBuffer', `Invalid sample count: ${numSamples}`)
		}
		this.data = this.data.map((channel) => this.resize(channel, numSamples))
	}

	/**
	 * Drop trailing channels, or append channels of the current length filled with 0.
	 */
	setNumChannels(numChannels: number): void {
		assertChannelCount(numChannels)

		const numSamples = this.numSamplesPerChannel
		const next = this.data.slice(0, numChannels)
		while (next.length < numChannels) {
			next.push(new this.arrayType(numSamples))
		}
		this.data = next
	}

	setSampleRate(sampleRate: number): void {
		if (!Number.isInteger(sampleRate) || sampleRate <= 0 || sampleRate > MAX_UINT32) {
			throw new BufferError('InvalidBuffer', `Invalid sample rate: ${sampleRate}`)
		}
		this.rate = sampleRate
	}

	setBitDepth(bitDepth: number): void {
		if (!isBitDepth(bitDepth)) {
			throw new BufferError('UnsupportedBitDepth', `Unsupported bit depth: ${bitDepth}`)
		}
		this.depth = bitDepth
	}

	/**
	 * Discard all samples, leaving one empty channel. Format fields are kept.
	 */
	clear(): void {
		this.data = [new this.arrayType(0)]
	}

	private resize(channel: T, numSamples: number): T {
		if (channel.length === numSamples) return channel
		const resized = new this.arrayType(numSamples)
		resized.set(channel.subarray(0, Math.min(channel.length, numSamples)))
		return resized
	}
}

/**
 * Create an empty Float32 sample buffer (44100 Hz, 16-bit, mono)
 */
export function createSampleBuffer(init: SampleBufferInit = {}): SampleBuffer<Float32Array> {
	return new SampleBuffer<Float32Array>(Float32Array, init)
}

function assertChannelCount(numChannels: number): void {
	if (!Number.isInteger(numChannels) || numChannels < 1 || numChannels > MAX_CHANNELS) {
		throw new BufferError(
			'UnsupportedChannelLayout',
			`Unsupported channel count: ${numChannels} (expected 1 or 2)`
		)
	}
}
