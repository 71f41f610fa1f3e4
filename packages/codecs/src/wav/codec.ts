/**
 * WAV codec class implementation
 * Integrates decoder and encoder with byte sources and sinks
 */

import type { ByteSink, ByteSource, SampleArray, SampleArrayType, SampleBuffer } from '@pcmkit/core'
import { decodeWav, decodeWavInto, isWav, parseWavInfo } from './decoder'
import { encodeWav } from './encoder'
import type { WavEncodeOptions, WavInfo } from './types'

/**
 * WAV Codec class
 */
export class WavCodec {
	/**
	 * Detect if data is WAV
	 */
	static detect(data: Uint8Array): boolean {
		return isWav(data)
	}

	/**
	 * Parse WAV metadata
	 */
	static parse(data: Uint8Array): WavInfo {
		return parseWavInfo(data)
	}

	/**
	 * Decode WAV to a new sample buffer
	 */
	static decode(data: Uint8Array): SampleBuffer<Float32Array> {
		return decodeWav(data)
	}

	/**
	 * Decode WAV into an existing sample buffer
	 */
	static decodeInto<T extends SampleArray>(data: Uint8Array, target: SampleBuffer<T>): void {
		decodeWavInto(data, target)
	}

	/**
	 * Encode a sample buffer to WAV
	 */
	static encode(buffer: SampleBuffer<SampleArray>, options?: WavEncodeOptions): Uint8Array {
		return encodeWav(buffer, options)
	}

	/**
	 * Read and decode a WAV file
	 * @throws IOError from the source, DecodeError for bad contents
	 */
	static load(source: ByteSource, path: string): SampleBuffer<Float32Array>
	static load<T extends SampleArray>(
		source: ByteSource,
		path: string,
		arrayType: SampleArrayType<T>
	): SampleBuffer<T>
	static load(
		source: ByteSource,
		path: string,
		arrayType: SampleArrayType<SampleArray> = Float32Array
	): SampleBuffer<SampleArray> {
		return decodeWav(source.read(path), arrayType)
	}

	/**
	 * Encode a sample buffer and write it out
	 * Nothing is written when encoding fails.
	 * @throws EncodeError, IOError from the sink
	 */
	static save(
		sink: ByteSink,
		path: string,
		buffer: SampleBuffer<SampleArray>,
		options?: WavEncodeOptions
	): void {
		sink.write(path, encodeWav(buffer, options))
	}
}
