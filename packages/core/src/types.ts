/**
 * Floating-point storage for one channel of normalized samples (-1 to 1)
 */
export type SampleArray = Float32Array | Float64Array

/**
 * Constructor of a sample array type, e.g. `Float32Array` or `Float64Array`
 */
export interface SampleArrayType<T extends SampleArray> {
	new (length: number): T
}

/**
 * Supported PCM bit depths
 */
export const BIT_DEPTHS = [8, 16, 24] as const

export type BitDepth = (typeof BIT_DEPTHS)[number]

/**
 * Supported channel counts (mono, stereo)
 */
export const MAX_CHANNELS = 2

/**
 * Defaults of a freshly created sample buffer
 */
export const DEFAULT_SAMPLE_RATE = 44100
export const DEFAULT_BIT_DEPTH: BitDepth = 16

/**
 * Largest value of a RIFF size or rate field
 */
export const MAX_UINT32 = 0xffffffff

/**
 * Container formats recognised by magic bytes
 */
export type AudioFileFormat = 'wav' | 'aiff'

/**
 * Byte source collaborator (e.g. a filesystem)
 * Implementations throw IOError on failure
 */
export interface ByteSource {
	read(path: string): Uint8Array
}

/**
 * Byte sink collaborator (e.g. a filesystem)
 * Implementations throw IOError on failure
 */
export interface ByteSink {
	write(path: string, bytes: Uint8Array): void
}

/**
 * Line-oriented text output
 */
export interface TextSink {
	emit(line: string): void
}

export function isBitDepth(value: number): value is BitDepth {
	return (BIT_DEPTHS as readonly number[]).includes(value)
}
