/**
 * Error taxonomy for PCM WAV decoding, encoding and buffer edits
 */

export type DecodeErrorKind =
	| 'InvalidContainer'
	| 'MissingChunk'
	| 'UnsupportedCompression'
	| 'UnsupportedChannelLayout'
	| 'UnsupportedBitDepth'
	| 'InconsistentHeader'
	| 'TruncatedData'

export type EncodeErrorKind = 'UnsupportedBitDepth' | 'UnsupportedChannelLayout' | 'HeaderOverflow' | 'SizeMismatch'

export type BufferErrorKind = 'UnsupportedChannelLayout' | 'UnsupportedBitDepth' | 'InvalidBuffer'

export type WavErrorKind = DecodeErrorKind | EncodeErrorKind | BufferErrorKind | 'IOError'

/**
 * Base class of every failure raised by pcmkit
 * Inspect `kind` to tell bad input from programming defects.
 */
export class WavError<K extends WavErrorKind = WavErrorKind> extends Error {
	readonly kind: K

	constructor(kind: K, message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = 'WavError'
		this.kind = kind
	}
}

/** Raised while parsing a byte stream */
export class DecodeError extends WavError<DecodeErrorKind> {
	constructor(kind: DecodeErrorKind, message: string) {
		super(kind, `Invalid WAV: ${message}`)
		this.name = 'DecodeError'
	}
}

/** Raised while serializing a sample buffer */
export class EncodeError extends WavError<EncodeErrorKind> {
	constructor(kind: EncodeErrorKind, message: string) {
		super(kind, `Cannot encode WAV: ${message}`)
		this.name = 'EncodeError'
	}
}

/** Raised when a sample buffer edit would break its invariants */
export class BufferError extends WavError<BufferErrorKind> {
	constructor(kind: BufferErrorKind, message: string) {
		super(kind, message)
		this.name = 'BufferError'
	}
}

/** Raised by byte source/sink collaborators */
export class IOError extends WavError<'IOError'> {
	readonly path: string

	constructor(path: string, message: string, options?: { cause?: unknown }) {
		super('IOError', `${message}: ${path}`, options)
		this.name = 'IOError'
		this.path = path
	}
}

export function isWavError(value: unknown, kind?: WavErrorKind): value is WavError {
	if (!(value instanceof WavError)) return false
	return kind === undefined || value.kind === kind
}

/**
 * Human-readable message of any thrown value
 */
export function errorMessage(err: unknown): string {
	if (err instanceof Error) return err.message
	if (typeof err === 'string') return err
	try {
		return JSON.stringify(err) ?? String(err)
	} catch {
		return String(err)
	}
}
