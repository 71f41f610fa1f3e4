import type { AudioFileFormat } from './types'

/**
 * Magic bytes for container detection
 * Both containers carry a form type 8 bytes in.
 */
const MAGIC_BYTES: Record<string, { bytes: number[]; offset?: number }> = {
	riff: { bytes: [0x52, 0x49, 0x46, 0x46] }, // "RIFF"
	wave: { bytes: [0x57, 0x41, 0x56, 0x45], offset: 8 }, // "WAVE"
	form: { bytes: [0x46, 0x4f, 0x52, 0x4d] }, // "FORM"
	aiff: { bytes: [0x41, 0x49, 0x46, 0x46], offset: 8 }, // "AIFF"
	aifc: { bytes: [0x41, 0x49, 0x46, 0x43], offset: 8 }, // "AIFC"
}

/**
 * Check if bytes match magic signature
 */
function matchMagic(data: Uint8Array, magic: { bytes: number[]; offset?: number } | undefined): boolean {
	if (!magic) return false
	const offset = magic.offset ?? 0
	if (data.length < offset + magic.bytes.length) return false

	for (let i = 0; i < magic.bytes.length; i++) {
		if (data[offset + i] !== magic.bytes[i]) return false
	}
	return true
}

/**
 * Detect audio container from binary data
 */
export function detectAudioFormat(data: Uint8Array): AudioFileFormat | null {
	if (matchMagic(data, MAGIC_BYTES.riff) && matchMagic(data, MAGIC_BYTES.wave)) return 'wav'
	if (
		matchMagic(data, MAGIC_BYTES.form) &&
		(matchMagic(data, MAGIC_BYTES.aiff) || matchMagic(data, MAGIC_BYTES.aifc))
	) {
		return 'aiff'
	}
	return null
}

/**
 * Get file extension for format
 */
export function getExtension(format: AudioFileFormat): string {
	return format
}

/**
 * Get MIME type for format
 */
export function getMimeType(format: AudioFileFormat): string {
	return format === 'wav' ? 'audio/wav' : 'audio/aiff'
}
