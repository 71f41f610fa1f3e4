/**
 * Conversions between normalized samples and integer PCM
 * Out-of-range samples are clamped, never rejected.
 */

const PCM8_OFFSET = 128
const PCM16_SCALE = 32768
const PCM16_MAX = 32767
const PCM24_SCALE = 8388608
const PCM24_MIN = -8388608
const PCM24_MAX = 8388607

export function clampSample(sample: number): number {
	if (Number.isNaN(sample)) return 0
	return Math.max(-1, Math.min(1, sample))
}

/** 16-bit signed PCM to sample */
export function pcm16ToSample(value: number): number {
	return value / PCM16_SCALE
}

/** Sample to 16-bit signed PCM (truncating) */
export function sampleToPcm16(sample: number): number {
	return Math.trunc(clampSample(sample) * PCM16_MAX)
}

/** 8-bit unsigned (offset-binary) PCM to sample */
export function pcm8ToSample(value: number): number {
	return (value - PCM8_OFFSET) / PCM8_OFFSET
}

/** Sample to 8-bit unsigned PCM (truncating) */
export function sampleToPcm8(sample: number): number {
	return Math.trunc(((clampSample(sample) + 1) / 2) * 255)
}

/** 24-bit signed PCM (already sign-extended) to sample */
export function pcm24ToSample(value: number): number {
	return value / PCM24_SCALE
}

/** Sample to 24-bit signed PCM, limited to the two's-complement range */
export function sampleToPcm24(sample: number): number {
	const value = Math.trunc(clampSample(sample) * PCM24_SCALE)
	return Math.max(PCM24_MIN, Math.min(PCM24_MAX, value))
}
