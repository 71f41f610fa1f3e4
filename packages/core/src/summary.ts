import type { SampleBuffer } from './buffer'
import type { SampleArray, TextSink } from './types'

const RULE = '|======================================|'

/**
 * Summary lines for a buffer: channels, length, rate, depth and duration
 */
export function describeSampleBuffer(buffer: SampleBuffer<SampleArray>): string[] {
	return [
		RULE,
		`Num Channels: ${buffer.numChannels}`,
		`Num Samples Per Channel: ${buffer.numSamplesPerChannel}`,
		`Sample Rate: ${buffer.sampleRate}`,
		`Bit Depth: ${buffer.bitDepth}`,
		`Length in Seconds: ${buffer.lengthInSeconds}`,
		RULE,
	]
}

export function printSummary(buffer: SampleBuffer<SampleArray>, sink: TextSink): void {
	for (const line of describeSampleBuffer(buffer)) {
		sink.emit(line)
	}
}
