/**
 * pcmwav - inspect and re-encode PCM WAV files
 */

import { basename } from 'node:path'
import { WavCodec, decodeWav } from '@pcmkit/codecs'
import {
	detectAudioFormat,
	errorMessage,
	getMimeType,
	printSummary,
	type ByteSink,
	type ByteSource,
	type TextSink,
} from '@pcmkit/core'
import { parseArgs, type CliOptions } from './args'

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const VERSION = '0.1.0'

export const HELP = `
pcmwav - PCM WAV inspector and converter

USAGE:
  pcmwav <input.wav> <output.wav> [options]   Re-encode a file
  pcmwav --info <file...>                     Show file info

OPTIONS:
  -b, --bits <8|16|24>   Output bit depth
  -c, --channels <1|2>   Output channel count (new channels are silent)
  -r, --rate <hz>        Sample rate written to the header (no resampling)
  -i, --info             Show file info
  -v, --verbose          Verbose output
  -q, --quiet            Suppress output
  --help                 Show this help
  --version              Show version

EXAMPLES:
  pcmwav voice.wav voice-8bit.wav --bits 8     # Requantize to 8-bit
  pcmwav stereo.wav mono.wav --channels 1      # Keep the left channel
  pcmwav --info a.wav b.wav                    # Show summaries
`

export interface RunDependencies {
	source: ByteSource
	sink: ByteSink
	out: TextSink
	err: TextSink
}

const silent: TextSink = { emit: () => undefined }

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

function showInfo(input: string, source: ByteSource, log: TextSink): void {
	const data = source.read(input)
	const format = detectAudioFormat(data)

	log.emit(`Source: ${input}`)
	log.emit(`Size: ${formatBytes(data.length)}`)
	log.emit(`Format: ${format ?? 'unknown'}`)
	if (format) {
		log.emit(`MIME: ${getMimeType(format)}`)
	}

	printSummary(decodeWav(data), log)
}

function convertFile(input: string, output: string, options: CliOptions, deps: RunDependencies, log: TextSink): void {
	const buffer = WavCodec.load(deps.source, input)

	if (options.channels !== undefined) buffer.setNumChannels(options.channels)
	if (options.rate !== undefined) buffer.setSampleRate(options.rate)
	if (options.bits !== undefined) buffer.setBitDepth(options.bits)

	WavCodec.save(deps.sink, output, buffer)

	if (options.verbose) {
		log.emit(`Converting: ${input}`)
		log.emit(`       → ${output}`)
		printSummary(buffer, log)
	} else {
		log.emit(`${basename(input)} → ${basename(output)}`)
	}
}

function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Run the command line
 * @returns process exit code
 */
export function run(argv: string[], deps: RunDependencies): number {
	const parsed = parseArgs(argv)
	if (!parsed.ok) {
		deps.err.emit(parsed.error)
		return 1
	}

	const { inputs, options } = parsed
	const log = options.quiet ? silent : deps.out

	if (options.help || (inputs.length === 0 && !options.version)) {
		deps.out.emit(HELP)
		return 0
	}

	if (options.version) {
		deps.out.emit(`pcmwav v${VERSION}`)
		return 0
	}

	if (options.info) {
		let failed = 0
		for (const input of inputs) {
			try {
				showInfo(input, deps.source, log)
			} catch (err) {
				failed++
				deps.err.emit(`${input}: ${errorMessage(err)}`)
			}
		}
		return failed > 0 ? 1 : 0
	}

	const [input, output] = inputs
	if (input === undefined || output === undefined || inputs.length > 2) {
		deps.err.emit('Error: expected <input.wav> <output.wav>')
		return 1
	}

	try {
		convertFile(input, output, options, deps, log)
		return 0
	} catch (err) {
		deps.err.emit(`Error: ${errorMessage(err)}`)
		return 1
	}
}
