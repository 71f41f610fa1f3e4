import { decodeWav, encodeWavMono, encodeWavStereo } from '@pcmkit/codecs'
import { IOError, type ByteSink, type ByteSource, type TextSink } from '@pcmkit/core'
import { beforeEach, describe, expect, it } from 'vitest'
import { HELP, VERSION, run, type RunDependencies } from './run'

class MemoryStore implements ByteSource, ByteSink {
	readonly files = new Map<string, Uint8Array>()

	read(path: string): Uint8Array {
		const bytes = this.files.get(path)
		if (!bytes) throw new IOError(path, 'No such file')
		return bytes
	}

	write(path: string, bytes: Uint8Array): void {
		this.files.set(path, bytes)
	}
}

class Lines implements TextSink {
	readonly lines: string[] = []

	emit(line: string): void {
		this.lines.push(line)
	}
}

describe('run', () => {
	let store: MemoryStore
	let out: Lines
	let err: Lines
	let deps: RunDependencies

	beforeEach(() => {
		store = new MemoryStore()
		out = new Lines()
		err = new Lines()
		deps = { source: store, sink: store, out, err }
	})

	it('should print help without inputs', () => {
		expect(run([], deps)).toBe(0)
		expect(out.lines).toEqual([HELP])
	})

	it('should print the version', () => {
		expect(run(['--version'], deps)).toBe(0)
		expect(out.lines).toEqual([`pcmwav v${VERSION}`])
	})

	it('should fail on unknown options', () => {
		expect(run(['--nope'], deps)).toBe(1)
		expect(err.lines).toEqual(['Unknown option: --nope'])
		expect(out.lines).toEqual([])
	})

	it('should show file info', () => {
		store.write('tone.wav', encodeWavMono([0, 0.5, -0.5, 0], { sampleRate: 8 }))

		expect(run(['--info', 'tone.wav'], deps)).toBe(0)
		expect(out.lines).toEqual([
			'Source: tone.wav',
			'Size: 52 B',
			'Format: wav',
			'MIME: audio/wav',
			'|======================================|',
			'Num Channels: 1',
			'Num Samples Per Channel: 4',
			'Sample Rate: 8',
			'Bit Depth: 16',
			'Length in Seconds: 0.5',
			'|======================================|',
		])
	})

	it('should report files that fail to decode', () => {
		store.write('bad.wav', new Uint8Array(44))

		expect(run(['--info', 'bad.wav'], deps)).toBe(1)
		expect(err.lines).toEqual(['bad.wav: Invalid WAV: bad magic number'])
	})

	it('should convert stereo 16-bit to mono 8-bit', () => {
		store.write('in.wav', encodeWavStereo([0.5, -0.5], [1, 1], { sampleRate: 8000 }))

		expect(run(['in.wav', 'out/mono.wav', '--channels', '1', '--bits', '8'], deps)).toBe(0)
		expect(out.lines).toEqual(['in.wav → mono.wav'])

		const written = store.read('out/mono.wav')
		expect(written.length).toBe(46)

		const decoded = decodeWav(written)
		expect(decoded.numChannels).toBe(1)
		expect(decoded.bitDepth).toBe(8)
		expect(decoded.sampleRate).toBe(8000)
		expect(decoded.numSamplesPerChannel).toBe(2)
	})

	it('should rewrite the sample rate field', () => {
		store.write('in.wav', encodeWavMono([0.25], { sampleRate: 8000 }))

		expect(run(['in.wav', 'out.wav', '--rate', '16000'], deps)).toBe(0)
		expect(decodeWav(store.read('out.wav')).sampleRate).toBe(16000)
	})

	it('should stay silent with --quiet', () => {
		store.write('in.wav', encodeWavMono([0.25]))

		expect(run(['in.wav', 'out.wav', '--quiet'], deps)).toBe(0)
		expect(out.lines).toEqual([])
		expect(store.files.has('out.wav')).toBe(true)
	})

	it('should require an input and an output', () => {
		expect(run(['only.wav'], deps)).toBe(1)
		expect(err.lines).toEqual(['Error: expected <input.wav> <output.wav>'])
	})

	it('should report missing inputs', () => {
		expect(run(['missing.wav', 'out.wav'], deps)).toBe(1)
		expect(err.lines).toEqual(['Error: No such file: missing.wav'])
		expect(store.files.has('out.wav')).toBe(false)
	})
})
