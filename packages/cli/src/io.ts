import { mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'
import { IOError, type ByteSink, type ByteSource, type TextSink } from '@pcmkit/core'

/**
 * Filesystem byte source and sink
 * Missing output directories are created on write.
 */
export class FileByteStore implements ByteSource, ByteSink {
	read(path: string): Uint8Array {
		try {
			return new Uint8Array(readFileSync(path))
		} catch (err) {
			throw new IOError(path, 'Cannot read file', { cause: err })
		}
	}

	write(path: string, bytes: Uint8Array): void {
		try {
			mkdirSync(dirname(path), { recursive: true })
			writeFileSync(path, bytes)
		} catch (err) {
			throw new IOError(path, 'Cannot write file', { cause: err })
		}
	}
}

export const stdout: TextSink = { emit: (line) => console.log(line) }
export const stderr: TextSink = { emit: (line) => console.error(line) }
