#!/usr/bin/env node
/**
 * pcmwav CLI entry point
 */

import { FileByteStore, stderr, stdout } from './io'
import { run } from './run'

const store = new FileByteStore()

process.exitCode = run(process.argv.slice(2), { source: store, sink: store, out: stdout, err: stderr })
