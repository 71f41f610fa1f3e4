import { MAX_UINT32, isBitDepth } from '@pcmkit/core'
import { z } from 'zod'

// ─────────────────────────────────────────────────────────────────────────────
// Options
// ─────────────────────────────────────────────────────────────────────────────

const optionsSchema = z.object({
	// Commands
	info: z.boolean().optional(),
	help: z.boolean().optional(),
	version: z.boolean().optional(),

	// Output format
	bits: z.coerce.number().int().refine(isBitDepth, 'must be 8, 16 or 24').optional(),
	channels: z.coerce.number().pipe(z.union([z.literal(1), z.literal(2)])).optional(),
	rate: z.coerce.number().int().positive().max(MAX_UINT32).optional(),

	// Flags
	verbose: z.boolean().optional(),
	quiet: z.boolean().optional(),
})

export type CliOptions = z.infer<typeof optionsSchema>

export type ParsedArgs =
	| { ok: true; inputs: string[]; options: CliOptions }
	| { ok: false; error: string }

const BOOLEAN_FLAGS = new Map<string, 'info' | 'help' | 'version' | 'verbose' | 'quiet'>([
	['--info', 'info'],
	['-i', 'info'],
	['--help', 'help'],
	['-?', 'help'],
	['--version', 'version'],
	['-V', 'version'],
	['--verbose', 'verbose'],
	['-v', 'verbose'],
	['--quiet', 'quiet'],
	['-q', 'quiet'],
])

const VALUE_FLAGS = new Map<string, 'bits' | 'channels' | 'rate'>([
	['--bits', 'bits'],
	['-b', 'bits'],
	['--channels', 'channels'],
	['-c', 'channels'],
	['--rate', 'rate'],
	['-r', 'rate'],
])

// ─────────────────────────────────────────────────────────────────────────────
// Argument Parser
// ─────────────────────────────────────────────────────────────────────────────

export function parseArgs(args: string[]): ParsedArgs {
	const inputs: string[] = []
	const raw: Record<string, string | boolean> = {}

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? ''
		const flag = BOOLEAN_FLAGS.get(arg)
		const key = VALUE_FLAGS.get(arg)

		if (flag) {
			raw[flag] = true
		} else if (key) {
			const value = args[i + 1]
			if (value === undefined) {
				return { ok: false, error: `Missing value for ${arg}` }
			}
			raw[key] = value
			i++
		} else if (!arg.startsWith('-')) {
			inputs.push(arg)
		} else {
			return { ok: false, error: `Unknown option: ${arg}` }
		}
	}

	const parsed = optionsSchema.safeParse(raw)
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`)
		return { ok: false, error: `Invalid options: ${issues.join(', ')}` }
	}

	return { ok: true, inputs, options: parsed.data }
}
