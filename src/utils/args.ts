// Command line parsing: `command positional... --flag=value --switch`

import { z } from 'zod'
import { err, ok, type Result } from './result'

export interface ParsedArgs {
	command: string | undefined
	positionals: string[]
	flags: Record<string, string>
}

export function parseArgv(argv: string[]): ParsedArgs {
	const positionals: string[] = []
	const flags: Record<string, string> = {}

	for (const arg of argv) {
		if (arg.startsWith('--')) {
			const body = arg.slice(2)
			const eq = body.indexOf('=')
			if (eq === -1) {
				flags[body] = 'true'
			} else {
				flags[body.slice(0, eq)] = body.slice(eq + 1)
			}
		} else {
			positionals.push(arg)
		}
	}

	const [command, ...rest] = positionals
	return { command, positionals: rest, flags }
}

const switchFlag = z.enum(['true', 'false']).transform((value) => value === 'true')

export const flagsSchema = z
	.object({
		yield: z.coerce.number().min(0).max(100),
		'module-mode': z.enum(['buyOrder', 'instantBuy']),
		'mineral-mode': z.enum(['instantSell', 'sellOrder']),
		'min-price': z.coerce.number().min(0),
		'max-price': z.coerce.number().min(0),
		top: z.coerce.number().int().positive(),
		sort: z.enum(['return', 'profit']),
		csv: z.string().min(1),
		limit: z.coerce.number().int().positive(),
		'input-quantity': z.coerce.number().int().positive(),
		materials: z.string().min(1),
		me: z.coerce.number().int().min(0).max(10),
		'min-profit': z.coerce.number(),
		skills: switchFlag,
		resources: switchFlag,
	})
	.partial()
	.strict()

export type CliFlags = z.infer<typeof flagsSchema>

export function parseFlags(flags: Record<string, string>): Result<CliFlags, string> {
	const parsed = flagsSchema.safeParse(flags)
	if (!parsed.success) {
		return err(
			parsed.error.issues
				.map((issue) => (issue.path.length > 0 ? `--${issue.path.join('.')}: ${issue.message}` : issue.message))
				.join('; ')
		)
	}
	return ok(parsed.data)
}

/**
 * Parse `34:120,35:40` into material ID to quantity
 */
export function parseMaterialOverrides(text: string): Result<Map<number, number>, string> {
	const overrides = new Map<number, number>()
	for (const part of text.split(',')) {
		const [id, quantity] = part.split(':')
		const materialId = Number(id)
		const value = Number(quantity)
		const missing = quantity === undefined || quantity.trim() === ''
		if (!Number.isInteger(materialId) || materialId <= 0 || missing || !Number.isFinite(value)) {
			return err(`Invalid material override "${part}", expected materialId:quantity`)
		}
		overrides.set(materialId, value)
	}
	return ok(overrides)
}

/**
 * Item reference from positionals: a bare number is an ID, anything else a name
 */
export function itemRefFrom(positionals: string[]): number | string | null {
	const text = positionals.join(' ').trim()
	if (text === '') return null
	return /^\d+$/.test(text) ? Number(text) : text
}
