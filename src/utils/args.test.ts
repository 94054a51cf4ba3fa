import { describe, test, expect } from 'vitest'
import { itemRefFrom, parseArgv, parseFlags, parseMaterialOverrides } from './args'

describe('parseArgv', () => {
	test('splits the command, positionals and flags', () => {
		expect(parseArgv(['value', 'Warp', 'Scrambler', '--yield=72.5', '--module-mode=instantBuy'])).toEqual({
			command: 'value',
			positionals: ['Warp', 'Scrambler'],
			flags: { yield: '72.5', 'module-mode': 'instantBuy' },
		})
	})

	test('treats a bare flag as a switch', () => {
		expect(parseArgv(['manufacturing', '--skills']).flags).toEqual({ skills: 'true' })
	})

	test('keeps everything after the first = in the value', () => {
		expect(parseArgv(['analyze', '--csv=a=b.csv']).flags).toEqual({ csv: 'a=b.csv' })
	})

	test('has no command for an empty argv', () => {
		expect(parseArgv([])).toEqual({ command: undefined, positionals: [], flags: {} })
	})
})

describe('parseFlags', () => {
	test('coerces numbers and switches', () => {
		expect(parseFlags({ yield: '60', top: '5', skills: 'true', resources: 'false', sort: 'profit' })).toEqual({
			ok: true,
			value: { yield: 60, top: 5, skills: true, resources: false, sort: 'profit' },
		})
	})

	test('names the flag that failed', () => {
		const result = parseFlags({ top: '0' })

		expect(result.ok).toBe(false)
		expect(!result.ok && result.error.startsWith('--top: ')).toBe(true)
	})

	test('rejects unknown flags', () => {
		const result = parseFlags({ colour: 'blue' })

		expect(result.ok).toBe(false)
		expect(!result.ok && result.error.includes("'colour'")).toBe(true)
	})

	test('rejects unknown price modes', () => {
		expect(parseFlags({ 'mineral-mode': 'barter' }).ok).toBe(false)
	})
})

describe('parseMaterialOverrides', () => {
	test('reads id:quantity pairs', () => {
		expect(parseMaterialOverrides('34:120,35:40.5')).toEqual({
			ok: true,
			value: new Map([
				[34, 120],
				[35, 40.5],
			]),
		})
	})

	test('rejects malformed pairs', () => {
		expect(parseMaterialOverrides('34')).toEqual({
			ok: false,
			error: 'Invalid material override "34", expected materialId:quantity',
		})
		expect(parseMaterialOverrides('34:').ok).toBe(false)
		expect(parseMaterialOverrides('tritanium:5').ok).toBe(false)
		expect(parseMaterialOverrides('34:lots').ok).toBe(false)
	})
})

describe('itemRefFrom', () => {
	test('reads digits as an item ID and anything else as a name', () => {
		expect(itemRefFrom(['3000'])).toBe(3000)
		expect(itemRefFrom(['Warp', 'Scrambler', 'I'])).toBe('Warp Scrambler I')
		expect(itemRefFrom(['125mm', 'Railgun'])).toBe('125mm Railgun')
		expect(itemRefFrom([])).toBeNull()
	})
})
