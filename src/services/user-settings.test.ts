import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import {
	DEFAULT_SETTINGS,
	UserSettingsManager,
	analysisOptionsOf,
	feeParamsOf,
	isSettingKey,
	valuationOptionsOf,
} from './user-settings'

let dir: string
let settingsPath: string

beforeEach(() => {
	dir = fs.mkdtempSync(path.join(os.tmpdir(), 'industry-settings-'))
	settingsPath = path.join(dir, 'settings.json')
})

afterEach(() => {
	fs.rmSync(dir, { recursive: true, force: true })
	vi.restoreAllMocks()
})

function readFile(): unknown {
	return JSON.parse(fs.readFileSync(settingsPath, 'utf8'))
}

describe('UserSettingsManager', () => {
	test('starts from defaults without a settings file', () => {
		const manager = new UserSettingsManager(settingsPath)

		expect(manager.getSettings()).toEqual(DEFAULT_SETTINGS)
		expect(manager.get('yieldPercent')).toBe(55)
		expect(fs.existsSync(settingsPath)).toBe(false)
	})

	test('merges a partial file over the defaults', () => {
		fs.writeFileSync(settingsPath, JSON.stringify({ yieldPercent: 70, modulePriceMode: 'instantBuy' }))

		const settings = new UserSettingsManager(settingsPath).getSettings()

		expect(settings.yieldPercent).toBe(70)
		expect(settings.modulePriceMode).toBe('instantBuy')
		expect(settings.brokerFeePercent).toBe(DEFAULT_SETTINGS.brokerFeePercent)
	})

	test('falls back to defaults when the file holds invalid values', () => {
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
		fs.writeFileSync(settingsPath, JSON.stringify({ yieldPercent: 150 }))

		expect(new UserSettingsManager(settingsPath).getSettings()).toEqual(DEFAULT_SETTINGS)
		expect(warn).toHaveBeenCalledTimes(1)
	})

	test('falls back to defaults when the file is not JSON', () => {
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
		fs.writeFileSync(settingsPath, 'not json')

		expect(new UserSettingsManager(settingsPath).getSettings()).toEqual(DEFAULT_SETTINGS)
		expect(warn).toHaveBeenCalledTimes(1)
	})

	test('saves valid updates', () => {
		const manager = new UserSettingsManager(settingsPath)

		const result = manager.updateSettings({ salesTaxPercent: 4.5, sortKey: 'profit' })

		expect(result.ok).toBe(true)
		expect(readFile()).toEqual({ ...DEFAULT_SETTINGS, salesTaxPercent: 4.5, sortKey: 'profit' })
		expect(new UserSettingsManager(settingsPath).get('sortKey')).toBe('profit')
	})

	test('rejects updates that break a rule and keeps the old values', () => {
		const manager = new UserSettingsManager(settingsPath)

		expect(manager.updateSettings({ minPrice: 500, maxPrice: 100 })).toEqual({
			ok: false,
			error: 'minPrice must not exceed maxPrice',
		})
		expect(manager.updateSettings({ topN: 0 }).ok).toBe(false)
		expect(manager.getSettings()).toEqual(DEFAULT_SETTINGS)
		expect(fs.existsSync(settingsPath)).toBe(false)
	})

	test('sets values from their text form', () => {
		const manager = new UserSettingsManager(settingsPath)

		expect(manager.setFromString('yieldPercent', '60').ok).toBe(true)
		expect(manager.setFromString('mineralPriceMode', 'sellOrder').ok).toBe(true)
		expect(manager.get('yieldPercent')).toBe(60)
		expect(manager.get('mineralPriceMode')).toBe('sellOrder')
	})

	test('rejects unknown keys and malformed values', () => {
		const manager = new UserSettingsManager(settingsPath)

		const unknown = manager.setFromString('colour', 'blue')
		expect(unknown.ok).toBe(false)
		expect(!unknown.ok && unknown.error.startsWith('Unknown setting "colour".')).toBe(true)

		const malformed = manager.setFromString('topN', 'lots')
		expect(malformed.ok).toBe(false)
		expect(!malformed.ok && malformed.error.startsWith('topN: ')).toBe(true)

		expect(manager.setFromString('mineralPriceMode', 'barter').ok).toBe(false)
	})

	test('resets to defaults', () => {
		const manager = new UserSettingsManager(settingsPath)
		manager.updateSettings({ meLevel: 8 })

		manager.resetToDefaults()

		expect(manager.get('meLevel')).toBe(0)
		expect(readFile()).toEqual(DEFAULT_SETTINGS)
	})

	test('displays one aligned line per setting', () => {
		const lines = new UserSettingsManager(settingsPath).displaySettings().split('\n')

		expect(lines).toHaveLength(14)
		expect(lines).toContain(`  ${'topN'.padEnd('reprocessingCostPercent'.length)}  30`)
	})
})

describe('isSettingKey', () => {
	test('accepts only known keys', () => {
		expect(isSettingKey('bufferPercent')).toBe(true)
		expect(isSettingKey('buffer')).toBe(false)
	})
})

describe('option helpers', () => {
	test('map settings onto calculator and analyzer options', () => {
		const settings = { ...DEFAULT_SETTINGS, bufferPercent: 5, topN: 10 }

		expect(feeParamsOf(settings)).toEqual({
			brokerFeePercent: 1.37,
			salesTaxPercent: 3.5,
			bufferPercent: 5,
			averageRelists: 3,
			relistDiscountPercent: 80,
		})
		expect(valuationOptionsOf(settings)).toEqual({
			yieldPercent: 55,
			feeParams: feeParamsOf(settings),
			reprocessingCostPercent: 3.37,
			modulePriceMode: 'buyOrder',
			mineralPriceMode: 'instantSell',
		})
		expect(analysisOptionsOf(settings)).toMatchObject({ topN: 10, minPrice: 1, maxPrice: 100_000, logWarnings: false })
	})
})
