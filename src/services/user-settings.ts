// User Settings Service
// Manages user defaults for fees, yield, price modes and analysis filters

import * as fs from 'fs'
import * as path from 'path'
import { z } from 'zod'
import { assumptions } from '../constants/assumptions'
import type { FeeParams } from '../types'
import { err, ok, type Result } from '../utils/result'
import type { AnalysisOptions } from './batch-analyzer'
import type { ValuationOptions } from './reprocessing-calculator'

const percent = z.number().min(0).max(100)

export const settingsSchema = z.object({
	// Market fees
	brokerFeePercent: percent,
	salesTaxPercent: percent,
	bufferPercent: percent,
	averageRelists: z.number().min(0),
	relistDiscountPercent: percent,

	// Reprocessing
	yieldPercent: percent,
	reprocessingCostPercent: percent,
	modulePriceMode: z.enum(['buyOrder', 'instantBuy']),
	mineralPriceMode: z.enum(['instantSell', 'sellOrder']),

	// Analysis
	minPrice: z.number().min(0),
	maxPrice: z.number().min(0),
	topN: z.number().int().positive(),
	sortKey: z.enum(['return', 'profit']),

	// Manufacturing
	meLevel: z.number().int().min(0).max(10),
})

export type UserSettings = z.infer<typeof settingsSchema>
export type SettingKey = keyof UserSettings

export const DEFAULT_SETTINGS: Readonly<UserSettings> = {
	...assumptions.fees,
	...assumptions.reprocessing,
	modulePriceMode: 'buyOrder',
	mineralPriceMode: 'instantSell',
	...assumptions.analysis,
	sortKey: 'return',
	meLevel: 0,
}

export const SETTING_KEYS: readonly SettingKey[] = settingsSchema.keyof().options

export function isSettingKey(key: string): key is SettingKey {
	return SETTING_KEYS.some((candidate) => candidate === key)
}

export function resolveSettingsPath(): string {
	return process.env.INDUSTRY_SETTINGS_PATH ?? path.join(process.cwd(), 'industry-settings.json')
}

export class UserSettingsManager {
	private settings: UserSettings
	private settingsPath: string

	constructor(settingsPath: string = resolveSettingsPath()) {
		this.settingsPath = settingsPath
		this.settings = this.loadSettings()
	}

	/**
	 * Get current user settings
	 */
	getSettings(): UserSettings {
		return { ...this.settings }
	}

	get<K extends SettingKey>(key: K): UserSettings[K] {
		return this.settings[key]
	}

	/**
	 * Validate and apply updates. Nothing is saved when any value is invalid.
	 */
	updateSettings(updates: Partial<UserSettings>): Result<UserSettings, string> {
		const merged = settingsSchema.safeParse({ ...this.settings, ...updates })
		if (!merged.success) {
			return err(formatIssues(merged.error))
		}
		if (merged.data.minPrice > merged.data.maxPrice) {
			return err('minPrice must not exceed maxPrice')
		}
		this.settings = merged.data
		this.saveSettings()
		return ok(this.getSettings())
	}

	/**
	 * Set one setting from its text form, as typed on the command line
	 */
	setFromString(key: string, raw: string): Result<UserSettings, string> {
		if (!isSettingKey(key)) {
			return err(`Unknown setting "${key}". Known settings: ${SETTING_KEYS.join(', ')}`)
		}
		const value = typeof DEFAULT_SETTINGS[key] === 'number' ? Number(raw) : raw
		const parsed = settingsSchema.partial().safeParse({ [key]: value })
		if (!parsed.success) {
			return err(formatIssues(parsed.error))
		}
		return this.updateSettings(parsed.data)
	}

	resetToDefaults(): void {
		this.settings = { ...DEFAULT_SETTINGS }
		this.saveSettings()
	}

	/**
	 * Load settings from file, merged over the defaults
	 */
	private loadSettings(): UserSettings {
		if (!fs.existsSync(this.settingsPath)) {
			return { ...DEFAULT_SETTINGS }
		}

		try {
			const data: unknown = JSON.parse(fs.readFileSync(this.settingsPath, 'utf8'))
			const parsed = settingsSchema.partial().safeParse(data)
			if (parsed.success) {
				return { ...DEFAULT_SETTINGS, ...parsed.data }
			}
			console.warn(`Invalid settings in ${this.settingsPath}, using defaults: ${formatIssues(parsed.error)}`)
		} catch (e) {
			console.warn(`Could not read ${this.settingsPath}, using defaults:`, e)
		}

		return { ...DEFAULT_SETTINGS }
	}

	private saveSettings(): void {
		fs.writeFileSync(this.settingsPath, JSON.stringify(this.settings, null, 2) + '\n')
	}

	/**
	 * Display current settings in a readable format
	 */
	displaySettings(): string {
		const width = Math.max(...SETTING_KEYS.map((key) => key.length))
		return SETTING_KEYS.map((key) => `  ${key.padEnd(width)}  ${this.settings[key]}`).join('\n')
	}
}

function formatIssues(error: z.ZodError): string {
	return error.issues.map((issue) => `${issue.path.join('.') || 'settings'}: ${issue.message}`).join('; ')
}

export function feeParamsOf(settings: UserSettings): FeeParams {
	return {
		brokerFeePercent: settings.brokerFeePercent,
		salesTaxPercent: settings.salesTaxPercent,
		bufferPercent: settings.bufferPercent,
		averageRelists: settings.averageRelists,
		relistDiscountPercent: settings.relistDiscountPercent,
	}
}

export function valuationOptionsOf(settings: UserSettings): Partial<ValuationOptions> {
	return {
		yieldPercent: settings.yieldPercent,
		feeParams: feeParamsOf(settings),
		reprocessingCostPercent: settings.reprocessingCostPercent,
		modulePriceMode: settings.modulePriceMode,
		mineralPriceMode: settings.mineralPriceMode,
	}
}

export function analysisOptionsOf(settings: UserSettings): Partial<AnalysisOptions> {
	return {
		...valuationOptionsOf(settings),
		logWarnings: false,
		minPrice: settings.minPrice,
		maxPrice: settings.maxPrice,
		topN: settings.topN,
		sortKey: settings.sortKey,
	}
}
