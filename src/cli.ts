// CLI Application for reprocessing and manufacturing profitability analysis

import 'dotenv/config'
import { search, select } from '@inquirer/prompts'
import { closeDb, getDatabaseSize, getDb, resolveDbPath } from './db/db'
import { createEngine, type Engine } from './engine'
import { searchScopeOf, resolveAnalysisOptions } from './services/batch-analyzer'
import { formatPopulateStats, populateInputQuantityCache } from './services/cache-populator'
import { formatAnalysis, formatManufacturing, formatValuation, ReportGenerator } from './services/report-generator'
import { describeValuationError, recalculateWithOverrides } from './services/reprocessing-calculator'
import { analysisOptionsOf, UserSettingsManager, valuationOptionsOf, type UserSettings } from './services/user-settings'
import type { ItemRef } from './services/catalog'
import { itemRefFrom, parseArgv, parseFlags, parseMaterialOverrides, type CliFlags } from './utils/args'

const USAGE = `Usage: industry-margins <command> [options]

Commands:
  value <item>         Reprocessing value of one item (ID or exact name)
                       [--yield=55] [--module-mode=buyOrder|instantBuy] [--mineral-mode=instantSell|sellOrder]
                       [--input-quantity=N] [--materials=materialId:qty,...]
  analyze              Rank all reprocessable items
                       [--min-price] [--max-price] [--top] [--sort=return|profit] [--csv=file]
  exclude <itemId>     Hide an item from analyses with the same price band and modes
  exclusions           List hidden items
  unexclude <itemId>   Restore a hidden item
  populate-cache       Resolve input quantities for every item
  review [--limit=50]  List inferred input quantities that need review
  clear-cache [itemId] Forget cached input quantities
  manufacturing        Rank blueprints by manufacturing profit
                       [--me=0] [--min-profit=0] [--skills] [--resources] [--top] [--csv=file]
  settings [key=value] Show or change saved defaults, "settings reset" restores them
  status               Database location, size and cache coverage

Run without a command for the interactive menu.`

// ============================================================================
// SETTINGS + FLAGS
// ============================================================================

/**
 * Saved settings with command line flags applied on top
 */
function applyFlags(settings: UserSettings, flags: CliFlags): UserSettings {
	const merged = { ...settings }
	if (flags.yield !== undefined) merged.yieldPercent = flags.yield
	if (flags['module-mode'] !== undefined) merged.modulePriceMode = flags['module-mode']
	if (flags['mineral-mode'] !== undefined) merged.mineralPriceMode = flags['mineral-mode']
	if (flags['min-price'] !== undefined) merged.minPrice = flags['min-price']
	if (flags['max-price'] !== undefined) merged.maxPrice = flags['max-price']
	if (flags.top !== undefined) merged.topN = flags.top
	if (flags.sort !== undefined) merged.sortKey = flags.sort
	if (flags.me !== undefined) merged.meLevel = flags.me
	return merged
}

function fail(message: string): void {
	console.error(message)
	process.exitCode = 1
}

// ============================================================================
// COMMANDS
// ============================================================================

function showValue(engine: Engine, ref: ItemRef, settings: UserSettings, flags: CliFlags): void {
	const result = engine.calculator.calculate(ref, valuationOptionsOf(settings))
	if (!result.ok) return fail(describeValuationError(result.error))

	let valuation = result.value
	if (flags['input-quantity'] !== undefined || flags.materials !== undefined) {
		const materials = flags.materials === undefined ? undefined : parseMaterialOverrides(flags.materials)
		if (materials && !materials.ok) return fail(materials.error)

		const recalculated = recalculateWithOverrides(valuation, {
			inputQuantity: flags['input-quantity'],
			materialQuantities: materials?.value,
		})
		if (!recalculated.ok) return fail(describeValuationError(recalculated.error))
		valuation = recalculated.value
	}

	console.log(formatValuation(valuation))
}

function runAnalysis(engine: Engine, settings: UserSettings, flags: CliFlags): void {
	const analyzer = engine.createBatchAnalyzer()
	const summary = analyzer.analyzeAll(analysisOptionsOf(settings))
	console.log(formatAnalysis(summary))

	if (flags.csv) {
		const file = new ReportGenerator('.').generateAnalysisCSV(summary.rows, flags.csv)
		console.log(`Saved ${summary.rows.length} rows to ${file}`)
	}
}

function excludeItem(engine: Engine, ref: ItemRef, settings: UserSettings): void {
	const lookup = engine.catalog.lookupItem(ref)
	if (!lookup.ok) return fail(describeValuationError(lookup.error))

	const scope = searchScopeOf(resolveAnalysisOptions(analysisOptionsOf(settings)))
	const added = engine.exclusions.exclude(lookup.value, scope)
	console.log(
		added
			? `Excluded ${lookup.value.name} from ${scope.minPrice}-${scope.maxPrice} ISK (${scope.modulePriceMode}/${scope.mineralPriceMode})`
			: `${lookup.value.name} is already excluded from this search`
	)
}

function listExclusions(engine: Engine): void {
	const entries = engine.exclusions.list()
	if (entries.length === 0) {
		console.log('No excluded items')
		return
	}
	for (const entry of entries) {
		console.log(
			`${String(entry.itemId).padStart(8)}  ${entry.itemName.padEnd(40)} ` +
				`${entry.minPrice}-${entry.maxPrice} ${entry.modulePriceMode}/${entry.mineralPriceMode}`
		)
	}
}

function showReview(engine: Engine, limit: number): void {
	const entries = engine.resolver.needingReview(limit)
	if (entries.length === 0) {
		console.log('No input quantities need review')
		return
	}
	for (const entry of entries) {
		const name = engine.catalog.getItem(entry.itemId)?.name ?? '(unknown item)'
		console.log(`${String(entry.itemId).padStart(8)}  ${name.padEnd(40)} ${String(entry.inputQuantity).padStart(6)}  ${entry.source}`)
	}
}

function runManufacturing(engine: Engine, settings: UserSettings, flags: CliFlags): void {
	const results = engine.manufacturing.analyze({
		meLevel: settings.meLevel,
		salesTaxPercent: settings.salesTaxPercent,
		filterSkills: flags.skills ?? false,
		filterResources: flags.resources ?? false,
		minProfit: flags['min-profit'] ?? 0,
		topN: settings.topN,
	})
	console.log(formatManufacturing(results))

	if (flags.csv) {
		const file = new ReportGenerator('.').generateManufacturingCSV(results, flags.csv)
		console.log(`Saved ${results.length} rows to ${file}`)
	}
}

function runSettings(manager: UserSettingsManager, assignments: string[]): void {
	if (assignments[0] === 'reset') {
		manager.resetToDefaults()
		console.log('Settings reset to defaults')
	}

	for (const assignment of assignments.filter((a) => a !== 'reset')) {
		const eq = assignment.indexOf('=')
		if (eq === -1) return fail(`Expected key=value, got "${assignment}"`)
		const updated = manager.setFromString(assignment.slice(0, eq), assignment.slice(eq + 1))
		if (!updated.ok) return fail(updated.error)
	}

	console.log(manager.displaySettings())
}

function showStatus(engine: Engine): void {
	const dbPath = resolveDbPath()
	const sizeMb = getDatabaseSize(dbPath) / (1024 * 1024)
	console.log(`Database:          ${dbPath} (${sizeMb.toFixed(1)} MB)`)
	console.log(`Items:             ${engine.catalog.allItems().length}`)
	console.log(`Reprocessable:     ${engine.catalog.reprocessableItems().length}`)
	console.log(`Cached quantities: ${engine.resolver.cachedCount()}`)
	console.log(`Excluded items:    ${engine.exclusions.list().length}`)
}

// ============================================================================
// INTERACTIVE MENU
// ============================================================================

async function interactive(engine: Engine, manager: UserSettingsManager): Promise<void> {
	for (;;) {
		const action = await select({
			message: 'What do you want to do?',
			choices: [
				{ name: 'Value an item', value: 'value' },
				{ name: 'Analyze all items', value: 'analyze' },
				{ name: 'Manufacturing profitability', value: 'manufacturing' },
				{ name: 'Populate input quantity cache', value: 'populate' },
				{ name: 'Show settings', value: 'settings' },
				{ name: 'Exit', value: 'exit' },
			],
		})

		const settings = manager.getSettings()
		switch (action) {
			case 'value': {
				const itemId = await search({
					message: 'Search item',
					source: async (term) => {
						if (!term || term.length < 2) return []
						return engine.catalog.searchItems(term).map((item) => ({ name: item.name, value: item.id }))
					},
				})
				showValue(engine, itemId, settings, {})
				break
			}
			case 'analyze':
				runAnalysis(engine, settings, {})
				break
			case 'manufacturing':
				runManufacturing(engine, settings, {})
				break
			case 'populate':
				console.log(formatPopulateStats(populateInputQuantityCache(engine.catalog, engine.resolver)))
				break
			case 'settings':
				console.log(manager.displaySettings())
				break
			case 'exit':
				return
		}
		console.log('')
	}
}

// ============================================================================
// MAIN
// ============================================================================

async function main(): Promise<void> {
	const { command, positionals, flags: rawFlags } = parseArgv(process.argv.slice(2))

	if (command === 'help' || rawFlags.help !== undefined) {
		console.log(USAGE)
		return
	}

	const flags = parseFlags(rawFlags)
	if (!flags.ok) return fail(flags.error)

	const manager = new UserSettingsManager()
	const settings = applyFlags(manager.getSettings(), flags.value)
	const engine = createEngine(getDb())
	const ref = itemRefFrom(positionals)

	try {
		switch (command) {
			case undefined:
				await interactive(engine, manager)
				break
			case 'value':
				if (ref === null) return fail('Usage: industry-margins value <item ID or name>')
				showValue(engine, ref, settings, flags.value)
				break
			case 'analyze':
				runAnalysis(engine, settings, flags.value)
				break
			case 'exclude':
				if (ref === null) return fail('Usage: industry-margins exclude <item ID or name>')
				excludeItem(engine, ref, settings)
				break
			case 'exclusions':
				listExclusions(engine)
				break
			case 'unexclude': {
				if (typeof ref !== 'number') return fail('Usage: industry-margins unexclude <item ID>')
				const removed = engine.exclusions.remove(ref)
				console.log(`Removed ${removed} exclusion(s) for item ${ref}`)
				break
			}
			case 'populate-cache':
				console.log(formatPopulateStats(populateInputQuantityCache(engine.catalog, engine.resolver)))
				break
			case 'review':
				showReview(engine, flags.value.limit ?? 50)
				break
			case 'clear-cache':
				if (typeof ref === 'string') return fail('Usage: industry-margins clear-cache [item ID]')
				if (ref === null) {
					console.log(`Cleared ${engine.resolver.clearAll()} cached quantities`)
				} else {
					console.log(engine.resolver.clear(ref) ? `Cleared cached quantity for ${ref}` : `Nothing cached for ${ref}`)
				}
				break
			case 'manufacturing':
				runManufacturing(engine, settings, flags.value)
				break
			case 'settings':
				runSettings(manager, positionals)
				break
			case 'status':
				showStatus(engine)
				break
			default:
				fail(`Unknown command: ${command}\n\n${USAGE}`)
		}
	} finally {
		closeDb()
	}
}

main().catch((error: unknown) => {
	console.error('Error:', error instanceof Error ? error.message : error)
	process.exit(1)
})
