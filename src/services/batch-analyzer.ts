// Batch Analyzer
// Values every reprocessable item in a price band and ranks the best opportunities

import { assumptions } from '../constants/assumptions'
import { DEFAULT_EXCLUDED_CATEGORY_IDS } from '../constants/categories'
import { rawModulePrice } from '../trading-economics'
import type { AnalysisRow, AnalysisSummary, SearchScope, SortKey } from '../types'
import type { MarketData } from './catalog'
import type { ExclusionSource } from './exclusion-store'
import { ReprocessingCalculator, resolveValuationOptions, type ValuationOptions } from './reprocessing-calculator'

// ============================================================================
// TYPES
// ============================================================================

export interface AnalysisOptions extends ValuationOptions {
	minPrice: number
	maxPrice: number
	topN: number
	excludedIds: Iterable<number>
	sortKey: SortKey
	excludedCategoryIds: readonly number[]
}

const PROGRESS_INTERVAL = 1000

export function resolveAnalysisOptions(options: Partial<AnalysisOptions> = {}): AnalysisOptions {
	return {
		...resolveValuationOptions({ logWarnings: false }),
		minPrice: assumptions.analysis.minPrice,
		maxPrice: assumptions.analysis.maxPrice,
		topN: assumptions.analysis.topN,
		excludedIds: [],
		sortKey: 'return',
		excludedCategoryIds: DEFAULT_EXCLUDED_CATEGORY_IDS,
		...options,
	}
}

export function searchScopeOf(options: AnalysisOptions): SearchScope {
	return {
		minPrice: options.minPrice,
		maxPrice: options.maxPrice,
		modulePriceMode: options.modulePriceMode,
		mineralPriceMode: options.mineralPriceMode,
	}
}

// ============================================================================
// ANALYZER
// ============================================================================

export class BatchAnalyzer {
	private data: MarketData
	private calculator: ReprocessingCalculator
	private exclusions: ExclusionSource | null

	constructor(data: MarketData, calculator: ReprocessingCalculator, exclusions: ExclusionSource | null = null) {
		this.data = data
		this.calculator = calculator
		this.exclusions = exclusions
	}

	/**
	 * Rank reprocessable items by return or profit per unit.
	 *
	 * The price band is checked against the raw quote before any valuation runs.
	 */
	analyzeAll(options: Partial<AnalysisOptions> = {}): AnalysisSummary {
		const opts = resolveAnalysisOptions(options)
		const excludedCategories = new Set(opts.excludedCategoryIds)
		const excludedIds = new Set(opts.excludedIds)
		for (const id of this.exclusions?.excludedIdsFor(searchScopeOf(opts)) ?? []) {
			excludedIds.add(id)
		}

		const candidates = this.data
			.reprocessableItems()
			.filter((item) => item.categoryId === null || !excludedCategories.has(item.categoryId))

		console.log(`Analyzing ${candidates.length} reprocessable items`)

		const rows: AnalysisRow[] = []
		let priceFiltered = 0
		let excluded = 0
		let skipped = 0

		candidates.forEach((item, index) => {
			if (index > 0 && index % PROGRESS_INTERVAL === 0) {
				console.log(`  ...${index}/${candidates.length}`)
			}

			if (excludedIds.has(item.id)) {
				excluded++
				return
			}

			const price = rawModulePrice(this.data.priceQuote(item.id), opts.modulePriceMode)
			if (price < opts.minPrice || price > opts.maxPrice) {
				priceFiltered++
				return
			}

			const result = this.calculator.calculate(item.id, opts)
			if (!result.ok) {
				skipped++
				return
			}

			const valuation = result.value
			if (valuation.modulePriceBeforeCosts === 0 || valuation.totalMineralValue === 0) {
				skipped++
				return
			}

			rows.push({
				item,
				inputQuantity: valuation.inputQuantity,
				inputQuantitySource: valuation.inputQuantitySource,
				needsReview: valuation.needsReview,
				modulePrice: valuation.modulePriceBeforeCosts,
				netReprocessingValue: valuation.netReprocessingValue,
				profitPerUnit: valuation.netReprocessingValue / valuation.inputQuantity,
				returnPercent: valuation.profitMargin.kind === 'value' ? valuation.profitMargin.percent : null,
				breakevenModulePrice:
					valuation.breakevenModulePrice.kind === 'value' ? valuation.breakevenModulePrice.price : null,
				valuation,
			})
		})

		rows.sort(compareRows(opts.sortKey))

		return {
			rows: rows.slice(0, Math.max(0, opts.topN)),
			candidates: candidates.length,
			priceFiltered,
			excluded,
			skipped,
			valued: rows.length,
		}
	}
}

/**
 * Descending by the sort key. Rows without a return sort last, ties by item ID.
 */
export function compareRows(sortKey: SortKey): (a: AnalysisRow, b: AnalysisRow) => number {
	const keyOf = (row: AnalysisRow): number =>
		sortKey === 'profit' ? row.profitPerUnit : (row.returnPercent ?? Number.NEGATIVE_INFINITY)

	return (a, b) => {
		const diff = keyOf(b) - keyOf(a)
		if (diff !== 0 && !Number.isNaN(diff)) return diff
		return a.item.id - b.item.id
	}
}
