// Core domain types for reprocessing and manufacturing analysis

// ============================================================================
// CATALOG
// ============================================================================

export interface Item {
	id: number
	name: string
	groupId: number | null
	categoryId: number | null
}

/** Best prices on the market. 0 means no live order on that side. */
export interface PriceQuote {
	itemId: number
	buyMax: number
	sellMin: number
}

/** Material obtained from reprocessing exactly one unit at 100% yield */
export interface YieldEntry {
	materialId: number
	materialName: string
	quantity: number
}

// ============================================================================
// INPUT QUANTITY
// ============================================================================

export type InputQuantitySource = 'blueprint' | 'group_consensus' | 'group_most_frequent' | 'default'

export const INPUT_QUANTITY_SOURCES: readonly InputQuantitySource[] = [
	'blueprint',
	'group_consensus',
	'group_most_frequent',
	'default',
]

export interface ResolvedInputQuantity {
	inputQuantity: number
	source: InputQuantitySource
	needsReview: boolean
}

export interface InputQuantityEntry extends ResolvedInputQuantity {
	itemId: number
	createdAt: string
}

// ============================================================================
// PRICING
// ============================================================================

/** How modules are acquired: a standing buy order at buyMax, or buying out sellMin */
export type ModulePriceMode = 'buyOrder' | 'instantBuy'

/** How minerals are liquidated: selling into buyMax, or listing at sellMin */
export type MineralPriceMode = 'instantSell' | 'sellOrder'

export interface FeeParams {
	brokerFeePercent: number
	salesTaxPercent: number
	bufferPercent: number
	averageRelists: number
	relistDiscountPercent: number
}

/** Identifies one search: an exclusion only applies to the same band and modes */
export interface SearchScope {
	minPrice: number
	maxPrice: number
	modulePriceMode: ModulePriceMode
	mineralPriceMode: MineralPriceMode
}

// ============================================================================
// VALUATION
// ============================================================================

export type Margin = { kind: 'value'; percent: number } | { kind: 'undefined' }

export type Breakeven = { kind: 'value'; price: number } | { kind: 'undefined' }

export interface MaterialValuation {
	materialId: number
	materialName: string
	/** Per-unit quantity from the yield record */
	quantityPerUnit: number
	/** Quantity received for the whole job after yield */
	quantityAfterYield: number
	rawPrice: number
	priceAfterCosts: number
	value: number
}

export interface ReprocessingValuation {
	item: Item
	yieldPercent: number
	modulePriceMode: ModulePriceMode
	mineralPriceMode: MineralPriceMode
	feeParams: FeeParams
	inputQuantity: number
	inputQuantitySource: InputQuantitySource
	needsReview: boolean
	modulePriceBeforeCosts: number
	modulePriceAfterCosts: number
	materials: MaterialValuation[]
	totalMineralValue: number
	totalModuleCost: number
	reprocessingCostPercent: number
	effectiveReprocessingCostPercent: number
	reprocessingCost: number
	netReprocessingValue: number
	profitMargin: Margin
	breakevenModulePrice: Breakeven
	/** Names of items that had no price data and were valued at 0 */
	warnings: string[]
}

export type ValuationError =
	| { kind: 'not_found'; ref: string }
	| { kind: 'ambiguous'; name: string; candidateIds: number[] }
	| { kind: 'not_reprocessable'; itemId: number; itemName: string }
	| { kind: 'invalid_override'; reason: string }

// ============================================================================
// ANALYSIS
// ============================================================================

export type SortKey = 'return' | 'profit'

export interface AnalysisRow {
	item: Item
	inputQuantity: number
	inputQuantitySource: InputQuantitySource
	needsReview: boolean
	modulePrice: number
	netReprocessingValue: number
	profitPerUnit: number
	returnPercent: number | null
	breakevenModulePrice: number | null
	valuation: ReprocessingValuation
}

export interface AnalysisSummary {
	rows: AnalysisRow[]
	candidates: number
	priceFiltered: number
	excluded: number
	skipped: number
	valued: number
}
