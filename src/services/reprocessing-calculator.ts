// Reprocessing Value Calculator
// Values one reprocessing job: buy the modules, reprocess them, sell the minerals

import { assumptions } from '../constants/assumptions'
import {
	DEFAULT_FEE_PARAMS,
	mineralPriceAfterCosts,
	moduleCostMultiplier,
	modulePriceAfterCosts,
	rawMineralPrice,
	rawModulePrice,
} from '../trading-economics'
import type {
	Breakeven,
	FeeParams,
	Margin,
	MaterialValuation,
	MineralPriceMode,
	ModulePriceMode,
	ReprocessingValuation,
	ValuationError,
} from '../types'
import { err, ok, type Result } from '../utils/result'
import type { ItemRef, MarketData } from './catalog'
import type { InputQuantityResolver } from './input-quantity-resolver'

// ============================================================================
// TYPES
// ============================================================================

export interface ValuationOptions {
	yieldPercent: number
	feeParams: FeeParams
	reprocessingCostPercent: number
	modulePriceMode: ModulePriceMode
	mineralPriceMode: MineralPriceMode
	/** Log missing prices with console.warn. They are recorded in `warnings` either way. */
	logWarnings: boolean
}

export interface ValuationOverrides {
	inputQuantity?: number
	/** Job quantity after yield, keyed by material ID */
	materialQuantities?: ReadonlyMap<number, number>
}

export const DEFAULT_VALUATION_OPTIONS: Readonly<ValuationOptions> = {
	yieldPercent: assumptions.reprocessing.yieldPercent,
	feeParams: DEFAULT_FEE_PARAMS,
	reprocessingCostPercent: assumptions.reprocessing.reprocessingCostPercent,
	modulePriceMode: 'buyOrder',
	mineralPriceMode: 'instantSell',
	logWarnings: true,
}

export function resolveValuationOptions(options: Partial<ValuationOptions> = {}): ValuationOptions {
	return { ...DEFAULT_VALUATION_OPTIONS, ...options }
}

// ============================================================================
// JOB TOTALS
// ============================================================================

interface JobTotals {
	totalModuleCost: number
	reprocessingCost: number
	netReprocessingValue: number
	profitMargin: Margin
	breakevenModulePrice: Breakeven
}

/**
 * Costs, margin and breakeven for a job once the mineral value is known.
 *
 * The reprocessing fee is a share of the module cost, so the breakeven solves
 * `M = price * multiplier * iq * (1 + effective%)` for the quoted price.
 */
function jobTotals(
	inputQuantity: number,
	unitModuleCost: number,
	costMultiplier: number,
	effectiveReprocessingCostPercent: number,
	totalMineralValue: number
): JobTotals {
	const totalModuleCost = unitModuleCost * inputQuantity
	const reprocessingCost = totalModuleCost * (effectiveReprocessingCostPercent / 100)
	const netReprocessingValue = totalMineralValue - totalModuleCost - reprocessingCost

	const profitMargin: Margin =
		totalModuleCost > 0
			? { kind: 'value', percent: ((totalMineralValue - reprocessingCost) / totalModuleCost - 1) * 100 }
			: { kind: 'undefined' }

	let breakevenModulePrice: Breakeven = { kind: 'undefined' }
	if (totalMineralValue > 0 && inputQuantity > 0 && costMultiplier > 0) {
		const afterCosts = totalMineralValue / (inputQuantity * (1 + effectiveReprocessingCostPercent / 100))
		breakevenModulePrice = { kind: 'value', price: afterCosts / costMultiplier }
	}

	return { totalModuleCost, reprocessingCost, netReprocessingValue, profitMargin, breakevenModulePrice }
}

export function effectiveReprocessingCost(reprocessingCostPercent: number, yieldPercent: number): number {
	return reprocessingCostPercent * (yieldPercent / 100)
}

// ============================================================================
// CALCULATOR
// ============================================================================

export class ReprocessingCalculator {
	private data: MarketData
	private resolver: InputQuantityResolver

	constructor(data: MarketData, resolver: InputQuantityResolver) {
		this.data = data
		this.resolver = resolver
	}

	/**
	 * Value reprocessing one job of an item.
	 *
	 * @param ref - Item ID or exact display name
	 * @param options - Overrides for yield, fees and price modes
	 */
	calculate(ref: ItemRef, options: Partial<ValuationOptions> = {}): Result<ReprocessingValuation, ValuationError> {
		const opts = resolveValuationOptions(options)
		const warnings: string[] = []

		const lookup = this.data.lookupItem(ref)
		if (!lookup.ok) return lookup
		const item = lookup.value

		const yieldRecord = this.data.reprocessingYield(item.id)
		if (yieldRecord.length === 0) {
			return err({ kind: 'not_reprocessable', itemId: item.id, itemName: item.name })
		}

		const noPrice = (name: string, id: number) => {
			warnings.push(name)
			if (opts.logWarnings) {
				console.warn(`No price data for ${name} (${id}), valuing at 0`)
			}
		}

		const modulePriceBeforeCosts = rawModulePrice(this.data.priceQuote(item.id), opts.modulePriceMode)
		if (modulePriceBeforeCosts === 0) noPrice(item.name, item.id)
		const unitModuleCost = modulePriceAfterCosts(opts.modulePriceMode, modulePriceBeforeCosts, opts.feeParams)

		const resolved = this.resolver.resolve(item.id)
		const yieldFraction = opts.yieldPercent / 100

		const materials: MaterialValuation[] = yieldRecord.map((entry) => {
			const rawPrice = rawMineralPrice(this.data.priceQuote(entry.materialId), opts.mineralPriceMode)
			if (rawPrice === 0) noPrice(entry.materialName, entry.materialId)
			const priceAfterCosts = mineralPriceAfterCosts(opts.mineralPriceMode, rawPrice, opts.feeParams)
			const quantityAfterYield = entry.quantity * resolved.inputQuantity * yieldFraction
			return {
				materialId: entry.materialId,
				materialName: entry.materialName,
				quantityPerUnit: entry.quantity,
				quantityAfterYield,
				rawPrice,
				priceAfterCosts,
				value: quantityAfterYield * priceAfterCosts,
			}
		})

		const totalMineralValue = materials.reduce((sum, material) => sum + material.value, 0)
		const effective = effectiveReprocessingCost(opts.reprocessingCostPercent, opts.yieldPercent)
		const totals = jobTotals(
			resolved.inputQuantity,
			unitModuleCost,
			moduleCostMultiplier(opts.modulePriceMode, opts.feeParams),
			effective,
			totalMineralValue
		)

		return ok({
			item,
			yieldPercent: opts.yieldPercent,
			modulePriceMode: opts.modulePriceMode,
			mineralPriceMode: opts.mineralPriceMode,
			feeParams: { ...opts.feeParams },
			inputQuantity: resolved.inputQuantity,
			inputQuantitySource: resolved.source,
			needsReview: resolved.needsReview,
			modulePriceBeforeCosts,
			modulePriceAfterCosts: unitModuleCost,
			materials,
			totalMineralValue,
			reprocessingCostPercent: opts.reprocessingCostPercent,
			effectiveReprocessingCostPercent: effective,
			...totals,
			warnings,
		})
	}
}

// ============================================================================
// WHAT-IF RECALCULATION
// ============================================================================

/**
 * Recompute a valuation with a different input quantity or hand-edited
 * material quantities. Materials without an override scale with the input quantity.
 *
 * @param valuation - A valuation returned by the calculator
 * @param overrides - Input quantity and per-material job quantities
 */
export function recalculateWithOverrides(
	valuation: ReprocessingValuation,
	overrides: ValuationOverrides
): Result<ReprocessingValuation, ValuationError> {
	const inputQuantity = overrides.inputQuantity ?? valuation.inputQuantity
	if (!Number.isInteger(inputQuantity) || inputQuantity <= 0) {
		return err({ kind: 'invalid_override', reason: `Input quantity must be a positive integer, got ${inputQuantity}` })
	}

	const edited = overrides.materialQuantities ?? new Map<number, number>()
	for (const [materialId, quantity] of edited) {
		if (!valuation.materials.some((material) => material.materialId === materialId)) {
			return err({ kind: 'invalid_override', reason: `Material ${materialId} is not produced by ${valuation.item.name}` })
		}
		if (!Number.isFinite(quantity) || quantity < 0) {
			return err({ kind: 'invalid_override', reason: `Quantity for material ${materialId} must be non-negative` })
		}
	}

	const yieldFraction = valuation.yieldPercent / 100
	const materials = valuation.materials.map((material) => {
		const quantityAfterYield = edited.get(material.materialId) ?? material.quantityPerUnit * inputQuantity * yieldFraction
		return { ...material, quantityAfterYield, value: quantityAfterYield * material.priceAfterCosts }
	})

	const totalMineralValue = materials.reduce((sum, material) => sum + material.value, 0)
	const totals = jobTotals(
		inputQuantity,
		valuation.modulePriceAfterCosts,
		moduleCostMultiplier(valuation.modulePriceMode, valuation.feeParams),
		valuation.effectiveReprocessingCostPercent,
		totalMineralValue
	)

	return ok({
		...valuation,
		inputQuantity,
		materials,
		totalMineralValue,
		...totals,
		warnings: [...valuation.warnings],
	})
}

/**
 * User-facing message for a valuation error.
 */
export function describeValuationError(error: ValuationError): string {
	switch (error.kind) {
		case 'not_found':
			return `Item not found: ${error.ref}`
		case 'ambiguous':
			return `Multiple items match "${error.name}": ${error.candidateIds.join(', ')}`
		case 'not_reprocessable':
			return `${error.itemName} (${error.itemId}) has no reprocessing outputs`
		case 'invalid_override':
			return `Invalid override: ${error.reason}`
	}
}
