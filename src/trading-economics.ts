/**
 * Trading Economics API
 *
 * Market fee model: what it really costs to acquire an item and what you
 * really keep when selling one, after broker fees, relists and sales tax.
 */

import { assumptions } from './constants/assumptions'
import type { FeeParams, MineralPriceMode, ModulePriceMode, PriceQuote } from './types'

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_FEE_PARAMS: Readonly<FeeParams> = Object.freeze({ ...assumptions.fees })

const pct = (value: number): number => value / 100

// ============================================================================
// ORDER FEES
// ============================================================================

/**
 * Broker fee plus the expected cost of relisting (modifying) an order.
 * Both are charged on the price the order is listed at.
 */
function orderFees(listedPrice: number, params: FeeParams): { brokerFee: number; relistFee: number } {
	const brokerFee = listedPrice * pct(params.brokerFeePercent)
	const relistFee =
		listedPrice * pct(params.brokerFeePercent) * (1 - pct(params.relistDiscountPercent)) * params.averageRelists
	return { brokerFee, relistFee }
}

/**
 * Total cost of acquiring one unit through a standing buy order.
 * The order is listed `bufferPercent` above the quoted price to stay on top.
 *
 * @param price - Quoted best buy price
 * @param params - Fee parameters
 */
export function costToPlaceBuyOrder(price: number, params: FeeParams = DEFAULT_FEE_PARAMS): number {
	const loaded = price * (1 + pct(params.bufferPercent))
	const { brokerFee, relistFee } = orderFees(loaded, params)
	return loaded + relistFee + brokerFee
}

/**
 * Net proceeds of selling one unit through a standing sell order.
 * The order is listed `bufferPercent` below the quoted price.
 *
 * @param price - Quoted best sell price
 * @param params - Fee parameters
 */
export function proceedsFromSellOrder(price: number, params: FeeParams = DEFAULT_FEE_PARAMS): number {
	const loaded = price * (1 - pct(params.bufferPercent))
	const { brokerFee, relistFee } = orderFees(loaded, params)
	const salesTax = loaded * pct(params.salesTaxPercent)
	return loaded - relistFee - brokerFee - salesTax
}

/**
 * Net proceeds of selling instantly into the best buy order. Only sales tax applies.
 */
export function proceedsFromSellingIntoBuyOrder(price: number, params: FeeParams = DEFAULT_FEE_PARAMS): number {
	return price * (1 - pct(params.salesTaxPercent))
}

/**
 * Buying instantly from the best sell order carries no fees.
 */
export function costToBuyIntoSellOrder(price: number): number {
	return price
}

// ============================================================================
// PRICE MODES
// ============================================================================

/** Raw quoted price a module is acquired at for the given mode */
export function rawModulePrice(quote: PriceQuote | null, mode: ModulePriceMode): number {
	if (!quote) return 0
	return mode === 'buyOrder' ? quote.buyMax : quote.sellMin
}

/** Raw quoted price a mineral is sold at for the given mode */
export function rawMineralPrice(quote: PriceQuote | null, mode: MineralPriceMode): number {
	if (!quote) return 0
	return mode === 'instantSell' ? quote.buyMax : quote.sellMin
}

export function modulePriceAfterCosts(mode: ModulePriceMode, price: number, params: FeeParams = DEFAULT_FEE_PARAMS): number {
	return mode === 'buyOrder' ? costToPlaceBuyOrder(price, params) : costToBuyIntoSellOrder(price)
}

export function mineralPriceAfterCosts(mode: MineralPriceMode, price: number, params: FeeParams = DEFAULT_FEE_PARAMS): number {
	return mode === 'instantSell' ? proceedsFromSellingIntoBuyOrder(price, params) : proceedsFromSellOrder(price, params)
}

/**
 * Cost after fees of one unit quoted at 1 ISK. Every fee function is linear in
 * price, so `modulePriceAfterCosts(mode, p) === p * moduleCostMultiplier(mode)`.
 */
export function moduleCostMultiplier(mode: ModulePriceMode, params: FeeParams = DEFAULT_FEE_PARAMS): number {
	return modulePriceAfterCosts(mode, 1, params)
}
