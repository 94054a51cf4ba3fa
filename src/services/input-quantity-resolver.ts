// Input Quantity Resolver
// Decides how many units of an item are reprocessed together as one job

import type { InputQuantityEntry, Item, ResolvedInputQuantity } from '../types'
import type { Catalog } from './catalog'
import type { QuantityCacheStore } from './input-quantity-cache'

export const DEFAULT_INPUT_QUANTITY = 1

export class InputQuantityResolver {
	private catalog: Catalog
	private cache: QuantityCacheStore
	private now: () => Date

	constructor(catalog: Catalog, cache: QuantityCacheStore, now: () => Date = () => new Date()) {
		this.catalog = catalog
		this.cache = cache
		this.now = now
	}

	/**
	 * Resolve the input quantity for an item.
	 *
	 * Order: cached entry, the item's own blueprint, the output its group agrees on,
	 * the group's most frequent output, then 1. Anything not read from the cache
	 * is written back, so a cached value sticks until it is cleared.
	 *
	 * @param itemId - Catalog item ID
	 */
	resolve(itemId: number): ResolvedInputQuantity {
		const cached = this.cache.get(itemId)
		if (cached) {
			return { inputQuantity: cached.inputQuantity, source: cached.source, needsReview: cached.needsReview }
		}

		const item = this.catalog.getItem(itemId)
		if (!item) {
			console.warn(`Item ${itemId} not found in catalog, using default input quantity`)
		}

		const resolved = item ? this.resolveFromCatalog(item) : defaultQuantity()
		this.store(itemId, resolved)
		return resolved
	}

	private resolveFromCatalog(item: Item): ResolvedInputQuantity {
		const ownOutput = this.catalog.blueprintOutputFor(item.id)
		if (ownOutput !== null) {
			return { inputQuantity: ownOutput, source: 'blueprint', needsReview: false }
		}

		if (item.groupId === null) return defaultQuantity()

		// Outputs of group members that have a blueprint, walked in ascending ID order
		const outputs: number[] = []
		for (const member of this.catalog.itemsInGroup(item.groupId)) {
			if (member.id === item.id) continue
			const output = this.catalog.blueprintOutputFor(member.id)
			if (output !== null) outputs.push(output)
		}

		if (outputs.length === 0) return defaultQuantity()

		const distinct = new Set(outputs)
		if (distinct.size === 1) {
			return { inputQuantity: outputs[0], source: 'group_consensus', needsReview: false }
		}

		return { inputQuantity: mostFrequent(outputs), source: 'group_most_frequent', needsReview: true }
	}

	private store(itemId: number, resolved: ResolvedInputQuantity): void {
		const entry: InputQuantityEntry = { itemId, ...resolved, createdAt: this.now().toISOString() }
		this.cache.put(entry)
	}

	clear(itemId: number): boolean {
		return this.cache.delete(itemId)
	}

	clearAll(): number {
		return this.cache.clear()
	}

	needingReview(limit = 50): InputQuantityEntry[] {
		return this.cache.needingReview(limit)
	}

	cachedCount(): number {
		return this.cache.count()
	}
}

function defaultQuantity(): ResolvedInputQuantity {
	return { inputQuantity: DEFAULT_INPUT_QUANTITY, source: 'default', needsReview: true }
}

/**
 * Most frequent value. Ties go to the value seen first.
 */
export function mostFrequent(values: number[]): number {
	const counts = new Map<number, number>()
	for (const value of values) {
		counts.set(value, (counts.get(value) ?? 0) + 1)
	}

	let best = values[0]
	let bestCount = 0
	// Map iterates in insertion order, so the first value reaching the top count wins
	for (const [value, count] of counts) {
		if (count > bestCount) {
			best = value
			bestCount = count
		}
	}
	return best
}
