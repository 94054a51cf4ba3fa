// Cache Populator
// Resolves the input quantity of every catalog item ahead of analysis

import type { InputQuantitySource } from '../types'
import { INPUT_QUANTITY_SOURCES } from '../types'
import type { Catalog } from './catalog'
import type { InputQuantityResolver } from './input-quantity-resolver'

export interface PopulateStats {
	totalItems: number
	bySource: Record<InputQuantitySource, number>
	needsReview: number
	cacheSize: number
}

const PROGRESS_INTERVAL = 1000

/**
 * Resolve every item so later valuations hit the cache. Safe to run repeatedly:
 * items already cached are read back unchanged.
 */
export function populateInputQuantityCache(catalog: Catalog, resolver: InputQuantityResolver): PopulateStats {
	const items = catalog.allItems()
	const bySource: Record<InputQuantitySource, number> = {
		blueprint: 0,
		group_consensus: 0,
		group_most_frequent: 0,
		default: 0,
	}
	let needsReview = 0

	console.log(`Resolving input quantities for ${items.length} items...`)

	items.forEach((item, index) => {
		const resolved = resolver.resolve(item.id)
		bySource[resolved.source]++
		if (resolved.needsReview) needsReview++

		if ((index + 1) % PROGRESS_INTERVAL === 0) {
			console.log(`  ...${index + 1}/${items.length}`)
		}
	})

	const cacheSize = resolver.cachedCount()
	if (cacheSize !== items.length) {
		console.warn(`Cache holds ${cacheSize} entries for ${items.length} catalog items`)
	}

	return { totalItems: items.length, bySource, needsReview, cacheSize }
}

export function formatPopulateStats(stats: PopulateStats): string {
	const lines = [`Items resolved: ${stats.totalItems}`]
	for (const source of INPUT_QUANTITY_SOURCES) {
		lines.push(`  ${source.padEnd(20)} ${stats.bySource[source]}`)
	}
	lines.push(`Needs review: ${stats.needsReview}`)
	lines.push(`Cache size: ${stats.cacheSize}`)
	return lines.join('\n')
}
