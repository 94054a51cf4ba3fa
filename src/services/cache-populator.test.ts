import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest'
import { formatPopulateStats, populateInputQuantityCache } from './cache-populator'
import { MemoryQuantityCache } from './input-quantity-cache'
import { InputQuantityResolver } from './input-quantity-resolver'
import { MarketSnapshot } from './market-snapshot'

const snapshot = new MarketSnapshot({
	items: [
		{ id: 1, name: 'Stasis Webifier I', groupId: 10, categoryId: 7 },
		{ id: 2, name: 'Stasis Webifier II', groupId: 10, categoryId: 7 },
		{ id: 3, name: 'Odd Trinket', groupId: null, categoryId: null },
	],
	blueprints: [{ blueprintId: 1001, productId: 1, outputQuantity: 20 }],
})

let cache: MemoryQuantityCache
let resolver: InputQuantityResolver

beforeEach(() => {
	vi.spyOn(console, 'log').mockImplementation(() => {})
	cache = new MemoryQuantityCache()
	resolver = new InputQuantityResolver(snapshot, cache)
})

afterEach(() => {
	vi.restoreAllMocks()
})

describe('populateInputQuantityCache', () => {
	test('resolves every item and counts sources', () => {
		const stats = populateInputQuantityCache(snapshot, resolver)

		expect(stats).toEqual({
			totalItems: 3,
			bySource: { blueprint: 1, group_consensus: 1, group_most_frequent: 0, default: 1 },
			needsReview: 1,
			cacheSize: 3,
		})
		expect(cache.get(2)?.inputQuantity).toBe(20)
	})

	test('running again gives the same result', () => {
		const first = populateInputQuantityCache(snapshot, resolver)

		expect(populateInputQuantityCache(snapshot, resolver)).toEqual(first)
	})

	test('warns when the cache holds entries for items outside the catalog', () => {
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
		cache.put({ itemId: 99, inputQuantity: 5, source: 'blueprint', needsReview: false, createdAt: '2026-01-01T00:00:00.000Z' })

		expect(populateInputQuantityCache(snapshot, resolver).cacheSize).toBe(4)
		expect(warn).toHaveBeenCalledWith('Cache holds 4 entries for 3 catalog items')
	})
})

describe('formatPopulateStats', () => {
	test('prints one line per source', () => {
		const text = formatPopulateStats({
			totalItems: 3,
			bySource: { blueprint: 1, group_consensus: 1, group_most_frequent: 0, default: 1 },
			needsReview: 1,
			cacheSize: 3,
		})

		expect(text.split('\n')).toEqual([
			'Items resolved: 3',
			'  blueprint            1',
			'  group_consensus      1',
			'  group_most_frequent  0',
			'  default              1',
			'Needs review: 1',
			'Cache size: 3',
		])
	})
})
