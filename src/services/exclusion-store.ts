// Exclusion Store
// Items the user hid from a particular analysis search

import type { Db } from '../db/db'
import { getDb } from '../db/db'
import type { Item, MineralPriceMode, ModulePriceMode, SearchScope } from '../types'

export interface ExclusionEntry extends SearchScope {
	itemId: number
	itemName: string
	excludedAt: string
}

export interface ExclusionSource {
	excludedIdsFor(scope: SearchScope): Set<number>
}

interface ExclusionRow {
	type_id: number
	type_name: string
	min_price: number
	max_price: number
	module_price_mode: string
	mineral_price_mode: string
	excluded_at: string
}

function isModulePriceMode(value: string): value is ModulePriceMode {
	return value === 'buyOrder' || value === 'instantBuy'
}

function isMineralPriceMode(value: string): value is MineralPriceMode {
	return value === 'instantSell' || value === 'sellOrder'
}

export class ExclusionStore implements ExclusionSource {
	private db: Db

	constructor(db: Db = getDb()) {
		this.db = db
	}

	/**
	 * Hide an item from searches with exactly this price band and price modes.
	 * Returns false when it was already hidden.
	 */
	exclude(item: Pick<Item, 'id' | 'name'>, scope: SearchScope, now: Date = new Date()): boolean {
		const result = this.db
			.prepare(
				`INSERT OR IGNORE INTO excluded_items
				(type_id, type_name, min_price, max_price, module_price_mode, mineral_price_mode, excluded_at)
				VALUES (?, ?, ?, ?, ?, ?, ?)`
			)
			.run(
				item.id,
				item.name,
				scope.minPrice,
				scope.maxPrice,
				scope.modulePriceMode,
				scope.mineralPriceMode,
				now.toISOString()
			)
		return result.changes > 0
	}

	excludedIdsFor(scope: SearchScope): Set<number> {
		const rows = this.db
			.prepare<[number, number, string, string], { type_id: number }>(
				`SELECT type_id FROM excluded_items
				WHERE min_price = ? AND max_price = ? AND module_price_mode = ? AND mineral_price_mode = ?`
			)
			.all(scope.minPrice, scope.maxPrice, scope.modulePriceMode, scope.mineralPriceMode)
		return new Set(rows.map((row) => row.type_id))
	}

	list(): ExclusionEntry[] {
		const rows = this.db
			.prepare<[], ExclusionRow>(
				`SELECT type_id, type_name, min_price, max_price, module_price_mode, mineral_price_mode, excluded_at
				FROM excluded_items
				ORDER BY excluded_at, type_id`
			)
			.all()

		const entries: ExclusionEntry[] = []
		for (const row of rows) {
			const modulePriceMode = row.module_price_mode
			const mineralPriceMode = row.mineral_price_mode
			if (!isModulePriceMode(modulePriceMode) || !isMineralPriceMode(mineralPriceMode)) {
				console.warn(`Skipping exclusion for ${row.type_name} with unknown price modes`)
				continue
			}
			entries.push({
				itemId: row.type_id,
				itemName: row.type_name,
				minPrice: row.min_price,
				maxPrice: row.max_price,
				modulePriceMode,
				mineralPriceMode,
				excludedAt: row.excluded_at,
			})
		}
		return entries
	}

	/**
	 * Remove an exclusion. Without a scope the item is restored to every search.
	 */
	remove(itemId: number, scope?: SearchScope): number {
		if (!scope) {
			return this.db.prepare('DELETE FROM excluded_items WHERE type_id = ?').run(itemId).changes
		}
		return this.db
			.prepare(
				`DELETE FROM excluded_items
				WHERE type_id = ? AND min_price = ? AND max_price = ? AND module_price_mode = ? AND mineral_price_mode = ?`
			)
			.run(itemId, scope.minPrice, scope.maxPrice, scope.modulePriceMode, scope.mineralPriceMode).changes
	}

	clear(): number {
		return this.db.prepare('DELETE FROM excluded_items').run().changes
	}
}
