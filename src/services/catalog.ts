// Catalog, price and yield data sources backed by the industry database

import type { Db } from '../db/db'
import { getDb } from '../db/db'
import type { Item, PriceQuote, ValuationError, YieldEntry } from '../types'
import { err, ok, type Result } from '../utils/result'

// ============================================================================
// TYPES
// ============================================================================

export type LookupError = Extract<ValuationError, { kind: 'not_found' | 'ambiguous' }>

export type ItemRef = number | string

export interface Catalog {
	lookupItem(ref: ItemRef): Result<Item, LookupError>
	getItem(itemId: number): Item | null
	/** Members of a group in ascending ID order */
	itemsInGroup(groupId: number): Item[]
	/** Output quantity of the blueprint producing the item, lowest blueprint ID first */
	blueprintOutputFor(itemId: number): number | null
	reprocessableItems(): Item[]
	allItems(): Item[]
}

export interface PriceSource {
	priceQuote(itemId: number): PriceQuote | null
}

export interface YieldSource {
	reprocessingYield(itemId: number): YieldEntry[]
}

export type MarketData = Catalog & PriceSource & YieldSource

export interface ItemRow {
	type_id: number
	type_name: string
	group_id: number | null
	category_id: number | null
}

interface YieldRow {
	material_type_id: number
	material_name: string
	quantity: number
}

export interface PriceRow {
	type_id: number
	buy_max: number | null
	sell_min: number | null
}

// ============================================================================
// HELPERS
// ============================================================================

export function toItem(row: ItemRow): Item {
	return { id: row.type_id, name: row.type_name, groupId: row.group_id, categoryId: row.category_id }
}

export function toQuote(row: PriceRow): PriceQuote {
	return { itemId: row.type_id, buyMax: row.buy_max ?? 0, sellMin: row.sell_min ?? 0 }
}

/** Lowercases ASCII letters only, the same rule as SQLite's NOCASE collation. */
export function foldCase(name: string): string {
	return name.replace(/[A-Z]/g, (letter) => letter.toLowerCase())
}

/**
 * Resolve a name lookup: one match wins, several is ambiguous, none is not found.
 */
export function pickByName(name: string, matches: Item[]): Result<Item, LookupError> {
	if (matches.length === 0) return err({ kind: 'not_found', ref: name })
	if (matches.length > 1) {
		return err({ kind: 'ambiguous', name, candidateIds: matches.map((item) => item.id).sort((a, b) => a - b) })
	}
	return ok(matches[0])
}

export const ITEM_COLUMNS = 'type_id, type_name, group_id, category_id'

// ============================================================================
// SQLITE CATALOG
// ============================================================================

export class SqliteCatalog implements MarketData {
	private db: Db

	constructor(db: Db = getDb()) {
		this.db = db
	}

	lookupItem(ref: ItemRef): Result<Item, LookupError> {
		if (typeof ref === 'number') {
			const item = this.getItem(ref)
			return item ? ok(item) : err({ kind: 'not_found', ref: String(ref) })
		}

		const exact = this.db
			.prepare<[string], ItemRow>(`SELECT ${ITEM_COLUMNS} FROM items WHERE type_name = ?`)
			.all(ref)
			.map(toItem)
		if (exact.length > 0) return pickByName(ref, exact)

		const folded = this.db
			.prepare<[string], ItemRow>(`SELECT ${ITEM_COLUMNS} FROM items WHERE type_name = ? COLLATE NOCASE`)
			.all(ref)
			.map(toItem)
		return pickByName(ref, folded)
	}

	getItem(itemId: number): Item | null {
		const row = this.db.prepare<[number], ItemRow>(`SELECT ${ITEM_COLUMNS} FROM items WHERE type_id = ?`).get(itemId)
		return row ? toItem(row) : null
	}

	itemsInGroup(groupId: number): Item[] {
		return this.db
			.prepare<[number], ItemRow>(`SELECT ${ITEM_COLUMNS} FROM items WHERE group_id = ? ORDER BY type_id`)
			.all(groupId)
			.map(toItem)
	}

	blueprintOutputFor(itemId: number): number | null {
		const row = this.db
			.prepare<[number], { output_quantity: number }>(
				'SELECT output_quantity FROM blueprints WHERE product_type_id = ? ORDER BY blueprint_type_id LIMIT 1'
			)
			.get(itemId)
		return row ? row.output_quantity : null
	}

	reprocessableItems(): Item[] {
		return this.db
			.prepare<[], ItemRow>(
				`SELECT ${ITEM_COLUMNS} FROM items
				WHERE type_id IN (SELECT DISTINCT item_type_id FROM reprocessing_outputs)
				ORDER BY type_id`
			)
			.all()
			.map(toItem)
	}

	allItems(): Item[] {
		return this.db.prepare<[], ItemRow>(`SELECT ${ITEM_COLUMNS} FROM items ORDER BY type_id`).all().map(toItem)
	}

	/** Case-insensitive substring search used by the interactive picker */
	searchItems(term: string, limit = 20): Item[] {
		return this.db
			.prepare<[string, number], ItemRow>(
				`SELECT ${ITEM_COLUMNS} FROM items WHERE type_name LIKE ? ORDER BY type_name LIMIT ?`
			)
			.all(`%${term}%`, limit)
			.map(toItem)
	}

	priceQuote(itemId: number): PriceQuote | null {
		const row = this.db
			.prepare<[number], PriceRow>('SELECT type_id, buy_max, sell_min FROM prices WHERE type_id = ?')
			.get(itemId)
		return row ? toQuote(row) : null
	}

	reprocessingYield(itemId: number): YieldEntry[] {
		return this.db
			.prepare<[number], YieldRow>(
				`SELECT material_type_id, material_name, quantity FROM reprocessing_outputs
				WHERE item_type_id = ?
				ORDER BY material_type_id`
			)
			.all(itemId)
			.map((row) => ({ materialId: row.material_type_id, materialName: row.material_name, quantity: row.quantity }))
	}
}
