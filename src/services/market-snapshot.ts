// Market Snapshot
// In-memory read model of items, blueprints, prices and yields, loaded in one pass

import type { Db } from '../db/db'
import { getDb } from '../db/db'
import type { Item, PriceQuote, YieldEntry } from '../types'
import { err, ok, type Result } from '../utils/result'
import { ITEM_COLUMNS, foldCase, pickByName, toItem, toQuote, type ItemRef, type ItemRow, type LookupError, type MarketData, type PriceRow } from './catalog'

// ============================================================================
// TYPES
// ============================================================================

export interface BlueprintOutput {
	blueprintId: number
	productId: number
	outputQuantity: number
}

export interface YieldRecordRow extends YieldEntry {
	itemId: number
}

export interface MarketSnapshotData {
	items: Item[]
	blueprints?: BlueprintOutput[]
	quotes?: PriceQuote[]
	yields?: YieldRecordRow[]
}

// ============================================================================
// SNAPSHOT
// ============================================================================

export class MarketSnapshot implements MarketData {
	private items: Map<number, Item>
	private itemsByName: Map<string, Item[]>
	private groups: Map<number, Item[]>
	private blueprintOutputs: Map<number, BlueprintOutput>
	private quotes: Map<number, PriceQuote>
	private yields: Map<number, YieldEntry[]>

	constructor(data: MarketSnapshotData) {
		// Index items by ID, name and group for fast lookup
		this.items = new Map()
		this.itemsByName = new Map()
		this.groups = new Map()
		const sortedItems = [...data.items].sort((a, b) => a.id - b.id)
		for (const item of sortedItems) {
			this.items.set(item.id, item)
			pushTo(this.itemsByName, item.name, item)
			if (item.groupId !== null) {
				pushTo(this.groups, item.groupId, item)
			}
		}

		// Lowest blueprint ID wins when several blueprints make the same product
		this.blueprintOutputs = new Map()
		for (const blueprint of data.blueprints ?? []) {
			const current = this.blueprintOutputs.get(blueprint.productId)
			if (!current || blueprint.blueprintId < current.blueprintId) {
				this.blueprintOutputs.set(blueprint.productId, blueprint)
			}
		}

		this.quotes = new Map()
		for (const quote of data.quotes ?? []) {
			this.quotes.set(quote.itemId, quote)
		}

		this.yields = new Map()
		for (const row of data.yields ?? []) {
			pushTo(this.yields, row.itemId, {
				materialId: row.materialId,
				materialName: row.materialName,
				quantity: row.quantity,
			})
		}
		for (const entries of this.yields.values()) {
			entries.sort((a, b) => a.materialId - b.materialId)
		}
	}

	/**
	 * Load everything the batch analyzer reads with four queries.
	 */
	static fromDatabase(db: Db = getDb()): MarketSnapshot {
		const items = db.prepare<[], ItemRow>(`SELECT ${ITEM_COLUMNS} FROM items`).all().map(toItem)

		const blueprints = db
			.prepare<[], { blueprint_type_id: number; product_type_id: number; output_quantity: number }>(
				'SELECT blueprint_type_id, product_type_id, output_quantity FROM blueprints'
			)
			.all()
			.map((row) => ({
				blueprintId: row.blueprint_type_id,
				productId: row.product_type_id,
				outputQuantity: row.output_quantity,
			}))

		const quotes = db
			.prepare<[], PriceRow>('SELECT type_id, buy_max, sell_min FROM prices')
			.all()
			.map(toQuote)

		const yields = db
			.prepare<[], { item_type_id: number; material_type_id: number; material_name: string; quantity: number }>(
				'SELECT item_type_id, material_type_id, material_name, quantity FROM reprocessing_outputs'
			)
			.all()
			.map((row) => ({
				itemId: row.item_type_id,
				materialId: row.material_type_id,
				materialName: row.material_name,
				quantity: row.quantity,
			}))

		return new MarketSnapshot({ items, blueprints, quotes, yields })
	}

	lookupItem(ref: ItemRef): Result<Item, LookupError> {
		if (typeof ref === 'number') {
			const item = this.items.get(ref)
			return item ? ok(item) : err({ kind: 'not_found', ref: String(ref) })
		}

		const exact = this.itemsByName.get(ref)
		if (exact) return pickByName(ref, exact)

		const folded = foldCase(ref)
		const matches = [...this.items.values()].filter((item) => foldCase(item.name) === folded)
		return pickByName(ref, matches)
	}

	getItem(itemId: number): Item | null {
		return this.items.get(itemId) ?? null
	}

	itemsInGroup(groupId: number): Item[] {
		return [...(this.groups.get(groupId) ?? [])]
	}

	blueprintOutputFor(itemId: number): number | null {
		return this.blueprintOutputs.get(itemId)?.outputQuantity ?? null
	}

	reprocessableItems(): Item[] {
		return [...this.items.values()].filter((item) => this.yields.has(item.id))
	}

	allItems(): Item[] {
		return [...this.items.values()]
	}

	priceQuote(itemId: number): PriceQuote | null {
		return this.quotes.get(itemId) ?? null
	}

	reprocessingYield(itemId: number): YieldEntry[] {
		return [...(this.yields.get(itemId) ?? [])]
	}
}

function pushTo<K, V>(map: Map<K, V[]>, key: K, value: V): void {
	const list = map.get(key)
	if (list) {
		list.push(value)
	} else {
		map.set(key, [value])
	}
}
