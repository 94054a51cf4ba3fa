// Input Quantity Cache
// Persists resolved input quantities per item. Entries are never refreshed automatically.

import type { Db } from '../db/db'
import { getDb } from '../db/db'
import type { InputQuantityEntry, InputQuantitySource } from '../types'
import { INPUT_QUANTITY_SOURCES } from '../types'

export interface QuantityCacheStore {
	get(itemId: number): InputQuantityEntry | null
	put(entry: InputQuantityEntry): void
	delete(itemId: number): boolean
	clear(): number
	needingReview(limit: number): InputQuantityEntry[]
	count(): number
}

interface CacheRow {
	type_id: number
	input_quantity: number
	source: string
	needs_review: number
	created_at: string
}

function isSource(value: string): value is InputQuantitySource {
	return INPUT_QUANTITY_SOURCES.some((source) => source === value)
}

function toEntry(row: CacheRow): InputQuantityEntry {
	if (!isSource(row.source)) {
		// Hand-edited rows with an unknown source are treated as needing review
		return {
			itemId: row.type_id,
			inputQuantity: row.input_quantity,
			source: 'default',
			needsReview: true,
			createdAt: row.created_at,
		}
	}
	return {
		itemId: row.type_id,
		inputQuantity: row.input_quantity,
		source: row.source,
		needsReview: row.needs_review === 1,
		createdAt: row.created_at,
	}
}

export class SqliteQuantityCache implements QuantityCacheStore {
	private db: Db

	constructor(db: Db = getDb()) {
		this.db = db
	}

	get(itemId: number): InputQuantityEntry | null {
		const row = this.db
			.prepare<[number], CacheRow>(
				'SELECT type_id, input_quantity, source, needs_review, created_at FROM input_quantity_cache WHERE type_id = ?'
			)
			.get(itemId)
		return row ? toEntry(row) : null
	}

	put(entry: InputQuantityEntry): void {
		this.db
			.prepare(
				`INSERT OR REPLACE INTO input_quantity_cache (type_id, input_quantity, source, needs_review, created_at)
				VALUES (?, ?, ?, ?, ?)`
			)
			.run(entry.itemId, entry.inputQuantity, entry.source, entry.needsReview ? 1 : 0, entry.createdAt)
	}

	delete(itemId: number): boolean {
		return this.db.prepare('DELETE FROM input_quantity_cache WHERE type_id = ?').run(itemId).changes > 0
	}

	clear(): number {
		return this.db.prepare('DELETE FROM input_quantity_cache').run().changes
	}

	needingReview(limit: number): InputQuantityEntry[] {
		return this.db
			.prepare<[number], CacheRow>(
				`SELECT type_id, input_quantity, source, needs_review, created_at
				FROM input_quantity_cache
				WHERE needs_review = 1
				ORDER BY type_id
				LIMIT ?`
			)
			.all(limit)
			.map(toEntry)
	}

	count(): number {
		const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM input_quantity_cache').get()
		return row?.total ?? 0
	}
}

export class MemoryQuantityCache implements QuantityCacheStore {
	private entries = new Map<number, InputQuantityEntry>()

	get(itemId: number): InputQuantityEntry | null {
		return this.entries.get(itemId) ?? null
	}

	put(entry: InputQuantityEntry): void {
		this.entries.set(entry.itemId, { ...entry })
	}

	delete(itemId: number): boolean {
		return this.entries.delete(itemId)
	}

	clear(): number {
		const size = this.entries.size
		this.entries.clear()
		return size
	}

	needingReview(limit: number): InputQuantityEntry[] {
		return [...this.entries.values()]
			.filter((entry) => entry.needsReview)
			.sort((a, b) => a.itemId - b.itemId)
			.slice(0, limit)
	}

	count(): number {
		return this.entries.size
	}
}
