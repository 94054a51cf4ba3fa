import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest'
import Database from 'better-sqlite3'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { getDatabaseSize, openDatabase } from './db'

let dir: string

beforeEach(() => {
	dir = fs.mkdtempSync(path.join(os.tmpdir(), 'industry-db-'))
})

afterEach(() => {
	fs.rmSync(dir, { recursive: true, force: true })
	vi.restoreAllMocks()
})

describe('openDatabase', () => {
	test('creates the directory and every table', () => {
		const dbPath = path.join(dir, 'nested', 'industry.sqlite')
		const db = openDatabase(dbPath)

		const tables = db
			.prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
			.all()
			.map((row) => row.name)
		db.close()

		expect(tables).toEqual([
			'blueprints',
			'character_skills',
			'excluded_items',
			'groups',
			'input_quantity_cache',
			'inventory',
			'items',
			'manufacturing_materials',
			'manufacturing_skills',
			'prices',
			'reprocessing_outputs',
		])
		expect(getDatabaseSize(dbPath)).toBeGreaterThan(0)
	})

	test('converts a legacy yield table on open', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {})
		const dbPath = path.join(dir, 'legacy.sqlite')
		const legacy = new Database(dbPath)
		legacy.exec(`
			CREATE TABLE reprocessing_outputs (
				item_type_id INTEGER NOT NULL,
				material_type_id INTEGER NOT NULL,
				material_name TEXT NOT NULL,
				quantity INTEGER NOT NULL,
				batch_size INTEGER
			);
			INSERT INTO reprocessing_outputs VALUES (1, 34, 'Tritanium', 400, 100);
		`)
		legacy.close()

		const db = openDatabase(dbPath)
		const row = db.prepare<[], { quantity: number }>('SELECT quantity FROM reprocessing_outputs').get()
		db.close()

		expect(row?.quantity).toBe(4)
		expect(log).toHaveBeenCalledWith('Normalized 1 reprocessing outputs to per-unit quantities')
	})
})

describe('getDatabaseSize', () => {
	test('is 0 for a missing database', () => {
		expect(getDatabaseSize(path.join(dir, 'missing.sqlite'))).toBe(0)
	})
})
