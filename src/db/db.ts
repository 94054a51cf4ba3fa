import { remember } from '@epic-web/remember'
import Database from 'better-sqlite3'
import * as fs from 'fs'
import * as path from 'path'
import { normalizeYieldQuantities } from './migrations'

export type Db = Database.Database

/**
 * Location of the industry database, read from INDUSTRY_DB_PATH when set.
 */
export function resolveDbPath(): string {
	return process.env.INDUSTRY_DB_PATH ?? path.join(process.cwd(), 'data', 'industry.sqlite')
}

/**
 * Shared connection. Opened lazily so that importing a service never touches the filesystem.
 */
export function getDb(): Db {
	return remember('sqlite-db', () => openDatabase(resolveDbPath()))
}

export function openDatabase(dbPath: string): Db {
	if (dbPath !== ':memory:') {
		const dir = path.dirname(dbPath)
		if (!fs.existsSync(dir)) {
			fs.mkdirSync(dir, { recursive: true })
		}
	}

	const instance = new Database(dbPath)
	instance.pragma('journal_mode = WAL')
	instance.pragma('synchronous = NORMAL')

	initializeSchema(instance)

	const migrated = normalizeYieldQuantities(instance)
	if (migrated.normalized) {
		console.log(`Normalized ${migrated.rowsUpdated} reprocessing outputs to per-unit quantities`)
	}

	return instance
}

export function initializeSchema(instance: Db): void {
	instance.exec(`
		CREATE TABLE IF NOT EXISTS groups (
			group_id INTEGER PRIMARY KEY,
			group_name TEXT NOT NULL,
			category_id INTEGER
		);

		CREATE TABLE IF NOT EXISTS items (
			type_id INTEGER PRIMARY KEY,
			type_name TEXT NOT NULL,
			group_id INTEGER,
			category_id INTEGER
		);

		CREATE INDEX IF NOT EXISTS idx_items_type_name ON items(type_name);
		CREATE INDEX IF NOT EXISTS idx_items_group_id ON items(group_id);

		CREATE TABLE IF NOT EXISTS blueprints (
			blueprint_type_id INTEGER PRIMARY KEY,
			product_type_id INTEGER NOT NULL,
			product_name TEXT NOT NULL,
			output_quantity INTEGER NOT NULL
		);

		CREATE INDEX IF NOT EXISTS idx_blueprints_product ON blueprints(product_type_id);

		CREATE TABLE IF NOT EXISTS manufacturing_materials (
			blueprint_type_id INTEGER NOT NULL,
			material_type_id INTEGER NOT NULL,
			material_name TEXT NOT NULL,
			quantity INTEGER NOT NULL,
			PRIMARY KEY (blueprint_type_id, material_type_id)
		);

		CREATE TABLE IF NOT EXISTS manufacturing_skills (
			blueprint_type_id INTEGER NOT NULL,
			skill_id INTEGER NOT NULL,
			skill_name TEXT NOT NULL,
			level INTEGER NOT NULL,
			PRIMARY KEY (blueprint_type_id, skill_id)
		);

		CREATE TABLE IF NOT EXISTS reprocessing_outputs (
			item_type_id INTEGER NOT NULL,
			material_type_id INTEGER NOT NULL,
			material_name TEXT NOT NULL,
			quantity REAL NOT NULL,
			PRIMARY KEY (item_type_id, material_type_id)
		);

		CREATE TABLE IF NOT EXISTS prices (
			type_id INTEGER PRIMARY KEY,
			buy_max REAL NOT NULL DEFAULT 0,
			sell_min REAL NOT NULL DEFAULT 0,
			updated_at TEXT
		);

		CREATE TABLE IF NOT EXISTS character_skills (
			skill_id INTEGER PRIMARY KEY,
			skill_name TEXT NOT NULL,
			level INTEGER NOT NULL CHECK (level >= 0 AND level <= 5)
		);

		CREATE TABLE IF NOT EXISTS inventory (
			type_id INTEGER PRIMARY KEY,
			type_name TEXT NOT NULL,
			quantity INTEGER NOT NULL DEFAULT 0
		);

		CREATE TABLE IF NOT EXISTS input_quantity_cache (
			type_id INTEGER PRIMARY KEY,
			input_quantity INTEGER NOT NULL,
			source TEXT NOT NULL,
			needs_review INTEGER NOT NULL DEFAULT 0,
			created_at TEXT NOT NULL
		);

		CREATE TABLE IF NOT EXISTS excluded_items (
			type_id INTEGER NOT NULL,
			type_name TEXT NOT NULL,
			min_price REAL NOT NULL,
			max_price REAL NOT NULL,
			module_price_mode TEXT NOT NULL,
			mineral_price_mode TEXT NOT NULL,
			excluded_at TEXT NOT NULL,
			PRIMARY KEY (type_id, min_price, max_price, module_price_mode, mineral_price_mode)
		);
	`)
}

export function getDatabaseSize(dbPath: string = resolveDbPath()): number {
	let totalSize = 0

	for (const file of [dbPath, dbPath + '-wal', dbPath + '-shm']) {
		if (fs.existsSync(file)) {
			totalSize += fs.statSync(file).size
		}
	}

	return totalSize
}

export function closeDb(): void {
	getDb().close()
}
